import { runAnthropicImageRequest } from "@llm"
import type { AnthropicOptions } from "@llm"
import type { ImageFindings, ImageInput, VisionAnalyzer } from "@pipeline-shared"
import { parseImageFindings } from "../findings"
import { VISION_MAX_OUTPUT_TOKENS, VISION_SYSTEM_PROMPT, VISION_USER_PROMPT } from "../prompts"

export class AnthropicVisionAnalyzer implements VisionAnalyzer {
  readonly name = "anthropic"

  constructor(private readonly options: AnthropicOptions = {}) {}

  async describe(input: ImageInput, signal?: AbortSignal): Promise<ImageFindings> {
    const raw = await runAnthropicImageRequest(
      {
        system: VISION_SYSTEM_PROMPT,
        prompt: VISION_USER_PROMPT,
        image: input,
        maxOutputTokens: VISION_MAX_OUTPUT_TOKENS,
      },
      this.options,
      signal,
    )
    return parseImageFindings(raw)
  }
}
