import { runMedGemmaRequest } from "@llm-medgemma"
import type { MedGemmaGeneratorOptions } from "@llm-medgemma"
import type { ImageFindings, ImageInput, VisionAnalyzer } from "@pipeline-shared"
import { parseImageFindings } from "../findings"
import { VISION_MAX_OUTPUT_TOKENS, VISION_SYSTEM_PROMPT, VISION_USER_PROMPT } from "../prompts"

/** Multimodal chat completions against a local OpenAI-compatible server. */
export class MedGemmaVisionAnalyzer implements VisionAnalyzer {
  readonly name = "medgemma"

  constructor(private readonly options: MedGemmaGeneratorOptions = {}) {}

  async describe(input: ImageInput, signal?: AbortSignal): Promise<ImageFindings> {
    const raw = await runMedGemmaRequest({
      ...this.options,
      system: VISION_SYSTEM_PROMPT,
      prompt: VISION_USER_PROMPT,
      images: [input],
      maxTokens: VISION_MAX_OUTPUT_TOKENS,
      failureCode: "vision_failed",
      signal,
    })
    return parseImageFindings(raw)
  }
}
