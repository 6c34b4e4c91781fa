import Anthropic from "@anthropic-ai/sdk"
import { PipelineStageError, classifyHttpStatus, lengthExceeded } from "@pipeline-errors"
import type { GenerationRequest, ImageInput, TextGenerator } from "@pipeline-shared"

export const DEFAULT_ANTHROPIC_MODEL = "claude-sonnet-4-5-20250929"

export interface AnthropicContentBlock {
  type: string
  text?: string
  input?: unknown
}

export interface AnthropicReply {
  content: AnthropicContentBlock[]
  stop_reason: string | null
  usage: { output_tokens: number }
}

/** The slice of the SDK client used here; tests pass a scripted fake. */
export interface AnthropicMessagesClient {
  messages: {
    create(
      params: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal },
    ): Promise<AnthropicReply>
  }
}

export interface AnthropicOptions {
  apiKey?: string
  model?: string
  client?: AnthropicMessagesClient
}

function resolveClient(options: AnthropicOptions): AnthropicMessagesClient {
  if (options.client) return options.client

  const anthropicApiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY
  if (!anthropicApiKey) {
    throw new PipelineStageError(
      "configuration_error",
      "ANTHROPIC_API_KEY environment variable is required. Please set it in your .env file or environment.",
      false,
    )
  }
  return new Anthropic({ apiKey: anthropicApiKey })
}

/**
 * Maps SDK failures onto the pipeline taxonomy. Abort errors from the caller's signal are
 * left to the timeout wrapper, which already knows whether it was a timeout or a cancellation.
 */
export function mapAnthropicError(error: unknown, failureCode: "generation_failed" | "vision_failed"): Error {
  if (error instanceof PipelineStageError) return error
  if (error instanceof Anthropic.APIUserAbortError) return error
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new PipelineStageError("adapter_timeout", "Anthropic request timed out", true)
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new PipelineStageError("adapter_unavailable", `Anthropic API unreachable: ${error.message}`, true)
  }
  if (error instanceof Anthropic.APIError) {
    const status = error.status ?? 0
    if (status === 400 && /prompt is too long|too many tokens/i.test(error.message)) {
      return lengthExceeded("input", "Prompt exceeds the model context window", { status })
    }
    const classified = classifyHttpStatus(status)
    const code = classified.code === "generation_failed" ? failureCode : classified.code
    return new PipelineStageError(code, `Anthropic API error (${status}): ${error.message}`, classified.recoverable, {
      status,
    })
  }
  const message = error instanceof Error ? error.message : String(error)
  return new PipelineStageError(failureCode, message, true)
}

function findText(message: AnthropicReply): string | null {
  for (const block of message.content) {
    if (block.type === "text" && typeof block.text === "string") return block.text
  }
  return null
}

function extractText(message: AnthropicReply, structured: boolean): string {
  // If we used tool calling for structured output, extract from tool use
  if (structured) {
    const toolUseBlock = message.content.find((block) => block.type === "tool_use")
    if (toolUseBlock && toolUseBlock.input !== undefined) {
      return JSON.stringify(toolUseBlock.input, null, 2)
    }
  }

  const text = findText(message)
  if (text === null) {
    throw new PipelineStageError("generation_failed", "No text content in Anthropic response", true)
  }
  return text
}

export class AnthropicGenerator implements TextGenerator {
  readonly name = "anthropic"
  private readonly client: AnthropicMessagesClient
  private readonly model: string

  constructor(options: AnthropicOptions = {}) {
    this.client = resolveClient(options)
    this.model = options.model ?? process.env.ANTHROPIC_MODEL ?? DEFAULT_ANTHROPIC_MODEL
  }

  async generate({ system, prompt, maxOutputTokens, jsonSchema }: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const requestParams: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: maxOutputTokens,
      messages: [{ role: "user", content: prompt }],
    }

    if (jsonSchema) {
      requestParams.system = [{ type: "text", text: system }]
      requestParams.tools = [
        {
          name: jsonSchema.name,
          description: "Return the assessment section following this exact structure",
          input_schema: { ...jsonSchema.schema, type: "object" },
        },
      ]
      requestParams.tool_choice = { type: "tool", name: jsonSchema.name }
    } else {
      requestParams.system = system
    }

    let message: AnthropicReply
    try {
      message = await this.client.messages.create(requestParams, { signal })
    } catch (error) {
      throw mapAnthropicError(error, "generation_failed")
    }

    if (message.stop_reason === "max_tokens") {
      throw lengthExceeded("output", `Model stopped at max_tokens (${maxOutputTokens})`, {
        maxOutputTokens,
        outputTokens: message.usage.output_tokens,
      })
    }

    return extractText(message, Boolean(jsonSchema))
  }
}

export interface AnthropicImageRequest {
  system: string
  prompt: string
  image: ImageInput
  maxOutputTokens: number
}

/**
 * Sends one image plus an instruction to the Messages API and returns the text reply.
 * Used by the vision provider; failures map to vision_failed.
 */
export async function runAnthropicImageRequest(
  { system, prompt, image, maxOutputTokens }: AnthropicImageRequest,
  options: AnthropicOptions = {},
  signal?: AbortSignal,
): Promise<string> {
  const client = resolveClient(options)
  const requestParams: Anthropic.MessageCreateParamsNonStreaming = {
    model: options.model ?? process.env.ANTHROPIC_MODEL ?? DEFAULT_ANTHROPIC_MODEL,
    max_tokens: maxOutputTokens,
    system,
    messages: [
      {
        role: "user",
        content: [
          {
            type: "image",
            source: { type: "base64", media_type: image.mimeType, data: image.image.toString("base64") },
          },
          { type: "text", text: prompt },
        ],
      },
    ],
  }

  let message: AnthropicReply
  try {
    message = await client.messages.create(requestParams, { signal })
  } catch (error) {
    throw mapAnthropicError(error, "vision_failed")
  }

  if (message.stop_reason === "max_tokens") {
    throw lengthExceeded("output", `Model stopped at max_tokens (${maxOutputTokens})`, { maxOutputTokens })
  }
  const text = findText(message)
  if (text === null) {
    throw new PipelineStageError("vision_failed", "No text content in Anthropic response", true)
  }
  return text
}

// Export prompts for versioned prompt management
export * as prompts from "./prompts"
