import { z } from "zod"
import { PipelineStageError, classifyHttpStatus, lengthExceeded } from "@pipeline-errors"
import { isAbortError, isNetworkFetchError } from "@pipeline-shared"
import type { GenerationRequest, ImageInput, TextGenerator } from "@pipeline-shared"

export interface MedGemmaRequest {
  system: string
  prompt: string
  images?: ImageInput[]
  model?: string
  baseUrl?: string
  apiKey?: string
  temperature?: number
  maxTokens?: number
  topP?: number
  stop?: string[]
  timeoutMs?: number
  signal?: AbortSignal
  /** Which failure code a non-transient backend error maps to. */
  failureCode?: "generation_failed" | "vision_failed"
  fetchFn?: typeof fetch
}

const DEFAULT_BASE_URL = "http://127.0.0.1:8080"
const DEFAULT_MODEL = "medgemma-1.5-4b-it"
const DEFAULT_TIMEOUT_MS = 60_000

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
        text: z.string().optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
})

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl
}

function assertNonEmpty(value: string | undefined, label: string): asserts value is string {
  if (!value || value.trim().length === 0) {
    throw new PipelineStageError("validation_error", `${label} is required`, false)
  }
}

function userContent(prompt: string, images: ImageInput[]) {
  if (images.length === 0) return prompt
  return [
    ...images.map((image) => ({
      type: "image_url" as const,
      image_url: { url: `data:${image.mimeType};base64,${image.image.toString("base64")}` },
    })),
    { type: "text" as const, text: prompt },
  ]
}

export async function runMedGemmaRequest(request: MedGemmaRequest): Promise<string> {
  const {
    system,
    prompt,
    images = [],
    model = process.env.MEDGEMMA_MODEL || DEFAULT_MODEL,
    baseUrl = process.env.MEDGEMMA_BASE_URL || DEFAULT_BASE_URL,
    apiKey = process.env.MEDGEMMA_API_KEY,
    temperature = 0.2,
    maxTokens = 800,
    topP = 0.9,
    stop,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    signal,
    failureCode = "generation_failed",
    fetchFn = fetch,
  } = request

  assertNonEmpty(system, "system")
  assertNonEmpty(prompt, "prompt")

  const controller = new AbortController()
  let timedOut = false
  const timeout = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, timeoutMs)
  const onAbort = () => controller.abort()
  signal?.addEventListener("abort", onAbort, { once: true })

  const url = `${normalizeBaseUrl(baseUrl)}/v1/chat/completions`
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  }
  if (apiKey) {
    headers.Authorization = `Bearer ${apiKey}`
  }

  try {
    let response: Response
    try {
      response = await fetchFn(url, {
        method: "POST",
        headers,
        signal: controller.signal,
        body: JSON.stringify({
          model,
          messages: [
            { role: "system", content: system },
            { role: "user", content: userContent(prompt, images) },
          ],
          temperature,
          max_tokens: maxTokens,
          top_p: topP,
          stop,
          stream: false,
        }),
      })
    } catch (error) {
      if (isAbortError(error) && timedOut) {
        throw new PipelineStageError("adapter_timeout", `MedGemma request timed out after ${timeoutMs}ms`, true, { timeoutMs })
      }
      if (isAbortError(error)) throw error
      if (isNetworkFetchError(error)) {
        throw new PipelineStageError("adapter_unavailable", `MedGemma server unreachable at ${baseUrl}`, true, { baseUrl })
      }
      throw error
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => "")
      if (response.status === 400 && /context length|too many tokens|maximum context/i.test(errorText)) {
        throw lengthExceeded("input", "Prompt exceeds the local model context window", { status: response.status })
      }
      const classified = classifyHttpStatus(response.status)
      const code = classified.code === "generation_failed" ? failureCode : classified.code
      throw new PipelineStageError(
        code,
        `MedGemma request failed (${response.status}): ${errorText || response.statusText}`,
        classified.recoverable,
        { status: response.status },
      )
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new PipelineStageError(failureCode, "Malformed MedGemma response", true, { issues: parsed.error.issues.length })
    }

    const [choice] = parsed.data.choices
    if (choice?.finish_reason === "length") {
      throw lengthExceeded("output", `Local model stopped at max_tokens (${maxTokens})`, { maxTokens })
    }
    const content = choice?.message?.content ?? choice?.text
    if (!content) {
      throw new PipelineStageError(failureCode, "No content returned from MedGemma response", true)
    }

    return content
  } finally {
    clearTimeout(timeout)
    signal?.removeEventListener("abort", onAbort)
  }
}

export interface MedGemmaGeneratorOptions {
  model?: string
  baseUrl?: string
  apiKey?: string
  timeoutMs?: number
  fetchFn?: typeof fetch
}

/** TextGenerator over a local OpenAI-compatible chat completions server. */
export class MedGemmaGenerator implements TextGenerator {
  readonly name = "medgemma"

  constructor(private readonly options: MedGemmaGeneratorOptions = {}) {}

  generate({ system, prompt, maxOutputTokens }: GenerationRequest, signal?: AbortSignal): Promise<string> {
    return runMedGemmaRequest({ ...this.options, system, prompt, maxTokens: maxOutputTokens, signal })
  }
}
