import { cancelledError, lengthExceeded, lengthSideOf, toPipelineError } from "@pipeline-errors"
import type { PipelineError } from "@pipeline-errors"
import { callWithTimeout, isUnparseableOutput, throwIfCancelled } from "@pipeline-shared"
import type { GenerationRequest, TextGenerator } from "@pipeline-shared"
import { debugWarn } from "@storage/debug-logger"
import type { GenerationBudget } from "@ward-config"
import { estimateTokens, fitToInputBudget } from "./truncation"
import { PLACEHOLDER_TEXT } from "./types"
import type { GenerationAttempt, PromptInput, StageOutcome, TruncationReport } from "./types"

export const MAX_GENERATION_ATTEMPTS = 2

export interface GenerationStageParams<T> {
  label: string
  generator: TextGenerator
  budget: GenerationBudget
  timeoutMs: number
  input: PromptInput
  build: (input: PromptInput, maxOutputTokens: number) => GenerationRequest
  parse: (raw: string) => T
  signal?: AbortSignal
}

export function promptTokensOf(request: GenerationRequest): number {
  return estimateTokens(request.system) + estimateTokens(request.prompt)
}

export function isRetryableGenerationError(error: PipelineError): boolean {
  if (error.code === "length_exceeded" || error.code === "adapter_timeout") return true
  return error.code === "generation_failed" && isUnparseableOutput(error)
}

/**
 * Runs one generation stage under the retry policy. Attempt 1 sends the full prompt with the
 * normal output budget. A retryable failure earns one more attempt with the reduced output
 * budget, and with truncated input when the failure was input-side. Anything else ends in a
 * placeholder. Cancellation is the only error that escapes.
 */
export async function runGenerationStage<T>(params: GenerationStageParams<T>): Promise<StageOutcome<T>> {
  const { label, generator, budget, timeoutMs, build, parse, signal } = params
  const attempts: GenerationAttempt[] = []
  let previous: { error: PipelineError; promptTokens: number } | null = null

  for (let attempt = 1; ; attempt += 1) {
    throwIfCancelled(signal, label)
    const maxOutputTokens = attempt === 1 ? budget.maxOutputTokens : budget.retryMaxOutputTokens

    let input = params.input
    let truncation: TruncationReport | null = null
    if (previous && lengthSideOf(previous.error) === "input") {
      // the backend rejected a prompt we estimated as fitting: aim lower than last time
      const target =
        previous.promptTokens <= budget.maxInputTokens
          ? Math.floor(previous.promptTokens * 0.75)
          : budget.maxInputTokens
      const fitted = fitToInputBudget(params.input, (candidate) => promptTokensOf(build(candidate, maxOutputTokens)), target)
      if (fitted) {
        input = fitted.input
        truncation = fitted.truncation
      }
    }

    const request = build(input, maxOutputTokens)
    const promptTokens = promptTokensOf(request)
    const record: GenerationAttempt = { attempt, maxOutputTokens, promptTokens, truncation }
    attempts.push(record)

    try {
      if (promptTokens > budget.maxInputTokens) {
        throw lengthExceeded("input", `${label} prompt is ~${promptTokens} tokens, budget is ${budget.maxInputTokens}`, {
          promptTokens,
          maxInputTokens: budget.maxInputTokens,
        })
      }
      const raw = await callWithTimeout(label, timeoutMs, (callSignal) => generator.generate(request, callSignal), signal)
      return { status: "ok", value: parse(raw), attempts, input }
    } catch (error) {
      if (signal?.aborted) throw cancelledError(label)
      const normalized = toPipelineError(error, {
        code: "generation_failed",
        message: `${label} generation failed`,
        recoverable: true,
      })
      if (normalized.code === "cancelled") throw error

      record.error = normalized
      debugWarn(`${label} attempt ${attempt} failed`, normalized.code, lengthSideOf(normalized) ?? "")
      if (!isRetryableGenerationError(normalized) || attempt >= MAX_GENERATION_ATTEMPTS) {
        return { status: "placeholder", text: PLACEHOLDER_TEXT, error: normalized, attempts }
      }
      previous = { error: normalized, promptTokens }
    }
  }
}
