export const PIPELINE_ERROR_CODES = [
  "adapter_unavailable",
  "adapter_timeout",
  "length_exceeded",
  "retrieval_unavailable",
  "transcription_failed",
  "vision_failed",
  "generation_failed",
  "invalid_transition",
  "persistence_conflict",
  "cancelled",
  "configuration_error",
  "validation_error",
  "not_found",
] as const

export type PipelineErrorCode = (typeof PIPELINE_ERROR_CODES)[number]

export type LengthSide = "input" | "output"

export interface PipelineError {
  code: PipelineErrorCode
  message: string
  recoverable: boolean
  details?: Record<string, unknown>
}

export class PipelineStageError extends Error implements PipelineError {
  code: PipelineErrorCode
  recoverable: boolean
  details?: Record<string, unknown>

  constructor(code: PipelineErrorCode, message: string, recoverable: boolean, details?: Record<string, unknown>) {
    super(message)
    this.name = "PipelineStageError"
    this.code = code
    this.recoverable = recoverable
    this.details = details
  }
}

export function isPipelineErrorCode(value: unknown): value is PipelineErrorCode {
  return typeof value === "string" && (PIPELINE_ERROR_CODES as readonly string[]).includes(value)
}

export function createPipelineError(
  code: PipelineErrorCode,
  message: string,
  recoverable: boolean,
  details?: Record<string, unknown>,
): PipelineError {
  return details === undefined ? { code, message, recoverable } : { code, message, recoverable, details }
}

export function isPipelineError(error: unknown): error is PipelineError {
  if (!error || typeof error !== "object") return false
  const candidate = error as Partial<PipelineError>
  return (
    isPipelineErrorCode(candidate.code) &&
    typeof candidate.message === "string" &&
    typeof candidate.recoverable === "boolean"
  )
}

export function toPipelineError(
  error: unknown,
  fallback: {
    code: PipelineErrorCode
    message: string
    recoverable: boolean
    details?: Record<string, unknown>
  },
): PipelineError {
  if (error instanceof PipelineStageError) {
    return createPipelineError(error.code, error.message, error.recoverable, error.details)
  }

  if (isPipelineError(error)) {
    return createPipelineError(error.code, error.message, error.recoverable, error.details)
  }

  if (error instanceof Error) {
    return createPipelineError(
      fallback.code,
      error.message || fallback.message,
      fallback.recoverable,
      fallback.details,
    )
  }

  return createPipelineError(
    fallback.code,
    typeof error === "string" ? error : fallback.message,
    fallback.recoverable,
    fallback.details,
  )
}

export function toPipelineStageError(
  error: unknown,
  fallback: {
    code: PipelineErrorCode
    message: string
    recoverable: boolean
    details?: Record<string, unknown>
  },
): PipelineStageError {
  if (error instanceof PipelineStageError) {
    return error
  }
  const normalized = toPipelineError(error, fallback)
  return new PipelineStageError(normalized.code, normalized.message, normalized.recoverable, normalized.details)
}

export function lengthExceeded(side: LengthSide, message: string, details?: Record<string, unknown>): PipelineStageError {
  return new PipelineStageError("length_exceeded", message, true, { ...details, side })
}

export function lengthSideOf(error: PipelineError): LengthSide | null {
  if (error.code !== "length_exceeded") return null
  return error.details?.side === "input" ? "input" : "output"
}

export function cancelledError(stage: string): PipelineStageError {
  return new PipelineStageError("cancelled", `Assessment cancelled before ${stage}`, true, { stage })
}

/**
 * Maps an HTTP status from a model backend onto the error taxonomy.
 * 408/425/429/5xx are transient and surface as adapter_unavailable.
 */
export function classifyHttpStatus(status: number): { code: PipelineErrorCode; recoverable: boolean } {
  if (status === 408 || status === 425 || status === 429 || status >= 500) {
    return { code: "adapter_unavailable", recoverable: true }
  }
  if (status === 401 || status === 403) {
    return { code: "configuration_error", recoverable: false }
  }
  return { code: "generation_failed", recoverable: true }
}
