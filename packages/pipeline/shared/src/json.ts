import type { z } from "zod"
import { PipelineStageError } from "./error"
import type { PipelineError, PipelineErrorCode } from "./error"

export function extractJson(text: string): string {
  const trimmed = text.trim()
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
    return trimmed
  }

  const fenceMatch = trimmed.match(/```json\s*([\s\S]*?)\s*```/i)
  if (fenceMatch?.[1]) {
    return fenceMatch[1].trim()
  }

  const firstBrace = trimmed.indexOf("{")
  const lastBrace = trimmed.lastIndexOf("}")
  if (firstBrace >= 0 && lastBrace > firstBrace) {
    return trimmed.slice(firstBrace, lastBrace + 1)
  }

  throw new Error("Unable to extract JSON from model output")
}

/**
 * Extracts, parses and validates a model's JSON reply. Any failure is a recoverable
 * `failureCode` error tagged `details.reason = "unparseable"`.
 */
export function parseModelJson<S extends z.ZodTypeAny>(
  raw: string,
  schema: S,
  failureCode: PipelineErrorCode = "generation_failed",
): z.infer<S> {
  let candidate: unknown
  try {
    candidate = JSON.parse(extractJson(raw))
  } catch (error) {
    throw new PipelineStageError(
      failureCode,
      `Model output is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      true,
      { reason: "unparseable" },
    )
  }

  const parsed = schema.safeParse(candidate)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    throw new PipelineStageError(
      failureCode,
      `Model output does not match schema${first ? `: ${first.path.join(".") || "(root)"} ${first.message}` : ""}`,
      true,
      { reason: "unparseable", issues: parsed.error.issues.length },
    )
  }
  return parsed.data
}

export function isUnparseableOutput(error: PipelineError): boolean {
  return error.details?.reason === "unparseable"
}
