import type { PromptInput, TruncationReport } from "./types"

/** Rough token estimate used for the local input-budget check. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4)
}

export interface FittedInput {
  input: PromptInput
  truncation: TruncationReport
  promptTokens: number
}

/**
 * Shrinks a prompt input until `measure` fits `maxInputTokens`: evidence is dropped from the end
 * (lowest-ranked first), then the narrative is cut from its tail. Returns null when even an empty
 * narrative with no evidence does not fit.
 */
export function fitToInputBudget(
  input: PromptInput,
  measure: (candidate: PromptInput) => number,
  maxInputTokens: number,
): FittedInput | null {
  const evidence = [...input.evidence]
  let narrative = input.narrative
  let tokens = measure({ narrative, evidence })

  while (tokens > maxInputTokens && evidence.length > 0) {
    evidence.pop()
    tokens = measure({ narrative, evidence })
  }

  while (tokens > maxInputTokens && narrative.length > 0) {
    const excessChars = (tokens - maxInputTokens) * 4
    narrative = narrative.slice(0, Math.max(0, narrative.length - excessChars))
    tokens = measure({ narrative, evidence })
  }

  if (tokens > maxInputTokens) return null
  return {
    input: { narrative, evidence },
    truncation: {
      droppedEvidence: input.evidence.length - evidence.length,
      narrativeCharsRemoved: input.narrative.length - narrative.length,
    },
    promptTokens: tokens,
  }
}
