// Bibliographic and front-matter fragments that rarely carry clinical guidance.
export const NOISE_PATTERNS: readonly string[] = [
  "et al",
  "doi:",
  "n engl j med",
  "clin infect dis",
  "respirology",
  "jama",
  "table of contents",
  "clinical questions",
  "all rights reserved",
  "downloaded from",
  "permissions",
]

const NUMBERED_QUESTION = /\bquestion \d{1,2}\b/

export function isNoiseChunk(text: string): boolean {
  const lower = text.toLowerCase()
  return NUMBERED_QUESTION.test(lower) || NOISE_PATTERNS.some((pattern) => lower.includes(pattern))
}
