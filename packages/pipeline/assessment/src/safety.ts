import type { DraftAssessment } from "@storage"

const VITALS_REGEX = /\b(bp|blood pressure|hr|heart rate|rr|respiratory rate|temp|temperature|spo2|oxygen saturation|sats)\b/i
const DOSING_REGEX = /\b(\d+\s?(mg|mcg|ml|units|l\/min)|q\d+h|bid|tid|qid|qd|stat)\b/i

function hasTerm(regex: RegExp, text: string): boolean {
  return regex.test(text)
}

export function draftText(draft: DraftAssessment): string {
  return [draft.impression, ...draft.recommendedActions, ...draft.redFlags].join(" ")
}

/**
 * Deterministic checks on a draft against what it was built from (narrative plus evidence).
 * Returns one warning per failed check.
 */
export function runSafetyChecks(params: { sourceText: string; draft: DraftAssessment }): string[] {
  const { sourceText, draft } = params
  const warnings: string[] = []
  const source = sourceText.toLowerCase()
  const text = draftText(draft).toLowerCase()

  if (hasTerm(VITALS_REGEX, text) && !hasTerm(VITALS_REGEX, source)) {
    warnings.push("Vitals mentioned in draft but not found in narrative or evidence.")
  }

  if (hasTerm(DOSING_REGEX, text) && !hasTerm(DOSING_REGEX, source)) {
    warnings.push("Medication dosing appears in draft but not found in narrative or evidence.")
  }

  if (draft.riskLevel === "High" && draft.recommendedActions.length === 0) {
    warnings.push("High-risk draft lists no recommended actions.")
  }

  return warnings
}
