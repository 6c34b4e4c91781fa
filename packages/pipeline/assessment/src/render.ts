import type { Assessment } from "@storage"

export const LOW_CONFIDENCE_LABEL = "LOW CONFIDENCE (partial assessment)"
export const MANUAL_REVIEW_LABEL = "REQUIRES MANUAL REVIEW"

function bullets(items: string[], empty = "none"): string[] {
  return items.length > 0 ? items.map((item) => `- ${item}`) : [`- ${empty}`]
}

export function renderAssessment(assessment: Assessment): string {
  const { draft, audit, differential, confidence } = assessment
  const lines: string[] = []

  if (confidence.requiresManualReview) lines.push(MANUAL_REVIEW_LABEL)
  if (confidence.lowConfidence || confidence.requiresManualReview) lines.push(LOW_CONFIDENCE_LABEL)
  if (lines.length > 0) lines.push("")

  lines.push("Impression:", draft.impression, "")
  lines.push(`Risk: ${draft.riskLevel ?? "unknown"}`)
  lines.push(`Model confidence: ${draft.confidenceScore === null ? "n/a" : `${draft.confidenceScore}/100`}`, "")
  lines.push("Recommended actions:", ...bullets(draft.recommendedActions), "")
  lines.push("Red flags:", ...bullets(draft.redFlags), "")

  lines.push(`Self-audit: ${audit.placeholder ? "unavailable" : audit.verdict}`)
  lines.push(...bullets(audit.reasons, "no concerns raised"), "")

  lines.push("Alternative diagnoses:")
  if (differential.placeholder) {
    lines.push("- unavailable")
  } else {
    lines.push(...bullets(differential.items.map((item) => `${item.diagnosis} (${item.plausibility.toFixed(2)})`)))
  }
  lines.push("")

  lines.push("Evidence:")
  if (confidence.noEvidence) {
    lines.push("- no evidence retrieved")
  } else {
    lines.push(...assessment.evidence.map((item) => `- [${item.chunkId}]${item.category ? ` (${item.category})` : ""}`))
  }

  if (confidence.reasons.length > 0) {
    lines.push("", "Confidence notes:", ...bullets(confidence.reasons))
  }
  if (assessment.gaps.length > 0) {
    lines.push("", "Gaps:", ...assessment.gaps.map((gap) => `- [${gap.severity}] ${gap.message}`))
  }

  return lines.join("\n")
}
