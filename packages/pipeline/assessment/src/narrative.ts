import type { ImageFindings } from "@pipeline-shared"

export function renderFindings(findings: ImageFindings): string {
  const lines = [
    `Primary finding: ${findings.primaryFinding} (confidence ${findings.confidence.toFixed(2)}, evidence ${findings.evidenceStrength})`,
  ]
  if (!findings.interpretable) lines.push("Label not interpretable; treat as low confidence.")
  if (findings.candidates.length > 0) lines.push(`Candidates: ${findings.candidates.join(", ")}`)
  if (findings.issues.length > 0) lines.push(`Issues: ${findings.issues.join(", ")}`)
  if (findings.description.trim()) lines.push(findings.description.trim())
  return lines.join("\n")
}

/** Labelled narrative sections; a missing or blank modality contributes nothing. */
export function buildNarrative(parts: {
  typed: string | null
  transcript: string | null
  findings: ImageFindings | null
}): string {
  const sections: string[] = []
  const typed = parts.typed?.trim()
  if (typed) sections.push(`[TYPED]\n${typed}`)
  const transcript = parts.transcript?.trim()
  if (transcript) sections.push(`[VOICE TRANSCRIPT]\n${transcript}`)
  if (parts.findings) sections.push(`[IMAGE FINDINGS]\n${renderFindings(parts.findings)}`)
  return sections.join("\n\n")
}
