import { z } from "zod"
import { parseModelJson } from "@pipeline-shared"
import type { EvidenceStrength, ImageFindings } from "@pipeline-shared"

export const visionOutputSchema = z.object({
  primary_finding: z.string(),
  // some backends report a percentage
  confidence: z.number().min(0).max(100).transform((value) => (value > 1 ? value / 100 : value)),
  candidates: z
    .array(z.union([z.string(), z.object({ label: z.string(), prob: z.number().optional() })]))
    .default([]),
  issues: z.array(z.string()).default([]),
  description: z.string().default(""),
})

export type VisionModelOutput = z.infer<typeof visionOutputSchema>

const UNINTERPRETABLE_LABEL = /^LABEL_\d+$/

export function isLabelInterpretable(label: string): boolean {
  const trimmed = label.trim()
  if (!trimmed) return false
  if (trimmed.toLowerCase() === "unknown") return false
  return !UNINTERPRETABLE_LABEL.test(trimmed)
}

export function evidenceStrengthFor(interpretable: boolean, confidence: number): EvidenceStrength {
  if (!interpretable) return "low"
  if (confidence >= 0.7) return "high"
  if (confidence >= 0.4) return "medium"
  return "low"
}

export function toImageFindings(output: VisionModelOutput): ImageFindings {
  const interpretable = isLabelInterpretable(output.primary_finding)
  const issues = [...output.issues]
  if (!interpretable) {
    issues.push("vision_label_not_interpretable")
  }
  const confidence = Math.round(output.confidence * 10_000) / 10_000
  return {
    primaryFinding: output.primary_finding.trim() || "Unknown",
    confidence,
    interpretable,
    evidenceStrength: evidenceStrengthFor(interpretable, confidence),
    candidates: output.candidates.map((candidate) => (typeof candidate === "string" ? candidate : candidate.label)),
    issues,
    description: output.description.trim(),
  }
}

export function parseImageFindings(raw: string): ImageFindings {
  return toImageFindings(parseModelJson(raw, visionOutputSchema, "vision_failed"))
}
