import type { ImageFindings } from "@pipeline-shared"
import type { PrimaryBasis, RouteTag } from "@storage"
import type { AudioQuality, ImageQuality } from "./types"

/** Scores under this are treated as unusable input. */
export const LOW_QUALITY_THRESHOLD = 0.35

const round3 = (value: number) => Math.round(value * 1000) / 1000
const clamp01 = (value: number) => Math.max(0, Math.min(1, value))

export function assessAudioQuality(transcript: string): AudioQuality {
  const text = transcript.trim()
  if (!text) return { score: 0, issues: ["empty_transcript"] }

  const issues: string[] = []
  const tokenCount = Math.max(1, text.split(/\s+/).length)
  const noiseCount = (text.toLowerCase().match(/<?epsilon>?/g) ?? []).length
  if (noiseCount / tokenCount > 0.2) issues.push("placeholder_noise_high")

  const words = text.toLowerCase().match(/[a-z']+/g) ?? []
  if (words.length >= 8) {
    if (new Set(words).size / words.length < 0.45) issues.push("repetition_high")
  } else {
    issues.push("very_short_transcript")
  }

  let score = 1
  if (issues.includes("very_short_transcript")) score -= 0.35
  if (issues.includes("placeholder_noise_high")) score -= 0.45
  if (issues.includes("repetition_high")) score -= 0.35
  return { score: round3(clamp01(score)), issues }
}

export function assessImageQuality(findings: ImageFindings | null): ImageQuality {
  if (!findings) return { score: 0, issues: ["no_image_findings"] }

  const issues = [...findings.issues]
  let score = 0.2
  if (findings.interpretable) {
    score = 0.4 + 0.6 * findings.confidence
  } else if (!issues.includes("image_not_interpretable")) {
    issues.push("image_not_interpretable")
  }

  if (findings.evidenceStrength === "low") score -= 0.15
  else if (findings.evidenceStrength === "medium") score -= 0.05
  return { score: round3(clamp01(score)), issues }
}

export function routeTagFor(hasAudio: boolean, hasImage: boolean): RouteTag {
  if (hasAudio && hasImage) return "audio_image"
  if (hasAudio) return "audio_only"
  if (hasImage) return "image_only"
  return "none"
}

/**
 * Which input the draft should lean on. A modality below the quality threshold yields to
 * retrieved evidence, or to the clinical record when there is none.
 */
export function pickPrimaryBasis(params: {
  audioQuality: number | null
  imageQuality: number | null
  evidenceUsed: boolean
}): PrimaryBasis {
  const { audioQuality, imageQuality, evidenceUsed } = params
  const fallback: PrimaryBasis = evidenceUsed ? "rag" : "clinical"

  if (audioQuality !== null && imageQuality !== null) {
    if (audioQuality >= 0.6 && imageQuality >= 0.6) return "mixed"
    return audioQuality >= imageQuality ? "audio" : "image"
  }
  if (audioQuality !== null) return audioQuality >= LOW_QUALITY_THRESHOLD ? "audio" : fallback
  if (imageQuality !== null) return imageQuality >= LOW_QUALITY_THRESHOLD ? "image" : fallback
  return fallback
}

export function buildFusionSummary(params: {
  routeTag: RouteTag
  primaryBasis: PrimaryBasis
  evidenceUsed: boolean
  transcript: string | null
  audioQuality: AudioQuality | null
  findings: ImageFindings | null
  imageQuality: ImageQuality | null
}): string {
  const { routeTag, primaryBasis, evidenceUsed, transcript, audioQuality, findings, imageQuality } = params
  const lines = [`- route_tag: ${routeTag}`, `- primary_basis: ${primaryBasis}`, `- evidence_used: ${evidenceUsed}`]

  if (audioQuality) {
    lines.push(`- transcript_chars: ${(transcript ?? "").trim().length}`)
    lines.push(`- audio_quality_score: ${audioQuality.score}`)
    if (audioQuality.issues.length > 0) lines.push(`- audio_issues: ${audioQuality.issues.join(", ")}`)
  }
  if (imageQuality) {
    if (findings) {
      lines.push(`- vision_primary: ${findings.primaryFinding}`)
      lines.push(`- vision_confidence: ${findings.confidence}`)
      lines.push(`- vision_strength: ${findings.evidenceStrength}`)
    } else {
      lines.push("- image provided but no findings were returned")
    }
    lines.push(`- image_quality_score: ${imageQuality.score}`)
    if (imageQuality.issues.length > 0) lines.push(`- image_issues: ${imageQuality.issues.join(", ")}`)
  }
  return lines.join("\n")
}
