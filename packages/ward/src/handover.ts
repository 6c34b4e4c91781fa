import { prompts } from "@llm"
import { PipelineStageError } from "@pipeline-errors"
import type { TextGenerator } from "@pipeline-shared"
import { runGenerationStage } from "@assessment"
import type { RiskSnapshot, Row, SbarSections, Vitals } from "@storage"
import { debugWarn } from "@storage/debug-logger"
import type { GenerationBudget } from "@ward-config"
import { computeRiskSnapshot } from "./risk-rules"

const NOT_RECORDED = "not recorded"
const DEFAULT_RECOMMENDATIONS = ["Continue monitoring", "Notify doctor if worsening"]
const MAX_KEY_POINTS = 6

export const SBAR_LABELS: Record<keyof SbarSections, string> = {
  situation: "S (Situation)",
  background: "B (Background)",
  assessment: "A (Assessment)",
  recommendation: "R (Recommendation)",
}

export interface HandoverSources {
  request: Row<"requests">
  patient: Row<"patients">
  /** The request's assessments, oldest first. */
  assessments: readonly Row<"assessments">[]
  /** Vitals recorded inside the handover window, oldest first. */
  vitals: readonly Row<"vitals">[]
}

export interface HandoverDraft {
  sbar: SbarSections
  text: string
  keyPoints: string[]
  risk: RiskSnapshot
}

function optional(value: string | number | null | undefined, suffix = ""): string {
  if (value === null || value === undefined) return NOT_RECORDED
  const text = String(value).trim()
  if (!text) return NOT_RECORDED
  return suffix ? `${text}${suffix}` : text
}

export function formatVitals(vitals: Vitals | null): string {
  if (!vitals) return NOT_RECORDED
  const parts: string[] = []
  if (vitals.temperatureC !== undefined) parts.push(`Temp ${vitals.temperatureC} C`)
  if (vitals.heartRate !== undefined) parts.push(`HR ${vitals.heartRate} bpm`)
  if (vitals.respRate !== undefined) parts.push(`RR ${vitals.respRate}/min`)
  if (vitals.systolicBp !== undefined) parts.push(`BP ${vitals.systolicBp}/${vitals.diastolicBp ?? "-"}`)
  if (vitals.spo2Pct !== undefined) parts.push(`SpO2 ${vitals.spo2Pct}%`)
  if (vitals.painScore !== undefined) parts.push(`Pain ${vitals.painScore}/10`)
  return parts.length > 0 ? parts.join(", ") : NOT_RECORDED
}

export function renderSbar(sbar: SbarSections): string {
  return [
    `${SBAR_LABELS.situation}: ${sbar.situation}`,
    `${SBAR_LABELS.background}: ${sbar.background}`,
    `${SBAR_LABELS.assessment}: ${sbar.assessment}`,
    `${SBAR_LABELS.recommendation}: ${sbar.recommendation}`,
  ].join("\n")
}

/** Free text the risk rules scan: the request text, patient clarifications and vitals notes. */
export function symptomTexts(request: Row<"requests">, vitals: readonly Row<"vitals">[]): string[] {
  const texts: string[] = []
  if (request.payload.text) texts.push(request.payload.text)
  for (const entry of request.transitions) {
    if (entry.action === "clarify" && entry.note) texts.push(entry.note)
  }
  for (const record of vitals) {
    if (record.notes) texts.push(record.notes)
  }
  return texts
}

/**
 * Deterministic SBAR handover built from the latest assessment, the latest vitals in the window
 * and the ward risk snapshot.
 */
export function buildHandoverTemplate({ request, patient, assessments, vitals }: HandoverSources): HandoverDraft {
  const latest = assessments.at(-1) ?? null
  const latestVitals = vitals.at(-1) ?? null
  const dailyCheck = request.payload.dailyCheck

  const risk = computeRiskSnapshot({
    vitals: latestVitals,
    symptoms: symptomTexts(request, vitals),
    dailyCheck,
    assessmentRisk: latest?.draft.riskLevel ?? null,
    gaps: latest?.gaps ?? [],
  })

  const flagMessages = risk.flags.map((flag) => flag.message)
  const recommendations = (risk.nextActions.length > 0 ? risk.nextActions.slice(0, 3) : DEFAULT_RECOMMENDATIONS)
    .map((item) => item.trim().replace(/\.+$/, ""))
    .filter((item) => item.length > 0)

  let assessmentLine = `Latest vitals ${formatVitals(latestVitals)}; assessment ${optional(latest?.draft.impression)}, risk ${optional(latest?.draft.riskLevel)}, gaps ${optional(latest?.gaps.length)}.`
  if (latest?.confidence.lowConfidence) {
    assessmentLine += " Low confidence (partial assessment)."
  }

  const sbar: SbarSections = {
    situation: `Risk light=${risk.riskLevel.toUpperCase()}. ${flagMessages[0] ?? "No urgent red flags."}`,
    background:
      `Bed ${patient.bedId ?? "-"}, age ${patient.age ?? "-"}, sex ${patient.sex ?? "-"}. ` +
      `Complaint ${optional(patient.chiefComplaint)}. ` +
      `Diet ${optional(dailyCheck?.diet)}, water ${optional(dailyCheck?.waterMl, " ml")}, sleep ${optional(dailyCheck?.sleepHours, " hrs")}.`,
    assessment: assessmentLine,
    recommendation: `${recommendations.join("; ") || "Continue monitoring"}.`,
  }

  return {
    sbar,
    text: renderSbar(sbar),
    keyPoints: [...flagMessages.slice(0, 3), ...risk.nextActions.slice(0, 3)].slice(0, MAX_KEY_POINTS),
    risk,
  }
}

export interface PolishSettings {
  generator: TextGenerator
  budget: GenerationBudget
  timeoutMs: number
  signal?: AbortSignal
}

function parsePolished(raw: string): string {
  const text = raw.trim()
  const missing = Object.values(SBAR_LABELS).filter((label) => !text.includes(label))
  if (!text || missing.length > 0) {
    throw new PipelineStageError("generation_failed", "Polished handover lost its SBAR structure", true, {
      reason: "unparseable",
      missing,
    })
  }
  return text
}

/**
 * Rewords the template for readability. Returns null when the model output is unusable, in
 * which case the caller keeps the template. Cancellation propagates.
 */
export async function polishHandoverText(template: string, settings: PolishSettings): Promise<string | null> {
  const v1 = prompts.assessment.currentVersion
  const outcome = await runGenerationStage({
    label: "handover_polish",
    generator: settings.generator,
    budget: settings.budget,
    timeoutMs: settings.timeoutMs,
    input: { narrative: template, evidence: [] },
    build: (input, maxOutputTokens) => ({
      system: v1.getHandoverPolishSystemPrompt(),
      prompt: v1.getHandoverPolishUserPrompt(input.narrative),
      maxOutputTokens,
    }),
    parse: parsePolished,
    signal: settings.signal,
  })

  if (outcome.status === "ok") return outcome.value
  if (outcome.status === "placeholder") {
    debugWarn("handover polish fell back to template", outcome.error.code)
  }
  return null
}
