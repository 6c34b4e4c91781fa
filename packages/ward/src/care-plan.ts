import { z } from "zod"
import { runGenerationStage } from "@assessment"
import { prompts } from "@llm"
import { parseModelJson } from "@pipeline-shared"
import type { TextGenerator } from "@pipeline-shared"
import type {
  CarePlanContent,
  CarePlanLevel,
  CarePlanRecommendation,
  CarePlanStatus,
  DailyCheck,
  Gap,
  RiskLevel,
  Role,
  Row,
} from "@storage"
import { debugWarn } from "@storage/debug-logger"
import type { GenerationBudget } from "@ward-config"
import { mentionsMedication } from "./chat"

export const MAX_RECOMMENDATIONS = 5
export const TEMPLATE_BULLETS = 3
export const MAX_BULLETS = 5
export const MAX_RED_FLAGS = 6
export const MAX_FOLLOW_UP = 4

export const DEFAULT_BULLETS = [
  "Follow your care team's guidance.",
  "Rest and hydrate as tolerated.",
  "Monitor symptoms and report changes.",
]
export const DEFAULT_RED_FLAGS = ["Severe shortness of breath", "Chest pain", "Confusion or fainting"]
export const NO_MEDICINE_CHANGES = "Do not change or stop any medicine without your care team."
export const WAIT_FOR_DOCTOR = "Wait for your doctor before any change to your treatment."

const MISSING_DATA_HINT = /\b(missing|not recorded|unavailable|insufficient)\b/i
const MISSING_VITAL_GAPS = ["missing_spo2", "missing_temp", "missing_rr", "missing_hr"]
const LOW_DIET_TERMS = ["very little", "low", "none", "nothing", "poor"]

const BULLET_FOR: Record<string, string> = {
  missing_vitals: "Let your nurse check your vital signs today.",
  low_audio_quality: "Type your update or record it again somewhere quiet.",
  nutrition_rest: "Eat small meals often, even if you are not hungry.",
  sleep_rest: "Rest during the day and keep lights low at night.",
  hydration: "Sip fluids through the day unless your team has limited them.",
  red_flags: "Call for help early if any warning sign below appears.",
  medical_plan: "Follow the plan your care team explained today.",
}

export interface RecommendationInputs {
  gaps: readonly Gap[]
  dailyCheck: DailyCheck | null
  assessmentRisk: RiskLevel | null
}

/** Plan topics the current gaps and daily check call for, most urgent rule first. */
export function recommendCarePlans({ gaps, dailyCheck, assessmentRisk }: RecommendationInputs): CarePlanRecommendation[] {
  const items: CarePlanRecommendation[] = []
  const gapIds = new Set(gaps.map((gap) => gap.id))

  if (MISSING_VITAL_GAPS.some((id) => gapIds.has(id))) {
    items.push({ id: "missing_vitals", priority: "high", reason: "Vital signs are missing from the assessment" })
  }
  if (gapIds.has("audio_quality_low")) {
    items.push({ id: "low_audio_quality", priority: "medium", reason: "The voice note was hard to hear" })
  }
  const diet = (dailyCheck?.diet ?? "").toLowerCase()
  if (LOW_DIET_TERMS.some((term) => diet.includes(term))) {
    items.push({ id: "nutrition_rest", priority: "medium", reason: "Low food intake reported" })
  }
  if (dailyCheck?.sleepHours !== undefined && dailyCheck.sleepHours <= 5) {
    items.push({ id: "sleep_rest", priority: "low", reason: `Slept ${dailyCheck.sleepHours} hrs` })
  }
  if (dailyCheck?.waterMl !== undefined && dailyCheck.waterMl <= 600) {
    items.push({ id: "hydration", priority: "medium", reason: `Drank ${dailyCheck.waterMl} ml` })
  }
  if (assessmentRisk === "High" || assessmentRisk === "Medium") {
    items.push({ id: "red_flags", priority: "high", reason: `Assessment risk is ${assessmentRisk}` })
  }
  items.push({ id: "medical_plan", priority: "low", reason: "An assessment is on file" })

  return items.slice(0, MAX_RECOMMENDATIONS)
}

function dedupe(items: readonly string[]): string[] {
  const seen = new Set<string>()
  const kept: string[] = []
  for (const raw of items) {
    const item = raw.trim()
    const key = item.toLowerCase()
    if (!item || seen.has(key)) continue
    seen.add(key)
    kept.push(item)
  }
  return kept
}

export function followUpFor(level: CarePlanLevel): string[] {
  return level === "medical" ? [NO_MEDICINE_CHANGES, WAIT_FOR_DOCTOR] : [NO_MEDICINE_CHANGES]
}

export function defaultCarePlanContent(level: CarePlanLevel): CarePlanContent {
  return {
    title: level === "medical" ? "Medical Care Plan" : "Care Plan",
    oneLiner: "Today's focus and safety tips.",
    bullets: [...DEFAULT_BULLETS],
    redFlags: [...DEFAULT_RED_FLAGS],
    followUp: followUpFor(level),
  }
}

/**
 * Cleans patient-facing content. Bullets lose missing-data hints and anything about medicines,
 * falling back to the defaults when none survive. The defaults' red flags and follow-ups are
 * always kept.
 */
export function normalizeCarePlan(content: CarePlanContent, defaults: CarePlanContent): CarePlanContent {
  const bullets = dedupe(content.bullets)
    .filter((item) => !MISSING_DATA_HINT.test(item) && !mentionsMedication(item))
    .slice(0, MAX_BULLETS)
  return {
    title: content.title.trim() || defaults.title,
    oneLiner: content.oneLiner.trim() || defaults.oneLiner,
    bullets: bullets.length > 0 ? bullets : [...DEFAULT_BULLETS],
    redFlags: dedupe([...defaults.redFlags, ...content.redFlags]).slice(0, MAX_RED_FLAGS),
    followUp: dedupe([...defaults.followUp, ...content.followUp]).slice(0, MAX_FOLLOW_UP),
  }
}

export function renderCarePlan(content: CarePlanContent): string {
  const list = (items: readonly string[]) => items.map((item) => `- ${item}`)
  return [
    `### ${content.title}`,
    content.oneLiner,
    "",
    "**DO**",
    ...list(content.bullets),
    "",
    "**GET HELP NOW**",
    ...list(content.redFlags),
    "",
    "**DON'T**",
    ...list(content.followUp),
  ].join("\n")
}

export interface CarePlanSources {
  level: CarePlanLevel
  assessment: Row<"assessments">
  dailyCheck: DailyCheck | null
}

export interface CarePlanTemplate {
  content: CarePlanContent
  recommendations: CarePlanRecommendation[]
}

/** Deterministic plan: one bullet per recommendation, plus the assessment's red flags. */
export function buildCarePlanTemplate({ level, assessment, dailyCheck }: CarePlanSources): CarePlanTemplate {
  const recommendations = recommendCarePlans({
    gaps: assessment.gaps,
    dailyCheck,
    assessmentRisk: assessment.draft.riskLevel,
  })
  const defaults = defaultCarePlanContent(level)
  const content = normalizeCarePlan(
    {
      ...defaults,
      bullets: recommendations.flatMap((item) => BULLET_FOR[item.id] ?? []).slice(0, TEMPLATE_BULLETS),
      redFlags: assessment.draft.redFlags,
    },
    defaults,
  )
  return { content, recommendations }
}

/** A nurse's medical plan waits for a doctor; everything else starts as a draft. */
export function initialCarePlanStatus(level: CarePlanLevel, creatorRole: Role): CarePlanStatus {
  return level === "medical" && creatorRole !== "doctor" ? "needs_review" : "draft"
}

const stringList = z
  .array(z.string())
  .default([])
  .transform((items) => items.map((item) => item.trim()).filter((item) => item.length > 0))

const carePlanOutputSchema = z
  .object({
    title: z.string().trim().min(1),
    one_liner: z.string().trim().default(""),
    bullets: stringList,
    red_flags: stringList,
    follow_up: stringList,
  })
  .transform(
    (output): CarePlanContent => ({
      title: output.title,
      oneLiner: output.one_liner,
      bullets: output.bullets,
      redFlags: output.red_flags,
      followUp: output.follow_up,
    }),
  )

export interface CarePlanDraftSettings {
  generator?: TextGenerator
  useModel: boolean
  budget: GenerationBudget
  timeoutMs: number
  signal?: AbortSignal
}

export interface CarePlanDraft extends CarePlanTemplate {
  text: string
  generatedBy: "template" | "model"
}

/**
 * Builds the template plan and, when the model is enabled, lets it reword the plan under the
 * generation retry policy. Unusable model output keeps the template. Cancellation propagates.
 */
export async function draftCarePlan(sources: CarePlanSources, settings: CarePlanDraftSettings): Promise<CarePlanDraft> {
  const template = buildCarePlanTemplate(sources)
  const fromTemplate: CarePlanDraft = { ...template, text: renderCarePlan(template.content), generatedBy: "template" }
  if (!settings.useModel || !settings.generator) return fromTemplate

  const v1 = prompts.assessment.currentVersion
  const outcome = await runGenerationStage({
    label: "care_plan",
    generator: settings.generator,
    budget: settings.budget,
    timeoutMs: settings.timeoutMs,
    input: { narrative: JSON.stringify(template.content, null, 2), evidence: [] },
    build: (input, maxOutputTokens) => ({
      system: v1.getCarePlanSystemPrompt(),
      prompt: v1.getCarePlanUserPrompt({
        level: sources.level,
        template: input.narrative,
        impression: sources.assessment.draft.impression,
        gaps: sources.assessment.gaps.map((gap) => gap.message),
      }),
      maxOutputTokens,
      jsonSchema: { name: "care_plan", schema: v1.CARE_PLAN_SCHEMA },
    }),
    parse: (raw) => parseModelJson(raw, carePlanOutputSchema),
    signal: settings.signal,
  })

  if (outcome.status === "ok") {
    const content = normalizeCarePlan(outcome.value, template.content)
    return { content, recommendations: template.recommendations, text: renderCarePlan(content), generatedBy: "model" }
  }
  if (outcome.status === "placeholder") {
    debugWarn("care plan fell back to template", outcome.error.code)
  }
  return fromTemplate
}
