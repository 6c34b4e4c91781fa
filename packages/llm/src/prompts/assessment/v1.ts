/**
 * Ward Assessment Prompts - Version 1
 * Three calls per assessment (draft, self-audit, reverse differential) plus the optional
 * handover polish, care plan drafting and patient chat. All structured calls return a single
 * JSON object.
 */

export const PROMPT_VERSION = "v1"
export const MODEL_OPTIMIZED_FOR = "claude-sonnet-4-5-20250929"

/**
 * Patient context as seen by prompts. `name` is accepted so callers can pass a stored patient
 * record directly, but it is never rendered.
 */
export interface PromptPatientContext {
  name?: string
  age: number | null
  sex: string | null
  chiefComplaint: string
  history: string
}

export interface PromptEvidence {
  ref: string
  category: string | null
  text: string
}

export interface PromptModalities {
  hasAudio: boolean
  hasImage: boolean
  audioQuality: number
  imageQuality: number
  basisHint: string
}

export interface DraftPromptParams {
  narrative: string
  evidence: PromptEvidence[]
  patient: PromptPatientContext
  modalities?: PromptModalities
}

export interface DraftForPrompt {
  impression: string
  riskLevel: string | null
  recommendedActions: string[]
  redFlags: string[]
  confidenceScore: number | null
}

export interface AuditPromptParams {
  draft: DraftForPrompt
  evidence: PromptEvidence[]
  patient: PromptPatientContext
  modalities?: PromptModalities
}

export interface DifferentialPromptParams {
  draft: DraftForPrompt
  narrative: string
  patient: PromptPatientContext
}

export const DRAFT_SCHEMA = {
  type: "object",
  properties: {
    impression: { type: "string", description: "Most likely working impression, one or two sentences" },
    risk_level: { type: "string", enum: ["Low", "Medium", "High"] },
    recommended_actions: { type: "array", items: { type: "string" } },
    red_flags: { type: "array", items: { type: "string" } },
    confidence_score: { type: "number", minimum: 0, maximum: 100 },
  },
  required: ["impression", "risk_level", "recommended_actions", "red_flags", "confidence_score"],
  additionalProperties: false,
} as const

export const AUDIT_SCHEMA = {
  type: "object",
  properties: {
    verdict: { type: "string", enum: ["pass", "flagged"] },
    reasons: { type: "array", items: { type: "string" } },
    unsupported_claims: { type: "array", items: { type: "string" } },
  },
  required: ["verdict", "reasons", "unsupported_claims"],
  additionalProperties: false,
} as const

export const DIFFERENTIAL_SCHEMA = {
  type: "object",
  properties: {
    alternatives: {
      type: "array",
      items: {
        type: "object",
        properties: {
          diagnosis: { type: "string" },
          plausibility: { type: "number", minimum: 0, maximum: 1 },
          supporting: { type: "array", items: { type: "string" } },
          against: { type: "array", items: { type: "string" } },
        },
        required: ["diagnosis", "plausibility", "supporting", "against"],
      },
    },
  },
  required: ["alternatives"],
  additionalProperties: false,
} as const

export const CARE_PLAN_SCHEMA = {
  type: "object",
  properties: {
    title: { type: "string" },
    one_liner: { type: "string" },
    bullets: { type: "array", items: { type: "string" } },
    red_flags: { type: "array", items: { type: "string" } },
    follow_up: { type: "array", items: { type: "string" } },
  },
  required: ["title", "one_liner", "bullets", "red_flags", "follow_up"],
  additionalProperties: false,
} as const

export const CHAT_SCHEMA = {
  type: "object",
  properties: {
    answer: { type: "string" },
    suggested_actions: { type: "array", items: { type: "string" } },
    need_escalation: { type: "boolean" },
    escalation_reason: { type: "string" },
  },
  required: ["answer", "suggested_actions", "need_escalation"],
  additionalProperties: false,
} as const

export interface CarePlanPromptParams {
  level: "nursing" | "medical"
  /** The deterministic plan as JSON; the model rewrites it, never extends it. */
  template: string
  impression: string
  gaps: string[]
}

export interface ChatPromptParams {
  message: string
  evidence: PromptEvidence[]
  patient: PromptPatientContext
}

const OUTPUT_RULES = `OUTPUT FORMAT:
- Output ONLY a single valid JSON object
- Do NOT wrap JSON in markdown or code fences
- Do NOT include any text before or after the JSON`

function renderPatient(patient: PromptPatientContext): string {
  return [
    `Age: ${patient.age ?? "not recorded"}, Sex: ${patient.sex ?? "not recorded"}`,
    `Complaint: ${patient.chiefComplaint || "not recorded"}`,
    `History: ${patient.history || "not recorded"}`,
  ].join("\n")
}

export function renderEvidence(evidence: PromptEvidence[]): string {
  if (evidence.length === 0) return "(no retrieved evidence)"
  return evidence
    .map((item) => `[${item.ref}]${item.category ? ` (${item.category})` : ""} ${item.text}`)
    .join("\n\n")
}

function renderModalities(modalities: PromptModalities | undefined): string {
  if (!modalities) return ""
  return `[MODALITIES]
- has_audio: ${modalities.hasAudio}
- has_image: ${modalities.hasImage}
- audio_quality_score: ${modalities.audioQuality.toFixed(2)}
- image_quality_score: ${modalities.imageQuality.toFixed(2)}
- basis_hint: ${modalities.basisHint}
`
}

export function getDraftSystemPrompt(): string {
  return `You are a clinical decision-support assistant on a hospital ward. You draft a working impression for nurse and doctor review. This is never a final diagnosis.

CORE PRINCIPLES:
- Use ONLY facts stated in the narrative, the patient context, or the retrieved evidence
- Do NOT invent vitals, labs, doses, or history
- Prefer retrieved evidence when it is relevant and consistent; say so when it is insufficient
- If imaging output is not interpretable, treat it as low confidence
- If the transcript is noisy or repetitive, treat it as low confidence

${OUTPUT_RULES}
- Fields: impression, risk_level (Low|Medium|High), recommended_actions[], red_flags[], confidence_score (0-100)`
}

export function getDraftUserPrompt(params: DraftPromptParams): string {
  const { narrative, evidence, patient, modalities } = params
  return [
    renderModalities(modalities),
    "[PATIENT CONTEXT]",
    renderPatient(patient),
    "",
    "[NARRATIVE]",
    narrative || "(empty)",
    "",
    "[EVIDENCE]",
    renderEvidence(evidence),
    "",
    "Return the draft assessment JSON now.",
  ]
    .filter((line, index) => index > 0 || line !== "")
    .join("\n")
}

export function getAuditSystemPrompt(): string {
  return `You are a senior ward physician auditing a junior colleague's draft assessment.

CHECK FOR:
- Claims not supported by the narrative or the retrieved evidence
- Logical contradictions that are truly impossible
- Absolute statements ("definitely", "guaranteed")
- Missed safety concerns given the red flags and vitals

HARD RULES:
- Do NOT invent sex-specific contradictions for common diseases
- If evidence is weak, recommend expert review rather than inventing errors

${OUTPUT_RULES}
- Fields: verdict (pass|flagged), reasons[], unsupported_claims[]`
}

export function getAuditUserPrompt(params: AuditPromptParams): string {
  const { draft, evidence, patient, modalities } = params
  return [
    renderModalities(modalities),
    "[PATIENT CONTEXT]",
    renderPatient(patient),
    "",
    "[DRAFT ASSESSMENT (JSON)]",
    JSON.stringify(draft, null, 2),
    "",
    "[EVIDENCE]",
    renderEvidence(evidence),
    "",
    "Return the audit JSON now.",
  ]
    .filter((line, index) => index > 0 || line !== "")
    .join("\n")
}

export function getDifferentialSystemPrompt(): string {
  return `You are a critical diagnostic expert. Assume the working impression is WRONG and list the most plausible alternatives, dangerous ones first when plausibility is similar.

${OUTPUT_RULES}
- Fields: alternatives[] of { diagnosis, plausibility (0-1), supporting[], against[] }
- List at most five alternatives`
}

export function getDifferentialUserPrompt(params: DifferentialPromptParams): string {
  const { draft, narrative, patient } = params
  return [
    "[PATIENT CONTEXT]",
    renderPatient(patient),
    "",
    `Working impression: "${draft.impression}"`,
    "",
    "[NARRATIVE]",
    narrative || "(empty)",
    "",
    "Return the differential JSON now.",
  ].join("\n")
}

export function getHandoverPolishSystemPrompt(): string {
  return `You edit nursing handover notes. Keep the SBAR structure and section labels. Do not add, remove, or change any clinical fact. Return only the polished SBAR text.`
}

export function getHandoverPolishUserPrompt(sbar: string): string {
  return `Polish the following SBAR for clarity.\n\n${sbar}`
}

export function getCarePlanSystemPrompt(): string {
  return `You write short daily care plans that ward patients read on their own.

RULES:
- Plain language, one short sentence per bullet, at most five bullets
- Keep every red flag from the draft plan
- Never mention medicine names, doses or changes to treatment
- Do not mention missing data or measurements the patient cannot take

${OUTPUT_RULES}
- Fields: title, one_liner, bullets[], red_flags[], follow_up[]`
}

export function getCarePlanUserPrompt(params: CarePlanPromptParams): string {
  return [
    `Plan level: ${params.level}`,
    `Working impression: ${params.impression || "not recorded"}`,
    "",
    "[OPEN GAPS]",
    params.gaps.length > 0 ? params.gaps.map((gap) => `- ${gap}`).join("\n") : "(none)",
    "",
    "[DRAFT PLAN (JSON)]",
    params.template,
    "",
    "Return the care plan JSON now.",
  ].join("\n")
}

export function getChatSystemPrompt(): string {
  return `You answer questions from hospital ward patients between nurse rounds.

RULES:
- Be brief and kind; at most four sentences
- Use the retrieved evidence when it is relevant, and never invent facts
- Never give medicine names, doses, or advice to start, stop or change treatment
- Set need_escalation when the message describes a symptom that needs a nurse now

${OUTPUT_RULES}
- Fields: answer, suggested_actions[], need_escalation, escalation_reason`
}

export function getChatUserPrompt(params: ChatPromptParams): string {
  const { message, evidence, patient } = params
  return [
    "[PATIENT CONTEXT]",
    renderPatient(patient),
    "",
    "[MESSAGE]",
    message,
    "",
    "[EVIDENCE]",
    renderEvidence(evidence),
    "",
    "Return the reply JSON now.",
  ].join("\n")
}

/**
 * Metadata for prompt versioning
 */
export const PROMPT_METADATA = {
  version: PROMPT_VERSION,
  created_at: "2026-03-02",
  optimized_for: MODEL_OPTIMIZED_FOR,
  description: "Draft, self-audit and reverse differential prompts for ward assessments",
  changelog: [
    "Initial release with evidence references and modality quality hints",
    "Care plan drafting and patient chat",
  ],
} as const
