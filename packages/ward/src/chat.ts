import { z } from "zod"
import { runGenerationStage, toCitation } from "@assessment"
import type { AssessmentPatient, EvidenceSearch, PromptInputEvidence } from "@assessment"
import { prompts } from "@llm"
import { cancelledError, toPipelineError } from "@pipeline-errors"
import { callWithTimeout, parseModelJson, throwIfCancelled } from "@pipeline-shared"
import type { TextGenerator } from "@pipeline-shared"
import type { ScoredChunk } from "@retrieval"
import type { EvidenceCitation } from "@storage"
import { debugWarn } from "@storage/debug-logger"
import type { GenerationBudget } from "@ward-config"

export const CHAT_TOP_K = 3
export const MAX_CHAT_CITATIONS = 3
export const MAX_SUGGESTED_ACTIONS = 6
export const SNIPPET_CHARS = 220
const LONG_MESSAGE_CHARS = 120

export const FALLBACK_ANSWER = "Your care team has your message. Please contact your nurse or doctor if symptoms worsen."
export const MEDICATION_POLICY_ANSWER = "Please consult your nurse or doctor for medication-related decisions."

const RETRIEVAL_TERMS = [
  "guideline",
  "evidence",
  "protocol",
  "recommend",
  "treatment",
  "antibiotic",
  "pneumonia",
  "risk",
  "criteria",
  "what is",
  "why",
  "how to",
  "explain",
]

export const ESCALATION_TERMS = ["chest pain", "severe shortness of breath", "confusion", "faint", "low oxygen"]

const MEDICATION_PATTERN = /\b(mg|doses?|dosage|increase|decrease|stop|start|antibiotics?|steroids?)\b/i

const TOPIC_TERMS: [ChatTopic, string[]][] = [
  ["med_adherence", ["medicine", "medication", "pill", "tablet", "inhaler"]],
  ["symptom_worsening", ["worse", "pain", "breath", "fever", "cough", "dizzy"]],
  ["diet_sleep", ["eat", "food", "diet", "sleep", "water", "drink"]],
  ["education", ["what is", "why", "how", "explain"]],
]

export type ChatTopic = "med_adherence" | "symptom_worsening" | "diet_sleep" | "education" | "other"

export interface ChatReply {
  answer: string
  suggestedActions: string[]
  needEscalation: boolean
  /** `triggered_by_keywords` when the keyword rule fired, the model's reason otherwise. */
  escalationReason: string | null
  safetyFlags: string[]
  citations: EvidenceCitation[]
  topic: ChatTopic
  generatedBy: "model" | "template"
  usedRetrieval: boolean
}

export interface ChatSettings {
  generator?: TextGenerator
  retriever?: EvidenceSearch
  budget: GenerationBudget
  evidenceCharBudget: number
  timeoutMs: number
  signal?: AbortSignal
}

const chatOutputSchema = z.object({
  answer: z.string().trim().min(1),
  suggested_actions: z
    .array(z.string())
    .default([])
    .transform((items) => items.map((item) => item.trim()).filter((item) => item.length > 0)),
  need_escalation: z.boolean().default(false),
  escalation_reason: z.string().trim().optional(),
})

type ChatOutput = z.infer<typeof chatOutputSchema>

/** Long messages, questions and guideline-style wording are worth a knowledge-base lookup. */
export function shouldUseRetrieval(message: string): boolean {
  const text = message.toLowerCase()
  if (text.length >= LONG_MESSAGE_CHARS || text.includes("?")) return true
  return RETRIEVAL_TERMS.some((term) => text.includes(term))
}

export function escalationRuleFires(message: string): boolean {
  const text = message.toLowerCase()
  return ESCALATION_TERMS.some((term) => text.includes(term))
}

export function mentionsMedication(text: string): boolean {
  return MEDICATION_PATTERN.test(text)
}

export function inferTopic(message: string): ChatTopic {
  const text = message.toLowerCase()
  for (const [topic, terms] of TOPIC_TERMS) {
    if (terms.some((term) => text.includes(term))) return topic
  }
  return "other"
}

async function lookUpEvidence(message: string, settings: ChatSettings): Promise<ScoredChunk[]> {
  const { retriever, signal } = settings
  if (!retriever || !shouldUseRetrieval(message)) return []
  try {
    return await callWithTimeout(
      "chat_retrieval",
      settings.timeoutMs,
      (callSignal) => retriever.query(message, CHAT_TOP_K, settings.evidenceCharBudget, callSignal),
      signal,
    )
  } catch (error) {
    if (signal?.aborted) throw cancelledError("chat_retrieval")
    const normalized = toPipelineError(error, {
      code: "retrieval_unavailable",
      message: "chat retrieval failed",
      recoverable: true,
    })
    if (normalized.code === "cancelled") throw error
    debugWarn("chat answered without evidence", normalized.code)
    return []
  }
}

function toPromptEvidence(item: ScoredChunk): PromptInputEvidence {
  const text = item.chunk.text.length > SNIPPET_CHARS ? `${item.chunk.text.slice(0, SNIPPET_CHARS)}...` : item.chunk.text
  return { ref: item.chunk.id, category: item.chunk.category, text }
}

async function askModel(
  message: string,
  patient: AssessmentPatient,
  evidence: PromptInputEvidence[],
  generator: TextGenerator,
  settings: ChatSettings,
): Promise<{ output: ChatOutput; refs: string[] } | null> {
  const v1 = prompts.assessment.currentVersion
  const outcome = await runGenerationStage({
    label: "patient_chat",
    generator,
    budget: settings.budget,
    timeoutMs: settings.timeoutMs,
    input: { narrative: message, evidence },
    build: (input, maxOutputTokens) => ({
      system: v1.getChatSystemPrompt(),
      prompt: v1.getChatUserPrompt({ message: input.narrative, evidence: input.evidence, patient }),
      maxOutputTokens,
      jsonSchema: { name: "patient_chat", schema: v1.CHAT_SCHEMA },
    }),
    parse: (raw) => parseModelJson(raw, chatOutputSchema),
    signal: settings.signal,
  })

  if (outcome.status === "ok") {
    return { output: outcome.value, refs: outcome.input.evidence.map((item) => item.ref) }
  }
  if (outcome.status === "placeholder") {
    debugWarn("patient chat fell back to template", outcome.error.code)
  }
  return null
}

/**
 * Answers one patient message. The model answers when a generator is configured; otherwise, or
 * when its output is unusable, the patient gets the fixed fallback answer. Medication advice is
 * always replaced, and the escalation keywords always escalate.
 */
export async function answerPatientMessage(
  message: string,
  patient: AssessmentPatient,
  settings: ChatSettings,
): Promise<ChatReply> {
  throwIfCancelled(settings.signal, "patient_chat")
  const retrieved = await lookUpEvidence(message, settings)
  const evidence = retrieved.map(toPromptEvidence)

  const reply = settings.generator ? await askModel(message, patient, evidence, settings.generator, settings) : null

  let answer = reply?.output.answer ?? FALLBACK_ANSWER
  const safetyFlags: string[] = []
  if (mentionsMedication(answer)) {
    answer = MEDICATION_POLICY_ANSWER
    safetyFlags.push("policy_filtered")
  }

  let needEscalation = reply?.output.need_escalation ?? false
  let escalationReason = needEscalation ? reply?.output.escalation_reason || "model_flagged" : null
  if (escalationRuleFires(message)) {
    needEscalation = true
    escalationReason = "triggered_by_keywords"
  }

  const cited = new Set(reply?.refs ?? [])
  return {
    answer,
    suggestedActions: (reply?.output.suggested_actions ?? []).slice(0, MAX_SUGGESTED_ACTIONS),
    needEscalation,
    escalationReason,
    safetyFlags,
    citations: retrieved
      .filter((item) => cited.has(item.chunk.id))
      .slice(0, MAX_CHAT_CITATIONS)
      .map(toCitation),
    topic: inferTopic(message),
    generatedBy: reply ? "model" : "template",
    usedRetrieval: retrieved.length > 0,
  }
}
