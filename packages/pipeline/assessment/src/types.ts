import type { GenerationBudget } from "@ward-config"
import type { PipelineError } from "@pipeline-errors"
import type { AudioInput, ImageFindings, ImageInput, SpeechToText, TextGenerator, VisionAnalyzer } from "@pipeline-shared"
import type { ScoredChunk } from "@retrieval"
import type { Vitals } from "@storage"

export const PLACEHOLDER_TEXT = "insufficient model output"

export interface AssessmentPatient {
  id: string
  /** Carried for display only. Never rendered into a prompt. */
  name?: string
  age: number | null
  sex: string | null
  chiefComplaint: string
  history: string
}

export interface AssessmentInput {
  requestId: string
  patient: AssessmentPatient
  typedText: string | null
  audio: AudioInput | null
  image: ImageInput | null
  latestVitals: Vitals | null
  supersedes: string | null
}

/** The slice of the Evidence Retriever the orchestrator reads from. */
export interface EvidenceSearch {
  query(text: string, k: number, charBudget: number, signal?: AbortSignal): Promise<ScoredChunk[]>
}

export interface OrchestratorDependencies {
  generator: TextGenerator
  retriever: EvidenceSearch
  transcriber?: SpeechToText
  vision?: VisionAnalyzer
}

export interface OrchestratorSettings {
  generation: GenerationBudget
  evidenceCharBudget: number
  topK: number
  adapterTimeoutMs: number
}

export interface RunOptions {
  signal?: AbortSignal
  now?: () => Date
}

/** One piece of evidence as it appears in a prompt; `ref` is the chunk id. */
export interface PromptInputEvidence {
  ref: string
  category: string | null
  text: string
}

/** The parts of a prompt that may be shortened to fit the input budget. */
export interface PromptInput {
  narrative: string
  evidence: PromptInputEvidence[]
}

export interface TruncationReport {
  droppedEvidence: number
  narrativeCharsRemoved: number
}

export interface GenerationAttempt {
  attempt: number
  maxOutputTokens: number
  promptTokens: number
  truncation: TruncationReport | null
  error?: PipelineError
}

export type StageOutcome<T> =
  /** `input` is what the successful attempt sent, after any truncation. */
  | { status: "ok"; value: T; attempts: GenerationAttempt[]; input: PromptInput }
  | { status: "placeholder"; text: typeof PLACEHOLDER_TEXT; error: PipelineError; attempts: GenerationAttempt[] }
  | { status: "skipped"; reason: string }

export interface AudioQuality {
  score: number
  issues: string[]
}

export interface ImageQuality {
  score: number
  issues: string[]
}

