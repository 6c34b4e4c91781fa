export { AssessmentOrchestrator, toCitation } from "./orchestrator"
export type { OrchestratorOptions } from "./orchestrator"
export { MAX_GENERATION_ATTEMPTS, isRetryableGenerationError, promptTokensOf, runGenerationStage } from "./generation"
export type { GenerationStageParams } from "./generation"
export { estimateTokens, fitToInputBudget } from "./truncation"
export type { FittedInput } from "./truncation"
export { GapCollector, VITAL_GAP_RULES, addVitalGaps } from "./gaps"
export { assessAudioQuality, assessImageQuality, pickPrimaryBasis, routeTagFor, LOW_QUALITY_THRESHOLD } from "./quality"
export { buildNarrative, renderFindings } from "./narrative"
export { runSafetyChecks, draftText } from "./safety"
export { LOW_CONFIDENCE_LABEL, MANUAL_REVIEW_LABEL, renderAssessment } from "./render"
export { auditOutputSchema, differentialOutputSchema, draftOutputSchema } from "./schema"
export type { AuditOutput, DifferentialOutput, DraftOutput } from "./schema"
export { PLACEHOLDER_TEXT } from "./types"
export type {
  AssessmentInput,
  AssessmentPatient,
  AudioQuality,
  EvidenceSearch,
  GenerationAttempt,
  ImageQuality,
  OrchestratorDependencies,
  OrchestratorSettings,
  PromptInput,
  PromptInputEvidence,
  RunOptions,
  StageOutcome,
  TruncationReport,
} from "./types"
