export { WardWorkflow, renderDailyCheck } from "./workflow"
export type { AssessmentRunner, WardWorkflowDependencies, WardWorkflowOptions } from "./workflow"
export {
  STAFF_ROLES,
  TERMINAL_STATUSES,
  TRANSITIONS,
  TRANSITION_TYPES,
  allowedActionsFor,
  entryActionsFor,
  isStaffRole,
  isTerminal,
  rejectionReason,
  ruleFor,
} from "./transitions"
export type { OwnerRule, TransitionContext, TransitionPolicy, TransitionRule } from "./transitions"
export { parseWardAction, wardActionSchema, vitalsSchema, dailyCheckSchema } from "./schema"
export { MAX_NEXT_ACTIONS, RISK_RULES_VERSION, computeRiskSnapshot } from "./risk-rules"
export type { RiskInputs } from "./risk-rules"
export { SBAR_LABELS, buildHandoverTemplate, formatVitals, polishHandoverText, renderSbar, symptomTexts } from "./handover"
export type { HandoverDraft, HandoverSources, PolishSettings } from "./handover"
export { loadWardSeedFile, parseWardSeed, seedWard, wardSeedSchema } from "./seed"
export type { SeedReport, WardSeed } from "./seed"
export { createWard } from "./create-ward"
export type { CreateWardOptions, Ward, WardAdapters } from "./create-ward"
export type * from "./types"
