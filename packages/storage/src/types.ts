export type Role = "patient" | "nurse" | "doctor"
export type StaffRole = Exclude<Role, "patient">

export interface Actor {
  role: Role
  id: string
}

export interface Patient {
  id: string
  name: string
  wardId: string
  bedId: string | null
  age: number | null
  sex: string | null
  chiefComplaint: string
  history: string
  admittedAt: string
  activeRequestIds: string[]
  version: number
}

export interface StaffMember {
  id: string
  name: string
  role: StaffRole
  wardId: string
}

export interface Vitals {
  spo2Pct?: number
  temperatureC?: number
  heartRate?: number
  respRate?: number
  systolicBp?: number
  diastolicBp?: number
  painScore?: number
}

export interface VitalsRecord extends Vitals {
  id: string
  patientId: string
  recordedAt: string
  recordedBy: Actor
  notes: string | null
}

export interface DailyCheck {
  diet?: string
  waterMl?: number
  sleepHours?: number
  symptoms: string[]
}

export type AttachmentKind = "voice" | "image"

export interface Attachment {
  id: string
  patientId: string
  kind: AttachmentKind
  data: Buffer
  mimeType: string
  sampleRateHz: number | null
  createdAt: string
}

export const REQUEST_STATUSES = [
  "created",
  "triaged",
  "in_progress",
  "forwarded",
  "resolved",
  "returned",
  "acknowledged",
  "archived",
] as const

export type RequestStatus = (typeof REQUEST_STATUSES)[number]

export type RequestPayloadKind = "daily_check" | "chat" | "voice" | "image" | "vitals"

export interface RequestPayload {
  kind: RequestPayloadKind
  text: string | null
  attachmentIds: string[]
  vitalsId: string | null
  dailyCheck: DailyCheck | null
}

export type ForwardedPayload =
  | { kind: "assessment"; assessmentId: string }
  | { kind: "handover"; handoverId: string }

export interface TransitionLogEntry {
  seq: number
  action: string
  actorRole: Role
  actorId: string
  at: string
  fromStatus: RequestStatus | null
  toStatus: RequestStatus
  fromOwner: Role | null
  toOwner: Role
  note: string | null
}

export interface WardRequest {
  id: string
  patientId: string
  wardId: string
  originRole: Role
  targetRole: Role
  ownerRole: Role
  ownerHistory: Role[]
  payload: RequestPayload
  status: RequestStatus
  escalated: boolean
  requiresManualReview: boolean
  assessmentIds: string[]
  handoverIds: string[]
  carePlanIds: string[]
  forwardedPayload: ForwardedPayload | null
  createdAt: string
  updatedAt: string
  resolvedAt: string | null
  version: number
  transitions: TransitionLogEntry[]
}

export interface EvidenceCitation {
  chunkId: string
  documentId: string
  category: string | null
  offset: number
  score: number
  text: string
}

export type RiskLevel = "Low" | "Medium" | "High"

export interface DraftAssessment {
  impression: string
  riskLevel: RiskLevel | null
  recommendedActions: string[]
  redFlags: string[]
  confidenceScore: number | null
  placeholder: boolean
}

export interface AuditVerdict {
  verdict: "pass" | "flagged"
  reasons: string[]
  unsupportedClaims: string[]
  placeholder: boolean
}

export interface DifferentialItem {
  diagnosis: string
  plausibility: number
  supporting: string[]
  against: string[]
}

export interface Differential {
  items: DifferentialItem[]
  placeholder: boolean
}

export type StageName = "transcription" | "vision" | "retrieval" | "draft" | "audit" | "differential" | "finalize"

export type StageStatus = "ok" | "skipped" | "failed" | "placeholder"

export interface StageTrace {
  stage: StageName
  status: StageStatus
  latencyMs: number
  summary: string
  attempts: number
  error: string | null
}

export type GapSeverity = "low" | "medium" | "high"

export interface Gap {
  id: string
  severity: GapSeverity
  message: string
  suggestedFields: string[]
}

export interface ConfidenceIndicator {
  lowConfidence: boolean
  noEvidence: boolean
  requiresManualReview: boolean
  degradedStages: StageName[]
  reasons: string[]
}

export type RouteTag = "audio_image" | "audio_only" | "image_only" | "none"
export type PrimaryBasis = "audio" | "image" | "mixed" | "rag" | "clinical"

export interface Assessment {
  id: string
  requestId: string
  patientId: string
  supersedes: string | null
  createdAt: string
  narrative: string
  routeTag: RouteTag
  primaryBasis: PrimaryBasis
  evidence: EvidenceCitation[]
  draft: DraftAssessment
  audit: AuditVerdict
  differential: Differential
  confidence: ConfidenceIndicator
  trace: StageTrace[]
  gaps: Gap[]
  finalized: true
}

export type RiskLight = "green" | "yellow" | "red"

export interface RiskFlag {
  id: string
  severity: GapSeverity
  message: string
  recommendation: string
}

export interface RiskSnapshot {
  riskLevel: RiskLight
  riskScore: number
  flags: RiskFlag[]
  nextActions: string[]
  rulesVersion: string
}

export interface SbarSections {
  situation: string
  background: string
  assessment: string
  recommendation: string
}

export interface HandoverSummary {
  id: string
  requestId: string
  patientId: string
  createdAt: string
  createdBy: Actor
  windowStart: string
  windowEnd: string
  sbar: SbarSections
  text: string
  keyPoints: string[]
  risk: RiskSnapshot
  sourceAssessmentIds: string[]
  sourceVitalsIds: string[]
  generatedBy: "template" | "model"
  annotation: string | null
}

export type CarePlanLevel = "nursing" | "medical"

/** `needs_review`: a medical plan drafted by a nurse, waiting for a doctor. */
export type CarePlanStatus = "draft" | "needs_review" | "published" | "held"

export interface CarePlanRecommendation {
  id: string
  priority: GapSeverity
  reason: string
}

/** The patient-facing part of a care plan. */
export interface CarePlanContent {
  title: string
  oneLiner: string
  bullets: string[]
  redFlags: string[]
  followUp: string[]
}

export interface CarePlan extends CarePlanContent {
  id: string
  requestId: string
  patientId: string
  level: CarePlanLevel
  status: CarePlanStatus
  /** Counts plans per patient and level, starting at 1. */
  planVersion: number
  sourceAssessmentId: string
  recommendations: CarePlanRecommendation[]
  text: string
  generatedBy: "template" | "model"
  createdAt: string
  createdBy: Actor
  updatedAt: string
  reviewedBy: Actor | null
  statusNote: string | null
  version: number
}
