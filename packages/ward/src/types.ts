import type { PipelineError } from "@pipeline-errors"
import type { ImageMimeType } from "@pipeline-shared"
import type {
  CarePlanLevel,
  DailyCheck,
  ForwardedPayload,
  RequestPayloadKind,
  Role,
  Row,
  StaffRole,
  Vitals,
} from "@storage"
import type { ChatReply } from "./chat"

export interface ActorOf<R extends Role> {
  role: R
  id: string
}

export type StaffActor = ActorOf<StaffRole>

export type NewAttachment =
  | { kind: "voice"; data: Buffer; sampleRateHz: number; mimeType: "audio/wav" }
  | { kind: "image"; data: Buffer; mimeType: ImageMimeType }

export interface SubmitDailyCheckAction {
  type: "submit_daily_check"
  actor: ActorOf<"patient">
  dailyCheck: DailyCheck
  text?: string
  attachments?: NewAttachment[]
}

/** A patient question between rounds; only an escalating message opens a request. */
export interface SendChatAction {
  type: "send_chat"
  actor: ActorOf<"patient">
  text: string
}

export interface OpenRequestAction {
  type: "open_request"
  actor: ActorOf<"nurse">
  patientId: string
  kind: RequestPayloadKind
  text?: string
  attachments?: NewAttachment[]
  vitalsId?: string
  targetRole?: StaffRole
}

export interface RecordVitalsAction {
  type: "record_vitals"
  actor: ActorOf<"nurse">
  patientId: string
  vitals: Vitals
  notes?: string
}

export interface TriageAction {
  type: "triage"
  actor: ActorOf<"nurse">
  requestId: string
  note?: string
}

export interface StartAction {
  type: "start"
  actor: StaffActor
  requestId: string
}

export interface GenerateAssessmentAction {
  type: "generate_assessment"
  actor: StaffActor
  requestId: string
}

export interface GenerateHandoverAction {
  type: "generate_handover"
  actor: StaffActor
  requestId: string
  annotation?: string
}

export interface GenerateCarePlanAction {
  type: "generate_care_plan"
  actor: StaffActor
  requestId: string
  level: CarePlanLevel
}

export interface UpdateCarePlanAction {
  type: "update_care_plan"
  actor: StaffActor
  requestId: string
  title: string
  oneLiner?: string
  bullets?: string[]
  redFlags?: string[]
  followUp?: string[]
}

export interface PublishCarePlanAction {
  type: "publish_care_plan"
  actor: StaffActor
  requestId: string
  note?: string
}

export interface HoldCarePlanAction {
  type: "hold_care_plan"
  actor: StaffActor
  requestId: string
  reason: string
}

export interface ForwardAction {
  type: "forward"
  actor: StaffActor
  requestId: string
  targetRole: StaffRole
  payload: ForwardedPayload
  note?: string
}

export interface ReturnAction {
  type: "return"
  actor: StaffActor
  requestId: string
  note?: string
}

export interface ClarifyAction {
  type: "clarify"
  actor: ActorOf<"patient">
  requestId: string
  text: string
}

export interface ResumeAction {
  type: "resume"
  actor: StaffActor
  requestId: string
}

export interface ResolveAction {
  type: "resolve"
  actor: StaffActor
  requestId: string
  note: string
}

export interface AcknowledgeAction {
  type: "acknowledge"
  actor: ActorOf<"patient" | "nurse">
  requestId: string
}

export interface AcknowledgeOverrideAction {
  type: "acknowledge_override"
  actor: StaffActor
  requestId: string
  reason: string
}

export interface ArchiveAction {
  type: "archive"
  actor: StaffActor
  requestId: string
  reason: string
}

export interface ListInboxAction {
  type: "list_inbox"
  actor: ActorOf<Role>
}

export interface ViewRequestAction {
  type: "view_request"
  actor: ActorOf<Role>
  requestId: string
}

export type WardAction =
  | SubmitDailyCheckAction
  | SendChatAction
  | OpenRequestAction
  | RecordVitalsAction
  | TriageAction
  | StartAction
  | GenerateAssessmentAction
  | GenerateHandoverAction
  | GenerateCarePlanAction
  | UpdateCarePlanAction
  | PublishCarePlanAction
  | HoldCarePlanAction
  | ForwardAction
  | ReturnAction
  | ClarifyAction
  | ResumeAction
  | ResolveAction
  | AcknowledgeAction
  | AcknowledgeOverrideAction
  | ArchiveAction
  | ListInboxAction
  | ViewRequestAction

export type WardActionType = WardAction["type"]

/** Actions that move an existing request through the transition table. */
export type RequestTransitionAction = Extract<
  WardAction,
  { requestId: string; type: Exclude<WardActionType, "view_request"> }
>
export type TransitionType = RequestTransitionAction["type"]

export interface DispatchSuccess {
  ok: true
  action: WardActionType
  request?: Row<"requests">
  assessment?: Row<"assessments">
  handover?: Row<"handovers">
  carePlan?: Row<"carePlans">
  vitals?: Row<"vitals">
  chat?: ChatReply
  inbox?: Row<"requests">[]
  allowedActions: WardActionType[]
}

export interface DispatchFailure {
  ok: false
  error: PipelineError
  request?: Row<"requests">
  allowedActions: WardActionType[]
}

export type DispatchResult = DispatchSuccess | DispatchFailure

export interface DispatchOptions {
  signal?: AbortSignal
}
