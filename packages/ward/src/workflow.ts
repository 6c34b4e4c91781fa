import { randomUUID } from "node:crypto"
import type { AssessmentInput, EvidenceSearch, RunOptions } from "@assessment"
import { PipelineStageError, isPipelineError, toPipelineError } from "@pipeline-errors"
import type { PipelineError } from "@pipeline-errors"
import { IMAGE_MIME_TYPES } from "@pipeline-shared"
import type { AudioInput, ImageInput, ImageMimeType, TextGenerator } from "@pipeline-shared"
import { writeAuditEntry } from "@storage/audit-log"
import { debugLog, debugWarn } from "@storage/debug-logger"
import { deepFreeze } from "@storage/freeze"
import type {
  Actor,
  Assessment,
  Attachment,
  CarePlan,
  DailyCheck,
  HandoverSummary,
  Role,
  Row,
  StaffRole,
  TransitionLogEntry,
  VitalsRecord,
  WardRequest,
  WardStore,
  WardTransaction,
} from "@storage"
import type { WardConfig } from "@ward-config"
import { defaultCarePlanContent, draftCarePlan, initialCarePlanStatus, normalizeCarePlan, renderCarePlan } from "./care-plan"
import { answerPatientMessage } from "./chat"
import type { ChatReply } from "./chat"
import { buildHandoverTemplate, polishHandoverText } from "./handover"
import { parseWardAction } from "./schema"
import {
  allowedActionsFor,
  entryActionsFor,
  isStaffRole,
  isTerminal,
  rejectionReason,
  ruleFor,
} from "./transitions"
import type { OwnerRule, TransitionContext } from "./transitions"
import type {
  ActorOf,
  DispatchFailure,
  DispatchOptions,
  DispatchResult,
  DispatchSuccess,
  ForwardAction,
  GenerateAssessmentAction,
  GenerateCarePlanAction,
  GenerateHandoverAction,
  HoldCarePlanAction,
  ListInboxAction,
  NewAttachment,
  OpenRequestAction,
  PublishCarePlanAction,
  RecordVitalsAction,
  RequestTransitionAction,
  SendChatAction,
  SubmitDailyCheckAction,
  UpdateCarePlanAction,
  ViewRequestAction,
  WardAction,
  WardActionType,
} from "./types"

const HOUR_MS = 60 * 60 * 1000
const DEFAULT_SAMPLE_RATE_HZ = 16000

/** The orchestrator surface the workflow calls. */
export interface AssessmentRunner {
  runAssessment(input: AssessmentInput, options?: RunOptions): Promise<Assessment>
}

export interface WardWorkflowDependencies {
  store: WardStore
  orchestrator: AssessmentRunner
  /**
   * Answers patient chat, and polishes handovers and drafts care plans when
   * `config.handover.useModel` is set.
   */
  generator?: TextGenerator
  /** Knowledge base for patient chat. */
  retriever?: EvidenceSearch
  config: Pick<WardConfig, "generation" | "handover" | "policy" | "adapters" | "retrieval">
}

export interface WardWorkflowOptions {
  now?: () => Date
  newId?: () => string
}

interface AdvanceOptions {
  note?: string | null
  targetRole?: StaffRole
  changes?: Partial<WardRequest>
}

function isImageMimeType(value: string): value is ImageMimeType {
  return IMAGE_MIME_TYPES.some((type) => type === value)
}

function invalidTransition(action: WardActionType, reason: string, request: Row<"requests">, role: Role): PipelineStageError {
  return new PipelineStageError("invalid_transition", `${action} rejected: ${reason}`, false, {
    action,
    reason,
    status: request.status,
    ownerRole: request.ownerRole,
    role,
  })
}

function notFound(kind: string, id: string): PipelineStageError {
  return new PipelineStageError("not_found", `${kind} ${id} not found`, false, { id })
}

function invalid(message: string, details?: Record<string, unknown>): PipelineStageError {
  return new PipelineStageError("validation_error", message, false, details)
}

export function renderDailyCheck(check: DailyCheck): string {
  const parts: string[] = []
  if (check.diet) parts.push(`Diet: ${check.diet}.`)
  if (check.waterMl !== undefined) parts.push(`Water: ${check.waterMl} ml.`)
  if (check.sleepHours !== undefined) parts.push(`Sleep: ${check.sleepHours} hrs.`)
  if (check.symptoms.length > 0) parts.push(`Symptoms: ${check.symptoms.join(", ")}.`)
  return parts.join(" ")
}

/** The role whose `return` handed the request to its current owner. */
function returnerOf(request: Row<"requests">): Role {
  for (let i = request.transitions.length - 1; i >= 0; i -= 1) {
    const entry = request.transitions[i]
    if (entry?.action === "return" && entry.fromOwner !== null) return entry.fromOwner
  }
  return request.targetRole
}

function resolveOwner(
  rule: OwnerRule,
  request: Row<"requests">,
  actorRole: Role,
  targetRole: StaffRole | undefined,
): { owner: Role; history: Role[] } {
  const history = [...request.ownerHistory]
  switch (rule) {
    case "unchanged":
      return { owner: request.ownerRole, history }
    case "actor":
      return { owner: actorRole, history }
    case "origin":
      return { owner: request.originRole, history }
    case "target": {
      if (!targetRole) throw invalid("forward needs a target role")
      history.push(request.ownerRole)
      return { owner: targetRole, history }
    }
    case "previous": {
      const previous = history.pop()
      if (previous === undefined) throw invalid("request has no previous owner")
      return { owner: previous, history }
    }
    case "returner": {
      history.push(request.ownerRole)
      return { owner: returnerOf(request), history }
    }
  }
}

/**
 * Single entry point for ward actions. Each dispatch validates the action, checks it against
 * the transition table, runs any model work without holding a lock, and commits the new request
 * state under the patient lock in one store transaction.
 */
export class WardWorkflow {
  private readonly now: () => Date
  private readonly newId: () => string

  constructor(
    private readonly deps: WardWorkflowDependencies,
    options: WardWorkflowOptions = {},
  ) {
    this.now = options.now ?? (() => new Date())
    this.newId = options.newId ?? randomUUID
  }

  get store(): WardStore {
    return this.deps.store
  }

  async dispatch(input: unknown, options: DispatchOptions = {}): Promise<DispatchResult> {
    let action: WardAction
    try {
      action = parseWardAction(input)
    } catch (error) {
      return this.reject(null, error)
    }

    try {
      return await this.handle(action, options)
    } catch (error) {
      return this.reject(action, error)
    }
  }

  /** Transition actions `role` may take on the request right now. */
  async allowedActions(requestId: string, role: Role): Promise<WardActionType[]> {
    const request = await this.store.read("requests", requestId)
    if (!request) return entryActionsFor(role)
    return allowedActionsFor(request, await this.contextFor(request, role))
  }

  private handle(action: WardAction, options: DispatchOptions): Promise<DispatchSuccess> {
    switch (action.type) {
      case "submit_daily_check":
        return this.submitDailyCheck(action)
      case "send_chat":
        return this.sendChat(action, options)
      case "open_request":
        return this.openRequest(action)
      case "record_vitals":
        return this.recordVitals(action)
      case "generate_assessment":
        return this.generateAssessment(action, options)
      case "generate_handover":
        return this.generateHandover(action, options)
      case "generate_care_plan":
        return this.generateCarePlan(action, options)
      case "update_care_plan":
        return this.updateCarePlan(action)
      case "publish_care_plan":
      case "hold_care_plan":
        return this.reviewCarePlan(action)
      case "forward":
        return this.forward(action)
      case "list_inbox":
        return this.listInbox(action)
      case "view_request":
        return this.viewRequest(action)
      case "triage":
      case "start":
      case "return":
      case "clarify":
      case "resume":
      case "resolve":
      case "acknowledge":
      case "acknowledge_override":
      case "archive":
        return this.simpleTransition(action)
    }
  }

  private async reject(action: WardAction | null, error: unknown): Promise<DispatchFailure> {
    if (!isPipelineError(error)) throw error
    const normalized: PipelineError = toPipelineError(error, {
      code: "validation_error",
      message: "Ward action failed",
      recoverable: false,
    })

    let request: Row<"requests"> | undefined
    let allowedActions: WardActionType[] = []
    if (action) {
      if ("requestId" in action) {
        request = (await this.store.read("requests", action.requestId)) ?? undefined
      }
      allowedActions = request
        ? allowedActionsFor(request, await this.contextFor(request, action.actor.role))
        : entryActionsFor(action.actor.role)
    }

    debugWarn("ward action rejected", action?.type ?? "unparsed", normalized.code)
    await writeAuditEntry({
      event_type: "request.rejected",
      resource_id: request?.id,
      success: false,
      error_message: normalized.message,
      metadata: { action: action?.type ?? null, code: normalized.code, actorRole: action?.actor.role ?? null },
    })

    return { ok: false, error: normalized, request, allowedActions }
  }

  private timestamp(): string {
    return this.now().toISOString()
  }

  private async contextFor(request: Row<"requests">, role: Role): Promise<TransitionContext> {
    const currentId = request.assessmentIds.at(-1)
    const currentAssessment = currentId ? await this.store.read("assessments", currentId) : null
    const carePlanId = request.carePlanIds.at(-1)
    const currentCarePlan = carePlanId ? await this.store.read("carePlans", carePlanId) : null
    return { role, now: this.now(), policy: this.deps.config.policy, currentAssessment, currentCarePlan }
  }

  private async requirePatient(patientId: string): Promise<Row<"patients">> {
    const patient = await this.store.read("patients", patientId)
    if (!patient) throw notFound("patient", patientId)
    return patient
  }

  private async requireRequest(requestId: string): Promise<Row<"requests">> {
    const request = await this.store.read("requests", requestId)
    if (!request) throw notFound("request", requestId)
    return request
  }

  private async requireStaff(actor: ActorOf<StaffRole>, wardId?: string): Promise<Row<"staff">> {
    const member = await this.store.read("staff", actor.id)
    if (!member) throw notFound("staff member", actor.id)
    if (member.role !== actor.role) {
      throw invalid(`staff member ${actor.id} is a ${member.role}, not a ${actor.role}`, { actorId: actor.id })
    }
    if (wardId !== undefined && member.wardId !== wardId) {
      throw invalid(`staff member ${actor.id} is not assigned to ward ${wardId}`, { actorId: actor.id, wardId })
    }
    return member
  }

  private async requireActor(actor: ActorOf<Role>, request: Row<"requests">): Promise<void> {
    const { role, id } = actor
    if (isStaffRole(role)) {
      await this.requireStaff({ role, id }, request.wardId)
      return
    }
    if (id !== request.patientId) {
      throw invalid(`patient ${id} may not act on request ${request.id}`, { actorId: id })
    }
  }

  private async loadForTransition(action: RequestTransitionAction): Promise<Row<"requests">> {
    const request = await this.requireRequest(action.requestId)
    await this.requireActor(action.actor, request)
    const reason = rejectionReason(request, action.type, await this.contextFor(request, action.actor.role))
    if (reason !== null) {
      throw invalidTransition(action.type, reason, request, action.actor.role)
    }
    return request
  }

  /** The next request state: status and owner from the transition table plus one log entry. */
  private advance(request: Row<"requests">, action: RequestTransitionAction, options: AdvanceOptions = {}): WardRequest {
    const rule = ruleFor(action.type)
    const toStatus = rule.to(request.status)
    const { owner, history } = resolveOwner(rule.owner, request, action.actor.role, options.targetRole)
    const at = this.timestamp()
    const entry: TransitionLogEntry = {
      seq: request.transitions.length + 1,
      action: action.type,
      actorRole: action.actor.role,
      actorId: action.actor.id,
      at,
      fromStatus: request.status,
      toStatus,
      fromOwner: request.ownerRole,
      toOwner: owner,
      note: options.note ?? null,
    }
    return {
      ...request,
      ...options.changes,
      status: toStatus,
      ownerRole: owner,
      ownerHistory: history,
      updatedAt: at,
      transitions: [...request.transitions, entry],
    }
  }

  private async commitTransition(
    observed: Row<"requests">,
    next: WardRequest,
    stage?: (tx: WardTransaction) => Promise<void>,
  ): Promise<Row<"requests">> {
    const committed = await this.runCommit(observed.patientId, async (tx) => {
      const current = await tx.read("requests", observed.id)
      if (!current) throw notFound("request", observed.id)
      if (current.version !== observed.version) {
        throw new PipelineStageError("persistence_conflict", `request ${observed.id} changed concurrently`, true, {
          requestId: observed.id,
          expectedVersion: observed.version,
          actualVersion: current.version,
        })
      }
      if (stage) await stage(tx)
      await tx.update("requests", next, observed.version)
      if (isTerminal(next.status)) {
        await this.releaseActiveRequest(tx, observed)
      }
      return deepFreeze({ ...next, version: observed.version + 1 })
    })
    await this.auditTransition(committed)
    return committed
  }

  /** Runs `fn` in a store transaction under the patient lock; a failed commit applies nothing. */
  private async runCommit<R>(patientId: string, fn: (tx: WardTransaction) => Promise<R>): Promise<R> {
    try {
      return await this.store.withPatientLock(patientId, () => this.store.transaction(fn))
    } catch (error) {
      if (isPipelineError(error)) throw error
      throw new PipelineStageError(
        "persistence_conflict",
        `commit failed: ${error instanceof Error ? error.message : String(error)}`,
        true,
        { patientId },
      )
    }
  }

  private async releaseActiveRequest(tx: WardTransaction, request: Row<"requests">): Promise<void> {
    const patient = await tx.read("patients", request.patientId)
    if (!patient) return
    await tx.update(
      "patients",
      { ...patient, activeRequestIds: patient.activeRequestIds.filter((id) => id !== request.id) },
      patient.version,
    )
  }

  private async auditTransition(request: Row<"requests">): Promise<void> {
    const entry = request.transitions.at(-1)
    if (!entry) return
    debugLog("request transition", { requestId: request.id, action: entry.action, to: entry.toStatus, owner: entry.toOwner })
    await writeAuditEntry({
      event_type: "request.transition",
      resource_id: request.id,
      success: true,
      metadata: {
        seq: entry.seq,
        action: entry.action,
        actorRole: entry.actorRole,
        fromStatus: entry.fromStatus,
        toStatus: entry.toStatus,
        fromOwner: entry.fromOwner,
        toOwner: entry.toOwner,
      },
    })
  }

  private async success(
    action: WardAction,
    request: Row<"requests">,
    extra: Omit<DispatchSuccess, "ok" | "action" | "request" | "allowedActions"> = {},
  ): Promise<DispatchSuccess> {
    return {
      ok: true,
      action: action.type,
      request,
      ...extra,
      allowedActions: allowedActionsFor(request, await this.contextFor(request, action.actor.role)),
    }
  }

  private toAttachments(patientId: string, attachments: NewAttachment[] | undefined, at: string): Attachment[] {
    return (attachments ?? []).map((attachment) => ({
      id: this.newId(),
      patientId,
      kind: attachment.kind,
      data: attachment.data,
      mimeType: attachment.mimeType,
      sampleRateHz: attachment.kind === "voice" ? attachment.sampleRateHz : null,
      createdAt: at,
    }))
  }

  private async createRequest(
    action: SubmitDailyCheckAction | SendChatAction | OpenRequestAction,
    patient: Row<"patients">,
    request: WardRequest,
    attachments: Attachment[],
    extra: { chat?: ChatReply } = {},
  ): Promise<DispatchSuccess> {
    const committed = await this.runCommit(patient.id, async (tx) => {
      const current = await tx.read("patients", patient.id)
      if (!current) throw notFound("patient", patient.id)
      for (const attachment of attachments) {
        await tx.create("attachments", attachment)
      }
      await tx.create("requests", request)
      await tx.update("patients", { ...current, activeRequestIds: [...current.activeRequestIds, request.id] }, current.version)
      return deepFreeze(request)
    })
    await this.auditTransition(committed)
    return this.success(action, committed, extra)
  }

  private newRequest(
    fields: Pick<WardRequest, "patientId" | "wardId" | "originRole" | "targetRole" | "ownerRole" | "ownerHistory" | "payload">,
    actor: Actor,
    action: WardActionType,
  ): WardRequest {
    const at = this.timestamp()
    const entry: TransitionLogEntry = {
      seq: 1,
      action,
      actorRole: actor.role,
      actorId: actor.id,
      at,
      fromStatus: null,
      toStatus: "created",
      fromOwner: null,
      toOwner: fields.ownerRole,
      note: null,
    }
    return {
      id: this.newId(),
      ...fields,
      status: "created",
      escalated: false,
      requiresManualReview: false,
      assessmentIds: [],
      handoverIds: [],
      carePlanIds: [],
      forwardedPayload: null,
      createdAt: at,
      updatedAt: at,
      resolvedAt: null,
      version: 1,
      transitions: [entry],
    }
  }

  private async submitDailyCheck(action: SubmitDailyCheckAction): Promise<DispatchSuccess> {
    const patient = await this.requirePatient(action.actor.id)
    const attachments = this.toAttachments(patient.id, action.attachments, this.timestamp())
    const request = this.newRequest(
      {
        patientId: patient.id,
        wardId: patient.wardId,
        originRole: "patient",
        targetRole: "nurse",
        ownerRole: "nurse",
        ownerHistory: ["patient"],
        payload: {
          kind: "daily_check",
          text: action.text ?? null,
          attachmentIds: attachments.map((attachment) => attachment.id),
          vitalsId: null,
          dailyCheck: action.dailyCheck,
        },
      },
      action.actor,
      action.type,
    )
    return this.createRequest(action, patient, request, attachments)
  }

  /** Answers the patient; an escalating message also opens a chat request for the nurse. */
  private async sendChat(action: SendChatAction, options: DispatchOptions): Promise<DispatchSuccess> {
    const patient = await this.requirePatient(action.actor.id)
    const { generation, adapters, retrieval } = this.deps.config
    const chat = await answerPatientMessage(action.text, patient, {
      generator: this.deps.generator,
      retriever: this.deps.retriever,
      budget: generation,
      evidenceCharBudget: retrieval.evidenceCharBudget,
      timeoutMs: adapters.timeoutMs,
      signal: options.signal,
    })

    let result: DispatchSuccess
    if (chat.needEscalation) {
      const request = this.newRequest(
        {
          patientId: patient.id,
          wardId: patient.wardId,
          originRole: "patient",
          targetRole: "nurse",
          ownerRole: "nurse",
          ownerHistory: ["patient"],
          payload: { kind: "chat", text: action.text, attachmentIds: [], vitalsId: null, dailyCheck: null },
        },
        action.actor,
        action.type,
      )
      result = await this.createRequest(action, patient, request, [], { chat })
    } else {
      result = { ok: true, action: action.type, chat, allowedActions: entryActionsFor(action.actor.role) }
    }

    await writeAuditEntry({
      event_type: "chat.answered",
      resource_id: result.request?.id,
      success: true,
      metadata: {
        patientId: patient.id,
        generatedBy: chat.generatedBy,
        topic: chat.topic,
        needEscalation: chat.needEscalation,
        escalationReason: chat.escalationReason,
        usedRetrieval: chat.usedRetrieval,
        safetyFlags: chat.safetyFlags,
      },
    })
    return result
  }

  private async openRequest(action: OpenRequestAction): Promise<DispatchSuccess> {
    const patient = await this.requirePatient(action.patientId)
    await this.requireStaff(action.actor, patient.wardId)

    if (action.vitalsId !== undefined) {
      const vitals = await this.store.read("vitals", action.vitalsId)
      if (!vitals || vitals.patientId !== patient.id) throw notFound("vitals record", action.vitalsId)
    } else if (action.kind === "vitals") {
      throw invalid("a vitals request needs a vitalsId")
    }

    const attachments = this.toAttachments(patient.id, action.attachments, this.timestamp())
    const request = this.newRequest(
      {
        patientId: patient.id,
        wardId: patient.wardId,
        originRole: "nurse",
        targetRole: action.targetRole ?? "nurse",
        ownerRole: "nurse",
        ownerHistory: [],
        payload: {
          kind: action.kind,
          text: action.text ?? null,
          attachmentIds: attachments.map((attachment) => attachment.id),
          vitalsId: action.vitalsId ?? null,
          dailyCheck: null,
        },
      },
      action.actor,
      action.type,
    )
    return this.createRequest(action, patient, request, attachments)
  }

  private async recordVitals(action: RecordVitalsAction): Promise<DispatchSuccess> {
    const patient = await this.requirePatient(action.patientId)
    await this.requireStaff(action.actor, patient.wardId)

    const record: VitalsRecord = deepFreeze({
      ...action.vitals,
      id: this.newId(),
      patientId: patient.id,
      recordedAt: this.timestamp(),
      recordedBy: { role: action.actor.role, id: action.actor.id },
      notes: action.notes ?? null,
    })
    await this.runCommit(patient.id, (tx) => tx.create("vitals", record))
    await writeAuditEntry({
      event_type: "vitals.recorded",
      resource_id: record.id,
      success: true,
      metadata: { patientId: patient.id, actorId: action.actor.id },
    })
    return { ok: true, action: action.type, vitals: record, allowedActions: entryActionsFor(action.actor.role) }
  }

  private async simpleTransition(
    action: Exclude<
      RequestTransitionAction,
      | GenerateAssessmentAction
      | GenerateHandoverAction
      | GenerateCarePlanAction
      | UpdateCarePlanAction
      | PublishCarePlanAction
      | HoldCarePlanAction
      | ForwardAction
    >,
  ): Promise<DispatchSuccess> {
    const request = await this.loadForTransition(action)
    let note: string | null = null
    switch (action.type) {
      case "triage":
      case "return":
        note = action.note ?? null
        break
      case "clarify":
        note = action.text
        break
      case "resolve":
        note = action.note
        break
      case "acknowledge_override":
      case "archive":
        note = action.reason
        break
      case "start":
      case "resume":
      case "acknowledge":
        break
    }

    const next = this.advance(request, action, { note })
    if (action.type === "resolve") {
      next.resolvedAt = next.updatedAt
    }
    const committed = await this.commitTransition(request, next)
    return this.success(action, committed)
  }

  private async latestVitals(patientId: string, vitalsId: string | null): Promise<Row<"vitals"> | null> {
    if (vitalsId) {
      return this.store.read("vitals", vitalsId)
    }
    const records = await this.store.list("vitals", (record) => record.patientId === patientId)
    records.sort((a, b) => a.recordedAt.localeCompare(b.recordedAt))
    return records.at(-1) ?? null
  }

  private async assessmentInput(request: Row<"requests">, patient: Row<"patients">): Promise<AssessmentInput> {
    let audio: AudioInput | null = null
    let image: ImageInput | null = null
    for (const attachmentId of request.payload.attachmentIds) {
      const attachment = await this.store.read("attachments", attachmentId)
      if (!attachment) throw notFound("attachment", attachmentId)
      if (attachment.kind === "voice" && !audio) {
        audio = { audio: attachment.data, sampleRateHz: attachment.sampleRateHz ?? DEFAULT_SAMPLE_RATE_HZ }
      } else if (attachment.kind === "image" && !image && isImageMimeType(attachment.mimeType)) {
        image = { image: attachment.data, mimeType: attachment.mimeType }
      }
    }

    const typed: string[] = []
    if (request.payload.text) typed.push(request.payload.text)
    if (request.payload.dailyCheck) {
      const rendered = renderDailyCheck(request.payload.dailyCheck)
      if (rendered) typed.push(rendered)
    }
    for (const entry of request.transitions) {
      if (entry.action === "clarify" && entry.note) typed.push(`Patient clarification: ${entry.note}`)
    }

    return {
      requestId: request.id,
      patient: {
        id: patient.id,
        name: patient.name,
        age: patient.age,
        sex: patient.sex,
        chiefComplaint: patient.chiefComplaint,
        history: patient.history,
      },
      typedText: typed.length > 0 ? typed.join("\n") : null,
      audio,
      image,
      latestVitals: await this.latestVitals(patient.id, request.payload.vitalsId),
      supersedes: request.assessmentIds.at(-1) ?? null,
    }
  }

  private async generateAssessment(action: GenerateAssessmentAction, options: DispatchOptions): Promise<DispatchSuccess> {
    const request = await this.loadForTransition(action)
    const patient = await this.requirePatient(request.patientId)
    const input = await this.assessmentInput(request, patient)

    // no lock is held while the models run
    const assessment = await this.deps.orchestrator.runAssessment(input, { signal: options.signal, now: this.now })

    const next = this.advance(request, action, {
      changes: {
        assessmentIds: [...request.assessmentIds, assessment.id],
        requiresManualReview: assessment.confidence.requiresManualReview,
      },
    })
    const committed = await this.commitTransition(request, next, (tx) => tx.create("assessments", assessment))
    return this.success(action, committed, { assessment })
  }

  private async generateHandover(action: GenerateHandoverAction, options: DispatchOptions): Promise<DispatchSuccess> {
    const request = await this.loadForTransition(action)
    const patient = await this.requirePatient(request.patientId)
    const { handover: handoverConfig, generation, adapters } = this.deps.config

    const assessments: Row<"assessments">[] = []
    for (const assessmentId of request.assessmentIds) {
      const assessment = await this.store.read("assessments", assessmentId)
      if (assessment) assessments.push(assessment)
    }
    const windowEnd = this.now()
    const windowStart = new Date(windowEnd.getTime() - handoverConfig.windowHours * HOUR_MS)
    const vitals = await this.store.list("vitals", (record) => {
      const recordedAt = Date.parse(record.recordedAt)
      return record.patientId === patient.id && recordedAt >= windowStart.getTime() && recordedAt <= windowEnd.getTime()
    })
    vitals.sort((a, b) => a.recordedAt.localeCompare(b.recordedAt))

    const draft = buildHandoverTemplate({ request, patient, assessments, vitals })
    let text = draft.text
    let generatedBy: HandoverSummary["generatedBy"] = "template"
    if (handoverConfig.useModel && this.deps.generator) {
      const polished = await polishHandoverText(draft.text, {
        generator: this.deps.generator,
        budget: generation,
        timeoutMs: adapters.timeoutMs,
        signal: options.signal,
      })
      if (polished !== null) {
        text = polished
        generatedBy = "model"
      }
    }

    const handover: HandoverSummary = deepFreeze({
      id: this.newId(),
      requestId: request.id,
      patientId: patient.id,
      createdAt: windowEnd.toISOString(),
      createdBy: { role: action.actor.role, id: action.actor.id },
      windowStart: windowStart.toISOString(),
      windowEnd: windowEnd.toISOString(),
      sbar: draft.sbar,
      text,
      keyPoints: draft.keyPoints,
      risk: draft.risk,
      sourceAssessmentIds: assessments.map((assessment) => assessment.id),
      sourceVitalsIds: vitals.map((record) => record.id),
      generatedBy,
      annotation: action.annotation ?? null,
    })

    const next = this.advance(request, action, { changes: { handoverIds: [...request.handoverIds, handover.id] } })
    const committed = await this.commitTransition(request, next, (tx) => tx.create("handovers", handover))
    await writeAuditEntry({
      event_type: "handover.generated",
      resource_id: handover.id,
      success: true,
      metadata: { requestId: request.id, generatedBy, riskLevel: handover.risk.riskLevel },
    })
    return this.success(action, committed, { handover })
  }

  private async generateCarePlan(action: GenerateCarePlanAction, options: DispatchOptions): Promise<DispatchSuccess> {
    const request = await this.loadForTransition(action)
    const assessmentId = request.assessmentIds.at(-1) ?? ""
    const assessment = await this.store.read("assessments", assessmentId)
    if (!assessment) throw notFound("assessment", assessmentId)
    const { handover: handoverConfig, generation, adapters } = this.deps.config

    const draft = await draftCarePlan(
      { level: action.level, assessment, dailyCheck: request.payload.dailyCheck },
      {
        generator: this.deps.generator,
        useModel: handoverConfig.useModel,
        budget: generation,
        timeoutMs: adapters.timeoutMs,
        signal: options.signal,
      },
    )

    const planId = this.newId()
    const next = this.advance(request, action, { changes: { carePlanIds: [...request.carePlanIds, planId] } })
    const fields: Omit<CarePlan, "planVersion"> = {
      ...draft.content,
      id: planId,
      requestId: request.id,
      patientId: request.patientId,
      level: action.level,
      status: initialCarePlanStatus(action.level, action.actor.role),
      sourceAssessmentId: assessment.id,
      recommendations: draft.recommendations,
      text: draft.text,
      generatedBy: draft.generatedBy,
      createdAt: next.updatedAt,
      createdBy: { role: action.actor.role, id: action.actor.id },
      updatedAt: next.updatedAt,
      reviewedBy: null,
      statusNote: null,
      version: 1,
    }
    const committed = await this.commitTransition(request, next, async (tx) => {
      // plan versions are counted under the patient lock
      const earlier = await tx.list("carePlans", (plan) => plan.patientId === request.patientId && plan.level === action.level)
      await tx.create("carePlans", deepFreeze({ ...fields, planVersion: earlier.length + 1 }))
    })
    const carePlan = await this.store.read("carePlans", planId)
    if (!carePlan) throw notFound("care plan", planId)

    await writeAuditEntry({
      event_type: "care_plan.generated",
      resource_id: carePlan.id,
      success: true,
      metadata: {
        requestId: request.id,
        level: carePlan.level,
        status: carePlan.status,
        planVersion: carePlan.planVersion,
        generatedBy: carePlan.generatedBy,
      },
    })
    return this.success(action, committed, { carePlan })
  }

  private async requireCurrentCarePlan(request: Row<"requests">): Promise<Row<"carePlans">> {
    const planId = request.carePlanIds.at(-1) ?? ""
    const plan = await this.store.read("carePlans", planId)
    if (!plan) throw notFound("care plan", planId)
    return plan
  }

  private async updateCarePlan(action: UpdateCarePlanAction): Promise<DispatchSuccess> {
    const request = await this.loadForTransition(action)
    const current = await this.requireCurrentCarePlan(request)
    const content = normalizeCarePlan(
      {
        title: action.title,
        oneLiner: action.oneLiner ?? current.oneLiner,
        bullets: action.bullets ?? current.bullets,
        redFlags: action.redFlags ?? current.redFlags,
        followUp: action.followUp ?? current.followUp,
      },
      defaultCarePlanContent(current.level),
    )
    return this.changeCarePlan(action, request, current, { ...content, text: renderCarePlan(content) }, null)
  }

  private async reviewCarePlan(action: PublishCarePlanAction | HoldCarePlanAction): Promise<DispatchSuccess> {
    const request = await this.loadForTransition(action)
    const current = await this.requireCurrentCarePlan(request)
    const note = action.type === "publish_care_plan" ? action.note ?? null : action.reason
    return this.changeCarePlan(
      action,
      request,
      current,
      {
        status: action.type === "publish_care_plan" ? "published" : "held",
        reviewedBy: { role: action.actor.role, id: action.actor.id },
        statusNote: note,
      },
      note,
    )
  }

  /** Rewrites the request's current plan and logs the action on the request in one commit. */
  private async changeCarePlan(
    action: UpdateCarePlanAction | PublishCarePlanAction | HoldCarePlanAction,
    request: Row<"requests">,
    current: Row<"carePlans">,
    changes: Partial<CarePlan>,
    note: string | null,
  ): Promise<DispatchSuccess> {
    const next = this.advance(request, action, { note })
    const updated: CarePlan = { ...current, ...changes, updatedAt: next.updatedAt }
    const committed = await this.commitTransition(request, next, (tx) => tx.update("carePlans", updated, current.version))
    const carePlan = deepFreeze({ ...updated, version: current.version + 1 })

    await writeAuditEntry({
      event_type: "care_plan.updated",
      resource_id: carePlan.id,
      success: true,
      metadata: { requestId: request.id, action: action.type, status: carePlan.status, actorRole: action.actor.role },
    })
    return this.success(action, committed, { carePlan })
  }

  private async forwardedReviewFlag(request: Row<"requests">, action: ForwardAction): Promise<boolean> {
    const { payload } = action
    if (payload.kind === "assessment") {
      if (!request.assessmentIds.includes(payload.assessmentId)) {
        throw invalid(`assessment ${payload.assessmentId} is not attached to request ${request.id}`)
      }
      const assessment = await this.store.read("assessments", payload.assessmentId)
      if (!assessment) throw notFound("assessment", payload.assessmentId)
      return assessment.confidence.requiresManualReview
    }

    if (!request.handoverIds.includes(payload.handoverId)) {
      throw invalid(`handover ${payload.handoverId} is not attached to request ${request.id}`)
    }
    const handover = await this.store.read("handovers", payload.handoverId)
    if (!handover) throw notFound("handover", payload.handoverId)
    const sourceId = handover.sourceAssessmentIds.at(-1)
    if (!sourceId) return false
    const source = await this.store.read("assessments", sourceId)
    return source?.confidence.requiresManualReview ?? false
  }

  private async forward(action: ForwardAction): Promise<DispatchSuccess> {
    const request = await this.loadForTransition(action)
    if (action.targetRole === action.actor.role) {
      throw invalid(`a ${action.actor.role} cannot forward to their own role`)
    }
    const requiresManualReview = await this.forwardedReviewFlag(request, action)

    const next = this.advance(request, action, {
      targetRole: action.targetRole,
      note: action.note ?? null,
      changes: {
        targetRole: action.targetRole,
        forwardedPayload: action.payload,
        requiresManualReview,
        escalated: request.escalated || action.targetRole === "doctor",
      },
    })
    const committed = await this.commitTransition(request, next)
    return this.success(action, committed)
  }

  private async listInbox(action: ListInboxAction): Promise<DispatchSuccess> {
    const { role, id } = action.actor
    let matches: (request: Row<"requests">) => boolean
    if (isStaffRole(role)) {
      const member = await this.requireStaff({ role, id })
      matches = (request) => request.wardId === member.wardId
    } else {
      await this.requirePatient(id)
      matches = (request) => request.patientId === id
    }

    const inbox = await this.store.list(
      "requests",
      (request) => matches(request) && request.ownerRole === role && !isTerminal(request.status),
    )
    inbox.sort(
      (a, b) =>
        Number(b.escalated) - Number(a.escalated) || a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id),
    )
    return { ok: true, action: action.type, inbox, allowedActions: entryActionsFor(role) }
  }

  private async viewRequest(action: ViewRequestAction): Promise<DispatchSuccess> {
    const request = await this.requireRequest(action.requestId)
    await this.requireActor(action.actor, request)

    const assessmentId = request.assessmentIds.at(-1)
    const handoverId = request.handoverIds.at(-1)
    const assessment = assessmentId ? await this.store.read("assessments", assessmentId) : null
    const handover = handoverId ? await this.store.read("handovers", handoverId) : null
    return this.success(action, request, {
      assessment: assessment ?? undefined,
      handover: handover ?? undefined,
      carePlan: (await this.visibleCarePlan(request, action.actor.role)) ?? undefined,
    })
  }

  /** Staff see the latest plan; patients only the latest published one. */
  private async visibleCarePlan(request: Row<"requests">, role: Role): Promise<Row<"carePlans"> | null> {
    for (let i = request.carePlanIds.length - 1; i >= 0; i -= 1) {
      const plan = await this.store.read("carePlans", request.carePlanIds[i] ?? "")
      if (plan && (isStaffRole(role) || plan.status === "published")) return plan
    }
    return null
  }
}
