import type { LowConfidenceReviewPolicy } from "@ward-config"
import type { CarePlanStatus, RequestStatus, Role, Row, StaffRole } from "@storage"
import type { TransitionType, WardActionType } from "./types"

export const TERMINAL_STATUSES: readonly RequestStatus[] = ["acknowledged", "archived"]
export const STAFF_ROLES: readonly StaffRole[] = ["nurse", "doctor"]

export function isTerminal(status: RequestStatus): boolean {
  return TERMINAL_STATUSES.includes(status)
}

export function isStaffRole(role: Role): role is StaffRole {
  return role === "nurse" || role === "doctor"
}

/**
 * Who owns the request after the transition.
 * - `unchanged`: the current owner keeps it
 * - `actor`: the acting role takes it
 * - `target`: the forward target
 * - `previous`: popped from the owner history
 * - `returner`: the role whose `return` handed the request to the current owner
 * - `origin`: the role that created the request
 */
export type OwnerRule = "unchanged" | "actor" | "target" | "previous" | "returner" | "origin"

export interface TransitionPolicy {
  lowConfidenceReview: LowConfidenceReviewPolicy
  acknowledgementTimeoutMs: number
}

export interface TransitionContext {
  role: Role
  now: Date
  policy: TransitionPolicy
  /** The latest assessment on the request, when the rule needs it. */
  currentAssessment: Row<"assessments"> | null
  /** The latest care plan on the request. */
  currentCarePlan: Row<"carePlans"> | null
}

export interface TransitionRule {
  roles: readonly Role[]
  from: readonly RequestStatus[]
  /** When false the action is administrative and skips the owner check. */
  ownerOnly: boolean
  to: (from: RequestStatus) => RequestStatus
  owner: OwnerRule
  /** Returns a rejection reason, or null when the action may proceed. */
  guard?: (request: Row<"requests">, context: TransitionContext) => string | null
}

const NON_TERMINAL: readonly RequestStatus[] = ["created", "triaged", "in_progress", "forwarded", "resolved", "returned"]

const always =
  (status: RequestStatus) =>
  (): RequestStatus =>
    status

/** Care plan actions act on the request's latest plan and leave the request where it is. */
const carePlanGuard =
  (action: string, from: readonly CarePlanStatus[], medicalNeedsDoctor: boolean) =>
  (_request: Row<"requests">, { role, currentCarePlan }: TransitionContext): string | null => {
    if (!currentCarePlan) return "the request has no care plan"
    if (!from.includes(currentCarePlan.status)) return `a ${currentCarePlan.status} care plan cannot be ${action}`
    if (medicalNeedsDoctor && currentCarePlan.level === "medical" && role !== "doctor") {
      return `a medical care plan must be ${action} by a doctor`
    }
    return null
  }

export const TRANSITIONS = {
  triage: {
    roles: ["nurse"],
    from: ["created"],
    ownerOnly: true,
    to: always("triaged"),
    owner: "unchanged",
  },
  start: {
    roles: STAFF_ROLES,
    from: ["triaged"],
    ownerOnly: true,
    to: always("in_progress"),
    owner: "actor",
  },
  generate_assessment: {
    roles: STAFF_ROLES,
    from: ["triaged", "in_progress", "returned"],
    ownerOnly: true,
    to: (from) => (from === "triaged" ? "in_progress" : from),
    owner: "unchanged",
  },
  generate_handover: {
    roles: STAFF_ROLES,
    from: ["in_progress", "returned"],
    ownerOnly: true,
    to: (from) => from,
    owner: "unchanged",
  },
  generate_care_plan: {
    roles: STAFF_ROLES,
    from: ["in_progress", "returned"],
    ownerOnly: true,
    to: (from) => from,
    owner: "unchanged",
    guard: (request) =>
      request.assessmentIds.length === 0 ? "a care plan needs an assessment attached to the request" : null,
  },
  update_care_plan: {
    roles: STAFF_ROLES,
    from: NON_TERMINAL,
    ownerOnly: false,
    to: (from) => from,
    owner: "unchanged",
    guard: carePlanGuard("edited", ["draft", "needs_review", "held"], false),
  },
  publish_care_plan: {
    roles: STAFF_ROLES,
    from: NON_TERMINAL,
    ownerOnly: false,
    to: (from) => from,
    owner: "unchanged",
    guard: carePlanGuard("published", ["draft", "needs_review", "held"], true),
  },
  hold_care_plan: {
    roles: STAFF_ROLES,
    from: NON_TERMINAL,
    ownerOnly: false,
    to: (from) => from,
    owner: "unchanged",
    guard: carePlanGuard("held", ["draft", "needs_review", "published"], true),
  },
  forward: {
    roles: STAFF_ROLES,
    from: ["in_progress", "returned"],
    ownerOnly: true,
    to: always("forwarded"),
    owner: "target",
    guard: (request) =>
      request.assessmentIds.length + request.handoverIds.length === 0
        ? "forward needs an assessment or handover attached to the request"
        : null,
  },
  return: {
    roles: STAFF_ROLES,
    from: ["in_progress", "forwarded"],
    ownerOnly: true,
    to: always("returned"),
    owner: "previous",
    guard: (request) => (request.ownerHistory.length === 0 ? "there is no previous owner to return to" : null),
  },
  clarify: {
    roles: ["patient"],
    from: ["returned"],
    ownerOnly: true,
    to: always("in_progress"),
    owner: "returner",
  },
  resume: {
    roles: STAFF_ROLES,
    from: ["returned"],
    ownerOnly: true,
    to: always("in_progress"),
    owner: "actor",
  },
  resolve: {
    roles: STAFF_ROLES,
    from: ["in_progress", "forwarded", "returned"],
    ownerOnly: true,
    to: always("resolved"),
    owner: "origin",
    guard: (_request, { role, policy, currentAssessment }) =>
      role === "nurse" &&
      policy.lowConfidenceReview === "doctor_required" &&
      currentAssessment?.confidence.lowConfidence === true
        ? "a low-confidence assessment must be reviewed by a doctor before it is resolved"
        : null,
  },
  acknowledge: {
    roles: ["patient", "nurse"],
    from: ["resolved"],
    ownerOnly: true,
    to: always("acknowledged"),
    owner: "unchanged",
  },
  acknowledge_override: {
    roles: STAFF_ROLES,
    from: ["resolved"],
    ownerOnly: false,
    to: always("acknowledged"),
    owner: "unchanged",
    guard: (request, { role, now, policy }) => {
      if (role === "doctor") return null
      if (request.resolvedAt === null) return "request has no resolution time"
      const waited = now.getTime() - Date.parse(request.resolvedAt)
      return waited >= policy.acknowledgementTimeoutMs
        ? null
        : `nurse override is available ${policy.acknowledgementTimeoutMs - waited}ms from now`
    },
  },
  archive: {
    roles: STAFF_ROLES,
    from: NON_TERMINAL,
    ownerOnly: false,
    to: always("archived"),
    owner: "unchanged",
  },
} as const satisfies Record<TransitionType, TransitionRule>

export const TRANSITION_TYPES = Object.keys(TRANSITIONS).filter(isTransitionType)

function isTransitionType(value: string): value is TransitionType {
  return value in TRANSITIONS
}

export function ruleFor(type: TransitionType): TransitionRule {
  return TRANSITIONS[type]
}

/** Why `type` is not allowed right now, or null when it is. */
export function rejectionReason(
  request: Row<"requests">,
  type: TransitionType,
  context: TransitionContext,
): string | null {
  const rule = ruleFor(type)
  if (!rule.roles.includes(context.role)) {
    return `${context.role} may not ${type}`
  }
  if (!rule.from.includes(request.status)) {
    return `${type} is not allowed from ${request.status}`
  }
  if (rule.ownerOnly && request.ownerRole !== context.role) {
    return `request is owned by ${request.ownerRole}`
  }
  return rule.guard ? rule.guard(request, context) : null
}

/** The transition actions `context.role` may take on `request` right now. */
export function allowedActionsFor(request: Row<"requests">, context: TransitionContext): TransitionType[] {
  return TRANSITION_TYPES.filter((type) => rejectionReason(request, type, context) === null)
}

const ENTRY_ACTIONS: Record<Role, WardActionType[]> = {
  patient: ["submit_daily_check", "send_chat"],
  nurse: ["open_request", "record_vitals"],
  doctor: [],
}

/** Actions a role can take without an existing request. */
export function entryActionsFor(role: Role): WardActionType[] {
  return [...ENTRY_ACTIONS[role]]
}
