import assert from "node:assert/strict"
import { beforeEach, describe, it } from "node:test"
import { clearAuditLog, getAuditEntries } from "@storage/audit-log"
import type { Row } from "@storage"
import type { DispatchFailure, DispatchResult, DispatchSuccess } from "../types.js"
import {
  ACK_TIMEOUT_MS,
  DAILY_CHECK,
  FailingStore,
  GatedStore,
  START,
  doctor,
  harness,
  nurse,
  patient,
} from "./fixtures.js"

function accepted(result: DispatchResult): DispatchSuccess {
  if (!result.ok) assert.fail(`expected acceptance, got ${result.error.code}: ${result.error.message}`)
  return result
}

function rejected(result: DispatchResult): DispatchFailure {
  if (result.ok) assert.fail(`expected rejection of ${result.action}`)
  return result
}

function requestOf(result: DispatchResult): Row<"requests"> {
  const { request } = accepted(result)
  assert.ok(request)
  return request
}

beforeEach(() => {
  clearAuditLog()
})

describe("WardWorkflow lifecycle", () => {
  it("takes a daily check from submission to acknowledgement", async () => {
    const { workflow, store, runner } = await harness()

    const created = requestOf(await workflow.dispatch(DAILY_CHECK))
    assert.equal(created.id, "id-1")
    assert.equal(created.status, "created")
    assert.equal(created.ownerRole, "nurse")
    assert.deepEqual(created.ownerHistory, ["patient"])
    assert.equal(created.version, 1)
    assert.deepEqual(created.transitions[0], {
      seq: 1,
      action: "submit_daily_check",
      actorRole: "patient",
      actorId: "p1",
      at: START.toISOString(),
      fromStatus: null,
      toStatus: "created",
      fromOwner: null,
      toOwner: "nurse",
      note: null,
    })
    assert.deepEqual((await store.read("patients", "p1"))?.activeRequestIds, ["id-1"])

    const triaged = accepted(await workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-1" }))
    assert.equal(triaged.request?.status, "triaged")
    assert.deepEqual(triaged.allowedActions, ["start", "generate_assessment", "archive"])

    const assessed = accepted(await workflow.dispatch({ type: "generate_assessment", actor: nurse, requestId: "id-1" }))
    assert.equal(assessed.request?.status, "in_progress")
    assert.deepEqual(assessed.request?.assessmentIds, ["assessment-1"])
    assert.equal(assessed.assessment?.id, "assessment-1")
    assert.equal(
      runner.calls[0]?.typedText,
      "Coughing more today\nDiet: low. Water: 500 ml. Sleep: 3 hrs. Symptoms: cough.",
    )
    assert.equal(runner.calls[0]?.supersedes, null)

    const resolved = requestOf(
      await workflow.dispatch({ type: "resolve", actor: nurse, requestId: "id-1", note: "Continue oral antibiotics" }),
    )
    assert.equal(resolved.status, "resolved")
    assert.equal(resolved.ownerRole, "patient")
    assert.equal(resolved.resolvedAt, START.toISOString())

    const acknowledged = accepted(await workflow.dispatch({ type: "acknowledge", actor: patient, requestId: "id-1" }))
    assert.equal(acknowledged.request?.status, "acknowledged")
    assert.deepEqual(acknowledged.allowedActions, [])
    assert.equal(acknowledged.request?.version, 5)
    assert.deepEqual(
      acknowledged.request?.transitions.map((entry) => entry.action),
      ["submit_daily_check", "triage", "generate_assessment", "resolve", "acknowledge"],
    )
    assert.deepEqual((await store.read("patients", "p1"))?.activeRequestIds, [])
    assert.equal(getAuditEntries({ event_type: "request.transition", resource_id: "id-1" }).length, 5)
  })

  it("supersedes the previous assessment without touching it", async () => {
    const { workflow, store, runner } = await harness()
    await workflow.dispatch(DAILY_CHECK)
    await workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-1" })

    const first = accepted(await workflow.dispatch({ type: "generate_assessment", actor: nurse, requestId: "id-1" }))
    const before = await store.read("assessments", "assessment-1")
    const second = accepted(await workflow.dispatch({ type: "generate_assessment", actor: nurse, requestId: "id-1" }))

    assert.equal(runner.calls[1]?.supersedes, "assessment-1")
    assert.equal(second.assessment?.id, "assessment-2")
    assert.equal(second.assessment?.supersedes, "assessment-1")
    assert.deepEqual(second.request?.assessmentIds, ["assessment-1", "assessment-2"])
    assert.equal(second.request?.status, "in_progress")

    const after = await store.read("assessments", "assessment-1")
    assert.deepEqual(after, first.assessment)
    assert.deepEqual(after, before)
    assert.equal(after?.supersedes, null)
  })

  it("returns a request to the patient and resumes with the clarification", async () => {
    const { workflow, runner } = await harness()
    await workflow.dispatch(DAILY_CHECK)
    await workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-1" })
    accepted(await workflow.dispatch({ type: "start", actor: nurse, requestId: "id-1" }))

    const returned = accepted(
      await workflow.dispatch({ type: "return", actor: nurse, requestId: "id-1", note: "How long has the cough lasted?" }),
    )
    assert.equal(returned.request?.status, "returned")
    assert.equal(returned.request?.ownerRole, "patient")
    assert.deepEqual(returned.request?.ownerHistory, [])
    assert.deepEqual(returned.allowedActions, ["archive"])

    const clarified = requestOf(
      await workflow.dispatch({ type: "clarify", actor: patient, requestId: "id-1", text: "Green sputum since Monday" }),
    )
    assert.equal(clarified.status, "in_progress")
    assert.equal(clarified.ownerRole, "nurse")
    assert.deepEqual(clarified.ownerHistory, ["patient"])
    const last = clarified.transitions.at(-1)
    assert.equal(last?.fromOwner, "patient")
    assert.equal(last?.toOwner, "nurse")
    assert.equal(last?.note, "Green sputum since Monday")

    accepted(await workflow.dispatch({ type: "generate_assessment", actor: nurse, requestId: "id-1" }))
    assert.ok(runner.calls[0]?.typedText?.endsWith("\nPatient clarification: Green sputum since Monday"))
  })

  it("escalates a forwarded assessment to the doctor and back to the originating nurse", async () => {
    const { workflow, runner } = await harness()
    runner.confidence = { lowConfidence: true, requiresManualReview: true }

    const opened = requestOf(
      await workflow.dispatch({
        type: "open_request",
        actor: nurse,
        patientId: "p1",
        kind: "chat",
        text: "Increasing oxygen requirement overnight",
      }),
    )
    assert.equal(opened.originRole, "nurse")
    assert.deepEqual(opened.ownerHistory, [])
    await workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-1" })

    const assessed = accepted(await workflow.dispatch({ type: "generate_assessment", actor: nurse, requestId: "id-1" }))
    assert.equal(assessed.request?.requiresManualReview, true)
    assert.deepEqual(assessed.allowedActions, [
      "generate_assessment",
      "generate_handover",
      "generate_care_plan",
      "forward",
      "archive",
    ])

    const forwarded = accepted(
      await workflow.dispatch({
        type: "forward",
        actor: nurse,
        requestId: "id-1",
        targetRole: "doctor",
        payload: { kind: "assessment", assessmentId: "assessment-1" },
      }),
    )
    assert.equal(forwarded.request?.status, "forwarded")
    assert.equal(forwarded.request?.ownerRole, "doctor")
    assert.equal(forwarded.request?.targetRole, "doctor")
    assert.equal(forwarded.request?.escalated, true)
    assert.equal(forwarded.request?.requiresManualReview, true)
    assert.deepEqual(forwarded.request?.ownerHistory, ["nurse"])
    assert.deepEqual(forwarded.request?.forwardedPayload, { kind: "assessment", assessmentId: "assessment-1" })
    assert.deepEqual(forwarded.allowedActions, ["archive"])
    assert.deepEqual(await workflow.allowedActions("id-1", "doctor"), ["return", "resolve", "archive"])

    const resolved = requestOf(
      await workflow.dispatch({ type: "resolve", actor: doctor, requestId: "id-1", note: "Start supplemental oxygen" }),
    )
    assert.equal(resolved.ownerRole, "nurse")

    const acknowledged = requestOf(await workflow.dispatch({ type: "acknowledge", actor: nurse, requestId: "id-1" }))
    assert.equal(acknowledged.status, "acknowledged")
  })

  it("lets the doctor return a forwarded request to the nurse", async () => {
    const { workflow } = await harness()
    await workflow.dispatch({ type: "open_request", actor: nurse, patientId: "p1", kind: "chat", text: "New rash on forearm" })
    await workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-1" })
    await workflow.dispatch({ type: "generate_assessment", actor: nurse, requestId: "id-1" })
    await workflow.dispatch({
      type: "forward",
      actor: nurse,
      requestId: "id-1",
      targetRole: "doctor",
      payload: { kind: "assessment", assessmentId: "assessment-1" },
    })

    const returned = requestOf(
      await workflow.dispatch({ type: "return", actor: doctor, requestId: "id-1", note: "Please photograph the rash" }),
    )
    assert.equal(returned.status, "returned")
    assert.equal(returned.ownerRole, "nurse")
    assert.deepEqual(returned.ownerHistory, [])

    const resumed = requestOf(await workflow.dispatch({ type: "resume", actor: nurse, requestId: "id-1" }))
    assert.equal(resumed.status, "in_progress")
    assert.equal(resumed.ownerRole, "nurse")
  })
})

describe("WardWorkflow rejections", () => {
  it("rejects an invalid transition without side effects", async () => {
    const { workflow, store } = await harness()
    await workflow.dispatch(DAILY_CHECK)

    const result = rejected(await workflow.dispatch({ type: "start", actor: doctor, requestId: "id-1" }))
    assert.equal(result.error.code, "invalid_transition")
    assert.equal(result.error.recoverable, false)
    assert.equal(result.request?.version, 1)
    assert.deepEqual(result.allowedActions, ["archive"])

    const stored = await store.read("requests", "id-1")
    assert.equal(stored?.status, "created")
    assert.equal(stored?.transitions.length, 1)
    assert.equal(getAuditEntries({ event_type: "request.rejected" }).length, 1)
  })

  it("rejects malformed actions and unknown staff", async () => {
    const { workflow } = await harness()

    const malformed = rejected(await workflow.dispatch({ type: "teleport", actor: nurse }))
    assert.equal(malformed.error.code, "validation_error")
    assert.deepEqual(malformed.allowedActions, [])
    assert.equal(malformed.request, undefined)

    await workflow.dispatch(DAILY_CHECK)
    const ghost = rejected(
      await workflow.dispatch({ type: "triage", actor: { role: "nurse", id: "ghost" }, requestId: "id-1" }),
    )
    assert.equal(ghost.error.code, "not_found")

    const impostor = rejected(
      await workflow.dispatch({ type: "triage", actor: { role: "nurse", id: "d1" }, requestId: "id-1" }),
    )
    assert.equal(impostor.error.code, "validation_error")

    const missing = rejected(await workflow.dispatch({ type: "triage", actor: nurse, requestId: "nope" }))
    assert.equal(missing.error.code, "not_found")
  })

  it("requires a forward target other than the actor's role and an attached payload", async () => {
    const { workflow, store } = await harness()
    await workflow.dispatch({ type: "open_request", actor: nurse, patientId: "p1", kind: "chat", text: "Fever spike" })
    await workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-1" })
    await workflow.dispatch({ type: "generate_assessment", actor: nurse, requestId: "id-1" })

    const toSelf = rejected(
      await workflow.dispatch({
        type: "forward",
        actor: nurse,
        requestId: "id-1",
        targetRole: "nurse",
        payload: { kind: "assessment", assessmentId: "assessment-1" },
      }),
    )
    assert.equal(toSelf.error.code, "validation_error")

    const detached = rejected(
      await workflow.dispatch({
        type: "forward",
        actor: nurse,
        requestId: "id-1",
        targetRole: "doctor",
        payload: { kind: "assessment", assessmentId: "assessment-9" },
      }),
    )
    assert.equal(detached.error.code, "validation_error")
    assert.equal((await store.read("requests", "id-1"))?.version, 3)
  })

  it("keeps low-confidence assessments away from nurse-only resolution", async () => {
    const { workflow, runner } = await harness()
    runner.confidence = { lowConfidence: true }
    await workflow.dispatch(DAILY_CHECK)
    await workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-1" })
    await workflow.dispatch({ type: "generate_assessment", actor: nurse, requestId: "id-1" })

    const result = rejected(await workflow.dispatch({ type: "resolve", actor: nurse, requestId: "id-1", note: "Resolved" }))
    assert.equal(result.error.code, "invalid_transition")
    assert.equal(
      result.error.details?.reason,
      "a low-confidence assessment must be reviewed by a doctor before it is resolved",
    )
    assert.deepEqual(result.allowedActions, [
      "generate_assessment",
      "generate_handover",
      "generate_care_plan",
      "forward",
      "return",
      "archive",
    ])
  })

  it("allows nurse resolution of low-confidence assessments under nurse discretion", async () => {
    const { workflow, runner } = await harness({ policy: { lowConfidenceReview: "nurse_discretion" } })
    runner.confidence = { lowConfidence: true }
    await workflow.dispatch(DAILY_CHECK)
    await workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-1" })
    await workflow.dispatch({ type: "generate_assessment", actor: nurse, requestId: "id-1" })

    const resolved = requestOf(await workflow.dispatch({ type: "resolve", actor: nurse, requestId: "id-1", note: "Resolved" }))
    assert.equal(resolved.status, "resolved")
  })
})

describe("acknowledgement override", () => {
  async function resolvedRequest() {
    const setup = await harness()
    await setup.workflow.dispatch(DAILY_CHECK)
    await setup.workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-1" })
    await setup.workflow.dispatch({ type: "start", actor: nurse, requestId: "id-1" })
    requestOf(await setup.workflow.dispatch({ type: "resolve", actor: nurse, requestId: "id-1", note: "Reviewed" }))
    return setup
  }

  it("makes a nurse wait for the acknowledgement timeout", async () => {
    const { workflow, clock } = await resolvedRequest()

    const ownerCheck = rejected(await workflow.dispatch({ type: "acknowledge", actor: nurse, requestId: "id-1" }))
    assert.equal(ownerCheck.error.code, "invalid_transition")

    const early = rejected(
      await workflow.dispatch({ type: "acknowledge_override", actor: nurse, requestId: "id-1", reason: "Patient discharged" }),
    )
    assert.equal(early.error.code, "invalid_transition")
    assert.deepEqual(early.allowedActions, ["archive"])

    clock.advance(ACK_TIMEOUT_MS)
    const overridden = requestOf(
      await workflow.dispatch({ type: "acknowledge_override", actor: nurse, requestId: "id-1", reason: "Patient discharged" }),
    )
    assert.equal(overridden.status, "acknowledged")
    assert.equal(overridden.ownerRole, "patient")
    assert.equal(overridden.transitions.at(-1)?.note, "Patient discharged")
  })

  it("lets a doctor override at any time", async () => {
    const { workflow } = await resolvedRequest()
    const overridden = requestOf(
      await workflow.dispatch({ type: "acknowledge_override", actor: doctor, requestId: "id-1", reason: "Reviewed on round" }),
    )
    assert.equal(overridden.status, "acknowledged")
  })
})

describe("concurrency and persistence", () => {
  it("lets exactly one of two concurrent forwards win", async () => {
    const store = new GatedStore()
    const { workflow } = await harness({ store })
    await workflow.dispatch({ type: "open_request", actor: nurse, patientId: "p1", kind: "chat", text: "Desaturating" })
    await workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-1" })
    await workflow.dispatch({ type: "generate_assessment", actor: nurse, requestId: "id-1" })

    const forward = {
      type: "forward",
      actor: nurse,
      requestId: "id-1",
      targetRole: "doctor",
      payload: { kind: "assessment", assessmentId: "assessment-1" },
    } as const
    store.holdLocks(2)
    const results = await Promise.all([workflow.dispatch(forward), workflow.dispatch(forward)])

    assert.equal(results.filter((result) => result.ok).length, 1)
    const loser = results.find((result): result is DispatchFailure => !result.ok)
    assert.ok(loser)
    assert.equal(loser.error.code, "persistence_conflict")
    assert.equal(loser.error.recoverable, true)
    assert.equal(loser.request?.status, "forwarded")
    assert.equal(loser.request?.version, 4)
    assert.deepEqual(loser.allowedActions, ["archive"])

    const stored = await store.read("requests", "id-1")
    assert.equal(stored?.transitions.length, 4)
  })

  it("leaves no trace of a transition whose commit fails", async () => {
    const store = new FailingStore()
    const { workflow, runner } = await harness({ store })
    await workflow.dispatch(DAILY_CHECK)
    await workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-1" })

    store.failNextCommit = true
    const result = rejected(await workflow.dispatch({ type: "generate_assessment", actor: nurse, requestId: "id-1" }))
    assert.equal(result.error.code, "persistence_conflict")
    assert.equal(result.error.message, "commit failed: disk unavailable")
    assert.equal(runner.calls.length, 1)
    assert.equal(result.request?.status, "triaged")
    assert.equal(result.request?.version, 2)
    assert.deepEqual(result.request?.assessmentIds, [])
    assert.equal((await store.list("assessments")).length, 0)
  })

  it("reports cancellation of an in-flight assessment", async () => {
    const { workflow, runner, store } = await harness()
    await workflow.dispatch(DAILY_CHECK)
    await workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-1" })

    let release: () => void = () => undefined
    runner.gate = new Promise<void>((resolve) => {
      release = resolve
    })
    const controller = new AbortController()
    const pending = workflow.dispatch(
      { type: "generate_assessment", actor: nurse, requestId: "id-1" },
      { signal: controller.signal },
    )
    controller.abort()
    release()

    const result = rejected(await pending)
    assert.equal(result.error.code, "cancelled")
    assert.equal((await store.read("requests", "id-1"))?.status, "triaged")
  })

  it("appends exactly one log entry per accepted transition and never rewrites earlier ones", async () => {
    const { workflow } = await harness()
    const steps = [
      DAILY_CHECK,
      { type: "triage", actor: nurse, requestId: "id-1" },
      { type: "start", actor: nurse, requestId: "id-1" },
      { type: "generate_assessment", actor: nurse, requestId: "id-1" },
      { type: "start", actor: nurse, requestId: "id-1" },
      { type: "forward", actor: nurse, requestId: "id-1", targetRole: "doctor", payload: { kind: "assessment", assessmentId: "assessment-1" } },
      { type: "return", actor: doctor, requestId: "id-1" },
      { type: "resume", actor: nurse, requestId: "id-1" },
      { type: "archive", actor: doctor, requestId: "id-1", reason: "Duplicate of bedside review" },
    ] as const

    let previous: Row<"requests">["transitions"] = []
    for (const step of steps) {
      const result = await workflow.dispatch(step)
      if (!result.ok) {
        assert.equal(result.error.code, "invalid_transition")
        assert.deepEqual(result.request?.transitions, previous)
        continue
      }
      const transitions = result.request?.transitions ?? []
      assert.equal(transitions.length, previous.length + 1)
      assert.deepEqual(transitions.slice(0, previous.length), previous)
      assert.equal(transitions.at(-1)?.seq, previous.length + 1)
      previous = transitions
    }
    assert.deepEqual(
      previous.map((entry) => entry.action),
      ["submit_daily_check", "triage", "start", "generate_assessment", "forward", "return", "resume", "archive"],
    )
    assert.equal(previous.at(-1)?.toStatus, "archived")
  })
})

describe("inbox and views", () => {
  it("lists requests owned by the caller's role within their ward", async () => {
    const { workflow } = await harness()
    await workflow.dispatch(DAILY_CHECK)
    await workflow.dispatch({ type: "open_request", actor: nurse, patientId: "p2", kind: "chat", text: "Chest tightness" })
    await workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-2" })
    await workflow.dispatch({ type: "generate_assessment", actor: nurse, requestId: "id-2" })
    await workflow.dispatch({
      type: "forward",
      actor: nurse,
      requestId: "id-2",
      targetRole: "doctor",
      payload: { kind: "assessment", assessmentId: "assessment-1" },
    })

    const nurseInbox = accepted(await workflow.dispatch({ type: "list_inbox", actor: nurse }))
    assert.deepEqual(nurseInbox.inbox?.map((request) => request.id), ["id-1"])
    assert.deepEqual(nurseInbox.allowedActions, ["open_request", "record_vitals"])

    const doctorInbox = accepted(await workflow.dispatch({ type: "list_inbox", actor: doctor }))
    assert.deepEqual(doctorInbox.inbox?.map((request) => request.id), ["id-2"])

    const otherWard = accepted(await workflow.dispatch({ type: "list_inbox", actor: { role: "nurse", id: "n2" } }))
    assert.deepEqual(otherWard.inbox, [])
  })

  it("only shows a request to its own patient and to staff of its ward", async () => {
    const { workflow } = await harness()
    await workflow.dispatch(DAILY_CHECK)

    const own = accepted(await workflow.dispatch({ type: "view_request", actor: patient, requestId: "id-1" }))
    assert.equal(own.request?.id, "id-1")
    assert.deepEqual(own.allowedActions, [])

    const stranger = rejected(
      await workflow.dispatch({ type: "view_request", actor: { role: "patient", id: "p2" }, requestId: "id-1" }),
    )
    assert.equal(stranger.error.code, "validation_error")

    const otherWard = rejected(
      await workflow.dispatch({ type: "view_request", actor: { role: "nurse", id: "n2" }, requestId: "id-1" }),
    )
    assert.equal(otherWard.error.code, "validation_error")
  })
})

describe("vitals and handover", () => {
  it("builds a template handover from the vitals in the window and forwards it", async () => {
    const { workflow } = await harness()
    await workflow.dispatch(DAILY_CHECK)
    const recorded = accepted(
      await workflow.dispatch({
        type: "record_vitals",
        actor: nurse,
        patientId: "p1",
        vitals: { spo2Pct: 89, temperatureC: 37.2, respRate: 22, heartRate: 96 },
      }),
    )
    assert.equal(recorded.vitals?.id, "id-2")
    assert.deepEqual(recorded.vitals?.recordedBy, { role: "nurse", id: "n1" })

    await workflow.dispatch({ type: "triage", actor: nurse, requestId: "id-1" })
    await workflow.dispatch({ type: "start", actor: nurse, requestId: "id-1" })

    const result = accepted(
      await workflow.dispatch({ type: "generate_handover", actor: nurse, requestId: "id-1", annotation: "Family visiting at 6pm" }),
    )
    const handover = result.handover
    assert.ok(handover)
    assert.equal(handover.id, "id-3")
    assert.equal(handover.generatedBy, "template")
    assert.equal(handover.annotation, "Family visiting at 6pm")
    assert.deepEqual(handover.sourceVitalsIds, ["id-2"])
    assert.deepEqual(handover.sourceAssessmentIds, [])
    assert.equal(handover.risk.riskLevel, "red")
    assert.equal(handover.sbar.situation, "Risk light=RED. SpO2 89% (<90)")
    assert.equal(
      handover.sbar.assessment,
      "Latest vitals Temp 37.2 C, HR 96 bpm, RR 22/min, SpO2 89%; assessment not recorded, risk not recorded, gaps not recorded.",
    )
    assert.equal(handover.sbar.recommendation, "Notify doctor immediately; Encourage fluids and rest; monitor closely.")
    assert.equal(result.request?.status, "in_progress")
    assert.deepEqual(result.request?.handoverIds, ["id-3"])
    assert.equal(result.request?.transitions.at(-1)?.action, "generate_handover")

    const forwarded = requestOf(
      await workflow.dispatch({
        type: "forward",
        actor: nurse,
        requestId: "id-1",
        targetRole: "doctor",
        payload: { kind: "handover", handoverId: "id-3" },
      }),
    )
    assert.equal(forwarded.status, "forwarded")
    assert.equal(forwarded.requiresManualReview, false)
    assert.deepEqual(forwarded.forwardedPayload, { kind: "handover", handoverId: "id-3" })
  })
})
