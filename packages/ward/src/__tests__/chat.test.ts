import assert from "node:assert/strict"
import { beforeEach, describe, it } from "node:test"
import type { EvidenceSearch } from "@assessment"
import type { ScoredChunk } from "@retrieval"
import { clearAuditLog, getAuditEntries } from "@storage/audit-log"
import {
  FALLBACK_ANSWER,
  MEDICATION_POLICY_ANSWER,
  answerPatientMessage,
  inferTopic,
  shouldUseRetrieval,
} from "../chat.js"
import type { ChatSettings } from "../chat.js"
import type { DispatchResult, DispatchSuccess } from "../types.js"
import { harness, nurse, patient, scriptedGenerator } from "./fixtures.js"

const PATIENT = { id: "p1", age: 71, sex: "F", chiefComplaint: "productive cough and fever", history: "COPD" }
const budget = { maxOutputTokens: 384, retryMaxOutputTokens: 192, maxInputTokens: 3072 }

class StubRetriever implements EvidenceSearch {
  readonly calls: Array<{ text: string; k: number; charBudget: number }> = []

  constructor(private readonly result: ScoredChunk[] | Error) {}

  async query(text: string, k: number, charBudget: number): Promise<ScoredChunk[]> {
    this.calls.push({ text, k, charBudget })
    if (this.result instanceof Error) throw this.result
    return this.result
  }
}

function scored(id: string, text: string): ScoredChunk {
  return { chunk: { id: `${id}#0`, documentId: id, offset: 0, text, category: "guideline" }, score: 0.8, truncated: false }
}

function reply(fields: Record<string, unknown>): string {
  return JSON.stringify({ suggested_actions: [], need_escalation: false, ...fields })
}

function settings(overrides: Partial<ChatSettings> = {}): ChatSettings {
  return { budget, evidenceCharBudget: 2200, timeoutMs: 1000, ...overrides }
}

function accepted(result: DispatchResult): DispatchSuccess {
  if (!result.ok) assert.fail(`expected acceptance, got ${result.error.code}: ${result.error.message}`)
  return result
}

const WALKING = "Walking short distances on the ward is encouraged once oxygen saturation is stable."

beforeEach(() => {
  clearAuditLog()
})

describe("chat rules", () => {
  it("looks up evidence for questions, long messages and guideline wording", () => {
    assert.equal(shouldUseRetrieval("Can I walk today?"), true)
    assert.equal(shouldUseRetrieval("Please explain my treatment"), true)
    assert.equal(shouldUseRetrieval("x".repeat(120)), true)
    assert.equal(shouldUseRetrieval("feeling ok today"), false)
  })

  it("tags the message topic", () => {
    assert.equal(inferTopic("I forgot my tablet this morning"), "med_adherence")
    assert.equal(inferTopic("My cough is worse"), "symptom_worsening")
    assert.equal(inferTopic("I could not sleep"), "diet_sleep")
    assert.equal(inferTopic("What is COPD"), "education")
    assert.equal(inferTopic("hello"), "other")
  })
})

describe("answerPatientMessage", () => {
  it("answers through the model with the retrieved evidence", async () => {
    const retriever = new StubRetriever([scored("walking-guide", WALKING)])
    const generator = scriptedGenerator([
      reply({ answer: "Short walks are fine if you feel steady.", suggested_actions: ["Ask a nurse to walk with you"] }),
    ])

    const answer = await answerPatientMessage("Is it safe to walk around the ward?", PATIENT, settings({ generator, retriever }))

    assert.deepEqual(retriever.calls, [{ text: "Is it safe to walk around the ward?", k: 3, charBudget: 2200 }])
    assert.equal(generator.requests[0]?.jsonSchema?.name, "patient_chat")
    assert.ok(generator.requests[0]?.prompt.includes(`[walking-guide#0] (guideline) ${WALKING}`))
    assert.equal(answer.answer, "Short walks are fine if you feel steady.")
    assert.deepEqual(answer.suggestedActions, ["Ask a nurse to walk with you"])
    assert.equal(answer.generatedBy, "model")
    assert.equal(answer.usedRetrieval, true)
    assert.equal(answer.needEscalation, false)
    assert.equal(answer.escalationReason, null)
    assert.deepEqual(
      answer.citations.map((citation) => citation.chunkId),
      ["walking-guide#0"],
    )
    assert.equal(answer.topic, "other")
  })

  it("cuts evidence snippets to 220 characters", async () => {
    const retriever = new StubRetriever([scored("long-guide", "a".repeat(300))])
    const generator = scriptedGenerator([reply({ answer: "Rest well." })])

    await answerPatientMessage("Why am I tired?", PATIENT, settings({ generator, retriever }))

    assert.ok(generator.requests[0]?.prompt.includes(`[long-guide#0] (guideline) ${"a".repeat(220)}...`))
    assert.equal(generator.requests[0]?.prompt.includes("a".repeat(221)), false)
  })

  it("replaces medication advice", async () => {
    const generator = scriptedGenerator([reply({ answer: "You can stop the antibiotic tomorrow." })])

    const answer = await answerPatientMessage("Can I go home soon?", PATIENT, settings({ generator }))

    assert.equal(answer.answer, MEDICATION_POLICY_ANSWER)
    assert.deepEqual(answer.safetyFlags, ["policy_filtered"])
  })

  it("escalates on warning keywords even without a model", async () => {
    const answer = await answerPatientMessage("I have chest pain since lunch", PATIENT, settings())

    assert.equal(answer.answer, FALLBACK_ANSWER)
    assert.equal(answer.generatedBy, "template")
    assert.equal(answer.needEscalation, true)
    assert.equal(answer.escalationReason, "triggered_by_keywords")
    assert.equal(answer.usedRetrieval, false)
    assert.equal(answer.topic, "symptom_worsening")
  })

  it("escalates when the model asks for a nurse", async () => {
    const generator = scriptedGenerator([reply({ answer: "A nurse will come and see you.", need_escalation: true })])

    const answer = await answerPatientMessage("My legs look swollen", PATIENT, settings({ generator }))

    assert.equal(answer.needEscalation, true)
    assert.equal(answer.escalationReason, "model_flagged")
  })

  it("answers without evidence when the knowledge base fails", async () => {
    const retriever = new StubRetriever(new Error("index offline"))
    const generator = scriptedGenerator([reply({ answer: "Short walks are fine." })])

    const answer = await answerPatientMessage("Can I walk today?", PATIENT, settings({ generator, retriever }))

    assert.equal(retriever.calls.length, 1)
    assert.ok(generator.requests[0]?.prompt.includes("(no retrieved evidence)"))
    assert.equal(answer.usedRetrieval, false)
    assert.deepEqual(answer.citations, [])
    assert.equal(answer.answer, "Short walks are fine.")
  })

  it("falls back to the fixed answer after two unusable replies", async () => {
    const generator = scriptedGenerator(["I am not sure."])

    const answer = await answerPatientMessage("feeling ok today", PATIENT, settings({ generator }))

    assert.equal(generator.requests.length, 2)
    assert.equal(generator.requests[1]?.maxOutputTokens, 192)
    assert.equal(answer.answer, FALLBACK_ANSWER)
    assert.equal(answer.generatedBy, "template")
  })
})

describe("send_chat", () => {
  it("answers the patient without opening a request", async () => {
    const { workflow, store } = await harness()

    const result = accepted(await workflow.dispatch({ type: "send_chat", actor: patient, text: "Can I have a shower today?" }))

    assert.equal(result.chat?.answer, FALLBACK_ANSWER)
    assert.equal(result.request, undefined)
    assert.deepEqual(result.allowedActions, ["submit_daily_check", "send_chat"])
    assert.deepEqual(await store.list("requests"), [])
    const [entry] = getAuditEntries({ event_type: "chat.answered" })
    assert.equal(entry?.resource_id, undefined)
    assert.equal(entry?.metadata?.needEscalation, false)
  })

  it("opens a nurse-owned chat request when the message escalates", async () => {
    const { workflow, store } = await harness()

    const result = accepted(await workflow.dispatch({ type: "send_chat", actor: patient, text: "I feel faint and dizzy" }))

    assert.equal(result.chat?.needEscalation, true)
    assert.equal(result.chat?.escalationReason, "triggered_by_keywords")
    const request = result.request
    assert.ok(request)
    assert.equal(request.id, "id-1")
    assert.equal(request.status, "created")
    assert.equal(request.originRole, "patient")
    assert.equal(request.ownerRole, "nurse")
    assert.deepEqual(request.ownerHistory, ["patient"])
    assert.deepEqual(request.payload, {
      kind: "chat",
      text: "I feel faint and dizzy",
      attachmentIds: [],
      vitalsId: null,
      dailyCheck: null,
    })
    assert.equal(request.transitions[0]?.action, "send_chat")
    assert.deepEqual(result.allowedActions, [])
    assert.deepEqual((await store.read("patients", "p1"))?.activeRequestIds, ["id-1"])

    const inbox = accepted(await workflow.dispatch({ type: "list_inbox", actor: nurse }))
    assert.deepEqual(inbox.inbox?.map((item) => item.id), ["id-1"])
    assert.equal(getAuditEntries({ event_type: "chat.answered" })[0]?.resource_id, "id-1")
  })

  it("answers through the configured generator and knowledge base", async () => {
    const retriever = new StubRetriever([scored("walking-guide", WALKING)])
    const generator = scriptedGenerator([reply({ answer: "Short walks are fine if you feel steady." })])
    const { workflow } = await harness({ generator, retriever })

    const result = accepted(await workflow.dispatch({ type: "send_chat", actor: patient, text: "Can I walk today?" }))

    assert.equal(result.chat?.generatedBy, "model")
    assert.equal(result.chat?.answer, "Short walks are fine if you feel steady.")
    assert.deepEqual(
      result.chat?.citations.map((citation) => citation.documentId),
      ["walking-guide"],
    )
    assert.equal(retriever.calls[0]?.charBudget, 2200)
  })
})
