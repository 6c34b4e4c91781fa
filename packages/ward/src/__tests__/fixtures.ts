import type { AssessmentInput, EvidenceSearch, RunOptions } from "@assessment"
import { cancelledError } from "@pipeline-errors"
import type { GenerationRequest, TextGenerator } from "@pipeline-shared"
import { MemoryWardStore } from "@storage"
import type { Assessment, ConfidenceIndicator, StagedWrites } from "@storage"
import type { WardConfig } from "@ward-config"
import { seedWard } from "../seed.js"
import type { WardSeed } from "../seed.js"
import { WardWorkflow } from "../workflow.js"
import type { AssessmentRunner } from "../workflow.js"

export const START = new Date("2026-03-02T08:00:00.000Z")
export const ACK_TIMEOUT_MS = 60 * 60 * 1000

export const SEED: WardSeed = {
  patients: [
    {
      id: "p1",
      name: "Test Patient",
      wardId: "ward-a",
      bedId: "A-01",
      age: 71,
      sex: "F",
      chiefComplaint: "productive cough and fever",
      history: "COPD",
    },
    { id: "p2", name: "Other Patient", wardId: "ward-a", bedId: "A-02", age: 54, sex: "M" },
  ],
  staff: [
    { id: "n1", name: "Nurse One", role: "nurse", wardId: "ward-a" },
    { id: "d1", name: "Doctor One", role: "doctor", wardId: "ward-a" },
    { id: "n2", name: "Nurse Two", role: "nurse", wardId: "ward-b" },
  ],
}

export function testConfig(
  overrides: Partial<WardConfig["policy"]> = {},
  useModel = false,
): Pick<WardConfig, "generation" | "handover" | "policy" | "adapters" | "retrieval"> {
  return {
    generation: { maxOutputTokens: 384, retryMaxOutputTokens: 192, maxInputTokens: 3072 },
    retrieval: { evidenceCharBudget: 2200, topK: 6 },
    handover: { useModel, windowHours: 24 },
    policy: { lowConfidenceReview: "doctor_required", acknowledgementTimeoutMs: ACK_TIMEOUT_MS, ...overrides },
    adapters: { timeoutMs: 1000 },
  }
}

export class TestClock {
  private current = START.getTime()

  readonly now = (): Date => new Date(this.current)

  advance(ms: number): void {
    this.current += ms
  }
}

export function sequentialIds(): () => string {
  let next = 0
  return () => {
    next += 1
    return `id-${next}`
  }
}

export type ScriptedGenerator = TextGenerator & { requests: GenerationRequest[] }

/** Replies in order and repeats the last reply once the script runs out. */
export function scriptedGenerator(replies: Array<string | Error>): ScriptedGenerator {
  const requests: GenerationRequest[] = []
  return {
    name: "scripted",
    requests,
    async generate(request) {
      requests.push(request)
      const reply = replies[Math.min(requests.length, replies.length) - 1]
      if (reply instanceof Error) throw reply
      return reply ?? ""
    },
  }
}

/** Stands in for the orchestrator; returns a canned assessment for each call. */
export class FakeRunner implements AssessmentRunner {
  readonly calls: AssessmentInput[] = []
  confidence: Partial<ConfidenceIndicator> = {}
  gate: Promise<void> | null = null
  private count = 0

  async runAssessment(input: AssessmentInput, options: RunOptions = {}): Promise<Assessment> {
    this.calls.push(input)
    if (this.gate) await this.gate
    if (options.signal?.aborted) throw cancelledError("draft")
    this.count += 1
    return {
      id: `assessment-${this.count}`,
      requestId: input.requestId,
      patientId: input.patient.id,
      supersedes: input.supersedes,
      createdAt: START.toISOString(),
      narrative: `[TYPED]\n${input.typedText ?? ""}`,
      routeTag: "none",
      primaryBasis: "clinical",
      evidence: [],
      draft: {
        impression: "Community-acquired pneumonia",
        riskLevel: "Medium",
        recommendedActions: ["Obtain chest X-ray"],
        redFlags: [],
        confidenceScore: 70,
        placeholder: false,
      },
      audit: { verdict: "pass", reasons: [], unsupportedClaims: [], placeholder: false },
      differential: { items: [], placeholder: false },
      confidence: {
        lowConfidence: false,
        noEvidence: false,
        requiresManualReview: false,
        degradedStages: [],
        reasons: [],
        ...this.confidence,
      },
      trace: [],
      gaps: [],
      finalized: true,
    }
  }
}

/** Store whose next commit can be made to fail. */
export class FailingStore extends MemoryWardStore {
  failNextCommit = false

  protected override async commit(staged: StagedWrites): Promise<void> {
    if (this.failNextCommit) {
      this.failNextCommit = false
      throw new Error("disk unavailable")
    }
    await super.commit(staged)
  }
}

/** Store that holds lock requests until `count` callers are waiting, then lets them all in. */
export class GatedStore extends MemoryWardStore {
  private expected = 0
  private waiting = 0
  private open: () => void = () => undefined
  private gate: Promise<void> = Promise.resolve()

  holdLocks(count: number): void {
    this.expected = count
    this.waiting = 0
    this.gate = new Promise<void>((resolve) => {
      this.open = resolve
    })
  }

  override async withPatientLock<R>(patientId: string, fn: () => Promise<R>): Promise<R> {
    if (this.expected > 0) {
      this.waiting += 1
      const gate = this.gate
      if (this.waiting >= this.expected) {
        this.expected = 0
        this.open()
      }
      await gate
    }
    return super.withPatientLock(patientId, fn)
  }
}

export interface Harness {
  workflow: WardWorkflow
  store: MemoryWardStore
  runner: FakeRunner
  clock: TestClock
}

export interface HarnessOptions {
  store?: MemoryWardStore
  policy?: Partial<WardConfig["policy"]>
  generator?: TextGenerator
  retriever?: EvidenceSearch
  useModel?: boolean
}

export async function harness(options: HarnessOptions = {}): Promise<Harness> {
  const store = options.store ?? new MemoryWardStore()
  await seedWard(store, SEED, START)
  const runner = new FakeRunner()
  const clock = new TestClock()
  const workflow = new WardWorkflow(
    {
      store,
      orchestrator: runner,
      generator: options.generator,
      retriever: options.retriever,
      config: testConfig(options.policy, options.useModel),
    },
    { now: clock.now, newId: sequentialIds() },
  )
  return { workflow, store, runner, clock }
}

export const patient = { role: "patient", id: "p1" } as const
export const nurse = { role: "nurse", id: "n1" } as const
export const doctor = { role: "doctor", id: "d1" } as const

export const DAILY_CHECK = {
  type: "submit_daily_check",
  actor: patient,
  text: "Coughing more today",
  dailyCheck: { diet: "low", waterMl: 500, sleepHours: 3, symptoms: ["cough"] },
} as const
