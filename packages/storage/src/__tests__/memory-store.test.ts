import assert from "node:assert/strict"
import test from "node:test"
import { isPipelineError } from "@pipeline-errors"
import { MemoryWardStore } from "../memory-store.js"
import type { StagedWrites } from "../memory-store.js"
import { PatientLocks } from "../patient-lock.js"
import type { Patient } from "../types.js"

function patient(overrides: Partial<Patient> = {}): Patient {
  return {
    id: "p-1",
    name: "Test Patient",
    wardId: "ward-a",
    bedId: "12",
    age: 64,
    sex: "F",
    chiefComplaint: "shortness of breath",
    history: "COPD",
    admittedAt: "2026-01-01T08:00:00.000Z",
    activeRequestIds: [],
    version: 1,
    ...overrides,
  }
}

test("committed rows are readable and deep-frozen", async () => {
  const store = new MemoryWardStore()
  await store.transaction(async (tx) => {
    await tx.create("patients", patient())
  })

  const stored = await store.read("patients", "p-1")
  assert.ok(stored)
  assert.equal(stored.chiefComplaint, "shortness of breath")
  assert.equal(Object.isFrozen(stored), true)
  assert.equal(Object.isFrozen(stored.activeRequestIds), true)
})

test("a throwing transaction applies nothing", async () => {
  const store = new MemoryWardStore()
  await assert.rejects(
    store.transaction(async (tx) => {
      await tx.create("patients", patient())
      throw new Error("boom")
    }),
    /boom/,
  )
  assert.equal(await store.read("patients", "p-1"), null)
})

test("update bumps the version and rejects a stale expected version", async () => {
  const store = new MemoryWardStore()
  await store.transaction(async (tx) => tx.create("patients", patient()))

  await store.transaction(async (tx) => tx.update("patients", patient({ history: "COPD, HTN" }), 1))
  const updated = await store.read("patients", "p-1")
  assert.equal(updated?.version, 2)
  assert.equal(updated?.history, "COPD, HTN")

  await assert.rejects(
    store.transaction(async (tx) => tx.update("patients", patient({ history: "stale" }), 1)),
    (error: unknown) => isPipelineError(error) && error.code === "persistence_conflict",
  )
  assert.equal((await store.read("patients", "p-1"))?.history, "COPD, HTN")
})

test("commit re-validates versions when transactions interleave", async () => {
  const store = new MemoryWardStore()
  await store.transaction(async (tx) => tx.create("patients", patient()))

  let releaseFirst: () => void = () => undefined
  const firstGate = new Promise<void>((resolve) => {
    releaseFirst = resolve
  })

  const first = store.transaction(async (tx) => {
    await tx.update("patients", patient({ history: "first" }), 1)
    await firstGate
  })
  const second = store.transaction(async (tx) => {
    await tx.update("patients", patient({ history: "second" }), 1)
  })

  await second
  releaseFirst()
  await assert.rejects(first, (error: unknown) => isPipelineError(error) && error.code === "persistence_conflict")
  assert.equal((await store.read("patients", "p-1"))?.history, "second")
})

test("a failing commit leaves no partial state", async () => {
  class FailingStore extends MemoryWardStore {
    protected override async commit(_staged: StagedWrites): Promise<void> {
      throw new Error("disk full")
    }
  }
  const store = new FailingStore()
  await assert.rejects(
    store.transaction(async (tx) => {
      await tx.create("patients", patient())
      await tx.create("staff", { id: "n-1", name: "Nurse One", role: "nurse", wardId: "ward-a" })
    }),
    /disk full/,
  )
  assert.equal(await store.read("patients", "p-1"), null)
  assert.equal(await store.read("staff", "n-1"), null)
})

test("transactions read their own staged writes", async () => {
  const store = new MemoryWardStore()
  const seen = await store.transaction(async (tx) => {
    await tx.create("patients", patient())
    const rows = await tx.list("patients")
    return rows.map((row) => row.id)
  })
  assert.deepEqual(seen, ["p-1"])
})

test("creating an existing id is a conflict", async () => {
  const store = new MemoryWardStore()
  await store.transaction(async (tx) => tx.create("patients", patient()))
  await assert.rejects(
    store.transaction(async (tx) => tx.create("patients", patient())),
    (error: unknown) => isPipelineError(error) && error.code === "persistence_conflict",
  )
})

test("patient locks run same-key work in arrival order", async () => {
  const locks = new PatientLocks()
  const order: string[] = []
  const slow = locks.run("p-1", async () => {
    await new Promise((resolve) => setTimeout(resolve, 20))
    order.push("first")
  })
  const fast = locks.run("p-1", async () => {
    order.push("second")
  })
  const other = locks.run("p-2", async () => {
    order.push("other")
  })
  await Promise.all([slow, fast, other])
  assert.deepEqual(order, ["other", "first", "second"])
  assert.equal(locks.isLocked("p-1"), false)
})
