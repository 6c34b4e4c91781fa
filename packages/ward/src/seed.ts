import { readFile } from "node:fs/promises"
import { z } from "zod"
import { PipelineStageError } from "@pipeline-errors"
import type { Patient, StaffMember, WardStore } from "@storage"

const patientSeedSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  wardId: z.string().trim().min(1),
  bedId: z.string().trim().min(1).nullable().default(null),
  age: z.number().int().min(0).max(130).nullable().default(null),
  sex: z.string().trim().min(1).nullable().default(null),
  chiefComplaint: z.string().default(""),
  history: z.string().default(""),
  admittedAt: z.string().datetime().optional(),
})

const staffSeedSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  role: z.enum(["nurse", "doctor"]),
  wardId: z.string().trim().min(1),
})

export const wardSeedSchema = z
  .object({
    patients: z.array(patientSeedSchema).default([]),
    staff: z.array(staffSeedSchema).default([]),
  })
  .superRefine((seed, ctx) => {
    const seen = new Set<string>()
    for (const [index, patient] of seed.patients.entries()) {
      if (seen.has(patient.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["patients", index, "id"], message: `duplicate id ${patient.id}` })
      }
      seen.add(patient.id)
    }
    seen.clear()
    for (const [index, member] of seed.staff.entries()) {
      if (seen.has(member.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["staff", index, "id"], message: `duplicate id ${member.id}` })
      }
      seen.add(member.id)
    }
  })

export type WardSeed = z.input<typeof wardSeedSchema>

export interface SeedReport {
  patients: number
  staff: number
}

export function parseWardSeed(raw: unknown): z.output<typeof wardSeedSchema> {
  const result = wardSeedSchema.safeParse(raw)
  if (!result.success) {
    const first = result.error.issues[0]
    throw new PipelineStageError(
      "configuration_error",
      `Invalid ward seed: ${first ? `${first.path.join(".")}: ${first.message}` : "unknown issue"}`,
      false,
      { issues: result.error.issues.length },
    )
  }
  return result.data
}

export async function loadWardSeedFile(path: string): Promise<z.output<typeof wardSeedSchema>> {
  let raw: string
  try {
    raw = await readFile(path, "utf8")
  } catch (error) {
    throw new PipelineStageError(
      "configuration_error",
      `Cannot read ward seed ${path}: ${error instanceof Error ? error.message : String(error)}`,
      false,
      { path },
    )
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new PipelineStageError(
      "configuration_error",
      `Ward seed ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      false,
      { path },
    )
  }
  return parseWardSeed(parsed)
}

/** Creates the seeded patients and staff in one transaction. Existing ids are a conflict. */
export async function seedWard(store: WardStore, seed: WardSeed, now: Date = new Date()): Promise<SeedReport> {
  const parsed = parseWardSeed(seed)
  await store.transaction(async (tx) => {
    for (const entry of parsed.patients) {
      const patient: Patient = {
        id: entry.id,
        name: entry.name,
        wardId: entry.wardId,
        bedId: entry.bedId,
        age: entry.age,
        sex: entry.sex,
        chiefComplaint: entry.chiefComplaint,
        history: entry.history,
        admittedAt: entry.admittedAt ?? now.toISOString(),
        activeRequestIds: [],
        version: 1,
      }
      await tx.create("patients", patient)
    }
    for (const entry of parsed.staff) {
      const member: StaffMember = { id: entry.id, name: entry.name, role: entry.role, wardId: entry.wardId }
      await tx.create("staff", member)
    }
  })
  return { patients: parsed.patients.length, staff: parsed.staff.length }
}
