import { z } from "zod"
import { PipelineStageError } from "@pipeline-errors"
import { IMAGE_MIME_TYPES } from "@pipeline-shared"
import type { WardAction } from "./types"

const id = z.string().trim().min(1)
const text = z.string().trim().min(1).max(8000)

const actor = <R extends "patient" | "nurse" | "doctor">(role: z.ZodType<R>) => z.object({ role, id })
const patientActor = actor(z.literal("patient"))
const nurseActor = actor(z.literal("nurse"))
const staffRole = z.enum(["nurse", "doctor"])
const staffActor = actor(staffRole)
const anyActor = actor(z.enum(["patient", "nurse", "doctor"]))

const bytes = z.union([
  z.instanceof(Buffer),
  z
    .string()
    .min(1)
    .transform((value) => Buffer.from(value, "base64")),
])

const attachmentSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("voice"),
    data: bytes,
    sampleRateHz: z.number().int().positive().default(16000),
    mimeType: z.literal("audio/wav").default("audio/wav"),
  }),
  z.object({
    kind: z.literal("image"),
    data: bytes,
    mimeType: z.enum(IMAGE_MIME_TYPES),
  }),
])

export const vitalsSchema = z
  .object({
    spo2Pct: z.number().min(0).max(100).optional(),
    temperatureC: z.number().min(25).max(45).optional(),
    heartRate: z.number().min(0).max(300).optional(),
    respRate: z.number().min(0).max(80).optional(),
    systolicBp: z.number().min(0).max(300).optional(),
    diastolicBp: z.number().min(0).max(200).optional(),
    painScore: z.number().int().min(0).max(10).optional(),
  })
  .refine((vitals) => Object.values(vitals).some((value) => value !== undefined), {
    message: "at least one vital sign is required",
  })

export const dailyCheckSchema = z.object({
  diet: z.string().trim().max(200).optional(),
  waterMl: z.number().min(0).max(10_000).optional(),
  sleepHours: z.number().min(0).max(24).optional(),
  symptoms: z.array(z.string().trim().min(1)).default([]),
})

const planItems = z.array(z.string().trim().min(1).max(300)).max(10)

const forwardedPayloadSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("assessment"), assessmentId: id }),
  z.object({ kind: z.literal("handover"), handoverId: id }),
])

export const wardActionSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("submit_daily_check"),
    actor: patientActor,
    dailyCheck: dailyCheckSchema,
    text: text.optional(),
    attachments: z.array(attachmentSchema).optional(),
  }),
  z.object({ type: z.literal("send_chat"), actor: patientActor, text }),
  z.object({
    type: z.literal("open_request"),
    actor: nurseActor,
    patientId: id,
    kind: z.enum(["daily_check", "chat", "voice", "image", "vitals"]),
    text: text.optional(),
    attachments: z.array(attachmentSchema).optional(),
    vitalsId: id.optional(),
    targetRole: staffRole.optional(),
  }),
  z.object({
    type: z.literal("record_vitals"),
    actor: nurseActor,
    patientId: id,
    vitals: vitalsSchema,
    notes: text.optional(),
  }),
  z.object({ type: z.literal("triage"), actor: nurseActor, requestId: id, note: text.optional() }),
  z.object({ type: z.literal("start"), actor: staffActor, requestId: id }),
  z.object({ type: z.literal("generate_assessment"), actor: staffActor, requestId: id }),
  z.object({
    type: z.literal("generate_handover"),
    actor: staffActor,
    requestId: id,
    annotation: text.optional(),
  }),
  z.object({
    type: z.literal("generate_care_plan"),
    actor: staffActor,
    requestId: id,
    level: z.enum(["nursing", "medical"]).default("nursing"),
  }),
  z.object({
    type: z.literal("update_care_plan"),
    actor: staffActor,
    requestId: id,
    title: z.string().trim().min(1).max(120),
    oneLiner: z.string().trim().max(300).optional(),
    bullets: planItems.optional(),
    redFlags: planItems.optional(),
    followUp: planItems.optional(),
  }),
  z.object({ type: z.literal("publish_care_plan"), actor: staffActor, requestId: id, note: text.optional() }),
  z.object({ type: z.literal("hold_care_plan"), actor: staffActor, requestId: id, reason: text }),
  z.object({
    type: z.literal("forward"),
    actor: staffActor,
    requestId: id,
    targetRole: staffRole,
    payload: forwardedPayloadSchema,
    note: text.optional(),
  }),
  z.object({ type: z.literal("return"), actor: staffActor, requestId: id, note: text.optional() }),
  z.object({ type: z.literal("clarify"), actor: patientActor, requestId: id, text }),
  z.object({ type: z.literal("resume"), actor: staffActor, requestId: id }),
  z.object({ type: z.literal("resolve"), actor: staffActor, requestId: id, note: text }),
  z.object({
    type: z.literal("acknowledge"),
    actor: actor(z.enum(["patient", "nurse"])),
    requestId: id,
  }),
  z.object({ type: z.literal("acknowledge_override"), actor: staffActor, requestId: id, reason: text }),
  z.object({ type: z.literal("archive"), actor: staffActor, requestId: id, reason: text }),
  z.object({ type: z.literal("list_inbox"), actor: anyActor }),
  z.object({ type: z.literal("view_request"), actor: anyActor, requestId: id }),
])

export function parseWardAction(raw: unknown): WardAction {
  const result = wardActionSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "action"}: ${issue.message}`)
    throw new PipelineStageError("validation_error", `Invalid ward action: ${issues.join("; ")}`, false, { issues })
  }
  const action: WardAction = result.data
  return action
}
