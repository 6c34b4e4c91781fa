import { z } from "zod"
import type { RiskLevel } from "@storage"

const stringList = z
  .array(z.string())
  .default([])
  .transform((items) => items.map((item) => item.trim()).filter((item) => item.length > 0))

const riskLevel = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(["low", "medium", "high"]))
  .transform((value): RiskLevel => (value === "low" ? "Low" : value === "medium" ? "Medium" : "High"))

export const draftOutputSchema = z.object({
  impression: z.string().trim().min(1),
  risk_level: riskLevel,
  recommended_actions: stringList,
  red_flags: stringList,
  // some backends answer on a 0-1 scale
  confidence_score: z
    .number()
    .min(0)
    .transform((value) => Math.min(100, value <= 1 ? Math.round(value * 100) : Math.round(value))),
})

export const auditOutputSchema = z.object({
  verdict: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(["pass", "flagged"])),
  reasons: stringList,
  unsupported_claims: stringList,
})

export const differentialOutputSchema = z.object({
  alternatives: z
    .array(
      z.object({
        diagnosis: z.string().trim().min(1),
        plausibility: z.number().min(0).max(1),
        supporting: stringList,
        against: stringList,
      }),
    )
    .max(10),
})

export type DraftOutput = z.infer<typeof draftOutputSchema>
export type AuditOutput = z.infer<typeof auditOutputSchema>
export type DifferentialOutput = z.infer<typeof differentialOutputSchema>
