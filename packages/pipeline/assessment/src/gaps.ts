import type { Gap, GapSeverity, Vitals } from "@storage"

/** Collects gaps in insertion order, keeping the first entry for each id. */
export class GapCollector {
  private readonly gaps: Gap[] = []
  private readonly ids = new Set<string>()

  add(id: string, severity: GapSeverity, message: string, suggestedFields: string[] = []): void {
    if (this.ids.has(id)) return
    this.ids.add(id)
    this.gaps.push({ id, severity, message, suggestedFields })
  }

  has(id: string): boolean {
    return this.ids.has(id)
  }

  list(): Gap[] {
    return [...this.gaps]
  }
}

interface VitalRule {
  id: string
  severity: GapSeverity
  message: string
  field: string
  key: keyof Vitals
  pattern: RegExp
}

export const VITAL_GAP_RULES: readonly VitalRule[] = [
  {
    id: "missing_spo2",
    severity: "high",
    message: "No oxygen saturation (SpO2) recorded. Measure or add it.",
    field: "spo2",
    key: "spo2Pct",
    pattern: /\bspo2\b|o2\s*sat|oxygen saturation|\bsats\b/i,
  },
  {
    id: "missing_temp",
    severity: "high",
    message: "No temperature recorded. Measure or add it.",
    field: "temperature",
    key: "temperatureC",
    pattern: /\btemp\b|temperature|°c/i,
  },
  {
    id: "missing_rr",
    severity: "medium",
    message: "No respiratory rate recorded.",
    field: "resp_rate",
    key: "respRate",
    pattern: /\brr\b|respiratory rate|resp rate/i,
  },
  {
    id: "missing_hr",
    severity: "medium",
    message: "No heart rate recorded.",
    field: "heart_rate",
    key: "heartRate",
    pattern: /\bhr\b|heart rate|\bpulse\b/i,
  },
]

/** A vital is missing when neither the text mentions it nor the latest vitals record holds it. */
export function addVitalGaps(collector: GapCollector, text: string, vitals: Vitals | null): void {
  for (const rule of VITAL_GAP_RULES) {
    if (vitals?.[rule.key] !== undefined) continue
    if (rule.pattern.test(text)) continue
    collector.add(rule.id, rule.severity, rule.message, [rule.field])
  }
}

export const MIN_CHIEF_COMPLAINT_CHARS = 10
