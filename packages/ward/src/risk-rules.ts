import type { DailyCheck, Gap, GapSeverity, RiskFlag, RiskLevel, RiskLight, RiskSnapshot, Vitals } from "@storage"

export const RISK_RULES_VERSION = "r1.0"
export const MAX_NEXT_ACTIONS = 6

const SEVERITY_WEIGHT: Record<GapSeverity, number> = { high: 35, medium: 15, low: 5 }

const MENTAL_STATUS_TERMS = ["confusion", "confused", "drowsy", "altered"]
const SEVERE_RESP_TERMS = ["hemoptysis", "haemoptysis", "coughing blood", "severe shortness of breath"]
const WARNING_RESP_TERMS = ["chest pain", "shortness of breath", "breathless"]
const LOW_DIET_TERMS = ["very little", "low", "none", "nothing", "poor"]
const MISSING_VITAL_GAPS = ["missing_spo2", "missing_temp", "missing_rr", "missing_hr"]

export interface RiskInputs {
  vitals: Vitals | null
  /** Free text scanned for symptom keywords: reported symptoms, notes, the request text. */
  symptoms: string[]
  dailyCheck?: DailyCheck | null
  assessmentRisk: RiskLevel | null
  gaps: readonly Gap[]
}

function mentions(text: string, terms: readonly string[]): boolean {
  return terms.some((term) => text.includes(term))
}

/**
 * Deterministic ward risk light. Every matched rule adds a flag; the light is red when any flag
 * is high, yellow when any is medium, green otherwise.
 */
export function computeRiskSnapshot({ vitals, symptoms, dailyCheck, assessmentRisk, gaps }: RiskInputs): RiskSnapshot {
  const flags: RiskFlag[] = []
  const flag = (id: string, severity: GapSeverity, message: string, recommendation: string) => {
    flags.push({ id, severity, message, recommendation })
  }

  const spo2 = vitals?.spo2Pct
  const temp = vitals?.temperatureC
  const rr = vitals?.respRate
  const hr = vitals?.heartRate
  const sbp = vitals?.systolicBp

  if (spo2 !== undefined && spo2 < 90) {
    flag("low_spo2", "high", `SpO2 ${spo2.toFixed(0)}% (<90)`, "Notify doctor immediately")
  }

  if (temp !== undefined && temp >= 39) {
    flag("high_temp", "high", `Temperature ${temp.toFixed(1)}°C (>=39.0)`, "Monitor closely and notify doctor if persistent")
  } else if (temp !== undefined && temp >= 38 && hr !== undefined && hr > 110) {
    flag(
      "fever_with_tachycardia",
      "medium",
      `Temperature ${temp.toFixed(1)}°C with HR ${hr.toFixed(0)}`,
      "Recheck vitals and consider escalation",
    )
  }

  if (rr !== undefined && rr >= 30) {
    flag("high_rr", "high", `RR ${rr.toFixed(0)} (>=30)`, "Notify doctor immediately")
  }

  if (sbp !== undefined && sbp < 90) {
    flag("low_sbp", "high", `SBP ${sbp.toFixed(0)} (<90)`, "Urgent review needed")
  }

  if (hr !== undefined && hr >= 130) {
    flag("high_hr", "high", `HR ${hr.toFixed(0)} (>=130)`, "Urgent review needed")
  } else if (hr !== undefined && hr >= 110) {
    flag("moderate_hr", "medium", `HR ${hr.toFixed(0)} (110-129)`, "Recheck and monitor")
  }

  const symptomText = [...symptoms, ...(dailyCheck?.symptoms ?? [])].join(" ").toLowerCase()
  if (mentions(symptomText, MENTAL_STATUS_TERMS)) {
    flag("mental_status_change", "high", "Possible altered mental status", "Notify doctor immediately")
  }

  if (dailyCheck) {
    const lowDiet = mentions((dailyCheck.diet ?? "").toLowerCase(), LOW_DIET_TERMS)
    const lowWater = dailyCheck.waterMl !== undefined && dailyCheck.waterMl < 600
    const shortSleep = dailyCheck.sleepHours !== undefined && dailyCheck.sleepHours < 4
    if (lowDiet && lowWater && shortSleep) {
      flag(
        "low_intake_dehydration",
        "medium",
        "Low intake + low water + short sleep",
        "Encourage fluids and rest; monitor closely",
      )
    }
  }

  if (mentions(symptomText, SEVERE_RESP_TERMS)) {
    flag("severe_resp_symptom", "high", "Severe respiratory symptom reported", "Escalate to doctor immediately")
  } else if (mentions(symptomText, WARNING_RESP_TERMS)) {
    flag("resp_symptom_warning", "medium", "Respiratory warning symptom reported", "Monitor and consider escalation")
  }

  const gapIds = new Set(gaps.map((gap) => gap.id))
  if (MISSING_VITAL_GAPS.some((id) => gapIds.has(id))) {
    flag("missing_vitals", "medium", "Missing vital signs data", "Measure vital signs")
  }
  if (gapIds.has("audio_quality_low")) {
    flag("low_audio_quality", "low", "Audio quality is low", "Use text input or re-record")
  }

  if (assessmentRisk === "High") {
    flag("assessment_high_risk", "medium", "Assessment risk_level=High", "Prioritize monitoring")
  }

  let riskLevel: RiskLight = "green"
  if (flags.some((item) => item.severity === "high")) {
    riskLevel = "red"
  } else if (flags.some((item) => item.severity === "medium")) {
    riskLevel = "yellow"
  }

  const score = flags.reduce((sum, item) => sum + SEVERITY_WEIGHT[item.severity], 0)
  const nextActions = [...new Set(flags.map((item) => item.recommendation).filter((text) => text.length > 0))]

  return {
    riskLevel,
    riskScore: Math.max(0, Math.min(100, score)),
    flags,
    nextActions: nextActions.slice(0, MAX_NEXT_ACTIONS),
    rulesVersion: RISK_RULES_VERSION,
  }
}
