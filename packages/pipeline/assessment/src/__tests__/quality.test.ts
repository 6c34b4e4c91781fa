import assert from "node:assert/strict"
import test from "node:test"
import type { ImageFindings } from "@pipeline-shared"
import { assessAudioQuality, assessImageQuality, pickPrimaryBasis, routeTagFor } from "../quality.js"
import { runSafetyChecks } from "../safety.js"

function findings(overrides: Partial<ImageFindings> = {}): ImageFindings {
  return {
    primaryFinding: "cellulitis",
    confidence: 0.5,
    interpretable: true,
    evidenceStrength: "medium",
    candidates: [],
    issues: [],
    description: "",
    ...overrides,
  }
}

test("audio quality penalizes empty, short and repetitive transcripts", () => {
  assert.deepEqual(assessAudioQuality("  "), { score: 0, issues: ["empty_transcript"] })
  assert.deepEqual(assessAudioQuality("cough worse"), { score: 0.65, issues: ["very_short_transcript"] })
  assert.deepEqual(assessAudioQuality("help help help help help help help help"), { score: 0.65, issues: ["repetition_high"] })
  assert.deepEqual(assessAudioQuality("epsilon epsilon epsilon hello"), { score: 0.2, issues: ["placeholder_noise_high", "very_short_transcript"] })
})

test("image quality follows interpretability and evidence strength", () => {
  assert.deepEqual(assessImageQuality(findings()), { score: 0.65, issues: [] })
  assert.deepEqual(assessImageQuality(findings({ interpretable: false, evidenceStrength: "low" })), {
    score: 0.05,
    issues: ["image_not_interpretable"],
  })
  assert.deepEqual(assessImageQuality(null), { score: 0, issues: ["no_image_findings"] })
})

test("primary basis falls back to evidence when a lone modality is poor", () => {
  assert.equal(pickPrimaryBasis({ audioQuality: 0.7, imageQuality: 0.7, evidenceUsed: false }), "mixed")
  assert.equal(pickPrimaryBasis({ audioQuality: 0.4, imageQuality: 0.7, evidenceUsed: false }), "image")
  assert.equal(pickPrimaryBasis({ audioQuality: 0.3, imageQuality: null, evidenceUsed: true }), "rag")
  assert.equal(pickPrimaryBasis({ audioQuality: null, imageQuality: null, evidenceUsed: false }), "clinical")
  assert.equal(routeTagFor(true, false), "audio_only")
})

test("safety checks flag vitals and dosing with no source", () => {
  const draft = {
    impression: "Sepsis with SpO2 88%.",
    riskLevel: "High" as const,
    recommendedActions: ["Give 500 mg amoxicillin."],
    redFlags: [],
    confidenceScore: 60,
    placeholder: false,
  }
  assert.deepEqual(runSafetyChecks({ sourceText: "Feels unwell.", draft }), [
    "Vitals mentioned in draft but not found in narrative or evidence.",
    "Medication dosing appears in draft but not found in narrative or evidence.",
  ])
  assert.deepEqual(runSafetyChecks({ sourceText: "SpO2 88, amoxicillin 500 mg tds", draft }), [])
})
