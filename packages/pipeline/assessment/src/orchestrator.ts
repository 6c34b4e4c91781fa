import { randomUUID } from "node:crypto"
import { prompts } from "@llm"
import { PipelineStageError, cancelledError, isPipelineError, toPipelineError } from "@pipeline-errors"
import type { PipelineError, PipelineErrorCode } from "@pipeline-errors"
import { callWithTimeout, parseModelJson, throwIfCancelled } from "@pipeline-shared"
import type { ImageFindings } from "@pipeline-shared"
import type { ScoredChunk } from "@retrieval"
import { writeAuditEntry } from "@storage/audit-log"
import { debugLog, debugWarn } from "@storage/debug-logger"
import { deepFreeze } from "@storage/freeze"
import type {
  Assessment,
  AuditVerdict,
  ConfidenceIndicator,
  Differential,
  DraftAssessment,
  EvidenceCitation,
  StageName,
  StageTrace,
} from "@storage"
import { narrativeSources, verifyDraft } from "@verification"
import { GapCollector, MIN_CHIEF_COMPLAINT_CHARS, addVitalGaps } from "./gaps"
import { runGenerationStage } from "./generation"
import { buildNarrative } from "./narrative"
import {
  LOW_QUALITY_THRESHOLD,
  assessAudioQuality,
  assessImageQuality,
  buildFusionSummary,
  pickPrimaryBasis,
  routeTagFor,
} from "./quality"
import { draftText, runSafetyChecks } from "./safety"
import { auditOutputSchema, differentialOutputSchema, draftOutputSchema } from "./schema"
import type { AuditOutput, DifferentialOutput, DraftOutput } from "./schema"
import { PLACEHOLDER_TEXT } from "./types"
import type {
  AssessmentInput,
  OrchestratorDependencies,
  OrchestratorSettings,
  PromptInputEvidence,
  RunOptions,
  StageOutcome,
} from "./types"

const MAX_MODALITY_ATTEMPTS = 2

type ModalityOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: PipelineError; attempts: number }

export interface OrchestratorOptions {
  newId?: () => string
}

function elapsed(started: number): number {
  return Math.round(performance.now() - started)
}

function placeholderDraft(): DraftAssessment {
  return {
    impression: PLACEHOLDER_TEXT,
    riskLevel: null,
    recommendedActions: [],
    redFlags: [],
    confidenceScore: null,
    placeholder: true,
  }
}

function toDraft(output: DraftOutput): DraftAssessment {
  return {
    impression: output.impression,
    riskLevel: output.risk_level,
    recommendedActions: output.recommended_actions,
    redFlags: output.red_flags,
    confidenceScore: output.confidence_score,
    placeholder: false,
  }
}

export function toCitation(item: ScoredChunk): EvidenceCitation {
  return {
    chunkId: item.chunk.id,
    documentId: item.chunk.documentId,
    category: item.chunk.category,
    offset: item.chunk.offset,
    score: item.score,
    text: item.chunk.text,
  }
}

function generationTrace<T>(stage: StageName, outcome: StageOutcome<T>, latencyMs: number, summary: string): StageTrace {
  if (outcome.status === "skipped") {
    return { stage, status: "skipped", latencyMs, summary: outcome.reason, attempts: 0, error: null }
  }
  if (outcome.status === "placeholder") {
    return {
      stage,
      status: "placeholder",
      latencyMs,
      summary: PLACEHOLDER_TEXT,
      attempts: outcome.attempts.length,
      error: `${outcome.error.code}: ${outcome.error.message}`,
    }
  }
  return { stage, status: "ok", latencyMs, summary, attempts: outcome.attempts.length, error: null }
}

/**
 * Runs the six assessment stages for one request: modality normalization, evidence retrieval,
 * draft, self-audit, reverse differential and finalization. Degraded stages never abort the
 * run; they surface in the confidence indicator, the trace and the gap list instead.
 */
export class AssessmentOrchestrator {
  private readonly newId: () => string

  constructor(
    private readonly deps: OrchestratorDependencies,
    private readonly settings: OrchestratorSettings,
    options: OrchestratorOptions = {},
  ) {
    this.newId = options.newId ?? randomUUID
  }

  async runAssessment(input: AssessmentInput, options: RunOptions = {}): Promise<Assessment> {
    try {
      const assessment = await this.execute(input, options)
      await writeAuditEntry({
        event_type: "assessment.completed",
        resource_id: assessment.id,
        success: true,
        metadata: {
          requestId: input.requestId,
          lowConfidence: assessment.confidence.lowConfidence,
          requiresManualReview: assessment.confidence.requiresManualReview,
          evidenceCount: assessment.evidence.length,
        },
      })
      return assessment
    } catch (error) {
      const cancelled = isPipelineError(error) && error.code === "cancelled"
      await writeAuditEntry({
        event_type: cancelled ? "assessment.cancelled" : "assessment.failed",
        resource_id: input.requestId,
        success: false,
        error_message: error instanceof Error ? error.message : String(error),
      })
      throw error
    }
  }

  private async execute(input: AssessmentInput, options: RunOptions): Promise<Assessment> {
    const { signal } = options
    const now = options.now ?? (() => new Date())
    const { generation, evidenceCharBudget, topK, adapterTimeoutMs } = this.settings
    const { patient } = input

    const trace: StageTrace[] = []
    const gaps = new GapCollector()
    const degraded = new Set<StageName>()
    const reasons: string[] = []
    const record = (entry: StageTrace) => {
      trace.push(entry)
      debugLog("assessment stage", { requestId: input.requestId, stage: entry.stage, status: entry.status, latencyMs: entry.latencyMs })
    }

    // 1. modality normalization
    let transcript: string | null = null
    let findings: ImageFindings | null = null

    throwIfCancelled(signal, "transcription")
    if (input.audio) {
      const audio = input.audio
      const started = performance.now()
      const outcome = await this.callModality(
        "transcription",
        "transcription_failed",
        (callSignal) => {
          if (!this.deps.transcriber) throw this.missingAdapter("speech-to-text")
          return this.deps.transcriber.transcribe(audio, callSignal)
        },
        signal,
      )
      if (outcome.ok) {
        transcript = outcome.value
        record({ stage: "transcription", status: "ok", latencyMs: elapsed(started), summary: `${outcome.value.trim().length} chars`, attempts: outcome.attempts, error: null })
      } else {
        degraded.add("transcription")
        reasons.push("Voice note could not be transcribed; it is excluded from the narrative.")
        gaps.add("transcription_unavailable", "medium", "Voice note could not be transcribed. Re-record or type the update.", ["audio"])
        record({ stage: "transcription", status: "failed", latencyMs: elapsed(started), summary: PLACEHOLDER_TEXT, attempts: outcome.attempts, error: `${outcome.error.code}: ${outcome.error.message}` })
      }
    } else {
      record({ stage: "transcription", status: "skipped", latencyMs: 0, summary: "no voice input", attempts: 0, error: null })
    }

    throwIfCancelled(signal, "vision")
    if (input.image) {
      const image = input.image
      const started = performance.now()
      const outcome = await this.callModality(
        "vision",
        "vision_failed",
        (callSignal) => {
          if (!this.deps.vision) throw this.missingAdapter("vision")
          return this.deps.vision.describe(image, callSignal)
        },
        signal,
      )
      if (outcome.ok) {
        findings = outcome.value
        record({ stage: "vision", status: "ok", latencyMs: elapsed(started), summary: outcome.value.primaryFinding, attempts: outcome.attempts, error: null })
      } else {
        degraded.add("vision")
        reasons.push("Image could not be analyzed; it is excluded from the narrative.")
        gaps.add("vision_unavailable", "medium", "Image could not be analyzed. Retake the photo or describe it in text.", ["image"])
        record({ stage: "vision", status: "failed", latencyMs: elapsed(started), summary: PLACEHOLDER_TEXT, attempts: outcome.attempts, error: `${outcome.error.code}: ${outcome.error.message}` })
      }
    } else {
      record({ stage: "vision", status: "skipped", latencyMs: 0, summary: "no image input", attempts: 0, error: null })
    }

    const audioQuality = input.audio ? assessAudioQuality(transcript ?? "") : null
    const imageQuality = input.image ? assessImageQuality(findings) : null
    if (audioQuality && transcript !== null && audioQuality.score < LOW_QUALITY_THRESHOLD) {
      reasons.push(`Audio quality is low (${audioQuality.score}).`)
      gaps.add("audio_quality_low", "medium", "Audio quality is poor. Re-record or switch to a typed update.", ["audio"])
    }
    if (imageQuality && findings !== null && imageQuality.score < LOW_QUALITY_THRESHOLD) {
      reasons.push(`Image quality is low (${imageQuality.score}).`)
      gaps.add("image_quality_low", "medium", "Image quality is poor. Retake it without blur or obstruction.", ["image"])
    }

    const narrative = buildNarrative({ typed: input.typedText, transcript, findings })

    // 2. evidence retrieval
    throwIfCancelled(signal, "retrieval")
    const retrievalStarted = performance.now()
    let evidence: ScoredChunk[] = []
    let retrievalError: PipelineError | null = null
    const query = [patient.chiefComplaint, narrative].join("\n").trim()
    try {
      evidence = await callWithTimeout(
        "retrieval",
        adapterTimeoutMs,
        (callSignal) => this.deps.retriever.query(query, topK, evidenceCharBudget, callSignal),
        signal,
      )
    } catch (error) {
      retrievalError = this.softFailure(error, "retrieval", "retrieval_unavailable", signal)
    }
    const noEvidence = evidence.length === 0
    if (retrievalError) {
      record({ stage: "retrieval", status: "failed", latencyMs: elapsed(retrievalStarted), summary: "evidence omitted", attempts: 1, error: `${retrievalError.code}: ${retrievalError.message}` })
    } else {
      record({ stage: "retrieval", status: "ok", latencyMs: elapsed(retrievalStarted), summary: `${evidence.length} chunks`, attempts: 1, error: null })
    }
    if (noEvidence) {
      degraded.add("retrieval")
      reasons.push(retrievalError ? "Knowledge base unavailable; no evidence was cited." : "No relevant evidence was found.")
      gaps.add("evidence_unavailable", "low", "No supporting evidence was retrieved for this assessment.")
    }

    const routeTag = routeTagFor(input.audio !== null, input.image !== null)
    const primaryBasis = pickPrimaryBasis({
      audioQuality: audioQuality?.score ?? null,
      imageQuality: imageQuality?.score ?? null,
      evidenceUsed: !noEvidence,
    })
    debugLog(
      "assessment fusion",
      buildFusionSummary({ routeTag, primaryBasis, evidenceUsed: !noEvidence, transcript, audioQuality, findings, imageQuality }),
    )

    const promptEvidence: PromptInputEvidence[] = evidence.map((item) => ({
      ref: item.chunk.id,
      category: item.chunk.category,
      text: item.chunk.text,
    }))
    const promptPatient = {
      age: patient.age,
      sex: patient.sex,
      chiefComplaint: patient.chiefComplaint,
      history: patient.history,
    }
    const modalities = {
      hasAudio: input.audio !== null,
      hasImage: input.image !== null,
      audioQuality: audioQuality?.score ?? 0,
      imageQuality: imageQuality?.score ?? 0,
      basisHint: primaryBasis,
    }
    const v1 = prompts.assessment.currentVersion

    // 3. draft
    throwIfCancelled(signal, "draft")
    const draftStarted = performance.now()
    const draftOutcome = await runGenerationStage<DraftOutput>({
      label: "draft",
      generator: this.deps.generator,
      budget: generation,
      timeoutMs: adapterTimeoutMs,
      input: { narrative, evidence: promptEvidence },
      signal,
      build: (promptInput, maxOutputTokens) => ({
        system: v1.getDraftSystemPrompt(),
        prompt: v1.getDraftUserPrompt({ ...promptInput, patient: promptPatient, modalities }),
        maxOutputTokens,
        jsonSchema: { name: "draft_assessment", schema: v1.DRAFT_SCHEMA },
      }),
      parse: (raw) => parseModelJson(raw, draftOutputSchema),
    })
    const draft = draftOutcome.status === "ok" ? toDraft(draftOutcome.value) : placeholderDraft()
    // evidence dropped to fit the draft prompt was never seen by the model
    const citedRefs = new Set(
      (draftOutcome.status === "ok" ? draftOutcome.input.evidence : promptEvidence).map((item) => item.ref),
    )
    const citedEvidence = evidence.filter((item) => citedRefs.has(item.chunk.id))
    const citedPromptEvidence = promptEvidence.filter((item) => citedRefs.has(item.ref))
    if (citedEvidence.length < evidence.length) {
      debugLog("draft evidence trimmed", { retrieved: evidence.length, cited: citedEvidence.length })
    }
    record(generationTrace("draft", draftOutcome, elapsed(draftStarted), `risk ${draft.riskLevel ?? "unknown"}`))

    // 4. self-audit
    throwIfCancelled(signal, "audit")
    const auditStarted = performance.now()
    const draftForPrompt = {
      impression: draft.impression,
      riskLevel: draft.riskLevel,
      recommendedActions: draft.recommendedActions,
      redFlags: draft.redFlags,
      confidenceScore: draft.confidenceScore,
    }
    const auditOutcome: StageOutcome<AuditOutput> = draft.placeholder
      ? { status: "skipped", reason: "draft unavailable" }
      : await runGenerationStage<AuditOutput>({
          label: "audit",
          generator: this.deps.generator,
          budget: generation,
          timeoutMs: adapterTimeoutMs,
          input: { narrative: "", evidence: citedPromptEvidence },
          signal,
          build: (promptInput, maxOutputTokens) => ({
            system: v1.getAuditSystemPrompt(),
            prompt: v1.getAuditUserPrompt({ draft: draftForPrompt, evidence: promptInput.evidence, patient: promptPatient, modalities }),
            maxOutputTokens,
            jsonSchema: { name: "self_audit", schema: v1.AUDIT_SCHEMA },
          }),
          parse: (raw) => parseModelJson(raw, auditOutputSchema),
        })
    const audit = this.mergeAudit(auditOutcome, draft, narrative, citedEvidence, [patient.chiefComplaint, patient.history])
    record(generationTrace("audit", auditOutcome, elapsed(auditStarted), `verdict ${audit.verdict}`))

    // 5. reverse differential
    throwIfCancelled(signal, "differential")
    const differentialStarted = performance.now()
    const differentialOutcome: StageOutcome<DifferentialOutput> = draft.placeholder
      ? { status: "skipped", reason: "draft unavailable" }
      : await runGenerationStage<DifferentialOutput>({
          label: "differential",
          generator: this.deps.generator,
          budget: generation,
          timeoutMs: adapterTimeoutMs,
          input: { narrative, evidence: [] },
          signal,
          build: (promptInput, maxOutputTokens) => ({
            system: v1.getDifferentialSystemPrompt(),
            prompt: v1.getDifferentialUserPrompt({ draft: draftForPrompt, narrative: promptInput.narrative, patient: promptPatient }),
            maxOutputTokens,
            jsonSchema: { name: "reverse_differential", schema: v1.DIFFERENTIAL_SCHEMA },
          }),
          parse: (raw) => parseModelJson(raw, differentialOutputSchema),
        })
    const differential: Differential =
      differentialOutcome.status === "ok"
        ? {
            // Array#sort is stable, so equal plausibility keeps the model's order
            items: [...differentialOutcome.value.alternatives].sort((a, b) => b.plausibility - a.plausibility),
            placeholder: false,
          }
        : { items: [], placeholder: true }
    record(generationTrace("differential", differentialOutcome, elapsed(differentialStarted), `${differential.items.length} alternatives`))

    // 6. finalization
    throwIfCancelled(signal, "finalize")
    const finalizeStarted = performance.now()
    const stageOutcomes = [
      ["draft", draftOutcome.status],
      ["audit", auditOutcome.status],
      ["differential", differentialOutcome.status],
    ] as const
    for (const [stage, status] of stageOutcomes) {
      if (status === "ok") continue
      degraded.add(stage)
      if (status === "placeholder") {
        reasons.push(`The ${stage} stage produced no usable model output.`)
        gaps.add(`${stage}_unavailable`, stage === "draft" ? "high" : "medium", `The ${stage} could not be generated. Review manually.`)
      }
    }
    const requiresManualReview = stageOutcomes.every(([, status]) => status !== "ok")
    if (requiresManualReview) reasons.push("No generation stage produced content; a clinician must review manually.")

    addVitalGaps(gaps, [narrative, patient.chiefComplaint, patient.history].join("\n"), input.latestVitals)
    if (patient.chiefComplaint.trim().length < MIN_CHIEF_COMPLAINT_CHARS) {
      gaps.add("chief_complaint_short", "low", "Chief complaint is missing or too brief.", ["chief_complaint"])
    }

    const confidence: ConfidenceIndicator = {
      lowConfidence: degraded.size > 0 || gaps.has("audio_quality_low") || gaps.has("image_quality_low"),
      noEvidence,
      requiresManualReview,
      degradedStages: [...degraded],
      reasons,
    }
    record({ stage: "finalize", status: "ok", latencyMs: elapsed(finalizeStarted), summary: confidence.lowConfidence ? "low confidence" : "complete", attempts: 1, error: null })

    const assessment: Assessment = {
      id: this.newId(),
      requestId: input.requestId,
      patientId: patient.id,
      supersedes: input.supersedes,
      createdAt: now().toISOString(),
      narrative,
      routeTag,
      primaryBasis,
      evidence: citedEvidence.map(toCitation),
      draft,
      audit,
      differential,
      confidence,
      trace,
      gaps: gaps.list(),
      finalized: true,
    }
    return deepFreeze(assessment)
  }

  /** Calls a modality adapter with the adapter timeout, retrying a timeout once. */
  private async callModality<T>(
    label: string,
    failureCode: PipelineErrorCode,
    call: (signal: AbortSignal) => Promise<T>,
    signal: AbortSignal | undefined,
  ): Promise<ModalityOutcome<T>> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        const value = await callWithTimeout(label, this.settings.adapterTimeoutMs, call, signal)
        return { ok: true, value, attempts: attempt }
      } catch (error) {
        const normalized = this.softFailure(error, label, failureCode, signal)
        debugWarn(`${label} attempt ${attempt} failed`, normalized.code)
        if (normalized.code !== "adapter_timeout" || attempt >= MAX_MODALITY_ATTEMPTS) {
          return { ok: false, error: normalized, attempts: attempt }
        }
      }
    }
  }

  /** Normalizes a soft stage failure. Cancellation is rethrown instead. */
  private softFailure(error: unknown, label: string, fallback: PipelineErrorCode, signal: AbortSignal | undefined): PipelineError {
    if (signal?.aborted) throw cancelledError(label)
    const normalized = toPipelineError(error, { code: fallback, message: `${label} failed`, recoverable: true })
    if (normalized.code === "cancelled") throw error
    return normalized
  }

  private missingAdapter(kind: string): PipelineStageError {
    return new PipelineStageError("adapter_unavailable", `No ${kind} adapter configured`, true)
  }

  private mergeAudit(
    outcome: StageOutcome<AuditOutput>,
    draft: DraftAssessment,
    narrative: string,
    evidence: ScoredChunk[],
    context: string[],
  ): AuditVerdict {
    if (outcome.status === "skipped") {
      return { verdict: "flagged", reasons: [`audit skipped: ${outcome.reason}`], unsupportedClaims: [], placeholder: true }
    }

    const reasons: string[] = []
    const unsupported = new Set<string>()
    let flagged = false
    if (outcome.status === "ok") {
      flagged = outcome.value.verdict === "flagged"
      reasons.push(...outcome.value.reasons)
      for (const claim of outcome.value.unsupported_claims) unsupported.add(claim)
    } else {
      flagged = true
      reasons.push(PLACEHOLDER_TEXT)
    }

    if (evidence.length > 0) {
      const sources = [
        ...evidence.map((item) => ({ ref: item.chunk.id, text: item.chunk.text })),
        ...narrativeSources(narrative),
      ]
      const verification = verifyDraft(draftText(draft), sources)
      if (verification.status === "failed") {
        flagged = true
        const facts = verification.summary.supportedClaims + verification.summary.unsupportedClaims
        reasons.push(`Claim check: ${verification.summary.unsupportedClaims} of ${facts} factual claims lack support.`)
        for (const claim of verification.claims) {
          if (claim.verdict === "unsupported") unsupported.add(claim.text)
        }
      }
    }

    const sourceText = [narrative, ...evidence.map((item) => item.chunk.text), ...context].join("\n")
    const warnings = runSafetyChecks({ sourceText, draft })
    if (warnings.length > 0) {
      flagged = true
      reasons.push(...warnings)
    }

    return {
      verdict: flagged ? "flagged" : "pass",
      reasons,
      unsupportedClaims: [...unsupported],
      placeholder: outcome.status === "placeholder",
    }
  }
}
