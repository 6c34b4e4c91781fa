import dotenv from "dotenv"

dotenv.config()

export type GenerationProvider = "anthropic" | "medgemma"
export type VisionProvider = "anthropic" | "medgemma"
export type TranscriptionProviderName = "whisper_local" | "whisper_openai" | "medasr"
export type EmbeddingProvider = "hashing" | "http"

/**
 * doctor_required: a low-confidence assessment keeps the request out of nurse-only resolution.
 * nurse_discretion: the nurse may resolve regardless of assessment confidence.
 */
export type LowConfidenceReviewPolicy = "doctor_required" | "nurse_discretion"

export interface GenerationBudget {
  maxOutputTokens: number
  retryMaxOutputTokens: number
  maxInputTokens: number
}

export interface WardConfig {
  generation: GenerationBudget
  retrieval: {
    evidenceCharBudget: number
    topK: number
  }
  adapters: {
    timeoutMs: number
  }
  handover: {
    useModel: boolean
    windowHours: number
  }
  policy: {
    lowConfidenceReview: LowConfidenceReviewPolicy
    acknowledgementTimeoutMs: number
  }
  providers: {
    generation: GenerationProvider
    vision: VisionProvider
    transcription: TranscriptionProviderName
    embedding: EmbeddingProvider
  }
  seedFile: string | null
}

const DEFAULTS = {
  maxOutputTokens: 384,
  retryMaxOutputTokens: 192,
  maxInputTokens: 3072,
  evidenceCharBudget: 2200,
  topK: 6,
  adapterTimeoutMs: 60_000,
  handoverWindowHours: 24,
  acknowledgementTimeoutMs: 24 * 60 * 60 * 1000,
} as const

export function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue
  }
  const normalized = value.trim().toLowerCase()
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false
  }
  return defaultValue
}

export function resolvePositiveInteger(value: string | undefined, fallback: number): number {
  if (!value) return fallback
  const parsed = Number.parseInt(value, 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

function normalize(raw: string | undefined): string {
  return raw?.trim().toLowerCase() || ""
}

function resolveGenerationProvider(raw: string | undefined): GenerationProvider {
  const provider = normalize(raw)
  return provider === "medgemma" || provider === "local" ? "medgemma" : "anthropic"
}

export function resolveTranscriptionProviderName(raw: string | undefined): TranscriptionProviderName {
  const provider = normalize(raw)
  if (provider === "medasr" || provider === "med_asr") return "medasr"
  if (provider === "whisper_openai" || provider === "whisper-openai" || provider === "openai" || provider === "whisper") {
    return "whisper_openai"
  }
  return "whisper_local"
}

function resolveLowConfidencePolicy(raw: string | undefined): LowConfidenceReviewPolicy {
  return normalize(raw) === "nurse_discretion" ? "nurse_discretion" : "doctor_required"
}

export function loadWardConfig(env: NodeJS.ProcessEnv = process.env): Readonly<WardConfig> {
  const maxOutputTokens = resolvePositiveInteger(env.WARD_MAX_OUTPUT_TOKENS, DEFAULTS.maxOutputTokens)
  // the retry budget is a reduction, never larger than the first attempt
  const retryMaxOutputTokens = Math.min(
    maxOutputTokens,
    resolvePositiveInteger(env.WARD_RETRY_MAX_OUTPUT_TOKENS, DEFAULTS.retryMaxOutputTokens),
  )

  const config: WardConfig = {
    generation: {
      maxOutputTokens,
      retryMaxOutputTokens,
      maxInputTokens: resolvePositiveInteger(env.WARD_MAX_INPUT_TOKENS, DEFAULTS.maxInputTokens),
    },
    retrieval: {
      evidenceCharBudget: resolvePositiveInteger(env.WARD_EVIDENCE_CHAR_BUDGET, DEFAULTS.evidenceCharBudget),
      topK: resolvePositiveInteger(env.WARD_EVIDENCE_TOP_K, DEFAULTS.topK),
    },
    adapters: {
      timeoutMs: resolvePositiveInteger(env.WARD_ADAPTER_TIMEOUT_MS, DEFAULTS.adapterTimeoutMs),
    },
    handover: {
      useModel: parseBooleanEnv(env.WARD_HANDOVER_USE_MODEL, false),
      windowHours: resolvePositiveInteger(env.WARD_HANDOVER_WINDOW_HOURS, DEFAULTS.handoverWindowHours),
    },
    policy: {
      lowConfidenceReview: resolveLowConfidencePolicy(env.WARD_LOW_CONFIDENCE_REVIEW),
      acknowledgementTimeoutMs: resolvePositiveInteger(env.WARD_ACK_TIMEOUT_MS, DEFAULTS.acknowledgementTimeoutMs),
    },
    providers: {
      generation: resolveGenerationProvider(env.GENERATION_PROVIDER),
      vision: resolveGenerationProvider(env.VISION_PROVIDER),
      transcription: resolveTranscriptionProviderName(env.TRANSCRIPTION_PROVIDER),
      embedding: normalize(env.EMBEDDING_PROVIDER) === "http" ? "http" : "hashing",
    },
    seedFile: env.WARD_SEED_FILE?.trim() || null,
  }

  return Object.freeze(config)
}
