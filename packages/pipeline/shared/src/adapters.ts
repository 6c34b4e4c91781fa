/**
 * Input/output contracts of the model backends the pipeline depends on.
 * Implementations throw PipelineStageError with the codes listed per method.
 */

export interface AudioInput {
  audio: Buffer
  sampleRateHz: number
  filename?: string
}

/** Throws transcription_failed, adapter_unavailable or adapter_timeout. */
export interface SpeechToText {
  readonly name: string
  transcribe(input: AudioInput, signal?: AbortSignal): Promise<string>
}

export const IMAGE_MIME_TYPES = ["image/jpeg", "image/png", "image/gif", "image/webp"] as const
export type ImageMimeType = (typeof IMAGE_MIME_TYPES)[number]

export interface ImageInput {
  image: Buffer
  mimeType: ImageMimeType
}

export type EvidenceStrength = "low" | "medium" | "high"

export interface ImageFindings {
  primaryFinding: string
  confidence: number
  interpretable: boolean
  evidenceStrength: EvidenceStrength
  candidates: string[]
  issues: string[]
  description: string
}

/** Throws vision_failed, adapter_unavailable or adapter_timeout. */
export interface VisionAnalyzer {
  readonly name: string
  describe(input: ImageInput, signal?: AbortSignal): Promise<ImageFindings>
}

export interface GenerationRequest {
  system: string
  prompt: string
  maxOutputTokens: number
  /**
   * JSON schema for structured output. Backends that support tool use enforce it;
   * others rely on the prompt and the caller's parser.
   */
  jsonSchema?: {
    name: string
    schema: Record<string, unknown>
  }
}

/** Throws generation_failed, length_exceeded, adapter_unavailable or adapter_timeout. */
export interface TextGenerator {
  readonly name: string
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>
}

/** Throws adapter_unavailable. */
export interface EmbeddingBackend {
  readonly name: string
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>
}
