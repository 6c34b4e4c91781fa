import { z } from "zod"
import { PipelineStageError, classifyHttpStatus } from "@pipeline-errors"
import { isAbortError, isNetworkFetchError } from "@pipeline-shared"
import type { EmbeddingBackend } from "@pipeline-shared"

export const HASHING_DIMENSIONS = 256

const FNV_OFFSET = 0x811c9dc5
const FNV_PRIME = 0x01000193

function fnv1a(token: string): number {
  let hash = FNV_OFFSET
  for (let i = 0; i < token.length; i += 1) {
    hash ^= token.charCodeAt(i)
    hash = Math.imul(hash, FNV_PRIME) >>> 0
  }
  return hash
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length >= 2)
}

export function l2Normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0))
  return norm === 0 ? vector : vector.map((value) => value / norm)
}

/**
 * Deterministic feature-hashing embedder. Each token lands in one of `dimensions` buckets with a
 * sign taken from a second hash bit, then the vector is L2-normalized.
 */
export class HashingEmbedder implements EmbeddingBackend {
  readonly name = "hashing"

  constructor(private readonly dimensions = HASHING_DIMENSIONS) {}

  embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0)
    for (const token of tokenize(text)) {
      const hash = fnv1a(token)
      const bucket = hash % this.dimensions
      vector[bucket] = (vector[bucket] ?? 0) + ((hash >>> 31) === 0 ? 1 : -1)
    }
    return l2Normalize(vector)
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text))
  }
}

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().int().nonnegative() })),
})

export interface HttpEmbeddingOptions {
  baseUrl?: string
  model?: string
  apiKey?: string
  fetchFn?: typeof fetch
}

const DEFAULT_EMBEDDING_URL = "http://127.0.0.1:8003"
const DEFAULT_EMBEDDING_MODEL = "bge-small-en-v1.5"

function unavailable(message: string, details?: Record<string, unknown>): PipelineStageError {
  return new PipelineStageError("adapter_unavailable", message, true, details)
}

/** OpenAI-compatible `/v1/embeddings` backend. Every failure surfaces as adapter_unavailable. */
export class HttpEmbeddingBackend implements EmbeddingBackend {
  readonly name = "http"
  private readonly baseUrl: string
  private readonly model: string

  constructor(private readonly options: HttpEmbeddingOptions = {}) {
    const baseUrl = options.baseUrl || process.env.EMBEDDING_BASE_URL || DEFAULT_EMBEDDING_URL
    this.baseUrl = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl
    this.model = options.model || process.env.EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return []
    const fetchFn = this.options.fetchFn ?? globalThis.fetch.bind(globalThis)
    const apiKey = this.options.apiKey ?? process.env.EMBEDDING_API_KEY
    const headers: Record<string, string> = { "Content-Type": "application/json" }
    if (apiKey) {
      headers.Authorization = `Bearer ${apiKey}`
    }

    let response: Response
    try {
      response = await fetchFn(`${this.baseUrl}/v1/embeddings`, {
        method: "POST",
        headers,
        signal,
        body: JSON.stringify({ model: this.model, input: texts }),
      })
    } catch (error) {
      if (isAbortError(error)) throw error
      if (isNetworkFetchError(error)) {
        throw unavailable(`Embedding server unreachable at ${this.baseUrl}`, { baseUrl: this.baseUrl })
      }
      throw unavailable(error instanceof Error ? error.message : String(error))
    }

    if (!response.ok) {
      const classified = classifyHttpStatus(response.status)
      throw unavailable(`Embedding request failed (${response.status})`, { status: response.status, transient: classified.recoverable })
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json().catch(() => null))
    if (!parsed.success || parsed.data.data.length !== texts.length) {
      throw unavailable("Malformed embedding response")
    }

    return [...parsed.data.data].sort((a, b) => a.index - b.index).map((item) => item.embedding)
  }
}
