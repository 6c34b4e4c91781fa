import { createHash } from "node:crypto"
import { PipelineStageError, toPipelineError } from "@pipeline-errors"
import { throwIfCancelled } from "@pipeline-shared"
import type { EmbeddingBackend } from "@pipeline-shared"
import { writeAuditEntry } from "@storage/audit-log"
import { debugLog } from "@storage/debug-logger"
import { deepFreeze } from "@storage/freeze"
import { chunkDocument } from "./chunker"
import { l2Normalize } from "./embeddings"
import { isNoiseChunk } from "./noise"
import type { Chunk, IndexReport, KnowledgeDocument, RetrievalUnavailableReason, ScoredChunk } from "./types"

/** A boundary chunk is cut to the remaining budget only when at least this much text fits. */
export const MIN_TRUNCATED_CHUNK_CHARS = 80

interface IndexedChunk {
  chunk: Chunk
  vector: number[]
  noisy: boolean
}

interface IndexedDocument {
  id: string
  contentHash: string
  chunks: readonly IndexedChunk[]
}

type Snapshot = ReadonlyMap<string, IndexedDocument>

function contentHash(document: KnowledgeDocument): string {
  return createHash("sha256")
    .update(document.category ?? "")
    .update("\u0000")
    .update(document.text)
    .digest("hex")
}

/** Both sides are unit length, so this is cosine similarity. */
function dot(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length)
  let sum = 0
  for (let i = 0; i < length; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0)
  }
  return sum
}

function retrievalUnavailable(reason: RetrievalUnavailableReason, message: string, cause?: unknown): PipelineStageError {
  const details: Record<string, unknown> = { reason }
  if (cause !== undefined) {
    details.cause = toPipelineError(cause, { code: "adapter_unavailable", message: "embedding failed", recoverable: true }).message
  }
  return new PipelineStageError("retrieval_unavailable", message, true, details)
}

function compareRanked(a: ScoredChunk, b: ScoredChunk): number {
  if (b.score !== a.score) return b.score - a.score
  if (a.chunk.documentId !== b.chunk.documentId) return a.chunk.documentId < b.chunk.documentId ? -1 : 1
  return a.chunk.offset - b.chunk.offset
}

/**
 * Vector index over knowledge documents. Readers capture the current immutable snapshot;
 * writers build replacement entries off to the side and swap in a new map, one write at a time.
 */
export class EvidenceRetriever {
  private snapshot: Snapshot = new Map()
  private writeTail: Promise<unknown> = Promise.resolve()

  constructor(private readonly embedder: EmbeddingBackend) {}

  size(): number {
    let count = 0
    for (const document of this.snapshot.values()) count += document.chunks.length
    return count
  }

  documentIds(): string[] {
    return [...this.snapshot.keys()].sort()
  }

  index(documents: KnowledgeDocument[], signal?: AbortSignal): Promise<IndexReport> {
    return this.serialize(() => this.applyIndex(documents, signal))
  }

  remove(documentId: string): Promise<boolean> {
    return this.serialize(async () => {
      if (!this.snapshot.has(documentId)) return false
      const next = new Map(this.snapshot)
      next.delete(documentId)
      this.snapshot = next
      return true
    })
  }

  /**
   * Top `k` chunks by cosine similarity, ties broken by document id then offset. Noisy chunks
   * are only used when no clean chunk scored. Total returned text never exceeds `charBudget`.
   */
  async query(text: string, k: number, charBudget: number, signal?: AbortSignal): Promise<ScoredChunk[]> {
    if (text.trim().length === 0 || k <= 0 || charBudget <= 0) return []

    const snapshot = this.snapshot
    const indexed: IndexedChunk[] = []
    for (const document of snapshot.values()) indexed.push(...document.chunks)
    if (indexed.length === 0) {
      throw retrievalUnavailable("empty_index", "Knowledge index is empty")
    }

    throwIfCancelled(signal, "retrieval")
    let queryVector: number[]
    try {
      const [vector] = await this.embedder.embed([text], signal)
      if (!vector) throw new Error("embedding backend returned no vector")
      queryVector = l2Normalize(vector)
    } catch (error) {
      throwIfCancelled(signal, "retrieval")
      throw retrievalUnavailable("embedding_unavailable", "Embedding backend unavailable", error)
    }

    const clean: ScoredChunk[] = []
    const noisy: ScoredChunk[] = []
    for (const entry of indexed) {
      const score = dot(queryVector, entry.vector)
      if (score <= 0) continue
      const scored = { chunk: entry.chunk, score, truncated: false }
      if (entry.noisy) noisy.push(scored)
      else clean.push(scored)
    }
    const ranked = (clean.length > 0 ? clean : noisy).sort(compareRanked).slice(0, k)

    const selected: ScoredChunk[] = []
    let used = 0
    for (const item of ranked) {
      const remaining = charBudget - used
      if (item.chunk.text.length <= remaining) {
        selected.push(item)
        used += item.chunk.text.length
        continue
      }
      if (remaining >= MIN_TRUNCATED_CHUNK_CHARS) {
        selected.push(deepFreeze({ ...item, chunk: { ...item.chunk, text: item.chunk.text.slice(0, remaining) }, truncated: true }))
      }
      break
    }

    debugLog("retrieval query", { candidates: indexed.length, returned: selected.length, usedChars: used })
    return selected
  }

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.writeTail.then(fn, fn)
    this.writeTail = run.catch(() => undefined)
    return run
  }

  private async applyIndex(documents: KnowledgeDocument[], signal?: AbortSignal): Promise<IndexReport> {
    const seen = new Set<string>()
    for (const document of documents) {
      if (!document.id || document.id.includes("#")) {
        throw new PipelineStageError("validation_error", `Invalid document id: "${document.id}"`, false)
      }
      if (seen.has(document.id)) {
        throw new PipelineStageError("validation_error", `Duplicate document id in batch: ${document.id}`, false)
      }
      seen.add(document.id)
    }

    const base = this.snapshot
    const pending: Array<{ document: KnowledgeDocument; hash: string; chunks: Chunk[]; replacing: boolean }> = []
    let unchanged = 0
    for (const document of documents) {
      const hash = contentHash(document)
      const existing = base.get(document.id)
      if (existing && existing.contentHash === hash) {
        unchanged += 1
        continue
      }
      pending.push({ document, hash, chunks: chunkDocument(document), replacing: existing !== undefined })
    }

    const texts = pending.flatMap((entry) => entry.chunks.map((chunk) => chunk.text))
    let vectors: number[][] = []
    if (texts.length > 0) {
      throwIfCancelled(signal, "indexing")
      try {
        vectors = await this.embedder.embed(texts, signal)
      } catch (error) {
        throwIfCancelled(signal, "indexing")
        throw retrievalUnavailable("embedding_unavailable", "Embedding backend unavailable during indexing", error)
      }
      if (vectors.length !== texts.length) {
        throw retrievalUnavailable("embedding_unavailable", "Embedding backend returned the wrong number of vectors")
      }
    }

    const next = new Map(this.snapshot)
    let cursor = 0
    let added = 0
    let replaced = 0
    for (const entry of pending) {
      const chunks = entry.chunks.map((chunk) => {
        const vector = l2Normalize(vectors[cursor] ?? [])
        cursor += 1
        return deepFreeze({ chunk, vector, noisy: isNoiseChunk(chunk.text) })
      })
      next.set(entry.document.id, { id: entry.document.id, contentHash: entry.hash, chunks: Object.freeze(chunks) })
      if (entry.replacing) replaced += 1
      else added += 1
    }
    this.snapshot = next

    const report: IndexReport = { added, replaced, unchanged, chunkCount: this.size() }
    await writeAuditEntry({
      event_type: "retrieval.indexed",
      success: true,
      metadata: { ...report },
    })
    return report
  }
}
