import { PipelineStageError } from "@pipeline-errors"
import type { Chunk, KnowledgeDocument } from "./types"

export const CHUNK_SIZE = 800
export const CHUNK_OVERLAP = 150

const SENTENCE_END = /[.!?]["')\]]?\s/g

function snapEnd(text: string, start: number, hardEnd: number, minEnd: number): number {
  if (hardEnd >= text.length) return text.length
  const window = text.slice(minEnd, hardEnd)

  let lastSentence = -1
  for (const match of window.matchAll(SENTENCE_END)) {
    lastSentence = (match.index ?? 0) + match[0].length
  }
  if (lastSentence > 0) return minEnd + lastSentence

  const lastSpace = window.search(/\s\S*$/)
  if (lastSpace > 0) return minEnd + lastSpace + 1
  return hardEnd
}

/**
 * Splits a document into overlapping windows. Window ends snap back to the last sentence or
 * whitespace boundary in the second half of the window; the next window starts `overlap`
 * characters before the previous end.
 */
export function chunkDocument(document: KnowledgeDocument, size = CHUNK_SIZE, overlap = CHUNK_OVERLAP): Chunk[] {
  if (!Number.isInteger(size) || size <= 0 || !Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new PipelineStageError(
      "validation_error",
      `Chunk overlap must be a non-negative integer below the chunk size (size ${size}, overlap ${overlap})`,
      false,
      { size, overlap },
    )
  }
  const { text } = document
  const category = document.category ?? null
  const chunks: Chunk[] = []
  let start = 0

  while (start < text.length) {
    const minEnd = start + Math.max(overlap + 1, Math.floor(size / 2))
    const end = snapEnd(text, start, start + size, Math.min(minEnd, text.length))
    const body = text.slice(start, end)
    if (body.trim().length > 0) {
      chunks.push({ id: `${document.id}#${start}`, documentId: document.id, offset: start, text: body, category })
    }
    if (end >= text.length) break
    start = end - overlap
  }

  return chunks
}
