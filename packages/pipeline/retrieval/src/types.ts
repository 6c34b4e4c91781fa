export interface KnowledgeDocument {
  id: string
  text: string
  category?: string | null
}

export interface Chunk {
  /** `<documentId>#<offset>` */
  id: string
  documentId: string
  offset: number
  text: string
  category: string | null
}

export interface ScoredChunk {
  chunk: Chunk
  score: number
  /** Set when the chunk was cut to fit the character budget. */
  truncated: boolean
}

export interface IndexReport {
  added: number
  replaced: number
  unchanged: number
  chunkCount: number
}

export type RetrievalUnavailableReason = "empty_index" | "embedding_unavailable"
