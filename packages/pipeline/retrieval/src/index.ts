export { CHUNK_OVERLAP, CHUNK_SIZE, chunkDocument } from "./chunker"
export { HASHING_DIMENSIONS, HashingEmbedder, HttpEmbeddingBackend, l2Normalize, tokenize } from "./embeddings"
export type { HttpEmbeddingOptions } from "./embeddings"
export { NOISE_PATTERNS, isNoiseChunk } from "./noise"
export { EvidenceRetriever, MIN_TRUNCATED_CHUNK_CHARS } from "./retriever"
export type { Chunk, IndexReport, KnowledgeDocument, RetrievalUnavailableReason, ScoredChunk } from "./types"
