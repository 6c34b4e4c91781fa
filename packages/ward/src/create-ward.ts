import { AssessmentOrchestrator } from "@assessment"
import { AnthropicGenerator } from "@llm"
import { MedGemmaGenerator } from "@llm-medgemma"
import type { EmbeddingBackend, SpeechToText, TextGenerator, VisionAnalyzer } from "@pipeline-shared"
import { EvidenceRetriever, HashingEmbedder, HttpEmbeddingBackend } from "@retrieval"
import type { IndexReport, KnowledgeDocument } from "@retrieval"
import { MemoryWardStore } from "@storage"
import type { WardStore } from "@storage"
import { debugLog } from "@storage/debug-logger"
import { createTranscriber, resolveTranscriptionProvider } from "@transcription"
import { createVisionAnalyzer } from "@vision"
import { loadWardConfig } from "@ward-config"
import type { WardConfig } from "@ward-config"
import { loadWardSeedFile, seedWard } from "./seed"
import type { WardSeed } from "./seed"
import { WardWorkflow } from "./workflow"
import type { WardWorkflowOptions } from "./workflow"

export interface WardAdapters {
  generator: TextGenerator
  transcriber: SpeechToText
  vision: VisionAnalyzer
  embedder: EmbeddingBackend
}

export interface CreateWardOptions {
  config?: Readonly<WardConfig>
  store?: WardStore
  /** Takes precedence over `config.seedFile`. */
  seed?: WardSeed
  /** Replaces the adapters the config would select. */
  adapters?: Partial<WardAdapters>
  workflow?: WardWorkflowOptions
}

export interface Ward {
  workflow: WardWorkflow
  retriever: EvidenceRetriever
  orchestrator: AssessmentOrchestrator
  store: WardStore
  config: Readonly<WardConfig>
  indexKnowledgeBase(documents: KnowledgeDocument[], signal?: AbortSignal): Promise<IndexReport>
}

function defaultGenerator(config: Readonly<WardConfig>): TextGenerator {
  switch (config.providers.generation) {
    case "medgemma":
      return new MedGemmaGenerator({ timeoutMs: config.adapters.timeoutMs })
    case "anthropic":
      return new AnthropicGenerator()
  }
}

function defaultEmbedder(config: Readonly<WardConfig>): EmbeddingBackend {
  switch (config.providers.embedding) {
    case "http":
      return new HttpEmbeddingBackend()
    case "hashing":
      return new HashingEmbedder()
  }
}

function defaultTranscriber(config: Readonly<WardConfig>): SpeechToText {
  return createTranscriber(
    resolveTranscriptionProvider({ ...process.env, TRANSCRIPTION_PROVIDER: config.providers.transcription }),
  )
}

/**
 * Wires the adapters selected by config, the evidence retriever, the assessment orchestrator and
 * the ward workflow over one store.
 */
export async function createWard(options: CreateWardOptions = {}): Promise<Ward> {
  const config = options.config ?? loadWardConfig()
  const store = options.store ?? new MemoryWardStore()
  const adapters = options.adapters ?? {}

  const generator = adapters.generator ?? defaultGenerator(config)
  const retriever = new EvidenceRetriever(adapters.embedder ?? defaultEmbedder(config))
  const orchestrator = new AssessmentOrchestrator(
    {
      generator,
      retriever,
      transcriber: adapters.transcriber ?? defaultTranscriber(config),
      vision: adapters.vision ?? createVisionAnalyzer(config.providers.vision),
    },
    {
      generation: config.generation,
      evidenceCharBudget: config.retrieval.evidenceCharBudget,
      topK: config.retrieval.topK,
      adapterTimeoutMs: config.adapters.timeoutMs,
    },
  )
  const workflow = new WardWorkflow({ store, orchestrator, generator, retriever, config }, options.workflow)

  const seed = options.seed ?? (config.seedFile ? await loadWardSeedFile(config.seedFile) : null)
  if (seed) {
    const report = await seedWard(store, seed)
    debugLog("ward seeded", report)
  }

  return {
    workflow,
    retriever,
    orchestrator,
    store,
    config,
    indexKnowledgeBase: (documents, signal) => retriever.index(documents, signal),
  }
}
