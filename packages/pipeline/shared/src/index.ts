export {
  PIPELINE_ERROR_CODES,
  PipelineStageError,
  cancelledError,
  classifyHttpStatus,
  createPipelineError,
  isPipelineError,
  isPipelineErrorCode,
  lengthExceeded,
  lengthSideOf,
  toPipelineError,
  toPipelineStageError,
} from "./error"
export type { LengthSide, PipelineError, PipelineErrorCode } from "./error"
export { IMAGE_MIME_TYPES } from "./adapters"
export type {
  AudioInput,
  EmbeddingBackend,
  EvidenceStrength,
  GenerationRequest,
  ImageFindings,
  ImageInput,
  ImageMimeType,
  SpeechToText,
  TextGenerator,
  VisionAnalyzer,
} from "./adapters"
export { callWithTimeout, isAbortError, isNetworkFetchError, throwIfCancelled } from "./timeout"
export { extractJson, isUnparseableOutput, parseModelJson } from "./json"
