export { encodePcmWav, isWav, parseWavHeader } from "./core/wav"
export type { WavInfo } from "./core/wav"

// Transcription providers
export { WhisperLocalTranscriber, transcribeWavBuffer as transcribeWithWhisperLocal } from "./providers/whisper-local-transcriber"
export type { WhisperLocalTranscriberOptions } from "./providers/whisper-local-transcriber"
export { WhisperOpenAITranscriber, transcribeWavBuffer as transcribeWithWhisper } from "./providers/whisper-transcriber"
export type { WhisperOpenAITranscriberOptions } from "./providers/whisper-transcriber"
export { MedASRTranscriber, transcribeWavBuffer as transcribeWithMedASR } from "./providers/medasr-transcriber"
export type { MedASRTranscriberOptions } from "./providers/medasr-transcriber"

export { createTranscriber, resolveTranscriptionProvider } from "./providers/provider-resolver"
export type { ResolvedTranscriptionProvider, TranscriberOptions, TranscriptionProvider } from "./providers/provider-resolver"
