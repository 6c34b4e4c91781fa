import type { SpeechToText } from "@pipeline-shared"
import { resolveTranscriptionProviderName } from "@ward-config"
import type { TranscriptionProviderName } from "@ward-config"
import { MedASRTranscriber } from "./medasr-transcriber"
import type { MedASRTranscriberOptions } from "./medasr-transcriber"
import { WhisperLocalTranscriber } from "./whisper-local-transcriber"
import type { WhisperLocalTranscriberOptions } from "./whisper-local-transcriber"
import { WhisperOpenAITranscriber } from "./whisper-transcriber"
import type { WhisperOpenAITranscriberOptions } from "./whisper-transcriber"

export type TranscriptionProvider = TranscriptionProviderName

export interface ResolvedTranscriptionProvider {
  provider: TranscriptionProvider
  model: string
}

const DEFAULT_WHISPER_LOCAL_MODEL = "tiny.en"
const DEFAULT_WHISPER_OPENAI_MODEL = "whisper-1"
const DEFAULT_MEDASR_MODEL = "medasr"

export function resolveTranscriptionProvider(env: NodeJS.ProcessEnv = process.env): ResolvedTranscriptionProvider {
  const provider = resolveTranscriptionProviderName(env.TRANSCRIPTION_PROVIDER)

  switch (provider) {
    case "medasr":
      return { provider, model: env.MEDASR_MODEL?.trim() || DEFAULT_MEDASR_MODEL }
    case "whisper_openai":
      return { provider, model: env.WHISPER_OPENAI_MODEL?.trim() || DEFAULT_WHISPER_OPENAI_MODEL }
    case "whisper_local":
      return { provider, model: env.WHISPER_LOCAL_MODEL?.trim() || DEFAULT_WHISPER_LOCAL_MODEL }
  }
}

export interface TranscriberOptions {
  whisperLocal?: WhisperLocalTranscriberOptions
  whisperOpenAI?: WhisperOpenAITranscriberOptions
  medasr?: MedASRTranscriberOptions
}

export function createTranscriber(
  resolved: ResolvedTranscriptionProvider = resolveTranscriptionProvider(),
  options: TranscriberOptions = {},
): SpeechToText {
  switch (resolved.provider) {
    case "medasr":
      return new MedASRTranscriber(options.medasr)
    case "whisper_openai":
      return new WhisperOpenAITranscriber({ model: resolved.model, ...options.whisperOpenAI })
    case "whisper_local":
      return new WhisperLocalTranscriber({ model: resolved.model, ...options.whisperLocal })
  }
}
