import { PipelineStageError } from "@pipeline-errors"
import { isAbortError, isNetworkFetchError } from "@pipeline-shared"
import type { AudioInput, SpeechToText } from "@pipeline-shared"
import { buildTranscriptionForm, fetchWithTimeout, httpFailure, readTranscript, toWavPayload, validateHttpsUrl } from "../core/endpoint"

const DEFAULT_WHISPER_URL = "https://api.openai.com/v1/audio/transcriptions"
const DEFAULT_WHISPER_MODEL = "whisper-1"
const DEFAULT_TIMEOUT_MS = 60_000

export interface WhisperOpenAITranscriberOptions {
  apiKey?: string
  url?: string
  model?: string
  timeoutMs?: number
  fetchFn?: typeof fetch
}

export async function transcribeWavBuffer(
  buffer: Buffer,
  filename: string,
  options: WhisperOpenAITranscriberOptions = {},
  signal?: AbortSignal,
): Promise<string> {
  const whisperUrl = options.url || process.env.WHISPER_OPENAI_URL || DEFAULT_WHISPER_URL
  const whisperModel = options.model || process.env.WHISPER_OPENAI_MODEL || DEFAULT_WHISPER_MODEL
  const fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis)

  // Validate HTTPS before sending any PHI
  validateHttpsUrl(whisperUrl, "Whisper API")

  const key = options.apiKey || process.env.OPENAI_API_KEY
  if (!key) {
    throw new PipelineStageError("configuration_error", "Missing OPENAI_API_KEY. Please configure your API key.", false)
  }

  let outcome: Awaited<ReturnType<typeof fetchWithTimeout>>
  try {
    outcome = await fetchWithTimeout(
      fetchFn,
      options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      whisperUrl,
      {
        method: "POST",
        headers: { Authorization: `Bearer ${key}` },
        body: buildTranscriptionForm(buffer, filename, { model: whisperModel }),
      },
      signal,
    )
  } catch (error) {
    if (isNetworkFetchError(error) && !isAbortError(error)) {
      throw new PipelineStageError("adapter_unavailable", "Whisper API unreachable", true, { provider: "whisper_openai" })
    }
    throw error
  }

  if ("timedOut" in outcome) {
    throw new PipelineStageError("adapter_timeout", "Whisper API request timed out", true, { provider: "whisper_openai" })
  }

  const { response } = outcome
  if (!response.ok) {
    const errorText = await response.text()
    throw httpFailure("Whisper", response.status, errorText)
  }

  return readTranscript(response, "whisper_openai")
}

export class WhisperOpenAITranscriber implements SpeechToText {
  readonly name = "whisper_openai"

  constructor(private readonly options: WhisperOpenAITranscriberOptions = {}) {}

  async transcribe(input: AudioInput, signal?: AbortSignal): Promise<string> {
    return transcribeWavBuffer(toWavPayload(input), input.filename ?? "audio.wav", this.options, signal)
  }
}
