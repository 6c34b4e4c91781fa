import { PipelineStageError } from "@pipeline-errors"
import { isAbortError, isNetworkFetchError } from "@pipeline-shared"
import type { AudioInput, SpeechToText } from "@pipeline-shared"
import { resolvePositiveInteger } from "@ward-config"
import { debugWarn } from "@storage/debug-logger"
import {
  buildTranscriptionForm,
  fetchWithTimeout,
  httpFailure,
  readTranscript,
  toWavPayload,
  validateLocalOrHttpsUrl,
} from "../core/endpoint"

const DEFAULT_WHISPER_LOCAL_URL = "http://127.0.0.1:8002/v1/audio/transcriptions"
const DEFAULT_WHISPER_LOCAL_MODEL = "tiny.en"
const DEFAULT_WHISPER_LANGUAGE = "auto"
const DEFAULT_TIMEOUT_MS = 15_000
const DEFAULT_MAX_RETRIES = 2

export interface WhisperLocalTranscriberOptions {
  baseUrl?: string
  model?: string
  language?: string
  timeoutMs?: number
  maxRetries?: number
  fetchFn?: typeof fetch
  waitFn?: (ms: number) => Promise<void>
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function trustedHosts(): string[] {
  return (process.env.WHISPER_LOCAL_TRUSTED_HOSTS || "")
    .split(",")
    .map((host) => host.trim().toLowerCase())
    .filter(Boolean)
}

function shouldRetryStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500
}

export async function transcribeWavBuffer(
  buffer: Buffer,
  filename: string,
  options?: WhisperLocalTranscriberOptions,
  signal?: AbortSignal,
): Promise<string> {
  const url = options?.baseUrl || process.env.WHISPER_LOCAL_URL || DEFAULT_WHISPER_LOCAL_URL
  const model = options?.model || process.env.WHISPER_LOCAL_MODEL || DEFAULT_WHISPER_LOCAL_MODEL
  const language = model.endsWith(".en") ? "en" : options?.language || process.env.WHISPER_LANGUAGE || DEFAULT_WHISPER_LANGUAGE
  const timeoutMs = options?.timeoutMs ?? resolvePositiveInteger(process.env.WHISPER_LOCAL_TIMEOUT_MS, DEFAULT_TIMEOUT_MS)
  const maxRetries = options?.maxRetries ?? resolvePositiveInteger(process.env.WHISPER_LOCAL_MAX_RETRIES, DEFAULT_MAX_RETRIES)
  const fetchFn = options?.fetchFn ?? globalThis.fetch.bind(globalThis)
  const waitFn = options?.waitFn ?? wait

  const configuredLanguage = process.env.WHISPER_LANGUAGE
  if (model.endsWith(".en") && configuredLanguage && configuredLanguage !== "en" && configuredLanguage !== "auto") {
    debugWarn(`WHISPER_LANGUAGE setting ignored since model '${model}' can only transcribe language 'en'.`)
  }

  validateLocalOrHttpsUrl(url, "Whisper local API", trustedHosts())

  const fields: Record<string, string> = { model, response_format: "json" }
  if (language !== "auto") {
    fields.language = language
  }

  const totalAttempts = maxRetries + 1
  for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
    try {
      const outcome = await fetchWithTimeout(
        fetchFn,
        timeoutMs,
        url,
        { method: "POST", body: buildTranscriptionForm(buffer, filename, fields) },
        signal,
      )

      if ("timedOut" in outcome) {
        if (attempt < totalAttempts) {
          await waitFn(250 * attempt)
          continue
        }
        throw new PipelineStageError(
          "adapter_timeout",
          `Whisper local transcription timed out after ${timeoutMs}ms (attempt ${attempt}/${totalAttempts}).`,
          true,
          { timeoutMs, attempts: attempt },
        )
      }

      const { response } = outcome
      if (!response.ok) {
        const errorText = await response.text()
        if (shouldRetryStatus(response.status) && attempt < totalAttempts) {
          await waitFn(250 * attempt)
          continue
        }

        if (response.status === 503) {
          throw new PipelineStageError(
            "adapter_unavailable",
            "Whisper local server is not ready. Please ensure the server is running.",
            true,
            { status: response.status, provider: "whisper_local" },
          )
        }

        throw httpFailure("Whisper local", response.status, errorText)
      }

      return await readTranscript(response, "whisper_local")
    } catch (error) {
      if (error instanceof PipelineStageError) throw error
      if (isAbortError(error)) throw error

      if (isNetworkFetchError(error)) {
        if (attempt < totalAttempts) {
          await waitFn(250 * attempt)
          continue
        }
        throw new PipelineStageError(
          "adapter_unavailable",
          `Cannot connect to Whisper local server at ${url}. Please start the Whisper local server.`,
          true,
          { provider: "whisper_local", url },
        )
      }

      throw error
    }
  }

  throw new PipelineStageError("transcription_failed", "Whisper local transcription failed after retries", true)
}

export class WhisperLocalTranscriber implements SpeechToText {
  readonly name = "whisper_local"

  constructor(private readonly options: WhisperLocalTranscriberOptions = {}) {}

  async transcribe(input: AudioInput, signal?: AbortSignal): Promise<string> {
    return transcribeWavBuffer(toWavPayload(input), input.filename ?? "audio.wav", this.options, signal)
  }
}
