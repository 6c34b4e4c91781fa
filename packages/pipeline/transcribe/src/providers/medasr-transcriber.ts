import { PipelineStageError } from "@pipeline-errors"
import { isAbortError, isNetworkFetchError } from "@pipeline-shared"
import type { AudioInput, SpeechToText } from "@pipeline-shared"
import {
  buildTranscriptionForm,
  fetchWithTimeout,
  httpFailure,
  readTranscript,
  toWavPayload,
  validateLocalOrHttpsUrl,
} from "../core/endpoint"

/**
 * MedASR Local Transcriber
 *
 * Transcribes audio using a local MedASR server exposing the OpenAI transcription route.
 * The server expects 16 kHz mono audio.
 */

const DEFAULT_MEDASR_URL = "http://127.0.0.1:8001/v1/audio/transcriptions"
const DEFAULT_TIMEOUT_MS = 60_000

export interface MedASRTranscriberOptions {
  baseUrl?: string
  timeoutMs?: number
  fetchFn?: typeof fetch
}

export async function transcribeWavBuffer(
  buffer: Buffer,
  filename: string,
  options: MedASRTranscriberOptions = {},
  signal?: AbortSignal,
): Promise<string> {
  const url = options.baseUrl || process.env.MEDASR_URL || DEFAULT_MEDASR_URL
  const fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis)

  // Validate URL (localhost is OK, remote must be HTTPS)
  validateLocalOrHttpsUrl(url, "MedASR API")

  let outcome: Awaited<ReturnType<typeof fetchWithTimeout>>
  try {
    outcome = await fetchWithTimeout(
      fetchFn,
      options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      url,
      { method: "POST", body: buildTranscriptionForm(buffer, filename, { model: "medasr", response_format: "json" }) },
      signal,
    )
  } catch (error) {
    if (isNetworkFetchError(error) && !isAbortError(error)) {
      throw new PipelineStageError(
        "adapter_unavailable",
        `Cannot connect to MedASR server at ${url}. Please start the MedASR server.`,
        true,
        { provider: "medasr", url },
      )
    }
    throw error
  }

  if ("timedOut" in outcome) {
    throw new PipelineStageError("adapter_timeout", "MedASR request timed out", true, { provider: "medasr" })
  }

  const { response } = outcome
  if (!response.ok) {
    const errorText = await response.text()
    if (response.status === 503) {
      throw new PipelineStageError(
        "adapter_unavailable",
        "MedASR server is not ready. Please ensure the server is running.",
        true,
        { status: response.status, provider: "medasr" },
      )
    }
    throw httpFailure("MedASR", response.status, errorText)
  }

  return readTranscript(response, "medasr")
}

export class MedASRTranscriber implements SpeechToText {
  readonly name = "medasr"

  constructor(private readonly options: MedASRTranscriberOptions = {}) {}

  async transcribe(input: AudioInput, signal?: AbortSignal): Promise<string> {
    return transcribeWavBuffer(toWavPayload(input), input.filename ?? "audio.wav", this.options, signal)
  }
}
