import { z } from "zod"
import { PipelineStageError, classifyHttpStatus } from "@pipeline-errors"
import type { AudioInput } from "@pipeline-shared"
import { debugWarn } from "@storage/debug-logger"
import { encodePcmWav, isWav, parseWavHeader } from "./wav"

const TranscriptionResponseSchema = z.object({ text: z.string().optional() })

function isLocalhost(hostname: string): boolean {
  return hostname === "localhost" || hostname === "127.0.0.1" || hostname === "::1" || hostname === "[::1]"
}

function parseUrl(url: string, serviceName: string): URL {
  try {
    return new URL(url)
  } catch {
    throw new PipelineStageError("configuration_error", `Invalid ${serviceName} URL: ${url}`, false)
  }
}

/**
 * Validate that external endpoints use HTTPS so PHI is encrypted in transit.
 */
export function validateHttpsUrl(url: string, serviceName: string): void {
  const parsed = parseUrl(url, serviceName)
  if (parsed.protocol !== "https:") {
    throw new PipelineStageError(
      "configuration_error",
      `SECURITY ERROR: ${serviceName} endpoint must use HTTPS. Received: ${parsed.protocol}//${parsed.host}`,
      false,
    )
  }
}

/**
 * For localhost connections, HTTPS is not required since data never leaves the machine.
 * Only validate HTTPS for remote endpoints.
 */
export function validateLocalOrHttpsUrl(url: string, serviceName: string, trustedHosts: string[] = []): void {
  const parsed = parseUrl(url, serviceName)
  const hostname = parsed.hostname.toLowerCase()
  if (!isLocalhost(hostname) && !trustedHosts.includes(hostname) && parsed.protocol !== "https:") {
    throw new PipelineStageError(
      "configuration_error",
      `SECURITY ERROR: ${serviceName} endpoint must use HTTPS or localhost. Received: ${parsed.protocol}//${parsed.host}`,
      false,
    )
  }
}

/**
 * Returns a WAV container for the input. WAV payloads are passed through (their header wins
 * over the declared rate); anything else is treated as 16-bit mono PCM at `sampleRateHz`.
 */
export function toWavPayload(input: AudioInput): Buffer {
  if (input.audio.length === 0) {
    throw new PipelineStageError("transcription_failed", "Audio payload is empty", false)
  }
  if (isWav(input.audio)) {
    const info = parseWavHeader(input.audio)
    if (info.sampleRateHz !== input.sampleRateHz) {
      debugWarn(`WAV header sample rate ${info.sampleRateHz}Hz differs from declared ${input.sampleRateHz}Hz`)
    }
    return input.audio
  }
  if (!Number.isInteger(input.sampleRateHz) || input.sampleRateHz <= 0) {
    throw new PipelineStageError("validation_error", `Invalid sample rate: ${input.sampleRateHz}`, false)
  }
  return encodePcmWav(input.audio, input.sampleRateHz)
}

export function buildTranscriptionForm(wav: Buffer, filename: string, fields: Record<string, string>): FormData {
  const formData = new FormData()
  const blob = new Blob([new Uint8Array(wav)], { type: "audio/wav" })
  formData.append("file", blob, filename)
  for (const [key, value] of Object.entries(fields)) {
    formData.append(key, value)
  }
  return formData
}

export function httpFailure(provider: string, status: number, errorText: string): PipelineStageError {
  const classified = classifyHttpStatus(status)
  const code = classified.code === "generation_failed" ? "transcription_failed" : classified.code
  return new PipelineStageError(code, `${provider} transcription failed (${status}): ${errorText}`, classified.recoverable, {
    status,
    provider,
  })
}

export async function readTranscript(response: Response, provider: string): Promise<string> {
  const parsed = TranscriptionResponseSchema.safeParse(await response.json().catch(() => null))
  if (!parsed.success) {
    throw new PipelineStageError("transcription_failed", `${provider} returned a malformed response`, true, { provider })
  }
  return parsed.data.text?.trim() ?? ""
}

/** Aborts on timeout or when the caller's signal fires; reports which one happened. */
export async function fetchWithTimeout(
  fetchFn: typeof fetch,
  timeoutMs: number,
  url: string,
  init: RequestInit,
  signal?: AbortSignal,
): Promise<{ response: Response } | { timedOut: true }> {
  const controller = new AbortController()
  let timedOut = false
  const timeout = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, timeoutMs)
  const onAbort = () => controller.abort()
  signal?.addEventListener("abort", onAbort, { once: true })
  try {
    return { response: await fetchFn(url, { ...init, signal: controller.signal }) }
  } catch (error) {
    if (timedOut) return { timedOut: true }
    throw error
  } finally {
    clearTimeout(timeout)
    signal?.removeEventListener("abort", onAbort)
  }
}
