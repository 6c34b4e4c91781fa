import assert from "node:assert/strict"
import test from "node:test"
import { isPipelineError } from "@pipeline-errors"
import { createTranscriber, resolveTranscriptionProvider } from "../providers/provider-resolver.js"
import { transcribeWavBuffer as transcribeWithWhisperLocal, WhisperLocalTranscriber } from "../providers/whisper-local-transcriber.js"
import { transcribeWavBuffer as transcribeWithWhisper } from "../providers/whisper-transcriber.js"
import { MedASRTranscriber } from "../providers/medasr-transcriber.js"

test("resolveTranscriptionProvider defaults to whisper_local with tiny.en model", () => {
  const resolved = resolveTranscriptionProvider({})
  assert.equal(resolved.provider, "whisper_local")
  assert.equal(resolved.model, "tiny.en")
})

test("resolveTranscriptionProvider supports explicit provider aliases", () => {
  assert.equal(resolveTranscriptionProvider({ TRANSCRIPTION_PROVIDER: "medasr" }).provider, "medasr")
  assert.equal(resolveTranscriptionProvider({ TRANSCRIPTION_PROVIDER: "openai" }).provider, "whisper_openai")
  assert.equal(resolveTranscriptionProvider({ TRANSCRIPTION_PROVIDER: "whisper_openai" }).provider, "whisper_openai")
  assert.equal(resolveTranscriptionProvider({ TRANSCRIPTION_PROVIDER: "whisper_local" }).provider, "whisper_local")
})

test("createTranscriber builds the resolved provider", () => {
  assert.equal(createTranscriber({ provider: "medasr", model: "medasr" }).name, "medasr")
  assert.equal(createTranscriber({ provider: "whisper_local", model: "base" }).name, "whisper_local")
})

test("whisper local transcriber retries transient failures and returns text", async () => {
  const waitCalls: number[] = []
  let attempts = 0
  const fetchFn: typeof fetch = async () => {
    attempts += 1
    if (attempts < 3) {
      return new Response("server busy", { status: 503 })
    }
    return new Response(JSON.stringify({ text: " final transcript " }), { status: 200 })
  }

  const text = await transcribeWithWhisperLocal(Buffer.from([1, 2, 3]), "segment.wav", {
    fetchFn,
    waitFn: async (ms) => {
      waitCalls.push(ms)
    },
    timeoutMs: 10_000,
    maxRetries: 3,
    baseUrl: "http://127.0.0.1:8002/v1/audio/transcriptions",
  })

  assert.equal(text, "final transcript")
  assert.equal(attempts, 3)
  assert.deepEqual(waitCalls, [250, 500])
})

test("whisper local transcriber reports an unreachable server as adapter_unavailable", async () => {
  const fetchFn: typeof fetch = async () => {
    throw new TypeError("fetch failed")
  }

  await assert.rejects(
    () =>
      transcribeWithWhisperLocal(Buffer.from([1, 2, 3]), "segment.wav", {
        fetchFn,
        waitFn: async () => {
          // no-op
        },
        timeoutMs: 10_000,
        maxRetries: 1,
      }),
    (error: unknown) =>
      isPipelineError(error) && error.code === "adapter_unavailable" && /Cannot connect to Whisper local server/.test(error.message),
  )
})

test("whisper local transcriber maps a client error to transcription_failed", async () => {
  const fetchFn: typeof fetch = async () => new Response("unsupported codec", { status: 415 })

  await assert.rejects(
    () => transcribeWithWhisperLocal(Buffer.from([1]), "segment.wav", { fetchFn, maxRetries: 0 }),
    (error: unknown) => isPipelineError(error) && error.code === "transcription_failed",
  )
})

test("whisper local transcriber times out as adapter_timeout after the last attempt", async () => {
  const fetchFn: typeof fetch = (_url, init) =>
    new Promise((_resolve, reject) => {
      init?.signal?.addEventListener("abort", () => {
        const abort = new Error("aborted")
        abort.name = "AbortError"
        reject(abort)
      })
    })

  await assert.rejects(
    () => transcribeWithWhisperLocal(Buffer.from([1]), "segment.wav", { fetchFn, maxRetries: 0, timeoutMs: 5 }),
    (error: unknown) => isPipelineError(error) && error.code === "adapter_timeout",
  )
})

test("hosted whisper refuses plain HTTP endpoints", async () => {
  await assert.rejects(
    () => transcribeWithWhisper(Buffer.from([1]), "a.wav", { url: "http://example.test/v1", apiKey: "test-secret" }),
    (error: unknown) => isPipelineError(error) && error.code === "configuration_error" && !error.recoverable,
  )
})

test("medasr refuses remote plain HTTP endpoints", async () => {
  const transcriber = new MedASRTranscriber({ baseUrl: "http://asr.example.test/v1/audio/transcriptions" })
  await assert.rejects(
    () => transcriber.transcribe({ audio: Buffer.from([0, 0, 1, 0]), sampleRateHz: 16_000 }),
    (error: unknown) => isPipelineError(error) && error.code === "configuration_error",
  )
})

test("raw PCM input is wrapped in a WAV container before upload", async () => {
  const uploads: Blob[] = []
  const fetchFn: typeof fetch = async (_url, init) => {
    const body = init?.body
    if (body instanceof FormData) {
      const file = body.get("file")
      if (file instanceof Blob) uploads.push(file)
    }
    return new Response(JSON.stringify({ text: "ok" }), { status: 200 })
  }
  const transcriber = new WhisperLocalTranscriber({ fetchFn, maxRetries: 0 })

  const text = await transcriber.transcribe({ audio: Buffer.alloc(32), sampleRateHz: 16_000 })
  assert.equal(text, "ok")
  const [uploaded] = uploads
  assert.ok(uploaded)
  const bytes = Buffer.from(await uploaded.arrayBuffer())
  assert.equal(bytes.toString("ascii", 0, 4), "RIFF")
  assert.equal(bytes.readUInt32LE(24), 16_000)
  assert.equal(bytes.length, 44 + 32)
})

test("empty audio fails before any request", async () => {
  let called = false
  const transcriber = new WhisperLocalTranscriber({
    fetchFn: async () => {
      called = true
      return new Response("{}")
    },
  })
  await assert.rejects(
    () => transcriber.transcribe({ audio: Buffer.alloc(0), sampleRateHz: 16_000 }),
    (error: unknown) => isPipelineError(error) && error.code === "transcription_failed",
  )
  assert.equal(called, false)
})
