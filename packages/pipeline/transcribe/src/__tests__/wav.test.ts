import assert from "node:assert/strict"
import test from "node:test"
import { isPipelineError } from "@pipeline-errors"
import { encodePcmWav, isWav, parseWavHeader } from "../core/wav.js"

test("parseWavHeader reads format and duration of an encoded payload", () => {
  // one second of 16-bit mono at 8 kHz
  const wav = encodePcmWav(Buffer.alloc(16_000), 8_000)
  assert.equal(isWav(wav), true)
  assert.deepEqual(parseWavHeader(wav), {
    sampleRateHz: 8_000,
    channels: 1,
    bitsPerSample: 16,
    dataBytes: 16_000,
    durationMs: 1000,
  })
})

test("parseWavHeader skips unknown chunks before data", () => {
  const wav = encodePcmWav(Buffer.alloc(4), 16_000)
  const list = Buffer.alloc(8 + 3 + 1)
  list.write("LIST", 0, "ascii")
  list.writeUInt32LE(3, 4)
  const withList = Buffer.concat([wav.subarray(0, 36), list, wav.subarray(36)])

  const info = parseWavHeader(withList)
  assert.equal(info.sampleRateHz, 16_000)
  assert.equal(info.dataBytes, 4)
})

test("parseWavHeader rejects non-WAV payloads", () => {
  assert.throws(
    () => parseWavHeader(Buffer.from("not a wav file at all")),
    (error: unknown) => isPipelineError(error) && error.code === "transcription_failed",
  )
})
