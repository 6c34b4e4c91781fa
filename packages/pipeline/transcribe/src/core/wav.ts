import { PipelineStageError } from "@pipeline-errors"

export interface WavInfo {
  sampleRateHz: number
  channels: number
  bitsPerSample: number
  dataBytes: number
  durationMs: number
}

const RIFF_HEADER_BYTES = 12
const CHUNK_HEADER_BYTES = 8

function malformed(reason: string): PipelineStageError {
  return new PipelineStageError("transcription_failed", `Invalid WAV payload: ${reason}`, false, { reason })
}

export function isWav(buffer: Buffer): boolean {
  return (
    buffer.length >= RIFF_HEADER_BYTES &&
    buffer.toString("ascii", 0, 4) === "RIFF" &&
    buffer.toString("ascii", 8, 12) === "WAVE"
  )
}

/**
 * Walks the RIFF chunk list and returns the format of the first `fmt ` chunk together with the
 * size of the `data` chunk. Chunk bodies are word-aligned.
 */
export function parseWavHeader(buffer: Buffer): WavInfo {
  if (!isWav(buffer)) {
    throw malformed("missing RIFF/WAVE header")
  }

  let offset = RIFF_HEADER_BYTES
  let format: { channels: number; sampleRateHz: number; byteRate: number; bitsPerSample: number } | null = null
  let dataBytes: number | null = null

  while (offset + CHUNK_HEADER_BYTES <= buffer.length) {
    const id = buffer.toString("ascii", offset, offset + 4)
    const size = buffer.readUInt32LE(offset + 4)
    const body = offset + CHUNK_HEADER_BYTES

    if (id === "fmt ") {
      if (size < 16 || body + 16 > buffer.length) throw malformed("truncated fmt chunk")
      format = {
        channels: buffer.readUInt16LE(body + 2),
        sampleRateHz: buffer.readUInt32LE(body + 4),
        byteRate: buffer.readUInt32LE(body + 8),
        bitsPerSample: buffer.readUInt16LE(body + 14),
      }
    } else if (id === "data") {
      dataBytes = Math.min(size, buffer.length - body)
      break
    }

    offset = body + size + (size % 2)
  }

  if (!format) throw malformed("missing fmt chunk")
  if (dataBytes === null) throw malformed("missing data chunk")
  if (format.sampleRateHz <= 0 || format.channels <= 0) throw malformed("zero sample rate or channel count")

  return {
    sampleRateHz: format.sampleRateHz,
    channels: format.channels,
    bitsPerSample: format.bitsPerSample,
    dataBytes,
    durationMs: format.byteRate > 0 ? Math.round((dataBytes / format.byteRate) * 1000) : 0,
  }
}

/** Wraps raw little-endian PCM samples in a minimal WAV container. */
export function encodePcmWav(pcm: Buffer, sampleRateHz: number, channels = 1, bitsPerSample = 16): Buffer {
  const blockAlign = (channels * bitsPerSample) / 8
  const header = Buffer.alloc(44)
  header.write("RIFF", 0, "ascii")
  header.writeUInt32LE(36 + pcm.length, 4)
  header.write("WAVE", 8, "ascii")
  header.write("fmt ", 12, "ascii")
  header.writeUInt32LE(16, 16)
  header.writeUInt16LE(1, 20)
  header.writeUInt16LE(channels, 22)
  header.writeUInt32LE(sampleRateHz, 24)
  header.writeUInt32LE(sampleRateHz * blockAlign, 28)
  header.writeUInt16LE(blockAlign, 32)
  header.writeUInt16LE(bitsPerSample, 34)
  header.write("data", 36, "ascii")
  header.writeUInt32LE(pcm.length, 40)
  return Buffer.concat([header, pcm])
}
