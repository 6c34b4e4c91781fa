import assert from "node:assert/strict"
import test from "node:test"
import { isPipelineError, lengthSideOf } from "@pipeline-errors"
import { MedGemmaGenerator, runMedGemmaRequest } from "../index.js"

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } })
}

test("runMedGemmaRequest throws when system is missing", async () => {
  await assert.rejects(() => runMedGemmaRequest({ system: "", prompt: "hello" }), /system is required/i)
})

test("runMedGemmaRequest throws when prompt is missing", async () => {
  await assert.rejects(() => runMedGemmaRequest({ system: "sys", prompt: "" }), /prompt is required/i)
})

test("runMedGemmaRequest calls local endpoint", async () => {
  const captured: { url?: string; body?: string } = {}
  const fetchFn: typeof fetch = async (url, init) => {
    captured.url = String(url)
    captured.body = String(init?.body)
    return jsonResponse({ choices: [{ message: { content: "ok" }, finish_reason: "stop" }] })
  }

  const result = await runMedGemmaRequest({
    system: "sys",
    prompt: "hello",
    baseUrl: "http://127.0.0.1:8080/",
    model: "medgemma-1.5-4b-it",
    maxTokens: 192,
    fetchFn,
  })

  assert.equal(result, "ok")
  assert.equal(captured.url, "http://127.0.0.1:8080/v1/chat/completions")
  const body = JSON.parse(captured.body ?? "{}")
  assert.equal(body.model, "medgemma-1.5-4b-it")
  assert.equal(body.max_tokens, 192)
  assert.equal(body.messages[0].role, "system")
  assert.equal(body.messages[1].content, "hello")
})

test("images are sent as data URLs ahead of the prompt", async () => {
  let body: { messages: Array<{ content: unknown }> } = { messages: [] }
  const fetchFn: typeof fetch = async (_url, init) => {
    body = JSON.parse(String(init?.body))
    return jsonResponse({ choices: [{ message: { content: "{}" } }] })
  }

  await runMedGemmaRequest({
    system: "sys",
    prompt: "describe",
    images: [{ image: Buffer.from("hi"), mimeType: "image/jpeg" }],
    fetchFn,
  })

  assert.deepEqual(body.messages[1]?.content, [
    { type: "image_url", image_url: { url: "data:image/jpeg;base64,aGk=" } },
    { type: "text", text: "describe" },
  ])
})

test("finish_reason length becomes output-side length_exceeded", async () => {
  const generator = new MedGemmaGenerator({
    fetchFn: async () => jsonResponse({ choices: [{ message: { content: "{\"imp" }, finish_reason: "length" }] }),
  })

  await assert.rejects(generator.generate({ system: "s", prompt: "p", maxOutputTokens: 64 }), (error: unknown) => {
    assert.ok(isPipelineError(error))
    assert.equal(error.code, "length_exceeded")
    assert.equal(lengthSideOf(error), "output")
    return true
  })
})

test("transient HTTP status maps to adapter_unavailable", async () => {
  const generator = new MedGemmaGenerator({ fetchFn: async () => new Response("busy", { status: 503 }) })

  await assert.rejects(
    generator.generate({ system: "s", prompt: "p", maxOutputTokens: 64 }),
    (error: unknown) => isPipelineError(error) && error.code === "adapter_unavailable" && error.recoverable,
  )
})

test("unreachable server maps to adapter_unavailable", async () => {
  const generator = new MedGemmaGenerator({
    fetchFn: async () => {
      throw new TypeError("fetch failed")
    },
  })

  await assert.rejects(
    generator.generate({ system: "s", prompt: "p", maxOutputTokens: 64 }),
    (error: unknown) => isPipelineError(error) && error.code === "adapter_unavailable",
  )
})

test("malformed body is a recoverable generation failure", async () => {
  const generator = new MedGemmaGenerator({ fetchFn: async () => jsonResponse({ choices: [] }) })

  await assert.rejects(
    generator.generate({ system: "s", prompt: "p", maxOutputTokens: 64 }),
    (error: unknown) => isPipelineError(error) && error.code === "generation_failed" && error.recoverable,
  )
})
