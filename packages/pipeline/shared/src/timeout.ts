import { PipelineStageError, cancelledError } from "./error"

export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw cancelledError(stage)
  }
}

/**
 * Runs one adapter call with a bounded timeout. The callee gets its own signal, aborted on
 * timeout or when the caller's signal fires. Adapters that ignore the signal are raced.
 */
export async function callWithTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  throwIfCancelled(parent, label)

  const controller = new AbortController()
  let rejectAbort: (error: Error) => void = () => undefined
  const aborted = new Promise<never>((_, reject) => {
    rejectAbort = reject
  })

  const onParentAbort = () => {
    rejectAbort(cancelledError(label))
    controller.abort()
  }
  parent?.addEventListener("abort", onParentAbort, { once: true })

  const timer = setTimeout(() => {
    rejectAbort(new PipelineStageError("adapter_timeout", `${label} timed out after ${timeoutMs}ms`, true, { timeoutMs }))
    controller.abort()
  }, timeoutMs)

  try {
    return await Promise.race([fn(controller.signal), aborted])
  } finally {
    clearTimeout(timer)
    parent?.removeEventListener("abort", onParentAbort)
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")
}

export function isNetworkFetchError(error: unknown): boolean {
  return error instanceof TypeError && error.message.toLowerCase().includes("fetch")
}
