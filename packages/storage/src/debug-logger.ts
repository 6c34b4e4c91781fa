/**
 * Debug logging utility that gates PHI-sensitive console output behind an environment flag.
 *
 * NEVER use console.log directly for narrative, transcripts or assessment text. Use these functions instead.
 *
 * @example
 * debugLog("assessment narrative", narrative.length, "chars") // Safe: only logs length
 * debugLogPHI("narrative:", narrative) // Gated: only in dev with WARD_ENABLE_PHI_DEBUG_LOGS=true
 */

const isDevelopment = (): boolean => process.env.NODE_ENV === "development"

const isPhiDebugEnabled = (): boolean => process.env.WARD_ENABLE_PHI_DEBUG_LOGS === "true"

/**
 * Log non-PHI debug information: ids, counts, lengths, latencies, stage status.
 */
export function debugLog(...args: unknown[]): void {
  if (isDevelopment()) {
    console.log(...args)
  }
}

/**
 * Log PHI-sensitive information (narratives, transcripts, draft text).
 * Only logs when WARD_ENABLE_PHI_DEBUG_LOGS=true AND in development mode.
 */
export function debugLogPHI(...args: unknown[]): void {
  if (isDevelopment() && isPhiDebugEnabled()) {
    console.log("[PHI DEBUG]", ...args)
  }
}

export function debugError(...args: unknown[]): void {
  console.error(...args)
}

export function debugWarn(...args: unknown[]): void {
  console.warn(...args)
}
