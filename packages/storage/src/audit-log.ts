import { debugError } from "./debug-logger"

export type AuditEventType =
  | "assessment.completed"
  | "assessment.failed"
  | "assessment.cancelled"
  | "request.transition"
  | "request.rejected"
  | "handover.generated"
  | "care_plan.generated"
  | "care_plan.updated"
  | "chat.answered"
  | "vitals.recorded"
  | "retrieval.indexed"

export interface AuditEntryInput {
  event_type: AuditEventType
  resource_id?: string
  success: boolean
  error_message?: string
  metadata?: Record<string, unknown>
}

export interface AuditEntry extends AuditEntryInput {
  id: string
  timestamp: string
}

export interface AuditSink {
  append(entry: AuditEntry): Promise<void>
  entries(): readonly AuditEntry[]
  clear(): void
}

export interface AuditFilter {
  event_type?: AuditEventType
  resource_id?: string
  success?: boolean
}

export const DEFAULT_AUDIT_LIMIT = 5000

/** Keeps the newest `limit` entries in memory. */
export class MemoryAuditSink implements AuditSink {
  private buffer: AuditEntry[] = []

  constructor(private readonly limit = DEFAULT_AUDIT_LIMIT) {}

  async append(entry: AuditEntry): Promise<void> {
    this.buffer.push(entry)
    if (this.buffer.length > this.limit) {
      this.buffer = this.buffer.slice(this.buffer.length - this.limit)
    }
  }

  entries(): readonly AuditEntry[] {
    return this.buffer
  }

  clear(): void {
    this.buffer = []
  }
}

let sink: AuditSink = new MemoryAuditSink()
let sequence = 0

export function setAuditSink(next: AuditSink): void {
  sink = next
}

/**
 * Append an audit entry. Never throws; sink failures are reported through debugError.
 */
export async function writeAuditEntry(input: AuditEntryInput): Promise<void> {
  sequence += 1
  const entry: AuditEntry = Object.freeze({
    ...input,
    metadata: input.metadata ? Object.freeze({ ...input.metadata }) : undefined,
    id: `audit-${Date.now()}-${sequence}`,
    timestamp: new Date().toISOString(),
  })
  try {
    await sink.append(entry)
  } catch (error) {
    debugError("Failed to write audit entry", entry.event_type, error instanceof Error ? error.message : String(error))
  }
}

export function getAuditEntries(filter: AuditFilter = {}): AuditEntry[] {
  return sink.entries().filter(
    (entry) =>
      (filter.event_type === undefined || entry.event_type === filter.event_type) &&
      (filter.resource_id === undefined || entry.resource_id === filter.resource_id) &&
      (filter.success === undefined || entry.success === filter.success),
  )
}

function csvCell(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

const CSV_COLUMNS = ["id", "timestamp", "event_type", "resource_id", "success", "error_message", "metadata"] as const

export function exportAuditLog(format: "json" | "csv", filter: AuditFilter = {}): string {
  const entries = getAuditEntries(filter)
  if (format === "json") {
    return JSON.stringify(entries, null, 2)
  }
  const lines = entries.map((entry) =>
    [
      entry.id,
      entry.timestamp,
      entry.event_type,
      entry.resource_id ?? "",
      String(entry.success),
      entry.error_message ?? "",
      entry.metadata ? JSON.stringify(entry.metadata) : "",
    ]
      .map(csvCell)
      .join(","),
  )
  return [CSV_COLUMNS.join(","), ...lines].join("\n")
}

export function clearAuditLog(): void {
  sink.clear()
}
