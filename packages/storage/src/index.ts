export * from "./types"
export type { ReadAccess, Row, TableMap, TableName, VersionedTable, WardStore, WardTransaction } from "./contracts"
export { TABLE_NAMES } from "./contracts"
export { MemoryWardStore } from "./memory-store"
export type { StagedWrite, StagedWrites } from "./memory-store"
export { PatientLocks } from "./patient-lock"
export { deepFreeze } from "./freeze"
export { clearAuditLog, exportAuditLog, getAuditEntries, MemoryAuditSink, setAuditSink, writeAuditEntry } from "./audit-log"
export type { AuditEntry, AuditEntryInput, AuditEventType, AuditFilter, AuditSink } from "./audit-log"
export { debugError, debugLog, debugLogPHI, debugWarn } from "./debug-logger"
