import { PipelineStageError } from "@pipeline-errors"
import type { ReadAccess, Row, TableMap, TableName, VersionedTable, WardStore, WardTransaction } from "./contracts"
import { TABLE_NAMES } from "./contracts"
import { deepFreeze } from "./freeze"
import { PatientLocks } from "./patient-lock"

type Tables = { [K in TableName]: Map<string, Row<K>> }

export interface StagedWrite<T extends TableName> {
  row: Row<T>
  /** null for a create, otherwise the committed version the write was based on. */
  baseVersion: number | null
}

export type StagedWrites = { [K in TableName]: Map<string, StagedWrite<K>> }

function emptyTables(): Tables {
  return {
    patients: new Map(),
    staff: new Map(),
    requests: new Map(),
    assessments: new Map(),
    handovers: new Map(),
    carePlans: new Map(),
    vitals: new Map(),
    attachments: new Map(),
  }
}

function emptyStaged(): StagedWrites {
  return {
    patients: new Map(),
    staff: new Map(),
    requests: new Map(),
    assessments: new Map(),
    handovers: new Map(),
    carePlans: new Map(),
    vitals: new Map(),
    attachments: new Map(),
  }
}

function rowId(row: { id: string }): string {
  return row.id
}

function conflict(message: string, details: Record<string, unknown>): PipelineStageError {
  return new PipelineStageError("persistence_conflict", message, true, details)
}

class MemoryTransaction implements WardTransaction {
  readonly staged = emptyStaged()
  private open = true

  constructor(private readonly committed: ReadAccess & { snapshot<T extends TableName>(table: T): ReadonlyMap<string, Row<T>> }) {}

  close(): void {
    this.open = false
  }

  private assertOpen(): void {
    if (!this.open) {
      throw new PipelineStageError("persistence_conflict", "Transaction is no longer open", false)
    }
  }

  private current<T extends TableName>(table: T, id: string): Row<T> | undefined {
    const staged = this.staged[table].get(id)
    if (staged) return staged.row
    return this.committed.snapshot(table).get(id)
  }

  async read<T extends TableName>(table: T, id: string): Promise<Row<T> | null> {
    this.assertOpen()
    return this.current(table, id) ?? null
  }

  async list<T extends TableName>(table: T, filter?: (row: Row<T>) => boolean): Promise<Row<T>[]> {
    this.assertOpen()
    const merged = new Map(this.committed.snapshot(table))
    for (const [id, write] of this.staged[table]) {
      merged.set(id, write.row)
    }
    const rows = [...merged.values()]
    return filter ? rows.filter(filter) : rows
  }

  async create<T extends TableName>(table: T, row: TableMap[T]): Promise<void> {
    this.assertOpen()
    const id = rowId(row)
    if (this.current(table, id)) {
      throw conflict(`${table} row ${id} already exists`, { table, id })
    }
    this.staged[table].set(id, { row: deepFreeze(row), baseVersion: null })
  }

  async update<T extends VersionedTable>(table: T, row: TableMap[T], expectedVersion: number): Promise<void> {
    this.assertOpen()
    const id = rowId(row)
    const existing = this.current(table, id)
    if (!existing) {
      throw new PipelineStageError("not_found", `${table} row ${id} does not exist`, false, { table, id })
    }
    const actual = existing.version
    if (actual !== expectedVersion) {
      throw conflict(`${table} row ${id} changed concurrently`, { table, id, expectedVersion, actualVersion: actual })
    }
    const previous = this.staged[table].get(id)
    const baseVersion = previous ? previous.baseVersion : expectedVersion
    const next: TableMap[T] = { ...row, version: expectedVersion + 1 }
    this.staged[table].set(id, { row: deepFreeze(next), baseVersion })
  }
}

/**
 * In-process WardStore. Transactions stage their writes and apply them in a single synchronous
 * step on commit, after re-checking every base version against committed state.
 */
export class MemoryWardStore implements WardStore {
  private tables: Tables = emptyTables()
  private readonly locks = new PatientLocks()

  snapshot<T extends TableName>(table: T): ReadonlyMap<string, Row<T>> {
    return this.tables[table]
  }

  async read<T extends TableName>(table: T, id: string): Promise<Row<T> | null> {
    return this.tables[table].get(id) ?? null
  }

  async list<T extends TableName>(table: T, filter?: (row: Row<T>) => boolean): Promise<Row<T>[]> {
    const rows = [...this.tables[table].values()]
    return filter ? rows.filter(filter) : rows
  }

  async transaction<R>(fn: (tx: WardTransaction) => Promise<R>): Promise<R> {
    const tx = new MemoryTransaction(this)
    try {
      const result = await fn(tx)
      tx.close()
      await this.commit(tx.staged)
      return result
    } finally {
      tx.close()
    }
  }

  withPatientLock<R>(patientId: string, fn: () => Promise<R>): Promise<R> {
    return this.locks.run(patientId, fn)
  }

  /**
   * Validates and applies staged writes. Either every write lands or none does.
   */
  protected async commit(staged: StagedWrites): Promise<void> {
    for (const table of TABLE_NAMES) {
      this.validateTable(table, staged)
    }
    const next = { ...this.tables }
    for (const table of TABLE_NAMES) {
      this.applyTable(next, table, staged)
    }
    this.tables = next
  }

  private validateTable<T extends TableName>(table: T, staged: StagedWrites): void {
    const committed = this.tables[table]
    for (const [id, write] of staged[table]) {
      const existing = committed.get(id)
      if (write.baseVersion === null) {
        if (existing) {
          throw conflict(`${table} row ${id} already exists`, { table, id })
        }
        continue
      }
      const actual = existing && "version" in existing ? existing.version : null
      if (actual !== write.baseVersion) {
        throw conflict(`${table} row ${id} changed concurrently`, {
          table,
          id,
          expectedVersion: write.baseVersion,
          actualVersion: actual,
        })
      }
    }
  }

  private applyTable<T extends TableName>(target: { [K in T]: Map<string, Row<K>> }, table: T, staged: StagedWrites): void {
    const writes = staged[table]
    if (writes.size === 0) return
    const copy = new Map(this.tables[table])
    for (const [id, write] of writes) {
      copy.set(id, write.row)
    }
    target[table] = copy
  }
}
