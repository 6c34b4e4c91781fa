import type {
  Assessment,
  Attachment,
  CarePlan,
  HandoverSummary,
  Patient,
  StaffMember,
  VitalsRecord,
  WardRequest,
} from "./types"

export interface TableMap {
  patients: Patient
  staff: StaffMember
  requests: WardRequest
  assessments: Assessment
  handovers: HandoverSummary
  carePlans: CarePlan
  vitals: VitalsRecord
  attachments: Attachment
}

export type TableName = keyof TableMap

export const TABLE_NAMES: readonly TableName[] = [
  "patients",
  "staff",
  "requests",
  "assessments",
  "handovers",
  "carePlans",
  "vitals",
  "attachments",
]

/** Tables whose rows carry a version counter and may be updated in place. */
export type VersionedTable = "patients" | "requests" | "carePlans"

export type Row<T extends TableName> = Readonly<TableMap[T]>

export interface ReadAccess {
  read<T extends TableName>(table: T, id: string): Promise<Row<T> | null>
  list<T extends TableName>(table: T, filter?: (row: Row<T>) => boolean): Promise<Row<T>[]>
}

export interface WardTransaction extends ReadAccess {
  /** Throws persistence_conflict when the id already exists. */
  create<T extends TableName>(table: T, row: TableMap[T]): Promise<void>
  /**
   * Writes `row` with version expectedVersion + 1. Throws persistence_conflict when the stored
   * version is not expectedVersion.
   */
  update<T extends VersionedTable>(table: T, row: TableMap[T], expectedVersion: number): Promise<void>
}

export interface WardStore extends ReadAccess {
  /** Staged writes apply atomically when fn resolves; nothing applies when it throws. */
  transaction<R>(fn: (tx: WardTransaction) => Promise<R>): Promise<R>
  /** Per-patient advisory lock, FIFO among waiters. */
  withPatientLock<R>(patientId: string, fn: () => Promise<R>): Promise<R>
}
