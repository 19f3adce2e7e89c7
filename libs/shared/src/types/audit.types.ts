import { AuditOperation } from '../enums/audit-operation.enum';

export type SnapshotValue = string | number | boolean | null;

/** Column name to value map of one row at one point in time. */
export type RowSnapshot = Record<string, SnapshotValue>;

export interface AuditRecordInput {
  tableName: string;
  recordId: string;
  operation: AuditOperation;
  oldData?: RowSnapshot | null;
  newData?: RowSnapshot | null;
}

export interface AuditQuery {
  tableName?: string;
  operation?: AuditOperation;
  recordId?: string;
  limit?: number;
}

export interface RollbackResult {
  message: string;
  tableName: string;
  recordId: string;
  reversedEntryId: number;
  reversedOperation: AuditOperation;
  appliedOperation: AuditOperation;
}

/** The write that undoes a recorded operation. */
export const INVERSE_OPERATION: Record<AuditOperation, AuditOperation> = {
  [AuditOperation.INSERT]: AuditOperation.DELETE,
  [AuditOperation.UPDATE]: AuditOperation.UPDATE,
  [AuditOperation.DELETE]: AuditOperation.INSERT,
};
