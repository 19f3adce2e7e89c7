import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { EntityManager } from 'typeorm';
import { AuditLogEntry } from '@repairflow/database';
import {
  AuditOperation,
  INVERSE_OPERATION,
  RepairEventType,
  RollbackAppliedEvent,
  RollbackResult,
  RowSnapshot,
} from '@repairflow/shared';
import { AuditStore, parseSnapshot } from '../audit/audit-store.service';
import { InvalidStateError, NoAuditHistoryError } from '../common/errors/repair.errors';
import { RepositoryRegistry } from '../persistence/repository.registry';
import { UnitOfWork } from '../persistence/unit-of-work.service';

/**
 * Single-step undo. Each call reverses whatever entry is newest at that moment
 * through the owning repository, so the reversal is itself audited and a
 * second call undoes the first.
 */
@Injectable()
export class RollbackCoordinator {
  private readonly logger = new Logger(RollbackCoordinator.name);

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly auditStore: AuditStore,
    private readonly registry: RepositoryRegistry,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async rollbackLast(tableName: string, recordId: string): Promise<RollbackResult> {
    const result = await this.unitOfWork.run('rollbackLast', async (manager) => {
      const entry = await this.auditStore.latestFor(tableName, recordId, manager);
      if (!entry) {
        throw new NoAuditHistoryError(tableName, recordId);
      }
      return this.reverse(manager, entry);
    });

    this.announce(result);
    return result;
  }

  async rollbackMostRecent(): Promise<RollbackResult> {
    const result = await this.unitOfWork.run('rollbackMostRecent', async (manager) => {
      const entry = await this.auditStore.latest(manager);
      if (!entry) {
        throw new NoAuditHistoryError();
      }
      return this.reverse(manager, entry);
    });

    this.announce(result);
    return result;
  }

  private async reverse(manager: EntityManager, entry: AuditLogEntry): Promise<RollbackResult> {
    const repository = this.registry.forTable(entry.tableName);
    if (!repository) {
      throw new InvalidStateError(`Rollback is not supported for table ${entry.tableName}`, {
        tableName: entry.tableName,
        recordId: entry.recordId,
        auditEntryId: entry.id,
      });
    }

    switch (entry.operation) {
      case AuditOperation.INSERT:
        await repository.delete(manager, entry.recordId);
        break;
      case AuditOperation.UPDATE:
        await repository.overwrite(manager, entry.recordId, this.previousState(entry));
        break;
      case AuditOperation.DELETE: {
        const snapshot = this.previousState(entry);
        if (snapshot[repository.primaryColumn] !== entry.recordId) {
          throw new InvalidStateError('Deleted snapshot does not match the audited record', {
            tableName: entry.tableName,
            recordId: entry.recordId,
            auditEntryId: entry.id,
          });
        }
        await repository.restore(manager, snapshot);
        break;
      }
    }

    const appliedOperation = INVERSE_OPERATION[entry.operation];
    return {
      message: `Rolled back ${entry.operation} on ${entry.tableName} record ${entry.recordId}`,
      tableName: entry.tableName,
      recordId: entry.recordId,
      reversedEntryId: entry.id,
      reversedOperation: entry.operation,
      appliedOperation,
    };
  }

  private previousState(entry: AuditLogEntry): RowSnapshot {
    let snapshot: RowSnapshot | null;
    try {
      snapshot = parseSnapshot(entry.oldData);
    } catch (error) {
      throw new InvalidStateError(`Audit entry ${entry.id} holds an unreadable snapshot`, {
        auditEntryId: entry.id,
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    if (!snapshot) {
      throw new InvalidStateError(`Audit entry ${entry.id} has no previous state to restore`, {
        auditEntryId: entry.id,
        operation: entry.operation,
      });
    }
    return snapshot;
  }

  private announce(result: RollbackResult): void {
    this.logger.log(result.message, {
      reversedEntryId: result.reversedEntryId,
      appliedOperation: result.appliedOperation,
    });
    const event: RollbackAppliedEvent = {
      tableName: result.tableName,
      recordId: result.recordId,
      reversedEntryId: result.reversedEntryId,
      appliedOperation: result.appliedOperation,
    };
    this.eventEmitter.emit(RepairEventType.ROLLBACK_APPLIED, event);
  }
}
