import { Logger } from '@nestjs/common';
import {
  DataSource,
  EntityManager,
  EntityMetadata,
  EntityTarget,
  FindOptionsWhere,
  ObjectLiteral,
  QueryFailedError,
} from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { AuditOperation, RowSnapshot } from '@repairflow/shared';
import { AuditStore, toSnapshotValue } from '../audit/audit-store.service';
import { Clock, IdGenerator } from '../common/clock/clock';
import { InvalidStateError, NotFoundError } from '../common/errors/repair.errors';

export interface AuditedRow extends ObjectLiteral {
  id: string;
}

// postgres unique_violation, better-sqlite3 unique/primary key constraint
const UNIQUE_VIOLATION_CODES = new Set([
  '23505',
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(driverError.code)
  );
}

/**
 * Typed CRUD over one table. Every write takes the caller's transaction
 * manager, changes the row first and then appends exactly one audit entry
 * through the same manager.
 */
export abstract class AuditedRepository<T extends AuditedRow> {
  protected readonly logger: Logger;

  protected constructor(
    protected readonly target: EntityTarget<T>,
    readonly entityLabel: string,
    protected readonly dataSource: DataSource,
    protected readonly auditStore: AuditStore,
    protected readonly ids: IdGenerator,
    protected readonly clock: Clock,
  ) {
    this.logger = new Logger(new.target.name);
  }

  get tableName(): string {
    return this.metadata.tableName;
  }

  /** Column name of the primary key as it appears in snapshots. */
  get primaryColumn(): string {
    const [primary] = this.metadata.primaryColumns;
    return primary.databaseName;
  }

  protected get metadata(): EntityMetadata {
    return this.dataSource.getMetadata(this.target);
  }

  async findById(id: string, manager: EntityManager = this.dataSource.manager): Promise<T | null> {
    return manager
      .createQueryBuilder(this.target, 'row')
      .where('row.id = :id', { id })
      .getOne();
  }

  async getById(id: string, manager: EntityManager = this.dataSource.manager): Promise<T> {
    const row = await this.findById(id, manager);
    if (!row) {
      throw new NotFoundError(this.entityLabel, id);
    }
    return row;
  }

  async insert(manager: EntityManager, row: T): Promise<T> {
    if (await this.findById(row.id, manager)) {
      throw new InvalidStateError(`${this.entityLabel} with ID ${row.id} already exists`, {
        table: this.tableName,
        id: row.id,
      });
    }

    await this.write(row.id, () => manager.save(this.target, row));
    const inserted = await this.getById(row.id, manager);

    await this.auditStore.record(manager, {
      tableName: this.tableName,
      recordId: row.id,
      operation: AuditOperation.INSERT,
      newData: this.toSnapshot(inserted),
    });
    return inserted;
  }

  /**
   * Applies `changes` to the row. With `condition` the write is a
   * compare-and-swap: it only lands if the row still matches, otherwise the
   * call fails with InvalidState and nothing is written.
   */
  async update(
    manager: EntityManager,
    id: string,
    changes: QueryDeepPartialEntity<T>,
    condition?: FindOptionsWhere<T>,
  ): Promise<T> {
    const before = await this.getById(id, manager);

    const result = await this.write(id, () =>
      manager.update(this.target, condition ?? id, changes),
    );
    if (!result.affected) {
      throw new InvalidStateError(`${this.entityLabel} with ID ${id} changed concurrently`, {
        table: this.tableName,
        id,
      });
    }

    const after = await this.getById(id, manager);
    await this.auditStore.record(manager, {
      tableName: this.tableName,
      recordId: id,
      operation: AuditOperation.UPDATE,
      oldData: this.toSnapshot(before),
      newData: this.toSnapshot(after),
    });
    return after;
  }

  async delete(manager: EntityManager, id: string): Promise<T> {
    const before = await this.getById(id, manager);

    await manager.delete(this.target, id);
    await this.auditStore.record(manager, {
      tableName: this.tableName,
      recordId: id,
      operation: AuditOperation.DELETE,
      oldData: this.toSnapshot(before),
    });
    return before;
  }

  /** Replaces every column of an existing row with the snapshot's values. */
  async overwrite(manager: EntityManager, id: string, snapshot: RowSnapshot): Promise<T> {
    const before = await this.getById(id, manager);
    const replacement = this.fromSnapshot(snapshot);
    if (replacement.id !== id) {
      throw new InvalidStateError(`Snapshot does not belong to ${this.entityLabel} ${id}`, {
        table: this.tableName,
        id,
      });
    }

    await this.guardRestore(manager, replacement);
    await this.write(id, () => manager.save(this.target, replacement));
    const after = await this.getById(id, manager);

    await this.auditStore.record(manager, {
      tableName: this.tableName,
      recordId: id,
      operation: AuditOperation.UPDATE,
      oldData: this.toSnapshot(before),
      newData: this.toSnapshot(after),
    });
    return after;
  }

  /** Reinserts a deleted row exactly as the snapshot describes it. */
  async restore(manager: EntityManager, snapshot: RowSnapshot): Promise<T> {
    const row = this.fromSnapshot(snapshot);
    await this.guardRestore(manager, row);
    return this.insert(manager, row);
  }

  toSnapshot(row: T): RowSnapshot {
    const snapshot: RowSnapshot = {};
    for (const column of this.metadata.columns) {
      snapshot[column.databaseName] = toSnapshotValue(column.getEntityValue(row));
    }
    return snapshot;
  }

  fromSnapshot(snapshot: RowSnapshot): T {
    const row = this.dataSource.manager.create(this.target);
    for (const column of this.metadata.columns) {
      if (!(column.databaseName in snapshot)) {
        throw new InvalidStateError(
          `Snapshot for ${this.tableName} is missing column ${column.databaseName}`,
          { table: this.tableName, column: column.databaseName },
        );
      }
      column.setEntityValue(row, snapshot[column.databaseName]);
    }
    return row;
  }

  /**
   * Runs before `overwrite` and `restore` put a historical row back. Tables
   * with cross-row invariants override it and throw InvalidState.
   */
  protected async guardRestore(_manager: EntityManager, _row: T): Promise<void> {
    return;
  }

  /** Unique violations surface as InvalidState. */
  private async write<R>(id: string, statement: () => Promise<R>): Promise<R> {
    try {
      return await statement();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new InvalidStateError(`${this.entityLabel} with ID ${id} conflicts with an existing row`, {
          table: this.tableName,
          id,
        });
      }
      throw error;
    }
  }

  protected newId(): string {
    return this.ids.nextId();
  }

  protected now(): string {
    return this.clock.now();
  }
}
