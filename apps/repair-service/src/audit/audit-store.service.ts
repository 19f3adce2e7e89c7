import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource, EntityManager, FindOptionsWhere } from 'typeorm';
import { AuditLogEntry } from '@repairflow/database';
import { AuditQuery, AuditRecordInput, RowSnapshot, SnapshotValue } from '@repairflow/shared';
import { Clock, CLOCK } from '../common/clock/clock';

export const MAX_AUDIT_QUERY_LIMIT = 500;

@Injectable()
export class AuditStore {
  private readonly logger = new Logger(AuditStore.name);
  private readonly defaultLimit: number;

  constructor(
    private readonly dataSource: DataSource,
    private readonly configService: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.defaultLimit = this.configService.get<number>('AUDIT_QUERY_DEFAULT_LIMIT', 50);
  }

  /**
   * Appends one entry using the caller's transaction. A failure here must fail
   * the caller's write, so errors are logged and rethrown.
   */
  async record(manager: EntityManager, input: AuditRecordInput): Promise<AuditLogEntry> {
    const entry = manager.create(AuditLogEntry, {
      tableName: input.tableName,
      recordId: input.recordId,
      operation: input.operation,
      oldData: serializeSnapshot(input.oldData),
      newData: serializeSnapshot(input.newData),
      operatedAt: this.clock.now(),
    });

    try {
      return await manager.save(AuditLogEntry, entry);
    } catch (error) {
      this.logger.error(`Failed to append audit entry for ${input.tableName}/${input.recordId}`, {
        operation: input.operation,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Newest-first listing, optionally filtered. A limit that is not a finite
   * number falls back to the configured default; zero or less lists nothing.
   */
  async query(
    query: AuditQuery = {},
    manager: EntityManager = this.dataSource.manager,
  ): Promise<AuditLogEntry[]> {
    const requested =
      query.limit !== undefined && Number.isFinite(query.limit) ? query.limit : this.defaultLimit;
    const limit = Math.min(Math.floor(requested), MAX_AUDIT_QUERY_LIMIT);
    // take: 0 means no limit to TypeORM
    if (limit <= 0) {
      return [];
    }

    const where: FindOptionsWhere<AuditLogEntry> = {};
    if (query.tableName) where.tableName = query.tableName;
    if (query.operation) where.operation = query.operation;
    if (query.recordId) where.recordId = query.recordId;

    return manager.find(AuditLogEntry, {
      where,
      order: { id: 'DESC' },
      take: limit,
    });
  }

  async latestFor(
    tableName: string,
    recordId: string,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<AuditLogEntry | null> {
    return manager.findOne(AuditLogEntry, {
      where: { tableName, recordId },
      order: { id: 'DESC' },
    });
  }

  async latest(manager: EntityManager = this.dataSource.manager): Promise<AuditLogEntry | null> {
    const [entry] = await manager.find(AuditLogEntry, { order: { id: 'DESC' }, take: 1 });
    return entry ?? null;
  }
}

export function serializeSnapshot(snapshot: RowSnapshot | null | undefined): string | null {
  return snapshot ? JSON.stringify(snapshot) : null;
}

export function parseSnapshot(raw: string | null): RowSnapshot | null {
  if (raw === null) {
    return null;
  }

  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Audit snapshot is not an object');
  }

  const snapshot: RowSnapshot = {};
  for (const [key, value] of Object.entries(parsed)) {
    snapshot[key] = toSnapshotValue(value);
  }
  return snapshot;
}

export function toSnapshotValue(value: unknown): SnapshotValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}
