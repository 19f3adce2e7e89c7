import { TestingModule } from '@nestjs/testing';
import { AuditOperation } from '@repairflow/shared';
import { UnitOfWork } from '../persistence/unit-of-work.service';
import { createRepairTestingModule } from '../testing/repair-testing.module';
import {
  AuditStore,
  parseSnapshot,
  serializeSnapshot,
  toSnapshotValue,
} from './audit-store.service';

describe('AuditStore', () => {
  let module: TestingModule;
  let auditStore: AuditStore;
  let unitOfWork: UnitOfWork;

  beforeEach(async () => {
    ({ module } = await createRepairTestingModule());
    auditStore = module.get(AuditStore);
    unitOfWork = module.get(UnitOfWork);

    await unitOfWork.run('seed', async (manager) => {
      await auditStore.record(manager, {
        tableName: 'vehicle',
        recordId: 'vehicle-1',
        operation: AuditOperation.INSERT,
        newData: { vehicle_id: 'vehicle-1' },
      });
      await auditStore.record(manager, {
        tableName: 'repair_order',
        recordId: 'order-1',
        operation: AuditOperation.INSERT,
        newData: { order_id: 'order-1' },
      });
      await auditStore.record(manager, {
        tableName: 'vehicle',
        recordId: 'vehicle-1',
        operation: AuditOperation.DELETE,
        oldData: { vehicle_id: 'vehicle-1' },
      });
    });
  });

  afterEach(async () => {
    await module.close();
  });

  describe('record', () => {
    it('should stamp entries with the clock and serialize snapshots', async () => {
      const [latest] = await auditStore.query({ limit: 1 });

      expect(latest).toMatchObject({
        tableName: 'vehicle',
        recordId: 'vehicle-1',
        operation: AuditOperation.DELETE,
        oldData: '{"vehicle_id":"vehicle-1"}',
        newData: null,
        operatedAt: '2024-03-01T08:02:00.000Z',
      });
    });
  });

  describe('query', () => {
    it('should list newest first', async () => {
      const entries = await auditStore.query();

      expect(entries.map((entry) => entry.recordId)).toEqual(['vehicle-1', 'order-1', 'vehicle-1']);
      expect(entries.map((entry) => entry.operation)).toEqual([
        AuditOperation.DELETE,
        AuditOperation.INSERT,
        AuditOperation.INSERT,
      ]);
    });

    it('should filter by table, record and operation', async () => {
      expect(await auditStore.query({ tableName: 'repair_order' })).toHaveLength(1);
      expect(await auditStore.query({ recordId: 'vehicle-1' })).toHaveLength(2);
      expect(
        await auditStore.query({ tableName: 'vehicle', operation: AuditOperation.INSERT }),
      ).toHaveLength(1);
    });

    it('should return nothing for a non-positive limit', async () => {
      expect(await auditStore.query({ limit: 0 })).toEqual([]);
      expect(await auditStore.query({ limit: -3 })).toEqual([]);
    });

    it('should fall back to the default for a limit that is not a finite number', async () => {
      expect(await auditStore.query({ limit: Number.NaN })).toHaveLength(3);
      expect(await auditStore.query({ limit: Number.POSITIVE_INFINITY })).toHaveLength(3);
    });

    it('should round a fractional limit down', async () => {
      expect(await auditStore.query({ limit: 2.7 })).toHaveLength(2);
    });
  });

  describe('latestFor', () => {
    it('should return the newest entry for a record', async () => {
      const entry = await auditStore.latestFor('vehicle', 'vehicle-1');

      expect(entry?.operation).toBe(AuditOperation.DELETE);
    });

    it('should return null for a record without history', async () => {
      expect(await auditStore.latestFor('vehicle', 'vehicle-2')).toBeNull();
    });
  });

  describe('snapshot serialization', () => {
    it('should serialize absent snapshots as null', () => {
      expect(serializeSnapshot(null)).toBeNull();
      expect(serializeSnapshot(undefined)).toBeNull();
    });

    it('should parse stored snapshots', () => {
      expect(parseSnapshot('{"order_id":"order-1","time_worked":2.5,"remarks":null}')).toEqual({
        order_id: 'order-1',
        time_worked: 2.5,
        remarks: null,
      });
      expect(parseSnapshot(null)).toBeNull();
    });

    it('should reject snapshots that are not objects', () => {
      expect(() => parseSnapshot('[1,2]')).toThrow('Audit snapshot is not an object');
    });

    it('should normalize column values', () => {
      expect(toSnapshotValue(undefined)).toBeNull();
      expect(toSnapshotValue(new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00.000Z');
      expect(toSnapshotValue({ nested: true })).toBe('{"nested":true}');
      expect(toSnapshotValue(false)).toBe(false);
    });
  });
});
