import { TestingModule } from '@nestjs/testing';
import { AuditOperation, VehicleColor } from '@repairflow/shared';
import { AuditStore, parseSnapshot } from '../audit/audit-store.service';
import {
  InvalidStateError,
  NotFoundError,
  StoreUnavailableError,
} from '../common/errors/repair.errors';
import { createRepairTestingModule, TEST_VEHICLE } from '../testing/repair-testing.module';
import { VehicleRepository } from './repositories/vehicle.repository';
import { UnitOfWork } from './unit-of-work.service';

describe('AuditedRepository', () => {
  let module: TestingModule;
  let unitOfWork: UnitOfWork;
  let repository: VehicleRepository;
  let auditStore: AuditStore;

  const expectedRow = {
    vehicle_id: 'id-0001',
    customer_id: 'customer-1',
    license_plate: 'TEST-001',
    brand: 'Toyota',
    model: 'Corolla',
    type: 'Sedan',
    color: 'Silver',
    remarks: null,
  };

  beforeEach(async () => {
    ({ module } = await createRepairTestingModule());
    unitOfWork = module.get(UnitOfWork);
    repository = module.get(VehicleRepository);
    auditStore = module.get(AuditStore);
  });

  afterEach(async () => {
    await module.close();
  });

  const createVehicle = () =>
    unitOfWork.run('createVehicle', (manager) => repository.createVehicle(manager, TEST_VEHICLE));

  it('should append one INSERT entry with the new row', async () => {
    await createVehicle();

    const entries = await auditStore.query();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      tableName: 'vehicle',
      recordId: 'id-0001',
      operation: AuditOperation.INSERT,
      oldData: null,
    });
    expect(parseSnapshot(entries[0].newData)).toEqual(expectedRow);
  });

  it('should append one UPDATE entry with both states', async () => {
    await createVehicle();

    const updated = await unitOfWork.run('updateVehicle', (manager) =>
      repository.update(manager, 'id-0001', { color: VehicleColor.BLACK }),
    );

    expect(updated.color).toBe(VehicleColor.BLACK);
    const [entry] = await auditStore.query({ operation: AuditOperation.UPDATE });
    expect(parseSnapshot(entry.oldData)).toEqual(expectedRow);
    expect(parseSnapshot(entry.newData)).toEqual({ ...expectedRow, color: 'Black' });
  });

  it('should append one DELETE entry with the removed row', async () => {
    await createVehicle();

    await unitOfWork.run('deleteVehicle', (manager) => repository.delete(manager, 'id-0001'));

    expect(await repository.findById('id-0001')).toBeNull();
    const [entry] = await auditStore.query({ operation: AuditOperation.DELETE });
    expect(parseSnapshot(entry.oldData)).toEqual(expectedRow);
    expect(entry.newData).toBeNull();
  });

  it('should not write when the compare-and-swap condition no longer holds', async () => {
    await createVehicle();

    await expect(
      unitOfWork.run('updateVehicle', (manager) =>
        repository.update(
          manager,
          'id-0001',
          { color: VehicleColor.BLACK },
          { id: 'id-0001', color: VehicleColor.RED },
        ),
      ),
    ).rejects.toThrow('Vehicle with ID id-0001 changed concurrently');

    expect((await repository.getById('id-0001')).color).toBe(VehicleColor.SILVER);
    expect(await auditStore.query()).toHaveLength(1);
  });

  it('should roll the row write back when the audit append fails', async () => {
    jest.spyOn(auditStore, 'record').mockRejectedValueOnce(new Error('audit table locked'));

    await expect(createVehicle()).rejects.toThrow(
      new StoreUnavailableError('createVehicle', new Error('audit table locked')),
    );

    expect(await repository.findById('id-0001')).toBeNull();
    expect(await auditStore.query()).toEqual([]);
  });

  it('should refuse to insert an id that already exists', async () => {
    const vehicle = await createVehicle();

    await expect(
      unitOfWork.run('restore', (manager) =>
        repository.restore(manager, repository.toSnapshot(vehicle)),
      ),
    ).rejects.toThrow(new InvalidStateError('Vehicle with ID id-0001 already exists'));
  });

  it('should fail with NotFound when deleting a missing row', async () => {
    await expect(
      unitOfWork.run('deleteVehicle', (manager) => repository.delete(manager, 'missing')),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should reject a snapshot that lacks a column', async () => {
    const { remarks: _remarks, ...partial } = expectedRow;

    expect(() => repository.fromSnapshot(partial)).toThrow(
      'Snapshot for vehicle is missing column remarks',
    );
  });

  it('should overwrite every column from a snapshot', async () => {
    await createVehicle();

    const overwritten = await unitOfWork.run('overwrite', (manager) =>
      repository.overwrite(manager, 'id-0001', { ...expectedRow, model: 'Yaris', remarks: 'Loaner' }),
    );

    expect(repository.toSnapshot(overwritten)).toEqual({
      ...expectedRow,
      model: 'Yaris',
      remarks: 'Loaner',
    });
  });
});
