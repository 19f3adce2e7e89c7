import { TestingModule } from '@nestjs/testing';
import {
  AssignmentStatus,
  RepairRequestStatus,
  RepairStatus,
  StaffJobType,
} from '@repairflow/shared';
import { InvalidStateError, NotFoundError } from '../common/errors/repair.errors';
import {
  createRepairTestingModule,
  openRepairOrder,
  seedUsers,
} from '../testing/repair-testing.module';
import { RepairOrderService } from './repair-order.service';
import { RepairRequestService } from './repair-request.service';

describe('RepairRequestService', () => {
  let module: TestingModule;

  afterEach(async () => {
    await module.close();
  });

  describe('convertToOrder', () => {
    beforeEach(async () => {
      ({ module } = await createRepairTestingModule());
    });

    it('should open a pending order and mark the request converted', async () => {
      const order = await openRepairOrder(module, StaffJobType.AUTO_ELECTRICIAN);

      expect(order).toMatchObject({
        id: 'id-0003',
        vehicleId: 'id-0001',
        customerId: 'customer-1',
        requestId: 'id-0002',
        requiredStaffType: StaffJobType.AUTO_ELECTRICIAN,
        status: RepairStatus.PENDING,
        finishTime: null,
        remarks: null,
      });
      const request = await module.get(RepairRequestService).getRequest('id-0002');
      expect(request.status).toBe(RepairRequestStatus.ORDER_CREATED);
    });

    it('should not convert the same request twice', async () => {
      await openRepairOrder(module, StaffJobType.AUTO_ELECTRICIAN);

      await expect(
        module
          .get(RepairRequestService)
          .convertToOrder({ requestId: 'id-0002', requiredStaffType: StaffJobType.WELDER }),
      ).rejects.toThrow(new InvalidStateError('Repair request id-0002 was already converted'));
    });

    it('should fail with NotFound for an unknown request', async () => {
      await expect(
        module
          .get(RepairRequestService)
          .convertToOrder({ requestId: 'missing', requiredStaffType: StaffJobType.WELDER }),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('with automatic assignment', () => {
    beforeEach(async () => {
      const context = await createRepairTestingModule({ autoAssignOnCreate: true });
      module = context.module;
      await seedUsers(context.dataSource, [
        { id: 'staff-1', jobType: StaffJobType.WELDER, hourlyRate: 40 },
      ]);
    });

    it('should assign a new order to eligible staff', async () => {
      const order = await openRepairOrder(module, StaffJobType.WELDER);

      const live = await module.get(RepairOrderService).liveAssignment(order.id);
      expect(live).toMatchObject({
        id: 'id-0004',
        staffId: 'staff-1',
        status: AssignmentStatus.PENDING,
      });
    });

    it('should leave the order unassigned when nobody is eligible', async () => {
      const order = await openRepairOrder(module, StaffJobType.PAINT_WORKER);

      expect(await module.get(RepairOrderService).listAssignments(order.id)).toEqual([]);
      expect((await module.get(RepairOrderService).getOrder(order.id)).status).toBe(
        RepairStatus.PENDING,
      );
    });
  });
});
