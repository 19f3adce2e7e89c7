import { Inject, Injectable } from '@nestjs/common';
import { DataSource, EntityManager, In } from 'typeorm';
import { RepairOrder } from '@repairflow/database';
import { RepairStatus, StaffJobType } from '@repairflow/shared';
import { AuditStore } from '../../audit/audit-store.service';
import { Clock, CLOCK, IdGenerator, ID_GENERATOR } from '../../common/clock/clock';
import { AuditedRepository } from '../audited.repository';

export interface NewRepairOrder {
  vehicleId: string;
  customerId: string;
  requestId: string;
  requiredStaffType: StaffJobType | null;
  remarks?: string | null;
}

@Injectable()
export class RepairOrderRepository extends AuditedRepository<RepairOrder> {
  constructor(
    dataSource: DataSource,
    auditStore: AuditStore,
    @Inject(ID_GENERATOR) ids: IdGenerator,
    @Inject(CLOCK) clock: Clock,
  ) {
    super(RepairOrder, 'Repair order', dataSource, auditStore, ids, clock);
  }

  async createOrder(manager: EntityManager, input: NewRepairOrder): Promise<RepairOrder> {
    const order = manager.create(RepairOrder, {
      id: this.newId(),
      vehicleId: input.vehicleId,
      customerId: input.customerId,
      requestId: input.requestId,
      requiredStaffType: input.requiredStaffType,
      status: RepairStatus.PENDING,
      orderTime: this.now(),
      finishTime: null,
      remarks: input.remarks ?? null,
    });
    return this.insert(manager, order);
  }

  /**
   * Moves the order to `status` only if it is still in one of `from`.
   */
  async transition(
    manager: EntityManager,
    orderId: string,
    from: readonly RepairStatus[],
    status: RepairStatus,
    extra: { finishTime?: string; remarks?: string | null } = {},
  ): Promise<RepairOrder> {
    return this.update(
      manager,
      orderId,
      { status, ...extra },
      { id: orderId, status: In([...from]) },
    );
  }
}
