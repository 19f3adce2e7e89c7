import { Inject, Injectable } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { RepairRequest } from '@repairflow/database';
import { RepairRequestStatus } from '@repairflow/shared';
import { AuditStore } from '../../audit/audit-store.service';
import { Clock, CLOCK, IdGenerator, ID_GENERATOR } from '../../common/clock/clock';
import { AuditedRepository } from '../audited.repository';

@Injectable()
export class RepairRequestRepository extends AuditedRepository<RepairRequest> {
  constructor(
    dataSource: DataSource,
    auditStore: AuditStore,
    @Inject(ID_GENERATOR) ids: IdGenerator,
    @Inject(CLOCK) clock: Clock,
  ) {
    super(RepairRequest, 'Repair request', dataSource, auditStore, ids, clock);
  }

  async createRequest(
    manager: EntityManager,
    vehicleId: string,
    customerId: string,
    description: string,
  ): Promise<RepairRequest> {
    const request = manager.create(RepairRequest, {
      id: this.newId(),
      vehicleId,
      customerId,
      description,
      status: RepairRequestStatus.PENDING,
      requestTime: this.now(),
    });
    return this.insert(manager, request);
  }

  async markOrderCreated(manager: EntityManager, requestId: string): Promise<RepairRequest> {
    return this.update(
      manager,
      requestId,
      { status: RepairRequestStatus.ORDER_CREATED },
      { id: requestId, status: RepairRequestStatus.PENDING },
    );
  }
}
