import { Inject, Injectable } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { RepairLog } from '@repairflow/database';
import { AuditStore } from '../../audit/audit-store.service';
import { Clock, CLOCK, IdGenerator, ID_GENERATOR } from '../../common/clock/clock';
import { AuditedRepository } from '../audited.repository';

@Injectable()
export class RepairLogRepository extends AuditedRepository<RepairLog> {
  constructor(
    dataSource: DataSource,
    auditStore: AuditStore,
    @Inject(ID_GENERATOR) ids: IdGenerator,
    @Inject(CLOCK) clock: Clock,
  ) {
    super(RepairLog, 'Repair log', dataSource, auditStore, ids, clock);
  }

  async createLog(
    manager: EntityManager,
    orderId: string,
    staffId: string,
    logMessage: string,
  ): Promise<RepairLog> {
    const log = manager.create(RepairLog, {
      id: this.newId(),
      orderId,
      staffId,
      logTime: this.now(),
      logMessage,
    });
    return this.insert(manager, log);
  }

  async findByOrder(
    orderId: string,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<RepairLog[]> {
    return manager.find(RepairLog, { where: { orderId }, order: { logTime: 'ASC' } });
  }
}
