import { Inject, Injectable } from '@nestjs/common';
import { DataSource, EntityManager, In } from 'typeorm';
import { Material } from '@repairflow/database';
import { MaterialLine } from '@repairflow/shared';
import { AuditStore } from '../../audit/audit-store.service';
import { Clock, CLOCK, IdGenerator, ID_GENERATOR } from '../../common/clock/clock';
import { AuditedRepository } from '../audited.repository';

@Injectable()
export class MaterialRepository extends AuditedRepository<Material> {
  constructor(
    dataSource: DataSource,
    auditStore: AuditStore,
    @Inject(ID_GENERATOR) ids: IdGenerator,
    @Inject(CLOCK) clock: Clock,
  ) {
    super(Material, 'Material', dataSource, auditStore, ids, clock);
  }

  async createMaterial(manager: EntityManager, logId: string, line: MaterialLine): Promise<Material> {
    const material = manager.create(Material, {
      id: this.newId(),
      logId,
      name: line.name,
      quantity: line.quantity,
      unitPrice: line.unitPrice,
      remarks: line.remarks ?? null,
    });
    return this.insert(manager, material);
  }

  async findByLogs(
    logIds: string[],
    manager: EntityManager = this.dataSource.manager,
  ): Promise<Material[]> {
    if (logIds.length === 0) {
      return [];
    }
    return manager.find(Material, { where: { logId: In(logIds) } });
  }
}
