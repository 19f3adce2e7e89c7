import { Inject, Injectable } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { Vehicle } from '@repairflow/database';
import { VehicleDetails } from '@repairflow/shared';
import { AuditStore } from '../../audit/audit-store.service';
import { Clock, CLOCK, IdGenerator, ID_GENERATOR } from '../../common/clock/clock';
import { AuditedRepository } from '../audited.repository';

@Injectable()
export class VehicleRepository extends AuditedRepository<Vehicle> {
  constructor(
    dataSource: DataSource,
    auditStore: AuditStore,
    @Inject(ID_GENERATOR) ids: IdGenerator,
    @Inject(CLOCK) clock: Clock,
  ) {
    super(Vehicle, 'Vehicle', dataSource, auditStore, ids, clock);
  }

  async createVehicle(manager: EntityManager, details: VehicleDetails): Promise<Vehicle> {
    const vehicle = manager.create(Vehicle, {
      id: this.newId(),
      customerId: details.customerId,
      licensePlate: details.licensePlate,
      brand: details.brand,
      model: details.model,
      type: details.type,
      color: details.color,
      remarks: details.remarks ?? null,
    });
    return this.insert(manager, vehicle);
  }

  async findByCustomer(
    customerId: string,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<Vehicle[]> {
    return manager.find(Vehicle, { where: { customerId } });
  }
}
