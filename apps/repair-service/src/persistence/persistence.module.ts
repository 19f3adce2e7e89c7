import { Global, Module } from '@nestjs/common';
import { UnitOfWork } from './unit-of-work.service';
import { RepositoryRegistry } from './repository.registry';
import { RepairOrderRepository } from './repositories/repair-order.repository';
import { RepairAssignmentRepository } from './repositories/repair-assignment.repository';
import { RepairLogRepository } from './repositories/repair-log.repository';
import { MaterialRepository } from './repositories/material.repository';
import { RepairRequestRepository } from './repositories/repair-request.repository';
import { VehicleRepository } from './repositories/vehicle.repository';
import { FeedbackRepository } from './repositories/feedback.repository';

const repositories = [
  RepairOrderRepository,
  RepairAssignmentRepository,
  RepairLogRepository,
  MaterialRepository,
  RepairRequestRepository,
  VehicleRepository,
  FeedbackRepository,
];

@Global()
@Module({
  providers: [UnitOfWork, RepositoryRegistry, ...repositories],
  exports: [UnitOfWork, RepositoryRegistry, ...repositories],
})
export class PersistenceModule {}
