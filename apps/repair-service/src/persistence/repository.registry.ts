import { Injectable } from '@nestjs/common';
import { AuditedRepository, AuditedRow } from './audited.repository';
import { FeedbackRepository } from './repositories/feedback.repository';
import { RepairOrderRepository } from './repositories/repair-order.repository';
import { RepairAssignmentRepository } from './repositories/repair-assignment.repository';
import { RepairLogRepository } from './repositories/repair-log.repository';
import { MaterialRepository } from './repositories/material.repository';
import { RepairRequestRepository } from './repositories/repair-request.repository';
import { VehicleRepository } from './repositories/vehicle.repository';

/** Looks up the audited repository that owns a table, for rollback. */
@Injectable()
export class RepositoryRegistry {
  private readonly byTable = new Map<string, AuditedRepository<AuditedRow>>();

  constructor(
    orders: RepairOrderRepository,
    assignments: RepairAssignmentRepository,
    logs: RepairLogRepository,
    materials: MaterialRepository,
    requests: RepairRequestRepository,
    vehicles: VehicleRepository,
    feedback: FeedbackRepository,
  ) {
    const owners = [orders, assignments, logs, materials, requests, vehicles, feedback];
    for (const repository of owners) {
      this.byTable.set(repository.tableName, repository);
    }
  }

  forTable(tableName: string): AuditedRepository<AuditedRow> | undefined {
    return this.byTable.get(tableName);
  }
}
