import { Injectable, Logger } from '@nestjs/common';
import { Material, RepairLog } from '@repairflow/database';
import { AssignmentStatus, MaterialLine, TERMINAL_REPAIR_STATUSES } from '@repairflow/shared';
import { ForbiddenError, InvalidStateError } from '../common/errors/repair.errors';
import { UnitOfWork } from '../persistence/unit-of-work.service';
import { MaterialRepository } from '../persistence/repositories/material.repository';
import { RepairAssignmentRepository } from '../persistence/repositories/repair-assignment.repository';
import { RepairLogRepository } from '../persistence/repositories/repair-log.repository';
import { RepairOrderRepository } from '../persistence/repositories/repair-order.repository';

export interface RepairLogWithMaterials {
  log: RepairLog;
  materials: Material[];
}

@Injectable()
export class RepairLogService {
  private readonly logger = new Logger(RepairLogService.name);

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly orders: RepairOrderRepository,
    private readonly assignments: RepairAssignmentRepository,
    private readonly logs: RepairLogRepository,
    private readonly materials: MaterialRepository,
  ) {}

  /**
   * Appends a work log with the materials it consumed. Only the staff member
   * holding the accepted assignment may write to an open order.
   */
  async addLog(
    orderId: string,
    staffId: string,
    message: string,
    lines: MaterialLine[] = [],
  ): Promise<RepairLogWithMaterials> {
    const result = await this.unitOfWork.run('addLog', async (manager) => {
      const order = await this.orders.getById(orderId, manager);
      if (TERMINAL_REPAIR_STATUSES.includes(order.status)) {
        throw new InvalidStateError(`Repair order ${orderId} is ${order.status}`, {
          orderId,
          status: order.status,
        });
      }

      const live = await this.assignments.findLive(orderId, manager);
      if (!live || live.status !== AssignmentStatus.ACCEPTED || live.staffId !== staffId) {
        throw new ForbiddenError(`Staff ID ${staffId} is not working on repair order ${orderId}`, {
          orderId,
          staffId,
        });
      }

      for (const line of lines) {
        if (!Number.isFinite(line.quantity) || line.quantity < 0) {
          throw new InvalidStateError('Material quantity must be a non-negative number', {
            name: line.name,
            quantity: line.quantity,
          });
        }
        if (!Number.isFinite(line.unitPrice) || line.unitPrice < 0) {
          throw new InvalidStateError('Material unit price must be a non-negative number', {
            name: line.name,
            unitPrice: line.unitPrice,
          });
        }
      }

      const log = await this.logs.createLog(manager, orderId, staffId, message);
      const materials: Material[] = [];
      for (const line of lines) {
        materials.push(await this.materials.createMaterial(manager, log.id, line));
      }
      return { log, materials };
    });

    this.logger.log(`Repair log ${result.log.id} added to order ${orderId}`, {
      staffId,
      materials: result.materials.length,
    });
    return result;
  }

  async logsForOrder(orderId: string): Promise<RepairLog[]> {
    return this.unitOfWork.read('logsForOrder', (manager) => this.logs.findByOrder(orderId, manager));
  }

  async materialsForLog(logId: string): Promise<Material[]> {
    return this.unitOfWork.read('materialsForLog', (manager) =>
      this.materials.findByLogs([logId], manager),
    );
  }
}
