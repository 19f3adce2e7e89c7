import { Inject, Injectable } from '@nestjs/common';
import { OrderBill, RepairStatus, roundCurrency } from '@repairflow/shared';
import { InvalidStateError } from '../common/errors/repair.errors';
import { UnitOfWork } from '../persistence/unit-of-work.service';
import { RepairOrderRepository } from '../persistence/repositories/repair-order.repository';
import { RepairAssignmentRepository } from '../persistence/repositories/repair-assignment.repository';
import { RepairLogRepository } from '../persistence/repositories/repair-log.repository';
import { MaterialRepository } from '../persistence/repositories/material.repository';
import { StaffDirectory, STAFF_DIRECTORY } from '../staff/staff-directory';

@Injectable()
export class FeeCalculator {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly orders: RepairOrderRepository,
    private readonly assignments: RepairAssignmentRepository,
    private readonly logs: RepairLogRepository,
    private readonly materials: MaterialRepository,
    @Inject(STAFF_DIRECTORY) private readonly staffDirectory: StaffDirectory,
  ) {}

  /** Sum of quantity × unit price over every material on every log of the order. */
  async materialFee(orderId: string): Promise<number> {
    return this.unitOfWork.read('materialFee', async (manager) => {
      const logs = await this.logs.findByOrder(orderId, manager);
      if (logs.length === 0) {
        return 0;
      }

      const materials = await this.materials.findByLogs(
        logs.map((log) => log.id),
        manager,
      );
      return materials.reduce((total, material) => total + material.totalPrice, 0);
    });
  }

  /**
   * Sum of hours × hourly rate over assignments with recorded time. Staff who
   * no longer exist or have no rate contribute nothing.
   */
  async laborFee(orderId: string): Promise<number> {
    return this.unitOfWork.read('laborFee', async (manager) => {
      const assignments = await this.assignments.findByOrder(orderId, manager);

      let total = 0;
      for (const assignment of assignments) {
        if (assignment.timeWorked === null || assignment.timeWorked <= 0) {
          continue;
        }
        const rate = await this.staffDirectory.hourlyRate(assignment.staffId);
        if (rate !== null) {
          total += assignment.timeWorked * rate;
        }
      }
      return total;
    });
  }

  /** Fees for a completed order, rounded to cents. */
  async billOrder(orderId: string): Promise<OrderBill> {
    const order = await this.unitOfWork.read('billOrder', (manager) =>
      this.orders.getById(orderId, manager),
    );
    if (order.status !== RepairStatus.COMPLETED) {
      throw new InvalidStateError(`Repair order ${orderId} is not completed`, {
        orderId,
        status: order.status,
      });
    }

    const [materialFee, laborFee] = await Promise.all([
      this.materialFee(orderId),
      this.laborFee(orderId),
    ]);

    return {
      orderId,
      materialFee: roundCurrency(materialFee),
      laborFee: roundCurrency(laborFee),
      total: roundCurrency(materialFee + laborFee),
    };
  }
}
