import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { RepairAssignment, RepairOrder } from '@repairflow/database';
import {
  AssignmentStatus,
  RepairEventType,
  RepairOrderStatusEvent,
  RepairStatus,
  TERMINAL_REPAIR_STATUSES,
} from '@repairflow/shared';
import { InvalidStateError } from '../common/errors/repair.errors';
import { UnitOfWork } from '../persistence/unit-of-work.service';
import { RepairOrderRepository } from '../persistence/repositories/repair-order.repository';
import { RepairAssignmentRepository } from '../persistence/repositories/repair-assignment.repository';

@Injectable()
export class RepairOrderService {
  private readonly logger = new Logger(RepairOrderService.name);

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly orders: RepairOrderRepository,
    private readonly assignments: RepairAssignmentRepository,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async getOrder(orderId: string): Promise<RepairOrder> {
    return this.unitOfWork.read('getOrder', (manager) => this.orders.getById(orderId, manager));
  }

  async listAssignments(orderId: string): Promise<RepairAssignment[]> {
    return this.unitOfWork.read('listAssignments', (manager) =>
      this.assignments.findByOrder(orderId, manager),
    );
  }

  async liveAssignment(orderId: string): Promise<RepairAssignment | null> {
    return this.unitOfWork.read('liveAssignment', (manager) =>
      this.assignments.findLive(orderId, manager),
    );
  }

  /**
   * Administrative cancellation from any non-terminal state. A pending
   * assignment is withdrawn in the same transaction.
   */
  async cancelOrder(orderId: string, reason?: string): Promise<RepairOrder> {
    const { order, previousStatus } = await this.unitOfWork.run('cancelOrder', async (manager) => {
      const current = await this.orders.getById(orderId, manager);
      if (TERMINAL_REPAIR_STATUSES.includes(current.status)) {
        throw new InvalidStateError(`Repair order ${orderId} is already ${current.status}`, {
          orderId,
          status: current.status,
        });
      }

      const live = await this.assignments.findLive(orderId, manager);
      if (live && live.status === AssignmentStatus.PENDING) {
        await this.assignments.resolvePending(manager, live.id, AssignmentStatus.REJECTED);
      }

      const remarks = reason
        ? [current.remarks, `Cancelled: ${reason}`].filter(Boolean).join('\n')
        : current.remarks;
      const cancelled = await this.orders.transition(
        manager,
        orderId,
        [current.status],
        RepairStatus.CANCELLED,
        { remarks },
      );
      return { order: cancelled, previousStatus: current.status };
    });

    this.logger.log(`Repair order ${orderId} cancelled`, { previousStatus, reason });
    const event: RepairOrderStatusEvent = {
      orderId,
      previousStatus,
      newStatus: RepairStatus.CANCELLED,
      reason,
    };
    this.eventEmitter.emit(RepairEventType.ORDER_CANCELLED, event);

    return order;
  }
}
