import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { EntityManager } from 'typeorm';
import { RepairAssignment, RepairOrder } from '@repairflow/database';
import {
  AssignmentEvent,
  AssignmentResponseEvent,
  AssignmentStatus,
  AssignmentTimeUpdate,
  ReassignmentNeededEvent,
  RepairEventType,
  RepairOrderStatusEvent,
  RepairStatus,
  TERMINAL_REPAIR_STATUSES,
} from '@repairflow/shared';
import { Clock, CLOCK } from '../common/clock/clock';
import {
  ForbiddenError,
  InvalidStateError,
  NoEligibleStaffError,
  NotFoundError,
  OrderUpdateFailedError,
} from '../common/errors/repair.errors';
import { UnitOfWork } from '../persistence/unit-of-work.service';
import { RepairOrderRepository } from '../persistence/repositories/repair-order.repository';
import { RepairAssignmentRepository } from '../persistence/repositories/repair-assignment.repository';
import { StaffDirectory, STAFF_DIRECTORY } from '../staff/staff-directory';
import { StaffSelector, STAFF_SELECTOR } from '../staff/staff-selector';

export interface AssignmentResponse {
  assignment: RepairAssignment;
  /** The replacement created after a rejection, if one could be made */
  reassignment: RepairAssignment | null;
  /** True when a rejection left the order without a live assignment */
  requiresManualAssignment: boolean;
}

/**
 * Drives the repair order / assignment state machines:
 *
 *   order:      Pending -> In Progress -> Completed
 *   assignment: pending -> accepted | rejected
 *
 * A rejection hands the order to another eligible staff member. Cancellation
 * is an administrative action handled by RepairOrderService.
 */
@Injectable()
export class AssignmentEngine {
  private readonly logger = new Logger(AssignmentEngine.name);

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly orders: RepairOrderRepository,
    private readonly assignments: RepairAssignmentRepository,
    @Inject(STAFF_DIRECTORY) private readonly staffDirectory: StaffDirectory,
    @Inject(STAFF_SELECTOR) private readonly staffSelector: StaffSelector,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async assignOrder(orderId: string, excludeStaffId?: string): Promise<RepairAssignment> {
    const assignment = await this.unitOfWork.run('assignOrder', async (manager) => {
      const order = await this.orders.getById(orderId, manager);

      const jobType = order.requiredStaffType;
      if (!jobType) {
        throw new InvalidStateError('Required staff type not specified for this repair order', {
          orderId,
          status: order.status,
        });
      }
      if (TERMINAL_REPAIR_STATUSES.includes(order.status)) {
        throw new InvalidStateError(`Repair order ${orderId} is ${order.status}`, {
          orderId,
          status: order.status,
        });
      }

      const live = await this.assignments.findLive(orderId, manager);
      if (live) {
        throw new InvalidStateError(`Repair order ${orderId} already has a live assignment`, {
          orderId,
          assignmentId: live.id,
          status: live.status,
        });
      }

      const eligible = await this.staffDirectory.eligibleStaff(jobType, excludeStaffId);
      if (eligible.length === 0) {
        throw new NoEligibleStaffError(orderId, jobType, excludeStaffId);
      }

      const selected = this.staffSelector.select(eligible);
      return this.assignments.createPending(manager, orderId, selected.staffId);
    });

    this.logger.log(`Assigned order ${orderId} to staff ${assignment.staffId}`, {
      assignmentId: assignment.id,
      excludeStaffId,
    });
    this.emit<AssignmentEvent>(RepairEventType.ASSIGNMENT_CREATED, {
      assignmentId: assignment.id,
      orderId,
      staffId: assignment.staffId,
    });

    return assignment;
  }

  async respondToAssignment(
    assignmentId: string,
    staffId: string,
    accept: boolean,
  ): Promise<AssignmentResponse> {
    const assignment = await this.unitOfWork.run(
      accept ? 'acceptAssignment' : 'rejectAssignment',
      async (manager) => {
        const current = await this.assignments.getById(assignmentId, manager);
        if (current.staffId !== staffId) {
          throw new ForbiddenError(
            `Assignment with ID ${assignmentId} does not belong to staff ID ${staffId}`,
            { assignmentId, staffId },
          );
        }
        if (current.status !== AssignmentStatus.PENDING) {
          throw new InvalidStateError(`Assignment with ID ${assignmentId} is not in a pending state`, {
            assignmentId,
            status: current.status,
          });
        }

        const resolved = await this.assignments.resolvePending(
          manager,
          assignmentId,
          accept ? AssignmentStatus.ACCEPTED : AssignmentStatus.REJECTED,
        );
        if (accept) {
          await this.startOrder(manager, resolved.orderId);
        }
        return resolved;
      },
    );

    this.emit<AssignmentResponseEvent>(
      accept ? RepairEventType.ASSIGNMENT_ACCEPTED : RepairEventType.ASSIGNMENT_REJECTED,
      { assignmentId, orderId: assignment.orderId, staffId, accepted: accept },
    );

    if (accept) {
      this.logger.log(`Staff ${staffId} accepted assignment ${assignmentId}`, {
        orderId: assignment.orderId,
      });
      return { assignment, reassignment: null, requiresManualAssignment: false };
    }

    // the rejection is committed; the replacement is a separate unit of work
    try {
      const reassignment = await this.assignOrder(assignment.orderId, staffId);
      return { assignment, reassignment, requiresManualAssignment: false };
    } catch (error) {
      if (!(error instanceof NoEligibleStaffError)) {
        throw error;
      }

      const order = await this.unitOfWork.read('findOrder', (manager) =>
        this.orders.findById(assignment.orderId, manager),
      );
      this.logger.warn(`Order ${assignment.orderId} has no live assignment after rejection`, {
        assignmentId,
        excludeStaffId: staffId,
        reason: error.message,
      });
      this.emit<ReassignmentNeededEvent>(RepairEventType.REASSIGNMENT_NEEDED, {
        orderId: assignment.orderId,
        requiredStaffType: order?.requiredStaffType ?? null,
        excludeStaffId: staffId,
      });
      return { assignment, reassignment: null, requiresManualAssignment: true };
    }
  }

  /**
   * Records hours on each listed assignment and completes the order, all in
   * one transaction: any failure leaves every row untouched.
   */
  async finishOrder(orderId: string, updates: AssignmentTimeUpdate[]): Promise<RepairOrder> {
    const { order, previousStatus } = await this.unitOfWork.run('finishOrder', async (manager) => {
      const current = await this.orders.getById(orderId, manager);
      if (TERMINAL_REPAIR_STATUSES.includes(current.status)) {
        throw new InvalidStateError(`Repair order ${orderId} is already ${current.status}`, {
          orderId,
          status: current.status,
        });
      }

      for (const update of updates) {
        if (!Number.isFinite(update.timeWorked) || update.timeWorked < 0) {
          throw new InvalidStateError('Time worked must be a non-negative number of hours', {
            assignmentId: update.assignmentId,
            timeWorked: update.timeWorked,
          });
        }

        const assignment = await this.assignments.findById(update.assignmentId, manager);
        if (!assignment || assignment.orderId !== orderId) {
          throw new NotFoundError('Assignment', update.assignmentId, { orderId });
        }
        await this.assignments.recordTimeWorked(manager, update.assignmentId, update.timeWorked);
      }

      const completed = await this.orders.transition(
        manager,
        orderId,
        [current.status],
        RepairStatus.COMPLETED,
        { finishTime: this.clock.now() },
      );
      return { order: completed, previousStatus: current.status };
    });

    this.logger.log(`Repair order ${orderId} completed`, {
      assignmentsUpdated: updates.length,
      finishTime: order.finishTime,
    });
    this.emit<RepairOrderStatusEvent>(RepairEventType.ORDER_COMPLETED, {
      orderId,
      previousStatus,
      newStatus: RepairStatus.COMPLETED,
    });

    return order;
  }

  private async startOrder(manager: EntityManager, orderId: string): Promise<RepairOrder> {
    const order = await this.orders.findById(orderId, manager);
    if (!order) {
      throw new OrderUpdateFailedError(orderId, null, 'order not found');
    }
    if (order.status === RepairStatus.IN_PROGRESS) {
      return order;
    }
    if (order.status !== RepairStatus.PENDING) {
      throw new OrderUpdateFailedError(orderId, order.status, `order is ${order.status}`);
    }

    try {
      return await this.orders.transition(
        manager,
        orderId,
        [RepairStatus.PENDING],
        RepairStatus.IN_PROGRESS,
      );
    } catch (error) {
      if (error instanceof InvalidStateError) {
        throw new OrderUpdateFailedError(orderId, order.status, error.message);
      }
      throw error;
    }
  }

  private emit<T>(event: RepairEventType, payload: T): void {
    this.eventEmitter.emit(event, payload);
  }
}
