import { Inject, Injectable } from '@nestjs/common';
import { DataSource, EntityManager, In } from 'typeorm';
import { RepairAssignment } from '@repairflow/database';
import { AssignmentStatus, LIVE_ASSIGNMENT_STATUSES } from '@repairflow/shared';
import { AuditStore } from '../../audit/audit-store.service';
import { Clock, CLOCK, IdGenerator, ID_GENERATOR } from '../../common/clock/clock';
import { InvalidStateError } from '../../common/errors/repair.errors';
import { AuditedRepository } from '../audited.repository';

@Injectable()
export class RepairAssignmentRepository extends AuditedRepository<RepairAssignment> {
  constructor(
    dataSource: DataSource,
    auditStore: AuditStore,
    @Inject(ID_GENERATOR) ids: IdGenerator,
    @Inject(CLOCK) clock: Clock,
  ) {
    super(RepairAssignment, 'Assignment', dataSource, auditStore, ids, clock);
  }

  async createPending(
    manager: EntityManager,
    orderId: string,
    staffId: string,
  ): Promise<RepairAssignment> {
    const assignment = manager.create(RepairAssignment, {
      id: this.newId(),
      orderId,
      staffId,
      status: AssignmentStatus.PENDING,
      timeWorked: null,
      assignedAt: this.now(),
    });
    return this.insert(manager, assignment);
  }

  async findByOrder(
    orderId: string,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<RepairAssignment[]> {
    return manager.find(RepairAssignment, {
      where: { orderId },
      order: { assignedAt: 'ASC' },
    });
  }

  async findLive(
    orderId: string,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<RepairAssignment | null> {
    return manager.findOne(RepairAssignment, {
      where: { orderId, status: In([...LIVE_ASSIGNMENT_STATUSES]) },
    });
  }

  /** pending → accepted | rejected, as a compare-and-swap on the pending state */
  async resolvePending(
    manager: EntityManager,
    assignmentId: string,
    status: AssignmentStatus.ACCEPTED | AssignmentStatus.REJECTED,
  ): Promise<RepairAssignment> {
    return this.update(
      manager,
      assignmentId,
      { status },
      { id: assignmentId, status: AssignmentStatus.PENDING },
    );
  }

  async recordTimeWorked(
    manager: EntityManager,
    assignmentId: string,
    timeWorked: number,
  ): Promise<RepairAssignment> {
    return this.update(manager, assignmentId, { timeWorked });
  }

  /** Putting back a pending or accepted row must not give the order a second live assignment. */
  protected async guardRestore(manager: EntityManager, row: RepairAssignment): Promise<void> {
    if (!LIVE_ASSIGNMENT_STATUSES.includes(row.status)) {
      return;
    }

    const live = await this.findLive(row.orderId, manager);
    if (live && live.id !== row.id) {
      throw new InvalidStateError(
        `Repair order ${row.orderId} already has live assignment ${live.id}`,
        { orderId: row.orderId, assignmentId: row.id, liveAssignmentId: live.id },
      );
    }
  }
}
