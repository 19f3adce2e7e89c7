import { Inject, Injectable } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { Feedback } from '@repairflow/database';
import { AuditStore } from '../../audit/audit-store.service';
import { Clock, CLOCK, IdGenerator, ID_GENERATOR } from '../../common/clock/clock';
import { AuditedRepository } from '../audited.repository';

@Injectable()
export class FeedbackRepository extends AuditedRepository<Feedback> {
  constructor(
    dataSource: DataSource,
    auditStore: AuditStore,
    @Inject(ID_GENERATOR) ids: IdGenerator,
    @Inject(CLOCK) clock: Clock,
  ) {
    super(Feedback, 'Feedback', dataSource, auditStore, ids, clock);
  }

  async createFeedback(
    manager: EntityManager,
    customerId: string,
    logId: string,
    rating: number,
    comments: string | null,
  ): Promise<Feedback> {
    const feedback = manager.create(Feedback, {
      id: this.newId(),
      customerId,
      logId,
      rating,
      comments,
      feedbackTime: this.now(),
    });
    return this.insert(manager, feedback);
  }

  async findByLog(
    logId: string,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<Feedback[]> {
    return manager.find(Feedback, { where: { logId }, order: { feedbackTime: 'ASC' } });
  }
}
