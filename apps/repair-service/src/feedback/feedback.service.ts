import { Injectable, Logger } from '@nestjs/common';
import { Feedback } from '@repairflow/database';
import { ForbiddenError, InvalidStateError } from '../common/errors/repair.errors';
import { UnitOfWork } from '../persistence/unit-of-work.service';
import { FeedbackRepository } from '../persistence/repositories/feedback.repository';
import { RepairLogRepository } from '../persistence/repositories/repair-log.repository';
import { RepairOrderRepository } from '../persistence/repositories/repair-order.repository';

export const MIN_FEEDBACK_RATING = 1;
export const MAX_FEEDBACK_RATING = 5;

@Injectable()
export class FeedbackService {
  private readonly logger = new Logger(FeedbackService.name);

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly orders: RepairOrderRepository,
    private readonly logs: RepairLogRepository,
    private readonly feedback: FeedbackRepository,
  ) {}

  /**
   * Rates a repair log. Only the customer who owns the log's order may rate
   * it; ratings are whole numbers from 1 to 5.
   */
  async leaveFeedback(
    customerId: string,
    logId: string,
    rating: number,
    comments?: string,
  ): Promise<Feedback> {
    const feedback = await this.unitOfWork.run('leaveFeedback', async (manager) => {
      const log = await this.logs.getById(logId, manager);
      const order = await this.orders.getById(log.orderId, manager);
      if (order.customerId !== customerId) {
        throw new ForbiddenError(
          `Repair log ${logId} does not belong to customer ID ${customerId}`,
          { logId, customerId },
        );
      }
      if (
        !Number.isInteger(rating) ||
        rating < MIN_FEEDBACK_RATING ||
        rating > MAX_FEEDBACK_RATING
      ) {
        throw new InvalidStateError(
          `Rating must be a whole number from ${MIN_FEEDBACK_RATING} to ${MAX_FEEDBACK_RATING}`,
          { logId, rating },
        );
      }

      return this.feedback.createFeedback(manager, customerId, logId, rating, comments ?? null);
    });

    this.logger.log(`Feedback ${feedback.id} left on repair log ${logId}`, {
      customerId,
      rating,
    });
    return feedback;
  }

  async getFeedback(feedbackId: string): Promise<Feedback> {
    return this.unitOfWork.read('getFeedback', (manager) =>
      this.feedback.getById(feedbackId, manager),
    );
  }

  async feedbackForLog(logId: string): Promise<Feedback[]> {
    return this.unitOfWork.read('feedbackForLog', (manager) =>
      this.feedback.findByLog(logId, manager),
    );
  }
}
