import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import { RepairEventType, RepairOrderCreatedEvent } from '@repairflow/shared';
import { NoEligibleStaffError } from '../common/errors/repair.errors';
import { AssignmentEngine } from './assignment-engine.service';

/** Assigns freshly created orders when AUTO_ASSIGN_ON_CREATE is on. */
@Injectable()
export class AssignmentEventsListener {
  private readonly logger = new Logger(AssignmentEventsListener.name);

  constructor(
    private readonly assignmentEngine: AssignmentEngine,
    private readonly configService: ConfigService,
  ) {}

  @OnEvent(RepairEventType.ORDER_CREATED)
  async handleOrderCreated(event: RepairOrderCreatedEvent): Promise<void> {
    if (!this.configService.get<boolean>('AUTO_ASSIGN_ON_CREATE', true)) {
      return;
    }

    try {
      await this.assignmentEngine.assignOrder(event.orderId);
    } catch (error) {
      if (error instanceof NoEligibleStaffError) {
        this.logger.warn(`Order ${event.orderId} awaits manual assignment: ${error.message}`, {
          requiredStaffType: event.requiredStaffType,
        });
        return;
      }
      // the order itself is committed; assignment can be retried by an operator
      this.logger.error(`Automatic assignment failed for order ${event.orderId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
