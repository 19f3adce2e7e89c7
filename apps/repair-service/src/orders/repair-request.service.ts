import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { RepairOrder, RepairRequest } from '@repairflow/database';
import {
  ConvertRequestInput,
  RepairEventType,
  RepairOrderCreatedEvent,
  RepairRequestStatus,
} from '@repairflow/shared';
import { InvalidStateError } from '../common/errors/repair.errors';
import { UnitOfWork } from '../persistence/unit-of-work.service';
import { RepairOrderRepository } from '../persistence/repositories/repair-order.repository';
import { RepairRequestRepository } from '../persistence/repositories/repair-request.repository';

@Injectable()
export class RepairRequestService {
  private readonly logger = new Logger(RepairRequestService.name);

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly requests: RepairRequestRepository,
    private readonly orders: RepairOrderRepository,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async createRequest(
    vehicleId: string,
    customerId: string,
    description: string,
  ): Promise<RepairRequest> {
    const request = await this.unitOfWork.run('createRequest', (manager) =>
      this.requests.createRequest(manager, vehicleId, customerId, description),
    );

    this.logger.log(`Repair request ${request.id} filed`, { vehicleId, customerId });
    return request;
  }

  async getRequest(requestId: string): Promise<RepairRequest> {
    return this.unitOfWork.read('getRequest', (manager) =>
      this.requests.getById(requestId, manager),
    );
  }

  /**
   * Creates a Pending order from a pending request and marks the request as
   * converted, atomically. Listeners of `repair.order.created` run before this
   * resolves.
   */
  async convertToOrder(input: ConvertRequestInput): Promise<RepairOrder> {
    const order = await this.unitOfWork.run('convertToOrder', async (manager) => {
      const request = await this.requests.getById(input.requestId, manager);
      if (request.status !== RepairRequestStatus.PENDING) {
        throw new InvalidStateError(`Repair request ${request.id} was already converted`, {
          requestId: request.id,
          status: request.status,
        });
      }

      const created = await this.orders.createOrder(manager, {
        vehicleId: request.vehicleId,
        customerId: request.customerId,
        requestId: request.id,
        requiredStaffType: input.requiredStaffType,
        remarks: input.remarks,
      });
      await this.requests.markOrderCreated(manager, request.id);
      return created;
    });

    this.logger.log(`Repair request ${input.requestId} converted to order ${order.id}`, {
      requiredStaffType: input.requiredStaffType,
    });

    const event: RepairOrderCreatedEvent = {
      orderId: order.id,
      vehicleId: order.vehicleId,
      customerId: order.customerId,
      requestId: order.requestId,
      requiredStaffType: input.requiredStaffType,
    };
    await this.eventEmitter.emitAsync(RepairEventType.ORDER_CREATED, event);

    return order;
  }
}
