import { Module } from '@nestjs/common';
import { RepairOrderService } from './repair-order.service';
import { RepairRequestService } from './repair-request.service';

@Module({
  providers: [RepairOrderService, RepairRequestService],
  exports: [RepairOrderService, RepairRequestService],
})
export class OrdersModule {}
