import { Module } from '@nestjs/common';
import { RepairLogService } from './repair-log.service';

@Module({
  providers: [RepairLogService],
  exports: [RepairLogService],
})
export class LogsModule {}
