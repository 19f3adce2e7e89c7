import { Module } from '@nestjs/common';
import { RollbackCoordinator } from './rollback-coordinator.service';

@Module({
  providers: [RollbackCoordinator],
  exports: [RollbackCoordinator],
})
export class RollbackModule {}
