import { Module } from '@nestjs/common';
import { StaffModule } from '../staff/staff.module';
import { AssignmentEngine } from './assignment-engine.service';
import { AssignmentEventsListener } from './assignment-events.listener';

@Module({
  imports: [StaffModule],
  providers: [AssignmentEngine, AssignmentEventsListener],
  exports: [AssignmentEngine],
})
export class AssignmentModule {}
