import { Module } from '@nestjs/common';
import { StaffModule } from '../staff/staff.module';
import { FeeCalculator } from './fee-calculator.service';

@Module({
  imports: [StaffModule],
  providers: [FeeCalculator],
  exports: [FeeCalculator],
})
export class FeesModule {}
