import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UserAccount } from '@repairflow/database';
import { STAFF_DIRECTORY } from './staff-directory';
import { TypeOrmStaffDirectory } from './typeorm-staff-directory.service';
import { STAFF_SELECTOR, UniformRandomStaffSelector } from './staff-selector';

@Module({
  imports: [TypeOrmModule.forFeature([UserAccount])],
  providers: [
    { provide: STAFF_DIRECTORY, useClass: TypeOrmStaffDirectory },
    { provide: STAFF_SELECTOR, useFactory: () => new UniformRandomStaffSelector() },
  ],
  exports: [STAFF_DIRECTORY, STAFF_SELECTOR],
})
export class StaffModule {}
