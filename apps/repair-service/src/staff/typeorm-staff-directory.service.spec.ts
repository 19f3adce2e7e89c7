import { TestingModule } from '@nestjs/testing';
import { StaffJobType, UserRole } from '@repairflow/shared';
import { createRepairTestingModule, seedUsers } from '../testing/repair-testing.module';
import { StaffDirectory, STAFF_DIRECTORY } from './staff-directory';

describe('TypeOrmStaffDirectory', () => {
  let module: TestingModule;
  let directory: StaffDirectory;

  beforeEach(async () => {
    const context = await createRepairTestingModule();
    module = context.module;
    directory = module.get<StaffDirectory>(STAFF_DIRECTORY);

    await seedUsers(context.dataSource, [
      { id: 'staff-2', name: 'Ben', jobType: StaffJobType.WELDER, hourlyRate: 45 },
      { id: 'staff-1', name: 'Ana', jobType: StaffJobType.WELDER, hourlyRate: 40 },
      { id: 'staff-3', name: 'Cai', jobType: StaffJobType.PAINT_WORKER, hourlyRate: 30 },
      { id: 'customer-1', name: 'Dee', role: UserRole.CUSTOMER },
      { id: 'admin-1', name: 'Eli', role: UserRole.ADMIN },
    ]);
  });

  afterEach(async () => {
    await module.close();
  });

  describe('eligibleStaff', () => {
    it('should return staff of the job type ordered by id', async () => {
      expect(await directory.eligibleStaff(StaffJobType.WELDER)).toEqual([
        { staffId: 'staff-1', name: 'Ana', jobType: StaffJobType.WELDER, hourlyRate: 40 },
        { staffId: 'staff-2', name: 'Ben', jobType: StaffJobType.WELDER, hourlyRate: 45 },
      ]);
    });

    it('should leave out the excluded staff member', async () => {
      const eligible = await directory.eligibleStaff(StaffJobType.WELDER, 'staff-1');

      expect(eligible.map((member) => member.staffId)).toEqual(['staff-2']);
    });

    it('should return nobody for a job type without staff', async () => {
      expect(await directory.eligibleStaff(StaffJobType.PARTS_SPECIALIST)).toEqual([]);
    });
  });

  describe('hourlyRate', () => {
    it('should return the rate of a staff member', async () => {
      expect(await directory.hourlyRate('staff-3')).toBe(30);
    });

    it('should return null for other roles and unknown users', async () => {
      expect(await directory.hourlyRate('customer-1')).toBeNull();
      expect(await directory.hourlyRate('nobody')).toBeNull();
    });
  });

  describe('findUser', () => {
    it('should expose staff details only on staff profiles', async () => {
      expect(await directory.findUser('staff-1')).toEqual({
        role: UserRole.STAFF,
        user: {
          id: 'staff-1',
          name: 'Ana',
          username: 'staff-1',
          email: null,
          phone: null,
          address: null,
        },
        staff: { jobType: StaffJobType.WELDER, hourlyRate: 40 },
      });
      expect(await directory.findUser('admin-1')).toEqual({
        role: UserRole.ADMIN,
        user: expect.objectContaining({ id: 'admin-1', name: 'Eli' }),
      });
    });

    it('should return null for an unknown user', async () => {
      expect(await directory.findUser('nobody')).toBeNull();
    });
  });
});
