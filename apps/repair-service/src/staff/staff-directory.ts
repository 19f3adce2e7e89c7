import { StaffJobType, StaffMember, UserProfile } from '@repairflow/shared';

export const STAFF_DIRECTORY = Symbol('STAFF_DIRECTORY');

/** Read-only view of staff accounts consumed by assignment and billing. */
export interface StaffDirectory {
  eligibleStaff(jobType: StaffJobType, excludeStaffId?: string): Promise<StaffMember[]>;
  hourlyRate(staffId: string): Promise<number | null>;
  findUser(userId: string): Promise<UserProfile | null>;
}
