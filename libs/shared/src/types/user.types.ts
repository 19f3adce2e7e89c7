import { StaffJobType, UserRole } from '../enums/staff-job-type.enum';

/** Fields every account carries regardless of role. */
export interface BaseUser {
  id: string;
  name: string;
  username: string;
  email: string | null;
  phone: string | null;
  address: string | null;
}

export interface StaffDetails {
  jobType: StaffJobType | null;
  hourlyRate: number | null;
}

export interface CustomerProfile {
  role: UserRole.CUSTOMER;
  user: BaseUser;
}

export interface StaffProfile {
  role: UserRole.STAFF;
  user: BaseUser;
  staff: StaffDetails;
}

export interface AdminProfile {
  role: UserRole.ADMIN;
  user: BaseUser;
}

export type UserProfile = CustomerProfile | StaffProfile | AdminProfile;

/** A staff account as seen by assignment and billing. */
export interface StaffMember {
  staffId: string;
  name: string;
  jobType: StaffJobType;
  hourlyRate: number | null;
}

export function isStaffProfile(profile: UserProfile): profile is StaffProfile {
  return profile.role === UserRole.STAFF;
}
