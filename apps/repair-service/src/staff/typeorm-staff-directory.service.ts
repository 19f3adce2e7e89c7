import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Not, Repository } from 'typeorm';
import { UserAccount } from '@repairflow/database';
import {
  BaseUser,
  isStaffProfile,
  StaffJobType,
  StaffMember,
  UserProfile,
  UserRole,
} from '@repairflow/shared';
import { StaffDirectory } from './staff-directory';

@Injectable()
export class TypeOrmStaffDirectory implements StaffDirectory {
  constructor(
    @InjectRepository(UserAccount)
    private readonly users: Repository<UserAccount>,
  ) {}

  async eligibleStaff(jobType: StaffJobType, excludeStaffId?: string): Promise<StaffMember[]> {
    const accounts = await this.users.find({
      where: {
        discriminator: UserRole.STAFF,
        jobType,
        ...(excludeStaffId ? { id: Not(excludeStaffId) } : {}),
      },
      order: { id: 'ASC' },
    });

    return accounts.map((account) => ({
      staffId: account.id,
      name: account.name,
      jobType,
      hourlyRate: account.hourlyRate,
    }));
  }

  async hourlyRate(staffId: string): Promise<number | null> {
    const profile = await this.findUser(staffId);
    if (!profile || !isStaffProfile(profile)) {
      return null;
    }
    return profile.staff.hourlyRate;
  }

  async findUser(userId: string): Promise<UserProfile | null> {
    const account = await this.users.findOne({ where: { id: userId } });
    return account ? toUserProfile(account) : null;
  }
}

export function toUserProfile(account: UserAccount): UserProfile {
  const user: BaseUser = {
    id: account.id,
    name: account.name,
    username: account.username,
    email: account.email,
    phone: account.phone,
    address: account.address,
  };

  switch (account.discriminator) {
    case UserRole.STAFF:
      return {
        role: UserRole.STAFF,
        user,
        staff: { jobType: account.jobType, hourlyRate: account.hourlyRate },
      };
    case UserRole.ADMIN:
      return { role: UserRole.ADMIN, user };
    case UserRole.CUSTOMER:
      return { role: UserRole.CUSTOMER, user };
  }
}
