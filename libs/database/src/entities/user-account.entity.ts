import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { StaffJobType, UserRole } from '@repairflow/shared';

/**
 * One row per account. `discriminator` selects the role; `job_type` and
 * `hourly_rate` are only meaningful for staff rows.
 */
@Entity('users')
@Index(['discriminator', 'jobType'])
export class UserAccount {
  @PrimaryColumn({ type: 'varchar', length: 36, name: 'user_id' })
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'varchar', length: 50 })
  @Index({ unique: true })
  username!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  email!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  phone!: string | null;

  @Column({ type: 'text', nullable: true })
  address!: string | null;

  @Column({ type: 'simple-enum', enum: UserRole })
  discriminator!: UserRole;

  @Column({ type: 'simple-enum', enum: StaffJobType, nullable: true, name: 'job_type' })
  jobType!: StaffJobType | null;

  @Column({ type: 'double precision', nullable: true, name: 'hourly_rate' })
  hourlyRate!: number | null;
}
