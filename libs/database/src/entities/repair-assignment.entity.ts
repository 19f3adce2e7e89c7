import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { AssignmentStatus } from '@repairflow/shared';

@Entity('repair_assignment')
@Index(['orderId', 'status'])
// at most one pending or accepted assignment per order
@Index('UQ_repair_assignment_live_order', ['orderId'], {
  unique: true,
  where: "status IN ('pending', 'accepted')",
})
export class RepairAssignment {
  @PrimaryColumn({ type: 'varchar', length: 36, name: 'assignment_id' })
  id!: string;

  @Column({ type: 'varchar', length: 36, name: 'order_id' })
  orderId!: string;

  @Column({ type: 'varchar', length: 36, name: 'staff_id' })
  @Index()
  staffId!: string;

  @Column({
    type: 'simple-enum',
    enum: AssignmentStatus,
    default: AssignmentStatus.PENDING,
  })
  status!: AssignmentStatus;

  // hours, filled in when the order is finished
  @Column({ type: 'double precision', nullable: true, name: 'time_worked' })
  timeWorked!: number | null;

  @Column({ type: 'varchar', length: 32, name: 'assigned_at' })
  assignedAt!: string;
}
