import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { RepairStatus, StaffJobType } from '@repairflow/shared';

@Entity('repair_order')
@Index(['status', 'orderTime'])
export class RepairOrder {
  @PrimaryColumn({ type: 'varchar', length: 36, name: 'order_id' })
  id!: string;

  @Column({ type: 'varchar', length: 36, name: 'vehicle_id' })
  @Index()
  vehicleId!: string;

  @Column({ type: 'varchar', length: 36, name: 'customer_id' })
  @Index()
  customerId!: string;

  @Column({ type: 'varchar', length: 36, name: 'request_id' })
  requestId!: string;

  @Column({
    type: 'simple-enum',
    enum: StaffJobType,
    nullable: true,
    name: 'required_staff_type',
  })
  requiredStaffType!: StaffJobType | null;

  @Column({
    type: 'simple-enum',
    enum: RepairStatus,
    default: RepairStatus.PENDING,
  })
  status!: RepairStatus;

  @Column({ type: 'varchar', length: 32, name: 'order_time' })
  orderTime!: string;

  @Column({ type: 'varchar', length: 32, nullable: true, name: 'finish_time' })
  finishTime!: string | null;

  @Column({ type: 'text', nullable: true })
  remarks!: string | null;
}
