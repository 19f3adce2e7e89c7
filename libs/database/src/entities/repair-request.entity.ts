import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { RepairRequestStatus } from '@repairflow/shared';

@Entity('repair_request')
@Index(['customerId', 'status'])
export class RepairRequest {
  @PrimaryColumn({ type: 'varchar', length: 36, name: 'request_id' })
  id!: string;

  @Column({ type: 'varchar', length: 36, name: 'vehicle_id' })
  vehicleId!: string;

  @Column({ type: 'varchar', length: 36, name: 'customer_id' })
  customerId!: string;

  @Column({ type: 'text' })
  description!: string;

  @Column({
    type: 'simple-enum',
    enum: RepairRequestStatus,
    default: RepairRequestStatus.PENDING,
  })
  status!: RepairRequestStatus;

  @Column({ type: 'varchar', length: 32, name: 'request_time' })
  requestTime!: string;
}
