import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

@Entity('repair_log')
export class RepairLog {
  @PrimaryColumn({ type: 'varchar', length: 36, name: 'log_id' })
  id!: string;

  @Column({ type: 'varchar', length: 36, name: 'order_id' })
  @Index()
  orderId!: string;

  @Column({ type: 'varchar', length: 36, name: 'staff_id' })
  staffId!: string;

  @Column({ type: 'varchar', length: 32, name: 'log_time' })
  logTime!: string;

  @Column({ type: 'text', name: 'log_message' })
  logMessage!: string;
}
