import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

@Entity('feedback')
export class Feedback {
  @PrimaryColumn({ type: 'varchar', length: 36, name: 'feedback_id' })
  id!: string;

  @Column({ type: 'varchar', length: 36, name: 'customer_id' })
  @Index()
  customerId!: string;

  @Column({ type: 'varchar', length: 36, name: 'log_id' })
  @Index()
  logId!: string;

  // 1 to 5
  @Column({ type: 'integer' })
  rating!: number;

  @Column({ type: 'text', nullable: true })
  comments!: string | null;

  @Column({ type: 'varchar', length: 32, name: 'feedback_time' })
  feedbackTime!: string;
}
