import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { AuditOperation } from '@repairflow/shared';

/**
 * Append-only change record. `log_id` grows with every append and orders the
 * log newest-first; `operated_at` is informational.
 */
@Entity('audit_log')
@Index(['tableName', 'recordId'])
@Index(['operation'])
export class AuditLogEntry {
  @PrimaryGeneratedColumn({ name: 'log_id' })
  id!: number;

  @Column({ type: 'varchar', length: 64, name: 'table_name' })
  tableName!: string;

  @Column({ type: 'varchar', length: 36, name: 'record_id' })
  recordId!: string;

  @Column({ type: 'simple-enum', enum: AuditOperation })
  operation!: AuditOperation;

  @Column({ type: 'text', nullable: true, name: 'old_data' })
  oldData!: string | null;

  @Column({ type: 'text', nullable: true, name: 'new_data' })
  newData!: string | null;

  @Column({ type: 'varchar', length: 32, name: 'operated_at' })
  operatedAt!: string;
}
