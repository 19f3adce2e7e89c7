import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { materialTotalPrice } from '@repairflow/shared';

@Entity('material')
export class Material {
  @PrimaryColumn({ type: 'varchar', length: 36, name: 'material_id' })
  id!: string;

  @Column({ type: 'varchar', length: 36, name: 'log_id' })
  @Index()
  logId!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'double precision' })
  quantity!: number;

  @Column({ type: 'double precision', name: 'unit_price' })
  unitPrice!: number;

  @Column({ type: 'text', nullable: true })
  remarks!: string | null;

  get totalPrice(): number {
    return materialTotalPrice(this);
  }
}
