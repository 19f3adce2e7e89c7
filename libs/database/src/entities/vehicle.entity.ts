import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { VehicleBrand, VehicleColor, VehicleType } from '@repairflow/shared';

@Entity('vehicle')
export class Vehicle {
  @PrimaryColumn({ type: 'varchar', length: 36, name: 'vehicle_id' })
  id!: string;

  @Column({ type: 'varchar', length: 36, name: 'customer_id' })
  @Index()
  customerId!: string;

  @Column({ type: 'varchar', length: 20, name: 'license_plate' })
  @Index({ unique: true })
  licensePlate!: string;

  @Column({ type: 'simple-enum', enum: VehicleBrand })
  brand!: VehicleBrand;

  @Column({ type: 'varchar', length: 100 })
  model!: string;

  @Column({ type: 'simple-enum', enum: VehicleType })
  type!: VehicleType;

  @Column({ type: 'simple-enum', enum: VehicleColor })
  color!: VehicleColor;

  @Column({ type: 'text', nullable: true })
  remarks!: string | null;
}
