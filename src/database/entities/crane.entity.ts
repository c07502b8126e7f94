import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';

export type CraneStatus = 'working' | 'idle' | 'maintenance' | 'error';

/**
 * Crane Entity - one monitored piece of lifting equipment.
 *
 * Created by provisioning and never deleted while historical measurements
 * reference it. Only `isActive` cranes take part in KPI rollups.
 */
@Entity('cranes')
export class Crane {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 100, unique: true })
  craneName!: string;

  @Column({ type: 'varchar', length: 50, default: 'EOT' })
  craneType!: string;

  /**
   * Rated capacity in tonnes.
   * Fallback for the load capacity when no configuration override exists
   * (`capacityTonnes * 1000` kg).
   */
  @Column({ type: 'float' })
  capacityTonnes!: number;

  @Column({ type: 'varchar', length: 100, default: '' })
  location!: string;

  @Column({ type: 'varchar', length: 20, default: 'idle' })
  status!: CraneStatus;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  /** Device identifiers attached to this crane (PLC, load cell, ...) */
  @Column({ type: 'jsonb', default: [] })
  deviceIds!: string[];

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
