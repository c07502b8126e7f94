import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

/**
 * CraneConfiguration Entity - tariff, energy targets and load capacity
 * override for a crane.
 *
 * Read-only input to the KPI engine. Ingestion only touches
 * `maxLoadCapacity`, when a load cell reports a new capacity.
 */
@Entity('crane_configurations')
@Index('uq_crane_configuration_crane', ['craneId'], { unique: true })
export class CraneConfiguration {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'int' })
  craneId!: number;

  /** Energy price per kWh */
  @Column({ type: 'float', default: 0.15 })
  tariffRate!: number;

  @Column({ type: 'varchar', length: 10, default: 'USD' })
  currency!: string;

  /** Target kWh per tonne lifted, used for system efficiency */
  @Column({ type: 'float', default: 1.0 })
  targetEnergyPerTon!: number;

  /** Actual load capacity in kg (overrides the nominal crane rating) */
  @Column({ type: 'float' })
  maxLoadCapacity!: number;

  @Column({ type: 'float', default: 80.0 })
  warningThreshold!: number;

  @Column({ type: 'float', default: 95.0 })
  overloadThreshold!: number;

  @Column({ type: 'float', default: 90.0 })
  targetAvailability!: number;

  @Column({ type: 'float', default: 95.0 })
  targetPerformance!: number;

  @Column({ type: 'float', default: 99.0 })
  targetQuality!: number;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
