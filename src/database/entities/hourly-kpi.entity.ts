import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  Index,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';

/**
 * HourlyKpi Entity - per-crane aggregate for one hour bucket.
 *
 * Unique per (craneId, hourStart); the rollup upserts on that key so
 * recomputing an hour replaces the row instead of duplicating it.
 * Durations are in seconds.
 */
@Entity('crane_hourly_kpis')
@Index('uq_hourly_kpi_crane_hour', ['craneId', 'hourStart'], { unique: true })
export class HourlyKpi {
  @PrimaryGeneratedColumn('increment', { type: 'bigint' })
  id!: string;

  @Column({ type: 'int' })
  craneId!: number;

  @Column({ type: 'timestamptz' })
  hourStart!: Date;

  @Column({ type: 'timestamptz' })
  hourEnd!: Date;

  // Operation times
  @Column({ type: 'float', default: 0 })
  hoistUpTime!: number;

  @Column({ type: 'float', default: 0 })
  hoistDownTime!: number;

  @Column({ type: 'float', default: 0 })
  ctLeftTime!: number;

  @Column({ type: 'float', default: 0 })
  ctRightTime!: number;

  @Column({ type: 'float', default: 0 })
  ltForwardTime!: number;

  @Column({ type: 'float', default: 0 })
  ltReverseTime!: number;

  @Column({ type: 'float', default: 0 })
  stopTime!: number;

  @Column({ type: 'float', default: 0 })
  totalMotionTime!: number;

  // Operation counts
  @Column({ type: 'int', default: 0 })
  hoistUpCount!: number;

  @Column({ type: 'int', default: 0 })
  hoistDownCount!: number;

  @Column({ type: 'int', default: 0 })
  ctLeftCount!: number;

  @Column({ type: 'int', default: 0 })
  ctRightCount!: number;

  @Column({ type: 'int', default: 0 })
  ltForwardCount!: number;

  @Column({ type: 'int', default: 0 })
  ltReverseCount!: number;

  @Column({ type: 'int', default: 0 })
  stopCount!: number;

  // Lifting
  @Column({ type: 'int', default: 0 })
  totalLifts!: number;

  @Column({ type: 'float', default: 0 })
  totalMassMovedTonnes!: number;

  @Column({ type: 'float', default: 0 })
  averageLoadPerLift!: number;

  // Energy
  @Column({ type: 'float', default: 0 })
  totalEnergyKwh!: number;

  @Column({ type: 'float', default: 0 })
  hourlyEnergyCost!: number;

  @Column({ type: 'float', default: 0 })
  energyPerTon!: number;

  @Column({ type: 'float', default: 0 })
  systemEfficiency!: number;

  @Column({ type: 'float', default: 0 })
  averagePower!: number;

  @Column({ type: 'float', default: 0 })
  peakPower!: number;

  // OEE
  @Column({ type: 'float', default: 0 })
  availability!: number;

  @Column({ type: 'float', default: 0 })
  performance!: number;

  @Column({ type: 'float', default: 0 })
  quality!: number;

  @Column({ type: 'float', default: 0 })
  oee!: number;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
