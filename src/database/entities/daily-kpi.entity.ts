import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  Index,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';

/**
 * DailyKpi Entity - per-crane, per-date, per-shift aggregate of the
 * date's HourlyKpi rows.
 *
 * Only the `day` shift is produced today; the shift column is kept so
 * shift-based partitioning can be added without a schema change.
 */
@Entity('crane_daily_kpis')
@Index('uq_daily_kpi_crane_date_shift', ['craneId', 'date', 'shift'], {
  unique: true,
})
export class DailyKpi {
  @PrimaryGeneratedColumn('increment', { type: 'bigint' })
  id!: string;

  @Column({ type: 'int' })
  craneId!: number;

  /** Calendar date in UTC, `YYYY-MM-DD` */
  @Column({ type: 'date' })
  date!: string;

  @Column({ type: 'varchar', length: 20 })
  shift!: string;

  /** Seconds */
  @Column({ type: 'float', default: 0 })
  totalOperationTime!: number;

  @Column({ type: 'int', default: 0 })
  totalLifts!: number;

  @Column({ type: 'int', default: 0 })
  totalOperationCount!: number;

  @Column({ type: 'float', default: 0 })
  totalMassMovedTonnes!: number;

  @Column({ type: 'float', default: 0 })
  totalEnergyKwh!: number;

  @Column({ type: 'float', default: 0 })
  totalEnergyCost!: number;

  @Column({ type: 'float', default: 0 })
  averageEnergyPerTon!: number;

  @Column({ type: 'float', default: 0 })
  averageEfficiency!: number;

  /** Max of the hourly mass moved (tonnes), not an instantaneous load */
  @Column({ type: 'float', default: 0 })
  peakLoad!: number;

  @Column({ type: 'float', default: 0 })
  averagePowerDemand!: number;

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
