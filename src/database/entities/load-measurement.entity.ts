import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  Index,
  CreateDateColumn,
} from 'typeorm';

export type LoadStatus = 'normal' | 'warning' | 'overload';

/**
 * LoadMeasurement Entity - load cell reading with the capacity it was
 * judged against.
 *
 * `loadPercentage` and `status` are computed at write time from `load` and
 * `capacity` (see buildLoadReading) and never stored out of sync with them.
 */
@Entity('crane_load_measurements')
@Index('idx_load_crane_timestamp', ['craneId', 'timestamp'])
export class LoadMeasurement {
  @PrimaryGeneratedColumn('increment', { type: 'bigint' })
  id!: string;

  @Column({ type: 'int' })
  craneId!: number;

  @Column({ type: 'timestamptz' })
  timestamp!: Date;

  /** Load in kg */
  @Column({ type: 'float' })
  load!: number;

  /** Capacity in kg */
  @Column({ type: 'float' })
  capacity!: number;

  @Column({ type: 'float' })
  loadPercentage!: number;

  @Column({ type: 'varchar', length: 20, default: 'normal' })
  status!: LoadStatus;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
