import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  Index,
  CreateDateColumn,
} from 'typeorm';

export const IO_FLAGS = [
  'start',
  'stop',
  'hoistUp',
  'hoistDown',
  'ctLeft',
  'ctRight',
  'ltForward',
  'ltReverse',
] as const;

export type IoFlag = (typeof IO_FLAGS)[number];

/**
 * IoStatus Entity - point sample of the crane's discrete I/O flags.
 *
 * A row is a snapshot, not a duration. Operation durations are derived by
 * comparing consecutive samples (see OperationCalculator).
 */
@Entity('crane_io_status')
@Index('idx_io_crane_timestamp', ['craneId', 'timestamp'])
export class IoStatus {
  @PrimaryGeneratedColumn('increment', { type: 'bigint' })
  id!: string;

  @Column({ type: 'int' })
  craneId!: number;

  @Column({ type: 'timestamptz' })
  timestamp!: Date;

  @Column({ type: 'boolean', default: false })
  start!: boolean;

  @Column({ type: 'boolean', default: false })
  stop!: boolean;

  @Column({ type: 'boolean', default: false })
  hoistUp!: boolean;

  @Column({ type: 'boolean', default: false })
  hoistDown!: boolean;

  @Column({ type: 'boolean', default: false })
  ctLeft!: boolean;

  @Column({ type: 'boolean', default: false })
  ctRight!: boolean;

  @Column({ type: 'boolean', default: false })
  ltForward!: boolean;

  @Column({ type: 'boolean', default: false })
  ltReverse!: boolean;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
