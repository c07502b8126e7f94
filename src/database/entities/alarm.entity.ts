import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  Index,
  CreateDateColumn,
} from 'typeorm';

export type AlarmSeverity = 'low' | 'medium' | 'high' | 'critical';

export const ALARM_LINES = ['alarmOne', 'alarmTwo', 'alarmThree'] as const;

export type AlarmLine = (typeof ALARM_LINES)[number];

/**
 * Alarm Entity - state of the three PLC alarm lines at one timestamp.
 *
 * `isAcknowledged` belongs to operators; ingestion always writes false.
 */
@Entity('crane_alarms')
@Index('idx_alarm_crane_timestamp', ['craneId', 'timestamp'])
export class Alarm {
  @PrimaryGeneratedColumn('increment', { type: 'bigint' })
  id!: string;

  @Column({ type: 'int' })
  craneId!: number;

  @Column({ type: 'timestamptz' })
  timestamp!: Date;

  @Column({ type: 'boolean', default: false })
  alarmOne!: boolean;

  @Column({ type: 'boolean', default: false })
  alarmTwo!: boolean;

  @Column({ type: 'boolean', default: false })
  alarmThree!: boolean;

  @Column({ type: 'text', default: '' })
  alarmMessage!: string;

  @Column({ type: 'varchar', length: 20, default: 'low' })
  alarmSeverity!: AlarmSeverity;

  @Column({ type: 'boolean', default: false })
  isAcknowledged!: boolean;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
