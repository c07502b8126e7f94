import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  Index,
  CreateDateColumn,
} from 'typeorm';

export const MOTOR_READINGS = [
  'hoistVoltage',
  'hoistCurrent',
  'hoistPower',
  'hoistFrequency',
  'ctVoltage',
  'ctCurrent',
  'ctPower',
  'ctFrequency',
  'ltVoltage',
  'ltCurrent',
  'ltPower',
  'ltFrequency',
] as const;

export type MotorReading = (typeof MOTOR_READINGS)[number];

/** Readings summed into `totalPower` / `totalCurrent` */
export const POWER_READINGS = ['hoistPower', 'ctPower', 'ltPower'] as const;
export const CURRENT_READINGS = [
  'hoistCurrent',
  'ctCurrent',
  'ltCurrent',
] as const;

/**
 * MotorMeasurement Entity - electrical readings of the three crane drives.
 *
 * Drives:
 * - hoist: lifting motor
 * - ct: cross travel (trolley)
 * - lt: long travel (gantry)
 *
 * A message may carry any subset of the twelve readings; absent readings
 * stay null. `totalPower` / `totalCurrent` are the sums of the readings
 * present in the same message, never a running total across messages.
 * Power is in kW, current in A, voltage in V, frequency in Hz.
 */
@Entity('crane_motor_measurements')
@Index('idx_motor_crane_timestamp', ['craneId', 'timestamp'])
export class MotorMeasurement {
  @PrimaryGeneratedColumn('increment', { type: 'bigint' })
  id!: string;

  @Column({ type: 'int' })
  craneId!: number;

  @Column({ type: 'timestamptz' })
  timestamp!: Date;

  @Column({ type: 'float', nullable: true })
  hoistVoltage!: number | null;

  @Column({ type: 'float', nullable: true })
  hoistCurrent!: number | null;

  @Column({ type: 'float', nullable: true })
  hoistPower!: number | null;

  @Column({ type: 'float', nullable: true })
  hoistFrequency!: number | null;

  @Column({ type: 'float', nullable: true })
  ctVoltage!: number | null;

  @Column({ type: 'float', nullable: true })
  ctCurrent!: number | null;

  @Column({ type: 'float', nullable: true })
  ctPower!: number | null;

  @Column({ type: 'float', nullable: true })
  ctFrequency!: number | null;

  @Column({ type: 'float', nullable: true })
  ltVoltage!: number | null;

  @Column({ type: 'float', nullable: true })
  ltCurrent!: number | null;

  @Column({ type: 'float', nullable: true })
  ltPower!: number | null;

  @Column({ type: 'float', nullable: true })
  ltFrequency!: number | null;

  @Column({ type: 'float', nullable: true })
  totalPower!: number | null;

  @Column({ type: 'float', nullable: true })
  totalCurrent!: number | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
