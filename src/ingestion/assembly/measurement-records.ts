import { MotorReading } from '../../database/entities/motor-measurement.entity';
import { IoFlag } from '../../database/entities/io-status.entity';
import {
  AlarmLine,
  AlarmSeverity,
} from '../../database/entities/alarm.entity';
import { LoadStatus } from '../../database/entities/load-measurement.entity';

export type MotorRecord = Record<MotorReading, number | null> & {
  timestamp: Date;
  totalPower: number;
  totalCurrent: number;
};

export type IoRecord = Record<IoFlag, boolean> & {
  timestamp: Date;
};

/**
 * Load reading before its capacity is resolved.
 * `capacity` is set when the same message carried one.
 */
export interface LoadDraft {
  timestamp: Date;
  load: number;
  capacity: number | null;
}

export interface LoadReading {
  load: number;
  capacity: number;
  loadPercentage: number;
  status: LoadStatus;
}

export type AlarmRecord = Record<AlarmLine, boolean> & {
  timestamp: Date;
  alarmMessage: string;
  alarmSeverity: AlarmSeverity;
};

/**
 * Everything one message produces, grouped per kind and timestamp.
 */
export interface AssembledMessage {
  motor: MotorRecord[];
  io: IoRecord[];
  load: LoadDraft[];
  alarm: AlarmRecord[];
  /** Capacity (kg) reported by the message, last value wins */
  capacity: number | null;
  /** Routed fields whose value could not be coerced */
  rejectedFields: string[];
}
