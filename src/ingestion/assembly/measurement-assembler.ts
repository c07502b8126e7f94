import {
  MotorReading,
  POWER_READINGS,
  CURRENT_READINGS,
} from '../../database/entities/motor-measurement.entity';
import { IoFlag } from '../../database/entities/io-status.entity';
import {
  ALARM_LINES,
  AlarmLine,
} from '../../database/entities/alarm.entity';
import { LoadStatus } from '../../database/entities/load-measurement.entity';
import { FieldRoute } from '../routing/field-rules';
import {
  AlarmRecord,
  AssembledMessage,
  IoRecord,
  LoadDraft,
  LoadReading,
  MotorRecord,
} from './measurement-records';

export interface RoutedField {
  name: string;
  route: FieldRoute;
  value: unknown;
  timestamp: Date;
}

/** Load percentage thresholds (inclusive lower bounds) */
export const LOAD_WARNING_PERCENT = 80;
export const LOAD_OVERLOAD_PERCENT = 95;

const ALARM_LABELS: Record<AlarmLine, string> = {
  alarmOne: 'Alarm One',
  alarmTwo: 'Alarm Two',
  alarmThree: 'Alarm Three',
};

const TRUTHY_STRINGS = new Set(['true', '1', 'on', 'yes']);

type MotorPartial = Partial<Record<MotorReading, number>>;
type IoPartial = Partial<Record<IoFlag, boolean>>;
type AlarmPartial = Partial<Record<AlarmLine, boolean>>;

/**
 * Group routed fields into at most one partial record per kind and
 * timestamp. A record exists only if at least one of its own fields was
 * present, so a motor-only message never writes empty I/O, load or
 * alarm rows.
 */
export function assembleMeasurements(fields: RoutedField[]): AssembledMessage {
  const motor = new Map<number, MotorPartial>();
  const io = new Map<number, IoPartial>();
  const load = new Map<number, number>();
  const alarm = new Map<number, AlarmPartial>();
  const rejectedFields: string[] = [];
  let capacity: number | null = null;

  for (const field of fields) {
    const at = field.timestamp.getTime();
    const { route } = field;

    switch (route.kind) {
      case 'motor': {
        const reading = toNumber(field.value);
        if (reading === null) {
          rejectedFields.push(field.name);
          break;
        }
        groupOf(motor, at)[route.slot] = reading;
        break;
      }
      case 'io':
        groupOf(io, at)[route.slot] = toFlag(field.value);
        break;
      case 'load': {
        const reading = toNumber(field.value);
        if (reading === null) {
          rejectedFields.push(field.name);
          break;
        }
        load.set(at, reading);
        break;
      }
      case 'capacity': {
        const reading = toNumber(field.value);
        if (reading === null) {
          rejectedFields.push(field.name);
          break;
        }
        capacity = reading;
        break;
      }
      case 'alarm':
        groupOf(alarm, at)[route.slot] = toFlag(field.value);
        break;
    }
  }

  return {
    motor: sortedEntries(motor).map(([at, partial]) =>
      buildMotorRecord(new Date(at), partial),
    ),
    io: sortedEntries(io).map(([at, partial]) =>
      buildIoRecord(new Date(at), partial),
    ),
    load: sortedEntries(load).map(
      ([at, reading]): LoadDraft => ({
        timestamp: new Date(at),
        load: reading,
        capacity,
      }),
    ),
    alarm: sortedEntries(alarm).map(([at, partial]) =>
      buildAlarmRecord(new Date(at), partial),
    ),
    capacity,
    rejectedFields,
  };
}

export function isEmptyMessage(message: AssembledMessage): boolean {
  return (
    message.motor.length === 0 &&
    message.io.length === 0 &&
    message.load.length === 0 &&
    message.alarm.length === 0 &&
    message.capacity === null
  );
}

/**
 * Derive percentage and status for a load against a capacity (both kg).
 * The status is judged on the exact ratio; only the stored percentage is
 * rounded to 2 decimals.
 */
export function buildLoadReading(load: number, capacity: number): LoadReading {
  const ratio = capacity > 0 ? (load / capacity) * 100 : 0;
  return {
    load,
    capacity,
    loadPercentage: Math.round(ratio * 100) / 100,
    status: loadStatusFor(ratio),
  };
}

export function loadStatusFor(loadPercentage: number): LoadStatus {
  if (loadPercentage >= LOAD_OVERLOAD_PERCENT) {
    return 'overload';
  }
  if (loadPercentage >= LOAD_WARNING_PERCENT) {
    return 'warning';
  }
  return 'normal';
}

function buildMotorRecord(timestamp: Date, partial: MotorPartial): MotorRecord {
  const reading = (name: MotorReading): number | null => partial[name] ?? null;
  return {
    timestamp,
    hoistVoltage: reading('hoistVoltage'),
    hoistCurrent: reading('hoistCurrent'),
    hoistPower: reading('hoistPower'),
    hoistFrequency: reading('hoistFrequency'),
    ctVoltage: reading('ctVoltage'),
    ctCurrent: reading('ctCurrent'),
    ctPower: reading('ctPower'),
    ctFrequency: reading('ctFrequency'),
    ltVoltage: reading('ltVoltage'),
    ltCurrent: reading('ltCurrent'),
    ltPower: reading('ltPower'),
    ltFrequency: reading('ltFrequency'),
    totalPower: sumPresent(partial, POWER_READINGS),
    totalCurrent: sumPresent(partial, CURRENT_READINGS),
  };
}

function buildIoRecord(timestamp: Date, partial: IoPartial): IoRecord {
  const flag = (name: IoFlag): boolean => partial[name] ?? false;
  return {
    timestamp,
    start: flag('start'),
    stop: flag('stop'),
    hoistUp: flag('hoistUp'),
    hoistDown: flag('hoistDown'),
    ctLeft: flag('ctLeft'),
    ctRight: flag('ctRight'),
    ltForward: flag('ltForward'),
    ltReverse: flag('ltReverse'),
  };
}

function buildAlarmRecord(timestamp: Date, partial: AlarmPartial): AlarmRecord {
  const active = ALARM_LINES.filter((line) => partial[line] === true);
  return {
    timestamp,
    alarmOne: partial.alarmOne ?? false,
    alarmTwo: partial.alarmTwo ?? false,
    alarmThree: partial.alarmThree ?? false,
    alarmMessage:
      active.length > 0
        ? `Active alarms: ${active.map((line) => ALARM_LABELS[line]).join(', ')}`
        : '',
    alarmSeverity: active.length > 0 ? 'high' : 'low',
  };
}

function sumPresent(
  partial: MotorPartial,
  readings: readonly MotorReading[],
): number {
  return readings.reduce((total, reading) => total + (partial[reading] ?? 0), 0);
}

function groupOf<T>(groups: Map<number, Partial<T>>, at: number): Partial<T> {
  const existing = groups.get(at);
  if (existing) {
    return existing;
  }
  const group: Partial<T> = {};
  groups.set(at, group);
  return group;
}

function sortedEntries<T>(groups: Map<number, T>): Array<[number, T]> {
  return [...groups.entries()].sort(([a], [b]) => a - b);
}

/**
 * Finite number from a number or numeric string; null otherwise.
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Discrete input value to boolean.
 * true, non-zero numbers and "true" / "1" / "on" / "yes" are set.
 */
export function toFlag(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0;
  }
  if (typeof value === 'string') {
    return TRUTHY_STRINGS.has(value.trim().toLowerCase());
  }
  return false;
}
