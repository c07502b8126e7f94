import { MotorReading } from '../../database/entities/motor-measurement.entity';
import { IoFlag } from '../../database/entities/io-status.entity';
import { AlarmLine } from '../../database/entities/alarm.entity';

export type MeasurementKind = 'motor' | 'io' | 'load' | 'alarm';

/**
 * Where a payload field lands.
 * `capacity` is not a measurement kind: it updates the crane's capacity and
 * is attached to the load rows of the same message.
 */
export type FieldRoute =
  | { kind: 'motor'; slot: MotorReading }
  | { kind: 'io'; slot: IoFlag }
  | { kind: 'load'; slot: 'load' }
  | { kind: 'capacity'; slot: 'capacity' }
  | { kind: 'alarm'; slot: AlarmLine };

export interface FieldRule {
  /** Lowercase term matched by substring containment */
  term: string;
  route: FieldRoute;
}

/**
 * Ordered routing table. The first rule whose term is contained in the
 * lowercased field name wins, so order decides ambiguous names:
 * - "hoist_up_start" is I/O `start`, not `hoistUp`
 * - "overload_detect" is a `load` reading
 * - "load_capacity" is a `load` reading, not a capacity update
 */
export const FIELD_RULES: readonly FieldRule[] = [
  { term: 'hoist_voltage', route: { kind: 'motor', slot: 'hoistVoltage' } },
  { term: 'hoist_current', route: { kind: 'motor', slot: 'hoistCurrent' } },
  { term: 'hoist_power', route: { kind: 'motor', slot: 'hoistPower' } },
  { term: 'hoist_frequency', route: { kind: 'motor', slot: 'hoistFrequency' } },
  { term: 'ct_voltage', route: { kind: 'motor', slot: 'ctVoltage' } },
  { term: 'ct_current', route: { kind: 'motor', slot: 'ctCurrent' } },
  { term: 'ct_power', route: { kind: 'motor', slot: 'ctPower' } },
  { term: 'ct_frequency', route: { kind: 'motor', slot: 'ctFrequency' } },
  { term: 'lt_voltage', route: { kind: 'motor', slot: 'ltVoltage' } },
  { term: 'lt_current', route: { kind: 'motor', slot: 'ltCurrent' } },
  { term: 'lt_power', route: { kind: 'motor', slot: 'ltPower' } },
  { term: 'lt_frequency', route: { kind: 'motor', slot: 'ltFrequency' } },

  { term: 'start', route: { kind: 'io', slot: 'start' } },
  { term: 'stop', route: { kind: 'io', slot: 'stop' } },
  { term: 'hoist_up', route: { kind: 'io', slot: 'hoistUp' } },
  { term: 'hoist_down', route: { kind: 'io', slot: 'hoistDown' } },
  { term: 'ct_left', route: { kind: 'io', slot: 'ctLeft' } },
  { term: 'ct_right', route: { kind: 'io', slot: 'ctRight' } },
  { term: 'lt_forward', route: { kind: 'io', slot: 'ltForward' } },
  { term: 'lt_reverse', route: { kind: 'io', slot: 'ltReverse' } },

  { term: 'load', route: { kind: 'load', slot: 'load' } },
  { term: 'capacity', route: { kind: 'capacity', slot: 'capacity' } },

  { term: 'alarm_one', route: { kind: 'alarm', slot: 'alarmOne' } },
  { term: 'alarm_two', route: { kind: 'alarm', slot: 'alarmTwo' } },
  { term: 'alarm_three', route: { kind: 'alarm', slot: 'alarmThree' } },
];
