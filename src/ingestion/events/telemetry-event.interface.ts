import { MeasurementKind } from '../routing/field-rules';
import { AlarmSeverity } from '../../database/entities/alarm.entity';

export interface MeasurementEvent {
  type: 'measurement';
  kind: MeasurementKind;
  craneId: number;
  timestamp: Date;
  summary: string;
}

export interface AlarmRaisedEvent {
  type: 'alarm-raised';
  craneId: number;
  timestamp: Date;
  severity: AlarmSeverity;
  summary: string;
}

export type TelemetryEvent = MeasurementEvent | AlarmRaisedEvent;
