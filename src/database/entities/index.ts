import { Crane } from './crane.entity';
import { TopicBinding } from './topic-binding.entity';
import { CraneConfiguration } from './crane-configuration.entity';
import { FieldMapping } from './field-mapping.entity';
import { MotorMeasurement } from './motor-measurement.entity';
import { IoStatus } from './io-status.entity';
import { LoadMeasurement } from './load-measurement.entity';
import { Alarm } from './alarm.entity';
import { HourlyKpi } from './hourly-kpi.entity';
import { DailyKpi } from './daily-kpi.entity';

export {
  Crane,
  TopicBinding,
  CraneConfiguration,
  FieldMapping,
  MotorMeasurement,
  IoStatus,
  LoadMeasurement,
  Alarm,
  HourlyKpi,
  DailyKpi,
};

/** Every entity registered with the TypeORM data source */
export const ENTITIES = [
  Crane,
  TopicBinding,
  CraneConfiguration,
  FieldMapping,
  MotorMeasurement,
  IoStatus,
  LoadMeasurement,
  Alarm,
  HourlyKpi,
  DailyKpi,
];
