import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Crane } from '../database/entities/crane.entity';
import { IoStatus } from '../database/entities/io-status.entity';
import { MotorMeasurement } from '../database/entities/motor-measurement.entity';
import { LoadMeasurement } from '../database/entities/load-measurement.entity';
import { HourlyKpi } from '../database/entities/hourly-kpi.entity';
import { Alarm } from '../database/entities/alarm.entity';
import { MeasurementsService } from './measurements.service';

/**
 * MeasurementsModule
 *
 * Window queries over the measurement tables for the KPI engine, table
 * statistics for the health endpoint and retention cleanup.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([
      Crane,
      IoStatus,
      MotorMeasurement,
      LoadMeasurement,
      HourlyKpi,
      Alarm,
    ]),
  ],
  providers: [MeasurementsService],
  exports: [MeasurementsService],
})
export class MeasurementsModule {}
