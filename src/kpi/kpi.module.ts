import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { HourlyKpi } from '../database/entities/hourly-kpi.entity';
import { DailyKpi } from '../database/entities/daily-kpi.entity';
import { CranesModule } from '../cranes/cranes.module';
import { MeasurementsModule } from '../measurements/measurements.module';
import { KpiRollupService } from './kpi-rollup.service';

/**
 * KpiModule
 *
 * Hourly/daily KPI and OEE rollups over the measurement tables.
 * The HTTP trigger lives in KpiHttpModule so the CLI can boot without it.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([HourlyKpi, DailyKpi]),
    CranesModule,
    MeasurementsModule,
  ],
  providers: [KpiRollupService],
  exports: [KpiRollupService],
})
export class KpiModule {}
