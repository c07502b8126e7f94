import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EnvironmentVariables, validateEnv } from './config/env.validation';
import { buildTypeOrmOptions } from './database/typeorm.config';
import { CranesModule } from './cranes/cranes.module';
import { IngestionModule } from './ingestion/ingestion.module';
import { MeasurementsModule } from './measurements/measurements.module';
import { KpiHttpModule } from './kpi/kpi-http.module';
import { HealthController } from './health/health.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) =>
        buildTypeOrmOptions(configService),
      inject: [ConfigService],
    }),
    CranesModule,
    MeasurementsModule,
    IngestionModule,
    KpiHttpModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
