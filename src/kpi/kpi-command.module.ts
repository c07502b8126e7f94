import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EnvironmentVariables, validateEnv } from '../config/env.validation';
import { buildTypeOrmOptions } from '../database/typeorm.config';
import { KpiModule } from './kpi.module';

/**
 * Application context for the KPI command line: database and rollups
 * only, no HTTP server and no MQTT listener.
 */
@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) =>
        buildTypeOrmOptions(configService),
      inject: [ConfigService],
    }),
    KpiModule,
  ],
})
export class KpiCommandModule {}
