import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EnvironmentVariables, validateEnv } from '../config/env.validation';
import { buildTypeOrmOptions } from '../database/typeorm.config';
import { MeasurementsModule } from './measurements.module';

/**
 * Application context for the retention cleanup command.
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
    MeasurementsModule,
  ],
})
export class CleanupCommandModule {}
