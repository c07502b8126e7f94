import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { ENTITIES } from './entities';
import { EnvironmentVariables } from '../config/env.validation';

/**
 * TypeORM options built from the validated environment.
 *
 * Every statement is bounded by DB_STATEMENT_TIMEOUT_MS so a stuck
 * database surfaces as a query error instead of a hung ingestion worker.
 */
export function buildTypeOrmOptions(
  configService: ConfigService<EnvironmentVariables, true>,
): TypeOrmModuleOptions {
  const statementTimeout = configService.get('DB_STATEMENT_TIMEOUT_MS', {
    infer: true,
  });

  return {
    type: 'postgres',
    host: configService.get('DB_HOST', { infer: true }),
    port: configService.get('DB_PORT', { infer: true }),
    username: configService.get('DB_USERNAME', { infer: true }),
    password: configService.get('DB_PASSWORD', { infer: true }),
    database: configService.get('DB_DATABASE', { infer: true }),
    entities: ENTITIES,
    synchronize: configService.get('DB_SYNCHRONIZE', { infer: true }),
    logging: configService.get('NODE_ENV', { infer: true }) !== 'production',
    connectTimeoutMS: configService.get('DB_CONNECT_TIMEOUT_MS', {
      infer: true,
    }),
    extra: {
      statement_timeout: statementTimeout,
      query_timeout: statementTimeout,
    },
  };
}
