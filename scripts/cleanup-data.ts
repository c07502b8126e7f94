/**
 * Delete measurement rows past their retention period.
 *
 * Usage:
 *   npx ts-node scripts/cleanup-data.ts all
 *   npx ts-node scripts/cleanup-data.ts motor 90
 *
 * Alarms are only deleted once acknowledged.
 * Exit codes: 0 done, 1 failed.
 */
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CleanupCommandModule } from '../src/measurements/cleanup-command.module';
import { MeasurementsService } from '../src/measurements/measurements.service';
import {
  parseCleanupArgs,
  runCleanupCommand,
} from '../src/measurements/data-cleanup.command';
import { EXIT_COMMAND_FAILED } from '../src/common/exit-codes';

const logger = new Logger('DataCleanup');

async function main(): Promise<number> {
  const args = parseCleanupArgs(process.argv.slice(2));
  const app = await NestFactory.createApplicationContext(
    CleanupCommandModule,
    { logger: ['log', 'warn', 'error'] },
  );
  try {
    return await runCleanupCommand(app.get(MeasurementsService), args, logger);
  } finally {
    await app.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = EXIT_COMMAND_FAILED;
  });
