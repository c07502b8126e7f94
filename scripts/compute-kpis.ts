/**
 * Compute hourly or daily KPIs once, for cron or manual backfill.
 *
 * Usage:
 *   npx ts-node scripts/compute-kpis.ts hourly
 *   npx ts-node scripts/compute-kpis.ts daily 2024-06-15
 *
 * Exit codes: 0 done, 1 command failed, 2 some cranes failed.
 */
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { KpiCommandModule } from '../src/kpi/kpi-command.module';
import { KpiRollupService } from '../src/kpi/kpi-rollup.service';
import {
  EXIT_COMMAND_FAILED,
  parseKpiCommandArgs,
  runKpiCommand,
} from '../src/kpi/kpi.command';

const logger = new Logger('ComputeKpis');

async function main(): Promise<number> {
  const args = parseKpiCommandArgs(process.argv.slice(2));
  const app = await NestFactory.createApplicationContext(KpiCommandModule, {
    logger: ['log', 'warn', 'error'],
  });
  try {
    return await runKpiCommand(app.get(KpiRollupService), args, logger);
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
