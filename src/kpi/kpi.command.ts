import { Logger } from '@nestjs/common';
import { describeError } from '../common/retry';
import { KpiRollupService, RollupBatchResult } from './kpi-rollup.service';
import { KpiRollupKind } from './kpi.errors';
import {
  EXIT_COMMAND_FAILED,
  EXIT_OK,
  EXIT_PARTIAL_FAILURE,
} from '../common/exit-codes';

export { EXIT_COMMAND_FAILED, EXIT_OK, EXIT_PARTIAL_FAILURE };

export interface KpiCommandArgs {
  kind: KpiRollupKind;
  at: Date;
}

const USAGE = 'Usage: compute-kpis <hourly|daily> [ISO-8601 date]';

/**
 * Parse `hourly|daily [at]` command line arguments.
 * @throws Error with usage text on invalid input
 */
export function parseKpiCommandArgs(
  argv: string[],
  now: Date = new Date(),
): KpiCommandArgs {
  const [kind, at] = argv;
  if (kind !== 'hourly' && kind !== 'daily') {
    throw new Error(USAGE);
  }
  if (at === undefined) {
    return { kind, at: now };
  }
  const moment = new Date(at);
  if (Number.isNaN(moment.getTime())) {
    throw new Error(`Invalid date '${at}'. ${USAGE}`);
  }
  return { kind, at: moment };
}

/**
 * Run one rollup and map its outcome to a process exit code:
 * 0 all cranes done, 2 some cranes failed, 1 the command itself failed.
 */
export async function runKpiCommand(
  service: Pick<KpiRollupService, 'computeHourlyKpis' | 'computeDailyKpis'>,
  args: KpiCommandArgs,
  logger: Logger = new Logger('KpiCommand'),
): Promise<number> {
  let result: RollupBatchResult;
  try {
    result =
      args.kind === 'hourly'
        ? await service.computeHourlyKpis(args.at)
        : await service.computeDailyKpis(args.at);
  } catch (error) {
    logger.error(`${args.kind} KPI command failed: ${describeError(error)}`);
    return EXIT_COMMAND_FAILED;
  }

  for (const failure of result.failed) {
    logger.warn(`Crane ${failure.craneId}: ${failure.error}`);
  }
  return result.failed.length > 0 ? EXIT_PARTIAL_FAILURE : EXIT_OK;
}
