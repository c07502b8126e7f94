import { Logger } from '@nestjs/common';
import { describeError } from '../common/retry';
import { EXIT_COMMAND_FAILED, EXIT_OK } from '../common/exit-codes';
import {
  MeasurementsService,
  RETENTION_SCOPES,
  RetentionScope,
} from './measurements.service';

export const DEFAULT_RETENTION_DAYS = 30;

export interface CleanupCommandArgs {
  scopes: readonly RetentionScope[];
  retentionDays: number;
  cutoff: Date;
}

const USAGE =
  'Usage: cleanup-data <all|motor|io|load|alarms> [retention days, default 30]';

function isRetentionScope(value: string): value is RetentionScope {
  return RETENTION_SCOPES.some((scope) => scope === value);
}

/**
 * Parse `<scope> [days]`. The cutoff is `now` minus the retention period.
 * @throws Error with usage text on invalid input
 */
export function parseCleanupArgs(
  argv: string[],
  now: Date = new Date(),
): CleanupCommandArgs {
  const [scope = 'all', days] = argv;

  let scopes: readonly RetentionScope[];
  if (scope === 'all') {
    scopes = RETENTION_SCOPES;
  } else if (isRetentionScope(scope)) {
    scopes = [scope];
  } else {
    throw new Error(`Unknown data type '${scope}'. ${USAGE}`);
  }

  const retentionDays =
    days === undefined ? DEFAULT_RETENTION_DAYS : Number(days);
  if (!Number.isInteger(retentionDays) || retentionDays < 1) {
    throw new Error(`Invalid retention '${days}'. ${USAGE}`);
  }

  return {
    scopes,
    retentionDays,
    cutoff: new Date(now.getTime() - retentionDays * 86_400_000),
  };
}

export async function runCleanupCommand(
  service: Pick<MeasurementsService, 'purgeOlderThan'>,
  args: CleanupCommandArgs,
  logger: Logger = new Logger('DataCleanup'),
): Promise<number> {
  try {
    const result = await service.purgeOlderThan(args.cutoff, args.scopes);
    logger.log(
      `Deleted ${result.deletedCount} record(s) older than ${args.retentionDays} day(s)`,
    );
    return EXIT_OK;
  } catch (error) {
    logger.error(`Data cleanup failed: ${describeError(error)}`);
    return EXIT_COMMAND_FAILED;
  }
}
