export type KpiRollupKind = 'hourly' | 'daily';

/**
 * A rollup command failed as a whole, e.g. the active cranes could not be
 * listed. Per-crane failures are reported in the batch result instead.
 */
export class KpiCommandError extends Error {
  readonly code = 'KPI_COMMAND_FAILURE';

  constructor(
    public readonly kind: KpiRollupKind,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`[${kind}] ${message}`);
    this.name = 'KpiCommandError';
  }
}
