export { KpiModule } from './kpi.module';
export { KpiRollupService } from './kpi-rollup.service';
export type { RollupBatchResult, RollupFailure } from './kpi-rollup.service';
export { KpiCommandError } from './kpi.errors';
export { runKpiCommand, parseKpiCommandArgs } from './kpi.command';
