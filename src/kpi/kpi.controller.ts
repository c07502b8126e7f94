import {
  BadRequestException,
  Controller,
  HttpCode,
  Logger,
  Post,
  Query,
  ServiceUnavailableException,
} from '@nestjs/common';
import { KpiRollupService, RollupBatchResult } from './kpi-rollup.service';
import { KpiCommandError } from './kpi.errors';

/**
 * KpiController
 *
 * Trigger endpoints for the KPI rollups, meant for an external scheduler.
 *
 * Usage:
 *   POST /kpi/hourly                         (current hour)
 *   POST /kpi/hourly?at=2024-06-15T10:30:00Z (backfill that hour)
 *   POST /kpi/daily?at=2024-06-15
 */
@Controller('kpi')
export class KpiController {
  private readonly logger = new Logger(KpiController.name);

  constructor(private readonly kpiRollupService: KpiRollupService) {}

  @Post('hourly')
  @HttpCode(200)
  async computeHourly(@Query('at') at?: string): Promise<RollupBatchResult> {
    const moment = this.parseAt(at);
    return this.run(() => this.kpiRollupService.computeHourlyKpis(moment));
  }

  @Post('daily')
  @HttpCode(200)
  async computeDaily(@Query('at') at?: string): Promise<RollupBatchResult> {
    const moment = this.parseAt(at);
    return this.run(() => this.kpiRollupService.computeDailyKpis(moment));
  }

  private parseAt(at?: string): Date {
    if (at === undefined || at === '') {
      return new Date();
    }
    const moment = new Date(at);
    if (Number.isNaN(moment.getTime())) {
      throw new BadRequestException(
        `Invalid 'at' parameter: '${at}'. Expected an ISO-8601 date or datetime.`,
      );
    }
    return moment;
  }

  private async run(
    command: () => Promise<RollupBatchResult>,
  ): Promise<RollupBatchResult> {
    try {
      return await command();
    } catch (error) {
      if (error instanceof KpiCommandError) {
        this.logger.error(error.message);
        throw new ServiceUnavailableException(error.message);
      }
      throw error;
    }
  }
}
