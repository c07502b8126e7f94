import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { HourlyKpi } from '../database/entities/hourly-kpi.entity';
import { DailyKpi } from '../database/entities/daily-kpi.entity';
import { describeError } from '../common/retry';
import { CraneConfigurationService } from '../cranes/crane-configuration.service';
import {
  ActiveCrane,
  MeasurementsService,
} from '../measurements/measurements.service';
import {
  calculateOperationDurations,
  calculateTotalMassMoved,
  countLifts,
  OPERATION_FLAGS,
  OPERATIONS,
  Operation,
} from './calculators/operation.calculator';
import {
  calculateEnergyConsumption,
  calculateEnergyCost,
  calculateEnergyPerTon,
  calculateSystemEfficiency,
  summarizePower,
} from './calculators/energy.calculator';
import { calculateOee } from './calculators/oee.calculator';
import { aggregateDailyKpi } from './calculators/daily-kpi.aggregator';
import { dayWindow, hourWindow, TimeWindow } from './time-windows';
import { KpiCommandError, KpiRollupKind } from './kpi.errors';

/** The single shift daily rows are currently written for */
export const DEFAULT_SHIFT = 'day';

export interface RollupFailure {
  craneId: number;
  error: string;
}

/**
 * Outcome of one hourly or daily rollup run
 */
export interface RollupBatchResult {
  kind: KpiRollupKind;
  windowStart: Date;
  windowEnd: Date;
  processed: number;
  succeeded: number;
  /** Cranes without input for the window (daily only) */
  skipped: number;
  failed: RollupFailure[];
  durationMs: number;
}

type UnitOutcome = 'written' | 'skipped';

type HourlyKpiValues = QueryDeepPartialEntity<HourlyKpi>;

const HOURLY_UPDATE_COLUMNS = [
  'hourEnd',
  'hoistUpTime',
  'hoistDownTime',
  'ctLeftTime',
  'ctRightTime',
  'ltForwardTime',
  'ltReverseTime',
  'stopTime',
  'totalMotionTime',
  'hoistUpCount',
  'hoistDownCount',
  'ctLeftCount',
  'ctRightCount',
  'ltForwardCount',
  'ltReverseCount',
  'stopCount',
  'totalLifts',
  'totalMassMovedTonnes',
  'averageLoadPerLift',
  'totalEnergyKwh',
  'hourlyEnergyCost',
  'energyPerTon',
  'systemEfficiency',
  'averagePower',
  'peakPower',
  'availability',
  'performance',
  'quality',
  'oee',
  'updatedAt',
];

const DAILY_UPDATE_COLUMNS = [
  'totalOperationTime',
  'totalLifts',
  'totalOperationCount',
  'totalMassMovedTonnes',
  'totalEnergyKwh',
  'totalEnergyCost',
  'averageEnergyPerTon',
  'averageEfficiency',
  'peakLoad',
  'averagePowerDemand',
  'availability',
  'performance',
  'quality',
  'oee',
  'updatedAt',
];

type DurationColumn =
  | 'hoistUpTime'
  | 'hoistDownTime'
  | 'ctLeftTime'
  | 'ctRightTime'
  | 'ltForwardTime'
  | 'ltReverseTime'
  | 'stopTime';

type CountColumn =
  | 'hoistUpCount'
  | 'hoistDownCount'
  | 'ctLeftCount'
  | 'ctRightCount'
  | 'ltForwardCount'
  | 'ltReverseCount'
  | 'stopCount';

/** Hourly columns holding each operation's duration and sample count */
const OPERATION_COLUMNS: Record<
  Operation,
  { time: DurationColumn; count: CountColumn }
> = {
  hoist_up: { time: 'hoistUpTime', count: 'hoistUpCount' },
  hoist_down: { time: 'hoistDownTime', count: 'hoistDownCount' },
  ct_left: { time: 'ctLeftTime', count: 'ctLeftCount' },
  ct_right: { time: 'ctRightTime', count: 'ctRightCount' },
  lt_forward: { time: 'ltForwardTime', count: 'ltForwardCount' },
  lt_reverse: { time: 'ltReverseTime', count: 'ltReverseCount' },
  stop: { time: 'stopTime', count: 'stopCount' },
};

/**
 * KpiRollupService - hourly and daily KPI rollups
 *
 * Each run lists the active cranes once, then computes and upserts one row
 * per crane. A crane that fails is logged and reported in the batch result
 * without stopping the others. Upserts are keyed on (craneId, hourStart)
 * and (craneId, date, shift), so re-running a window replaces its rows with
 * identical values when the input has not changed.
 */
@Injectable()
export class KpiRollupService {
  private readonly logger = new Logger(KpiRollupService.name);

  constructor(
    @InjectRepository(HourlyKpi)
    private readonly hourlyKpiRepository: Repository<HourlyKpi>,
    @InjectRepository(DailyKpi)
    private readonly dailyKpiRepository: Repository<DailyKpi>,
    private readonly measurementsService: MeasurementsService,
    private readonly configurationService: CraneConfigurationService,
  ) {}

  /**
   * Compute the hour containing `at` for every active crane
   */
  async computeHourlyKpis(at: Date = new Date()): Promise<RollupBatchResult> {
    const window = hourWindow(at);
    return this.runBatch('hourly', window, (crane) =>
      this.computeCraneHourlyKpi(crane, window),
    );
  }

  /**
   * Aggregate the UTC day containing `at` from its hourly rows
   */
  async computeDailyKpis(at: Date = new Date()): Promise<RollupBatchResult> {
    const window = dayWindow(at);
    return this.runBatch('daily', window, (crane) =>
      this.computeCraneDailyKpi(crane, window.date, window),
    );
  }

  private async runBatch(
    kind: KpiRollupKind,
    window: TimeWindow,
    computeUnit: (crane: ActiveCrane) => Promise<UnitOutcome>,
  ): Promise<RollupBatchResult> {
    const startTime = Date.now();
    const result: RollupBatchResult = {
      kind,
      windowStart: window.start,
      windowEnd: window.end,
      processed: 0,
      succeeded: 0,
      skipped: 0,
      failed: [],
      durationMs: 0,
    };

    let cranes: ActiveCrane[];
    try {
      cranes = await this.measurementsService.findActiveCranes();
    } catch (error) {
      throw new KpiCommandError(
        kind,
        `Cannot list active cranes: ${describeError(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    for (const crane of cranes) {
      result.processed++;
      try {
        const outcome = await computeUnit(crane);
        if (outcome === 'written') {
          result.succeeded++;
        } else {
          result.skipped++;
        }
      } catch (error) {
        const message = describeError(error);
        result.failed.push({ craneId: crane.id, error: message });
        this.logger.error(
          `${kind} KPIs failed for crane ${crane.id} (${crane.craneName}): ${message}`,
        );
      }
    }

    result.durationMs = Date.now() - startTime;
    this.logger.log(
      `${kind} rollup for ${window.start.toISOString()}: ${result.succeeded} written, ${result.skipped} skipped, ${result.failed.length} failed (${result.durationMs}ms)`,
    );
    return result;
  }

  private async computeCraneHourlyKpi(
    crane: ActiveCrane,
    window: TimeWindow,
  ): Promise<UnitOutcome> {
    const values = await this.buildHourlyKpi(crane.id, window);

    await this.hourlyKpiRepository
      .createQueryBuilder()
      .insert()
      .into(HourlyKpi)
      .values(values)
      .orUpdate(HOURLY_UPDATE_COLUMNS, ['craneId', 'hourStart'])
      .execute();

    return 'written';
  }

  /**
   * Run every reducer over the window and assemble the hourly row.
   * The same measurement rows always give the same values.
   */
  async buildHourlyKpi(
    craneId: number,
    window: TimeWindow,
  ): Promise<HourlyKpiValues> {
    const [ioSamples, hoistUpSamples, powerSamples, loadSamples, config] =
      await Promise.all([
        this.measurementsService.findIoStatuses(craneId, window),
        this.measurementsService.findIoStatusesWithFlag(
          craneId,
          window,
          'hoistUp',
        ),
        this.measurementsService.findMotorMeasurements(craneId, window),
        this.measurementsService.findLoadMeasurements(craneId, window),
        this.configurationService.getEffective(craneId),
      ]);

    const counts = await this.countOperations(craneId, window);
    const durations = calculateOperationDurations(ioSamples);
    const totalLifts = countLifts(hoistUpSamples);
    const totalMassMovedTonnes = calculateTotalMassMoved(loadSamples);
    const totalEnergyKwh = calculateEnergyConsumption(powerSamples);
    const { averagePower, peakPower } = summarizePower(powerSamples);
    const energyPerTon = calculateEnergyPerTon(
      totalEnergyKwh,
      totalMassMovedTonnes,
    );
    const oee = calculateOee({
      samples: ioSamples,
      hoistUpSampleCount: hoistUpSamples.length,
      start: window.start,
      end: window.end,
    });

    const values: HourlyKpiValues = {
      craneId,
      hourStart: window.start,
      hourEnd: window.end,
      totalMotionTime: OPERATIONS.reduce((sum, op) => sum + durations[op], 0),
      totalLifts,
      totalMassMovedTonnes,
      averageLoadPerLift: totalLifts > 0 ? totalMassMovedTonnes / totalLifts : 0,
      totalEnergyKwh,
      hourlyEnergyCost: calculateEnergyCost(totalEnergyKwh, config.tariffRate),
      energyPerTon,
      systemEfficiency: calculateSystemEfficiency(
        energyPerTon,
        config.targetEnergyPerTon,
      ),
      averagePower,
      peakPower,
      ...oee,
    };

    for (const op of OPERATIONS) {
      values[OPERATION_COLUMNS[op].time] = durations[op];
      values[OPERATION_COLUMNS[op].count] = counts[op];
    }

    return values;
  }

  private async countOperations(
    craneId: number,
    window: TimeWindow,
  ): Promise<Record<Operation, number>> {
    const counts = await Promise.all(
      OPERATIONS.map((op) =>
        this.measurementsService.countIoFlag(
          craneId,
          window,
          OPERATION_FLAGS[op],
        ),
      ),
    );
    return {
      hoist_up: counts[0],
      hoist_down: counts[1],
      ct_left: counts[2],
      ct_right: counts[3],
      lt_forward: counts[4],
      lt_reverse: counts[5],
      stop: counts[6],
    };
  }

  private async computeCraneDailyKpi(
    crane: ActiveCrane,
    date: string,
    window: TimeWindow,
  ): Promise<UnitOutcome> {
    const hours = await this.measurementsService.findHourlyKpis(
      crane.id,
      window,
    );
    const daily = aggregateDailyKpi(hours);
    if (!daily) {
      this.logger.debug(`No hourly KPIs for crane ${crane.id} on ${date}`);
      return 'skipped';
    }

    await this.dailyKpiRepository
      .createQueryBuilder()
      .insert()
      .into(DailyKpi)
      .values({
        craneId: crane.id,
        date,
        shift: DEFAULT_SHIFT,
        ...daily,
      })
      .orUpdate(DAILY_UPDATE_COLUMNS, ['craneId', 'date', 'shift'])
      .execute();

    return 'written';
  }
}
