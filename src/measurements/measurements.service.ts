import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  And,
  DeleteResult,
  FindOperator,
  FindOptionsWhere,
  LessThan,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { Crane } from '../database/entities/crane.entity';
import { IoFlag, IoStatus } from '../database/entities/io-status.entity';
import { MotorMeasurement } from '../database/entities/motor-measurement.entity';
import { LoadMeasurement } from '../database/entities/load-measurement.entity';
import { HourlyKpi } from '../database/entities/hourly-kpi.entity';
import { Alarm } from '../database/entities/alarm.entity';
import { TimeWindow } from '../kpi/time-windows';

export type IoSampleRow = Pick<
  IoStatus,
  | 'timestamp'
  | 'start'
  | 'stop'
  | 'hoistUp'
  | 'hoistDown'
  | 'ctLeft'
  | 'ctRight'
  | 'ltForward'
  | 'ltReverse'
>;

export type PowerSampleRow = Pick<MotorMeasurement, 'timestamp' | 'totalPower'>;

export type LoadSampleRow = Pick<LoadMeasurement, 'timestamp' | 'load'>;

export type ActiveCrane = Pick<Crane, 'id' | 'craneName'>;

/** Motor data newer than this counts as data still flowing */
export const RECENT_DATA_MINUTES = 5;

export interface DataStatistics {
  motorMeasurements: number;
  ioStatus: number;
  loadMeasurements: number;
  alarms: number;
  totalRecords: number;
}

export interface SystemStatus {
  recentDataFlow: boolean;
  /** Unacknowledged alarm rows */
  activeAlarms: number;
  activeCranes: number;
  workingCranes: number;
}

export const RETENTION_SCOPES = ['motor', 'io', 'load', 'alarms'] as const;
export type RetentionScope = (typeof RETENTION_SCOPES)[number];

export interface PurgeResult {
  cutoff: Date;
  deleted: Partial<Record<RetentionScope, number>>;
  deletedCount: number;
}

/**
 * MeasurementsService - read side of the measurement tables.
 *
 * Every range query is half-open `[start, end)` and ordered by timestamp
 * ascending, so a sample on an hour boundary belongs to exactly one window.
 */
@Injectable()
export class MeasurementsService {
  private readonly logger = new Logger(MeasurementsService.name);

  constructor(
    @InjectRepository(Crane)
    private readonly craneRepository: Repository<Crane>,
    @InjectRepository(IoStatus)
    private readonly ioStatusRepository: Repository<IoStatus>,
    @InjectRepository(MotorMeasurement)
    private readonly motorRepository: Repository<MotorMeasurement>,
    @InjectRepository(LoadMeasurement)
    private readonly loadRepository: Repository<LoadMeasurement>,
    @InjectRepository(HourlyKpi)
    private readonly hourlyKpiRepository: Repository<HourlyKpi>,
    @InjectRepository(Alarm)
    private readonly alarmRepository: Repository<Alarm>,
  ) {}

  async findActiveCranes(): Promise<ActiveCrane[]> {
    return this.craneRepository.find({
      where: { isActive: true },
      select: { id: true, craneName: true },
      order: { id: 'ASC' },
    });
  }

  async findIoStatuses(
    craneId: number,
    window: TimeWindow,
  ): Promise<IoSampleRow[]> {
    return this.ioStatusRepository.find({
      where: { craneId, timestamp: inWindow(window) },
      select: {
        timestamp: true,
        start: true,
        stop: true,
        hoistUp: true,
        hoistDown: true,
        ctLeft: true,
        ctRight: true,
        ltForward: true,
        ltReverse: true,
      },
      order: { timestamp: 'ASC', id: 'ASC' },
    });
  }

  /**
   * Samples with one flag set, e.g. hoist-up samples for lift counting
   */
  async findIoStatusesWithFlag(
    craneId: number,
    window: TimeWindow,
    flag: IoFlag,
  ): Promise<Array<Pick<IoStatus, 'timestamp'>>> {
    return this.ioStatusRepository.find({
      where: flagSetInWindow(craneId, window, flag),
      select: { timestamp: true },
      order: { timestamp: 'ASC', id: 'ASC' },
    });
  }

  async countIoFlag(
    craneId: number,
    window: TimeWindow,
    flag: IoFlag,
  ): Promise<number> {
    return this.ioStatusRepository.count({
      where: flagSetInWindow(craneId, window, flag),
    });
  }

  async findMotorMeasurements(
    craneId: number,
    window: TimeWindow,
  ): Promise<PowerSampleRow[]> {
    return this.motorRepository.find({
      where: { craneId, timestamp: inWindow(window) },
      select: { timestamp: true, totalPower: true },
      order: { timestamp: 'ASC', id: 'ASC' },
    });
  }

  async findLoadMeasurements(
    craneId: number,
    window: TimeWindow,
  ): Promise<LoadSampleRow[]> {
    return this.loadRepository.find({
      where: { craneId, timestamp: inWindow(window) },
      select: { timestamp: true, load: true },
      order: { timestamp: 'ASC', id: 'ASC' },
    });
  }

  async findHourlyKpis(
    craneId: number,
    window: TimeWindow,
  ): Promise<HourlyKpi[]> {
    const rows = await this.hourlyKpiRepository.find({
      where: { craneId, hourStart: inWindow(window) },
      order: { hourStart: 'ASC' },
    });
    this.logger.debug(
      `Found ${rows.length} hourly KPI row(s) for crane ${craneId} from ${window.start.toISOString()}`,
    );
    return rows;
  }

  /** Row counts of the measurement tables */
  async getDataStatistics(): Promise<DataStatistics> {
    const [motorMeasurements, ioStatus, loadMeasurements, alarms] =
      await Promise.all([
        this.motorRepository.count(),
        this.ioStatusRepository.count(),
        this.loadRepository.count(),
        this.alarmRepository.count(),
      ]);
    return {
      motorMeasurements,
      ioStatus,
      loadMeasurements,
      alarms,
      totalRecords: motorMeasurements + ioStatus + loadMeasurements + alarms,
    };
  }

  async getSystemStatus(now: Date = new Date()): Promise<SystemStatus> {
    const recentThreshold = new Date(
      now.getTime() - RECENT_DATA_MINUTES * 60_000,
    );
    const [recentSample, activeAlarms, activeCranes, workingCranes] =
      await Promise.all([
        this.motorRepository.findOne({
          where: { timestamp: MoreThanOrEqual(recentThreshold) },
          select: { id: true },
        }),
        this.alarmRepository.count({ where: { isAcknowledged: false } }),
        this.craneRepository.count({ where: { isActive: true } }),
        this.craneRepository.count({ where: { status: 'working' } }),
      ]);
    return {
      recentDataFlow: recentSample !== null,
      activeAlarms,
      activeCranes,
      workingCranes,
    };
  }

  /**
   * Delete rows older than `cutoff` for the given tables.
   * Only acknowledged alarms are ever deleted.
   */
  async purgeOlderThan(
    cutoff: Date,
    scopes: readonly RetentionScope[],
  ): Promise<PurgeResult> {
    const deleted: Partial<Record<RetentionScope, number>> = {};
    let deletedCount = 0;
    for (const scope of scopes) {
      const result = await this.deleteScope(scope, LessThan(cutoff));
      const count = result.affected ?? 0;
      deleted[scope] = count;
      deletedCount += count;
    }

    this.logger.log(
      `Deleted ${deletedCount} row(s) older than ${cutoff.toISOString()}`,
    );
    return { cutoff, deleted, deletedCount };
  }

  private deleteScope(
    scope: RetentionScope,
    before: FindOperator<Date>,
  ): Promise<DeleteResult> {
    switch (scope) {
      case 'motor':
        return this.motorRepository.delete({ timestamp: before });
      case 'io':
        return this.ioStatusRepository.delete({ timestamp: before });
      case 'load':
        return this.loadRepository.delete({ timestamp: before });
      case 'alarms':
        return this.alarmRepository.delete({
          timestamp: before,
          isAcknowledged: true,
        });
    }
  }
}

function inWindow(window: TimeWindow): FindOperator<Date> {
  return And(MoreThanOrEqual(window.start), LessThan(window.end));
}

function flagSetInWindow(
  craneId: number,
  window: TimeWindow,
  flag: IoFlag,
): FindOptionsWhere<IoStatus> {
  const where: FindOptionsWhere<IoStatus> = {
    craneId,
    timestamp: inWindow(window),
  };
  where[flag] = true;
  return where;
}
