import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { And, LessThan, MoreThanOrEqual } from 'typeorm';
import { MeasurementsService } from './measurements.service';
import { Crane } from '../database/entities/crane.entity';
import { IoStatus } from '../database/entities/io-status.entity';
import { MotorMeasurement } from '../database/entities/motor-measurement.entity';
import { LoadMeasurement } from '../database/entities/load-measurement.entity';
import { HourlyKpi } from '../database/entities/hourly-kpi.entity';
import { Alarm } from '../database/entities/alarm.entity';
import { at, BASE_TIME } from '../../test/utils/test-helpers';

type RepositoryMock = {
  find: jest.Mock;
  findOne: jest.Mock;
  count: jest.Mock;
  delete: jest.Mock;
};

function createRepositoryMock(): RepositoryMock {
  return {
    find: jest.fn().mockResolvedValue([]),
    findOne: jest.fn().mockResolvedValue(null),
    count: jest.fn().mockResolvedValue(0),
    delete: jest.fn().mockResolvedValue({ raw: [], affected: 0 }),
  };
}

describe('MeasurementsService', () => {
  let service: MeasurementsService;
  let craneRepository: RepositoryMock;
  let ioRepository: RepositoryMock;
  let motorRepository: RepositoryMock;
  let loadRepository: RepositoryMock;
  let hourlyRepository: RepositoryMock;
  let alarmRepository: RepositoryMock;

  const window = { start: BASE_TIME, end: at(3600) };
  const inWindow = And(MoreThanOrEqual(BASE_TIME), LessThan(at(3600)));

  beforeEach(async () => {
    craneRepository = createRepositoryMock();
    ioRepository = createRepositoryMock();
    motorRepository = createRepositoryMock();
    loadRepository = createRepositoryMock();
    hourlyRepository = createRepositoryMock();
    alarmRepository = createRepositoryMock();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MeasurementsService,
        { provide: getRepositoryToken(Crane), useValue: craneRepository },
        { provide: getRepositoryToken(IoStatus), useValue: ioRepository },
        {
          provide: getRepositoryToken(MotorMeasurement),
          useValue: motorRepository,
        },
        {
          provide: getRepositoryToken(LoadMeasurement),
          useValue: loadRepository,
        },
        { provide: getRepositoryToken(HourlyKpi), useValue: hourlyRepository },
        { provide: getRepositoryToken(Alarm), useValue: alarmRepository },
      ],
    }).compile();

    service = module.get<MeasurementsService>(MeasurementsService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should list active cranes only', async () => {
    craneRepository.find.mockResolvedValue([{ id: 3, craneName: 'EOT-03' }]);

    await expect(service.findActiveCranes()).resolves.toEqual([
      { id: 3, craneName: 'EOT-03' },
    ]);
    expect(craneRepository.find).toHaveBeenCalledWith(
      expect.objectContaining({ where: { isActive: true } }),
    );
  });

  it('should query I/O samples over the half-open window in time order', async () => {
    await service.findIoStatuses(7, window);

    expect(ioRepository.find).toHaveBeenCalledWith(
      expect.objectContaining({
        where: { craneId: 7, timestamp: inWindow },
        order: { timestamp: 'ASC', id: 'ASC' },
      }),
    );
  });

  it('should filter on a single flag', async () => {
    await service.findIoStatusesWithFlag(7, window, 'hoistUp');
    await service.countIoFlag(7, window, 'ltReverse');

    expect(ioRepository.find).toHaveBeenCalledWith(
      expect.objectContaining({
        where: { craneId: 7, timestamp: inWindow, hoistUp: true },
      }),
    );
    expect(ioRepository.count).toHaveBeenCalledWith({
      where: { craneId: 7, timestamp: inWindow, ltReverse: true },
    });
  });

  it('should select only total power for motor samples', async () => {
    await service.findMotorMeasurements(7, window);

    expect(motorRepository.find).toHaveBeenCalledWith(
      expect.objectContaining({
        select: { timestamp: true, totalPower: true },
      }),
    );
  });

  it('should select load readings', async () => {
    loadRepository.find.mockResolvedValue([{ timestamp: at(5), load: 400 }]);

    await expect(service.findLoadMeasurements(7, window)).resolves.toEqual([
      { timestamp: at(5), load: 400 },
    ]);
  });

  it('should read hourly rows by hour start', async () => {
    await service.findHourlyKpis(7, window);

    expect(hourlyRepository.find).toHaveBeenCalledWith({
      where: { craneId: 7, hourStart: inWindow },
      order: { hourStart: 'ASC' },
    });
  });

  describe('getDataStatistics', () => {
    it('should count each table and sum the total', async () => {
      motorRepository.count.mockResolvedValue(120);
      ioRepository.count.mockResolvedValue(300);
      loadRepository.count.mockResolvedValue(60);
      alarmRepository.count.mockResolvedValue(4);

      await expect(service.getDataStatistics()).resolves.toEqual({
        motorMeasurements: 120,
        ioStatus: 300,
        loadMeasurements: 60,
        alarms: 4,
        totalRecords: 484,
      });
    });
  });

  describe('getSystemStatus', () => {
    const now = at(3600);

    it('should look for motor data in the last five minutes', async () => {
      await service.getSystemStatus(now);

      expect(motorRepository.findOne).toHaveBeenCalledWith({
        where: { timestamp: MoreThanOrEqual(at(3300)) },
        select: { id: true },
      });
    });

    it('should report data flow when a recent sample exists', async () => {
      motorRepository.findOne.mockResolvedValue({ id: 42 });
      alarmRepository.count.mockResolvedValue(2);
      craneRepository.count
        .mockResolvedValueOnce(5)
        .mockResolvedValueOnce(1);

      await expect(service.getSystemStatus(now)).resolves.toEqual({
        recentDataFlow: true,
        activeAlarms: 2,
        activeCranes: 5,
        workingCranes: 1,
      });
      expect(alarmRepository.count).toHaveBeenCalledWith({
        where: { isAcknowledged: false },
      });
      expect(craneRepository.count).toHaveBeenNthCalledWith(1, {
        where: { isActive: true },
      });
      expect(craneRepository.count).toHaveBeenNthCalledWith(2, {
        where: { status: 'working' },
      });
    });

    it('should report no data flow without a recent sample', async () => {
      const status = await service.getSystemStatus(now);

      expect(status.recentDataFlow).toBe(false);
    });
  });

  describe('purgeOlderThan', () => {
    const cutoff = at(0);

    it('should delete older rows from each requested table', async () => {
      motorRepository.delete.mockResolvedValue({ raw: [], affected: 10 });
      ioRepository.delete.mockResolvedValue({ raw: [], affected: 25 });

      const result = await service.purgeOlderThan(cutoff, ['motor', 'io']);

      expect(motorRepository.delete).toHaveBeenCalledWith({
        timestamp: LessThan(cutoff),
      });
      expect(ioRepository.delete).toHaveBeenCalledWith({
        timestamp: LessThan(cutoff),
      });
      expect(loadRepository.delete).not.toHaveBeenCalled();
      expect(alarmRepository.delete).not.toHaveBeenCalled();
      expect(result).toEqual({
        cutoff,
        deleted: { motor: 10, io: 25 },
        deletedCount: 35,
      });
    });

    it('should only delete acknowledged alarms', async () => {
      await service.purgeOlderThan(cutoff, ['alarms']);

      expect(alarmRepository.delete).toHaveBeenCalledWith({
        timestamp: LessThan(cutoff),
        isAcknowledged: true,
      });
    });

    it('should count an unreported affected total as zero', async () => {
      loadRepository.delete.mockResolvedValue({ raw: [] });

      const result = await service.purgeOlderThan(cutoff, ['load']);

      expect(result.deleted).toEqual({ load: 0 });
      expect(result.deletedCount).toBe(0);
    });
  });
});
