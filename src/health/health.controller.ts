import { Controller, Get } from '@nestjs/common';
import {
  IngestionService,
  IngestionStats,
} from '../ingestion/ingestion.service';
import {
  DataStatistics,
  MeasurementsService,
  SystemStatus,
} from '../measurements/measurements.service';

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  ingestion: IngestionStats;
  dataStatistics: DataStatistics;
  systemStatus: SystemStatus;
}

@Controller('health')
export class HealthController {
  constructor(
    private readonly ingestionService: IngestionService,
    private readonly measurementsService: MeasurementsService,
  ) {}

  @Get()
  async check(): Promise<HealthResponse> {
    const now = new Date();
    const [dataStatistics, systemStatus] = await Promise.all([
      this.measurementsService.getDataStatistics(),
      this.measurementsService.getSystemStatus(now),
    ]);
    return {
      status: 'ok',
      timestamp: now.toISOString(),
      ingestion: this.ingestionService.getStats(),
      dataStatistics,
      systemStatus,
    };
  }
}
