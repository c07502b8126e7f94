import { Module } from '@nestjs/common';
import { KpiModule } from './kpi.module';
import { KpiController } from './kpi.controller';

@Module({
  imports: [KpiModule],
  controllers: [KpiController],
})
export class KpiHttpModule {}
