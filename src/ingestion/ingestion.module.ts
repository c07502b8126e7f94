import { Module } from '@nestjs/common';
import { CranesModule } from '../cranes/cranes.module';
import { IngestionService } from './ingestion.service';
import { FieldRouter } from './routing/field-router';
import { TelemetryEventsService } from './events/telemetry-events.service';
import { MqttListenerService } from './mqtt/mqtt-listener.service';

/**
 * IngestionModule
 *
 * Telemetry ingestion from the MQTT broker into measurement tables.
 *
 * Components:
 * - MqttListenerService: broker subscription, feeds messages to the pipeline
 * - IngestionService: decode, classify, route, assemble and persist
 * - FieldRouter: field name -> measurement slot
 * - TelemetryEventsService: notifications for stored measurements
 */
@Module({
  imports: [CranesModule],
  providers: [
    IngestionService,
    FieldRouter,
    TelemetryEventsService,
    MqttListenerService,
  ],
  exports: [IngestionService, TelemetryEventsService],
})
export class IngestionModule {}
