// Re-export public API
export { IngestionModule } from './ingestion.module';
export { IngestionService } from './ingestion.service';
export type {
  IngestionResult,
  IngestionStats,
  IngestionOutcome,
} from './ingestion.service';
export { TelemetryEventsService } from './events/telemetry-events.service';
export type { TelemetryEvent } from './events/telemetry-event.interface';
export type { TelemetryListener } from './events/telemetry-events.service';
export { classifyPayload } from './classification/payload-classifier';
export type { PayloadShape } from './interfaces/payload-shape.interface';
export { FieldRouter } from './routing/field-router';
export {
  assembleMeasurements,
  buildLoadReading,
} from './assembly/measurement-assembler';
export {
  IngestionError,
  DecodeError,
  UnresolvedTopicError,
  UnclassifiedPayloadError,
  PersistenceFailureError,
} from './errors/ingestion.errors';
