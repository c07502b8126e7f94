import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource, EntityManager } from 'typeorm';
import { Crane } from '../database/entities/crane.entity';
import { MotorMeasurement } from '../database/entities/motor-measurement.entity';
import { IoStatus } from '../database/entities/io-status.entity';
import { LoadMeasurement } from '../database/entities/load-measurement.entity';
import { Alarm } from '../database/entities/alarm.entity';
import { EnvironmentVariables } from '../config/env.validation';
import {
  describeError,
  isTransientDatabaseError,
  withRetry,
} from '../common/retry';
import { TopicResolverService } from '../cranes/topic-resolver.service';
import { CapacityCacheService } from '../cranes/capacity-cache.service';
import { CraneConfigurationService } from '../cranes/crane-configuration.service';
import { FieldMappingService } from '../cranes/field-mapping.service';
import {
  classifyPayload,
  isJsonObject,
} from './classification/payload-classifier';
import {
  ExtractedField,
  PayloadShape,
  PayloadShapeName,
} from './interfaces/payload-shape.interface';
import { FieldRouter } from './routing/field-router';
import { MeasurementKind } from './routing/field-rules';
import {
  assembleMeasurements,
  buildLoadReading,
  isEmptyMessage,
  RoutedField,
} from './assembly/measurement-assembler';
import { AssembledMessage } from './assembly/measurement-records';
import {
  DecodeError,
  IngestionError,
  PersistenceFailureError,
  UnclassifiedPayloadError,
  UnresolvedTopicError,
} from './errors/ingestion.errors';
import { TelemetryEventsService } from './events/telemetry-events.service';

export type IngestionOutcome = 'stored' | 'dropped' | 'failed';

export type RecordCounts = Record<MeasurementKind, number>;

/**
 * Ingestion Result Summary
 */
export interface IngestionResult {
  success: boolean;
  outcome: IngestionOutcome;
  /** Error code or drop reason; null when stored */
  reason: string | null;
  topic: string;
  craneId: number | null;
  shape: PayloadShapeName | null;
  records: RecordCounts;
  capacityUpdated: boolean;
  /** Fields that mapped to no measurement or held an unusable value */
  ignoredFields: string[];
  errors: string[];
  durationMs: number;
}

/**
 * Pipeline counters since process start
 */
export interface IngestionStats {
  received: number;
  stored: number;
  dropped: number;
  failed: number;
  decodeErrors: number;
  unresolvedTopics: number;
  classificationMisses: number;
}

/**
 * IngestionService - turns one telemetry message into measurement rows
 *
 * Pipeline:
 * 1. Decode: UTF-8 JSON object
 * 2. Resolve: topic -> crane via active topic bindings
 * 3. Classify: array-triplet / embedded-json / single-scalar
 * 4. Route: field name -> measurement slot (crane overrides first)
 * 5. Assemble: partial records per kind and timestamp
 * 6. Persist: one transaction per message, serialized per crane
 * 7. Notify: cache update and telemetry events after commit
 *
 * Failures of a single message never escape `ingestMessage`; they are
 * counted, logged and reported in the returned IngestionResult.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);
  private readonly stats: IngestionStats = {
    received: 0,
    stored: 0,
    dropped: 0,
    failed: 0,
    decodeErrors: 0,
    unresolvedTopics: 0,
    classificationMisses: 0,
  };

  constructor(
    private readonly dataSource: DataSource,
    private readonly configService: ConfigService<EnvironmentVariables, true>,
    private readonly topicResolver: TopicResolverService,
    private readonly capacityCache: CapacityCacheService,
    private readonly configurationService: CraneConfigurationService,
    private readonly fieldMappingService: FieldMappingService,
    private readonly fieldRouter: FieldRouter,
    private readonly events: TelemetryEventsService,
  ) {}

  /**
   * Ingest one message
   *
   * @param topic - Topic the message arrived on
   * @param payload - Raw message bytes
   * @param receivedAt - Receipt time, used when the payload carries none
   */
  async ingestMessage(
    topic: string,
    payload: Buffer | string,
    receivedAt: Date = new Date(),
  ): Promise<IngestionResult> {
    const startTime = Date.now();
    const result: IngestionResult = {
      success: false,
      outcome: 'dropped',
      reason: null,
      topic,
      craneId: null,
      shape: null,
      records: { motor: 0, io: 0, load: 0, alarm: 0 },
      capacityUpdated: false,
      ignoredFields: [],
      errors: [],
      durationMs: 0,
    };
    this.stats.received++;

    try {
      const body = this.decode(topic, payload);

      const crane = await this.topicResolver.resolve(topic);
      if (!crane) {
        throw new UnresolvedTopicError(topic);
      }
      result.craneId = crane.id;

      const shape: PayloadShape = isJsonObject(body)
        ? classifyPayload(body, receivedAt)
        : { shape: 'unrecognized', reason: 'payload is not a JSON object' };
      result.shape = shape.shape;
      if (shape.shape === 'unrecognized') {
        throw new UnclassifiedPayloadError(topic, shape.reason);
      }

      if (shape.shape === 'embedded-json' && shape.rejected.length > 0) {
        this.logger.warn(
          `Skipped embedded fields on '${topic}' without usable value/timestamp: ${shape.rejected.join(', ')}`,
        );
        result.errors.push(
          ...shape.rejected.map((name) => `Unusable embedded field: ${name}`),
        );
      }

      const routed = await this.routeFields(crane.id, extractFields(shape));
      result.ignoredFields.push(...routed.ignored);

      const message = assembleMeasurements(routed.fields);
      result.ignoredFields.push(...message.rejectedFields);
      if (message.rejectedFields.length > 0) {
        this.logger.debug(
          `Crane ${crane.id}: non-numeric values skipped for ${message.rejectedFields.join(', ')}`,
        );
      }

      if (isEmptyMessage(message)) {
        this.stats.dropped++;
        result.reason = 'no-measurements';
        this.logger.warn(
          `No measurements in ${shape.shape} message on '${topic}' (crane ${crane.id})`,
        );
        return result;
      }

      result.records = await this.persist(topic, crane, message);
      result.capacityUpdated = message.capacity !== null;
      result.outcome = 'stored';
      result.success = true;
      this.stats.stored++;

      this.publishEvents(crane.id, message);
      this.logger.debug(
        `Stored ${shape.shape} message for crane ${crane.id}: ${formatCounts(result.records)}`,
      );
    } catch (error) {
      this.recordFailure(result, error);
    } finally {
      result.durationMs = Date.now() - startTime;
    }

    return result;
  }

  getStats(): IngestionStats {
    return { ...this.stats };
  }

  private decode(topic: string, payload: Buffer | string): unknown {
    const text =
      typeof payload === 'string' ? payload : payload.toString('utf-8');
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new DecodeError(
        topic,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private async routeFields(
    craneId: number,
    fields: ExtractedField[],
  ): Promise<{ fields: RoutedField[]; ignored: string[] }> {
    const overrides = await this.fieldMappingService.getOverrides(craneId);
    const routed: RoutedField[] = [];
    const ignored: string[] = [];

    for (const field of fields) {
      const route = this.fieldRouter.route(field.name, overrides);
      if (!route) {
        ignored.push(field.name);
        this.logger.debug(`Crane ${craneId}: unknown field '${field.name}'`);
        continue;
      }
      routed.push({ ...field, route });
    }

    return { fields: routed, ignored };
  }

  /**
   * Write all rows of a message in one transaction.
   *
   * Runs under the crane's lock so a capacity update and the load rows
   * judged against it are never interleaved with another message of the
   * same crane. The capacity cache is updated only after commit.
   */
  private async persist(
    topic: string,
    crane: Crane,
    message: AssembledMessage,
  ): Promise<RecordCounts> {
    return this.capacityCache.runExclusive(crane.id, async () => {
      let attempts = 0;
      try {
        const counts = await withRetry(
          (attempt) => {
            attempts = attempt;
            return this.dataSource.transaction((manager) =>
              this.writeMessage(manager, crane, message),
            );
          },
          {
            maxAttempts: this.configService.get('PERSISTENCE_MAX_ATTEMPTS', {
              infer: true,
            }),
            baseDelayMs: this.configService.get(
              'PERSISTENCE_RETRY_BASE_DELAY_MS',
              { infer: true },
            ),
            isRetryable: isTransientDatabaseError,
            label: `Persisting message for crane ${crane.id}`,
            logger: this.logger,
          },
        );

        if (message.capacity !== null) {
          this.capacityCache.remember(crane.id, message.capacity);
        }
        return counts;
      } catch (error) {
        throw new PersistenceFailureError(
          topic,
          crane.id,
          attempts,
          error instanceof Error ? error : undefined,
        );
      }
    });
  }

  private async writeMessage(
    manager: EntityManager,
    crane: Crane,
    message: AssembledMessage,
  ): Promise<RecordCounts> {
    const craneId = crane.id;

    if (message.capacity !== null) {
      await this.configurationService.persistCapacity(
        manager,
        craneId,
        message.capacity,
      );
    }

    if (message.motor.length > 0) {
      await manager.insert(
        MotorMeasurement,
        message.motor.map((record) => ({ craneId, ...record })),
      );
    }

    if (message.io.length > 0) {
      await manager.insert(
        IoStatus,
        message.io.map((record) => ({ craneId, ...record })),
      );
    }

    if (message.load.length > 0) {
      const resolved =
        message.capacity ?? (await this.capacityCache.resolve(crane));
      await manager.insert(
        LoadMeasurement,
        message.load.map((draft) => ({
          craneId,
          timestamp: draft.timestamp,
          ...buildLoadReading(draft.load, draft.capacity ?? resolved),
        })),
      );
    }

    if (message.alarm.length > 0) {
      await manager.insert(
        Alarm,
        message.alarm.map((record) => ({
          craneId,
          ...record,
          isAcknowledged: false,
        })),
      );
    }

    return {
      motor: message.motor.length,
      io: message.io.length,
      load: message.load.length,
      alarm: message.alarm.length,
    };
  }

  private publishEvents(craneId: number, message: AssembledMessage): void {
    const written: Array<[MeasurementKind, Array<{ timestamp: Date }>]> = [
      ['motor', message.motor],
      ['io', message.io],
      ['load', message.load],
      ['alarm', message.alarm],
    ];

    for (const [kind, records] of written) {
      if (records.length === 0) continue;
      this.events.publish({
        type: 'measurement',
        kind,
        craneId,
        timestamp: records[records.length - 1].timestamp,
        summary: `${records.length} ${kind} record(s)`,
      });
    }

    for (const alarm of message.alarm) {
      if (alarm.alarmMessage === '') continue;
      this.events.publish({
        type: 'alarm-raised',
        craneId,
        timestamp: alarm.timestamp,
        severity: alarm.alarmSeverity,
        summary: alarm.alarmMessage,
      });
    }
  }

  private recordFailure(result: IngestionResult, error: unknown): void {
    const message = describeError(error);
    result.errors.push(message);

    if (error instanceof IngestionError) {
      result.reason = error.code;
      switch (error.code) {
        case 'DECODE_ERROR':
          this.stats.decodeErrors++;
          break;
        case 'UNRESOLVED_TOPIC':
          this.stats.unresolvedTopics++;
          break;
        case 'UNCLASSIFIED_PAYLOAD':
          this.stats.classificationMisses++;
          break;
        case 'PERSISTENCE_FAILURE':
          result.outcome = 'failed';
          this.stats.failed++;
          this.logger.error(message);
          return;
      }
      this.stats.dropped++;
      this.logger.warn(`Dropped message: ${message}`);
      return;
    }

    result.outcome = 'failed';
    result.reason = 'INTERNAL_ERROR';
    this.stats.failed++;
    this.logger.error(
      `Ingestion failed for '${result.topic}': ${message}`,
      error instanceof Error ? error.stack : undefined,
    );
  }
}

function extractFields(
  shape: Exclude<PayloadShape, { shape: 'unrecognized' }>,
): ExtractedField[] {
  switch (shape.shape) {
    case 'array-triplet':
    case 'embedded-json':
      return shape.fields;
    case 'single-scalar':
      return [shape.field];
  }
}

function formatCounts(counts: RecordCounts): string {
  return Object.entries(counts)
    .map(([kind, count]) => `${kind}=${count}`)
    .join(' ');
}
