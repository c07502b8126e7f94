import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Subject, Subscription } from 'rxjs';
import { describeError } from '../../common/retry';
import { TelemetryEvent } from './telemetry-event.interface';

export type TelemetryListener = (event: TelemetryEvent) => void;

/**
 * TelemetryEventsService - outbound notifications for stored measurements.
 *
 * Fire-and-forget: each listener runs inside its own error boundary, so a
 * listener that throws is logged and neither the other listeners nor the
 * ingestion pipeline that published the event are affected.
 */
@Injectable()
export class TelemetryEventsService implements OnModuleDestroy {
  private readonly logger = new Logger(TelemetryEventsService.name);
  private readonly subject = new Subject<TelemetryEvent>();

  subscribe(listener: TelemetryListener): Subscription {
    return this.subject.subscribe((event) => {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn(
          `Listener failed on ${event.type} event for crane ${event.craneId}: ${describeError(error)}`,
        );
      }
    });
  }

  publish(event: TelemetryEvent): void {
    this.subject.next(event);
  }

  onModuleDestroy(): void {
    this.subject.complete();
  }
}
