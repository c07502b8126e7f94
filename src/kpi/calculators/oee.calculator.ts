import { IoFlag } from '../../database/entities/io-status.entity';
import { IoSample, secondsBetween } from './operation.calculator';

/** Flags that count as the crane operating */
export const MOTION_FLAGS: readonly IoFlag[] = [
  'hoistUp',
  'hoistDown',
  'ctLeft',
  'ctRight',
  'ltForward',
  'ltReverse',
];

/** Nominal lift cycles per hour for performance */
export const IDEAL_CYCLES_PER_HOUR = 60;

/** Placeholder until good/bad lifts are tracked */
export const QUALITY_CONSTANT = 99.0;

export interface OeeInput {
  samples: IoSample[];
  hoistUpSampleCount: number;
  start: Date;
  end: Date;
}

export interface OeeResult {
  availability: number;
  performance: number;
  quality: number;
  oee: number;
}

/**
 * Seconds the crane was operating (any motion flag set).
 *
 * Unlike calculateOperationDurations, a span still open after the last
 * sample is credited up to `end`.
 */
export function calculateOperatingTime(samples: IoSample[], end: Date): number {
  let operating = 0;
  let openedAt: Date | null = null;

  for (const sample of samples) {
    const isOperating = MOTION_FLAGS.some((flag) => sample[flag]);
    if (isOperating && openedAt === null) {
      openedAt = sample.timestamp;
    } else if (!isOperating && openedAt !== null) {
      operating += secondsBetween(openedAt, sample.timestamp);
      openedAt = null;
    }
  }

  if (openedAt !== null) {
    operating += Math.max(0, secondsBetween(openedAt, end));
  }
  return operating;
}

export function calculateAvailability(
  operatingSeconds: number,
  plannedSeconds: number,
): number {
  if (plannedSeconds <= 0) return 0;
  return clampPercent((operatingSeconds / plannedSeconds) * 100);
}

export function calculatePerformance(
  hoistUpSampleCount: number,
  windowHours: number,
): number {
  const idealCycles = IDEAL_CYCLES_PER_HOUR * windowHours;
  if (idealCycles <= 0) return 0;
  return clampPercent((hoistUpSampleCount / idealCycles) * 100);
}

export function calculateOee(input: OeeInput): OeeResult {
  const plannedSeconds = secondsBetween(input.start, input.end);
  const availability = calculateAvailability(
    calculateOperatingTime(input.samples, input.end),
    plannedSeconds,
  );
  const performance = calculatePerformance(
    input.hoistUpSampleCount,
    plannedSeconds / 3600,
  );
  const quality = QUALITY_CONSTANT;

  return {
    availability,
    performance,
    quality,
    oee: (availability * performance * quality) / 10000,
  };
}

function clampPercent(value: number): number {
  return Math.min(100, Math.max(0, value));
}
