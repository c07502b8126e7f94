import { IoFlag } from '../../database/entities/io-status.entity';

/** Operations in resolution priority order */
export const OPERATIONS = [
  'hoist_up',
  'hoist_down',
  'ct_left',
  'ct_right',
  'lt_forward',
  'lt_reverse',
  'stop',
] as const;

export type Operation = (typeof OPERATIONS)[number];

export const OPERATION_FLAGS: Record<Operation, IoFlag> = {
  hoist_up: 'hoistUp',
  hoist_down: 'hoistDown',
  ct_left: 'ctLeft',
  ct_right: 'ctRight',
  lt_forward: 'ltForward',
  lt_reverse: 'ltReverse',
  stop: 'stop',
};

export type IoSample = { timestamp: Date } & Record<IoFlag, boolean>;

export interface LoadSample {
  timestamp: Date;
  load: number;
}

export type OperationDurations = Record<Operation, number>;

/** Hoist-up samples further apart than this start a new lift */
export const LIFT_DEBOUNCE_SECONDS = 5;

/**
 * The single operation a sample represents: the first set flag in
 * OPERATIONS order, or null when none is set.
 */
export function resolveActiveOperation(sample: IoSample): Operation | null {
  return OPERATIONS.find((op) => sample[OPERATION_FLAGS[op]]) ?? null;
}

/**
 * Seconds spent in each operation, from samples ordered by timestamp.
 *
 * A period closes only when a sample resolving to a different operation
 * arrives; it is credited to the previous operation up to that sample's
 * timestamp. A period still open after the last sample is not credited.
 */
export function calculateOperationDurations(
  samples: IoSample[],
): OperationDurations {
  const durations = emptyDurations();
  let current: Operation | null = null;
  let openedAt: Date | null = null;

  for (const sample of samples) {
    const operation = resolveActiveOperation(sample);
    if (operation === current) {
      continue;
    }
    if (current !== null && openedAt !== null) {
      durations[current] += secondsBetween(openedAt, sample.timestamp);
    }
    current = operation;
    openedAt = sample.timestamp;
  }

  return durations;
}

/**
 * Count lifts from hoist-up samples ordered by timestamp.
 *
 * The first sample only initializes the debounce clock; every later sample
 * more than LIFT_DEBOUNCE_SECONDS after its predecessor counts one lift.
 * N separated bursts therefore count N - 1.
 */
export function countLifts(hoistUpSamples: Array<{ timestamp: Date }>): number {
  let lifts = 0;
  let lastSeen: Date | null = null;

  for (const sample of hoistUpSamples) {
    if (
      lastSeen !== null &&
      secondsBetween(lastSeen, sample.timestamp) > LIFT_DEBOUNCE_SECONDS
    ) {
      lifts++;
    }
    lastSeen = sample.timestamp;
  }

  return lifts;
}

/**
 * Tonnes moved: every reading above the previous one adds its full load
 * (kg). The previous load starts at 0.
 */
export function calculateTotalMassMoved(samples: LoadSample[]): number {
  let totalKg = 0;
  let lastLoad = 0;

  for (const sample of samples) {
    if (sample.load > lastLoad) {
      totalKg += sample.load;
    }
    lastLoad = sample.load;
  }

  return totalKg / 1000;
}

export function emptyDurations(): OperationDurations {
  return {
    hoist_up: 0,
    hoist_down: 0,
    ct_left: 0,
    ct_right: 0,
    lt_forward: 0,
    lt_reverse: 0,
    stop: 0,
  };
}

export function secondsBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / 1000;
}
