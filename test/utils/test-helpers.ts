import { IoFlag } from '../../src/database/entities/io-status.entity';
import { IoSample } from '../../src/kpi/calculators/operation.calculator';

/** Fixed reference instant for time-based tests (an hour boundary, UTC) */
export const BASE_TIME = new Date('2024-06-15T10:00:00.000Z');

/** BASE_TIME + seconds */
export function at(seconds: number): Date {
  return new Date(BASE_TIME.getTime() + seconds * 1000);
}

/**
 * I/O sample at BASE_TIME + seconds with the given flags set
 */
export function ioSample(seconds: number, ...flags: IoFlag[]): IoSample {
  return {
    timestamp: at(seconds),
    start: flags.includes('start'),
    stop: flags.includes('stop'),
    hoistUp: flags.includes('hoistUp'),
    hoistDown: flags.includes('hoistDown'),
    ctLeft: flags.includes('ctLeft'),
    ctRight: flags.includes('ctRight'),
    ltForward: flags.includes('ltForward'),
    ltReverse: flags.includes('ltReverse'),
  };
}

/** JSON payload bytes as received from the broker */
export function payload(body: unknown): Buffer {
  return Buffer.from(JSON.stringify(body), 'utf-8');
}

/**
 * Chainable TypeORM insert query builder mock.
 * `execute` resolves with an empty insert result.
 */
export function createInsertQueryBuilderMock() {
  return {
    insert: jest.fn().mockReturnThis(),
    into: jest.fn().mockReturnThis(),
    values: jest.fn().mockReturnThis(),
    orUpdate: jest.fn().mockReturnThis(),
    execute: jest.fn().mockResolvedValue({ identifiers: [], raw: [] }),
  };
}

export type InsertQueryBuilderMock = ReturnType<
  typeof createInsertQueryBuilderMock
>;
