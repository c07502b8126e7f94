import {
  assembleMeasurements,
  buildLoadReading,
  isEmptyMessage,
  RoutedField,
  toFlag,
  toNumber,
} from './measurement-assembler';
import { FieldRouter } from '../routing/field-router';
import { at } from '../../../test/utils/test-helpers';

describe('assembleMeasurements', () => {
  const router = new FieldRouter();

  /** Route `fields` by name, all at the same timestamp */
  function routed(
    fields: Record<string, unknown>,
    timestamp: Date = at(0),
  ): RoutedField[] {
    return Object.entries(fields).flatMap(([name, value]) => {
      const route = router.route(name);
      return route ? [{ name, route, value, timestamp }] : [];
    });
  }

  it('should produce at most one record per kind for one timestamp', () => {
    const message = assembleMeasurements(
      routed({
        hoist_power: 10,
        ct_power: 4,
        hoist_current: 20,
        hoist_up: true,
        ct_left: 0,
        load: 900,
        alarm_one: 1,
      }),
    );

    expect(message.motor).toHaveLength(1);
    expect(message.io).toHaveLength(1);
    expect(message.load).toHaveLength(1);
    expect(message.alarm).toHaveLength(1);
  });

  it('should sum only the power and current readings present', () => {
    const message = assembleMeasurements(
      routed({ hoist_power: 10, lt_power: 2.5, ct_current: 7 }),
    );

    expect(message.motor[0]).toMatchObject({
      hoistPower: 10,
      ctPower: null,
      ltPower: 2.5,
      ctCurrent: 7,
      hoistVoltage: null,
      totalPower: 12.5,
      totalCurrent: 7,
    });
  });

  it('should not create rows for kinds without fields', () => {
    const message = assembleMeasurements(routed({ hoist_power: 10 }));

    expect(message.io).toEqual([]);
    expect(message.load).toEqual([]);
    expect(message.alarm).toEqual([]);
    expect(message.capacity).toBeNull();
  });

  it('should default unset I/O flags to false', () => {
    const message = assembleMeasurements(routed({ hoist_down: 'on' }));

    expect(message.io).toEqual([
      {
        timestamp: at(0),
        start: false,
        stop: false,
        hoistUp: false,
        hoistDown: true,
        ctLeft: false,
        ctRight: false,
        ltForward: false,
        ltReverse: false,
      },
    ]);
  });

  it('should group fields by timestamp', () => {
    const message = assembleMeasurements([
      ...routed({ load: 300 }, at(10)),
      ...routed({ load: 200 }, at(5)),
    ]);

    expect(message.load).toEqual([
      { timestamp: at(5), load: 200, capacity: null },
      { timestamp: at(10), load: 300, capacity: null },
    ]);
  });

  it('should attach the last capacity in the message to load drafts', () => {
    const message = assembleMeasurements([
      ...routed({ capacity: 8000 }),
      ...routed({ load: 4000 }),
      ...routed({ capacity: '12000' }),
    ]);

    expect(message.capacity).toBe(12000);
    expect(message.load).toEqual([
      { timestamp: at(0), load: 4000, capacity: 12000 },
    ]);
  });

  it('should summarize active alarm lines', () => {
    const message = assembleMeasurements(
      routed({ alarm_one: true, alarm_two: false, alarm_three: 'yes' }),
    );

    expect(message.alarm).toEqual([
      {
        timestamp: at(0),
        alarmOne: true,
        alarmTwo: false,
        alarmThree: true,
        alarmMessage: 'Active alarms: Alarm One, Alarm Three',
        alarmSeverity: 'high',
      },
    ]);
  });

  it('should keep severity low with no active alarm line', () => {
    const message = assembleMeasurements(routed({ alarm_two: 0 }));

    expect(message.alarm[0]).toMatchObject({
      alarmMessage: '',
      alarmSeverity: 'low',
    });
  });

  it('should reject non-numeric motor and load values', () => {
    const message = assembleMeasurements(
      routed({ hoist_power: 'n/a', load: null, ct_power: 3 }),
    );

    expect(message.rejectedFields).toEqual(['hoist_power', 'load']);
    expect(message.motor[0].totalPower).toBe(3);
    expect(message.load).toEqual([]);
  });

  it('should report an empty message only without rows and capacity', () => {
    expect(isEmptyMessage(assembleMeasurements([]))).toBe(true);
    expect(isEmptyMessage(assembleMeasurements(routed({ capacity: 5000 })))).toBe(
      false,
    );
  });
});

describe('buildLoadReading', () => {
  it.each([
    [7999, 10000, 79.99, 'normal'],
    [8000, 10000, 80, 'warning'],
    [9499, 10000, 94.99, 'warning'],
    [9500, 10000, 95, 'overload'],
    [12000, 10000, 120, 'overload'],
  ])('should classify %d of %d kg', (load, capacity, percentage, status) => {
    expect(buildLoadReading(load, capacity)).toEqual({
      load,
      capacity,
      loadPercentage: percentage,
      status,
    });
  });

  it('should classify from the exact ratio, not the rounded percentage', () => {
    // 79.996% is stored as 80.00 but is still below the warning threshold
    expect(buildLoadReading(7999.6, 10000)).toEqual({
      load: 7999.6,
      capacity: 10000,
      loadPercentage: 80,
      status: 'normal',
    });
  });

  it('should report 0% for a non-positive capacity', () => {
    expect(buildLoadReading(500, 0)).toEqual({
      load: 500,
      capacity: 0,
      loadPercentage: 0,
      status: 'normal',
    });
  });
});

describe('value coercion', () => {
  it('should accept finite numbers and numeric strings', () => {
    expect(toNumber(12.5)).toBe(12.5);
    expect(toNumber(' 42 ')).toBe(42);
    expect(toNumber('')).toBeNull();
    expect(toNumber('abc')).toBeNull();
    expect(toNumber(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toNumber(true)).toBeNull();
  });

  it('should read flags from booleans, numbers and strings', () => {
    expect(toFlag(true)).toBe(true);
    expect(toFlag(2)).toBe(true);
    expect(toFlag(0)).toBe(false);
    expect(toFlag('ON')).toBe(true);
    expect(toFlag('1')).toBe(true);
    expect(toFlag('off')).toBe(false);
    expect(toFlag(null)).toBe(false);
  });
});
