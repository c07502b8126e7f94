import {
  calculateAvailability,
  calculateOee,
  calculateOperatingTime,
  calculatePerformance,
  QUALITY_CONSTANT,
} from './oee.calculator';
import { calculateOperationDurations } from './operation.calculator';
import { at, ioSample } from '../../../test/utils/test-helpers';

describe('OeeCalculator', () => {
  const start = at(0);
  const end = at(3600);

  describe('calculateOperatingTime', () => {
    it('should accrue spans with any motion flag set', () => {
      const samples = [
        ioSample(0, 'hoistUp'),
        ioSample(10, 'ctLeft'),
        ioSample(20),
        ioSample(30, 'stop'),
        ioSample(40, 'ltForward'),
        ioSample(50, 'start'),
      ];

      expect(calculateOperatingTime(samples, end)).toBe(20 + 10);
    });

    it('should flush a span still open at the window end', () => {
      const samples = [ioSample(3000, 'hoistDown'), ioSample(3300, 'hoistUp')];

      expect(calculateOperatingTime(samples, end)).toBe(600);
    });

    it('should differ from the duration reducer on an open final span', () => {
      const samples = [ioSample(0), ioSample(1800, 'hoistUp')];

      expect(calculateOperationDurations(samples).hoist_up).toBe(0);
      expect(calculateOperatingTime(samples, end)).toBe(1800);
    });
  });

  describe('availability and performance', () => {
    it('should cap availability at 100 and return 0 for no planned time', () => {
      expect(calculateAvailability(1800, 3600)).toBe(50);
      expect(calculateAvailability(7200, 3600)).toBe(100);
      expect(calculateAvailability(100, 0)).toBe(0);
    });

    it('should compare hoist-up samples to 60 per hour', () => {
      expect(calculatePerformance(30, 1)).toBe(50);
      expect(calculatePerformance(600, 1)).toBe(100);
      expect(calculatePerformance(30, 0)).toBe(0);
    });
  });

  describe('calculateOee', () => {
    it('should combine the three factors', () => {
      const result = calculateOee({
        samples: [ioSample(0), ioSample(1800, 'hoistUp')],
        hoistUpSampleCount: 30,
        start,
        end,
      });

      expect(result.availability).toBe(50);
      expect(result.performance).toBe(50);
      expect(result.quality).toBe(QUALITY_CONSTANT);
      expect(result.oee).toBeCloseTo((50 * 50 * 99) / 10000, 10);
    });

    it.each([
      ['all idle', [ioSample(0), ioSample(1800)], 0],
      ['always operating', [ioSample(0, 'hoistUp')], 5000],
      ['no samples', [], 0],
    ])('should stay within [0, 100] when %s', (_label, samples, count) => {
      const result = calculateOee({
        samples,
        hoistUpSampleCount: count,
        start,
        end,
      });

      for (const value of Object.values(result)) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(100);
      }
    });
  });
});
