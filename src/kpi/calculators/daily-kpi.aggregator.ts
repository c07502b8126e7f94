import { HourlyKpi } from '../../database/entities/hourly-kpi.entity';

export type HourlyKpiSummary = Pick<
  HourlyKpi,
  | 'totalMotionTime'
  | 'totalLifts'
  | 'hoistUpCount'
  | 'hoistDownCount'
  | 'ctLeftCount'
  | 'ctRightCount'
  | 'ltForwardCount'
  | 'ltReverseCount'
  | 'stopCount'
  | 'totalMassMovedTonnes'
  | 'totalEnergyKwh'
  | 'hourlyEnergyCost'
  | 'energyPerTon'
  | 'systemEfficiency'
  | 'availability'
  | 'performance'
  | 'quality'
  | 'oee'
>;

export interface DailyKpiValues {
  totalOperationTime: number;
  totalLifts: number;
  totalOperationCount: number;
  totalMassMovedTonnes: number;
  totalEnergyKwh: number;
  totalEnergyCost: number;
  averageEnergyPerTon: number;
  averageEfficiency: number;
  peakLoad: number;
  averagePowerDemand: number;
  availability: number;
  performance: number;
  quality: number;
  oee: number;
}

/**
 * Fold the hourly rows of one day into daily values.
 *
 * - sums: motion time, lifts, operation counts, mass, energy, cost
 * - averages: energy per ton, efficiency and the OEE figures
 * - `peakLoad` is the largest hourly mass moved (tonnes), not a load reading
 * - `averagePowerDemand` is the average hourly energy times 4
 *
 * @returns null for an empty day; no daily row is written for it
 */
export function aggregateDailyKpi(
  hours: HourlyKpiSummary[],
): DailyKpiValues | null {
  if (hours.length === 0) {
    return null;
  }

  const sum = (pick: (hour: HourlyKpiSummary) => number): number =>
    hours.reduce((total, hour) => total + pick(hour), 0);
  const average = (pick: (hour: HourlyKpiSummary) => number): number =>
    sum(pick) / hours.length;

  return {
    totalOperationTime: sum((h) => h.totalMotionTime),
    totalLifts: sum((h) => h.totalLifts),
    totalOperationCount: sum(
      (h) =>
        h.hoistUpCount +
        h.hoistDownCount +
        h.ctLeftCount +
        h.ctRightCount +
        h.ltForwardCount +
        h.ltReverseCount +
        h.stopCount,
    ),
    totalMassMovedTonnes: sum((h) => h.totalMassMovedTonnes),
    totalEnergyKwh: sum((h) => h.totalEnergyKwh),
    totalEnergyCost: sum((h) => h.hourlyEnergyCost),
    averageEnergyPerTon: average((h) => h.energyPerTon),
    averageEfficiency: average((h) => h.systemEfficiency),
    peakLoad: Math.max(...hours.map((h) => h.totalMassMovedTonnes)),
    averagePowerDemand: average((h) => h.totalEnergyKwh) * 4,
    availability: average((h) => h.availability),
    performance: average((h) => h.performance),
    quality: average((h) => h.quality),
    oee: average((h) => h.oee),
  };
}
