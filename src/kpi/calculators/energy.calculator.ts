export interface PowerSample {
  timestamp: Date;
  /** kW; null counts as 0 */
  totalPower: number | null;
}

export interface PowerSummary {
  averagePower: number;
  peakPower: number;
}

/**
 * kWh by trapezoidal integration of total power over samples ordered by
 * timestamp. A single sample yields 0.
 */
export function calculateEnergyConsumption(samples: PowerSample[]): number {
  let energyKwh = 0;

  for (let i = 1; i < samples.length; i++) {
    const previous = samples[i - 1];
    const current = samples[i];
    const hours =
      (current.timestamp.getTime() - previous.timestamp.getTime()) / 3_600_000;
    const averagePower =
      ((previous.totalPower ?? 0) + (current.totalPower ?? 0)) / 2;
    energyKwh += averagePower * hours;
  }

  return energyKwh;
}

export function summarizePower(samples: PowerSample[]): PowerSummary {
  if (samples.length === 0) {
    return { averagePower: 0, peakPower: 0 };
  }
  const powers = samples.map((sample) => sample.totalPower ?? 0);
  return {
    averagePower: powers.reduce((sum, p) => sum + p, 0) / powers.length,
    peakPower: powers.reduce((peak, p) => Math.max(peak, p), powers[0]),
  };
}

export function calculateEnergyCost(
  energyKwh: number,
  tariffRate: number,
): number {
  return energyKwh * tariffRate;
}

export function calculateEnergyPerTon(
  energyKwh: number,
  massTonnes: number,
): number {
  return massTonnes > 0 ? energyKwh / massTonnes : 0;
}

/**
 * Percentage of the target energy-per-ton achieved, capped at 100.
 * 0 when no energy per ton was measured.
 */
export function calculateSystemEfficiency(
  actualEnergyPerTon: number,
  targetEnergyPerTon: number,
): number {
  if (actualEnergyPerTon <= 0 || targetEnergyPerTon <= 0) {
    return 0;
  }
  return Math.min(100, (targetEnergyPerTon / actualEnergyPerTon) * 100);
}
