import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';
import { CraneConfiguration } from '../database/entities/crane-configuration.entity';

/**
 * Values used when a crane has no configuration row.
 */
export const DEFAULT_CRANE_CONFIGURATION = {
  tariffRate: 0.15,
  currency: 'USD',
  targetEnergyPerTon: 1.0,
  warningThreshold: 80,
  overloadThreshold: 95,
  targetAvailability: 90,
  targetPerformance: 95,
  targetQuality: 99,
} as const;

/**
 * Configuration as the KPI engine sees it.
 * `maxLoadCapacity` is null when no row exists.
 */
export interface EffectiveCraneConfiguration {
  craneId: number;
  tariffRate: number;
  currency: string;
  targetEnergyPerTon: number;
  maxLoadCapacity: number | null;
  isDefault: boolean;
}

@Injectable()
export class CraneConfigurationService {
  private readonly logger = new Logger(CraneConfigurationService.name);

  constructor(
    @InjectRepository(CraneConfiguration)
    private readonly configurationRepository: Repository<CraneConfiguration>,
  ) {}

  async findByCraneId(craneId: number): Promise<CraneConfiguration | null> {
    return this.configurationRepository.findOne({ where: { craneId } });
  }

  async findByCraneIds(craneIds: number[]): Promise<CraneConfiguration[]> {
    if (craneIds.length === 0) return [];
    return this.configurationRepository.find({
      where: { craneId: In(craneIds) },
    });
  }

  /**
   * Stored configuration, or the documented defaults when the crane has
   * none.
   */
  async getEffective(craneId: number): Promise<EffectiveCraneConfiguration> {
    const configuration = await this.findByCraneId(craneId);
    if (!configuration) {
      this.logger.debug(
        `No configuration for crane ${craneId}, using defaults (tariff ${DEFAULT_CRANE_CONFIGURATION.tariffRate}, target ${DEFAULT_CRANE_CONFIGURATION.targetEnergyPerTon} kWh/t)`,
      );
      return {
        craneId,
        tariffRate: DEFAULT_CRANE_CONFIGURATION.tariffRate,
        currency: DEFAULT_CRANE_CONFIGURATION.currency,
        targetEnergyPerTon: DEFAULT_CRANE_CONFIGURATION.targetEnergyPerTon,
        maxLoadCapacity: null,
        isDefault: true,
      };
    }

    return {
      craneId,
      tariffRate: configuration.tariffRate,
      currency: configuration.currency,
      targetEnergyPerTon: configuration.targetEnergyPerTon,
      maxLoadCapacity: configuration.maxLoadCapacity,
      isDefault: false,
    };
  }

  /**
   * Write a capacity reported by telemetry, creating the configuration row
   * with defaults when the crane has none. Runs on the caller's transaction.
   */
  async persistCapacity(
    manager: EntityManager,
    craneId: number,
    capacityKg: number,
  ): Promise<void> {
    const repository = manager.getRepository(CraneConfiguration);
    const existing = await repository.findOne({ where: { craneId } });

    if (existing) {
      if (existing.maxLoadCapacity !== capacityKg) {
        await repository.update(
          { craneId },
          { maxLoadCapacity: capacityKg },
        );
      }
      return;
    }

    await repository.insert({
      ...DEFAULT_CRANE_CONFIGURATION,
      craneId,
      maxLoadCapacity: capacityKg,
    });
    this.logger.log(
      `Created configuration for crane ${craneId} with capacity ${capacityKg} kg`,
    );
  }
}
