import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Crane } from '../database/entities/crane.entity';
import { KeyedMutex } from '../common/keyed-mutex';
import { CraneConfigurationService } from './crane-configuration.service';

export type CapacitySubject = Pick<Crane, 'id' | 'capacityTonnes'>;

/**
 * CapacityCacheService - effective load capacity (kg) per crane.
 *
 * Resolution order:
 * 1. cached value
 * 2. configuration `maxLoadCapacity`
 * 3. rated `capacityTonnes * 1000`
 *
 * Capacity changes for a crane are serialized through `runExclusive`, and
 * the cache is only updated after the owning transaction commits
 * (`remember`), so readers never see an uncommitted capacity.
 */
@Injectable()
export class CapacityCacheService {
  private readonly logger = new Logger(CapacityCacheService.name);
  private readonly capacities = new Map<number, number>();
  private readonly mutex = new KeyedMutex<number>();

  constructor(
    @InjectRepository(Crane)
    private readonly craneRepository: Repository<Crane>,
    private readonly configurationService: CraneConfigurationService,
  ) {}

  async resolve(crane: CapacitySubject): Promise<number> {
    const cached = this.capacities.get(crane.id);
    if (cached !== undefined) {
      return cached;
    }

    const configuration = await this.configurationService.findByCraneId(
      crane.id,
    );
    const capacity =
      configuration?.maxLoadCapacity ?? crane.capacityTonnes * 1000;
    this.capacities.set(crane.id, capacity);
    return capacity;
  }

  /**
   * Warm the cache for every active crane.
   * @returns Number of cranes cached
   */
  async preload(): Promise<number> {
    const cranes = await this.craneRepository.find({
      where: { isActive: true },
      select: { id: true, capacityTonnes: true },
    });
    const configurations = await this.configurationService.findByCraneIds(
      cranes.map((crane) => crane.id),
    );
    const overrides = new Map(
      configurations.map((c) => [c.craneId, c.maxLoadCapacity]),
    );

    for (const crane of cranes) {
      this.capacities.set(
        crane.id,
        overrides.get(crane.id) ?? crane.capacityTonnes * 1000,
      );
    }

    this.logger.log(`Preloaded capacity for ${cranes.length} crane(s)`);
    return cranes.length;
  }

  remember(craneId: number, capacityKg: number): void {
    const previous = this.capacities.get(craneId);
    this.capacities.set(craneId, capacityKg);
    if (previous !== capacityKg) {
      this.logger.log(
        `Capacity for crane ${craneId} updated: ${previous ?? 'unset'} -> ${capacityKg} kg`,
      );
    }
  }

  runExclusive<T>(craneId: number, task: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(craneId, task);
  }
}
