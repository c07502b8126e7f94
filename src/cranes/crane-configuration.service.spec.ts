import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { EntityManager } from 'typeorm';
import {
  CraneConfigurationService,
  DEFAULT_CRANE_CONFIGURATION,
} from './crane-configuration.service';
import { CraneConfiguration } from '../database/entities/crane-configuration.entity';

describe('CraneConfigurationService', () => {
  let service: CraneConfigurationService;

  const mockRepository = {
    findOne: jest.fn(),
    find: jest.fn(),
    update: jest.fn(),
    insert: jest.fn(),
  };

  const manager = {
    getRepository: jest.fn().mockReturnValue(mockRepository),
  };

  function storedConfiguration(
    overrides: Partial<CraneConfiguration> = {},
  ): CraneConfiguration {
    return Object.assign(new CraneConfiguration(), {
      id: 4,
      craneId: 1,
      tariffRate: 0.2,
      currency: 'EUR',
      targetEnergyPerTon: 1.5,
      maxLoadCapacity: 9000,
      ...overrides,
    });
  }

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CraneConfigurationService,
        {
          provide: getRepositoryToken(CraneConfiguration),
          useValue: mockRepository,
        },
      ],
    }).compile();

    service = module.get<CraneConfigurationService>(CraneConfigurationService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('getEffective', () => {
    it('should use defaults when the crane has no configuration', async () => {
      mockRepository.findOne.mockResolvedValue(null);

      await expect(service.getEffective(3)).resolves.toEqual({
        craneId: 3,
        tariffRate: 0.15,
        currency: 'USD',
        targetEnergyPerTon: 1.0,
        maxLoadCapacity: null,
        isDefault: true,
      });
    });

    it('should return the stored configuration', async () => {
      mockRepository.findOne.mockResolvedValue(storedConfiguration());

      await expect(service.getEffective(1)).resolves.toEqual({
        craneId: 1,
        tariffRate: 0.2,
        currency: 'EUR',
        targetEnergyPerTon: 1.5,
        maxLoadCapacity: 9000,
        isDefault: false,
      });
    });
  });

  describe('findByCraneIds', () => {
    it('should not query for an empty id list', async () => {
      await expect(service.findByCraneIds([])).resolves.toEqual([]);
      expect(mockRepository.find).not.toHaveBeenCalled();
    });
  });

  describe('persistCapacity', () => {
    it('should update a changed capacity', async () => {
      mockRepository.findOne.mockResolvedValue(storedConfiguration());

      await service.persistCapacity(
        manager as unknown as EntityManager,
        1,
        12000,
      );

      expect(manager.getRepository).toHaveBeenCalledWith(CraneConfiguration);
      expect(mockRepository.update).toHaveBeenCalledWith(
        { craneId: 1 },
        { maxLoadCapacity: 12000 },
      );
      expect(mockRepository.insert).not.toHaveBeenCalled();
    });

    it('should skip the write when the capacity is unchanged', async () => {
      mockRepository.findOne.mockResolvedValue(storedConfiguration());

      await service.persistCapacity(
        manager as unknown as EntityManager,
        1,
        9000,
      );

      expect(mockRepository.update).not.toHaveBeenCalled();
    });

    it('should create a configuration with defaults', async () => {
      mockRepository.findOne.mockResolvedValue(null);

      await service.persistCapacity(
        manager as unknown as EntityManager,
        7,
        5000,
      );

      expect(mockRepository.insert).toHaveBeenCalledWith({
        ...DEFAULT_CRANE_CONFIGURATION,
        craneId: 7,
        maxLoadCapacity: 5000,
      });
    });
  });
});
