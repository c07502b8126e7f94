import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Crane } from '../database/entities/crane.entity';
import { TopicBinding } from '../database/entities/topic-binding.entity';
import { CraneConfiguration } from '../database/entities/crane-configuration.entity';
import { FieldMapping } from '../database/entities/field-mapping.entity';
import { TopicResolverService } from './topic-resolver.service';
import { CapacityCacheService } from './capacity-cache.service';
import { CraneConfigurationService } from './crane-configuration.service';
import { FieldMappingService } from './field-mapping.service';

/**
 * CranesModule
 *
 * Registry lookups shared by ingestion and the KPI engine:
 * - TopicResolverService: topic -> crane
 * - CapacityCacheService: effective load capacity per crane
 * - CraneConfigurationService: tariff/targets with defaults
 * - FieldMappingService: per-crane field name overrides
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([
      Crane,
      TopicBinding,
      CraneConfiguration,
      FieldMapping,
    ]),
  ],
  providers: [
    TopicResolverService,
    CapacityCacheService,
    CraneConfigurationService,
    FieldMappingService,
  ],
  exports: [
    TopicResolverService,
    CapacityCacheService,
    CraneConfigurationService,
    FieldMappingService,
  ],
})
export class CranesModule {}
