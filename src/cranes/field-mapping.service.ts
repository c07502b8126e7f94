import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { FieldMapping } from '../database/entities/field-mapping.entity';

/**
 * Active field mappings of a crane, keyed by lowercase incoming field name.
 */
@Injectable()
export class FieldMappingService {
  constructor(
    @InjectRepository(FieldMapping)
    private readonly mappingRepository: Repository<FieldMapping>,
  ) {}

  async getOverrides(craneId: number): Promise<Map<string, string>> {
    const mappings = await this.mappingRepository.find({
      where: { craneId, isActive: true },
      select: { incomingFieldName: true, mappedFieldName: true },
    });
    return new Map(
      mappings.map((mapping) => [
        mapping.incomingFieldName.toLowerCase(),
        mapping.mappedFieldName,
      ]),
    );
  }
}
