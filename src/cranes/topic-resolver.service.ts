import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Crane } from '../database/entities/crane.entity';
import { TopicBinding } from '../database/entities/topic-binding.entity';

/**
 * TopicResolverService - maps an MQTT topic to its crane.
 * Only active bindings resolve; a topic without one yields null.
 */
@Injectable()
export class TopicResolverService {
  constructor(
    @InjectRepository(TopicBinding)
    private readonly bindingRepository: Repository<TopicBinding>,
  ) {}

  async resolve(topic: string): Promise<Crane | null> {
    const binding = await this.bindingRepository.findOne({
      where: { mqttTopic: topic, isActive: true },
      relations: { crane: true },
    });
    return binding?.crane ?? null;
  }

  /** Distinct topics of all active bindings, for subscription */
  async listActiveTopics(): Promise<string[]> {
    const bindings = await this.bindingRepository.find({
      where: { isActive: true },
      select: { mqttTopic: true },
      order: { mqttTopic: 'ASC' },
    });
    return [...new Set(bindings.map((binding) => binding.mqttTopic))];
  }
}
