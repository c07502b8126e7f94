import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { connect, IClientOptions, MqttClient } from 'mqtt';
import { EnvironmentVariables } from '../../config/env.validation';
import { describeError } from '../../common/retry';
import { TopicResolverService } from '../../cranes/topic-resolver.service';
import { CapacityCacheService } from '../../cranes/capacity-cache.service';
import { IngestionService } from '../ingestion.service';

/**
 * MqttListenerService - broker ingress for the ingestion pipeline.
 *
 * Subscribes to the topic of every active binding on each (re)connect and
 * hands every message to IngestionService. Pipeline failures are logged
 * here; nothing a message does can take the listener down.
 */
@Injectable()
export class MqttListenerService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(MqttListenerService.name);
  private client: MqttClient | null = null;

  constructor(
    private readonly configService: ConfigService<EnvironmentVariables, true>,
    private readonly ingestionService: IngestionService,
    private readonly topicResolver: TopicResolverService,
    private readonly capacityCache: CapacityCacheService,
  ) {}

  onApplicationBootstrap(): void {
    if (!this.configService.get('MQTT_ENABLED', { infer: true })) {
      this.logger.log('MQTT listener disabled');
      return;
    }

    const url = this.configService.get('MQTT_URL', { infer: true });
    const options: IClientOptions = {
      clientId:
        this.configService.get('MQTT_CLIENT_ID', { infer: true }) ??
        `crane-telemetry-${randomUUID().slice(0, 8)}`,
      username: this.configService.get('MQTT_USERNAME', { infer: true }),
      password: this.configService.get('MQTT_PASSWORD', { infer: true }),
      reconnectPeriod: 5000,
    };

    this.logger.log(`Connecting to MQTT broker at ${url}`);
    const client = connect(url, options);
    this.client = client;

    client.on('connect', () => {
      this.handleConnect(client).catch((error: unknown) => {
        this.logger.error(`MQTT subscription failed: ${describeError(error)}`);
      });
    });

    client.on('message', (topic, payload) => {
      this.handleMessage(topic, payload);
    });

    client.on('error', (error) => {
      this.logger.error(`MQTT client error: ${error.message}`);
    });

    client.on('reconnect', () => {
      this.logger.warn('Reconnecting to MQTT broker...');
    });

    client.on('close', () => {
      this.logger.debug('MQTT connection closed');
    });
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.client) return;
    await this.client.endAsync();
    this.client = null;
    this.logger.log('MQTT listener stopped');
  }

  private async handleConnect(client: MqttClient): Promise<void> {
    const topics = await this.topicResolver.listActiveTopics();
    if (topics.length === 0) {
      this.logger.warn('Connected to MQTT broker, but no active topic bindings');
    } else {
      await client.subscribeAsync(topics, { qos: this.qos() });
      this.logger.log(
        `Connected to MQTT broker, subscribed to ${topics.length} topic(s)`,
      );
    }
    await this.capacityCache.preload();
  }

  private handleMessage(topic: string, payload: Buffer): void {
    this.ingestionService
      .ingestMessage(topic, payload)
      .then((result) => {
        if (result.outcome === 'failed') {
          this.logger.error(
            `Message on '${topic}' failed: ${result.errors.join('; ')}`,
          );
        }
      })
      .catch((error: unknown) => {
        this.logger.error(
          `Unexpected ingestion error on '${topic}': ${describeError(error)}`,
        );
      });
  }

  private qos(): 0 | 1 | 2 {
    return this.configService.get('MQTT_QOS', { infer: true });
  }
}
