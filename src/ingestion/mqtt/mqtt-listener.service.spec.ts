import { EventEmitter } from 'node:events';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { connect, MqttClient } from 'mqtt';
import { MqttListenerService } from './mqtt-listener.service';
import { IngestionService } from '../ingestion.service';
import { TopicResolverService } from '../../cranes/topic-resolver.service';
import { CapacityCacheService } from '../../cranes/capacity-cache.service';
import { payload } from '../../../test/utils/test-helpers';
import { TEST_TOPIC } from '../../../test/utils/mock-data';

jest.mock('mqtt', () => ({ connect: jest.fn() }));

const mockConnect = jest.mocked(connect);

class FakeMqttClient extends EventEmitter {
  subscribeAsync = jest.fn().mockResolvedValue([]);
  endAsync = jest.fn().mockResolvedValue(undefined);
}

function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('MqttListenerService', () => {
  let service: MqttListenerService;
  let client: FakeMqttClient;
  let settings: Record<string, unknown>;

  const mockIngestionService = {
    ingestMessage: jest.fn(),
  };

  const mockTopicResolver = {
    listActiveTopics: jest.fn(),
  };

  const mockCapacityCache = {
    preload: jest.fn(),
  };

  const mockConfigService = {
    get: jest.fn((key: string) => settings[key]),
  };

  beforeEach(async () => {
    settings = {
      MQTT_ENABLED: true,
      MQTT_URL: 'mqtt://broker.test:1883',
      MQTT_CLIENT_ID: 'test-client',
      MQTT_USERNAME: 'crane',
      MQTT_PASSWORD: 'test-secret',
      MQTT_QOS: 1,
    };
    client = new FakeMqttClient();
    mockConnect.mockReturnValue(client as unknown as MqttClient);
    mockTopicResolver.listActiveTopics.mockResolvedValue([
      'plant-a/crane-01/telemetry',
      'plant-a/crane-02/telemetry',
    ]);
    mockCapacityCache.preload.mockResolvedValue(2);
    mockIngestionService.ingestMessage.mockResolvedValue({
      outcome: 'stored',
      errors: [],
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MqttListenerService,
        { provide: ConfigService, useValue: mockConfigService },
        { provide: IngestionService, useValue: mockIngestionService },
        { provide: TopicResolverService, useValue: mockTopicResolver },
        { provide: CapacityCacheService, useValue: mockCapacityCache },
      ],
    }).compile();

    service = module.get<MqttListenerService>(MqttListenerService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should not connect when disabled', () => {
    settings.MQTT_ENABLED = false;

    service.onApplicationBootstrap();

    expect(mockConnect).not.toHaveBeenCalled();
  });

  it('should connect with the configured credentials', () => {
    service.onApplicationBootstrap();

    expect(mockConnect).toHaveBeenCalledWith('mqtt://broker.test:1883', {
      clientId: 'test-client',
      username: 'crane',
      password: 'test-secret',
      reconnectPeriod: 5000,
    });
  });

  it('should generate a client id when none is configured', () => {
    settings.MQTT_CLIENT_ID = undefined;

    service.onApplicationBootstrap();

    expect(mockConnect).toHaveBeenCalledWith(
      'mqtt://broker.test:1883',
      expect.objectContaining({
        clientId: expect.stringMatching(/^crane-telemetry-[0-9a-f]{8}$/),
      }),
    );
  });

  it('should subscribe to active topics and warm the capacity cache on connect', async () => {
    service.onApplicationBootstrap();
    client.emit('connect');
    await flushPromises();

    expect(client.subscribeAsync).toHaveBeenCalledWith(
      ['plant-a/crane-01/telemetry', 'plant-a/crane-02/telemetry'],
      { qos: 1 },
    );
    expect(mockCapacityCache.preload).toHaveBeenCalledTimes(1);
  });

  it('should not subscribe when no topic is bound', async () => {
    mockTopicResolver.listActiveTopics.mockResolvedValue([]);

    service.onApplicationBootstrap();
    client.emit('connect');
    await flushPromises();

    expect(client.subscribeAsync).not.toHaveBeenCalled();
    expect(mockCapacityCache.preload).toHaveBeenCalledTimes(1);
  });

  it('should hand every message to the ingestion pipeline', async () => {
    const body = payload({ load: 640 });

    service.onApplicationBootstrap();
    client.emit('message', TEST_TOPIC, body);
    await flushPromises();

    expect(mockIngestionService.ingestMessage).toHaveBeenCalledWith(
      TEST_TOPIC,
      body,
    );
  });

  it('should keep listening after an ingestion error', async () => {
    mockIngestionService.ingestMessage.mockRejectedValueOnce(
      new Error('unexpected'),
    );

    service.onApplicationBootstrap();
    client.emit('message', TEST_TOPIC, payload({ load: 1 }));
    client.emit('message', TEST_TOPIC, payload({ load: 2 }));
    await flushPromises();

    expect(mockIngestionService.ingestMessage).toHaveBeenCalledTimes(2);
  });

  it('should close the client on shutdown', async () => {
    service.onApplicationBootstrap();

    await service.onModuleDestroy();

    expect(client.endAsync).toHaveBeenCalledTimes(1);
  });
});
