import { connectAsync, type IClientOptions, type MqttClient } from 'mqtt';
import type { Logger } from '../logging/logger';
import { errorMeta } from '../logging/logger';
import { LogComponents } from '../logging/components';

export type MessageHandler = (topic: string, payload: Buffer) => void;

/**
 * What the telemetry subscriber needs from a broker connection.
 * Tests substitute an in-process fake.
 */
export interface TelemetryTransport {
  connect(): Promise<void>;
  subscribe(topic: string, handler: MessageHandler): Promise<void>;
  publish(topic: string, payload: string): Promise<void>;
  disconnect(): Promise<void>;
}

/**
 * MQTT topic filter match with `+` (one level) and `#` (remaining levels)
 */
export function topicMatches(pattern: string, topic: string): boolean {
  const patternLevels = pattern.split('/');
  const topicLevels = topic.split('/');

  for (let i = 0; i < patternLevels.length; i++) {
    const level = patternLevels[i];
    if (level === '#') return true;
    if (i >= topicLevels.length) return false;
    if (level !== '+' && level !== topicLevels[i]) return false;
  }
  return patternLevels.length === topicLevels.length;
}

export interface MqttTransportOptions {
  brokerUrl: string;
  username?: string;
  password?: string;
  logger?: Logger;
  connectTimeoutMs?: number;
}

/**
 * Broker connection backed by mqtt.js. Reconnects are left to the client's
 * own reconnectPeriod; subscriptions are restored by the broker session.
 */
export class MqttTransport implements TelemetryTransport {
  private client: MqttClient | null = null;
  private handlers: Array<{ pattern: string; handler: MessageHandler }> = [];
  private readonly logger?: Logger;

  constructor(private readonly options: MqttTransportOptions) {
    this.logger = options.logger;
  }

  async connect(): Promise<void> {
    if (this.client?.connected) return;

    const { brokerUrl, username, password } = this.options;
    const clientOptions: IClientOptions = {
      username,
      password,
      clean: false,
      clientId: `gridsense-detector-${process.pid}`,
      reconnectPeriod: 5000,
      connectTimeout: this.options.connectTimeoutMs ?? 10000,
    };

    const client = await connectAsync(brokerUrl, clientOptions);
    this.client = client;

    this.logger?.info('Connected to MQTT broker', {
      component: LogComponents.MQTT,
      brokerUrl,
    });

    client.on('error', (error) => {
      this.logger?.error('MQTT connection error', {
        component: LogComponents.MQTT,
        brokerUrl,
        ...errorMeta(error),
      });
    });
    client.on('offline', () => {
      this.logger?.warn('MQTT client offline', { component: LogComponents.MQTT });
    });
    client.on('reconnect', () => {
      this.logger?.info('MQTT client reconnecting', { component: LogComponents.MQTT });
    });
    client.on('message', (topic, payload) => this.route(topic, payload));
  }

  async subscribe(topic: string, handler: MessageHandler): Promise<void> {
    const client = this.requireClient();
    const granted = await client.subscribeAsync(topic, { qos: 1 });

    if (granted.length === 0 || granted[0].qos === 128) {
      throw new Error(`Subscribe rejected by broker for topic: ${topic}`);
    }

    this.handlers.push({ pattern: topic, handler });
    this.logger?.info('Subscribed to topic', {
      component: LogComponents.MQTT,
      topic,
      qos: granted[0].qos,
    });
  }

  async publish(topic: string, payload: string): Promise<void> {
    await this.requireClient().publishAsync(topic, payload, { qos: 1 });
  }

  async disconnect(): Promise<void> {
    if (!this.client) return;
    const client = this.client;
    this.client = null;
    this.handlers = [];
    await client.endAsync();
    this.logger?.info('MQTT connection closed', { component: LogComponents.MQTT });
  }

  private route(topic: string, payload: Buffer): void {
    for (const { pattern, handler } of this.handlers) {
      if (topicMatches(pattern, topic)) {
        handler(topic, payload);
      }
    }
  }

  private requireClient(): MqttClient {
    if (!this.client) {
      throw new Error('MQTT client not connected');
    }
    return this.client;
  }
}
