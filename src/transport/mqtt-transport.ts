/**
 * MQTT Transport
 *
 * Carries state messages over one MQTT topic. Streaming instances publish
 * at QoS 1 (at-least-once), listening instances subscribe to the same
 * topic. The client reconnects on its own and re-issues the subscription
 * after each reconnect (mqtt.js `resubscribe`).
 */

import { connect, IClientOptions } from 'mqtt';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { MessageHandler, MessageTransport } from './transport';

export interface MqttTransportConfig {
  brokerUrl: string;
  topic: string;
  clientId?: string;
  qos: 0 | 1 | 2;
  /** Milliseconds between reconnect attempts */
  reconnectPeriodMs?: number;
}

/** The part of the mqtt.js client this transport uses */
export interface MqttClientHandle {
  on(event: 'message', listener: (topic: string, payload: Buffer) => void): unknown;
  on(event: 'connect' | 'close' | 'reconnect' | 'offline', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  publishAsync(topic: string, message: string, opts: { qos: 0 | 1 | 2 }): Promise<unknown>;
  subscribeAsync(topic: string, opts: { qos: 0 | 1 | 2 }): Promise<unknown>;
  endAsync(): Promise<void>;
}

export type MqttConnect = (brokerUrl: string, options: IClientOptions) => MqttClientHandle;

export class MqttTransport implements MessageTransport {
  readonly name = 'mqtt';

  private client: MqttClientHandle;
  private topic: string;
  private qos: 0 | 1 | 2;
  private handlers: MessageHandler[] = [];
  private subscribed = false;
  private closed = false;
  private log: Logger;

  constructor(config: MqttTransportConfig, connectClient: MqttConnect = connect) {
    this.topic = config.topic;
    this.qos = config.qos;
    this.log = getLogger('Mqtt');
    this.client = connectClient(config.brokerUrl, toClientOptions(config));

    this.client.on('connect', () => {
      this.log.info({ brokerUrl: config.brokerUrl, topic: this.topic }, 'Connected');
    });

    this.client.on('close', () => {
      this.log.debug('Disconnected');
    });

    this.client.on('reconnect', () => {
      this.log.info({ brokerUrl: config.brokerUrl }, 'Reconnecting');
    });

    this.client.on('offline', () => {
      this.log.warn('Offline');
    });

    this.client.on('message', (topic: string, payload: Buffer) => {
      if (topic !== this.topic) return;
      const receivedAt = Date.now();
      for (const handler of this.handlers) {
        handler({ data: payload, receivedAt });
      }
    });

    this.client.on('error', (err: Error) => {
      this.log.error({ err, brokerUrl: config.brokerUrl }, 'Client error');
    });
  }

  async publish(payload: string): Promise<void> {
    await this.client.publishAsync(this.topic, payload, { qos: this.qos });
  }

  async subscribe(handler: MessageHandler): Promise<void> {
    this.handlers.push(handler);
    if (this.subscribed) return;
    this.subscribed = true;
    await this.client.subscribeAsync(this.topic, { qos: this.qos });
    this.log.info({ topic: this.topic }, 'Subscribed');
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.handlers = [];
    await this.client.endAsync();
  }
}

function toClientOptions(config: MqttTransportConfig): IClientOptions {
  const options: IClientOptions = {
    reconnectPeriod: config.reconnectPeriodMs ?? 2000,
    clean: true,
    resubscribe: true,
  };
  if (config.clientId) {
    options.clientId = config.clientId;
  }
  return options;
}
