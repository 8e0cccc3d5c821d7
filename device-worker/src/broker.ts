import { EventEmitter } from 'eventemitter3';
import { connect, type IClientOptions, type MqttClient } from 'mqtt';

export type Qos = 0 | 1;

export interface BrokerEvents {
  connect: [];
  /** CONNACK with a non-zero return/reason code. */
  rejected: [code: number];
  error: [err: Error];
  close: [];
  message: [topic: string, payload: string];
}

export interface BrokerOptions {
  host: string;
  port: number;
  clientId: string;
  username?: string;
  password?: string;
  tls: boolean;
  ca?: Buffer;
  cert?: Buffer;
  key?: Buffer;
  connectTimeoutMs: number;
  keepaliveSeconds: number;
}

/**
 * The slice of an MQTT client the uplink needs. Auto-reconnect is left to the caller:
 * once a connection closes it stays closed.
 */
export interface BrokerConnection extends EventEmitter<BrokerEvents> {
  publish(topic: string, payload: string, qos: Qos): Promise<void>;
  subscribe(topic: string, qos: Qos): Promise<void>;
  end(): Promise<void>;
}

export type BrokerFactory = (options: BrokerOptions) => BrokerConnection;

export class MqttBrokerConnection extends EventEmitter<BrokerEvents> implements BrokerConnection {
  private readonly client: MqttClient;

  constructor(o: BrokerOptions) {
    super();
    const options: IClientOptions = {
      host: o.host,
      port: o.port,
      protocol: o.tls ? 'mqtts' : 'mqtt',
      clientId: o.clientId,
      username: o.username,
      password: o.password,
      ca: o.ca,
      cert: o.cert,
      key: o.key,
      clean: true,
      keepalive: o.keepaliveSeconds,
      connectTimeout: o.connectTimeoutMs,
      reconnectPeriod: 0,
    };
    this.client = connect(options);
    this.client.on('connect', () => this.emit('connect'));
    // Inspect CONNACK so that a rejection carries its reason code
    this.client.on('packetreceive', (packet) => {
      if (packet.cmd !== 'connack') return;
      const code = packet.reasonCode ?? packet.returnCode ?? 0;
      if (code !== 0) this.emit('rejected', code);
    });
    this.client.on('error', (err) => this.emit('error', err));
    this.client.on('close', () => this.emit('close'));
    this.client.on('message', (topic, payload) => this.emit('message', topic, payload.toString('utf8')));
  }

  publish(topic: string, payload: string, qos: Qos): Promise<void> {
    return new Promise((resolve, reject) => {
      this.client.publish(topic, payload, { qos }, (err) => (err ? reject(err) : resolve()));
    });
  }

  subscribe(topic: string, qos: Qos): Promise<void> {
    return new Promise((resolve, reject) => {
      this.client.subscribe(topic, { qos }, (err) => (err ? reject(err) : resolve()));
    });
  }

  end(): Promise<void> {
    return new Promise((resolve) => {
      this.client.end(true, {}, () => resolve());
    });
  }
}

export const openMqttBroker: BrokerFactory = (options) => new MqttBrokerConnection(options);
