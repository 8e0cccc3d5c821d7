import { EventEmitter } from 'eventemitter3';
import type { RegistrationRecord, RegistrationStore } from '../../shared/src/status-file.js';
import type { BrokerConnection, BrokerEvents, BrokerFactory, BrokerOptions, Qos } from './broker.js';

export type BrokerOutcome = 'accept' | 'hang' | { reject: number };

export interface Published {
  topic: string;
  payload: string;
  qos: Qos;
}

/** In-process broker connection that settles its CONNACK on the next microtask. */
export class FakeBroker extends EventEmitter<BrokerEvents> implements BrokerConnection {
  readonly published: Published[] = [];
  readonly subscribed: string[] = [];
  ended = false;
  failPublish = false;

  constructor(readonly options: BrokerOptions, outcome: BrokerOutcome) {
    super();
    void Promise.resolve().then(() => {
      if (outcome === 'accept') this.emit('connect');
      else if (outcome !== 'hang') this.emit('rejected', outcome.reject);
    });
  }

  publish(topic: string, payload: string, qos: Qos): Promise<void> {
    if (this.failPublish) return Promise.reject(new Error('publish failed'));
    this.published.push({ topic, payload, qos });
    return Promise.resolve();
  }

  subscribe(topic: string): Promise<void> {
    this.subscribed.push(topic);
    return Promise.resolve();
  }

  end(): Promise<void> {
    this.ended = true;
    return Promise.resolve();
  }
}

/** Hands out one FakeBroker per connect; the last outcome repeats. */
export function fakeBrokers(...outcomes: BrokerOutcome[]): { open: BrokerFactory; brokers: FakeBroker[] } {
  const brokers: FakeBroker[] = [];
  const open: BrokerFactory = (options) => {
    const broker = new FakeBroker(options, outcomes[Math.min(brokers.length, outcomes.length - 1)]);
    brokers.push(broker);
    return broker;
  };
  return { open, brokers };
}

export class MemoryRegistrationStore implements RegistrationStore {
  readonly records = new Map<string, RegistrationRecord>();

  get(deviceId: string): RegistrationRecord | null {
    return this.records.get(deviceId) ?? null;
  }

  markRegistered(deviceId: string, deviceName: string): void {
    this.records.set(deviceId, { registered: true, deviceName, registeredAt: new Date().toISOString() });
  }
}
