import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_UPLINK_SETTINGS, type UplinkSettings } from '../../shared/src/settings.js';
import { MemoryRegistrationStore, fakeBrokers, type BrokerOutcome } from './testing.js';
import { UplinkSession, reconnectDelayMs, rejectionReason, type UplinkSessionOptions } from './uplink.js';

const settings: UplinkSettings = {
  ...DEFAULT_UPLINK_SETTINGS,
  enabled: true,
  brokerHost: 'broker.test',
  username: 'device',
  password: 'test-secret',
  tenant: 't1',
};

const sample = {
  deviceId: 'pv001',
  timestamp: '2024-01-01T00:00:00.000Z',
  voltage: 225,
  current: 10,
  power: 2250,
  kwh: 0.003125,
};

function session(outcomes: BrokerOutcome[], extra: Partial<UplinkSessionOptions> = {}) {
  const fake = fakeBrokers(...outcomes);
  const registrations = new MemoryRegistrationStore();
  const uplink = new UplinkSession({
    deviceId: 'pv001',
    deviceName: 'iot_sim_pv001',
    settings,
    registrations,
    openBroker: fake.open,
    ...extra,
  });
  return { uplink, registrations, brokers: fake.brokers };
}

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe('helpers', () => {
  it('doubles the reconnect delay up to five minutes', () => {
    expect([1, 2, 3, 4, 5, 6, 7, 8].map((n) => reconnectDelayMs(n))).toEqual([
      5_000, 10_000, 20_000, 40_000, 80_000, 160_000, 300_000, 300_000,
    ]);
  });

  it('maps CONNACK codes to failure reasons', () => {
    expect(rejectionReason(1)).toBe('protocol-mismatch');
    expect(rejectionReason(2)).toBe('bad-identifier');
    expect(rejectionReason(3)).toBe('unavailable');
    expect(rejectionReason(4)).toBe('bad-credentials');
    expect(rejectionReason(134)).toBe('bad-credentials');
    expect(rejectionReason(5)).toBe('unauthorized');
    expect(rejectionReason(135)).toBe('unauthorized');
    expect(rejectionReason(128)).toBe('error');
  });
});

describe('connect', () => {
  it('connects with tenant-qualified credentials', async () => {
    const { uplink, brokers } = session(['accept']);
    const connected = vi.fn();
    uplink.on('connected', connected);

    await expect(uplink.connect()).resolves.toEqual({ ok: true });
    expect(uplink.isConnected).toBe(true);
    expect(connected).toHaveBeenCalledTimes(1);
    expect(brokers[0].options).toMatchObject({
      host: 'broker.test',
      port: 1883,
      clientId: 'iot_sim_pv001',
      username: 't1/device',
      password: 'test-secret',
      tls: false,
    });
  });

  it('shares one attempt between concurrent callers', async () => {
    const { uplink, brokers } = session(['accept']);
    const [a, b] = await Promise.all([uplink.connect(), uplink.connect()]);
    expect(a).toEqual({ ok: true });
    expect(b).toEqual({ ok: true });
    expect(brokers).toHaveLength(1);
  });

  it('reports a rejected CONNACK with its reason', async () => {
    const { uplink, brokers } = session([{ reject: 134 }]);
    await expect(uplink.connect()).resolves.toEqual({
      ok: false,
      reason: 'bad-credentials',
      detail: 'Bad User Name or Password',
    });
    expect(uplink.connectionState).toBe('disconnected');
    expect(brokers[0].ended).toBe(true);
  });

  it('times out when no CONNACK arrives', async () => {
    const { uplink } = session(['hang']);
    const pending = uplink.connect();
    await vi.advanceTimersByTimeAsync(10_000);
    await expect(pending).resolves.toEqual({ ok: false, reason: 'timeout', detail: 'no CONNACK within 10000 ms' });
    expect(uplink.isConnected).toBe(false);
  });

  it('abandons a pending connect on disconnect', async () => {
    const { uplink } = session(['hang']);
    const pending = uplink.connect();
    await uplink.disconnect();
    await expect(pending).resolves.toMatchObject({ ok: false, reason: 'error' });
    expect(uplink.connectionState).toBe('disconnected');
  });
});

describe('register', () => {
  it('publishes the registration once and subscribes to commands', async () => {
    const { uplink, registrations, brokers } = session(['accept']);
    await uplink.connect();

    await expect(uplink.register('PV', 'iot_sim_pv001')).resolves.toBe(true);
    await expect(uplink.register('PV', 'iot_sim_pv001')).resolves.toBe(true);

    const registrationsSent = brokers[0].published.filter((p) => p.payload.startsWith('100,'));
    expect(registrationsSent).toEqual([{ topic: 's/us', payload: '100,iot_sim_pv001,PV', qos: 1 }]);
    expect(uplink.registrationState).toBe('registered');
    expect(registrations.get('pv001')?.deviceName).toBe('iot_sim_pv001');
    expect(brokers[0].subscribed).toContain('s/ds');
  });

  it('skips devices the store already knows', async () => {
    const { uplink, registrations, brokers } = session(['accept']);
    registrations.markRegistered('pv001', 'iot_sim_pv001');
    await uplink.connect();

    await uplink.register('PV', 'iot_sim_pv001');
    expect(brokers[0].published).toEqual([]);
    expect(brokers[0].subscribed).toEqual(['s/ds']);
  });

  it('republishes when forced', async () => {
    const { uplink, registrations, brokers } = session(['accept']);
    registrations.markRegistered('pv001', 'iot_sim_pv001');
    await uplink.connect();

    await uplink.register('PV', 'iot_sim_pv001', true);
    expect(brokers[0].published.map((p) => p.payload)).toEqual(['100,iot_sim_pv001,PV']);
  });

  it('fails while disconnected', async () => {
    const { uplink } = session(['accept']);
    await expect(uplink.register('PV', 'iot_sim_pv001')).resolves.toBe(false);
    expect(uplink.registrationState).toBe('unregistered');
  });
});

describe('reconnect loop', () => {
  it('backs off exponentially after an unexpected close', async () => {
    const { uplink, brokers } = session(['accept', { reject: 3 }]);
    const delays: number[] = [];
    uplink.on('reconnecting', (_attempt, delay) => delays.push(delay));
    await uplink.connect();

    brokers[0].emit('close');
    expect(uplink.isReconnecting).toBe(true);
    for (const step of [5_000, 10_000, 20_000, 40_000]) {
      await vi.advanceTimersByTimeAsync(step);
    }
    expect(delays).toEqual([5_000, 10_000, 20_000, 40_000, 80_000]);
    expect(brokers).toHaveLength(5);
  });

  it('resets the attempt count and resubscribes once reconnected', async () => {
    const { uplink, brokers } = session(['accept']);
    await uplink.connect();
    await uplink.register('PV', 'iot_sim_pv001');

    brokers[0].emit('close');
    await vi.advanceTimersByTimeAsync(5_000);

    expect(uplink.isConnected).toBe(true);
    expect(uplink.isReconnecting).toBe(false);
    expect(uplink.reconnectAttempts).toBe(0);
    expect(brokers[1].subscribed).toEqual(['s/ds']);
  });

  it('gives up after the attempt limit and disables auto-reconnect', async () => {
    const { uplink, brokers } = session(['accept', { reject: 3 }], { reconnectBaseMs: 1_000, maxReconnectAttempts: 3 });
    const gaveUp = vi.fn();
    uplink.on('gaveUp', gaveUp);
    await uplink.connect();

    brokers[0].emit('close');
    await vi.advanceTimersByTimeAsync(1_000 + 2_000 + 4_000);

    expect(gaveUp).toHaveBeenCalledWith(3);
    expect(uplink.autoReconnectEnabled).toBe(false);
    expect(uplink.isReconnecting).toBe(false);
    await expect(uplink.sendMeasurement(sample)).resolves.toBe(false);
    expect(brokers).toHaveLength(4);
  });

  it('starts backing off when the first connect fails', async () => {
    const { uplink, brokers } = session([{ reject: 3 }], { reconnectBaseMs: 1_000, maxReconnectAttempts: 3 });
    const gaveUp = vi.fn();
    uplink.on('gaveUp', gaveUp);

    await expect(uplink.connect()).resolves.toMatchObject({ ok: false, reason: 'unavailable' });
    expect(uplink.isReconnecting).toBe(true);

    // sends during the loop are dropped without opening connections of their own
    for (let i = 0; i < 20; i++) {
      await expect(uplink.sendMeasurement(sample)).resolves.toBe(false);
      await vi.advanceTimersByTimeAsync(1_000);
    }

    expect(gaveUp).toHaveBeenCalledTimes(1);
    expect(gaveUp).toHaveBeenCalledWith(3);
    expect(brokers).toHaveLength(4);
    expect(uplink.autoReconnectEnabled).toBe(false);
  });

  it('does not leave a send waiting on a broker that never answers', async () => {
    const { uplink, brokers } = session(['hang'], { maxReconnectAttempts: 2 });
    const first = uplink.sendMeasurement(sample);
    await vi.advanceTimersByTimeAsync(10_000);
    await expect(first).resolves.toBe(false);
    expect(uplink.isReconnecting).toBe(true);

    const done = vi.fn();
    void uplink.sendMeasurement(sample).then(done);
    await vi.advanceTimersByTimeAsync(0);
    expect(done).toHaveBeenCalledWith(false);
    expect(brokers).toHaveLength(1);
  });

  it('reconnects on the next send once re-enabled after giving up', async () => {
    const { uplink, brokers } = session([{ reject: 3 }, { reject: 3 }, 'accept'], { reconnectBaseMs: 1_000, maxReconnectAttempts: 1 });
    await uplink.connect();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(uplink.autoReconnectEnabled).toBe(false);
    expect(brokers).toHaveLength(2);

    uplink.enableAutoReconnect();
    expect(uplink.reconnectAttempts).toBe(0);
    await expect(uplink.sendMeasurement(sample)).resolves.toBe(true);
    expect(brokers).toHaveLength(3);
    expect(brokers[2].published).toHaveLength(1);
  });

  it('does not reconnect after a requested disconnect', async () => {
    const { uplink, brokers } = session(['accept']);
    await uplink.connect();
    await uplink.disconnect();

    await vi.advanceTimersByTimeAsync(60_000);
    expect(brokers).toHaveLength(1);
    expect(brokers[0].ended).toBe(true);
    expect(uplink.autoReconnectEnabled).toBe(false);
  });
});

describe('heartbeat', () => {
  it('publishes only when nothing else went out for a full interval', async () => {
    const { uplink, brokers } = session(['accept']);
    await uplink.connect();
    const heartbeats = () => brokers[0].published.filter((p) => p.payload.startsWith('400,'));

    await vi.advanceTimersByTimeAsync(60_000);
    expect(heartbeats().map((p) => p.payload)).toEqual(['400,c8y_Heartbeat,Heartbeat from iot_sim_pv001']);

    await vi.advanceTimersByTimeAsync(30_000);
    await uplink.sendMeasurement(sample);
    await vi.advanceTimersByTimeAsync(30_000);
    expect(heartbeats()).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(heartbeats()).toHaveLength(2);
  });
});

describe('commands', () => {
  it('acknowledges a restart request and reports success later', async () => {
    const { uplink, brokers } = session(['accept']);
    const command = vi.fn();
    uplink.on('command', command);
    await uplink.connect();

    brokers[0].emit('message', 's/ds', '510,iot_sim_pv001');
    await vi.advanceTimersByTimeAsync(0);
    expect(command).toHaveBeenCalledWith('c8y_Restart');
    expect(brokers[0].published.map((p) => p.payload)).toEqual(['501,c8y_Restart']);

    await vi.advanceTimersByTimeAsync(2_000);
    expect(brokers[0].published.map((p) => p.payload)).toEqual(['501,c8y_Restart', '503,c8y_Restart']);
  });

  it('ignores other topics and templates', async () => {
    const { uplink, brokers } = session(['accept']);
    await uplink.connect();
    brokers[0].emit('message', 's/other', '510');
    brokers[0].emit('message', 's/ds', '511,iot_sim_pv001,ls');
    await vi.advanceTimersByTimeAsync(5_000);
    expect(brokers[0].published).toEqual([]);
  });
});

describe('sending', () => {
  it('publishes measurements at QoS 0', async () => {
    const { uplink, brokers } = session(['accept']);
    await uplink.connect();
    await expect(uplink.sendMeasurement(sample)).resolves.toBe(true);
    expect(brokers[0].published).toHaveLength(1);
    expect(brokers[0].published[0].qos).toBe(0);
    expect(brokers[0].published[0].payload.split('\n')).toHaveLength(4);
  });

  it('connects inline when sending while disconnected', async () => {
    const { uplink, brokers } = session(['accept']);
    await expect(uplink.sendMeasurement(sample)).resolves.toBe(true);
    expect(brokers).toHaveLength(1);
    expect(uplink.isConnected).toBe(true);
  });

  it('reports a failed publish as false', async () => {
    const { uplink, brokers } = session(['accept']);
    await uplink.connect();
    brokers[0].failPublish = true;
    await expect(uplink.sendMeasurement(sample)).resolves.toBe(false);
  });

  it('sends alarms with the severity template', async () => {
    const { uplink, brokers } = session(['accept']);
    await uplink.connect();
    await expect(uplink.sendAlarm('c8y_Overload', 'too much')).resolves.toBe(true);
    expect(brokers[0].published).toEqual([{ topic: 's/us', payload: '303,c8y_Overload,too much', qos: 1 }]);
  });
});
