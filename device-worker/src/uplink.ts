/**
 * Telemetry uplink
 * ---------------------------------------------
 * One session per worker process. Owns the broker connection, the registration state,
 * and two background timers:
 * - reconnect loop: started by an unexpected close or a failed connect; exponential backoff from 5 s doubling
 *   to a 300 s ceiling, at most 50 attempts, then gives up until re-enabled;
 * - heartbeat: every 60 s while connected, publishes a keep-alive if nothing else went
 *   out in that window.
 *
 * All state lives on the single event loop; the `reconnecting` flag keeps a send or a
 * heartbeat from starting a second connect while a backoff attempt is pending.
 */
import { EventEmitter } from 'eventemitter3';
import { readFileSync } from 'fs';
import type { MeasurementSample } from '../../shared/src/types.js';
import type { RegistrationStore } from '../../shared/src/status-file.js';
import { effectiveBrokerPort, type UplinkSettings } from '../../shared/src/settings.js';
import { errorMessage } from '../../shared/src/errors.js';
import { openMqttBroker, type BrokerConnection, type BrokerFactory, type BrokerOptions } from './broker.js';
import {
  DOWNSTREAM_TOPIC,
  RESTART_OPERATION,
  UPSTREAM_TOPIC,
  alarmMessage,
  heartbeatMessage,
  measurementMessage,
  operationExecuting,
  operationSuccessful,
  parseSmartRestLine,
  registrationMessage,
  type AlarmSeverity,
} from './smartrest.js';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';
export type RegistrationState = 'unregistered' | 'registered';

export type ConnectFailureReason =
  | 'protocol-mismatch'
  | 'bad-identifier'
  | 'unavailable'
  | 'bad-credentials'
  | 'unauthorized'
  | 'timeout'
  | 'error';

export type ConnectResult = { ok: true } | { ok: false; reason: ConnectFailureReason; detail?: string };

// Map MQTT CONNACK reason codes to human-readable text (MQTT v5 and MQTT v3.1.1)
export function connackReasonText(code: number): string {
  const v5: Record<number, string> = {
    128: 'Unspecified error',
    130: 'Protocol Error',
    132: 'Unsupported Protocol Version',
    133: 'Client Identifier not valid',
    134: 'Bad User Name or Password',
    135: 'Not authorized',
    136: 'Server unavailable',
    137: 'Server busy',
    138: 'Banned',
    140: 'Bad authentication method',
  };
  const v3: Record<number, string> = {
    0: 'Connection Accepted',
    1: 'Unacceptable protocol version',
    2: 'Identifier rejected',
    3: 'Server unavailable',
    4: 'Bad user name or password',
    5: 'Not authorized',
  };
  return v5[code] || v3[code] || `Unknown (${code})`;
}

export function rejectionReason(code: number): ConnectFailureReason {
  switch (code) {
    case 1: case 130: case 132: return 'protocol-mismatch';
    case 2: case 133: return 'bad-identifier';
    case 3: case 136: case 137: return 'unavailable';
    case 4: case 134: case 140: return 'bad-credentials';
    case 5: case 135: case 138: return 'unauthorized';
    default: return 'error';
  }
}

/** Delay before reconnect attempt `attempt` (1-based). */
export function reconnectDelayMs(attempt: number, baseMs = 5_000, maxMs = 300_000): number {
  return Math.min(baseMs * 2 ** Math.max(attempt - 1, 0), maxMs);
}

export interface UplinkEvents {
  connected: [];
  disconnected: [requested: boolean];
  registered: [deviceName: string];
  reconnecting: [attempt: number, delayMs: number];
  gaveUp: [attempts: number];
  command: [operation: string];
}

export interface UplinkSessionOptions {
  deviceId: string;
  /** External name; also the MQTT client id. */
  deviceName: string;
  settings: UplinkSettings;
  registrations: RegistrationStore;
  openBroker?: BrokerFactory;
  logTag?: string;
  connectTimeoutMs?: number;
  reconnectBaseMs?: number;
  reconnectMaxMs?: number;
  maxReconnectAttempts?: number;
  heartbeatIntervalMs?: number;
  restartDelayMs?: number;
}

export class UplinkSession extends EventEmitter<UplinkEvents> {
  readonly deviceId: string;
  readonly deviceName: string;

  connectionState: ConnectionState = 'disconnected';
  registrationState: RegistrationState = 'unregistered';
  reconnectAttempts = 0;
  lastMessageAt: number | null = null;
  lastHeartbeatAt: number | null = null;

  private readonly settings: UplinkSettings;
  private readonly registrations: RegistrationStore;
  private readonly openBroker: BrokerFactory;
  private readonly tag: string;
  private readonly connectTimeoutMs: number;
  private readonly reconnectBaseMs: number;
  private readonly reconnectMaxMs: number;
  private readonly maxReconnectAttempts: number;
  private readonly heartbeatIntervalMs: number;
  private readonly restartDelayMs: number;

  private broker: BrokerConnection | null = null;
  private connecting: Promise<ConnectResult> | null = null;
  private abortConnect: (() => void) | null = null;
  private autoReconnect = true;
  private reconnecting = false;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private readonly operationTimers = new Set<NodeJS.Timeout>();

  constructor(o: UplinkSessionOptions) {
    super();
    this.deviceId = o.deviceId;
    this.deviceName = o.deviceName;
    this.settings = o.settings;
    this.registrations = o.registrations;
    this.openBroker = o.openBroker ?? openMqttBroker;
    this.tag = o.logTag ?? `[uplink:${o.deviceId}]`;
    this.connectTimeoutMs = o.connectTimeoutMs ?? 10_000;
    this.reconnectBaseMs = o.reconnectBaseMs ?? 5_000;
    this.reconnectMaxMs = o.reconnectMaxMs ?? 300_000;
    this.maxReconnectAttempts = o.maxReconnectAttempts ?? 50;
    this.heartbeatIntervalMs = o.heartbeatIntervalMs ?? 60_000;
    this.restartDelayMs = o.restartDelayMs ?? 2_000;
  }

  get isConnected(): boolean {
    return this.connectionState === 'connected' && this.broker !== null;
  }

  get isReconnecting(): boolean {
    return this.reconnecting;
  }

  get autoReconnectEnabled(): boolean {
    return this.autoReconnect;
  }

  /** Re-arm automatic reconnection after `disconnect()` or after the loop gave up, with a fresh attempt budget. */
  enableAutoReconnect(): void {
    this.autoReconnect = true;
    this.reconnectAttempts = 0;
  }

  /**
   * Open the broker connection and wait up to the connect timeout for the outcome.
   * Concurrent callers share the same attempt. A failure outside the backoff loop starts it
   * while auto-reconnect is on.
   */
  async connect(): Promise<ConnectResult> {
    const result = await this.connectOnce();
    if (!result.ok && this.autoReconnect && !this.reconnecting) this.startReconnectLoop();
    return result;
  }

  private connectOnce(): Promise<ConnectResult> {
    if (this.isConnected) return Promise.resolve({ ok: true });
    if (!this.connecting) {
      this.connecting = this.openConnection().finally(() => { this.connecting = null; });
    }
    return this.connecting;
  }

  private brokerOptions(): BrokerOptions {
    const s = this.settings;
    const readIf = (p: string) => (p ? readFileSync(p) : undefined);
    return {
      host: s.brokerHost,
      port: effectiveBrokerPort(s),
      clientId: this.deviceName,
      username: s.username ? (s.tenant ? `${s.tenant}/${s.username}` : s.username) : undefined,
      password: s.password || undefined,
      tls: s.useSsl,
      ca: s.useSsl ? readIf(s.caCertPath) : undefined,
      cert: s.useSsl ? readIf(s.clientCertPath) : undefined,
      key: s.useSsl ? readIf(s.clientKeyPath) : undefined,
      connectTimeoutMs: this.connectTimeoutMs,
      keepaliveSeconds: 60,
    };
  }

  private async openConnection(): Promise<ConnectResult> {
    this.dropBroker();
    this.connectionState = 'connecting';

    let broker: BrokerConnection;
    try {
      broker = this.openBroker(this.brokerOptions());
    } catch (e) {
      this.connectionState = 'disconnected';
      console.error(`${this.tag} cannot open connection to ${this.settings.brokerHost}:`, errorMessage(e));
      return { ok: false, reason: 'error', detail: errorMessage(e) };
    }
    this.broker = broker;
    console.log(`${this.tag} connecting to ${this.settings.brokerHost}:${effectiveBrokerPort(this.settings)} as ${this.deviceName}`);

    const result = await new Promise<ConnectResult>((resolve) => {
      const finish = (r: ConnectResult) => {
        this.abortConnect = null;
        clearTimeout(timer);
        broker.off('connect', onConnect);
        broker.off('rejected', onRejected);
        broker.off('error', onError);
        broker.off('close', onClose);
        resolve(r);
      };
      const onConnect = () => finish({ ok: true });
      const onRejected = (code: number) => finish({ ok: false, reason: rejectionReason(code), detail: connackReasonText(code) });
      const onError = (err: Error) => finish({ ok: false, reason: 'error', detail: err.message });
      const onClose = () => finish({ ok: false, reason: 'unavailable', detail: 'connection closed' });
      const timer = setTimeout(() => finish({ ok: false, reason: 'timeout', detail: `no CONNACK within ${this.connectTimeoutMs} ms` }), this.connectTimeoutMs);
      broker.on('connect', onConnect);
      broker.on('rejected', onRejected);
      broker.on('error', onError);
      broker.on('close', onClose);
      this.abortConnect = () => finish({ ok: false, reason: 'error', detail: 'disconnect requested' });
    });

    // disconnect() may have run while we were waiting
    if (this.broker !== broker) {
      broker.removeAllListeners();
      await broker.end();
      return { ok: false, reason: 'error', detail: 'connection superseded' };
    }

    if (!result.ok) {
      this.connectionState = 'disconnected';
      this.dropBroker();
      console.error(`${this.tag} connect failed (${result.reason}${result.detail ? `: ${result.detail}` : ''})`);
      return result;
    }

    this.connectionState = 'connected';
    this.reconnectAttempts = 0;
    broker.on('close', () => this.handleClose(broker));
    broker.on('error', (err) => console.error(`${this.tag} mqtt error`, err.message));
    broker.on('message', (topic, payload) => this.handleMessage(topic, payload));
    console.log(`${this.tag} connected`);
    this.startHeartbeat();
    if (this.registrationState === 'registered') await this.subscribeCommands();
    this.emit('connected');
    return result;
  }

  private dropBroker(): void {
    const broker = this.broker;
    this.broker = null;
    if (!broker) return;
    broker.removeAllListeners();
    broker.end().catch((e: unknown) => console.warn(`${this.tag} error closing connection:`, errorMessage(e)));
  }

  private handleClose(broker: BrokerConnection): void {
    if (broker !== this.broker) return;
    this.broker = null;
    broker.removeAllListeners();
    this.connectionState = 'disconnected';
    this.stopHeartbeat();
    console.warn(`${this.tag} unexpected disconnect from broker`);
    this.emit('disconnected', false);
    if (this.autoReconnect) this.startReconnectLoop();
  }

  private startReconnectLoop(): void {
    if (this.reconnecting) return;
    this.reconnecting = true;
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (!this.autoReconnect) {
      this.reconnecting = false;
      return;
    }
    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      this.reconnecting = false;
      this.autoReconnect = false;
      console.error(`${this.tag} giving up after ${this.reconnectAttempts} reconnect attempts; auto-reconnect disabled`);
      this.emit('gaveUp', this.reconnectAttempts);
      return;
    }
    const attempt = ++this.reconnectAttempts;
    const delay = reconnectDelayMs(attempt, this.reconnectBaseMs, this.reconnectMaxMs);
    console.log(`${this.tag} reconnect attempt ${attempt}/${this.maxReconnectAttempts} in ${delay / 1000}s`);
    this.emit('reconnecting', attempt, delay);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.attemptReconnect().catch((e: unknown) => {
        console.error(`${this.tag} reconnect attempt failed:`, errorMessage(e));
        this.scheduleReconnect();
      });
    }, delay);
  }

  private async attemptReconnect(): Promise<void> {
    if (!this.autoReconnect) {
      this.reconnecting = false;
      return;
    }
    const result = await this.connectOnce();
    if (result.ok) {
      this.reconnecting = false;
      console.log(`${this.tag} reconnected`);
    } else {
      this.scheduleReconnect();
    }
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private heartbeat(): void {
    const broker = this.broker;
    if (this.connectionState !== 'connected' || !broker) return;
    const now = Date.now();
    const lastOut = Math.max(this.lastMessageAt ?? 0, this.lastHeartbeatAt ?? 0);
    if (now - lastOut < this.heartbeatIntervalMs) return;
    this.lastHeartbeatAt = now;
    broker.publish(UPSTREAM_TOPIC, heartbeatMessage(this.deviceName), 0).catch((e: unknown) => {
      // the broker's close event decides the connection state, not a failed publish
      console.warn(`${this.tag} heartbeat publish failed:`, errorMessage(e));
    });
  }

  /**
   * Register the device with the platform once. A device the registration store already
   * knows is not published again unless `force` is set; either way the command channel
   * is (re-)subscribed.
   */
  async register(deviceType: string, name: string, force = false): Promise<boolean> {
    if (!force) {
      let known = false;
      try {
        known = this.registrations.get(this.deviceId)?.registered === true;
      } catch (e) {
        console.warn(`${this.tag} cannot read registration record:`, errorMessage(e));
      }
      if (known) {
        console.log(`${this.tag} ${name} already registered, skipping registration`);
        this.registrationState = 'registered';
        await this.subscribeCommands();
        return true;
      }
    }

    const broker = this.broker;
    if (!this.isConnected || !broker) {
      console.warn(`${this.tag} cannot register ${name}: not connected`);
      return false;
    }
    try {
      await broker.publish(UPSTREAM_TOPIC, registrationMessage(name, deviceType), 1);
    } catch (e) {
      console.error(`${this.tag} registration of ${name} failed:`, errorMessage(e));
      return false;
    }
    this.lastMessageAt = Date.now();
    this.registrationState = 'registered';
    try {
      this.registrations.markRegistered(this.deviceId, name);
    } catch (e) {
      console.warn(`${this.tag} registered ${name} but could not persist the record:`, errorMessage(e));
    }
    console.log(`${this.tag} registered ${name} (${deviceType})`);
    await this.subscribeCommands();
    this.emit('registered', name);
    return true;
  }

  private async subscribeCommands(): Promise<boolean> {
    const broker = this.broker;
    if (!this.isConnected || !broker) return false;
    try {
      await broker.subscribe(DOWNSTREAM_TOPIC, 1);
      return true;
    } catch (e) {
      console.error(`${this.tag} subscribe to ${DOWNSTREAM_TOPIC} failed:`, errorMessage(e));
      return false;
    }
  }

  private handleMessage(topic: string, payload: string): void {
    if (topic !== DOWNSTREAM_TOPIC) return;
    for (const line of payload.split(/\r?\n/)) {
      if (!line.trim()) continue;
      const [template] = parseSmartRestLine(line);
      if (template === '510') this.handleRestart();
      else console.log(`${this.tag} ignoring operation template ${template}`);
    }
  }

  /** Acknowledge, pretend to restart, then report success. Nothing is actually restarted. */
  private handleRestart(): void {
    console.log(`${this.tag} restart requested`);
    this.emit('command', RESTART_OPERATION);
    this.publishQuietly(operationExecuting(RESTART_OPERATION));
    const timer = setTimeout(() => {
      this.operationTimers.delete(timer);
      this.publishQuietly(operationSuccessful(RESTART_OPERATION));
      console.log(`${this.tag} restart completed`);
    }, this.restartDelayMs);
    this.operationTimers.add(timer);
  }

  private publishQuietly(message: string): void {
    const broker = this.broker;
    if (!this.isConnected || !broker) return;
    broker.publish(UPSTREAM_TOPIC, message, 1).then(
      () => { this.lastMessageAt = Date.now(); },
      (e: unknown) => console.warn(`${this.tag} publish failed:`, errorMessage(e)),
    );
  }

  /**
   * Forward one sample. When disconnected and no backoff loop is running, one inline
   * reconnect is tried first; if it fails the loop takes over and later sends are dropped
   * without waiting. Failures are logged and reported as `false`.
   */
  async sendMeasurement(sample: MeasurementSample): Promise<boolean> {
    if (!this.isConnected) {
      if (!this.autoReconnect || this.reconnecting || this.connectionState !== 'disconnected') {
        console.warn(`${this.tag} not connected, dropping measurement`);
        return false;
      }
      const result = await this.connect();
      if (!result.ok) return false;
    }
    const broker = this.broker;
    if (!broker) return false;
    try {
      await broker.publish(UPSTREAM_TOPIC, measurementMessage(sample), 0);
      this.lastMessageAt = Date.now();
      return true;
    } catch (e) {
      console.error(`${this.tag} failed to publish measurement:`, errorMessage(e));
      return false;
    }
  }

  async sendAlarm(type: string, text: string, severity: AlarmSeverity = 'MINOR'): Promise<boolean> {
    const broker = this.broker;
    if (!this.isConnected || !broker) return false;
    try {
      await broker.publish(UPSTREAM_TOPIC, alarmMessage(type, text, severity), 1);
      this.lastMessageAt = Date.now();
      console.log(`${this.tag} alarm sent: ${type} - ${text}`);
      return true;
    } catch (e) {
      console.error(`${this.tag} failed to send alarm:`, errorMessage(e));
      return false;
    }
  }

  /** Close for good: auto-reconnect off, timers cleared, flags reset. */
  async disconnect(): Promise<void> {
    this.autoReconnect = false;
    this.reconnecting = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.stopHeartbeat();
    for (const t of this.operationTimers) clearTimeout(t);
    this.operationTimers.clear();
    this.abortConnect?.();

    const broker = this.broker;
    this.broker = null;
    this.connectionState = 'disconnected';
    this.registrationState = 'unregistered';
    if (broker) {
      broker.removeAllListeners();
      await broker.end();
      console.log(`${this.tag} disconnected from broker`);
    }
    this.emit('disconnected', true);
  }
}
