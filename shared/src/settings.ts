import { existsSync, readFileSync, writeFileSync } from 'fs';
import { SettingsFileError } from './errors.js';

export const MIN_INTERVAL_SECONDS = 1;
export const MAX_INTERVAL_SECONDS = 300;
export const DEFAULT_INTERVAL_SECONDS = 5;

export interface DeviceSettings {
  measurementInterval: number;
  autoSaveInterval: number;
}

export interface UplinkSettings {
  enabled: boolean;
  brokerHost: string;
  brokerPort: number;
  username: string;
  password: string;
  tenant: string;
  useSsl: boolean;
  caCertPath: string;
  clientCertPath: string;
  clientKeyPath: string;
  deviceNamePrefix: string;
}

export const DEFAULT_DEVICE_SETTINGS: Readonly<DeviceSettings> = {
  measurementInterval: DEFAULT_INTERVAL_SECONDS,
  autoSaveInterval: 30,
};

export const DEFAULT_UPLINK_SETTINGS: Readonly<UplinkSettings> = {
  enabled: false,
  brokerHost: '',
  brokerPort: 1883,
  username: '',
  password: '',
  tenant: '',
  useSsl: false,
  caCertPath: '',
  clientCertPath: '',
  clientKeyPath: '',
  deviceNamePrefix: 'iot_sim_',
};

export function clampInterval(seconds: number): number {
  if (!Number.isFinite(seconds)) return DEFAULT_INTERVAL_SECONDS;
  return Math.min(MAX_INTERVAL_SECONDS, Math.max(MIN_INTERVAL_SECONDS, Math.round(seconds)));
}

/** TLS on the default plain port means the broker's TLS port. */
export function effectiveBrokerPort(s: UplinkSettings): number {
  return s.useSsl && s.brokerPort === 1883 ? 8883 : s.brokerPort;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

const str = (v: unknown, fallback: string) => (typeof v === 'string' ? v : fallback);
const bool = (v: unknown, fallback: boolean) => (typeof v === 'boolean' ? v : fallback);
const num = (v: unknown, fallback: number) => {
  const n = typeof v === 'string' && v.trim() !== '' ? Number(v) : v;
  return typeof n === 'number' && Number.isFinite(n) ? n : fallback;
};

export function parseDeviceSettings(raw: unknown): DeviceSettings {
  const d = DEFAULT_DEVICE_SETTINGS;
  if (!isObject(raw)) return { ...d };
  return {
    measurementInterval: clampInterval(num(raw.measurement_interval, d.measurementInterval)),
    autoSaveInterval: num(raw.auto_save_interval, d.autoSaveInterval),
  };
}

export function serializeDeviceSettings(s: DeviceSettings): Record<string, unknown> {
  return { measurement_interval: s.measurementInterval, auto_save_interval: s.autoSaveInterval };
}

export function parseUplinkSettings(raw: unknown): UplinkSettings {
  const d = DEFAULT_UPLINK_SETTINGS;
  if (!isObject(raw)) return { ...d };
  return {
    enabled: bool(raw.enabled, d.enabled),
    brokerHost: str(raw.broker_host, d.brokerHost),
    brokerPort: num(raw.broker_port, d.brokerPort),
    username: str(raw.username, d.username),
    password: str(raw.password, d.password),
    tenant: str(raw.tenant, d.tenant),
    useSsl: bool(raw.use_ssl, d.useSsl),
    caCertPath: str(raw.ca_cert_path, d.caCertPath),
    clientCertPath: str(raw.client_cert_path, d.clientCertPath),
    clientKeyPath: str(raw.client_key_path, d.clientKeyPath),
    // older files used `device_prefix`
    deviceNamePrefix: str(raw.device_name_prefix, str(raw.device_prefix, d.deviceNamePrefix)),
  };
}

export function serializeUplinkSettings(s: UplinkSettings): Record<string, unknown> {
  return {
    enabled: s.enabled,
    broker_host: s.brokerHost,
    broker_port: s.brokerPort,
    username: s.username,
    password: s.password,
    tenant: s.tenant,
    use_ssl: s.useSsl,
    ca_cert_path: s.caCertPath,
    client_cert_path: s.clientCertPath,
    client_key_path: s.clientKeyPath,
    device_name_prefix: s.deviceNamePrefix,
  };
}

/**
 * A JSON settings file with no versioning: every `load()` reads the disk and every
 * `update()` rewrites it, last writer wins. An absent file yields the defaults; an unreadable
 * one yields the defaults too and is reported through `onError`.
 */
export class SettingsFile<T extends object> {
  constructor(
    readonly path: string,
    private readonly parse: (raw: unknown) => T,
    private readonly serialize: (value: T) => Record<string, unknown>,
    private readonly onError: (err: SettingsFileError) => void = () => {},
  ) {}

  load(): T {
    if (!existsSync(this.path)) return this.parse(undefined);
    try {
      return this.parse(JSON.parse(readFileSync(this.path, 'utf8')));
    } catch (e) {
      this.onError(new SettingsFileError(this.path, e));
      return this.parse(undefined);
    }
  }

  save(value: T): void {
    writeFileSync(this.path, JSON.stringify(this.serialize(value), null, 2));
  }

  /**
   * Merge a patch in file format (snake_case keys) over the current contents, re-validate
   * and write. Unknown keys and ill-typed values are dropped by the parser.
   */
  update(patch: Record<string, unknown>): T {
    const next = this.parse({ ...this.serialize(this.load()), ...patch });
    this.save(next);
    return next;
  }
}

export function deviceSettingsFile(path: string, onError?: (err: SettingsFileError) => void): SettingsFile<DeviceSettings> {
  return new SettingsFile(path, parseDeviceSettings, serializeDeviceSettings, onError);
}

export function uplinkSettingsFile(path: string, onError?: (err: SettingsFileError) => void): SettingsFile<UplinkSettings> {
  return new SettingsFile(path, parseUplinkSettings, serializeUplinkSettings, onError);
}
