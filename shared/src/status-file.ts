import { existsSync, readFileSync, renameSync, writeFileSync } from 'fs';
import type { DeviceRunStatus } from './types.js';
import { SettingsFileError } from './errors.js';

/**
 * On-disk layout of `device_status.json`.
 *
 * The supervisor owns `counters` and the `device_type`/`status`/`created_at` fields; worker
 * processes write the `cumulocity_*` fields of their own entry. Both sides rewrite the whole
 * file, so two writers racing between read and write lose one update.
 */
export interface StatusFileDevice {
  device_type: string;
  status: DeviceRunStatus;
  created_at: string;
  cumulocity_registered?: boolean;
  cumulocity_device_name?: string;
  cumulocity_registered_at?: string;
}

export interface StatusFileData {
  counters: Record<string, number>;
  devices: Record<string, StatusFileDevice>;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function parseDevice(v: unknown): StatusFileDevice | null {
  if (!isObject(v)) return null;
  if (typeof v.device_type !== 'string') return null;
  const out: StatusFileDevice = {
    device_type: v.device_type,
    status: v.status === 'active' ? 'active' : 'stopped',
    created_at: typeof v.created_at === 'string' ? v.created_at : new Date().toISOString(),
  };
  if (typeof v.cumulocity_registered === 'boolean') out.cumulocity_registered = v.cumulocity_registered;
  if (typeof v.cumulocity_device_name === 'string') out.cumulocity_device_name = v.cumulocity_device_name;
  if (typeof v.cumulocity_registered_at === 'string') out.cumulocity_registered_at = v.cumulocity_registered_at;
  return out;
}

/** Validate parsed JSON, dropping entries that do not have the expected shape. */
export function parseStatusFile(raw: unknown): StatusFileData {
  const data: StatusFileData = { counters: {}, devices: {} };
  if (!isObject(raw)) return data;
  if (isObject(raw.counters)) {
    for (const [key, value] of Object.entries(raw.counters)) {
      if (typeof value === 'number' && Number.isInteger(value) && value >= 0) data.counters[key] = value;
    }
  }
  if (isObject(raw.devices)) {
    for (const [id, value] of Object.entries(raw.devices)) {
      const device = parseDevice(value);
      if (device) data.devices[id] = device;
    }
  }
  return data;
}

/** Missing file reads as empty; unreadable JSON raises `SettingsFileError`. */
export function readStatusFile(path: string): StatusFileData {
  if (!existsSync(path)) return { counters: {}, devices: {} };
  try {
    return parseStatusFile(JSON.parse(readFileSync(path, 'utf8')));
  } catch (e) {
    throw new SettingsFileError(path, e);
  }
}

export function writeStatusFile(path: string, data: StatusFileData): void {
  const tmp = `${path}.${process.pid}.tmp`;
  writeFileSync(tmp, JSON.stringify(data, null, 2));
  renameSync(tmp, path);
}

export interface RegistrationRecord {
  registered: boolean;
  deviceName?: string;
  registeredAt?: string;
}

/** Remembers which devices the remote platform already knows. */
export interface RegistrationStore {
  get(deviceId: string): RegistrationRecord | null;
  markRegistered(deviceId: string, deviceName: string): void;
}

export class StatusFileRegistrationStore implements RegistrationStore {
  constructor(private readonly path: string) {}

  get(deviceId: string): RegistrationRecord | null {
    const entry = readStatusFile(this.path).devices[deviceId];
    if (!entry || entry.cumulocity_registered === undefined) return null;
    return {
      registered: entry.cumulocity_registered,
      deviceName: entry.cumulocity_device_name,
      registeredAt: entry.cumulocity_registered_at,
    };
  }

  /** Throws when the device has no entry; the supervisor creates entries, workers only annotate them. */
  markRegistered(deviceId: string, deviceName: string): void {
    const data = readStatusFile(this.path);
    const entry = data.devices[deviceId];
    if (!entry) throw new Error(`device ${deviceId} has no entry in ${this.path}`);
    entry.cumulocity_registered = true;
    entry.cumulocity_device_name = deviceName;
    entry.cumulocity_registered_at = new Date().toISOString();
    writeStatusFile(this.path, data);
  }
}
