import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SettingsFileError } from './errors.js';
import {
  StatusFileRegistrationStore,
  parseStatusFile,
  readStatusFile,
  writeStatusFile,
} from './status-file.js';

let dir: string;
let file: string;

beforeEach(() => {
  dir = mkdtempSync(path.join(tmpdir(), 'status-file-'));
  file = path.join(dir, 'device_status.json');
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('status file', () => {
  it('reads a missing file as empty', () => {
    expect(readStatusFile(file)).toEqual({ counters: {}, devices: {} });
  });

  it('drops malformed entries and treats unknown statuses as stopped', () => {
    const data = parseStatusFile({
      counters: { pv: 3, bad: -1, worse: 'x' },
      devices: {
        pv001: { device_type: 'PV', status: 'active', created_at: '2024-01-01T00:00:00.000Z' },
        pv002: { device_type: 'PV', status: 'paused', created_at: '2024-01-02T00:00:00.000Z' },
        junk: { status: 'active' },
      },
    });
    expect(data.counters).toEqual({ pv: 3 });
    expect(Object.keys(data.devices)).toEqual(['pv001', 'pv002']);
    expect(data.devices.pv002.status).toBe('stopped');
  });

  it('writes the whole document', () => {
    writeStatusFile(file, {
      counters: { pv: 1 },
      devices: { pv001: { device_type: 'PV', status: 'stopped', created_at: '2024-01-01T00:00:00.000Z' } },
    });
    expect(readStatusFile(file).devices.pv001.device_type).toBe('PV');
  });

  it('raises SettingsFileError for unparseable JSON', () => {
    writeFileSync(file, '{ not json');
    expect(() => readStatusFile(file)).toThrow(SettingsFileError);
  });
});

describe('StatusFileRegistrationStore', () => {
  beforeEach(() => {
    writeStatusFile(file, {
      counters: { pv: 1 },
      devices: { pv001: { device_type: 'PV', status: 'active', created_at: '2024-01-01T00:00:00.000Z' } },
    });
  });

  it('has no record before registration', () => {
    expect(new StatusFileRegistrationStore(file).get('pv001')).toBeNull();
  });

  it('annotates the device entry and keeps the rest of the file', () => {
    const store = new StatusFileRegistrationStore(file);
    store.markRegistered('pv001', 'iot_sim_pv001');

    const record = store.get('pv001');
    expect(record?.registered).toBe(true);
    expect(record?.deviceName).toBe('iot_sim_pv001');
    const data = readStatusFile(file);
    expect(data.counters).toEqual({ pv: 1 });
    expect(data.devices.pv001.status).toBe('active');
  });

  it('refuses to create entries for unknown devices', () => {
    expect(() => new StatusFileRegistrationStore(file).markRegistered('pv009', 'iot_sim_pv009')).toThrow('pv009');
  });
});
