import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SettingsFileError } from './errors.js';
import {
  DEFAULT_DEVICE_SETTINGS,
  DEFAULT_UPLINK_SETTINGS,
  clampInterval,
  deviceSettingsFile,
  effectiveBrokerPort,
  parseUplinkSettings,
  uplinkSettingsFile,
} from './settings.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(path.join(tmpdir(), 'settings-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('clampInterval', () => {
  it('keeps the interval within 1..300 seconds', () => {
    expect(clampInterval(0)).toBe(1);
    expect(clampInterval(500)).toBe(300);
    expect(clampInterval(2.4)).toBe(2);
    expect(clampInterval(Number.NaN)).toBe(5);
  });
});

describe('effectiveBrokerPort', () => {
  it('switches the default port to 8883 under TLS', () => {
    expect(effectiveBrokerPort({ ...DEFAULT_UPLINK_SETTINGS, useSsl: true })).toBe(8883);
    expect(effectiveBrokerPort({ ...DEFAULT_UPLINK_SETTINGS, useSsl: true, brokerPort: 9883 })).toBe(9883);
    expect(effectiveBrokerPort({ ...DEFAULT_UPLINK_SETTINGS })).toBe(1883);
  });
});

describe('parseUplinkSettings', () => {
  it('accepts the legacy prefix key and numeric strings', () => {
    const s = parseUplinkSettings({ device_prefix: 'sim_', broker_port: '8883', enabled: 'yes' });
    expect(s.deviceNamePrefix).toBe('sim_');
    expect(s.brokerPort).toBe(8883);
    expect(s.enabled).toBe(false);
  });
});

describe('SettingsFile', () => {
  it('returns defaults when the file is absent', () => {
    const file = deviceSettingsFile(path.join(dir, 'device_settings.json'));
    expect(file.load()).toEqual(DEFAULT_DEVICE_SETTINGS);
  });

  it('reports an unreadable file and falls back to defaults', () => {
    const p = path.join(dir, 'mqtt_settings.json');
    writeFileSync(p, 'nope');
    const onError = vi.fn();
    expect(uplinkSettingsFile(p, onError).load()).toEqual(DEFAULT_UPLINK_SETTINGS);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBeInstanceOf(SettingsFileError);
  });

  it('merges a snake_case patch and clamps the interval', () => {
    const p = path.join(dir, 'device_settings.json');
    const file = deviceSettingsFile(p);
    const next = file.update({ measurement_interval: 1000, unknown_key: true });
    expect(next).toEqual({ measurementInterval: 300, autoSaveInterval: 30 });
    expect(JSON.parse(readFileSync(p, 'utf8'))).toEqual({ measurement_interval: 300, auto_save_interval: 30 });
  });

  it('keeps fields the patch does not mention', () => {
    const file = uplinkSettingsFile(path.join(dir, 'mqtt_settings.json'));
    file.update({ broker_host: 'broker.test', password: 'test-secret' });
    const next = file.update({ enabled: true });
    expect(next.brokerHost).toBe('broker.test');
    expect(next.password).toBe('test-secret');
    expect(next.enabled).toBe(true);
  });
});
