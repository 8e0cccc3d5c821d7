import type { DeviceType, MeasurementSample } from './types.js';
import { UnknownDeviceTypeError } from './errors.js';

type Range = readonly [min: number, max: number];

export interface DeviceTypeSpec {
  type: DeviceType;
  /** Prefix used in device ids and as the counter key in the status file. */
  typeId: string;
  icon: string;
  color: string;
  voltageRange: Range;
  currentRange: Range;
  /** Counter keys older status files used for this type. */
  legacyCounterKeys: readonly string[];
}

export const DEVICE_TYPES = {
  'PV': {
    type: 'PV',
    typeId: 'pv',
    icon: 'fas fa-solar-panel',
    color: 'text-warning',
    voltageRange: [200, 250],
    currentRange: [5, 15],
    legacyCounterKeys: ['PV'],
  },
  'Heat Pump': {
    type: 'Heat Pump',
    typeId: 'heatpump',
    icon: 'fas fa-thermometer-half',
    color: 'text-info',
    voltageRange: [220, 240],
    currentRange: [8, 20],
    legacyCounterKeys: ['Heat Pump'],
  },
  'Main Grid': {
    type: 'Main Grid',
    typeId: 'maingrid',
    icon: 'fas fa-bolt',
    color: 'text-primary',
    voltageRange: [230, 240],
    currentRange: [10, 50],
    legacyCounterKeys: ['Main Grid'],
  },
} as const satisfies Record<DeviceType, DeviceTypeSpec>;

export const DEVICE_TYPE_NAMES: readonly DeviceType[] = ['PV', 'Heat Pump', 'Main Grid'];

export function isDeviceType(value: unknown): value is DeviceType {
  return DEVICE_TYPE_NAMES.some((name) => name === value);
}

export function getDeviceTypeSpec(type: string): DeviceTypeSpec {
  if (!isDeviceType(type)) throw new UnknownDeviceTypeError(type);
  return DEVICE_TYPES[type];
}

export function formatDeviceId(type: DeviceType, counter: number): string {
  return `${DEVICE_TYPES[type].typeId}${String(counter).padStart(3, '0')}`;
}

/**
 * Resolve the device type from an id such as `heatpump012`.
 * The longest matching prefix wins so that overlapping prefixes stay unambiguous.
 */
export function deviceTypeFromId(deviceId: string): DeviceType | null {
  let match: DeviceTypeSpec | null = null;
  for (const name of DEVICE_TYPE_NAMES) {
    const spec = DEVICE_TYPES[name];
    if (!deviceId.startsWith(spec.typeId)) continue;
    if (!/^\d+$/.test(deviceId.slice(spec.typeId.length))) continue;
    if (!match || spec.typeId.length > match.typeId.length) match = spec;
  }
  return match ? match.type : null;
}

function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

function uniform([min, max]: Range, random: () => number): number {
  return min + (max - min) * random();
}

export interface SampleOptions {
  previous: MeasurementSample | null;
  /** `previous` was read back from the store rather than produced earlier in this run. */
  resumed?: boolean;
  intervalSeconds: number;
  now?: Date;
  random?: () => number;
}

/**
 * Produce the next sample for a device.
 *
 * Energy integrates the new power over the real time since the previous sample. A resumed
 * previous sample counts at most one interval, so time a device spent stopped adds nothing.
 * Without a previous sample the accumulation starts from 0 over one interval.
 */
export function generateSample(type: DeviceType, deviceId: string, opts: SampleOptions): MeasurementSample {
  const spec = DEVICE_TYPES[type];
  const random = opts.random ?? Math.random;
  const now = opts.now ?? new Date();

  const voltage = round(uniform(spec.voltageRange, random), 2);
  const current = round(uniform(spec.currentRange, random), 2);
  const power = round(voltage * current, 2);

  let elapsedSeconds = opts.intervalSeconds;
  let previousKwh = 0;
  if (opts.previous) {
    previousKwh = opts.previous.kwh;
    const since = (now.getTime() - Date.parse(opts.previous.timestamp)) / 1000;
    if (Number.isFinite(since)) {
      elapsedSeconds = Math.max(since, 0);
      if (opts.resumed) elapsedSeconds = Math.min(elapsedSeconds, opts.intervalSeconds);
    }
  }

  const kwh = round(previousKwh + (power / 1000) * (elapsedSeconds / 3600), 6);
  return { deviceId, timestamp: now.toISOString(), voltage, current, power, kwh };
}
