export type DeviceType = 'PV' | 'Heat Pump' | 'Main Grid';

export type DeviceRunStatus = 'active' | 'stopped';

/** Identity and last-known intent of one simulated device. */
export interface DeviceRecord {
  deviceId: string;
  deviceType: DeviceType;
  status: DeviceRunStatus;
  createdAt: string;
}

export interface MeasurementSample {
  deviceId: string;
  timestamp: string;
  voltage: number;
  current: number;
  power: number;
  kwh: number;
}

export interface StoredMeasurement extends MeasurementSample {
  id: number;
  createdAt: string;
}

export interface MeasurementQuery {
  deviceId?: string;
  limit?: number;
  offset?: number;
}

/**
 * Append-only store of samples plus one config row per device.
 * Implemented by `SqliteMeasurementSink`; workers and the supervisor each open their own.
 */
export interface MeasurementSink {
  insertMeasurement(sample: MeasurementSample): void;
  latestMeasurement(deviceId: string): MeasurementSample | null;
  getMeasurements(query?: MeasurementQuery): StoredMeasurement[];
  countMeasurements(deviceId?: string): number;
  countDevices(): number;
  deleteDeviceMeasurements(deviceId: string): number;
  saveDeviceConfig(deviceId: string, deviceType: DeviceType, status: DeviceRunStatus): void;
  deleteDeviceConfig(deviceId: string): void;
  close(): void;
}
