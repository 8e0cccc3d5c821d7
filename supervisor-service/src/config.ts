import path from 'path';

export const SERVICE = 'supervisor-service';

export const HOST: string = process.env.HOST || '0.0.0.0';
export const PORT: number = Number(process.env.PORT || 5000);

// Runtime state: status file, JSON settings and the measurement database
export const DATA_DIR: string = process.env.DATA_DIR || path.resolve(process.cwd(), 'data');
export const STATUS_FILE: string = process.env.STATUS_FILE || path.join(DATA_DIR, 'device_status.json');
export const DEVICE_SETTINGS_FILE: string = process.env.DEVICE_SETTINGS_FILE || path.join(DATA_DIR, 'device_settings.json');
export const MQTT_SETTINGS_FILE: string = process.env.MQTT_SETTINGS_FILE || path.join(DATA_DIR, 'mqtt_settings.json');
export const MEASUREMENTS_DB: string = process.env.MEASUREMENTS_DB || path.join(DATA_DIR, 'iot_devices.db');

// Bounded waits when stopping a worker: SIGTERM first, then SIGKILL
export const STOP_GRACE_MS: number = Number(process.env.STOP_GRACE_MS || 3000);
export const KILL_GRACE_MS: number = Number(process.env.KILL_GRACE_MS || 2000);
