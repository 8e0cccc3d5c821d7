import path from 'path';

export const SERVICE = 'device-worker';

// Paths mirror supervisor-service/src/config.ts; the supervisor passes its resolved values through the environment.
export const DATA_DIR: string = process.env.DATA_DIR || path.resolve(process.cwd(), 'data');
export const STATUS_FILE: string = process.env.STATUS_FILE || path.join(DATA_DIR, 'device_status.json');
export const MQTT_SETTINGS_FILE: string = process.env.MQTT_SETTINGS_FILE || path.join(DATA_DIR, 'mqtt_settings.json');
export const MEASUREMENTS_DB: string = process.env.MEASUREMENTS_DB || path.join(DATA_DIR, 'iot_devices.db');
