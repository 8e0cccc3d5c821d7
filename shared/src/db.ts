import Database from 'better-sqlite3';
import type {
  DeviceRunStatus,
  DeviceType,
  MeasurementQuery,
  MeasurementSample,
  MeasurementSink,
  StoredMeasurement,
} from './types.js';

export type DB = Database.Database;

interface MeasurementRow {
  id: number;
  device_id: string;
  timestamp: string;
  voltage: number;
  current: number;
  power: number;
  kwh: number;
  created_at: string;
}

/** Open SQLite and ensure the `measurements` and `device_configs` tables exist. */
export function initDb(path: string): DB {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  // every worker process writes to the same file
  db.pragma('busy_timeout = 30000');
  db.exec(`
    CREATE TABLE IF NOT EXISTS measurements (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      device_id TEXT NOT NULL,
      timestamp TEXT NOT NULL,
      voltage REAL NOT NULL,
      current REAL NOT NULL,
      power REAL NOT NULL,
      kwh REAL NOT NULL,
      created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    );
    CREATE INDEX IF NOT EXISTS idx_device_timestamp ON measurements(device_id, timestamp);
    CREATE TABLE IF NOT EXISTS device_configs (
      device_id TEXT PRIMARY KEY,
      device_type TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'stopped',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
  `);
  return db;
}

function toStored(row: MeasurementRow): StoredMeasurement {
  return {
    id: row.id,
    deviceId: row.device_id,
    timestamp: row.timestamp,
    voltage: row.voltage,
    current: row.current,
    power: row.power,
    kwh: row.kwh,
    createdAt: row.created_at,
  };
}

export class SqliteMeasurementSink implements MeasurementSink {
  private readonly db: DB;

  constructor(path: string) {
    this.db = initDb(path);
  }

  insertMeasurement(sample: MeasurementSample): void {
    this.db
      .prepare(
        `INSERT INTO measurements (device_id, timestamp, voltage, current, power, kwh)
         VALUES (@device_id, @timestamp, @voltage, @current, @power, @kwh)`,
      )
      .run({
        device_id: sample.deviceId,
        timestamp: sample.timestamp,
        voltage: sample.voltage,
        current: sample.current,
        power: sample.power,
        kwh: sample.kwh,
      });
  }

  latestMeasurement(deviceId: string): MeasurementSample | null {
    const row = this.db
      .prepare<[string], MeasurementRow>('SELECT * FROM measurements WHERE device_id = ? ORDER BY id DESC LIMIT 1')
      .get(deviceId);
    if (!row) return null;
    const { id: _id, createdAt: _createdAt, ...sample } = toStored(row);
    return sample;
  }

  /** Newest first. */
  getMeasurements({ deviceId, limit = 100, offset = 0 }: MeasurementQuery = {}): StoredMeasurement[] {
    const rows = deviceId
      ? this.db
          .prepare<[string, number, number], MeasurementRow>(
            'SELECT * FROM measurements WHERE device_id = ? ORDER BY timestamp DESC, id DESC LIMIT ? OFFSET ?',
          )
          .all(deviceId, limit, offset)
      : this.db
          .prepare<[number, number], MeasurementRow>(
            'SELECT * FROM measurements ORDER BY timestamp DESC, id DESC LIMIT ? OFFSET ?',
          )
          .all(limit, offset);
    return rows.map(toStored);
  }

  countMeasurements(deviceId?: string): number {
    const row = deviceId
      ? this.db.prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM measurements WHERE device_id = ?').get(deviceId)
      : this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM measurements').get();
    return row?.count ?? 0;
  }

  countDevices(): number {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(DISTINCT device_id) AS count FROM measurements')
      .get();
    return row?.count ?? 0;
  }

  deleteDeviceMeasurements(deviceId: string): number {
    return this.db.prepare('DELETE FROM measurements WHERE device_id = ?').run(deviceId).changes;
  }

  saveDeviceConfig(deviceId: string, deviceType: DeviceType, status: DeviceRunStatus): void {
    const now = new Date().toISOString();
    this.db
      .prepare(
        `INSERT INTO device_configs (device_id, device_type, status, created_at, updated_at)
         VALUES (@device_id, @device_type, @status, @now, @now)
         ON CONFLICT(device_id) DO UPDATE SET device_type=excluded.device_type, status=excluded.status, updated_at=excluded.updated_at`,
      )
      .run({ device_id: deviceId, device_type: deviceType, status, now });
  }

  deleteDeviceConfig(deviceId: string): void {
    this.db.prepare('DELETE FROM device_configs WHERE device_id = ?').run(deviceId);
  }

  getDeviceConfig(deviceId: string): { deviceType: string; status: string } | null {
    const row = this.db
      .prepare<[string], { device_type: string; status: string }>('SELECT device_type, status FROM device_configs WHERE device_id = ?')
      .get(deviceId);
    return row ? { deviceType: row.device_type, status: row.status } : null;
  }

  close(): void {
    this.db.close();
  }
}
