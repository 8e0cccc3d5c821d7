import {
  DEVICE_TYPE_NAMES,
  DEVICE_TYPES,
  deviceTypeFromId,
  formatDeviceId,
  getDeviceTypeSpec,
  isDeviceType,
} from '../../shared/src/device-types.js';
import { errorMessage } from '../../shared/src/errors.js';
import { clampInterval } from '../../shared/src/settings.js';
import {
  readStatusFile,
  writeStatusFile,
  type StatusFileData,
  type StatusFileDevice,
} from '../../shared/src/status-file.js';
import type { DeviceRecord, DeviceRunStatus, DeviceType, MeasurementSink } from '../../shared/src/types.js';
import type { WorkerHandle, WorkerLauncher } from './launcher.js';

export interface DeviceStatusView {
  deviceId: string;
  deviceType: DeviceType | null;
  status: DeviceRunStatus;
  createdAt: string | null;
  pid: number | null;
  uplinkRegistered: boolean;
  uplinkDeviceName: string | null;
}

export interface SupervisorOptions {
  statusFile: string;
  sink: MeasurementSink;
  launcher: WorkerLauncher;
  /** Read on every start so interval changes reach the next started worker. */
  intervalSeconds: () => number;
  stopGraceMs?: number;
  killGraceMs?: number;
  logTag?: string;
}

/**
 * Fold legacy counter keys (`PV`, `Heat Pump`, `Main Grid`) into the type-id keys, keeping the
 * larger value so no id is ever reissued. Keys of unknown types pass through.
 */
export function migrateCounters(raw: Record<string, number>): Record<string, number> {
  const out: Record<string, number> = {};
  const consumed = new Set<string>();
  for (const name of DEVICE_TYPE_NAMES) {
    const spec = DEVICE_TYPES[name];
    const keys = [spec.typeId, ...spec.legacyCounterKeys];
    keys.forEach((k) => consumed.add(k));
    const value = Math.max(0, ...keys.map((k) => raw[k] ?? 0));
    if (value > 0) out[spec.typeId] = value;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (!consumed.has(key)) out[key] = value;
  }
  return out;
}

type RegistrationFields = Pick<StatusFileDevice, 'cumulocity_registered' | 'cumulocity_device_name' | 'cumulocity_registered_at'>;

function registrationFields(entry: StatusFileDevice | undefined): RegistrationFields {
  if (!entry) return {};
  const out: RegistrationFields = {};
  if (entry.cumulocity_registered !== undefined) out.cumulocity_registered = entry.cumulocity_registered;
  if (entry.cumulocity_device_name !== undefined) out.cumulocity_device_name = entry.cumulocity_device_name;
  if (entry.cumulocity_registered_at !== undefined) out.cumulocity_registered_at = entry.cumulocity_registered_at;
  return out;
}

/**
 * Owns the device registry and one worker process per running device.
 *
 * State lives in three places: `records` (identity and last intent, mirrored to the status
 * file), `handles` (live or not-yet-reaped worker processes, never persisted) and `counters`.
 * A worker that crashes keeps its handle until the next start, stop or delete; liveness is
 * always asked of the handle, never of the persisted status.
 */
export class DeviceSupervisor {
  private readonly records = new Map<string, DeviceRecord>();
  private readonly handles = new Map<string, WorkerHandle>();
  private readonly stopping = new Set<string>();
  private counters: Record<string, number> = {};
  private readonly tag: string;
  private readonly stopGraceMs: number;
  private readonly killGraceMs: number;

  constructor(private readonly o: SupervisorOptions) {
    this.tag = o.logTag ?? '[supervisor-service]';
    this.stopGraceMs = o.stopGraceMs ?? 3000;
    this.killGraceMs = o.killGraceMs ?? 2000;
  }

  /**
   * Load the status file left by a previous run. No worker survives a supervisor restart, so
   * every device comes back stopped; the file is rewritten to say so.
   */
  reconcileOnStartup(): void {
    let data: StatusFileData = { counters: {}, devices: {} };
    try {
      data = readStatusFile(this.o.statusFile);
    } catch (e) {
      console.error(`${this.tag} cannot read status file, starting empty:`, errorMessage(e));
    }

    this.counters = migrateCounters(data.counters);
    this.records.clear();
    let reconciled = 0;
    for (const [deviceId, entry] of Object.entries(data.devices)) {
      const deviceType = isDeviceType(entry.device_type) ? entry.device_type : deviceTypeFromId(deviceId);
      if (!deviceType) {
        console.warn(`${this.tag} skipping ${deviceId}: unknown device type ${entry.device_type}`);
        continue;
      }
      if (entry.status === 'active') reconciled++;
      this.records.set(deviceId, { deviceId, deviceType, status: 'stopped', createdAt: entry.created_at });
      this.bumpCounter(deviceType, deviceId);
    }
    this.persist();
    console.log(`${this.tag} loaded ${this.records.size} devices (${reconciled} marked stopped after restart)`);
  }

  /** Allocate the next id for `deviceType` and record the device as stopped. */
  addDevice(deviceType: string): string {
    const spec = getDeviceTypeSpec(deviceType);
    let counter = this.counters[spec.typeId] ?? 0;
    let deviceId: string;
    do {
      counter++;
      deviceId = formatDeviceId(spec.type, counter);
    } while (this.records.has(deviceId));
    this.counters[spec.typeId] = counter;

    const record: DeviceRecord = { deviceId, deviceType: spec.type, status: 'stopped', createdAt: new Date().toISOString() };
    this.records.set(deviceId, record);
    this.saveConfig(record);
    this.persist();
    console.log(`${this.tag} added ${spec.type} device ${deviceId}`);
    return deviceId;
  }

  /**
   * `false` when the device is already running, its id has no known type prefix, or its
   * process could not be created. An id without a record but with a valid prefix is adopted.
   */
  startDevice(deviceId: string): boolean {
    if (this.isRunning(deviceId)) {
      console.warn(`${this.tag} device ${deviceId} is already running`);
      return false;
    }
    const deviceType = this.records.get(deviceId)?.deviceType ?? deviceTypeFromId(deviceId);
    if (!deviceType) {
      console.warn(`${this.tag} cannot start ${deviceId}: unknown device type prefix`);
      return false;
    }

    const intervalSeconds = clampInterval(this.o.intervalSeconds());
    let handle: WorkerHandle;
    try {
      handle = this.o.launcher.launch({ deviceId, deviceType, intervalSeconds });
    } catch (e) {
      console.error(`${this.tag} failed to start ${deviceId}:`, errorMessage(e));
      return false;
    }

    let record = this.records.get(deviceId);
    if (!record) {
      record = { deviceId, deviceType, status: 'stopped', createdAt: new Date().toISOString() };
      this.records.set(deviceId, record);
      this.bumpCounter(deviceType, deviceId);
    }

    this.handles.set(deviceId, handle);
    handle.onExit((code, signal) => {
      if (this.stopping.has(deviceId) || this.handles.get(deviceId) !== handle) return;
      console.warn(`${this.tag} worker for ${deviceId} exited (code=${code}, signal=${signal})`);
    });
    record.status = 'active';
    this.saveConfig(record);
    this.persist();
    console.log(`${this.tag} started ${deviceId} (pid ${handle.pid}, every ${intervalSeconds}s)`);
    return true;
  }

  /**
   * SIGTERM, wait, then SIGKILL, wait. The handle is dropped and the device recorded as stopped
   * whatever happens; returns `false` only when there was no handle to stop.
   */
  async stopDevice(deviceId: string): Promise<boolean> {
    const record = this.records.get(deviceId);
    const handle = this.handles.get(deviceId);
    if (!handle) {
      console.warn(`${this.tag} device ${deviceId} is not running`);
      if (record && record.status !== 'stopped') {
        record.status = 'stopped';
        this.saveConfig(record);
        this.persist();
      }
      return false;
    }

    this.stopping.add(deviceId);
    try {
      if (handle.isAlive()) {
        console.log(`${this.tag} stopping ${deviceId} (pid ${handle.pid})`);
        handle.kill('SIGTERM');
        let exited = await handle.waitForExit(this.stopGraceMs);
        if (!exited) {
          console.warn(`${this.tag} ${deviceId} ignored SIGTERM, sending SIGKILL`);
          handle.kill('SIGKILL');
          exited = await handle.waitForExit(this.killGraceMs);
        }
        if (!exited) console.error(`${this.tag} ${deviceId} (pid ${handle.pid}) did not exit after SIGKILL`);
      } else {
        console.log(`${this.tag} worker for ${deviceId} had already exited`);
      }
    } catch (e) {
      console.error(`${this.tag} error stopping ${deviceId}:`, errorMessage(e));
    } finally {
      this.stopping.delete(deviceId);
      this.handles.delete(deviceId);
      if (record) {
        record.status = 'stopped';
        this.saveConfig(record);
      }
      this.persist();
    }
    return true;
  }

  /**
   * Stop if needed, forget the device and purge its measurements. Unknown ids are a no-op
   * success. The counter is not rewound.
   */
  async deleteDevice(deviceId: string): Promise<boolean> {
    if (this.handles.has(deviceId)) await this.stopDevice(deviceId);
    const known = this.records.delete(deviceId);
    try {
      const removed = this.o.sink.deleteDeviceMeasurements(deviceId);
      this.o.sink.deleteDeviceConfig(deviceId);
      if (removed > 0) console.log(`${this.tag} removed ${removed} measurements of ${deviceId}`);
    } catch (e) {
      console.error(`${this.tag} failed to purge data of ${deviceId}:`, errorMessage(e));
    }
    this.persist();
    if (known) console.log(`${this.tag} deleted ${deviceId}`);
    return true;
  }

  isRunning(deviceId: string): boolean {
    return this.handles.get(deviceId)?.isAlive() ?? false;
  }

  /** `null` for ids that are neither registered nor running. */
  getStatus(deviceId: string): DeviceStatusView | null {
    if (!this.records.has(deviceId) && !this.handles.has(deviceId)) return null;
    return this.view(deviceId, this.readDisk().devices[deviceId]);
  }

  /** Every known device, sorted by id, including entries only present in the status file. */
  listAll(): DeviceStatusView[] {
    const disk = this.readDisk();
    const ids = new Set([...this.records.keys(), ...this.handles.keys(), ...Object.keys(disk.devices)]);
    return [...ids].sort().map((id) => this.view(id, disk.devices[id]));
  }

  counter(deviceType: DeviceType): number {
    return this.counters[DEVICE_TYPES[deviceType].typeId] ?? 0;
  }

  /** Stop every worker; used on shutdown. */
  async cleanup(): Promise<void> {
    const ids = [...this.handles.keys()];
    if (ids.length === 0) return;
    console.log(`${this.tag} stopping ${ids.length} workers...`);
    await Promise.allSettled(ids.map((id) => this.stopDevice(id)));
  }

  private view(deviceId: string, entry: StatusFileDevice | undefined): DeviceStatusView {
    const record = this.records.get(deviceId);
    const handle = this.handles.get(deviceId);
    const alive = handle?.isAlive() ?? false;
    const fromDisk = entry && isDeviceType(entry.device_type) ? entry.device_type : null;
    return {
      deviceId,
      deviceType: record?.deviceType ?? fromDisk ?? deviceTypeFromId(deviceId),
      status: handle ? (alive ? 'active' : 'stopped') : (record?.status ?? entry?.status ?? 'stopped'),
      createdAt: record?.createdAt ?? entry?.created_at ?? null,
      pid: alive ? (handle?.pid ?? null) : null,
      uplinkRegistered: entry?.cumulocity_registered ?? false,
      uplinkDeviceName: entry?.cumulocity_device_name ?? null,
    };
  }

  private readDisk(): StatusFileData {
    try {
      return readStatusFile(this.o.statusFile);
    } catch (e) {
      console.warn(`${this.tag} cannot read status file:`, errorMessage(e));
      return { counters: {}, devices: {} };
    }
  }

  private bumpCounter(deviceType: DeviceType, deviceId: string): void {
    const typeId = DEVICE_TYPES[deviceType].typeId;
    const n = Number(deviceId.slice(typeId.length));
    if (deviceId.startsWith(typeId) && Number.isInteger(n) && n > (this.counters[typeId] ?? 0)) {
      this.counters[typeId] = n;
    }
  }

  private saveConfig(record: DeviceRecord): void {
    try {
      this.o.sink.saveDeviceConfig(record.deviceId, record.deviceType, record.status);
    } catch (e) {
      console.warn(`${this.tag} failed to save config row for ${record.deviceId}:`, errorMessage(e));
    }
  }

  /**
   * Rewrite the status file from memory, keeping the registration fields workers wrote for
   * devices that still exist. Failures are logged; the in-memory state stays authoritative.
   */
  private persist(): boolean {
    try {
      const onDisk = this.readDisk();
      const devices: Record<string, StatusFileDevice> = {};
      for (const id of [...this.records.keys()].sort()) {
        const record = this.records.get(id);
        if (!record) continue;
        devices[id] = {
          device_type: record.deviceType,
          status: record.status,
          created_at: record.createdAt,
          ...registrationFields(onDisk.devices[id]),
        };
      }
      writeStatusFile(this.o.statusFile, { counters: { ...this.counters }, devices });
      return true;
    } catch (e) {
      console.error(`${this.tag} failed to write status file:`, errorMessage(e));
      return false;
    }
  }
}
