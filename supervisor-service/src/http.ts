import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import morgan from 'morgan';
import { DEVICE_TYPE_NAMES, DEVICE_TYPES } from '../../shared/src/device-types.js';
import { UnknownDeviceTypeError, errorMessage } from '../../shared/src/errors.js';
import {
  serializeDeviceSettings,
  serializeUplinkSettings,
  type DeviceSettings,
  type SettingsFile,
  type UplinkSettings,
} from '../../shared/src/settings.js';
import type { MeasurementSink, StoredMeasurement } from '../../shared/src/types.js';
import { SERVICE } from './config.js';
import type { DeviceStatusView, DeviceSupervisor } from './supervisor.js';

export interface ControlApiDeps {
  supervisor: DeviceSupervisor;
  sink: MeasurementSink;
  deviceSettings: SettingsFile<DeviceSettings>;
  uplinkSettings: SettingsFile<UplinkSettings>;
  /** morgan format; `false` turns request logging off. */
  requestLog?: string | false;
}

const MAX_PAGE = 1000;

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function queryInt(v: unknown, fallback: number, min: number, max: number): number {
  const n = typeof v === 'string' ? Number.parseInt(v, 10) : NaN;
  if (!Number.isFinite(n)) return fallback;
  return Math.min(max, Math.max(min, n));
}

function deviceJson(d: DeviceStatusView) {
  return {
    device_id: d.deviceId,
    device_type: d.deviceType,
    status: d.status,
    created_at: d.createdAt,
    pid: d.pid,
    cumulocity_registered: d.uplinkRegistered,
    cumulocity_device_name: d.uplinkDeviceName,
  };
}

function measurementJson(m: StoredMeasurement) {
  return {
    id: m.id,
    device_id: m.deviceId,
    timestamp: m.timestamp,
    voltage: m.voltage,
    current: m.current,
    power: m.power,
    kwh: m.kwh,
    created_at: m.createdAt,
  };
}

/** The password is write-only: reads only say whether one is set. */
function uplinkJson(s: UplinkSettings) {
  const { password: _password, ...rest } = serializeUplinkSettings(s);
  return { ...rest, has_password: s.password.length > 0 };
}

/** JSON control API over the supervisor, measurement store and settings files. */
export function createApp(deps: ControlApiDeps): Express {
  const { supervisor, sink, deviceSettings, uplinkSettings } = deps;
  const app = express();
  app.set('etag', false);
  if (deps.requestLog !== false) app.use(morgan(deps.requestLog ?? 'combined'));
  app.use(express.json({ limit: '100kb' }));

  app.get('/healthz', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.get('/api/device-types', (_req: Request, res: Response) => {
    res.json(DEVICE_TYPE_NAMES.map((name) => {
      const t = DEVICE_TYPES[name];
      return { device_type: t.type, type_id: t.typeId, icon: t.icon, color: t.color };
    }));
  });

  app.get('/api/devices', (_req: Request, res: Response) => {
    res.json(supervisor.listAll().map(deviceJson));
  });

  app.post('/api/devices', (req: Request, res: Response) => {
    const body: unknown = req.body;
    const deviceType = isObject(body) ? body.device_type : undefined;
    if (typeof deviceType !== 'string' || !deviceType) {
      res.status(400).json({ success: false, error: 'device_type is required' });
      return;
    }
    try {
      const deviceId = supervisor.addDevice(deviceType);
      res.status(201).json({ success: true, device_id: deviceId });
    } catch (e) {
      if (e instanceof UnknownDeviceTypeError) {
        res.status(400).json({ success: false, error: e.message });
        return;
      }
      throw e;
    }
  });

  app.get('/api/devices/:id', (req: Request, res: Response) => {
    const status = supervisor.getStatus(req.params.id);
    if (!status) { res.status(404).json({ error: `unknown device ${req.params.id}` }); return; }
    res.json(deviceJson(status));
  });

  app.post('/api/devices/:id/start', (req: Request, res: Response) => {
    const id = req.params.id;
    if (supervisor.startDevice(id)) { res.json({ success: true }); return; }
    res.status(409).json({ success: false, error: `device ${id} is already running or failed to start` });
  });

  app.post('/api/devices/:id/stop', async (req: Request, res: Response, next: NextFunction) => {
    const id = req.params.id;
    try {
      if (!supervisor.getStatus(id)) { res.status(404).json({ success: false, error: `unknown device ${id}` }); return; }
      if (await supervisor.stopDevice(id)) { res.json({ success: true }); return; }
      res.status(409).json({ success: false, error: `device ${id} is not running` });
    } catch (e) {
      next(e);
    }
  });

  app.delete('/api/devices/:id', async (req: Request, res: Response, next: NextFunction) => {
    const id = req.params.id;
    try {
      res.json({ success: await supervisor.deleteDevice(id) });
    } catch (e) {
      next(e);
    }
  });

  app.get('/api/measurements', (req: Request, res: Response) => {
    const deviceId = typeof req.query.device_id === 'string' && req.query.device_id ? req.query.device_id : undefined;
    const limit = queryInt(req.query.limit, 100, 1, MAX_PAGE);
    const offset = queryInt(req.query.offset, 0, 0, Number.MAX_SAFE_INTEGER);
    const rows = sink.getMeasurements({ deviceId, limit, offset });
    res.json({
      total: sink.countMeasurements(deviceId),
      limit,
      offset,
      measurements: rows.map(measurementJson),
    });
  });

  app.get('/api/stats', (_req: Request, res: Response) => {
    const devices = supervisor.listAll();
    res.json({
      devices: devices.length,
      active_devices: devices.filter((d) => d.status === 'active').length,
      devices_with_measurements: sink.countDevices(),
      measurements: sink.countMeasurements(),
    });
  });

  app.get('/api/settings/device', (_req: Request, res: Response) => {
    res.json(serializeDeviceSettings(deviceSettings.load()));
  });

  app.put('/api/settings/device', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isObject(body)) { res.status(400).json({ success: false, error: 'expected a JSON object' }); return; }
    const next = deviceSettings.update(body);
    console.log(`[${SERVICE}] device settings updated (interval ${next.measurementInterval}s)`);
    res.json(serializeDeviceSettings(next));
  });

  app.get('/api/settings/uplink', (_req: Request, res: Response) => {
    res.json(uplinkJson(uplinkSettings.load()));
  });

  app.put('/api/settings/uplink', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isObject(body)) { res.status(400).json({ success: false, error: 'expected a JSON object' }); return; }
    // an empty password field means "keep the stored one"
    const patch = { ...body };
    if (patch.password === '' || patch.password === undefined) delete patch.password;
    const next = uplinkSettings.update(patch);
    console.log(`[${SERVICE}] uplink settings updated (enabled=${next.enabled}, host=${next.brokerHost || '-'})`);
    res.json(uplinkJson(next));
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'not found' });
  });

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error(`[${SERVICE}] request failed:`, errorMessage(err));
    res.status(500).json({ success: false, error: errorMessage(err) });
  });

  return app;
}
