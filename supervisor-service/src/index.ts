/**
 * Supervisor Service
 * ---------------------------------------------
 * Purpose
 * - Own the set of simulated devices and run one device-worker process per running device.
 *
 * Responsibilities
 * - Allocate device ids and keep `device_status.json` in step with the registry.
 * - Start and stop workers (SIGTERM, then SIGKILL after a grace period).
 * - Serve the JSON control API: devices, measurements, stats and settings.
 *
 * Startup
 * - Devices recorded as active by a previous run are marked stopped; nothing is auto-started.
 */
import { mkdirSync } from 'fs';
import { errorMessage } from '../../shared/src/errors.js';
import { SqliteMeasurementSink } from '../../shared/src/db.js';
import { deviceSettingsFile, uplinkSettingsFile } from '../../shared/src/settings.js';
import {
  DATA_DIR,
  DEVICE_SETTINGS_FILE,
  HOST,
  KILL_GRACE_MS,
  MEASUREMENTS_DB,
  MQTT_SETTINGS_FILE,
  PORT,
  SERVICE,
  STATUS_FILE,
  STOP_GRACE_MS,
} from './config.js';
import { createApp } from './http.js';
import { ChildProcessLauncher } from './launcher.js';
import { registerShutdown } from './shutdown.js';
import { DeviceSupervisor } from './supervisor.js';

async function main() {
  mkdirSync(DATA_DIR, { recursive: true });
  const onSettingsError = (err: Error) => console.warn(`[${SERVICE}] ${err.message}, using defaults`);
  const deviceSettings = deviceSettingsFile(DEVICE_SETTINGS_FILE, onSettingsError);
  const uplinkSettings = uplinkSettingsFile(MQTT_SETTINGS_FILE, onSettingsError);
  const sink = new SqliteMeasurementSink(MEASUREMENTS_DB);

  // workers resolve the same files through their own config
  const launcher = new ChildProcessLauncher({
    env: { ...process.env, DATA_DIR, STATUS_FILE, MEASUREMENTS_DB, MQTT_SETTINGS_FILE },
  });
  const supervisor = new DeviceSupervisor({
    statusFile: STATUS_FILE,
    sink,
    launcher,
    intervalSeconds: () => deviceSettings.load().measurementInterval,
    stopGraceMs: STOP_GRACE_MS,
    killGraceMs: KILL_GRACE_MS,
    logTag: `[${SERVICE}]`,
  });
  supervisor.reconcileOnStartup();

  const app = createApp({ supervisor, sink, deviceSettings, uplinkSettings });
  const server = app.listen(PORT, HOST, () => {
    console.log(`[${SERVICE}] listening on ${HOST}:${PORT}, data in ${DATA_DIR}`);
  });
  server.on('error', (e) => console.error(`[${SERVICE}] http server error:`, errorMessage(e)));
  registerShutdown(supervisor, server, sink);
}

main().catch((e) => {
  console.error(`[${SERVICE}] fatal:`, e);
  process.exitCode = 1;
});
