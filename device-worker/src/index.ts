/**
 * Device Worker
 * ---------------------------------------------
 * Purpose
 * - Simulate one energy-metering device in its own OS process.
 *
 * Invocation
 * - Spawned by supervisor-service: `index <deviceId> <deviceType> <intervalSeconds>`.
 * - Settings are read once here; later changes only affect workers started afterwards.
 *
 * Responsibilities
 * - Append a measurement to the SQLite store every interval.
 * - When the uplink is enabled in `mqtt_settings.json`, connect, register once, and forward
 *   each measurement over MQTT.
 *
 * Shutdown
 * - SIGTERM/SIGINT stop the loop at its next sleep and close the uplink at once (abandoning a
 *   pending connect); the database is closed before exit.
 */
import { isDeviceType } from '../../shared/src/device-types.js';
import { errorMessage } from '../../shared/src/errors.js';
import { SqliteMeasurementSink } from '../../shared/src/db.js';
import { clampInterval, uplinkSettingsFile } from '../../shared/src/settings.js';
import { StatusFileRegistrationStore } from '../../shared/src/status-file.js';
import { MEASUREMENTS_DB, MQTT_SETTINGS_FILE, SERVICE, STATUS_FILE } from './config.js';
import { UplinkSession } from './uplink.js';
import { runSamplingLoop, stopOnSignal } from './worker.js';

async function main() {
  const [deviceId, deviceType, intervalArg] = process.argv.slice(2);
  if (!deviceId || !isDeviceType(deviceType)) {
    throw new Error(`usage: index <deviceId> <PV|Heat Pump|Main Grid> [intervalSeconds] (got ${deviceId} ${deviceType})`);
  }
  const intervalSeconds = clampInterval(Number(intervalArg ?? 5));
  const tag = `[${SERVICE}:${deviceId}]`;
  console.log(`${tag} starting (${deviceType}, every ${intervalSeconds}s, pid ${process.pid})`);

  let uplink: UplinkSession | null = null;
  const controller = new AbortController();
  const onSignal = stopOnSignal(controller, () => uplink, tag);
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  const settings = uplinkSettingsFile(MQTT_SETTINGS_FILE, (err) => console.warn(`${tag} ${err.message}, using defaults`)).load();
  const sink = new SqliteMeasurementSink(MEASUREMENTS_DB);

  if (settings.enabled && settings.brokerHost) {
    const deviceName = `${settings.deviceNamePrefix}${deviceId}`;
    const session = new UplinkSession({
      deviceId,
      deviceName,
      settings,
      registrations: new StatusFileRegistrationStore(STATUS_FILE),
      logTag: `${tag} uplink`,
    });
    session.on('connected', () => {
      if (session.registrationState === 'registered') return;
      session.register(deviceType, deviceName).catch((e: unknown) => console.error(`${tag} registration error:`, errorMessage(e)));
    });
    session.on('gaveUp', (attempts) => console.error(`${tag} uplink abandoned after ${attempts} attempts; restart the device to retry`));
    uplink = session;
    const result = await session.connect();
    if (!result.ok) console.warn(`${tag} uplink unavailable (${result.reason}); retrying in the background, sampling continues`);
  }

  try {
    const stored = await runSamplingLoop({ deviceId, deviceType, intervalSeconds, sink, uplink, signal: controller.signal, logTag: tag });
    console.log(`${tag} stopped after ${stored} samples`);
  } finally {
    if (uplink) await uplink.disconnect();
    sink.close();
    console.log(`${tag} shutting down`);
  }
}

main().catch((e) => {
  console.error(`[${SERVICE}] fatal:`, e);
  process.exitCode = 1;
});
