import { generateSample } from '../../shared/src/device-types.js';
import { errorMessage } from '../../shared/src/errors.js';
import type { DeviceType, MeasurementSample, MeasurementSink } from '../../shared/src/types.js';
import type { UplinkSession } from './uplink.js';

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

/** Termination handler: ends the loop at its next sleep and closes the uplink at once, abandoning a pending connect. */
export function stopOnSignal(controller: AbortController, uplink: () => UplinkSession | null, tag: string) {
  return (signal: NodeJS.Signals): void => {
    console.log(`${tag} received ${signal}, stopping...`);
    controller.abort();
    uplink()?.disconnect().catch((e: unknown) => console.error(`${tag} uplink close failed:`, errorMessage(e)));
  };
}

export interface SamplingLoopOptions {
  deviceId: string;
  deviceType: DeviceType;
  intervalSeconds: number;
  sink: MeasurementSink;
  uplink?: UplinkSession | null;
  /** Aborted by the termination signal handler; checked between iterations. */
  signal: AbortSignal;
  logTag?: string;
  now?: () => Date;
  random?: () => number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/**
 * Generate → persist → forward → sleep until `signal` aborts.
 * Each iteration completes before the next starts, so the cumulative energy of a sample is
 * always computed against the one persisted just before it. Returns the number of samples stored.
 */
export async function runSamplingLoop(o: SamplingLoopOptions): Promise<number> {
  const tag = o.logTag ?? `[device-worker:${o.deviceId}]`;
  const wait = o.sleep ?? sleep;
  const now = o.now ?? (() => new Date());
  const uplink = o.uplink ?? null;

  let previous: MeasurementSample | null = null;
  try {
    previous = o.sink.latestMeasurement(o.deviceId);
  } catch (e) {
    console.warn(`${tag} cannot read previous sample, starting energy at 0:`, errorMessage(e));
  }

  // only the first sample after a restart is capped to one interval
  let resumed = previous !== null;
  let stored = 0;
  while (!o.signal.aborted) {
    const sample = generateSample(o.deviceType, o.deviceId, {
      previous,
      resumed,
      intervalSeconds: o.intervalSeconds,
      now: now(),
      random: o.random,
    });

    try {
      o.sink.insertMeasurement(sample);
      previous = sample;
      resumed = false;
      stored++;
      console.log(`${tag} V=${sample.voltage} I=${sample.current} P=${sample.power} kWh=${sample.kwh}`);
    } catch (e) {
      console.error(`${tag} failed to store measurement:`, errorMessage(e));
      if (uplink?.isConnected) {
        await uplink.sendAlarm('c8y_PersistenceFailure', `Measurement storage failed on ${o.deviceId}`, 'MAJOR');
      }
    }

    // Disconnected sessions still get the sample: sendMeasurement tries one inline reconnect
    // unless a backoff loop is running or auto-reconnect was switched off.
    if (uplink && (uplink.isConnected || uplink.autoReconnectEnabled)) {
      const sent = await uplink.sendMeasurement(sample);
      if (!sent) console.warn(`${tag} measurement not forwarded`);
    }

    await wait(o.intervalSeconds * 1000, o.signal);
  }
  return stored;
}
