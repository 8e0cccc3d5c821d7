import type { Server } from 'http';
import { errorMessage } from '../../shared/src/errors.js';
import type { MeasurementSink } from '../../shared/src/types.js';
import { SERVICE } from './config.js';
import type { DeviceSupervisor } from './supervisor.js';

/** Stop every worker, then close the HTTP server and the database. A second signal exits at once. */
export function registerShutdown(supervisor: DeviceSupervisor, server: Server, sink: MeasurementSink) {
  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      console.warn(`[${SERVICE}] ${signal} again, exiting now`);
      process.exit(1);
    }
    shuttingDown = true;
    console.log(`[${SERVICE}] ${signal} received, shutting down...`);
    supervisor
      .cleanup()
      .catch((e: unknown) => console.error(`[${SERVICE}] cleanup failed:`, errorMessage(e)))
      .finally(() => {
        server.close();
        try { sink.close(); } catch (e) { console.warn(`[${SERVICE}] closing database:`, errorMessage(e)); }
        process.exit(0);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
