import { spawn, type ChildProcess } from 'child_process';
import path from 'path';
import { fileURLToPath } from 'url';
import type { DeviceType } from '../../shared/src/types.js';
import { SERVICE } from './config.js';

export interface WorkerSpec {
  deviceId: string;
  deviceType: DeviceType;
  intervalSeconds: number;
}

export type ExitListener = (code: number | null, signal: NodeJS.Signals | null) => void;

/** Ownership of one worker process. Never persisted. */
export interface WorkerHandle {
  readonly pid: number | undefined;
  isAlive(): boolean;
  kill(signal: NodeJS.Signals): boolean;
  /** Resolves `true` once the process has exited, `false` if it is still running after `timeoutMs`. */
  waitForExit(timeoutMs: number): Promise<boolean>;
  onExit(listener: ExitListener): void;
}

export interface WorkerLauncher {
  /** Throws when the process cannot be created. */
  launch(spec: WorkerSpec): WorkerHandle;
}

export class ChildProcessWorkerHandle implements WorkerHandle {
  private exited = false;

  constructor(private readonly child: ChildProcess) {
    child.once('exit', () => { this.exited = true; });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isAlive(): boolean {
    return !this.exited && this.child.exitCode === null && this.child.signalCode === null;
  }

  kill(signal: NodeJS.Signals): boolean {
    return this.child.kill(signal);
  }

  waitForExit(timeoutMs: number): Promise<boolean> {
    if (!this.isAlive()) return Promise.resolve(true);
    return new Promise((resolve) => {
      const onExit = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.child.off('exit', onExit);
        resolve(!this.isAlive());
      }, timeoutMs);
      this.child.once('exit', onExit);
    });
  }

  onExit(listener: ExitListener): void {
    this.child.once('exit', listener);
  }
}

/**
 * Path of the worker entrypoint next to this file's tree, with the same extension: `.ts`
 * when running under tsx, `.js` from `dist/`.
 */
export function defaultWorkerScript(): string {
  const here = fileURLToPath(import.meta.url);
  return path.resolve(path.dirname(here), '../../device-worker/src', `index${path.extname(here)}`);
}

export interface ChildProcessLauncherOptions {
  script?: string;
  env?: NodeJS.ProcessEnv;
  /** Node flags for the child; defaults to the supervisor's own so a tsx loader carries over. */
  execArgv?: string[];
}

/** Runs each worker as `node <script> <deviceId> <deviceType> <interval>`, sharing our stdout/stderr. */
export class ChildProcessLauncher implements WorkerLauncher {
  private readonly script: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly execArgv: string[];

  constructor(o: ChildProcessLauncherOptions = {}) {
    this.script = o.script ?? defaultWorkerScript();
    this.env = o.env ?? process.env;
    this.execArgv = o.execArgv ?? process.execArgv;
  }

  launch(spec: WorkerSpec): WorkerHandle {
    const child = spawn(
      process.execPath,
      [...this.execArgv, this.script, spec.deviceId, spec.deviceType, String(spec.intervalSeconds)],
      { env: this.env, stdio: ['ignore', 'inherit', 'inherit'] },
    );
    child.on('error', (err) => console.error(`[${SERVICE}] worker ${spec.deviceId} process error:`, err.message));
    if (child.pid === undefined) {
      throw new Error(`failed to spawn worker for ${spec.deviceId}`);
    }
    return new ChildProcessWorkerHandle(child);
  }
}
