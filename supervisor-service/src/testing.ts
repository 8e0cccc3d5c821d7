import type { ExitListener, WorkerHandle, WorkerLauncher, WorkerSpec } from './launcher.js';

/** How a stand-in worker reacts to signals. */
export type FakeWorkerBehavior = 'exits' | 'ignores-term' | 'unkillable';

/** A worker process stand-in: exits on SIGTERM unless told to ignore it, on SIGKILL unless unkillable. */
export class FakeWorkerHandle implements WorkerHandle {
  alive = true;
  readonly signals: NodeJS.Signals[] = [];
  /** Timeouts passed to `waitForExit`, in call order. */
  readonly waits: number[] = [];
  private readonly listeners: ExitListener[] = [];

  constructor(readonly pid: number, private readonly behavior: FakeWorkerBehavior = 'exits') {}

  isAlive(): boolean {
    return this.alive;
  }

  kill(signal: NodeJS.Signals): boolean {
    this.signals.push(signal);
    if (this.behavior === 'unkillable') return true;
    if (signal === 'SIGKILL' || this.behavior === 'exits') this.exit(null, signal);
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null): void {
    if (!this.alive) return;
    this.alive = false;
    for (const l of this.listeners) l(code, signal);
  }

  waitForExit(timeoutMs: number): Promise<boolean> {
    this.waits.push(timeoutMs);
    return Promise.resolve(!this.alive);
  }

  onExit(listener: ExitListener): void {
    this.listeners.push(listener);
  }
}

export class FakeLauncher implements WorkerLauncher {
  readonly launched: WorkerSpec[] = [];
  readonly handles: FakeWorkerHandle[] = [];
  fail = false;
  behavior: FakeWorkerBehavior = 'exits';

  launch(spec: WorkerSpec): WorkerHandle {
    if (this.fail) throw new Error('spawn EAGAIN');
    this.launched.push(spec);
    const handle = new FakeWorkerHandle(1000 + this.handles.length + 1, this.behavior);
    this.handles.push(handle);
    return handle;
  }

  last(): FakeWorkerHandle {
    const handle = this.handles[this.handles.length - 1];
    if (!handle) throw new Error('nothing launched');
    return handle;
  }
}
