import type { Logger } from '../core/logger.js';

interface ScheduledTask {
  timer: NodeJS.Timeout;
  task: () => Promise<void>;
  everyMs: number;
  running: boolean;
}

/**
 * Fixed-interval task runner. A tick that finds the previous run of the same
 * task still in flight is skipped rather than stacked.
 */
export class Scheduler {
  private readonly tasks = new Map<string, ScheduledTask>();

  constructor(private readonly logger: Logger) {}

  add(name: string, everyMs: number, task: () => Promise<void>, opts: { runImmediately?: boolean } = {}): void {
    this.remove(name);
    const entry: ScheduledTask = {
      timer: setInterval(() => {
        void this.tick(name);
      }, everyMs),
      task,
      everyMs,
      running: false
    };
    this.tasks.set(name, entry);
    this.logger.info('scheduled task registered', { name, everyMs });
    if (opts.runImmediately) void this.tick(name);
  }

  /** Runs a task now, outside its interval; resolves false if it was already running. */
  async runNow(name: string): Promise<boolean> {
    return this.tick(name);
  }

  remove(name: string): boolean {
    const entry = this.tasks.get(name);
    if (!entry) return false;
    clearInterval(entry.timer);
    this.tasks.delete(name);
    return true;
  }

  isRunning(name: string): boolean {
    return this.tasks.get(name)?.running ?? false;
  }

  shutdown(): void {
    for (const [, entry] of this.tasks) {
      clearInterval(entry.timer);
    }
    this.tasks.clear();
    this.logger.info('scheduler shutdown complete');
  }

  private async tick(name: string): Promise<boolean> {
    const entry = this.tasks.get(name);
    if (!entry) return false;
    if (entry.running) {
      this.logger.warn('scheduled task still running, tick skipped', { name });
      return false;
    }
    entry.running = true;
    try {
      await entry.task();
    } catch (err) {
      this.logger.error('scheduled task failed', { name, err: String(err), stack: err instanceof Error ? err.stack : undefined });
    } finally {
      entry.running = false;
    }
    return true;
  }
}
