import type { Logger } from '../core/logger.js';

interface ScheduledTask {
  timer: NodeJS.Timeout;
  task: () => Promise<void>;
  running: boolean;
}

export class Scheduler {
  private readonly timers = new Map<string, ScheduledTask>();

  constructor(private readonly logger: Logger) {}

  add(name: string, everyMs: number, task: () => Promise<void>): void {
    const entry: ScheduledTask = { timer: setInterval(() => this.run(name), everyMs), task, running: false };
    this.timers.set(name, entry);
    this.logger.info('scheduled task registered', { name, everyMs });
  }

  /** Runs a task now, unless its previous run is still in flight. */
  run(name: string): void {
    const entry = this.timers.get(name);
    if (!entry) return;
    if (entry.running) {
      this.logger.debug('scheduled task still running, invocation skipped', { name });
      return;
    }
    entry.running = true;
    void entry
      .task()
      .catch((err: unknown) => {
        this.logger.error('scheduled task failed', { name, err: String(err), stack: err instanceof Error ? err.stack : undefined });
      })
      .finally(() => {
        entry.running = false;
      });
  }

  shutdown(): void {
    for (const [, entry] of this.timers) {
      clearInterval(entry.timer);
    }
    this.timers.clear();
    this.logger.info('scheduler shutdown complete');
  }
}
