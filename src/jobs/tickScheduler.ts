import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type { TradingConnector } from '../execution/connector.js';
import type { CycleResult } from '../strategy/types.js';

export type TickState = 'waiting' | 'active';

export type TickOutcome =
  | { kind: 'busy' }
  | { kind: 'waiting'; nextTickAt: number }
  | { kind: 'connector_not_ready' }
  | { kind: 'cycle'; result: CycleResult; nextTickAt: number };

export interface CycleRunner {
  runCycle(): Promise<CycleResult>;
}

/**
 * Gates quoting cycles on a fixed refresh cadence.
 *
 * Driven by an external clock that calls `tick(now)` more often than the
 * refresh interval. Only one cycle runs at a time. The schedule advances after
 * a cycle that quoted or threw; a cycle skipped for not-ready data leaves it
 * unchanged so the next invocation retries.
 */
export class TickScheduler {
  private state: TickState = 'waiting';
  private nextTickAt = 0;

  constructor(
    private readonly connector: TradingConnector,
    private readonly strategy: CycleRunner,
    private readonly refreshIntervalMs: number,
    private readonly logger: Logger,
    private readonly metrics: Metrics
  ) {}

  getState(): TickState {
    return this.state;
  }

  getNextTickAt(): number {
    return this.nextTickAt;
  }

  async tick(now: number): Promise<TickOutcome> {
    if (this.state === 'active') {
      this.metrics.increment('tick.busy');
      return { kind: 'busy' };
    }
    if (now < this.nextTickAt) {
      return { kind: 'waiting', nextTickAt: this.nextTickAt };
    }
    if (!this.connector.isReady()) {
      this.logger.debug('connector not ready, tick skipped', { connector: this.connector.name });
      this.metrics.increment('tick.connector_not_ready');
      return { kind: 'connector_not_ready' };
    }

    this.state = 'active';
    try {
      const result = await this.strategy.runCycle();
      if (result.kind === 'quoted') {
        this.nextTickAt = now + this.refreshIntervalMs;
      }
      return { kind: 'cycle', result, nextTickAt: this.nextTickAt };
    } catch (err) {
      this.nextTickAt = now + this.refreshIntervalMs;
      this.metrics.increment('tick.cycle_failed');
      throw err;
    } finally {
      this.state = 'waiting';
    }
  }
}
