import type { Logger } from '../core/logger.js';
import type { CandleFeed } from '../data/candleFeed.js';
import type { TradingConnector } from '../execution/connector.js';
import type { MarketMakingStrategy } from '../strategy/engine.js';
import type { TickOutcome, TickScheduler } from './tickScheduler.js';

export interface RuntimeState {
  lastCandleTime?: number;
  lastTickAt?: number;
  lastOutcome?: TickOutcome['kind'];
  nextTickAt?: number;
  cycles: number;
  failedCycles: number;
}

/** The periodic jobs the service runs, each registered with the Scheduler. */
export class TradingLoops {
  private readonly runtime: RuntimeState = { cycles: 0, failedCycles: 0 };

  constructor(
    private readonly feed: CandleFeed,
    private readonly connector: TradingConnector,
    private readonly ticks: TickScheduler,
    private readonly strategy: MarketMakingStrategy,
    private readonly logger: Logger
  ) {}

  getStatus(): RuntimeState {
    return { ...this.runtime, lastCandleTime: this.feed.getLastCandleTime() };
  }

  async candleLoop(): Promise<void> {
    await this.feed.poll();
  }

  async tickLoop(now: () => number = Date.now): Promise<void> {
    await this.connector.sync();
    const at = now();
    this.runtime.lastTickAt = at;
    try {
      const outcome = await this.ticks.tick(at);
      this.runtime.lastOutcome = outcome.kind;
      if (outcome.kind === 'cycle') {
        this.runtime.cycles += 1;
        this.runtime.nextTickAt = outcome.nextTickAt;
      }
    } catch (err) {
      this.runtime.failedCycles += 1;
      this.runtime.nextTickAt = this.ticks.getNextTickAt();
      throw err;
    }
  }

  async statusLoop(): Promise<void> {
    this.logger.info('status', { status: this.strategy.formatStatus(), ...this.getStatus() });
  }
}
