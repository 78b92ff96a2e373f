/**
 * Prometheus text exposition of the quoting counters and gauges, served at /metrics.
 */

import type { Metrics, MetricsSnapshot } from './metrics.js';

const PREFIX = 'spreadsmith_';

export class PrometheusMetrics implements Metrics {
  private readonly counters = new Map<string, number>();
  private readonly gauges = new Map<string, number>();

  increment(name: string, value = 1): void {
    const key = this.sanitize(name);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  gauge(name: string, value: number): void {
    this.gauges.set(this.sanitize(name), value);
  }

  render(): string {
    const lines: string[] = [];

    for (const [name, value] of this.counters) {
      lines.push(`# TYPE ${PREFIX}${name} counter`);
      lines.push(`${PREFIX}${name} ${value}`);
    }

    for (const [name, value] of this.gauges) {
      lines.push(`# TYPE ${PREFIX}${name} gauge`);
      lines.push(`${PREFIX}${name} ${value}`);
    }

    return lines.join('\n') + '\n';
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: Object.fromEntries(this.counters.entries()),
      gauges: Object.fromEntries(this.gauges.entries())
    };
  }

  private sanitize(name: string): string {
    return name.replace(/[^a-zA-Z0-9_]/g, '_');
  }
}
