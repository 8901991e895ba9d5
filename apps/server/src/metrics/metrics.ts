import type { MetricsBody } from "@marquee/protocol";

export type Counter = keyof MetricsBody;

/**
 * Process-wide request counters served on `GET /metrics`.
 */
export class Metrics {
  private counters: MetricsBody = {
    staticRequests: 0,
    partyRequests: 0,
    fontRequests: 0,
    rejectedStreams: 0,
    totalErrors: 0,
  };

  increment(counter: Counter, by = 1): void {
    this.counters[counter] += by;
  }

  get(counter: Counter): number {
    return this.counters[counter];
  }

  snapshot(): MetricsBody {
    return { ...this.counters };
  }
}
