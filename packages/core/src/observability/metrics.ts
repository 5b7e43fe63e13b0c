/**
 * Lightweight in-memory metrics collector for the poller's own health.
 *
 * Counter and gauge names are type parameters so each owner declares
 * the closed set of names it records.
 */

export interface MetricsSnapshot<C extends string = string, G extends string = string> {
  counters: Partial<Record<C, number>>;
  gauges: Partial<Record<G, number>>;
  timestamp: number;
}

export interface MetricsCollector<C extends string = string, G extends string = string> {
  increment(name: C, delta?: number): void;
  gauge(name: G, value: number): void;
  getSnapshot(): MetricsSnapshot<C, G>;
}

function toRecord<K extends string>(map: Map<K, number>): Partial<Record<K, number>> {
  const record: Partial<Record<K, number>> = {};
  for (const [key, value] of map) {
    record[key] = value;
  }
  return record;
}

export function createMetricsCollector<
  C extends string = string,
  G extends string = string,
>(): MetricsCollector<C, G> {
  const counters = new Map<C, number>();
  const gauges = new Map<G, number>();

  return {
    increment(name: C, delta = 1): void {
      counters.set(name, (counters.get(name) ?? 0) + delta);
    },

    gauge(name: G, value: number): void {
      gauges.set(name, value);
    },

    getSnapshot(): MetricsSnapshot<C, G> {
      return {
        counters: toRecord(counters),
        gauges: toRecord(gauges),
        timestamp: Date.now(),
      };
    },
  };
}
