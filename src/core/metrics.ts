/**
 * Metrics — in-process counters and histograms for transitions, tokens and deliveries.
 */

export type Tags = Record<string, string>;

export interface MetricsSnapshot {
  counters: Record<string, { value: number; tags?: Tags }[]>;
  histograms: Record<string, { values: number[]; tags?: Tags }[]>;
  collectedAt: string;
}

/** Adapter interface for external metrics systems (Prometheus, StatsD, etc.) */
export interface MetricsAdapter {
  onCounter(name: string, value: number, tags?: Tags): void;
  onHistogram(name: string, value: number, tags?: Tags): void;
}

function tagsKey(tags?: Tags): string {
  if (!tags || Object.keys(tags).length === 0) return '';
  return Object.entries(tags).sort(([a], [b]) => a.localeCompare(b)).map(([k, v]) => `${k}=${v}`).join(',');
}

/** name → tag key → entry */
type Series<E> = Map<string, Map<string, E>>;

function entryFor<E>(series: Series<E>, name: string, tags: Tags | undefined, init: () => E): E {
  let byTags = series.get(name);
  if (!byTags) {
    byTags = new Map();
    series.set(name, byTags);
  }
  const key = tagsKey(tags);
  let entry = byTags.get(key);
  if (!entry) {
    entry = init();
    byTags.set(key, entry);
  }
  return entry;
}

export class MetricsCollector {
  private counters: Series<{ value: number; tags?: Tags }> = new Map();
  private histograms: Series<{ values: number[]; tags?: Tags }> = new Map();
  private adapters: MetricsAdapter[] = [];

  registerAdapter(adapter: MetricsAdapter): void {
    this.adapters.push(adapter);
  }

  /** Increment a counter by 1 (or by `amount`). */
  counter(name: string, tags?: Tags, amount = 1): void {
    entryFor(this.counters, name, tags, () => ({ value: 0, tags })).value += amount;
    for (const a of this.adapters) a.onCounter(name, amount, tags);
  }

  histogram(name: string, value: number, tags?: Tags): void {
    entryFor(this.histograms, name, tags, () => ({ values: [], tags })).values.push(value);
    for (const a of this.adapters) a.onHistogram(name, value, tags);
  }

  /** Sum across all tag combinations, or the value for exactly `tags`. */
  getCounter(name: string, tags?: Tags): number {
    const byTags = this.counters.get(name);
    if (!byTags) return 0;
    if (tags) return byTags.get(tagsKey(tags))?.value ?? 0;
    let total = 0;
    for (const entry of byTags.values()) total += entry.value;
    return total;
  }

  getHistogramValues(name: string, tags?: Tags): number[] {
    const byTags = this.histograms.get(name);
    if (!byTags) return [];
    if (tags) return byTags.get(tagsKey(tags))?.values ?? [];
    return Array.from(byTags.values()).flatMap(e => e.values);
  }

  getSnapshot(): MetricsSnapshot {
    const counters: MetricsSnapshot['counters'] = {};
    for (const [name, byTags] of this.counters) counters[name] = Array.from(byTags.values());
    const histograms: MetricsSnapshot['histograms'] = {};
    for (const [name, byTags] of this.histograms) histograms[name] = Array.from(byTags.values());
    return { counters, histograms, collectedAt: new Date().toISOString() };
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }
}

/** Global metrics instance (singleton for convenience). */
export const globalMetrics = new MetricsCollector();
