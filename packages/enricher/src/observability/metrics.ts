import { FIELD_NAMES, type FieldName } from '../extractors/types.js';

type DurationStats = {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
};

type FieldOutcome = {
  hit: number;
  miss: number;
  error: number;
};

type MetricSnapshot = {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  fetchDurations: DurationStats;
};

type MetricsLogger = { info: (msg: unknown, ...args: unknown[]) => void };

/**
 * Run-wide counters shared by the five column tasks. Only observational:
 * nothing in the pipeline reads these back to decide results.
 *
 * Extraction outcomes are counted as `extract.<hit|miss|error>.<field>`.
 */
export class EnrichmentMetrics {
  private readonly counters = new Map<string, number>();
  private readonly gauges = new Map<string, number>();
  private durationCount = 0;
  private durationTotal = 0;
  private durationMin = Number.POSITIVE_INFINITY;
  private durationMax = 0;

  increment(counter: string, amount = 1): void {
    this.counters.set(counter, this.count(counter) + amount);
  }

  gauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  recordFetchDuration(ms: number): void {
    this.durationCount += 1;
    this.durationTotal += ms;
    this.durationMin = Math.min(this.durationMin, ms);
    this.durationMax = Math.max(this.durationMax, ms);
  }

  count(counter: string): number {
    return this.counters.get(counter) ?? 0;
  }

  fieldOutcome(field: FieldName): FieldOutcome {
    return {
      hit: this.count(`extract.hit.${field}`),
      miss: this.count(`extract.miss.${field}`),
      error: this.count(`extract.error.${field}`),
    };
  }

  snapshot(): MetricSnapshot {
    const empty = this.durationCount === 0;

    return {
      counters: Object.fromEntries(
        [...this.counters.entries()].sort(([a], [b]) => a.localeCompare(b)),
      ),
      gauges: Object.fromEntries(this.gauges),
      fetchDurations: {
        count: this.durationCount,
        min: empty ? 0 : this.durationMin,
        max: this.durationMax,
        avg: empty ? 0 : this.durationTotal / this.durationCount,
        total: this.durationTotal,
      },
    };
  }

  /** One JSON line with the whole snapshot, then one line per derived field. */
  log(logger: MetricsLogger): void {
    logger.info('[Metrics]', JSON.stringify(this.snapshot()));

    for (const field of FIELD_NAMES) {
      const { hit, miss, error } = this.fieldOutcome(field);
      logger.info(`[Metrics] ${field}: ${hit} found, ${miss} missing, ${error} errors`);
    }
  }
}

export type { DurationStats, FieldOutcome, MetricSnapshot, MetricsLogger };
