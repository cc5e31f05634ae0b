/**
 * Service Metrics Collector
 *
 * In-memory counters and histograms with Prometheus text format export.
 * Request handling only sees the {@link MetricsRecorder} capability; the
 * HTTP layer additionally reads the exporter side for `/metrics`.
 *
 * @module src/observability/metrics
 */

/**
 * What request handling and key refresh report.
 */
export interface MetricsRecorder {
  /** Count a finished /validate request by status code. */
  recordRequest(status: number): void;
  /** Observe one token verification, in seconds. */
  observeValidation(seconds: number): void;
  /** Count a JWKS refresh attempt. */
  recordKeyRefresh(success: boolean): void;
}

export interface MetricsExporter {
  toPrometheusFormat(prefix?: string): string;
}

/** Status labels exported from startup, even before they occur. */
export const TRACKED_STATUSES = [200, 401, 405, 500] as const;

/**
 * Histogram bucket
 */
interface HistogramBucket {
  le: number;
  count: number;
}

interface Histogram {
  buckets: HistogramBucket[];
  sum: number;
  count: number;
}

/**
 * `count` upper bounds starting at `start`, each `factor` times the previous.
 * Rounded to 6 significant digits so 1e-7 * 3 prints as 3e-7.
 */
export function exponentialBuckets(
  start: number,
  factor: number,
  count: number,
): number[] {
  return Array.from(
    { length: count },
    (_, i) => Number((start * factor ** i).toPrecision(6)),
  );
}

/**
 * Default validation-time buckets: 100ns, x3, six buckets (seconds).
 */
export const VALIDATION_BUCKETS = exponentialBuckets(100e-9, 3, 6);

function createHistogram(buckets: number[]): Histogram {
  return {
    buckets: buckets.map((le) => ({ le, count: 0 })),
    sum: 0,
    count: 0,
  };
}

function observeHistogram(histogram: Histogram, value: number): void {
  histogram.sum += value;
  histogram.count++;
  for (const bucket of histogram.buckets) {
    if (value <= bucket.le) {
      bucket.count++;
    }
  }
}

/**
 * Metrics snapshot returned by getSnapshot()
 */
export interface ServiceMetricsSnapshot {
  requests_by_status: Record<string, number>;
  key_refresh: { success: number; failed: number };
  histograms: {
    token_validation_time_seconds: Histogram;
  };
  collected_at: number;
  uptime_seconds: number;
}

/**
 * Service metrics collector.
 *
 * @example
 * ```typescript
 * const metrics = new ServiceMetrics();
 * metrics.initialize();
 * metrics.recordRequest(200);
 * console.log(metrics.toPrometheusFormat());
 * ```
 */
export class ServiceMetrics implements MetricsRecorder, MetricsExporter {
  private startTime = Date.now();
  private requests = new Map<string, number>();
  private refreshSuccess = 0;
  private refreshFailed = 0;
  private validationTime: Histogram;

  constructor(private readonly buckets: number[] = VALIDATION_BUCKETS) {
    this.validationTime = createHistogram(buckets);
  }

  /**
   * Register status labels at zero so they are exported before the first
   * request with that status. Call once at startup.
   */
  initialize(statuses: readonly number[] = TRACKED_STATUSES): void {
    for (const status of statuses) {
      const label = String(status);
      if (!this.requests.has(label)) this.requests.set(label, 0);
    }
  }

  recordRequest(status: number): void {
    const label = String(status);
    this.requests.set(label, (this.requests.get(label) ?? 0) + 1);
  }

  observeValidation(seconds: number): void {
    observeHistogram(this.validationTime, seconds);
  }

  recordKeyRefresh(success: boolean): void {
    if (success) this.refreshSuccess++;
    else this.refreshFailed++;
  }

  /**
   * Get current metrics snapshot
   */
  getSnapshot(): ServiceMetricsSnapshot {
    return {
      requests_by_status: Object.fromEntries(this.requests),
      key_refresh: {
        success: this.refreshSuccess,
        failed: this.refreshFailed,
      },
      histograms: {
        token_validation_time_seconds: {
          ...this.validationTime,
          buckets: this.validationTime.buckets.map((b) => ({ ...b })),
        },
      },
      collected_at: Date.now(),
      uptime_seconds: Math.floor((Date.now() - this.startTime) / 1000),
    };
  }

  /**
   * Prometheus text format export
   */
  toPrometheusFormat(prefix = "jwt_subrequest_auth"): string {
    const m = this.getSnapshot();
    const lines: string[] = [];

    lines.push(
      `# HELP ${prefix}_http_requests_total Total number of http requests handled`,
    );
    lines.push(`# TYPE ${prefix}_http_requests_total counter`);
    for (const [status, count] of Object.entries(m.requests_by_status)) {
      lines.push(`${prefix}_http_requests_total{status="${status}"} ${count}`);
    }

    lines.push(
      `# HELP ${prefix}_jwks_refresh_total JWKS refresh attempts by outcome`,
    );
    lines.push(`# TYPE ${prefix}_jwks_refresh_total counter`);
    lines.push(
      `${prefix}_jwks_refresh_total{outcome="success"} ${m.key_refresh.success}`,
    );
    lines.push(
      `${prefix}_jwks_refresh_total{outcome="failed"} ${m.key_refresh.failed}`,
    );

    const h = m.histograms.token_validation_time_seconds;
    const name = `${prefix}_token_validation_time_seconds`;
    lines.push(`# HELP ${name} Number of seconds spent validating token`);
    lines.push(`# TYPE ${name} histogram`);
    for (const bucket of h.buckets) {
      lines.push(`${name}_bucket{le="${bucket.le}"} ${bucket.count}`);
    }
    lines.push(`${name}_bucket{le="+Inf"} ${h.count}`);
    lines.push(`${name}_sum ${h.sum}`);
    lines.push(`${name}_count ${h.count}`);

    lines.push(`# HELP ${prefix}_uptime_seconds Service uptime in seconds`);
    lines.push(`# TYPE ${prefix}_uptime_seconds gauge`);
    lines.push(`${prefix}_uptime_seconds ${m.uptime_seconds}`);

    return lines.join("\n") + "\n";
  }

  /**
   * Reset all metrics. Status labels registered by initialize() stay, at zero.
   */
  reset(): void {
    for (const label of this.requests.keys()) this.requests.set(label, 0);
    this.refreshSuccess = 0;
    this.refreshFailed = 0;
    this.validationTime = createHistogram(this.buckets);
    this.startTime = Date.now();
  }
}

/** Recorder that discards everything. */
export const noopMetrics: MetricsRecorder = {
  recordRequest: () => {},
  observeValidation: () => {},
  recordKeyRefresh: () => {},
};
