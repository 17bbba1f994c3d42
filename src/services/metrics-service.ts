type PublishResult = "ok" | "error";

const LATENCY_BUCKETS_MS = [5, 10, 25, 50, 100, 250, 500, 1_000, 2_500];

type ApiErrorKey = `${number}|${string}`;
type PublishKey = `${string}|${PublishResult}`;

type LatencyHistogram = {
  buckets: number[];
  count: number;
  sum: number;
};

function apiErrorKey(statusCode: number, code: string): ApiErrorKey {
  return `${statusCode}|${code}`;
}

function publishKey(kind: string, result: PublishResult): PublishKey {
  return `${kind}|${result}`;
}

function escapeLabel(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/\n/g, "\\n")
    .replace(/"/g, '\\"');
}

class MetricsService {
  private readonly samplesByFamily = new Map<string, number>();
  private readonly batchLatencies = new Map<string, LatencyHistogram>();
  private foldsApplied = 0;
  private foldsSkipped = 0;
  private aggregateConflicts = 0;
  private readonly publishes = new Map<PublishKey, number>();
  private readonly apiErrors = new Map<ApiErrorKey, number>();

  observeIngest(params: { family: string; samples: number; latencyMs: number }): void {
    this.samplesByFamily.set(params.family, (this.samplesByFamily.get(params.family) ?? 0) + params.samples);

    const existing = this.batchLatencies.get(params.family) ?? {
      buckets: new Array<number>(LATENCY_BUCKETS_MS.length).fill(0),
      count: 0,
      sum: 0
    };
    const boundedLatency = Math.max(0, params.latencyMs);
    existing.count += 1;
    existing.sum += boundedLatency;
    for (let i = 0; i < LATENCY_BUCKETS_MS.length; i += 1) {
      if (boundedLatency <= LATENCY_BUCKETS_MS[i]) {
        existing.buckets[i] += 1;
      }
    }
    this.batchLatencies.set(params.family, existing);
  }

  observeAggregateFolds(params: { applied: number; skipped: number }): void {
    this.foldsApplied += params.applied;
    this.foldsSkipped += params.skipped;
  }

  observeAggregateConflict(): void {
    this.aggregateConflicts += 1;
  }

  observeConfigPublish(kind: "publish" | "republish", result: PublishResult): void {
    const key = publishKey(kind, result);
    this.publishes.set(key, (this.publishes.get(key) ?? 0) + 1);
  }

  observeApiError(params: { statusCode: number; code: string }): void {
    const key = apiErrorKey(params.statusCode, params.code);
    this.apiErrors.set(key, (this.apiErrors.get(key) ?? 0) + 1);
  }

  renderPrometheus(): string {
    const lines: string[] = [];

    lines.push("# HELP telemetry_samples_total Samples ingested by family.");
    lines.push("# TYPE telemetry_samples_total counter");
    for (const [family, value] of this.samplesByFamily) {
      lines.push(`telemetry_samples_total{family="${escapeLabel(family)}"} ${value}`);
    }

    lines.push("# HELP telemetry_batch_latency_ms Ingest batch latency histogram in milliseconds.");
    lines.push("# TYPE telemetry_batch_latency_ms histogram");
    for (const [family, histogram] of this.batchLatencies) {
      const label = `family="${escapeLabel(family)}"`;
      for (let i = 0; i < LATENCY_BUCKETS_MS.length; i += 1) {
        lines.push(`telemetry_batch_latency_ms_bucket{${label},le="${LATENCY_BUCKETS_MS[i]}"} ${histogram.buckets[i]}`);
      }
      lines.push(`telemetry_batch_latency_ms_bucket{${label},le="+Inf"} ${histogram.count}`);
      lines.push(`telemetry_batch_latency_ms_sum{${label}} ${histogram.sum.toFixed(3)}`);
      lines.push(`telemetry_batch_latency_ms_count{${label}} ${histogram.count}`);
    }

    lines.push("# HELP telemetry_aggregate_folds_total Daily aggregate (bucket, metric) folds.");
    lines.push("# TYPE telemetry_aggregate_folds_total counter");
    lines.push(`telemetry_aggregate_folds_total{result="applied"} ${this.foldsApplied}`);
    lines.push(`telemetry_aggregate_folds_total{result="skipped"} ${this.foldsSkipped}`);

    lines.push("# HELP telemetry_aggregate_conflicts_total Daily aggregate compare-and-set conflicts.");
    lines.push("# TYPE telemetry_aggregate_conflicts_total counter");
    lines.push(`telemetry_aggregate_conflicts_total ${this.aggregateConflicts}`);

    lines.push("# HELP telemetry_config_publish_total Config publishes by kind/result.");
    lines.push("# TYPE telemetry_config_publish_total counter");
    for (const [key, value] of this.publishes) {
      const [kind, result] = key.split("|");
      lines.push(
        `telemetry_config_publish_total{kind="${escapeLabel(kind)}",result="${escapeLabel(result)}"} ${value}`
      );
    }

    lines.push("# HELP telemetry_api_errors_total API error responses by status/code.");
    lines.push("# TYPE telemetry_api_errors_total counter");
    for (const [key, value] of this.apiErrors) {
      const [statusCode, code] = key.split("|");
      lines.push(
        `telemetry_api_errors_total{status_code="${escapeLabel(statusCode)}",code="${escapeLabel(code)}"} ${value}`
      );
    }

    return lines.join("\n");
  }
}

export const metricsService = new MetricsService();
