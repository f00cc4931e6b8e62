import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface SanitizeRunMetrics {
  timestamp: string;
  processed: number;
  failed: number;
  ignored: number;
  rules: number;
  durationMs: number;
  dryRun: boolean;
}

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const runCounter = new Counter({
  name: 'log_sanitizer_runs_total',
  help: 'Number of completed sanitization runs',
  labelNames: ['dry_run'],
  registers: [registry],
});

const filesCounter = new Counter({
  name: 'log_sanitizer_files_total',
  help: 'Files handled across all runs, by outcome',
  labelNames: ['outcome'],
  registers: [registry],
});

const runDuration = new Histogram({
  name: 'log_sanitizer_run_duration_seconds',
  help: 'Duration of sanitization runs in seconds',
  labelNames: ['dry_run'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [registry],
});

const rulesGauge = new Gauge({
  name: 'log_sanitizer_last_run_rules',
  help: 'Number of rules loaded for the last run',
  registers: [registry],
});

const timestampGauge = new Gauge({
  name: 'log_sanitizer_last_run_timestamp_seconds',
  help: 'Unix timestamp (seconds) of the last completed run',
  registers: [registry],
});

export function recordSanitizeMetrics(metrics: SanitizeRunMetrics): void {
  const labels = { dry_run: metrics.dryRun ? 'true' : 'false' };
  runCounter.inc(labels);
  runDuration.observe(labels, metrics.durationMs / 1000);
  filesCounter.inc({ outcome: 'sanitized' }, metrics.processed);
  filesCounter.inc({ outcome: 'failed' }, metrics.failed);
  filesCounter.inc({ outcome: 'ignored' }, metrics.ignored);
  rulesGauge.set(metrics.rules);
  timestampGauge.set(Date.now() / 1000);
}

export function metricsContentType(): string {
  return registry.contentType;
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
