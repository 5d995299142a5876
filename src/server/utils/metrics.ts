import { Registry, Counter, Histogram } from 'prom-client';

/**
 * Prometheus metrics registry. Not served over HTTP by this service; the host
 * process exposes it alongside its own metrics.
 */
export const metricsRegistry = new Registry();

/**
 * Per-object outcomes of ingestion runs
 */
export const ingestionObjects = new Counter({
  name: 'ingestion_objects_total',
  help: 'Objects processed by the ingestion pipeline, by outcome',
  labelNames: ['outcome'] as const,
  registers: [metricsRegistry],
});

export const ingestionUpserts = new Counter({
  name: 'ingestion_upserts_total',
  help: 'Document store upserts, by collection and outcome',
  labelNames: ['collection', 'outcome'] as const,
  registers: [metricsRegistry],
});

export const ingestionArchiveFailures = new Counter({
  name: 'ingestion_archive_failures_total',
  help: 'Objects that could not be archived and were left in place',
  labelNames: ['destination', 'phase'] as const,
  registers: [metricsRegistry],
});

export const ingestionRunDuration = new Histogram({
  name: 'ingestion_run_duration_seconds',
  help: 'Duration of ingestion runs in seconds',
  labelNames: ['status'] as const,
  buckets: [0.5, 1, 5, 15, 30, 60, 120, 300],
  registers: [metricsRegistry],
});

export const ingestionTicksSkipped = new Counter({
  name: 'ingestion_ticks_skipped_total',
  help: 'Scheduler ticks skipped because a run was still in progress',
  registers: [metricsRegistry],
});
