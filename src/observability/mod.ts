/**
 * Observability module
 *
 * - Metrics collection (counters, histograms) with Prometheus text export
 * - OTel spans for validation outcomes
 *
 * @module src/observability
 */

export {
  getServiceTracer,
  isOtelEnabled,
  otelValidationEvents,
  recordValidationEvent,
  type ValidationEvent,
  type ValidationEventAttributes,
  type ValidationEventRecorder,
} from "./otel.ts";

export {
  exponentialBuckets,
  type MetricsExporter,
  type MetricsRecorder,
  noopMetrics,
  ServiceMetrics,
  type ServiceMetricsSnapshot,
  TRACKED_STATUSES,
  VALIDATION_BUCKETS,
} from "./metrics.ts";
