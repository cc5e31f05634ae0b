/**
 * OpenTelemetry integration
 *
 * Records each validation outcome as a short span. Enable with
 * `OTEL_ENABLED=true` and register an SDK/exporter before startup; without
 * one, the API is a no-op.
 *
 * @module src/observability/otel
 */

import { SpanStatusCode, trace, type Tracer } from "@opentelemetry/api";
import { env } from "../runtime/runtime.ts";

let serviceTracer: Tracer | null = null;

/**
 * Get or create the service tracer
 */
export function getServiceTracer(): Tracer {
  if (!serviceTracer) {
    serviceTracer = trace.getTracer("jwt-subrequest-auth", "0.1.0");
  }
  return serviceTracer;
}

export type ValidationEvent = "allow" | "deny" | "error";

export type ValidationEventAttributes = Record<
  string,
  string | number | boolean | undefined
>;

export type ValidationEventRecorder = (
  event: ValidationEvent,
  attributes: ValidationEventAttributes,
) => void;

/**
 * Record a validation event as a fire-and-forget span.
 */
export function recordValidationEvent(
  event: ValidationEvent,
  attributes: ValidationEventAttributes,
): void {
  const tracer = getServiceTracer();
  tracer.startActiveSpan(`auth.validate.${event}`, { attributes }, (span) => {
    span.setStatus({
      code: event === "allow" ? SpanStatusCode.OK : SpanStatusCode.ERROR,
    });
    span.end();
  });
}

export function isOtelEnabled(): boolean {
  return env("OTEL_ENABLED") === "true";
}

/** Default recorder: a span per event while `OTEL_ENABLED=true`. */
export const otelValidationEvents: ValidationEventRecorder = (
  event,
  attributes,
) => {
  if (isOtelEnabled()) recordValidationEvent(event, attributes);
};
