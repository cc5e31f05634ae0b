/**
 * HTTP surface of the service.
 *
 * - `GET|HEAD /validate` answers nginx `auth_request` subrequests
 * - `GET /healthz` liveness probe
 * - `GET /metrics` Prometheus text
 *
 * @module src/http-server
 */

import { Hono } from "hono";
import type { Logger } from "./logger.ts";
import { silentLogger } from "./logger.ts";
import type {
  MetricsExporter,
  MetricsRecorder,
} from "./observability/metrics.ts";
import {
  otelValidationEvents,
  type ValidationEventRecorder,
} from "./observability/otel.ts";
import type { ValidationOutcome } from "./validator.ts";

/** Anything that turns a request into an allow/deny outcome. */
export interface Validator {
  validate(request: Request): Promise<ValidationOutcome>;
}

export interface AppOptions {
  validator: Validator;
  metrics: MetricsRecorder & MetricsExporter;
  logger?: Logger;
  /** Receives an `error` event for every request that ends in a 500. */
  recordEvent?: ValidationEventRecorder;
}

const ALLOWED_METHODS = new Set(["GET", "HEAD"]);

export function createApp(options: AppOptions): Hono {
  const { validator, metrics } = options;
  const logger = options.logger ?? silentLogger;
  const recordEvent = options.recordEvent ?? otelValidationEvents;
  const app = new Hono();

  // Count and log every /validate request once its status is known
  app.use("/validate", async (c, next) => {
    await next();
    metrics.recordRequest(c.res.status);
    logger.debug("Handled validation request", {
      url: c.req.url,
      status: c.res.status,
      method: c.req.method,
      userAgent: c.req.header("user-agent") ?? "",
    });
  });

  app.all("/validate", async (c) => {
    if (!ALLOWED_METHODS.has(c.req.method)) {
      logger.info("Invalid method", { method: c.req.method });
      return c.body(null, 405);
    }

    const outcome = await validator.validate(c.req.raw);
    if (!outcome.allowed) {
      return c.body(null, 401);
    }
    for (const [name, value] of Object.entries(outcome.headers)) {
      c.header(name, value);
    }
    return c.body(null, 200);
  });

  // Health check endpoint
  app.get("/healthz", (c) => c.text("OK"));

  // Prometheus metrics endpoint
  app.get("/metrics", () =>
    new Response(metrics.toPrometheusFormat(), {
      headers: { "Content-Type": "text/plain; version=0.0.4; charset=utf-8" },
    }));

  app.onError((err, c) => {
    logger.error("Unhandled error while handling request", {
      path: c.req.path,
      error: err,
    });
    recordEvent("error", { "http.route": c.req.path, "error.type": err.name });
    return c.text("Internal Server Error", 500);
  });

  return app;
}
