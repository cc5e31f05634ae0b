/**
 * Service wiring.
 *
 * Builds the key source and the validation pipeline from a loaded
 * configuration and starts the HTTP server.
 *
 * @module src/service
 */

import { createKeyResolver } from "./auth/key-source.ts";
import { TokenVerifier } from "./auth/token-verifier.ts";
import type { ServiceConfig } from "./config.ts";
import { createApp } from "./http-server.ts";
import type { Logger } from "./logger.ts";
import { ServiceMetrics } from "./observability/metrics.ts";
import { PolicyEvaluator } from "./policy/evaluator.ts";
import { PatternCache } from "./policy/pattern-cache.ts";
import { serve } from "./runtime/runtime.ts";
import { RequestValidator } from "./validator.ts";

export interface RunningService {
  config: ServiceConfig;
  shutdown(): Promise<void>;
}

/**
 * Wire and start the service from a loaded configuration.
 */
export async function startService(
  config: ServiceConfig,
  logger: Logger,
): Promise<RunningService> {
  const metrics = new ServiceMetrics();
  metrics.initialize();

  const resolver = await createKeyResolver(config.jwks, { logger, metrics });
  const validator = new RequestValidator({
    verifier: new TokenVerifier({
      resolver,
      clockToleranceSeconds: config.token.clockToleranceSeconds,
      metrics,
    }),
    evaluator: new PolicyEvaluator({
      patterns: new PatternCache({ mode: config.policy.regexpMatch }),
      emptyPolicy: config.policy.emptyPolicy,
      logger,
    }),
    staticHeaders: config.headers,
    logger,
  });
  const app = createApp({ validator, metrics, logger });

  logger.info("Starting server", { addr: `${config.host}:${config.port}` });
  const server = serve({ port: config.port, hostname: config.host }, app.fetch);

  return {
    config,
    shutdown: async () => {
      resolver.close();
      await server.shutdown();
    },
  };
}
