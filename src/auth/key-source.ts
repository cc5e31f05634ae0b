/**
 * Picks the key source from configuration.
 *
 * @module src/auth/key-source
 */

import type { Logger } from "../logger.ts";
import { silentLogger } from "../logger.ts";
import type { MetricsRecorder } from "../observability/metrics.ts";
import type { ReadTextFileFn } from "../runtime/types.ts";
import { ConfigurationError } from "./errors.ts";
import type { KeyResolver } from "./key-resolver.ts";
import { RemoteKeyResolver } from "./remote-key-resolver.ts";
import { StaticKeyResolver } from "./static-key-resolver.ts";

export interface KeySourceConfig {
  /** PEM file with an EC public key. Wins over `url` when both are set. */
  path?: string;
  /** JWKS endpoint. */
  url?: string;
  refreshIntervalMs?: number;
  fetchTimeoutMs?: number;
  insecureSkipVerify?: boolean;
}

export interface KeySourceDeps {
  logger?: Logger;
  metrics?: MetricsRecorder;
  readTextFile?: ReadTextFileFn;
}

/**
 * Build the resolver for the configured key source.
 * Throws ConfigurationError when neither source is set or the chosen one
 * cannot be loaded.
 */
export async function createKeyResolver(
  config: KeySourceConfig,
  deps: KeySourceDeps = {},
): Promise<KeyResolver> {
  const logger = deps.logger ?? silentLogger;

  if (config.path) {
    if (config.url) {
      logger.warn("Both JWKS_PATH and JWKS_URL are set, using JWKS_PATH", {
        path: config.path,
      });
    }
    const resolver = await StaticKeyResolver.fromFile(
      config.path,
      deps.readTextFile,
    );
    logger.info("Using static EC public key", {
      path: config.path,
      algorithm: resolver.algorithm,
    });
    return resolver;
  }

  if (config.url) {
    let url: URL;
    try {
      url = new URL(config.url);
    } catch (err) {
      throw new ConfigurationError(`Invalid JWKS URL: ${config.url}`, {
        cause: err,
      });
    }
    if (config.insecureSkipVerify) {
      logger.warn("TLS certificate verification is disabled for JWKS fetches");
    }
    const resolver = await RemoteKeyResolver.create({
      url,
      refreshIntervalMs: config.refreshIntervalMs,
      fetchTimeoutMs: config.fetchTimeoutMs,
      insecureSkipVerify: config.insecureSkipVerify,
      logger,
      metrics: deps.metrics,
    });
    logger.info("Using remote JWKS", {
      url,
      kids: resolver.current()?.kids ?? [],
    });
    return resolver;
  }

  throw new ConfigurationError(
    "Either JWKS_PATH or JWKS_URL must be set to obtain the public key",
  );
}
