/**
 * Remote JWKS key source with periodic refresh.
 *
 * The key set is fetched once at startup (failure is fatal) and then on a
 * fixed interval. Each successful fetch replaces the whole snapshot in one
 * assignment, so a verification sees either the old set or the new one.
 * A failed refresh keeps the previous snapshot.
 *
 * Fetching goes through jose's remote key set, reloaded on our schedule.
 * Verification only reads the local snapshot and never waits on a fetch.
 *
 * @module src/auth/remote-key-resolver
 */

import { Agent } from "node:https";
import {
  createLocalJWKSet,
  createRemoteJWKSet,
  errors,
  type FlattenedJWSInput,
  type JSONWebKeySet,
  type JWSHeaderParameters,
  type KeyLike,
  type RemoteJWKSetOptions,
} from "jose";
import type { Logger } from "../logger.ts";
import { silentLogger } from "../logger.ts";
import { type MetricsRecorder, noopMetrics } from "../observability/metrics.ts";
import { unrefTimer } from "../runtime/runtime.ts";
import type { Timer, UnrefTimerFn } from "../runtime/types.ts";
import { ConfigurationError, KeyResolutionError } from "./errors.ts";
import { keyIds, parseJwks } from "./jwks.ts";
import { KeyResolver } from "./key-resolver.ts";

/** Algorithms accepted from a remote key set. HMAC is never accepted. */
export const REMOTE_ALGORITHMS: readonly string[] = [
  "RS256",
  "RS384",
  "RS512",
  "PS256",
  "PS384",
  "PS512",
  "ES256",
  "ES384",
  "ES512",
  "ES256K",
  "EdDSA",
];

export const DEFAULT_REFRESH_INTERVAL_MS = 60 * 60 * 1000;
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

/** Agent for `insecureSkipVerify`; never used for anything but JWKS fetches. */
export const INSECURE_AGENT = new Agent({ rejectUnauthorized: false });

/**
 * Transport options for the jose remote key set. The TLS bypass only
 * applies to https URLs; an https agent cannot carry a plain http request.
 */
export function remoteJwksOptions(
  url: URL,
  options: { fetchTimeoutMs?: number; insecureSkipVerify?: boolean } = {},
): RemoteJWKSetOptions {
  return {
    agent: options.insecureSkipVerify && url.protocol === "https:"
      ? INSECURE_AGENT
      : undefined,
    timeoutDuration: options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
    // Fetches happen on our schedule only
    cacheMaxAge: Infinity,
    cooldownDuration: 0,
    headers: { accept: "application/json" },
  };
}

export interface RemoteKeyResolverOptions {
  url: URL;
  /** Refresh period. 0 disables periodic refresh. */
  refreshIntervalMs?: number;
  fetchTimeoutMs?: number;
  insecureSkipVerify?: boolean;
  unref?: UnrefTimerFn;
  logger?: Logger;
  metrics?: MetricsRecorder;
}

interface KeySetSnapshot {
  jwks: JSONWebKeySet;
  getKey: ReturnType<typeof createLocalJWKSet>;
  fetchedAt: Date;
}

export class RemoteKeyResolver extends KeyResolver {
  readonly mode = "remote";
  readonly algorithms = REMOTE_ALGORITHMS;

  private readonly url: URL;
  private readonly refreshIntervalMs: number;
  private readonly remote: ReturnType<typeof createRemoteJWKSet>;
  private readonly unref: UnrefTimerFn;
  private readonly logger: Logger;
  private readonly metrics: MetricsRecorder;

  private snapshot: KeySetSnapshot | null = null;
  private inFlight: Promise<boolean> | null = null;
  private timer: Timer | null = null;

  private constructor(options: RemoteKeyResolverOptions) {
    super();
    this.url = options.url;
    this.refreshIntervalMs = options.refreshIntervalMs ??
      DEFAULT_REFRESH_INTERVAL_MS;
    this.remote = createRemoteJWKSet(
      options.url,
      remoteJwksOptions(options.url, options),
    );
    this.unref = options.unref ?? unrefTimer;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * Fetch the initial key set and start the refresh timer.
   * Throws ConfigurationError when the first fetch fails.
   */
  static async create(
    options: RemoteKeyResolverOptions,
  ): Promise<RemoteKeyResolver> {
    const resolver = new RemoteKeyResolver(options);
    try {
      await resolver.load();
    } catch (err) {
      throw new ConfigurationError(
        `Failed to create JWKS from resource at the given URL ${options.url.href}`,
        { cause: err },
      );
    }
    resolver.metrics.recordKeyRefresh(true);
    resolver.start();
    return resolver;
  }

  /** Start periodic refresh. No-op when already running or disabled. */
  start(): void {
    if (this.timer || this.refreshIntervalMs <= 0) return;
    this.timer = setInterval(() => {
      void this.refresh();
    }, this.refreshIntervalMs);
    this.unref(this.timer);
  }

  /**
   * Fetch the key set now. Resolves to false (and keeps the current
   * snapshot) when the fetch or validation fails. Concurrent calls share
   * one fetch.
   */
  refresh(): Promise<boolean> {
    if (this.inFlight) return this.inFlight;

    this.inFlight = this.load()
      .then(() => {
        this.metrics.recordKeyRefresh(true);
        return true;
      }, (err: unknown) => {
        this.metrics.recordKeyRefresh(false);
        this.logger.error("Failed to refresh JWKS, keeping previous keys", {
          url: this.url,
          error: err,
        });
        return false;
      })
      .finally(() => {
        this.inFlight = null;
      });
    return this.inFlight;
  }

  async resolve(
    header: JWSHeaderParameters,
    token: FlattenedJWSInput,
  ): Promise<KeyLike> {
    const snapshot = this.snapshot;
    if (!snapshot) {
      throw new KeyResolutionError("JWKS not loaded");
    }
    try {
      return await snapshot.getKey(header, token);
    } catch (err) {
      if (
        err instanceof errors.JWKSNoMatchingKey ||
        err instanceof errors.JWKSMultipleMatchingKeys
      ) {
        throw new KeyResolutionError(
          `No usable key for kid ${JSON.stringify(header.kid ?? null)}`,
          { cause: err },
        );
      }
      throw err;
    }
  }

  /** Keys currently in use and when they were fetched. */
  current(): { kids: string[]; fetchedAt: Date } | null {
    if (!this.snapshot) return null;
    return {
      kids: keyIds(this.snapshot.jwks),
      fetchedAt: this.snapshot.fetchedAt,
    };
  }

  override close(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async load(): Promise<void> {
    await this.remote.reload();
    const jwks = parseJwks(this.remote.jwks());
    this.snapshot = {
      jwks,
      getKey: createLocalJWKSet(jwks),
      fetchedAt: new Date(),
    };
    this.logger.debug("Loaded JWKS", {
      url: this.url,
      kids: keyIds(jwks),
    });
  }
}
