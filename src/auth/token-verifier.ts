/**
 * Token Verifier
 *
 * Verifies a compact JWS against the configured key source and checks the
 * registered time claims. Everything jose reports is mapped onto the
 * {@link AuthError} taxonomy; no partial claim set escapes a failure.
 *
 * @module src/auth/token-verifier
 */

import { performance } from "node:perf_hooks";
import { errors, jwtVerify, type JWTVerifyGetKey } from "jose";
import type { ClaimSet } from "../policy/claims.ts";
import { type MetricsRecorder, noopMetrics } from "../observability/metrics.ts";
import {
  AuthError,
  ClaimStructureError,
  KeyResolutionError,
  SignatureError,
  TokenParseError,
} from "./errors.ts";
import type { KeyResolver } from "./key-resolver.ts";

export type VerifyResult =
  | { ok: true; claims: ClaimSet }
  | { ok: false; error: AuthError };

export interface TokenVerifierOptions {
  resolver: KeyResolver;
  /** Leeway applied to exp, nbf and iat. */
  clockToleranceSeconds?: number;
  metrics?: MetricsRecorder;
  /** Clock override for tests. */
  now?: () => Date;
}

/**
 * Map a jose failure onto the deny taxonomy.
 */
export function toAuthError(err: unknown): AuthError {
  if (err instanceof AuthError) return err;

  if (err instanceof errors.JOSEError) {
    switch (err.code) {
      case "ERR_JWT_EXPIRED":
      case "ERR_JWT_CLAIM_VALIDATION_FAILED":
        return new ClaimStructureError(err.message, { cause: err });
      case "ERR_JWS_INVALID":
      case "ERR_JWT_INVALID":
        return new TokenParseError(err.message, { cause: err });
      case "ERR_JWKS_NO_MATCHING_KEY":
      case "ERR_JWKS_MULTIPLE_MATCHING_KEYS":
      case "ERR_JWK_INVALID":
      case "ERR_JWKS_INVALID":
        return new KeyResolutionError(err.message, { cause: err });
      default:
        // signature mismatch, algorithm not allowed or not supported
        return new SignatureError(err.message, { cause: err });
    }
  }

  // jose throws TypeError when the key does not fit the declared algorithm
  const message = err instanceof Error ? err.message : String(err);
  return new SignatureError(message, { cause: err });
}

export class TokenVerifier {
  private readonly resolver: KeyResolver;
  private readonly clockTolerance: number;
  private readonly metrics: MetricsRecorder;
  private readonly now: () => Date;

  constructor(options: TokenVerifierOptions) {
    this.resolver = options.resolver;
    this.clockTolerance = options.clockToleranceSeconds ?? 0;
    this.metrics = options.metrics ?? noopMetrics;
    this.now = options.now ?? (() => new Date());
  }

  async verify(credential: string): Promise<VerifyResult> {
    const started = performance.now();
    try {
      return await this.check(credential);
    } finally {
      this.metrics.observeValidation((performance.now() - started) / 1000);
    }
  }

  private async check(credential: string): Promise<VerifyResult> {
    const currentDate = this.now();
    let payload: ClaimSet;
    try {
      const getKey: JWTVerifyGetKey = (header, token) =>
        this.resolver.resolve(header, token);
      const result = await jwtVerify(credential, getKey, {
        algorithms: [...this.resolver.algorithms],
        clockTolerance: this.clockTolerance,
        currentDate,
      });
      payload = result.payload;
    } catch (err) {
      return { ok: false, error: toAuthError(err) };
    }

    // exp and nbf are checked by jose; iat only for its type
    const iat = payload["iat"];
    const nowSeconds = Math.floor(currentDate.getTime() / 1000);
    if (typeof iat === "number" && iat > nowSeconds + this.clockTolerance) {
      return {
        ok: false,
        error: new ClaimStructureError(
          '"iat" claim timestamp check failed (it should be in the past)',
        ),
      };
    }

    return { ok: true, claims: Object.freeze({ ...payload }) };
  }
}
