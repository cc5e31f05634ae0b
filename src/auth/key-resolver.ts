/**
 * KeyResolver abstract class.
 *
 * Abstract class (not interface) so the verifier can depend on one token
 * for either key source. Implementations hand jose the key that verifies
 * a given token header.
 *
 * @module src/auth/key-resolver
 */

import type { FlattenedJWSInput, JWSHeaderParameters, KeyLike } from "jose";

export type KeySourceMode = "static" | "remote";

/**
 * Base class for verification key sources.
 *
 * @example
 * ```typescript
 * class SingleKeyResolver extends KeyResolver {
 *   readonly mode = "static";
 *   readonly algorithms = ["ES256"];
 *   constructor(private key: KeyLike) { super(); }
 *   resolve() { return Promise.resolve(this.key); }
 * }
 * ```
 */
export abstract class KeyResolver {
  abstract readonly mode: KeySourceMode;

  /** Signature algorithms a token may declare for this source. */
  abstract readonly algorithms: readonly string[];

  /**
   * Return the key that verifies a token with this protected header.
   * Rejects with {@link KeyResolutionError} when none matches.
   */
  abstract resolve(
    header: JWSHeaderParameters,
    token: FlattenedJWSInput,
  ): Promise<KeyLike>;

  /** Release timers or other resources. Safe to call more than once. */
  close(): void {}
}
