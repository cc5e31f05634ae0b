/**
 * Static EC public key loaded once from a PEM file.
 *
 * @module src/auth/static-key-resolver
 */

import { createPublicKey, type KeyObject } from "node:crypto";
import type { KeyLike } from "jose";
import { readTextFile } from "../runtime/runtime.ts";
import type { ReadTextFileFn } from "../runtime/types.ts";
import { ConfigurationError } from "./errors.ts";
import { KeyResolver } from "./key-resolver.ts";

/** Named curve → the one JWS algorithm that signs with it. */
const CURVE_ALGORITHMS: Readonly<Record<string, string>> = {
  prime256v1: "ES256",
  secp384r1: "ES384",
  secp521r1: "ES512",
  secp256k1: "ES256K",
};

const PEM_PUBLIC_KEY =
  /-----BEGIN PUBLIC KEY-----[\s\S]+?-----END PUBLIC KEY-----/;

/**
 * Resolver that always returns the same EC key, whatever the token header
 * says. Tokens must be signed with the curve's algorithm.
 */
export class StaticKeyResolver extends KeyResolver {
  readonly mode = "static";
  readonly algorithms: readonly string[];

  private constructor(private readonly key: KeyObject, algorithm: string) {
    super();
    this.algorithms = [algorithm];
  }

  /**
   * Read and parse the PEM file at `path`.
   * Throws ConfigurationError when it is missing, unreadable or not an EC
   * public key.
   */
  static async fromFile(
    path: string,
    read: ReadTextFileFn = readTextFile,
  ): Promise<StaticKeyResolver> {
    let pem: string | null;
    try {
      pem = await read(path);
    } catch (err) {
      throw new ConfigurationError(
        `Couldn't read EC public key from file ${path}`,
        { cause: err },
      );
    }
    if (pem === null) {
      throw new ConfigurationError(
        `Couldn't read EC public key from file ${path}: file not found`,
      );
    }
    return StaticKeyResolver.fromPem(pem);
  }

  static fromPem(pem: string): StaticKeyResolver {
    const block = PEM_PUBLIC_KEY.exec(pem);
    if (!block) {
      throw new ConfigurationError("No PEM block containing a public key found");
    }

    let key: KeyObject;
    try {
      key = createPublicKey({ key: block[0], format: "pem" });
    } catch (err) {
      throw new ConfigurationError("Failed to parse public key", { cause: err });
    }

    if (key.asymmetricKeyType !== "ec") {
      throw new ConfigurationError(
        `Given key is not an EC public key (got ${key.asymmetricKeyType ?? "unknown"})`,
      );
    }
    const curve = key.asymmetricKeyDetails?.namedCurve ?? "";
    const algorithm = CURVE_ALGORITHMS[curve];
    if (!algorithm) {
      throw new ConfigurationError(`Unsupported EC curve: ${curve || "unknown"}`);
    }
    return new StaticKeyResolver(key, algorithm);
  }

  /** Curve-derived algorithm, e.g. ES256 for a P-256 key. */
  get algorithm(): string {
    return this.algorithms[0] ?? "";
  }

  resolve(): Promise<KeyLike> {
    return Promise.resolve(this.key);
  }
}
