/**
 * JWKS document validation.
 *
 * Checks the outer shape of a fetched key set before it replaces the
 * current snapshot. Per-key checks (supported kty, curve, key material)
 * happen in jose when a key is selected for a token.
 *
 * @module src/auth/jwks
 */

import Ajv from "ajv";
import type { JSONWebKeySet, JWK } from "jose";

/** Shape a JWKS document must have to be accepted. */
interface JwksDocument {
  keys: Array<{ kty: string; kid?: string; alg?: string; use?: string }>;
}

const JWKS_SCHEMA = {
  type: "object",
  properties: {
    keys: {
      type: "array",
      items: {
        type: "object",
        properties: {
          kty: { type: "string", minLength: 1 },
          kid: { type: "string" },
          alg: { type: "string" },
          use: { type: "string" },
        },
        required: ["kty"],
        additionalProperties: true,
      },
    },
  },
  required: ["keys"],
  additionalProperties: true,
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateJwks = ajv.compile<JwksDocument>(JWKS_SCHEMA);

/**
 * Validate a decoded JWKS document and return it as a jose key set.
 * Throws with the ajv error text when the document is malformed.
 */
export function parseJwks(document: unknown): JSONWebKeySet {
  if (!validateJwks(document)) {
    throw new Error(
      `Invalid JWKS document: ${ajv.errorsText(validateJwks.errors)}`,
    );
  }
  const keys: JWK[] = document.keys.map((key) => ({ ...key }));
  return { keys };
}

/** `kid` values of a key set, for logging. Keys without one are skipped. */
export function keyIds(jwks: JSONWebKeySet): string[] {
  return jwks.keys.flatMap((key) => (key.kid ? [key.kid] : []));
}
