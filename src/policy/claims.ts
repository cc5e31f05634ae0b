/**
 * Claim values as a tagged variant.
 *
 * Token payloads are untyped JSON; the evaluator and the header projector
 * dispatch on `kind` instead of probing runtime types themselves.
 *
 * @module src/policy/claims
 */

/** Verified token payload, frozen after verification. */
export type ClaimSet = Readonly<Record<string, unknown>>;

export type ClaimValue =
  | { kind: "absent" }
  | { kind: "scalar"; value: string }
  | { kind: "sequence"; values: readonly string[] }
  | { kind: "other"; raw: unknown };

const ABSENT: ClaimValue = { kind: "absent" };

function isStringArray(value: readonly unknown[]): value is readonly string[] {
  return value.every((item) => typeof item === "string");
}

/**
 * Classify a raw claim value. Arrays holding anything but strings are
 * `other`, as are numbers, booleans, objects and null.
 */
export function classifyClaim(raw: unknown): ClaimValue {
  if (raw === undefined) return ABSENT;
  if (typeof raw === "string") return { kind: "scalar", value: raw };
  if (Array.isArray(raw) && isStringArray(raw)) {
    return { kind: "sequence", values: raw };
  }
  return { kind: "other", raw };
}

/**
 * Look up and classify a claim. Only own properties count, so names like
 * `constructor` or `__proto__` are absent unless the token carries them.
 */
export function getClaim(claims: ClaimSet, name: string): ClaimValue {
  if (!Object.hasOwn(claims, name)) return ABSENT;
  return classifyClaim(claims[name]);
}
