/**
 * Per-request claim policy, built from query parameters.
 *
 * - `claims_<name>=<value>` adds a literal pattern for claim `<name>`
 * - `claims_regexp_<name>=<pattern>` adds a regex pattern for claim `<name>`
 *
 * A repeated parameter adds one pattern per value. Literal and regex
 * patterns for the same claim name land in the same set.
 *
 * @module src/policy/policy
 */

export const CLAIMS_PREFIX = "claims_";
export const CLAIMS_REGEXP_PREFIX = "claims_regexp_";

export type Pattern =
  | { kind: "literal"; value: string }
  | { kind: "regexp"; source: string };

/** Claim name to acceptable patterns. AND across names, OR within one. */
export type Policy = ReadonlyMap<string, readonly Pattern[]>;

function toPattern(key: string): { claim: string; make: (v: string) => Pattern } | null {
  if (key.startsWith(CLAIMS_REGEXP_PREFIX)) {
    return {
      claim: key.slice(CLAIMS_REGEXP_PREFIX.length),
      make: (source) => ({ kind: "regexp", source }),
    };
  }
  if (key.startsWith(CLAIMS_PREFIX)) {
    return {
      claim: key.slice(CLAIMS_PREFIX.length),
      make: (value) => ({ kind: "literal", value }),
    };
  }
  return null;
}

export function parsePolicy(query: URLSearchParams): Policy {
  const policy = new Map<string, Pattern[]>();

  for (const [key, value] of query) {
    const entry = toPattern(key);
    if (!entry) continue;

    const patterns = policy.get(entry.claim);
    if (patterns) {
      patterns.push(entry.make(value));
    } else {
      policy.set(entry.claim, [entry.make(value)]);
    }
  }

  return policy;
}

/** Render a policy for log fields. */
export function describePolicy(policy: Policy): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const [claim, patterns] of policy) {
    out[claim] = patterns.map((p) =>
      p.kind === "literal" ? p.value : `/${p.source}/`
    );
  }
  return out;
}
