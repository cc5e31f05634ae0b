/**
 * Claim Policy Evaluator
 *
 * Decides whether a verified claim set satisfies a policy: every claim name
 * in the policy must have a value matching at least one of its patterns.
 *
 * @module src/policy/evaluator
 */

import type { Logger } from "../logger.ts";
import { silentLogger } from "../logger.ts";
import { type ClaimSet, type ClaimValue, getClaim } from "./claims.ts";
import type { PatternCache } from "./pattern-cache.ts";
import { describePolicy, type Pattern, type Policy } from "./policy.ts";

/**
 * What to do when a request carries no `claims_*` parameters at all.
 * `allow` keeps the historical permissive behavior.
 */
export type EmptyPolicyBehavior = "allow" | "deny";

export type RejectReason =
  | "empty_policy"
  | "absent"
  | "unsupported_shape"
  | "empty_sequence"
  | "no_match";

export type PolicyDecision =
  | { accepted: true }
  | { accepted: false; claim: string; reason: RejectReason };

export interface PolicyEvaluatorOptions {
  patterns: PatternCache;
  emptyPolicy?: EmptyPolicyBehavior;
  logger?: Logger;
}

export class PolicyEvaluator {
  private readonly patterns: PatternCache;
  private readonly emptyPolicy: EmptyPolicyBehavior;
  private readonly logger: Logger;

  constructor(options: PolicyEvaluatorOptions) {
    this.patterns = options.patterns;
    this.emptyPolicy = options.emptyPolicy ?? "allow";
    this.logger = options.logger ?? silentLogger;
  }

  evaluate(claims: ClaimSet, policy: Policy): PolicyDecision {
    if (policy.size === 0) {
      if (this.emptyPolicy === "deny") {
        this.logger.info("No claims requirements set, denying");
        return { accepted: false, claim: "", reason: "empty_policy" };
      }
      this.logger.warn("No claims requirements set, skipping");
      return { accepted: true };
    }

    this.logger.debug("Validating claims from query string", {
      policy: describePolicy(policy),
    });

    for (const [name, patterns] of policy) {
      const reason = this.checkClaim(getClaim(claims, name), patterns);
      if (reason) {
        this.logger.debug("Token claims did not match required values", {
          claim: name,
          reason,
        });
        return { accepted: false, claim: name, reason };
      }
    }

    return { accepted: true };
  }

  /** Returns the reject reason, or null when the claim passes. */
  private checkClaim(
    value: ClaimValue,
    patterns: readonly Pattern[],
  ): RejectReason | null {
    switch (value.kind) {
      case "scalar":
        return this.matchesAny(value.value, patterns) ? null : "no_match";
      case "sequence":
        if (value.values.length === 0 && patterns.length > 0) {
          return "empty_sequence";
        }
        return value.values.some((v) => this.matchesAny(v, patterns))
          ? null
          : "no_match";
      case "absent":
        return "absent";
      case "other":
        return "unsupported_shape";
    }
  }

  private matchesAny(actual: string, patterns: readonly Pattern[]): boolean {
    return patterns.some((pattern) => this.matches(actual, pattern));
  }

  private matches(actual: string, pattern: Pattern): boolean {
    if (pattern.kind === "literal") return pattern.value === actual;

    const compiled = this.patterns.lookup(pattern.source);
    if (!compiled.ok) {
      this.logger.error("Unable to compile pattern to match claim", {
        pattern: pattern.source,
        err: compiled.error.cause,
      });
      return false;
    }
    return compiled.regexp.test(actual);
  }
}
