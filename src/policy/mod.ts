/**
 * Claim policy module.
 *
 * @module src/policy
 */

export { classifyClaim, getClaim } from "./claims.ts";
export type { ClaimSet, ClaimValue } from "./claims.ts";

export { PatternCache } from "./pattern-cache.ts";
export type {
  CompiledPattern,
  PatternCacheStats,
  RegExpMatchMode,
} from "./pattern-cache.ts";

export {
  CLAIMS_PREFIX,
  CLAIMS_REGEXP_PREFIX,
  describePolicy,
  parsePolicy,
} from "./policy.ts";
export type { Pattern, Policy } from "./policy.ts";

export { PolicyEvaluator } from "./evaluator.ts";
export type {
  EmptyPolicyBehavior,
  PolicyDecision,
  PolicyEvaluatorOptions,
  RejectReason,
} from "./evaluator.ts";

export {
  buildHeaderMap,
  encodeClaim,
  HEADERS_PREFIX,
  projectHeaders,
} from "./headers.ts";
export type { HeaderMap } from "./headers.ts";
