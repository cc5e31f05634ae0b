/**
 * Request validation pipeline.
 *
 * extract credential → verify token → evaluate claim policy → project
 * response headers. Every deny is an {@link AuthError}; anything else that
 * escapes is a bug and becomes a 500 at the HTTP layer.
 *
 * @module src/validator
 */

import { extractCredential } from "./auth/credential.ts";
import { type AuthError, PolicyMismatchError } from "./auth/errors.ts";
import type { TokenVerifier } from "./auth/token-verifier.ts";
import type { Logger } from "./logger.ts";
import { silentLogger } from "./logger.ts";
import {
  otelValidationEvents,
  type ValidationEventRecorder,
} from "./observability/otel.ts";
import type { PolicyDecision, PolicyEvaluator } from "./policy/evaluator.ts";
import { buildHeaderMap, projectHeaders } from "./policy/headers.ts";
import { parsePolicy } from "./policy/policy.ts";

export type ValidationOutcome =
  | { allowed: true; headers: Record<string, string> }
  | { allowed: false; error: AuthError };

export interface RequestValidatorOptions {
  verifier: TokenVerifier;
  evaluator: PolicyEvaluator;
  /** Header → claim pairs projected on every allowed request. */
  staticHeaders?: Readonly<Record<string, string>>;
  logger?: Logger;
  /** Defaults to OpenTelemetry spans behind `OTEL_ENABLED`. */
  recordEvent?: ValidationEventRecorder;
}

function mismatchMessage(
  decision: Extract<PolicyDecision, { accepted: false }>,
): string {
  switch (decision.reason) {
    case "empty_policy":
      return "No claims requirements set";
    case "absent":
      return `Claim ${decision.claim} is missing`;
    case "unsupported_shape":
      return `Claim ${decision.claim} is not a string or list of strings`;
    case "empty_sequence":
      return `Claim ${decision.claim} is an empty list`;
    case "no_match":
      return `Claim ${decision.claim} did not match any required value`;
  }
}

export class RequestValidator {
  private readonly verifier: TokenVerifier;
  private readonly evaluator: PolicyEvaluator;
  private readonly staticHeaders: Readonly<Record<string, string>>;
  private readonly logger: Logger;
  private readonly recordEvent: ValidationEventRecorder;

  constructor(options: RequestValidatorOptions) {
    this.verifier = options.verifier;
    this.evaluator = options.evaluator;
    this.staticHeaders = options.staticHeaders ?? {};
    this.logger = options.logger ?? silentLogger;
    this.recordEvent = options.recordEvent ?? otelValidationEvents;
  }

  async validate(request: Request): Promise<ValidationOutcome> {
    const outcome = await this.run(request);
    if (outcome.allowed) {
      this.recordEvent("allow", {});
    } else {
      this.recordEvent("deny", { "auth.error": outcome.error.code });
    }
    return outcome;
  }

  private async run(request: Request): Promise<ValidationOutcome> {
    const extracted = extractCredential(request);
    if (!extracted.ok) {
      this.logger.debug("Failed to extract credential", {
        error: extracted.error,
      });
      return { allowed: false, error: extracted.error };
    }

    const verified = await this.verifier.verify(extracted.credential);
    if (!verified.ok) {
      this.logger.debug("Failed to verify token", {
        source: extracted.source,
        error: verified.error,
      });
      return { allowed: false, error: verified.error };
    }

    const query = new URL(request.url).searchParams;
    const decision = this.evaluator.evaluate(verified.claims, parsePolicy(query));
    if (!decision.accepted) {
      return {
        allowed: false,
        error: new PolicyMismatchError(decision.claim, mismatchMessage(decision)),
      };
    }

    const headerMap = buildHeaderMap(query, this.staticHeaders);
    return {
      allowed: true,
      headers: projectHeaders(verified.claims, headerMap, this.logger),
    };
  }
}
