/**
 * Error taxonomy for the validation pipeline.
 *
 * Every per-request failure is an {@link AuthError} subclass and maps to a
 * 401. {@link ConfigurationError} is the only error allowed to stop the
 * process, and only at startup.
 *
 * @module src/auth/errors
 */

export type AuthErrorCode =
  | "extraction_failed"
  | "key_not_found"
  | "token_malformed"
  | "signature_invalid"
  | "claims_invalid"
  | "policy_mismatch";

/**
 * Base class for deny outcomes. The message is for logs only and never
 * reaches the response.
 */
export class AuthError extends Error {
  constructor(
    public readonly code: AuthErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "AuthError";
  }
}

/** Credential missing from the Authorization header or the named cookie. */
export class ExtractionError extends AuthError {
  constructor(message: string) {
    super("extraction_failed", message);
    this.name = "ExtractionError";
  }
}

/** No verification key matches the token header. */
export class KeyResolutionError extends AuthError {
  constructor(message: string, options?: ErrorOptions) {
    super("key_not_found", message, options);
    this.name = "KeyResolutionError";
  }
}

export class TokenParseError extends AuthError {
  constructor(message: string, options?: ErrorOptions) {
    super("token_malformed", message, options);
    this.name = "TokenParseError";
  }
}

export class SignatureError extends AuthError {
  constructor(message: string, options?: ErrorOptions) {
    super("signature_invalid", message, options);
    this.name = "SignatureError";
  }
}

/** exp / nbf / iat malformed or out of range. */
export class ClaimStructureError extends AuthError {
  constructor(message: string, options?: ErrorOptions) {
    super("claims_invalid", message, options);
    this.name = "ClaimStructureError";
  }
}

export class PolicyMismatchError extends AuthError {
  constructor(
    public readonly claim: string,
    message: string,
  ) {
    super("policy_mismatch", message);
    this.name = "PolicyMismatchError";
  }
}

/**
 * A regex pattern from the query string failed to compile. Treated as a
 * non-match for that one pattern.
 */
export class PatternCompileError extends Error {
  constructor(
    public readonly pattern: string,
    options?: ErrorOptions,
  ) {
    super(`Unable to compile pattern ${JSON.stringify(pattern)}`, options);
    this.name = "PatternCompileError";
  }
}

/** Fatal startup error: no key source, unreadable key file, bad config. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
