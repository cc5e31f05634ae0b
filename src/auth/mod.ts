/**
 * Token authentication: credential extraction, key sources and JWS
 * verification.
 *
 * @module src/auth
 */

export {
  AuthError,
  type AuthErrorCode,
  ClaimStructureError,
  ConfigurationError,
  ExtractionError,
  KeyResolutionError,
  PatternCompileError,
  PolicyMismatchError,
  SignatureError,
  TokenParseError,
} from "./errors.ts";

export {
  type CredentialSource,
  extractBearerToken,
  extractCredential,
  type ExtractionResult,
} from "./credential.ts";

export { keyIds, parseJwks } from "./jwks.ts";
export { KeyResolver, type KeySourceMode } from "./key-resolver.ts";
export { StaticKeyResolver } from "./static-key-resolver.ts";
export {
  DEFAULT_REFRESH_INTERVAL_MS,
  REMOTE_ALGORITHMS,
  RemoteKeyResolver,
  type RemoteKeyResolverOptions,
} from "./remote-key-resolver.ts";
export {
  createKeyResolver,
  type KeySourceConfig,
  type KeySourceDeps,
} from "./key-source.ts";
export {
  toAuthError,
  TokenVerifier,
  type TokenVerifierOptions,
  type VerifyResult,
} from "./token-verifier.ts";
