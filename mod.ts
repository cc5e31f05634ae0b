/**
 * JWT subrequest authentication service
 *
 * Answers nginx `auth_request` subrequests: verifies the Bearer (or cookie)
 * token against a static EC key or a refreshed JWKS, checks its claims
 * against `claims_*` query parameters and projects claims into response
 * headers.
 *
 * @example
 * ```typescript
 * import { loadConfig, startService, createLogger } from "jwt-subrequest-auth";
 *
 * const config = await loadConfig();
 * const service = await startService(config, createLogger(config.logLevel));
 * // ...
 * await service.shutdown();
 * ```
 *
 * nginx:
 * ```nginx
 * location = /_auth {
 *   internal;
 *   proxy_pass http://127.0.0.1:8080/validate?claims_group=developers&headers_x-user=sub;
 *   proxy_pass_request_body off;
 * }
 * ```
 *
 * @module jwt-subrequest-auth
 */

export * from "./src/auth/mod.ts";
export * from "./src/policy/mod.ts";
export * from "./src/observability/mod.ts";

export {
  DEFAULT_CONFIG_PATH,
  loadConfig,
  type LoadConfigOptions,
  parseHeaderList,
  type ServiceConfig,
} from "./src/config.ts";
export {
  consoleSink,
  createLogger,
  formatLogLine,
  isLogLevel,
  LOG_LEVELS,
  type LogFields,
  type Logger,
  type LogLevel,
  type LogSink,
  silentLogger,
  silentSink,
} from "./src/logger.ts";
export {
  RequestValidator,
  type RequestValidatorOptions,
  type ValidationOutcome,
} from "./src/validator.ts";
export { type AppOptions, createApp, type Validator } from "./src/http-server.ts";
export { type RunningService, startService } from "./src/service.ts";
