/**
 * Service configuration loader.
 *
 * Loads config from a YAML file with env var overrides, then validates and
 * fills defaults with ajv. Priority: env vars > YAML > defaults.
 *
 * @module src/config
 */

import Ajv from "ajv";
import { parse as parseYaml } from "yaml";
import { ConfigurationError } from "./auth/errors.ts";
import { LOG_LEVELS, type LogLevel } from "./logger.ts";
import type { EmptyPolicyBehavior } from "./policy/evaluator.ts";
import type { RegExpMatchMode } from "./policy/pattern-cache.ts";
import { env as processEnv, readTextFile } from "./runtime/runtime.ts";
import type { EnvFn, ReadTextFileFn } from "./runtime/types.ts";

export const DEFAULT_CONFIG_PATH = "jwt-subrequest-auth.yaml";

/**
 * Parsed service configuration (after YAML + env merge and defaults).
 */
export interface ServiceConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  jwks: {
    /** PEM file with an EC public key. Wins over `url`. */
    path?: string;
    url?: string;
    refreshIntervalMs: number;
    fetchTimeoutMs: number;
    insecureSkipVerify: boolean;
  };
  token: {
    clockToleranceSeconds: number;
  };
  policy: {
    regexpMatch: RegExpMatchMode;
    emptyPolicy: EmptyPolicyBehavior;
  };
  /** Static response header name → claim name. */
  headers: Record<string, string>;
}

const CONFIG_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    port: { type: "integer", minimum: 0, maximum: 65535, default: 8080 },
    host: { type: "string", minLength: 1, default: "0.0.0.0" },
    logLevel: { enum: [...LOG_LEVELS], default: "info" },
    jwks: {
      type: "object",
      additionalProperties: false,
      default: {},
      properties: {
        path: { type: "string", minLength: 1 },
        url: { type: "string", minLength: 1 },
        refreshIntervalMs: { type: "integer", minimum: 0, default: 3_600_000 },
        fetchTimeoutMs: { type: "integer", minimum: 1, default: 10_000 },
        insecureSkipVerify: { type: "boolean", default: false },
      },
    },
    token: {
      type: "object",
      additionalProperties: false,
      default: {},
      properties: {
        clockToleranceSeconds: { type: "number", minimum: 0, default: 0 },
      },
    },
    policy: {
      type: "object",
      additionalProperties: false,
      default: {},
      properties: {
        regexpMatch: { enum: ["search", "full"], default: "search" },
        emptyPolicy: { enum: ["allow", "deny"], default: "allow" },
      },
    },
    headers: {
      type: "object",
      additionalProperties: { type: "string", minLength: 1 },
      default: {},
    },
  },
};

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  useDefaults: true,
  coerceTypes: true,
});
const validateConfig = ajv.compile<ServiceConfig>(CONFIG_SCHEMA);

/**
 * Env var → config path. Empty values count as unset.
 */
const ENV_MAPPING: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["PORT", ["port"]],
  ["HOST", ["host"]],
  ["LOG_LEVEL", ["logLevel"]],
  ["JWKS_PATH", ["jwks", "path"]],
  ["JWKS_URL", ["jwks", "url"]],
  ["JWKS_REFRESH_INTERVAL_MS", ["jwks", "refreshIntervalMs"]],
  ["JWKS_FETCH_TIMEOUT_MS", ["jwks", "fetchTimeoutMs"]],
  ["INSECURE_SKIP_VERIFY", ["jwks", "insecureSkipVerify"]],
  ["CLOCK_TOLERANCE_SECONDS", ["token", "clockToleranceSeconds"]],
  ["REGEXP_MATCH", ["policy", "regexpMatch"]],
  ["EMPTY_POLICY", ["policy", "emptyPolicy"]],
];

export interface LoadConfigOptions {
  /** YAML file. Defaults to CONFIG_PATH, then {@link DEFAULT_CONFIG_PATH}. */
  configPath?: string;
  env?: EnvFn;
  readTextFile?: ReadTextFileFn;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse `h1=claim1,h2=claim2` into a header → claim map.
 */
export function parseHeaderList(value: string): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const entry of value.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) continue;
    const eq = trimmed.indexOf("=");
    const header = eq > 0 ? trimmed.slice(0, eq).trim() : "";
    const claim = eq > 0 ? trimmed.slice(eq + 1).trim() : "";
    if (!header || !claim) {
      throw new ConfigurationError(
        `[Config] Invalid RESPONSE_HEADERS entry "${trimmed}". ` +
          'Expected "header=claim".',
      );
    }
    headers[header] = claim;
  }
  return headers;
}

/**
 * Load service configuration from YAML file + env var overrides.
 *
 * 1. Reads YAML file (a missing default file is not an error)
 * 2. Overlays env vars
 * 3. Validates the merged config and fills defaults
 *
 * Env var mapping:
 * - PORT → port, HOST → host, LOG_LEVEL → logLevel
 * - JWKS_PATH, JWKS_URL, JWKS_REFRESH_INTERVAL_MS, JWKS_FETCH_TIMEOUT_MS,
 *   INSECURE_SKIP_VERIFY → jwks.*
 * - CLOCK_TOLERANCE_SECONDS → token.clockToleranceSeconds
 * - REGEXP_MATCH, EMPTY_POLICY → policy.*
 * - RESPONSE_HEADERS (`h1=claim1,h2=claim2`) → headers (replaces YAML)
 *
 * @throws ConfigurationError if config is invalid (fail-fast)
 */
export async function loadConfig(
  options: LoadConfigOptions = {},
): Promise<ServiceConfig> {
  const env = options.env ?? processEnv;
  const read = options.readTextFile ?? readTextFile;
  const get = (key: string) => {
    const value = env(key);
    return value === undefined || value === "" ? undefined : value;
  };

  const explicitPath = options.configPath ?? get("CONFIG_PATH");
  const raw = await loadYaml(explicitPath ?? DEFAULT_CONFIG_PATH, read, {
    required: explicitPath !== undefined,
  });

  for (const [key, path] of ENV_MAPPING) {
    const value = get(key);
    if (value === undefined) continue;
    setPath(raw, path, key === "LOG_LEVEL" ? value.toLowerCase() : value);
  }
  const responseHeaders = get("RESPONSE_HEADERS");
  if (responseHeaders !== undefined) {
    raw["headers"] = parseHeaderList(responseHeaders);
  }

  if (!validateConfig(raw)) {
    throw new ConfigurationError(
      `[Config] Invalid configuration: ${
        ajv.errorsText(validateConfig.errors, { dataVar: "config" })
      }`,
    );
  }
  return raw;
}

/**
 * Load a YAML config file as a plain object.
 * A missing file yields `{}` unless it was asked for explicitly.
 */
async function loadYaml(
  path: string,
  read: ReadTextFileFn,
  { required }: { required: boolean },
): Promise<Record<string, unknown>> {
  let text: string | null;
  try {
    text = await read(path);
  } catch (err) {
    throw new ConfigurationError(`[Config] Unable to read ${path}`, {
      cause: err,
    });
  }
  if (text === null) {
    if (required) {
      throw new ConfigurationError(`[Config] Config file not found: ${path}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (err) {
    throw new ConfigurationError(`[Config] Invalid YAML in ${path}`, {
      cause: err,
    });
  }

  // An empty document parses to null
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError(
      `[Config] ${path} must contain a mapping at the top level`,
    );
  }
  return parsed;
}

/**
 * Set a nested value, creating intermediate objects. A non-object already
 * in the way is left for validation to report.
 */
function setPath(
  target: Record<string, unknown>,
  path: readonly string[],
  value: string,
): void {
  const [head, ...rest] = path;
  if (head === undefined) return;
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const existing = target[head];
  if (existing === undefined) {
    const child: Record<string, unknown> = {};
    target[head] = child;
    setPath(child, rest, value);
  } else if (isRecord(existing)) {
    setPath(existing, rest, value);
  }
}
