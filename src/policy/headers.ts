/**
 * Response Header Projector
 *
 * Surfaces claims of a validated token as response headers so the proxy can
 * forward them upstream. Values are base64 encoded: strings as their UTF-8
 * bytes, everything else as compact JSON.
 *
 * @module src/policy/headers
 */

import type { Logger } from "../logger.ts";
import { silentLogger } from "../logger.ts";
import { type ClaimSet, type ClaimValue, getClaim } from "./claims.ts";

export const HEADERS_PREFIX = "headers_";

/** Output header name to claim name. */
export type HeaderMap = ReadonlyMap<string, string>;

// RFC 9110 token characters
const HEADER_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Merge the statically configured mapping with `headers_<name>=<claim>`
 * query parameters. Header names are case-insensitive and keyed in lower
 * case. Query entries win over static ones; among query parameters naming
 * the same header, the first one wins.
 */
export function buildHeaderMap(
  query: URLSearchParams,
  staticHeaders: Readonly<Record<string, string>> = {},
): HeaderMap {
  const map = new Map<string, string>();
  for (const [header, claim] of Object.entries(staticHeaders)) {
    map.set(header.toLowerCase(), claim);
  }

  const fromQuery = new Set<string>();
  for (const [key, claim] of query) {
    if (!key.startsWith(HEADERS_PREFIX)) continue;
    const header = key.slice(HEADERS_PREFIX.length).toLowerCase();
    if (fromQuery.has(header)) continue;
    fromQuery.add(header);
    map.set(header, claim);
  }
  return map;
}

function toBase64(text: string): string {
  return Buffer.from(text, "utf-8").toString("base64");
}

/**
 * Encode a claim value for a header, or null when it cannot be encoded.
 */
export function encodeClaim(value: ClaimValue): string | null {
  switch (value.kind) {
    case "absent":
      return null;
    case "scalar":
      return toBase64(value.value);
    case "sequence":
      return toBase64(JSON.stringify(value.values));
    case "other": {
      // JSON.stringify returns undefined for values JSON has no form for
      const json: string | undefined = JSON.stringify(value.raw);
      return json === undefined ? null : toBase64(json);
    }
  }
}

export function projectHeaders(
  claims: ClaimSet,
  headerMap: HeaderMap,
  logger: Logger = silentLogger,
): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const [header, claimName] of headerMap) {
    if (!HEADER_NAME.test(header)) {
      logger.warn("Skipping invalid response header name", { header });
      continue;
    }

    const value = getClaim(claims, claimName);
    if (value.kind === "absent") continue;

    let encoded: string | null;
    try {
      encoded = encodeClaim(value);
    } catch (err) {
      logger.warn("Failed to serialize claim for response header", {
        header,
        claim: claimName,
        err,
      });
      continue;
    }
    if (encoded === null) continue;

    logger.debug("add response header", { header, claim: claimName });
    headers[header] = encoded;
  }

  return headers;
}
