/**
 * Credential Extractor
 *
 * Pulls the raw token out of a /validate request: from the cookie named by
 * the `cookie` query parameter when present, otherwise from the
 * `Authorization: Bearer` header.
 *
 * @module src/auth/credential
 */

import { parse as parseCookies } from "hono/utils/cookie";
import { ExtractionError } from "./errors.ts";

export type CredentialSource = "header" | "cookie";

export type ExtractionResult =
  | { ok: true; credential: string; source: CredentialSource }
  | { ok: false; error: ExtractionError };

/**
 * Extract Bearer token from Authorization header value.
 *
 * @returns Token string or null if not a Bearer token
 */
export function extractBearerToken(authHeader: string | null): string | null {
  if (!authHeader) return null;
  const match = /^Bearer\s+(.+)$/i.exec(authHeader.trim());
  const token = match?.[1]?.trim();
  return token ? token : null;
}

export function extractCredential(request: Request): ExtractionResult {
  const cookieName = new URL(request.url).searchParams.get("cookie");

  if (cookieName) {
    const value = parseCookies(request.headers.get("cookie") ?? "", cookieName)[
      cookieName
    ];
    if (!value) {
      return {
        ok: false,
        error: new ExtractionError(`Cookie ${cookieName} not found in request`),
      };
    }
    return { ok: true, credential: value, source: "cookie" };
  }

  const authorization = request.headers.get("authorization");
  if (!authorization) {
    return {
      ok: false,
      error: new ExtractionError("Authorization header not found in request"),
    };
  }
  const token = extractBearerToken(authorization);
  if (!token) {
    return {
      ok: false,
      error: new ExtractionError("Authorization header is not a Bearer token"),
    };
  }
  return { ok: true, credential: token, source: "header" };
}
