/**
 * Tests for credential extraction.
 *
 * @module src/auth/credential_test
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { extractBearerToken, extractCredential } from "./credential.ts";
import { ExtractionError } from "./errors.ts";

function request(path: string, headers: Record<string, string> = {}): Request {
  return new Request(`http://auth.local${path}`, { headers });
}

function failureMessage(req: Request): string {
  const result = extractCredential(req);
  assert.equal(result.ok, false);
  if (result.ok) return "";
  assert.ok(result.error instanceof ExtractionError);
  assert.equal(result.error.code, "extraction_failed");
  return result.error.message;
}

// ============================================
// extractBearerToken
// ============================================

test("extractBearerToken - returns the token", () => {
  assert.equal(extractBearerToken("Bearer abc.def.ghi"), "abc.def.ghi");
});

test("extractBearerToken - scheme is case-insensitive and token is trimmed", () => {
  assert.equal(extractBearerToken("bearer   abc  "), "abc");
  assert.equal(extractBearerToken("BEARER abc"), "abc");
});

test("extractBearerToken - rejects other schemes and empty tokens", () => {
  assert.equal(extractBearerToken("Basic dTE6cHc="), null);
  assert.equal(extractBearerToken("Bearer"), null);
  assert.equal(extractBearerToken("Bearer    "), null);
  assert.equal(extractBearerToken(""), null);
  assert.equal(extractBearerToken(null), null);
});

// ============================================
// extractCredential - header mode
// ============================================

test("extractCredential - reads the Authorization header", () => {
  const result = extractCredential(
    request("/validate", { authorization: "Bearer tok" }),
  );
  assert.deepEqual(result, { ok: true, credential: "tok", source: "header" });
});

test("extractCredential - missing Authorization header fails", () => {
  assert.equal(
    failureMessage(request("/validate")),
    "Authorization header not found in request",
  );
});

test("extractCredential - non-Bearer Authorization header fails", () => {
  assert.equal(
    failureMessage(request("/validate", { authorization: "Basic dTE6cHc=" })),
    "Authorization header is not a Bearer token",
  );
});

test("extractCredential - empty cookie parameter falls back to the header", () => {
  const result = extractCredential(
    request("/validate?cookie=", { authorization: "Bearer tok" }),
  );
  assert.deepEqual(result, { ok: true, credential: "tok", source: "header" });
});

// ============================================
// extractCredential - cookie mode
// ============================================

test("extractCredential - reads the named cookie", () => {
  const result = extractCredential(
    request("/validate?cookie=session", { cookie: "theme=dark; session=tok" }),
  );
  assert.deepEqual(result, { ok: true, credential: "tok", source: "cookie" });
});

test("extractCredential - missing cookie fails even with a Bearer header", () => {
  const req = request("/validate?cookie=session", {
    cookie: "theme=dark",
    authorization: "Bearer tok",
  });
  assert.equal(failureMessage(req), "Cookie session not found in request");
});

test("extractCredential - no Cookie header at all fails", () => {
  assert.equal(
    failureMessage(request("/validate?cookie=session")),
    "Cookie session not found in request",
  );
});
