/**
 * Tests for the static and remote key sources.
 *
 * @module src/auth/key-resolver_test
 */

import { generateKeyPairSync } from "node:crypto";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, before, test } from "node:test";
import assert from "node:assert/strict";
import { errors, type FlattenedJWSInput } from "jose";
import { ServiceMetrics } from "../observability/metrics.ts";
import { ConfigurationError, KeyResolutionError } from "./errors.ts";
import { createKeyResolver } from "./key-source.ts";
import {
  DEFAULT_FETCH_TIMEOUT_MS,
  INSECURE_AGENT,
  RemoteKeyResolver,
  remoteJwksOptions,
} from "./remote-key-resolver.ts";
import { StaticKeyResolver } from "./static-key-resolver.ts";
import {
  createTestSigner,
  startJwksServer,
  type TestSigner,
} from "./test-keys.ts";

const TOKEN: FlattenedJWSInput = { payload: "", signature: "" };

let dir = "";
let p256: TestSigner;
let rotated: TestSigner;

before(async () => {
  dir = await mkdtemp(join(tmpdir(), "jwt-subrequest-auth-keys-"));
  p256 = await createTestSigner("ES256", "k1");
  rotated = await createTestSigner("ES256", "k2");
});

after(async () => {
  await rm(dir, { recursive: true, force: true });
});

function ecPem(namedCurve: string): string {
  return generateKeyPairSync("ec", {
    namedCurve,
    publicKeyEncoding: { type: "spki", format: "pem" },
    privateKeyEncoding: { type: "pkcs8", format: "pem" },
  }).publicKey;
}

// ============================================
// StaticKeyResolver
// ============================================

test("StaticKeyResolver - derives the algorithm from the curve", () => {
  assert.deepEqual(StaticKeyResolver.fromPem(ecPem("prime256v1")).algorithms, [
    "ES256",
  ]);
  assert.equal(StaticKeyResolver.fromPem(ecPem("secp384r1")).algorithm, "ES384");
  assert.equal(StaticKeyResolver.fromPem(ecPem("secp521r1")).algorithm, "ES512");
});

test("StaticKeyResolver - ignores text around the PEM block", () => {
  const resolver = StaticKeyResolver.fromPem(`# issuer key\n${p256.pem}\n`);
  assert.equal(resolver.mode, "static");
  assert.equal(resolver.algorithm, "ES256");
});

test("StaticKeyResolver - rejects non-EC keys", () => {
  const { publicKey } = generateKeyPairSync("rsa", {
    modulusLength: 2048,
    publicKeyEncoding: { type: "spki", format: "pem" },
    privateKeyEncoding: { type: "pkcs8", format: "pem" },
  });
  assert.throws(
    () => StaticKeyResolver.fromPem(publicKey),
    (err: unknown) =>
      err instanceof ConfigurationError &&
      err.message === "Given key is not an EC public key (got rsa)",
  );
});

test("StaticKeyResolver - rejects text without a PEM block", () => {
  assert.throws(
    () => StaticKeyResolver.fromPem("not a key"),
    (err: unknown) =>
      err instanceof ConfigurationError &&
      err.message === "No PEM block containing a public key found",
  );
});

test("StaticKeyResolver - rejects a corrupt PEM block", () => {
  const corrupt = "-----BEGIN PUBLIC KEY-----\nAAAA\n-----END PUBLIC KEY-----\n";
  assert.throws(
    () => StaticKeyResolver.fromPem(corrupt),
    (err: unknown) =>
      err instanceof ConfigurationError &&
      err.message === "Failed to parse public key",
  );
});

test("StaticKeyResolver - fromFile reads a PEM file", async () => {
  const path = join(dir, "ec.pem");
  await writeFile(path, p256.pem);
  const resolver = await StaticKeyResolver.fromFile(path);
  assert.equal(resolver.algorithm, "ES256");
});

test("StaticKeyResolver - fromFile fails on a missing file", async () => {
  const path = join(dir, "missing.pem");
  await assert.rejects(
    StaticKeyResolver.fromFile(path),
    (err: unknown) =>
      err instanceof ConfigurationError &&
      err.message ===
        `Couldn't read EC public key from file ${path}: file not found`,
  );
});

test("StaticKeyResolver - fromFile wraps read errors", async () => {
  await assert.rejects(
    StaticKeyResolver.fromFile("/keys/ec.pem", () =>
      Promise.reject(new Error("EACCES"))),
    (err: unknown) =>
      err instanceof ConfigurationError &&
      err.message === "Couldn't read EC public key from file /keys/ec.pem",
  );
});

// ============================================
// RemoteKeyResolver
// ============================================

test("RemoteKeyResolver - resolves keys by kid", async () => {
  const server = await startJwksServer(p256.jwks);
  try {
    const resolver = await RemoteKeyResolver.create({
      url: server.url,
      refreshIntervalMs: 0,
    });

    const key = await resolver.resolve({ alg: "ES256", kid: "k1" }, TOKEN);
    assert.equal(key.type, "public");
    assert.equal(server.requests, 1);
    assert.deepEqual(resolver.current()?.kids, ["k1"]);
  } finally {
    await server.shutdown();
  }
});

test("RemoteKeyResolver - unknown kid is a KeyResolutionError", async () => {
  const server = await startJwksServer(p256.jwks);
  try {
    const resolver = await RemoteKeyResolver.create({
      url: server.url,
      refreshIntervalMs: 0,
    });

    await assert.rejects(
      resolver.resolve({ alg: "ES256", kid: "nope" }, TOKEN),
      (err: unknown) =>
        err instanceof KeyResolutionError && err.code === "key_not_found",
    );
  } finally {
    await server.shutdown();
  }
});

test("RemoteKeyResolver - non-200 status at startup is a ConfigurationError", async () => {
  const server = await startJwksServer(p256.jwks);
  server.respond(503, "unavailable");
  try {
    await assert.rejects(
      RemoteKeyResolver.create({ url: server.url, refreshIntervalMs: 0 }),
      (err: unknown) =>
        err instanceof ConfigurationError &&
        err.message ===
          `Failed to create JWKS from resource at the given URL ${server.url.href}`,
    );
    assert.equal(server.requests, 1);
  } finally {
    await server.shutdown();
  }
});

test("RemoteKeyResolver - fetch timeout at startup is a ConfigurationError", async () => {
  const server = await startJwksServer(p256.jwks);
  server.stall();
  try {
    await assert.rejects(
      RemoteKeyResolver.create({
        url: server.url,
        fetchTimeoutMs: 50,
        refreshIntervalMs: 0,
      }),
      (err: unknown) =>
        err instanceof ConfigurationError &&
        err.cause instanceof errors.JWKSTimeout,
    );
  } finally {
    await server.shutdown();
  }
});

test("RemoteKeyResolver - body that is not JSON is rejected at startup", async () => {
  const server = await startJwksServer(p256.jwks);
  server.respond(200, "<html>not a key set</html>");
  try {
    await assert.rejects(
      RemoteKeyResolver.create({ url: server.url, refreshIntervalMs: 0 }),
      ConfigurationError,
    );
  } finally {
    await server.shutdown();
  }
});

test("RemoteKeyResolver - malformed JWKS document is rejected at startup", async () => {
  const server = await startJwksServer(p256.jwks);
  try {
    for (const document of [{}, { keys: "k1" }, { keys: [{ kid: "k1" }] }]) {
      server.publish(document);
      await assert.rejects(
        RemoteKeyResolver.create({ url: server.url, refreshIntervalMs: 0 }),
        ConfigurationError,
      );
    }
  } finally {
    await server.shutdown();
  }
});

test("RemoteKeyResolver - refresh swaps the whole key set", async () => {
  const server = await startJwksServer(p256.jwks);
  try {
    const resolver = await RemoteKeyResolver.create({
      url: server.url,
      refreshIntervalMs: 0,
    });

    server.publish(rotated.jwks);
    assert.equal(await resolver.refresh(), true);
    assert.deepEqual(resolver.current()?.kids, ["k2"]);
    await resolver.resolve({ alg: "ES256", kid: "k2" }, TOKEN);
    await assert.rejects(
      resolver.resolve({ alg: "ES256", kid: "k1" }, TOKEN),
      KeyResolutionError,
    );
  } finally {
    await server.shutdown();
  }
});

test("RemoteKeyResolver - failed refresh keeps the previous keys", async () => {
  const metrics = new ServiceMetrics();
  const server = await startJwksServer(p256.jwks);
  try {
    const resolver = await RemoteKeyResolver.create({
      url: server.url,
      metrics,
      refreshIntervalMs: 0,
    });

    server.respond(500, "");
    assert.equal(await resolver.refresh(), false);
    server.respond(200, "{");
    assert.equal(await resolver.refresh(), false);

    await resolver.resolve({ alg: "ES256", kid: "k1" }, TOKEN);
    assert.deepEqual(resolver.current()?.kids, ["k1"]);
    assert.deepEqual(metrics.getSnapshot().key_refresh, { success: 1, failed: 2 });
  } finally {
    await server.shutdown();
  }
});

test("RemoteKeyResolver - concurrent refreshes share one fetch", async () => {
  const server = await startJwksServer(p256.jwks);
  try {
    const resolver = await RemoteKeyResolver.create({
      url: server.url,
      refreshIntervalMs: 0,
    });

    const results = await Promise.all([resolver.refresh(), resolver.refresh()]);
    assert.deepEqual(results, [true, true]);
    assert.equal(server.requests, 2);
  } finally {
    await server.shutdown();
  }
});

test("RemoteKeyResolver - start schedules an unref'd timer and close clears it", async () => {
  const server = await startJwksServer(p256.jwks);
  try {
    let unrefCalls = 0;
    const resolver = await RemoteKeyResolver.create({
      url: server.url,
      refreshIntervalMs: 60_000,
      unref: (timer) => {
        unrefCalls++;
        timer.unref();
      },
    });

    resolver.start();
    assert.equal(unrefCalls, 1);
    resolver.close();
    resolver.close();
  } finally {
    await server.shutdown();
  }
});

// ============================================
// remoteJwksOptions
// ============================================

test("remoteJwksOptions - TLS bypass passes the insecure agent for https", () => {
  const options = remoteJwksOptions(new URL("https://issuer.test/jwks"), {
    insecureSkipVerify: true,
    fetchTimeoutMs: 2_500,
  });
  assert.equal(options.agent, INSECURE_AGENT);
  assert.equal(INSECURE_AGENT.options.rejectUnauthorized, false);
  assert.equal(options.timeoutDuration, 2_500);
  assert.equal(options.cacheMaxAge, Infinity);
});

test("remoteJwksOptions - default agent unless TLS bypass applies", () => {
  const https = new URL("https://issuer.test/jwks");
  assert.equal(remoteJwksOptions(https).agent, undefined);
  assert.equal(remoteJwksOptions(https).timeoutDuration, DEFAULT_FETCH_TIMEOUT_MS);
  assert.equal(
    remoteJwksOptions(new URL("http://issuer.test/jwks"), {
      insecureSkipVerify: true,
    }).agent,
    undefined,
  );
});

test("RemoteKeyResolver - TLS bypass still fetches over plain http", async () => {
  const server = await startJwksServer(p256.jwks);
  try {
    const resolver = await RemoteKeyResolver.create({
      url: server.url,
      insecureSkipVerify: true,
      refreshIntervalMs: 0,
    });
    assert.deepEqual(resolver.current()?.kids, ["k1"]);
  } finally {
    await server.shutdown();
  }
});

// ============================================
// createKeyResolver
// ============================================

test("createKeyResolver - file path wins over URL", async () => {
  const server = await startJwksServer(p256.jwks);
  try {
    const resolver = await createKeyResolver(
      { path: "/keys/ec.pem", url: server.url.href },
      { readTextFile: () => Promise.resolve(p256.pem) },
    );
    assert.equal(resolver.mode, "static");
    assert.equal(server.requests, 0);
  } finally {
    await server.shutdown();
  }
});

test("createKeyResolver - uses the URL when no path is set", async () => {
  const server = await startJwksServer(p256.jwks);
  try {
    const resolver = await createKeyResolver({
      url: server.url.href,
      refreshIntervalMs: 0,
    });
    assert.equal(resolver.mode, "remote");
    assert.equal(server.requests, 1);
    resolver.close();
  } finally {
    await server.shutdown();
  }
});

test("createKeyResolver - fails without any key source", async () => {
  await assert.rejects(
    createKeyResolver({}),
    (err: unknown) =>
      err instanceof ConfigurationError &&
      err.message ===
        "Either JWKS_PATH or JWKS_URL must be set to obtain the public key",
  );
});

test("createKeyResolver - fails on an unparseable URL", async () => {
  await assert.rejects(
    createKeyResolver({ url: "not a url" }),
    (err: unknown) =>
      err instanceof ConfigurationError &&
      err.message === "Invalid JWKS URL: not a url",
  );
});
