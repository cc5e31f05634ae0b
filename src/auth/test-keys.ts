/**
 * Key and token fixtures shared by the auth and HTTP tests.
 *
 * Keys are generated in process for every suite. Remote key sets are served
 * from a loopback HTTP server in the same process.
 *
 * @module src/auth/test-keys
 */

import { createServer } from "node:http";
import {
  CompactSign,
  exportJWK,
  exportSPKI,
  generateKeyPair,
  type JSONWebKeySet,
  type KeyLike,
} from "jose";

export interface TestSigner {
  alg: string;
  kid: string;
  publicKey: KeyLike;
  privateKey: KeyLike;
  /** SPKI PEM of the public key. */
  pem: string;
  /** One-key JWKS publishing the public key under `kid`. */
  jwks: JSONWebKeySet;
  /**
   * Sign `claims` as a compact JWS. The payload is serialized as given,
   * so malformed registered claims can be produced too.
   */
  sign(
    claims: Record<string, unknown>,
    header?: { alg?: string; kid?: string },
  ): Promise<string>;
}

export async function createTestSigner(
  alg = "ES256",
  kid = "test-key-1",
): Promise<TestSigner> {
  const { publicKey, privateKey } = await generateKeyPair(alg);
  const jwk = await exportJWK(publicKey);
  jwk.kid = kid;
  jwk.use = "sig";

  return {
    alg,
    kid,
    publicKey,
    privateKey,
    pem: await exportSPKI(publicKey),
    jwks: { keys: [jwk] },
    sign: (claims, header = {}) =>
      new CompactSign(new TextEncoder().encode(JSON.stringify(claims)))
        .setProtectedHeader({ alg, kid, typ: "JWT", ...header })
        .sign(privateKey),
  };
}

/** Fixed clock for time-claim tests: 2023-11-14T22:13:20Z. */
export const NOW = new Date(1_700_000_000_000);
export const NOW_SECONDS = 1_700_000_000;

/** Loopback JWKS endpoint whose reply can be changed between fetches. */
export interface LocalJwksServer {
  url: URL;
  /** Requests received so far. */
  readonly requests: number;
  /** Reply 200 with `jwks` from now on. */
  publish(jwks: unknown): void;
  /** Reply with `status` and a raw `body` from now on. */
  respond(status: number, body: string): void;
  /** Accept requests and never answer them. */
  stall(): void;
  shutdown(): Promise<void>;
}

export async function startJwksServer(
  jwks: unknown,
): Promise<LocalJwksServer> {
  let reply: { status: number; body: string } | null = {
    status: 200,
    body: JSON.stringify(jwks),
  };
  let requests = 0;

  const server = createServer((_req, res) => {
    requests++;
    if (!reply) return;
    res.writeHead(reply.status, { "content-type": "application/json" });
    res.end(reply.body);
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("JWKS test server is not listening on a TCP port");
  }

  return {
    url: new URL(`http://127.0.0.1:${address.port}/.well-known/jwks.json`),
    get requests() {
      return requests;
    },
    publish: (next) => {
      reply = { status: 200, body: JSON.stringify(next) };
    },
    respond: (status, body) => {
      reply = { status, body };
    },
    stall: () => {
      reply = null;
    },
    shutdown: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
