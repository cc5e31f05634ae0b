/**
 * Runtime adapter: Node.js implementation
 *
 * @see ./types.ts for the port contract
 * @module src/runtime/runtime
 */

import { readFile } from "node:fs/promises";
import { createServer } from "node:http";
import type {
  FetchHandler,
  RuntimePort,
  ServeHandle,
  ServeOptions,
  Timer,
} from "./types.ts";

// Re-export types so consumers import from a single module
export type {
  EnvFn,
  FetchHandler,
  ReadTextFileFn,
  ServeHandle,
  ServeOptions,
  Timer,
} from "./types.ts";

/**
 * Get an environment variable.
 */
export function env(key: string): string | undefined {
  return process.env[key];
}

/**
 * Read a UTF-8 text file.
 * Returns null if the file does not exist.
 */
export async function readTextFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (
      err && typeof err === "object" && "code" in err && err.code === "ENOENT"
    ) {
      return null;
    }
    throw err;
  }
}

/**
 * Start an HTTP server with a fetch-style handler.
 * Uses node:http with a Request/Response adapter (compatible with Hono).
 *
 * Request bodies are never read: the service only answers GET/HEAD, and
 * node:http discards an unread body once the response ends.
 */
export function serve(
  options: ServeOptions,
  handler: FetchHandler,
): ServeHandle {
  const hostname = options.hostname ?? "0.0.0.0";

  const server = createServer(async (nodeReq, nodeRes) => {
    try {
      // Prefer Host header (correct behind reverse proxy) over bound hostname
      const host = nodeReq.headers.host ?? `${hostname}:${options.port}`;
      const url = `http://${host}${nodeReq.url ?? "/"}`;
      const headers = new Headers();
      for (const [key, value] of Object.entries(nodeReq.headers)) {
        if (value) {
          if (Array.isArray(value)) {
            for (const v of value) headers.append(key, v);
          } else {
            headers.set(key, value);
          }
        }
      }

      const request = new Request(url, {
        method: nodeReq.method ?? "GET",
        headers,
      });

      const response = await handler(request);

      // Use raw header entries to preserve repeated headers
      const resHeaders: Record<string, string | string[]> = {};
      response.headers.forEach((value, key) => {
        const existing = resHeaders[key];
        if (existing !== undefined) {
          resHeaders[key] = Array.isArray(existing)
            ? [...existing, value]
            : [existing, value];
        } else {
          resHeaders[key] = value;
        }
      });
      nodeRes.writeHead(response.status, resHeaders);

      if (response.body) {
        const reader = response.body.getReader();
        while (true) {
          const { done, value } = await reader.read();
          if (done) break;
          nodeRes.write(value);
        }
      }
      nodeRes.end();
    } catch (err) {
      console.error("[runtime] Request handler error:", err);
      if (!nodeRes.headersSent) {
        nodeRes.writeHead(500);
      }
      nodeRes.end();
    }
  });

  server.listen(options.port, hostname, () => {
    if (options.onListen) {
      options.onListen({ hostname, port: options.port });
    }
  });

  return {
    shutdown: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/**
 * Unref a timer so it doesn't block process exit.
 */
export function unrefTimer(timer: Timer): void {
  timer.unref();
}

/** Compile-time check against RuntimePort */
void ({ env, readTextFile, serve, unrefTimer } satisfies RuntimePort);
