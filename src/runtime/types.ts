/**
 * Runtime Port: host contract
 *
 * The handful of host services the rest of the code reaches for, kept
 * behind one port so tests can swap any of them out.
 *
 * @module src/runtime/types
 */

// ─── Environment ─────────────────────────────────────────

/**
 * Get an environment variable.
 * Returns undefined if not set (never throws).
 */
export type EnvFn = (key: string) => string | undefined;

// ─── File System ─────────────────────────────────────────

/**
 * Read a UTF-8 text file.
 * Returns null if the file does not exist (no throw on ENOENT).
 * Throws on other errors (permission denied, etc.).
 */
export type ReadTextFileFn = (path: string) => Promise<string | null>;

// ─── HTTP Server ─────────────────────────────────────────

/** Fetch-style request handler (Web standard) */
export type FetchHandler = (req: Request) => Response | Promise<Response>;

/** Options for starting an HTTP server */
export interface ServeOptions {
  port: number;
  hostname?: string;
  onListen?: (info: { hostname: string; port: number }) => void;
}

/** Handle returned by serve(), used to shut down the server */
export interface ServeHandle {
  shutdown(): Promise<void>;
}

export type ServeFn = (
  options: ServeOptions,
  handler: FetchHandler,
) => ServeHandle;

// ─── Timers ──────────────────────────────────────────────

export type Timer = ReturnType<typeof setInterval>;

/** Unref a timer so it doesn't prevent process exit. */
export type UnrefTimerFn = (timer: Timer) => void;

// ─── Port interface ──────────────────────────────────────

/**
 * Complete runtime port contract. `runtime.ts` checks itself against it
 * with `satisfies RuntimePort`.
 */
export interface RuntimePort {
  env: EnvFn;
  readTextFile: ReadTextFileFn;
  serve: ServeFn;
  unrefTimer: UnrefTimerFn;
}
