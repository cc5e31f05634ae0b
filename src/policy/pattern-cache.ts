/**
 * Pattern Cache
 *
 * Memoizes compiled regular expressions by pattern string so a policy that
 * repeats on every request compiles once per process. Compile failures are
 * memoized too.
 *
 * @module src/policy/pattern-cache
 */

import { PatternCompileError } from "../auth/errors.ts";

/**
 * How a regex pattern has to match a claim value:
 * - `search`: anywhere in the value (unanchored)
 * - `full`: the whole value
 */
export type RegExpMatchMode = "search" | "full";

export type CompiledPattern =
  | { ok: true; regexp: RegExp }
  | { ok: false; error: PatternCompileError };

export interface PatternCacheStats {
  /** Distinct pattern strings held */
  size: number;
  /** Compilations performed (one per distinct pattern) */
  compiles: number;
  /** Lookups answered from the cache */
  hits: number;
}

/**
 * Process-lifetime regex cache. No eviction: the key space is the set of
 * distinct patterns seen, which is small for a given deployment.
 *
 * @example
 * ```typescript
 * const cache = new PatternCache();
 * cache.lookup("^admin"); // compiles "^admin"
 * cache.lookup("^admin"); // same entry, counted as a hit
 * ```
 */
export class PatternCache {
  readonly mode: RegExpMatchMode;
  private entries = new Map<string, CompiledPattern>();
  private compiles = 0;
  private hits = 0;

  constructor(options: { mode?: RegExpMatchMode } = {}) {
    this.mode = options.mode ?? "search";
  }

  /**
   * Return the compiled form of `pattern`, compiling it on first use.
   */
  lookup(pattern: string): CompiledPattern {
    const cached = this.entries.get(pattern);
    if (cached) {
      this.hits++;
      return cached;
    }

    const compiled = this.compile(pattern);
    this.entries.set(pattern, compiled);
    return compiled;
  }

  stats(): PatternCacheStats {
    return {
      size: this.entries.size,
      compiles: this.compiles,
      hits: this.hits,
    };
  }

  private compile(pattern: string): CompiledPattern {
    this.compiles++;
    try {
      // The bare pattern is compiled first even in full mode: wrapping an
      // unbalanced pattern like "a)(b" in a group would make it valid.
      const regexp = new RegExp(pattern, "u");
      if (this.mode === "search") return { ok: true, regexp };
      return { ok: true, regexp: new RegExp(`^(?:${pattern})$`, "u") };
    } catch (err) {
      return { ok: false, error: new PatternCompileError(pattern, { cause: err }) };
    }
  }
}
