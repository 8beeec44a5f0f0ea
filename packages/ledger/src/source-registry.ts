/**
 * YieldSourceRegistry - the current set of yield sources.
 *
 * Keyed by (origin, name). Sources are never edited in place: a refresh
 * replaces every source of one origin at once, leaving other origins
 * untouched.
 */

import { ValidationError } from "@yield-guardian/types";
import type { YieldOrigin, YieldSource, YieldSourceView } from "@yield-guardian/types";
import {
  accrualOver,
  toSourceView,
  totalDailyYield,
  validateYieldSource,
} from "./yield-source.js";

function keyOf(source: YieldSource): string {
  return `${source.origin}\u0000${source.name}`;
}

export class YieldSourceRegistry {
  private readonly _sources = new Map<string, YieldSource>();

  constructor(initial: readonly YieldSource[] = []) {
    for (const source of initial) {
      validateYieldSource(source);
      if (this._sources.has(keyOf(source))) {
        throw new ValidationError(
          `Duplicate yield source '${source.name}' for origin '${source.origin}'`,
        );
      }
      this._sources.set(keyOf(source), source);
    }
  }

  /**
   * Swap every source tagged with `origin` for `sources`.
   *
   * All replacements are validated first; on any error the registry is
   * left exactly as it was.
   */
  replaceOrigin(origin: YieldOrigin, sources: readonly YieldSource[]): void {
    const incoming = new Map<string, YieldSource>();
    for (const source of sources) {
      if (source.origin !== origin) {
        throw new ValidationError(
          `Yield source '${source.name}' has origin '${source.origin}', expected '${origin}'`,
        );
      }
      validateYieldSource(source);
      if (incoming.has(keyOf(source))) {
        throw new ValidationError(
          `Duplicate yield source '${source.name}' for origin '${origin}'`,
        );
      }
      incoming.set(keyOf(source), source);
    }

    for (const [key, source] of this._sources) {
      if (source.origin === origin) {
        this._sources.delete(key);
      }
    }
    for (const [key, source] of incoming) {
      this._sources.set(key, source);
    }
  }

  list(): readonly YieldSource[] {
    return [...this._sources.values()];
  }

  byOrigin(origin: YieldOrigin): readonly YieldSource[] {
    return this.list().filter((s) => s.origin === origin);
  }

  get size(): number {
    return this._sources.size;
  }

  /** Sum of daily yields at ledger precision. */
  totalDailyYield(): bigint {
    return totalDailyYield(this.list());
  }

  /** Yield produced by all sources over `elapsedMs`. */
  accrualOver(elapsedMs: number): bigint {
    return accrualOver(this.list(), elapsedMs);
  }

  views(): readonly YieldSourceView[] {
    return this.list().map(toSourceView);
  }
}
