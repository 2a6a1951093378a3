/**
 * Paths whose responses are always logged.
 * Built once at startup from `whitePatterns`; read-only afterwards and
 * shared by every request.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';

export interface WhitelistPattern {
  /** Pattern text as configured. */
  readonly source: string;
  /** Anchored form of `source`: matches whole paths only. */
  readonly regex: RegExp;
}

const SEPARATOR = ';';

export class PatternWhitelist {
  static readonly EMPTY = new PatternWhitelist([]);

  readonly patterns: readonly WhitelistPattern[];

  private constructor(patterns: WhitelistPattern[]) {
    this.patterns = Object.freeze(patterns);
    Object.freeze(this);
  }

  /** Split a semicolon-delimited list and compile it. */
  static parse(config: string | undefined, logProvider?: ILogProvider): PatternWhitelist {
    if (!config) return PatternWhitelist.EMPTY;
    return PatternWhitelist.compile(config.split(SEPARATOR), logProvider);
  }

  /**
   * Compile every source. A source that is not a valid regular expression
   * is logged and dropped; the others are kept.
   */
  static compile(sources: readonly string[], logProvider?: ILogProvider): PatternWhitelist {
    const seen = new Set<string>();
    const patterns: WhitelistPattern[] = [];

    for (const source of sources) {
      if (!source || seen.has(source)) continue;
      seen.add(source);

      try {
        // Validate the source on its own: wrapping it could balance a stray ')'
        new RegExp(source);
        patterns.push(Object.freeze({ source, regex: new RegExp(`^(?:${source})$`) }));
      } catch (err) {
        logProvider?.error(`error compiling pattern ${source}`, {
          pattern: source,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return new PatternWhitelist(patterns);
  }

  get size(): number {
    return this.patterns.length;
  }

  /** True iff `path` fully matches at least one pattern. */
  matches(path: string): boolean {
    return this.patterns.some((p) => p.regex.test(path));
  }

  toString(): string {
    return this.patterns.map((p) => p.source).join(SEPARATOR);
  }
}
