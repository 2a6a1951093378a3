import { describe, it, expect, beforeEach } from 'vitest';
import { PatternWhitelist } from '../../src/capture/PatternWhitelist.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';

describe('PatternWhitelist', () => {
  let logProvider: ConsoleLogProvider;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
  });

  describe('parse', () => {
    it('splits the configuration on semicolons', () => {
      const whitelist = PatternWhitelist.parse('/api/orders/.*;/health', logProvider);
      expect(whitelist.patterns.map((p) => p.source)).toEqual(['/api/orders/.*', '/health']);
      expect(whitelist.size).toBe(2);
    });

    it('returns an empty whitelist for missing or empty configuration', () => {
      expect(PatternWhitelist.parse(undefined).size).toBe(0);
      expect(PatternWhitelist.parse('').size).toBe(0);
    });

    it('ignores empty entries and duplicates', () => {
      const whitelist = PatternWhitelist.parse('/a;;/b;/a;');
      expect(whitelist.toString()).toBe('/a;/b');
    });
  });

  describe('compile', () => {
    it('drops an invalid pattern and keeps the valid ones', () => {
      const whitelist = PatternWhitelist.compile(['/ok/.*', '[unclosed', '/fine'], logProvider);

      expect(whitelist.size).toBe(2);
      expect(whitelist.matches('/ok/1')).toBe(true);
      expect(whitelist.matches('/fine')).toBe(true);

      expect(logProvider.events).toHaveLength(1);
      expect(logProvider.events[0].level).toBe('error');
      expect(logProvider.events[0].message).toBe('error compiling pattern [unclosed');
      expect(logProvider.events[0].fields?.pattern).toBe('[unclosed');
    });

    it('rejects a source that is only valid once wrapped in a group', () => {
      const whitelist = PatternWhitelist.compile(['a)(b'], logProvider);
      expect(whitelist.size).toBe(0);
      expect(logProvider.events).toHaveLength(1);
    });

    it('compiles without a log provider', () => {
      expect(PatternWhitelist.compile(['(']).size).toBe(0);
    });
  });

  describe('matches', () => {
    const whitelist = PatternWhitelist.parse('/api/admin/.*;/status');

    it('matches the whole path', () => {
      expect(whitelist.matches('/api/admin/users')).toBe(true);
      expect(whitelist.matches('/status')).toBe(true);
    });

    it('does not match a substring', () => {
      expect(whitelist.matches('/v2/api/admin/users')).toBe(false);
      expect(whitelist.matches('/status/extra')).toBe(false);
      expect(whitelist.matches('/statuses')).toBe(false);
    });

    it('applies alternation inside a pattern to the whole path', () => {
      const alt = PatternWhitelist.parse('/a|/b');
      expect(alt.matches('/a')).toBe(true);
      expect(alt.matches('/b')).toBe(true);
      expect(alt.matches('/a/x')).toBe(false);
    });

    it('is always false when empty', () => {
      expect(PatternWhitelist.EMPTY.matches('/anything')).toBe(false);
      expect(PatternWhitelist.EMPTY.matches('')).toBe(false);
    });

    it('gives the same answer on repeated calls', () => {
      const results = Array.from({ length: 5 }, () => whitelist.matches('/status'));
      expect(results).toEqual([true, true, true, true, true]);
    });
  });

  it('is frozen after construction', () => {
    const whitelist = PatternWhitelist.parse('/x');
    expect(Object.isFrozen(whitelist)).toBe(true);
    expect(Object.isFrozen(whitelist.patterns)).toBe(true);
  });
});
