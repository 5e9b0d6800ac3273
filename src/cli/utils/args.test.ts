import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { parsePositiveInteger, parseStatus, requirePositional } from './args.js';
import { CliUsageError } from './errorHandling.js';

describe('CLI argument helpers', () => {
  it('should read required positionals', () => {
    expect(requirePositional(['checkout'], 0, 'projectId')).toBe('checkout');
    expect(() => requirePositional([], 0, 'projectId')).toThrow(CliUsageError);
    expect(() => requirePositional(['  '], 0, 'projectId')).toThrow(
      'Missing required argument <projectId>'
    );
  });

  it('should accept any positive integer', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 1_000_000 }), (n) => {
        expect(parsePositiveInteger(String(n), 'id')).toBe(n);
      })
    );
  });

  it('should reject zero, negatives and decimals', () => {
    for (const value of ['0', '-1', '1.5', '', '1e3']) {
      expect(() => parsePositiveInteger(value, 'id')).toThrow(CliUsageError);
    }
  });

  it('should parse statuses case-insensitively', () => {
    expect(parseStatus('ignored')).toBe('IGNORED');
    expect(parseStatus('Addressed')).toBe('ADDRESSED');
    expect(() => parseStatus('closed')).toThrow(
      "Invalid status 'closed': expected OPEN, ADDRESSED or IGNORED"
    );
  });
});
