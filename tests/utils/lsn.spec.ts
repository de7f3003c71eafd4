import { describe, expect, it } from 'vitest';
import { formatLsn, lsnReached, parseLsn } from '../../src/utils/lsn.js';

describe('lsn', () => {
  it('parses both halves as hex', () => {
    expect(parseLsn('0/16B5A50')).toBe(0x16b5a50n);
    expect(parseLsn('1/0')).toBe(1n << 32n);
    expect(formatLsn(parseLsn('2/a0'))).toBe('2/A0');
  });

  it('rejects malformed values', () => {
    expect(() => parseLsn('16B5A50')).toThrow("Invalid LSN '16B5A50'. Expected the form 'X/Y' in hex.");
  });

  it('compares positions rather than strings', () => {
    expect(lsnReached('0/FF', '0/100')).toBe(false);
    expect(lsnReached('1/0', '0/FFFFFFFF')).toBe(true);
    expect(lsnReached('0/100', '0/100')).toBe(true);
    expect(lsnReached(null, '0/1')).toBe(false);
  });
});
