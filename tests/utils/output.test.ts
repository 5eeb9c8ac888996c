import { describe, it, expect } from 'vitest';
import { formatJSON, formatBody, maskSecret } from '../../src/utils/output.js';

describe('formatJSON', () => {
  it('should pretty print by default', () => {
    expect(formatJSON({ a: 1 })).toBe('{\n  "a": 1\n}');
  });

  it('should print compact JSON when asked', () => {
    expect(formatJSON({ a: 1 }, false)).toBe('{"a":1}');
  });
});

describe('formatBody', () => {
  it('should return strings unchanged', () => {
    expect(formatBody('Not Found')).toBe('Not Found');
  });

  it('should return an empty string for missing bodies', () => {
    expect(formatBody(undefined)).toBe('');
    expect(formatBody(null)).toBe('');
  });

  it('should serialize objects', () => {
    expect(formatBody({ error: 'invalid_grant' }, false)).toBe('{"error":"invalid_grant"}');
  });
});

describe('maskSecret', () => {
  it('should keep the first four characters', () => {
    expect(maskSecret('test-secret')).toBe('test*******');
  });

  it('should cap the mask length', () => {
    expect(maskSecret('x'.repeat(40))).toBe('xxxx' + '*'.repeat(12));
  });

  it('should mask short values entirely', () => {
    expect(maskSecret('abc')).toBe('***');
  });
});
