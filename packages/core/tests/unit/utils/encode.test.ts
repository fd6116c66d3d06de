import { describe, expect, it } from 'vitest';
import { basicAuthHeader, encodePathSegment } from '../../../src/utils/encode.js';
import { requireIntInRange, requireNonEmpty } from '../../../src/utils/validate.js';
import { ValidationError } from '../../../src/utils/errors.js';

describe('encodePathSegment', () => {
  it('leaves plain names alone', () => {
    expect(encodePathSegment('JOB01234')).toBe('JOB01234');
  });

  it('escapes national and reserved characters', () => {
    expect(encodePathSegment('A$B#C@')).toBe('A%24B%23C%40');
    expect(encodePathSegment('a/b')).toBe('a%2Fb');
  });

  it('rejects blanks', () => {
    expect(() => encodePathSegment(' ')).toThrow('path segment not specified');
  });
});

describe('basicAuthHeader', () => {
  it('base64-encodes user:password', () => {
    expect(basicAuthHeader({ user: 'ibmuser', password: 'test-secret' })).toBe('Basic aWJtdXNlcjp0ZXN0LXNlY3JldA==');
  });
});

describe('requireNonEmpty', () => {
  it('returns the value untouched', () => {
    expect(requireNonEmpty(' x ', 'field')).toBe(' x ');
  });

  it.each([undefined, null, '', '   '])('rejects %j', (value) => {
    expect(() => requireNonEmpty(value, 'job name')).toThrow(ValidationError);
    expect(() => requireNonEmpty(value, 'job name')).toThrow('job name not specified');
  });
});

describe('requireIntInRange', () => {
  it('accepts bounds', () => {
    expect(requireIntInRange(1, 'n', 1, 3)).toBe(1);
    expect(requireIntInRange(3, 'n', 1, 3)).toBe(3);
  });

  it('rejects fractions and out-of-range values', () => {
    expect(() => requireIntInRange(1.5, 'lrecl', 1, 32760)).toThrow(
      'lrecl must be an integer between 1 and 32760, got 1.5',
    );
    expect(() => requireIntInRange(4, 'n', 1, 3)).toThrow(ValidationError);
  });
});
