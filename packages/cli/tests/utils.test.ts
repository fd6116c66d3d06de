import { InvalidArgumentError } from 'commander';
import { CancellationToken } from '@zos-client/core';
import { describe, expect, it } from 'vitest';

import {
  cancelOnInterrupt,
  collectSymbol,
  parseJobStatus,
  parseNonNegativeInt,
  parsePositiveInt,
} from '../src/utils.js';

describe('parsePositiveInt', () => {
  it('parses digits', () => {
    expect(parsePositiveInt('25')).toBe(25);
  });

  it('rejects zero, negatives and non-numbers', () => {
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('-3')).toThrow('Must be a positive integer');
    expect(() => parsePositiveInt('ten')).toThrow('Must be a positive integer');
    expect(() => parsePositiveInt('1.5')).toThrow('Must be a positive integer');
  });
});

describe('parseNonNegativeInt', () => {
  it('accepts zero', () => {
    expect(parseNonNegativeInt('0')).toBe(0);
    expect(parseNonNegativeInt('3000')).toBe(3000);
  });

  it('rejects negatives', () => {
    expect(() => parseNonNegativeInt('-1')).toThrow('Must be a non-negative integer');
  });
});

describe('parseJobStatus', () => {
  it('accepts a status in any case', () => {
    expect(parseJobStatus('output')).toBe('OUTPUT');
    expect(parseJobStatus('Active')).toBe('ACTIVE');
  });

  it('rejects an unknown status with the allowed choices', () => {
    expect(() => parseJobStatus('held')).toThrow('Allowed choices are INPUT, ACTIVE, OUTPUT.');
  });
});

describe('collectSymbol', () => {
  it('accumulates NAME=value pairs', () => {
    const first = collectSymbol('HLQ=IBMUSER', {});
    expect(collectSymbol('CLASS=A', first)).toEqual({ HLQ: 'IBMUSER', CLASS: 'A' });
  });

  it('keeps everything after the first equals sign', () => {
    expect(collectSymbol('PARM=A=B', {})).toEqual({ PARM: 'A=B' });
  });

  it('lets a later value replace an earlier one', () => {
    expect(collectSymbol('HLQ=PROD', { HLQ: 'TEST' })).toEqual({ HLQ: 'PROD' });
  });

  it('rejects values without a name', () => {
    expect(() => collectSymbol('=X', {})).toThrow('Expected NAME=value, got "=X"');
    expect(() => collectSymbol('HLQ', {})).toThrow(InvalidArgumentError);
  });
});

describe('cancelOnInterrupt', () => {
  it('adds one SIGINT listener and removes it again', () => {
    const before = process.listenerCount('SIGINT');
    const release = cancelOnInterrupt(new CancellationToken());
    expect(process.listenerCount('SIGINT')).toBe(before + 1);
    release();
    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
