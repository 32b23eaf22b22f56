import { describe, expect, it } from 'vitest';

import { partialRatio, ratio } from './similarity.js';

describe('ratio', () => {
  it('scores identical strings 100', () => {
    expect(ratio('abc', 'abc')).toBe(100);
  });

  it('scores by common subsequence', () => {
    expect(ratio('abcd', 'abxy')).toBe(50);
  });
});

describe('partialRatio', () => {
  it('is 100 when the shorter string is contained', () => {
    expect(partialRatio('inception', 'inception 2010')).toBe(100);
  });

  it('keeps the best window', () => {
    expect(partialRatio('abcd', 'xbcdy')).toBe(75);
    expect(partialRatio('xbcdy', 'abcd')).toBe(75);
  });

  it('is 0 for an empty side', () => {
    expect(partialRatio('', 'abc')).toBe(0);
  });
});
