import { describe, it, expect } from 'vitest';
import { levenshtein, similarity, subsequenceScore, tokenize } from '../../../src/resolver/fuzzy.js';

describe('levenshtein', () => {
  it('counts edits', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('abc', '')).toBe(3);
    expect(levenshtein('speaker', 'speaker')).toBe(0);
  });
});

describe('subsequenceScore', () => {
  it('divides by the tightest window', () => {
    expect(subsequenceScore('mxm', 'mx master')).toBe(0.75);
    expect(subsequenceScore('ab', 'a-ab')).toBe(1);
  });

  it('is 0 when the characters are not in order', () => {
    expect(subsequenceScore('abc', 'xyz')).toBe(0);
    expect(subsequenceScore('ba', 'ab')).toBe(0);
    expect(subsequenceScore('', 'ab')).toBe(0);
  });
});

describe('tokenize', () => {
  it('splits on anything that is not a letter or digit', () => {
    expect(tokenize('sony wh-1000xm4')).toEqual(['sony', 'wh', '1000xm4']);
  });
});

describe('similarity', () => {
  it('tolerates a missing letter', () => {
    expect(similarity('keybord', 'Magic Keyboard')).toBe(0.875);
  });

  it('scores a transposition by edit distance', () => {
    expect(similarity('speakre', 'Speakers')).toBe(0.75);
  });

  it('is 0 for unrelated names', () => {
    expect(similarity('pro', 'Sony WH-1000XM4')).toBe(0);
  });

  it('is 0 for an empty query', () => {
    expect(similarity('', 'Speaker')).toBe(0);
  });
});
