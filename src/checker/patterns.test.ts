import { describe, it, expect } from 'vitest';
import { findRepeatedRun, hasKeyboardSequence, hasMonotonicSequence, matchesWordDigitsTemplate } from './patterns.js';

describe('hasKeyboardSequence', () => {
  it('finds row windows anywhere in the password', () => {
    expect(hasKeyboardSequence('xxqwerxx')).toBe(true);
    expect(hasKeyboardSequence('zxcv')).toBe(true);
    expect(hasKeyboardSequence('pass1234')).toBe(true);
  });

  it('finds reversed row windows', () => {
    expect(hasKeyboardSequence('rewq')).toBe(true);
    expect(hasKeyboardSequence('lkjh')).toBe(true);
    expect(hasKeyboardSequence('0987')).toBe(true);
  });

  it('ignores windows shorter than the minimum', () => {
    expect(hasKeyboardSequence('qwe')).toBe(false);
    expect(hasKeyboardSequence('hello-world')).toBe(false);
  });

  it('honours custom rows and length', () => {
    expect(hasKeyboardSequence('xyz', ['wxyz'], 3)).toBe(true);
    expect(hasKeyboardSequence('qwer', ['wxyz'], 3)).toBe(false);
  });
});

describe('hasMonotonicSequence', () => {
  it('detects ascending and descending runs', () => {
    expect(hasMonotonicSequence('abcd1234')).toBe(true);
    expect(hasMonotonicSequence('dcba')).toBe(true);
    expect(hasMonotonicSequence('x9876y')).toBe(true);
  });

  it('rejects broken or short runs', () => {
    expect(hasMonotonicSequence('abce')).toBe(false);
    expect(hasMonotonicSequence('abc')).toBe(false);
    expect(hasMonotonicSequence('a1b2c3d4')).toBe(false);
    expect(hasMonotonicSequence('abcba')).toBe(false);
  });

  it('is total on empty input', () => {
    expect(hasMonotonicSequence('')).toBe(false);
  });
});

describe('findRepeatedRun', () => {
  it('reports the run length', () => {
    expect(findRepeatedRun('aaaa1234XY')).toEqual({ found: true, length: 4 });
    expect(findRepeatedRun('xx1111111y')).toEqual({ found: true, length: 7 });
  });

  it('reports the leftmost run', () => {
    expect(findRepeatedRun('abzzzzqqqqqq')).toEqual({ found: true, length: 4 });
  });

  it('counts code points, not UTF-16 units', () => {
    expect(findRepeatedRun('😀😀😀😀')).toEqual({ found: true, length: 4 });
  });

  it('returns zero length when there is no long run', () => {
    expect(findRepeatedRun('aaabbb')).toEqual({ found: false, length: 0 });
  });

  it('counts carriage returns but not newlines', () => {
    expect(findRepeatedRun('Ab1#\r\r\r\rzz')).toEqual({ found: true, length: 4 });
    expect(findRepeatedRun('\n\n\n\n')).toEqual({ found: false, length: 0 });
  });
});

describe('matchesWordDigitsTemplate', () => {
  it('matches word + digits + optional symbol', () => {
    expect(matchesWordDigitsTemplate('Summer2024!')).toBe(true);
    expect(matchesWordDigitsTemplate('abc1#')).toBe(true);
    expect(matchesWordDigitsTemplate('hunter2')).toBe(true);
  });

  it('requires a whole-string match', () => {
    expect(matchesWordDigitsTemplate('summer12345')).toBe(false);
    expect(matchesWordDigitsTemplate('Summer2024!!')).toBe(false);
    expect(matchesWordDigitsTemplate('2024Summer')).toBe(false);
    expect(matchesWordDigitsTemplate('abc1^')).toBe(false);
    expect(matchesWordDigitsTemplate('x Summer2024')).toBe(false);
  });
});
