import { POOL_DIGIT, POOL_LOWER, POOL_SYMBOL, POOL_UPPER } from './const.js';

export interface CharacterClasses {
  lower: boolean;
  upper: boolean;
  digit: boolean;
  symbol: boolean;
}

export function detectCharacterClasses(pw: string): CharacterClasses {
  return {
    lower: /[a-z]/.test(pw),
    upper: /[A-Z]/.test(pw),
    digit: /[0-9]/.test(pw),
    symbol: /[^A-Za-z0-9]/.test(pw),
  };
}

export function charsetSize(classes: CharacterClasses): number {
  let size = 0;
  if (classes.lower) size += POOL_LOWER;
  if (classes.upper) size += POOL_UPPER;
  if (classes.digit) size += POOL_DIGIT;
  // approximates the printable symbol set, regardless of which symbols appear
  if (classes.symbol) size += POOL_SYMBOL;
  return size;
}

/**
 * Rough upper bound from pool size and length. Not a guessing-entropy
 * measure; only meant to rank passwords against each other.
 */
export function estimateEntropyBits(pw: string): number {
  if (!pw) return 0;
  const pool = charsetSize(detectCharacterClasses(pw));
  if (pool === 0) return 0;
  return Array.from(pw).length * Math.log2(pool);
}
