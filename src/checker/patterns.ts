import { KEYBOARD_ROWS, MIN_REPEAT_RUN, MIN_SEQUENCE_LENGTH } from './const.js';

export interface RepeatedRun {
  found: boolean;
  length: number;
}

const codePoints = (s: string): string[] => Array.from(s);

const reversed = (s: string): string => codePoints(s).reverse().join('');

// Rows like "qwer", "asdf", "1234" and their reverses.
export function hasKeyboardSequence(
  pwLower: string,
  rows: readonly string[] = KEYBOARD_ROWS,
  minLength: number = MIN_SEQUENCE_LENGTH,
): boolean {
  for (const row of rows) {
    for (let i = 0; i + minLength <= row.length; i++) {
      const chunk = row.slice(i, i + minLength);
      if (pwLower.includes(chunk) || pwLower.includes(reversed(chunk))) return true;
    }
  }
  return false;
}

// Runs of consecutive code points, up or down: "abcd", "fedc", "6789".
export function hasMonotonicSequence(pw: string, minLength: number = MIN_SEQUENCE_LENGTH): boolean {
  const codes = codePoints(pw).map(c => c.codePointAt(0) ?? 0);
  if (minLength < 2 || codes.length < minLength) return false;

  for (let i = 0; i + minLength <= codes.length; i++) {
    let up = true;
    let down = true;
    for (let j = i; j < i + minLength - 1; j++) {
      const diff = codes[j + 1] - codes[j];
      if (diff !== 1) up = false;
      if (diff !== -1) down = false;
    }
    if (up || down) return true;
  }
  return false;
}

// Long repeats like "aaaa" or "1111"; reports the leftmost run. Any character but \n counts.
export function findRepeatedRun(pw: string, minRun: number = MIN_REPEAT_RUN): RepeatedRun {
  const m = new RegExp(`([^\\n])\\1{${Math.max(minRun - 1, 1)},}`, 'u').exec(pw);
  return m ? { found: true, length: codePoints(m[0]).length } : { found: false, length: 0 };
}

const WORD_DIGITS_TEMPLATE = /^[A-Za-z]+[0-9]{1,4}[!@#$%]?$/;

/** Whole-string "word + 1-4 digits + optional symbol", e.g. `Summer2024!`. */
export function matchesWordDigitsTemplate(pw: string): boolean {
  return WORD_DIGITS_TEMPLATE.test(pw);
}
