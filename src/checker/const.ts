export const UTF8 = 'utf8';

// Kept small on purpose; larger lists come from --common-list.
export const DEFAULT_COMMON_PASSWORDS = [
  'password', '123456', '123456789', 'qwerty', 'letmein',
  'admin', 'welcome', 'iloveyou', 'monkey', 'football',
] as const;

export const KEYBOARD_ROWS = ['qwertyuiop', 'asdfghjkl', 'zxcvbnm', '1234567890'] as const;

// Order matters: each entry rewrites the output of the previous one.
export const COMMON_SUBSTITUTIONS: ReadonlyArray<readonly [string, string]> = [
  ['@', 'a'],
  ['0', 'o'],
  ['1', 'l'],
  ['!', 'i'],
  ['$', 's'],
  ['3', 'e'],
  ['5', 's'],
  ['7', 't'],
];

export const POOL_LOWER = 26;
export const POOL_UPPER = 26;
export const POOL_DIGIT = 10;
export const POOL_SYMBOL = 33;

export const MIN_SEQUENCE_LENGTH = 4;
export const MIN_REPEAT_RUN = 4;
export const MIN_COMMON_SUBSTRING_LENGTH = 6;
export const SUBSTRING_SCAN_LIMIT = 5000;

export const STRONG_ENTROPY_BITS = 80;
export const WEAK_ENTROPY_BITS = 50;

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

export interface CheckPolicy {
  readonly keyboardRows: readonly string[];
  readonly substitutions: ReadonlyArray<readonly [string, string]>;
  readonly minSequenceLength: number;
  readonly minRepeatRun: number;
  readonly minCommonSubstringLength: number;
  readonly substringScanLimit: number;
}

export const DEFAULT_POLICY: CheckPolicy = Object.freeze({
  keyboardRows: KEYBOARD_ROWS,
  substitutions: COMMON_SUBSTITUTIONS,
  minSequenceLength: MIN_SEQUENCE_LENGTH,
  minRepeatRun: MIN_REPEAT_RUN,
  minCommonSubstringLength: MIN_COMMON_SUBSTRING_LENGTH,
  substringScanLimit: SUBSTRING_SCAN_LIMIT,
});
