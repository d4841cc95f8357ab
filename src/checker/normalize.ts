import { COMMON_SUBSTITUTIONS } from './const.js';

// Unicode whitespace incl. the \x1c-\x1f separators and \x85; unlike trim(), \uFEFF is not whitespace here.
const WS = String.raw`[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]`;
const EDGE_WHITESPACE = new RegExp(`^${WS}+|${WS}+$`, 'g');

export function stripWhitespace(s: string): string {
  return s.replace(EDGE_WHITESPACE, '');
}

/**
 * Canonical form for common-password lookups: stripped, lower-cased, with
 * leetspeak substitutions collapsed. Never used for character-class checks.
 */
export function normalizeForCommonChecks(
  password: string,
  substitutions: ReadonlyArray<readonly [string, string]> = COMMON_SUBSTITUTIONS,
): string {
  let s = stripWhitespace(password).toLowerCase();
  for (const [sym, repl] of substitutions) {
    s = s.replaceAll(sym, repl);
  }
  return s;
}
