import { STRONG_ENTROPY_BITS, WEAK_ENTROPY_BITS, type CheckPolicy } from './const.js';
import type { CharacterClasses } from './entropy.js';
import type { CommonPasswordList } from './common-passwords.js';
import { findRepeatedRun, hasKeyboardSequence, hasMonotonicSequence, matchesWordDigitsTemplate } from './patterns.js';

/** Everything a rule may look at. Built once per evaluation, never mutated. */
export interface EvaluationContext {
  readonly password: string;
  readonly lower: string;
  readonly normalized: string;
  readonly length: number;
  readonly classes: CharacterClasses;
  readonly entropyBits: number;
  readonly common: CommonPasswordList;
  readonly policy: CheckPolicy;
}

export interface RuleOutcome {
  delta: number;
  issues: string[];
  suggestions: string[];
}

export type ScoringRule = (ctx: EvaluationContext) => RuleOutcome;

export const MESSAGES = {
  emptyIssue: 'Password is empty.',
  emptySuggestion: 'Enter a password with at least 12–16 characters.',
  shortIssue: 'Too short (aim for at least 12 characters).',
  shortSuggestion: 'Use 12–16+ characters (a passphrase works well).',
  noLowerIssue: 'No lowercase letters.',
  noLowerSuggestion: 'Add lowercase letters (a–z).',
  noUpperIssue: 'No uppercase letters.',
  noUpperSuggestion: 'Add uppercase letters (A–Z).',
  noDigitIssue: 'No digits.',
  noDigitSuggestion: 'Add digits (0–9).',
  noSymbolIssue: 'No symbols.',
  noSymbolSuggestion: 'Add symbols (e.g., !@#$%).',
  commonIssue: 'Appears in common password lists.',
  commonSuggestion: 'Avoid common passwords; use a unique passphrase.',
  commonWordIssue: 'Contains a common password word/pattern.',
  commonWordSuggestion: "Remove common words (e.g., 'password', 'admin') and use a unique phrase.",
  sequenceIssue: 'Contains an easy sequence (keyboard or ordered characters).',
  sequenceSuggestion: 'Avoid sequences like 1234, abcd, qwer.',
  repeatSuggestion: 'Avoid long repeats like aaaa or 1111.',
  templateIssue: 'Looks like a common pattern (word + digits).',
  templateSuggestion: 'Use a passphrase or mix words in a less predictable way.',
  entropySuggestion: 'Increase complexity and length to raise entropy.',
} as const;

export const repeatIssue = (runLength: number): string =>
  `Contains repeated characters (e.g., '${'*'.repeat(Math.min(runLength, 6))}').`;

function outcome(delta: number, issue?: string, suggestion?: string): RuleOutcome {
  return {
    delta,
    issues: issue ? [issue] : [],
    suggestions: suggestion ? [suggestion] : [],
  };
}

const NO_CHANGE: RuleOutcome = Object.freeze({ delta: 0, issues: [], suggestions: [] });

export const lengthRule: ScoringRule = ({ length }) => {
  if (length >= 16) return outcome(40);
  if (length >= 12) return outcome(30);
  if (length >= 10) return outcome(20);
  if (length >= 8) return outcome(10);
  return outcome(0, MESSAGES.shortIssue, MESSAGES.shortSuggestion);
};

export const varietyRule: ScoringRule = ({ classes }) => {
  const checks: [boolean, string, string][] = [
    [classes.lower, MESSAGES.noLowerIssue, MESSAGES.noLowerSuggestion],
    [classes.upper, MESSAGES.noUpperIssue, MESSAGES.noUpperSuggestion],
    [classes.digit, MESSAGES.noDigitIssue, MESSAGES.noDigitSuggestion],
    [classes.symbol, MESSAGES.noSymbolIssue, MESSAGES.noSymbolSuggestion],
  ];
  const result: RuleOutcome = { delta: 0, issues: [], suggestions: [] };
  for (const [present, issue, suggestion] of checks) {
    if (present) {
      result.delta += 10;
    } else {
      result.issues.push(issue);
      result.suggestions.push(suggestion);
    }
  }
  return result;
};

export const commonPasswordRule: ScoringRule = ({ normalized, common }) =>
  common.has(normalized) ? outcome(-40, MESSAGES.commonIssue, MESSAGES.commonSuggestion) : NO_CHANGE;

// e.g. "password123!"; only the first match counts
export const commonSubstringRule: ScoringRule = ({ normalized, common, policy }) => {
  for (const candidate of common.candidates(policy.substringScanLimit)) {
    if (candidate.length >= policy.minCommonSubstringLength && normalized.includes(candidate)) {
      return outcome(-20, MESSAGES.commonWordIssue, MESSAGES.commonWordSuggestion);
    }
  }
  return NO_CHANGE;
};

export const sequenceRule: ScoringRule = ({ lower, policy }) => {
  const found =
    hasKeyboardSequence(lower, policy.keyboardRows, policy.minSequenceLength) ||
    hasMonotonicSequence(lower, policy.minSequenceLength);
  return found ? outcome(-15, MESSAGES.sequenceIssue, MESSAGES.sequenceSuggestion) : NO_CHANGE;
};

export const repeatRule: ScoringRule = ({ password, policy }) => {
  const run = findRepeatedRun(password, policy.minRepeatRun);
  return run.found ? outcome(-10, repeatIssue(run.length), MESSAGES.repeatSuggestion) : NO_CHANGE;
};

export const templateRule: ScoringRule = ({ password }) =>
  matchesWordDigitsTemplate(password) ? outcome(-10, MESSAGES.templateIssue, MESSAGES.templateSuggestion) : NO_CHANGE;

export const entropyRule: ScoringRule = ({ entropyBits }) => {
  if (entropyBits >= STRONG_ENTROPY_BITS) return outcome(10);
  if (entropyBits < WEAK_ENTROPY_BITS) return outcome(-10, undefined, MESSAGES.entropySuggestion);
  return NO_CHANGE;
};

/** Applied in this order; the order decides how issues and suggestions are listed. */
export const SCORING_RULES: readonly ScoringRule[] = Object.freeze([
  lengthRule,
  varietyRule,
  commonPasswordRule,
  commonSubstringRule,
  sequenceRule,
  repeatRule,
  templateRule,
  entropyRule,
]);
