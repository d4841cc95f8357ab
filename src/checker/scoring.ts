import { DEFAULT_POLICY, MAX_SCORE, MIN_SCORE, type CheckPolicy } from './const.js';
import { CommonPasswordList } from './common-passwords.js';
import { detectCharacterClasses, estimateEntropyBits } from './entropy.js';
import { normalizeForCommonChecks } from './normalize.js';
import { MESSAGES, SCORING_RULES, type EvaluationContext, type ScoringRule } from './rules.js';

export const RATINGS = ['Very Weak', 'Weak', 'Moderate', 'Strong', 'Very Strong'] as const;

export type Rating = (typeof RATINGS)[number];

export interface CheckResult {
  readonly score: number;
  readonly rating: Rating;
  readonly entropyBits: number;
  readonly issues: readonly string[];
  readonly suggestions: readonly string[];
}

export function rateFromScore(score: number): Rating {
  if (score >= 85) return 'Very Strong';
  if (score >= 70) return 'Strong';
  if (score >= 50) return 'Moderate';
  if (score >= 30) return 'Weak';
  return 'Very Weak';
}

export const clampScore = (score: number): number => Math.max(MIN_SCORE, Math.min(MAX_SCORE, score));

const roundTo2 = (n: number): number => Math.round(n * 100) / 100;

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}

function freezeResult(result: CheckResult): CheckResult {
  return Object.freeze({
    ...result,
    issues: Object.freeze([...result.issues]),
    suggestions: Object.freeze([...result.suggestions]),
  });
}

export function buildContext(password: string, common: CommonPasswordList, policy: CheckPolicy): EvaluationContext {
  return {
    password,
    lower: password.toLowerCase(),
    normalized: normalizeForCommonChecks(password, policy.substitutions),
    length: Array.from(password).length,
    classes: detectCharacterClasses(password),
    entropyBits: estimateEntropyBits(password),
    common,
    policy,
  };
}

/**
 * Scores a password against the common list. Pure and synchronous; the same
 * inputs always give an equal result.
 */
export function evaluatePassword(
  password: string,
  common: CommonPasswordList = CommonPasswordList.seed(),
  policy: CheckPolicy = DEFAULT_POLICY,
  rules: readonly ScoringRule[] = SCORING_RULES,
): CheckResult {
  if (!password) {
    return freezeResult({
      score: 0,
      rating: 'Very Weak',
      entropyBits: 0,
      issues: [MESSAGES.emptyIssue],
      suggestions: [MESSAGES.emptySuggestion],
    });
  }

  const ctx = buildContext(password, common, policy);
  let total = 0;
  const issues: string[] = [];
  const suggestions: string[] = [];

  for (const rule of rules) {
    const { delta, issues: found, suggestions: advice } = rule(ctx);
    total += delta;
    issues.push(...found);
    suggestions.push(...advice);
  }

  const score = clampScore(total);
  return freezeResult({
    score,
    rating: rateFromScore(score),
    entropyBits: roundTo2(ctx.entropyBits),
    issues,
    suggestions: dedupe(suggestions),
  });
}
