export { DEFAULT_POLICY, DEFAULT_COMMON_PASSWORDS, KEYBOARD_ROWS, COMMON_SUBSTITUTIONS, type CheckPolicy } from './checker/const.js';
export { CommonPasswordList, loadCommonPasswords, parseCommonPasswordText } from './checker/common-passwords.js';
export { normalizeForCommonChecks, stripWhitespace } from './checker/normalize.js';
export {
  hasKeyboardSequence,
  hasMonotonicSequence,
  findRepeatedRun,
  matchesWordDigitsTemplate,
  type RepeatedRun,
} from './checker/patterns.js';
export { estimateEntropyBits, detectCharacterClasses, charsetSize, type CharacterClasses } from './checker/entropy.js';
export { SCORING_RULES, type ScoringRule, type RuleOutcome, type EvaluationContext } from './checker/rules.js';
export { evaluatePassword, rateFromScore, RATINGS, type CheckResult, type Rating } from './checker/scoring.js';
export { formatReport, maskPassword } from './checker/report.js';
export { runCheck, type CheckOptions, type CheckOutput } from './checker/check-command.js';
export { ConfigError } from './errors.js';
