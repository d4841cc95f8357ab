import type { CheckResult } from './scoring.js';

const TITLE = 'Password Strength Report';

export function maskPassword(pw: string): string {
  return '*'.repeat(Array.from(pw).length);
}

// Always shows a decimal part: 0 -> "0.0", 60 -> "60.0", 52.56 -> "52.56".
export function formatBits(bits: number): string {
  return Number.isInteger(bits) ? bits.toFixed(1) : String(bits);
}

export function formatReport(pw: string, result: CheckResult, showPassword = false): string {
  const lines: string[] = [];
  lines.push(TITLE);
  lines.push('-'.repeat(26));
  lines.push(`Password: ${showPassword ? pw : maskPassword(pw)}`);
  lines.push(`Score:    ${result.score}/100`);
  lines.push(`Rating:   ${result.rating}`);
  lines.push(`Entropy:  ~${formatBits(result.entropyBits)} bits (rough estimate)`);
  lines.push('');

  if (result.issues.length) {
    lines.push('Issues found:');
    result.issues.forEach(i => lines.push(` - ${i}`));
  } else {
    lines.push('Issues found: none');
  }
  lines.push('');

  if (result.suggestions.length) {
    lines.push('Suggestions:');
    result.suggestions.forEach(s => lines.push(` - ${s}`));
    lines.push('');
  }
  return lines.join('\n');
}
