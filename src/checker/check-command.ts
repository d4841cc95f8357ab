import inquirer from 'inquirer';
import { loadCommonPasswords } from './common-passwords.js';
import { formatReport } from './report.js';
import { evaluatePassword, type CheckResult } from './scoring.js';

export type PasswordPrompt = () => Promise<string>;

export interface CheckOptions {
  password?: string;
  show?: boolean;
  json?: boolean;
  commonListPath?: string;
}

export interface CheckOutput {
  result: CheckResult;
  text: string;
}

// No mask: nothing is echoed while typing.
export async function promptPassword(): Promise<string> {
  const { password } = await inquirer.prompt<{ password: string }>([
    { type: 'password', name: 'password', message: 'Enter a password to check:' },
  ]);
  return password;
}

export async function runCheck(opts: CheckOptions, prompt: PasswordPrompt = promptPassword): Promise<CheckOutput> {
  const common = await loadCommonPasswords(opts.commonListPath);
  const password = opts.password ?? (await prompt());
  const result = evaluatePassword(password, common);
  const text = opts.json ? JSON.stringify(result, null, 2) : formatReport(password, result, !!opts.show);
  return { result, text };
}
