#!/usr/bin/env node
import { Command } from 'commander';
import log from 'loglevel';
import { resolveCheckerConfig, type CheckerConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { runCheck } from './check-command.js';

log.setLevel('info');

interface CliOptions {
  password?: string;
  show?: boolean;
  json?: boolean;
  commonList?: string;
  logLevel?: string;
}

const program = new Command();
program
  .name('pwcheck')
  .description('Password Strength Checker (CLI)')
  .version('0.1.0')
  .option('-p, --password <password>', 'password string (avoid using this on shared machines)')
  .option('--show', 'show the password in output (hidden by default)')
  .option('--common-list <path>', 'path to a common passwords file, one per line')
  .option('--json', 'print the result as JSON instead of a report')
  .option('--log-level <level>', 'trace, debug, info, warn, error or silent')
  .action(async (opts: CliOptions) => {
    let config: CheckerConfig;
    try {
      config = resolveCheckerConfig(opts);
    } catch (e) {
      log.error(errorMessage(e));
      process.exit(1);
    }
    log.setLevel(config.logLevel);

    try {
      const { text } = await runCheck({
        password: opts.password,
        show: opts.show,
        json: opts.json,
        commonListPath: config.commonListPath,
      });
      console.log(text);
    } catch (e) {
      log.error('Check failed:', errorMessage(e));
      process.exit(1);
    }
  });

await program.parseAsync(process.argv);
