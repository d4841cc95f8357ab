#!/usr/bin/env node
import { Command } from 'commander';
import log from 'loglevel';
import { resolveGeneratorConfig, type GeneratorConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { runGenerator } from './generator.js';

log.setLevel('info');

const program = new Command();
program
  .name('pwcheck-loggen')
  .description('Writes synthetic sshd auth log batches for the demo server')
  .version('0.1.0')
  .option('-d, --dir <dir>', 'output directory')
  .option('-i, --interval <ms>', 'delay between batches in milliseconds')
  .option('-n, --batches <n>', 'stop after this many batches')
  .option('--log-level <level>', 'trace, debug, info, warn, error or silent')
  .action(async (opts: { dir?: string; interval?: string; batches?: string; logLevel?: string }) => {
    let config: GeneratorConfig;
    try {
      config = resolveGeneratorConfig(opts);
    } catch (e) {
      log.error(errorMessage(e));
      process.exit(1);
    }
    log.setLevel(config.logLevel);

    const controller = new AbortController();
    process.once('SIGINT', () => {
      log.info('Stopping simulator.');
      controller.abort();
    });

    log.info('Starting attack simulator. Press Ctrl+C to stop.');
    try {
      await runGenerator({ ...config, signal: controller.signal });
    } catch (e) {
      log.error('Generator failed:', errorMessage(e));
      process.exit(1);
    }
  });

await program.parseAsync(process.argv);
