#!/usr/bin/env node
import { Command } from 'commander';
import log from 'loglevel';
import { resolveProcessorConfig, type ProcessorConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { runProcessor } from './processor.js';

log.setLevel('info');

const program = new Command();
program
  .name('pwcheck-logproc')
  .description('Moves threat lines of new raw auth logs into the processed directory')
  .version('0.1.0')
  .option('-r, --raw-dir <dir>', 'directory the generator writes to')
  .option('-o, --processed-dir <dir>', 'directory the server summarizes')
  .option('--log-level <level>', 'trace, debug, info, warn, error or silent')
  .action(async (opts: { rawDir?: string; processedDir?: string; logLevel?: string }) => {
    let config: ProcessorConfig;
    try {
      config = resolveProcessorConfig(opts);
    } catch (e) {
      log.error(errorMessage(e));
      process.exit(1);
    }
    log.setLevel(config.logLevel);

    const controller = new AbortController();
    process.once('SIGINT', () => {
      log.info('Stopping log processor.');
      controller.abort();
    });

    log.info(`Log processor started. Watching: ${config.rawDir}`);
    try {
      const count = await runProcessor({ ...config, signal: controller.signal });
      log.info(`Processed ${count} file(s).`);
    } catch (e) {
      log.error('Log processor failed:', errorMessage(e));
      process.exit(1);
    }
  });

await program.parseAsync(process.argv);
