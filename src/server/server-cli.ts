#!/usr/bin/env node
import { Command } from 'commander';
import log from 'loglevel';
import { resolveServerConfig, type ServerConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { startServer } from './server.js';

log.setLevel('info');

const program = new Command();
program
  .name('pwcheck-server')
  .description('Demo HTTP server: password checks and auth log summary')
  .version('0.1.0')
  .option('-p, --port <port>', 'listening port')
  .option('--log-dir <dir>', 'directory of *.log files to summarize')
  .option('--common-list <path>', 'path to a common passwords file, one per line')
  .option('--log-level <level>', 'trace, debug, info, warn, error or silent')
  .action(async (opts: { port?: string; logDir?: string; commonList?: string; logLevel?: string }) => {
    let config: ServerConfig;
    try {
      config = resolveServerConfig(opts);
    } catch (e) {
      log.error('Error:', errorMessage(e));
      process.exit(1);
    }
    log.setLevel(config.logLevel);

    try {
      await startServer(config);
    } catch (e) {
      log.error('Failed to start server:', errorMessage(e));
      process.exit(1);
    }
  });

await program.parseAsync(process.argv);
