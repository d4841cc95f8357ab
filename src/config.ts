import { ConfigError } from './errors.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogLevelName = 'info';
export const DEFAULT_PORT = 3000;
export const DEFAULT_RAW_DIR = 'logs/raw';
export const DEFAULT_PROCESSED_DIR = 'logs/processed';
export const DEFAULT_GENERATOR_INTERVAL_MS = 5000;

export type Env = Record<string, string | undefined>;

export interface CheckerConfig {
  commonListPath?: string;
  logLevel: LogLevelName;
}

export interface ServerConfig extends CheckerConfig {
  port: number;
  logDir: string;
}

export interface ProcessorConfig {
  rawDir: string;
  processedDir: string;
  logLevel: LogLevelName;
}

export interface GeneratorConfig {
  dir: string;
  intervalMs: number;
  batches?: number; // unlimited when absent
  logLevel: LogLevelName;
}

const isLogLevel = (v: string): v is LogLevelName => (LOG_LEVELS as readonly string[]).includes(v);

export function parseLogLevel(raw: string | undefined): LogLevelName {
  if (raw === undefined || raw === '') return DEFAULT_LOG_LEVEL;
  const level = raw.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(`Invalid log level "${raw}" (expected one of ${LOG_LEVELS.join(', ')})`);
  }
  return level;
}

export function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw === '') return DEFAULT_PORT;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid port "${raw}" (expected 0..65535)`);
  }
  return port;
}

function parsePositiveInt(raw: string, what: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new ConfigError(`Invalid ${what} "${raw}" (expected a positive integer)`);
  return n;
}

const nonEmpty = (v: string | undefined): string | undefined => (v && v.trim().length ? v : undefined);

export function resolveCheckerConfig(
  opts: { commonList?: string; logLevel?: string },
  env: Env = process.env,
): CheckerConfig {
  const cfg: CheckerConfig = { logLevel: parseLogLevel(opts.logLevel ?? env.PWCHECK_LOG_LEVEL) };
  const commonListPath = nonEmpty(opts.commonList) ?? nonEmpty(env.PWCHECK_COMMON_LIST);
  if (commonListPath) cfg.commonListPath = commonListPath;
  return cfg;
}

export function resolveServerConfig(
  opts: { port?: string; logDir?: string; commonList?: string; logLevel?: string },
  env: Env = process.env,
): ServerConfig {
  return {
    ...resolveCheckerConfig(opts, env),
    port: parsePort(opts.port ?? env.PWCHECK_PORT),
    logDir: nonEmpty(opts.logDir) ?? nonEmpty(env.PWCHECK_LOG_DIR) ?? DEFAULT_PROCESSED_DIR,
  };
}

export function resolveGeneratorConfig(
  opts: { dir?: string; interval?: string; batches?: string; logLevel?: string },
  env: Env = process.env,
): GeneratorConfig {
  const cfg: GeneratorConfig = {
    dir: nonEmpty(opts.dir) ?? nonEmpty(env.PWCHECK_RAW_DIR) ?? DEFAULT_RAW_DIR,
    intervalMs: opts.interval ? parsePositiveInt(opts.interval, 'interval') : DEFAULT_GENERATOR_INTERVAL_MS,
    logLevel: parseLogLevel(opts.logLevel ?? env.PWCHECK_LOG_LEVEL),
  };
  if (opts.batches) cfg.batches = parsePositiveInt(opts.batches, 'batch count');
  return cfg;
}

export function resolveProcessorConfig(
  opts: { rawDir?: string; processedDir?: string; logLevel?: string },
  env: Env = process.env,
): ProcessorConfig {
  return {
    rawDir: nonEmpty(opts.rawDir) ?? nonEmpty(env.PWCHECK_RAW_DIR) ?? DEFAULT_RAW_DIR,
    processedDir: nonEmpty(opts.processedDir) ?? nonEmpty(env.PWCHECK_LOG_DIR) ?? DEFAULT_PROCESSED_DIR,
    logLevel: parseLogLevel(opts.logLevel ?? env.PWCHECK_LOG_LEVEL),
  };
}
