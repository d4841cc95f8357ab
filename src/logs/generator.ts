import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import _ from 'lodash';
import log from 'loglevel';

export const SAMPLE_IPS = ['192.168.1.105', '10.0.0.42', '172.16.0.5', '45.33.22.11'] as const;
export const SAMPLE_USERS = ['root', 'admin', 'user1', 'guest', 'db_admin'] as const;
export const FAILED_RATIO = 0.8;
export const LINES_PER_BATCH = 5;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const pad2 = (n: number): string => String(n).padStart(2, '0');

/** syslog-style local time, e.g. `Oct 19 09:05:03` */
export function formatSyslogTimestamp(d: Date): string {
  return `${MONTHS[d.getMonth()]} ${pad2(d.getDate())} ${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

export interface LogLineOptions {
  random?: () => number;
  ips?: readonly string[];
  users?: readonly string[];
}

const pick = (list: readonly string[], random: () => number): string | undefined =>
  _.nth(list, Math.floor(random() * list.length));

/** `random` drives every choice (address, then user, then outcome). */
export function generateLogLine(now: Date = new Date(), opts: LogLineOptions = {}): string {
  const random = opts.random ?? Math.random;
  const ip = pick(opts.ips ?? SAMPLE_IPS, random) ?? SAMPLE_IPS[0];
  const user = pick(opts.users ?? SAMPLE_USERS, random) ?? SAMPLE_USERS[0];
  const outcome = random() < FAILED_RATIO ? 'Failed' : 'Accepted';
  return `${formatSyslogTimestamp(now)} my-server sshd[1234]: ${outcome} password for ${user} from ${ip} port 54321 ssh2`;
}

export function batchFileName(now: Date): string {
  return `auth_${Math.floor(now.getTime() / 1000)}.log`;
}

/** Appends a batch to `auth_<unix seconds>.log` in `dir`; returns the file path. */
export async function writeLogBatch(
  dir: string,
  lines: number = LINES_PER_BATCH,
  now: Date = new Date(),
  opts: LogLineOptions = {},
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, batchFileName(now));
  const body = Array.from({ length: lines }, () => generateLogLine(now, opts) + '\n').join('');
  await writeFile(path, body, { flag: 'a' });
  return path;
}

export interface GeneratorRun {
  dir: string;
  intervalMs: number;
  batches?: number;
  signal?: AbortSignal;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

/** Writes batches until `batches` is reached or `signal` aborts. */
export async function runGenerator(run: GeneratorRun): Promise<string[]> {
  const written: string[] = [];
  while (!run.signal?.aborted && (run.batches === undefined || written.length < run.batches)) {
    const path = await writeLogBatch(run.dir);
    written.push(path);
    log.info(` [+] Generated new log batch: ${path}`);
    if (run.batches !== undefined && written.length >= run.batches) break;
    await sleep(run.intervalMs, run.signal);
  }
  return written;
}
