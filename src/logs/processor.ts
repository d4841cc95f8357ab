import { mkdir, readFile, stat, unlink, watch, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import log from 'loglevel';
import { isAbortError, isNotFound, errorMessage } from '../errors.js';
import { filterThreatLines, listLogFiles } from './analyzer.js';

export const DEFAULT_SETTLE_MS = 100;

export interface ProcessedFile {
  source: string;
  target: string;
  kept: number;
}

/**
 * Appends the threat lines of `rawPath` to a file of the same name in
 * `processedDir`, then deletes the raw file.
 */
export async function processLogFile(rawPath: string, processedDir: string): Promise<ProcessedFile> {
  const kept = filterThreatLines(await readFile(rawPath, 'utf8'));
  await mkdir(processedDir, { recursive: true });
  const target = join(processedDir, basename(rawPath));
  await writeFile(target, kept.map(line => line + '\n').join(''), { flag: 'a' });
  await unlink(rawPath);
  return { source: rawPath, target, kept: kept.length };
}

export interface ProcessorRun {
  rawDir: string;
  processedDir: string;
  signal?: AbortSignal;
  // wait after a create event so the writer can finish the batch
  settleMs?: number;
  onProcessed?: (file: ProcessedFile) => void;
}

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (e) {
    if (isNotFound(e)) return false;
    throw e;
  }
}

/**
 * Processes the `*.log` files already in `rawDir`, then every new one until
 * `signal` aborts. Resolves with the number of files processed.
 */
export async function runProcessor(run: ProcessorRun): Promise<number> {
  await mkdir(run.rawDir, { recursive: true });
  const settleMs = run.settleMs ?? DEFAULT_SETTLE_MS;
  const inFlight = new Set<string>();
  let processed = 0;

  const handle = async (name: string, settle: boolean): Promise<void> => {
    if (!name.endsWith('.log') || inFlight.has(name)) return;
    inFlight.add(name);
    try {
      if (settle) await sleep(settleMs);
      const rawPath = join(run.rawDir, name);
      if (!(await isRegularFile(rawPath))) return;
      const file = await processLogFile(rawPath, run.processedDir);
      processed++;
      log.info(`Processed ${name}: kept ${file.kept} line(s)`);
      run.onProcessed?.(file);
    } catch (e) {
      log.warn(`Failed to process ${name}: ${errorMessage(e)}`);
    } finally {
      inFlight.delete(name);
    }
  };

  for (const name of await listLogFiles(run.rawDir)) {
    if (run.signal?.aborted) return processed;
    await handle(name, false);
  }

  try {
    for await (const event of watch(run.rawDir, { signal: run.signal })) {
      if (event.filename) await handle(event.filename, true);
    }
  } catch (e) {
    if (!isAbortError(e)) throw e;
  }
  return processed;
}
