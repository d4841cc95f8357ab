import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { isNotFound } from '../errors.js';

export const THREAT_MARKERS = ['Failed', 'ERROR', 'Critical'] as const;

export interface LogSummary {
  total_count: number;
  failed_attempts: number;
  files: number;
}

export function isThreatLine(line: string): boolean {
  return THREAT_MARKERS.some(m => line.includes(m));
}

export function filterThreatLines(text: string): string[] {
  return text.split(/\r?\n/).filter(isThreatLine);
}

/** Names of regular `*.log` files in `dir`, sorted; none when `dir` is missing. */
export async function listLogFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter(e => e.isFile() && e.name.endsWith('.log'))
      .map(e => e.name)
      .sort();
  } catch (e) {
    if (isNotFound(e)) return [];
    throw e;
  }
}

/** Counts non-blank lines and threat lines across every `*.log` file in `dir`. */
export async function summarizeLogs(dir: string): Promise<LogSummary> {
  const summary: LogSummary = { total_count: 0, failed_attempts: 0, files: 0 };
  for (const name of await listLogFiles(dir)) {
    const text = await readFile(join(dir, name), 'utf8');
    const lines = text.split(/\r?\n/).filter(l => l.trim().length > 0);
    summary.files++;
    summary.total_count += lines.length;
    summary.failed_attempts += lines.filter(isThreatLine).length;
  }
  return summary;
}
