import { readFile, access } from 'fs/promises';
import log from 'loglevel';
import { DEFAULT_COMMON_PASSWORDS, UTF8 } from './const.js';
import { errorMessage } from '../errors.js';
import { stripWhitespace } from './normalize.js';

/**
 * Known-weak passwords, lower-cased. Iterates in insertion order: the built-in
 * seed first, then supplemental entries in the order they were read.
 */
export class CommonPasswordList implements Iterable<string> {
  private readonly entries: ReadonlySet<string>;

  private constructor(entries: Set<string>) {
    this.entries = entries;
    Object.freeze(this);
  }

  static fromEntries(extra: Iterable<string> = []): CommonPasswordList {
    const entries = new Set<string>(DEFAULT_COMMON_PASSWORDS);
    for (const raw of extra) {
      const value = cleanLine(raw);
      if (value !== null) entries.add(value);
    }
    return new CommonPasswordList(entries);
  }

  static seed(): CommonPasswordList {
    return CommonPasswordList.fromEntries();
  }

  get size(): number {
    return this.entries.size;
  }

  has(value: string): boolean {
    return this.entries.has(value);
  }

  /** Yields at most `limit` entries, in list order. */
  *candidates(limit: number): Generator<string> {
    if (limit <= 0) return;
    let seen = 0;
    for (const entry of this.entries) {
      yield entry;
      if (++seen >= limit) return;
    }
  }

  [Symbol.iterator](): Iterator<string> {
    return this.entries.values();
  }
}

function cleanLine(line: string): string | null {
  const value = stripWhitespace(line);
  if (!value || value.startsWith('#')) return null;
  return value.toLowerCase();
}

export function parseCommonPasswordText(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(cleanLine)
    .filter((v): v is string => v !== null);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Loads the seed list plus the supplemental file at `path`. Never rejects:
 * a missing or unreadable file yields the seed list alone.
 */
export async function loadCommonPasswords(path?: string): Promise<CommonPasswordList> {
  if (!path) return CommonPasswordList.seed();

  if (!(await exists(path))) {
    log.debug(`common list not found, using built-in list: ${path}`);
    return CommonPasswordList.seed();
  }

  try {
    const raw = await readFile(path, UTF8);
    const list = CommonPasswordList.fromEntries(parseCommonPasswordText(raw));
    log.debug(`loaded common list ${path} (${list.size} entries)`);
    return list;
  } catch (e) {
    log.debug(`could not read common list ${path}, using built-in list: ${errorMessage(e)}`);
    return CommonPasswordList.seed();
  }
}
