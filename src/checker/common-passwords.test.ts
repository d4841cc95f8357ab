import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import log from 'loglevel';
import { CommonPasswordList, loadCommonPasswords, parseCommonPasswordText } from './common-passwords.js';
import { DEFAULT_COMMON_PASSWORDS } from './const.js';

describe('CommonPasswordList', () => {
  it('starts from the built-in list', () => {
    const list = CommonPasswordList.seed();
    expect(list.size).toBe(10);
    expect(list.has('password')).toBe(true);
    expect([...list]).toEqual([...DEFAULT_COMMON_PASSWORDS]);
  });

  it('cleans extra entries and keeps insertion order', () => {
    const list = CommonPasswordList.fromEntries([' Hunter22 ', '', '# note', 'password', 'Sunshine']);
    expect(list.size).toBe(12);
    expect(list.has('hunter22')).toBe(true);
    expect(list.has('# note')).toBe(false);
    expect([...list].slice(10)).toEqual(['hunter22', 'sunshine']);
  });

  it('limits candidates', () => {
    const list = CommonPasswordList.fromEntries(Array.from({ length: 6000 }, (_, i) => `filler${i}`));
    expect(list.size).toBe(6010);
    expect([...list.candidates(3)]).toEqual(['password', '123456', '123456789']);
    expect([...list.candidates(5000)]).toHaveLength(5000);
    expect([...list.candidates(0)]).toEqual([]);
  });
});

describe('parseCommonPasswordText', () => {
  it('skips blanks and comments', () => {
    expect(parseCommonPasswordText('# header\n\nAlpha\r\n  #indented comment\n beta \n')).toEqual(['alpha', 'beta']);
  });
});

describe('loadCommonPasswords', () => {
  let tmpDir: string;

  beforeEach(() => {
    log.setLevel('silent');
    tmpDir = mkdtempSync(join(tmpdir(), 'pwcheck-common-test-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns the seed list without a path', async () => {
    const list = await loadCommonPasswords();
    expect(list.size).toBe(10);
  });

  it('falls back to the seed list for a missing file', async () => {
    const list = await loadCommonPasswords(join(tmpDir, 'missing.txt'));
    expect([...list]).toEqual([...DEFAULT_COMMON_PASSWORDS]);
  });

  it('falls back to the seed list when the path cannot be read', async () => {
    const list = await loadCommonPasswords(tmpDir);
    expect(list.size).toBe(10);
  });

  it('merges file entries after the seed list', async () => {
    const file = join(tmpDir, 'common.txt');
    writeFileSync(file, '# comment\n\n  Hunter22  \nSunshine\r\nqwerty\n');
    const list = await loadCommonPasswords(file);
    expect(list.size).toBe(12);
    expect([...list].slice(10)).toEqual(['hunter22', 'sunshine']);
  });
});
