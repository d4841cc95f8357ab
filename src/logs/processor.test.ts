import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import log from 'loglevel';
import { processLogFile, runProcessor, type ProcessedFile } from './processor.js';

const RAW = [
  'Oct 19 09:05:03 my-server sshd[1234]: Failed password for root from 10.0.0.42 port 54321 ssh2',
  'Oct 19 09:05:03 my-server sshd[1234]: Accepted password for guest from 10.0.0.42 port 54321 ssh2',
  'Oct 19 09:05:04 my-server kernel: ERROR disk quota exceeded',
  '',
].join('\n');

const KEPT =
  'Oct 19 09:05:03 my-server sshd[1234]: Failed password for root from 10.0.0.42 port 54321 ssh2\n' +
  'Oct 19 09:05:04 my-server kernel: ERROR disk quota exceeded\n';

describe('log processor', () => {
  let tmpDir: string;
  let rawDir: string;
  let processedDir: string;

  beforeEach(() => {
    log.setLevel('silent');
    tmpDir = mkdtempSync(join(tmpdir(), 'pwcheck-logproc-test-'));
    rawDir = join(tmpDir, 'raw');
    processedDir = join(tmpDir, 'processed');
    mkdirSync(rawDir);
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('processLogFile', () => {
    it('keeps threat lines and removes the raw file', async () => {
      const rawPath = join(rawDir, 'auth_1.log');
      writeFileSync(rawPath, RAW);
      const file = await processLogFile(rawPath, processedDir);
      expect(file).toEqual({ source: rawPath, target: join(processedDir, 'auth_1.log'), kept: 2 });
      expect(readFileSync(file.target, 'utf8')).toBe(KEPT);
      expect(existsSync(rawPath)).toBe(false);
    });

    it('appends when the same batch name comes back', async () => {
      const rawPath = join(rawDir, 'auth_1.log');
      writeFileSync(rawPath, RAW);
      await processLogFile(rawPath, processedDir);
      writeFileSync(rawPath, 'Critical: sshd restarted\n');
      await processLogFile(rawPath, processedDir);
      expect(readFileSync(join(processedDir, 'auth_1.log'), 'utf8')).toBe(KEPT + 'Critical: sshd restarted\n');
    });

    it('writes an empty file when nothing matches', async () => {
      const rawPath = join(rawDir, 'auth_2.log');
      writeFileSync(rawPath, 'Accepted password for guest\n');
      const file = await processLogFile(rawPath, processedDir);
      expect(file.kept).toBe(0);
      expect(readFileSync(file.target, 'utf8')).toBe('');
    });

    it('fails for a missing raw file', async () => {
      await expect(processLogFile(join(rawDir, 'gone.log'), processedDir)).rejects.toThrow(/ENOENT/);
    });
  });

  describe('runProcessor', () => {
    it('processes files already waiting, then stops on abort', async () => {
      writeFileSync(join(rawDir, 'auth_1.log'), RAW);
      writeFileSync(join(rawDir, 'notes.txt'), 'Failed\n');
      const controller = new AbortController();
      const count = await runProcessor({
        rawDir,
        processedDir,
        signal: controller.signal,
        onProcessed: () => controller.abort(),
      });
      expect(count).toBe(1);
      expect(readFileSync(join(processedDir, 'auth_1.log'), 'utf8')).toBe(KEPT);
      expect(existsSync(join(rawDir, 'notes.txt'))).toBe(true);
    });

    it('picks up files created while watching', async () => {
      const controller = new AbortController();
      let done: (file: ProcessedFile) => void = () => undefined;
      const seen = new Promise<ProcessedFile>(resolve => {
        done = resolve;
      });
      const run = runProcessor({ rawDir, processedDir, signal: controller.signal, settleMs: 10, onProcessed: f => done(f) });

      await new Promise(resolve => setTimeout(resolve, 100));
      writeFileSync(join(rawDir, 'auth_5.log'), RAW);

      const file = await seen;
      controller.abort();
      expect(await run).toBe(1);
      expect(file.target).toBe(join(processedDir, 'auth_5.log'));
      expect(readFileSync(file.target, 'utf8')).toBe(KEPT);
      expect(existsSync(join(rawDir, 'auth_5.log'))).toBe(false);
    });

    it('returns at once when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      expect(await runProcessor({ rawDir, processedDir, signal: controller.signal })).toBe(0);
    });

    it('creates a missing raw directory', async () => {
      const controller = new AbortController();
      controller.abort();
      const missing = join(tmpDir, 'later', 'raw');
      await runProcessor({ rawDir: missing, processedDir, signal: controller.signal });
      expect(existsSync(missing)).toBe(true);
    });
  });
});
