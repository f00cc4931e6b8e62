import { describe, it, expect } from 'vitest';
import { mkdtemp, mkdir, readFile, writeFile, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileProcessingError } from '../../src/common/errors';
import { parseRuleSet } from '../../src/rules';
import { processFile } from '../../src/sanitizer/pipeline';
import type { FileTask } from '../../src/sanitizer/types';

async function withTempDir(fn: (dir: string) => Promise<void>) {
  const dir = await mkdtemp(join(tmpdir(), 'log-sanitizer-pipeline-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

function taskFor(dir: string, relativePath: string): FileTask {
  return {
    relativePath,
    sourcePath: join(dir, 'source', relativePath),
    destinationPath: join(dir, 'results', relativePath),
  };
}

const digits = parseRuleSet('\\d+\n', 'main.rule');

describe('processFile', () => {
  it('writes the sanitized text to a mirrored path, creating parent directories', async () => {
    await withTempDir(async (dir) => {
      const task = taskFor(dir, 'nested/deep/app.log');
      await mkdir(join(dir, 'source', 'nested', 'deep'), { recursive: true });
      await writeFile(task.sourcePath, 'Order 12345 shipped\n');

      const outcome = await processFile(task, digits, { placeholder: '*', maintainLength: true });

      expect(outcome.status).toBe('sanitized');
      expect(await readFile(task.destinationPath, 'utf8')).toBe('Order ***** shipped\n');
    });
  });

  it('overwrites an existing destination file', async () => {
    await withTempDir(async (dir) => {
      const task = taskFor(dir, 'app.log');
      await mkdir(join(dir, 'source'), { recursive: true });
      await mkdir(join(dir, 'results'), { recursive: true });
      await writeFile(task.sourcePath, 'pin 42');
      await writeFile(task.destinationPath, 'stale content that is longer');

      await processFile(task, digits, { placeholder: 'N', maintainLength: false });

      expect(await readFile(task.destinationPath, 'utf8')).toBe('pin N');
    });
  });

  it('decodes malformed UTF-8 permissively', async () => {
    await withTempDir(async (dir) => {
      const task = taskFor(dir, 'binary.log');
      await mkdir(join(dir, 'source'), { recursive: true });
      await writeFile(task.sourcePath, Buffer.from([0x61, 0xff, 0x31, 0x32]));

      const outcome = await processFile(task, digits, { placeholder: '*', maintainLength: true });

      expect(outcome.status).toBe('sanitized');
      expect(await readFile(task.destinationPath, 'utf8')).toBe('a\uFFFD**');
    });
  });

  it('reports the applied rules', async () => {
    await withTempDir(async (dir) => {
      const task = taskFor(dir, 'a.txt');
      await mkdir(join(dir, 'source'), { recursive: true });
      await writeFile(task.sourcePath, 'abc 1');
      const ruleSet = parseRuleSet('\\d+\nzzz\n', 'main.rule');

      const outcome = await processFile(task, ruleSet, { placeholder: '*', maintainLength: true });

      expect(outcome).toEqual({ status: 'sanitized', task, appliedRules: ['\\d+'] });
    });
  });

  it('returns a failed outcome instead of throwing when the source is missing', async () => {
    await withTempDir(async (dir) => {
      const task = taskFor(dir, 'gone.log');

      const outcome = await processFile(task, digits, { placeholder: '*', maintainLength: true });

      expect(outcome.status).toBe('failed');
      if (outcome.status === 'failed') {
        expect(outcome.error).toBeInstanceOf(FileProcessingError);
        expect(outcome.error.path).toBe(task.sourcePath);
        expect(outcome.error.code).toBe('FILE_PROCESSING');
      }
      expect(existsSync(task.destinationPath)).toBe(false);
    });
  });

  it('fails locally when the destination cannot be written', async () => {
    await withTempDir(async (dir) => {
      const task = taskFor(dir, 'a.txt');
      await mkdir(join(dir, 'source'), { recursive: true });
      await writeFile(task.sourcePath, '1');
      await mkdir(task.destinationPath, { recursive: true });

      const outcome = await processFile(task, digits, { placeholder: '*', maintainLength: true });

      expect(outcome.status).toBe('failed');
    });
  });

  it('writes nothing in dry-run mode', async () => {
    await withTempDir(async (dir) => {
      const task = taskFor(dir, 'sub/a.txt');
      await mkdir(join(dir, 'source', 'sub'), { recursive: true });
      await writeFile(task.sourcePath, '1');

      const outcome = await processFile(task, digits, { placeholder: '*', maintainLength: true, dryRun: true });

      expect(outcome.status).toBe('sanitized');
      expect(existsSync(join(dir, 'results'))).toBe(false);
    });
  });
});
