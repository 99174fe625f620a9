import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ensureDir, isDirectory, listFiles } from './file.js';

describe('file operations', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'refmaster-utils-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('creates nested directories', async () => {
    const target = join(root, 'a', 'b');
    await ensureDir(target);
    expect(await isDirectory(target)).toBe(true);
  });

  it('reports missing paths and files as not directories', async () => {
    await writeFile(join(root, 'song.wav'), '');
    expect(await isDirectory(join(root, 'missing'))).toBe(false);
    expect(await isDirectory(join(root, 'song.wav'))).toBe(false);
  });

  it('lists files but not subdirectories', async () => {
    await writeFile(join(root, 'one.wav'), '');
    await mkdir(join(root, 'nested.wav'));
    expect(await listFiles(root)).toEqual(['one.wav']);
  });
});
