import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ValidationError } from '@refmaster/core';
import { NO_FILES_FOUND, resolveBatchInputs } from './sourceResolver.js';

describe('resolveBatchInputs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'refmaster-inputs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns an explicit file list as given', async () => {
    const files = ['/music/b.mp3', '/elsewhere/a.txt'];
    expect(await resolveBatchInputs({ type: 'files', files })).toEqual(files);
  });

  it('keeps only audio files from a directory', async () => {
    await writeFile(join(dir, 'a.WAV'), '');
    await writeFile(join(dir, 'b.txt'), '');
    await writeFile(join(dir, 'c.flac'), '');
    await mkdir(join(dir, 'sub.mp3'));

    const found = await resolveBatchInputs({ type: 'directory', directory: dir });
    expect([...found].sort()).toEqual([join(dir, 'a.WAV'), join(dir, 'c.flac')]);
  });

  it('rejects a directory without audio files', async () => {
    await writeFile(join(dir, 'notes.txt'), '');

    const result = resolveBatchInputs({ type: 'directory', directory: dir });
    await expect(result).rejects.toBeInstanceOf(ValidationError);
    await expect(result).rejects.toThrow(NO_FILES_FOUND);
  });
});
