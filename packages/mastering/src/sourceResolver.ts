/**
 * Batch Input Resolution
 */

import { join } from 'node:path';
import { listFiles } from '@refmaster/utils';
import { ValidationError, type BatchInputSource } from '@refmaster/core';
import { isAudioFile } from './naming.js';

export const NO_FILES_FOUND = 'No audio files found in the input folder.';

/**
 * Resolve the ordered list of files a batch will master.
 *
 * An explicit list is returned as given. A directory is scanned without
 * recursion and keeps the filesystem's order.
 */
export async function resolveBatchInputs(source: BatchInputSource): Promise<string[]> {
  if (source.type === 'files') {
    return [...source.files];
  }

  const names = await listFiles(source.directory);
  const found = names.filter(isAudioFile).map((name) => join(source.directory, name));

  if (found.length === 0) {
    throw new ValidationError('No Files', NO_FILES_FOUND, 'input');
  }

  return found;
}
