/**
 * File naming rules shared by the form and the batch worker
 */

import { basename, dirname, join } from 'node:path';
import { getBasename, hasExtension } from '@refmaster/utils';

export const AUDIO_EXTENSIONS = ['.wav', '.flac', '.aiff', '.mp3'] as const;

export const MASTERED_SUFFIX = ' (Mastered)';
export const OUTPUT_EXTENSION = '.flac';
export const BATCH_OUTPUT_FOLDER = 'Mastered';

export function isAudioFile(filename: string): boolean {
  return hasExtension(filename, AUDIO_EXTENSIONS);
}

/** `track1.wav` → `track1 (Mastered).flac` */
export function masteredFileName(inputPath: string): string {
  return `${getBasename(inputPath)}${MASTERED_SUFFIX}${OUTPUT_EXTENSION}`;
}

export function masteredOutputPath(inputPath: string, outputDir: string): string {
  return join(outputDir, masteredFileName(inputPath));
}

/**
 * Default output for a single target: next to the target itself
 */
export function suggestSingleOutput(targetPath: string): string {
  return masteredOutputPath(targetPath, dirname(targetPath));
}

/**
 * Default batch output folder: `Mastered` inside the input directory, or
 * inside the parent directory of the first selected file
 */
export function suggestBatchOutputDir(
  source: { directory: string } | { files: readonly string[] }
): string | null {
  if ('directory' in source) {
    return join(source.directory, BATCH_OUTPUT_FOLDER);
  }
  const [first] = source.files;
  return first ? join(dirname(first), BATCH_OUTPUT_FOLDER) : null;
}

export function ensureFlacExtension(path: string): string {
  return path.toLowerCase().endsWith(OUTPUT_EXTENSION) ? path : `${path}${OUTPUT_EXTENSION}`;
}

export function displayName(path: string): string {
  return basename(path);
}
