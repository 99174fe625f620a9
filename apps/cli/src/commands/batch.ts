/**
 * Batch Command
 *
 * Master every file of a folder, or an explicit list of files, against one
 * reference track.
 */

import { suggestBatchOutputDir } from '@refmaster/mastering';
import { loadConfig } from '../config/index.js';
import { attachPanelView } from '../lib/panelView.js';
import { printKeyValue } from '../lib/output.js';
import { startRuntime } from '../lib/startup.js';

interface BatchOptions {
  reference?: string;
  dir?: string;
  files?: string[];
  output?: string;
  bitDepth?: string;
}

export function defaultBatchOutput(options: Pick<BatchOptions, 'dir' | 'files'>): string | undefined {
  if (options.files && options.files.length > 0) {
    return suggestBatchOutputDir({ files: options.files }) ?? undefined;
  }
  if (options.dir) {
    return suggestBatchOutputDir({ directory: options.dir }) ?? undefined;
  }
  return undefined;
}

export async function batchCommand(options: BatchOptions): Promise<void> {
  const config = loadConfig();
  const runtime = startRuntime(config);
  if (!runtime) return;

  const outputDir = options.output ?? defaultBatchOutput(options);
  if (outputDir) {
    printKeyValue('Output Dir', outputDir);
  }

  const detach = attachPanelView(runtime.batch);
  try {
    const final = await runtime.batch.start({
      reference: options.reference,
      inputDir: options.dir,
      inputFiles: options.files,
      outputDir,
      bitDepth: options.bitDepth ?? config.defaultBitDepth,
    });

    if (final.tone !== 'success') {
      process.exitCode = 1;
    }
  } finally {
    detach();
  }
}
