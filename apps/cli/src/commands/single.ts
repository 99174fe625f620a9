/**
 * Single Command
 *
 * Master one song against a reference track.
 */

import { ensureFlacExtension, suggestSingleOutput } from '@refmaster/mastering';
import { loadConfig } from '../config/index.js';
import { attachPanelView } from '../lib/panelView.js';
import { printKeyValue } from '../lib/output.js';
import { startRuntime } from '../lib/startup.js';

interface SingleOptions {
  reference?: string;
  target?: string;
  output?: string;
  bitDepth?: string;
}

export async function singleCommand(options: SingleOptions): Promise<void> {
  const config = loadConfig();
  const runtime = startRuntime(config);
  if (!runtime) return;

  const output = options.output
    ? ensureFlacExtension(options.output)
    : options.target
      ? suggestSingleOutput(options.target)
      : undefined;

  if (output) {
    printKeyValue('Output', output);
  }

  const detach = attachPanelView(runtime.single);
  try {
    const final = await runtime.single.start({
      reference: options.reference,
      target: options.target,
      output,
      bitDepth: options.bitDepth ?? config.defaultBitDepth,
    });

    if (final.tone !== 'success') {
      process.exitCode = 1;
    }
  } finally {
    detach();
  }
}
