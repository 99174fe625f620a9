/**
 * Interactive Command
 *
 * Prompt-driven session with a "Single Song" and a "Batch Master" panel.
 * Each panel keeps its last status between runs.
 */

import chalk from 'chalk';
import type { Interface } from 'node:readline';
import {
  ensureFlacExtension,
  suggestBatchOutputDir,
  suggestSingleOutput,
  type PanelState,
} from '@refmaster/mastering';
import { loadConfig, type CliConfig } from '../config/index.js';
import { ask, createPrompt, splitPathList } from '../lib/prompt.js';
import { attachPanelView } from '../lib/panelView.js';
import { printHeader, toneColors } from '../lib/output.js';
import { startRuntime } from '../lib/startup.js';
import type { Runtime } from '../lib/runtime.js';

function statusLine(label: string, state: PanelState): string {
  return `${chalk.bold(label)} ${toneColors[state.tone](state.status)}`;
}

async function runSingle(rl: Interface, runtime: Runtime, config: CliConfig): Promise<void> {
  const reference = await ask(rl, 'Reference');
  const target = await ask(rl, 'Target');
  const output = await ask(rl, 'Output', target ? suggestSingleOutput(target) : '');
  const bitDepth = await ask(rl, 'Bit-depth (16, 24, 32)', config.defaultBitDepth);

  await runtime.single.start({
    reference,
    target,
    output: output ? ensureFlacExtension(output) : output,
    bitDepth,
  });
}

async function runBatch(rl: Interface, runtime: Runtime, config: CliConfig): Promise<void> {
  const reference = await ask(rl, 'Reference');
  const inputDir = await ask(rl, 'Input directory (leave empty to pick files)');
  const inputFiles = inputDir ? [] : splitPathList(await ask(rl, 'Input files (separate with ;)'));

  const suggested = inputFiles.length > 0
    ? suggestBatchOutputDir({ files: inputFiles })
    : inputDir
      ? suggestBatchOutputDir({ directory: inputDir })
      : null;
  const outputDir = await ask(rl, 'Output Dir', suggested ?? '');
  const bitDepth = await ask(rl, 'Bit-depth (16, 24, 32)', config.defaultBitDepth);

  await runtime.batch.start({ reference, inputDir, inputFiles, outputDir, bitDepth });
}

export async function interactiveCommand(): Promise<void> {
  const config = loadConfig();
  const runtime = startRuntime(config);
  if (!runtime) return;

  const detachSingle = attachPanelView(runtime.single);
  const detachBatch = attachPanelView(runtime.batch);
  const rl = createPrompt();

  try {
    for (;;) {
      printHeader('Simple Mastering');
      console.log(statusLine('[1] Single Song ', runtime.single.snapshot));
      console.log(statusLine('[2] Batch Master', runtime.batch.snapshot));
      console.log(chalk.gray('[q] Quit'));
      console.log();

      const choice = (await ask(rl, 'Choose')).toLowerCase();
      if (choice === '1') {
        await runSingle(rl, runtime, config);
      } else if (choice === '2') {
        await runBatch(rl, runtime, config);
      } else if (choice === 'q' || choice === 'quit') {
        break;
      } else {
        console.log(chalk.yellow(`Unknown choice '${choice}'`));
      }
    }
  } finally {
    rl.close();
    detachSingle();
    detachBatch();
  }
}
