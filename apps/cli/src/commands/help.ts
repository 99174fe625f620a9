/**
 * Help Command
 *
 * Shows detailed help for all commands.
 */

import chalk from 'chalk';
import { printHeader } from '../lib/output.js';

export async function helpCommand(command?: string): Promise<void> {
  if (command) {
    showCommandHelp(command);
    return;
  }

  printHeader('Refmaster CLI Help');

  console.log(chalk.bold('MASTERING COMMANDS:'));
  console.log();
  console.log(chalk.cyan('  single'));
  console.log('    Master one song so it matches a reference track');
  console.log('    Options: -r, --reference <file>  -t, --target <file>  -o, --output <file>  -b, --bit-depth <16|24|32>');
  console.log();
  console.log(chalk.cyan('  batch'));
  console.log('    Master a folder or a list of songs against one reference');
  console.log('    Options: -r, --reference <file>  -d, --dir <folder>  -f, --files <files...>  -o, --output <folder>  -b, --bit-depth <16|24|32>');
  console.log();
  console.log(chalk.cyan('  interactive'));
  console.log('    Prompt for every field, with Single Song and Batch Master panels');
  console.log();

  console.log(chalk.bold('SYSTEM COMMANDS:'));
  console.log();
  console.log(chalk.cyan('  check'));
  console.log('    Show where the mastering CLI is expected and whether it exists');
  console.log();
  console.log(chalk.cyan('  config'));
  console.log('    View or modify CLI configuration');
  console.log('    Options: --list  --get <key>  --set <key=value>  --reset');
  console.log();

  console.log(chalk.bold('ENVIRONMENT VARIABLES:'));
  console.log();
  console.log('  REFMASTER_CLI_PATH            Mastering CLI (default: matchering-cli/mg_cli.py)');
  console.log('  REFMASTER_PYTHON              Interpreter for .py tools (default: python3)');
  console.log('  REFMASTER_DEFAULT_BIT_DEPTH   16, 24 or 32 (default: 24)');
  console.log('  REFMASTER_CONCURRENCY         Jobs running at once (default: CPU count)');
  console.log('  REFMASTER_TIMEOUT_MS          Per-file timeout, 0 for none (default: 0)');
  console.log('  LOG_LEVEL                     pino log level (default: info)');
  console.log();

  console.log(chalk.bold('EXAMPLES:'));
  console.log();
  console.log(chalk.gray('  # Master one song at 24 bit'));
  console.log('  $ refmaster single -r ref.wav -t song.wav');
  console.log();
  console.log(chalk.gray('  # Master a whole folder into ./album/Mastered'));
  console.log('  $ refmaster batch -r ref.wav -d ./album -b 16');
  console.log();
  console.log(chalk.gray('  # Master selected files'));
  console.log('  $ refmaster batch -r ref.wav -f one.wav two.flac -o ./out');
  console.log();
}

function showCommandHelp(command: string): void {
  const helpTexts: Record<string, () => void> = {
    single: () => {
      printHeader('single - Master one song');
      console.log('Usage: refmaster single -r <reference> -t <target> [options]');
      console.log();
      console.log('Options:');
      console.log('  -o, --output <file>        Output file (default: "<target> (Mastered).flac" beside the target)');
      console.log('  -b, --bit-depth <depth>    16, 24 or 32 (default: 24)');
    },
    batch: () => {
      printHeader('batch - Master several songs');
      console.log('Usage: refmaster batch -r <reference> (-d <folder> | -f <files...>) [options]');
      console.log();
      console.log('Options:');
      console.log('  -o, --output <folder>      Output folder (default: "Mastered" inside the input folder)');
      console.log('  -b, --bit-depth <depth>    16, 24 or 32 (default: 24)');
      console.log();
      console.log('Files given with -f take precedence over -d.');
      console.log('Folders are scanned for .wav, .flac, .aiff and .mp3 files (not recursive).');
      console.log('The batch stops at the first file the mastering CLI fails on.');
    },
  };

  const helpFn = helpTexts[command];
  if (helpFn) {
    helpFn();
  } else {
    console.log(chalk.yellow(`No detailed help for '${command}'`));
    console.log('Run "refmaster help" for general help');
  }
}
