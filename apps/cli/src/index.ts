#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for refmaster. The mastering itself is done by an
 * external CLI tool; this program validates input, runs the tool and
 * reports progress.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '@refmaster/utils';

// Commands
import { singleCommand } from './commands/single.js';
import { batchCommand } from './commands/batch.js';
import { interactiveCommand } from './commands/interactive.js';
import { checkCommand } from './commands/check.js';
import { configCommand } from './commands/config.js';
import { helpCommand } from './commands/help.js';

const program = new Command();

program
  .name('refmaster')
  .description('Reference-based audio mastering shell')
  .version('1.0.0')
  .helpCommand(false)
  .option('--debug', 'Enable debug output')
  .hook('preAction', (command) => {
    if (command.opts<{ debug?: boolean }>().debug) {
      logger.level = 'debug';
    }
  });

// ============================================
// MASTERING COMMANDS
// ============================================

program
  .command('single')
  .description('Master a single song against a reference track')
  .option('-r, --reference <file>', 'Reference track')
  .option('-t, --target <file>', 'Song to master')
  .option('-o, --output <file>', 'Where to save the mastered file')
  .option('-b, --bit-depth <depth>', 'Output bit-depth (16, 24, 32)')
  .action(singleCommand);

program
  .command('batch')
  .description('Master a folder or a list of songs against a reference track')
  .option('-r, --reference <file>', 'Reference track')
  .option('-d, --dir <folder>', 'Folder to scan for audio files')
  .option('-f, --files <files...>', 'Songs to master (takes precedence over --dir)')
  .option('-o, --output <folder>', 'Folder for mastered files')
  .option('-b, --bit-depth <depth>', 'Output bit-depth (16, 24, 32)')
  .action(batchCommand);

program
  .command('interactive')
  .description('Fill in the mastering forms step by step')
  .action(interactiveCommand);

// ============================================
// SYSTEM COMMANDS
// ============================================

program
  .command('check')
  .description('Locate the mastering CLI')
  .option('--json', 'Output in JSON format')
  .action(checkCommand);

program
  .command('config')
  .description('View or modify CLI configuration')
  .option('--set <key=value>', 'Set a config value')
  .option('--get <key>', 'Get a config value')
  .option('--list', 'List all config values')
  .option('--reset', 'Reset to defaults')
  .action(configCommand);

program
  .command('help [command]')
  .description('Show detailed help for all commands')
  .action(helpCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('refmaster help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
await program.parseAsync();
