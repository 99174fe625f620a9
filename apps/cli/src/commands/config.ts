/**
 * Config Command
 *
 * View and manage CLI configuration.
 */

import chalk from 'chalk';
import { configFileSchema, loadConfig, resetConfig, saveConfig, type ConfigFile } from '../config/index.js';
import { printError, printHeader, printSuccess } from '../lib/output.js';

interface ConfigOptions {
  set?: string;
  get?: string;
  list?: boolean;
  reset?: boolean;
}

const configKeys = ['cliPath', 'python', 'defaultBitDepth', 'concurrency', 'timeoutMs'] as const;
type ConfigKey = typeof configKeys[number];

const configDescriptions: Record<ConfigKey, string> = {
  cliPath: 'Path to the mastering CLI script or binary (REFMASTER_CLI_PATH)',
  python: 'Interpreter used for .py tools (REFMASTER_PYTHON)',
  defaultBitDepth: 'Bit-depth used when none is given (REFMASTER_DEFAULT_BIT_DEPTH)',
  concurrency: 'Maximum jobs running at once (REFMASTER_CONCURRENCY)',
  timeoutMs: 'Per-file tool timeout in milliseconds, 0 for none (REFMASTER_TIMEOUT_MS)',
};

function isConfigKey(key: string): key is ConfigKey {
  return (configKeys as readonly string[]).includes(key);
}

/**
 * Parse `key=value` into a validated config update
 */
export function parseAssignment(assignment: string): Partial<ConfigFile> {
  const index = assignment.indexOf('=');
  if (index <= 0) {
    throw new Error('Usage: refmaster config --set <key=value>');
  }

  const key = assignment.slice(0, index).trim();
  const raw = assignment.slice(index + 1).trim();
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key}`);
  }

  const value = key === 'concurrency' || key === 'timeoutMs' ? Number(raw) : raw;
  const parsed = configFileSchema.partial().safeParse({ [key]: value });
  if (!parsed.success) {
    throw new Error(`Invalid value for ${key}: ${parsed.error.issues.map((i) => i.message).join(', ')}`);
  }
  return parsed.data;
}

function listConfig(): void {
  const config = loadConfig();
  printHeader('CLI Configuration');

  for (const key of configKeys) {
    const value = config[key];
    console.log(`${chalk.cyan(key)}: ${value ?? chalk.gray('not set')}`);
    console.log(`  ${chalk.gray(configDescriptions[key])}`);
  }
  console.log();
  console.log(chalk.gray(`Config file: ${config.configFile}`));
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  try {
    if (options.reset) {
      resetConfig();
      printSuccess('Configuration reset to defaults');
      return;
    }

    if (options.set) {
      const update = parseAssignment(options.set);
      saveConfig(update);
      printSuccess(`Saved ${Object.keys(update).join(', ')}`);
      return;
    }

    if (options.get) {
      if (!isConfigKey(options.get)) {
        throw new Error(`Unknown config key: ${options.get}`);
      }
      const value = loadConfig()[options.get];
      console.log(value ?? '');
      return;
    }

    listConfig();
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = 1;
  }
}
