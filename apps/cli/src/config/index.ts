/**
 * CLI Configuration
 *
 * Environment (and .env) wins over ~/.refmaster/config.json, which wins
 * over defaults.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { BIT_DEPTHS, errorMessage } from '@refmaster/core';
import { logger } from '@refmaster/utils';

dotenvConfig();

// Config file location
export const CONFIG_DIR = join(homedir(), '.refmaster');
export const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

// Environment schema
const envSchema = z.object({
  REFMASTER_CLI_PATH: z.string().min(1).optional(),
  REFMASTER_PYTHON: z.string().min(1).optional(),
  REFMASTER_DEFAULT_BIT_DEPTH: z.enum(BIT_DEPTHS).optional(),
  REFMASTER_CONCURRENCY: z.string().regex(/^\d+$/).transform(Number).optional(),
  REFMASTER_TIMEOUT_MS: z.string().regex(/^\d+$/).transform(Number).optional(),
});

// Config file schema
export const configFileSchema = z.object({
  cliPath: z.string().min(1).optional(),
  python: z.string().min(1).default('python3'),
  defaultBitDepth: z.enum(BIT_DEPTHS).default('24'),
  concurrency: z.number().int().min(1).optional(),
  timeoutMs: z.number().int().min(0).default(0),
});

export type ConfigFile = z.infer<typeof configFileSchema>;
export type ConfigFileInput = z.input<typeof configFileSchema>;

export interface CliConfig {
  cliPath?: string;
  python: string;
  defaultBitDepth: ConfigFile['defaultBitDepth'];
  concurrency?: number;
  timeoutMs: number;
  configDir: string;
  configFile: string;
}

// Load config from file
function loadConfigFile(): ConfigFileInput {
  if (!existsSync(CONFIG_FILE)) {
    return {};
  }

  try {
    const content: unknown = JSON.parse(readFileSync(CONFIG_FILE, 'utf-8'));
    const parsed = configFileSchema.partial().safeParse(content);
    if (parsed.success) {
      return parsed.data;
    }
    logger.warn({ file: CONFIG_FILE, issues: parsed.error.issues }, 'Invalid config file, using defaults');
  } catch (error) {
    logger.warn({ file: CONFIG_FILE, error: errorMessage(error) }, 'Unreadable config file, using defaults');
  }
  return {};
}

// Save config to file
export function saveConfig(updates: Partial<ConfigFile>): void {
  mkdirSync(CONFIG_DIR, { recursive: true });
  const current = loadConfigFile();
  const merged = { ...current, ...updates };
  writeFileSync(CONFIG_FILE, JSON.stringify(merged, null, 2));
}

export function resetConfig(): void {
  mkdirSync(CONFIG_DIR, { recursive: true });
  writeFileSync(CONFIG_FILE, '{}');
}

/**
 * Merge environment and file values
 */
export function buildConfig(envInput: Record<string, string | undefined>, fileInput: ConfigFileInput): CliConfig {
  const env = envSchema.parse(envInput);
  const file = configFileSchema.parse(fileInput);

  return {
    cliPath: env.REFMASTER_CLI_PATH ?? file.cliPath,
    python: env.REFMASTER_PYTHON ?? file.python,
    defaultBitDepth: env.REFMASTER_DEFAULT_BIT_DEPTH ?? file.defaultBitDepth,
    concurrency: env.REFMASTER_CONCURRENCY ?? file.concurrency,
    timeoutMs: env.REFMASTER_TIMEOUT_MS ?? file.timeoutMs,
    configDir: CONFIG_DIR,
    configFile: CONFIG_FILE,
  };
}

export function loadConfig(): CliConfig {
  return buildConfig(process.env, loadConfigFile());
}
