/**
 * Mastering Tool Resolution
 *
 * Locates the external reference-mastering CLI.
 *
 * Priority order:
 * 1. Explicit path (REFMASTER_CLI_PATH or the config file)
 * 2. matchering-cli/mg_cli.py beside the application
 * 3. ~/matchering-cli/mg_cli.py
 *
 * Python scripts are run through an interpreter; anything else is executed
 * directly.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ToolNotFoundError } from '../errors/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Walk up from `start` to the workspace root: the first directory whose
 * package.json declares `workspaces`. Works from the source tree and from
 * the compiled tree under dist/.
 */
export function findAppRoot(start: string): string {
  let dir = resolve(start);
  for (;;) {
    const manifest = join(dir, 'package.json');
    if (existsSync(manifest)) {
      const parsed: unknown = JSON.parse(readFileSync(manifest, 'utf8'));
      if (typeof parsed === 'object' && parsed !== null && 'workspaces' in parsed) {
        return dir;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      // Not inside the workspace; assume the source layout
      return resolve(__dirname, '../../../..');
    }
    dir = parent;
  }
}

const APP_ROOT = findAppRoot(__dirname);

export const TOOL_FOLDER = 'matchering-cli';
export const TOOL_SCRIPT = 'mg_cli.py';

export type ToolSource = 'configured' | 'bundled' | 'home';

export interface MasteringTool {
  /** Executable to spawn */
  command: string;
  /** Arguments placed before the mastering arguments (the script, for Python) */
  prefixArgs: readonly string[];
  /** Path that has to exist for the tool to run */
  scriptPath: string;
  source: ToolSource;
}

export interface ResolveToolOptions {
  cliPath?: string;
  python?: string;
  appRoot?: string;
  homeDir?: string;
  exists?: (path: string) => boolean;
}

export function resolveMasteringTool(options: ResolveToolOptions = {}): MasteringTool {
  const {
    cliPath,
    python = 'python3',
    appRoot = APP_ROOT,
    homeDir = homedir(),
    exists = existsSync,
  } = options;

  let scriptPath: string;
  let source: ToolSource;

  if (cliPath) {
    scriptPath = resolve(cliPath);
    source = 'configured';
  } else {
    const bundled = join(appRoot, TOOL_FOLDER, TOOL_SCRIPT);
    if (exists(bundled)) {
      scriptPath = bundled;
      source = 'bundled';
    } else {
      scriptPath = join(homeDir, TOOL_FOLDER, TOOL_SCRIPT);
      source = 'home';
    }
  }

  if (scriptPath.toLowerCase().endsWith('.py')) {
    return { command: python, prefixArgs: [scriptPath], scriptPath, source };
  }

  return { command: scriptPath, prefixArgs: [], scriptPath, source };
}

export function isToolAvailable(
  tool: MasteringTool,
  exists: (path: string) => boolean = existsSync
): boolean {
  return exists(tool.scriptPath);
}

/**
 * Fatal startup check: throws when the tool's script or binary is missing
 */
export function assertToolAvailable(
  tool: MasteringTool,
  exists: (path: string) => boolean = existsSync
): void {
  if (!isToolAvailable(tool, exists)) {
    throw new ToolNotFoundError(tool.scriptPath);
  }
}
