/**
 * Startup guard shared by the commands that run the mastering tool
 */

import { ToolNotFoundError } from '@refmaster/core';
import { loadConfig, type CliConfig } from '../config/index.js';
import { createRuntime, type Runtime } from './runtime.js';
import { printErrorBox } from './output.js';

/**
 * Build the runtime or report the missing tool. Returns null (with the exit
 * code set) when the tool cannot be found.
 */
export function startRuntime(config: CliConfig = loadConfig()): Runtime | null {
  try {
    return createRuntime(config);
  } catch (error) {
    if (error instanceof ToolNotFoundError) {
      printErrorBox('Fatal Error', error.message);
      process.exitCode = 1;
      return null;
    }
    throw error;
  }
}
