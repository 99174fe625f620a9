/**
 * Check Command
 *
 * Show where the mastering tool is expected and whether it is there.
 */

import { isToolAvailable } from '@refmaster/core';
import { loadConfig } from '../config/index.js';
import { resolveTool } from '../lib/runtime.js';
import { printError, printHeader, printJson, printKeyValue, printSuccess } from '../lib/output.js';

interface CheckOptions {
  json?: boolean;
}

export async function checkCommand(options: CheckOptions): Promise<void> {
  const config = loadConfig();
  const tool = resolveTool(config);
  const available = isToolAvailable(tool);

  if (options.json) {
    printJson({ ...tool, available });
  } else {
    printHeader('Mastering Tool');
    printKeyValue('Path', tool.scriptPath);
    printKeyValue('Found via', tool.source);
    printKeyValue('Command', [tool.command, ...tool.prefixArgs].join(' '));
    console.log();

    if (available) {
      printSuccess('Mastering CLI found');
    } else {
      printError(`Mastering CLI not found at ${tool.scriptPath}`);
    }
  }

  if (!available) {
    process.exitCode = 1;
  }
}
