/**
 * Runtime wiring: mastering tool, worker pool and panels built from config
 */

import {
  assertToolAvailable,
  resolveMasteringTool,
  type MasteringTool,
} from '@refmaster/core';
import { WorkerPool, SinglePanel, BatchPanel } from '@refmaster/mastering';
import { logger } from '@refmaster/utils';
import type { CliConfig } from '../config/index.js';

export interface Runtime {
  tool: MasteringTool;
  pool: WorkerPool;
  single: SinglePanel;
  batch: BatchPanel;
}

export function resolveTool(config: CliConfig): MasteringTool {
  return resolveMasteringTool({ cliPath: config.cliPath, python: config.python });
}

/**
 * Build the runtime. Throws `ToolNotFoundError` when the tool is missing.
 */
export function createRuntime(config: CliConfig): Runtime {
  const tool = resolveTool(config);
  logger.debug({ scriptPath: tool.scriptPath, source: tool.source }, 'Checking for mastering CLI');
  assertToolAvailable(tool);

  const pool = new WorkerPool({
    tool,
    concurrency: config.concurrency,
    timeoutMs: config.timeoutMs,
  });
  logger.debug({ concurrency: pool.concurrency }, 'Mastering CLI found');

  return {
    tool,
    pool,
    single: new SinglePanel(pool),
    batch: new BatchPanel(pool),
  };
}
