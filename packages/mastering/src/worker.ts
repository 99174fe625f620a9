/**
 * Mastering Workers
 *
 * Run the external tool for one job and translate the outcome into worker
 * reports. Workers never throw: every fault ends up as an `error` report,
 * and `finished` is always the last report.
 */

import { resolve } from 'node:path';
import {
  executeCommand,
  createLogger,
  formatCommandLine,
  type CommandResult,
  type CommandRunner,
  type KeyedLock,
  type Logger,
} from '@refmaster/utils';
import {
  CommandExecutionError,
  CommandLaunchError,
  ValidationError,
  errorMessage,
  type BatchMasteringJob,
  type MasteringJob,
  type MasteringTool,
  type ReportSink,
  type SingleMasteringJob,
} from '@refmaster/core';
import { createMasteringCommand, type MasteringCommand } from './commandBuilder.js';
import { displayName, masteredOutputPath } from './naming.js';
import { resolveBatchInputs } from './sourceResolver.js';

export const STATUS_TEXT = {
  processing: 'Processing... (this can take a while)',
  success: 'Success! File mastered.',
  failure: 'Error! Check terminal for details.',
  batchFile: (index: number, total: number, filename: string) =>
    `Processing ${index}/${total}: ${filename}`,
  batchComplete: (total: number) => `Batch complete! ${total} files mastered.`,
} as const;

export interface WorkerContext {
  jobId: string;
  tool: MasteringTool;
  sink: ReportSink;
  runner?: CommandRunner;
  /** Serializes writes to the same destination across concurrent jobs */
  lock?: KeyedLock;
  logger?: Logger;
  timeoutMs?: number;
}

/**
 * Percentage reported when file `index` (1-based) of `total` starts
 */
export function batchProgress(index: number, total: number): number {
  return Math.round((index / total) * 100);
}

function jobLogger(job: MasteringJob, ctx: WorkerContext): Logger {
  const context = { jobId: ctx.jobId, kind: job.kind };
  return ctx.logger ? ctx.logger.child(context) : createLogger(context);
}

/**
 * Run a mastering command, throwing on launch failure or non-zero exit
 */
async function runTool(command: MasteringCommand, ctx: WorkerContext, log: Logger): Promise<CommandResult> {
  const runner = ctx.runner ?? executeCommand;
  const commandLine = formatCommandLine(command.command, command.args);

  const invoke = async (): Promise<CommandResult> => {
    log.info({ command: commandLine }, 'Running command');

    let result: CommandResult;
    try {
      result = await runner(command.command, command.args, { timeout: ctx.timeoutMs });
    } catch (error) {
      throw new CommandLaunchError(command.command, error);
    }

    log.debug({ stdout: result.stdout, duration: result.duration }, 'Command output');

    if (result.exitCode !== 0) {
      log.error({ exitCode: result.exitCode, stderr: result.stderr, timedOut: result.timedOut }, 'Command failed');
      const stderr = result.timedOut && !result.stderr
        ? `Timed out after ${ctx.timeoutMs ?? 0}ms`
        : result.stderr;
      throw new CommandExecutionError(commandLine, result.exitCode, stderr, result.stdout);
    }

    return result;
  };

  return ctx.lock ? ctx.lock.run(resolve(command.outputPath), invoke) : invoke();
}

/**
 * Master one target against the reference
 */
export async function runSingleJob(job: SingleMasteringJob, ctx: WorkerContext): Promise<void> {
  const { sink, jobId } = ctx;
  const log = jobLogger(job, ctx);

  try {
    sink.emit({ type: 'status', jobId, text: STATUS_TEXT.processing });

    const command = createMasteringCommand(ctx.tool, job);
    await runTool(command, ctx, log);

    sink.emit({ type: 'status', jobId, text: STATUS_TEXT.success });
    log.info({ output: job.outputPath }, 'File mastered');
  } catch (error) {
    const message = error instanceof CommandExecutionError
      ? `An error occurred:\n\n${error.diagnostic}`
      : `An unexpected error occurred:\n\n${errorMessage(error)}`;

    log.error({ error: errorMessage(error) }, 'Single job failed');
    sink.emit({ type: 'error', jobId, message });
    sink.emit({ type: 'status', jobId, text: STATUS_TEXT.failure });
  } finally {
    sink.emit({ type: 'finished', jobId });
  }
}

/**
 * Master every resolved input in order, stopping at the first failure.
 * Outputs written before a failure stay on disk.
 */
export async function runBatchJob(job: BatchMasteringJob, ctx: WorkerContext): Promise<void> {
  const { sink, jobId } = ctx;
  const log = jobLogger(job, ctx);
  let current: string | null = null;

  try {
    if (job.input.type === 'files') {
      log.info({ count: job.input.files.length }, 'Processing selected files');
    } else {
      log.info({ directory: job.input.directory }, 'Scanning directory');
    }

    const files = await resolveBatchInputs(job.input);
    const total = files.length;
    log.info({ total }, 'Found files to process');

    for (const [position, inputPath] of files.entries()) {
      const index = position + 1;
      current = displayName(inputPath);

      const command = createMasteringCommand(ctx.tool, {
        targetPath: inputPath,
        referencePath: job.referencePath,
        outputPath: masteredOutputPath(inputPath, job.outputDir),
        bitDepth: job.bitDepth,
      });

      sink.emit({ type: 'status', jobId, text: STATUS_TEXT.batchFile(index, total, current) });
      sink.emit({ type: 'progress', jobId, percent: batchProgress(index, total) });

      await runTool(command, ctx, log);
    }

    sink.emit({ type: 'status', jobId, text: STATUS_TEXT.batchComplete(total) });
    log.info({ total, outputDir: job.outputDir }, 'Batch complete');
  } catch (error) {
    let message: string;
    if (error instanceof CommandExecutionError) {
      message = `Failed on file: ${current ?? 'unknown'}\n\n${error.diagnostic}`;
    } else if (error instanceof ValidationError) {
      message = error.message;
    } else {
      message = `An error occurred:\n\n${errorMessage(error)}`;
    }

    log.error({ error: errorMessage(error), file: current }, 'Batch job failed');
    sink.emit({ type: 'error', jobId, message });
    sink.emit({ type: 'status', jobId, text: STATUS_TEXT.failure });
  } finally {
    sink.emit({ type: 'finished', jobId });
  }
}

export function runJob(job: MasteringJob, ctx: WorkerContext): Promise<void> {
  return job.kind === 'single' ? runSingleJob(job, ctx) : runBatchJob(job, ctx);
}
