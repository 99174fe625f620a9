/**
 * Worker Pool
 *
 * Runs mastering jobs off the display path with bounded concurrency.
 * Jobs beyond the limit wait in FIFO order. Each job gets its own report
 * channel; jobs that write the same destination are serialized through a
 * shared keyed lock.
 *
 * Events: `job:queued`, `job:started`, `job:finished` (jobId) and `idle`.
 */

import { EventEmitter } from 'node:events';
import { availableParallelism } from 'node:os';
import { KeyedLock, logger as rootLogger, type CommandRunner, type Logger } from '@refmaster/utils';
import type { MasteringJob, MasteringTool } from '@refmaster/core';
import { ReportChannel } from './reportChannel.js';
import { runJob } from './worker.js';

export interface WorkerPoolOptions {
  tool: MasteringTool;
  concurrency?: number;
  runner?: CommandRunner;
  timeoutMs?: number;
  logger?: Logger;
}

export interface SubmittedJob {
  jobId: string;
  job: MasteringJob;
  reports: ReportChannel;
  /** Settles after the job's `finished` report has been emitted */
  done: Promise<void>;
}

interface QueuedJob {
  submitted: SubmittedJob;
  start: () => void;
}

/**
 * Copy and freeze a job so nothing mutates it while a worker runs
 */
export function freezeJob(job: MasteringJob): MasteringJob {
  if (job.kind === 'single') {
    return Object.freeze({ ...job });
  }
  const input = job.input.type === 'files'
    ? Object.freeze({ type: 'files' as const, files: Object.freeze([...job.input.files]) })
    : Object.freeze({ ...job.input });
  return Object.freeze({ ...job, input });
}

export class WorkerPool extends EventEmitter {
  private readonly tool: MasteringTool;
  private readonly runner?: CommandRunner;
  private readonly timeoutMs?: number;
  private readonly log: Logger;
  private readonly lock = new KeyedLock();

  readonly concurrency: number;
  private queue: QueuedJob[] = [];
  private running = 0;
  private sequence = 0;

  constructor(options: WorkerPoolOptions) {
    super();
    this.tool = options.tool;
    this.runner = options.runner;
    this.timeoutMs = options.timeoutMs;
    this.log = options.logger ?? rootLogger;
    this.concurrency = Math.max(1, options.concurrency ?? availableParallelism());
    this.log.debug({ concurrency: this.concurrency }, 'Worker pool created');
  }

  get activeCount(): number {
    return this.running;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  submit(job: MasteringJob): SubmittedJob {
    this.sequence += 1;
    const jobId = `${job.kind}-${this.sequence}`;
    const frozen = freezeJob(job);
    const reports = new ReportChannel();

    let start: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      start = resolve;
    });

    const done = started.then(() => this.execute(jobId, frozen, reports));
    const submitted: SubmittedJob = { jobId, job: frozen, reports, done };

    this.queue.push({ submitted, start });
    this.emit('job:queued', jobId);
    this.log.info({ jobId, kind: job.kind, queued: this.queue.length }, 'Job submitted');
    this.drain();

    return submitted;
  }

  /**
   * Resolves when no job is running or waiting
   */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.once('idle', () => resolve());
    });
  }

  private drain(): void {
    while (this.running < this.concurrency) {
      const next = this.queue.shift();
      if (!next) break;
      this.running += 1;
      next.start();
    }
  }

  private async execute(jobId: string, job: MasteringJob, reports: ReportChannel): Promise<void> {
    this.emit('job:started', jobId);
    this.log.info({ jobId }, 'Job started');

    try {
      await runJob(job, {
        jobId,
        tool: this.tool,
        sink: reports,
        runner: this.runner,
        lock: this.lock,
        logger: this.log,
        timeoutMs: this.timeoutMs,
      });
    } finally {
      this.running -= 1;
      this.emit('job:finished', jobId);
      this.log.info({ jobId }, 'Job finished');
      this.drain();
      if (this.running === 0 && this.queue.length === 0) {
        this.emit('idle');
      }
    }
  }
}
