/**
 * Mastering Panels
 *
 * Display state for the single and batch modes: status text and tone,
 * whether the run control is enabled, and the batch progress bar. A panel
 * validates its form, submits the job to the pool and then drains the job's
 * report channel, applying one report at a time.
 */

import { EventEmitter } from 'node:events';
import {
  EnvironmentError,
  ValidationError,
  type BatchMasteringJob,
  type JobKind,
  type MasteringJob,
  type SingleMasteringJob,
  type WorkerReport,
} from '@refmaster/core';
import type { WorkerPool } from './workerPool.js';
import {
  prepareOutputDir,
  validateBatchForm,
  validateSingleForm,
  type BatchFormInput,
  type SingleFormInput,
} from './form/validation.js';

export const IDLE_STATUS = 'Status: Idle';

export type PanelTone = 'idle' | 'running' | 'success' | 'error';

export interface PanelState {
  readonly mode: JobKind;
  readonly status: string;
  readonly tone: PanelTone;
  readonly runEnabled: boolean;
  readonly progress: { readonly visible: boolean; readonly value: number };
  readonly errorMessage: string | null;
  readonly jobId: string | null;
}

export interface PanelWarning {
  title: string;
  message: string;
}

/**
 * Events: `change` (PanelState), `warning` (PanelWarning), `failure` (message)
 */
export abstract class MasteringPanel<TForm, TJob extends MasteringJob> extends EventEmitter {
  private state: PanelState;
  private busy = false;

  protected constructor(
    protected readonly pool: WorkerPool,
    mode: JobKind,
    /** Status text that marks a successful run */
    private readonly successMarker: string
  ) {
    super();
    this.state = {
      mode,
      status: IDLE_STATUS,
      tone: 'idle',
      runEnabled: true,
      progress: { visible: false, value: 0 },
      errorMessage: null,
      jobId: null,
    };
  }

  /**
   * Validate the form and do any host-side preparation. Throws
   * `ValidationError` or `EnvironmentError`.
   */
  protected abstract prepare(form: TForm): Promise<TJob>;

  protected get showsProgress(): boolean {
    return false;
  }

  get snapshot(): PanelState {
    return this.state;
  }

  get isRunning(): boolean {
    return this.busy;
  }

  /**
   * Run one job from the given form values. Resolves with the final panel
   * state once the job's `finished` report has been applied, or right away
   * when the form is rejected.
   */
  async start(form: TForm): Promise<PanelState> {
    if (this.busy) {
      this.emit('warning', { title: 'Busy', message: 'Job already running' } satisfies PanelWarning);
      return this.state;
    }

    this.busy = true;
    try {
      let job: TJob;
      try {
        job = await this.prepare(form);
      } catch (error) {
        if (error instanceof ValidationError) {
          this.emit('warning', { title: error.title, message: error.message } satisfies PanelWarning);
        } else if (error instanceof EnvironmentError) {
          this.update({ errorMessage: error.message });
          this.emit('failure', error.message);
        } else {
          throw error;
        }
        return this.state;
      }

      const submitted = this.pool.submit(job);
      this.update({
        runEnabled: false,
        tone: 'running',
        errorMessage: null,
        jobId: submitted.jobId,
        progress: { visible: this.showsProgress, value: 0 },
      });

      for await (const report of submitted.reports) {
        this.apply(report);
      }
      await submitted.done;

      return this.state;
    } finally {
      this.busy = false;
    }
  }

  private apply(report: WorkerReport): void {
    switch (report.type) {
      case 'status':
        this.update({ status: report.text });
        break;
      case 'progress':
        this.update({ progress: { ...this.state.progress, value: report.percent } });
        break;
      case 'error':
        this.update({
          tone: 'error',
          errorMessage: report.message,
          progress: { ...this.state.progress, visible: false },
        });
        this.emit('failure', report.message);
        break;
      case 'finished':
        this.update({
          runEnabled: true,
          progress: { ...this.state.progress, visible: false },
          tone: this.state.status.includes(this.successMarker) ? 'success' : this.state.tone,
        });
        break;
    }
  }

  private update(changes: Partial<PanelState>): void {
    this.state = { ...this.state, ...changes };
    this.emit('change', this.state);
  }
}

export class SinglePanel extends MasteringPanel<SingleFormInput, SingleMasteringJob> {
  constructor(pool: WorkerPool) {
    super(pool, 'single', 'Success');
  }

  protected async prepare(form: SingleFormInput): Promise<SingleMasteringJob> {
    return validateSingleForm(form);
  }
}

export class BatchPanel extends MasteringPanel<BatchFormInput, BatchMasteringJob> {
  constructor(pool: WorkerPool) {
    super(pool, 'batch', 'complete');
  }

  protected get showsProgress(): boolean {
    return true;
  }

  protected async prepare(form: BatchFormInput): Promise<BatchMasteringJob> {
    const job = await validateBatchForm(form);
    await prepareOutputDir(job.outputDir);
    return job;
  }
}
