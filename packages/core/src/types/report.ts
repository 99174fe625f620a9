/**
 * Worker Reports
 *
 * Everything a worker tells the display layer. `finished` is always the
 * last report of a job and is sent exactly once.
 */

export type WorkerReport =
  | { readonly type: 'status'; readonly jobId: string; readonly text: string }
  | { readonly type: 'progress'; readonly jobId: string; readonly percent: number }
  | { readonly type: 'error'; readonly jobId: string; readonly message: string }
  | { readonly type: 'finished'; readonly jobId: string };

/**
 * Anything a worker can push reports into
 */
export interface ReportSink {
  emit(report: WorkerReport): void;
}
