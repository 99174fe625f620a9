/**
 * Report Channel
 *
 * Unbounded FIFO between a worker and the display layer. Workers push with
 * `emit`; the display drains with `for await`, so reports are applied one at
 * a time by a single consumer.
 */

import type { ReportSink, WorkerReport } from '@refmaster/core';

export class ReportChannel implements ReportSink, AsyncIterable<WorkerReport> {
  private buffer: WorkerReport[] = [];
  private waiters: Array<(result: IteratorResult<WorkerReport>) => void> = [];
  private closed = false;

  emit(report: WorkerReport): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: report, done: false });
    } else {
      this.buffer.push(report);
    }

    // `finished` is terminal for a job
    if (report.type === 'finished') {
      this.close();
    }
  }

  /**
   * Stop accepting reports. Iteration ends once the buffer drains.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  next(): Promise<IteratorResult<WorkerReport>> {
    const report = this.buffer.shift();
    if (report) {
      return Promise.resolve({ value: report, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<WorkerReport> {
    return {
      next: () => this.next(),
    };
  }

  /**
   * Drain every remaining report into an array
   */
  async collect(): Promise<WorkerReport[]> {
    const reports: WorkerReport[] = [];
    for await (const report of this) {
      reports.push(report);
    }
    return reports;
  }
}
