import { describe, it, expect } from 'vitest';
import { ReportChannel } from './reportChannel.js';

describe('ReportChannel', () => {
  it('delivers buffered reports in order and ends after finished', async () => {
    const channel = new ReportChannel();
    channel.emit({ type: 'status', jobId: 'j', text: 'one' });
    channel.emit({ type: 'progress', jobId: 'j', percent: 50 });
    channel.emit({ type: 'finished', jobId: 'j' });

    expect(channel.isClosed).toBe(true);
    expect(await channel.collect()).toEqual([
      { type: 'status', jobId: 'j', text: 'one' },
      { type: 'progress', jobId: 'j', percent: 50 },
      { type: 'finished', jobId: 'j' },
    ]);
  });

  it('wakes a waiting consumer', async () => {
    const channel = new ReportChannel();
    const pending = channel.next();

    channel.emit({ type: 'status', jobId: 'j', text: 'late' });

    await expect(pending).resolves.toEqual({
      value: { type: 'status', jobId: 'j', text: 'late' },
      done: false,
    });
  });

  it('ignores reports after finished', async () => {
    const channel = new ReportChannel();
    channel.emit({ type: 'finished', jobId: 'j' });
    channel.emit({ type: 'status', jobId: 'j', text: 'too late' });

    expect(await channel.collect()).toEqual([{ type: 'finished', jobId: 'j' }]);
  });

  it('ends pending reads on close', async () => {
    const channel = new ReportChannel();
    const pending = channel.next();
    channel.close();

    await expect(pending).resolves.toEqual({ value: undefined, done: true });
  });
});
