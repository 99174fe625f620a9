import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CommandResult, CommandRunner } from '@refmaster/utils';
import type { MasteringTool } from '@refmaster/core';
import { WorkerPool } from './workerPool.js';
import { BatchPanel, IDLE_STATUS, SinglePanel, type PanelState, type PanelWarning } from './panel.js';

const tool: MasteringTool = {
  command: 'python3',
  prefixArgs: ['/tools/mg_cli.py'],
  scriptPath: '/tools/mg_cli.py',
  source: 'configured',
};

function result(exitCode: number, stderr = ''): CommandResult {
  return { exitCode, stdout: '', stderr, duration: 1, timedOut: false };
}

const singleForm = {
  reference: '/music/ref.wav',
  target: '/music/song.wav',
  output: '/music/song (Mastered).flac',
  bitDepth: '24',
};

describe('SinglePanel', () => {
  it('starts idle with the run control enabled', () => {
    const panel = new SinglePanel(new WorkerPool({ tool, concurrency: 1 }));
    expect(panel.snapshot).toMatchObject({ status: IDLE_STATUS, tone: 'idle', runEnabled: true });
  });

  it('disables run while the job is in flight and ends green on success', async () => {
    const runner = vi.fn<CommandRunner>(async () => result(0));
    const panel = new SinglePanel(new WorkerPool({ tool, concurrency: 1, runner }));
    const states: PanelState[] = [];
    panel.on('change', (state: PanelState) => states.push(state));

    const final = await panel.start(singleForm);

    expect(states[0]).toMatchObject({ runEnabled: false, tone: 'running', jobId: 'single-1' });
    expect(final).toMatchObject({
      status: 'Success! File mastered.',
      tone: 'success',
      runEnabled: true,
      errorMessage: null,
    });
  });

  it('shows the error and still re-enables run after a tool failure', async () => {
    const runner = vi.fn<CommandRunner>(async () => result(1, 'bad reference'));
    const panel = new SinglePanel(new WorkerPool({ tool, concurrency: 1, runner }));
    const failures: string[] = [];
    panel.on('failure', (message: string) => failures.push(message));

    const final = await panel.start(singleForm);

    expect(failures).toEqual(['An error occurred:\n\nbad reference']);
    expect(final).toMatchObject({
      status: 'Error! Check terminal for details.',
      tone: 'error',
      runEnabled: true,
    });
  });

  it('rejects bit depth 20 locally without starting a worker', async () => {
    const runner = vi.fn<CommandRunner>(async () => result(0));
    const pool = new WorkerPool({ tool, concurrency: 1, runner });
    const submit = vi.spyOn(pool, 'submit');
    const panel = new SinglePanel(pool);
    const warnings: PanelWarning[] = [];
    panel.on('warning', (warning: PanelWarning) => warnings.push(warning));

    const final = await panel.start({ ...singleForm, bitDepth: '20' });

    expect(warnings).toEqual([{ title: 'Invalid Bit-depth', message: 'Please enter 16, 24, or 32 for bit-depth.' }]);
    expect(submit).not.toHaveBeenCalled();
    expect(runner).not.toHaveBeenCalled();
    expect(final).toMatchObject({ status: IDLE_STATUS, runEnabled: true });
  });

  it('refuses a second run while one is in flight', async () => {
    let release: () => void = () => undefined;
    const runner = vi.fn<CommandRunner>(
      () => new Promise<CommandResult>((resolve) => {
        release = () => resolve(result(0));
      })
    );
    const panel = new SinglePanel(new WorkerPool({ tool, concurrency: 2, runner }));
    const warnings: PanelWarning[] = [];
    panel.on('warning', (warning: PanelWarning) => warnings.push(warning));

    const first = panel.start(singleForm);
    await panel.start(singleForm);
    await vi.waitFor(() => expect(runner).toHaveBeenCalledTimes(1));
    release();
    await first;

    expect(warnings).toEqual([{ title: 'Busy', message: 'Job already running' }]);
    expect(runner).toHaveBeenCalledTimes(1);
  });
});

describe('BatchPanel', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'refmaster-panel-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('creates the output folder, tracks progress and hides the bar when done', async () => {
    const runner = vi.fn<CommandRunner>(async () => result(0));
    const panel = new BatchPanel(new WorkerPool({ tool, concurrency: 1, runner }));
    const progress: number[] = [];
    panel.on('change', (state: PanelState) => {
      if (state.progress.visible) progress.push(state.progress.value);
    });
    const outputDir = join(root, 'Mastered');

    const final = await panel.start({
      reference: '/music/ref.wav',
      inputFiles: ['/music/a.wav', '/music/b.wav'],
      outputDir,
      bitDepth: '16',
    });

    expect((await stat(outputDir)).isDirectory()).toBe(true);
    expect([...new Set(progress)]).toEqual([0, 50, 100]);
    expect(final).toMatchObject({
      status: 'Batch complete! 2 files mastered.',
      tone: 'success',
      runEnabled: true,
      progress: { visible: false, value: 100 },
    });
  });

  it('names the failing file and stops there', async () => {
    const runner = vi.fn<CommandRunner>(async () => result(1, 'clipping'));
    const panel = new BatchPanel(new WorkerPool({ tool, concurrency: 1, runner }));
    const failures: string[] = [];
    panel.on('failure', (message: string) => failures.push(message));

    const final = await panel.start({
      reference: '/music/ref.wav',
      inputFiles: ['/music/a.wav', '/music/b.wav'],
      outputDir: root,
      bitDepth: '24',
    });

    expect(runner).toHaveBeenCalledTimes(1);
    expect(failures).toEqual(['Failed on file: a.wav\n\nclipping']);
    expect(final).toMatchObject({ tone: 'error', runEnabled: true, progress: { visible: false } });
  });

  it('warns when no input was selected', async () => {
    const panel = new BatchPanel(new WorkerPool({ tool, concurrency: 1 }));
    const warnings: PanelWarning[] = [];
    panel.on('warning', (warning: PanelWarning) => warnings.push(warning));

    await panel.start({ reference: '/r.wav', outputDir: root, bitDepth: '24' });

    expect(warnings).toEqual([{ title: 'Missing Info', message: 'Please select an input directory OR input files.' }]);
  });
});
