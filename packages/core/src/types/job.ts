/**
 * Job Types
 *
 * A job is built fresh for every run and frozen before a worker sees it.
 */

export const BIT_DEPTHS = ['16', '24', '32'] as const;

export type BitDepth = (typeof BIT_DEPTHS)[number];

export interface SingleMasteringJob {
  readonly kind: 'single';
  readonly referencePath: string;
  readonly targetPath: string;
  readonly outputPath: string;
  readonly bitDepth: BitDepth;
}

/**
 * Where a batch takes its targets from. An explicit file list is used as
 * given; a directory is scanned (non-recursively) for audio files.
 */
export type BatchInputSource =
  | { readonly type: 'files'; readonly files: readonly string[] }
  | { readonly type: 'directory'; readonly directory: string };

export interface BatchMasteringJob {
  readonly kind: 'batch';
  readonly referencePath: string;
  readonly input: BatchInputSource;
  readonly outputDir: string;
  readonly bitDepth: BitDepth;
}

export type MasteringJob = SingleMasteringJob | BatchMasteringJob;

export type JobKind = MasteringJob['kind'];
