/**
 * Form Validation
 *
 * Pre-flight checks on what the user typed. Everything here runs before a
 * job exists; a rejection never reaches the worker pool.
 */

import { z } from 'zod';
import { ensureDir, isDirectory, isNonEmptyString, logger } from '@refmaster/utils';
import {
  BIT_DEPTHS,
  EnvironmentError,
  ValidationError,
  errorMessage,
  type BatchInputSource,
  type BatchMasteringJob,
  type SingleMasteringJob,
} from '@refmaster/core';

export const FORM_MESSAGES = {
  missingSingle: 'Please fill in all fields.',
  missingBatch: 'Please fill in all fields (Reference, Output Dir, Bit-depth).',
  missingInput: 'Please select an input directory OR input files.',
  invalidBitDepth: 'Please enter 16, 24, or 32 for bit-depth.',
} as const;

const requiredField = z.string().refine(isNonEmptyString);

const bitDepthSchema = z.enum(BIT_DEPTHS);

const singleFieldsSchema = z.object({
  reference: requiredField,
  target: requiredField,
  output: requiredField,
  bitDepth: requiredField,
});

const batchFieldsSchema = z.object({
  reference: requiredField,
  outputDir: requiredField,
  bitDepth: requiredField,
});

export interface SingleFormInput {
  reference?: string;
  target?: string;
  output?: string;
  bitDepth?: string;
}

export interface BatchFormInput {
  reference?: string;
  /** Directory typed or picked by the user */
  inputDir?: string;
  /** Files picked explicitly; wins over `inputDir` when non-empty */
  inputFiles?: readonly string[];
  outputDir?: string;
  bitDepth?: string;
}

function parseBitDepth(value: string) {
  const parsed = bitDepthSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError('Invalid Bit-depth', FORM_MESSAGES.invalidBitDepth, 'bitDepth');
  }
  return parsed.data;
}

export function validateSingleForm(input: SingleFormInput): SingleMasteringJob {
  const fields = singleFieldsSchema.safeParse(input);
  if (!fields.success) {
    throw new ValidationError('Missing Info', FORM_MESSAGES.missingSingle);
  }

  const { reference, target, output, bitDepth } = fields.data;
  return {
    kind: 'single',
    referencePath: reference,
    targetPath: target,
    outputPath: output,
    bitDepth: parseBitDepth(bitDepth),
  };
}

/**
 * Pick the batch input: explicit files first, then an existing directory
 */
export async function resolveInputSource(input: BatchFormInput): Promise<BatchInputSource> {
  if (input.inputFiles && input.inputFiles.length > 0) {
    logger.debug({ count: input.inputFiles.length }, 'Using selected files list');
    return { type: 'files', files: [...input.inputFiles] };
  }

  if (isNonEmptyString(input.inputDir) && (await isDirectory(input.inputDir))) {
    logger.debug({ directory: input.inputDir }, 'Using selected directory path');
    return { type: 'directory', directory: input.inputDir };
  }

  throw new ValidationError('Missing Info', FORM_MESSAGES.missingInput, 'input');
}

export async function validateBatchForm(input: BatchFormInput): Promise<BatchMasteringJob> {
  const source = await resolveInputSource(input);

  const fields = batchFieldsSchema.safeParse(input);
  if (!fields.success) {
    throw new ValidationError('Missing Info', FORM_MESSAGES.missingBatch);
  }

  const { reference, outputDir, bitDepth } = fields.data;
  return {
    kind: 'batch',
    referencePath: reference,
    input: source,
    outputDir,
    bitDepth: parseBitDepth(bitDepth),
  };
}

/**
 * Create the batch output directory if it is missing
 */
export async function prepareOutputDir(dir: string): Promise<void> {
  try {
    if (await isDirectory(dir)) return;
    await ensureDir(dir);
    logger.info({ dir }, 'Created output directory');
  } catch (error) {
    throw new EnvironmentError(
      `Could not create output directory:\n${errorMessage(error)}`,
      dir,
      error
    );
  }
}
