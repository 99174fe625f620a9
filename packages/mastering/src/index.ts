/**
 * @refmaster/mastering
 *
 * Orchestration of the external mastering tool.
 *
 * RULES:
 * - One tool invocation at a time within a job
 * - A batch stops at its first failing file
 * - Every job ends with exactly one `finished` report
 * - Log every tool command executed
 */

// Command Builder
export {
  MasteringCommandBuilder,
  createMasteringCommand,
  type MasteringCommand,
} from './commandBuilder.js';

// Naming
export {
  AUDIO_EXTENSIONS,
  MASTERED_SUFFIX,
  OUTPUT_EXTENSION,
  BATCH_OUTPUT_FOLDER,
  isAudioFile,
  masteredFileName,
  masteredOutputPath,
  suggestSingleOutput,
  suggestBatchOutputDir,
  ensureFlacExtension,
  displayName,
} from './naming.js';

// Input resolution
export { resolveBatchInputs, NO_FILES_FOUND } from './sourceResolver.js';

// Workers
export {
  runSingleJob,
  runBatchJob,
  runJob,
  batchProgress,
  STATUS_TEXT,
  type WorkerContext,
} from './worker.js';

// Reports
export { ReportChannel } from './reportChannel.js';

// Pool
export { WorkerPool, freezeJob, type WorkerPoolOptions, type SubmittedJob } from './workerPool.js';

// Form
export {
  validateSingleForm,
  validateBatchForm,
  resolveInputSource,
  prepareOutputDir,
  FORM_MESSAGES,
  type SingleFormInput,
  type BatchFormInput,
} from './form/validation.js';

// Panels
export {
  MasteringPanel,
  SinglePanel,
  BatchPanel,
  IDLE_STATUS,
  type PanelState,
  type PanelTone,
  type PanelWarning,
} from './panel.js';
