/**
 * @refmaster/core
 *
 * Core package containing:
 * - Job and worker report types
 * - Error classes
 * - Mastering tool resolution
 */

// Types
export {
  BIT_DEPTHS,
  type BitDepth,
  type SingleMasteringJob,
  type BatchMasteringJob,
  type BatchInputSource,
  type MasteringJob,
  type JobKind,
} from './types/job.js';

export type {
  WorkerReport,
  ReportSink,
} from './types/report.js';

// Errors
export {
  RefmasterError,
  ValidationError,
  EnvironmentError,
  CommandLaunchError,
  CommandExecutionError,
  ToolNotFoundError,
  errorMessage,
} from './errors/index.js';

// Mastering tool
export {
  resolveMasteringTool,
  isToolAvailable,
  assertToolAvailable,
  TOOL_FOLDER,
  TOOL_SCRIPT,
  type MasteringTool,
  type ResolveToolOptions,
  type ToolSource,
} from './config/masteringTool.js';
