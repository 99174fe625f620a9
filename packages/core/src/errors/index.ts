/**
 * Custom Error Classes
 */

/**
 * Base error class for all refmaster errors
 */
export class RefmasterError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RefmasterError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Local pre-flight rejection of user input. Never reaches a worker.
 */
export class ValidationError extends RefmasterError {
  public readonly title: string;

  constructor(title: string, message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', { title, field });
    this.name = 'ValidationError';
    this.title = title;
  }
}

/**
 * The host environment refused a precondition (output directory creation)
 */
export class EnvironmentError extends RefmasterError {
  constructor(message: string, path: string, cause?: unknown) {
    super(message, 'ENVIRONMENT_ERROR', {
      path,
      cause: cause instanceof Error ? cause.message : cause,
    });
    this.name = 'EnvironmentError';
  }
}

/**
 * The external tool could not be started at all
 */
export class CommandLaunchError extends RefmasterError {
  constructor(command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Could not start ${command}: ${reason}`,
      'COMMAND_LAUNCH_ERROR',
      { command, reason }
    );
    this.name = 'CommandLaunchError';
  }
}

/**
 * External command exited non-zero
 */
export class CommandExecutionError extends RefmasterError {
  public readonly exitCode: number;
  public readonly stderr: string;
  public readonly stdout: string;

  constructor(
    command: string,
    exitCode: number,
    stderr: string,
    stdout: string
  ) {
    super(
      `Command failed with exit code ${exitCode}`,
      'COMMAND_EXECUTION_ERROR',
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
    this.exitCode = exitCode;
    this.stderr = stderr;
    this.stdout = stdout;
  }

  /**
   * Text shown to the user: the tool's error stream when it wrote one
   */
  get diagnostic(): string {
    return this.stderr.trim().length > 0 ? this.stderr : this.stdout;
  }
}

/**
 * Mastering tool missing at startup
 */
export class ToolNotFoundError extends RefmasterError {
  constructor(path: string) {
    super(
      `Could not find the mastering CLI script at:\n${path}\n\n` +
        "Please make sure the 'matchering-cli' folder is in the same directory as this application, " +
        'or set REFMASTER_CLI_PATH.',
      'TOOL_NOT_FOUND',
      { path }
    );
    this.name = 'ToolNotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
