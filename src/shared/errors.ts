import type { ShellCommandResult } from '../runner/types.js';

export enum ShellRunnerErrorCode {
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  STATUS_NOT_CAPTURED = 'STATUS_NOT_CAPTURED',
  COMMAND_FAILED = 'COMMAND_FAILED',
  SHELL_RESOLUTION_FAILED = 'SHELL_RESOLUTION_FAILED',
  INVALID_ENVIRONMENT = 'INVALID_ENVIRONMENT',
  SPAWN_FAILED = 'SPAWN_FAILED',
}

export class ShellRunnerError extends Error {
  readonly code: ShellRunnerErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: ShellRunnerErrorCode,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ShellRunnerError';
    this.code = code;
    this.context = context;
  }
}

/** One or more pipeline stages exited non-zero while check-on-failure was enabled. */
export class ShellCommandError extends ShellRunnerError {
  readonly result: ShellCommandResult;

  constructor(message: string, result: ShellCommandResult) {
    super(ShellRunnerErrorCode.COMMAND_FAILED, message, { pipestatus: result.pipestatus });
    this.name = 'ShellCommandError';
    this.result = result;
  }

  get output(): string {
    return this.result.output;
  }

  get status(): number {
    return this.result.status;
  }

  get pipestatus(): number[] {
    return this.result.pipestatus;
  }
}

export class ShellResolutionError extends ShellRunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ShellRunnerErrorCode.SHELL_RESOLUTION_FAILED, message, undefined, options);
    this.name = 'ShellResolutionError';
  }
}

export class EnvironmentVariableError extends ShellRunnerError {
  constructor(variable: string, value: string) {
    super(
      ShellRunnerErrorCode.INVALID_ENVIRONMENT,
      `Received invalid value for environment variable ${variable}: "${value}"\n` +
        'Expected "True" or "False" (case-insensitive).',
      { variable, value }
    );
    this.name = 'EnvironmentVariableError';
  }
}
