// src/core/errors.ts
export enum ErrorCode {
  NOT_STARTED = 'not_started',
  INVALID_ARGUMENT = 'invalid_argument',
  INVALID_CONFIG = 'invalid_config',
  BROWSER_LAUNCH_FAILED = 'browser_launch_failed',
  INPUT_READ_FAILED = 'input_read_failed',
  OUTPUT_WRITE_FAILED = 'output_write_failed',
}

export class RenderError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RenderError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function isRenderError(error: unknown): error is RenderError {
  return error instanceof RenderError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
