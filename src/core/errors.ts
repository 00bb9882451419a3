// src/core/errors.ts
export enum ErrorCode {
  EXTRACTION_FAILED = 'extraction_failed',
  UNEXPECTED = 'unexpected',
  RUN_ACTIVE = 'run_active',
  INVALID_URL = 'invalid_url',
  INVALID_OPTION = 'invalid_option',
  TOOL_NOT_FOUND = 'tool_not_found',
}

export class DownloaderError extends Error {
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
    this.name = 'DownloaderError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

/**
 * Wraps anything thrown while processing an item so the caller only has to
 * deal with DownloaderError.
 */
export function toDownloaderError(error: unknown): DownloaderError {
  if (error instanceof DownloaderError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new DownloaderError(ErrorCode.UNEXPECTED, message);
}
