export type BatchSetupErrorCode =
  | 'INPUT_UNREADABLE'
  | 'NO_VALID_URLS'
  | 'INVALID_CONFIG'
  | 'OUTPUT_DIR_UNAVAILABLE';

/**
 * Raised before any worker starts when the batch as a whole cannot run.
 */
export class BatchSetupError extends Error {
  readonly code: BatchSetupErrorCode;

  constructor(code: BatchSetupErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BatchSetupError';
    this.code = code;
  }
}

export const isBatchSetupError = (error: unknown): error is BatchSetupError =>
  error instanceof BatchSetupError;

/**
 * Turns any thrown value into the text recorded as a failure reason.
 */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message.length > 0 ? error.message : error.name;
  }
  return String(error);
};
