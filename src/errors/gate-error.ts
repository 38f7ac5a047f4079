/**
 * Gate Error - Base error class for the Strategy Draft Gate
 */

import { ErrorCode, ErrorCategory, getErrorCategory, getErrorMessage } from './error-codes';

export class GateError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly context?: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, context?: string, details?: Record<string, unknown>) {
    const baseMessage = getErrorMessage(code);
    const fullMessage = context
      ? `[${code}] ${baseMessage}: ${context}`
      : `[${code}] ${baseMessage}`;

    super(fullMessage);
    this.name = 'GateError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.context = context;
    this.details = details;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A draft file that cannot be read or scored. Recorded as a failed load.
 */
export class MalformedInputError extends GateError {
  public readonly file: string;

  constructor(
    code:
      | ErrorCode.E102_DRAFT_PARSE_FAILURE
      | ErrorCode.E103_DRAFT_REQUIRED_FIELD_MISSING
      | ErrorCode.E104_DUPLICATE_DRAFT_ID
      | ErrorCode.E106_DRAFT_FILE_UNREADABLE,
    file: string,
    context: string
  ) {
    super(code, context, { file });
    this.name = 'MalformedInputError';
    this.file = file;
  }
}

/**
 * Input path missing or output path not writable. Aborts the whole run.
 */
export class FatalIOError extends GateError {
  public readonly path: string;

  constructor(
    code:
      | ErrorCode.E101_INPUT_PATH_NOT_FOUND
      | ErrorCode.E105_INPUT_PATH_UNREADABLE
      | ErrorCode.E301_OUTPUT_NOT_WRITABLE
      | ErrorCode.E302_OUTPUT_WRITE_FAILURE,
    ioPath: string,
    context?: string
  ) {
    super(code, context ?? ioPath, { path: ioPath });
    this.name = 'FatalIOError';
    this.path = ioPath;
  }
}
