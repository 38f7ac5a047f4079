/**
 * Error Codes for the Strategy Draft Gate
 *
 * E1xx: Input errors - a draft or the input path could not be used
 * E2xx: Configuration and argument errors - prevent the run from starting
 * E3xx: Output errors - the review document could not be written
 * E4xx: Internal invariant violations - halt the run immediately
 *
 * E102-E104 and E106 are recoverable: the draft is recorded as a failed
 * load and the batch continues. Every other code aborts the run.
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  INPUT = 'INPUT',
  CONFIGURATION = 'CONFIGURATION',
  OUTPUT = 'OUTPUT',
  INVARIANT = 'INVARIANT',
}

export enum ErrorCode {
  // E1xx: Input Errors
  E101_INPUT_PATH_NOT_FOUND = 'E101',
  E102_DRAFT_PARSE_FAILURE = 'E102',
  E103_DRAFT_REQUIRED_FIELD_MISSING = 'E103',
  E104_DUPLICATE_DRAFT_ID = 'E104',
  E105_INPUT_PATH_UNREADABLE = 'E105',
  E106_DRAFT_FILE_UNREADABLE = 'E106',

  // E2xx: Configuration and Argument Errors
  E201_CONFIG_FILE_NOT_FOUND = 'E201',
  E202_CONFIG_PARSE_FAILURE = 'E202',
  E203_CONFIG_SCHEMA_VALIDATION_FAILURE = 'E203',
  E204_INVALID_ARGUMENTS = 'E204',

  // E3xx: Output Errors
  E301_OUTPUT_NOT_WRITABLE = 'E301',
  E302_OUTPUT_WRITE_FAILURE = 'E302',

  // E4xx: Internal Invariant Errors
  E401_ACCUMULATOR_INVARIANT_VIOLATION = 'E401',
  E402_ITERATION_BUDGET_INVALID = 'E402',
}

const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.E101_INPUT_PATH_NOT_FOUND]: 'Input path does not exist',
  [ErrorCode.E102_DRAFT_PARSE_FAILURE]: 'Draft document could not be parsed',
  [ErrorCode.E103_DRAFT_REQUIRED_FIELD_MISSING]: 'Draft is missing a required field',
  [ErrorCode.E104_DUPLICATE_DRAFT_ID]: 'Draft id already loaded from another file',
  [ErrorCode.E105_INPUT_PATH_UNREADABLE]: 'Input path could not be read',
  [ErrorCode.E106_DRAFT_FILE_UNREADABLE]: 'Draft file could not be read',

  [ErrorCode.E201_CONFIG_FILE_NOT_FOUND]: 'Configuration file not found',
  [ErrorCode.E202_CONFIG_PARSE_FAILURE]: 'Configuration file could not be parsed',
  [ErrorCode.E203_CONFIG_SCHEMA_VALIDATION_FAILURE]: 'Configuration schema validation failed',
  [ErrorCode.E204_INVALID_ARGUMENTS]: 'Invalid command line arguments',

  [ErrorCode.E301_OUTPUT_NOT_WRITABLE]: 'Output directory is not writable',
  [ErrorCode.E302_OUTPUT_WRITE_FAILURE]: 'Failed to write output document',

  [ErrorCode.E401_ACCUMULATOR_INVARIANT_VIOLATION]: 'Review accumulator invariant violated',
  [ErrorCode.E402_ITERATION_BUDGET_INVALID]: 'Review iteration budget must be a positive integer',
};

/**
 * Get the error category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const codeStr: string = code;
  if (codeStr.startsWith('E1')) {
    return ErrorCategory.INPUT;
  }
  if (codeStr.startsWith('E2')) {
    return ErrorCategory.CONFIGURATION;
  }
  if (codeStr.startsWith('E3')) {
    return ErrorCategory.OUTPUT;
  }
  return ErrorCategory.INVARIANT;
}

/**
 * Get the error message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code];
}
