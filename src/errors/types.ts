/**
 * Error codes for the failure classes of a credential lookup
 */
export enum ErrorCode {
  // Request errors
  PROTOCOL_ERROR = 'PROTOCOL_ERROR',
  MISSING_HOST = 'MISSING_HOST',

  // Mapping file errors
  MAPPING_NOT_FOUND = 'MAPPING_NOT_FOUND',
  MAPPING_PARSE_ERROR = 'MAPPING_PARSE_ERROR',
  NO_MAPPING_SECTION = 'NO_MAPPING_SECTION',

  // Mapping value errors
  MISSING_TARGET = 'MISSING_TARGET',
  UNKNOWN_EXTRACTOR = 'UNKNOWN_EXTRACTOR',
  INVALID_REGEX = 'INVALID_REGEX',
  INVALID_INTEGER = 'INVALID_INTEGER',
  INVALID_ENCODING = 'INVALID_ENCODING',

  // Password store errors
  ENTRY_NOT_FOUND = 'ENTRY_NOT_FOUND',
  ENTRY_NOT_A_FILE = 'ENTRY_NOT_A_FILE',
  STORE_FAILED = 'STORE_FAILED',

  // Generic
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export type ErrorDetails = Record<string, string | number | boolean | string[] | undefined>;

/**
 * Application error carrying an error code and diagnostic details
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: ErrorDetails,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to user-facing message.
   *
   * Most lookup failures already carry a precise message (the header that
   * failed to match, the extractor name, the entry path), so only the
   * generic cases get a canned text.
   */
  toUserMessage(): string {
    switch (this.code) {
      case ErrorCode.PROTOCOL_ERROR:
        return `Malformed credential request: ${this.message}`;

      case ErrorCode.MISSING_HOST:
        return 'Request lacks host entry';

      case ErrorCode.MAPPING_NOT_FOUND:
      case ErrorCode.MAPPING_PARSE_ERROR:
        return `Unable to parse mapping file: ${this.message}`;

      case ErrorCode.STORE_FAILED:
        return this.message || 'Unable to retrieve entry from the password store.';

      default:
        return this.message || 'An unknown error occurred.';
    }
  }

  /**
   * Get recovery suggestion for the error
   */
  getRecoverySuggestion(): string | null {
    const expectedFile = this.details?.expectedFile;
    const available = this.details?.available;

    switch (this.code) {
      case ErrorCode.MAPPING_NOT_FOUND:
        return expectedFile
          ? `Create ${expectedFile} or pass --mapping <file>`
          : 'Pass a mapping file with --mapping <file>';

      case ErrorCode.NO_MAPPING_SECTION:
        return 'Add a section whose pattern matches the request to the mapping file';

      case ErrorCode.UNKNOWN_EXTRACTOR:
        return Array.isArray(available)
          ? `Valid extractors: ${available.join(', ')}`
          : null;

      case ErrorCode.ENTRY_NOT_FOUND:
      case ErrorCode.ENTRY_NOT_A_FILE:
        return 'Check the target template and password_store_dir of the matching section';

      default:
        return null;
    }
  }
}
