/**
 * License Errors - error taxonomy shared by the query and install commands
 *
 * Every failure that reaches the user is one of these classes. They carry an
 * ErrorCode so the error handler can pick the matching fix-it steps.
 */

export enum ErrorCode {
  // Registry errors
  REGISTRY_UNAVAILABLE = 'E301',
  LICENSE_NOT_RETRIEVED = 'E302',

  // File system errors
  PERMISSION_DENIED = 'E201',
  DISK_FULL = 'E202',
  DIRECTORY_NOT_FOUND = 'E203',
  TARGET_IS_DIRECTORY = 'E204',
  WRITE_FAILED = 'E205',

  // Input errors
  INVALID_USAGE = 'E401',

  // Unknown
  UNKNOWN_ERROR = 'E999'
}

/**
 * Extract a printable message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Read the errno-style code (`EACCES`, `ENOENT`, ...) of a thrown value, if it has one.
 * Node.js fetch wraps network errors, so the cause is checked as well.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if ('cause' in error) {
    return getErrorCode(error.cause);
  }
  return undefined;
}

/**
 * Base class of all errors this tool reports to the user.
 */
export class LicenseToolError extends Error {
  public name = 'LicenseToolError';

  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);

    // Maintains proper stack trace in V8 engines (Chrome, Node)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * The registry could not be queried: unreachable, non-2xx answer or
 * malformed payload. `key` is set when a single-license fetch failed.
 */
export class UnavailableError extends LicenseToolError {
  constructor(message: string, public readonly key?: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.REGISTRY_UNAVAILABLE, options);
    this.name = 'UnavailableError';
  }
}

/**
 * The license to install could not be fetched. No file has been touched.
 */
export class RetrievalError extends LicenseToolError {
  constructor(public readonly key: string, cause: unknown) {
    super(`Could not retrieve license "${key}": ${getErrorMessage(cause)}`, ErrorCode.LICENSE_NOT_RETRIEVED, { cause });
    this.name = 'RetrievalError';
  }
}

/**
 * The rendered license could not be written to its destination.
 */
export class WriteError extends LicenseToolError {
  public readonly fsCode: string | undefined;

  constructor(public readonly path: string, cause: unknown) {
    const fsCode = getErrorCode(cause);
    super(`Could not write license file "${path}": ${getErrorMessage(cause)}`, writeErrorCodeFor(fsCode), { cause });
    this.name = 'WriteError';
    this.fsCode = fsCode;
  }
}

/**
 * The command line could not be understood.
 */
export class UsageError extends LicenseToolError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_USAGE);
    this.name = 'UsageError';
  }
}

function writeErrorCodeFor(fsCode: string | undefined): ErrorCode {
  switch (fsCode) {
    case 'EACCES':
    case 'EPERM':
    case 'EROFS':
      return ErrorCode.PERMISSION_DENIED;
    case 'ENOSPC':
      return ErrorCode.DISK_FULL;
    case 'ENOENT':
    case 'ENOTDIR':
      return ErrorCode.DIRECTORY_NOT_FOUND;
    case 'EISDIR':
      return ErrorCode.TARGET_IS_DIRECTORY;
    default:
      return ErrorCode.WRITE_FAILED;
  }
}
