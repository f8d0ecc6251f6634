/**
 * User-friendly error handling system
 */

import { colorize, output } from './output-manager.js';
import { IS_DEBUG } from '../config/constants.js';
import { ErrorCode, LicenseToolError, UsageError, WriteError, getErrorMessage } from './license-errors.js';
import { explainFileSystemError } from './misc-utils.js';

/** Exit code for registry, filesystem and unexpected failures */
export const EXIT_FAILURE = 1;
/** Exit code for a command line that could not be parsed */
export const EXIT_USAGE = 2;

interface ErrorSolution {
  description: string;
  steps: string[];
  helpUrl?: string;
}

const ERROR_SOLUTIONS: Record<ErrorCode, ErrorSolution> = {
  [ErrorCode.REGISTRY_UNAVAILABLE]: {
    description: 'The license registry could not be queried',
    steps: [
      'Check your internet connection',
      'Run "lictool get-license --list" to see the valid license keys',
      'If you hit the GitHub API rate limit, set LICTOOL_REGISTRY_TOKEN'
    ],
    helpUrl: 'https://docs.github.com/en/rest/licenses/licenses'
  },
  [ErrorCode.LICENSE_NOT_RETRIEVED]: {
    description: 'The license text could not be retrieved',
    steps: [
      'Check the license key spelling (for example "mit" or "gpl-3.0")',
      'Run "lictool get-license --list" to see the valid license keys',
      'Check your internet connection and try again'
    ]
  },
  [ErrorCode.PERMISSION_DENIED]: {
    description: 'Permission denied writing the license file',
    steps: [
      'Check that you have write permissions for the target path',
      'Choose another destination with --path'
    ]
  },
  [ErrorCode.DISK_FULL]: {
    description: 'Not enough disk space available',
    steps: [
      'Free up some disk space',
      'Choose another destination with --path'
    ]
  },
  [ErrorCode.DIRECTORY_NOT_FOUND]: {
    description: 'The target directory does not exist',
    steps: [
      'Create the directory first, lictool does not create it',
      'Check the --path value for typos'
    ]
  },
  [ErrorCode.TARGET_IS_DIRECTORY]: {
    description: 'The target path is a directory',
    steps: [
      'Pass a file name, for example --path ./docs/LICENSE'
    ]
  },
  [ErrorCode.WRITE_FAILED]: {
    description: 'The license file could not be written',
    steps: [
      'Check the target path and try again',
      'Run with LICTOOL_DEBUG=true for technical details'
    ]
  },
  [ErrorCode.INVALID_USAGE]: {
    description: 'Invalid command line',
    steps: [
      'Run "lictool help" to see the available commands and options'
    ]
  },
  [ErrorCode.UNKNOWN_ERROR]: {
    description: 'An unexpected error occurred',
    steps: [
      'Try the operation again',
      'Run with LICTOOL_DEBUG=true for technical details'
    ]
  }
};

export class UserFriendlyError extends Error {
  constructor(
    public code: ErrorCode,
    public detail: string,
    public technicalMessage?: string
  ) {
    const solution = ERROR_SOLUTIONS[code];
    super(solution.description);
    this.name = 'UserFriendlyError';
  }

  get exitCode(): number {
    return this.code === ErrorCode.INVALID_USAGE ? EXIT_USAGE : EXIT_FAILURE;
  }

  public display(): void {
    const solution = ERROR_SOLUTIONS[this.code];

    // Error header
    output.writeErrorLine('\n' + colorize('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━', 'red'));
    output.writeErrorLine(colorize(`❌ ${solution.description}`, 'red'));
    output.writeErrorLine(colorize(`   ${this.detail}`, 'red'));
    output.writeErrorLine(colorize(`   Error Code: ${this.code}`, 'dim'));
    output.writeErrorLine(colorize('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━', 'red'));

    // Solution steps
    output.writeErrorLine('\n' + colorize('💡 How to fix this:', 'yellow'));
    solution.steps.forEach((step, index) => {
      output.writeErrorLine(colorize(`   ${index + 1}. ${step}`, 'cyan'));
    });

    if (solution.helpUrl) {
      output.writeErrorLine('\n' + colorize(`📚 Learn more: ${solution.helpUrl}`, 'dim'));
    }

    if (IS_DEBUG && this.technicalMessage) {
      output.writeErrorLine('\n' + colorize('Technical details:', 'dim'));
      output.writeErrorLine(colorize(this.technicalMessage, 'dim'));
    }

    output.writeErrorLine('');
  }
}

/**
 * Convert anything thrown into a user-friendly error
 */
export function handleError(error: unknown): UserFriendlyError {
  if (error instanceof UserFriendlyError) {
    return error;
  }

  if (error instanceof LicenseToolError) {
    let technical: string | undefined;
    if (error instanceof WriteError && error.fsCode) {
      technical = explainFileSystemError(error.cause, `writing ${error.path}`);
    } else if (error.cause !== undefined) {
      technical = getErrorMessage(error.cause);
    }
    return new UserFriendlyError(error.code, error.message, technical);
  }

  return new UserFriendlyError(ErrorCode.UNKNOWN_ERROR, getErrorMessage(error), getErrorMessage(error));
}

/**
 * Global error handler wrapper.
 * Resolves to the process exit code: the command's own on success, a failure code after displaying the error.
 */
export function withErrorHandler<A extends unknown[]>(
  fn: (...args: A) => Promise<number>
): (...args: A) => Promise<number> {
  return async (...args: A) => {
    try {
      return await fn(...args);
    } catch (error: unknown) {
      const userError = handleError(error);
      if (error instanceof UsageError) {
        // usage mistakes need no boxed report
        output.error(error.message);
        output.writeErrorLine(colorize('Try "lictool help" to see what I can do.', 'dim'));
      } else {
        userError.display();
      }

      if (IS_DEBUG && error instanceof Error) {
        output.writeErrorLine(`Stack trace: ${error.stack ?? ''}`);
      }

      return userError.exitCode;
    }
  };
}
