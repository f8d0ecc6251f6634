import { promises as fs, type Stats } from 'fs';
import { join, dirname, basename } from 'path';
import { randomBytes } from 'crypto';
import { getErrorCode, getErrorMessage } from './license-errors.js';

export function getModuleNameFromUrl(url: string): string {
  return url.match(/\/([^/]+)\.(js|ts)$/)?.[1] || 'default';
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

// directory not writable, but an existing file in it may be
const IN_PLACE_FALLBACK_CODES = new Set(['EACCES', 'EPERM']);

async function statIfExists(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath);
  } catch (error: unknown) {
    const code = getErrorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') return null;
    throw error;
  }
}

/**
 * Write a file atomically: the data goes to a temp file next to the target,
 * which is then renamed over it. A failed write never leaves a partial target.
 *
 * An existing target keeps its permissions, and a symlinked target is written
 * through to the file it points at. When the directory refuses the temp file
 * but the target already exists, the target is overwritten in place.
 *
 * The parent directory must already exist; it is not created.
 *
 * @param filePath - The destination file path
 * @param data - The data to write (string or Buffer)
 * @param options - Optional encoding (defaults to 'utf8')
 */
export async function writeFileAtomic(
  filePath: string,
  data: string | Buffer,
  options: { encoding?: BufferEncoding } = {}
): Promise<void> {
  const { encoding = 'utf8' } = options;

  const existing = await statIfExists(filePath);
  const existingFile = existing?.isFile() ? existing : null;
  const destination = existingFile ? await fs.realpath(filePath) : filePath;

  const dir = dirname(destination);
  const tempPath = join(dir, `.${basename(destination)}.${randomBytes(8).toString('hex')}.tmp`);

  try {
    await fs.writeFile(tempPath, data, { encoding });

    if (existingFile) {
      await fs.chmod(tempPath, existingFile.mode & 0o7777);
    }

    await fs.rename(tempPath, destination);
  } catch (error: unknown) {
    try {
      await fs.unlink(tempPath);
    } catch {
      // Ignore cleanup errors
    }

    if (existingFile && IN_PLACE_FALLBACK_CODES.has(getErrorCode(error) ?? '')) {
      await fs.writeFile(destination, data, { encoding });
      return;
    }
    throw error;
  }
}

interface FileSystemErrorExplanation {
  message: string;
  cause: string;
  fix: Record<string, string>;
}

const FILE_SYSTEM_ERROR_EXPLANATIONS: Record<string, FileSystemErrorExplanation> = {
  EACCES: {
    message: 'Permission denied',
    cause: "You don't have write access to this location",
    fix: {
      darwin: 'Check permissions: ls -la "$(dirname <path>)" or use chmod/chown to fix permissions',
      win32: 'Run terminal as Administrator or check folder Properties > Security tab',
      linux: 'Check permissions: ls -la "$(dirname <path>)" or use sudo/chmod to fix'
    }
  },
  EPERM: {
    message: 'Operation not permitted',
    cause: 'Insufficient privileges, file is locked, or protected by system',
    fix: {
      darwin: 'File may be locked or require admin access. Try: sudo or check System Preferences > Security',
      win32: 'Run as Administrator or check if file is in use by another program',
      linux: 'Try with sudo or check if file is immutable (lsattr/chattr)'
    }
  },
  ENOENT: {
    message: 'Directory not found',
    cause: 'The parent directory of the target path is missing',
    fix: {
      darwin: 'Verify path exists: ls -la "$(dirname <path>)"',
      win32: 'Verify path exists in File Explorer',
      linux: 'Verify path exists: ls -la "$(dirname <path>)"'
    }
  },
  ENOSPC: {
    message: 'No space left on device',
    cause: 'Disk is full - insufficient storage space',
    fix: {
      darwin: 'Free up space: Check storage in  > About This Mac > Storage',
      win32: 'Free up space: Check C:\\ drive in File Explorer',
      linux: 'Free up space: df -h to check disk usage, rm unnecessary files'
    }
  },
  EROFS: {
    message: 'Read-only file system',
    cause: 'Cannot write to read-only mounted filesystem',
    fix: {
      darwin: 'Check if volume is mounted read-only: mount | grep <path>',
      win32: 'Check drive properties and ensure it\'s not write-protected',
      linux: 'Remount with write permissions: sudo mount -o remount,rw <path>'
    }
  },
  ENOTDIR: {
    message: 'Not a directory',
    cause: 'A parent segment of the path is a file, not a directory',
    fix: {
      darwin: 'Check path: file <path> to see what it is',
      win32: 'Verify path in File Explorer',
      linux: 'Check path: file <path> or ls -la <path>'
    }
  },
  EISDIR: {
    message: 'Is a directory',
    cause: 'Expected a file but found a directory at this path',
    fix: {
      darwin: 'Point --path at a file inside it: ls -la <path>',
      win32: 'Verify path in File Explorer points to a file',
      linux: 'Check path: ls -ld <path>'
    }
  }
};

/**
 * Explain a file system error with platform-specific fix hints.
 *
 * @example
 * explainFileSystemError(err, 'writing ./LICENSE')
 * // Output:
 * // ❌ Permission denied when writing ./LICENSE
 * //    Error Code: EACCES
 * //    Cause: You don't have write access to this location
 * //    Fix: Check permissions...
 */
export function explainFileSystemError(
  error: unknown,
  operationDescription: string
): string {
  const errorCode = getErrorCode(error) || 'UNKNOWN';
  const platform = process.platform;

  const explanation = FILE_SYSTEM_ERROR_EXPLANATIONS[errorCode] || {
    message: 'Unknown file system error',
    cause: `Unexpected error: ${getErrorMessage(error)}`,
    fix: {
      darwin: 'Check system logs: Console.app',
      win32: 'Check Event Viewer',
      linux: 'Check system logs: journalctl or dmesg'
    }
  };

  const platformFix = explanation.fix[platform] ||
                      explanation.fix.linux ||
                      'Contact system administrator';

  return [
    `❌ ${explanation.message} when ${operationDescription}`,
    `   Error Code: ${errorCode}`,
    `   Cause: ${explanation.cause}`,
    `   Fix: ${platformFix}`
  ].join('\n');
}
