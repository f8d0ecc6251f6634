/**
 * Node.js version compatibility checking
 */

import { MIN_NODE_MAJOR_VERSION } from '../config/constants.js';

/**
 * Check if current Node version is compatible
 */
export function checkNodeVersion(currentVersion: string = process.version): { compatible: boolean; message?: string } {
  const major = parseInt(currentVersion.replace(/^v/, '').split('.')[0], 10);

  if (Number.isNaN(major) || major < MIN_NODE_MAJOR_VERSION) {
    return {
      compatible: false,
      message: `Node.js ${currentVersion} is too old. Please upgrade to Node.js ${MIN_NODE_MAJOR_VERSION} or newer.\nDownload from: https://nodejs.org/`
    };
  }

  return { compatible: true };
}
