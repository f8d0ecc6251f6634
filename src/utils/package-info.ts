import { join } from 'path';
import fsExtra from 'fs-extra';
import { getPackageRoot } from '../config/user-paths.js';
import { logger } from './compact-logger.js';
import { getErrorMessage } from './license-errors.js';

const { readJsonSync } = fsExtra;

const DEFAULT_PACKAGE_NAME = 'lictool';

/**
 * Package info cache to avoid multiple file reads
 */
export interface PackageInfo {
  name: string;
  version: string;
  binary: string;
}

let packageInfoCache: PackageInfo | null = null;

/**
 * Get package info from package.json (cached)
 */
export function getPackageInfo(): PackageInfo {
  if (packageInfoCache) {
    return packageInfoCache;
  }

  try {
    const packageJson: unknown = readJsonSync(join(getPackageRoot(), 'package.json'));
    const fields: object = typeof packageJson === 'object' && packageJson !== null ? packageJson : {};

    const name = 'name' in fields && typeof fields.name === 'string' ? fields.name : DEFAULT_PACKAGE_NAME;
    const version = 'version' in fields && typeof fields.version === 'string' ? fields.version : '0.0.0';

    // first declared binary is the main one
    let binary = DEFAULT_PACKAGE_NAME;
    if ('bin' in fields && typeof fields.bin === 'object' && fields.bin !== null) {
      binary = Object.keys(fields.bin)[0] || DEFAULT_PACKAGE_NAME;
    }

    packageInfoCache = { name, version, binary };
    return packageInfoCache;
  } catch (error: unknown) {
    logger.debug(`Could not read package.json: ${getErrorMessage(error)}`);
    return { name: DEFAULT_PACKAGE_NAME, version: '0.0.0', binary: DEFAULT_PACKAGE_NAME };
  }
}

/**
 * User-Agent sent to the license registry
 */
export function getUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version}`;
}
