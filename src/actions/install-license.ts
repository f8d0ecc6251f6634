/**
 * install-license - fetch a license, fill in its placeholders and write it to disk
 */

import fsExtra from 'fs-extra';
import type { LicenseRecord, LicenseRegistry } from '../utils/registry-client.js';
import type { IdentityProvider } from '../utils/identity-provider.js';
import { renderLicense, type PlaceholderValues } from '../utils/license-renderer.js';
import { RetrievalError, UsageError, WriteError } from '../utils/license-errors.js';
import { writeFileAtomic } from '../utils/misc-utils.js';
import { logger } from '../utils/compact-logger.js';
import { DEFAULT_LICENSE_PATH, DEFAULT_YEAR_SUFFIX } from '../config/constants.js';
import type { PlaceholderRule } from '../config/placeholder-rules.js';

const { pathExists } = fsExtra;

export interface InstallRequest {
  /** Registry license key, any case */
  key: string;
  /** Destination file, defaults to ./LICENSE */
  targetPath?: string;
  /** Copyright holder, defaults to the git/OS identity */
  author?: string;
  /** Copyright year, defaults to "<current year>-present" */
  year?: string;
  /** Accepted for every family; no current placeholder family uses it */
  company?: string;
  /** Program name, used by the GNU family */
  project?: string;
  /** Write the registry text untouched */
  rawMode?: boolean;
}

export interface InstallResult {
  /** Normalized (lowercase) license key */
  key: string;
  name: string;
  targetPath: string;
  /** Name of the placeholder family applied, null in raw mode or for keys without one */
  family: string | null;
  /** Placeholders present in the license text that were replaced with an empty value */
  clearedPlaceholders: PlaceholderRule[];
}

export interface InstallDependencies {
  registry: LicenseRegistry;
  identity: IdentityProvider;
  /** Clock used for the default year */
  now?: () => Date;
}

export function getDefaultYear(now: Date = new Date()): string {
  return `${now.getFullYear()}${DEFAULT_YEAR_SUFFIX}`;
}

/**
 * Fill the placeholder values the request leaves out.
 * An explicitly given empty string is kept: it skips the identity lookup and erases the token.
 */
export async function resolvePlaceholderValues(
  request: InstallRequest,
  deps: InstallDependencies
): Promise<PlaceholderValues> {
  const author = request.author ?? await deps.identity.resolveAuthor();
  const year = request.year ?? getDefaultYear(deps.now?.() ?? new Date());

  return {
    author,
    year,
    project: request.project ?? '',
    company: request.company ?? ''
  };
}

async function fetchLicense(registry: LicenseRegistry, key: string): Promise<LicenseRecord> {
  try {
    return await registry.fetchOne(key);
  } catch (error: unknown) {
    throw new RetrievalError(key, error);
  }
}

/**
 * Install a license file.
 *
 * Nothing is written unless the license text was fetched and rendered;
 * the write itself is atomic, so a failure leaves any existing file intact.
 */
export async function installLicense(request: InstallRequest, deps: InstallDependencies): Promise<InstallResult> {
  const key = request.key.trim().toLowerCase();
  if (!key) {
    throw new UsageError('A license key is required');
  }
  const targetPath = request.targetPath || DEFAULT_LICENSE_PATH;

  // raw text needs no values, so skip the identity lookup
  const values = request.rawMode ? null : await resolvePlaceholderValues(request, deps);

  const record = await fetchLicense(deps.registry, key);
  logger.debug(`Fetched "${record.name}" (${record.body.length} characters)`);

  let text = record.body;
  let family: string | null = null;
  const clearedPlaceholders: PlaceholderRule[] = [];

  if (values) {
    const rendered = renderLicense(key, record.body, values);
    text = rendered.text;
    family = rendered.family?.name ?? null;

    for (const rule of rendered.family?.rules ?? []) {
      if (values[rule.source] === '' && record.body.includes(rule.token)) {
        clearedPlaceholders.push(rule);
      }
    }
  }

  if (await pathExists(targetPath)) {
    logger.debug(`Overwriting existing ${targetPath}`);
  }

  try {
    await writeFileAtomic(targetPath, text);
  } catch (error: unknown) {
    throw new WriteError(targetPath, error);
  }

  return { key, name: record.name, targetPath, family, clearedPlaceholders };
}

/**
 * Run the install-license command.
 *
 * @returns process exit code
 */
export async function runInstallLicense(request: InstallRequest, deps: InstallDependencies): Promise<number> {
  await logger.initialize(import.meta.url);
  const result = await installLicense(request, deps);

  if (request.rawMode) {
    logger.info('Raw mode: license text written without placeholder substitution');
  } else if (!result.family) {
    logger.info(`No placeholders known for "${result.key}"; license text written as published`);
  }

  for (const { token, source } of result.clearedPlaceholders) {
    logger.warn(`No value for ${token}; the placeholder was removed. Pass --${source} to fill it in.`);
  }

  logger.success(`${result.name} written to ${result.targetPath}`);
  return 0;
}

