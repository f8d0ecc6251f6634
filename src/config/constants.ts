/**
 * Base address of the license registry.
 * Listing lives at `${REGISTRY_BASE_URL}/licenses`, single records at `${REGISTRY_BASE_URL}/licenses/<key>`.
 * Configurable via LICTOOL_REGISTRY_URL
 */
export const REGISTRY_BASE_URL = (process.env.LICTOOL_REGISTRY_URL || 'https://api.github.com').replace(/\/+$/, '');

/** Optional bearer token sent to the registry (raises the GitHub API rate limit) */
export const REGISTRY_TOKEN = process.env.LICTOOL_REGISTRY_TOKEN || '';

/** Registry request timeout (ms) - configurable via LICTOOL_HTTP_TIMEOUT_MS */
export const HTTP_TIMEOUT_MS =
  parseInt(process.env.LICTOOL_HTTP_TIMEOUT_MS || '30000');

export const REGISTRY_ACCEPT_HEADER = 'application/vnd.github+json';

export const DEFAULT_LICENSE_PATH = './LICENSE';

/** Suffix appended to the current calendar year when no --year is given */
export const DEFAULT_YEAR_SUFFIX = '-present';

export const VERBOSITY = process.env.LICTOOL_VERBOSITY || process.env.LICTOOL_LOG_LEVEL || 'normal';

/** When set, every output line is also appended to this file */
export const LOG_FILE_PATH = process.env.LICTOOL_LOG_FILE || '';

export const IS_DEBUG = process.env.LICTOOL_DEBUG === 'true';

export const MIN_NODE_MAJOR_VERSION = 20;
