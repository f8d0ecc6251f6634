/**
 * License registry client
 *
 * Talks to a GitHub-compatible licenses API:
 *   GET <baseUrl>/licenses        -> array of licenses (key, name, url, ...)
 *   GET <baseUrl>/licenses/<key>  -> one full license record
 */

import { callHttp, type HttpCallOptions } from './http-caller.js';
import { REGISTRY_ACCEPT_HEADER, REGISTRY_BASE_URL, REGISTRY_TOKEN } from '../config/constants.js';
import { getErrorMessage } from './license-errors.js';

export interface LicenseSummary {
  readonly key: string;
  readonly name: string;
  readonly url: string;
}

export interface LicenseRecord extends LicenseSummary {
  readonly spdx_id: string;
  readonly html_url: string;
  readonly description: string;
  /** Implementation notes, as the registry names the field */
  readonly implementation: string;
  readonly permissions: readonly string[];
  readonly conditions: readonly string[];
  readonly limitations: readonly string[];
  /** Raw license text with embedded placeholder tokens */
  readonly body: string;
  readonly featured: boolean;
}

/**
 * Minimal registry surface used by the commands; tests swap in a fixture registry.
 */
export interface LicenseRegistry {
  fetchAll(): Promise<LicenseSummary[]>;
  fetchOne(key: string): Promise<LicenseRecord>;
}

/**
 * The registry answered, but not with what was asked for: non-2xx status or malformed JSON.
 */
export class RegistryResponseError extends Error {
  public name = 'RegistryResponseError';

  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message);
  }
}

export interface HttpLicenseRegistryOptions {
  baseUrl?: string;
  token?: string;
  userAgent?: string;
  timeout?: number;
}

export class HttpLicenseRegistry implements LicenseRegistry {
  private readonly baseUrl: string;
  private readonly httpOptions: HttpCallOptions;

  constructor(options: HttpLicenseRegistryOptions = {}) {
    this.baseUrl = (options.baseUrl ?? REGISTRY_BASE_URL).replace(/\/+$/, '');

    const token = options.token ?? REGISTRY_TOKEN;
    const headers: Record<string, string> = { Accept: REGISTRY_ACCEPT_HEADER };
    if (token) headers.Authorization = `Bearer ${token}`;

    this.httpOptions = { headers, userAgent: options.userAgent, timeout: options.timeout };
  }

  async fetchAll(): Promise<LicenseSummary[]> {
    const url = `${this.baseUrl}/licenses`;
    const payload = await this.getJson(url);

    if (!Array.isArray(payload)) {
      throw new RegistryResponseError(`Expected a list of licenses from ${url}`, url);
    }

    return payload.map((item: unknown, index) => {
      const summary = parseLicenseSummary(item);
      if (!summary) {
        throw new RegistryResponseError(`Malformed license entry #${index} from ${url}`, url);
      }
      return summary;
    });
  }

  async fetchOne(key: string): Promise<LicenseRecord> {
    const url = `${this.baseUrl}/licenses/${encodeURIComponent(key)}`;
    const record = parseLicenseRecord(await this.getJson(url));

    if (!record) {
      throw new RegistryResponseError(`Malformed license record for "${key}" from ${url}`, url);
    }
    return record;
  }

  private async getJson(url: string): Promise<unknown> {
    const response = await callHttp(url, this.httpOptions);

    if (!response.ok) {
      throw new RegistryResponseError(
        `Registry answered ${response.status}${response.statusText ? ` ${response.statusText}` : ''} for ${url}`,
        url,
        response.status
      );
    }

    try {
      return await response.json();
    } catch (error: unknown) {
      throw new RegistryResponseError(`Invalid JSON from ${url}: ${getErrorMessage(error)}`, url, response.status);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function asStringList(value: unknown): string[] | null {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) return null;
  return value.every((item): item is string => typeof item === 'string') ? value : null;
}

/**
 * Validate one entry of the listing payload.
 * `url` may be null for registry entries without an API page; it is reported as an empty string.
 */
export function parseLicenseSummary(value: unknown): LicenseSummary | null {
  if (!isRecord(value)) return null;

  const key = asString(value.key);
  const name = asString(value.name);
  if (!key || !name) return null;

  return { key, name, url: asString(value.url) ?? '' };
}

/**
 * Validate a single-license payload. Only `key`, `name` and `body` are mandatory;
 * missing optional text fields become empty strings and missing lists empty lists.
 */
export function parseLicenseRecord(value: unknown): LicenseRecord | null {
  const summary = parseLicenseSummary(value);
  if (!summary || !isRecord(value)) return null;

  const body = asString(value.body);
  const permissions = asStringList(value.permissions);
  const conditions = asStringList(value.conditions);
  const limitations = asStringList(value.limitations);
  if (body === null || !permissions || !conditions || !limitations) return null;

  return {
    ...summary,
    spdx_id: asString(value.spdx_id) ?? '',
    html_url: asString(value.html_url) ?? '',
    description: asString(value.description) ?? '',
    implementation: asString(value.implementation) ?? '',
    permissions,
    conditions,
    limitations,
    body,
    featured: value.featured === true
  };
}
