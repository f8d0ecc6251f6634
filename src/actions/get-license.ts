/**
 * get-license - list the registry's licenses or show full license records
 */

import type { LicenseRecord, LicenseRegistry, LicenseSummary } from '../utils/registry-client.js';
import type { GetLicenseArgs } from '../utils/cli-args.js';
import { UnavailableError, getErrorMessage } from '../utils/license-errors.js';
import { logger } from '../utils/compact-logger.js';
import { output } from '../utils/output-manager.js';
import { formatDuration } from '../utils/misc-utils.js';
import { EXIT_FAILURE } from '../utils/error-handler.js';

export interface LicenseFetchFailure {
  key: string;
  error: UnavailableError;
}

export interface SettledLicenseFetch {
  /** Successfully fetched records, in input order */
  records: LicenseRecord[];
  /** One entry per failed key, in input order */
  failures: LicenseFetchFailure[];
}

/**
 * List every license the registry advertises.
 * Any failure aborts the whole listing.
 */
export async function listAll(registry: LicenseRegistry): Promise<LicenseSummary[]> {
  try {
    return await registry.fetchAll();
  } catch (error: unknown) {
    throw new UnavailableError(`Could not list licenses: ${getErrorMessage(error)}`, undefined, { cause: error });
  }
}

async function fetchRecord(registry: LicenseRegistry, key: string): Promise<LicenseRecord> {
  try {
    return await registry.fetchOne(key);
  } catch (error: unknown) {
    throw new UnavailableError(`Could not fetch license "${key}": ${getErrorMessage(error)}`, key, { cause: error });
  }
}

/**
 * Fetch full records for the given keys, one request per key, in order.
 * Keys are passed to the registry as given. The first failing key aborts the batch.
 */
export async function getOne(registry: LicenseRegistry, keys: readonly string[]): Promise<LicenseRecord[]> {
  const records: LicenseRecord[] = [];
  for (const key of keys) {
    records.push(await fetchRecord(registry, key));
  }
  return records;
}

/**
 * Like getOne, but a failing key does not stop the others:
 * every key is tried and failures are collected next to the records.
 */
export async function getOneSettled(registry: LicenseRegistry, keys: readonly string[]): Promise<SettledLicenseFetch> {
  const result: SettledLicenseFetch = { records: [], failures: [] };

  for (const key of keys) {
    try {
      result.records.push(await fetchRecord(registry, key));
    } catch (error: unknown) {
      if (!(error instanceof UnavailableError)) throw error;
      result.failures.push({ key, error });
    }
  }

  return result;
}

/**
 * Render summaries as an aligned KEY / NAME / URL table.
 */
export function formatLicenseTable(summaries: readonly LicenseSummary[]): string[] {
  const header: [string, string, string] = ['KEY', 'NAME', 'URL'];
  const rows = summaries.map(({ key, name, url }): [string, string, string] => [key, name, url]);

  const keyWidth = Math.max(header[0].length, ...rows.map(row => row[0].length));
  const nameWidth = Math.max(header[1].length, ...rows.map(row => row[1].length));

  return [header, ...rows].map(([key, name, url]) =>
    `${key.padEnd(keyWidth)}  ${name.padEnd(nameWidth)}  ${url}`.trimEnd()
  );
}

function formatList(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : '-';
}

/**
 * Render one license record: a heading, labelled metadata fields, then the license text.
 */
export function formatLicenseRecord(record: LicenseRecord): string[] {
  const fields: Array<[string, string]> = [
    ['SPDX ID', record.spdx_id || '-'],
    ['URL', record.url || '-'],
    ['HTML URL', record.html_url || '-'],
    ['Featured', record.featured ? 'yes' : 'no'],
    ['Description', record.description || '-'],
    ['Implementation', record.implementation || '-'],
    ['Permissions', formatList(record.permissions)],
    ['Conditions', formatList(record.conditions)],
    ['Limitations', formatList(record.limitations)]
  ];
  const labelWidth = Math.max(...fields.map(([label]) => label.length)) + 1;

  return [
    `${record.key} - ${record.name}`,
    ...fields.map(([label, value]) => `  ${`${label}:`.padEnd(labelWidth)} ${value}`),
    '',
    ...record.body.replace(/\n$/, '').split('\n')
  ];
}

function printRecords(records: readonly LicenseRecord[], json: boolean): void {
  if (json) {
    output.writeLine(JSON.stringify(records, null, 2));
    return;
  }

  records.forEach((record, index) => {
    if (index > 0) output.writeLine('━'.repeat(60));
    formatLicenseRecord(record).forEach(line => output.writeLine(line));
  });
}

/**
 * Run the get-license command.
 * Without keys the full listing is printed; with keys, each license record.
 *
 * @returns process exit code
 */
export async function runGetLicense(args: GetLicenseArgs, registry: LicenseRegistry): Promise<number> {
  await logger.initialize(import.meta.url);
  const startTime = Date.now();

  if (args.keys.length === 0) {
    const summaries = await listAll(registry);
    logger.debug(`Listed ${summaries.length} licenses in ${formatDuration(Date.now() - startTime)}`);

    if (args.json) {
      output.writeLine(JSON.stringify(summaries, null, 2));
    } else if (summaries.length === 0) {
      logger.warn('The registry advertises no licenses');
    } else {
      formatLicenseTable(summaries).forEach(line => output.writeLine(line));
    }
    return 0;
  }

  if (!args.keepGoing) {
    const records = await getOne(registry, args.keys);
    logger.debug(`Fetched ${records.length} licenses in ${formatDuration(Date.now() - startTime)}`);
    printRecords(records, args.json);
    return 0;
  }

  const { records, failures } = await getOneSettled(registry, args.keys);
  logger.debug(`Fetched ${records.length} of ${args.keys.length} licenses in ${formatDuration(Date.now() - startTime)}`);
  printRecords(records, args.json);

  for (const failure of failures) {
    logger.error(failure.error.message);
  }
  return failures.length > 0 ? EXIT_FAILURE : 0;
}
