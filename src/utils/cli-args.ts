/**
 * Command line parsing for the lictool commands
 */

import { UsageError } from './license-errors.js';
import type { InstallRequest } from '../actions/install-license.js';

export const GET_LICENSE_COMMAND = 'get-license';
export const INSTALL_LICENSE_COMMAND = 'install-license';

export interface GetLicenseArgs {
  keys: string[];
  list: boolean;
  json: boolean;
  keepGoing: boolean;
}

export type ParsedCommand =
  | { command: typeof GET_LICENSE_COMMAND; args: GetLicenseArgs }
  | { command: typeof INSTALL_LICENSE_COMMAND; request: InstallRequest }
  | { command: 'help' }
  | { command: 'version' };

interface SplitArgs {
  positionals: string[];
  values: Map<string, string>;
  flags: Set<string>;
}

/**
 * Separate positionals from `--flag`, `--option value` and `--option=value` tokens.
 * A bare `--` ends option parsing.
 */
export function splitArgs(
  args: readonly string[],
  valueOptions: readonly string[],
  booleanFlags: readonly string[]
): SplitArgs {
  const result: SplitArgs = { positionals: [], values: new Map(), flags: new Set() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--') {
      result.positionals.push(...args.slice(i + 1));
      break;
    }

    if (!arg.startsWith('--') || arg === '-') {
      if (arg.startsWith('-') && arg !== '-') {
        throw new UsageError(`Unknown option "${arg}"`);
      }
      result.positionals.push(arg);
      continue;
    }

    const eqIndex = arg.indexOf('=');
    const name = eqIndex === -1 ? arg.slice(2) : arg.slice(2, eqIndex);

    if (valueOptions.includes(name)) {
      let value: string | undefined;
      if (eqIndex !== -1) {
        value = arg.slice(eqIndex + 1);
      } else if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
        value = args[++i];
      }
      if (value === undefined) {
        throw new UsageError(`Option "--${name}" needs a value`);
      }
      result.values.set(name, value);
      continue;
    }

    if (booleanFlags.includes(name)) {
      if (eqIndex !== -1) {
        throw new UsageError(`Option "--${name}" does not take a value`);
      }
      result.flags.add(name);
      continue;
    }

    throw new UsageError(`Unknown option "--${name}"`);
  }

  return result;
}

export function parseGetLicenseArgs(args: readonly string[]): GetLicenseArgs {
  const { positionals, flags } = splitArgs(args, [], ['list', 'json', 'keep-going']);
  const list = flags.has('list');

  if (list && positionals.length > 0) {
    throw new UsageError('--list does not take license keys; pass either --list or one or more keys');
  }

  return {
    keys: positionals,
    list,
    json: flags.has('json'),
    keepGoing: flags.has('keep-going')
  };
}

const OVERRIDE_OPTIONS = ['author', 'year', 'company', 'project'] as const;

export function parseInstallLicenseArgs(args: readonly string[]): InstallRequest {
  const { positionals, values, flags } = splitArgs(args, ['path', ...OVERRIDE_OPTIONS], ['base']);

  if (positionals.length === 0) {
    throw new UsageError(`${INSTALL_LICENSE_COMMAND} needs a license key, for example "${INSTALL_LICENSE_COMMAND} mit"`);
  }
  if (positionals.length > 1) {
    throw new UsageError(`${INSTALL_LICENSE_COMMAND} takes exactly one license key, got ${positionals.length}: ${positionals.join(', ')}`);
  }

  const rawMode = flags.has('base');
  const overrides = OVERRIDE_OPTIONS.filter(option => values.has(option));
  if (rawMode && overrides.length > 0) {
    throw new UsageError(`--base cannot be combined with ${overrides.map(option => `--${option}`).join(', ')}`);
  }

  return {
    key: positionals[0],
    targetPath: values.get('path'),
    author: values.get('author'),
    year: values.get('year'),
    company: values.get('company'),
    project: values.get('project'),
    rawMode
  };
}

/**
 * Parse the full argument list.
 *
 * @param args - process.argv without the node binary and script
 * @param invokedAs - binary name; the `get-license` and `install-license` aliases skip the sub-command
 */
export function parseCliArgs(args: readonly string[], invokedAs?: string): ParsedCommand {
  const [command, ...rest] = invokedAs === GET_LICENSE_COMMAND || invokedAs === INSTALL_LICENSE_COMMAND
    ? [invokedAs, ...args]
    : args;

  if (!command || command === 'help' || command === '--help' || command === '-h') {
    return { command: 'help' };
  }

  if (command === 'version' || command === '--version' || command === '-v') {
    return { command: 'version' };
  }

  if (rest.includes('--help') || rest.includes('-h')) {
    return { command: 'help' };
  }

  switch (command) {
    case GET_LICENSE_COMMAND:
      return { command: GET_LICENSE_COMMAND, args: parseGetLicenseArgs(rest) };
    case INSTALL_LICENSE_COMMAND:
      return { command: INSTALL_LICENSE_COMMAND, request: parseInstallLicenseArgs(rest) };
    default:
      throw new UsageError(`Oops! I don't know the command "${command}"`);
  }
}
