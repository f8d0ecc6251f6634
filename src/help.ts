/**
 * Help command - displays usage
 */

import { output, colorize } from './utils/output-manager.js';
import { getPackageInfo } from './utils/package-info.js';
import { DEFAULT_LICENSE_PATH, REGISTRY_BASE_URL } from './config/constants.js';

export function getUsageLines(binary: string): string[] {
  return [
    'Usage:',
    `  ${binary} get-license [--list] [--json] [--keep-going] [<key>...]`,
    `  ${binary} install-license <key> [--path P] [--author A] [--year Y] [--company C] [--project PR]`,
    `  ${binary} install-license <key> [--path P] --base`,
    `  ${binary} help | version`,
    '',
    'get-license:',
    '  (no keys)      list every license as a KEY / NAME / URL table',
    '  <key>...       show the full record of each license',
    '  --json         print JSON instead of text',
    '  --keep-going   fetch every key even when some fail (exit code 1 if any failed)',
    '',
    'install-license:',
    `  --path P       destination file (default: ${DEFAULT_LICENSE_PATH})`,
    '  --author A     copyright holder (default: git config user.name, then your OS user name)',
    '  --year Y       copyright year (default: "<current year>-present")',
    '  --company C    company name',
    '  --project PR   program name, used by the GPL family',
    '  --base         write the license text as published, without filling in placeholders',
    '',
    'Environment:',
    `  LICTOOL_REGISTRY_URL     registry base URL (default: ${REGISTRY_BASE_URL})`,
    '  LICTOOL_REGISTRY_TOKEN   bearer token for the registry',
    '  LICTOOL_VERBOSITY        minimal | normal | verbose',
    '  LICTOOL_LOG_FILE         also append all output to this file',
    '  LICTOOL_DEBUG=true       show technical error details'
  ];
}

export function printHelp(): void {
  const { name, version, binary } = getPackageInfo();
  output.writeLine(colorize(`📜 ${name} ${version} - fetch and install open-source licenses`, 'bright'));
  output.writeLine(colorize('━'.repeat(50), 'dim'));
  getUsageLines(binary).forEach(line => output.writeLine(line));
}

export function printVersion(): void {
  output.writeLine(getPackageInfo().version);
}
