/**
 * Command dispatch shared by the lictool, get-license and install-license binaries
 */

import { parseCliArgs, GET_LICENSE_COMMAND, INSTALL_LICENSE_COMMAND } from './utils/cli-args.js';
import { withErrorHandler } from './utils/error-handler.js';
import { HttpLicenseRegistry, type LicenseRegistry } from './utils/registry-client.js';
import { SystemIdentityProvider, type IdentityProvider } from './utils/identity-provider.js';
import { getUserAgent } from './utils/package-info.js';
import { logger } from './utils/compact-logger.js';
import { runGetLicense } from './actions/get-license.js';
import { runInstallLicense } from './actions/install-license.js';
import { printHelp, printVersion } from './help.js';
import { checkNodeVersion } from './utils/node-check.js';
import { output, colorize } from './utils/output-manager.js';

export interface CliDependencies {
  registry: LicenseRegistry;
  identity: IdentityProvider;
  now?: () => Date;
}

export interface RunCliOptions {
  /** Command fixed by the binary (`get-license`, `install-license`); none for `lictool` */
  invokedAs?: string;
  /** Replacements for the network registry and the system identity, used by tests */
  deps?: Partial<CliDependencies>;
}

function createDependencies(overrides: Partial<CliDependencies> = {}): CliDependencies {
  return {
    registry: overrides.registry ?? new HttpLicenseRegistry({ userAgent: getUserAgent() }),
    identity: overrides.identity ?? new SystemIdentityProvider(),
    now: overrides.now
  };
}

/**
 * Parse the arguments, run the matching command and resolve to the process exit code.
 * Errors are displayed on stderr, never thrown.
 */
export async function runCli(args: readonly string[], options: RunCliOptions = {}): Promise<number> {
  const run = withErrorHandler(async (): Promise<number> => {
    const parsed = parseCliArgs(args, options.invokedAs);

    switch (parsed.command) {
      case 'help':
        printHelp();
        return 0;
      case 'version':
        printVersion();
        return 0;
      case GET_LICENSE_COMMAND:
        return runGetLicense(parsed.args, createDependencies(options.deps).registry);
      case INSTALL_LICENSE_COMMAND:
        return runInstallLicense(parsed.request, createDependencies(options.deps));
    }
  });

  try {
    return await run();
  } finally {
    await logger.close();
  }
}

/**
 * Process entry shared by the binaries. Each binary passes its own command name;
 * `lictool` passes none and takes the command from the arguments.
 */
export function startCli(invokedAs?: string): void {
  const main = async (): Promise<void> => {
    const nodeCheck = checkNodeVersion();
    if (!nodeCheck.compatible) {
      output.writeErrorLine(colorize(nodeCheck.message ?? 'Unsupported Node.js version', 'red'));
      process.exitCode = 1;
      return;
    }

    process.exitCode = await runCli(process.argv.slice(2), { invokedAs });
  };

  main().catch((err: unknown) => {
    output.writeErrorLine(colorize(`\n✗ Unexpected error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`, 'red'));
    process.exitCode = 1;
  });
}
