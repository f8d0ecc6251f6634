/**
 * Author identity resolution
 *
 * The default copyright holder comes from `git config user.name`, then from
 * the OS account running the command. An unresolvable identity yields an
 * empty string rather than an error.
 */

import { spawn } from 'child_process';
import { userInfo } from 'os';
import { logger } from './compact-logger.js';
import { getErrorMessage } from './license-errors.js';

export interface IdentityProvider {
  resolveAuthor(): Promise<string>;
}

/** Runs a command and resolves with its stdout */
export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export function runCommand(command: string, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (chunk: Buffer) => { stdout += chunk.toString('utf8'); });
    child.stderr.on('data', (chunk: Buffer) => { stderr += chunk.toString('utf8'); });

    child.on('error', reject);
    child.on('close', (code) => {
      if (code === 0) {
        resolve(stdout);
      } else {
        reject(new Error(`${command} ${args.join(' ')} exited with code ${code}${stderr ? `: ${stderr.trim()}` : ''}`));
      }
    });
  });
}

export function getOsUserName(): string {
  try {
    return userInfo().username;
  } catch (error: unknown) {
    // userInfo() throws for uids without a passwd entry (common in containers)
    logger.debug(`OS user lookup failed: ${getErrorMessage(error)}`);
    return process.env.USER || process.env.USERNAME || '';
  }
}

export interface SystemIdentityProviderOptions {
  runCommand?: CommandRunner;
  getOsUserName?: () => string;
}

export class SystemIdentityProvider implements IdentityProvider {
  private readonly run: CommandRunner;
  private readonly osUserName: () => string;

  constructor(options: SystemIdentityProviderOptions = {}) {
    this.run = options.runCommand ?? runCommand;
    this.osUserName = options.getOsUserName ?? getOsUserName;
  }

  async resolveAuthor(): Promise<string> {
    const gitName = await this.readGitUserName();
    if (gitName) {
      logger.debug(`Author resolved from git config: ${gitName}`);
      return gitName;
    }

    const osName = this.osUserName().trim();
    if (osName) {
      logger.debug(`Author resolved from OS user: ${osName}`);
    } else {
      logger.warn('Could not determine an author name; placeholders will be left empty. Use --author to set one.');
    }
    return osName;
  }

  private async readGitUserName(): Promise<string> {
    try {
      return (await this.run('git', ['config', 'user.name'])).trim();
    } catch (error: unknown) {
      // git missing or user.name unset
      logger.debug(`git user.name lookup failed: ${getErrorMessage(error)}`);
      return '';
    }
  }
}
