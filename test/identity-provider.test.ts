import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';
import { SystemIdentityProvider, type CommandRunner } from '../src/utils/identity-provider.js';
import { captureOutput } from './test-utils.js';

function gitAnswering(stdout: string): CommandRunner & { calls: string[][] } {
  const calls: string[][] = [];
  const run = async (command: string, args: string[]): Promise<string> => {
    calls.push([command, ...args]);
    return stdout;
  };
  return Object.assign(run, { calls });
}

const gitFailing: CommandRunner = async () => {
  throw new Error('git config user.name exited with code 1');
};

describe('SystemIdentityProvider', () => {
  it('prefers the git user name, trimmed', async () => {
    const runCommand = gitAnswering('  Jane Doe \n');
    const provider = new SystemIdentityProvider({ runCommand, getOsUserName: () => 'jdoe' });

    assert.equal(await provider.resolveAuthor(), 'Jane Doe');
    assert.deepEqual(runCommand.calls, [['git', 'config', 'user.name']]);
  });

  it('falls back to the OS user when git has no name', async () => {
    const provider = new SystemIdentityProvider({ runCommand: gitAnswering('\n'), getOsUserName: () => 'jdoe' });
    assert.equal(await provider.resolveAuthor(), 'jdoe');
  });

  it('falls back to the OS user when git cannot be run', async () => {
    const provider = new SystemIdentityProvider({ runCommand: gitFailing, getOsUserName: () => 'jdoe' });
    assert.equal(await provider.resolveAuthor(), 'jdoe');
  });

  it('resolves to an empty string with a warning when nothing is known', async () => {
    const provider = new SystemIdentityProvider({ runCommand: gitFailing, getOsUserName: () => ' ' });

    const { result, stdout, stderr } = await captureOutput(() => provider.resolveAuthor());

    assert.equal(result, '');
    assert.equal(stdout, '');
    assert.equal(
      stderr,
      '⚠️  Could not determine an author name; placeholders will be left empty. Use --author to set one.\n'
    );
  });
});
