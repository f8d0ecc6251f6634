import { strict as assert } from 'node:assert';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, it } from 'node:test';
import fs from 'fs-extra';
import { runCli } from '../src/cli.js';
import { withErrorHandler } from '../src/utils/error-handler.js';
import { FixtureRegistry, StubIdentity, captureOutput, makeTempDir } from './test-utils.js';

function fixtureDeps() {
  return { registry: new FixtureRegistry(), identity: new StubIdentity('Stub Author'), now: () => new Date(2024, 0, 15) };
}

describe('runCli', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('prints the version from package.json', async () => {
    const { result, stdout } = await captureOutput(() => runCli(['--version']));

    assert.equal(result, 0);
    assert.equal(stdout, '1.0.0\n');
  });

  it('prints usage for help', async () => {
    const { result, stdout } = await captureOutput(() => runCli(['help']));

    assert.equal(result, 0);
    assert.ok(stdout.split('\n').includes('  lictool get-license [--list] [--json] [--keep-going] [<key>...]'));
  });

  it('lists the registry with get-license --list', async () => {
    const { result, stdout } = await captureOutput(() => runCli(['get-license', '--list'], { deps: fixtureDeps() }));

    assert.equal(result, 0);
    assert.equal(stdout.split('\n')[0], 'KEY         NAME                             URL');
  });

  it('installs through the install-license alias', async () => {
    const targetPath = path.join(dir, 'LICENSE');

    const { result } = await captureOutput(() =>
      runCli(['MIT', '--path', targetPath], { invokedAs: 'install-license', deps: fixtureDeps() })
    );

    assert.equal(result, 0);
    const lines = (await fs.readFile(targetPath, 'utf8')).split('\n');
    assert.equal(lines[2], 'Copyright (c) 2024-present Stub Author');
  });

  it('exits 2 with a short message on a usage error', async () => {
    const deps = fixtureDeps();
    const { result, stdout, stderr } = await captureOutput(() => runCli(['install-license'], { deps }));

    assert.equal(result, 2);
    assert.equal(stdout, '');
    assert.equal(stderr, [
      '✗ install-license needs a license key, for example "install-license mit"',
      'Try "lictool help" to see what I can do.',
      ''
    ].join('\n'));
    assert.deepEqual(deps.registry.requestedKeys, []);
  });

  it('exits 1 and explains a failed retrieval', async () => {
    const targetPath = path.join(dir, 'LICENSE');

    const { result, stdout, stderr } = await captureOutput(() =>
      runCli(['install-license', 'nope', '--path', targetPath], { deps: fixtureDeps() })
    );

    assert.equal(result, 1);
    assert.equal(stdout, '');
    const lines = stderr.split('\n');
    assert.ok(lines.includes('❌ The license text could not be retrieved'));
    assert.ok(lines.includes('   Could not retrieve license "nope": Registry answered 404 Not Found for https://registry.test/licenses/nope'));
    assert.ok(lines.includes('   Error Code: E302'));
    assert.equal(await fs.pathExists(targetPath), false);
  });

  it('exits 1 and explains a write into a missing directory', async () => {
    const targetPath = path.join(dir, 'nowhere', 'LICENSE');

    const { result, stderr } = await captureOutput(() =>
      runCli(['install-license', 'mit', '--path', targetPath], { deps: fixtureDeps() })
    );

    assert.equal(result, 1);
    const lines = stderr.split('\n');
    assert.ok(lines.includes('❌ The target directory does not exist'));
    assert.ok(lines.includes('   Error Code: E203'));
  });

  it('exits 1 when a fail-fast get-license hits an unknown key', async () => {
    const { result, stdout, stderr } = await captureOutput(() =>
      runCli(['get-license', 'mit', 'nope'], { deps: fixtureDeps() })
    );

    assert.equal(result, 1);
    assert.equal(stdout, '');
    assert.ok(stderr.split('\n').includes('❌ The license registry could not be queried'));
  });
});

describe('binaries', () => {
  it('gives each command binary an entry file of its own', async () => {
    const packageJson: unknown = await fs.readJson(fileURLToPath(new URL('../package.json', import.meta.url)));
    assert.ok(typeof packageJson === 'object' && packageJson !== null && 'bin' in packageJson);

    assert.deepEqual(packageJson.bin, {
      'lictool': 'dist/src/run.js',
      'get-license': 'dist/src/get-license.js',
      'install-license': 'dist/src/install-license.js'
    });

    const root = fileURLToPath(new URL('..', import.meta.url));
    for (const entry of ['run', 'get-license', 'install-license']) {
      assert.equal(await fs.pathExists(path.join(root, 'src', `${entry}.ts`)), true, entry);
    }
  });

  it('routes arguments to the command the binary fixes', async () => {
    const { result, stdout } = await captureOutput(() =>
      runCli(['--list'], { invokedAs: 'get-license', deps: fixtureDeps() })
    );

    assert.equal(result, 0);
    assert.equal(stdout.split('\n')[0], 'KEY         NAME                             URL');
  });
});

describe('withErrorHandler', () => {
  it('shows the generic fix-it steps for an unexpected error and exits 1', async () => {
    const failing = withErrorHandler(async (): Promise<number> => {
      throw new Error('boom');
    });

    const { result, stderr } = await captureOutput(() => failing());
    const lines = stderr.split('\n');

    assert.equal(result, 1);
    assert.ok(lines.includes('❌ An unexpected error occurred'));
    assert.ok(lines.includes('   boom'));
    assert.deepEqual(lines.filter(line => /^ {3}\d+\. /.test(line)), [
      '   1. Try the operation again',
      '   2. Run with LICTOOL_DEBUG=true for technical details'
    ]);
  });
});
