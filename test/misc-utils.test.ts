import { strict as assert } from 'node:assert';
import path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';
import fs from 'fs-extra';
import { explainFileSystemError, formatDuration, getModuleNameFromUrl, writeFileAtomic } from '../src/utils/misc-utils.js';
import { checkNodeVersion } from '../src/utils/node-check.js';
import { ErrorCode, WriteError, getErrorCode } from '../src/utils/license-errors.js';
import { makeTempDir } from './test-utils.js';

function errnoError(code: string): Error {
  return Object.assign(new Error(`${code}: simulated`), { code });
}

describe('writeFileAtomic', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('writes the content and leaves only the target behind', async () => {
    const target = path.join(dir, 'LICENSE');
    await writeFileAtomic(target, 'hello\n');

    assert.equal(await fs.readFile(target, 'utf8'), 'hello\n');
    assert.deepEqual(await fs.readdir(dir), ['LICENSE']);
  });

  it('writes through a symlinked target and keeps the link', async () => {
    const shared = path.join(dir, 'SHARED_LICENSE');
    const target = path.join(dir, 'LICENSE');
    await fs.writeFile(shared, 'old');
    await fs.symlink(shared, target);

    await writeFileAtomic(target, 'new');

    assert.equal(await fs.readFile(shared, 'utf8'), 'new');
    assert.equal((await fs.lstat(target)).isSymbolicLink(), true);
    assert.deepEqual((await fs.readdir(dir)).sort(), ['LICENSE', 'SHARED_LICENSE']);
  });

  it('keeps the permissions of an existing file', async () => {
    const target = path.join(dir, 'LICENSE');
    await fs.writeFile(target, 'old');
    await fs.chmod(target, 0o640);

    await writeFileAtomic(target, 'new');

    assert.equal((await fs.stat(target)).mode & 0o777, 0o640);
  });

  it('overwrites an existing file in place when its directory is read-only', { skip: process.getuid?.() === 0 }, async () => {
    const locked = path.join(dir, 'locked');
    const target = path.join(locked, 'LICENSE');
    await fs.mkdir(locked);
    await fs.writeFile(target, 'old');
    await fs.chmod(locked, 0o555);

    try {
      await writeFileAtomic(target, 'new');
      assert.equal(await fs.readFile(target, 'utf8'), 'new');
    } finally {
      await fs.chmod(locked, 0o755);
    }
  });

  it('reports the write failure when a parent segment is a file', async () => {
    await fs.writeFile(path.join(dir, 'file'), 'x');

    await assert.rejects(writeFileAtomic(path.join(dir, 'file', 'LICENSE'), 'x'), { code: 'ENOTDIR', syscall: 'open' });
  });

  it('fails with ENOENT when the directory is missing', async () => {
    await assert.rejects(writeFileAtomic(path.join(dir, 'a', 'LICENSE'), 'x'), { code: 'ENOENT' });
  });
});

describe('WriteError', () => {
  it('maps errno codes onto error codes', () => {
    const cases: Array<[string, ErrorCode]> = [
      ['EACCES', ErrorCode.PERMISSION_DENIED],
      ['EPERM', ErrorCode.PERMISSION_DENIED],
      ['EROFS', ErrorCode.PERMISSION_DENIED],
      ['ENOSPC', ErrorCode.DISK_FULL],
      ['ENOENT', ErrorCode.DIRECTORY_NOT_FOUND],
      ['ENOTDIR', ErrorCode.DIRECTORY_NOT_FOUND],
      ['EISDIR', ErrorCode.TARGET_IS_DIRECTORY],
      ['EIO', ErrorCode.WRITE_FAILED]
    ];
    for (const [fsCode, expected] of cases) {
      assert.equal(new WriteError('LICENSE', errnoError(fsCode)).code, expected, fsCode);
    }
  });

  it('names the path and the cause in its message', () => {
    const error = new WriteError('out/LICENSE', errnoError('EACCES'));
    assert.equal(error.message, 'Could not write license file "out/LICENSE": EACCES: simulated');
    assert.equal(error.fsCode, 'EACCES');
  });
});

describe('getErrorCode', () => {
  it('looks through wrapped causes', () => {
    const wrapped = new Error('fetch failed', { cause: errnoError('ECONNREFUSED') });
    assert.equal(getErrorCode(wrapped), 'ECONNREFUSED');
    assert.equal(getErrorCode('EACCES'), undefined);
  });
});

describe('explainFileSystemError', () => {
  it('describes known codes', () => {
    const lines = explainFileSystemError(errnoError('EISDIR'), 'writing ./LICENSE').split('\n');

    assert.equal(lines[0], '❌ Is a directory when writing ./LICENSE');
    assert.equal(lines[1], '   Error Code: EISDIR');
    assert.equal(lines[2], '   Cause: Expected a file but found a directory at this path');
  });

  it('falls back to the raw message for unknown codes', () => {
    const lines = explainFileSystemError(new Error('boom'), 'writing ./LICENSE').split('\n');

    assert.equal(lines[0], '❌ Unknown file system error when writing ./LICENSE');
    assert.equal(lines[1], '   Error Code: UNKNOWN');
    assert.equal(lines[2], '   Cause: Unexpected error: boom');
  });
});

describe('formatDuration', () => {
  it('picks a unit by magnitude', () => {
    assert.equal(formatDuration(250), '250ms');
    assert.equal(formatDuration(1500), '1.5s');
    assert.equal(formatDuration(125000), '2m 5s');
  });
});

describe('getModuleNameFromUrl', () => {
  it('takes the file name without extension', () => {
    assert.equal(getModuleNameFromUrl('file:///opt/lictool/dist/src/actions/install-license.js'), 'install-license');
    assert.equal(getModuleNameFromUrl('file:///x/y/get-license.ts'), 'get-license');
    assert.equal(getModuleNameFromUrl('about:blank'), 'default');
  });
});

describe('checkNodeVersion', () => {
  it('accepts Node.js 20 and newer', () => {
    assert.deepEqual(checkNodeVersion('v20.11.1'), { compatible: true });
    assert.deepEqual(checkNodeVersion('v22.0.0'), { compatible: true });
  });

  it('rejects older or unparseable versions', () => {
    assert.equal(checkNodeVersion('v18.19.0').compatible, false);
    assert.equal(checkNodeVersion('garbage').compatible, false);
  });
});
