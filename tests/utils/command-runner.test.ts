import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';

import { DryRunRunner, ExecFileRunner, formatCommandLine, runChecked } from '../../src/utils/command-runner.js';
import { CommandFailedError } from '../../src/utils/errors.js';
import { RecordingRunner, createRecordingOutput } from '../test-helpers.js';

describe('formatCommandLine', () => {
  it('leaves plain arguments bare', () => {
    assert.equal(formatCommandLine('apt-get', ['install', '-y', 'git']), 'apt-get install -y git');
  });

  it('quotes arguments with spaces or quotes', () => {
    assert.equal(formatCommandLine('echo', ["it's", 'a b', 'plain']), "echo 'it'\\''s' 'a b' plain");
  });
});

describe('DryRunRunner', () => {
  it('prints commands instead of running them', async () => {
    const output = createRecordingOutput();
    const runner = new DryRunRunner(output);

    const result = await runner.run('apt-get', ['install', '-y', 'git'], { sudo: true });

    assert.deepEqual(result, { exitCode: 0, stdout: '', stderr: '' });
    assert.deepEqual(runner.commands, ['sudo apt-get install -y git']);
    assert.deepEqual(output.entries, [{ kind: 'message', text: '[dry-run] sudo apt-get install -y git' }]);
  });

  it('answers probes with a non-zero status without printing them', async () => {
    const output = createRecordingOutput();
    const runner = new DryRunRunner(output);

    const result = await runner.run('which', ['code'], { probe: true });

    assert.equal(result.exitCode, 1);
    assert.deepEqual(runner.commands, ['which code']);
    assert.deepEqual(output.entries, []);
  });
});

describe('runChecked', () => {
  it('returns the output of a successful command', async () => {
    const runner = new RecordingRunner(() => ({ stdout: 'jammy\n' }));

    const result = await runChecked(runner, 'lsb_release', ['-cs']);

    assert.equal(result.stdout, 'jammy\n');
  });

  it('throws CommandFailedError on a non-zero exit', async () => {
    const runner = new RecordingRunner(() => ({ exitCode: 100, stderr: 'E: Unable to locate package nope\n' }));

    await assert.rejects(runChecked(runner, 'apt-get', ['install', 'nope']), (error: unknown) => {
      assert.ok(error instanceof CommandFailedError);
      assert.equal(
        error.message,
        "Command 'apt-get install nope' exited with status 100: E: Unable to locate package nope"
      );
      return true;
    });
  });
});

describe('ExecFileRunner', () => {
  let binDir: string;
  let searchPath: string;

  before(async () => {
    binDir = join(tmpdir(), `labsetup-test-runner-${Date.now()}`);
    await mkdir(binDir, { recursive: true });
    // Stand-in for sudo with env_reset: the command starts with an empty environment
    await writeFile(join(binDir, 'sudo'), '#!/bin/sh\nexec env -i PATH="$PATH" "$@"\n', { mode: 0o755 });
    searchPath = `${binDir}:${process.env.PATH ?? '/usr/bin:/bin'}`;
  });

  after(async () => {
    await rm(binDir, { recursive: true, force: true });
  });

  it('hands environment variables to a command run through sudo', async () => {
    const runner = new ExecFileRunner({ useSudo: true });

    const result = await runner.run('sh', ['-c', 'echo FRONTEND=$DEBIAN_FRONTEND'], {
      sudo: true,
      env: { PATH: searchPath, DEBIAN_FRONTEND: 'noninteractive' }
    });

    assert.equal(result.exitCode, 0);
    assert.equal(result.stdout, 'FRONTEND=noninteractive\n');
  });

  it('runs the command directly when sudo is not needed', async () => {
    const runner = new ExecFileRunner({ useSudo: false });

    const result = await runner.run('sh', ['-c', 'echo $LABSETUP_TEST_VALUE'], {
      sudo: true,
      env: { LABSETUP_TEST_VALUE: 'direct' }
    });

    assert.equal(result.stdout, 'direct\n');
  });

  it('reports a non-zero exit instead of throwing', async () => {
    const runner = new ExecFileRunner({ useSudo: false });

    const result = await runner.run('sh', ['-c', 'echo oops >&2; exit 3']);

    assert.deepEqual(result, { exitCode: 3, stdout: '', stderr: 'oops\n' });
  });

  it('reports 127 for a program that does not exist', async () => {
    const runner = new ExecFileRunner({ useSudo: false });

    const result = await runner.run('labsetup-no-such-program', []);

    assert.equal(result.exitCode, 127);
  });
});
