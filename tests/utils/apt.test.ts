import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { aptInstall, aptUpdate, dpkgInstalled } from '../../src/utils/apt.js';
import { RecordingRunner } from '../test-helpers.js';

describe('apt helpers', () => {
  it('installs packages non-interactively as root', async () => {
    const runner = new RecordingRunner();

    await aptInstall(runner, ['git', 'curl']);

    assert.deepEqual(runner.calls, [
      {
        command: 'apt-get',
        args: ['install', '-y', '--no-install-recommends', 'git', 'curl'],
        options: { sudo: true, env: { DEBIAN_FRONTEND: 'noninteractive' } }
      }
    ]);
  });

  it('runs nothing for an empty package list', async () => {
    const runner = new RecordingRunner();

    await aptInstall(runner, []);

    assert.deepEqual(runner.calls, []);
  });

  it('propagates a failed update', async () => {
    const runner = new RecordingRunner(() => ({ exitCode: 100 }));

    await assert.rejects(aptUpdate(runner), /Command 'apt-get update' exited with status 100/);
  });

  it('reports packages installed only when dpkg says so for all of them', async () => {
    const runner = new RecordingRunner((_command, args) =>
      args.includes('git') ? { stdout: 'install ok installed' } : { exitCode: 1, stdout: '' }
    );

    assert.equal(await dpkgInstalled(runner, ['git']), 0);
    assert.equal(await dpkgInstalled(runner, ['git', 'afni']), 1);
    assert.deepEqual(runner.commandLines().slice(0, 1), ['dpkg-query -W --showformat=${Status} git']);
    assert.equal(runner.calls[0].options.probe, true);
  });

  it('treats a deinstalled package as missing', async () => {
    const runner = new RecordingRunner(() => ({ stdout: 'deinstall ok config-files' }));

    assert.equal(await dpkgInstalled(runner, ['zoom']), 1);
  });
});
