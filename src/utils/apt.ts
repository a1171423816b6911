/**
 * Thin wrapper around apt-get / dpkg-query
 */

import { CHECK_NOT_SATISFIED, CHECK_SATISFIED, type CheckStatus } from '../types/index.js';
import { runChecked, type CommandRunner } from './command-runner.js';

const APT_ENV = { DEBIAN_FRONTEND: 'noninteractive' };

export async function aptUpdate(runner: CommandRunner): Promise<void> {
  await runChecked(runner, 'apt-get', ['update'], { sudo: true, env: APT_ENV });
}

export async function aptUpgrade(runner: CommandRunner): Promise<void> {
  await runChecked(runner, 'apt-get', ['upgrade', '-y'], { sudo: true, env: APT_ENV });
}

/**
 * Install packages by name or local .deb path
 */
export async function aptInstall(runner: CommandRunner, packages: readonly string[]): Promise<void> {
  if (packages.length === 0) {
    return;
  }
  await runChecked(runner, 'apt-get', ['install', '-y', '--no-install-recommends', ...packages], {
    sudo: true,
    env: APT_ENV
  });
}

/**
 * 0 when every package is installed, 1 otherwise
 */
export async function dpkgInstalled(runner: CommandRunner, packages: readonly string[]): Promise<CheckStatus> {
  for (const pkg of packages) {
    const result = await runner.run('dpkg-query', ['-W', '--showformat=${Status}', pkg], { probe: true });
    if (result.exitCode !== 0 || !result.stdout.includes('install ok installed')) {
      return CHECK_NOT_SATISFIED;
    }
  }
  return CHECK_SATISFIED;
}
