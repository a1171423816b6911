/**
 * Operating-system level units: package index refresh, base tooling, compilers.
 */

import type { DependencyUnitDefinition, UnitDefinition } from '../../../types/index.js';
import { aptInstall, aptUpdate, aptUpgrade, dpkgInstalled } from '../../../utils/apt.js';
import { attempt } from '../unit-helpers.js';

export const BASE_PACKAGES = [
  'curl',
  'wget',
  'git',
  'vim',
  'htop',
  'tree',
  'unzip',
  'tcsh',
  'ca-certificates',
  'gnupg',
  'lsb-release',
  'software-properties-common'
] as const;

export const BUILD_PACKAGES = ['build-essential', 'cmake', 'pkg-config'] as const;

export const systemUpdate: UnitDefinition = {
  name: 'system-update',
  description: 'Refresh the apt index and upgrade installed packages',
  category: 'system',
  install: ctx => attempt(async () => {
    await aptUpdate(ctx.runner);
    await aptUpgrade(ctx.runner);
  })
};

export const basePackages: UnitDefinition = {
  name: 'base-packages',
  description: 'Command-line essentials (curl, git, vim, tcsh, ...)',
  category: 'system',
  install: ctx => attempt(() => aptInstall(ctx.runner, BASE_PACKAGES)),
  check: ctx => dpkgInstalled(ctx.runner, BASE_PACKAGES)
};

export const buildTools: UnitDefinition = {
  name: 'build-tools',
  description: 'C/C++ toolchain and CMake for tools built from source',
  category: 'system',
  install: ctx => attempt(() => aptInstall(ctx.runner, BUILD_PACKAGES)),
  check: ctx => dpkgInstalled(ctx.runner, BUILD_PACKAGES)
};

export const buildToolsDependency: DependencyUnitDefinition = {
  ...buildTools,
  requires: ['mrtrix3']
};
