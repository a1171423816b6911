/**
 * Shell-environment customizations: git identity, aliases, conda activation.
 */

import { join } from 'path';
import type { ProvisionContext, UnitDefinition } from '../../../types/index.js';
import { runChecked } from '../../../utils/command-runner.js';
import { argsFor } from '../../install/unit-actions.js';
import { attempt, profileBlockPresent, statusOf, writeProfileBlock } from '../unit-helpers.js';
import { minicondaPrefix } from './science.js';

export const ALIASES = [
  "alias ll='ls -alF'",
  "alias la='ls -A'",
  "alias ..='cd ..'",
  "alias gs='git status'"
] as const;

async function gitConfigValue(ctx: ProvisionContext, key: string): Promise<string> {
  const result = await ctx.runner.run('git', ['config', '--global', '--get', key], {
    probe: true,
    env: { HOME: ctx.config.home }
  });
  return result.exitCode === 0 ? result.stdout.trim() : '';
}

export const gitIdentity: UnitDefinition = {
  name: 'git-identity',
  description: 'Global git user.name and user.email',
  category: 'shell',
  options: [
    { name: 'name', description: 'value for user.name', required: true },
    { name: 'email', description: 'value for user.email', required: true }
  ],
  install: (ctx, args) => attempt(async () => {
    const env = { HOME: ctx.config.home };
    await runChecked(ctx.runner, 'git', ['config', '--global', 'user.name', args.name], { env });
    await runChecked(ctx.runner, 'git', ['config', '--global', 'user.email', args.email], { env });
  }),
  check: async ctx => {
    const wanted = argsFor(ctx, 'git-identity');
    if (!wanted.name || !wanted.email) {
      return statusOf(false);
    }
    const name = await gitConfigValue(ctx, 'user.name');
    const email = await gitConfigValue(ctx, 'user.email');
    return statusOf(name === wanted.name && email === wanted.email);
  }
};

export const shellAliases: UnitDefinition = {
  name: 'shell-aliases',
  description: 'Common aliases in the shell profile',
  category: 'shell',
  install: ctx => attempt(() => writeProfileBlock(ctx, 'aliases', ALIASES)),
  check: ctx => profileBlockPresent(ctx, 'aliases')
};

export const condaInit: UnitDefinition = {
  name: 'conda-init',
  description: 'Make conda available in new shells',
  category: 'shell',
  install: ctx => attempt(() => {
    const script = join(minicondaPrefix(ctx.config.home), 'etc', 'profile.d', 'conda.sh');
    return writeProfileBlock(ctx, 'conda', [`[ -f "${script}" ] && . "${script}"`]);
  }),
  check: ctx => profileBlockPresent(ctx, 'conda')
};
