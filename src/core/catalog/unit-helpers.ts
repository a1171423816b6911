/**
 * Building blocks shared by the built-in unit definitions
 */

import {
  CHECK_NOT_SATISFIED,
  CHECK_SATISFIED,
  type CheckStatus,
  type InstallOutcome,
  type ProvisionContext
} from '../../types/index.js';
import { toError } from '../../utils/errors.js';
import { hasProfileBlock, upsertProfileBlock } from '../../utils/shell-profile.js';
import { resolveOutput } from '../ports/resolve.js';

/**
 * Run the steps of an install action and fold any thrown error into a
 * failed outcome.
 */
export async function attempt(steps: () => Promise<void>): Promise<InstallOutcome> {
  try {
    await steps();
    return { ok: true };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}

export function statusOf(satisfied: boolean): CheckStatus {
  return satisfied ? CHECK_SATISFIED : CHECK_NOT_SATISFIED;
}

/**
 * 0 when `program` is on the PATH
 */
export async function commandAvailable(ctx: ProvisionContext, program: string): Promise<CheckStatus> {
  const result = await ctx.runner.run('which', [program], { probe: true });
  return statusOf(result.exitCode === 0);
}

/**
 * 0 when `path` exists
 */
export async function pathPresent(ctx: ProvisionContext, path: string): Promise<CheckStatus> {
  const result = await ctx.runner.run('test', ['-e', path], { probe: true });
  return statusOf(result.exitCode === 0);
}

/**
 * Codename of the running distribution (jammy, bookworm, ...)
 */
export async function distroCodename(ctx: ProvisionContext): Promise<string> {
  const result = await ctx.runner.run('lsb_release', ['-cs'], { probe: true });
  const codename = result.stdout.trim();
  if (codename) {
    return codename;
  }
  if (ctx.dryRun) {
    return '<codename>';
  }
  throw new Error('Could not determine the distribution codename (lsb_release -cs)');
}

/**
 * Add or refresh a managed block in the configured shell profile
 */
export async function writeProfileBlock(ctx: ProvisionContext, id: string, lines: readonly string[]): Promise<void> {
  if (ctx.dryRun) {
    resolveOutput(ctx).message(`[dry-run] update block '${id}' in ${ctx.config.shellProfile}`);
    return;
  }
  await upsertProfileBlock(ctx.config.shellProfile, id, lines);
}

export async function profileBlockPresent(ctx: ProvisionContext, id: string): Promise<CheckStatus> {
  return statusOf(await hasProfileBlock(ctx.config.shellProfile, id));
}
