/**
 * Execution Context Module
 *
 * Builds the ProvisionContext handed to the resolver, the orchestrator and
 * every unit action. This is the one place that reads process state (cwd,
 * home directory, environment, uid); everything downstream sees only the
 * frozen configuration.
 */

import { homedir, tmpdir } from 'os';
import type { ProvisionContext, ProvisionContextOptions } from '../types/execution-context.js';
import type { OutputPort } from './ports/output.js';
import { loadProvisionConfig } from './config.js';
import { DryRunRunner, ExecFileRunner } from '../utils/command-runner.js';
import { logger } from '../utils/logger.js';

function runningAsRoot(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0;
}

export async function createProvisionContext(
  options: ProvisionContextOptions = {},
  output?: OutputPort
): Promise<ProvisionContext> {
  const config = await loadProvisionConfig(options.configPath, {
    cwd: process.cwd(),
    home: homedir(),
    tmpDir: tmpdir(),
    env: process.env
  });

  const dryRun = options.dryRun === true;
  const runner = dryRun
    ? new DryRunRunner(output)
    : new ExecFileRunner({ useSudo: !runningAsRoot() });

  logger.debug('Created provision context', {
    configSource: config.sourcePath,
    home: config.home,
    shellProfile: config.shellProfile,
    dryRun
  });

  return { config, runner, output, dryRun };
}
