/**
 * Execution Context Types
 *
 * Everything an install or check action may touch is reached through the
 * ProvisionContext: the frozen configuration, the output port and the command
 * runner. Actions never read process state directly.
 */

import type { ProvisionConfig } from './index.js';
import type { OutputPort } from '../core/ports/output.js';
import type { CommandRunner } from '../utils/command-runner.js';

export interface ProvisionContext {
  /**
   * Immutable configuration, built once at startup.
   */
  readonly config: ProvisionConfig;

  /**
   * Runs external programs (apt-get, curl, tar, ...).
   * DryRunRunner in --dry-run mode, ExecFileRunner otherwise.
   */
  readonly runner: CommandRunner;

  /**
   * Output port for all user-facing progress messages.
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;

  /**
   * True when commands are only printed, not executed.
   */
  readonly dryRun: boolean;
}

/**
 * Options for creating a ProvisionContext
 */
export interface ProvisionContextOptions {
  /**
   * --config flag: explicit configuration file
   */
  configPath?: string;

  /**
   * --dry-run flag
   */
  dryRun?: boolean;

  /**
   * Override interactive mode detection (undefined = auto-detect from TTY)
   */
  interactive?: boolean;
}
