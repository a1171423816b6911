import { execFile } from 'child_process';
import { promisify } from 'util';

import { logger } from './logger.js';
import { CommandFailedError } from './errors.js';
import type { OutputPort } from '../core/ports/output.js';
import { resolveOutput } from '../core/ports/resolve.js';

const execFileAsync = promisify(execFile);

// apt-get and installer scripts are chatty
const MAX_BUFFER = 64 * 1024 * 1024;

export interface RunOptions {
  /** Run through sudo when the process is not already root */
  sudo?: boolean;
  cwd?: string;
  env?: Record<string, string>;
  /**
   * Marks a read-only query (dpkg -s, command -v, ...).
   * The dry-run runner answers probes with a non-zero status.
   */
  probe?: boolean;
}

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs external programs. Never throws on a non-zero exit status;
 * callers decide what a failure means.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandOutput>;
}

export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map(part => (/^[\w@%+=:,./~-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}

interface ExecFailure {
  code?: number | string;
  stdout?: string;
  stderr?: string;
  message: string;
}

function toExecFailure(error: unknown): ExecFailure {
  if (error instanceof Error) {
    const fields: Record<string, unknown> = { ...error };
    const code = fields.code;
    return {
      code: typeof code === 'number' || typeof code === 'string' ? code : undefined,
      stdout: typeof fields.stdout === 'string' ? fields.stdout : undefined,
      stderr: typeof fields.stderr === 'string' ? fields.stderr : undefined,
      message: error.message
    };
  }
  return { message: String(error) };
}

/**
 * sudo resets the environment (env_reset), so variables the command needs
 * are handed over as `env K=V` in front of it.
 */
function envPrefix(env: Record<string, string> | undefined): string[] {
  const assignments = Object.entries(env ?? {}).map(([key, value]) => `${key}=${value}`);
  return assignments.length > 0 ? ['env', ...assignments] : [];
}

export class ExecFileRunner implements CommandRunner {
  private readonly useSudo: boolean;

  constructor(options: { useSudo: boolean }) {
    this.useSudo = options.useSudo;
  }

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandOutput> {
    const elevate = options.sudo === true && this.useSudo;
    const file = elevate ? 'sudo' : command;
    const argv = elevate ? [...envPrefix(options.env), command, ...args] : [...args];

    logger.debug(`Running: ${formatCommandLine(file, argv)}`);

    try {
      const { stdout, stderr } = await execFileAsync(file, argv, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        maxBuffer: MAX_BUFFER,
        encoding: 'utf8'
      });
      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      const failure = toExecFailure(error);
      // A string code (ENOENT, EACCES) means the program never started
      const exitCode = typeof failure.code === 'number' ? failure.code : 127;
      logger.debug(`Command exited with status ${exitCode}`, { command: file, code: failure.code });
      return {
        exitCode,
        stdout: failure.stdout ?? '',
        stderr: failure.stderr ?? failure.message
      };
    }
  }
}

/**
 * Prints commands instead of running them. Installs "succeed" and probes
 * report "not satisfied", so a dry run walks every step of the plan.
 */
export class DryRunRunner implements CommandRunner {
  readonly commands: string[] = [];
  private readonly output?: OutputPort;

  constructor(output?: OutputPort) {
    this.output = output;
  }

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandOutput> {
    const line = formatCommandLine(options.sudo ? 'sudo' : command, options.sudo ? [command, ...args] : args);
    this.commands.push(line);
    if (!options.probe) {
      resolveOutput({ output: this.output }).message(`[dry-run] ${line}`);
    }
    return { exitCode: options.probe ? 1 : 0, stdout: '', stderr: '' };
  }
}

/**
 * Run a command and throw CommandFailedError on a non-zero exit status.
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: RunOptions
): Promise<CommandOutput> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandFailedError(formatCommandLine(command, args), result.exitCode, result.stderr);
  }
  return result;
}
