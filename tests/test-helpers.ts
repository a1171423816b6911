/**
 * In-process stand-ins for the terminal, the command runner and unit actions
 */

import type {
  CheckStatus,
  DependencyUnitDefinition,
  ProvisionConfig,
  ProvisionContext,
  UnitArgs,
  UnitDefinition
} from '../src/types/index.js';
import type { OutputPort, UnifiedSpinner } from '../src/core/ports/output.js';
import type { CommandOutput, CommandRunner, RunOptions } from '../src/utils/command-runner.js';

export interface OutputEntry {
  kind: 'info' | 'step' | 'message' | 'success' | 'error' | 'warn' | 'note' | 'spinner-start' | 'spinner-stop';
  text: string;
}

export function createRecordingOutput(): OutputPort & { entries: OutputEntry[] } {
  const entries: OutputEntry[] = [];
  const record = (kind: OutputEntry['kind']) => (text: string) => {
    entries.push({ kind, text });
  };

  return {
    entries,
    info: record('info'),
    step: record('step'),
    message: record('message'),
    success: record('success'),
    error: record('error'),
    warn: record('warn'),
    note(content: string, title?: string) {
      entries.push({ kind: 'note', text: title ? `${title}\n${content}` : content });
    },
    async confirm(_message: string, options?: { initial?: boolean }) {
      return options?.initial ?? false;
    },
    spinner(): UnifiedSpinner {
      return {
        start: text => entries.push({ kind: 'spinner-start', text }),
        stop: text => entries.push({ kind: 'spinner-stop', text: text ?? '' }),
        message: () => undefined
      };
    }
  };
}

export interface RecordedCommand {
  command: string;
  args: string[];
  options: RunOptions;
}

export type CommandResponder = (command: string, args: readonly string[]) => Partial<CommandOutput> | undefined;

/**
 * Records every command; answers with exit code 0 unless the responder
 * says otherwise.
 */
export class RecordingRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];

  constructor(private readonly responder: CommandResponder = () => undefined) {}

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandOutput> {
    this.calls.push({ command, args: [...args], options });
    const response = this.responder(command, args) ?? {};
    return { exitCode: 0, stdout: '', stderr: '', ...response };
  }

  commandLines(): string[] {
    return this.calls.map(call => [call.command, ...call.args].join(' '));
  }
}

export function createTestConfig(overrides: Partial<ProvisionConfig> = {}): ProvisionConfig {
  return {
    home: '/home/tester',
    shellProfile: '/home/tester/.bashrc',
    installPrefix: '/opt',
    downloadDir: '/tmp/labsetup-test',
    units: [],
    unitOptions: {},
    sourcePath: null,
    ...overrides
  };
}

export function createTestContext(
  overrides: { config?: Partial<ProvisionConfig>; runner?: CommandRunner; output?: OutputPort; dryRun?: boolean } = {}
): ProvisionContext {
  return {
    config: createTestConfig(overrides.config),
    runner: overrides.runner ?? new RecordingRunner(),
    output: overrides.output ?? createRecordingOutput(),
    dryRun: overrides.dryRun ?? false
  };
}

export interface FakeUnitOptions {
  /** Status the check returns, 'throw' to make it throw; omit for no check */
  check?: CheckStatus | 'throw';
  /** Make the install report a failure */
  fail?: boolean;
  /** Make the install throw instead of returning an outcome */
  throws?: boolean;
  options?: UnitDefinition['options'];
}

/**
 * A unit whose check and install append to `journal`
 * ("check:<name>", "install:<name>").
 */
export function fakeUnit(name: string, journal: string[], options: FakeUnitOptions = {}): UnitDefinition {
  const unit: UnitDefinition = {
    name,
    description: `${name} test unit`,
    category: 'science',
    options: options.options,
    install: async (_ctx, args: UnitArgs) => {
      const argText = Object.entries(args).map(([key, value]) => `${key}=${value}`).join(',');
      journal.push(argText ? `install:${name}(${argText})` : `install:${name}`);
      if (options.throws) {
        throw new Error(`${name} blew up`);
      }
      if (options.fail) {
        return { ok: false, error: new Error(`${name} exited with status 100`) };
      }
      return { ok: true };
    }
  };

  const check = options.check;
  if (check !== undefined) {
    unit.check = async () => {
      journal.push(`check:${name}`);
      if (check === 'throw') {
        throw new Error(`${name} probe crashed`);
      }
      return check;
    };
  }

  return unit;
}

export function fakeDependency(
  name: string,
  requires: readonly string[],
  journal: string[],
  options: FakeUnitOptions = {}
): DependencyUnitDefinition {
  return { ...fakeUnit(name, journal, options), requires };
}
