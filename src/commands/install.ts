import { Command } from 'commander';

import type { CommandResult } from '../types/index.js';
import { createCliProvisionContext } from '../cli/context.js';
import { createDefaultCatalog } from '../core/catalog/default-catalog.js';
import { runProvisionPipeline } from '../core/install/provision-pipeline.js';
import type { ProvisionReport } from '../core/install/types.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { UserCancellationError, withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

interface InstallCommandOptions {
  all?: boolean;
  config?: string;
  dryRun?: boolean;
  interactive?: boolean;
  yes?: boolean;
}

async function installCommand(units: string[], options: InstallCommandOptions): Promise<CommandResult<ProvisionReport>> {
  const ctx = await createCliProvisionContext({
    configPath: options.config,
    dryRun: options.dryRun,
    interactive: options.interactive === false ? false : undefined
  });
  const catalog = createDefaultCatalog();

  let requested: readonly string[] = units;
  if (options.all) {
    requested = catalog.installableUnits().map(unit => unit.name);
  } else if (requested.length === 0) {
    requested = ctx.config.units;
    if (requested.length > 0) {
      logger.debug(`Using units from ${ctx.config.sourcePath ?? 'configuration'}`);
    }
  }

  if (!ctx.dryRun && !options.yes && requested.length > 0) {
    const out = resolveOutput(ctx);
    const proceed = await out.confirm(`Install ${requested.join(', ')}?`, { initial: true });
    if (!proceed) {
      throw new UserCancellationError();
    }
  }

  return runProvisionPipeline(requested, catalog, ctx);
}

/**
 * Setup the 'labsetup install' command
 */
export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .argument('[units...]', 'units to install, in order (default: "units" from the configuration file)')
    .description('Install units and the dependency units they need')
    .option('--all', 'install every unit in the catalog')
    .option('-c, --config <path>', 'configuration file (JSON or JSONC)')
    .option('--dry-run', 'print the commands instead of running them')
    .option('--no-interactive', 'plain output, no prompts')
    .option('-y, --yes', 'do not ask for confirmation')
    .action(
      withErrorHandling(async (units: string[], options: InstallCommandOptions) => {
        const result = await installCommand(units, options);
        if (!result.success) {
          throw new Error(result.error ?? 'Install failed');
        }
      })
    );
}
