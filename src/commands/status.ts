import { Command } from 'commander';

import { createCliProvisionContext } from '../cli/context.js';
import { createDefaultCatalog } from '../core/catalog/default-catalog.js';
import { runStatusPipeline, type UnitState, type UnitStatusReport } from '../core/status/status-pipeline.js';
import { formatTable } from '../utils/formatters.js';
import { withErrorHandling } from '../utils/errors.js';

interface StatusCommandOptions {
  config?: string;
}

const STATE_LABELS: Record<UnitState, string> = {
  satisfied: '✅ installed',
  missing: '❌ missing',
  unchecked: '·  no check',
  error: '⚠️  check failed',
  unknown: '?  unknown unit'
};

export function formatStatusLines(units: readonly UnitStatusReport[]): string[] {
  const table = formatTable(units, [
    { header: 'UNIT', accessor: unit => (unit.isDependency ? `${unit.name} (dependency)` : unit.name) },
    { header: 'STATE', accessor: unit => STATE_LABELS[unit.state] },
    { header: 'NOTES', accessor: unit => unit.reason ?? unit.description ?? '' }
  ]);
  const installed = units.filter(unit => unit.state === 'satisfied').length;
  return [...table, '', `Summary: ${installed}/${units.length} installed`];
}

/**
 * Setup the 'labsetup status' command
 */
export function setupStatusCommand(program: Command): void {
  program
    .command('status')
    .argument('[units...]', 'units to check (default: all)')
    .description('Run the idempotency checks without installing anything')
    .option('-c, --config <path>', 'configuration file (JSON or JSONC)')
    .action(
      withErrorHandling(async (units: string[], options: StatusCommandOptions) => {
        const ctx = await createCliProvisionContext({ configPath: options.config, interactive: false });
        const result = await runStatusPipeline(units, createDefaultCatalog(), ctx);
        for (const line of formatStatusLines(result.data?.units ?? [])) {
          console.log(line);
        }
      })
    );
}
