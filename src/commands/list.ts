import { Command } from 'commander';

import { createDefaultCatalog } from '../core/catalog/default-catalog.js';
import { CATEGORY_ORDER, runListPipeline, type UnitListEntry } from '../core/list/list-pipeline.js';
import { formatTable } from '../utils/formatters.js';
import { withErrorHandling } from '../utils/errors.js';

function describeEntry(entry: UnitListEntry): string {
  const notes: string[] = [];
  if (entry.triggeredBy.length > 0) {
    notes.push(`${entry.installable ? 'also installed' : 'installed'} before ${entry.triggeredBy.join(', ')}`);
  }
  const options = entry.options.map(option => (option.required ? `${option.name}*` : option.name));
  if (options.length > 0) {
    notes.push(`options: ${options.join(', ')}`);
  }
  return notes.length > 0 ? `${entry.description} (${notes.join('; ')})` : entry.description;
}

export function formatUnitList(units: readonly UnitListEntry[]): string[] {
  const lines: string[] = [];
  for (const category of CATEGORY_ORDER) {
    const inCategory = units.filter(unit => unit.category === category);
    if (inCategory.length === 0) {
      continue;
    }
    if (lines.length > 0) {
      lines.push('');
    }
    lines.push(`${category}:`);
    lines.push(
      ...formatTable(inCategory, [
        { header: 'NAME', accessor: unit => unit.name },
        { header: 'DESCRIPTION', accessor: describeEntry }
      ]).map(line => `  ${line}`)
    );
  }
  return lines;
}

/**
 * Setup the 'labsetup list' command
 */
export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List the units labsetup can install')
    .action(
      withErrorHandling(async () => {
        const result = runListPipeline(createDefaultCatalog());
        for (const line of formatUnitList(result.data?.units ?? [])) {
          console.log(line);
        }
        console.log('\n* required option, set under "unitOptions" in the configuration file');
      })
    );
}
