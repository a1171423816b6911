import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import { formatTreeList, pluralize } from '../../utils/formatters.js';
import type { ProvisionReport } from './types.js';

/**
 * Render the end-of-run summary for `labsetup install`
 */
export function displayProvisionSummary(report: ProvisionReport, output: OutputPort = resolveOutput()): void {
  const { resolution, orchestration } = report;
  const lines: string[] = [];

  const installed = [...resolution.installed, ...orchestration.completed];
  if (installed.length > 0) {
    lines.push(`Installed ${pluralize(installed.length, 'unit')}:`, ...formatTreeList(installed));
  }

  const alreadyPresent = [...resolution.satisfied, ...orchestration.skipped];
  if (alreadyPresent.length > 0) {
    lines.push(`Already present:`, ...formatTreeList(alreadyPresent));
  }

  if (orchestration.unknown.length > 0) {
    lines.push(`Unknown (skipped):`, ...formatTreeList(orchestration.unknown));
  }

  const failure = resolution.failure ?? orchestration.failure;
  if (failure) {
    const done = new Set([...installed, ...alreadyPresent, ...orchestration.unknown, failure.unit]);
    const notAttempted = resolution.failure
      ? resolution.plan
      : resolution.plan.filter(name => !done.has(name));
    if (notAttempted.length > 0) {
      lines.push(`Not attempted:`, ...formatTreeList(notAttempted));
    }
  }

  if (lines.length > 0) {
    output.note(lines.join('\n'), report.dryRun ? 'Dry run summary' : 'Summary');
  }

  if (failure) {
    output.error(`${failure.unit} failed: ${failure.error.message}`);
    output.info('Fix the problem and run the same command again.');
  } else if (installed.length === 0) {
    output.success('Nothing to install');
  } else {
    output.success(report.dryRun ? `Would install ${pluralize(installed.length, 'unit')}` : 'Done');
  }
}
