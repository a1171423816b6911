import type { CommandResult, ProvisionContext } from '../../types/index.js';
import type { UnitCatalog } from '../catalog/unit-catalog.js';
import { resolveOutput } from '../ports/resolve.js';
import { InstallFailureError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { normalizeRequestedUnits } from '../../utils/unit-names.js';
import { resolveDependencies } from './dependency-resolver.js';
import { InstallOrchestrator } from './orchestrator.js';
import { displayProvisionSummary } from './install-output.js';
import type { OrchestrationReport, ProvisionReport } from './types.js';

export interface ProvisionPipelineOptions {
  /** Suppress the end-of-run summary */
  silent?: boolean;
}

/**
 * Resolve dependency units for the requested names, then install what is
 * left of the request in order.
 *
 * A failure in either stage ends the run; the result carries the partial
 * report either way.
 */
export async function runProvisionPipeline(
  requested: readonly string[],
  catalog: UnitCatalog,
  ctx: ProvisionContext,
  options: ProvisionPipelineOptions = {}
): Promise<CommandResult<ProvisionReport>> {
  const names = normalizeRequestedUnits(requested);
  if (names.length === 0) {
    throw new ValidationError('no units requested. Name units on the command line, list them under "units" in the configuration file, or pass --all.');
  }

  logger.debug('Provisioning requested units', { names, dryRun: ctx.dryRun });

  const resolution = await resolveDependencies(names, catalog, ctx);

  let orchestration: OrchestrationReport = { completed: [], skipped: [], unknown: [] };
  if (!resolution.failure) {
    orchestration = await new InstallOrchestrator(catalog, ctx).run(resolution.plan);
  }

  const report: ProvisionReport = { requested: names, resolution, orchestration, dryRun: ctx.dryRun };
  if (!options.silent) {
    displayProvisionSummary(report, resolveOutput(ctx));
  }

  const failure = resolution.failure ?? orchestration.failure;
  if (failure) {
    const error = new InstallFailureError(failure.unit, failure.error);
    logger.debug(error.message, { duringResolution: failure.duringResolution });
    return { success: false, error: error.message, data: report };
  }

  return {
    success: true,
    data: report,
    warnings: orchestration.unknown.map(name => `Unknown unit '${name}' was skipped`)
  };
}
