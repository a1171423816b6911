/**
 * Dependency Resolver
 *
 * One pass over the catalog's dependency units, in declaration order. A
 * dependency unit is triggered when any name in its `requires` list is still
 * in the requested set. A triggered unit is checked, installed when the check
 * does not report it satisfied, and then removed from the requested set so the
 * orchestrator never installs it a second time.
 *
 * The pass does not repeat: installing a dependency never triggers another
 * scan, so a dependency of a dependency is not resolved.
 */

import type { ProvisionContext } from '../../types/index.js';
import type { UnitCatalog } from '../catalog/unit-catalog.js';
import { resolveOutput } from '../ports/resolve.js';
import { logger } from '../../utils/logger.js';
import { argsFor, installUnit, isUnitSatisfied } from './unit-actions.js';
import type { ResolutionResult } from './types.js';

export async function resolveDependencies(
  requested: readonly string[],
  catalog: UnitCatalog,
  ctx: ProvisionContext
): Promise<ResolutionResult> {
  const out = resolveOutput(ctx);
  const working = [...requested];
  const installed: string[] = [];
  const satisfied: string[] = [];

  for (const name of catalog.dependencyNames()) {
    const dependency = catalog.lookupDependency(name);
    const triggeredBy = dependency.requires.filter(required => working.includes(required));
    if (triggeredBy.length === 0) {
      continue;
    }

    logger.debug(`Dependency '${name}' required by ${triggeredBy.join(', ')}`);

    if (await isUnitSatisfied(dependency, ctx)) {
      satisfied.push(name);
      out.info(`${name} already set up (needed by ${triggeredBy.join(', ')})`);
    } else {
      const spinner = out.spinner();
      spinner.start(`Installing ${name} (needed by ${triggeredBy.join(', ')})`);
      const outcome = await installUnit(dependency, ctx, argsFor(ctx, name));
      if (!outcome.ok) {
        spinner.stop(`Failed to install ${name}`);
        return {
          plan: working,
          installed,
          satisfied,
          failure: { unit: name, error: outcome.error, duringResolution: true }
        };
      }
      spinner.stop(`Installed ${name}`);
      installed.push(name);
    }

    const index = working.indexOf(name);
    if (index !== -1) {
      working.splice(index, 1);
    }
  }

  return { plan: working, installed, satisfied };
}
