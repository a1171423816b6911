import { CHECK_SATISFIED, type CommandResult, type ProvisionContext, type UnitDefinition } from '../../types/index.js';
import type { UnitCatalog } from '../catalog/unit-catalog.js';
import { CheckFailureError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { normalizeRequestedUnits } from '../../utils/unit-names.js';

export type UnitState = 'satisfied' | 'missing' | 'unchecked' | 'error' | 'unknown';

export interface UnitStatusReport {
  name: string;
  state: UnitState;
  description?: string;
  /** Set when the check itself failed */
  reason?: string;
  isDependency: boolean;
}

export interface StatusPipelineResult {
  units: UnitStatusReport[];
}

/**
 * Every unit the catalog knows, installables first, each name once
 */
function allUnitNames(catalog: UnitCatalog): string[] {
  const names = catalog.installableUnits().map(unit => unit.name);
  for (const name of catalog.dependencyNames()) {
    if (!names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

async function probe(unit: UnitDefinition, ctx: ProvisionContext): Promise<Pick<UnitStatusReport, 'state' | 'reason'>> {
  if (!unit.check) {
    return { state: 'unchecked' };
  }
  try {
    const status = await unit.check(ctx);
    return { state: status === CHECK_SATISFIED ? 'satisfied' : 'missing' };
  } catch (error) {
    const failure = new CheckFailureError(unit.name, error);
    logger.debug(failure.message);
    return { state: 'error', reason: failure.message };
  }
}

/**
 * Run the idempotency checks of the named units (all units when none are
 * named) without installing anything.
 */
export async function runStatusPipeline(
  requested: readonly string[],
  catalog: UnitCatalog,
  ctx: ProvisionContext
): Promise<CommandResult<StatusPipelineResult>> {
  const names = requested.length > 0 ? normalizeRequestedUnits(requested) : allUnitNames(catalog);
  const units: UnitStatusReport[] = [];

  for (const name of names) {
    const isDependency = catalog.findDependency(name) !== undefined;
    const unit = catalog.findInstallable(name) ?? catalog.findDependency(name);
    if (!unit) {
      logger.warn(`Unknown unit '${name}'`);
      units.push({ name, state: 'unknown', isDependency: false });
      continue;
    }
    units.push({ name, description: unit.description, isDependency, ...(await probe(unit, ctx)) });
  }

  return { success: true, data: { units } };
}
