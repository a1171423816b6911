/**
 * Calling into unit actions.
 *
 * Install actions report failure through their InstallOutcome; anything they
 * throw anyway is folded into a failed outcome here so the driving loops only
 * ever deal with results. Checks that throw count as "not satisfied".
 */

import { CHECK_SATISFIED, type InstallOutcome, type ProvisionContext, type UnitArgs, type UnitDefinition } from '../../types/index.js';
import { CheckFailureError, ValidationError, toError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const NO_ARGS: UnitArgs = Object.freeze({});

/**
 * Argument bundle configured for a unit under `unitOptions`
 */
export function argsFor(ctx: ProvisionContext, unitName: string): UnitArgs {
  return ctx.config.unitOptions[unitName] ?? NO_ARGS;
}

/**
 * Run a unit's idempotency check. Units without a check are never satisfied.
 */
export async function isUnitSatisfied(unit: UnitDefinition, ctx: ProvisionContext): Promise<boolean> {
  if (!unit.check) {
    return false;
  }
  try {
    const status = await unit.check(ctx);
    logger.debug(`Check for '${unit.name}' returned ${status}`);
    return status === CHECK_SATISFIED;
  } catch (error) {
    logger.warn(new CheckFailureError(unit.name, error).message);
    return false;
  }
}

/**
 * Compare configured arguments against the options a unit declares
 */
export function validateUnitArgs(unit: UnitDefinition, args: UnitArgs): Error | null {
  const declared = unit.options ?? [];

  for (const key of Object.keys(args)) {
    if (!declared.some(option => option.name === key)) {
      logger.warn(`Unit '${unit.name}' does not take option '${key}'; ignoring it`);
    }
  }

  const missing = declared.filter(option => option.required && !args[option.name]);
  if (missing.length > 0) {
    const names = missing.map(option => `unitOptions.${unit.name}.${option.name}`).join(', ');
    return new ValidationError(`'${unit.name}' needs ${names} in the configuration file`, { unitName: unit.name });
  }
  return null;
}

export async function installUnit(unit: UnitDefinition, ctx: ProvisionContext, args: UnitArgs): Promise<InstallOutcome> {
  const invalid = validateUnitArgs(unit, args);
  if (invalid) {
    return { ok: false, error: invalid };
  }
  try {
    return await unit.install(ctx, args);
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}
