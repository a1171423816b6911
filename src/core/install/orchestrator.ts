import type { ProvisionContext } from '../../types/index.js';
import type { UnitCatalog } from '../catalog/unit-catalog.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import { UnknownUnitError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { argsFor, installUnit, isUnitSatisfied } from './unit-actions.js';
import type { OrchestrationReport } from './types.js';

/**
 * InstallOrchestrator drives the resolved plan.
 *
 * Units run one at a time in plan order. Unknown names are replaced by a
 * no-op and reported; units whose check reports them satisfied are skipped;
 * the first failed install stops the run. Nothing already installed is
 * rolled back.
 */
export class InstallOrchestrator {
  private readonly output: OutputPort;

  constructor(
    private readonly catalog: UnitCatalog,
    private readonly ctx: ProvisionContext
  ) {
    this.output = resolveOutput(ctx);
  }

  async run(plan: readonly string[]): Promise<OrchestrationReport> {
    const report: OrchestrationReport = { completed: [], skipped: [], unknown: [] };

    for (const [position, name] of plan.entries()) {
      const unit = this.lookup(name);
      if (!unit) {
        report.unknown.push(name);
        continue;
      }

      if (await isUnitSatisfied(unit, this.ctx)) {
        this.output.info(`${name} is already installed`);
        report.skipped.push(name);
        continue;
      }

      const spinner = this.output.spinner();
      spinner.start(`[${position + 1}/${plan.length}] Installing ${name}`);
      const outcome = await installUnit(unit, this.ctx, argsFor(this.ctx, name));

      if (!outcome.ok) {
        spinner.stop(`Failed to install ${name}`);
        report.failure = { unit: name, error: outcome.error, duringResolution: false };
        const remaining = plan.slice(position + 1);
        if (remaining.length > 0) {
          logger.debug(`Not attempted after failure of '${name}': ${remaining.join(', ')}`);
        }
        return report;
      }

      spinner.stop(`Installed ${name}`);
      report.completed.push(name);
    }

    return report;
  }

  /**
   * Catalog lookup with the unknown-name fallback: a missing entry becomes
   * a logged no-op instead of a failure.
   */
  private lookup(name: string) {
    try {
      return this.catalog.lookupInstallable(name);
    } catch (error) {
      if (error instanceof UnknownUnitError) {
        logger.debug(`${error.message}; skipping`);
        const dependency = this.catalog.findDependency(name);
        this.output.warn(
          dependency
            ? `Skipping '${name}': it is only installed as a dependency of ${dependency.requires.join(', ')}`
            : `Skipping unknown unit '${name}'`
        );
        return undefined;
      }
      throw error;
    }
  }
}
