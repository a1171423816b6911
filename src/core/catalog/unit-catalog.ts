/**
 * Unit Catalog
 *
 * Read-only registry of everything labsetup knows how to install. Holds two
 * mappings that may share names: installable units, requested by the user,
 * and dependency units, installed automatically when one of the names in
 * their `requires` list is requested.
 *
 * Both mappings keep declaration order; the resolver walks dependency units
 * in that order.
 */

import type { CatalogDefinition, DependencyUnitDefinition, UnitDefinition } from '../../types/index.js';
import { CatalogError, UnknownUnitError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

function indexByName<T extends UnitDefinition>(units: readonly T[], kind: string): ReadonlyMap<string, T> {
  const map = new Map<string, T>();
  for (const unit of units) {
    if (map.has(unit.name)) {
      throw new CatalogError(`duplicate ${kind} '${unit.name}'`, { unitName: unit.name });
    }
    map.set(unit.name, unit);
  }
  return map;
}

/**
 * Find a cycle among dependency units, following `requires` edges that point
 * at other dependency units. Returns the cycle path or null.
 */
export function findDependencyCycle(dependencies: ReadonlyMap<string, DependencyUnitDefinition>): string[] | null {
  const done = new Set<string>();

  const visit = (name: string, stack: string[]): string[] | null => {
    const onStack = stack.indexOf(name);
    if (onStack !== -1) {
      return [...stack.slice(onStack), name];
    }
    if (done.has(name)) {
      return null;
    }
    const unit = dependencies.get(name);
    if (!unit) {
      return null;
    }
    stack.push(name);
    for (const required of unit.requires) {
      const cycle = visit(required, stack);
      if (cycle) {
        return cycle;
      }
    }
    stack.pop();
    done.add(name);
    return null;
  };

  for (const name of dependencies.keys()) {
    const cycle = visit(name, []);
    if (cycle) {
      return cycle;
    }
  }
  return null;
}

export class UnitCatalog {
  private readonly installables: ReadonlyMap<string, UnitDefinition>;
  private readonly dependencies: ReadonlyMap<string, DependencyUnitDefinition>;

  constructor(definition: CatalogDefinition) {
    this.installables = indexByName(definition.units, 'unit');
    this.dependencies = indexByName(
      definition.dependencies.map(dep => ({ ...dep, requires: Object.freeze([...dep.requires]) })),
      'dependency unit'
    );
    this.validate();
  }

  private validate(): void {
    const cycle = findDependencyCycle(this.dependencies);
    if (cycle) {
      throw new CatalogError(`dependency cycle ${cycle.join(' → ')}`, { cycle });
    }

    for (const dep of this.dependencies.values()) {
      for (const required of dep.requires) {
        if (!this.has(required)) {
          // Never fatal: the entry simply can never trigger
          logger.warn(`Dependency unit '${dep.name}' requires unknown unit '${required}'`);
        }
      }
    }
  }

  /**
   * Install action for a requested unit
   * @throws UnknownUnitError
   */
  lookupInstallable(name: string): UnitDefinition {
    const unit = this.installables.get(name);
    if (!unit) {
      throw new UnknownUnitError(name);
    }
    return unit;
  }

  findInstallable(name: string): UnitDefinition | undefined {
    return this.installables.get(name);
  }

  /**
   * @throws UnknownUnitError
   */
  lookupDependency(name: string): DependencyUnitDefinition {
    const unit = this.dependencies.get(name);
    if (!unit) {
      throw new UnknownUnitError(name);
    }
    return unit;
  }

  findDependency(name: string): DependencyUnitDefinition | undefined {
    return this.dependencies.get(name);
  }

  has(name: string): boolean {
    return this.installables.has(name) || this.dependencies.has(name);
  }

  installableUnits(): UnitDefinition[] {
    return [...this.installables.values()];
  }

  dependencyUnits(): DependencyUnitDefinition[] {
    return [...this.dependencies.values()];
  }

  dependencyNames(): string[] {
    return [...this.dependencies.keys()];
  }
}
