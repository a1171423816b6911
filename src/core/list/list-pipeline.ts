import type { CommandResult, UnitCategory, UnitOptionSpec } from '../../types/index.js';
import type { UnitCatalog } from '../catalog/unit-catalog.js';

export interface UnitListEntry {
  name: string;
  description: string;
  category: UnitCategory;
  options: UnitOptionSpec[];
  /** Requested units that pull this unit in as a dependency */
  triggeredBy: string[];
  /** False for units that are only ever installed as a dependency */
  installable: boolean;
}

export interface ListPipelineResult {
  units: UnitListEntry[];
}

export const CATEGORY_ORDER: readonly UnitCategory[] = ['system', 'application', 'science', 'shell'];

/**
 * Describe every unit in the catalog, grouped by category, declaration
 * order inside each group.
 */
export function runListPipeline(catalog: UnitCatalog): CommandResult<ListPipelineResult> {
  const entries: UnitListEntry[] = catalog.installableUnits().map(unit => ({
    name: unit.name,
    description: unit.description,
    category: unit.category,
    options: [...(unit.options ?? [])],
    triggeredBy: [],
    installable: true
  }));

  for (const dependency of catalog.dependencyUnits()) {
    const existing = entries.find(entry => entry.name === dependency.name);
    if (existing) {
      existing.triggeredBy = [...dependency.requires];
    } else {
      entries.push({
        name: dependency.name,
        description: dependency.description,
        category: dependency.category,
        options: [...(dependency.options ?? [])],
        triggeredBy: [...dependency.requires],
        installable: false
      });
    }
  }

  const units = CATEGORY_ORDER.flatMap(category => entries.filter(entry => entry.category === category));
  return { success: true, data: { units } };
}
