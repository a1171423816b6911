import { UnitCatalog } from './unit-catalog.js';
import { basePackages, buildTools, buildToolsDependency, systemUpdate } from './units/system.js';
import { docker, dockerRepository, slack, vscode, zoom } from './units/applications.js';
import {
  afni,
  ants,
  dcm2niix,
  freesurfer,
  fsl,
  miniconda,
  mrtrix3,
  neurodebian,
  neurodebianDependency
} from './units/science.js';
import { condaInit, gitIdentity, shellAliases } from './units/shell.js';

/**
 * The built-in catalog. Declaration order is install order for `--all`
 * and the order in which dependency units are resolved.
 */
export function createDefaultCatalog(): UnitCatalog {
  return new UnitCatalog({
    units: [
      systemUpdate,
      basePackages,
      buildTools,
      docker,
      vscode,
      slack,
      zoom,
      neurodebian,
      afni,
      fsl,
      dcm2niix,
      freesurfer,
      miniconda,
      mrtrix3,
      ants,
      gitIdentity,
      shellAliases,
      condaInit
    ],
    dependencies: [
      neurodebianDependency,
      buildToolsDependency,
      dockerRepository
    ]
  });
}
