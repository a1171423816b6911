/**
 * Types shared by the dependency resolver, the orchestrator and the
 * provision pipeline.
 */

export interface UnitFailure {
  unit: string;
  error: Error;
  /** True when the failing unit was a dependency installed by the resolver */
  duringResolution: boolean;
}

export interface ResolutionResult {
  /**
   * The requested set after resolution: the caller's order, minus the
   * dependency units the resolver handled.
   */
  plan: string[];
  /** Dependency units whose install ran */
  installed: string[];
  /** Dependency units whose check reported them as already satisfied */
  satisfied: string[];
  failure?: UnitFailure;
}

export interface OrchestrationReport {
  completed: string[];
  /** Units whose check reported them as already satisfied */
  skipped: string[];
  /** Names with no catalog entry, replaced by a no-op */
  unknown: string[];
  failure?: UnitFailure;
}

export interface ProvisionReport {
  requested: string[];
  resolution: ResolutionResult;
  orchestration: OrchestrationReport;
  dryRun: boolean;
}
