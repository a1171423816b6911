/**
 * Common types and interfaces for the labsetup CLI
 */

import type { ProvisionContext } from './execution-context.js';

export * from './execution-context.js';

// Configuration types
export interface LabsetupConfigFile {
  home?: string;
  shellProfile?: string;
  installPrefix?: string;
  downloadDir?: string;
  units?: string[];
  unitOptions?: Record<string, Record<string, string>>;
}

/**
 * Frozen configuration handed to every component through the execution context.
 * Paths are absolute and already tilde-expanded.
 */
export interface ProvisionConfig {
  readonly home: string;
  readonly shellProfile: string;
  readonly installPrefix: string;
  readonly downloadDir: string;
  readonly units: readonly string[];
  readonly unitOptions: Readonly<Record<string, UnitArgs>>;
  /** Where the configuration was read from, or null when defaults were used */
  readonly sourcePath: string | null;
}

// Unit types

/**
 * Exit-status style result of an idempotency probe.
 * 0 means already satisfied, anything else means not satisfied.
 */
export type CheckStatus = number;

export const CHECK_SATISFIED: CheckStatus = 0;
export const CHECK_NOT_SATISFIED: CheckStatus = 1;

export type InstallOutcome =
  | { ok: true }
  | { ok: false; error: Error };

export type UnitArgs = Readonly<Record<string, string>>;

export type InstallAction = (ctx: ProvisionContext, args: UnitArgs) => Promise<InstallOutcome>;
export type CheckProbe = (ctx: ProvisionContext) => Promise<CheckStatus>;

export type UnitCategory = 'system' | 'application' | 'science' | 'shell';

export interface UnitOptionSpec {
  name: string;
  description: string;
  required?: boolean;
}

export interface UnitDefinition {
  name: string;
  description: string;
  category: UnitCategory;
  install: InstallAction;
  check?: CheckProbe;
  options?: readonly UnitOptionSpec[];
}

/**
 * A unit installed automatically, before anything else runs, whenever one of
 * the names in `requires` is requested.
 */
export interface DependencyUnitDefinition extends UnitDefinition {
  requires: readonly string[];
}

export interface CatalogDefinition {
  units: readonly UnitDefinition[];
  dependencies: readonly DependencyUnitDefinition[];
}

// Command result
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class LabsetupError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LabsetupError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  UNKNOWN_UNIT = 'UNKNOWN_UNIT',
  INSTALL_FAILURE = 'INSTALL_FAILURE',
  CHECK_FAILURE = 'CHECK_FAILURE',
  CATALOG_ERROR = 'CATALOG_ERROR',
  COMMAND_FAILED = 'COMMAND_FAILED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
