import { isAbsolute, join, resolve } from 'path';
import type { LabsetupConfigFile, ProvisionConfig, UnitArgs } from '../types/index.js';
import { CONFIG_DEFAULTS, CONFIG_FILES, ENV_VARS } from '../constants/index.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Configuration loading for the labsetup CLI
 * Supports both JSON and JSONC formats
 */

export interface ConfigEnvironment {
  cwd: string;
  home: string;
  tmpDir: string;
  env: Readonly<Record<string, string | undefined>>;
}

const KNOWN_KEYS: ReadonlyArray<keyof LabsetupConfigFile> = [
  'home',
  'shellProfile',
  'installPrefix',
  'downloadDir',
  'units',
  'unitOptions'
];

/**
 * Expand a leading ~ against `home`. Commands run without a shell, so unit
 * options holding paths go through this before reaching argv.
 */
export function expandHome(path: string, home: string): string {
  if (path === '~') {
    return home;
  }
  if (path.startsWith('~/')) {
    return join(home, path.slice(2));
  }
  return path;
}

/**
 * Expand a leading ~ and make the path absolute
 */
export function expandPath(path: string, home: string, cwd: string): string {
  const expanded = expandHome(path, home);
  return isAbsolute(expanded) ? expanded : resolve(cwd, expanded);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(raw: Record<string, unknown>, key: string, source: string): string | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`Invalid '${key}' in ${source}: expected a non-empty string`, { key, source });
  }
  return value;
}

function parseUnits(value: unknown, source: string): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`Invalid 'units' in ${source}: expected an array of unit names`, { source });
  }
  return value;
}

function parseUnitOptions(value: unknown, source: string): Record<string, Record<string, string>> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid 'unitOptions' in ${source}: expected an object keyed by unit name`, { source });
  }

  const result: Record<string, Record<string, string>> = {};
  for (const [unitName, options] of Object.entries(value)) {
    if (!isRecord(options)) {
      throw new ConfigError(`Invalid 'unitOptions.${unitName}' in ${source}: expected an object`, { source, unitName });
    }
    const args: Record<string, string> = {};
    for (const [optionName, optionValue] of Object.entries(options)) {
      if (typeof optionValue !== 'string') {
        throw new ConfigError(
          `Invalid 'unitOptions.${unitName}.${optionName}' in ${source}: expected a string`,
          { source, unitName, optionName }
        );
      }
      args[optionName] = optionValue;
    }
    result[unitName] = args;
  }
  return result;
}

/**
 * Validate the raw contents of a configuration file
 */
export function parseConfigFile(raw: unknown, source: string): LabsetupConfigFile {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid configuration in ${source}: expected a JSON object`, { source });
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.some(known => known === key)) {
      logger.warn(`Ignoring unknown configuration key '${key}' in ${source}`);
    }
  }

  return {
    home: optionalString(raw, 'home', source),
    shellProfile: optionalString(raw, 'shellProfile', source),
    installPrefix: optionalString(raw, 'installPrefix', source),
    downloadDir: optionalString(raw, 'downloadDir', source),
    units: parseUnits(raw.units, source),
    unitOptions: parseUnitOptions(raw.unitOptions, source)
  };
}

/**
 * Find the configuration file to use.
 * An explicitly named file (flag or environment) must exist; the implicit
 * locations are optional.
 */
export async function findConfigFile(explicitPath: string | undefined, environment: ConfigEnvironment): Promise<string | null> {
  const named = explicitPath ?? environment.env[ENV_VARS.CONFIG];
  if (named) {
    const path = expandPath(named, environment.home, environment.cwd);
    if (!(await exists(path))) {
      throw new ConfigError(`Configuration file not found: ${path}`, { path });
    }
    return path;
  }

  const candidates = [
    ...CONFIG_FILES.LOCAL.map(name => join(environment.cwd, name)),
    join(environment.home, CONFIG_FILES.USER)
  ];
  for (const candidate of candidates) {
    if (await exists(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Merge a parsed file over the defaults and freeze the result
 */
export function buildProvisionConfig(
  file: LabsetupConfigFile,
  environment: ConfigEnvironment,
  sourcePath: string | null
): ProvisionConfig {
  const home = file.home ? expandPath(file.home, environment.home, environment.cwd) : environment.home;
  const expand = (path: string) => expandPath(path, home, environment.cwd);

  const unitOptions: Record<string, UnitArgs> = {};
  for (const [unitName, args] of Object.entries(file.unitOptions ?? {})) {
    unitOptions[unitName] = Object.freeze({ ...args });
  }

  return Object.freeze({
    home,
    shellProfile: expand(file.shellProfile ?? CONFIG_DEFAULTS.SHELL_PROFILE),
    installPrefix: expand(file.installPrefix ?? CONFIG_DEFAULTS.INSTALL_PREFIX),
    downloadDir: expand(file.downloadDir ?? join(environment.tmpDir, CONFIG_DEFAULTS.DOWNLOAD_DIR_NAME)),
    units: Object.freeze([...(file.units ?? [])]),
    unitOptions: Object.freeze(unitOptions),
    sourcePath
  });
}

/**
 * Load the provisioning configuration, falling back to defaults when no
 * configuration file exists.
 */
export async function loadProvisionConfig(
  explicitPath: string | undefined,
  environment: ConfigEnvironment
): Promise<ProvisionConfig> {
  const path = await findConfigFile(explicitPath, environment);

  if (!path) {
    logger.debug('Config file not found, using defaults');
    return buildProvisionConfig({}, environment, null);
  }

  logger.debug(`Loading config from: ${path}`);
  let raw: unknown;
  try {
    raw = await readJsonOrJsoncFile(path);
  } catch (error) {
    throw new ConfigError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`, { path });
  }

  return buildProvisionConfig(parseConfigFile(raw, path), environment, path);
}
