/**
 * Shared constants for the labsetup CLI
 */

export const CLI_NAME = 'labsetup';

export const CONFIG_FILES = {
  /** Looked up in the working directory, in this order */
  LOCAL: ['labsetup.jsonc', 'labsetup.json'],
  /** Relative to the home directory */
  USER: '.config/labsetup/config.jsonc'
} as const;

export const ENV_VARS = {
  CONFIG: 'LABSETUP_CONFIG',
  VERBOSE: 'LABSETUP_VERBOSE'
} as const;

export const CONFIG_DEFAULTS = {
  SHELL_PROFILE: '~/.bashrc',
  INSTALL_PREFIX: '/opt',
  DOWNLOAD_DIR_NAME: 'labsetup'
} as const;

/**
 * Markers delimiting a block labsetup owns inside a shell profile.
 * The block id is appended after the colon.
 */
export const PROFILE_MARKERS = {
  BEGIN: '# >>> labsetup:',
  END: '# <<< labsetup:',
  SUFFIX_BEGIN: ' >>>',
  SUFFIX_END: ' <<<'
} as const;
