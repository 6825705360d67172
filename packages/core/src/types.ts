/**
 * Descriptor (pyproject.toml) types
 */

/** A TOML value after normalization: dates become ISO strings, 64-bit integers decimal strings */
export type TomlValue = string | number | boolean | TomlValue[] | TomlTable

/** A TOML table */
export interface TomlTable {
  [key: string]: TomlValue
}

/** Whole parsed descriptor */
export type DescriptorData = TomlTable

/** Supported environment backends */
export type EnvironmentKind = 'poetry' | 'conda'

/**
 * `[tool.tandem]` table.
 *
 * Projects read environment settings from it; pipelines additionally
 * declare their ordered `steps`.
 */
export interface TandemTable {
  /** Pipeline steps, `component:command[:subcommand]` */
  steps?: string[]
  /** Environment backend (default: poetry) */
  environment?: EnvironmentKind
  /** Conda environment name (default: the project name) */
  conda_env?: string
  /** Conda environment file, relative to the project root */
  conda_file?: string
  /** Python interpreter or version for new environments */
  python?: string
  [key: string]: TomlValue | undefined
}

/** `[tool.typeo]` table */
export interface TypeoTable {
  /** Registered scripts: a list of names, or a table keyed by name */
  scripts?: TomlTable | string[]
  [key: string]: TomlValue | undefined
}

/** Descriptor file name looked up at every project root */
export const DESCRIPTOR_FILENAME = 'pyproject.toml'
