/**
 * Project descriptor (pyproject.toml) reader and accessor
 */

import { readFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import TOML from '@iarna/toml'

import {
  ConfigParseError,
  ConfigValidationError,
  MissingDescriptorError,
  MissingKeyError,
} from '../errors.js'
import { validateTandemTable, validateTypeoTable } from '../schemas/index.js'
import {
  DESCRIPTOR_FILENAME,
  type DescriptorData,
  type TandemTable,
  type TomlTable,
  type TomlValue,
  type TypeoTable,
} from '../types.js'

export function isTomlTable(value: TomlValue | undefined): value is TomlTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function normalizeValue(value: unknown): TomlValue | undefined {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return value
    case 'bigint':
      // 64-bit integers outside the safe range keep their exact digits
      return value.toString()
    case 'object':
      if (value === null) return undefined
      if (value instanceof Date) return value.toISOString()
      if (Array.isArray(value)) {
        return value.map(normalizeValue).filter((v): v is TomlValue => v !== undefined)
      }
      return normalize(value)
    default:
      return undefined
  }
}

function normalize(parsed: unknown): DescriptorData {
  const table: TomlTable = {}
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return table
  }
  for (const [key, value] of Object.entries(parsed)) {
    const normalized = normalizeValue(value)
    if (normalized !== undefined) {
      table[key] = normalized
    }
  }
  return table
}

/**
 * Loaded descriptor of a project or pipeline.
 *
 * The parsed mapping is never handed out directly: `data`, `table` and
 * `optionalTable` all return deep copies.
 */
export class ProjectConfig {
  /** Absolute project root */
  readonly root: string
  /** Absolute path of the descriptor file */
  readonly source: string

  private readonly raw: DescriptorData

  private constructor(root: string, source: string, raw: DescriptorData) {
    this.root = root
    this.source = source
    this.raw = raw
  }

  /**
   * Read `<root>/pyproject.toml`.
   *
   * @param owner - Kind of object being constructed, used in the error message
   * @throws MissingDescriptorError if the file does not exist
   * @throws ConfigParseError if the file is not valid TOML
   */
  static async load(root: string, owner = 'Project'): Promise<ProjectConfig> {
    const absRoot = resolve(root)
    const source = join(absRoot, DESCRIPTOR_FILENAME)

    let content: string
    try {
      content = await readFile(source, 'utf8')
    } catch (err) {
      const code = (err as NodeJS.ErrnoException | undefined)?.code
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw new MissingDescriptorError(owner, absRoot, source)
      }
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigParseError(`Failed to read file: ${message}`, source)
    }

    return ProjectConfig.parse(content, absRoot)
  }

  /**
   * Parse descriptor content that belongs to `root`.
   *
   * @throws ConfigParseError if TOML parsing fails
   */
  static parse(content: string, root: string): ProjectConfig {
    const absRoot = resolve(root)
    const source = join(absRoot, DESCRIPTOR_FILENAME)

    let parsed: unknown
    try {
      parsed = TOML.parse(content)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigParseError(`Failed to parse TOML: ${message}`, source)
    }

    return new ProjectConfig(absRoot, source, normalize(parsed))
  }

  /** Deep copy of the whole descriptor */
  get data(): DescriptorData {
    return structuredClone(this.raw)
  }

  /** Whether a table exists at the given key path */
  has(...keys: string[]): boolean {
    return this.lookup(keys) !== undefined
  }

  /**
   * Deep copy of the table at the given key path.
   *
   * @throws MissingKeyError naming the dotted path when it is absent or not a table
   */
  table(...keys: string[]): TomlTable {
    const found = this.lookup(keys)
    if (found === undefined) {
      throw new MissingKeyError(keys.join('.'), this.source)
    }
    return structuredClone(found)
  }

  /** Like `table`, but an absent table reads as empty */
  optionalTable(...keys: string[]): TomlTable {
    const found = this.lookup(keys)
    return found === undefined ? {} : structuredClone(found)
  }

  /**
   * `[tool.poetry].name`
   *
   * @throws MissingKeyError if the name is missing
   */
  projectName(): string {
    const name = this.optionalTable('tool', 'poetry')['name']
    if (typeof name !== 'string' || name.length === 0) {
      throw new MissingKeyError('tool.poetry.name', this.source)
    }
    return name
  }

  /**
   * Validated `[tool.tandem]` table, empty when absent.
   *
   * @throws ConfigValidationError if the table does not match its schema
   */
  tandem(): TandemTable {
    const result = validateTandemTable(this.optionalTable('tool', 'tandem'))
    if (!result.valid) {
      throw new ConfigValidationError('Invalid [tool.tandem] table', this.source, result.errors)
    }
    return result.data
  }

  /**
   * Validated `[tool.typeo]` table.
   *
   * @throws MissingKeyError if the table is absent
   * @throws ConfigValidationError if the table does not match its schema
   */
  typeo(): TypeoTable {
    const result = validateTypeoTable(this.table('tool', 'typeo'))
    if (!result.valid) {
      throw new ConfigValidationError('Invalid [tool.typeo] table', this.source, result.errors)
    }
    return result.data
  }

  private lookup(keys: string[]): TomlTable | undefined {
    let current: TomlTable = this.raw
    for (const key of keys) {
      const next = current[key]
      if (!isTomlTable(next)) {
        return undefined
      }
      current = next
    }
    return current
  }
}
