/**
 * Feature configuration loader.
 *
 * `features.yaml` carries the sniffer settings under `global.sniffer` and the
 * feature schema under `features`: named sections, each a list of
 * `{ name, type }` columns. The `global` block is validated with zod; the
 * `features` block is read tolerantly (non-list sections, non-mapping items
 * and unnamed items are skipped). The returned config is frozen.
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import * as yaml from 'js-yaml'
import { z } from 'zod'

import type {
  ColumnSpec,
  ColumnType,
  FeatureConfig,
  FeatureSchema,
  FormatFamily,
  SectionKind,
  SnifferConfig
} from '../../shared/types'
import { isFormatFamily } from '../../shared/types'
import { DEFAULT_SNIFF_WINDOW } from '../../shared/constants/file-signatures'

export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../../config/features.yaml')

export const STATISTIC_SECTION = 'statistic'
export const ENCRYPTION_SECTION_SUFFIX = '_enc'

export type ConfigErrorCode = 'CONFIG_INVALID' | 'CONFIG_NOT_FOUND'

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode
  public readonly remediation?: string
  public override readonly cause?: unknown

  constructor(message: string, code: ConfigErrorCode, remediation?: string, cause?: unknown) {
    super(message)
    this.name = 'ConfigError'
    this.code = code
    this.remediation = remediation
    this.cause = cause
  }
}

// ─── Validation ───────────────────────────────────────────────

const SnifferBlock = z
  .object({
    // Numeric strings such as "16384" are accepted.
    head_bytes: z.coerce.number().int().positive().default(DEFAULT_SNIFF_WINDOW),
    tail_bytes: z.coerce.number().int().positive().default(DEFAULT_SNIFF_WINDOW),
    // Families must be opted into; a missing list enables none.
    enabled_families: z
      .array(z.string().refine(isFormatFamily, { message: 'unknown format family' }))
      .nullish()
      .transform(families => families ?? [])
  })
  .default({})

const RootDocument = z.object({
  global: z.object({ sniffer: SnifferBlock }).passthrough().default({}),
  features: z.record(z.unknown()).nullish()
})

const COLUMN_TYPES: ReadonlySet<string> = new Set(['bool', 'int', 'float', 'string'])

function isColumnType(value: string): value is ColumnType {
  return COLUMN_TYPES.has(value)
}

export function sectionKind(section: string): SectionKind {
  if (section === STATISTIC_SECTION) return 'statistic'
  if (section.endsWith(ENCRYPTION_SECTION_SUFFIX)) return 'encryption'
  return 'structural'
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Build the schema from the raw `features` mapping. Column order is
 * declaration order; a column declared twice keeps its first declaration
 * but stays listed in every section that names it.
 */
export function buildSchema(features: Record<string, unknown> | null | undefined): FeatureSchema {
  const columns: ColumnSpec[] = []
  const sections = new Map<string, readonly string[]>()
  const seen = new Set<string>()

  for (const [section, items] of Object.entries(features ?? {})) {
    if (!Array.isArray(items)) continue

    const names: string[] = []
    for (const item of items) {
      if (!isPlainObject(item)) continue
      const name = item['name']
      if (typeof name !== 'string' || name === '') continue

      names.push(name)
      if (seen.has(name)) continue
      seen.add(name)

      const rawType = item['type']
      const type = typeof rawType === 'string' ? rawType.toLowerCase() : ''
      columns.push(
        Object.freeze({ name, section, ...(isColumnType(type) ? { type } : {}) })
      )
    }
    sections.set(section, Object.freeze(names))
  }

  return Object.freeze({ columns: Object.freeze(columns), sections })
}

/**
 * Validate an already-parsed YAML document.
 *
 * @throws {ConfigError} When the root is not a mapping or `global.sniffer` is malformed.
 */
export function parseConfig(doc: unknown): FeatureConfig {
  if (doc === null || doc === undefined) doc = {}
  if (!isPlainObject(doc)) {
    throw new ConfigError('Configuration root must be a mapping', 'CONFIG_INVALID')
  }

  const parsed = RootDocument.safeParse(doc)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(i => `${i.path.join('.') || '<root>'}: ${i.message}`)
      .join('; ')
    throw new ConfigError(
      `Invalid configuration: ${detail}`,
      'CONFIG_INVALID',
      'Check global.sniffer: head_bytes/tail_bytes are positive integers and enabled_families lists known families.',
      parsed.error
    )
  }

  const { sniffer } = parsed.data.global
  const enabled: FormatFamily[] = sniffer.enabled_families.filter(isFormatFamily)
  const snifferConfig: SnifferConfig = Object.freeze({
    headBytes: sniffer.head_bytes,
    tailBytes: sniffer.tail_bytes,
    enabledFamilies: new Set(enabled)
  })

  return Object.freeze({
    sniffer: snifferConfig,
    schema: buildSchema(parsed.data.features)
  })
}

/** Parse YAML text into a config. */
export function parseConfigText(text: string, source: string = '<inline>'): FeatureConfig {
  let doc: unknown
  try {
    doc = yaml.load(text)
  } catch (err) {
    throw new ConfigError(
      `Cannot parse YAML in ${source}: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_INVALID',
      undefined,
      err
    )
  }
  return parseConfig(doc)
}

/**
 * Load and validate a configuration file.
 *
 * @throws {ConfigError} `CONFIG_NOT_FOUND` when the file is missing,
 *   `CONFIG_INVALID` when it cannot be parsed or validated.
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): FeatureConfig {
  let text: string
  try {
    text = fs.readFileSync(configPath, 'utf-8')
  } catch (err) {
    throw new ConfigError(
      `features.yaml not found at: ${configPath}`,
      'CONFIG_NOT_FOUND',
      'Pass --config <path> or restore config/features.yaml.',
      err
    )
  }
  return parseConfigText(text, configPath)
}

/** Columns owned by the structural aggregator (first declared outside _enc/statistic sections). */
export function structuralColumns(schema: FeatureSchema): string[] {
  return schema.columns.filter(c => sectionKind(c.section) === 'structural').map(c => c.name)
}

/** Encryption sections and the columns each one declares. */
export function encryptionSections(schema: FeatureSchema): Map<string, readonly string[]> {
  const out = new Map<string, readonly string[]>()
  for (const [section, names] of schema.sections) {
    if (sectionKind(section) === 'encryption') out.set(section, names)
  }
  return out
}

export function statisticColumns(schema: FeatureSchema): readonly string[] {
  return schema.sections.get(STATISTIC_SECTION) ?? []
}

export function columnTypes(schema: FeatureSchema): Map<string, ColumnType | undefined> {
  return new Map(schema.columns.map(c => [c.name, c.type]))
}
