// ─── Feature Values ───────────────────────────────────────────

/**
 * A single feature cell. Integer vs. float is not distinguished at runtime;
 * the declared column type decides how the value is normalized.
 */
export type FeatureValue = boolean | number | string | null

/** Name -> value mapping. Insertion order follows the producer. */
export type FeatureMap = Record<string, FeatureValue>

/** Final per-file output: exactly the schema's columns, in schema order. */
export type FeatureRecord = Readonly<FeatureMap>

/** Fields every structural parser reports in addition to its own. */
export type StructuralFlags = {
  parser_ok: boolean
  structure_consistent: boolean
}

// ─── Format Families ──────────────────────────────────────────

export type FormatFamily =
  | 'pdf' | 'png' | 'jpeg' | 'gzip' | 'ole2' | 'rar' | 'mp4' | 'zip' | 'ooxml'

/** Families without a structural parser that the sniffer still recognizes. */
export type MagicOnlyFamily =
  | 'gif' | 'webp' | 'mp3' | 'wav' | 'flac' | 'bzip2' | 'lz4' | 'zstd'
  | 'sqlite' | 'tar' | 'pe' | 'elf' | '7z'

export type MagicFamily = FormatFamily | MagicOnlyFamily | 'unknown'

/** All families that have a structural parser, in sniffer priority order. */
export const ALL_FORMAT_FAMILIES: readonly FormatFamily[] = [
  'pdf', 'png', 'jpeg', 'gzip', 'ole2', 'rar', 'mp4', 'zip', 'ooxml'
]

export function isFormatFamily(value: string): value is FormatFamily {
  return ALL_FORMAT_FAMILIES.some(family => family === value)
}

// ─── Sniffer ──────────────────────────────────────────────────

export interface SniffResult {
  /** Parser family, or 'other' when no enabled family matched. */
  format_family: FormatFamily | 'other'
  magic_ok: boolean
  magic_family: MagicFamily
  size_bytes: number
  log_size: number
}

/** The sniffer keys Aggregator A copies into the record. */
export const SNIFF_KEYS = [
  'size_bytes', 'log_size', 'magic_ok', 'format_family', 'magic_family'
] as const satisfies readonly (keyof SniffResult)[]

export interface SnifferConfig {
  headBytes: number
  tailBytes: number
  enabledFamilies: ReadonlySet<FormatFamily>
}

// ─── Schema ───────────────────────────────────────────────────

export type ColumnType = 'bool' | 'int' | 'float' | 'string'

export interface ColumnSpec {
  name: string
  /** Declared type; undefined when the config omits it or names an unknown type. */
  type?: ColumnType
  /** Section the column was first declared in. */
  section: string
}

/** Which aggregator owns a section. */
export type SectionKind = 'structural' | 'encryption' | 'statistic'

export interface FeatureSchema {
  /** Unique columns in declaration order (first declaration wins). */
  readonly columns: readonly ColumnSpec[]
  /** Column names per section, as declared in that section (duplicates across sections kept). */
  readonly sections: ReadonlyMap<string, readonly string[]>
}

export interface FeatureConfig {
  readonly sniffer: SnifferConfig
  readonly schema: FeatureSchema
}

// ─── Batch ────────────────────────────────────────────────────

export interface BatchOptions {
  /** Worker threads to use; 0 extracts in-process. */
  workers: number
  /** Suppress informational log lines. */
  quiet: boolean
}

export interface BatchSummary {
  runId: string
  csvPath: string
  /** Rows written (files extracted successfully). */
  processed: number
  /** Files skipped because extraction failed for a per-file reason. */
  failed: number
}
