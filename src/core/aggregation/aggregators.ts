/**
 * Aggregators A, B and C, and strict schema reconciliation.
 *
 * Each aggregator is a pure function of the schema and its inputs returning a
 * partial record: every column it owns is present (null when no value was
 * produced) and no other key is.
 */

import type { FeatureMap, FeatureSchema, SniffResult } from '../../shared/types'
import { SNIFF_KEYS } from '../../shared/types'
import {
  encryptionSections,
  statisticColumns,
  structuralColumns
} from '../schema/config-loader'
import type { ByteMetrics } from '../statistics/byte-statistics'
import { METRIC_NAMES } from '../statistics/byte-statistics'

export class SchemaMismatchError extends Error {
  public readonly code = 'SCHEMA_MISMATCH'
  public readonly filePath: string
  public readonly missing: readonly string[]
  public readonly extra: readonly string[]

  constructor(filePath: string, missing: readonly string[], extra: readonly string[]) {
    const parts: string[] = []
    if (missing.length > 0) parts.push(`missing features: [${missing.join(', ')}]`)
    if (extra.length > 0) parts.push(`unexpected features: [${extra.join(', ')}]`)
    super(`Schema mismatch for ${filePath}: ${parts.join(', ')}`)
    this.name = 'SchemaMismatchError'
    this.filePath = filePath
    this.missing = missing
    this.extra = extra
  }
}

function overlay(columns: readonly string[], values: Readonly<FeatureMap>): FeatureMap {
  const out: FeatureMap = {}
  for (const name of columns) out[name] = null
  for (const [key, value] of Object.entries(values)) {
    if (Object.prototype.hasOwnProperty.call(out, key)) out[key] = value
  }
  return out
}

/**
 * Aggregator A: sniffer keys plus the structural record over the structural
 * sections' columns. `parserFeatures` is null when no parser was registered
 * for the family, which leaves `parser_ok` / `structure_consistent` null.
 */
export function aggregateStructural(
  schema: FeatureSchema,
  sniff: SniffResult,
  parserFeatures: Readonly<FeatureMap> | null
): FeatureMap {
  const merged: FeatureMap = { parser_ok: null, structure_consistent: null }
  for (const key of SNIFF_KEYS) merged[key] = sniff[key]
  Object.assign(merged, parserFeatures ?? {})
  return overlay(structuralColumns(schema), merged)
}

/**
 * Aggregator B: every encryption column defaults to null; the section named
 * `encSection` is overlaid with the encryption record.
 */
export function aggregateEncryption(
  schema: FeatureSchema,
  encSection: string,
  encFeatures: Readonly<FeatureMap> | null
): FeatureMap {
  const out: FeatureMap = {}
  for (const names of encryptionSections(schema).values()) {
    for (const name of names) out[name] = null
  }

  const own = schema.sections.get(encSection)
  if (own && encFeatures) {
    Object.assign(out, overlay(own, encFeatures))
  }
  return out
}

/**
 * Aggregator C: the statistic section's columns, overlaid with the metrics
 * whose names it declares. `metrics` is null when the statistics pass failed.
 */
export function aggregateStatistics(
  schema: FeatureSchema,
  metrics: Readonly<ByteMetrics> | null
): FeatureMap {
  const values: FeatureMap = {}
  if (metrics) {
    for (const name of METRIC_NAMES) values[name] = metrics[name]
  }
  return overlay(statisticColumns(schema), values)
}

/**
 * Strict reconciliation: the merged map must hold exactly the schema columns.
 *
 * @throws {SchemaMismatchError} Naming the missing and unexpected columns.
 */
export function reconcile(schema: FeatureSchema, merged: Readonly<FeatureMap>, filePath: string): void {
  const allowed = new Set(schema.columns.map(c => c.name))
  const missing = schema.columns.map(c => c.name).filter(n => !Object.prototype.hasOwnProperty.call(merged, n))
  const extra = Object.keys(merged).filter(k => !allowed.has(k))
  if (missing.length > 0 || extra.length > 0) {
    throw new SchemaMismatchError(filePath, missing, extra)
  }
}
