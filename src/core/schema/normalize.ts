/**
 * Value normalization against declared column types.
 *
 * A value that cannot be converted is returned unchanged; null always stays
 * null, and columns without a declared type pass through.
 */

import type { ColumnType, FeatureSchema, FeatureValue, FeatureRecord } from '../../shared/types'

const INTEGER_TEXT = /^[+-]?\d+$/
const FLOAT_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$|^[+-]?(inf|infinity|nan)$/i

function toInt(value: FeatureValue): FeatureValue {
  if (typeof value === 'boolean') return value ? 1 : 0
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : value
  if (typeof value === 'string') {
    const text = value.trim().replace(/_/g, '')
    return INTEGER_TEXT.test(text) ? Number.parseInt(text, 10) : value
  }
  return value
}

function toFloat(value: FeatureValue): FeatureValue {
  if (typeof value === 'boolean') return value ? 1 : 0
  if (typeof value === 'number') return value
  if (typeof value === 'string') {
    const text = value.trim()
    if (!FLOAT_TEXT.test(text)) return value
    const lower = text.toLowerCase().replace(/^[+]/, '')
    if (lower === 'inf' || lower === 'infinity') return Infinity
    if (lower === '-inf' || lower === '-infinity') return -Infinity
    if (lower.endsWith('nan')) return NaN
    return Number(text)
  }
  return value
}

function toBool(value: FeatureValue): FeatureValue {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number' && Number.isFinite(value)) return value !== 0
  return value
}

export function normalizeValue(value: FeatureValue, type: ColumnType | undefined): FeatureValue {
  if (value === null) return null
  switch (type) {
    case 'bool':
      return toBool(value)
    case 'int':
      return toInt(value)
    case 'float':
      return toFloat(value)
    case 'string':
      return String(value)
    default:
      return value
  }
}

/**
 * Project a reconciled map onto the schema: exactly the schema's columns,
 * in declaration order, each normalized to its declared type.
 */
export function normalizeRecord(
  schema: FeatureSchema,
  values: Readonly<Record<string, FeatureValue>>
): FeatureRecord {
  const out: Record<string, FeatureValue> = {}
  for (const column of schema.columns) {
    out[column.name] = normalizeValue(values[column.name] ?? null, column.type)
  }
  return Object.freeze(out)
}
