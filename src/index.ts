/**
 * Public API.
 *
 * The usual entry point is {@link ExtractionContext}: load a config, then
 * extract one flat feature record per file. {@link BatchManager} drives a
 * whole directory into a CSV.
 */

export * from './shared/types'

export type { ReadableSource } from './core/io/readable-source'
export { BufferSource, readHead, readTail } from './core/io/readable-source'
export { BlockReader, SourceReadError, withBlockReader } from './core/io/block-reader'

export { Sniffer, sniffFile, DEFAULT_SNIFFER_CONFIG } from './core/sniffer/sniffer'

export type { FeatureParser, ParseResult } from './core/parsers/base-parser'
export { FormatParser, ParseError } from './core/parsers/base-parser'
export * from './core/parsers/structural'
export * from './core/parsers/encryption'
export { ParserRegistry, defaultRegistry } from './core/parsers/registry'

export type { ByteMetrics, ByteStatistics } from './core/statistics/byte-statistics'
export {
  METRIC_NAMES,
  collectByteStatistics,
  computeMetrics
} from './core/statistics/byte-statistics'

export {
  ConfigError,
  DEFAULT_CONFIG_PATH,
  loadConfig,
  parseConfig,
  parseConfigText
} from './core/schema/config-loader'
export { normalizeRecord, normalizeValue } from './core/schema/normalize'
export * from './core/aggregation'

export type { ExtractionOptions, ExtractionTrace } from './core/extraction/extract-context'
export { ExtractionContext } from './core/extraction/extract-context'

export { BatchManager } from './main/batch-manager'
export type { BatchManagerOptions } from './main/batch-manager'
export { writeCsv, renderCsv } from './main/csv-writer'
