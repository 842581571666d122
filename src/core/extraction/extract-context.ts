/**
 * Extraction context: turns one file into one schema-conforming record.
 *
 *   sniff -> structural parse -> A -> (parser_ok) encryption parse -> B
 *         -> byte statistics -> C -> reconcile -> normalize
 *
 * Parse failures never escape: they collapse to the parser's default record.
 * Only {@link SchemaMismatchError} (a configuration bug) and I/O errors on the
 * file itself propagate.
 */

import type { FeatureConfig, FeatureMap, FeatureRecord, SniffResult } from '../../shared/types'
import type { ReadableSource } from '../io/readable-source'
import { withBlockReader } from '../io/block-reader'
import { Sniffer } from '../sniffer/sniffer'
import type { FeatureParser } from '../parsers/base-parser'
import { ENCRYPTION_SUFFIX, ParserRegistry, defaultRegistry } from '../parsers/registry'
import type { ByteMetrics } from '../statistics/byte-statistics'
import { collectByteStatistics, computeMetrics } from '../statistics/byte-statistics'
import {
  aggregateEncryption,
  aggregateStatistics,
  aggregateStructural,
  reconcile
} from '../aggregation/aggregators'
import { normalizeRecord } from '../schema/normalize'

export interface ExtractionOptions {
  /** Log parser failures and their reasons. */
  debug?: boolean
  registry?: ParserRegistry
}

/** Per-file intermediate results, exposed for diagnostics. */
export interface ExtractionTrace {
  sniff: SniffResult
  structural: FeatureMap | null
  encryption: FeatureMap | null
  metrics: ByteMetrics | null
}

export class ExtractionContext {
  private readonly sniffer: Sniffer
  private readonly registry: ParserRegistry
  private readonly debug: boolean

  constructor(
    readonly config: FeatureConfig,
    options: ExtractionOptions = {}
  ) {
    this.sniffer = new Sniffer(config.sniffer)
    this.registry = options.registry ?? defaultRegistry
    this.debug = options.debug ?? false
  }

  /** Extract the feature record of a file on disk. */
  extract(filePath: string): Promise<FeatureRecord> {
    return withBlockReader(filePath, reader => this.extractSource(reader, filePath))
  }

  /**
   * Extract from an already-open source. `label` names the file in errors
   * and log lines.
   */
  async extractSource(source: ReadableSource, label: string): Promise<FeatureRecord> {
    const trace = await this.trace(source, label)
    const { schema } = this.config

    const merged: FeatureMap = {
      ...aggregateStructural(schema, trace.sniff, trace.structural),
      ...aggregateEncryption(schema, `${trace.sniff.format_family}${ENCRYPTION_SUFFIX}`, trace.encryption),
      ...aggregateStatistics(schema, trace.metrics)
    }

    reconcile(schema, merged, label)
    return normalizeRecord(schema, merged)
  }

  /** Run every stage and return the raw per-stage outputs. */
  async trace(source: ReadableSource, label: string): Promise<ExtractionTrace> {
    const sniff = await this.sniffer.sniff(source)

    const parser = this.registry.getParser(sniff.format_family)
    const structural = parser ? await this.runParser(parser, source, label) : null

    let encryption: FeatureMap | null = null
    if (structural?.parser_ok === true) {
      const encParser = this.registry.getEncryptionParser(sniff.format_family)
      if (encParser) encryption = await this.runParser(encParser, source, label)
    }

    let metrics: ByteMetrics | null = null
    try {
      metrics = computeMetrics(await collectByteStatistics(source))
    } catch (err) {
      console.warn(
        `[extract] Byte statistics failed for ${label}:`,
        err instanceof Error ? err.message : err
      )
    }

    return { sniff, structural, encryption, metrics }
  }

  private async runParser(parser: FeatureParser, source: ReadableSource, label: string): Promise<FeatureMap> {
    const result = await parser.run(source)
    if (result.ok) return result.value

    if (this.debug) {
      console.debug(`[extract] ${parser.name} failed on ${label} (${result.error.code}): ${result.error.message}`)
    }
    return parser.defaults()
  }
}
