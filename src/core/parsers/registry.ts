/**
 * Parser registry.
 *
 * Two static tables built once at start-up: structural parsers keyed by
 * format family, and encryption-marker parsers keyed by `<family>_enc`.
 * Lookups of unregistered names return undefined ("no parser").
 */

import type { FormatFamily } from '../../shared/types'
import type { FeatureParser } from './base-parser'
import {
  GzipParser,
  JpegParser,
  Mp4Parser,
  Ole2Parser,
  OoxmlParser,
  PdfParser,
  PngParser,
  RarParser,
  ZipParser
} from './structural'
import { Ole2EncParser, PdfEncParser, ZipEncParser } from './encryption'

export const ENCRYPTION_SUFFIX = '_enc'

/**
 * Create the structural parser table, one parser per format family.
 */
export function createStructuralParserMap(): Map<string, FeatureParser> {
  const parsers: FeatureParser[] = [
    new GzipParser(),
    new JpegParser(),
    new PngParser(),
    new Mp4Parser(),
    new Ole2Parser(),
    new ZipParser(),
    new OoxmlParser(),
    new RarParser(),
    new PdfParser()
  ]
  return new Map(parsers.map(p => [p.family, p]))
}

/**
 * Create the encryption-marker parser table, keyed `<family>_enc`.
 */
export function createEncryptionParserMap(): Map<string, FeatureParser> {
  const parsers: FeatureParser[] = [new Ole2EncParser(), new PdfEncParser(), new ZipEncParser()]
  return new Map(parsers.map(p => [p.family, p]))
}

export class ParserRegistry {
  constructor(
    private readonly structural: ReadonlyMap<string, FeatureParser> = createStructuralParserMap(),
    private readonly encryption: ReadonlyMap<string, FeatureParser> = createEncryptionParserMap()
  ) {}

  /** Structural parser for a family, if one is registered. */
  getParser(family: FormatFamily | string): FeatureParser | undefined {
    return this.structural.get(family)
  }

  /** Encryption-marker parser for a family (looked up as `<family>_enc`). */
  getEncryptionParser(family: FormatFamily | string): FeatureParser | undefined {
    return this.encryption.get(`${family}${ENCRYPTION_SUFFIX}`)
  }

  structuralFamilies(): string[] {
    return [...this.structural.keys()]
  }

  encryptionFamilies(): string[] {
    return [...this.encryption.keys()]
  }
}

/** Process-wide registry; parsers are stateless so one instance is shared. */
export const defaultRegistry = new ParserRegistry()
