/**
 * Structural parsers - barrel export.
 *
 * Each parser walks one container format's internal structure and reports
 * its soundness features plus `parser_ok` / `structure_consistent`.
 */

export { GzipParser } from './gzip-parser'
export { JpegParser } from './jpeg-parser'
export { PngParser } from './png-parser'
export { Mp4Parser } from './mp4-parser'
export { Ole2Parser } from './ole2-parser'
export { ZipParser } from './zip-parser'
export { OoxmlParser } from './ooxml-parser'
export { RarParser } from './rar-parser'
export { PdfParser } from './pdf-parser'

export type { GzipFeatures } from './gzip-parser'
export type { JpegFeatures } from './jpeg-parser'
export type { PngFeatures } from './png-parser'
export type { Mp4Features } from './mp4-parser'
export type { Ole2Features } from './ole2-parser'
export type { ZipFeatures } from './zip-parser'
export type { OoxmlFeatures } from './ooxml-parser'
export type { RarFeatures } from './rar-parser'
export type { PdfFeatures } from './pdf-parser'
