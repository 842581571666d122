/**
 * Encryption-marker parsers - barrel export.
 *
 * Registered under `<family>_enc` and only run on files whose structural
 * parser reported `parser_ok`.
 */

export { Ole2EncParser } from './ole2-enc-parser'
export { PdfEncParser } from './pdf-enc-parser'
export { ZipEncParser } from './zip-enc-parser'

export type { Ole2EncFeatures } from './ole2-enc-parser'
export type { PdfEncFeatures } from './pdf-enc-parser'
export type { ZipEncFeatures } from './zip-enc-parser'
