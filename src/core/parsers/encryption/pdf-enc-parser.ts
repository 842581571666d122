/**
 * PDF encryption-marker parser.
 *
 * An encrypted PDF names its security handler in the trailer's /Encrypt
 * dictionary (`/Filter /Standard`, `/Adobe.PubSec`, ...) and may declare
 * `/EncryptMetadata false`. The tail is searched first since the trailer
 * sits there; linearized files carry it near the head instead.
 */

import type { ReadableSource } from '../../io/readable-source'
import { readHead, readTail } from '../../io/readable-source'
import { FormatParser } from '../base-parser'

export type PdfEncFeatures = {
  pdf_encrypt_dict_present: boolean
  pdf_encrypt_filter: string | null
  /** '' when /Encrypt is present without an /EncryptMetadata flag. */
  pdf_encrypt_metadata: boolean | string | null
}

const TAIL_READ = 256 * 1024
const HEAD_READ = 1024 * 1024
const WINDOW_BEFORE = 2 * 1024
const WINDOW_AFTER = 8 * 1024

const FILTER_NAME = /\/Filter\s*\/([A-Za-z0-9]+)/
const ENCRYPT_METADATA = /\/EncryptMetadata\s+(true|false)/i

/**
 * Look for /Encrypt in `buf`; the filter and metadata flag are taken from a
 * window around its first occurrence, falling back to the whole buffer.
 * Returns null when there is no /Encrypt key.
 */
export function scanEncryptDictionary(buf: Buffer): PdfEncFeatures | null {
  const pos = buf.indexOf('/Encrypt')
  if (pos === -1) return null

  const text = buf.toString('latin1')
  const window = text.slice(Math.max(0, pos - WINDOW_BEFORE), Math.min(text.length, pos + WINDOW_AFTER))

  const filter = FILTER_NAME.exec(window) ?? FILTER_NAME.exec(text)
  const metadata = ENCRYPT_METADATA.exec(window) ?? ENCRYPT_METADATA.exec(text)

  return {
    pdf_encrypt_dict_present: true,
    pdf_encrypt_filter: filter ? filter[1] : null,
    pdf_encrypt_metadata: metadata ? metadata[1].toLowerCase() === 'true' : ''
  }
}

export class PdfEncParser extends FormatParser<PdfEncFeatures> {
  readonly name = 'PDF Encryption Parser'
  readonly family = 'pdf_enc'

  defaults(): PdfEncFeatures {
    return {
      pdf_encrypt_dict_present: false,
      pdf_encrypt_filter: '',
      pdf_encrypt_metadata: ''
    }
  }

  protected async inspect(source: ReadableSource): Promise<PdfEncFeatures> {
    const fromTail = scanEncryptDictionary(await readTail(source, TAIL_READ))
    if (fromTail) return fromTail

    const fromHead = scanEncryptDictionary(await readHead(source, HEAD_READ))
    if (fromHead) return fromHead

    return {
      pdf_encrypt_dict_present: false,
      pdf_encrypt_filter: null,
      pdf_encrypt_metadata: null
    }
  }
}
