/**
 * OLE2 encryption-marker parser.
 *
 * Two kinds of legitimate encryption live inside compound files:
 *  - OOXML documents encrypted by Office are wrapped in a CFB container with
 *    `EncryptionInfo` and `EncryptedPackage` streams. The EncryptionInfo head
 *    tells Agile (XML descriptor with the 2006 encryption namespace),
 *    Extensible (other XML) and Standard (binary) apart.
 *  - Legacy binary documents using RC4 / CryptoAPI leave a BIFF FILEPASS
 *    record in the Excel workbook, an encryption atom in PowerPoint, and a
 *    CSP name string in the stream.
 *
 * Only the first 16 KiB of each stream is probed.
 */

import type { ReadableSource } from '../../io/readable-source'
import { CompoundFile } from '../../formats/compound-file'
import { FormatParser } from '../base-parser'

export type Ole2EncFeatures = {
  encrypted_package_present: boolean
  ooxml_encryption_info_present: boolean
  ooxml_encryption_type: string | null
  ole_crypto_provider: string | null
  ole_rc4_meta_present: boolean
  ole_rc4_triplet_present: boolean
}

export type OoxmlEncryptionType = 'Agile' | 'Extensible' | 'Standard' | 'Unknown'

const PROBE_LEN = 16 * 1024

const PROVIDER_HINTS: readonly string[] = [
  'Microsoft Enhanced Cryptographic Provider',
  'Microsoft Base Cryptographic Provider',
  'Microsoft Strong Cryptographic Provider',
  'Microsoft Enhanced RSA and AES Cryptographic Provider'
]

const PROVIDER_PATTERN = /Microsoft[^\x00\r\n]{0,64}Cryptographic Provider[^\x00\r\n]{0,32}/
const PROVIDER_PATTERN_WIDE = /Microsoft.{0,64}Cryptographic Provider.{0,32}/

const AGILE_MARKERS: readonly string[] = [
  'http://schemas.microsoft.com/office/2006/encryption',
  'http://schemas.microsoft.com/office/2006/keyEncryptor/password',
  'keyData'
]

/** BIFF FILEPASS record id (0x002F, little-endian). */
const BIFF_FILEPASS = Buffer.from([0x2f, 0x00])

/** Salt + verifier + verifier hash, 16 bytes each. */
const RC4_TRIPLET_SIZE = 48
const LENGTH_16_LE = Buffer.from([0x10, 0x00, 0x00, 0x00])
const TRIPLET_SCAN_LIMIT = 8192

/** EncryptionInfo starts with a major/minor version pair before its payload. */
const ENCRYPTION_INFO_VERSION_SIZE = 8

const TRIPLET_STREAMS = ['WordDocument', 'Workbook', 'Book', 'PowerPoint Document'] as const

function asciiOnly(s: string): string {
  return s.replace(/[^\x00-\x7f]/g, '')
}

function classifyXml(blob: Buffer): OoxmlEncryptionType | null {
  const text = blob.toString('latin1').replace(/^[ \t\n\r\v\f]+/, '')
  if (!text.startsWith('<')) return null
  if (text.includes('<encryption') && AGILE_MARKERS.some(m => text.includes(m))) {
    return 'Agile'
  }
  return 'Extensible'
}

/**
 * Classify an EncryptionInfo head. XML descriptors are recognized either at
 * the very start or after the version header (versions 4.4 and x.3).
 */
export function detectEncryptionType(blob: Buffer): OoxmlEncryptionType | null {
  if (blob.length === 0) return null

  const direct = classifyXml(blob)
  if (direct) return direct

  if (blob.length > ENCRYPTION_INFO_VERSION_SIZE) {
    const major = blob.readUInt16LE(0)
    const minor = blob.readUInt16LE(2)
    const xmlVersion = (major === 4 && minor === 4) || ((major === 3 || major === 4) && minor === 3)
    if (xmlVersion) {
      const payload = classifyXml(blob.subarray(ENCRYPTION_INFO_VERSION_SIZE))
      if (payload) return payload
    }
  }

  return 'Standard'
}

/** Find a CryptoAPI provider name, ASCII or UTF-16LE. */
export function detectProvider(blob: Buffer): string | null {
  if (blob.length === 0) return null

  for (const hint of PROVIDER_HINTS) {
    if (blob.includes(hint, 0, 'latin1')) return hint
  }
  for (const hint of PROVIDER_HINTS) {
    if (blob.includes(hint, 0, 'utf16le')) return hint
  }

  const narrow = PROVIDER_PATTERN.exec(blob.toString('latin1'))
  if (narrow) return asciiOnly(narrow[0])

  const wide = PROVIDER_PATTERN_WIDE.exec(blob.toString('utf16le'))
  return wide ? wide[0] : null
}

export function hasBiffFilepass(blob: Buffer): boolean {
  return blob.length >= 4 && blob.includes(BIFF_FILEPASS)
}

export function hasPowerPointEncryptionMarker(blob: Buffer): boolean {
  if (blob.length === 0) return false
  if (blob.includes('Encryption', 0, 'latin1')) return true
  // "DocumentEncryption" contains "Encryption", so one test per encoding suffices.
  return blob.toString('utf16le').includes('Encryption')
}

/**
 * Heuristic for an RC4 salt/verifier/verifier-hash block: three 16-byte
 * length-prefixed fields in a row, or room for a bare 48-byte block past
 * the stream start.
 */
export function hasRc4Triplet(blob: Buffer): boolean {
  const stride = LENGTH_16_LE.length + 16
  const limit = Math.min(blob.length - 3 * stride, TRIPLET_SCAN_LIMIT)
  for (let i = 0; i < limit; i++) {
    if (
      blob.subarray(i, i + 4).equals(LENGTH_16_LE) &&
      blob.subarray(i + stride, i + stride + 4).equals(LENGTH_16_LE) &&
      blob.subarray(i + 2 * stride, i + 2 * stride + 4).equals(LENGTH_16_LE)
    ) {
      return true
    }
  }
  return blob.length > RC4_TRIPLET_SIZE
}

export class Ole2EncParser extends FormatParser<Ole2EncFeatures> {
  readonly name = 'OLE2 Encryption Parser'
  readonly family = 'ole2_enc'

  defaults(): Ole2EncFeatures {
    return {
      encrypted_package_present: false,
      ooxml_encryption_info_present: false,
      ooxml_encryption_type: '',
      ole_crypto_provider: '',
      ole_rc4_meta_present: false,
      ole_rc4_triplet_present: false
    }
  }

  protected async inspect(source: ReadableSource): Promise<Ole2EncFeatures> {
    const cfb = await CompoundFile.open(source)

    const probe = async (suffix: string): Promise<Buffer | null> => {
      const stream = cfb.findStream(suffix)
      return stream ? cfb.readStream(stream.entry, PROBE_LEN) : null
    }

    const encryptedPackage = cfb.findStream('EncryptedPackage') !== undefined
    const encryptionInfo = await probe('EncryptionInfo')

    let encType: string | null = null
    if (encryptionInfo) {
      encType = detectEncryptionType(encryptionInfo) ?? 'Unknown'
    }
    if (encType === null && encryptedPackage) {
      encType = 'Unknown'
    }

    let rc4Meta = false
    let provider: string | null = null

    for (const name of ['Workbook', 'Book']) {
      const blob = await probe(name)
      if (blob && hasBiffFilepass(blob)) {
        rc4Meta = true
        provider = detectProvider(blob) ?? provider
        break
      }
    }

    if (!rc4Meta) {
      const blob = await probe('PowerPoint Document')
      if (blob && hasPowerPointEncryptionMarker(blob)) {
        rc4Meta = true
        provider = detectProvider(blob) ?? provider
      }
    }

    if (!rc4Meta) {
      const blob = await probe('WordDocument')
      const found = blob ? detectProvider(blob) : null
      if (found) {
        provider = found
        rc4Meta = true
      }
    }

    let triplet = false
    for (const name of TRIPLET_STREAMS) {
      const blob = await probe(name)
      if (blob && hasRc4Triplet(blob)) {
        triplet = true
        break
      }
    }

    return {
      encrypted_package_present: encryptedPackage,
      ooxml_encryption_info_present: encryptionInfo !== null,
      ooxml_encryption_type: encType,
      ole_crypto_provider: provider,
      ole_rc4_meta_present: rc4Meta,
      ole_rc4_triplet_present: triplet
    }
  }
}
