/**
 * ZIP encryption-marker parser.
 *
 * Bit 0 of an entry's general-purpose flags marks it encrypted. WinZip AES
 * entries additionally carry an extra field with header id 0x9901; anything
 * else encrypted is treated as traditional PKWARE (ZipCrypto) encryption.
 */

import type { ReadableSource } from '../../io/readable-source'
import { hasExtraField, isEntryEncrypted, listArchive } from '../../formats/zip-archive'
import type { CentralDirectoryEntry } from '../../formats/zip-archive'
import { FormatParser } from '../base-parser'

export type ZipEncFeatures = {
  zip_any_entry_encrypted: boolean
  zip_encryption_method: string | null
  zip_all_headers_encrypted: boolean
}

export type ZipEncryptionMethod = 'AES' | 'ZipCrypto' | 'Mixed'

const AES_EXTRA_ID = 0x9901

export function entryEncryptionMethod(entry: CentralDirectoryEntry): 'AES' | 'ZipCrypto' | null {
  if (!isEntryEncrypted(entry)) return null
  return hasExtraField(entry.extra, AES_EXTRA_ID) ? 'AES' : 'ZipCrypto'
}

export class ZipEncParser extends FormatParser<ZipEncFeatures> {
  readonly name = 'ZIP Encryption Parser'
  readonly family = 'zip_enc'

  defaults(): ZipEncFeatures {
    return {
      zip_any_entry_encrypted: false,
      zip_encryption_method: '',
      zip_all_headers_encrypted: false
    }
  }

  protected async inspect(source: ReadableSource): Promise<ZipEncFeatures> {
    const entries = await listArchive(source)
    if (entries.length === 0) {
      return this.defaults()
    }

    const methods = new Set<ZipEncryptionMethod>()
    let any = false
    let all = true
    for (const entry of entries) {
      const encrypted = isEntryEncrypted(entry)
      any = any || encrypted
      all = all && encrypted
      const method = entryEncryptionMethod(entry)
      if (method) methods.add(method)
    }

    if (!any) {
      return {
        zip_any_entry_encrypted: false,
        zip_encryption_method: null,
        zip_all_headers_encrypted: false
      }
    }

    let method: ZipEncryptionMethod = 'ZipCrypto'
    if (methods.size === 1) {
      const [only] = methods
      method = only
    } else if (methods.size > 1) {
      method = 'Mixed'
    }

    return {
      zip_any_entry_encrypted: true,
      zip_encryption_method: method,
      zip_all_headers_encrypted: all
    }
  }
}
