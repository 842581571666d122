/**
 * ZIP Parser
 *
 * ZIP archives are read from the end:
 *   [local headers + data ...] [central directory] [EOCD (+ comment)]
 *
 * The EOCD locates the central directory; its records are walked up to the
 * declared entry count. Local headers are not visited.
 */

import type { StructuralFlags } from '../../../shared/types'
import type { ReadableSource } from '../../io/readable-source'
import {
  CDH_SIGNATURE,
  FLAG_UTF8_NAMES,
  findEndOfCentralDirectory,
  scanCentralDirectory
} from '../../formats/zip-archive'
import { FormatParser } from '../base-parser'

export type ZipFeatures = StructuralFlags & {
  zip_central_dir_ok: boolean
  zip_cd_offset_ok: boolean
  zip_entry_count: number
  zip_has_content_types: boolean
  zip_comment_len: number
  zip_names_utf8_fraction: number
  zip_crc_present_fraction: number
}

export const CONTENT_TYPES_NAME = '[Content_Types].xml'

/** Share of entries with a non-zero CRC for the archive to count as consistent. */
const MIN_CRC_FRACTION = 0.65

function round6(x: number): number {
  return Math.round(x * 1e6) / 1e6
}

export class ZipParser extends FormatParser<ZipFeatures> {
  readonly name = 'ZIP Parser'
  readonly family = 'zip'

  defaults(): ZipFeatures {
    return {
      zip_central_dir_ok: false,
      zip_cd_offset_ok: false,
      zip_entry_count: 0,
      zip_has_content_types: false,
      zip_comment_len: 0,
      zip_names_utf8_fraction: 0,
      zip_crc_present_fraction: 0,
      parser_ok: false,
      structure_consistent: false
    }
  }

  protected async inspect(source: ReadableSource): Promise<ZipFeatures> {
    const eocd = await findEndOfCentralDirectory(source)
    if (!eocd) {
      return this.defaults()
    }

    const sig = await source.read(eocd.cdOffset, 4)
    const cdOffsetOk =
      eocd.cdOffset + eocd.cdSize <= source.size &&
      sig.length === 4 &&
      sig.readUInt32LE(0) === CDH_SIGNATURE

    const { entries } = await scanCentralDirectory(source, eocd)
    const count = entries.length
    const utf8 = entries.filter(e => (e.flags & FLAG_UTF8_NAMES) !== 0).length
    const withCrc = entries.filter(e => e.crc32 !== 0).length
    const hasContentTypes = entries.some(e => e.rawName.toString('latin1') === CONTENT_TYPES_NAME)

    const centralDirOk =
      (eocd.entriesTotal === 0 && count === 0) || count === eocd.entriesTotal
    const crcFraction = count > 0 ? round6(withCrc / count) : 0
    const parserOk = centralDirOk && cdOffsetOk && count >= 1

    return {
      zip_central_dir_ok: centralDirOk,
      zip_cd_offset_ok: cdOffsetOk,
      zip_entry_count: count,
      zip_has_content_types: hasContentTypes,
      zip_comment_len: eocd.commentLength,
      zip_names_utf8_fraction: count > 0 ? round6(utf8 / count) : 0,
      zip_crc_present_fraction: crcFraction,
      parser_ok: parserOk,
      structure_consistent: parserOk && crcFraction >= MIN_CRC_FRACTION
    }
  }
}
