/**
 * GZIP Parser
 *
 * RFC 1952 member header:
 *   [ID1 ID2 CM] [FLG] [MTIME:4 LE] [XFL] [OS]
 * followed, depending on FLG, by FEXTRA (length-prefixed), FNAME and
 * FCOMMENT (NUL-terminated) and FHCRC (2 bytes).
 *
 * Only the header is inspected; the deflate payload is never decoded.
 * Soundness is tied to the base header alone, so a header cut off inside
 * an optional field still reports `parser_ok`.
 */

import type { StructuralFlags } from '../../../shared/types'
import { GZIP_MAGIC, hasBytesAt } from '../../../shared/constants/file-signatures'
import type { ReadableSource } from '../../io/readable-source'
import { readHead } from '../../io/readable-source'
import { FormatParser } from '../base-parser'

export type GzipFeatures = StructuralFlags & {
  gzip_header_ok: boolean
  gzip_mtime_present: boolean
  gzip_name_present: boolean
}

const BASE_HEADER_SIZE = 10
const MAX_READ = 64 * 1024

const FEXTRA = 0x04
const FNAME = 0x08

export class GzipParser extends FormatParser<GzipFeatures> {
  readonly name = 'GZIP Parser'
  readonly family = 'gzip'

  defaults(): GzipFeatures {
    return {
      gzip_header_ok: false,
      gzip_mtime_present: false,
      gzip_name_present: false,
      parser_ok: false,
      structure_consistent: false
    }
  }

  protected async inspect(source: ReadableSource): Promise<GzipFeatures> {
    const data = await readHead(source, MAX_READ)
    if (data.length < BASE_HEADER_SIZE) {
      return this.defaults()
    }

    const headerOk = hasBytesAt(data, 0, GZIP_MAGIC)
    const flags = data[3]
    const result: GzipFeatures = {
      gzip_header_ok: headerOk,
      gzip_mtime_present: data.readUInt32LE(4) !== 0,
      gzip_name_present: false,
      parser_ok: headerOk,
      structure_consistent: headerOk
    }

    const n = data.length
    let pos = BASE_HEADER_SIZE

    if (flags & FEXTRA) {
      if (pos + 2 > n) return result
      pos += 2 + data.readUInt16LE(pos)
      if (pos > n) return result
    }

    if (flags & FNAME) {
      const terminator = data.indexOf(0, pos)
      // The name counts only when its NUL terminator lies inside the window.
      result.gzip_name_present = terminator !== -1 && terminator > pos
    }

    // FCOMMENT and FHCRC follow but carry no features.
    return result
  }
}
