/**
 * PNG Parser
 *
 * PNG files are chunk-based. Each chunk has the structure:
 *   [4 bytes length] [4 bytes type] [length bytes data] [4 bytes CRC]
 *
 * Strategy:
 *   1. Validate the 8-byte PNG signature.
 *   2. The first chunk must be a 13-byte IHDR that fits in the file.
 *   3. Walk the remaining chunks by their 8-byte headers, counting IDAT,
 *      until IEND or a chunk that runs past end-of-file.
 */

import type { StructuralFlags } from '../../../shared/types'
import { PNG_MAGIC, hasBytesAt } from '../../../shared/constants/file-signatures'
import type { ReadableSource } from '../../io/readable-source'
import { FormatParser } from '../base-parser'

export type PngFeatures = StructuralFlags & {
  png_header_ok: boolean
  png_ihdr_ok: boolean
  png_chunks_count: number
  png_idat_count: number
  png_end_iend_ok: boolean
}

/** Signature plus one chunk header and CRC. */
const MIN_PNG_SIZE = 8 + 12

/** Length + type + CRC around every chunk's data. */
const CHUNK_OVERHEAD = 12

const IHDR_TYPE = 0x49484452 // 'IHDR'
const IDAT_TYPE = 0x49444154 // 'IDAT'
const IEND_TYPE = 0x49454e44 // 'IEND'

const IHDR_LENGTH = 13

const MAX_CHUNKS = 100_000

export class PngParser extends FormatParser<PngFeatures> {
  readonly name = 'PNG Parser'
  readonly family = 'png'

  defaults(): PngFeatures {
    return {
      png_header_ok: false,
      png_ihdr_ok: false,
      png_chunks_count: 0,
      png_idat_count: 0,
      png_end_iend_ok: false,
      parser_ok: false,
      structure_consistent: false
    }
  }

  protected async inspect(source: ReadableSource): Promise<PngFeatures> {
    const n = source.size
    const head = await source.read(0, 16)
    if (n < MIN_PNG_SIZE || !hasBytesAt(head, 0, PNG_MAGIC)) {
      return this.defaults()
    }

    // First chunk: counted whatever its type.
    const ihdrLength = head.readUInt32BE(8)
    const ihdrOk =
      head.readUInt32BE(12) === IHDR_TYPE &&
      ihdrLength === IHDR_LENGTH &&
      8 + CHUNK_OVERHEAD + ihdrLength <= n
    let pos = 8 + CHUNK_OVERHEAD + ihdrLength
    let chunks = 1
    let idat = 0
    let iend = false
    let steps = 0

    while (pos + 8 <= n && steps < MAX_CHUNKS) {
      steps++
      const header = await source.read(pos, 8)
      if (header.length < 8) break

      const length = header.readUInt32BE(0)
      const type = header.readUInt32BE(4)
      const next = pos + CHUNK_OVERHEAD + length
      if (next > n) break

      chunks++
      if (type === IDAT_TYPE) {
        idat++
      } else if (type === IEND_TYPE) {
        iend = true
        break
      }
      pos = next
    }

    const parserOk = ihdrOk && chunks >= 2
    return {
      png_header_ok: true,
      png_ihdr_ok: ihdrOk,
      png_chunks_count: chunks,
      png_idat_count: idat,
      png_end_iend_ok: iend,
      parser_ok: parserOk,
      structure_consistent: parserOk && idat >= 1 && iend
    }
  }
}
