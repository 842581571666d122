/**
 * JPEG Parser
 *
 * JPEG files are a sequence of marker segments:
 *   [0xFF] [marker] [2-byte BE length (includes itself)] [payload]
 *
 * The walk starts after SOI and stops at SOS, since everything that follows
 * is entropy-coded scan data. RSTn, TEM and a nested SOI carry no length
 * field; EOI ends the walk.
 */

import type { StructuralFlags } from '../../../shared/types'
import type { ReadableSource } from '../../io/readable-source'
import { readHead } from '../../io/readable-source'
import { FormatParser } from '../base-parser'

export type JpegFeatures = StructuralFlags & {
  jpeg_header_ok: boolean
  jpeg_sof_present: boolean
  jpeg_sos_present: boolean
  jpeg_exif_present: boolean
  jpeg_segments_count: number
}

const SOI = 0xd8
const EOI = 0xd9
const SOS = 0xda
const TEM = 0x01
const RST0 = 0xd0
const RST7 = 0xd7
const APP1 = 0xe1

/** Start-of-frame markers (baseline, progressive, lossless, arithmetic variants). */
const SOF_MARKERS: ReadonlySet<number> = new Set([
  0xc0, 0xc1, 0xc2, 0xc3,
  0xc5, 0xc6, 0xc7,
  0xc9, 0xca, 0xcb,
  0xcd, 0xce, 0xcf
])

const EXIF_ID = Buffer.from('Exif\x00\x00', 'latin1')

const MAX_STEPS = 200_000

/** Maximum JPEG bytes to scan (32 MB). */
const MAX_SCAN_SIZE = 32 * 1024 * 1024

export class JpegParser extends FormatParser<JpegFeatures> {
  readonly name = 'JPEG Parser'
  readonly family = 'jpeg'

  defaults(): JpegFeatures {
    return {
      jpeg_header_ok: false,
      jpeg_sof_present: false,
      jpeg_sos_present: false,
      jpeg_exif_present: false,
      jpeg_segments_count: 0,
      parser_ok: false,
      structure_consistent: false
    }
  }

  protected async inspect(source: ReadableSource): Promise<JpegFeatures> {
    const data = await readHead(source, MAX_SCAN_SIZE)
    if (data.length < 2 || data[0] !== 0xff || data[1] !== SOI) {
      return this.defaults()
    }

    const n = data.length
    let pos = 2
    let steps = 0
    let segments = 0
    let sof = false
    let sos = false
    let exif = false

    while (pos < n && steps < MAX_STEPS) {
      steps++

      if (data[pos] !== 0xff) {
        if (sos) break
        const next = data.indexOf(0xff, pos)
        if (next === -1) break
        pos = next
      }

      // Fill bytes
      while (pos < n && data[pos] === 0xff) pos++
      if (pos >= n) break

      const marker = data[pos]
      pos++

      if ((marker >= RST0 && marker <= RST7) || marker === TEM || marker === SOI) {
        segments++
        continue
      }
      if (marker === EOI) {
        segments++
        break
      }

      if (pos + 2 > n) break
      const length = data.readUInt16BE(pos)
      const payloadStart = pos + 2
      const segmentEnd = payloadStart + (length - 2)
      if (length < 2 || segmentEnd > n) break

      if (SOF_MARKERS.has(marker)) sof = true
      if (marker === SOS) sos = true
      if (
        marker === APP1 &&
        payloadStart + EXIF_ID.length <= n &&
        data.subarray(payloadStart, payloadStart + EXIF_ID.length).equals(EXIF_ID)
      ) {
        exif = true
      }

      segments++
      if (marker === SOS) break
      pos = segmentEnd
    }

    return {
      jpeg_header_ok: true,
      jpeg_sof_present: sof,
      jpeg_sos_present: sos,
      jpeg_exif_present: exif,
      jpeg_segments_count: segments,
      parser_ok: (sof || sos) && segments >= 3,
      structure_consistent: sof && sos && segments >= 4
    }
  }
}
