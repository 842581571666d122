/**
 * MP4 / ISO Base Media Parser
 *
 * ISO BMFF is a tree of boxes:
 *   [4 bytes size (BE)] [4 bytes type] [payload]
 *
 * size == 1 means a 64-bit largesize follows the type (16-byte header);
 * size == 0 means the box extends to the end of its container.
 *
 * The top-level box list and the children of `moov` must tile their range:
 * a box shorter than its own header or reaching past its container ends the
 * walk and marks the tree invalid. Fewer than 8 trailing bytes are tolerated.
 */

import type { StructuralFlags } from '../../../shared/types'
import type { ReadableSource } from '../../io/readable-source'
import { FormatParser } from '../base-parser'

export type Mp4Features = StructuralFlags & {
  mp4_ftyp_present: boolean
  mp4_moov_present: boolean
  mp4_mdat_present: boolean
  mp4_brand: string
  mp4_box_tree_ok: boolean
}

export interface BoxHeader {
  type: string
  start: number
  size: number
  headerSize: number
}

const MAX_STEPS = 1_000_000

/** Decode a four-character code, dropping bytes outside 7-bit ASCII. */
function fourcc(buf: Buffer, offset: number): string {
  let out = ''
  for (let i = offset; i < offset + 4 && i < buf.length; i++) {
    if (buf[i] < 0x80) out += String.fromCharCode(buf[i])
  }
  return out
}

/**
 * Visit the boxes tiling `[start, end)` in order.
 *
 * @returns false if a box header is invalid or the step cap is exceeded.
 */
export async function walkBoxes(
  source: ReadableSource,
  start: number,
  end: number,
  visit: (box: BoxHeader) => Promise<void> | void
): Promise<boolean> {
  let pos = start
  let steps = 0

  while (pos + 8 <= end) {
    if (++steps > MAX_STEPS) return false

    const head = await source.read(pos, Math.min(16, end - pos))
    if (head.length < 8) return false

    const size32 = head.readUInt32BE(0)
    let headerSize = 8
    let size: number

    if (size32 === 1) {
      if (head.length < 16) return false
      const large = head.readBigUInt64BE(8)
      if (large < 16n || large > BigInt(Number.MAX_SAFE_INTEGER)) return false
      size = Number(large)
      headerSize = 16
    } else if (size32 === 0) {
      size = end - pos
    } else {
      size = size32
    }

    if (size < headerSize || pos + size > end) return false

    await visit({ type: fourcc(head, 4), start: pos, size, headerSize })
    pos += size
  }

  return true
}

export class Mp4Parser extends FormatParser<Mp4Features> {
  readonly name = 'MP4 Parser'
  readonly family = 'mp4'

  defaults(): Mp4Features {
    return {
      mp4_ftyp_present: false,
      mp4_moov_present: false,
      mp4_mdat_present: false,
      mp4_brand: '',
      mp4_box_tree_ok: false,
      parser_ok: false,
      structure_consistent: false
    }
  }

  protected async inspect(source: ReadableSource): Promise<Mp4Features> {
    if (source.size < 8) {
      return this.defaults()
    }

    let ftyp = false
    let moov = false
    let mdat = false
    let brand = ''
    let nestedOk = true

    const topLevelOk = await walkBoxes(source, 0, source.size, async (box) => {
      switch (box.type) {
        case 'ftyp': {
          ftyp = true
          const major = await source.read(box.start + box.headerSize, 4)
          if (major.length >= 4) brand = fourcc(major, 0)
          break
        }
        case 'moov': {
          moov = true
          const ok = await walkBoxes(source, box.start + box.headerSize, box.start + box.size, () => {})
          nestedOk = nestedOk && ok
          break
        }
        case 'mdat':
          mdat = true
          break
      }
    })

    const treeOk = topLevelOk && nestedOk
    return {
      mp4_ftyp_present: ftyp,
      mp4_moov_present: moov,
      mp4_mdat_present: mdat,
      mp4_brand: brand,
      mp4_box_tree_ok: treeOk,
      parser_ok: ftyp && treeOk && (moov || mdat),
      structure_consistent: ftyp && treeOk && moov && mdat
    }
  }
}
