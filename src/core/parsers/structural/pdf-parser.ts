/**
 * PDF Parser
 *
 * A PDF is read from both ends: the header comment `%PDF-x.y` at the start,
 * and at the end a `startxref` pointer to the cross-reference section, which
 * is either a classical `xref` table followed by a `trailer` dictionary or a
 * cross-reference stream object (`/Type /XRef`).
 *
 * Strategy:
 *   1. Read the version from the head window.
 *   2. Reverse-search the tail for `startxref` and read its offset.
 *   3. Look at the bytes around that offset for an xref table or stream.
 *   4. Check the tail for /Root and /ID trailer keys.
 *   5. Estimate the object count from the declared xref size, or by counting
 *      `N 0 obj` tokens in bounded head and tail windows.
 */

import type { StructuralFlags } from '../../../shared/types'
import { PDF_MAGIC, hasBytesAt } from '../../../shared/constants/file-signatures'
import type { ReadableSource } from '../../io/readable-source'
import { readHead, readTail } from '../../io/readable-source'
import { FormatParser } from '../base-parser'

export type PdfFeatures = StructuralFlags & {
  pdf_version: number | null
  pdf_has_trailer: boolean
  pdf_startxref_found: boolean
  pdf_xref_ok: boolean
  pdf_ids_present: boolean
  pdf_root_present: boolean
  pdf_trailer_ok: boolean
  /** log1p of the estimated object count. */
  pdf_obj_count_est: number
}

const HEAD_READ = 64 * 1024
const TAIL_READ = 128 * 1024
const STARTXREF_SCAN = 256 * 1024

/** Bytes read around the xref offset (starting 16 bytes before it). */
const XREF_WINDOW = 4096
const XREF_LEAD = 16

/** Token scan window bounds, in KiB. */
const MIN_SCAN_KIB = 512
const MAX_SCAN_KIB = 4096

const STARTXREF = 'startxref'

// PDF whitespace without NUL, matching the token scan of typical writers.
const WS = '[ \\t\\n\\r\\f\\v]'
const OBJ_TOKEN = new RegExp(`\\d+${WS}+0${WS}+obj`, 'g')
const XREF_STREAM_SIZE = /\/Size\s+(\d+)/

interface XrefProbe {
  ok: boolean
  trailerKeyword: boolean
  declaredSize: number | null
}

export function parsePdfVersion(head: Buffer): number | null {
  if (!hasBytesAt(head, 0, PDF_MAGIC)) return null

  let digits = ''
  for (const byte of head.subarray(5, 8)) {
    if (byte >= 0x80) continue
    const ch = String.fromCharCode(byte)
    if ((ch >= '0' && ch <= '9') || ch === '.') {
      digits += ch
    } else {
      break
    }
  }

  const version = digits === '' ? NaN : Number(digits)
  return Number.isFinite(version) && version !== 0 ? version : null
}

/**
 * Sum the entry counts of a classical xref table's subsections.
 * `text` starts at the `xref` keyword; parsing stops at `trailer`, at the
 * first token that does not fit the table grammar, or at the window end.
 */
export function classicXrefSize(text: string): number | null {
  const tokens = text.slice(4).split(/\s+/).filter(t => t.length > 0)
  let total = 0
  let subsections = 0
  let i = 0

  while (i + 1 < tokens.length) {
    const [first, second] = [tokens[i], tokens[i + 1]]
    if (!/^\d+$/.test(first) || !/^\d+$/.test(second)) break

    const count = Number(second)
    total += count
    subsections++
    i += 2

    // Entries are "offset generation n|f"; the window may end inside them.
    for (let e = 0; e < count && i + 2 < tokens.length; e++) {
      if (!/^\d+$/.test(tokens[i]) || !/^[nf]$/.test(tokens[i + 2])) return total
      i += 3
    }
  }

  return subsections > 0 ? total : null
}

export class PdfParser extends FormatParser<PdfFeatures> {
  readonly name = 'PDF Parser'
  readonly family = 'pdf'

  defaults(): PdfFeatures {
    return {
      pdf_version: null,
      pdf_has_trailer: false,
      pdf_startxref_found: false,
      pdf_xref_ok: false,
      pdf_ids_present: false,
      pdf_root_present: false,
      pdf_trailer_ok: false,
      pdf_obj_count_est: 0,
      parser_ok: false,
      structure_consistent: false
    }
  }

  protected async inspect(source: ReadableSource): Promise<PdfFeatures> {
    const head = await readHead(source, HEAD_READ)
    const tail = await readTail(source, TAIL_READ)

    const version = parsePdfVersion(head)
    const { found: startxrefFound, offset } = await this.findStartxref(source)

    let xref: XrefProbe = { ok: false, trailerKeyword: false, declaredSize: null }
    if (startxrefFound && offset !== null) {
      xref = await this.probeXref(source, offset)
    }

    const rootPresent = tail.includes('/Root')
    const idsPresent = tail.includes('/ID')
    const trailerOk = startxrefFound && xref.ok && (xref.trailerKeyword || rootPresent)

    const objCount =
      xref.ok && xref.declaredSize !== null && xref.declaredSize > 0
        ? xref.declaredSize
        : await this.countObjectTokens(source)

    const parserOk = (xref.trailerKeyword && startxrefFound) || xref.ok || trailerOk
    return {
      pdf_version: version,
      pdf_has_trailer: xref.trailerKeyword,
      pdf_startxref_found: startxrefFound,
      pdf_xref_ok: xref.ok,
      pdf_ids_present: idsPresent,
      pdf_root_present: rootPresent,
      pdf_trailer_ok: trailerOk,
      pdf_obj_count_est: Math.log1p(objCount),
      parser_ok: parserOk,
      structure_consistent:
        parserOk &&
        ((xref.ok && trailerOk && rootPresent) || (trailerOk && rootPresent && idsPresent))
    }
  }

  /** Last `startxref` in the final 256 KiB and the first digit run after it. */
  private async findStartxref(
    source: ReadableSource
  ): Promise<{ found: boolean; offset: number | null }> {
    const window = await readTail(source, STARTXREF_SCAN)
    const idx = window.lastIndexOf(STARTXREF)
    if (idx === -1) {
      return { found: false, offset: null }
    }

    const after = window
      .subarray(idx + STARTXREF.length, idx + STARTXREF.length + 64)
      .toString('latin1')
    const digits = /\d+/.exec(after)
    return { found: true, offset: digits ? Number(digits[0]) : null }
  }

  private async probeXref(source: ReadableSource, offset: number): Promise<XrefProbe> {
    const buf = await source.read(Math.max(0, offset - XREF_LEAD), XREF_WINDOW)
    if (buf.length === 0) {
      return { ok: false, trailerKeyword: false, declaredSize: null }
    }

    const text = buf.toString('latin1')
    const classic = text.slice(0, 128).includes('xref')
    const stream = text.includes('/Type') && text.includes('/XRef')
    const trailerKeyword = text.includes('trailer')

    let declaredSize: number | null = null
    if (classic) {
      declaredSize = classicXrefSize(text.slice(text.indexOf('xref')))
    } else if (stream) {
      const m = XREF_STREAM_SIZE.exec(text)
      declaredSize = m ? Number(m[1]) : null
    }

    return { ok: classic || stream, trailerKeyword, declaredSize }
  }

  /** Count `N 0 obj` tokens over a head window and a non-overlapping tail window. */
  private async countObjectTokens(source: ReadableSource): Promise<number> {
    const total = source.size
    const capKib = Math.max(MIN_SCAN_KIB, Math.min(MAX_SCAN_KIB, Math.floor(total / 4096)))
    const cap = capKib * 1024

    const headN = Math.min(cap, total)
    const tailN = Math.min(cap, Math.max(0, total - headN))

    const headBuf = await source.read(0, headN)
    const tailBuf = tailN > 0 ? await source.read(total - tailN, tailN) : Buffer.alloc(0)

    const combined = `${headBuf.toString('latin1')}\n${tailBuf.toString('latin1')}`
    return combined.match(OBJ_TOKEN)?.length ?? 0
  }
}
