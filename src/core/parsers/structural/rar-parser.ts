/**
 * RAR Parser
 *
 * RAR 1.5-4.x archives are a chain of blocks, each opened by a 7-byte header:
 *   [CRC:2] [TYPE:1] [FLAGS:2] [SIZE:2]   (little-endian)
 * With FLAGS bit 0x8000 (ADD_SIZE) a 4-byte length follows the fixed header
 * and the block spans SIZE + ADD_SIZE bytes.
 *
 * RAR 5 archives use variable-length integers throughout; only the first
 * header after the signature is checked for plausibility.
 */

import type { StructuralFlags } from '../../../shared/types'
import { RAR4_MAGIC, RAR5_MAGIC, hasBytesAt } from '../../../shared/constants/file-signatures'
import type { ReadableSource } from '../../io/readable-source'
import { FormatParser } from '../base-parser'

export type RarFeatures = StructuralFlags & {
  rar_header_ok: boolean
  rar_main_header_flags_ok: boolean
  rar_file_records_count: number
  rar_version_5: boolean
}

const BLOCK_HEADER_SIZE = 7

const BLOCK_MAIN = 0x73
const BLOCK_FILE = 0x74
const BLOCK_ENDARC = 0x7b

const FLAG_ADD_SIZE = 0x8000

const MAX_BLOCKS = 1_000_000

/** RAR 5 header types run from 1 (main) to 5 (end of archive). */
const RAR5_MAX_HEADER_TYPE = 5
const RAR5_MAX_HEADER_SIZE = 2 * 1024 * 1024

/**
 * Decode a RAR 5 vint (7 data bits per byte, high bit = continuation).
 * Returns null when the buffer ends first or the value exceeds 2^53.
 */
export function readVint(buf: Buffer, offset: number): { value: number; next: number } | null {
  let value = 0
  let multiplier = 1
  for (let i = offset; i < buf.length && i < offset + 10; i++) {
    value += (buf[i] & 0x7f) * multiplier
    if (!Number.isSafeInteger(value)) return null
    if ((buf[i] & 0x80) === 0) return { value, next: i + 1 }
    multiplier *= 128
  }
  return null
}

export class RarParser extends FormatParser<RarFeatures> {
  readonly name = 'RAR Parser'
  readonly family = 'rar'

  defaults(): RarFeatures {
    return {
      rar_header_ok: false,
      rar_main_header_flags_ok: false,
      rar_file_records_count: 0,
      rar_version_5: false,
      parser_ok: false,
      structure_consistent: false
    }
  }

  protected async inspect(source: ReadableSource): Promise<RarFeatures> {
    const head = await source.read(0, 16)
    if (hasBytesAt(head, 0, RAR5_MAGIC)) {
      return this.inspectV5(source)
    }
    if (hasBytesAt(head, 0, RAR4_MAGIC)) {
      return this.inspectV4(source)
    }
    return this.defaults()
  }

  private async inspectV4(source: ReadableSource): Promise<RarFeatures> {
    const size = source.size
    let pos = RAR4_MAGIC.length
    let blocks = 0
    let files = 0
    let headerOk = false
    let mainSeen = false

    while (pos + BLOCK_HEADER_SIZE <= size && blocks < MAX_BLOCKS) {
      blocks++
      const header = await source.read(pos, BLOCK_HEADER_SIZE + 4)
      if (header.length < BLOCK_HEADER_SIZE) break

      const type = header[2]
      const flags = header.readUInt16LE(3)
      const headSize = header.readUInt16LE(5)
      if (headSize < BLOCK_HEADER_SIZE) break

      let addSize = 0
      if (flags & FLAG_ADD_SIZE) {
        if (pos + BLOCK_HEADER_SIZE + 4 > size) break
        addSize = header.readUInt32LE(BLOCK_HEADER_SIZE)
      }

      // SIZE already covers the ADD_SIZE field itself; the block advance is
      // SIZE + ADD_SIZE exactly as archivers emit it.
      const total = headSize + addSize
      if (pos + total > size) break

      if (type === BLOCK_MAIN) mainSeen = true
      if (type === BLOCK_FILE) files++

      headerOk = true
      pos += total

      if (type === BLOCK_ENDARC) break
    }

    const parserOk = headerOk && mainSeen
    return {
      rar_header_ok: headerOk && mainSeen,
      rar_main_header_flags_ok: mainSeen,
      rar_file_records_count: files,
      rar_version_5: false,
      parser_ok: parserOk,
      structure_consistent: parserOk && files > 0
    }
  }

  private async inspectV5(source: ReadableSource): Promise<RarFeatures> {
    // After the signature: [CRC32:4] [header size: vint] [header type: vint] ...
    // Both fields are decoded as vints rather than as a fixed u32 size and
    // u8 type, so a short size vint does not shift the type byte; the
    // plausibility bounds are 1..5 for the type and 2 MiB for the size.
    const buf = await source.read(RAR5_MAGIC.length, 4 + 10 + 10)
    let plausible = false
    const headerSize = buf.length > 4 ? readVint(buf, 4) : null
    if (headerSize) {
      const headerType = readVint(buf, headerSize.next)
      plausible =
        headerType !== null &&
        headerType.value >= 1 &&
        headerType.value <= RAR5_MAX_HEADER_TYPE &&
        headerSize.value > 0 &&
        headerSize.value <= RAR5_MAX_HEADER_SIZE
    }

    return {
      rar_header_ok: true,
      rar_main_header_flags_ok: true,
      rar_file_records_count: 0,
      rar_version_5: true,
      parser_ok: true,
      structure_consistent: plausible
    }
  }
}
