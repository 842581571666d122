/**
 * ZIP central-directory reader.
 *
 * Two views of the same structures:
 *  - {@link scanCentralDirectory} is lenient: it stops quietly at the first
 *    record that does not fit and reports what it saw. The ZIP structural
 *    parser builds its soundness features from it.
 *  - {@link listArchive} is strict: any malformed record throws, the way an
 *    archive library refuses to open a damaged file. The sniffer's OOXML
 *    probe, the OOXML parser and the ZIP encryption parser use it.
 */

import * as zlib from 'node:zlib'

import type { ReadableSource } from '../io/readable-source'
import { readTail } from '../io/readable-source'
import { ZIP_EMPTY_MAGIC } from '../../shared/constants/file-signatures'
import { ParseError } from '../parsers/base-parser'

export const EOCD_SIGNATURE = 0x06054b50
export const CDH_SIGNATURE = 0x02014b50
export const LFH_SIGNATURE = 0x04034b50

export const EOCD_SIZE = 22
export const CDH_FIXED_SIZE = 46
export const LFH_FIXED_SIZE = 30

/** The EOCD may be followed by a comment of up to 65535 bytes. */
export const MAX_EOCD_SEARCH = 0x10000 + EOCD_SIZE

export const FLAG_ENCRYPTED = 0x0001
export const FLAG_UTF8_NAMES = 0x0800

export const METHOD_STORED = 0
export const METHOD_DEFLATED = 8

/** Compressed bytes fed to the inflater when probing an entry's head. */
const MAX_PROBE_INPUT = 16 * 1024

// ─── End of central directory ─────────────────────────────────

export interface EndOfCentralDirectory {
  /** Absolute offset of the EOCD signature. */
  position: number
  entriesTotal: number
  cdSize: number
  cdOffset: number
  commentLength: number
}

/**
 * Reverse-scan the last 64 KiB + 22 bytes for the EOCD signature.
 * Returns null when it is absent or the record is cut short.
 */
export async function findEndOfCentralDirectory(
  source: ReadableSource
): Promise<EndOfCentralDirectory | null> {
  const search = Math.min(MAX_EOCD_SEARCH, source.size)
  const tail = await readTail(source, search)
  const idx = tail.lastIndexOf(ZIP_EMPTY_MAGIC)
  if (idx === -1) return null

  const position = source.size - search + idx
  const eocd = await source.read(position, EOCD_SIZE)
  if (eocd.length < EOCD_SIZE || eocd.readUInt32LE(0) !== EOCD_SIGNATURE) {
    return null
  }

  return {
    position,
    entriesTotal: eocd.readUInt16LE(10),
    cdSize: eocd.readUInt32LE(12),
    cdOffset: eocd.readUInt32LE(16),
    commentLength: eocd.readUInt16LE(20)
  }
}

// ─── Central directory records ────────────────────────────────

export interface CentralDirectoryEntry {
  /** Decoded name: UTF-8 when flag bit 11 is set, Latin-1 otherwise. */
  name: string
  rawName: Buffer
  flags: number
  method: number
  crc32: number
  compressedSize: number
  uncompressedSize: number
  extra: Buffer
  /** Absolute offset of the entry's local file header. */
  localHeaderOffset: number
}

function decodeName(raw: Buffer, flags: number): string {
  return raw.toString((flags & FLAG_UTF8_NAMES) !== 0 ? 'utf8' : 'latin1')
}

/**
 * Decode the record at `pos`. Returns null when the signature is wrong or
 * the variable-length fields run past the buffer.
 */
function decodeRecord(
  data: Buffer,
  pos: number,
  offsetShift: number
): { entry: CentralDirectoryEntry; next: number } | null {
  if (pos + CDH_FIXED_SIZE > data.length || data.readUInt32LE(pos) !== CDH_SIGNATURE) {
    return null
  }

  const flags = data.readUInt16LE(pos + 8)
  const nameLength = data.readUInt16LE(pos + 28)
  const extraLength = data.readUInt16LE(pos + 30)
  const commentLength = data.readUInt16LE(pos + 32)

  const nameStart = pos + CDH_FIXED_SIZE
  const extraStart = nameStart + nameLength
  const next = extraStart + extraLength + commentLength
  if (next > data.length) return null

  const rawName = data.subarray(nameStart, extraStart)
  return {
    entry: {
      name: decodeName(rawName, flags),
      rawName,
      flags,
      method: data.readUInt16LE(pos + 10),
      crc32: data.readUInt32LE(pos + 16),
      compressedSize: data.readUInt32LE(pos + 20),
      uncompressedSize: data.readUInt32LE(pos + 24),
      extra: data.subarray(extraStart, extraStart + extraLength),
      localHeaderOffset: data.readUInt32LE(pos + 42) + offsetShift
    },
    next
  }
}

export interface CentralDirectoryScan {
  entries: CentralDirectoryEntry[]
}

/**
 * Lenient walk over `cdSize` bytes at `cdOffset`. Stops at the first record
 * with a bad signature or a name running past the buffer, and once the
 * EOCD's declared entry count is reached (when non-zero).
 */
export async function scanCentralDirectory(
  source: ReadableSource,
  eocd: EndOfCentralDirectory
): Promise<CentralDirectoryScan> {
  const data = await source.read(eocd.cdOffset, eocd.cdSize)
  const entries: CentralDirectoryEntry[] = []
  let pos = 0

  while (pos + CDH_FIXED_SIZE <= data.length) {
    if (data.readUInt32LE(pos) !== CDH_SIGNATURE) break

    const nameLength = data.readUInt16LE(pos + 28)
    if (pos + CDH_FIXED_SIZE + nameLength > data.length) break

    // Extra and comment may be cut off at the directory end; the lenient
    // view still counts the record and clamps the slices.
    const flags = data.readUInt16LE(pos + 8)
    const extraLength = data.readUInt16LE(pos + 30)
    const commentLength = data.readUInt16LE(pos + 32)
    const nameStart = pos + CDH_FIXED_SIZE
    const extraStart = nameStart + nameLength
    const rawName = data.subarray(nameStart, extraStart)

    entries.push({
      name: decodeName(rawName, flags),
      rawName,
      flags,
      method: data.readUInt16LE(pos + 10),
      crc32: data.readUInt32LE(pos + 16),
      compressedSize: data.readUInt32LE(pos + 20),
      uncompressedSize: data.readUInt32LE(pos + 24),
      extra: data.subarray(extraStart, Math.min(data.length, extraStart + extraLength)),
      localHeaderOffset: data.readUInt32LE(pos + 42)
    })

    pos = extraStart + extraLength + commentLength
    if (eocd.entriesTotal !== 0 && entries.length >= eocd.entriesTotal) break
  }

  return { entries }
}

/**
 * Strictly list every entry of the archive.
 *
 * Leading data before the archive (self-extractor stubs, concatenation) is
 * tolerated: the central directory is located relative to the EOCD and all
 * recorded offsets are shifted by the difference.
 *
 * @throws {ParseError} When there is no EOCD, the directory does not fit,
 *   or any record is malformed.
 */
export async function listArchive(source: ReadableSource): Promise<CentralDirectoryEntry[]> {
  const eocd = await findEndOfCentralDirectory(source)
  if (!eocd) {
    throw new ParseError('End of central directory not found', 'BAD_SIGNATURE')
  }

  const cdStart = eocd.position - eocd.cdSize
  const shift = cdStart - eocd.cdOffset
  if (cdStart < 0 || shift < 0) {
    throw new ParseError('Central directory lies outside the file', 'MALFORMED')
  }

  const data = await source.read(cdStart, eocd.cdSize)
  if (data.length !== eocd.cdSize) {
    throw new ParseError('Central directory is truncated', 'TRUNCATED')
  }

  const entries: CentralDirectoryEntry[] = []
  let pos = 0
  while (pos < data.length) {
    const decoded = decodeRecord(data, pos, shift)
    if (!decoded) {
      throw new ParseError(`Bad central directory record at +${pos}`, 'MALFORMED')
    }
    entries.push(decoded.entry)
    pos = decoded.next
  }

  return entries
}

// ─── Entry helpers ────────────────────────────────────────────

export function isEntryEncrypted(entry: CentralDirectoryEntry): boolean {
  return (entry.flags & FLAG_ENCRYPTED) !== 0
}

/** Walk the `id:2 size:2 data` extra-field records looking for `headerId`. */
export function hasExtraField(extra: Buffer, headerId: number): boolean {
  let i = 0
  while (i + 4 <= extra.length) {
    const id = extra.readUInt16LE(i)
    const size = extra.readUInt16LE(i + 2)
    i += 4
    if (i + size > extra.length) break
    if (id === headerId) return true
    i += size
  }
  return false
}

/**
 * Read up to `maxBytes` of an entry's uncompressed content. Only stored and
 * deflated entries can be read; deflated input is capped and inflated with a
 * sync flush so a partial stream still yields its leading bytes.
 *
 * @throws {ParseError} For encrypted entries, unsupported methods, or a
 *   missing local header.
 */
export async function readEntryHead(
  source: ReadableSource,
  entry: CentralDirectoryEntry,
  maxBytes: number
): Promise<Buffer> {
  if (isEntryEncrypted(entry)) {
    throw new ParseError(`Entry "${entry.name}" is encrypted`, 'MALFORMED')
  }

  const header = await source.read(entry.localHeaderOffset, LFH_FIXED_SIZE)
  if (header.length < LFH_FIXED_SIZE || header.readUInt32LE(0) !== LFH_SIGNATURE) {
    throw new ParseError(`No local header for "${entry.name}"`, 'MALFORMED')
  }

  const dataStart =
    entry.localHeaderOffset + LFH_FIXED_SIZE + header.readUInt16LE(26) + header.readUInt16LE(28)

  switch (entry.method) {
    case METHOD_STORED:
      return source.read(dataStart, Math.min(maxBytes, entry.compressedSize))

    case METHOD_DEFLATED: {
      const input = await source.read(dataStart, Math.min(MAX_PROBE_INPUT, entry.compressedSize))
      try {
        const out = zlib.inflateRawSync(input, { finishFlush: zlib.constants.Z_SYNC_FLUSH })
        return out.subarray(0, maxBytes)
      } catch (err) {
        throw new ParseError(`Cannot inflate "${entry.name}"`, 'MALFORMED', err)
      }
    }

    default:
      throw new ParseError(
        `Unsupported compression method ${entry.method} for "${entry.name}"`,
        'MALFORMED'
      )
  }
}
