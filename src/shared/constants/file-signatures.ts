import type { FormatFamily, MagicOnlyFamily } from '../types'

export interface FileSignature<F extends string = string> {
  family: F
  displayName: string
  /** Returns true when the head window carries this format's magic. */
  matches: (head: Buffer) => boolean
}

// Helper to create a Buffer from hex string
function hex(s: string): Buffer {
  return Buffer.from(s.replace(/\s+/g, ''), 'hex')
}

function ascii(s: string): Buffer {
  return Buffer.from(s, 'latin1')
}

/** True when `buf` holds `magic` at `offset`. */
export function hasBytesAt(buf: Buffer, offset: number, magic: Buffer): boolean {
  if (offset < 0 || offset + magic.length > buf.length) return false
  return buf.subarray(offset, offset + magic.length).equals(magic)
}

function startsWithAny(...magics: Buffer[]): (head: Buffer) => boolean {
  return (head) => magics.some(m => hasBytesAt(head, 0, m))
}

export const PDF_MAGIC = ascii('%PDF-')
export const PNG_MAGIC = hex('89 50 4E 47 0D 0A 1A 0A')
export const JPEG_MAGIC = hex('FF D8 FF')
export const GZIP_MAGIC = hex('1F 8B 08')
export const CFB_MAGIC = hex('D0 CF 11 E0 A1 B1 1A E1')
export const RAR4_MAGIC = hex('52 61 72 21 1A 07 00')
export const RAR5_MAGIC = hex('52 61 72 21 1A 07 01 00')
export const ZIP_LOCAL_MAGIC = hex('50 4B 03 04')
export const ZIP_EMPTY_MAGIC = hex('50 4B 05 06')
export const ZIP_SPANNED_MAGIC = hex('50 4B 07 08')

// ─── Families with a structural parser (priority order) ───────

export const PARSER_SIGNATURES: readonly FileSignature<FormatFamily>[] = [
  { family: 'pdf', displayName: 'PDF Document', matches: startsWithAny(PDF_MAGIC) },
  { family: 'png', displayName: 'PNG Image', matches: startsWithAny(PNG_MAGIC) },
  { family: 'jpeg', displayName: 'JPEG Image', matches: startsWithAny(JPEG_MAGIC) },
  { family: 'gzip', displayName: 'GZIP Stream', matches: startsWithAny(GZIP_MAGIC) },
  { family: 'ole2', displayName: 'Compound File (OLE2)', matches: startsWithAny(CFB_MAGIC) },
  { family: 'rar', displayName: 'RAR Archive', matches: startsWithAny(RAR4_MAGIC, RAR5_MAGIC) },
  {
    family: 'mp4',
    displayName: 'ISO Base Media (MP4)',
    // ftyp box at offset 4; the box header plus major brand needs 12 bytes
    matches: (head) => head.length >= 12 && hasBytesAt(head, 4, ascii('ftyp'))
  },
  {
    family: 'zip',
    displayName: 'ZIP Archive',
    matches: startsWithAny(ZIP_LOCAL_MAGIC, ZIP_EMPTY_MAGIC, ZIP_SPANNED_MAGIC)
  }
]

// ─── Known magic without a parser (diagnostic only) ───────────

/** Offset of the "ustar" magic inside a TAR header block. */
export const TAR_MAGIC_OFFSET = 257
export const TAR_MIN_LENGTH = 265

export function isTar(blob: Buffer): boolean {
  return (
    blob.length >= TAR_MIN_LENGTH &&
    (hasBytesAt(blob, TAR_MAGIC_OFFSET, ascii('ustar\x00')) ||
      hasBytesAt(blob, TAR_MAGIC_OFFSET, ascii('ustar ')))
  )
}

export const MAGIC_ONLY_SIGNATURES: readonly FileSignature<MagicOnlyFamily>[] = [
  { family: 'gif', displayName: 'GIF Image', matches: startsWithAny(ascii('GIF87a'), ascii('GIF89a')) },
  {
    family: 'webp',
    displayName: 'WebP Image',
    matches: (head) => hasBytesAt(head, 0, ascii('RIFF')) && hasBytesAt(head, 8, ascii('WEBP'))
  },
  {
    family: 'mp3',
    displayName: 'MP3 Audio',
    // ID3 tag, or a bare MPEG audio frame sync (11 set bits)
    matches: (head) =>
      hasBytesAt(head, 0, ascii('ID3')) ||
      (head.length >= 2 && head[0] === 0xff && (head[1] & 0xe0) === 0xe0)
  },
  {
    family: 'wav',
    displayName: 'WAVE Audio',
    matches: (head) => hasBytesAt(head, 0, ascii('RIFF')) && hasBytesAt(head, 8, ascii('WAVE'))
  },
  { family: 'flac', displayName: 'FLAC Audio', matches: startsWithAny(ascii('fLaC')) },
  { family: 'bzip2', displayName: 'BZIP2 Stream', matches: startsWithAny(ascii('BZh')) },
  { family: 'lz4', displayName: 'LZ4 Frame', matches: startsWithAny(hex('04 22 4D 18')) },
  { family: 'zstd', displayName: 'Zstandard Frame', matches: startsWithAny(hex('28 B5 2F FD')) },
  { family: 'sqlite', displayName: 'SQLite Database', matches: startsWithAny(ascii('SQLite format 3\x00')) },
  // TAR is matched by the sniffer against head (+tail) rather than head alone.
  { family: 'tar', displayName: 'TAR Archive', matches: isTar },
  { family: 'pe', displayName: 'PE Executable', matches: startsWithAny(ascii('MZ')) },
  { family: 'elf', displayName: 'ELF Executable', matches: startsWithAny(hex('7F 45 4C 46')) },
  { family: '7z', displayName: '7-Zip Archive', matches: startsWithAny(hex('37 7A BC AF 27 1C')) }
]

/** Default sniffer head/tail window (16 KiB). */
export const DEFAULT_SNIFF_WINDOW = 16 * 1024

/** Read chunk size for the byte-statistics pass (64 KiB). */
export const STATS_CHUNK_SIZE = 64 * 1024

/** Head segment and tail ring size for byte statistics (32 KiB). */
export const STATS_SEGMENT_SIZE = 32 * 1024
