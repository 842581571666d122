/**
 * Compound File Binary (OLE2 / CFB) container reader.
 *
 * The container is addressed as an arena of fixed-size sectors following the
 * 512-byte header. Every traversal (DIFAT chain, FAT chains, MiniFAT chains,
 * the directory tree) works on integer sector or entry indices with a visited
 * set and a hard cap, so crafted next-pointers that loop back terminate.
 *
 * Layout references (all little-endian):
 *   header  0x00  signature D0 CF 11 E0 A1 B1 1A E1
 *           0x1E  sector shift           0x20  mini sector shift
 *           0x28  directory sectors      0x2C  FAT sectors
 *           0x30  first directory sector 0x38  mini stream cutoff
 *           0x3C  first MiniFAT sector   0x40  MiniFAT sectors
 *           0x44  first DIFAT sector     0x48  DIFAT sectors
 *           0x4C  109 inline DIFAT entries
 *   dirent  0x00  UTF-16LE name (64 bytes) 0x40 name length (bytes, incl. NUL)
 *           0x42  object type   0x44 left  0x48 right  0x4C child
 *           0x74  start sector  0x78 stream size (low)  0x7C (high, v4 only)
 */

import type { ReadableSource } from '../io/readable-source'
import { hasBytesAt, CFB_MAGIC } from '../../shared/constants/file-signatures'
import { ParseError } from '../parsers/base-parser'

export const CFB_HEADER_SIZE = 512
export const DIR_ENTRY_SIZE = 128

export const FREESECT = 0xffffffff
export const ENDOFCHAIN = 0xfffffffe
export const FATSECT = 0xfffffffd
export const DIFSECT = 0xfffffffc
export const NOSTREAM = 0xffffffff

/** Hard cap on sectors visited by any single chain walk. */
export const MAX_SECTORS_READ = 8192

/** Number of DIFAT entries stored inline in the header. */
const INLINE_DIFAT_ENTRIES = 109

export const ObjectType = {
  UNUSED: 0,
  STORAGE: 1,
  STREAM: 2,
  ROOT: 5
} as const

export type ObjectTypeCode = (typeof ObjectType)[keyof typeof ObjectType]

const VALID_OBJECT_TYPES: ReadonlySet<number> = new Set(Object.values(ObjectType))

/** Streams whose presence marks a Word, Excel or PowerPoint binary document. */
export const APPLICATION_STREAMS: ReadonlySet<string> = new Set([
  'WordDocument',
  'Workbook',
  'PowerPoint Document'
])

export const SUMMARY_INFORMATION_STREAM = '\x05SummaryInformation'

// ─── Header ───────────────────────────────────────────────────

export interface CfbHeader {
  sectorSize: number
  miniSectorSize: number
  numDirSectors: number
  numFatSectors: number
  firstDirSector: number
  miniStreamCutoff: number
  firstMiniFatSector: number
  numMiniFatSectors: number
  firstDifatSector: number
  numDifatSectors: number
  /** The 109 inline DIFAT entries. */
  difat: number[]
}

/**
 * Decode the 512-byte header. Returns null when the signature is missing,
 * the buffer is short, or the sector shifts are outside 7..20.
 */
export function parseCfbHeader(buf: Buffer): CfbHeader | null {
  if (buf.length < CFB_HEADER_SIZE || !hasBytesAt(buf, 0, CFB_MAGIC)) {
    return null
  }

  const sectorShift = buf.readUInt16LE(0x1e)
  const miniSectorShift = buf.readUInt16LE(0x20)
  if (sectorShift < 7 || sectorShift > 20 || miniSectorShift < 2 || miniSectorShift > sectorShift) {
    return null
  }

  const difat: number[] = []
  for (let i = 0; i < INLINE_DIFAT_ENTRIES; i++) {
    difat.push(buf.readUInt32LE(0x4c + i * 4))
  }

  return {
    sectorSize: 1 << sectorShift,
    miniSectorSize: 1 << miniSectorShift,
    numDirSectors: buf.readUInt32LE(0x28),
    numFatSectors: buf.readUInt32LE(0x2c),
    firstDirSector: buf.readUInt32LE(0x30),
    miniStreamCutoff: buf.readUInt32LE(0x38),
    firstMiniFatSector: buf.readUInt32LE(0x3c),
    numMiniFatSectors: buf.readUInt32LE(0x40),
    firstDifatSector: buf.readUInt32LE(0x44),
    numDifatSectors: buf.readUInt32LE(0x48),
    difat
  }
}

function isChainEnd(sector: number): boolean {
  return sector === FREESECT || sector === ENDOFCHAIN
}

// ─── Sectors and chains ───────────────────────────────────────

/**
 * Read one whole sector. The result is empty unless the full sector lies
 * inside the source.
 */
export async function readSector(
  source: ReadableSource,
  sectorSize: number,
  index: number
): Promise<Buffer> {
  const offset = CFB_HEADER_SIZE + index * sectorSize
  if (offset + sectorSize > source.size) {
    return Buffer.alloc(0)
  }
  const buf = await source.read(offset, sectorSize)
  return buf.length === sectorSize ? buf : Buffer.alloc(0)
}

function readU32Array(buf: Buffer, count: number): number[] {
  const out: number[] = new Array(count)
  for (let i = 0; i < count; i++) {
    out[i] = buf.readUInt32LE(i * 4)
  }
  return out
}

export interface FatTable {
  /** Next-sector pointer for every sector covered by the loaded FAT sectors. */
  entries: number[]
  /** True when every referenced FAT sector could be read and the FAT is non-empty. */
  ok: boolean
}

/**
 * Assemble the FAT: FAT sector indices come from the inline DIFAT plus the
 * DIFAT sector chain (cycle-guarded, at most {@link MAX_SECTORS_READ} DIFAT
 * sectors), then each distinct FAT sector is decoded into the entry table.
 * At most {@link MAX_SECTORS_READ} FAT sectors are read; a duplicate index or
 * hitting the cap marks the table not ok.
 */
export async function buildFat(source: ReadableSource, header: CfbHeader): Promise<FatTable> {
  const { sectorSize } = header
  const fatSectorIndices = header.difat.filter(s => s !== FREESECT)

  let difatSector = header.firstDifatSector
  let remaining = header.numDifatSectors
  const visited = new Set<number>()
  const perSector = sectorSize / 4 - 1

  while (!isChainEnd(difatSector) && remaining > 0 && visited.size < MAX_SECTORS_READ) {
    if (visited.has(difatSector)) break
    visited.add(difatSector)

    const buf = await readSector(source, sectorSize, difatSector)
    if (buf.length !== sectorSize) break

    for (const s of readU32Array(buf, perSector)) {
      if (s !== FREESECT) fatSectorIndices.push(s)
    }
    difatSector = buf.readUInt32LE(sectorSize - 4)
    remaining--
  }

  const entries: number[] = []
  const loaded = new Set<number>()
  let ok = true
  for (const index of fatSectorIndices) {
    // A FAT sector listed twice is malformed; reading it again would only
    // repeat its entries.
    if (loaded.has(index)) {
      ok = false
      continue
    }
    if (loaded.size >= MAX_SECTORS_READ) {
      ok = false
      break
    }
    loaded.add(index)

    const buf = await readSector(source, sectorSize, index)
    if (buf.length !== sectorSize) {
      ok = false
      break
    }
    for (const next of readU32Array(buf, sectorSize / 4)) {
      entries.push(next)
    }
  }

  return { entries, ok: ok && entries.length > 0 }
}

/**
 * Concatenate the sectors of the chain starting at `start`, stopping at
 * end-of-chain, on a revisited or out-of-table sector, on an unreadable
 * sector, after `maxSectors` hops, or once `maxBytes` have been gathered.
 */
export async function followChain(
  source: ReadableSource,
  sectorSize: number,
  fat: readonly number[],
  start: number,
  maxBytes: number = Number.POSITIVE_INFINITY,
  maxSectors: number = MAX_SECTORS_READ
): Promise<Buffer> {
  const parts: Buffer[] = []
  const seen = new Set<number>()
  let gathered = 0
  let current = start

  while (!isChainEnd(current) && seen.size < maxSectors && gathered < maxBytes) {
    if (seen.has(current) || current >= fat.length) break
    seen.add(current)

    const sector = await readSector(source, sectorSize, current)
    if (sector.length !== sectorSize) break
    parts.push(sector)
    gathered += sector.length
    current = fat[current]
  }

  return Buffer.concat(parts)
}

// ─── Directory ────────────────────────────────────────────────

export interface DirectoryEntry {
  index: number
  name: string
  objectType: number
  leftSibling: number
  rightSibling: number
  child: number
  startSector: number
  streamSize: number
}

export function parseDirectoryEntry(
  buf: Buffer,
  index: number,
  sectorSize: number
): DirectoryEntry {
  let nameLength = buf.readUInt16LE(0x40)
  if (nameLength > 64) nameLength = 64
  if (nameLength % 2 === 1) nameLength -= 1

  const name =
    nameLength > 0 ? buf.toString('utf16le', 0, nameLength).replace(/\x00+$/, '') : ''

  const sizeLow = buf.readUInt32LE(0x78)
  // Version 3 files (512-byte sectors) must ignore the high dword.
  const sizeHigh = sectorSize === 4096 ? buf.readUInt32LE(0x7c) : 0

  return {
    index,
    name,
    objectType: buf[0x42],
    leftSibling: buf.readUInt32LE(0x44),
    rightSibling: buf.readUInt32LE(0x48),
    child: buf.readUInt32LE(0x4c),
    startSector: buf.readUInt32LE(0x74),
    streamSize: sizeHigh * 0x1_0000_0000 + sizeLow
  }
}

export interface DirectoryScan {
  /** False when the stream is shorter than one entry or an entry has an unknown object type. */
  ok: boolean
  entries: DirectoryEntry[]
  streamCount: number
  rootPresent: boolean
  summaryInfoPresent: boolean
  applicationStreamPresent: boolean
}

/**
 * Walk the directory stream entry by entry. An unknown object type stops
 * the walk and marks the directory invalid, keeping the counts gathered so far.
 */
export function scanDirectory(dirStream: Buffer, sectorSize: number): DirectoryScan {
  const scan: DirectoryScan = {
    ok: false,
    entries: [],
    streamCount: 0,
    rootPresent: false,
    summaryInfoPresent: false,
    applicationStreamPresent: false
  }

  if (dirStream.length < DIR_ENTRY_SIZE) {
    return scan
  }

  const count = Math.floor(dirStream.length / DIR_ENTRY_SIZE)
  for (let i = 0; i < count; i++) {
    const raw = dirStream.subarray(i * DIR_ENTRY_SIZE, (i + 1) * DIR_ENTRY_SIZE)
    const entry = parseDirectoryEntry(raw, i, sectorSize)

    if (!VALID_OBJECT_TYPES.has(entry.objectType)) {
      return scan
    }

    if (entry.objectType === ObjectType.ROOT) scan.rootPresent = true
    if (entry.objectType === ObjectType.STREAM) scan.streamCount++
    if (entry.name === SUMMARY_INFORMATION_STREAM) scan.summaryInfoPresent = true
    if (APPLICATION_STREAMS.has(entry.name)) scan.applicationStreamPresent = true

    scan.entries.push(entry)
  }

  scan.ok = true
  return scan
}

/**
 * MiniFAT sanity: trivially true when no MiniFAT is declared, otherwise the
 * first MiniFAT sector must be readable in full.
 */
export async function miniFatReadable(
  source: ReadableSource,
  header: CfbHeader
): Promise<boolean> {
  if (header.numMiniFatSectors === 0 || isChainEnd(header.firstMiniFatSector)) {
    return true
  }
  const buf = await readSector(source, header.sectorSize, header.firstMiniFatSector)
  return buf.length === header.sectorSize && buf.length % 4 === 0
}

// ─── Stream access ────────────────────────────────────────────

export interface StreamRef {
  /** Storage path joined with '/', e.g. "ObjectPool/_1234/Ole". */
  path: string
  entry: DirectoryEntry
}

/**
 * An opened compound file with its FAT and directory decoded, able to list
 * and read streams. Used by the encryption-marker parser; the structural
 * parser only needs the lower-level functions above.
 */
export class CompoundFile {
  private miniFat: number[] | null = null
  private miniStream: Buffer | null = null

  private constructor(
    private readonly source: ReadableSource,
    readonly header: CfbHeader,
    readonly fat: FatTable,
    readonly directory: DirectoryScan
  ) {}

  /**
   * @throws {ParseError} When the header is invalid or the directory cannot be decoded.
   */
  static async open(source: ReadableSource): Promise<CompoundFile> {
    const headerBuf = await source.read(0, CFB_HEADER_SIZE)
    const header = parseCfbHeader(headerBuf)
    if (!header) {
      throw new ParseError('Not a compound file', 'BAD_SIGNATURE')
    }

    const fat = await buildFat(source, header)
    const dirStream = await followChain(source, header.sectorSize, fat.entries, header.firstDirSector)
    const directory = scanDirectory(dirStream, header.sectorSize)
    if (!directory.ok || !directory.rootPresent) {
      throw new ParseError('Compound file directory is unreadable', 'MALFORMED')
    }

    return new CompoundFile(source, header, fat, directory)
  }

  private get root(): DirectoryEntry | undefined {
    return this.directory.entries.find(e => e.objectType === ObjectType.ROOT)
  }

  /**
   * List every stream below the root, depth first, children of a storage
   * in name order. The tree walk is cycle-guarded by entry index.
   */
  listStreams(): StreamRef[] {
    const root = this.root
    if (!root) return []

    const entries = this.directory.entries
    const visited = new Set<number>([root.index])
    const out: StreamRef[] = []

    const collectSiblings = (start: number): DirectoryEntry[] => {
      const kids: DirectoryEntry[] = []
      const stack: number[] = [start]
      while (stack.length > 0) {
        const id = stack.pop()
        if (id === undefined || id === NOSTREAM || id >= entries.length || visited.has(id)) continue
        visited.add(id)
        const entry = entries[id]
        kids.push(entry)
        stack.push(entry.leftSibling, entry.rightSibling)
      }
      return kids.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    }

    const walk = (storage: DirectoryEntry, prefix: string): void => {
      for (const kid of collectSiblings(storage.child)) {
        const path = prefix ? `${prefix}/${kid.name}` : kid.name
        if (kid.objectType === ObjectType.STREAM) {
          out.push({ path, entry: kid })
        } else if (kid.objectType === ObjectType.STORAGE) {
          walk(kid, path)
        }
      }
    }

    walk(root, '')
    return out
  }

  /**
   * Find the first stream whose lower-cased path ends with `suffix`
   * (compared case-insensitively).
   */
  findStream(suffix: string): StreamRef | undefined {
    const wanted = suffix.toLowerCase()
    return this.listStreams().find(s => s.path.toLowerCase().endsWith(wanted))
  }

  /** Read at most `maxBytes` from the start of a stream. */
  async readStream(entry: DirectoryEntry, maxBytes: number): Promise<Buffer> {
    const wanted = Math.min(entry.streamSize, maxBytes)
    if (wanted <= 0) return Buffer.alloc(0)

    if (entry.streamSize < this.header.miniStreamCutoff && entry.objectType !== ObjectType.ROOT) {
      return this.readMiniStream(entry.startSector, wanted)
    }

    const data = await followChain(
      this.source,
      this.header.sectorSize,
      this.fat.entries,
      entry.startSector,
      wanted
    )
    return data.subarray(0, wanted)
  }

  private async readMiniStream(start: number, wanted: number): Promise<Buffer> {
    const { sectorSize, miniSectorSize } = this.header

    if (!this.miniFat) {
      const raw = await followChain(
        this.source,
        sectorSize,
        this.fat.entries,
        this.header.firstMiniFatSector
      )
      this.miniFat = readU32Array(raw, Math.floor(raw.length / 4))
    }
    if (!this.miniStream) {
      const root = this.root
      this.miniStream = root
        ? await followChain(this.source, sectorSize, this.fat.entries, root.startSector)
        : Buffer.alloc(0)
    }

    const miniFat = this.miniFat
    const container = this.miniStream
    const parts: Buffer[] = []
    const seen = new Set<number>()
    let gathered = 0
    let current = start

    while (!isChainEnd(current) && gathered < wanted && seen.size < MAX_SECTORS_READ) {
      if (seen.has(current) || current >= miniFat.length) break
      seen.add(current)

      const offset = current * miniSectorSize
      if (offset + miniSectorSize > container.length) break
      parts.push(container.subarray(offset, offset + miniSectorSize))
      gathered += miniSectorSize
      current = miniFat[current]
    }

    return Buffer.concat(parts).subarray(0, wanted)
  }
}
