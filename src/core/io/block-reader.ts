import * as fs from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'

import type { ReadableSource } from './readable-source'

// ─── Error Types ──────────────────────────────────────────────

export class SourceReadError extends Error {
  public readonly code: string
  public override readonly cause?: unknown

  constructor(message: string, code: string, cause?: unknown) {
    super(message)
    this.name = 'SourceReadError'
    this.code = code
    this.cause = cause
  }
}

// ─── Statistics ───────────────────────────────────────────────

export interface BlockReaderStats {
  /** Total number of read operations performed. */
  totalReads: number
  /** Total bytes delivered to callers. */
  totalBytesRead: number
}

// ─── BlockReader ──────────────────────────────────────────────

/**
 * Random-access reader over a regular file.
 *
 * Every parser for one file shares the same open handle; offsets are plain
 * numbers (exact up to 2^53 bytes). Reads are clamped at end-of-file rather
 * than failing, so a truncated structure shows up as a short buffer.
 */
export class BlockReader implements ReadableSource {
  private handle: FileHandle | null = null
  private filePath: string = ''
  private fileSize: number = 0

  private stats: BlockReaderStats = {
    totalReads: 0,
    totalBytesRead: 0
  }

  // ── Public Accessors ────────────────────────────────────

  get isOpen(): boolean {
    return this.handle !== null
  }

  get path(): string {
    return this.filePath
  }

  get size(): number {
    return this.fileSize
  }

  getStats(): Readonly<BlockReaderStats> {
    return { ...this.stats }
  }

  // ── Lifecycle ───────────────────────────────────────────

  /**
   * Open a file for reading.
   *
   * @throws {SourceReadError} If the reader is already open or the path
   *   cannot be accessed.
   */
  async open(path: string): Promise<void> {
    if (this.handle) {
      throw new SourceReadError(
        'Reader is already open. Call close() before opening another file.',
        'ALREADY_OPEN'
      )
    }

    try {
      this.handle = await fs.open(path, 'r')
      const stat = await this.handle.stat()
      this.fileSize = stat.size
      this.filePath = path
      this.stats = { totalReads: 0, totalBytesRead: 0 }
    } catch (err) {
      if (this.handle) {
        await this.handle.close().catch((closeErr: unknown) => {
          console.error(`[io] Failed to close "${path}" after open error:`, closeErr)
        })
        this.handle = null
      }

      throw new SourceReadError(
        `Failed to open "${path}": ${err instanceof Error ? err.message : String(err)}`,
        'OPEN_FAILED',
        err
      )
    }
  }

  /** Close the handle. Safe to call multiple times. */
  async close(): Promise<void> {
    if (this.handle) {
      try {
        await this.handle.close()
      } finally {
        this.handle = null
        this.filePath = ''
        this.fileSize = 0
      }
    }
  }

  // ── Reading ─────────────────────────────────────────────

  /**
   * Read up to `length` bytes starting at `offset`, clamped to end-of-file.
   *
   * @throws {SourceReadError} If the reader is not open or the read fails.
   */
  async read(offset: number, length: number): Promise<Buffer> {
    const handle = this.ensureOpen()

    if (length <= 0 || offset < 0 || offset >= this.fileSize) {
      return Buffer.alloc(0)
    }

    const wanted = Math.min(length, this.fileSize - offset)
    const buffer = Buffer.alloc(wanted)
    let filled = 0

    try {
      while (filled < wanted) {
        const { bytesRead } = await handle.read(buffer, filled, wanted - filled, offset + filled)
        if (bytesRead === 0) break
        filled += bytesRead
      }
    } catch (err) {
      throw new SourceReadError(
        `Read of ${wanted} bytes at ${offset} failed for "${this.filePath}"`,
        'READ_FAILED',
        err
      )
    }

    this.stats.totalReads++
    this.stats.totalBytesRead += filled

    return filled === wanted ? buffer : buffer.subarray(0, filled)
  }

  // ── Private ─────────────────────────────────────────────

  private ensureOpen(): FileHandle {
    if (!this.handle) {
      throw new SourceReadError('BlockReader is not open. Call open() first.', 'NOT_OPEN')
    }
    return this.handle
  }
}

/**
 * Open `path`, run `fn` with the reader, and always close it afterwards.
 */
export async function withBlockReader<T>(
  path: string,
  fn: (reader: BlockReader) => Promise<T>
): Promise<T> {
  const reader = new BlockReader()
  await reader.open(path)
  try {
    return await fn(reader)
  } finally {
    await reader.close()
  }
}
