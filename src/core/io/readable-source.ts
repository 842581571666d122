/**
 * Minimal random-access byte source used by the sniffer, the parsers and the
 * byte-statistics pass.
 *
 * The file-backed {@link BlockReader} is the production implementation;
 * {@link BufferSource} serves bytes already in memory, which keeps parsers
 * easily testable.
 */

export interface ReadableSource {
  /**
   * Read up to `length` bytes starting at absolute byte `offset`.
   * Reads past the end are clamped: the returned buffer may be shorter than
   * `length`, and is empty when `offset` is at or beyond the end.
   */
  read(offset: number, length: number): Promise<Buffer>
  /** Total size in bytes. */
  readonly size: number
}

/** Read the first `length` bytes (or the whole source when shorter). */
export function readHead(source: ReadableSource, length: number): Promise<Buffer> {
  return source.read(0, Math.min(length, source.size))
}

/** Read the last `length` bytes (or the whole source when shorter). */
export function readTail(source: ReadableSource, length: number): Promise<Buffer> {
  const n = Math.min(length, source.size)
  return source.read(source.size - n, n)
}

export class BufferSource implements ReadableSource {
  constructor(private readonly data: Buffer) {}

  get size(): number {
    return this.data.length
  }

  async read(offset: number, length: number): Promise<Buffer> {
    if (offset < 0 || length <= 0 || offset >= this.data.length) {
      return Buffer.alloc(0)
    }
    return this.data.subarray(offset, Math.min(this.data.length, offset + length))
  }
}

/**
 * Iterate a source front to back in fixed-size chunks. The last chunk may be
 * shorter; an empty source yields nothing.
 */
export async function* iterateChunks(
  source: ReadableSource,
  chunkSize: number
): AsyncGenerator<Buffer> {
  let offset = 0
  while (offset < source.size) {
    const chunk = await source.read(offset, chunkSize)
    if (chunk.length === 0) break
    yield chunk
    offset += chunk.length
  }
}
