/**
 * Byte-statistics engine.
 *
 * One front-to-back pass in 64 KiB chunks accumulates a 256-bin histogram,
 * the first 32 KiB (head segment) and the last 32 KiB (tail ring). All
 * metrics are pure functions of those, iterating bins in index order so two
 * passes over the same bytes give identical results.
 */

import { STATS_CHUNK_SIZE, STATS_SEGMENT_SIZE } from '../../shared/constants/file-signatures'
import type { ReadableSource } from '../io/readable-source'
import { iterateChunks } from '../io/readable-source'

export interface ByteStatistics {
  /** Count per byte value; Float64 keeps counts exact past 2^32. */
  histogram: Float64Array
  total: number
  head: Buffer
  tail: Buffer
}

export interface ByteMetrics {
  entropy_global: number | null
  min_entropy_global: number | null
  entropy_head: number | null
  entropy_tail: number | null
  byte_chi2: number | null
  ic_index: number | null
}

export const METRIC_NAMES = [
  'entropy_global',
  'min_entropy_global',
  'entropy_head',
  'entropy_tail',
  'byte_chi2',
  'ic_index'
] as const satisfies readonly (keyof ByteMetrics)[]

// ─── Accumulation ─────────────────────────────────────────────

/**
 * Streaming accumulator. Feed chunks in file order with {@link update},
 * then call {@link finish}.
 */
export class ByteStatisticsAccumulator {
  private readonly histogram = new Float64Array(256)
  private total = 0
  private readonly head = Buffer.alloc(STATS_SEGMENT_SIZE)
  private headLength = 0
  private readonly ring = Buffer.alloc(STATS_SEGMENT_SIZE)
  /** Next write position in the ring. */
  private ringPos = 0
  private ringLength = 0

  update(chunk: Buffer): void {
    for (let i = 0; i < chunk.length; i++) {
      this.histogram[chunk[i]]++
    }
    this.total += chunk.length

    if (this.headLength < STATS_SEGMENT_SIZE) {
      this.headLength += chunk.copy(this.head, this.headLength, 0, STATS_SEGMENT_SIZE - this.headLength)
    }

    // Only the last ring-size bytes of a chunk can survive.
    const src = chunk.length > STATS_SEGMENT_SIZE ? chunk.subarray(chunk.length - STATS_SEGMENT_SIZE) : chunk
    let copied = 0
    while (copied < src.length) {
      const n = src.copy(this.ring, this.ringPos, copied, copied + (STATS_SEGMENT_SIZE - this.ringPos))
      copied += n
      this.ringPos = (this.ringPos + n) % STATS_SEGMENT_SIZE
    }
    this.ringLength = Math.min(STATS_SEGMENT_SIZE, this.ringLength + src.length)
  }

  finish(): ByteStatistics {
    let tail: Buffer
    if (this.ringLength < STATS_SEGMENT_SIZE) {
      tail = Buffer.from(this.ring.subarray(0, this.ringLength))
    } else {
      tail = Buffer.concat([this.ring.subarray(this.ringPos), this.ring.subarray(0, this.ringPos)])
    }

    return {
      histogram: Float64Array.from(this.histogram),
      total: this.total,
      head: Buffer.from(this.head.subarray(0, this.headLength)),
      tail
    }
  }
}

export async function collectByteStatistics(
  source: ReadableSource,
  chunkSize: number = STATS_CHUNK_SIZE
): Promise<ByteStatistics> {
  const acc = new ByteStatisticsAccumulator()
  for await (const chunk of iterateChunks(source, chunkSize)) {
    acc.update(chunk)
  }
  return acc.finish()
}

// ─── Metrics ──────────────────────────────────────────────────

export function histogramOf(data: Buffer): Float64Array {
  const counts = new Float64Array(256)
  for (let i = 0; i < data.length; i++) counts[data[i]]++
  return counts
}

/** Shannon entropy in bits per byte. */
export function shannonEntropy(counts: Float64Array, total: number): number | null {
  if (total === 0) return null
  let h = 0
  for (let b = 0; b < 256; b++) {
    const c = counts[b]
    if (c === 0) continue
    const p = c / total
    h -= p * Math.log2(p)
  }
  return h
}

export function minEntropy(counts: Float64Array, total: number): number | null {
  if (total === 0) return null
  let max = 0
  for (let b = 0; b < 256; b++) {
    if (counts[b] > max) max = counts[b]
  }
  return max === 0 ? null : -Math.log2(max / total)
}

/** Chi-square statistic against a uniform distribution over 256 values. */
export function chiSquare(counts: Float64Array, total: number): number | null {
  if (total === 0) return null
  const expected = total / 256
  let chi2 = 0
  for (let b = 0; b < 256; b++) {
    const diff = counts[b] - expected
    chi2 += (diff * diff) / expected
  }
  return chi2
}

export function indexOfCoincidence(counts: Float64Array, total: number): number | null {
  if (total <= 1) return null
  let numerator = 0
  for (let b = 0; b < 256; b++) {
    numerator += counts[b] * (counts[b] - 1)
  }
  return numerator / (total * (total - 1))
}

export function entropyOf(data: Buffer): number | null {
  return shannonEntropy(histogramOf(data), data.length)
}

export function computeMetrics(stats: ByteStatistics): ByteMetrics {
  return {
    entropy_global: shannonEntropy(stats.histogram, stats.total),
    min_entropy_global: minEntropy(stats.histogram, stats.total),
    entropy_head: entropyOf(stats.head),
    entropy_tail: entropyOf(stats.tail),
    byte_chi2: chiSquare(stats.histogram, stats.total),
    ic_index: indexOfCoincidence(stats.histogram, stats.total)
  }
}
