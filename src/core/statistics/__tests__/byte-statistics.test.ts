import { BufferSource } from '../../io/readable-source'
import {
  ByteStatisticsAccumulator,
  METRIC_NAMES,
  chiSquare,
  collectByteStatistics,
  computeMetrics,
  entropyOf,
  histogramOf,
  indexOfCoincidence,
  minEntropy,
  shannonEntropy
} from '../byte-statistics'

function patterned(length: number): Buffer {
  const data = Buffer.alloc(length)
  for (let i = 0; i < length; i++) data[i] = (i * 7 + (i >> 9)) % 251
  return data
}

describe('metric functions', () => {
  it('should return null for every metric of an empty input', () => {
    const counts = new Float64Array(256)
    expect(shannonEntropy(counts, 0)).toBeNull()
    expect(minEntropy(counts, 0)).toBeNull()
    expect(chiSquare(counts, 0)).toBeNull()
    expect(indexOfCoincidence(counts, 0)).toBeNull()
    expect(entropyOf(Buffer.alloc(0))).toBeNull()
  })

  it('should give 8 bits for a perfectly uniform input', () => {
    const data = Buffer.from(Array.from({ length: 256 }, (_, i) => i))
    const counts = histogramOf(data)

    expect(shannonEntropy(counts, 256)).toBeCloseTo(8, 12)
    expect(minEntropy(counts, 256)).toBeCloseTo(8, 12)
    expect(chiSquare(counts, 256)).toBeCloseTo(0, 12)
    expect(indexOfCoincidence(counts, 256)).toBe(0)
  })

  it('should give zero entropy for a constant input', () => {
    const counts = histogramOf(Buffer.alloc(100, 0x61))

    expect(shannonEntropy(counts, 100)).toBeCloseTo(0, 12)
    expect(minEntropy(counts, 100)).toBeCloseTo(0, 12)
    expect(chiSquare(counts, 100)).toBeCloseTo(25500, 6)
    expect(indexOfCoincidence(counts, 100)).toBe(1)
  })

  it('should give one bit for two equally frequent values', () => {
    const data = Buffer.from('ab'.repeat(50), 'latin1')
    expect(entropyOf(data)).toBeCloseTo(1, 12)
    expect(minEntropy(histogramOf(data), data.length)).toBeCloseTo(1, 12)
  })

  it('should leave the index of coincidence undefined for a single byte', () => {
    const counts = histogramOf(Buffer.from([0x42]))
    expect(indexOfCoincidence(counts, 1)).toBeNull()
    expect(shannonEntropy(counts, 1)).toBe(0)
  })
})

describe('collectByteStatistics', () => {
  it('should keep the whole input as head and tail when it is short', async () => {
    const data = Buffer.from('short input', 'latin1')
    const stats = await collectByteStatistics(new BufferSource(data))

    expect(stats.total).toBe(11)
    expect(stats.head.equals(data)).toBe(true)
    expect(stats.tail.equals(data)).toBe(true)
  })

  it('should keep the first and last 32 KiB of a long input', async () => {
    const data = patterned(100_000)
    const stats = await collectByteStatistics(new BufferSource(data))

    expect(stats.total).toBe(100_000)
    expect(stats.head.equals(data.subarray(0, 32768))).toBe(true)
    expect(stats.tail.equals(data.subarray(100_000 - 32768))).toBe(true)
  })

  it('should produce the same segments whatever the chunk size', async () => {
    const data = patterned(70_001)
    const reference = await collectByteStatistics(new BufferSource(data))

    for (const chunkSize of [1000, 4097, 32768, 40000]) {
      const stats = await collectByteStatistics(new BufferSource(data), chunkSize)
      expect(stats.head.equals(reference.head)).toBe(true)
      expect(stats.tail.equals(reference.tail)).toBe(true)
      expect(Array.from(stats.histogram)).toEqual(Array.from(reference.histogram))
    }
  })

  it('should count every byte into the histogram', async () => {
    const stats = await collectByteStatistics(new BufferSource(Buffer.from([1, 1, 2, 255])))
    expect(stats.histogram[1]).toBe(2)
    expect(stats.histogram[2]).toBe(1)
    expect(stats.histogram[255]).toBe(1)
    expect(stats.histogram[0]).toBe(0)
  })

  it('should produce empty segments for an empty source', async () => {
    const stats = await collectByteStatistics(new BufferSource(Buffer.alloc(0)))
    expect(stats.total).toBe(0)
    expect(stats.head.length).toBe(0)
    expect(stats.tail.length).toBe(0)
  })
})

describe('computeMetrics', () => {
  it('should report null for all six metrics of an empty file', async () => {
    const metrics = computeMetrics(await collectByteStatistics(new BufferSource(Buffer.alloc(0))))
    for (const name of METRIC_NAMES) {
      expect(metrics[name]).toBeNull()
    }
  })

  it('should be identical across two passes over the same bytes', async () => {
    const data = patterned(50_000)
    const first = computeMetrics(await collectByteStatistics(new BufferSource(data)))
    const second = computeMetrics(await collectByteStatistics(new BufferSource(data), 333))

    expect(second).toEqual(first)
  })

  it('should measure head and tail separately', async () => {
    const data = Buffer.concat([Buffer.alloc(40_000, 0), Buffer.from('ab'.repeat(20_000), 'latin1')])
    const metrics = computeMetrics(await collectByteStatistics(new BufferSource(data)))

    expect(metrics.entropy_head).toBeCloseTo(0, 12)
    expect(metrics.entropy_tail).toBeCloseTo(1, 12)
  })

  it('should accept accumulator output fed by hand', () => {
    const acc = new ByteStatisticsAccumulator()
    acc.update(Buffer.from([0, 1]))
    acc.update(Buffer.from([2, 3]))
    const metrics = computeMetrics(acc.finish())

    expect(metrics.entropy_global).toBeCloseTo(2, 12)
    expect(metrics.ic_index).toBe(0)
  })
})
