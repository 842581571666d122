import { Ole2Parser } from '../ole2-parser'
import { BufferSource } from '../../../io/readable-source'
import { buildCompoundFile, setFatEntry, stream } from '../../../__tests__/fixtures/compound-file-builder'

describe('Ole2Parser', () => {
  const parser = new Ole2Parser()

  it('should report a sound Word document container', async () => {
    const { buffer } = buildCompoundFile([
      stream('\x05SummaryInformation', Buffer.alloc(200, 1)),
      stream('WordDocument', Buffer.alloc(5000, 2))
    ])

    expect(await parser.parse(new BufferSource(buffer))).toEqual({
      ole_dir_ok: true,
      ole_stream_count: 2,
      ole_fat_ok: true,
      ole_mini_fat_ok: true,
      ole_root_entry_present: true,
      ole_summaryinfo_present: true,
      ole_expected_streams_present: true,
      parser_ok: true,
      structure_consistent: true
    })
  })

  it('should not call a container without known streams consistent', async () => {
    const { buffer } = buildCompoundFile([stream('Payload', Buffer.alloc(5000))])
    const result = await parser.parse(new BufferSource(buffer))

    expect(result.parser_ok).toBe(true)
    expect(result.ole_expected_streams_present).toBe(false)
    expect(result.structure_consistent).toBe(false)
  })

  it('should fail the MiniFAT check when its first sector is missing', async () => {
    const { buffer } = buildCompoundFile([stream('Workbook', 'a'), stream('Other', 'b')])
    buffer.writeUInt32LE(300, 0x3c)
    const result = await parser.parse(new BufferSource(buffer))

    expect(result.ole_mini_fat_ok).toBe(false)
    expect(result.parser_ok).toBe(true)
    expect(result.structure_consistent).toBe(false)
  })

  it('should stop on an unknown directory object type', async () => {
    const { buffer, dirSectors } = buildCompoundFile([stream('WordDocument', 'w'), stream('Data', 'd')])
    // Third entry (index 2) gets object type 7.
    buffer[512 + dirSectors[0] * 512 + 2 * 128 + 0x42] = 7
    const result = await parser.parse(new BufferSource(buffer))

    expect(result.ole_dir_ok).toBe(false)
    expect(result.ole_stream_count).toBe(1)
    expect(result.parser_ok).toBe(false)
  })

  it('should terminate on a directory chain that loops', async () => {
    const nodes = Array.from({ length: 6 }, (_, i) => stream(`S${i}`, 'x'))
    const { buffer, dirSectors } = buildCompoundFile(nodes)
    expect(dirSectors).toEqual([1, 2])
    setFatEntry(buffer, 2, 1)

    const result = await parser.parse(new BufferSource(buffer))
    expect(result.ole_stream_count).toBe(6)
    expect(result.ole_dir_ok).toBe(true)
  })

  it('should return defaults without a valid header', async () => {
    expect(await parser.parse(new BufferSource(Buffer.alloc(0)))).toEqual(parser.defaults())
    const { buffer } = buildCompoundFile([stream('Data', 'x')])
    expect(await parser.parse(new BufferSource(buffer.subarray(0, 511)))).toEqual(parser.defaults())
  })
})
