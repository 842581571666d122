import {
  findEndOfCentralDirectory,
  hasExtraField,
  listArchive,
  readEntryHead
} from '../zip-archive'
import { BufferSource } from '../../io/readable-source'
import { ParseError } from '../../parsers/base-parser'
import { aesExtra, buildZip } from '../../__tests__/fixtures/zip-builder'

describe('findEndOfCentralDirectory', () => {
  it('should locate the record behind a trailing comment', async () => {
    const data = buildZip([{ name: 'a', data: 'x' }], { comment: 'c'.repeat(300) })
    const eocd = await findEndOfCentralDirectory(new BufferSource(data))

    expect(eocd?.position).toBe(data.length - 322)
    expect(eocd?.entriesTotal).toBe(1)
    expect(eocd?.commentLength).toBe(300)
  })

  it('should return null without the signature', async () => {
    expect(await findEndOfCentralDirectory(new BufferSource(Buffer.alloc(100)))).toBeNull()
  })

  it('should return null for a record cut short', async () => {
    const data = Buffer.from('PK\x05\x06\x00\x00', 'latin1')
    expect(await findEndOfCentralDirectory(new BufferSource(data))).toBeNull()
  })
})

describe('listArchive', () => {
  it('should decode names and flags', async () => {
    const data = buildZip([
      { name: 'plain.txt', data: 'p' },
      { name: 'café.txt', data: 'c', flags: 0x0800 }
    ])
    const entries = await listArchive(new BufferSource(data))

    expect(entries.map(e => e.name)).toEqual(['plain.txt', 'café.txt'])
    expect(entries[1].flags).toBe(0x0800)
  })

  it('should shift offsets for data prepended to the archive', async () => {
    const prefix = Buffer.alloc(100, 0x90)
    const data = buildZip([{ name: 'a.txt', data: 'shifted' }], { prefix })
    const source = new BufferSource(data)
    const [entry] = await listArchive(source)

    expect(entry.localHeaderOffset).toBe(100)
    expect((await readEntryHead(source, entry, 64)).toString('utf8')).toBe('shifted')
  })

  it('should reject a damaged central directory record', async () => {
    const data = buildZip([{ name: 'a.txt', data: 'x' }])
    const cdStart = 30 + 5 + 1
    data.writeUInt32LE(0, cdStart)

    await expect(listArchive(new BufferSource(data))).rejects.toMatchObject({ code: 'MALFORMED' })
  })

  it('should reject input without an EOCD', async () => {
    await expect(listArchive(new BufferSource(Buffer.alloc(10)))).rejects.toBeInstanceOf(ParseError)
  })
})

describe('readEntryHead', () => {
  it('should inflate the head of a deflated entry', async () => {
    const text = 'lorem ipsum '.repeat(200)
    const data = buildZip([{ name: 'big.txt', data: text, method: 'deflated' }])
    const source = new BufferSource(data)
    const [entry] = await listArchive(source)

    expect((await readEntryHead(source, entry, 11)).toString('utf8')).toBe('lorem ipsum')
  })

  it('should refuse encrypted entries', async () => {
    const data = buildZip([{ name: 'secret', data: 'x', flags: 0x0001 }])
    const source = new BufferSource(data)
    const [entry] = await listArchive(source)

    await expect(readEntryHead(source, entry, 16)).rejects.toBeInstanceOf(ParseError)
  })
})

describe('hasExtraField', () => {
  it('should find a header id among extra records', () => {
    const other = Buffer.from([0x55, 0x54, 0x01, 0x00, 0x00])
    const extra = Buffer.concat([other, aesExtra()])

    expect(hasExtraField(extra, 0x9901)).toBe(true)
    expect(hasExtraField(other, 0x9901)).toBe(false)
  })

  it('should stop at a record that overruns the field', () => {
    expect(hasExtraField(Buffer.from([0x01, 0x99, 0x20, 0x00, 0x00]), 0x9901)).toBe(false)
  })
})
