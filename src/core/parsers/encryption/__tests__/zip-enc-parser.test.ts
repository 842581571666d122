import { ZipEncParser } from '../zip-enc-parser'
import { BufferSource } from '../../../io/readable-source'
import { aesExtra, buildZip } from '../../../__tests__/fixtures/zip-builder'

describe('ZipEncParser', () => {
  const parser = new ZipEncParser()

  it('should detect AES on every entry', async () => {
    const data = buildZip([
      { name: 'a', data: 'x', flags: 0x0001, extra: aesExtra() },
      { name: 'b', data: 'y', flags: 0x0001, extra: aesExtra() }
    ])

    expect(await parser.parse(new BufferSource(data))).toEqual({
      zip_any_entry_encrypted: true,
      zip_encryption_method: 'AES',
      zip_all_headers_encrypted: true
    })
  })

  it('should detect ZipCrypto on some entries', async () => {
    const data = buildZip([
      { name: 'a', data: 'x', flags: 0x0001 },
      { name: 'b', data: 'y' }
    ])

    expect(await parser.parse(new BufferSource(data))).toEqual({
      zip_any_entry_encrypted: true,
      zip_encryption_method: 'ZipCrypto',
      zip_all_headers_encrypted: false
    })
  })

  it('should call disagreeing entries mixed', async () => {
    const data = buildZip([
      { name: 'a', data: 'x', flags: 0x0001, extra: aesExtra() },
      { name: 'b', data: 'y', flags: 0x0001 }
    ])
    expect((await parser.parse(new BufferSource(data))).zip_encryption_method).toBe('Mixed')
  })

  it('should ignore an AES extra field on an unencrypted entry', async () => {
    const data = buildZip([{ name: 'a', data: 'x', extra: aesExtra() }])

    expect(await parser.parse(new BufferSource(data))).toEqual({
      zip_any_entry_encrypted: false,
      zip_encryption_method: null,
      zip_all_headers_encrypted: false
    })
  })

  it('should return defaults for empty or unreadable archives', async () => {
    expect(await parser.parse(new BufferSource(buildZip([])))).toEqual(parser.defaults())
    expect(await parser.parse(new BufferSource(Buffer.alloc(0)))).toEqual(parser.defaults())
  })
})
