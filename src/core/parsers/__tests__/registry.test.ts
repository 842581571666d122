import { ALL_FORMAT_FAMILIES } from '../../../shared/types'
import type { FeatureMap } from '../../../shared/types'
import type { ReadableSource } from '../../io/readable-source'
import { BufferSource } from '../../io/readable-source'
import type { FeatureParser, ParseResult } from '../base-parser'
import { ParserRegistry, defaultRegistry } from '../registry'

class FixedParser implements FeatureParser {
  readonly name = 'Fixed Parser'

  constructor(
    readonly family: string,
    private readonly record: FeatureMap
  ) {}

  defaults(): FeatureMap {
    return { ...this.record }
  }

  async run(_source: ReadableSource): Promise<ParseResult<FeatureMap>> {
    return { ok: true, value: this.defaults() }
  }

  async parse(source: ReadableSource): Promise<FeatureMap> {
    const result = await this.run(source)
    return result.ok ? result.value : this.defaults()
  }
}

describe('ParserRegistry', () => {
  it('should register one structural parser per format family', () => {
    expect(defaultRegistry.structuralFamilies()).toEqual([
      'gzip',
      'jpeg',
      'png',
      'mp4',
      'ole2',
      'zip',
      'ooxml',
      'rar',
      'pdf'
    ])
    for (const family of ALL_FORMAT_FAMILIES) {
      expect(defaultRegistry.getParser(family)?.family).toBe(family)
    }
  })

  it('should look up encryption parsers under the _enc suffix', () => {
    expect(defaultRegistry.encryptionFamilies()).toEqual(['ole2_enc', 'pdf_enc', 'zip_enc'])
    expect(defaultRegistry.getEncryptionParser('pdf')?.family).toBe('pdf_enc')
    expect(defaultRegistry.getEncryptionParser('ooxml')).toBeUndefined()
  })

  it('should return undefined for unregistered names', () => {
    expect(defaultRegistry.getParser('other')).toBeUndefined()
    expect(defaultRegistry.getParser('pdf_enc')).toBeUndefined()
    expect(defaultRegistry.getEncryptionParser('other')).toBeUndefined()
  })

  it('should accept custom tables', async () => {
    const parser = new FixedParser('png', { png_header_ok: true })
    const registry = new ParserRegistry(new Map([['png', parser]]), new Map())

    expect(registry.getParser('png')).toBe(parser)
    expect(registry.getParser('pdf')).toBeUndefined()
    expect(registry.encryptionFamilies()).toEqual([])
    expect(await registry.getParser('png')?.parse(new BufferSource(Buffer.alloc(0)))).toEqual({
      png_header_ok: true
    })
  })
})
