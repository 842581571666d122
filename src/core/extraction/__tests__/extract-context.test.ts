import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import * as zlib from 'node:zlib'

import type { FeatureMap } from '../../../shared/types'
import type { ReadableSource } from '../../io/readable-source'
import { BufferSource } from '../../io/readable-source'
import type { FeatureParser, ParseResult } from '../../parsers/base-parser'
import { ParseError } from '../../parsers/base-parser'
import { ParserRegistry } from '../../parsers/registry'
import { DEFAULT_CONFIG_PATH, loadConfig } from '../../schema/config-loader'
import { METRIC_NAMES } from '../../statistics/byte-statistics'
import { aesExtra, buildZip } from '../../__tests__/fixtures/zip-builder'
import { ExtractionContext } from '../extract-context'

const config = loadConfig(DEFAULT_CONFIG_PATH)
const columnNames = config.schema.columns.map(c => c.name)

class FailingParser implements FeatureParser {
  readonly name = 'Failing Parser'
  readonly family = 'gzip'

  defaults(): FeatureMap {
    return { gzip_header_ok: false, parser_ok: false, structure_consistent: false }
  }

  async run(_source: ReadableSource): Promise<ParseResult<FeatureMap>> {
    return { ok: false, error: new ParseError('header is damaged', 'MALFORMED') }
  }

  async parse(source: ReadableSource): Promise<FeatureMap> {
    const result = await this.run(source)
    return result.ok ? result.value : this.defaults()
  }
}

describe('ExtractionContext', () => {
  const context = new ExtractionContext(config)

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should emit exactly the schema columns for an empty file', async () => {
    const record = await context.extractSource(new BufferSource(Buffer.alloc(0)), 'empty.bin')

    expect(Object.keys(record)).toEqual(columnNames)
    expect(record['size_bytes']).toBe(0)
    expect(record['log_size']).toBe(0)
    expect(record['magic_ok']).toBe(false)
    expect(record['format_family']).toBe('other')
    expect(record['magic_family']).toBe('unknown')
    expect(record['parser_ok']).toBeNull()
    expect(record['zip_any_entry_encrypted']).toBeNull()
    for (const name of METRIC_NAMES) {
      expect(record[name]).toBeNull()
    }
  })

  it('should run the structural parser of the sniffed family', async () => {
    const data = zlib.gzipSync(Buffer.from('payload'))
    const record = await context.extractSource(new BufferSource(data), 'a.gz')

    expect(Object.keys(record)).toEqual(columnNames)
    expect(record['format_family']).toBe('gzip')
    expect(record['gzip_header_ok']).toBe(true)
    expect(record['parser_ok']).toBe(true)
    expect(record['zip_entry_count']).toBeNull()
    expect(record['pdf_encrypt_dict_present']).toBeNull()
    expect(typeof record['entropy_global']).toBe('number')
  })

  it('should run the encryption parser after a successful structural parse', async () => {
    const data = buildZip([
      { name: 'a.txt', data: 'first', flags: 0x0001, extra: aesExtra() },
      { name: 'b.txt', data: 'second', flags: 0x0001, extra: aesExtra() }
    ])
    const record = await context.extractSource(new BufferSource(data), 'locked.zip')

    expect(record['format_family']).toBe('zip')
    expect(record['zip_entry_count']).toBe(2)
    expect(record['parser_ok']).toBe(true)
    expect(record['zip_any_entry_encrypted']).toBe(true)
    expect(record['zip_encryption_method']).toBe('AES')
    expect(record['zip_all_headers_encrypted']).toBe(true)
    expect(record['encrypted_package_present']).toBeNull()
  })

  it('should report a plain archive as unencrypted', async () => {
    const data = buildZip([{ name: 'a.txt', data: 'first' }])
    const record = await context.extractSource(new BufferSource(data), 'plain.zip')

    expect(record['zip_any_entry_encrypted']).toBe(false)
    expect(record['zip_encryption_method']).toBeNull()
    expect(record['zip_all_headers_encrypted']).toBe(false)
  })

  it('should fall back to parser defaults and skip encryption when parsing fails', async () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined)
    const registry = new ParserRegistry(new Map([['gzip', new FailingParser()]]), new Map())
    const failing = new ExtractionContext(config, { registry, debug: true })

    const trace = await failing.trace(new BufferSource(zlib.gzipSync(Buffer.from('x'))), 'bad.gz')

    expect(trace.structural).toEqual({
      gzip_header_ok: false,
      parser_ok: false,
      structure_consistent: false
    })
    expect(trace.encryption).toBeNull()
    expect(debug).toHaveBeenCalledWith(
      '[extract] Failing Parser failed on bad.gz (MALFORMED): header is damaged'
    )
  })

  it('should produce the same record on repeated runs', async () => {
    const data = buildZip([{ name: 'a.txt', data: 'same bytes' }])
    const first = await context.extractSource(new BufferSource(data), 'x.zip')
    const second = await context.extractSource(new BufferSource(data), 'x.zip')

    expect(second).toEqual(first)
  })

  it('should extract a file on disk', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'extract-'))
    const file = path.join(dir, 'note.gz')
    fs.writeFileSync(file, zlib.gzipSync(Buffer.from('on disk')))
    try {
      const record = await context.extract(file)
      expect(record['format_family']).toBe('gzip')
      expect(record['size_bytes']).toBe(fs.statSync(file).size)
    } finally {
      fs.rmSync(dir, { recursive: true, force: true })
    }
  })
})
