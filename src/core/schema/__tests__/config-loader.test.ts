import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'

import {
  ConfigError,
  DEFAULT_CONFIG_PATH,
  buildSchema,
  columnTypes,
  encryptionSections,
  loadConfig,
  parseConfig,
  parseConfigText,
  sectionKind,
  statisticColumns,
  structuralColumns
} from '../config-loader'

const SAMPLE = `
global:
  sniffer:
    head_bytes: 4096
    tail_bytes: 2048
    enabled_families: [pdf, zip]
features:
  common:
    - { name: size_bytes, type: int }
    - { name: magic_ok, type: BOOL }
  pdf:
    - { name: pdf_version, type: float }
    - { name: parser_ok, type: bool }
  zip:
    - { name: zip_entry_count, type: int }
    - { name: parser_ok, type: bool }
  pdf_enc:
    - { name: pdf_encrypt_filter, type: string }
  statistic:
    - { name: entropy_global, type: float }
`

function captureError(fn: () => unknown): ConfigError {
  try {
    fn()
  } catch (err) {
    if (err instanceof ConfigError) return err
    throw err
  }
  throw new Error('expected a ConfigError')
}

describe('parseConfigText', () => {
  it('should read the sniffer block', () => {
    const config = parseConfigText(SAMPLE)

    expect(config.sniffer.headBytes).toBe(4096)
    expect(config.sniffer.tailBytes).toBe(2048)
    expect([...config.sniffer.enabledFamilies]).toEqual(['pdf', 'zip'])
  })

  it('should keep the first declaration of a repeated column', () => {
    const { schema } = parseConfigText(SAMPLE)

    expect(schema.columns.map(c => c.name)).toEqual([
      'size_bytes',
      'magic_ok',
      'pdf_version',
      'parser_ok',
      'zip_entry_count',
      'pdf_encrypt_filter',
      'entropy_global'
    ])
    expect(schema.columns.find(c => c.name === 'parser_ok')?.section).toBe('pdf')
    expect(schema.sections.get('zip')).toEqual(['zip_entry_count', 'parser_ok'])
  })

  it('should lowercase declared types', () => {
    const { schema } = parseConfigText(SAMPLE)
    expect(columnTypes(schema).get('magic_ok')).toBe('bool')
  })

  it('should fall back to defaults when the global block is missing', () => {
    const config = parseConfigText('features:\n  common:\n    - { name: size_bytes }\n')

    expect(config.sniffer.headBytes).toBe(16384)
    expect(config.sniffer.tailBytes).toBe(16384)
    expect(config.sniffer.enabledFamilies.size).toBe(0)
    expect(config.schema.columns).toEqual([{ name: 'size_bytes', section: 'common' }])
  })

  it('should enable no family when the list is null', () => {
    const config = parseConfigText('global:\n  sniffer:\n    enabled_families:\n')
    expect(config.sniffer.enabledFamilies.size).toBe(0)
  })

  it('should accept window sizes written as numeric strings', () => {
    const config = parseConfigText('global:\n  sniffer:\n    head_bytes: "8192"\n    tail_bytes: "4096"\n')
    expect(config.sniffer.headBytes).toBe(8192)
    expect(config.sniffer.tailBytes).toBe(4096)
  })

  it('should still reject a non-numeric window', () => {
    const err = captureError(() => parseConfigText('global:\n  sniffer:\n    tail_bytes: large\n'))
    expect(err.code).toBe('CONFIG_INVALID')
    expect(err.message).toContain('global.sniffer.tail_bytes')
  })

  it('should accept an empty document', () => {
    const config = parseConfigText('')
    expect(config.schema.columns).toEqual([])
    expect(config.schema.sections.size).toBe(0)
  })

  it('should return a frozen config', () => {
    const config = parseConfigText(SAMPLE)
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.schema.columns)).toBe(true)
  })

  it('should reject malformed YAML', () => {
    const err = captureError(() => parseConfigText('features: [', 'broken.yaml'))
    expect(err.code).toBe('CONFIG_INVALID')
    expect(err.message).toMatch(/^Cannot parse YAML in broken\.yaml: /)
  })

  it('should reject a non-positive window', () => {
    const err = captureError(() => parseConfigText('global:\n  sniffer:\n    head_bytes: 0\n'))
    expect(err.code).toBe('CONFIG_INVALID')
    expect(err.message).toContain('global.sniffer.head_bytes')
    expect(err.remediation).toBeDefined()
  })

  it('should reject an unknown family', () => {
    const err = captureError(() =>
      parseConfigText('global:\n  sniffer:\n    enabled_families: [pdf, webm]\n')
    )
    expect(err.code).toBe('CONFIG_INVALID')
    expect(err.message).toContain('unknown format family')
  })
})

describe('parseConfig', () => {
  it('should reject a root that is not a mapping', () => {
    const err = captureError(() => parseConfig(['a', 'b']))
    expect(err.code).toBe('CONFIG_INVALID')
    expect(err.message).toBe('Configuration root must be a mapping')
  })
})

describe('buildSchema', () => {
  it('should skip sections and items it cannot read', () => {
    const schema = buildSchema({
      notes: 'free text',
      pdf: [
        'pdf_version',
        { type: 'int' },
        { name: '' },
        { name: 'pdf_linearized', type: 'decimal' },
        { name: 'parser_ok', type: 'bool' }
      ]
    })

    expect(schema.columns).toEqual([
      { name: 'pdf_linearized', section: 'pdf' },
      { name: 'parser_ok', section: 'pdf', type: 'bool' }
    ])
    expect(schema.sections.has('notes')).toBe(false)
  })

  it('should tolerate a null features block', () => {
    expect(buildSchema(null).columns).toEqual([])
  })
})

describe('section helpers', () => {
  it('should classify sections by name', () => {
    expect(sectionKind('statistic')).toBe('statistic')
    expect(sectionKind('zip_enc')).toBe('encryption')
    expect(sectionKind('common')).toBe('structural')
    expect(sectionKind('pdf')).toBe('structural')
  })

  it('should split the schema into aggregator column sets', () => {
    const { schema } = parseConfigText(SAMPLE)

    expect(structuralColumns(schema)).toEqual([
      'size_bytes',
      'magic_ok',
      'pdf_version',
      'parser_ok',
      'zip_entry_count'
    ])
    expect([...encryptionSections(schema).keys()]).toEqual(['pdf_enc'])
    expect(statisticColumns(schema)).toEqual(['entropy_global'])
  })
})

describe('loadConfig', () => {
  it('should load the bundled configuration', () => {
    const config = loadConfig(DEFAULT_CONFIG_PATH)

    expect(config.schema.columns[0]).toEqual({ name: 'size_bytes', section: 'common', type: 'int' })
    expect([...encryptionSections(config.schema).keys()]).toEqual(['ole2_enc', 'pdf_enc', 'zip_enc'])
    expect(statisticColumns(config.schema)).toHaveLength(6)
    expect(config.sniffer.enabledFamilies.size).toBe(9)
  })

  it('should report a missing file', () => {
    const missing = path.join(os.tmpdir(), 'does-not-exist', 'features.yaml')
    const err = captureError(() => loadConfig(missing))

    expect(err.code).toBe('CONFIG_NOT_FOUND')
    expect(err.message).toBe(`features.yaml not found at: ${missing}`)
  })

  it('should load a file from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'features-'))
    const file = path.join(dir, 'features.yaml')
    fs.writeFileSync(file, SAMPLE)
    try {
      expect(loadConfig(file).sniffer.headBytes).toBe(4096)
    } finally {
      fs.rmSync(dir, { recursive: true, force: true })
    }
  })
})
