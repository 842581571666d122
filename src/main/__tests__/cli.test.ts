import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'

import { DEFAULT_CONFIG_PATH } from '../../core/schema/config-loader'
import { CliUsageError, parseArgs, runCli } from '../cli'

describe('parseArgs', () => {
  it('should parse an extract command with defaults', () => {
    expect(parseArgs(['extract', 'in', 'out'])).toEqual({
      command: { kind: 'extract', inputDir: 'in', outputDir: 'out' },
      configPath: DEFAULT_CONFIG_PATH,
      workers: 0,
      quiet: false,
      debug: false
    })
  })

  it('should accept options in both spellings', () => {
    const options = parseArgs(['extract', '--workers=4', 'in', '--config', 'my.yaml', 'out', '-q', '--debug'])

    expect(options.command).toEqual({ kind: 'extract', inputDir: 'in', outputDir: 'out' })
    expect(options.workers).toBe(4)
    expect(options.configPath).toBe('my.yaml')
    expect(options.quiet).toBe(true)
    expect(options.debug).toBe(true)
  })

  it('should fall back to help without a command', () => {
    expect(parseArgs([]).command).toEqual({ kind: 'help' })
    expect(parseArgs(['sniff', 'a.pdf', '--help']).command).toEqual({ kind: 'help' })
  })

  it('should collect sniff targets', () => {
    expect(parseArgs(['sniff', 'a.pdf', 'b.zip']).command).toEqual({ kind: 'sniff', files: ['a.pdf', 'b.zip'] })
  })

  it('should reject bad usage', () => {
    expect(() => parseArgs(['extract', 'in'])).toThrow(CliUsageError)
    expect(() => parseArgs(['sniff'])).toThrow('Usage: ransomsift sniff <FILE...>')
    expect(() => parseArgs(['convert'])).toThrow('Unknown command: convert')
    expect(() => parseArgs(['families', '--verbose'])).toThrow('Unknown option: --verbose')
    expect(() => parseArgs(['extract', 'in', 'out', '--workers', '-1'])).toThrow(
      '--workers expects a non-negative integer, got "-1"'
    )
    expect(() => parseArgs(['extract', 'in', 'out', '--config'])).toThrow('--config expects a path')
  })
})

describe('runCli', () => {
  function spyConsole() {
    return {
      log: vi.spyOn(console, 'log').mockImplementation(() => undefined),
      error: vi.spyOn(console, 'error').mockImplementation(() => undefined)
    }
  }

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should exit with 2 on a usage error', async () => {
    const { error } = spyConsole()
    expect(await runCli(['convert'])).toBe(2)
    expect(error).toHaveBeenCalledWith('[cli] Unknown command: convert')
  })

  it('should list the registered families', async () => {
    const { log } = spyConsole()
    expect(await runCli(['families'])).toBe(0)
    expect(log).toHaveBeenCalledWith('structural: gzip, jpeg, png, mp4, ole2, zip, ooxml, rar, pdf')
    expect(log).toHaveBeenCalledWith('encryption: ole2_enc, pdf_enc, zip_enc')
  })

  it('should fail when the input directory is missing', async () => {
    const { error } = spyConsole()
    const missing = path.join(os.tmpdir(), 'no-such-input-dir')
    expect(await runCli(['extract', missing, 'out'])).toBe(1)
    expect(error).toHaveBeenCalledWith(`[cli] Directory not found: ${missing}`)
  })

  it('should extract a directory and report the row count', async () => {
    const { log } = spyConsole()
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'))
    const input = path.join(root, 'in')
    const output = path.join(root, 'out')
    fs.mkdirSync(input)
    fs.writeFileSync(path.join(input, 'note.txt'), 'hello')
    try {
      expect(await runCli(['extract', input, output, '--quiet'])).toBe(0)
      expect(log).toHaveBeenCalledWith(`Wrote 1 rows to ${path.join(output, 'features_test.csv')}`)
    } finally {
      fs.rmSync(root, { recursive: true, force: true })
    }
  })

  it('should print a sniff result per file', async () => {
    const { log } = spyConsole()
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'))
    const file = path.join(root, 'empty.bin')
    fs.writeFileSync(file, Buffer.alloc(0))
    try {
      expect(await runCli(['sniff', file])).toBe(0)
      expect(log).toHaveBeenCalledWith(
        `${file} => {"format_family":"other","magic_ok":false,"magic_family":"unknown","size_bytes":0,"log_size":0}`
      )
    } finally {
      fs.rmSync(root, { recursive: true, force: true })
    }
  })
})
