#!/usr/bin/env node

import * as fs from 'node:fs'

import { loadConfig, DEFAULT_CONFIG_PATH, ConfigError } from '../core/schema/config-loader'
import { SchemaMismatchError } from '../core/aggregation/aggregators'
import { sniffFile } from '../core/sniffer/sniffer'
import { defaultRegistry } from '../core/parsers/registry'
import { BatchManager } from './batch-manager'

export type CliCommand =
  | { kind: 'extract'; inputDir: string; outputDir: string }
  | { kind: 'sniff'; files: string[] }
  | { kind: 'families' }
  | { kind: 'help' }

export interface CliOptions {
  command: CliCommand
  configPath: string
  workers: number
  quiet: boolean
  debug: boolean
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

function parseWorkers(value: string | undefined): number {
  const n = value === undefined ? NaN : Number(value)
  if (!Number.isInteger(n) || n < 0) {
    throw new CliUsageError(`--workers expects a non-negative integer, got "${value ?? ''}"`)
  }
  return n
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws {CliUsageError} On an unknown option, a bad option value, or
 *   missing positional arguments.
 */
export function parseArgs(args: readonly string[]): CliOptions {
  let configPath = DEFAULT_CONFIG_PATH
  let workers = 0
  let quiet = false
  let debug = false
  let help = false
  const positional: string[] = []

  for (let i = 0; i < args.length; i++) {
    let arg = args[i]
    let value: string | undefined = args[i + 1]
    let usedEqualsSyntax = false

    // Support --flag=value syntax: split on first '='
    if (arg.startsWith('--') && arg.includes('=')) {
      const eqIndex = arg.indexOf('=')
      value = arg.slice(eqIndex + 1)
      arg = arg.slice(0, eqIndex)
      usedEqualsSyntax = true
    }

    const consumeValue = (): void => {
      if (!usedEqualsSyntax) i++
    }

    switch (arg) {
      case '--config':
        if (value === undefined) throw new CliUsageError('--config expects a path')
        configPath = value
        consumeValue()
        break
      case '--workers':
        workers = parseWorkers(value)
        consumeValue()
        break
      case '--quiet':
      case '-q':
        quiet = true
        break
      case '--debug':
        debug = true
        break
      case '--help':
      case '-h':
        help = true
        break
      default:
        if (arg.startsWith('-')) throw new CliUsageError(`Unknown option: ${arg}`)
        positional.push(arg)
    }
  }

  const options = { configPath, workers, quiet, debug }
  const [name, ...rest] = positional

  if (help || name === undefined || name === 'help') {
    return { command: { kind: 'help' }, ...options }
  }

  switch (name) {
    case 'extract':
      if (rest.length !== 2) {
        throw new CliUsageError('Usage: ransomsift extract <INPUT_DIR> <OUTPUT_DIR>')
      }
      return { command: { kind: 'extract', inputDir: rest[0], outputDir: rest[1] }, ...options }
    case 'sniff':
      if (rest.length === 0) throw new CliUsageError('Usage: ransomsift sniff <FILE...>')
      return { command: { kind: 'sniff', files: rest }, ...options }
    case 'families':
      return { command: { kind: 'families' }, ...options }
    default:
      throw new CliUsageError(`Unknown command: ${name}`)
  }
}

function printHelp(): void {
  console.log(`
ransomsift - file feature extraction for encrypted-content classification

USAGE:
  ransomsift extract <INPUT_DIR> <OUTPUT_DIR> [OPTIONS]
  ransomsift sniff <FILE...> [OPTIONS]
  ransomsift families

OPTIONS:
  --config <path>     Feature configuration (default: config/features.yaml)
  --workers <n>       Worker threads for extraction; 0 runs in-process (default: 0)
  -q, --quiet         Only print errors and the final summary line
  --debug             Log parser failure reasons
  -h, --help          Show this help message

EXAMPLES:
  ransomsift extract ./samples ./out --workers=4
  ransomsift sniff report.pdf archive.zip
`)
}

export async function runCli(args: readonly string[]): Promise<number> {
  let options: CliOptions
  try {
    options = parseArgs(args)
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`[cli] ${err.message}`)
      return 2
    }
    throw err
  }

  const { command } = options
  switch (command.kind) {
    case 'help':
      printHelp()
      return 0

    case 'families':
      console.log(`structural: ${defaultRegistry.structuralFamilies().join(', ')}`)
      console.log(`encryption: ${defaultRegistry.encryptionFamilies().join(', ')}`)
      return 0

    case 'sniff': {
      const config = loadConfig(options.configPath)
      for (const file of command.files) {
        const result = await sniffFile(file, config.sniffer)
        console.log(`${file} => ${JSON.stringify(result)}`)
      }
      return 0
    }

    case 'extract': {
      if (!fs.existsSync(command.inputDir) || !fs.statSync(command.inputDir).isDirectory()) {
        console.error(`[cli] Directory not found: ${command.inputDir}`)
        return 1
      }
      const config = loadConfig(options.configPath)
      const manager = new BatchManager(config, {
        workers: options.workers,
        quiet: options.quiet,
        debug: options.debug,
        configPath: options.configPath
      })
      const summary = await manager.run(command.inputDir, command.outputDir)
      console.log(`Wrote ${summary.processed} rows to ${summary.csvPath}`)
      return 0
    }
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code
    })
    .catch((error: unknown) => {
      if (error instanceof ConfigError || error instanceof SchemaMismatchError) {
        console.error(`[cli] ${error.message}`)
        if (error instanceof ConfigError && error.remediation) {
          console.error(`[cli] ${error.remediation}`)
        }
      } else {
        console.error('[cli] Fatal error:', error)
      }
      process.exitCode = 1
    })
}
