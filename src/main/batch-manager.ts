/**
 * BatchManager - Extracts feature records for every file under a directory.
 *
 * Files are discovered by a recursive walk, extracted either in-process or
 * across a pool of worker threads, and written in walk order to
 * `<outputDir>/features_test.csv` with a leading `path` column.
 *
 * A per-file failure (unreadable file, I/O error) is logged and counted;
 * the run continues. A schema mismatch aborts the run: it means the parser
 * code and the configured schema disagree, so every row would be wrong.
 */

import { Worker } from 'worker_threads'
import { EventEmitter } from 'events'
import { v4 as uuidv4 } from 'uuid'
import * as fs from 'node:fs/promises'
import * as path from 'path'

import type { BatchOptions, BatchSummary, FeatureConfig, FeatureRecord, FeatureValue } from '../shared/types'
import { ExtractionContext } from '../core/extraction/extract-context'
import { SchemaMismatchError } from '../core/aggregation/aggregators'
import { writeCsv } from './csv-writer'
import type { CsvRow } from './csv-writer'

export const OUTPUT_FILE_NAME = 'features_test.csv'
export const PATH_COLUMN = 'path'

/** Messages sent from the main thread to extraction workers. */
export type WorkerRequest =
  | { type: 'extract'; index: number; filePath: string }
  | { type: 'shutdown' }

/** Messages sent from extraction workers to the main thread. */
export type WorkerResponse =
  | { type: 'result'; index: number; record: Record<string, FeatureValue> }
  | { type: 'failed'; index: number; error: string }
  | { type: 'schema-mismatch'; index: number; filePath: string; missing: string[]; extra: string[] }

export interface WorkerInit {
  runId: string
  configPath: string
  debug: boolean
}

export interface BatchManagerOptions extends Partial<BatchOptions> {
  /** Config file the workers load; required when workers > 0. */
  configPath?: string
  debug?: boolean
}

/**
 * Events emitted by BatchManager:
 *   'file-done'   (runId, relativePath)
 *   'file-failed' (runId, relativePath, message)
 *   'complete'    (runId, summary)
 */
export class BatchManager extends EventEmitter {
  private readonly workers: number
  private readonly quiet: boolean
  private readonly debug: boolean
  private readonly configPath?: string

  constructor(
    private readonly config: FeatureConfig,
    options: BatchManagerOptions = {}
  ) {
    super()
    this.workers = Math.max(0, Math.floor(options.workers ?? 0))
    this.quiet = options.quiet ?? false
    this.debug = options.debug ?? false
    this.configPath = options.configPath
  }

  /**
   * Extract every file under `inputDir` and write the CSV into `outputDir`.
   *
   * @throws {SchemaMismatchError} If any record does not match the schema.
   */
  async run(inputDir: string, outputDir: string): Promise<BatchSummary> {
    const runId = uuidv4()
    const files = await walkFiles(inputDir)
    this.info(`[batch] ${runId} Extracting ${files.length} files from ${inputDir}`)

    const records =
      this.workers > 0 && files.length > 0
        ? await this.extractWithWorkers(runId, inputDir, files)
        : await this.extractInProcess(runId, inputDir, files)

    const columns = [PATH_COLUMN, ...this.config.schema.columns.map(c => c.name)]
    const rows: CsvRow[] = []
    files.forEach((file, i) => {
      const record = records[i]
      if (record) rows.push({ [PATH_COLUMN]: relativePath(inputDir, file), ...record })
    })

    const csvPath = path.join(outputDir, OUTPUT_FILE_NAME)
    const { finalPath } = await writeCsv(csvPath, columns, rows)

    const summary: BatchSummary = {
      runId,
      csvPath: finalPath,
      processed: rows.length,
      failed: files.length - rows.length
    }
    this.info(`[batch] ${runId} Done: ${summary.processed} ok, ${summary.failed} failed`)
    this.emit('complete', runId, summary)
    return summary
  }

  // ─── In-process ───────────────────────────────────────────────

  private async extractInProcess(
    runId: string,
    inputDir: string,
    files: readonly string[]
  ): Promise<(FeatureRecord | undefined)[]> {
    const context = new ExtractionContext(this.config, { debug: this.debug })
    const records: (FeatureRecord | undefined)[] = []

    for (const file of files) {
      const rel = relativePath(inputDir, file)
      try {
        records.push(await context.extract(file))
        this.emit('file-done', runId, rel)
      } catch (err) {
        if (err instanceof SchemaMismatchError) throw err
        records.push(undefined)
        this.fileFailed(runId, rel, err instanceof Error ? err.message : String(err))
      }
    }

    return records
  }

  // ─── Worker pool ──────────────────────────────────────────────

  private extractWithWorkers(
    runId: string,
    inputDir: string,
    files: readonly string[]
  ): Promise<(FeatureRecord | undefined)[]> {
    const configPath = this.configPath
    if (!configPath) {
      return Promise.reject(new Error('A config path is required to run extraction workers'))
    }

    const poolSize = Math.min(this.workers, files.length)
    const records: (FeatureRecord | undefined)[] = files.map(() => undefined)
    const pool: Worker[] = []

    return new Promise((resolve, reject) => {
      let next = 0
      let settled = 0
      let finished = false

      const shutdown = (): void => {
        for (const worker of pool) {
          worker.postMessage({ type: 'shutdown' } satisfies WorkerRequest)
        }
      }

      const fail = (err: Error): void => {
        if (finished) return
        finished = true
        for (const worker of pool) {
          worker.terminate().catch((termErr: unknown) => {
            console.error('[batch] Failed to terminate worker:', termErr)
          })
        }
        reject(err)
      }

      const dispatch = (worker: Worker): void => {
        if (next >= files.length) return
        const index = next++
        worker.postMessage({ type: 'extract', index, filePath: files[index] } satisfies WorkerRequest)
      }

      const handleMessage = (worker: Worker, msg: WorkerResponse): void => {
        if (finished) return
        const rel = relativePath(inputDir, files[msg.index])

        switch (msg.type) {
          case 'result':
            records[msg.index] = Object.freeze(msg.record)
            this.emit('file-done', runId, rel)
            break
          case 'failed':
            this.fileFailed(runId, rel, msg.error)
            break
          case 'schema-mismatch':
            fail(new SchemaMismatchError(msg.filePath, msg.missing, msg.extra))
            return
        }

        settled++
        if (settled === files.length) {
          finished = true
          shutdown()
          resolve(records)
        } else {
          dispatch(worker)
        }
      }

      const init: WorkerInit = { runId, configPath, debug: this.debug }
      for (let i = 0; i < poolSize; i++) {
        const worker = spawnExtractWorker(init)
        pool.push(worker)

        worker.on('message', (msg: WorkerResponse) => handleMessage(worker, msg))
        worker.on('error', (err) => {
          console.error(`[batch] ${runId} worker error:`, err.message)
          fail(err)
        })
        worker.on('exit', (code) => {
          if (code !== 0 && !finished) {
            console.error(`[batch] ${runId} worker exited with code`, code)
            fail(new Error(`Extraction worker exited with code ${code}`))
          }
        })

        dispatch(worker)
      }
    })
  }

  // ─── Private ──────────────────────────────────────────────────

  private fileFailed(runId: string, rel: string, message: string): void {
    console.error(`[batch] ${runId} Failed to extract ${rel}: ${message}`)
    this.emit('file-failed', runId, rel, message)
  }

  private info(message: string): void {
    if (!this.quiet) console.log(message)
  }
}

// ─── Helpers ──────────────────────────────────────────────────

/**
 * Start an extraction worker from the entry beside this module: the compiled
 * `.js` under dist, or the `.ts` source (through tsx's require hook) when the
 * package runs from its sources, as under Vitest.
 */
export function spawnExtractWorker(init: WorkerInit): Worker {
  const ext = path.extname(__filename)
  const workerPath = path.resolve(__dirname, `workers/extract.worker${ext}`)
  if (ext !== '.ts') {
    return new Worker(workerPath, { workerData: init })
  }

  const loader = require.resolve('tsx/cjs')
  const bootstrap = `require(${JSON.stringify(loader)})\nrequire(${JSON.stringify(workerPath)})`
  return new Worker(bootstrap, { eval: true, workerData: init })
}

/** Path relative to `root` with forward slashes. */
export function relativePath(root: string, file: string): string {
  return path.relative(root, file).split(path.sep).join('/')
}

/**
 * Recursively list regular files under `root`: each directory's files
 * (sorted by name) before its subdirectories (also sorted).
 */
export async function walkFiles(root: string): Promise<string[]> {
  const out: string[] = []
  const entries = await fs.readdir(root, { withFileTypes: true })
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

  for (const entry of entries) {
    if (entry.isFile()) out.push(path.join(root, entry.name))
  }
  for (const entry of entries) {
    if (entry.isDirectory()) out.push(...(await walkFiles(path.join(root, entry.name))))
  }
  return out
}
