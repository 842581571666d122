/**
 * Extraction worker thread - extracts feature records for files sent by the
 * BatchManager, one at a time, with its own ExtractionContext.
 *
 * Communication protocol (parentPort):
 *   Main -> Worker: { type: 'extract', index, filePath } | { type: 'shutdown' }
 *   Worker -> Main: { type: 'result', index, record }
 *   Worker -> Main: { type: 'failed', index, error }
 *   Worker -> Main: { type: 'schema-mismatch', index, filePath, missing, extra }
 *
 * workerData shape: { runId: string, configPath: string, debug: boolean }
 */

import { parentPort, workerData } from 'worker_threads'
import { z } from 'zod'

import { ExtractionContext } from '../../core/extraction/extract-context'
import { SchemaMismatchError } from '../../core/aggregation/aggregators'
import { loadConfig } from '../../core/schema/config-loader'
import type { WorkerResponse } from '../batch-manager'

if (!parentPort) {
  throw new Error('extract.worker.ts must be run as a worker thread')
}

const port = parentPort

const WorkerInitSchema = z.object({
  runId: z.string(),
  configPath: z.string(),
  debug: z.boolean()
})

const WorkerRequestSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('extract'), index: z.number().int().nonnegative(), filePath: z.string() }),
  z.object({ type: z.literal('shutdown') })
])

const init = WorkerInitSchema.parse(workerData)
const context = new ExtractionContext(loadConfig(init.configPath), { debug: init.debug })

function send(msg: WorkerResponse): void {
  port.postMessage(msg)
}

async function handleExtract(index: number, filePath: string): Promise<void> {
  try {
    const record = await context.extract(filePath)
    send({ type: 'result', index, record: { ...record } })
  } catch (err) {
    if (err instanceof SchemaMismatchError) {
      send({
        type: 'schema-mismatch',
        index,
        filePath: err.filePath,
        missing: [...err.missing],
        extra: [...err.extra]
      })
      return
    }
    send({ type: 'failed', index, error: err instanceof Error ? err.message : String(err) })
  }
}

port.on('message', (raw: unknown) => {
  const parsed = WorkerRequestSchema.safeParse(raw)
  if (!parsed.success) {
    console.error(`[worker] ${init.runId} Ignoring malformed message:`, parsed.error.message)
    return
  }

  const msg = parsed.data
  switch (msg.type) {
    case 'extract':
      void handleExtract(msg.index, msg.filePath)
      break
    case 'shutdown':
      port.close()
      break
  }
})
