/**
 * JSONL Reader for the Run Log
 *
 * Streams run entries back out of the run log, newest last, with simple
 * filtering. Lines that do not parse as a run entry are skipped with a
 * warning.
 */

import { createReadStream } from 'node:fs'
import { createInterface } from 'node:readline'
import { z } from 'zod'
import { errorCode } from '../pipeline/errors'
import { silentLogger, type Logger } from '../pipeline/logger'
import type { RunLogFilter } from './types'

/**
 * The fields of a RunReport the history view relies on. Other fields
 * pass through unchecked.
 */
export const runLogEntrySchema = z
  .object({
    runId: z.string(),
    pipeline: z.string(),
    version: z.string(),
    status: z.enum(['Done', 'Failed']),
    startedAt: z.string(),
    finishedAt: z.string(),
    durationMs: z.number(),
    factRows: z.number(),
    error: z.object({ name: z.string(), stage: z.string().optional(), message: z.string() }).optional(),
  })
  .passthrough()

export type RunLogEntry = z.infer<typeof runLogEntrySchema>

function matchesFilter(entry: RunLogEntry, filter: RunLogFilter): boolean {
  if (filter.pipeline !== undefined && entry.pipeline !== filter.pipeline) return false
  if (filter.status !== undefined && entry.status !== filter.status) return false
  if (filter.since !== undefined && entry.startedAt < filter.since) return false
  return true
}

/**
 * Stream matching entries line by line.
 */
export async function* streamRunLog(
  inputPath: string,
  filter: RunLogFilter = {},
  logger: Logger = silentLogger
): AsyncGenerator<RunLogEntry> {
  const stream = createReadStream(inputPath, { encoding: 'utf-8' })
  const rl = createInterface({
    input: stream,
    crlfDelay: Infinity,
  })

  let lineNumber = 0
  for await (const line of rl) {
    lineNumber++
    if (!line.trim()) continue

    let value: unknown
    try {
      value = JSON.parse(line)
    } catch {
      logger.warn(`${inputPath}:${lineNumber} is not valid JSON, skipped`)
      continue
    }

    const parsed = runLogEntrySchema.safeParse(value)
    if (!parsed.success) {
      logger.warn(`${inputPath}:${lineNumber} is not a run entry, skipped`)
      continue
    }
    if (matchesFilter(parsed.data, filter)) yield parsed.data
  }
}

/**
 * Read every matching run. A missing log reads as no runs.
 */
export async function readRunLog(
  inputPath: string,
  filter: RunLogFilter = {},
  logger: Logger = silentLogger
): Promise<RunLogEntry[]> {
  const entries: RunLogEntry[] = []
  try {
    for await (const entry of streamRunLog(inputPath, filter, logger)) {
      entries.push(entry)
    }
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return []
    throw error
  }
  return entries
}

/**
 * The most recent `limit` runs, newest last.
 */
export async function readRecentRuns(inputPath: string, limit: number, filter: RunLogFilter = {}): Promise<RunLogEntry[]> {
  const entries = await readRunLog(inputPath, filter)
  return limit > 0 ? entries.slice(-limit) : entries
}

/**
 * One-line summary of a run for terminal output.
 */
export function formatRunSummary(entry: RunLogEntry): string {
  const seconds = (entry.durationMs / 1000).toFixed(1)
  const base = `${entry.startedAt}  ${entry.runId}  ${entry.pipeline}@${entry.version}  ${entry.status}  ${seconds}s`
  if (entry.error) {
    return `${base}  ${entry.error.name}${entry.error.stage ? ` [${entry.error.stage}]` : ''}: ${entry.error.message}`
  }
  return `${base}  ${entry.factRows} fact rows`
}
