/**
 * JSONL Writer for Run Reports
 *
 * Appends one line per pipeline run to the run log. Oversized logs are
 * rotated aside with a timestamp suffix before the next append.
 */

import { appendFile, mkdir, rename, stat } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { errorCode } from '../pipeline/errors'
import type { RunLogOptions, RunReport } from './types'

export const RUN_LOG_FILE = 'runs.jsonl'

const DEFAULT_MAX_SIZE_BYTES = 10 * 1024 * 1024

/**
 * Path of the run log inside an output directory.
 */
export function runLogPath(outputDir: string): string {
  return join(outputDir, RUN_LOG_FILE)
}

/**
 * Append a run report to the log.
 *
 * @example
 * ```typescript
 * await appendRunReport(report, { outputPath: runLogPath('./data/processed') })
 * ```
 */
export async function appendRunReport(report: RunReport, options: RunLogOptions): Promise<void> {
  await mkdir(dirname(options.outputPath), { recursive: true })
  await rotateIfNeeded(options.outputPath, options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES)
  await appendFile(options.outputPath, JSON.stringify(report) + '\n', 'utf-8')
}

/**
 * Generate a unique run ID.
 * Format: {timestamp}-{random}
 */
export function generateRunId(now: Date = new Date()): string {
  const timestamp = now.getTime().toString(36)
  const random = Math.random().toString(36).substring(2, 8)
  return `${timestamp}-${random}`
}

/**
 * Get file size in bytes.
 * Returns 0 if the file doesn't exist.
 */
export async function getFileSize(path: string): Promise<number> {
  try {
    const stats = await stat(path)
    return stats.size
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return 0
    throw error
  }
}

/**
 * Rotate the log if it exceeds the size limit.
 * Renames the existing file with a timestamp suffix.
 */
export async function rotateIfNeeded(outputPath: string, maxSizeBytes: number): Promise<boolean> {
  const size = await getFileSize(outputPath)

  if (size > maxSizeBytes) {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-')
    const rotatedPath = outputPath.replace(/\.jsonl$/, `-${timestamp}.jsonl`)

    await rename(outputPath, rotatedPath)
    return true
  }

  return false
}
