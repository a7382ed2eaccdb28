/**
 * Run Log Format Types
 *
 * Every pipeline run produces one RunReport, appended as a line of
 * newline-delimited JSON (JSONL) to the output directory's run log so runs
 * can be compared over time.
 */

import type { CleanReport } from '../pipeline/cleaner'
import type { ExportedFile } from '../pipeline/exporter'
import type { JoinStep } from '../pipeline/joiner'
import type { PipelineState } from '../pipeline/pipeline'

export type RunStatus = 'Done' | 'Failed'

export interface StateChange {
  from: PipelineState
  to: PipelineState
  // ISO 8601
  at: string
}

export interface StageTiming {
  stage: PipelineState
  durationMs: number
}

export interface RunError {
  name: string
  // Stage the error was raised in, when it is an ETL error
  stage?: string
  message: string
}

/**
 * Outcome of one pipeline run.
 */
export interface RunReport {
  // ============================================================
  // Identification
  // ============================================================

  /**
   * Unique run id, also written to the manifest.
   * Format: "{timestamp36}-{random}"
   */
  runId: string

  pipeline: string

  version: string

  status: RunStatus

  // ============================================================
  // Timing
  // ============================================================

  startedAt: string

  finishedAt: string

  durationMs: number

  stages: StageTiming[]

  history: StateChange[]

  // ============================================================
  // Data
  // ============================================================

  inputDir: string

  outputDir: string

  /**
   * Raw row counts per source entity, as read.
   */
  sourceRows: Record<string, number>

  cleaning: CleanReport[]

  joins: JoinStep[]

  factRows: number

  /**
   * Row counts of the aggregate tables.
   */
  aggregateRows: Record<string, number>

  files: ExportedFile[]

  error?: RunError
}

/**
 * Options for the run log writer.
 */
export interface RunLogOptions {
  // Path to the JSONL file
  outputPath: string

  // Rotate the log once it grows past this size (default 10 MB)
  maxSizeBytes?: number
}

/**
 * Filter for reading the run log.
 */
export interface RunLogFilter {
  pipeline?: string
  status?: RunStatus
  // Only runs started at or after this ISO timestamp
  since?: string
}
