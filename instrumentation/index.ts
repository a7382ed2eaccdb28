/**
 * Run Log Module
 *
 * Every pipeline run appends a RunReport to `<output>/runs.jsonl`.
 *
 * Usage:
 * ```typescript
 * import { appendRunReport, readRecentRuns, runLogPath } from './instrumentation'
 *
 * await appendRunReport(report, { outputPath: runLogPath('./data/processed') })
 * const runs = await readRecentRuns(runLogPath('./data/processed'), 10, { status: 'Failed' })
 * ```
 */

// Run Log Types
export type {
  RunError,
  RunLogFilter,
  RunLogOptions,
  RunReport,
  RunStatus,
  StageTiming,
  StateChange,
} from './types'

// JSONL Writer
export {
  RUN_LOG_FILE,
  appendRunReport,
  generateRunId,
  getFileSize,
  rotateIfNeeded,
  runLogPath,
} from './writer'

// JSONL Reader
export {
  formatRunSummary,
  readRecentRuns,
  readRunLog,
  runLogEntrySchema,
  streamRunLog,
  type RunLogEntry,
} from './reader'
