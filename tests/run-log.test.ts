/**
 * Run Log Writer & Reader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { appendFile, readdir } from 'node:fs/promises'
import { join } from 'node:path'
import {
  appendRunReport,
  formatRunSummary,
  generateRunId,
  readRecentRuns,
  readRunLog,
  rotateIfNeeded,
  runLogPath,
  type RunReport,
} from '../instrumentation'
import { RecordingLogger, makeTempDir, removeDir } from './helpers'

function report(overrides: Partial<RunReport> = {}): RunReport {
  return {
    runId: 'run-1',
    pipeline: 'ecommerce',
    version: '1.0.0',
    status: 'Done',
    startedAt: '2024-01-01T00:00:00.000Z',
    finishedAt: '2024-01-01T00:00:01.500Z',
    durationMs: 1500,
    stages: [],
    history: [],
    inputDir: '/data/raw',
    outputDir: '/data/processed',
    sourceRows: {},
    cleaning: [],
    joins: [],
    factRows: 5,
    aggregateRows: {},
    files: [],
    ...overrides,
  }
}

describe('Run Log', () => {
  let dir: string
  let logPath: string

  beforeEach(async () => {
    dir = await makeTempDir()
    logPath = runLogPath(join(dir, 'processed'))
  })

  afterEach(async () => {
    await removeDir(dir)
  })

  it('should append one line per run and read them back in order', async () => {
    await appendRunReport(report(), { outputPath: logPath })
    await appendRunReport(report({ runId: 'run-2', status: 'Failed' }), { outputPath: logPath })

    const runs = await readRunLog(logPath)

    expect(runs.map((run) => run.runId)).toEqual(['run-1', 'run-2'])
    expect(runs[0].sourceRows).toEqual({})
  })

  it('should filter by status, pipeline and start time', async () => {
    await appendRunReport(report(), { outputPath: logPath })
    await appendRunReport(report({ runId: 'run-2', status: 'Failed', startedAt: '2024-02-01T00:00:00.000Z' }), {
      outputPath: logPath,
    })
    await appendRunReport(report({ runId: 'run-3', pipeline: 'other' }), { outputPath: logPath })

    expect((await readRunLog(logPath, { status: 'Failed' })).map((run) => run.runId)).toEqual(['run-2'])
    expect((await readRunLog(logPath, { pipeline: 'ecommerce' })).map((run) => run.runId)).toEqual(['run-1', 'run-2'])
    expect((await readRunLog(logPath, { since: '2024-01-15T00:00:00.000Z' })).map((run) => run.runId)).toEqual(['run-2'])
  })

  it('should keep the most recent runs', async () => {
    for (const runId of ['a', 'b', 'c']) {
      await appendRunReport(report({ runId }), { outputPath: logPath })
    }
    expect((await readRecentRuns(logPath, 2)).map((run) => run.runId)).toEqual(['b', 'c'])
  })

  it('should skip malformed lines with a warning', async () => {
    await appendRunReport(report(), { outputPath: logPath })
    await appendFile(logPath, 'not json\n{"runId":1}\n\n', 'utf-8')
    await appendRunReport(report({ runId: 'run-2' }), { outputPath: logPath })
    const logger = new RecordingLogger()

    const runs = await readRunLog(logPath, {}, logger)

    expect(runs.map((run) => run.runId)).toEqual(['run-1', 'run-2'])
    expect(logger.messages('warn')).toEqual([
      `${logPath}:2 is not valid JSON, skipped`,
      `${logPath}:3 is not a run entry, skipped`,
    ])
  })

  it('should read a missing log as no runs', async () => {
    expect(await readRunLog(join(dir, 'missing.jsonl'))).toEqual([])
  })

  it('should rotate an oversized log aside', async () => {
    await appendRunReport(report(), { outputPath: logPath, maxSizeBytes: 10 })
    await appendRunReport(report({ runId: 'run-2' }), { outputPath: logPath, maxSizeBytes: 10 })

    const files = await readdir(join(dir, 'processed'))
    expect(files).toHaveLength(2)
    expect(files.filter((file) => /^runs-.+\.jsonl$/.test(file))).toHaveLength(1)
    expect((await readRunLog(logPath)).map((run) => run.runId)).toEqual(['run-2'])
  })

  it('should not rotate a missing log', async () => {
    expect(await rotateIfNeeded(join(dir, 'missing.jsonl'), 0)).toBe(false)
  })

  it('should build run ids from the start time', () => {
    expect(generateRunId(new Date(0))).toMatch(/^0-[a-z0-9]{1,6}$/)
    expect(generateRunId(new Date(Date.UTC(2024, 0, 1)))).toMatch(new RegExp(`^${Date.UTC(2024, 0, 1).toString(36)}-`))
  })

  describe('formatRunSummary', () => {
    it('should summarize a successful run', async () => {
      await appendRunReport(report(), { outputPath: logPath })
      const [entry] = await readRunLog(logPath)

      expect(formatRunSummary(entry)).toBe('2024-01-01T00:00:00.000Z  run-1  ecommerce@1.0.0  Done  1.5s  5 fact rows')
    })

    it('should show the error of a failed run', async () => {
      await appendRunReport(
        report({ status: 'Failed', durationMs: 200, error: { name: 'ReadError', stage: 'reading', message: 'boom' } }),
        { outputPath: logPath }
      )
      const [entry] = await readRunLog(logPath)

      expect(formatRunSummary(entry)).toBe(
        '2024-01-01T00:00:00.000Z  run-1  ecommerce@1.0.0  Failed  0.2s  ReadError [reading]: boom'
      )
    })
  })
})
