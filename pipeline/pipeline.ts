/**
 * Pipeline orchestrator
 *
 * Runs the stages in a fixed order as a linear state machine:
 *
 *   Idle → Reading → Cleaning → Joining → Deriving → Exporting → Done
 *
 * Any stage may move to Failed. A pipeline instance runs once; a failed
 * run is retried with a new instance from Idle.
 *
 * @module pipeline/pipeline
 */

import * as path from 'node:path'
import type { PipelineConfig } from '../datasets/types'
import type { RunError, RunReport, StageTiming, StateChange } from '../instrumentation/types'
import { appendRunReport, generateRunId, runLogPath } from '../instrumentation/writer'
import { cleanSource, type CleanReport } from './cleaner'
import { validatePipelineConfig, type RunOptions } from './config'
import { deriveColumns } from './deriver'
import { ConfigurationError, EtlError, describeError } from './errors'
import { exportTables, type ExportedFile, type FileOps } from './exporter'
import { executeJoinPlan, type JoinStep } from './joiner'
import { createLogger, type Logger } from './logger'
import { readSources } from './reader'
import type { Table } from './table'

export type PipelineState = 'Idle' | 'Reading' | 'Cleaning' | 'Joining' | 'Deriving' | 'Exporting' | 'Done' | 'Failed'

export const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  Idle: ['Reading', 'Failed'],
  Reading: ['Cleaning', 'Failed'],
  Cleaning: ['Joining', 'Failed'],
  Joining: ['Deriving', 'Failed'],
  Deriving: ['Exporting', 'Failed'],
  Exporting: ['Done', 'Failed'],
  Done: [],
  Failed: [],
}

export class PipelineStateError extends Error {
  constructor(
    readonly from: PipelineState,
    readonly to: PipelineState
  ) {
    super(`Invalid pipeline transition ${from} → ${to}`)
    this.name = 'PipelineStateError'
  }
}

export interface PipelineDeps {
  logger?: Logger
  fileOps?: FileOps
  now?: () => Date
  runId?: string
}

interface RunProgress {
  sourceRows: Record<string, number>
  cleaning: CleanReport[]
  joins: JoinStep[]
  factRows: number
  aggregateRows: Record<string, number>
  files: ExportedFile[]
}

export function toRunError(error: unknown): RunError {
  if (error instanceof EtlError) return { name: error.name, stage: error.stage, message: error.message }
  if (error instanceof Error) return { name: error.name, message: error.message }
  return { name: 'Error', message: String(error) }
}

export class EtlPipeline {
  private current: PipelineState = 'Idle'
  private readonly changes: StateChange[] = []
  private readonly timings: StageTiming[] = []
  private stageStartedAt = 0
  private readonly logger: Logger
  private readonly now: () => Date

  constructor(
    private readonly config: PipelineConfig,
    private readonly options: RunOptions,
    private readonly deps: PipelineDeps = {}
  ) {
    this.logger = deps.logger ?? createLogger(config.name, options.logLevel)
    this.now = deps.now ?? (() => new Date())
  }

  get state(): PipelineState {
    return this.current
  }

  get history(): StateChange[] {
    return [...this.changes]
  }

  get stageTimings(): StageTiming[] {
    return [...this.timings]
  }

  /**
   * Move to the next state.
   *
   * @throws PipelineStateError when the transition is not allowed
   */
  transition(to: PipelineState): void {
    const from = this.current
    if (!TRANSITIONS[from].includes(to)) {
      throw new PipelineStateError(from, to)
    }
    const at = this.now()
    if (from !== 'Idle') {
      this.timings.push({ stage: from, durationMs: at.getTime() - this.stageStartedAt })
    }
    this.stageStartedAt = at.getTime()
    this.changes.push({ from, to, at: at.toISOString() })
    this.current = to
    this.logger.debug(`${from} → ${to}`)
  }

  /**
   * Run every stage. On failure the pipeline ends in Failed, the error is
   * logged with its stage and rethrown.
   */
  async run(): Promise<RunReport> {
    if (this.current !== 'Idle') {
      throw new PipelineStateError(this.current, 'Reading')
    }

    const startedAt = this.now()
    const runId = this.deps.runId ?? generateRunId(startedAt)
    const progress: RunProgress = {
      sourceRows: {},
      cleaning: [],
      joins: [],
      factRows: 0,
      aggregateRows: {},
      files: [],
    }

    this.logger.info(`Run ${runId}: ${this.config.name}@${this.config.version} from ${this.options.inputDir}`)

    try {
      await this.execute(runId, progress)
    } catch (error) {
      this.transition('Failed')
      this.logger.error(`Run ${runId} failed: ${describeError(error)}`, error)
      await this.recordRun(this.report(runId, startedAt, progress, toRunError(error)))
      throw error
    }

    const report = this.report(runId, startedAt, progress)
    this.logger.info(
      `Run ${runId} done in ${report.durationMs}ms: ${report.factRows} fact rows, ${report.files.length} files`
    )
    await this.recordRun(report)
    return report
  }

  private async execute(runId: string, progress: RunProgress): Promise<void> {
    const { config, options } = this
    validatePipelineConfig(config)

    this.transition('Reading')
    const raw = await readSources(config.sources, {
      inputDir: options.inputDir,
      overrides: options.overrides,
      delimiter: options.delimiter,
      logger: this.logger.child('read'),
    })
    for (const [entity, table] of raw) progress.sourceRows[entity] = table.rows.length

    this.transition('Cleaning')
    const cleanLogger = this.logger.child('clean')
    const tables = new Map<string, Table>()
    for (const source of config.sources) {
      const table = raw.get(source.entity)
      if (!table) throw new ConfigurationError(`Source ${source.entity} was not read`)
      const { table: cleaned, report } = cleanSource(table, source, cleanLogger)
      tables.set(source.entity, cleaned)
      progress.cleaning.push(report)
    }
    for (const derived of config.derivedSources) {
      const from = tables.get(derived.from)
      if (!from) throw new ConfigurationError(`Derived source ${derived.name} reads unknown source ${derived.from}`)
      const table = derived.build(from)
      tables.set(derived.name, table)
      cleanLogger.info(`Built ${derived.name} from ${derived.from}: ${table.rows.length} rows`)
    }

    this.transition('Joining')
    const base = tables.get(config.baseTable)
    if (!base) throw new ConfigurationError(`Base table ${config.baseTable} is not a source`)
    const joined = executeJoinPlan(base, tables, config.joinPlan, {
      name: config.factTable,
      logger: this.logger.child('join'),
    })
    progress.joins = joined.steps

    this.transition('Deriving')
    const deriveLogger = this.logger.child('derive')
    const fact = deriveColumns(joined.table, config.derivations, deriveLogger)
    progress.factRows = fact.rows.length

    const outputTables = new Map<string, Table>([[config.factTable, fact]])
    for (const aggregate of config.aggregates) {
      const table = aggregate.build(fact, tables)
      outputTables.set(aggregate.name, table)
      progress.aggregateRows[aggregate.name] = table.rows.length
      deriveLogger.debug(`Aggregate ${aggregate.name}: ${table.rows.length} rows`)
    }

    this.transition('Exporting')
    const exported = await exportTables(outputTables, config.outputs, {
      outputDir: options.outputDir,
      runId,
      pipeline: { name: config.name, version: config.version },
      parquet: options.parquet,
      fileOps: this.deps.fileOps,
      logger: this.logger.child('export'),
      now: this.now,
    })
    progress.files = exported.files

    this.transition('Done')
  }

  private report(runId: string, startedAt: Date, progress: RunProgress, error?: RunError): RunReport {
    const finishedAt = this.now()
    return {
      runId,
      pipeline: this.config.name,
      version: this.config.version,
      status: error ? 'Failed' : 'Done',
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      stages: this.stageTimings,
      history: this.history,
      inputDir: path.resolve(this.options.inputDir),
      outputDir: path.resolve(this.options.outputDir),
      ...progress,
      error,
    }
  }

  private async recordRun(report: RunReport): Promise<void> {
    if (!this.options.runLog) return
    try {
      await appendRunReport(report, { outputPath: runLogPath(this.options.outputDir) })
    } catch (error) {
      this.logger.warn(`Could not append to the run log: ${describeError(error)}`)
    }
  }
}

/**
 * Create a pipeline and run it once.
 */
export function runPipeline(config: PipelineConfig, options: RunOptions, deps?: PipelineDeps): Promise<RunReport> {
  return new EtlPipeline(config, options, deps).run()
}
