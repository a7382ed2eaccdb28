/**
 * Exporter
 *
 * Writes each output table as a CSV file with its documented header, then
 * a manifest describing the run's files and, optionally, a DuckDB script
 * that converts every CSV to Parquet.
 *
 * Files are staged in `<output>/.staging-<runId>` and moved into the
 * output directory only once every file of the run is written; a failed
 * export removes the staging directory and leaves the previous run's files
 * as they were. Each write goes through a temporary path and a rename. A
 * transient I/O failure is retried once.
 *
 * @module pipeline/exporter
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import * as path from 'node:path'
import { writeToString } from 'fast-csv'
import type { OutputColumnType, OutputTableConfig } from '../datasets/types'
import { formatDate, formatTimestamp } from './dates'
import { SchemaError, WriteError, describeError, errorCode } from './errors'
import { silentLogger, type Logger } from './logger'
import type { Cell, Table } from './table'

export const MANIFEST_FILE = 'manifest.json'
export const PARQUET_SCRIPT_FILE = 'to_parquet.sql'
export const STAGING_PREFIX = '.staging-'

// Error codes worth a second attempt
export const TRANSIENT_CODES = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'EIO', 'ETIMEDOUT'])

/**
 * File operations used by the exporter, replaceable in tests.
 */
export interface FileOps {
  writeFile(filePath: string, content: string): Promise<void>
  rename(from: string, to: string): Promise<void>
  remove(filePath: string): Promise<void>
  makeDir(dirPath: string): Promise<void>
  removeDir(dirPath: string): Promise<void>
}

export const nodeFileOps: FileOps = {
  writeFile: (filePath, content) => writeFile(filePath, content, 'utf8'),
  rename: (from, to) => rename(from, to),
  remove: (filePath) => rm(filePath, { force: true }),
  makeDir: async (dirPath) => {
    await mkdir(dirPath, { recursive: true })
  },
  removeDir: (dirPath) => rm(dirPath, { recursive: true, force: true }),
}

export interface ExportOptions {
  outputDir: string
  runId: string
  pipeline: { name: string; version: string }
  parquet?: boolean
  fileOps?: FileOps
  logger?: Logger
  now?: () => Date
}

export interface ExportedFile {
  file: string
  table: string
  description: string
  rows: number
  columns: Array<{ name: string; type: OutputColumnType }>
}

export interface Manifest {
  runId: string
  pipeline: string
  version: string
  generatedAt: string
  files: ExportedFile[]
  parquetScript: string | null
}

export interface ExportResult {
  files: ExportedFile[]
  manifestPath: string
  parquetScriptPath: string | null
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Render one cell for CSV output. Null is an empty field.
 */
export function formatCell(value: Cell, type: OutputColumnType): string {
  if (value === null) return ''
  if (value instanceof Date) return type === 'date' ? formatDate(value) : formatTimestamp(value)
  if (typeof value === 'boolean') return value ? 'true' : 'false'
  return String(value)
}

/**
 * Render a table as CSV with the output's columns, in the output's order.
 *
 * @throws SchemaError when the table lacks a documented column
 */
export async function tableToCsv(table: Table, output: OutputTableConfig): Promise<string> {
  const missing = output.columns.map((column) => column.name).filter((name) => !table.columns.includes(name))
  if (missing.length > 0) {
    throw new SchemaError(
      'exporting',
      output.table,
      missing,
      `Table ${table.name} is missing documented output columns: ${missing.join(', ')}`
    )
  }

  const rows = table.rows.map((row) => output.columns.map((column) => formatCell(row[column.name] ?? null, column.type)))

  return writeToString(rows, {
    headers: output.columns.map((column) => column.name),
    alwaysWriteHeaders: true,
    includeEndRowDelimiter: true,
  })
}

// ============================================================================
// Atomic writes
// ============================================================================

function isTransient(err: unknown): string | undefined {
  const code = errorCode(err)
  return code !== undefined && TRANSIENT_CODES.has(code) ? code : undefined
}

/**
 * Write a file through a temporary sibling and a rename. Returns the number
 * of attempts used.
 *
 * @throws WriteError on a non-transient failure or a second failure
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
  options: { fileOps?: FileOps; logger?: Logger } = {}
): Promise<number> {
  const ops = options.fileOps ?? nodeFileOps
  const logger = options.logger ?? silentLogger
  const tempPath = `${filePath}.${process.pid}.tmp`

  for (let attempt = 1; ; attempt++) {
    try {
      await ops.writeFile(tempPath, content)
      await ops.rename(tempPath, filePath)
      return attempt
    } catch (err) {
      await ops.remove(tempPath).catch((cleanupError: unknown) => {
        logger.debug(`Could not remove ${tempPath}: ${describeError(cleanupError)}`)
      })

      const code = isTransient(err)
      if (attempt === 1 && code !== undefined) {
        logger.warn(`Transient ${code} writing ${filePath}, retrying once`)
        continue
      }
      throw new WriteError(filePath, attempt, `Failed to write ${filePath}: ${describeError(err)}`, { cause: err })
    }
  }
}

/**
 * Move a staged file into place, retrying a transient failure once.
 *
 * @throws WriteError on a non-transient failure or a second failure
 */
export async function moveFile(
  from: string,
  to: string,
  options: { fileOps?: FileOps; logger?: Logger } = {}
): Promise<number> {
  const ops = options.fileOps ?? nodeFileOps
  const logger = options.logger ?? silentLogger

  for (let attempt = 1; ; attempt++) {
    try {
      await ops.rename(from, to)
      return attempt
    } catch (err) {
      const code = isTransient(err)
      if (attempt === 1 && code !== undefined) {
        logger.warn(`Transient ${code} moving ${from} to ${to}, retrying once`)
        continue
      }
      throw new WriteError(to, attempt, `Failed to move ${from} to ${to}: ${describeError(err)}`, { cause: err })
    }
  }
}

// ============================================================================
// Parquet conversion script
// ============================================================================

const DUCKDB_TYPES: Record<OutputColumnType, string> = {
  string: 'VARCHAR',
  integer: 'BIGINT',
  decimal: 'DOUBLE',
  boolean: 'BOOLEAN',
  timestamp: 'TIMESTAMP',
  date: 'DATE',
}

function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}

/**
 * DuckDB script converting every exported CSV to Parquet with the
 * documented column types. Paths are relative to the output directory.
 */
export function generateParquetScript(outputs: OutputTableConfig[]): string {
  const lines: string[] = []
  lines.push('-- DuckDB Parquet conversion script')
  lines.push(`-- Run from the output directory: duckdb < ${PARQUET_SCRIPT_FILE}`)

  for (const output of outputs) {
    const columns = output.columns
      .map((column) => `${sqlString(column.name)}: ${sqlString(DUCKDB_TYPES[column.type])}`)
      .join(', ')
    lines.push('')
    lines.push(`-- ${output.description}`)
    lines.push('COPY (')
    lines.push(`  SELECT * FROM read_csv(${sqlString(`${output.file}.csv`)}, header=true, columns={${columns}})`)
    lines.push(`) TO ${sqlString(`${output.file}.parquet`)} (FORMAT PARQUET, COMPRESSION 'zstd');`)
  }

  return lines.join('\n') + '\n'
}

// ============================================================================
// Export
// ============================================================================

/**
 * Export every configured output table. All tables are checked against
 * their documented columns before the first file is written, and nothing
 * reaches the output directory until every file is staged.
 *
 * @throws SchemaError when a table is absent or lacks a documented column
 * @throws WriteError when a file cannot be written or moved into place
 */
export async function exportTables(
  tables: Map<string, Table>,
  outputs: OutputTableConfig[],
  options: ExportOptions
): Promise<ExportResult> {
  const logger = options.logger ?? silentLogger
  const ops = options.fileOps ?? nodeFileOps
  const now = options.now ?? (() => new Date())
  const outputDir = path.resolve(options.outputDir)
  const stagingDir = path.join(outputDir, `${STAGING_PREFIX}${options.runId}`)

  const rendered: Array<{ output: OutputTableConfig; csv: string; rows: number }> = []
  for (const output of outputs) {
    const table = tables.get(output.table)
    if (!table) {
      throw new SchemaError('exporting', output.table, [], `No table ${output.table} to export as ${output.file}.csv`)
    }
    rendered.push({ output, csv: await tableToCsv(table, output), rows: table.rows.length })
  }

  try {
    await ops.makeDir(stagingDir)
  } catch (err) {
    throw new WriteError(outputDir, 1, `Cannot create output directory ${outputDir}: ${describeError(err)}`, {
      cause: err,
    })
  }

  const files: ExportedFile[] = []
  const staged: string[] = []
  const stage = async (file: string, content: string): Promise<void> => {
    await writeFileAtomic(path.join(stagingDir, file), content, { fileOps: ops, logger })
    staged.push(file)
  }
  const removeStaging = (): Promise<void> =>
    ops.removeDir(stagingDir).catch((cleanupError: unknown) => {
      logger.warn(`Could not remove ${stagingDir}: ${describeError(cleanupError)}`)
    })

  try {
    for (const { output, csv, rows } of rendered) {
      const file = `${output.file}.csv`
      await stage(file, csv)
      logger.info(`Wrote ${rows} rows to ${file}`)
      files.push({
        file,
        table: output.table,
        description: output.description,
        rows,
        columns: output.columns.map((column) => ({ name: column.name, type: column.type })),
      })
    }

    if (options.parquet) {
      await stage(PARQUET_SCRIPT_FILE, generateParquetScript(outputs))
      logger.info(`Wrote ${PARQUET_SCRIPT_FILE}; run it with duckdb from ${outputDir}`)
    }

    const manifest: Manifest = {
      runId: options.runId,
      pipeline: options.pipeline.name,
      version: options.pipeline.version,
      generatedAt: now().toISOString(),
      files,
      parquetScript: options.parquet ? PARQUET_SCRIPT_FILE : null,
    }
    await stage(MANIFEST_FILE, JSON.stringify(manifest, null, 2) + '\n')

    for (const file of staged) {
      await moveFile(path.join(stagingDir, file), path.join(outputDir, file), { fileOps: ops, logger })
    }
  } catch (err) {
    await removeStaging()
    throw err
  }

  await removeStaging()
  logger.debug(`Moved ${staged.length} files into ${outputDir}`)

  return {
    files,
    manifestPath: path.join(outputDir, MANIFEST_FILE),
    parquetScriptPath: options.parquet ? path.join(outputDir, PARQUET_SCRIPT_FILE) : null,
  }
}
