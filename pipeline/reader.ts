/**
 * Source Reader
 *
 * Loads each configured CSV file into a table of raw cells. Values stay
 * strings (blank fields become null); typing is the cleaner's job.
 *
 * @module pipeline/reader
 */

import { readFile } from 'node:fs/promises'
import * as path from 'node:path'
import { parseString } from 'fast-csv'
import type { SourceConfig } from '../datasets/types'
import { ReadError, SchemaError, errorCode } from './errors'
import { silentLogger, type Logger } from './logger'
import { createTable, type Row, type Table } from './table'

export interface ReadOptions {
  inputDir: string
  // Per-entity file path overrides
  overrides?: Record<string, string>
  delimiter?: string
  logger?: Logger
}

export function resolveSourcePath(source: SourceConfig, options: ReadOptions): string {
  const override = options.overrides?.[source.entity]
  if (override) return path.resolve(override)
  return path.resolve(options.inputDir, source.file)
}

/**
 * Parse CSV text into records of raw fields (header row included).
 */
export function parseCsv(content: string, delimiter = ','): Promise<string[][]> {
  return new Promise((resolve, reject) => {
    const records: string[][] = []
    parseString<string[], string[]>(content.replace(/^\uFEFF/, ''), {
      headers: false,
      ignoreEmpty: true,
      delimiter,
    })
      .on('data', (record: string[]) => {
        records.push(record)
      })
      .on('error', reject)
      .on('end', () => resolve(records))
  })
}

/**
 * Build a table from parsed records, checking the header against the
 * source schema.
 */
export function recordsToTable(source: SourceConfig, records: string[][], filePath: string, logger: Logger = silentLogger): Table {
  const declared = source.columns.map((column) => column.name)

  if (records.length === 0) {
    throw new ReadError(filePath, `Source ${source.entity} has no header row: ${filePath}`)
  }

  const header = records[0].map((name) => name.trim())

  const seen = new Set<string>()
  const duplicates = new Set<string>()
  for (const name of header) {
    if (seen.has(name)) duplicates.add(name)
    seen.add(name)
  }
  if (duplicates.size > 0) {
    throw new SchemaError(
      'reading',
      source.entity,
      [...duplicates],
      `Source ${source.entity} has duplicate columns: ${[...duplicates].join(', ')}`
    )
  }

  const missing = source.columns
    .filter((column) => column.required !== false && !seen.has(column.name))
    .map((column) => column.name)
  if (missing.length > 0) {
    throw new SchemaError(
      'reading',
      source.entity,
      missing,
      `Source ${source.entity} (${filePath}) is missing required columns: ${missing.join(', ')}`
    )
  }

  const absentOptional = declared.filter((name) => !seen.has(name))
  if (absentOptional.length > 0) {
    logger.debug(`${source.entity}: optional columns absent, filled with null: ${absentOptional.join(', ')}`)
  }
  const ignored = header.filter((name) => !declared.includes(name))
  if (ignored.length > 0) {
    logger.debug(`${source.entity}: ignoring undeclared columns: ${ignored.join(', ')}`)
  }

  const positions = new Map<string, number>()
  header.forEach((name, index) => positions.set(name, index))

  const rows: Row[] = []
  for (let index = 1; index < records.length; index++) {
    const record = records[index]
    if (record.length > header.length) {
      throw new ReadError(
        filePath,
        `Source ${source.entity} record ${index} has ${record.length} fields, header has ${header.length}`,
        { details: { record: index } }
      )
    }

    const row: Row = {}
    for (const name of declared) {
      const position = positions.get(name)
      const raw = position === undefined ? undefined : record[position]
      row[name] = raw === undefined || raw.trim() === '' ? null : raw
    }
    rows.push(row)
  }

  return createTable(source.entity, declared, rows)
}

/**
 * Read one source into a raw table.
 *
 * @throws ReadError when the file is missing, unreadable or corrupt
 * @throws SchemaError when required columns are absent
 */
export async function readSource(source: SourceConfig, options: ReadOptions): Promise<Table> {
  const logger = options.logger ?? silentLogger
  const filePath = resolveSourcePath(source, options)

  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (err) {
    if (errorCode(err) === 'ENOENT' && source.required === false) {
      logger.warn(`Optional source ${source.entity} not found at ${filePath}; continuing with an empty table`)
      return createTable(source.entity, source.columns.map((column) => column.name))
    }
    throw new ReadError(filePath, `Cannot read source ${source.entity}: ${filePath}`, { cause: err })
  }

  let records: string[][]
  try {
    records = await parseCsv(content, options.delimiter)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new ReadError(filePath, `Corrupt CSV in source ${source.entity}: ${reason}`, { cause: err })
  }

  const table = recordsToTable(source, records, filePath, logger)
  logger.info(`Read ${table.rows.length} rows from ${source.entity} (${path.basename(filePath)})`)
  return table
}

/**
 * Read every source, in declaration order.
 */
export async function readSources(sources: SourceConfig[], options: ReadOptions): Promise<Map<string, Table>> {
  const tables = new Map<string, Table>()
  for (const source of sources) {
    tables.set(source.entity, await readSource(source, options))
  }
  return tables
}
