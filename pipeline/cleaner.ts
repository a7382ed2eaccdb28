/**
 * Cleaner
 *
 * Applies declarative per-column rules to a raw table:
 *
 * 1. coerce every ruled cell to its declared type (a value that fails
 *    coercion, its valid range or its enum codes counts as invalid and
 *    becomes null)
 * 2. apply the column's null policy: drop the row, keep the null, or impute
 * 3. deduplicate on the primary key, keeping the first occurrence
 *
 * Bad rows are filtered and counted, never fatal on their own. An empty or
 * below-threshold result raises DataQualityError.
 *
 * @module pipeline/cleaner
 */

import type { CleaningRules, ColumnRule, QualityConfig, SourceConfig } from '../datasets/types'
import { parseTimestamp, startOfUtcDay } from './dates'
import { ConfigurationError, DataQualityError } from './errors'
import { silentLogger, type Logger } from './logger'
import { compositeKey, createTable, type Cell, type Row, type Table } from './table'

export interface CleanOptions {
  primaryKey?: string[]
  quality?: QualityConfig
  // Optional sources may legitimately be empty
  allowEmpty?: boolean
  logger?: Logger
}

export interface CleanReport {
  table: string
  inputRows: number
  outputRows: number
  droppedRows: number
  duplicateRows: number
  imputedCells: Record<string, number>
  invalidCells: Record<string, number>
}

export interface CleanResult {
  table: Table
  report: CleanReport
}

type Coerced = { valid: true; value: Cell } | { valid: false }

const INVALID: Coerced = { valid: false }

const TRUE_VALUES = new Set(['true', '1', 'yes', 'y', 't'])
const FALSE_VALUES = new Set(['false', '0', 'no', 'n', 'f'])

// ============================================================================
// Coercion
// ============================================================================

function applyCase(value: string, mode: ColumnRule['case']): string {
  switch (mode) {
    case 'lower':
      return value.toLowerCase()
    case 'upper':
      return value.toUpperCase()
    default:
      return value
  }
}

function parseNumber(value: Cell): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value !== 'string') return null
  const cleaned = value.trim().replace(/,/g, '')
  if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(cleaned)) return null
  const parsed = Number(cleaned)
  return Number.isFinite(parsed) ? parsed : null
}

function parseDateCell(value: Cell): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value
  if (typeof value !== 'string') return null
  return parseTimestamp(value)
}

function rangeBound(bound: number | string | undefined, rule: ColumnRule): number | undefined {
  if (bound === undefined) return undefined
  if (typeof bound === 'number') return bound
  const parsed = parseTimestamp(bound)
  if (!parsed) return undefined
  return rule.type === 'date' ? startOfUtcDay(parsed).getTime() : parsed.getTime()
}

function inRange(measure: number, rule: ColumnRule): boolean {
  const min = rangeBound(rule.validRange?.min, rule)
  const max = rangeBound(rule.validRange?.max, rule)
  if (min !== undefined && measure < min) return false
  if (max !== undefined && measure > max) return false
  return true
}

/**
 * Coerce one cell to the rule's type. Null input stays null (valid);
 * values that cannot be coerced or fall outside the rule are invalid.
 */
export function coerceCell(value: Cell, rule: ColumnRule): Coerced {
  if (value === null) return { valid: true, value: null }
  if (typeof value === 'string' && rule.trim !== false && value.trim() === '') {
    return { valid: true, value: null }
  }

  switch (rule.type) {
    case 'string': {
      if (typeof value !== 'string') return { valid: true, value: String(value) }
      const text = applyCase(rule.trim === false ? value : value.trim(), rule.case)
      return { valid: true, value: text }
    }

    case 'enum': {
      if (typeof value !== 'string') return INVALID
      const code = applyCase(value.trim(), rule.case ?? 'lower')
      if (rule.values && !rule.values.includes(code)) return INVALID
      return { valid: true, value: code }
    }

    case 'integer': {
      const parsed = parseNumber(value)
      if (parsed === null || !Number.isInteger(parsed) || !inRange(parsed, rule)) return INVALID
      return { valid: true, value: parsed }
    }

    case 'decimal': {
      const parsed = parseNumber(value)
      if (parsed === null || !inRange(parsed, rule)) return INVALID
      return { valid: true, value: parsed }
    }

    case 'boolean': {
      if (typeof value === 'boolean') return { valid: true, value }
      const text = String(value).trim().toLowerCase()
      if (TRUE_VALUES.has(text)) return { valid: true, value: true }
      if (FALSE_VALUES.has(text)) return { valid: true, value: false }
      return INVALID
    }

    case 'timestamp':
    case 'date': {
      const parsed = parseDateCell(value)
      if (!parsed) return INVALID
      const normalized = rule.type === 'date' ? startOfUtcDay(parsed) : parsed
      if (!inRange(normalized.getTime(), rule)) return INVALID
      return { valid: true, value: normalized }
    }
  }
}

/**
 * Median of the column's valid values: the mean of the two middle values
 * for decimals, the lower middle value for integers.
 */
export function median(values: number[], integer = false): number | null {
  if (values.length === 0) return null
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  if (sorted.length % 2 === 1) return sorted[mid]
  return integer ? sorted[mid - 1] : (sorted[mid - 1] + sorted[mid]) / 2
}

// ============================================================================
// Rule validation
// ============================================================================

/**
 * Reject rules that can never be satisfied before any row is touched.
 */
export function validateRules(table: Table, rules: CleaningRules, primaryKey: string[] = []): void {
  for (const [column, rule] of Object.entries(rules)) {
    if (!table.columns.includes(column)) {
      throw new ConfigurationError(`Cleaning rule for ${table.name}.${column} names an unknown column`)
    }
    if (rule.type === 'enum' && (!rule.values || rule.values.length === 0)) {
      throw new ConfigurationError(`Enum column ${table.name}.${column} declares no values`)
    }
    if (typeof rule.onNull === 'object') {
      if (rule.onNull.impute === 'median' && rule.type !== 'integer' && rule.type !== 'decimal') {
        throw new ConfigurationError(`Median imputation on non-numeric column ${table.name}.${column}`)
      }
      if (rule.onNull.impute === 'constant') {
        const coerced = coerceCell(rule.onNull.value, rule)
        if (!coerced.valid || coerced.value === null) {
          throw new ConfigurationError(`Imputed value for ${table.name}.${column} does not satisfy its own rule`)
        }
      }
    }
  }
  for (const column of primaryKey) {
    if (!table.columns.includes(column)) {
      throw new ConfigurationError(`Primary key column ${table.name}.${column} is not in the table`)
    }
  }
}

// ============================================================================
// Cleaning
// ============================================================================

/**
 * Keep the first row per primary key. Rows with a null key part are
 * returned separately. Idempotent.
 */
export function deduplicate(rows: Row[], primaryKey: string[]): { rows: Row[]; duplicates: number; nullKeys: number } {
  if (primaryKey.length === 0) return { rows, duplicates: 0, nullKeys: 0 }

  const seen = new Set<string>()
  const kept: Row[] = []
  let duplicates = 0
  let nullKeys = 0

  for (const row of rows) {
    const key = compositeKey(row, primaryKey)
    if (key === null) {
      nullKeys++
      continue
    }
    if (seen.has(key)) {
      duplicates++
      continue
    }
    seen.add(key)
    kept.push(row)
  }

  return { rows: kept, duplicates, nullKeys }
}

/**
 * Clean a table with per-column rules.
 *
 * @throws ConfigurationError for rules that name unknown columns or cannot hold
 * @throws DataQualityError when the result is empty or breaks a quality threshold
 */
export function cleanTable(table: Table, rules: CleaningRules, options: CleanOptions = {}): CleanResult {
  const logger = options.logger ?? silentLogger
  const primaryKey = options.primaryKey ?? []
  validateRules(table, rules, primaryKey)

  const ruled = Object.entries(rules)
  const invalidCells: Record<string, number> = {}
  const imputedCells: Record<string, number> = {}

  // Pass 1: coerce; invalid cells become null
  const coercedRows: Row[] = table.rows.map((row) => {
    const next: Row = { ...row }
    for (const [column, rule] of ruled) {
      const result = coerceCell(row[column] ?? null, rule)
      if (result.valid) {
        next[column] = result.value
      } else {
        next[column] = null
        invalidCells[column] = (invalidCells[column] ?? 0) + 1
      }
    }
    return next
  })

  // Medians come from the valid values of the first row per key, before any drop
  const medians = new Map<string, number | null>()
  const distinctRows = deduplicate(coercedRows, primaryKey).rows
  for (const [column, rule] of ruled) {
    if (typeof rule.onNull === 'object' && rule.onNull.impute === 'median') {
      const values = distinctRows
        .map((row) => row[column])
        .filter((value): value is number => typeof value === 'number')
      medians.set(column, median(values, rule.type === 'integer'))
    }
  }

  // Pass 2: null policies
  const surviving: Row[] = []
  let droppedRows = 0

  for (const row of coercedRows) {
    let drop = false
    for (const [column, rule] of ruled) {
      if (row[column] !== null) continue
      const policy = rule.onNull
      if (policy === 'keep') continue
      if (policy === 'drop') {
        drop = true
        break
      }
      let imputed: Cell = null
      if (policy.impute === 'constant') {
        const coerced = coerceCell(policy.value, rule)
        imputed = coerced.valid ? coerced.value : null
      } else {
        imputed = medians.get(column) ?? null
      }
      if (imputed === null) {
        drop = true
        break
      }
      row[column] = imputed
      imputedCells[column] = (imputedCells[column] ?? 0) + 1
    }
    if (drop) {
      droppedRows++
    } else {
      surviving.push(row)
    }
  }

  const deduped = deduplicate(surviving, primaryKey)
  droppedRows += deduped.nullKeys

  const report: CleanReport = {
    table: table.name,
    inputRows: table.rows.length,
    outputRows: deduped.rows.length,
    droppedRows,
    duplicateRows: deduped.duplicates,
    imputedCells,
    invalidCells,
  }

  logger.info(
    `Cleaned ${table.name}: ${report.inputRows} → ${report.outputRows} rows ` +
      `(${report.droppedRows} dropped, ${report.duplicateRows} duplicates removed)`
  )
  for (const [column, count] of Object.entries(invalidCells)) {
    logger.debug(`${table.name}.${column}: ${count} invalid values`)
  }
  for (const [column, count] of Object.entries(imputedCells)) {
    logger.debug(`${table.name}.${column}: ${count} values imputed`)
  }

  checkQuality(report, options)

  return { table: createTable(table.name, table.columns, deduped.rows), report }
}

function checkQuality(report: CleanReport, options: CleanOptions): void {
  if (report.outputRows === 0 && !options.allowEmpty) {
    throw new DataQualityError(
      report.table,
      `Cleaning ${report.table} left no rows (${report.inputRows} read)`,
      report
    )
  }

  const quality = options.quality
  if (!quality || report.inputRows === 0) return

  if (quality.minRows !== undefined && report.outputRows < quality.minRows) {
    throw new DataQualityError(
      report.table,
      `Cleaning ${report.table} left ${report.outputRows} rows, below the minimum of ${quality.minRows}`,
      report
    )
  }

  if (quality.maxDropRatio !== undefined) {
    const removed = report.inputRows - report.outputRows
    const ratio = removed / report.inputRows
    if (ratio > quality.maxDropRatio) {
      throw new DataQualityError(
        report.table,
        `Cleaning ${report.table} removed ${(ratio * 100).toFixed(1)}% of rows, above the limit of ${(quality.maxDropRatio * 100).toFixed(1)}%`,
        report
      )
    }
  }
}

/**
 * Clean a raw source table with the rules, key and thresholds its
 * definition declares.
 */
export function cleanSource(table: Table, source: SourceConfig, logger?: Logger): CleanResult {
  return cleanTable(table, source.rules, {
    primaryKey: source.primaryKey,
    quality: source.quality,
    allowEmpty: source.required === false,
    logger,
  })
}
