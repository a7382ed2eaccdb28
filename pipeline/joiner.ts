/**
 * Joiner
 *
 * Executes an ordered join plan, folding each right table into the
 * running left table. Every join spec declares its multiplicity so row
 * multiplication is visible in the plan; the step stats record what
 * actually happened.
 *
 * - inner: one output row per matching (left, right) pair; unmatched
 *   left rows are dropped
 * - left: every left row appears at least once; unmatched rows get null
 *   right columns
 *
 * Null keys never match.
 *
 * @module pipeline/joiner
 */

import type { JoinSpec } from '../datasets/types'
import { JoinError } from './errors'
import { silentLogger, type Logger } from './logger'
import { cellKind, keyOf, type Row, type Table } from './table'

export interface JoinStep {
  name: string
  kind: JoinSpec['kind']
  multiplicity: JoinSpec['multiplicity']
  leftRows: number
  rightRows: number
  outputRows: number
  unmatchedLeftRows: number
  duplicateRightKeys: number
}

export interface JoinResult {
  table: Table
  steps: JoinStep[]
}

function keyKinds(table: Table, column: string): Set<string> {
  const kinds = new Set<string>()
  for (const row of table.rows) {
    const value = row[column] ?? null
    if (value !== null) kinds.add(cellKind(value))
  }
  return kinds
}

function carriedColumns(spec: JoinSpec, right: Table): string[] {
  const columns = spec.select ?? right.columns.filter((column) => column !== spec.rightKey)
  for (const column of columns) {
    if (!right.columns.includes(column)) {
      throw new JoinError(spec.name, `Join ${spec.name} selects unknown column ${right.name}.${column}`)
    }
  }
  return columns
}

/**
 * Join one right table into the left table.
 *
 * @throws JoinError on missing key columns, key type mismatches or column collisions
 */
export function joinTables(left: Table, right: Table, spec: JoinSpec, logger: Logger = silentLogger): { table: Table; step: JoinStep } {
  if (!left.columns.includes(spec.leftKey)) {
    throw new JoinError(spec.name, `Join ${spec.name}: left table ${left.name} has no key column ${spec.leftKey}`)
  }
  if (!right.columns.includes(spec.rightKey)) {
    throw new JoinError(spec.name, `Join ${spec.name}: right table ${right.name} has no key column ${spec.rightKey}`)
  }

  const leftKinds = keyKinds(left, spec.leftKey)
  const rightKinds = keyKinds(right, spec.rightKey)
  if (leftKinds.size > 0 && rightKinds.size > 0 && ![...leftKinds].some((kind) => rightKinds.has(kind))) {
    throw new JoinError(
      spec.name,
      `Join ${spec.name}: key type mismatch, ${left.name}.${spec.leftKey} is ${[...leftKinds].join('|')} ` +
        `but ${right.name}.${spec.rightKey} is ${[...rightKinds].join('|')}`,
      { left: [...leftKinds], right: [...rightKinds] }
    )
  }

  const carried = carriedColumns(spec, right)
  const outputNames = carried.map((column) => `${spec.prefix ?? ''}${column}`)
  const collisions = outputNames.filter((name) => left.columns.includes(name))
  if (collisions.length > 0) {
    throw new JoinError(
      spec.name,
      `Join ${spec.name}: columns already present on ${left.name}: ${collisions.join(', ')} (use select or prefix)`,
      { collisions }
    )
  }

  // Index right rows by key
  const index = new Map<string, Row[]>()
  let duplicateRightKeys = 0
  for (const row of right.rows) {
    const key = keyOf(row[spec.rightKey] ?? null)
    if (key === null) continue
    const bucket = index.get(key)
    if (bucket) {
      if (bucket.length === 1) duplicateRightKeys++
      bucket.push(row)
    } else {
      index.set(key, [row])
    }
  }

  if (duplicateRightKeys > 0 && spec.multiplicity !== 'one-to-many') {
    logger.warn(
      `Join ${spec.name} is declared ${spec.multiplicity} but ${duplicateRightKeys} ${right.name}.${spec.rightKey} ` +
        'keys repeat; matching rows will multiply'
    )
  }

  const rows: Row[] = []
  let unmatched = 0

  for (const leftRow of left.rows) {
    const key = keyOf(leftRow[spec.leftKey] ?? null)
    const matches = key === null ? undefined : index.get(key)

    if (!matches) {
      unmatched++
      if (spec.kind === 'left') {
        const row: Row = { ...leftRow }
        for (const name of outputNames) row[name] = null
        rows.push(row)
      }
      continue
    }

    for (const rightRow of matches) {
      const row: Row = { ...leftRow }
      carried.forEach((column, position) => {
        row[outputNames[position]] = rightRow[column] ?? null
      })
      rows.push(row)
    }
  }

  const step: JoinStep = {
    name: spec.name,
    kind: spec.kind,
    multiplicity: spec.multiplicity,
    leftRows: left.rows.length,
    rightRows: right.rows.length,
    outputRows: rows.length,
    unmatchedLeftRows: unmatched,
    duplicateRightKeys,
  }

  logger.info(
    `Join ${spec.name} (${spec.kind}, ${spec.multiplicity}): ${step.leftRows} → ${step.outputRows} rows, ` +
      `${step.unmatchedLeftRows} unmatched`
  )

  return {
    table: { name: left.name, columns: [...left.columns, ...outputNames], rows },
    step,
  }
}

/**
 * Run a join plan in order, starting from the base table.
 *
 * @throws JoinError when a plan step names a table that does not exist
 */
export function executeJoinPlan(
  base: Table,
  tables: Map<string, Table>,
  plan: JoinSpec[],
  options: { name?: string; logger?: Logger } = {}
): JoinResult {
  const logger = options.logger ?? silentLogger
  const steps: JoinStep[] = []
  let current: Table = { ...base, name: options.name ?? base.name }

  for (const spec of plan) {
    const right = tables.get(spec.right)
    if (!right) {
      throw new JoinError(spec.name, `Join ${spec.name} references unknown table ${spec.right}`)
    }
    const { table, step } = joinTables(current, right, spec, logger)
    current = table
    steps.push(step)
  }

  return { table: current, steps }
}
