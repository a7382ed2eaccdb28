/**
 * Metric Deriver
 *
 * Applies an ordered list of pure column derivations. The list is checked
 * before any row is touched: every input must exist on the table or be
 * produced earlier in the list, and the dependency graph must be acyclic.
 *
 * @module pipeline/deriver
 */

import type { Derivation } from '../datasets/types'
import { ConfigurationError } from './errors'
import { silentLogger, type Logger } from './logger'
import type { Cell, Row, Table } from './table'

/**
 * Find a dependency cycle among derivations, as the list of names along it.
 */
export function findCycle(derivations: Array<Pick<Derivation, 'name' | 'inputs'>>): string[] | null {
  const byName = new Map(derivations.map((derivation) => [derivation.name, derivation]))
  const state = new Map<string, 'visiting' | 'done'>()
  const stack: string[] = []

  const visit = (name: string): string[] | null => {
    const mark = state.get(name)
    if (mark === 'done') return null
    if (mark === 'visiting') {
      return [...stack.slice(stack.indexOf(name)), name]
    }
    state.set(name, 'visiting')
    stack.push(name)
    const derivation = byName.get(name)
    for (const input of derivation?.inputs ?? []) {
      if (!byName.has(input)) continue
      const cycle = visit(input)
      if (cycle) return cycle
    }
    stack.pop()
    state.set(name, 'done')
    return null
  }

  for (const derivation of derivations) {
    const cycle = visit(derivation.name)
    if (cycle) return cycle
  }
  return null
}

/**
 * Validate a derivation list against the columns available before it runs.
 *
 * @throws ConfigurationError on duplicate or colliding outputs, unknown
 * inputs, cycles and forward references
 */
export function validateDerivations(derivations: Derivation[], availableColumns: string[]): void {
  const available = new Set(availableColumns)
  const outputs = new Set<string>()

  for (const derivation of derivations) {
    if (outputs.has(derivation.name)) {
      throw new ConfigurationError(`Derived column ${derivation.name} is declared twice`)
    }
    if (available.has(derivation.name)) {
      throw new ConfigurationError(`Derived column ${derivation.name} would overwrite an existing column`)
    }
    if (derivation.inputs.length === 0) {
      throw new ConfigurationError(`Derived column ${derivation.name} declares no inputs`)
    }
    outputs.add(derivation.name)
  }

  for (const derivation of derivations) {
    for (const input of derivation.inputs) {
      if (!available.has(input) && !outputs.has(input)) {
        throw new ConfigurationError(`Derived column ${derivation.name} reads unknown column ${input}`)
      }
    }
  }

  const cycle = findCycle(derivations)
  if (cycle) {
    throw new ConfigurationError(`Cyclic derivation dependency: ${cycle.join(' → ')}`, { cycle })
  }

  const produced = new Set<string>()
  for (const derivation of derivations) {
    for (const input of derivation.inputs) {
      if (outputs.has(input) && !produced.has(input)) {
        throw new ConfigurationError(
          `Derived column ${derivation.name} reads ${input}, which is derived later in the list`
        )
      }
    }
    produced.add(derivation.name)
  }
}

/**
 * Evaluate one derivation on a row, enforcing null propagation.
 */
export function evaluate(derivation: Derivation, row: Row): Cell {
  const values = derivation.inputs.map((input) => row[input] ?? null)
  if (derivation.nullPolicy !== 'coalesce' && values.some((value) => value === null)) {
    return null
  }
  const result = derivation.compute(values)
  if (typeof result === 'number' && !Number.isFinite(result)) return null
  return result
}

/**
 * Append every derived column to the table, in list order.
 */
export function deriveColumns(table: Table, derivations: Derivation[], logger: Logger = silentLogger): Table {
  validateDerivations(derivations, table.columns)

  const rows = table.rows.map((source) => {
    const row: Row = { ...source }
    for (const derivation of derivations) {
      row[derivation.name] = evaluate(derivation, row)
    }
    return row
  })

  logger.info(`Derived ${derivations.length} columns on ${table.name}: ${derivations.map((d) => d.name).join(', ')}`)

  return {
    name: table.name,
    columns: [...table.columns, ...derivations.map((derivation) => derivation.name)],
    rows,
  }
}
