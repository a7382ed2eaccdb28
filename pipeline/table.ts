/**
 * In-memory table model shared by every pipeline stage.
 *
 * Tables are row-oriented: `columns` carries the column order (which is
 * preserved through to the export) and each row maps column name to cell.
 */

export type Cell = string | number | boolean | Date | null

export type Row = Record<string, Cell>

export interface Table {
  name: string
  columns: string[]
  rows: Row[]
}

/**
 * Create a table, filling every declared column on every row.
 * Missing cells become null so downstream stages never see `undefined`.
 */
export function createTable(name: string, columns: string[], rows: Row[] = []): Table {
  return {
    name,
    columns: [...columns],
    rows: rows.map((row) => {
      const filled: Row = {}
      for (const column of columns) {
        filled[column] = row[column] ?? null
      }
      return filled
    }),
  }
}

/**
 * Runtime kind of a non-null cell, used for join key compatibility checks.
 */
export function cellKind(value: Cell): 'string' | 'number' | 'boolean' | 'date' | 'null' {
  if (value === null) return 'null'
  if (value instanceof Date) return 'date'
  switch (typeof value) {
    case 'string':
      return 'string'
    case 'number':
      return 'number'
    default:
      return 'boolean'
  }
}

/**
 * Stable string form of a key cell. Dates key by their epoch millis.
 */
export function keyOf(value: Cell): string | null {
  if (value === null) return null
  if (value instanceof Date) return `d:${value.getTime()}`
  return `${typeof value}:${String(value)}`
}

/**
 * Composite key of several columns; null when any part is null.
 */
export function compositeKey(row: Row, columns: string[]): string | null {
  const parts: string[] = []
  for (const column of columns) {
    const part = keyOf(row[column] ?? null)
    if (part === null) return null
    parts.push(part)
  }
  return parts.join('\u0000')
}

export function requireNumber(value: Cell): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

export function requireDate(value: Cell): Date | null {
  return value instanceof Date && !Number.isNaN(value.getTime()) ? value : null
}
