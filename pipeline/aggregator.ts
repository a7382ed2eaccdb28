/**
 * Aggregator
 *
 * Group-by helpers and the dashboard aggregate tables built from the
 * denormalized fact table, plus the per-order payment rollup joined into
 * the fact table, the calendar dimension and the source dimensions of the
 * star schema.
 *
 * Null group keys are skipped. Sums skip null values. Ratios with a zero
 * denominator are null.
 *
 * @module pipeline/aggregator
 */

import { DAY_NAMES, MONTH_NAMES, addDays, dateId, dayOfWeek, quarterOf, startOfUtcDay } from './dates'
import { ConfigurationError } from './errors'
import { compositeKey, createTable, keyOf, requireDate, requireNumber, type Cell, type Row, type Table } from './table'

export interface GroupKey {
  column: string
  as?: string
}

export type MeasureOp = 'sum' | 'count' | 'distinct' | 'max' | 'min'

export interface Measure {
  as: string
  op: MeasureOp
  column: string
  // Take each value of these key columns once per group; rows missing a key part always count
  distinctOn?: string[]
}

interface Accumulator {
  sum: number
  count: number
  distinct: Set<string>
  seen: Set<string>
  max: number | null
  min: number | null
}

export function roundCents(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100
}

export function ratio(numerator: Cell, denominator: Cell): number | null {
  const top = requireNumber(numerator)
  const bottom = requireNumber(denominator)
  if (top === null || bottom === null || bottom === 0) return null
  return top / bottom
}

function compareCells(a: Cell, b: Cell): number {
  if (a === b) return 0
  if (a === null) return 1
  if (b === null) return -1
  if (typeof a === 'number' && typeof b === 'number') return a - b
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime()
  return String(a) < String(b) ? -1 : 1
}

/**
 * Group rows by key columns and compute measures. Groups come out sorted
 * by their keys.
 */
export function groupBy(table: Table, name: string, keys: GroupKey[], measures: Measure[]): Table {
  const keyColumns = keys.map((key) => key.column)
  const groups = new Map<string, { keyRow: Row; acc: Accumulator[] }>()

  const openGroup = (row: Row): { keyRow: Row; acc: Accumulator[] } => {
    const keyRow: Row = {}
    for (const key of keys) keyRow[key.as ?? key.column] = row[key.column] ?? null
    return {
      keyRow,
      acc: measures.map(() => ({ sum: 0, count: 0, distinct: new Set<string>(), seen: new Set<string>(), max: null, min: null })),
    }
  }

  for (const row of table.rows) {
    const groupKey = compositeKey(row, keyColumns)
    if (groupKey === null) continue

    const group = groups.get(groupKey) ?? openGroup(row)
    groups.set(groupKey, group)

    measures.forEach((measure, position) => {
      const acc = group.acc[position]
      const value = row[measure.column] ?? null
      if (measure.distinctOn) {
        const rowKey = compositeKey(row, measure.distinctOn)
        if (rowKey !== null) {
          if (acc.seen.has(rowKey)) return
          acc.seen.add(rowKey)
        }
      }
      if (measure.op === 'count') {
        acc.count++
        return
      }
      if (value === null) return
      if (measure.op === 'distinct') {
        const key = keyOf(value)
        if (key !== null) acc.distinct.add(key)
        return
      }
      const number = requireNumber(value)
      if (number === null) return
      acc.sum += number
      acc.max = acc.max === null ? number : Math.max(acc.max, number)
      acc.min = acc.min === null ? number : Math.min(acc.min, number)
    })
  }

  const rows: Row[] = [...groups.values()].map(({ keyRow, acc }) => {
    const row: Row = { ...keyRow }
    measures.forEach((measure, position) => {
      const a = acc[position]
      switch (measure.op) {
        case 'sum':
          row[measure.as] = roundCents(a.sum)
          break
        case 'count':
          row[measure.as] = a.count
          break
        case 'distinct':
          row[measure.as] = a.distinct.size
          break
        case 'max':
          row[measure.as] = a.max
          break
        case 'min':
          row[measure.as] = a.min
          break
      }
    })
    return row
  })

  const keyNames = keys.map((key) => key.as ?? key.column)
  rows.sort((a, b) => {
    for (const column of keyNames) {
      const order = compareCells(a[column] ?? null, b[column] ?? null)
      if (order !== 0) return order
    }
    return 0
  })

  return createTable(name, [...keyNames, ...measures.map((measure) => measure.as)], rows)
}

function withColumns(table: Table, columns: Array<{ name: string; compute: (row: Row) => Cell }>): Table {
  return {
    name: table.name,
    columns: [...table.columns, ...columns.map((column) => column.name)],
    rows: table.rows.map((row) => {
      const next: Row = { ...row }
      for (const column of columns) next[column.name] = column.compute(row)
      return next
    }),
  }
}

function percent(value: number | null): number | null {
  return value === null ? null : roundCents(value * 100)
}

function average(row: Row): number | null {
  const value = ratio(row.total_sales, row.order_count)
  return value === null ? null : roundCents(value)
}

// Review joins repeat an item row once per review of its order
const ORDER_ITEM_KEY = ['order_id', 'order_item_id']

const SALES_MEASURES: Measure[] = [
  { as: 'order_count', op: 'distinct', column: 'order_id' },
  { as: 'total_sales', op: 'sum', column: 'price', distinctOn: ORDER_ITEM_KEY },
  { as: 'total_freight', op: 'sum', column: 'freight_value', distinctOn: ORDER_ITEM_KEY },
]

// ============================================================================
// Pre-join rollups
// ============================================================================

/**
 * One row per order: payment total, number of payments, the highest
 * installment count and the type of the first payment in sequence.
 */
export function paymentsByOrder(payments: Table): Table {
  const totals = groupBy(payments, 'order_payments', [{ column: 'order_id' }], [
    { as: 'payment_total', op: 'sum', column: 'payment_value' },
    { as: 'payment_count', op: 'count', column: 'order_id' },
    { as: 'payment_installments_max', op: 'max', column: 'payment_installments' },
  ])

  const firstType = new Map<string, { sequence: number; type: Cell }>()
  for (const row of payments.rows) {
    const key = keyOf(row.order_id ?? null)
    if (key === null) continue
    const sequence = requireNumber(row.payment_sequential ?? null) ?? Number.MAX_SAFE_INTEGER
    const current = firstType.get(key)
    if (!current || sequence < current.sequence) {
      firstType.set(key, { sequence, type: row.payment_type ?? null })
    }
  }

  return withColumns(totals, [
    {
      name: 'primary_payment_type',
      compute: (row) => {
        const key = keyOf(row.order_id ?? null)
        return key === null ? null : firstType.get(key)?.type ?? null
      },
    },
  ])
}

// ============================================================================
// Dashboard aggregates
// ============================================================================

export function salesByMonth(fact: Table): Table {
  const grouped = groupBy(
    fact,
    'sales_by_month',
    [{ column: 'purchase_year', as: 'year' }, { column: 'purchase_month', as: 'month' }, { column: 'purchase_quarter', as: 'quarter' }],
    SALES_MEASURES
  )
  return withColumns(grouped, [
    { name: 'avg_order_value', compute: average },
    { name: 'freight_percentage', compute: (row) => percent(ratio(row.total_freight, row.total_sales)) },
  ])
}

export function salesByCategory(fact: Table): Table {
  const grouped = groupBy(fact, 'sales_by_category', [{ column: 'category_name' }], SALES_MEASURES)
  return withColumns(grouped, [{ name: 'avg_order_value', compute: average }])
}

export function salesByState(fact: Table): Table {
  const grouped = groupBy(fact, 'sales_by_state', [{ column: 'customer_state', as: 'state' }], SALES_MEASURES)
  return withColumns(grouped, [{ name: 'avg_order_value', compute: average }])
}

export function salesByCity(fact: Table): Table {
  const grouped = groupBy(
    fact,
    'sales_by_city',
    [{ column: 'customer_state', as: 'state' }, { column: 'customer_city', as: 'city' }],
    SALES_MEASURES.slice(0, 2)
  )
  return withColumns(grouped, [
    { name: 'location', compute: (row) => `${String(row.city)} (${String(row.state)})` },
  ])
}

export function salesBySeller(fact: Table): Table {
  const grouped = groupBy(fact, 'sales_by_seller', [{ column: 'seller_id' }], SALES_MEASURES)
  return withColumns(grouped, [{ name: 'avg_order_value', compute: average }])
}

/**
 * Reviewed orders per score with the net promoter score over all of them:
 * % promoters (score 5) minus % detractors (score 3 or lower).
 * Unreviewed rows have a null score and are left out.
 */
export function reviewMetrics(fact: Table): Table {
  const grouped = groupBy(fact, 'review_metrics', [{ column: 'review_score' }], SALES_MEASURES.slice(0, 2))

  let total = 0
  let promoters = 0
  let detractors = 0
  for (const row of grouped.rows) {
    const count = requireNumber(row.order_count ?? null) ?? 0
    const score = requireNumber(row.review_score ?? null)
    total += count
    if (score === 5) promoters += count
    if (score !== null && score <= 3) detractors += count
  }

  const nps = total === 0 ? null : roundCents((promoters / total) * 100 - (detractors / total) * 100)
  return withColumns(grouped, [{ name: 'nps', compute: () => nps }])
}

/**
 * Calendar dimension covering every day from the first to the last
 * purchase date.
 */
export function dateDimension(fact: Table, column = 'order_purchase_timestamp'): Table {
  const columns = [
    'date_id', 'date', 'year', 'month', 'day', 'day_of_week', 'quarter',
    'is_weekend', 'month_name', 'day_of_week_name',
  ]

  let first: Date | null = null
  let last: Date | null = null
  for (const row of fact.rows) {
    const value = requireDate(row[column] ?? null)
    if (!value) continue
    const day = startOfUtcDay(value)
    if (!first || day < first) first = day
    if (!last || day > last) last = day
  }

  const rows: Row[] = []
  if (first && last) {
    for (let day = first; day <= last; day = addDays(day, 1)) {
      const weekday = dayOfWeek(day)
      rows.push({
        date_id: dateId(day),
        date: day,
        year: day.getUTCFullYear(),
        month: day.getUTCMonth() + 1,
        day: day.getUTCDate(),
        day_of_week: weekday,
        quarter: quarterOf(day),
        is_weekend: weekday >= 5,
        month_name: MONTH_NAMES[day.getUTCMonth()],
        day_of_week_name: DAY_NAMES[weekday],
      })
    }
  }
  return createTable('dim_date', columns, rows)
}

// ============================================================================
// Source dimensions
// ============================================================================

/**
 * Look up a cleaned source table for a dimension build.
 *
 * @throws ConfigurationError when the table was never loaded
 */
export function requireTable(tables: ReadonlyMap<string, Table>, name: string): Table {
  const table = tables.get(name)
  if (!table) throw new ConfigurationError(`Dimension source ${name} is not loaded`)
  return table
}

/**
 * Dimension over a cleaned source: every source row, keyed by an `id`
 * column copied from `keyColumn` and placed first.
 */
export function dimensionOf(source: Table, name: string, keyColumn: string): Table {
  const columns = ['id', ...source.columns.filter((column) => column !== 'id')]
  return createTable(
    name,
    columns,
    source.rows.map((row) => ({ ...row, id: row[keyColumn] ?? null }))
  )
}

/**
 * Product dimension with `product_category_name_english`, taken from the
 * translation table and falling back to the source category name.
 */
export function productDimension(products: Table, translation?: Table): Table {
  const english = new Map<string, Cell>()
  for (const row of translation?.rows ?? []) {
    const key = keyOf(row.product_category_name ?? null)
    if (key !== null && !english.has(key)) english.set(key, row.product_category_name_english ?? null)
  }

  const columns = products.columns.includes('product_category_name_english')
    ? products.columns
    : [...products.columns, 'product_category_name_english']
  const translated = createTable(
    products.name,
    columns,
    products.rows.map((row) => {
      const category = row.product_category_name ?? null
      const key = keyOf(category)
      const name = key === null ? null : english.get(key) ?? null
      return { ...row, product_category_name_english: name ?? category }
    })
  )
  return dimensionOf(translated, 'dim_product', 'product_id')
}
