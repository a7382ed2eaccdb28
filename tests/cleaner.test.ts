/**
 * Cleaner Tests
 */

import { describe, it, expect } from 'vitest'
import type { CleaningRules, ColumnRule } from '../datasets/types'
import { cleanTable, coerceCell, deduplicate, median, validateRules } from '../pipeline/cleaner'
import { ConfigurationError, DataQualityError } from '../pipeline/errors'
import { createTable, type Table } from '../pipeline/table'

const rules: CleaningRules = {
  id: { type: 'integer', onNull: 'drop' },
  status: { type: 'enum', values: ['delivered', 'shipped', 'unknown'], onNull: { impute: 'constant', value: 'unknown' } },
  amount: { type: 'decimal', validRange: { min: 0 }, onNull: { impute: 'median' } },
  qty: { type: 'integer', onNull: 'keep' },
}

function rawOrders(): Table {
  return createTable('orders', ['id', 'status', 'amount', 'qty'], [
    { id: '1', status: 'delivered', amount: '10.5', qty: '2' },
    { id: '2', status: 'bogus', amount: '20', qty: null },
    { id: '3', status: ' SHIPPED ', amount: '-5', qty: '1' },
    { id: '1', status: 'shipped', amount: '99', qty: '9' },
    { id: 'x', status: 'delivered', amount: '1', qty: '1' },
  ])
}

describe('Cleaner', () => {
  describe('coerceCell', () => {
    it('should coerce integers and reject fractions', () => {
      expect(coerceCell('42', { type: 'integer', onNull: 'keep' })).toEqual({ valid: true, value: 42 })
      expect(coerceCell('4.5', { type: 'integer', onNull: 'keep' })).toEqual({ valid: false })
    })

    it('should strip thousand separators from decimals', () => {
      expect(coerceCell('1,234.50', { type: 'decimal', onNull: 'keep' })).toEqual({ valid: true, value: 1234.5 })
      expect(coerceCell('12abc', { type: 'decimal', onNull: 'keep' })).toEqual({ valid: false })
    })

    it('should enforce valid ranges', () => {
      const rule: ColumnRule = { type: 'integer', onNull: 'keep', validRange: { min: 1, max: 5 } }
      expect(coerceCell('0', rule)).toEqual({ valid: false })
      expect(coerceCell('5', rule)).toEqual({ valid: true, value: 5 })
    })

    it('should read boolean words', () => {
      expect(coerceCell('Yes', { type: 'boolean', onNull: 'keep' })).toEqual({ valid: true, value: true })
      expect(coerceCell('0', { type: 'boolean', onNull: 'keep' })).toEqual({ valid: true, value: false })
      expect(coerceCell('maybe', { type: 'boolean', onNull: 'keep' })).toEqual({ valid: false })
    })

    it('should normalize enum codes before checking them', () => {
      const rule: ColumnRule = { type: 'enum', onNull: 'keep', values: ['delivered'] }
      expect(coerceCell(' Delivered ', rule)).toEqual({ valid: true, value: 'delivered' })
      expect(coerceCell('lost', rule)).toEqual({ valid: false })
    })

    it('should read timestamps as UTC and truncate dates', () => {
      expect(coerceCell('2023-01-05 10:30:00', { type: 'timestamp', onNull: 'keep' })).toEqual({
        valid: true,
        value: new Date(Date.UTC(2023, 0, 5, 10, 30)),
      })
      expect(coerceCell('2023-01-05T10:30:00Z', { type: 'date', onNull: 'keep' })).toEqual({
        valid: true,
        value: new Date(Date.UTC(2023, 0, 5)),
      })
      expect(coerceCell('2023-02-30', { type: 'date', onNull: 'keep' })).toEqual({ valid: false })
    })

    it('should treat blanks as null, not invalid', () => {
      expect(coerceCell('   ', { type: 'integer', onNull: 'keep' })).toEqual({ valid: true, value: null })
    })

    it('should trim and case strings', () => {
      expect(coerceCell('  sp ', { type: 'string', onNull: 'keep', case: 'upper' })).toEqual({ valid: true, value: 'SP' })
    })
  })

  describe('median', () => {
    it('should take the middle value of an odd count', () => {
      expect(median([3, 1, 2])).toBe(2)
    })

    it('should average the middle pair for decimals and take the lower for integers', () => {
      expect(median([4, 1, 3, 2])).toBe(2.5)
      expect(median([4, 1, 3, 2], true)).toBe(2)
    })

    it('should be null without values', () => {
      expect(median([])).toBeNull()
    })
  })

  describe('cleanTable', () => {
    it('should coerce, apply null policies and deduplicate', () => {
      const { table, report } = cleanTable(rawOrders(), rules, { primaryKey: ['id'] })

      expect(table.rows).toEqual([
        { id: 1, status: 'delivered', amount: 10.5, qty: 2 },
        { id: 2, status: 'unknown', amount: 20, qty: null },
        { id: 3, status: 'shipped', amount: 15.25, qty: 1 },
      ])
      expect(report).toEqual({
        table: 'orders',
        inputRows: 5,
        outputRows: 3,
        droppedRows: 1,
        duplicateRows: 1,
        imputedCells: { status: 1, amount: 1 },
        invalidCells: { id: 1, status: 1, amount: 1 },
      })
    })

    it('should be idempotent', () => {
      const first = cleanTable(rawOrders(), rules, { primaryKey: ['id'] })
      const second = cleanTable(first.table, rules, { primaryKey: ['id'] })

      expect(second.table.rows).toEqual(first.table.rows)
      expect(second.report.droppedRows).toBe(0)
      expect(second.report.duplicateRows).toBe(0)
    })

    it('should pass columns without a rule through untouched', () => {
      const raw = createTable('t', ['id', 'free'], [{ id: '1', free: '  as is ' }])
      const { table } = cleanTable(raw, { id: { type: 'integer', onNull: 'drop' } })
      expect(table.rows).toEqual([{ id: 1, free: '  as is ' }])
    })

    it('should take medians over one row per key', () => {
      const raw = createTable('t', ['id', 'amount'], [
        { id: '1', amount: '10' },
        { id: '1', amount: '10' },
        { id: '1', amount: '10' },
        { id: '2', amount: '40' },
        { id: '3', amount: null },
      ])

      const { table, report } = cleanTable(
        raw,
        { id: { type: 'integer', onNull: 'drop' }, amount: { type: 'decimal', onNull: { impute: 'median' } } },
        { primaryKey: ['id'] }
      )

      expect(table.rows).toEqual([
        { id: 1, amount: 10 },
        { id: 2, amount: 40 },
        { id: 3, amount: 25 },
      ])
      expect(report.duplicateRows).toBe(2)
    })

    it('should drop rows whose median cannot be computed', () => {
      const raw = createTable('t', ['id', 'amount'], [
        { id: '1', amount: null },
        { id: '2', amount: 'n/a' },
      ])
      const { table, report } = cleanTable(
        raw,
        { id: { type: 'integer', onNull: 'drop' }, amount: { type: 'decimal', onNull: { impute: 'median' } } },
        { allowEmpty: true }
      )
      expect(table.rows).toEqual([])
      expect(report.droppedRows).toBe(2)
    })

    it('should raise DataQualityError when nothing survives', () => {
      const raw = createTable('orders', ['id', 'status', 'amount', 'qty'], [{ id: 'bad', status: null, amount: null, qty: null }])
      expect(() => cleanTable(raw, rules)).toThrow(DataQualityError)
    })

    it('should let an optional source stay empty', () => {
      const raw = createTable('orders', ['id', 'status', 'amount', 'qty'])
      expect(cleanTable(raw, rules, { allowEmpty: true }).table.rows).toEqual([])
    })

    it('should enforce the minimum row threshold', () => {
      expect(() => cleanTable(rawOrders(), rules, { primaryKey: ['id'], quality: { minRows: 4 } })).toThrow(
        'Cleaning orders left 3 rows, below the minimum of 4'
      )
    })

    it('should enforce the drop ratio threshold', () => {
      expect(() => cleanTable(rawOrders(), rules, { primaryKey: ['id'], quality: { maxDropRatio: 0.25 } })).toThrow(
        'Cleaning orders removed 40.0% of rows, above the limit of 25.0%'
      )
    })
  })

  describe('validateRules', () => {
    const table = createTable('t', ['id', 'name'])

    it('should reject rules for unknown columns', () => {
      expect(() => validateRules(table, { missing: { type: 'string', onNull: 'keep' } })).toThrow(ConfigurationError)
    })

    it('should reject median imputation on text columns', () => {
      expect(() => validateRules(table, { name: { type: 'string', onNull: { impute: 'median' } } })).toThrow(
        'Median imputation on non-numeric column t.name'
      )
    })

    it('should reject an imputed constant that breaks its own rule', () => {
      expect(() =>
        validateRules(table, { id: { type: 'integer', validRange: { min: 1 }, onNull: { impute: 'constant', value: 0 } } })
      ).toThrow(ConfigurationError)
    })

    it('should reject a primary key outside the table', () => {
      expect(() => validateRules(table, {}, ['sku'])).toThrow('Primary key column t.sku is not in the table')
    })
  })

  describe('deduplicate', () => {
    it('should keep the first row per composite key and separate null keys', () => {
      const result = deduplicate(
        [
          { order_id: 'a', seq: 1, v: 'first' },
          { order_id: 'a', seq: 2, v: 'other' },
          { order_id: 'a', seq: 1, v: 'second' },
          { order_id: null, seq: 1, v: 'orphan' },
        ],
        ['order_id', 'seq']
      )

      expect(result.rows.map((row) => row.v)).toEqual(['first', 'other'])
      expect(result.duplicates).toBe(1)
      expect(result.nullKeys).toBe(1)
    })
  })
})
