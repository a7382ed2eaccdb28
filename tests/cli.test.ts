/**
 * Command Line & Sample Generator Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { readFile, readdir } from 'node:fs/promises'
import { join } from 'node:path'
import { generate, createRng } from '../scripts/generate/ecommerce'
import { main, parseArgs } from '../scripts/run-etl'
import { makeTempDir, removeDir } from './helpers'

const quiet = { ETL_LOG_LEVEL: 'silent' }

describe('CLI', () => {
  describe('parseArgs', () => {
    it('should read key=value pairs and bare flags', () => {
      expect(parseArgs(['--input=data/in', '--parquet', '--orders=a=b.csv'])).toEqual({
        input: 'data/in',
        parquet: true,
        orders: 'a=b.csv',
      })
    })

    it('should reject positional arguments', () => {
      expect(() => parseArgs(['data/in'])).toThrow('Unexpected argument data/in')
      expect(() => parseArgs(['--'])).toThrow('Unexpected argument --')
    })
  })

  describe('main', () => {
    let dir: string
    let rawDir: string
    let outDir: string

    beforeEach(async () => {
      dir = await makeTempDir()
      rawDir = join(dir, 'raw')
      outDir = join(dir, 'processed')
      await generate(rawDir, { orders: 30, seed: 7 })
    })

    afterEach(async () => {
      await removeDir(dir)
      vi.restoreAllMocks()
    })

    it('should run the pipeline over a generated sample and exit 0', async () => {
      const code = await main([`--input=${rawDir}`, `--output=${outDir}`, '--parquet'], quiet)

      expect(code).toBe(0)
      const files = await readdir(outDir)
      expect(files).toContain('fact_order_items.csv')
      expect(files).toContain('to_parquet.sql')
      expect(files).toContain('runs.jsonl')
    })

    it('should exit 1 when the input directory is missing', async () => {
      expect(await main([`--input=${join(dir, 'nowhere')}`, `--output=${outDir}`], quiet)).toBe(1)
    })

    it('should exit 1 on an unknown option', async () => {
      expect(await main(['--bogus'], quiet)).toBe(1)
    })

    it('should exit 1 on an unknown pipeline', async () => {
      expect(await main(['--pipeline=nope'], quiet)).toBe(1)
    })

    it('should print recent runs with --history', async () => {
      await main([`--input=${rawDir}`, `--output=${outDir}`], quiet)
      const log = vi.spyOn(console, 'log').mockImplementation(() => {})

      const code = await main(['--history', `--output=${outDir}`], quiet)

      expect(code).toBe(0)
      expect(log).toHaveBeenCalledTimes(1)
      expect(String(log.mock.calls[0][0])).toContain('ecommerce@1.0.0  Done')
    })

    it('should say so when no runs are recorded', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {})

      expect(await main(['--history', `--output=${outDir}`], quiet)).toBe(0)
      expect(log).toHaveBeenCalledWith(`No runs recorded in ${join(outDir, 'runs.jsonl')}`)
    })

    it('should print usage with --help', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {})

      expect(await main(['--help'], quiet)).toBe(0)
      expect(String(log.mock.calls[0][0])).toMatch(/^Usage: run-etl/)
    })
  })
})

describe('Sample Generator', () => {
  let dir: string

  beforeEach(async () => {
    dir = await makeTempDir()
  })

  afterEach(async () => {
    await removeDir(dir)
  })

  it('should seed a deterministic random sequence', () => {
    const a = createRng(1)
    const b = createRng(1)
    const first = [a(), a(), a()]

    expect([b(), b(), b()]).toEqual(first)
    expect(first.every((value) => value >= 0 && value < 1)).toBe(true)
  })

  it('should write every source file with the expected counts', async () => {
    const summary = await generate(dir, { orders: 20, seed: 3 })

    expect(summary).toMatchObject({
      orders: 21,
      customers: 20,
      products: 40,
      sellers: 12,
      category_translation: 10,
    })
    expect((await readdir(dir)).sort()).toEqual([
      'olist_customers_dataset.csv',
      'olist_order_items_dataset.csv',
      'olist_order_payments_dataset.csv',
      'olist_order_reviews_dataset.csv',
      'olist_orders_dataset.csv',
      'olist_products_dataset.csv',
      'olist_sellers_dataset.csv',
      'product_category_name_translation.csv',
    ])
  })

  it('should produce identical files for the same seed', async () => {
    await generate(join(dir, 'a'), { orders: 15, seed: 11 })
    await generate(join(dir, 'b'), { orders: 15, seed: 11 })

    const file = 'olist_order_items_dataset.csv'
    expect(await readFile(join(dir, 'b', file), 'utf8')).toBe(await readFile(join(dir, 'a', file), 'utf8'))
  })

  it('should write clean data when dirty rows are off', async () => {
    const summary = await generate(dir, { orders: 10, seed: 5, dirty: false })
    expect(summary.orders).toBe(10)

    const orders = await readFile(join(dir, 'olist_orders_dataset.csv'), 'utf8')
    expect(orders).not.toContain('lost_in_transit')
  })
})
