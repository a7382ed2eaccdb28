#!/usr/bin/env tsx
/**
 * E-commerce Marketplace Sample Data Generator
 *
 * Writes the marketplace CSV exports the ETL pipeline reads: orders, order
 * items, customers, payments, reviews, products, sellers and the category
 * translation table. Uses deterministic seeding for reproducibility, and
 * mixes in a few dirty rows (duplicates, bad codes, blanks) so a run
 * exercises the cleaner.
 *
 * Usage:
 *   npx tsx scripts/generate/ecommerce.ts --output=data/raw --orders=500 --seed=7
 */

import { mkdir, writeFile } from 'node:fs/promises'
import * as path from 'node:path'
import { fileURLToPath } from 'node:url'
import { writeToString } from 'fast-csv'
import { ecommercePipeline, getSource } from '../../datasets'
import { addDays, formatTimestamp } from '../../pipeline/dates'

// Seeded random number generator (Mulberry32)
export function createRng(seed: number): () => number {
  return function () {
    let t = (seed += 0x6d2b79f5)
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export interface GenerateOptions {
  orders?: number
  products?: number
  sellers?: number
  seed?: number
  // Add dirty rows for the cleaner to deal with
  dirty?: boolean
}

export type GenerateSummary = Record<string, number>

type CsvValue = string | number | null

// Sample data for realistic generation
const LOCATIONS: Array<[city: string, state: string]> = [
  ['sao paulo', 'SP'],
  ['campinas', 'SP'],
  ['rio de janeiro', 'RJ'],
  ['niteroi', 'RJ'],
  ['belo horizonte', 'MG'],
  ['curitiba', 'PR'],
  ['porto alegre', 'RS'],
  ['salvador', 'BA'],
  ['recife', 'PE'],
  ['brasilia', 'DF'],
]
const CATEGORIES: Array<[pt: string, en: string]> = [
  ['beleza_saude', 'health_beauty'],
  ['cama_mesa_banho', 'bed_bath_table'],
  ['esporte_lazer', 'sports_leisure'],
  ['informatica_acessorios', 'computers_accessories'],
  ['moveis_decoracao', 'furniture_decor'],
  ['utilidades_domesticas', 'housewares'],
  ['relogios_presentes', 'watches_gifts'],
  ['telefonia', 'telephony'],
  ['brinquedos', 'toys'],
  ['automotivo', 'auto'],
]
// Weighted towards delivered, as real exports are
const ORDER_STATUSES = ['delivered', 'delivered', 'delivered', 'delivered', 'delivered', 'delivered', 'shipped', 'invoiced', 'processing', 'canceled']
const PAYMENT_TYPES = ['credit_card', 'credit_card', 'credit_card', 'boleto', 'voucher', 'debit_card']
const REVIEW_SCORES = [5, 5, 5, 5, 4, 4, 3, 2, 1, 1]
const REVIEW_TITLES = ['Recomendo', 'Otimo produto', 'Chegou antes do prazo', 'Nao recebi', 'Produto com defeito']
const REVIEW_MESSAGES = [
  'Produto muito bom, entrega rapida.',
  'Veio diferente do anuncio, "tamanho" errado',
  'Bom, mas a embalagem chegou amassada, de resto ok',
  'Ainda aguardando a entrega\ncontato sem resposta',
]

function pick<T>(arr: T[], rng: () => number): T {
  return arr[Math.floor(rng() * arr.length)]
}

function between(rng: () => number, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1))
}

function money(rng: () => number, min: number, max: number): number {
  return Math.round((min + rng() * (max - min)) * 100) / 100
}

function generateId(rng: () => number): string {
  const hex = '0123456789abcdef'
  let id = ''
  for (let i = 0; i < 32; i++) {
    id += hex[Math.floor(rng() * 16)]
  }
  return id
}

function zip(rng: () => number): string {
  return String(between(rng, 1000, 99999)).padStart(5, '0')
}

function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * 3_600_000)
}

function stamp(date: Date | null): string | null {
  return date ? formatTimestamp(date) : null
}

async function writeCsv(outputDir: string, entity: string, rows: CsvValue[][]): Promise<number> {
  const source = getSource(ecommercePipeline, entity)
  if (!source) throw new Error(`No source named ${entity}`)
  const csv = await writeToString(
    rows.map((row) => row.map((value) => (value === null ? '' : String(value)))),
    { headers: source.columns.map((column) => column.name), alwaysWriteHeaders: true, includeEndRowDelimiter: true }
  )
  await writeFile(path.join(outputDir, source.file), csv, 'utf8')
  return rows.length
}

/**
 * Generate a sample dataset into `outputDir`. Returns the number of rows
 * written per entity.
 */
export async function generate(outputDir: string, options: GenerateOptions = {}): Promise<GenerateSummary> {
  const orderCount = options.orders ?? 200
  const productCount = options.products ?? 40
  const sellerCount = options.sellers ?? 12
  const dirty = options.dirty ?? true
  const rng = createRng(options.seed ?? 42)

  await mkdir(outputDir, { recursive: true })

  const sellers: CsvValue[][] = []
  for (let i = 0; i < sellerCount; i++) {
    const [city, state] = pick(LOCATIONS, rng)
    sellers.push([generateId(rng), zip(rng), city, state])
  }

  const products: CsvValue[][] = []
  for (let i = 0; i < productCount; i++) {
    const [category] = pick(CATEGORIES, rng)
    products.push([
      generateId(rng),
      dirty && i === 0 ? null : category,
      between(rng, 20, 60),
      between(rng, 100, 2000),
      between(rng, 1, 6),
      between(rng, 100, 15000),
      between(rng, 10, 90),
      between(rng, 2, 60),
      between(rng, 10, 60),
    ])
  }

  const customers: CsvValue[][] = []
  const orders: CsvValue[][] = []
  const items: CsvValue[][] = []
  const payments: CsvValue[][] = []
  const reviews: CsvValue[][] = []
  const uniqueCustomers = Array.from({ length: Math.max(1, Math.floor(orderCount * 0.9)) }, () => generateId(rng))
  const start = Date.UTC(2017, 0, 1)
  const span = Date.UTC(2018, 7, 31) - start

  for (let i = 0; i < orderCount; i++) {
    const orderId = generateId(rng)
    const customerId = generateId(rng)
    const [city, state] = pick(LOCATIONS, rng)
    customers.push([customerId, pick(uniqueCustomers, rng), zip(rng), city, state])

    const status = pick(ORDER_STATUSES, rng)
    const purchased = new Date(start + Math.floor(rng() * span))
    const approved = status === 'canceled' ? null : addHours(purchased, between(rng, 1, 48))
    const shipped = status === 'delivered' || status === 'shipped' ? addDays(purchased, between(rng, 1, 5)) : null
    const delivered = status === 'delivered' ? addDays(purchased, between(rng, 3, 30)) : null
    const estimated = addDays(purchased, between(rng, 10, 25))
    orders.push([orderId, customerId, status, stamp(purchased), stamp(approved), stamp(shipped), stamp(delivered), stamp(estimated)])

    let total = 0
    const itemCount = between(rng, 1, 3)
    for (let n = 1; n <= itemCount; n++) {
      const product = pick(products, rng)
      const seller = pick(sellers, rng)
      const price = money(rng, 9.9, 450)
      const freight = money(rng, 5, 45)
      total += price + freight
      items.push([orderId, n, product[0], seller[0], stamp(addDays(purchased, 3)), price, freight])
    }

    total = Math.round(total * 100) / 100
    if (rng() < 0.15) {
      const voucher = Math.round(total * 0.3 * 100) / 100
      payments.push([orderId, 1, 'voucher', 1, voucher])
      payments.push([orderId, 2, 'credit_card', between(rng, 1, 10), Math.round((total - voucher) * 100) / 100])
    } else {
      const type = pick(PAYMENT_TYPES, rng)
      payments.push([orderId, 1, type, type === 'credit_card' ? between(rng, 1, 10) : 1, total])
    }

    if (rng() < 0.85) {
      const created = addDays(delivered ?? purchased, between(rng, 0, 10))
      const hasComment = rng() < 0.4
      reviews.push([
        generateId(rng),
        orderId,
        pick(REVIEW_SCORES, rng),
        hasComment ? pick(REVIEW_TITLES, rng) : null,
        hasComment ? pick(REVIEW_MESSAGES, rng) : null,
        stamp(created),
        stamp(addHours(created, between(rng, 2, 72))),
      ])
    }
  }

  if (dirty && orders.length > 2) {
    // exact duplicate, unknown status code, negative price
    orders.push([...orders[0]])
    const broken = [...orders[1]]
    broken[2] = 'lost_in_transit'
    orders[1] = broken
    items.push([items[0][0], 99, items[0][2], items[0][3], items[0][4], -10, 5])
  }

  const translations: CsvValue[][] = CATEGORIES.map(([pt, en]) => [pt, en])

  const summary: GenerateSummary = {
    orders: await writeCsv(outputDir, 'orders', orders),
    order_items: await writeCsv(outputDir, 'order_items', items),
    customers: await writeCsv(outputDir, 'customers', customers),
    payments: await writeCsv(outputDir, 'payments', payments),
    reviews: await writeCsv(outputDir, 'reviews', reviews),
    products: await writeCsv(outputDir, 'products', products),
    sellers: await writeCsv(outputDir, 'sellers', sellers),
    category_translation: await writeCsv(outputDir, 'category_translation', translations),
  }

  return summary
}

function parseArgs(argv: string[]): { output: string; orders?: number; seed?: number } {
  const args: { output: string; orders?: number; seed?: number } = { output: 'data/raw' }

  const count = (value: string): number | undefined => {
    const parsed = Number.parseInt(value, 10)
    return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
  }

  for (const arg of argv) {
    if (arg.startsWith('--output=')) {
      args.output = arg.slice('--output='.length)
    } else if (arg.startsWith('--orders=')) {
      args.orders = count(arg.slice('--orders='.length))
    } else if (arg.startsWith('--seed=')) {
      args.seed = count(arg.slice('--seed='.length))
    }
  }

  return args
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2))
  console.log(`Generating e-commerce sample (${args.orders ?? 200} orders)...`)
  const summary = await generate(args.output, { orders: args.orders, seed: args.seed })
  for (const [entity, rows] of Object.entries(summary)) {
    console.log(`  ${entity}: ${rows} rows`)
  }
  console.log(`Sample dataset written to ${args.output}`)
}

const invokedPath = process.argv[1]
if (invokedPath && path.resolve(invokedPath) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
}
