/**
 * E-commerce Marketplace Dataset
 *
 * Brazilian marketplace export layout: orders, order items, customers,
 * payments, reviews, products, sellers and an optional category-name
 * translation table. The pipeline produces one fact row per order item
 * (per review of the order), dashboard aggregates, a calendar dimension and
 * customer, product, seller, order and review dimensions keyed by `id`.
 */

import {
  dateDimension,
  dimensionOf,
  paymentsByOrder,
  productDimension,
  requireTable,
  reviewMetrics,
  roundCents,
  salesByCategory,
  salesByCity,
  salesByMonth,
  salesBySeller,
  salesByState,
} from '../pipeline/aggregator'
import { dateId, dayOfWeek, diffCalendarDays, quarterOf } from '../pipeline/dates'
import { deriveColumns } from '../pipeline/deriver'
import { requireDate, requireNumber, type Cell, type Table } from '../pipeline/table'
import { registerPipeline } from './registry'
import type {
  Derivation,
  JoinSpec,
  OutputTableConfig,
  PipelineConfig,
  SourceConfig,
} from './types'

export const ORDER_STATUSES = [
  'created',
  'approved',
  'invoiced',
  'processing',
  'shipped',
  'delivered',
  'canceled',
  'unavailable',
]

export const PAYMENT_TYPES = ['credit_card', 'boleto', 'voucher', 'debit_card', 'not_defined']

// ============================================================================
// Sources
// ============================================================================

const ordersSource: SourceConfig = {
  entity: 'orders',
  file: 'olist_orders_dataset.csv',
  description: 'One row per order with its status and lifecycle timestamps',
  primaryKey: ['order_id'],
  columns: [
    { name: 'order_id' },
    { name: 'customer_id' },
    { name: 'order_status' },
    { name: 'order_purchase_timestamp' },
    { name: 'order_approved_at' },
    { name: 'order_delivered_carrier_date' },
    { name: 'order_delivered_customer_date' },
    { name: 'order_estimated_delivery_date' },
  ],
  rules: {
    order_id: { type: 'string', onNull: 'drop' },
    customer_id: { type: 'string', onNull: 'drop' },
    order_status: { type: 'enum', values: ORDER_STATUSES, onNull: 'drop' },
    order_purchase_timestamp: { type: 'timestamp', onNull: 'drop' },
    order_approved_at: { type: 'timestamp', onNull: 'keep' },
    order_delivered_carrier_date: { type: 'timestamp', onNull: 'keep' },
    order_delivered_customer_date: { type: 'timestamp', onNull: 'keep' },
    order_estimated_delivery_date: { type: 'timestamp', onNull: 'keep' },
  },
  quality: { minRows: 1 },
}

const orderItemsSource: SourceConfig = {
  entity: 'order_items',
  file: 'olist_order_items_dataset.csv',
  description: 'One row per item within an order; order_item_id is the sequence within the order',
  primaryKey: ['order_id', 'order_item_id'],
  columns: [
    { name: 'order_id' },
    { name: 'order_item_id' },
    { name: 'product_id' },
    { name: 'seller_id' },
    { name: 'shipping_limit_date' },
    { name: 'price' },
    { name: 'freight_value' },
  ],
  rules: {
    order_id: { type: 'string', onNull: 'drop' },
    order_item_id: { type: 'integer', validRange: { min: 1 }, onNull: 'drop' },
    product_id: { type: 'string', onNull: 'drop' },
    seller_id: { type: 'string', onNull: 'drop' },
    shipping_limit_date: { type: 'timestamp', onNull: 'keep' },
    price: { type: 'decimal', validRange: { min: 0 }, onNull: 'drop' },
    freight_value: { type: 'decimal', validRange: { min: 0 }, onNull: 'keep' },
  },
  quality: { minRows: 1 },
}

const customersSource: SourceConfig = {
  entity: 'customers',
  file: 'olist_customers_dataset.csv',
  description: 'Customer per order-level customer_id, with the stable customer_unique_id and location',
  primaryKey: ['customer_id'],
  columns: [
    { name: 'customer_id' },
    { name: 'customer_unique_id' },
    { name: 'customer_zip_code_prefix' },
    { name: 'customer_city' },
    { name: 'customer_state' },
  ],
  rules: {
    customer_id: { type: 'string', onNull: 'drop' },
    customer_unique_id: { type: 'string', onNull: 'keep' },
    // zip prefixes keep their leading zeros
    customer_zip_code_prefix: { type: 'string', onNull: 'keep' },
    customer_city: { type: 'string', case: 'lower', onNull: 'keep' },
    customer_state: { type: 'string', case: 'upper', onNull: 'keep' },
  },
}

const paymentsSource: SourceConfig = {
  entity: 'payments',
  file: 'olist_order_payments_dataset.csv',
  description: 'Payments per order; an order may be paid in several sequential payments',
  primaryKey: ['order_id', 'payment_sequential'],
  columns: [
    { name: 'order_id' },
    { name: 'payment_sequential' },
    { name: 'payment_type' },
    { name: 'payment_installments' },
    { name: 'payment_value' },
  ],
  rules: {
    order_id: { type: 'string', onNull: 'drop' },
    payment_sequential: { type: 'integer', validRange: { min: 1 }, onNull: 'drop' },
    payment_type: { type: 'enum', values: PAYMENT_TYPES, onNull: { impute: 'constant', value: 'not_defined' } },
    payment_installments: { type: 'integer', validRange: { min: 0 }, onNull: { impute: 'median' } },
    payment_value: { type: 'decimal', validRange: { min: 0 }, onNull: 'drop' },
  },
}

const reviewsSource: SourceConfig = {
  entity: 'reviews',
  file: 'olist_order_reviews_dataset.csv',
  description: 'Customer reviews; review_id repeats across orders, so the key is (review_id, order_id)',
  primaryKey: ['review_id', 'order_id'],
  columns: [
    { name: 'review_id' },
    { name: 'order_id' },
    { name: 'review_score' },
    { name: 'review_comment_title', required: false },
    { name: 'review_comment_message', required: false },
    { name: 'review_creation_date' },
    { name: 'review_answer_timestamp' },
  ],
  rules: {
    review_id: { type: 'string', onNull: 'drop' },
    order_id: { type: 'string', onNull: 'drop' },
    review_score: { type: 'integer', validRange: { min: 1, max: 5 }, onNull: 'drop' },
    review_comment_title: { type: 'string', onNull: 'keep' },
    review_comment_message: { type: 'string', onNull: 'keep' },
    review_creation_date: { type: 'timestamp', onNull: 'keep' },
    review_answer_timestamp: { type: 'timestamp', onNull: 'keep' },
  },
}

const productsSource: SourceConfig = {
  entity: 'products',
  file: 'olist_products_dataset.csv',
  description: 'Product catalog with category and physical dimensions',
  primaryKey: ['product_id'],
  columns: [
    { name: 'product_id' },
    { name: 'product_category_name' },
    // misspelled upstream; kept as delivered
    { name: 'product_name_lenght', required: false },
    { name: 'product_description_lenght', required: false },
    { name: 'product_photos_qty', required: false },
    { name: 'product_weight_g' },
    { name: 'product_length_cm' },
    { name: 'product_height_cm' },
    { name: 'product_width_cm' },
  ],
  rules: {
    product_id: { type: 'string', onNull: 'drop' },
    product_category_name: { type: 'string', case: 'lower', onNull: 'keep' },
    product_name_lenght: { type: 'integer', validRange: { min: 0 }, onNull: 'keep' },
    product_description_lenght: { type: 'integer', validRange: { min: 0 }, onNull: 'keep' },
    product_photos_qty: { type: 'integer', validRange: { min: 0 }, onNull: 'keep' },
    product_weight_g: { type: 'decimal', validRange: { min: 0 }, onNull: { impute: 'median' } },
    product_length_cm: { type: 'decimal', validRange: { min: 0 }, onNull: { impute: 'median' } },
    product_height_cm: { type: 'decimal', validRange: { min: 0 }, onNull: { impute: 'median' } },
    product_width_cm: { type: 'decimal', validRange: { min: 0 }, onNull: { impute: 'median' } },
  },
}

const sellersSource: SourceConfig = {
  entity: 'sellers',
  file: 'olist_sellers_dataset.csv',
  description: 'Marketplace sellers and their location',
  primaryKey: ['seller_id'],
  columns: [
    { name: 'seller_id' },
    { name: 'seller_zip_code_prefix' },
    { name: 'seller_city' },
    { name: 'seller_state' },
  ],
  rules: {
    seller_id: { type: 'string', onNull: 'drop' },
    seller_zip_code_prefix: { type: 'string', onNull: 'keep' },
    seller_city: { type: 'string', case: 'lower', onNull: 'keep' },
    seller_state: { type: 'string', case: 'upper', onNull: 'keep' },
  },
}

const categoryTranslationSource: SourceConfig = {
  entity: 'category_translation',
  file: 'product_category_name_translation.csv',
  description: 'Portuguese category name to English; optional',
  required: false,
  primaryKey: ['product_category_name'],
  columns: [
    { name: 'product_category_name' },
    { name: 'product_category_name_english' },
  ],
  rules: {
    product_category_name: { type: 'string', case: 'lower', onNull: 'drop' },
    product_category_name_english: { type: 'string', onNull: 'keep' },
  },
}

// ============================================================================
// Join plan (base table: order_items)
// ============================================================================

const joinPlan: JoinSpec[] = [
  {
    name: 'items_orders',
    right: 'orders',
    leftKey: 'order_id',
    rightKey: 'order_id',
    kind: 'inner',
    multiplicity: 'many-to-one',
    description: 'Each item row takes its order; items of unknown orders are dropped. An order with n items yields n rows.',
  },
  {
    name: 'orders_customers',
    right: 'customers',
    leftKey: 'customer_id',
    rightKey: 'customer_id',
    kind: 'left',
    multiplicity: 'many-to-one',
    select: ['customer_unique_id', 'customer_zip_code_prefix', 'customer_city', 'customer_state'],
    description: 'Customer location; rows without a known customer keep null location columns.',
  },
  {
    name: 'items_products',
    right: 'products',
    leftKey: 'product_id',
    rightKey: 'product_id',
    kind: 'left',
    multiplicity: 'many-to-one',
    select: ['product_category_name', 'product_weight_g', 'product_length_cm', 'product_height_cm', 'product_width_cm'],
    description: 'Product category and dimensions; no multiplication.',
  },
  {
    name: 'products_category_translation',
    right: 'category_translation',
    leftKey: 'product_category_name',
    rightKey: 'product_category_name',
    kind: 'left',
    multiplicity: 'many-to-one',
    select: ['product_category_name_english'],
    description: 'English category name when the translation file is present.',
  },
  {
    name: 'items_sellers',
    right: 'sellers',
    leftKey: 'seller_id',
    rightKey: 'seller_id',
    kind: 'left',
    multiplicity: 'many-to-one',
    select: ['seller_zip_code_prefix', 'seller_city', 'seller_state'],
    description: 'Seller location; no multiplication.',
  },
  {
    name: 'orders_payments',
    right: 'order_payments',
    leftKey: 'order_id',
    rightKey: 'order_id',
    kind: 'left',
    multiplicity: 'many-to-one',
    description: 'Payments rolled up per order before joining, so each item row meets at most one payment row.',
  },
  {
    name: 'orders_reviews',
    right: 'reviews',
    leftKey: 'order_id',
    rightKey: 'order_id',
    kind: 'left',
    multiplicity: 'one-to-many',
    select: ['review_id', 'review_score', 'review_creation_date', 'review_answer_timestamp'],
    description:
      'Reviews per order. An order with k reviews multiplies each of its item rows k times; ' +
      'unreviewed orders keep their rows with null review columns.',
  },
]

// ============================================================================
// Derivations
// ============================================================================

function days(to: Cell, from: Cell): number | null {
  const end = requireDate(to)
  const start = requireDate(from)
  return end && start ? diffCalendarDays(end, start) : null
}

function purchaseDatePart(part: (date: Date) => number): Derivation['compute'] {
  return ([purchased]) => {
    const date = requireDate(purchased)
    return date ? part(date) : null
  }
}

export const derivations: Derivation[] = [
  {
    name: 'revenue',
    inputs: ['price', 'freight_value'],
    description: 'Item price plus freight, in cents precision',
    compute: ([price, freight]) => {
      const p = requireNumber(price)
      const f = requireNumber(freight)
      return p === null || f === null ? null : roundCents(p + f)
    },
  },
  {
    name: 'delivery_delay_days',
    inputs: ['order_delivered_customer_date', 'order_estimated_delivery_date'],
    description: 'Delivered minus estimated date in signed whole days; negative means early',
    compute: ([delivered, estimated]) => days(delivered, estimated),
  },
  {
    name: 'delivery_time_days',
    inputs: ['order_delivered_customer_date', 'order_purchase_timestamp'],
    description: 'Whole days from purchase to delivery',
    compute: ([delivered, purchased]) => days(delivered, purchased),
  },
  {
    name: 'delivered_on_time',
    inputs: ['delivery_delay_days'],
    description: 'Delivered on or before the estimated date',
    compute: ([delay]) => {
      const value = requireNumber(delay)
      return value === null ? null : value <= 0
    },
  },
  {
    name: 'review_lag_days',
    inputs: ['review_creation_date', 'order_purchase_timestamp'],
    description: 'Whole days from purchase to the review being created',
    compute: ([created, purchased]) => days(created, purchased),
  },
  {
    name: 'purchase_date_id',
    inputs: ['order_purchase_timestamp'],
    description: 'YYYYMMDD key into dim_date',
    compute: purchaseDatePart(dateId),
  },
  {
    name: 'purchase_year',
    inputs: ['order_purchase_timestamp'],
    description: 'Purchase year',
    compute: purchaseDatePart((date) => date.getUTCFullYear()),
  },
  {
    name: 'purchase_month',
    inputs: ['order_purchase_timestamp'],
    description: 'Purchase month, 1-12',
    compute: purchaseDatePart((date) => date.getUTCMonth() + 1),
  },
  {
    name: 'purchase_quarter',
    inputs: ['order_purchase_timestamp'],
    description: 'Purchase quarter, 1-4',
    compute: purchaseDatePart(quarterOf),
  },
  {
    name: 'purchase_day_of_week',
    inputs: ['order_purchase_timestamp'],
    description: 'Purchase weekday, 0 = Monday',
    compute: purchaseDatePart(dayOfWeek),
  },
  {
    name: 'category_name',
    inputs: ['product_category_name_english', 'product_category_name'],
    description: 'English category name, falling back to the source name',
    nullPolicy: 'coalesce',
    compute: ([english, original]) => english ?? original ?? null,
  },
]

// ============================================================================
// Dimensions
// ============================================================================

const ORDER_TIMESTAMPS = [
  'order_purchase_timestamp',
  'order_approved_at',
  'order_delivered_carrier_date',
  'order_delivered_customer_date',
  'order_estimated_delivery_date',
]

const ORDER_METRICS = ['delivery_delay_days', 'delivery_time_days', 'delivered_on_time']

/**
 * Orders with their delivery metrics, one row per order.
 */
export function orderDimension(orders: Table): Table {
  const metrics = derivations.filter((derivation) => ORDER_METRICS.includes(derivation.name))
  const derived = deriveColumns(orders, metrics)
  return dimensionOf(
    { ...derived, columns: ['order_id', 'order_status', ...ORDER_TIMESTAMPS, ...ORDER_METRICS] },
    'dim_order',
    'order_id'
  )
}

// ============================================================================
// Outputs
// ============================================================================

const salesColumns = [
  { name: 'order_count', type: 'integer' },
  { name: 'total_sales', type: 'decimal' },
  { name: 'total_freight', type: 'decimal' },
  { name: 'avg_order_value', type: 'decimal' },
] as const

export const outputs: OutputTableConfig[] = [
  {
    table: 'fact_order_items',
    file: 'fact_order_items',
    description: 'One row per order item (per review of its order)',
    columns: [
      { name: 'order_id', type: 'string' },
      { name: 'order_item_id', type: 'integer' },
      { name: 'product_id', type: 'string' },
      { name: 'seller_id', type: 'string' },
      { name: 'customer_id', type: 'string' },
      { name: 'customer_unique_id', type: 'string' },
      { name: 'order_status', type: 'string' },
      { name: 'order_purchase_timestamp', type: 'timestamp' },
      { name: 'order_approved_at', type: 'timestamp' },
      { name: 'order_delivered_carrier_date', type: 'timestamp' },
      { name: 'order_delivered_customer_date', type: 'timestamp' },
      { name: 'order_estimated_delivery_date', type: 'timestamp' },
      { name: 'shipping_limit_date', type: 'timestamp' },
      { name: 'price', type: 'decimal' },
      { name: 'freight_value', type: 'decimal' },
      { name: 'revenue', type: 'decimal' },
      { name: 'purchase_date_id', type: 'integer' },
      { name: 'purchase_year', type: 'integer' },
      { name: 'purchase_month', type: 'integer' },
      { name: 'purchase_quarter', type: 'integer' },
      { name: 'purchase_day_of_week', type: 'integer' },
      { name: 'delivery_time_days', type: 'integer' },
      { name: 'delivery_delay_days', type: 'integer' },
      { name: 'delivered_on_time', type: 'boolean' },
      { name: 'customer_zip_code_prefix', type: 'string' },
      { name: 'customer_city', type: 'string' },
      { name: 'customer_state', type: 'string' },
      { name: 'seller_zip_code_prefix', type: 'string' },
      { name: 'seller_city', type: 'string' },
      { name: 'seller_state', type: 'string' },
      { name: 'product_category_name', type: 'string' },
      { name: 'category_name', type: 'string' },
      { name: 'product_weight_g', type: 'decimal' },
      { name: 'payment_total', type: 'decimal' },
      { name: 'payment_count', type: 'integer' },
      { name: 'payment_installments_max', type: 'integer' },
      { name: 'primary_payment_type', type: 'string' },
      { name: 'review_id', type: 'string' },
      { name: 'review_score', type: 'integer' },
      { name: 'review_creation_date', type: 'timestamp' },
      { name: 'review_answer_timestamp', type: 'timestamp' },
      { name: 'review_lag_days', type: 'integer' },
    ],
  },
  {
    table: 'sales_by_month',
    file: 'agg_sales_by_month',
    description: 'Sales per purchase month',
    columns: [
      { name: 'year', type: 'integer' },
      { name: 'month', type: 'integer' },
      { name: 'quarter', type: 'integer' },
      ...salesColumns,
      { name: 'freight_percentage', type: 'decimal' },
    ],
  },
  {
    table: 'sales_by_category',
    file: 'agg_sales_by_category',
    description: 'Sales per product category (English name when available)',
    columns: [{ name: 'category_name', type: 'string' }, ...salesColumns],
  },
  {
    table: 'sales_by_state',
    file: 'agg_sales_by_state',
    description: 'Sales per customer state',
    columns: [{ name: 'state', type: 'string' }, ...salesColumns],
  },
  {
    table: 'sales_by_city',
    file: 'agg_sales_by_city',
    description: 'Sales per customer city',
    columns: [
      { name: 'state', type: 'string' },
      { name: 'city', type: 'string' },
      { name: 'location', type: 'string' },
      { name: 'order_count', type: 'integer' },
      { name: 'total_sales', type: 'decimal' },
    ],
  },
  {
    table: 'sales_by_seller',
    file: 'agg_sales_by_seller',
    description: 'Sales per seller',
    columns: [{ name: 'seller_id', type: 'string' }, ...salesColumns],
  },
  {
    table: 'review_metrics',
    file: 'agg_review_metrics',
    description: 'Reviewed orders per score, with the overall net promoter score',
    columns: [
      { name: 'review_score', type: 'integer' },
      { name: 'order_count', type: 'integer' },
      { name: 'total_sales', type: 'decimal' },
      { name: 'nps', type: 'decimal' },
    ],
  },
  {
    table: 'dim_date',
    file: 'dim_date',
    description: 'Calendar dimension keyed by date_id (YYYYMMDD)',
    columns: [
      { name: 'date_id', type: 'integer' },
      { name: 'date', type: 'date' },
      { name: 'year', type: 'integer' },
      { name: 'month', type: 'integer' },
      { name: 'day', type: 'integer' },
      { name: 'day_of_week', type: 'integer' },
      { name: 'quarter', type: 'integer' },
      { name: 'is_weekend', type: 'boolean' },
      { name: 'month_name', type: 'string' },
      { name: 'day_of_week_name', type: 'string' },
    ],
  },
  {
    table: 'dim_customer',
    file: 'dim_customer',
    description: 'Customer dimension keyed by customer_id',
    columns: [
      { name: 'id', type: 'string' },
      { name: 'customer_id', type: 'string' },
      { name: 'customer_unique_id', type: 'string' },
      { name: 'customer_zip_code_prefix', type: 'string' },
      { name: 'customer_city', type: 'string' },
      { name: 'customer_state', type: 'string' },
    ],
  },
  {
    table: 'dim_product',
    file: 'dim_product',
    description: 'Product dimension keyed by product_id, with the English category name',
    columns: [
      { name: 'id', type: 'string' },
      { name: 'product_id', type: 'string' },
      { name: 'product_category_name', type: 'string' },
      { name: 'product_category_name_english', type: 'string' },
      { name: 'product_name_lenght', type: 'integer' },
      { name: 'product_description_lenght', type: 'integer' },
      { name: 'product_photos_qty', type: 'integer' },
      { name: 'product_weight_g', type: 'decimal' },
      { name: 'product_length_cm', type: 'decimal' },
      { name: 'product_height_cm', type: 'decimal' },
      { name: 'product_width_cm', type: 'decimal' },
    ],
  },
  {
    table: 'dim_seller',
    file: 'dim_seller',
    description: 'Seller dimension keyed by seller_id',
    columns: [
      { name: 'id', type: 'string' },
      { name: 'seller_id', type: 'string' },
      { name: 'seller_zip_code_prefix', type: 'string' },
      { name: 'seller_city', type: 'string' },
      { name: 'seller_state', type: 'string' },
    ],
  },
  {
    table: 'dim_order',
    file: 'dim_order',
    description: 'Order dimension keyed by order_id, with delivery metrics',
    columns: [
      { name: 'id', type: 'string' },
      { name: 'order_id', type: 'string' },
      { name: 'order_status', type: 'string' },
      { name: 'order_purchase_timestamp', type: 'timestamp' },
      { name: 'order_approved_at', type: 'timestamp' },
      { name: 'order_delivered_carrier_date', type: 'timestamp' },
      { name: 'order_delivered_customer_date', type: 'timestamp' },
      { name: 'order_estimated_delivery_date', type: 'timestamp' },
      { name: 'delivery_delay_days', type: 'integer' },
      { name: 'delivery_time_days', type: 'integer' },
      { name: 'delivered_on_time', type: 'boolean' },
    ],
  },
  {
    table: 'dim_review',
    file: 'dim_review',
    description: 'Review dimension keyed by review_id; a review_id shared by several orders repeats',
    columns: [
      { name: 'id', type: 'string' },
      { name: 'review_id', type: 'string' },
      { name: 'order_id', type: 'string' },
      { name: 'review_score', type: 'integer' },
      { name: 'review_comment_title', type: 'string' },
      { name: 'review_comment_message', type: 'string' },
      { name: 'review_creation_date', type: 'timestamp' },
      { name: 'review_answer_timestamp', type: 'timestamp' },
    ],
  },
]

// ============================================================================
// Pipeline
// ============================================================================

export const ecommercePipeline: PipelineConfig = {
  name: 'ecommerce',
  description: 'Marketplace orders to a dashboard-ready fact table and aggregates',
  version: '1.0.0',
  sources: [
    ordersSource,
    orderItemsSource,
    customersSource,
    paymentsSource,
    reviewsSource,
    productsSource,
    sellersSource,
    categoryTranslationSource,
  ],
  derivedSources: [
    {
      name: 'order_payments',
      from: 'payments',
      description: 'Payments rolled up to one row per order',
      build: paymentsByOrder,
    },
  ],
  baseTable: 'order_items',
  factTable: 'fact_order_items',
  joinPlan,
  derivations,
  aggregates: [
    { name: 'sales_by_month', description: 'Sales per purchase month', build: salesByMonth },
    { name: 'sales_by_category', description: 'Sales per category', build: salesByCategory },
    { name: 'sales_by_state', description: 'Sales per customer state', build: salesByState },
    { name: 'sales_by_city', description: 'Sales per customer city', build: salesByCity },
    { name: 'sales_by_seller', description: 'Sales per seller', build: salesBySeller },
    { name: 'review_metrics', description: 'Review score distribution and NPS', build: reviewMetrics },
    { name: 'dim_date', description: 'Calendar dimension', build: (fact) => dateDimension(fact) },
    {
      name: 'dim_customer',
      description: 'Customer dimension',
      build: (_fact, sources) => dimensionOf(requireTable(sources, 'customers'), 'dim_customer', 'customer_id'),
    },
    {
      name: 'dim_product',
      description: 'Product dimension',
      build: (_fact, sources) => productDimension(requireTable(sources, 'products'), sources.get('category_translation')),
    },
    {
      name: 'dim_seller',
      description: 'Seller dimension',
      build: (_fact, sources) => dimensionOf(requireTable(sources, 'sellers'), 'dim_seller', 'seller_id'),
    },
    {
      name: 'dim_order',
      description: 'Order dimension with delivery metrics',
      build: (_fact, sources) => orderDimension(requireTable(sources, 'orders')),
    },
    {
      name: 'dim_review',
      description: 'Review dimension',
      build: (_fact, sources) => dimensionOf(requireTable(sources, 'reviews'), 'dim_review', 'review_id'),
    },
  ],
  outputs,
}

registerPipeline(ecommercePipeline)
