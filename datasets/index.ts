/**
 * ETL Dataset Registry
 *
 * Re-exports the dataset definition types and the registry, and loads every
 * dataset module so it registers itself.
 */

export * from './types'
export * from './registry'

export { ecommercePipeline, derivations, outputs, ORDER_STATUSES, PAYMENT_TYPES } from './ecommerce'
