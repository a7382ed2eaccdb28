/**
 * E-commerce ETL pipeline
 *
 * Usage:
 * ```typescript
 * import { ecommercePipeline } from 'ecommerce-etl/datasets'
 * import { parseRunOptions, runPipeline } from 'ecommerce-etl'
 *
 * const report = await runPipeline(
 *   ecommercePipeline,
 *   parseRunOptions({ inputDir: 'data/raw', outputDir: 'data/processed' })
 * )
 * console.log(report.status, report.factRows)
 * ```
 */

export * from './table'
export * from './errors'
export * from './logger'
export * from './dates'
export * from './config'
export * from './reader'
export * from './cleaner'
export * from './joiner'
export * from './deriver'
export * from './aggregator'
export * from './exporter'
export * from './pipeline'
