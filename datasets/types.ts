/**
 * ETL Dataset Definition Types
 *
 * A dataset definition declares everything a pipeline run needs:
 * source files and their column schemas, per-column cleaning rules,
 * the join plan, the derivation list, aggregate tables and the output
 * schemas handed to the dashboard tool.
 */

import type { Cell, Table } from '../pipeline/table'

// ============================================================================
// Columns & Cleaning Rules
// ============================================================================

// Column data types understood by the cleaner and the exporter
export type ColumnType =
  | 'string'
  | 'integer'
  | 'decimal'
  | 'boolean'
  | 'timestamp'
  | 'date'
  | 'enum'

// Column as it appears in a source file
export interface SourceColumnConfig {
  name: string
  // Absent optional columns are added as all-null columns
  required?: boolean
}

export type ImputePolicy =
  | { impute: 'constant'; value: string | number | boolean }
  | { impute: 'median' }

export type NullPolicy = 'drop' | 'keep' | ImputePolicy

export interface ValidRange {
  // Numbers for integer/decimal, ISO date strings for timestamp/date
  min?: number | string
  max?: number | string
}

export interface ColumnRule {
  type: ColumnType
  onNull: NullPolicy
  validRange?: ValidRange
  // Allowed codes for enum columns, compared after normalization
  values?: string[]
  trim?: boolean
  case?: 'lower' | 'upper' | 'preserve'
}

export type CleaningRules = Record<string, ColumnRule>

export interface QualityConfig {
  // Fewer rows than this after cleaning is a data quality failure
  minRows?: number
  // Share of input rows that may be dropped (0..1)
  maxDropRatio?: number
}

// ============================================================================
// Sources
// ============================================================================

export interface SourceConfig {
  entity: string
  file: string
  description: string
  // Optional sources may be missing on disk; they load as empty tables
  required?: boolean
  primaryKey: string[]
  columns: SourceColumnConfig[]
  rules: CleaningRules
  quality?: QualityConfig
}

// Table computed from a cleaned source before joining (e.g. per-order rollups)
export interface DerivedSourceConfig {
  name: string
  from: string
  description: string
  build: (table: Table) => Table
}

// ============================================================================
// Joins
// ============================================================================

export type JoinKind = 'inner' | 'left'

// How many right rows each left row may meet. One-to-many multiplies rows.
export type JoinMultiplicity = 'one-to-one' | 'many-to-one' | 'one-to-many'

export interface JoinSpec {
  name: string
  right: string
  leftKey: string
  rightKey: string
  kind: JoinKind
  multiplicity: JoinMultiplicity
  // Right columns to carry over (default: all except the right key)
  select?: string[]
  // Prefix applied to carried right columns
  prefix?: string
  description: string
}

// ============================================================================
// Derivations & Aggregates
// ============================================================================

/**
 * A pure column derivation. With the default `propagate` policy the
 * deriver emits null without calling `compute` when any input is null.
 * `coalesce` derivations see nulls and decide themselves.
 */
export interface Derivation {
  name: string
  inputs: string[]
  description: string
  nullPolicy?: 'propagate' | 'coalesce'
  compute: (values: Cell[]) => Cell
}

// Built from the fact table, or from the cleaned and derived sources for dimensions
export interface AggregateConfig {
  name: string
  description: string
  build: (fact: Table, sources: ReadonlyMap<string, Table>) => Table
}

// ============================================================================
// Outputs
// ============================================================================

export type OutputColumnType = Exclude<ColumnType, 'enum'>

export interface OutputColumn {
  name: string
  type: OutputColumnType
  description?: string
}

export interface OutputTableConfig {
  // Name of the in-memory table to export
  table: string
  // File name without extension
  file: string
  description: string
  columns: OutputColumn[]
}

// ============================================================================
// Pipeline
// ============================================================================

export interface PipelineConfig {
  name: string
  description: string
  version: string
  sources: SourceConfig[]
  derivedSources: DerivedSourceConfig[]
  // Table the join plan starts from, and the name given to its result
  baseTable: string
  factTable: string
  joinPlan: JoinSpec[]
  derivations: Derivation[]
  aggregates: AggregateConfig[]
  outputs: OutputTableConfig[]
}
