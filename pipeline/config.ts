/**
 * Run options and dataset definition validation.
 *
 * Runtime options are paths and flags only; everything else lives in the
 * typed dataset definition. Both are checked with zod before a run starts
 * and any failure surfaces as a ConfigurationError.
 *
 * @module pipeline/config
 */

import { z } from 'zod'
import type { PipelineConfig } from '../datasets/types'
import { findCycle } from './deriver'
import { ConfigurationError } from './errors'
import { LOG_LEVELS, parseLogLevel, type LogLevel } from './logger'

export const DEFAULT_INPUT_DIR = 'data/raw'
export const DEFAULT_OUTPUT_DIR = 'data/processed'

// ── Run options ─────────────────────────────────────────────────────

export const runOptionsSchema = z.object({
  inputDir: z.string().min(1, 'Input directory is required'),
  outputDir: z.string().min(1, 'Output directory is required'),
  overrides: z.record(z.string().min(1, 'Override path must not be empty')).default({}),
  delimiter: z.string().length(1, 'Delimiter must be a single character').default(','),
  parquet: z.boolean().default(false),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  runLog: z.boolean().default(true),
})
export type RunOptionsInput = z.input<typeof runOptionsSchema>
export type RunOptions = z.output<typeof runOptionsSchema>

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

export function parseRunOptions(input: unknown): RunOptions {
  const parsed = runOptionsSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid run options: ${formatIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    })
  }
  return parsed.data
}

/**
 * Build run options from parsed command line flags and the environment.
 * Flags win over environment variables; any flag named after a source
 * entity overrides that entity's file path.
 *
 * @throws ConfigurationError on unknown flags or invalid values
 */
export function runOptionsFromArgs(
  args: Record<string, string | boolean>,
  env: Record<string, string | undefined>,
  entities: string[]
): RunOptions {
  const known = new Set(['input', 'output', 'delimiter', 'parquet', 'verbose', 'quiet', 'no-run-log', 'pipeline', 'history', 'help'])
  const overrides: Record<string, string> = {}

  for (const [key, value] of Object.entries(args)) {
    if (known.has(key)) continue
    if (!entities.includes(key)) {
      throw new ConfigurationError(`Unknown option --${key}`, { known: [...known, ...entities] })
    }
    if (typeof value !== 'string') {
      throw new ConfigurationError(`Option --${key} needs a file path (--${key}=<file>)`)
    }
    overrides[key] = value
  }

  const text = (key: string): string | undefined => {
    const value = args[key]
    return typeof value === 'string' ? value : undefined
  }

  let logLevel: LogLevel = parseLogLevel(env.ETL_LOG_LEVEL, 'info')
  if (args.verbose === true) logLevel = 'debug'
  if (args.quiet === true) logLevel = 'warn'

  return parseRunOptions({
    inputDir: text('input') ?? env.ETL_INPUT_DIR ?? DEFAULT_INPUT_DIR,
    outputDir: text('output') ?? env.ETL_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR,
    overrides,
    delimiter: text('delimiter'),
    parquet: args.parquet === true,
    logLevel,
    runLog: args['no-run-log'] !== true,
  })
}

// ── Dataset definition ──────────────────────────────────────────────

const COLUMN_TYPES = ['string', 'integer', 'decimal', 'boolean', 'timestamp', 'date', 'enum'] as const
const OUTPUT_COLUMN_TYPES = ['string', 'integer', 'decimal', 'boolean', 'timestamp', 'date'] as const

const nullPolicySchema = z.union([
  z.enum(['drop', 'keep']),
  z.object({ impute: z.literal('constant'), value: z.union([z.string(), z.number(), z.boolean()]) }),
  z.object({ impute: z.literal('median') }),
])

const boundSchema = z.union([z.number(), z.string().min(1)]).optional()

const columnRuleSchema = z.object({
  type: z.enum(COLUMN_TYPES),
  onNull: nullPolicySchema,
  validRange: z.object({ min: boundSchema, max: boundSchema }).optional(),
  values: z.array(z.string()).optional(),
  trim: z.boolean().optional(),
  case: z.enum(['lower', 'upper', 'preserve']).optional(),
})

const sourceSchema = z
  .object({
    entity: z.string().min(1),
    file: z.string().min(1),
    description: z.string(),
    required: z.boolean().optional(),
    primaryKey: z.array(z.string().min(1)),
    columns: z.array(z.object({ name: z.string().min(1), required: z.boolean().optional() })).min(1),
    rules: z.record(columnRuleSchema),
    quality: z
      .object({
        minRows: z.number().int().nonnegative().optional(),
        maxDropRatio: z.number().min(0).max(1).optional(),
      })
      .optional(),
  })
  .superRefine((source, ctx) => {
    const names = source.columns.map((column) => column.name)
    for (const duplicate of names.filter((name, index) => names.indexOf(name) !== index)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['columns'], message: `Column ${duplicate} is declared twice` })
    }
    for (const column of Object.keys(source.rules)) {
      if (!names.includes(column)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['rules', column], message: `Rule for undeclared column ${column}` })
      }
    }
    for (const column of source.primaryKey) {
      if (!names.includes(column)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['primaryKey'], message: `Primary key column ${column} is not declared` })
      }
    }
  })

const joinSpecSchema = z.object({
  name: z.string().min(1),
  right: z.string().min(1),
  leftKey: z.string().min(1),
  rightKey: z.string().min(1),
  kind: z.enum(['inner', 'left']),
  multiplicity: z.enum(['one-to-one', 'many-to-one', 'one-to-many']),
  select: z.array(z.string().min(1)).optional(),
  prefix: z.string().optional(),
  description: z.string().min(1, 'Every join documents its effect on row counts'),
})

const outputSchema = z
  .object({
    table: z.string().min(1),
    file: z.string().regex(/^[A-Za-z0-9_-]+$/, 'File names are letters, digits, _ and - only'),
    description: z.string(),
    columns: z.array(z.object({ name: z.string().min(1), type: z.enum(OUTPUT_COLUMN_TYPES) })).min(1),
  })
  .superRefine((output, ctx) => {
    const names = output.columns.map((column) => column.name)
    for (const duplicate of names.filter((name, index) => names.indexOf(name) !== index)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['columns'], message: `Column ${duplicate} is listed twice` })
    }
  })

export const pipelineConfigSchema = z
  .object({
    name: z.string().min(1),
    description: z.string(),
    version: z.string().min(1),
    sources: z.array(sourceSchema).min(1),
    derivedSources: z.array(z.object({ name: z.string().min(1), from: z.string().min(1), description: z.string() })),
    baseTable: z.string().min(1),
    factTable: z.string().min(1),
    joinPlan: z.array(joinSpecSchema),
    derivations: z.array(
      z.object({
        name: z.string().min(1),
        inputs: z.array(z.string().min(1)),
        description: z.string(),
        nullPolicy: z.enum(['propagate', 'coalesce']).optional(),
      })
    ),
    aggregates: z.array(z.object({ name: z.string().min(1), description: z.string() })),
    outputs: z.array(outputSchema).min(1),
  })
  .superRefine((config, ctx) => {
    const entities = config.sources.map((source) => source.entity)
    const tables = new Set([...entities, ...config.derivedSources.map((derived) => derived.name)])

    for (const duplicate of entities.filter((entity, index) => entities.indexOf(entity) !== index)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sources'], message: `Source ${duplicate} is declared twice` })
    }
    if (!entities.includes(config.baseTable)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['baseTable'], message: `Base table ${config.baseTable} is not a source` })
    }
    config.derivedSources.forEach((derived, index) => {
      if (!entities.includes(derived.from)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['derivedSources', index, 'from'],
          message: `Derived source ${derived.name} reads unknown source ${derived.from}`,
        })
      }
    })
    config.joinPlan.forEach((spec, index) => {
      if (!tables.has(spec.right)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['joinPlan', index, 'right'],
          message: `Join ${spec.name} references unknown table ${spec.right}`,
        })
      }
    })

    const cycle = findCycle(config.derivations)
    if (cycle) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['derivations'], message: `Cyclic derivation dependency: ${cycle.join(' → ')}` })
    }

    const produced = new Set([config.factTable, ...config.aggregates.map((aggregate) => aggregate.name)])
    const files = new Set<string>()
    config.outputs.forEach((output, index) => {
      if (!produced.has(output.table)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['outputs', index, 'table'],
          message: `Output ${output.file} exports unknown table ${output.table}`,
        })
      }
      if (files.has(output.file)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['outputs', index, 'file'], message: `File ${output.file} is written twice` })
      }
      files.add(output.file)
    })
  })

/**
 * Check the declarative parts of a dataset definition. Functions (derivation
 * and aggregate bodies) are not inspected.
 *
 * @throws ConfigurationError listing every problem found
 */
export function validatePipelineConfig(config: PipelineConfig): void {
  const parsed = pipelineConfigSchema.safeParse(config)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid pipeline ${config.name}: ${formatIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    })
  }
}
