#!/usr/bin/env tsx
/**
 * Run the ETL pipeline
 *
 * Usage:
 *   npx tsx scripts/run-etl.ts --input=data/raw --output=data/processed
 *   npx tsx scripts/run-etl.ts --orders=/exports/orders.csv --parquet --verbose
 *   npx tsx scripts/run-etl.ts --history --output=data/processed
 *
 * Environment: ETL_INPUT_DIR, ETL_OUTPUT_DIR, ETL_LOG_LEVEL.
 * Exits 0 when the run reaches Done, 1 when it fails.
 */

import * as path from 'node:path'
import { fileURLToPath } from 'node:url'
import { getPipeline, getPipelineNames } from '../datasets'
import { formatRunSummary, readRecentRuns } from '../instrumentation/reader'
import { runLogPath } from '../instrumentation/writer'
import { runOptionsFromArgs } from '../pipeline/config'
import { ConfigurationError, describeError } from '../pipeline/errors'
import { createLogger, parseLogLevel } from '../pipeline/logger'
import { runPipeline } from '../pipeline/pipeline'

export const DEFAULT_PIPELINE = 'ecommerce'

const HISTORY_LIMIT = 10

const USAGE = `Usage: run-etl [options]

  --input=<dir>        Directory holding the source CSV files (ETL_INPUT_DIR, default data/raw)
  --output=<dir>       Directory the outputs are written to (ETL_OUTPUT_DIR, default data/processed)
  --<entity>=<file>    Read one source from a specific file, e.g. --orders=orders.csv
  --delimiter=<char>   Source CSV delimiter (default ,)
  --parquet            Also write to_parquet.sql, a DuckDB conversion script
  --no-run-log         Do not append to <output>/runs.jsonl
  --history            Print the most recent runs from the run log and exit
  --pipeline=<name>    Dataset definition to run (default ${DEFAULT_PIPELINE})
  --verbose | --quiet  Log level debug | warn (ETL_LOG_LEVEL)
`

/**
 * Parse `--key=value` and `--flag` arguments.
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {}

  for (const arg of argv) {
    if (!arg.startsWith('--') || arg.length === 2) {
      throw new ConfigurationError(`Unexpected argument ${arg}`)
    }
    const body = arg.slice(2)
    const eq = body.indexOf('=')
    if (eq === -1) {
      args[body] = true
    } else {
      args[body.slice(0, eq)] = body.slice(eq + 1)
    }
  }

  return args
}

export async function main(argv: string[], env: Record<string, string | undefined>): Promise<number> {
  const logger = createLogger('cli', parseLogLevel(env.ETL_LOG_LEVEL))

  try {
    const args = parseArgs(argv)
    if (args.help === true) {
      console.log(USAGE)
      return 0
    }

    const name = typeof args.pipeline === 'string' ? args.pipeline : DEFAULT_PIPELINE
    const config = getPipeline(name)
    if (!config) {
      throw new ConfigurationError(`Unknown pipeline ${name} (available: ${getPipelineNames().join(', ')})`)
    }

    const options = runOptionsFromArgs(
      args,
      env,
      config.sources.map((source) => source.entity)
    )

    if (args.history === true) {
      const runs = await readRecentRuns(runLogPath(options.outputDir), HISTORY_LIMIT, { pipeline: config.name })
      if (runs.length === 0) console.log(`No runs recorded in ${runLogPath(options.outputDir)}`)
      for (const run of runs) console.log(formatRunSummary(run))
      return 0
    }

    const report = await runPipeline(config, options, {
      logger: createLogger(config.name, options.logLevel),
    })
    return report.status === 'Done' ? 0 : 1
  } catch (error) {
    logger.error(describeError(error), error)
    return 1
  }
}

const invokedPath = process.argv[1]
if (invokedPath && path.resolve(invokedPath) === fileURLToPath(import.meta.url)) {
  main(process.argv.slice(2), process.env).then(
    (code) => {
      process.exitCode = code
    },
    (error: unknown) => {
      console.error(error)
      process.exitCode = 1
    }
  )
}
