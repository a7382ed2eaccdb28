export type PipelineStage = 'config' | 'reading' | 'cleaning' | 'joining' | 'deriving' | 'exporting'

export class EtlError extends Error {
  readonly stage: PipelineStage
  readonly details?: unknown

  constructor(stage: PipelineStage, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.stage = stage
    this.details = details
  }
}

export class ReadError extends EtlError {
  readonly path: string

  constructor(path: string, message: string, options?: { cause?: unknown; details?: unknown }) {
    super('reading', message, options?.details, { cause: options?.cause })
    this.path = path
  }
}

export class SchemaError extends EtlError {
  readonly table: string
  readonly columns: string[]

  constructor(
    stage: 'reading' | 'exporting',
    table: string,
    columns: string[],
    message: string
  ) {
    super(stage, message, { table, columns })
    this.table = table
    this.columns = columns
  }
}

export class DataQualityError extends EtlError {
  readonly table: string

  constructor(table: string, message: string, details?: unknown) {
    super('cleaning', message, details)
    this.table = table
  }
}

export class JoinError extends EtlError {
  readonly join: string

  constructor(join: string, message: string, details?: unknown) {
    super('joining', message, details)
    this.join = join
  }
}

export class ConfigurationError extends EtlError {
  constructor(message: string, details?: unknown) {
    super('config', message, details)
  }
}

export class WriteError extends EtlError {
  readonly path: string
  readonly attempts: number

  constructor(path: string, attempts: number, message: string, options?: { cause?: unknown }) {
    super('exporting', message, { path, attempts }, { cause: options?.cause })
    this.path = path
    this.attempts = attempts
  }
}

export function describeError(error: unknown): string {
  if (error instanceof EtlError) return `${error.name} [${error.stage}]: ${error.message}`
  if (error instanceof Error) return `${error.name}: ${error.message}`
  return String(error)
}

/**
 * Node.js system error code, when the value carries one.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error
    return typeof code === 'string' ? code : undefined
  }
  return undefined
}
