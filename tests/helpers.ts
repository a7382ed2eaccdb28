/**
 * Shared test helpers: temp directories, CSV fixtures and a logger that
 * records instead of printing.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { LogLevel, Logger } from '../pipeline/logger'

export async function makeTempDir(prefix = 'etl-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true })
}

export function csv(lines: string[]): string {
  return lines.join('\n') + '\n'
}

export async function writeCsvFile(dir: string, file: string, lines: string[]): Promise<string> {
  const filePath = join(dir, file)
  await writeFile(filePath, csv(lines), 'utf8')
  return filePath
}

export class RecordingLogger implements Logger {
  readonly lines: Array<{ level: LogLevel; message: string }> = []

  debug(message: string): void {
    this.lines.push({ level: 'debug', message })
  }

  info(message: string): void {
    this.lines.push({ level: 'info', message })
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message })
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message })
  }

  child(): Logger {
    return this
  }

  messages(level: LogLevel): string[] {
    return this.lines.filter((line) => line.level === level).map((line) => line.message)
  }
}
