/**
 * Exporter Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { readFile, readdir } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import type { OutputTableConfig } from '../datasets/types'
import { SchemaError, WriteError } from '../pipeline/errors'
import {
  MANIFEST_FILE,
  PARQUET_SCRIPT_FILE,
  exportTables,
  formatCell,
  generateParquetScript,
  moveFile,
  nodeFileOps,
  tableToCsv,
  writeFileAtomic,
  type FileOps,
  type Manifest,
} from '../pipeline/exporter'
import { createTable, type Table } from '../pipeline/table'
import { RecordingLogger, makeTempDir, removeDir } from './helpers'

const when = new Date(Date.UTC(2023, 0, 5, 10, 30))

const output: OutputTableConfig = {
  table: 'widgets',
  file: 'widget_export',
  description: 'Test widgets',
  columns: [
    { name: 'id', type: 'integer' },
    { name: 'label', type: 'string' },
    { name: 'day', type: 'date' },
    { name: 'at', type: 'timestamp' },
    { name: 'ok', type: 'boolean' },
  ],
}

function widgets(): Table {
  return createTable('widgets', ['extra', 'id', 'label', 'day', 'at', 'ok'], [
    { extra: 'dropped', id: 1, label: 'x, y', day: when, at: when, ok: true },
    { extra: 'dropped', id: 2, label: null, day: null, at: null, ok: false },
  ])
}

/**
 * In-memory file operations failing with the given error codes, one per
 * attempt, before succeeding.
 */
class FlakyFileOps implements FileOps {
  readonly files = new Map<string, string>()
  readonly removed: string[] = []
  private failures: string[]
  private renameFailures: string[]

  constructor(failures: string[] = [], renameFailures: string[] = []) {
    this.failures = [...failures]
    this.renameFailures = [...renameFailures]
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    const code = this.failures.shift()
    if (code) throw Object.assign(new Error(`${code}: simulated failure`), { code })
    this.files.set(filePath, content)
  }

  async rename(from: string, to: string): Promise<void> {
    const code = this.renameFailures.shift()
    if (code) throw Object.assign(new Error(`${code}: simulated failure`), { code })
    const content = this.files.get(from)
    if (content === undefined) throw Object.assign(new Error(`ENOENT: ${from}`), { code: 'ENOENT' })
    this.files.delete(from)
    this.files.set(to, content)
  }

  async remove(filePath: string): Promise<void> {
    this.removed.push(filePath)
    this.files.delete(filePath)
  }

  async makeDir(): Promise<void> {
    return
  }

  async removeDir(dirPath: string): Promise<void> {
    this.removed.push(dirPath)
  }
}

/**
 * Real file operations that record every write and fail writes of the
 * named file with EACCES.
 */
function recordingFileOps(failing?: string): FileOps & { written: string[] } {
  const written: string[] = []
  return {
    written,
    ...nodeFileOps,
    writeFile: async (filePath, content) => {
      if (failing !== undefined && basename(filePath).startsWith(failing)) {
        throw Object.assign(new Error(`EACCES: permission denied, open '${filePath}'`), { code: 'EACCES' })
      }
      written.push(filePath)
      await nodeFileOps.writeFile(filePath, content)
    },
  }
}

const single = (table: string): OutputTableConfig => ({
  table,
  file: table,
  description: `Table ${table}`,
  columns: [{ name: 'v', type: 'integer' }],
})

function singles(value: number): Map<string, Table> {
  return new Map([
    ['a', createTable('a', ['v'], [{ v: value }])],
    ['b', createTable('b', ['v'], [{ v: value }])],
  ])
}

describe('Exporter', () => {
  describe('formatCell', () => {
    it('should format dates by column type', () => {
      expect(formatCell(when, 'date')).toBe('2023-01-05')
      expect(formatCell(when, 'timestamp')).toBe('2023-01-05 10:30:00')
    })

    it('should format nulls, booleans and numbers', () => {
      expect(formatCell(null, 'string')).toBe('')
      expect(formatCell(false, 'boolean')).toBe('false')
      expect(formatCell(12.5, 'decimal')).toBe('12.5')
    })
  })

  describe('tableToCsv', () => {
    it('should write documented columns in order with quoting', async () => {
      const csv = await tableToCsv(widgets(), output)

      expect(csv).toBe(
        'id,label,day,at,ok\n' +
          '1,"x, y",2023-01-05,2023-01-05 10:30:00,true\n' +
          '2,,,,false\n'
      )
    })

    it('should write only the header for an empty table', async () => {
      const csv = await tableToCsv(createTable('widgets', ['id', 'label', 'day', 'at', 'ok']), output)
      expect(csv).toBe('id,label,day,at,ok\n')
    })

    it('should raise SchemaError when a documented column is missing', async () => {
      const table = createTable('widgets', ['id', 'label'])
      await expect(tableToCsv(table, output)).rejects.toBeInstanceOf(SchemaError)
      await expect(tableToCsv(table, output)).rejects.toThrow(
        'Table widgets is missing documented output columns: day, at, ok'
      )
    })
  })

  describe('writeFileAtomic', () => {
    it('should write through a temporary file', async () => {
      const ops = new FlakyFileOps()
      const attempts = await writeFileAtomic('/out/a.csv', 'data', { fileOps: ops })

      expect(attempts).toBe(1)
      expect([...ops.files.entries()]).toEqual([['/out/a.csv', 'data']])
    })

    it('should retry once after a transient failure', async () => {
      const ops = new FlakyFileOps(['EBUSY'])
      const logger = new RecordingLogger()

      const attempts = await writeFileAtomic('/out/a.csv', 'data', { fileOps: ops, logger })

      expect(attempts).toBe(2)
      expect(ops.files.get('/out/a.csv')).toBe('data')
      expect(ops.removed).toEqual([`/out/a.csv.${process.pid}.tmp`])
      expect(logger.messages('warn')).toEqual(['Transient EBUSY writing /out/a.csv, retrying once'])
    })

    it('should not retry a permanent failure', async () => {
      const ops = new FlakyFileOps(['EACCES'])

      const error = await writeFileAtomic('/out/a.csv', 'data', { fileOps: ops }).catch((err: unknown) => err)

      expect(error).toBeInstanceOf(WriteError)
      expect(error).toMatchObject({ path: '/out/a.csv', attempts: 1, stage: 'exporting' })
      expect(ops.files.size).toBe(0)
    })

    it('should give up after a second transient failure', async () => {
      const ops = new FlakyFileOps(['EIO', 'EIO'])

      await expect(writeFileAtomic('/out/a.csv', 'data', { fileOps: ops })).rejects.toMatchObject({
        name: 'WriteError',
        attempts: 2,
      })
    })
  })

  describe('moveFile', () => {
    it('should retry a transient rename once', async () => {
      const ops = new FlakyFileOps([], ['EBUSY'])
      ops.files.set('/stage/a.csv', 'data')
      const logger = new RecordingLogger()

      const attempts = await moveFile('/stage/a.csv', '/out/a.csv', { fileOps: ops, logger })

      expect(attempts).toBe(2)
      expect([...ops.files.entries()]).toEqual([['/out/a.csv', 'data']])
      expect(logger.messages('warn')).toEqual(['Transient EBUSY moving /stage/a.csv to /out/a.csv, retrying once'])
    })

    it('should not retry a permanent rename failure', async () => {
      const ops = new FlakyFileOps([], ['EXDEV'])
      ops.files.set('/stage/a.csv', 'data')

      await expect(moveFile('/stage/a.csv', '/out/a.csv', { fileOps: ops })).rejects.toMatchObject({
        name: 'WriteError',
        path: '/out/a.csv',
        attempts: 1,
      })
      expect(ops.files.get('/stage/a.csv')).toBe('data')
    })
  })

  describe('generateParquetScript', () => {
    it('should emit one typed COPY statement per output', () => {
      const script = generateParquetScript([
        { ...output, columns: [{ name: 'id', type: 'integer' }, { name: 'label', type: 'string' }] },
      ])

      expect(script.split('\n')).toEqual([
        '-- DuckDB Parquet conversion script',
        '-- Run from the output directory: duckdb < to_parquet.sql',
        '',
        '-- Test widgets',
        'COPY (',
        "  SELECT * FROM read_csv('widget_export.csv', header=true, columns={'id': 'BIGINT', 'label': 'VARCHAR'})",
        ") TO 'widget_export.parquet' (FORMAT PARQUET, COMPRESSION 'zstd');",
        '',
      ])
    })
  })

  describe('exportTables', () => {
    let dir: string

    beforeEach(async () => {
      dir = await makeTempDir()
    })

    afterEach(async () => {
      await removeDir(dir)
    })

    it('should write CSV files, the parquet script and a manifest', async () => {
      const outputDir = join(dir, 'out')
      const result = await exportTables(new Map([['widgets', widgets()]]), [output], {
        outputDir,
        runId: 'run-1',
        pipeline: { name: 'widgets', version: '2.0.0' },
        parquet: true,
        now: () => new Date(Date.UTC(2024, 0, 1)),
      })

      expect((await readdir(outputDir)).sort()).toEqual([MANIFEST_FILE, PARQUET_SCRIPT_FILE, 'widget_export.csv'].sort())
      expect(result.manifestPath).toBe(join(outputDir, MANIFEST_FILE))
      expect(result.parquetScriptPath).toBe(join(outputDir, PARQUET_SCRIPT_FILE))

      const manifest: Manifest = JSON.parse(await readFile(result.manifestPath, 'utf8'))
      expect(manifest).toEqual({
        runId: 'run-1',
        pipeline: 'widgets',
        version: '2.0.0',
        generatedAt: '2024-01-01T00:00:00.000Z',
        files: [
          {
            file: 'widget_export.csv',
            table: 'widgets',
            description: 'Test widgets',
            rows: 2,
            columns: output.columns,
          },
        ],
        parquetScript: PARQUET_SCRIPT_FILE,
      })

      const csv = await readFile(join(outputDir, 'widget_export.csv'), 'utf8')
      expect(csv.trimEnd().split('\n')).toHaveLength(3)
    })

    it('should skip the parquet script unless asked', async () => {
      const result = await exportTables(new Map([['widgets', widgets()]]), [output], {
        outputDir: dir,
        runId: 'run-2',
        pipeline: { name: 'widgets', version: '2.0.0' },
      })

      expect(result.parquetScriptPath).toBeNull()
      expect((await readdir(dir)).sort()).toEqual([MANIFEST_FILE, 'widget_export.csv'])
    })

    it('should stage every file before moving it into place', async () => {
      const outputDir = join(dir, 'out')
      const ops = recordingFileOps()

      await exportTables(singles(1), [single('a'), single('b')], {
        outputDir,
        runId: 'run-9',
        pipeline: { name: 'singles', version: '1.0.0' },
        fileOps: ops,
      })

      expect(ops.written.map((filePath) => dirname(filePath))).toEqual([
        join(outputDir, '.staging-run-9'),
        join(outputDir, '.staging-run-9'),
        join(outputDir, '.staging-run-9'),
      ])
      expect((await readdir(outputDir)).sort()).toEqual(['a.csv', 'b.csv', MANIFEST_FILE])
    })

    it('should leave the previous run untouched when a later file fails', async () => {
      const outputDir = join(dir, 'out')
      const pipeline = { name: 'singles', version: '1.0.0' }
      await exportTables(singles(1), [single('a'), single('b')], { outputDir, runId: 'run-old', pipeline })
      const logger = new RecordingLogger()

      const error = await exportTables(singles(2), [single('a'), single('b')], {
        outputDir,
        runId: 'run-new',
        pipeline,
        fileOps: recordingFileOps('b.csv'),
        logger,
      }).catch((err: unknown) => err)

      expect(error).toBeInstanceOf(WriteError)
      expect(error).toMatchObject({ path: join(outputDir, '.staging-run-new', 'b.csv'), attempts: 1 })
      expect(await readFile(join(outputDir, 'a.csv'), 'utf8')).toBe('v\n1\n')
      expect(await readFile(join(outputDir, 'b.csv'), 'utf8')).toBe('v\n1\n')
      const manifest: Manifest = JSON.parse(await readFile(join(outputDir, MANIFEST_FILE), 'utf8'))
      expect(manifest.runId).toBe('run-old')
      expect((await readdir(outputDir)).sort()).toEqual(['a.csv', 'b.csv', MANIFEST_FILE])
      expect(logger.messages('info')).toEqual(['Wrote 1 rows to a.csv'])
    })

    it('should write nothing when a table is missing', async () => {
      const outputDir = join(dir, 'out')

      await expect(
        exportTables(new Map(), [output], { outputDir, runId: 'run-3', pipeline: { name: 'widgets', version: '2.0.0' } })
      ).rejects.toThrow('No table widgets to export as widget_export.csv')
      expect(await readdir(dir)).toEqual([])
    })
  })
})
