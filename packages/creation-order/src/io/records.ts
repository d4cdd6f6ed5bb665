import fs from 'node:fs/promises'
import { DEPENDENCY_FIELDS } from '../dependencyFields'
import { InputError } from '../errors'
import type { ExistingRecord, NewRecord } from '../types'
import { parseCsvTable, type CsvRow, type CsvTable } from './csv'

export type RecordLoadOptions = {
  /**
   * Lower-case userids and dependency references so that "JDoe" and "jdoe"
   * name the same employee.
   */
  lowercaseUserIds?: boolean
}

export type RecordKind = 'new' | 'existing'

function cleanCell(value: string | null): string | null {
  if (value == null) return null
  const trimmed = value.trim()
  return trimmed === '' ? null : trimmed
}

function normalizeId(value: string | null, options: RecordLoadOptions): string | null {
  const cleaned = cleanCell(value)
  if (cleaned === null) return null
  return options.lowercaseUserIds ? cleaned.toLowerCase() : cleaned
}

function requireUserIdColumn(table: CsvTable, kind: RecordKind): void {
  if (!table.columns.includes('userid')) {
    throw new InputError(`The ${kind} employees table is missing the required "userid" column`)
  }
}

function readUserId(
  row: CsvRow,
  position: number,
  kind: RecordKind,
  options: RecordLoadOptions
): string {
  const userid = normalizeId(row.userid ?? null, options)
  if (userid === null) {
    throw new InputError(`Row ${position + 1} of the ${kind} employees table has an empty userid`)
  }
  return userid
}

export function toNewRecords(table: CsvTable, options: RecordLoadOptions = {}): NewRecord[] {
  requireUserIdColumn(table, 'new')

  return table.rows.map((row, position) => {
    const record: NewRecord = { userid: readUserId(row, position, 'new', options) }
    for (const column of table.columns) {
      if (column === 'userid') continue
      record[column] = cleanCell(row[column] ?? null)
    }
    for (const field of DEPENDENCY_FIELDS) {
      if (table.columns.includes(field.name)) {
        record[field.name] = normalizeId(row[field.name] ?? null, options)
      }
    }
    return record
  })
}

export function toExistingRecords(
  table: CsvTable,
  options: RecordLoadOptions = {}
): ExistingRecord[] {
  requireUserIdColumn(table, 'existing')
  return table.rows.map((row, position) => ({
    userid: readUserId(row, position, 'existing', options),
  }))
}

async function readCsvFile(filePath: string): Promise<CsvTable> {
  let csv: string
  try {
    csv = await fs.readFile(filePath, 'utf-8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new InputError(`Cannot read employees file ${filePath}: ${reason}`)
  }
  return parseCsvTable(csv)
}

export async function loadNewRecords(
  filePath: string,
  options: RecordLoadOptions = {}
): Promise<NewRecord[]> {
  return toNewRecords(await readCsvFile(filePath), options)
}

export async function loadExistingRecords(
  filePath: string,
  options: RecordLoadOptions = {}
): Promise<ExistingRecord[]> {
  return toExistingRecords(await readCsvFile(filePath), options)
}
