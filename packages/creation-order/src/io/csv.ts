import Papa from 'papaparse'
import { InputError } from '../errors'

export type CsvRow = Record<string, string | null>

export interface CsvTable {
  /** Header names in file order, present even when there are no data rows */
  columns: string[]
  rows: CsvRow[]
}

/**
 * Parse comma-separated text with a header row. Empty cells become null.
 * The delimiter is fixed so that single-column tables parse too.
 */
export function parseCsvTable(csv: string): CsvTable {
  const parsed = Papa.parse<Record<string, string | undefined>>(csv.replace(/^\uFEFF/, ''), {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
  })

  const [error] = parsed.errors
  if (error !== undefined) {
    const at = error.row === undefined ? '' : ` (row ${error.row + 1})`
    throw new InputError(`Failed to parse CSV${at}: ${error.message}`)
  }

  const columns = parsed.meta.fields ?? []
  const rows = parsed.data.map((raw) => {
    const row: CsvRow = {}
    for (const column of columns) {
      const value = raw[column]
      row[column] = value == null || value === '' ? null : value
    }
    return row
  })

  return { columns, rows }
}

/**
 * Serialize records to CSV. Columns are the union of all record keys in the
 * order they are first seen; null and undefined become empty cells.
 */
export function toCsv(records: ReadonlyArray<Record<string, unknown>>): string {
  const columns: string[] = []
  const seen = new Set<string>()
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key)
        columns.push(key)
      }
    }
  }

  const data = records.map((record) =>
    columns.map((column) => {
      const value = record[column]
      return value == null ? '' : String(value)
    })
  )

  return Papa.unparse({ fields: columns, data }, { newline: '\n' })
}
