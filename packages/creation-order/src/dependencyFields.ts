import type { DependencyFieldName, DependencyValue, NewRecord } from './types'

export type DependencyFieldDescriptor = {
  name: DependencyFieldName
  read: (record: NewRecord) => DependencyValue
}

/**
 * Fields that reference another employee. Order matters: it is the order in
 * which missing dependencies are reported for a record.
 */
export const DEPENDENCY_FIELDS: readonly DependencyFieldDescriptor[] = [
  { name: 'manager', read: (record) => record.manager },
  { name: 'matrix_manager', read: (record) => record.matrix_manager },
  { name: 'hr', read: (record) => record.hr },
]

/** Returns the referenced userid, or null when the field is empty. */
export function readDependency(
  record: NewRecord,
  field: DependencyFieldDescriptor
): string | null {
  const value = field.read(record)
  if (typeof value !== 'string' || value.trim() === '') return null
  return value
}

export function compareUserIds(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
