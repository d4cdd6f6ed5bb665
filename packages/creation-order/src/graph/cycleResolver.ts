import { DEPENDENCY_FIELDS, compareUserIds, readDependency } from '../dependencyFields'
import type { ClearedDependency, CycleResolution, NewRecord } from '../types'

/**
 * Break circular dependencies among the leftover nodes.
 *
 * Each leftover record is copied with every dependency field that points at
 * another leftover node (itself included) set to null. References to records
 * outside the group are valid at creation time and are kept. The input
 * records are never modified.
 */
export function resolveCycles<T extends NewRecord>(
  leftover: readonly string[],
  recordsById: ReadonlyMap<string, T>
): CycleResolution<T> {
  const group = new Set(leftover)
  const records: T[] = []
  const cleared: ClearedDependency[] = []

  for (const userid of [...group].sort(compareUserIds)) {
    const record = recordsById.get(userid)
    if (record === undefined) {
      throw new Error(`Cycle member "${userid}" is not a known record`)
    }

    let copy: T = { ...record }
    for (const field of DEPENDENCY_FIELDS) {
      const dep = readDependency(record, field)
      if (dep === null || !group.has(dep)) continue

      copy = { ...copy, [field.name]: null }
      cleared.push({ userid, field: field.name, cleared_dependency: dep })
    }
    records.push(copy)
  }

  return { records, cleared }
}
