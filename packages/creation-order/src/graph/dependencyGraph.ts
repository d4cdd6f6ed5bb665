import { DEPENDENCY_FIELDS, readDependency } from '../dependencyFields'
import { InputError } from '../errors'
import type {
  DependencyEdge,
  ExistingRecord,
  GraphBuildResult,
  MissingDependency,
  NewRecord,
} from '../types'

function readUserId(record: unknown): string | null {
  if (record == null || typeof record !== 'object' || !('userid' in record)) return null
  const userid = record.userid
  if (typeof userid !== 'string' || userid.trim() === '') return null
  return userid
}

/**
 * Checks that every record carries a non-empty userid and that no userid
 * appears twice across both sets. Collects every problem before throwing.
 */
export function validateRecordSets(
  newRecords: readonly NewRecord[],
  existingRecords: readonly ExistingRecord[]
): void {
  const issues: string[] = []
  const seen = new Map<string, 'new' | 'existing'>()

  const check = (records: readonly unknown[], set: 'new' | 'existing') => {
    records.forEach((record, position) => {
      const userid = readUserId(record)
      if (userid === null) {
        issues.push(`${set} record at position ${position} has no userid`)
        return
      }
      const previous = seen.get(userid)
      if (previous === undefined) {
        seen.set(userid, set)
      } else if (previous === set) {
        issues.push(`duplicate userid "${userid}" in ${set} records`)
      } else {
        issues.push(`userid "${userid}" appears in both new and existing records`)
      }
    })
  }

  check(newRecords, 'new')
  check(existingRecords, 'existing')

  if (issues.length > 0) {
    throw new InputError('Invalid employee records', issues)
  }
}

/**
 * Build the dependency graph between new employees.
 *
 * An edge `prerequisite -> dependent` is added for every dependency field that
 * names another new employee, or the employee itself. References to existing
 * employees are already satisfied and produce no edge; references to nobody
 * are collected as missing dependencies and do not block scheduling.
 */
export function buildDependencyGraph(
  newRecords: readonly NewRecord[],
  existingRecords: readonly ExistingRecord[]
): GraphBuildResult {
  validateRecordSets(newRecords, existingRecords)

  const nodes = newRecords.map((record) => record.userid)
  const newIds = new Set(nodes)
  const existingIds = new Set(existingRecords.map((record) => record.userid))

  const edges: DependencyEdge[] = []
  const outgoing = new Map<string, DependencyEdge[]>()
  const inDegree = new Map<string, number>()
  const missingDependencies: MissingDependency[] = []

  for (const name of nodes) {
    outgoing.set(name, [])
    inDegree.set(name, 0)
  }

  for (const record of newRecords) {
    for (const field of DEPENDENCY_FIELDS) {
      const dep = readDependency(record, field)
      if (dep === null) continue

      if (existingIds.has(dep)) continue

      if (!newIds.has(dep)) {
        missingDependencies.push({
          userid: record.userid,
          field: field.name,
          missing_dependency: dep,
        })
        continue
      }

      const edge: DependencyEdge = { prerequisite: dep, dependent: record.userid, field: field.name }
      edges.push(edge)
      outgoing.get(dep)?.push(edge)
      inDegree.set(record.userid, (inDegree.get(record.userid) ?? 0) + 1)
    }
  }

  return {
    graph: { nodes, edges, outgoing, inDegree },
    missingDependencies,
  }
}
