import type {
  DependencyGraph,
  DependencySummary,
  MissingDependency,
  ScheduleResult,
} from './types'

/**
 * Summarize a resolution run. A read-only projection of the graph and the
 * schedule: nothing is recomputed, so the numbers always agree with the
 * batches that were produced.
 */
export function buildDependencySummary(
  graph: DependencyGraph,
  schedule: ScheduleResult,
  missingDependencies: readonly MissingDependency[]
): DependencySummary {
  const total = graph.nodes.length
  const noDeps = graph.nodes.filter((n) => (graph.inDegree.get(n) ?? 0) === 0).length

  return {
    total_new_employees: total,
    employees_with_no_dependencies: noDeps,
    employees_with_dependencies: total - noDeps,
    employees_in_cycles: schedule.leftover.length,
    cycle_userids: [...schedule.leftover],
    missing_dependencies: missingDependencies.map((m) => ({ ...m })),
    missing_dependency_count: missingDependencies.length,
  }
}
