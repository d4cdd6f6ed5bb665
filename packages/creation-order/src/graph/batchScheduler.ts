import { compareUserIds } from '../dependencyFields'
import type { DependencyGraph, ScheduleResult } from '../types'

/**
 * Compute creation batches via level-order topological sort (Kahn's algorithm).
 *
 * Every member of batch k only depends on members of batches 0..k-1, so the
 * members of one batch can be created concurrently. Nodes still holding
 * unresolved edges once no new node becomes free are returned as leftover.
 */
export function scheduleBatches(graph: DependencyGraph): ScheduleResult {
  const inDegree = new Map(graph.inDegree)

  const batches: string[][] = []
  let current = graph.nodes.filter((n) => inDegree.get(n) === 0).sort(compareUserIds)

  while (current.length > 0) {
    batches.push(current)
    const next: string[] = []

    for (const name of current) {
      for (const edge of graph.outgoing.get(name) ?? []) {
        const newDeg = (inDegree.get(edge.dependent) ?? 1) - 1
        inDegree.set(edge.dependent, newDeg)
        if (newDeg === 0) {
          next.push(edge.dependent)
        }
      }
    }

    current = next.sort(compareUserIds)
  }

  const leftover = graph.nodes
    .filter((n) => (inDegree.get(n) ?? 0) > 0)
    .sort(compareUserIds)

  return { batches, leftover }
}
