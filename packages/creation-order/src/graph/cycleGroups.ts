import { compareUserIds } from '../dependencyFields'
import type { DependencyGraph } from '../types'

/**
 * Split the cycle members into their individual cycles using Tarjan's
 * strongly connected components algorithm.
 *
 * Only components of more than one node, or a single node that references
 * itself, are cycles. A node that merely depends on a cycle ends up in the
 * leftover set too but belongs to no group.
 */
export function findCycleGroups(graph: DependencyGraph, leftover: readonly string[]): string[][] {
  const members = new Set(leftover)
  const successors = new Map<string, string[]>()
  const selfLoops = new Set<string>()

  for (const name of members) {
    successors.set(name, [])
  }
  for (const edge of graph.edges) {
    if (!members.has(edge.prerequisite) || !members.has(edge.dependent)) continue
    if (edge.prerequisite === edge.dependent) {
      selfLoops.add(edge.prerequisite)
    }
    successors.get(edge.prerequisite)?.push(edge.dependent)
  }

  let counter = 0
  const index = new Map<string, number>()
  const lowlink = new Map<string, number>()
  const stack: string[] = []
  const onStack = new Set<string>()
  const components: string[][] = []

  // Iterative to stay clear of the call stack limit on long chains.
  for (const root of [...members].sort(compareUserIds)) {
    if (index.has(root)) continue

    const work: Array<{ node: string; next: number }> = [{ node: root, next: 0 }]
    index.set(root, counter)
    lowlink.set(root, counter)
    counter++
    stack.push(root)
    onStack.add(root)

    while (work.length > 0) {
      const frame = work[work.length - 1]
      const edges = successors.get(frame.node) ?? []

      if (frame.next < edges.length) {
        const w = edges[frame.next++]
        const wIndex = index.get(w)
        if (wIndex === undefined) {
          index.set(w, counter)
          lowlink.set(w, counter)
          counter++
          stack.push(w)
          onStack.add(w)
          work.push({ node: w, next: 0 })
        } else if (onStack.has(w)) {
          lowlink.set(frame.node, Math.min(lowlink.get(frame.node) ?? wIndex, wIndex))
        }
        continue
      }

      work.pop()
      const vLow = lowlink.get(frame.node) ?? 0
      const parent = work[work.length - 1]
      if (parent !== undefined) {
        lowlink.set(parent.node, Math.min(lowlink.get(parent.node) ?? vLow, vLow))
      }

      if (vLow === index.get(frame.node)) {
        const component: string[] = []
        let w: string | undefined
        do {
          w = stack.pop()
          if (w === undefined) break
          onStack.delete(w)
          component.push(w)
        } while (w !== frame.node)
        components.push(component)
      }
    }
  }

  return components
    .filter((c) => c.length > 1 || selfLoops.has(c[0]))
    .map((c) => c.sort(compareUserIds))
    .sort((a, b) => b.length - a.length || compareUserIds(a[0], b[0]))
}
