import { buildDependencyGraph } from './graph/dependencyGraph'
import { scheduleBatches } from './graph/batchScheduler'
import { resolveCycles } from './graph/cycleResolver'
import { findCycleGroups } from './graph/cycleGroups'
import { buildDependencySummary } from './diagnostics'
import type {
  CreationBatch,
  CreationOrderResolverConfig,
  CreationOrderResult,
  ExistingRecord,
  Logger,
  NewRecord,
} from './types'

/**
 * Works out in which order a set of new employees can be created.
 *
 * Batches are returned in creation order. All records of one batch may be
 * created in parallel; a batch may only start once every earlier batch is
 * done. Employees caught in a circular manager/matrix manager/hr chain are
 * placed in a final batch with the fields that close the loop cleared, so a
 * later update can restore them once everyone exists.
 */
export class CreationOrderResolver {
  private readonly logger: Logger

  constructor(config: CreationOrderResolverConfig = {}) {
    this.logger = config.logger ?? console
  }

  resolve<T extends NewRecord>(
    newRecords: readonly T[],
    existingRecords: readonly ExistingRecord[]
  ): CreationOrderResult<T> {
    const { graph, missingDependencies } = buildDependencyGraph(newRecords, existingRecords)
    this.logger.info(
      {
        newEmployees: graph.nodes.length,
        existingEmployees: existingRecords.length,
        dependencies: graph.edges.length,
      },
      'Built employee dependency graph'
    )

    if (missingDependencies.length > 0) {
      this.logger.warn(
        { count: missingDependencies.length, missingDependencies },
        'Employees reference userids that are neither new nor existing'
      )
    }

    const schedule = scheduleBatches(graph)
    const recordsById = new Map<string, T>()
    for (const record of newRecords) {
      recordsById.set(record.userid, record)
    }

    const batches = schedule.batches.map(
      (ids, index): CreationBatch<T> => ({
        index,
        kind: 'ordered',
        records: ids.map((id) => {
          const record = recordsById.get(id)
          if (record === undefined) {
            throw new Error(`Scheduled userid "${id}" is not a known record`)
          }
          return record
        }),
      })
    )

    const cycles = resolveCycles(schedule.leftover, recordsById)
    let cycleGroups: string[][] = []
    if (cycles.records.length > 0) {
      cycleGroups = findCycleGroups(graph, schedule.leftover)
      this.logger.warn(
        {
          count: schedule.leftover.length,
          cycleGroups,
          clearedDependencies: cycles.cleared,
        },
        `Circular dependencies detected for ${schedule.leftover.length} employees (grouped into ${cycleGroups.length} cycles), clearing references between them`
      )
      batches.push({ index: batches.length, kind: 'cycle', records: cycles.records })
    }

    const summary = buildDependencySummary(graph, schedule, missingDependencies)

    this.logger.info(
      { employees: graph.nodes.length, batches: batches.length },
      'Resolved employee creation order'
    )
    for (const batch of batches) {
      this.logger.debug?.(
        { batch: batch.index + 1, kind: batch.kind, employees: batch.records.length },
        'Creation batch'
      )
    }

    return {
      batches,
      summary,
      cycleGroups,
      clearedDependencies: cycles.cleared,
    }
  }
}

/**
 * Resolve the creation order in one call.
 */
export function resolveCreationOrder<T extends NewRecord>(
  newRecords: readonly T[],
  existingRecords: readonly ExistingRecord[] = [],
  config: CreationOrderResolverConfig = {}
): CreationOrderResult<T> {
  return new CreationOrderResolver(config).resolve(newRecords, existingRecords)
}
