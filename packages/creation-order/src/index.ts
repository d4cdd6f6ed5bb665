import pkg from '../package.json' with { type: 'json' }

export const VERSION = pkg.version

export { CreationOrderResolver, resolveCreationOrder } from './creationOrderResolver'
export { buildDependencyGraph, validateRecordSets } from './graph/dependencyGraph'
export { scheduleBatches } from './graph/batchScheduler'
export { resolveCycles } from './graph/cycleResolver'
export { findCycleGroups } from './graph/cycleGroups'
export { buildDependencySummary } from './diagnostics'
export { DEPENDENCY_FIELDS, type DependencyFieldDescriptor } from './dependencyFields'
export { InputError } from './errors'

export { parseCsvTable, toCsv, type CsvRow, type CsvTable } from './io/csv'
export {
  toNewRecords,
  toExistingRecords,
  loadNewRecords,
  loadExistingRecords,
  type RecordLoadOptions,
} from './io/records'
export { writeBatchFiles } from './io/batchFiles'

export type * from './types'
