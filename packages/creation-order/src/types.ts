/**
 * Shared types for the employee creation order resolver.
 *
 * Field names follow the snake_case column names of the HR source tables so
 * records can be passed straight from a CSV export or a database row.
 */

export type Logger = {
  info(obj: unknown, msg?: string): void
  warn(obj: unknown, msg?: string): void
  error(obj: unknown, msg?: string): void
  debug?(obj: unknown, msg?: string): void
}

export type DependencyFieldName = 'manager' | 'matrix_manager' | 'hr'

export type DependencyValue = string | null | undefined

/**
 * A record to be created. Columns other than `userid` and the dependency
 * fields are carried through to the output untouched.
 */
export interface NewRecord {
  userid: string
  manager?: DependencyValue
  matrix_manager?: DependencyValue
  hr?: DependencyValue
  [column: string]: unknown
}

/** A record that already exists in the target system. */
export interface ExistingRecord {
  userid: string
  [column: string]: unknown
}

/** `prerequisite` must be created before `dependent`. */
export interface DependencyEdge {
  prerequisite: string
  dependent: string
  field: DependencyFieldName
}

export interface MissingDependency {
  userid: string
  field: DependencyFieldName
  missing_dependency: string
}

export interface ClearedDependency {
  userid: string
  field: DependencyFieldName
  cleared_dependency: string
}

export interface DependencyGraph {
  /** New-record ids in input order */
  readonly nodes: readonly string[]
  readonly edges: readonly DependencyEdge[]
  /** Edges grouped by prerequisite */
  readonly outgoing: ReadonlyMap<string, readonly DependencyEdge[]>
  /** In-degree before any edge is removed */
  readonly inDegree: ReadonlyMap<string, number>
}

export interface GraphBuildResult {
  graph: DependencyGraph
  missingDependencies: MissingDependency[]
}

export interface ScheduleResult {
  /** Userids per batch, each batch sorted ascending */
  batches: string[][]
  /** Nodes whose in-degree never reached zero, sorted ascending */
  leftover: string[]
}

export interface CycleResolution<T extends NewRecord = NewRecord> {
  records: T[]
  cleared: ClearedDependency[]
}

export type BatchKind = 'ordered' | 'cycle'

export interface CreationBatch<T extends NewRecord = NewRecord> {
  index: number
  kind: BatchKind
  records: T[]
}

export interface DependencySummary {
  total_new_employees: number
  employees_with_no_dependencies: number
  employees_with_dependencies: number
  employees_in_cycles: number
  cycle_userids: string[]
  missing_dependencies: MissingDependency[]
  missing_dependency_count: number
}

export interface CreationOrderResult<T extends NewRecord = NewRecord> {
  batches: CreationBatch<T>[]
  summary: DependencySummary
  /** Strongly connected components among the cycle members */
  cycleGroups: string[][]
  clearedDependencies: ClearedDependency[]
}

export type CreationOrderResolverConfig = {
  logger?: Logger
}
