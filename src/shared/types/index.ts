export { formatIdentity } from './commit'
export type { Commit } from './commit'
export type { AliasEntry, AliasTable, Configuration } from './config'
export type {
  BoundaryReason,
  BranchOutcome,
  BranchStatus,
  Classification,
  Group,
  GroupingResult,
  RunReport,
  SquashResult
} from './squash'
