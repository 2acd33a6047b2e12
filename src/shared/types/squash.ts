import type { Commit } from './commit'

/**
 * A contiguous run of mergeable commits, oldest first.
 */
export type Group = {
  commits: Commit[]
  /** First correlation key seen in the run, or null when none had one */
  correlationKey: string | null
}

export type BoundaryReason = 'keyword' | 'merge' | 'tagged'

export type Classification = {
  isBoundary: boolean
  reason?: BoundaryReason
}

export type GroupingResult = {
  groups: Group[]
  /** Revert, merge, pull and tagged commits that flushed the open group */
  boundaryCount: number
  /** Commits excluded by the age filter */
  filteredCount: number
}

/**
 * Record of one performed rewrite.
 */
export type SquashResult = {
  branch: string
  originalCommits: Commit[]
  newCommitId: string
  message: string
}

export type BranchStatus = 'completed' | 'skipped' | 'aborted'

export type BranchOutcome = {
  branch: string
  status: BranchStatus
  groups: Group[]
  results: SquashResult[]
  boundaryCount: number
  filteredCount: number
  /** Why the branch was skipped or aborted */
  reason?: string
}

export type RunReport = {
  outcomes: BranchOutcome[]
  results: SquashResult[]
  /** A rewrite failed and the remaining branches were not processed */
  aborted: boolean
  exitCode: 0 | 1
}
