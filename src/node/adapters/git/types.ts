/**
 * Git Adapter Types
 *
 * Type definitions for Git operations that are independent of the underlying
 * Git implementation.
 */

/**
 * One entry of a branch's history with the metadata the grouping pass needs
 */
export type CommitRecord = {
  hash: string
  authorName: string
  authorEmail: string
  /** Commit time in seconds since epoch */
  timestamp: number
  parentHashes: string[]
}

/**
 * Author or committer of a commit
 */
export type Signature = {
  name: string
  email: string
  /** Git's raw date format: "<seconds> <offset>", e.g. "1700000000 +0100" */
  date: string
}

/**
 * Everything needed to recreate a commit on another parent
 */
export type CommitDetail = {
  hash: string
  tree: string
  parentHashes: string[]
  message: string
  author: Signature
  committer: Signature
}

/**
 * Options for listing commits
 */
export type ListCommitsOptions = {
  /**
   * Follow only the first parent of merge commits
   */
  firstParent?: boolean
}

/**
 * Options for creating a commit object without touching any ref
 */
export type CommitTreeOptions = {
  tree: string
  parents: string[]
  message: string
  author: Signature
  /**
   * Committer identity; git's configured identity and the current time when omitted
   */
  committer?: Signature
}

/**
 * Options for git reset operations
 */
export type ResetOptions = {
  /**
   * Reset mode: soft, mixed, or hard
   */
  mode: 'soft' | 'mixed' | 'hard'
  /**
   * Target commit SHA or ref
   */
  ref: string
}
