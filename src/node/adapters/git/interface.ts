/**
 * Git Adapter Interface
 *
 * Defines the Git operations the squash run consumes. Business logic talks to
 * this interface only, so it can be exercised against an in-memory repository
 * in tests and against the git CLI in production.
 */

import type {
  CommitDetail,
  CommitRecord,
  CommitTreeOptions,
  ListCommitsOptions,
  ResetOptions
} from './types'

/**
 * Main Git adapter interface
 *
 * All methods are async and throw GitCommandError (or BackendTimeoutError) on failure
 */
export interface GitAdapter {
  /**
   * Get the adapter name for logging/debugging
   */
  readonly name: string

  // ============================================================================
  // Repository Inspection
  // ============================================================================

  /**
   * List the branches of a remote, without the remote prefix.
   * Symbolic refs such as origin/HEAD are left out.
   *
   * @param dir - Repository directory path
   * @param remote - Remote name (e.g. "origin")
   */
  listRemoteBranches(dir: string, remote: string): Promise<string[]>

  /**
   * Get the current branch name
   *
   * @returns Branch name or null if detached HEAD
   */
  currentBranch(dir: string): Promise<string | null>

  /**
   * List the commits of a ref or range, oldest first
   *
   * @param dir - Repository directory path
   * @param range - Ref ("main") or range ("abc123..main")
   */
  listCommits(dir: string, range: string, options?: ListCommitsOptions): Promise<CommitRecord[]>

  /**
   * Full message (subject and body) of a commit
   */
  getMessage(dir: string, hash: string): Promise<string>

  /**
   * Names of the tags from which the commit is reachable
   */
  tagsContaining(dir: string, hash: string): Promise<string[]>

  /**
   * Read full commit details including tree and author/committer metadata
   */
  readCommit(dir: string, hash: string): Promise<CommitDetail>

  /**
   * Resolve a ref or revision expression ("HEAD", "main", "abc123^{tree}") to an object id
   */
  resolveRef(dir: string, ref: string): Promise<string>

  /**
   * Absolute path of the repository's git directory
   */
  resolveGitDir(dir: string): Promise<string>

  // ============================================================================
  // Repository Mutation
  // ============================================================================

  /**
   * Checkout a branch or commit
   */
  checkout(dir: string, ref: string): Promise<void>

  /**
   * Create a commit object from a tree without moving any ref
   *
   * @returns SHA of the created commit
   */
  commitTree(dir: string, options: CommitTreeOptions): Promise<string>

  /**
   * Point a ref at a new commit.
   * When expectedOld is given the update only happens if the ref still points there.
   */
  updateRef(dir: string, ref: string, newSha: string, expectedOld?: string): Promise<void>

  /**
   * Reset HEAD to a specific commit
   *
   * Soft reset: moves HEAD, keeps index and working tree
   * Mixed reset: moves HEAD, resets index, keeps working tree
   * Hard reset: moves HEAD, resets index and working tree
   */
  reset(dir: string, options: ResetOptions): Promise<void>
}
