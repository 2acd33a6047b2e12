/**
 * Git Adapter Module
 *
 * Provides the interface the squash run uses to talk to git, backed by simple-git.
 *
 * Usage:
 * ```typescript
 * import { createGitAdapter } from '../adapters/git'
 *
 * const git = createGitAdapter({ timeoutMs: 30_000 })
 * const commits = await git.listCommits(repoPath, 'main', { firstParent: true })
 * ```
 */

// Main exports
export { createGitAdapter } from './factory'
export type { GitAdapterConfig } from './factory'

// Interface and types
export type { GitAdapter } from './interface'

// All type definitions
export type {
  CommitDetail,
  CommitRecord,
  CommitTreeOptions,
  ListCommitsOptions,
  ResetOptions,
  Signature
} from './types'

// Adapter implementations (for testing)
export { SimpleGitAdapter } from './SimpleGitAdapter'

// Output parsing
export { parseCommitDetail, parseCommitLog, parseRemoteBranches } from './utils'
