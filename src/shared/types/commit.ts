/**
 * A commit of one branch's linear history, as seen by the grouping pass.
 * Snapshots are immutable for the duration of one pass; a rewrite supersedes
 * them with new commits instead of mutating them.
 */
export type Commit = {
  readonly hash: string
  readonly authorName: string
  readonly authorEmail: string
  /** "Name <email>" exactly as reported by the backend */
  readonly rawAuthor: string
  /** rawAuthor after alias resolution */
  readonly canonicalAuthor: string
  /** Commit time in seconds since epoch */
  readonly timestamp: number
  readonly message: string
  /** More than one entry means a merge commit */
  readonly parentHashes: readonly string[]
  /** Reachable from at least one tag */
  readonly isTagged: boolean
}

export function formatIdentity(name: string, email: string): string {
  return `${name} <${email}>`
}
