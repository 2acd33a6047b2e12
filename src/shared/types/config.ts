/**
 * One developer and every identifier (name, email or "Name <email>") they
 * have committed under.
 */
export type AliasEntry = {
  canonical: string
  identifiers: string[]
}

/**
 * Lower-cased identifier -> canonical identity.
 */
export type AliasTable = ReadonlyMap<string, string>

export type Configuration = {
  /** Repository working copy the run operates on */
  repoPath: string
  aliases: AliasEntry[]
  /** Largest positive gap between two adjacent commits that still merges */
  squashWindowSeconds: number
  /** Commits older than this are left alone when the age filter is on */
  ageLimitSeconds: number
  enableAgeFilter: boolean
  /** Case-insensitive message substrings that make a commit a boundary */
  boundaryKeywords: string[]
  /** Remote whose branches are processed */
  remote: string
  /** Timeout applied to every git invocation */
  commandTimeoutMs: number
}
