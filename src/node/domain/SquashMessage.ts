import type { Commit, Group } from '@shared/types'

/**
 * Message of a collapsed group: every member's full message, oldest first,
 * separated by one blank line.
 */
export function buildSquashMessage(commits: readonly Commit[]): string {
  return commits.map((commit) => commit.message.trimEnd()).join('\n\n')
}

/**
 * Translate a group computed before earlier rewrites of the same branch to
 * the commit ids those rewrites produced. Ids not in the map are unchanged.
 */
export function remapGroup(group: Group, rewritten: ReadonlyMap<string, string>): Group {
  if (rewritten.size === 0) return group

  const translate = (hash: string): string => rewritten.get(hash) ?? hash

  return {
    correlationKey: group.correlationKey,
    commits: group.commits.map((commit) => ({
      ...commit,
      hash: translate(commit.hash),
      parentHashes: commit.parentHashes.map(translate)
    }))
  }
}
