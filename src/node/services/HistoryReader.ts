import { log } from '@shared/logger'
import { formatIdentity, type Commit } from '@shared/types'
import type { IdentityResolver } from '../domain'
import type { RepoSession } from './RepoSession'

/**
 * Reads one branch's linear history as typed Commit snapshots.
 *
 * Only first parents are followed: commits brought in by a merge belong to
 * another line of history, and the merge itself is classified as a boundary.
 */
export class HistoryReader {
  constructor(private readonly resolver: IdentityResolver) {}

  /**
   * Commits of the branch, oldest first.
   *
   * @throws MalformedCommitRecordError when the backend returns an unparseable record
   * @throws GitCommandError when any backend call fails
   */
  async read(session: RepoSession, branch: string): Promise<Commit[]> {
    const git = session.git
    const records = await git.listCommits(session.repoPath, branch, { firstParent: true })

    const commits: Commit[] = []
    for (const record of records) {
      const message = await git.getMessage(session.repoPath, record.hash)
      const tags = await git.tagsContaining(session.repoPath, record.hash)

      commits.push({
        hash: record.hash,
        authorName: record.authorName,
        authorEmail: record.authorEmail,
        rawAuthor: formatIdentity(record.authorName, record.authorEmail),
        canonicalAuthor: this.resolver.resolveAuthor(record.authorName, record.authorEmail),
        timestamp: record.timestamp,
        message,
        parentHashes: record.parentHashes,
        isTagged: tags.length > 0
      })
    }

    log.debug(`[HistoryReader] Read ${commits.length} commits from ${branch}`)
    return commits
  }
}
