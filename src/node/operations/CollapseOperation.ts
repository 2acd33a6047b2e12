import { log } from '@shared/logger'
import type { Commit, Group } from '@shared/types'
import { buildSquashMessage } from '../domain'
import { RewriteJournal, type RepoSession } from '../services'
import { describeError, RewriteError } from '../shared/errors'

/**
 * Result of collapsing one group.
 */
export type CollapseResult = {
  /** Commit that replaced the group */
  newHash: string
  /** Branch tip after the descendants were replayed */
  newTip: string
  message: string
  /** Old -> new id of the last member and of every replayed descendant */
  rewritten: Map<string, string>
}

function short(sha: string): string {
  return sha.slice(0, 8)
}

/**
 * Refuse anything that is not a contiguous single-parent run.
 */
function validateLinearGroup(branch: string, commits: readonly Commit[]): void {
  if (commits.length < 2) {
    throw new RewriteError(
      `Refusing to collapse a group of ${commits.length} commit(s) on ${branch}`,
      'validation',
      branch
    )
  }

  for (let i = 0; i < commits.length; i++) {
    const commit = commits[i]
    if (commit.parentHashes.length > 1) {
      throw new RewriteError(
        `Commit ${short(commit.hash)} on ${branch} is a merge and cannot be collapsed`,
        'validation',
        branch
      )
    }
    if (i > 0 && commit.parentHashes[0] !== commits[i - 1].hash) {
      throw new RewriteError(
        `Commit ${short(commit.hash)} on ${branch} does not follow ${short(commits[i - 1].hash)}`,
        'validation',
        branch
      )
    }
  }
}

export class CollapseOperation {
  /**
   * Replace the contiguous range [first member, last member] of the checked-out
   * branch with one commit.
   *
   * The new commit keeps the last member's tree and author, takes the first
   * member's parent, and carries the members' messages joined by blank lines.
   * Commits after the range are recreated on top of it with their own trees,
   * messages and signatures, so the branch's final content does not change.
   *
   * Either the branch ends at the new tip, or it is restored to where it was
   * before the attempt and a RewriteError is thrown.
   */
  static async collapse(
    session: RepoSession,
    branch: string,
    group: Group
  ): Promise<CollapseResult> {
    const commits = group.commits
    validateLinearGroup(branch, commits)

    const git = session.git
    const dir = session.repoPath
    const ref = `refs/heads/${branch}`
    const first = commits[0]
    const last = commits[commits.length - 1]

    let originalHead: string
    try {
      const current = await git.currentBranch(dir)
      if (current !== branch) {
        throw new Error(`expected ${branch} to be checked out, found ${current ?? 'detached HEAD'}`)
      }
      originalHead = await git.resolveRef(dir, ref)
    } catch (error) {
      throw new RewriteError(
        `Cannot collapse on ${branch}: ${describeError(error)}`,
        'validation',
        branch,
        error
      )
    }

    const message = buildSquashMessage(commits)

    await RewriteJournal.writeIntent(session.gitDir, {
      id: `collapse-${branch}-${Date.now()}`,
      branch,
      originalHead,
      firstHash: first.hash,
      lastHash: last.hash
    })

    try {
      await RewriteJournal.markExecuting(session.gitDir)

      const lastDetail = await git.readCommit(dir, last.hash)
      const newHash = await git.commitTree(dir, {
        tree: lastDetail.tree,
        parents: first.parentHashes.slice(0, 1),
        message,
        author: lastDetail.author
      })

      const descendants = await git.listCommits(dir, `${last.hash}..${originalHead}`, {
        firstParent: true
      })
      if (descendants.length === 0 && last.hash !== originalHead) {
        throw new Error(`${short(last.hash)} is not on the first-parent history of ${branch}`)
      }

      const rewritten = new Map<string, string>([[last.hash, newHash]])
      let tip = newHash
      let previousOld = last.hash

      for (const record of descendants) {
        const detail = await git.readCommit(dir, record.hash)
        const [firstParent, ...otherParents] = detail.parentHashes
        if (firstParent !== previousOld) {
          throw new Error(`${short(record.hash)} does not descend from ${short(previousOld)}`)
        }

        const replayed = await git.commitTree(dir, {
          tree: detail.tree,
          parents: [tip, ...otherParents.map((p) => rewritten.get(p) ?? p)],
          message: detail.message,
          author: detail.author,
          committer: detail.committer
        })

        rewritten.set(record.hash, replayed)
        tip = replayed
        previousOld = record.hash
      }

      // Nothing visible has changed until this compare-and-swap
      await git.updateRef(dir, ref, tip, originalHead)
      await git.reset(dir, { mode: 'hard', ref: tip })

      await RewriteJournal.markCompleted(session.gitDir)
      await RewriteJournal.commitIntent(session.gitDir)

      log.debug(
        `[CollapseOperation] ${branch}: ${short(first.hash)}..${short(last.hash)} -> ${short(newHash)}`,
        { replayed: descendants.length }
      )

      return { newHash, newTip: tip, message, rewritten }
    } catch (error) {
      await this.rollback(session, branch, originalHead)
      await RewriteJournal.markFailed(session.gitDir, error)
      throw new RewriteError(
        `Collapsing ${short(first.hash)}..${short(last.hash)} on ${branch} failed: ${describeError(error)}`,
        'execution',
        branch,
        error
      )
    }
  }

  /**
   * Restore the branch and working copy to the pre-attempt head.
   * The journal intent stays in place when this fails so the next run can retry.
   */
  private static async rollback(
    session: RepoSession,
    branch: string,
    originalHead: string
  ): Promise<void> {
    const git = session.git
    const dir = session.repoPath
    const ref = `refs/heads/${branch}`

    try {
      const current = await git.resolveRef(dir, ref)
      if (current !== originalHead) {
        await git.updateRef(dir, ref, originalHead)
      }
      await git.reset(dir, { mode: 'hard', ref: originalHead })
      log.warn(`[CollapseOperation] Restored ${branch} to ${short(originalHead)}`)
    } catch (rollbackError) {
      log.error(`[CollapseOperation] Rollback of ${branch} failed`, rollbackError)
      throw new RewriteError(
        `Rollback of ${branch} to ${short(originalHead)} failed: ${describeError(rollbackError)}`,
        'rollback',
        branch,
        rollbackError
      )
    }
  }
}
