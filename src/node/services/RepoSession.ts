/**
 * RepoSession - exclusive ownership of one repository for one run.
 *
 * Every rewrite mutates the working copy and branch tips that the next step
 * reads, so only one session may talk to a repository at a time. The session
 * holds a lock file in the git directory from open() until release(), and is
 * the only handle through which the reader and the rewriter reach the backend.
 */

import * as fs from 'fs'
import * as path from 'path'

import { log } from '@shared/logger'
import type { GitAdapter } from '../adapters/git'
import { SESSION_LOCK_FILE } from '../shared/constants'
import { SessionError } from '../shared/errors'

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST'
}

export class RepoSession {
  private released = false

  private constructor(
    readonly repoPath: string,
    private readonly adapter: GitAdapter,
    readonly gitDir: string,
    private readonly lockPath: string
  ) {}

  /**
   * Acquire the repository lock.
   *
   * @throws SessionError when another session holds the lock
   */
  static async open(repoPath: string, git: GitAdapter): Promise<RepoSession> {
    const gitDir = await git.resolveGitDir(repoPath)
    const lockPath = path.join(gitDir, SESSION_LOCK_FILE)

    try {
      const handle = await fs.promises.open(lockPath, 'wx')
      try {
        await handle.writeFile(`${process.pid}\n`)
      } finally {
        await handle.close()
      }
    } catch (error) {
      if (isAlreadyExists(error)) {
        throw new SessionError(
          `Another history-squash run holds ${lockPath}. Remove it if no run is active.`,
          repoPath
        )
      }
      throw error
    }

    log.debug('[RepoSession] Opened', { repoPath, gitDir, adapter: git.name })
    return new RepoSession(repoPath, git, gitDir, lockPath)
  }

  /**
   * Open a session, run the callback, and release the lock whatever happens.
   */
  static async run<T>(
    repoPath: string,
    git: GitAdapter,
    fn: (session: RepoSession) => Promise<T>
  ): Promise<T> {
    const session = await RepoSession.open(repoPath, git)
    try {
      return await fn(session)
    } finally {
      await session.release()
    }
  }

  get isOpen(): boolean {
    return !this.released
  }

  /**
   * Backend access; only valid while the session is open.
   */
  get git(): GitAdapter {
    if (this.released) {
      throw new SessionError('Repository session used after release', this.repoPath)
    }
    return this.adapter
  }

  async release(): Promise<void> {
    if (this.released) return
    this.released = true
    await fs.promises.rm(this.lockPath, { force: true })
    log.debug('[RepoSession] Released', { repoPath: this.repoPath })
  }
}
