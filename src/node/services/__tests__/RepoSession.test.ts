import fs from 'fs'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  cleanupTempDir,
  createTempGitDir,
  FakeGitAdapter
} from '../../adapters/git/__tests__/test-utils'
import { SESSION_LOCK_FILE } from '../../shared/constants'
import { SessionError } from '../../shared/errors'
import { RepoSession } from '../RepoSession'

describe('RepoSession', () => {
  let gitDir: string
  let git: FakeGitAdapter

  beforeEach(async () => {
    gitDir = await createTempGitDir()
    git = new FakeGitAdapter(gitDir)
  })

  afterEach(async () => {
    await cleanupTempDir(gitDir)
  })

  it('holds a lock file in the git directory while open', async () => {
    const session = await RepoSession.open('/repo', git)
    const lockPath = path.join(gitDir, SESSION_LOCK_FILE)

    expect(session.gitDir).toBe(gitDir)
    expect(fs.existsSync(lockPath)).toBe(true)

    await session.release()

    expect(fs.existsSync(lockPath)).toBe(false)
    expect(session.isOpen).toBe(false)
  })

  it('refuses a second session on the same repository', async () => {
    const first = await RepoSession.open('/repo', git)

    await expect(RepoSession.open('/repo', git)).rejects.toBeInstanceOf(SessionError)

    await first.release()
    const second = await RepoSession.open('/repo', git)
    await second.release()
  })

  it('rejects backend access after release', async () => {
    const session = await RepoSession.open('/repo', git)
    await session.release()

    expect(() => session.git).toThrow('Repository session used after release')
  })

  it('releases the lock when the callback fails', async () => {
    await expect(
      RepoSession.run('/repo', git, async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')

    expect(fs.existsSync(path.join(gitDir, SESSION_LOCK_FILE))).toBe(false)
  })

  it('returns the callback result', async () => {
    const result = await RepoSession.run('/repo', git, async (session) => session.repoPath)
    expect(result).toBe('/repo')
  })
})
