import fs from 'fs'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  cleanupTempDir,
  createTempGitDir,
  FakeGitAdapter
} from '../../adapters/git/__tests__/test-utils'
import { INTENT_FILE } from '../../shared/constants'
import { RepoSession } from '../RepoSession'
import { RewriteJournal } from '../RewriteJournal'

const author = 'A <a@x.com>'

describe('RewriteJournal', () => {
  let gitDir: string
  let git: FakeGitAdapter
  let session: RepoSession

  beforeEach(async () => {
    gitDir = await createTempGitDir()
    git = new FakeGitAdapter(gitDir)
    session = await RepoSession.open('/repo', git)
  })

  afterEach(async () => {
    await session.release()
    await cleanupTempDir(gitDir)
  })

  function intentFor(originalHead: string) {
    return { id: 'collapse-main-1', branch: 'main', originalHead, firstHash: 'f1', lastHash: 'l1' }
  }

  it('walks an intent through its states', async () => {
    await RewriteJournal.writeIntent(gitDir, intentFor('abc'))
    expect((await RewriteJournal.getIntent(gitDir))?.status).toBe('pending')

    await RewriteJournal.markExecuting(gitDir)
    expect((await RewriteJournal.getIntent(gitDir))?.status).toBe('executing')

    await RewriteJournal.markFailed(gitDir, new Error('update-ref failed'))
    const failed = await RewriteJournal.getIntent(gitDir)
    expect(failed?.status).toBe('failed')
    expect(failed?.error).toEqual({ message: 'update-ref failed' })

    await RewriteJournal.commitIntent(gitDir)
    expect(await RewriteJournal.getIntent(gitDir)).toBeNull()
  })

  it('ignores a malformed intent file', async () => {
    await fs.promises.writeFile(path.join(gitDir, INTENT_FILE), '{"status":"nope"}')
    expect(await RewriteJournal.getIntent(gitDir)).toBeNull()
  })

  describe('recover', () => {
    it('does nothing without an intent', async () => {
      expect(await RewriteJournal.recover(session)).toBe('none')
    })

    it('clears a failed intent without touching the branch', async () => {
      const [, head] = git.buildBranch('main', [
        { author, message: 'one', at: 0 },
        { author, message: 'two', at: 10 }
      ])
      await RewriteJournal.writeIntent(gitDir, intentFor('elsewhere'))
      await RewriteJournal.markFailed(gitDir, new Error('x'))

      expect(await RewriteJournal.recover(session)).toBe('cleared')
      expect(git.refs.get('refs/heads/main')).toBe(head)
      expect(await RewriteJournal.getIntent(gitDir)).toBeNull()
    })

    it('restores a branch left mid-rewrite', async () => {
      const [first, second] = git.buildBranch('main', [
        { author, message: 'one', at: 0 },
        { author, message: 'two', at: 10 }
      ])
      await RewriteJournal.writeIntent(gitDir, intentFor(second))
      await RewriteJournal.markExecuting(gitDir)
      git.refs.set('refs/heads/main', first)

      expect(await RewriteJournal.recover(session)).toBe('restored')
      expect(git.refs.get('refs/heads/main')).toBe(second)
      expect(await RewriteJournal.getIntent(gitDir)).toBeNull()
    })
  })
})
