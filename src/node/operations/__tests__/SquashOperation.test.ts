/**
 * Tests for SquashOperation.
 *
 * These tests run whole squash runs against an in-memory repository:
 * - grouping and collapsing per branch
 * - skip / abort policy per failure kind
 * - dry-run preview
 */

import type { Configuration, SquashResult } from '@shared/types'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  BASE_TIME,
  cleanupTempDir,
  createTempGitDir,
  FakeGitAdapter
} from '../../adapters/git/__tests__/test-utils'
import { RepoSession, RewriteJournal } from '../../services'
import { GitCommandError } from '../../shared/errors'
import { SquashOperation } from '../SquashOperation'

const X = 'Xavier <x@example.com>'
const Y = 'Yara <y@example.com>'

function makeConfig(overrides: Partial<Configuration> = {}): Configuration {
  return {
    repoPath: '/repo',
    aliases: [],
    squashWindowSeconds: 3600,
    ageLimitSeconds: 86400,
    enableAgeFilter: false,
    boundaryKeywords: ['revert', 'merge', 'pull'],
    remote: 'origin',
    commandTimeoutMs: 1000,
    ...overrides
  }
}

function messages(git: FakeGitAdapter, branch: string): string[] {
  return git.history(branch).map((commit) => commit.message)
}

describe('SquashOperation', () => {
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

  function buildTwoBranches(): { main: string[]; feature: string[] } {
    const main = git.buildBranch('main', [
      { author: X, message: 'one', at: 0 },
      { author: X, message: 'two', at: 10 },
      { author: Y, message: 'three', at: 20 }
    ])
    const feature = git.buildBranch('feature', [
      { author: Y, message: 'a', at: 0 },
      { author: Y, message: 'Revert "a"', at: 10 },
      { author: Y, message: 'b', at: 20 },
      { author: Y, message: 'c', at: 30 }
    ])
    return { main, feature }
  }

  describe('execute', () => {
    it('squashes every branch and returns to the starting branch', async () => {
      const { main, feature } = buildTwoBranches()
      const onSquash = vi.fn<(result: SquashResult) => void>()

      const report = await SquashOperation.execute(session, makeConfig(), { onSquash })

      expect(messages(git, 'main')).toEqual(['one\n\ntwo', 'three'])
      expect(messages(git, 'feature')).toEqual(['a', 'Revert "a"', 'b\n\nc'])
      expect(report.exitCode).toBe(0)
      expect(report.aborted).toBe(false)
      expect(report.outcomes.map((o) => [o.branch, o.status, o.boundaryCount])).toEqual([
        ['main', 'completed', 0],
        ['feature', 'completed', 1]
      ])
      expect(report.results.map((r) => r.originalCommits.map((c) => c.hash))).toEqual([
        [main[0], main[1]],
        [feature[2], feature[3]]
      ])
      expect(onSquash).toHaveBeenCalledTimes(2)
      expect(await git.currentBranch()).toBe('main')
    })

    it('translates later groups of a branch through earlier rewrites', async () => {
      const original = git.buildBranch('main', [
        { author: X, message: 'one', at: 0, tree: 't1' },
        { author: X, message: 'two', at: 10, tree: 't2' },
        { author: Y, message: 'three', at: 20, tree: 't3' },
        { author: Y, message: 'four', at: 30, tree: 't4' }
      ])

      const report = await SquashOperation.execute(session, makeConfig())

      const history = git.history('main')
      expect(history.map((commit) => commit.message)).toEqual(['one\n\ntwo', 'three\n\nfour'])
      expect(history.map((commit) => commit.tree)).toEqual(['t2', 't4'])
      expect(history[1].parentHashes).toEqual([history[0].hash])
      expect(report.results.map((r) => r.newCommitId)).toEqual(history.map((c) => c.hash))
      expect(report.results[1].originalCommits.map((c) => c.hash)).toEqual([
        original[2],
        original[3]
      ])
    })

    it('applies aliases when comparing authors', async () => {
      git.buildBranch('main', [
        { author: 'jd <jdoe@x.com>', message: 'one', at: 0 },
        { author: 'Jane Doe <jane@y.com>', message: 'two', at: 10 }
      ])
      const config = makeConfig({
        aliases: [{ canonical: 'Jane Doe', identifiers: ['jdoe@x.com', 'Jane Doe <jane@y.com>'] }]
      })

      const report = await SquashOperation.execute(session, config)

      expect(messages(git, 'main')).toEqual(['one\n\ntwo'])
      expect(report.results[0].originalCommits.map((c) => c.canonicalAuthor)).toEqual([
        'Jane Doe',
        'Jane Doe'
      ])
    })

    it('leaves old commits alone when the age filter is on', async () => {
      git.buildBranch('main', [
        { author: X, message: 'old', at: 0 },
        { author: X, message: 'new', at: 100 },
        { author: X, message: 'newer', at: 110 }
      ])
      const clock = { now: () => (BASE_TIME + 150) * 1000 }

      const report = await SquashOperation.execute(
        session,
        makeConfig({ enableAgeFilter: true, ageLimitSeconds: 60 }),
        { clock }
      )

      expect(messages(git, 'main')).toEqual(['old', 'new\n\nnewer'])
      expect(report.outcomes[0].filteredCount).toBe(1)
    })

    it('skips a branch that cannot be checked out', async () => {
      buildTwoBranches()
      const checkout = git.checkout.bind(git)
      vi.spyOn(git, 'checkout').mockImplementation(async (dir, ref) => {
        if (ref === 'main') throw new GitCommandError('local changes would be overwritten', 'checkout')
        return checkout(dir, ref)
      })

      const report = await SquashOperation.execute(session, makeConfig())

      expect(report.outcomes.map((o) => o.status)).toEqual(['skipped', 'completed'])
      expect(report.outcomes[0].reason).toBe('local changes would be overwritten')
      expect(messages(git, 'main')).toEqual(['one', 'two', 'three'])
      expect(messages(git, 'feature')).toEqual(['a', 'Revert "a"', 'b\n\nc'])
      expect(report.exitCode).toBe(0)
    })

    it('aborts only the branch whose history cannot be read', async () => {
      const { main } = buildTwoBranches()
      const getMessage = git.getMessage.bind(git)
      vi.spyOn(git, 'getMessage').mockImplementation(async (dir, hash) => {
        if (hash === main[1]) throw new GitCommandError('timed out', 'getMessage')
        return getMessage(dir, hash)
      })

      const report = await SquashOperation.execute(session, makeConfig())

      expect(report.outcomes.map((o) => o.status)).toEqual(['aborted', 'completed'])
      expect(report.aborted).toBe(false)
      expect(report.exitCode).toBe(1)
      expect(messages(git, 'feature')).toEqual(['a', 'Revert "a"', 'b\n\nc'])
    })

    it('aborts the run when a collapse fails', async () => {
      const { main, feature } = buildTwoBranches()
      vi.spyOn(git, 'commitTree').mockRejectedValueOnce(new GitCommandError('bad object', 'commitTree'))

      const report = await SquashOperation.execute(session, makeConfig())

      expect(report.aborted).toBe(true)
      expect(report.exitCode).toBe(1)
      expect(report.outcomes.map((o) => [o.branch, o.status])).toEqual([['main', 'aborted']])
      expect(git.refs.get('refs/heads/main')).toBe(main[2])
      expect(git.refs.get('refs/heads/feature')).toBe(feature[3])
      expect(await git.currentBranch()).toBe('main')
    })

    it('restores a branch left mid-rewrite before starting', async () => {
      const [one, two] = git.buildBranch('main', [
        { author: X, message: 'one', at: 0 },
        { author: Y, message: 'two', at: 10 }
      ])
      await RewriteJournal.writeIntent(gitDir, {
        id: 'collapse-main-0',
        branch: 'main',
        originalHead: two,
        firstHash: one,
        lastHash: two
      })
      git.refs.set('refs/heads/main', one)

      const report = await SquashOperation.execute(session, makeConfig())

      expect(git.refs.get('refs/heads/main')).toBe(two)
      expect(report.results).toEqual([])
      expect(await RewriteJournal.getIntent(gitDir)).toBeNull()
    })

    it('reports progress per branch', async () => {
      buildTwoBranches()
      const started: string[] = []
      const completed: string[] = []

      await SquashOperation.execute(session, makeConfig(), {
        onBranchStart: (branch) => started.push(branch),
        onBranchComplete: (outcome) => completed.push(`${outcome.branch}:${outcome.results.length}`)
      })

      expect(started).toEqual(['main', 'feature'])
      expect(completed).toEqual(['main:1', 'feature:1'])
    })
  })

  describe('preview', () => {
    it('groups remote branches without changing anything', async () => {
      const { main, feature } = buildTwoBranches()
      const checkout = vi.spyOn(git, 'checkout')
      const commitTree = vi.spyOn(git, 'commitTree')

      const report = await SquashOperation.preview(session, makeConfig())

      expect(checkout).not.toHaveBeenCalled()
      expect(commitTree).not.toHaveBeenCalled()
      expect(git.refs.get('refs/heads/main')).toBe(main[2])
      expect(git.refs.get('refs/heads/feature')).toBe(feature[3])
      expect(report.results).toEqual([])
      expect(report.exitCode).toBe(0)
      expect(
        report.outcomes.map((o) => o.groups.map((g) => g.commits.map((c) => c.message)))
      ).toEqual([
        [['one', 'two'], ['three']],
        [['a'], ['b', 'c']]
      ])
    })

    it('reads the remote-tracking refs', async () => {
      git.buildBranch('main', [
        { author: X, message: 'one', at: 0 },
        { author: X, message: 'two', at: 10 }
      ])
      const listCommits = vi.spyOn(git, 'listCommits')

      await SquashOperation.preview(session, makeConfig())

      expect(listCommits).toHaveBeenCalledWith('/repo', 'origin/main', { firstParent: true })
    })
  })
})
