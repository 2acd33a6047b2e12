/**
 * Simple-Git Adapter
 *
 * Git adapter implementation using simple-git library.
 * This uses the native Git CLI under the hood; every call carries a block
 * timeout so a hung git process surfaces as BackendTimeoutError.
 */

import { log } from '@shared/logger'
import simpleGit, { GitPluginError, type SimpleGit } from 'simple-git'
import { BackendTimeoutError, GitCommandError } from '../../shared/errors'
import { DEFAULT_COMMAND_TIMEOUT_MS } from '../../shared/constants'
import type { GitAdapter } from './interface'
import type {
  CommitDetail,
  CommitRecord,
  CommitTreeOptions,
  ListCommitsOptions,
  ResetOptions
} from './types'
import {
  COMMIT_DETAIL_FORMAT,
  COMMIT_RECORD_FORMAT,
  parseCommitDetail,
  parseCommitLog,
  parseRemoteBranches
} from './utils'

export type SimpleGitAdapterOptions = {
  /** Timeout applied to every git invocation (ms) */
  timeoutMs?: number
}

export class SimpleGitAdapter implements GitAdapter {
  readonly name = 'simple-git'
  private readonly timeoutMs: number

  constructor(options: SimpleGitAdapterOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS
  }

  private createGit(dir: string): SimpleGit {
    return simpleGit({ baseDir: dir, timeout: { block: this.timeoutMs } })
  }

  // ============================================================================
  // Repository Inspection
  // ============================================================================

  async listRemoteBranches(dir: string, remote: string): Promise<string[]> {
    try {
      const git = this.createGit(dir)
      const output = await git.raw([
        'for-each-ref',
        '--format=%(refname)%09%(symref)',
        `refs/remotes/${remote}`
      ])
      return parseRemoteBranches(output, remote)
    } catch (error) {
      throw this.createError('listRemoteBranches', error)
    }
  }

  async currentBranch(dir: string): Promise<string | null> {
    try {
      const git = this.createGit(dir)
      const result = (await git.raw(['branch', '--show-current'])).trim()
      // Empty output means detached HEAD
      return result.length > 0 ? result : null
    } catch (error) {
      throw this.createError('currentBranch', error)
    }
  }

  async listCommits(
    dir: string,
    range: string,
    options?: ListCommitsOptions
  ): Promise<CommitRecord[]> {
    let output: string
    try {
      const git = this.createGit(dir)
      const args = ['log', '--reverse', `--format=${COMMIT_RECORD_FORMAT}`]
      if (options?.firstParent) {
        args.push('--first-parent')
      }
      args.push(range, '--')
      output = await git.raw(args)
    } catch (error) {
      throw this.createError('listCommits', error)
    }

    // Parsing failures are MalformedCommitRecordError, not backend failures
    return parseCommitLog(output)
  }

  async getMessage(dir: string, hash: string): Promise<string> {
    try {
      const git = this.createGit(dir)
      const result = await git.raw(['log', '-1', '--format=%B', hash, '--'])
      return result.trimEnd()
    } catch (error) {
      throw this.createError('getMessage', error)
    }
  }

  async tagsContaining(dir: string, hash: string): Promise<string[]> {
    try {
      const git = this.createGit(dir)
      const result = await git.raw(['tag', '--contains', hash])
      return result
        .split('\n')
        .map((t) => t.trim())
        .filter((t) => t.length > 0)
    } catch (error) {
      throw this.createError('tagsContaining', error)
    }
  }

  async readCommit(dir: string, hash: string): Promise<CommitDetail> {
    let output: string
    try {
      const git = this.createGit(dir)
      output = await git.raw(['log', '-1', '--date=raw', `--format=${COMMIT_DETAIL_FORMAT}`, hash, '--'])
    } catch (error) {
      throw this.createError('readCommit', error)
    }

    return parseCommitDetail(output)
  }

  async resolveRef(dir: string, ref: string): Promise<string> {
    try {
      const git = this.createGit(dir)
      const result = await git.revparse(['--verify', ref])
      return result.trim()
    } catch (error) {
      throw this.createError('resolveRef', error)
    }
  }

  async resolveGitDir(dir: string): Promise<string> {
    try {
      const git = this.createGit(dir)
      const result = await git.revparse(['--absolute-git-dir'])
      return result.trim()
    } catch (error) {
      throw this.createError('resolveGitDir', error)
    }
  }

  // ============================================================================
  // Repository Mutation
  // ============================================================================

  async checkout(dir: string, ref: string): Promise<void> {
    try {
      const git = this.createGit(dir)
      await git.checkout(ref)
    } catch (error) {
      throw this.createError('checkout', error)
    }
  }

  async commitTree(dir: string, options: CommitTreeOptions): Promise<string> {
    try {
      const env: Record<string, string> = {
        GIT_AUTHOR_NAME: options.author.name,
        GIT_AUTHOR_EMAIL: options.author.email,
        GIT_AUTHOR_DATE: options.author.date
      }

      if (options.committer) {
        env['GIT_COMMITTER_NAME'] = options.committer.name
        env['GIT_COMMITTER_EMAIL'] = options.committer.email
        env['GIT_COMMITTER_DATE'] = options.committer.date
      }

      // env() replaces the child environment; editors, pagers and askpass helpers stay out
      const git = this.createGit(dir).env({ ...passthroughEnv(), ...env })
      const args = ['commit-tree', options.tree]
      for (const parent of options.parents) {
        args.push('-p', parent)
      }
      args.push('-m', options.message)

      const result = await git.raw(args)
      return result.trim()
    } catch (error) {
      throw this.createError('commitTree', error)
    }
  }

  async updateRef(dir: string, ref: string, newSha: string, expectedOld?: string): Promise<void> {
    try {
      const git = this.createGit(dir)
      const args = ['update-ref', '-m', 'history-squash', ref, newSha]
      if (expectedOld) {
        args.push(expectedOld)
      }
      await git.raw(args)
    } catch (error) {
      throw this.createError('updateRef', error)
    }
  }

  async reset(dir: string, options: ResetOptions): Promise<void> {
    try {
      const git = this.createGit(dir)
      await git.reset([`--${options.mode}`, options.ref])
    } catch (error) {
      throw this.createError('reset', error)
    }
  }

  private createError(operation: string, originalError: unknown): GitCommandError {
    if (originalError instanceof GitPluginError && originalError.plugin === 'timeout') {
      log.debug(`[SimpleGitAdapter] ${operation} timed out`)
      return new BackendTimeoutError(operation, this.timeoutMs, originalError)
    }
    const message = originalError instanceof Error ? originalError.message : String(originalError)
    return new GitCommandError(
      `[SimpleGitAdapter] ${operation} failed: ${message}`,
      operation,
      originalError
    )
  }
}

/**
 * Variables git needs to find itself and the user's global config
 */
const PASSTHROUGH_ENV = ['PATH', 'HOME', 'XDG_CONFIG_HOME', 'USERPROFILE', 'SYSTEMROOT'] as const

function passthroughEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const key of PASSTHROUGH_ENV) {
    const value = process.env[key]
    if (value !== undefined) env[key] = value
  }
  return env
}
