/**
 * RewriteJournal - Write-Ahead Log for branch rewrites
 *
 * A collapse moves a branch tip. If the process dies between creating the new
 * commits and finishing, the branch may be left pointing somewhere the operator
 * never reviewed. The journal records the branch and its head before any
 * mutation so the next run can put it back.
 *
 * Flow:
 * 1. Write intent to disk BEFORE touching the branch
 * 2. Mark executing, run the collapse
 * 3. Commit (clear) the intent on success, mark failed after a rollback
 * 4. On startup: restore any branch whose intent never got committed
 *
 * Intent states:
 * - 'pending': Intent written, collapse not started
 * - 'executing': Collapse in progress
 * - 'completed': Collapse finished, awaiting commit
 * - 'failed': Collapse failed and was rolled back
 */

import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'

import { log } from '@shared/logger'
import { INTENT_FILE } from '../shared/constants'
import { describeError } from '../shared/errors'
import type { RepoSession } from './RepoSession'

const RewriteIntentSchema = z.object({
  id: z.string(),
  branch: z.string(),
  /** Branch head before the collapse */
  originalHead: z.string(),
  firstHash: z.string(),
  lastHash: z.string(),
  status: z.enum(['pending', 'executing', 'completed', 'failed']),
  createdAtMs: z.number(),
  updatedAtMs: z.number(),
  error: z.object({ message: z.string() }).optional()
})

export type RewriteIntent = z.infer<typeof RewriteIntentSchema>

export type RewriteIntentStatus = RewriteIntent['status']

export type RecoveryAction = 'none' | 'cleared' | 'restored'

export class RewriteJournal {
  private constructor() {
    // Static-only class
  }

  /**
   * Write a new intent to the log.
   * This MUST be called before the branch is touched.
   */
  static async writeIntent(
    gitDir: string,
    intent: Omit<RewriteIntent, 'createdAtMs' | 'updatedAtMs' | 'status'>
  ): Promise<RewriteIntent> {
    const now = Date.now()
    const fullIntent: RewriteIntent = {
      ...intent,
      status: 'pending',
      createdAtMs: now,
      updatedAtMs: now
    }

    await this.persistIntent(gitDir, fullIntent)
    log.debug('[RewriteJournal] Intent written', { intentId: intent.id, branch: intent.branch })

    return fullIntent
  }

  static async markExecuting(gitDir: string): Promise<void> {
    await this.updateStatus(gitDir, 'executing')
  }

  static async markCompleted(gitDir: string): Promise<void> {
    await this.updateStatus(gitDir, 'completed')
  }

  /**
   * Mark intent as failed with error information.
   */
  static async markFailed(gitDir: string, error: unknown): Promise<void> {
    await this.updateStatus(gitDir, 'failed', { message: describeError(error) })
  }

  /**
   * Commit the transaction by clearing the intent.
   */
  static async commitIntent(gitDir: string): Promise<void> {
    await this.clearIntent(gitDir)
    log.debug('[RewriteJournal] Intent committed (cleared)', { gitDir })
  }

  static async getIntent(gitDir: string): Promise<RewriteIntent | null> {
    return this.loadIntent(gitDir)
  }

  /**
   * Put back any branch a previous run left mid-rewrite.
   *
   * Completed and failed intents only need clearing: a failed collapse has
   * already been rolled back. Pending and executing intents restore the
   * branch to its recorded head.
   */
  static async recover(session: RepoSession): Promise<RecoveryAction> {
    const intent = await this.loadIntent(session.gitDir)
    if (!intent) {
      return 'none'
    }

    if (intent.status === 'completed' || intent.status === 'failed') {
      await this.clearIntent(session.gitDir)
      return 'cleared'
    }

    log.warn('[RewriteJournal] Restoring branch left mid-rewrite by a previous run', {
      branch: intent.branch,
      originalHead: intent.originalHead,
      status: intent.status
    })

    const git = session.git
    const ref = `refs/heads/${intent.branch}`
    const currentHead = await git.resolveRef(session.repoPath, ref)
    if (currentHead !== intent.originalHead) {
      await git.updateRef(session.repoPath, ref, intent.originalHead)
    }
    if ((await git.currentBranch(session.repoPath)) === intent.branch) {
      await git.reset(session.repoPath, { mode: 'hard', ref: intent.originalHead })
    }

    await this.clearIntent(session.gitDir)
    return 'restored'
  }

  // ===========================================================================
  // Private: Persistence
  // ===========================================================================

  private static getIntentFilePath(gitDir: string): string {
    return path.join(gitDir, INTENT_FILE)
  }

  private static async updateStatus(
    gitDir: string,
    status: RewriteIntentStatus,
    error?: RewriteIntent['error']
  ): Promise<void> {
    const intent = await this.loadIntent(gitDir)
    if (!intent) {
      log.warn('[RewriteJournal] No intent to update', { gitDir, status })
      return
    }

    await this.persistIntent(gitDir, {
      ...intent,
      status,
      ...(error ? { error } : {}),
      updatedAtMs: Date.now()
    })
  }

  private static async loadIntent(gitDir: string): Promise<RewriteIntent | null> {
    let content: string
    try {
      content = await fs.promises.readFile(this.getIntentFilePath(gitDir), 'utf-8')
    } catch {
      return null
    }

    let raw: unknown
    try {
      raw = JSON.parse(content)
    } catch {
      log.warn('[RewriteJournal] Ignoring unreadable intent file', { gitDir })
      return null
    }

    const parsed = RewriteIntentSchema.safeParse(raw)
    if (!parsed.success) {
      log.warn('[RewriteJournal] Ignoring malformed intent file', { gitDir })
      return null
    }
    return parsed.data
  }

  /**
   * Persist intent using atomic write (temp file + rename).
   */
  private static async persistIntent(gitDir: string, intent: RewriteIntent): Promise<void> {
    const filePath = this.getIntentFilePath(gitDir)
    const tempPath = `${filePath}.${process.pid}.tmp`

    try {
      await fs.promises.writeFile(tempPath, JSON.stringify(intent, null, 2))
      await fs.promises.rename(tempPath, filePath)
    } catch (err) {
      await fs.promises.rm(tempPath, { force: true })
      throw err
    }
  }

  private static async clearIntent(gitDir: string): Promise<void> {
    await fs.promises.rm(this.getIntentFilePath(gitDir), { force: true })
  }
}
