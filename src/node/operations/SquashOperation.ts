import { log } from '@shared/logger'
import type {
  BranchOutcome,
  Configuration,
  GroupingResult,
  RunReport,
  SquashResult
} from '@shared/types'
import { BoundaryClassifier, GroupingEngine, IdentityResolver, remapGroup } from '../domain'
import { HistoryReader, RewriteJournal, type RepoSession } from '../services'
import type { Clock } from '../shared/clock'
import { describeError } from '../shared/errors'
import { CollapseOperation } from './CollapseOperation'

/**
 * Progress callbacks and collaborators for a run.
 */
export interface SquashRunOptions {
  /** Time source for the age filter */
  clock?: Clock
  /** Called before a branch is checked out */
  onBranchStart?: (branch: string) => void
  /** Called after every successful collapse */
  onSquash?: (result: SquashResult) => void
  /** Called once per branch with its final outcome */
  onBranchComplete?: (outcome: BranchOutcome) => void
}

/**
 * Old -> current id map, folded forward with the map of one more collapse.
 */
function composeRewrites(
  accumulated: Map<string, string>,
  next: ReadonlyMap<string, string>
): void {
  const originalOf = new Map<string, string>()
  for (const [original, current] of accumulated) {
    originalOf.set(current, original)
  }
  for (const [current, replacement] of next) {
    accumulated.set(originalOf.get(current) ?? current, replacement)
  }
}

type BranchRun = {
  outcome: BranchOutcome
  /** A collapse failed on this branch */
  stopRun: boolean
}

function emptyOutcome(branch: string): BranchOutcome {
  return { branch, status: 'completed', groups: [], results: [], boundaryCount: 0, filteredCount: 0 }
}

function buildReport(outcomes: BranchOutcome[], aborted: boolean): RunReport {
  const results = outcomes.flatMap((outcome) => outcome.results)
  const anyAborted = aborted || outcomes.some((outcome) => outcome.status === 'aborted')
  return { outcomes, results, aborted, exitCode: anyAborted ? 1 : 0 }
}

export class SquashOperation {
  static createEngine(config: Configuration, clock?: Clock): GroupingEngine {
    return new GroupingEngine({
      squashWindowSeconds: config.squashWindowSeconds,
      classifier: new BoundaryClassifier(config.boundaryKeywords),
      ageFilter: config.enableAgeFilter ? { limitSeconds: config.ageLimitSeconds, clock } : undefined
    })
  }

  /**
   * Read and group every remote branch without touching the working copy.
   * Branches are read through their remote-tracking refs.
   */
  static async preview(
    session: RepoSession,
    config: Configuration,
    options: SquashRunOptions = {}
  ): Promise<RunReport> {
    const reader = new HistoryReader(IdentityResolver.fromAliases(config.aliases))
    const engine = this.createEngine(config, options.clock)
    const branches = await session.git.listRemoteBranches(session.repoPath, config.remote)

    const outcomes: BranchOutcome[] = []
    for (const branch of branches) {
      options.onBranchStart?.(branch)
      const outcome = emptyOutcome(branch)

      try {
        const commits = await reader.read(session, `${config.remote}/${branch}`)
        Object.assign(outcome, this.groupingFields(engine.group(commits)))
      } catch (error) {
        log.error(`[SquashOperation] Could not read ${branch}:`, describeError(error))
        outcome.status = 'aborted'
        outcome.reason = describeError(error)
      }

      outcomes.push(outcome)
      options.onBranchComplete?.(outcome)
    }

    return buildReport(outcomes, false)
  }

  /**
   * Squash every remote branch in turn.
   *
   * - checkout failure: branch skipped, run continues
   * - read or grouping failure: branch aborted, run continues
   * - collapse failure: branch already restored, run aborted
   *
   * The branch checked out before the run is checked out again at the end.
   */
  static async execute(
    session: RepoSession,
    config: Configuration,
    options: SquashRunOptions = {}
  ): Promise<RunReport> {
    const git = session.git
    const dir = session.repoPath

    const recovery = await RewriteJournal.recover(session)
    if (recovery === 'restored') {
      log.warn('[SquashOperation] Restored a branch left mid-rewrite by a previous run')
    }

    const reader = new HistoryReader(IdentityResolver.fromAliases(config.aliases))
    const engine = this.createEngine(config, options.clock)
    const startBranch = await git.currentBranch(dir)
    const branches = await git.listRemoteBranches(dir, config.remote)
    log.info(`Processing ${branches.length} branch(es) from ${config.remote}`)

    const outcomes: BranchOutcome[] = []
    let aborted = false

    try {
      for (const branch of branches) {
        options.onBranchStart?.(branch)
        const { outcome, stopRun } = await this.processBranch(
          session,
          branch,
          reader,
          engine,
          options
        )
        outcomes.push(outcome)
        options.onBranchComplete?.(outcome)

        if (stopRun) {
          aborted = true
          break
        }
      }
    } finally {
      await this.restoreStartBranch(session, startBranch)
    }

    return buildReport(outcomes, aborted)
  }

  private static async processBranch(
    session: RepoSession,
    branch: string,
    reader: HistoryReader,
    engine: GroupingEngine,
    options: SquashRunOptions
  ): Promise<BranchRun> {
    const outcome = emptyOutcome(branch)

    try {
      await session.git.checkout(session.repoPath, branch)
    } catch (error) {
      log.warn(`[SquashOperation] Skipping ${branch}: checkout failed`, describeError(error))
      return {
        outcome: { ...outcome, status: 'skipped', reason: describeError(error) },
        stopRun: false
      }
    }

    let grouping: GroupingResult
    try {
      grouping = engine.group(await reader.read(session, branch))
    } catch (error) {
      log.error(`[SquashOperation] Could not read ${branch}:`, describeError(error))
      return {
        outcome: { ...outcome, status: 'aborted', reason: describeError(error) },
        stopRun: false
      }
    }
    Object.assign(outcome, this.groupingFields(grouping))

    const rewritten = new Map<string, string>()
    for (const group of GroupingEngine.rewritable(grouping.groups)) {
      try {
        const collapsed = await CollapseOperation.collapse(
          session,
          branch,
          remapGroup(group, rewritten)
        )
        composeRewrites(rewritten, collapsed.rewritten)

        const result: SquashResult = {
          branch,
          originalCommits: group.commits,
          newCommitId: collapsed.newHash,
          message: collapsed.message
        }
        outcome.results.push(result)
        options.onSquash?.(result)
      } catch (error) {
        log.error(`[SquashOperation] Aborting run on ${branch}:`, describeError(error))
        outcome.status = 'aborted'
        outcome.reason = describeError(error)
        // Remaining branches stay untouched
        return { outcome, stopRun: true }
      }
    }

    return { outcome, stopRun: false }
  }

  private static groupingFields(
    grouping: GroupingResult
  ): Pick<BranchOutcome, 'groups' | 'boundaryCount' | 'filteredCount'> {
    return {
      groups: grouping.groups,
      boundaryCount: grouping.boundaryCount,
      filteredCount: grouping.filteredCount
    }
  }

  private static async restoreStartBranch(
    session: RepoSession,
    startBranch: string | null
  ): Promise<void> {
    if (!startBranch) return
    try {
      await session.git.checkout(session.repoPath, startBranch)
    } catch (error) {
      log.warn(`[SquashOperation] Could not return to ${startBranch}`, describeError(error))
    }
  }
}
