import type { BranchOutcome, RunReport, SquashResult } from '@shared/types'
import { log } from '@shared/logger'
import { GroupingEngine } from '../../domain'

export function formatSquashResult(result: SquashResult): string {
  const members = result.originalCommits
    .map((commit) => `(${commit.hash.slice(0, 7)}, ${commit.canonicalAuthor})`)
    .join(', ')
  return `Commits [${members}] were squashed into:\n${result.newCommitId}: ${result.message}`
}

export function formatBranchOutcome(outcome: BranchOutcome): string {
  const rewritten = GroupingEngine.rewritable(outcome.groups).length
  const suffix = outcome.reason ? ` (${outcome.reason})` : ''
  return (
    `${outcome.branch}: ${outcome.status}${suffix}, ` +
    `${outcome.groups.length} group(s), ${rewritten} to squash, ` +
    `${outcome.boundaryCount} boundary, ${outcome.filteredCount} filtered`
  )
}

/**
 * Preview of what a run would squash. Nothing is printed for groups of one.
 */
export function printPreview(report: RunReport): void {
  report.outcomes.forEach((outcome) => {
    log.info(formatBranchOutcome(outcome))
    GroupingEngine.rewritable(outcome.groups).forEach((group) => {
      const key = group.correlationKey ?? 'no key'
      const first = group.commits[0]
      log.info(`  - ${group.commits.length} commits by ${first.canonicalAuthor} [${key}]`)
      group.commits.forEach((commit) => {
        const subject = commit.message.split('\n')[0] || '(no message)'
        log.info(`      ${commit.hash.slice(0, 7)} ${subject}`)
      })
    })
  })
}

export function printReport(report: RunReport): void {
  report.results.forEach((result) => {
    log.info(formatSquashResult(result))
  })

  log.info(`\nBranches (${report.outcomes.length}):`)
  report.outcomes.forEach((outcome) => {
    log.info(`  - ${formatBranchOutcome(outcome)}`)
  })

  if (report.aborted) {
    log.error('Run aborted after a failed rewrite. Remaining branches were not processed.')
    return
  }

  log.info('Done squashing commits. Please review the changes before pushing.')
  log.info(
    "If you're satisfied with the changes, you can push all branches to the new repository with:\n" +
      'git push --all <new-repo-url>'
  )
}
