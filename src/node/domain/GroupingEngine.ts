import type { Commit, Group, GroupingResult } from '@shared/types'
import { systemClock, type Clock } from '../shared/clock'
import { DEFAULT_SQUASH_WINDOW_SECONDS } from '../shared/constants'
import { BoundaryClassifier } from './BoundaryClassifier'
import { areKeysCompatible, extractCorrelationKey } from './CorrelationKey'

export type AgeFilterOptions = {
  /** Commits older than this (relative to clock) are left out of every group */
  limitSeconds: number
  clock?: Clock
}

export type GroupingOptions = {
  squashWindowSeconds?: number
  classifier?: BoundaryClassifier
  /** Omit to disable the age filter */
  ageFilter?: AgeFilterOptions
}

/**
 * Partitions one branch's history into maximal runs of mergeable commits.
 *
 * Two neighbouring commits are mergeable when they share a canonical author
 * and the later one is strictly newer by at most the squash window. A run also
 * stops at a commit whose correlation key conflicts with the run's key, which
 * is the first key any member carried.
 *
 * Boundary commits and commits removed by the age filter end the open run and
 * join none, so a run never spans one of them.
 */
export class GroupingEngine {
  private readonly squashWindowSeconds: number
  private readonly classifier: BoundaryClassifier
  private readonly ageFilter: AgeFilterOptions | undefined

  constructor(options: GroupingOptions = {}) {
    this.squashWindowSeconds = options.squashWindowSeconds ?? DEFAULT_SQUASH_WINDOW_SECONDS
    this.classifier = options.classifier ?? new BoundaryClassifier()
    this.ageFilter = options.ageFilter
  }

  /**
   * Single pass over commits ordered oldest first.
   *
   * Every non-boundary, non-filtered commit lands in exactly one group;
   * groups of one are included so callers see the whole partition.
   */
  group(commits: readonly Commit[]): GroupingResult {
    const groups: Group[] = []
    let boundaryCount = 0
    let filteredCount = 0

    let current: Commit[] = []
    let currentKey: string | null = null

    const flush = (): void => {
      if (current.length > 0) {
        groups.push({ commits: current, correlationKey: currentKey })
      }
      current = []
      currentKey = null
    }

    const cutoffSeconds = this.ageCutoffSeconds()

    for (const commit of commits) {
      if (this.classifier.classify(commit).isBoundary) {
        boundaryCount++
        flush()
        continue
      }

      if (cutoffSeconds !== null && commit.timestamp < cutoffSeconds) {
        filteredCount++
        flush()
        continue
      }

      const key = extractCorrelationKey(commit.message)
      const previous = current[current.length - 1]

      if (
        previous &&
        this.isAdjacentMergeable(previous, commit) &&
        areKeysCompatible(currentKey, key)
      ) {
        current.push(commit)
        currentKey = currentKey ?? key
        continue
      }

      flush()
      current = [commit]
      currentKey = key
    }

    flush()

    return { groups, boundaryCount, filteredCount }
  }

  /**
   * Same canonical author, and the later commit is newer by (0, window] seconds.
   */
  isAdjacentMergeable(earlier: Commit, later: Commit): boolean {
    if (earlier.canonicalAuthor !== later.canonicalAuthor) return false
    const delta = later.timestamp - earlier.timestamp
    return delta > 0 && delta <= this.squashWindowSeconds
  }

  /**
   * Groups that actually need a rewrite.
   */
  static rewritable(groups: readonly Group[]): Group[] {
    return groups.filter((group) => group.commits.length >= 2)
  }

  private ageCutoffSeconds(): number | null {
    if (!this.ageFilter) return null
    const nowSeconds = Math.floor((this.ageFilter.clock ?? systemClock).now() / 1000)
    return nowSeconds - this.ageFilter.limitSeconds
  }
}
