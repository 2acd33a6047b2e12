import type { Classification, Commit } from '@shared/types'
import { DEFAULT_BOUNDARY_KEYWORDS } from '../shared/constants'

/**
 * Decides which commits may never be part of a group: reverts, merges and
 * pulls (by message keyword or by parent count) and commits a tag reaches.
 */
export class BoundaryClassifier {
  private readonly keywords: readonly string[]

  constructor(keywords: readonly string[] = DEFAULT_BOUNDARY_KEYWORDS) {
    this.keywords = keywords.map((k) => k.toLowerCase()).filter((k) => k.length > 0)
  }

  classify(commit: Commit): Classification {
    const message = commit.message.toLowerCase()
    if (this.keywords.some((keyword) => message.includes(keyword))) {
      return { isBoundary: true, reason: 'keyword' }
    }

    if (commit.parentHashes.length > 1) {
      return { isBoundary: true, reason: 'merge' }
    }

    if (commit.isTagged) {
      return { isBoundary: true, reason: 'tagged' }
    }

    return { isBoundary: false }
  }
}
