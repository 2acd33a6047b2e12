/**
 * Git Adapter Factory
 *
 * Provides a centralized way to create Git adapter instances.
 */

import type { GitAdapter } from './interface'
import { SimpleGitAdapter } from './SimpleGitAdapter'

/**
 * Configuration for adapter creation
 */
export interface GitAdapterConfig {
  /**
   * Timeout applied to every git invocation (ms)
   */
  timeoutMs?: number
}

/**
 * Create a Git adapter instance. Each call returns a fresh adapter.
 */
export function createGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  return new SimpleGitAdapter({ timeoutMs: config.timeoutMs })
}
