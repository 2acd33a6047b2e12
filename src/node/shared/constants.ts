/**
 * Node-specific constants for the backend.
 */

const DAY_SECONDS = 60 * 60 * 24

/**
 * Largest positive gap between two adjacent commits of one author that still merges.
 */
export const DEFAULT_SQUASH_WINDOW_SECONDS = 14 * DAY_SECONDS

/**
 * Commits older than this count as already published when the age filter is on.
 */
export const DEFAULT_AGE_LIMIT_SECONDS = 14 * DAY_SECONDS

export const DEFAULT_BOUNDARY_KEYWORDS = ['revert', 'merge', 'pull'] as const

export const DEFAULT_REMOTE = 'origin'

/** Default timeout for git commands (ms) */
export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000

/**
 * Config file looked up in the repository root when no path is given.
 */
export const CONFIG_FILE_NAME = '.history-squash.json'

/** Lock file in the git directory held by an open session */
export const SESSION_LOCK_FILE = 'history-squash.lock'

/** Write-ahead intent for the rewrite in flight */
export const INTENT_FILE = 'history-squash-intent.json'
