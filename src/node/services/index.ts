/**
 * Services Layer - stateful I/O around the git backend.
 *
 * Services own backend access and on-disk state. Pure decisions live in
 * the domain layer.
 */

export { HistoryReader } from './HistoryReader'
export { RepoSession } from './RepoSession'
export { RewriteJournal } from './RewriteJournal'
export type { RecoveryAction, RewriteIntent, RewriteIntentStatus } from './RewriteJournal'
