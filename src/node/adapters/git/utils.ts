/**
 * Git output parsing.
 *
 * Formats use ASCII unit/record separators so that names, emails and messages
 * can contain any printable character without breaking the split.
 */

import { MalformedCommitRecordError } from '../../shared/errors'
import type { CommitDetail, CommitRecord } from './types'

/** Delimiter between fields in --format output. Using ASCII Unit Separator. */
export const FIELD_DELIMITER = '\x1f'

/** Delimiter between records. Using ASCII Record Separator. */
export const RECORD_DELIMITER = '\x1e'

/**
 * `git log` format for CommitRecord: hash, author name, author email, commit time, parents
 */
export const COMMIT_RECORD_FORMAT = '%x1e' + ['%H', '%an', '%ae', '%ct', '%P'].join('%x1f')

/**
 * `git log --date=raw` format for CommitDetail; the message comes last so it may contain newlines
 */
export const COMMIT_DETAIL_FORMAT = ['%H', '%T', '%P', '%an', '%ae', '%ad', '%cn', '%ce', '%cd', '%B'].join(
  '%x1f'
)

const HASH_PATTERN = /^[0-9a-f]{4,64}$/
const TIMESTAMP_PATTERN = /^\d+$/
const RAW_DATE_PATTERN = /^\d+ [+-]\d{4}$/

function parseParents(field: string): string[] {
  return field.trim().split(' ').filter((p) => p.length > 0)
}

/**
 * Parse one record of COMMIT_RECORD_FORMAT output.
 *
 * @throws MalformedCommitRecordError when the hash, email or timestamp is unusable
 */
export function parseCommitRecord(record: string): CommitRecord {
  const fields = record.split(FIELD_DELIMITER)
  if (fields.length !== 5) {
    throw new MalformedCommitRecordError(
      `Expected 5 fields in commit record, got ${fields.length}`,
      record
    )
  }

  const [hash, authorName, authorEmail, timestamp, parents] = fields.map((f) => f.trim())

  if (!hash || !HASH_PATTERN.test(hash)) {
    throw new MalformedCommitRecordError(`Invalid commit hash '${hash}'`, record)
  }
  if (!authorEmail) {
    throw new MalformedCommitRecordError(`Commit ${hash} has no author email`, record)
  }
  if (!timestamp || !TIMESTAMP_PATTERN.test(timestamp)) {
    throw new MalformedCommitRecordError(`Commit ${hash} has invalid timestamp '${timestamp}'`, record)
  }

  return {
    hash,
    authorName: authorName ?? '',
    authorEmail,
    timestamp: parseInt(timestamp, 10),
    parentHashes: parseParents(parents ?? '')
  }
}

/**
 * Parse raw COMMIT_RECORD_FORMAT output into records, in output order.
 */
export function parseCommitLog(output: string): CommitRecord[] {
  return output
    .split(RECORD_DELIMITER)
    .filter((r) => r.trim().length > 0)
    .map((r) => parseCommitRecord(r.trim()))
}

/**
 * Parse COMMIT_DETAIL_FORMAT output for a single commit.
 */
export function parseCommitDetail(output: string): CommitDetail {
  const fields = output.split(FIELD_DELIMITER)
  if (fields.length < 10) {
    throw new MalformedCommitRecordError(
      `Expected 10 fields in commit detail, got ${fields.length}`,
      output
    )
  }

  const [hash, tree, parents, authorName, authorEmail, authorDate, committerName, committerEmail, committerDate] =
    fields.slice(0, 9).map((f) => f.trim())
  // %B may itself contain the delimiter in pathological messages; keep everything after field 9
  const message = fields.slice(9).join(FIELD_DELIMITER).trimEnd()

  if (!hash || !HASH_PATTERN.test(hash) || !tree || !HASH_PATTERN.test(tree)) {
    throw new MalformedCommitRecordError(`Invalid commit or tree id in '${hash}'`, output)
  }
  if (!authorDate || !RAW_DATE_PATTERN.test(authorDate)) {
    throw new MalformedCommitRecordError(`Commit ${hash} has invalid author date '${authorDate}'`, output)
  }
  if (!committerDate || !RAW_DATE_PATTERN.test(committerDate)) {
    throw new MalformedCommitRecordError(
      `Commit ${hash} has invalid committer date '${committerDate}'`,
      output
    )
  }

  return {
    hash,
    tree,
    parentHashes: parseParents(parents ?? ''),
    message,
    author: { name: authorName ?? '', email: authorEmail ?? '', date: authorDate },
    committer: { name: committerName ?? '', email: committerEmail ?? '', date: committerDate }
  }
}

/**
 * Parse `git for-each-ref --format=%(refname)%09%(symref) refs/remotes/<remote>` output
 * into branch names without the remote prefix. Symbolic refs are skipped.
 */
export function parseRemoteBranches(output: string, remote: string): string[] {
  const prefix = `refs/remotes/${remote}/`
  const branches: string[] = []

  for (const line of output.split('\n')) {
    if (!line.trim()) continue
    const [refName, symref] = line.split('\t')
    if (!refName || !refName.startsWith(prefix)) continue
    if (symref && symref.trim().length > 0) continue
    branches.push(refName.slice(prefix.length))
  }

  return branches
}
