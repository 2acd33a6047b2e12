import type { AliasEntry, AliasTable } from '@shared/types'
import { formatIdentity } from '@shared/types'
import { ConfigError } from '../shared/errors'

/**
 * Build the lookup table from configured aliases.
 *
 * Every identifier (and the canonical identity itself) maps, lower-cased, to
 * the canonical identity. An identifier claimed by two different developers is
 * a configuration error.
 */
export function buildAliasTable(aliases: readonly AliasEntry[]): AliasTable {
  const table = new Map<string, string>()

  const claim = (identifier: string, canonical: string): void => {
    const key = identifier.trim().toLowerCase()
    if (!key) {
      throw new ConfigError(`Empty identifier in aliases of '${canonical}'`, 'aliases')
    }
    const existing = table.get(key)
    if (existing !== undefined && existing !== canonical) {
      throw new ConfigError(
        `Identifier '${identifier}' is listed under both '${existing}' and '${canonical}'`,
        'aliases'
      )
    }
    table.set(key, canonical)
  }

  for (const entry of aliases) {
    const canonical = entry.canonical.trim()
    if (!canonical) {
      throw new ConfigError('Alias entry has an empty canonical identity', 'aliases')
    }
    claim(canonical, canonical)
    for (const identifier of entry.identifiers) {
      claim(identifier, canonical)
    }
  }

  return table
}

/**
 * Maps raw author identities to canonical ones through an immutable alias table.
 */
export class IdentityResolver {
  constructor(private readonly table: AliasTable) {}

  static fromAliases(aliases: readonly AliasEntry[]): IdentityResolver {
    return new IdentityResolver(buildAliasTable(aliases))
  }

  /**
   * Case-insensitive lookup; an unknown identifier is its own canonical form.
   */
  resolve(identifier: string): string {
    return this.table.get(identifier.trim().toLowerCase()) ?? identifier
  }

  /**
   * Resolve a commit author, trying "Name <email>", then the email, then the name.
   */
  resolveAuthor(name: string, email: string): string {
    const raw = formatIdentity(name, email)
    for (const candidate of [raw, email, name]) {
      if (!candidate) continue
      const canonical = this.table.get(candidate.trim().toLowerCase())
      if (canonical !== undefined) return canonical
    }
    return raw
  }
}
