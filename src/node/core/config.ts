import type { AliasEntry, Configuration } from '@shared/types'
import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'
import { buildAliasTable } from '../domain'
import {
  CONFIG_FILE_NAME,
  DEFAULT_AGE_LIMIT_SECONDS,
  DEFAULT_BOUNDARY_KEYWORDS,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_REMOTE,
  DEFAULT_SQUASH_WINDOW_SECONDS
} from '../shared/constants'
import { ConfigError } from '../shared/errors'

const IdentifierListSchema = z.array(z.string())

const AliasObjectSchema = z.object({
  canonical: z.string(),
  identifiers: IdentifierListSchema
})

const AliasTupleSchema = z
  .tuple([z.string(), IdentifierListSchema])
  .transform(([canonical, identifiers]) => ({ canonical, identifiers }))

const ConfigFileSchema = z
  .object({
    aliases: z.array(z.union([AliasObjectSchema, AliasTupleSchema])).default([]),
    squashWindowSeconds: z.number().int().positive().default(DEFAULT_SQUASH_WINDOW_SECONDS),
    ageLimitSeconds: z.number().int().positive().default(DEFAULT_AGE_LIMIT_SECONDS),
    enableAgeFilter: z.boolean().default(false),
    boundaryKeywords: z.array(z.string().min(1)).default([...DEFAULT_BOUNDARY_KEYWORDS]),
    remote: z.string().min(1).default(DEFAULT_REMOTE),
    commandTimeoutMs: z.number().int().positive().default(DEFAULT_COMMAND_TIMEOUT_MS)
  })
  .strict()

export type ConfigFile = z.infer<typeof ConfigFileSchema>

export type LoadConfigurationOptions = {
  /** Explicit config file; missing is an error when given */
  configPath?: string
  repoPath?: string
  env?: NodeJS.ProcessEnv
}

function readConfigFile(filePath: string, required: boolean): unknown {
  let content: string
  try {
    content = fs.readFileSync(filePath, 'utf-8')
  } catch (error) {
    if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }
    throw new ConfigError(`Cannot read configuration file ${filePath}`, undefined, error)
  }

  try {
    return JSON.parse(content)
  } catch (error) {
    throw new ConfigError(`Configuration file ${filePath} is not valid JSON`, undefined, error)
  }
}

/**
 * Resolve the run configuration from, in order of precedence: explicit
 * options, HISTORY_SQUASH_* environment variables, the config file and
 * embedded defaults.
 *
 * @throws ConfigError when the file is unreadable or malformed, or the aliases conflict
 */
export function loadConfiguration(options: LoadConfigurationOptions = {}): Configuration {
  const env = options.env ?? process.env
  const repoPath = path.resolve(options.repoPath ?? env['HISTORY_SQUASH_REPO'] ?? process.cwd())

  const explicitPath = options.configPath ?? env['HISTORY_SQUASH_CONFIG']
  const configPath = explicitPath
    ? path.resolve(explicitPath)
    : path.join(repoPath, CONFIG_FILE_NAME)

  const parsed = ConfigFileSchema.safeParse(readConfigFile(configPath, Boolean(explicitPath)))
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue?.path.join('.') || undefined
    throw new ConfigError(
      `Invalid configuration in ${configPath}: ${field ? `${field}: ` : ''}${issue?.message ?? 'unknown error'}`,
      field,
      parsed.error
    )
  }

  const aliases: AliasEntry[] = parsed.data.aliases
  // Throws on conflicting identifiers
  buildAliasTable(aliases)

  return { repoPath, ...parsed.data, aliases }
}
