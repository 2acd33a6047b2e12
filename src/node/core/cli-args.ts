import { ConfigError } from '../shared/errors'

export type CliArgs = {
  configPath?: string
  repoPath?: string
  dryRun: boolean
  help: boolean
}

export const USAGE = 'Usage: history-squash [--config <file>] [--repo <dir>] [--dry-run]'

function valueAfter(args: string[], index: number, flag: string): string {
  const value = args[index + 1]
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`${flag} requires a value`, flag.slice(2))
  }
  return value
}

export function parseCliArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { dryRun: false, help: false }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '--config':
        parsed.configPath = valueAfter(args, i, arg)
        i++
        break
      case '--repo':
        parsed.repoPath = valueAfter(args, i, arg)
        i++
        break
      case '--dry-run':
        parsed.dryRun = true
        break
      case '--help':
      case '-h':
        parsed.help = true
        break
      default:
        throw new ConfigError(`Unknown argument: ${arg}`)
    }
  }

  return parsed
}
