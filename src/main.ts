import dotenv from 'dotenv'

import { isLogLevel, log, setLogLevel } from '@shared/logger'
import type { RunReport } from '@shared/types'
import { createGitAdapter } from './node/adapters/git'
import { parseCliArgs, USAGE } from './node/core/cli-args'
import { loadConfiguration } from './node/core/config'
import { printPreview, printReport } from './node/core/utils/print-report'
import { SquashOperation } from './node/operations'
import { RepoSession } from './node/services'
import { describeError } from './node/shared/errors'

dotenv.config()

// The logger read LOG_LEVEL before .env was loaded
const envLevel = process.env['LOG_LEVEL']?.toLowerCase()
if (isLogLevel(envLevel)) setLogLevel(envLevel)

export async function main(argv: string[]): Promise<number> {
  try {
    const args = parseCliArgs(argv)
    if (args.help) {
      log.info(USAGE)
      return 0
    }

    const config = loadConfiguration({ configPath: args.configPath, repoPath: args.repoPath })
    log.info(`Squashing history of ${config.repoPath}${args.dryRun ? ' (dry run)' : ''}`)

    const git = createGitAdapter({ timeoutMs: config.commandTimeoutMs })
    const report: RunReport = await RepoSession.run(config.repoPath, git, (session) =>
      args.dryRun
        ? SquashOperation.preview(session, config)
        : SquashOperation.execute(session, config, {
            onBranchStart: (branch) => log.info(`Processing branch ${branch}`)
          })
    )

    if (args.dryRun) {
      printPreview(report)
    } else {
      printReport(report)
    }
    return report.exitCode
  } catch (error) {
    log.error('history-squash failed:', describeError(error))
    return 1
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    log.error(error)
    process.exitCode = 1
  })
