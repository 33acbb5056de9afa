#!/usr/bin/env node
import * as readline from 'node:readline/promises'
import { stdin as input, stdout as output } from 'node:process'
import { loadConfig, type SyncConfig } from './config.js'
import { createLogger } from './logger.js'
import { runSync, windowFromConfig } from './app.js'
import { authorizeInteractively, GoogleTokenStore, readClientSecrets } from './google-auth.js'
import { formatReport } from './sync/report.js'
import { formatWindow } from './sync/window.js'
import { CalendarSyncError } from './errors.js'

const USAGE = `Usage: calendar-sync [command] [options]

Commands:
  sync        Copy missing events between the CalDAV and Google calendars (default)
  window      Print the active sync window
  authorize   Authorize access to Google Calendar and store the token

Options:
  --config-dir <dir>     Directory holding config.yaml (default: nearest .calendar-sync/)
  --dry-run              Report what would be copied without writing
  --continue-on-error    Keep going when a single write fails
  -h, --help             Show this help`

interface CliArgs {
  command: string
  configDir?: string
  dryRun: boolean
  continueOnError: boolean
  help: boolean
}

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { command: 'sync', dryRun: false, continueOnError: false, help: false }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '--dry-run':
        parsed.dryRun = true
        break
      case '--continue-on-error':
        parsed.continueOnError = true
        break
      case '--config-dir':
        parsed.configDir = args[++i]
        if (!parsed.configDir) throw new Error('--config-dir needs a value')
        break
      case '-h':
      case '--help':
        parsed.help = true
        break
      default:
        if (arg.startsWith('-')) throw new Error(`Unknown option: ${arg}`)
        parsed.command = arg
    }
  }

  return parsed
}

async function syncCommand(config: SyncConfig, args: CliArgs): Promise<number> {
  const logger = createLogger({ level: config.log.level })
  const report = await runSync(config, {
    logger,
    dryRun: args.dryRun,
    continueOnWriteError: args.continueOnError || undefined,
  })

  for (const line of formatReport(report, { A: 'CalDAV', B: 'Google' })) {
    console.log(line)
  }
  return report.failed.length > 0 ? 2 : 0
}

async function authorizeCommand(config: SyncConfig): Promise<number> {
  const rl = readline.createInterface({ input, output })
  try {
    await authorizeInteractively(
      readClientSecrets(config.google.credentialsFile),
      new GoogleTokenStore(config.google.tokenFile),
      {
        scopes: config.google.scopes,
        promptForCode: async (authUrl) => {
          console.log('Open this URL in a browser and grant access:\n')
          console.log(`  ${authUrl}\n`)
          return rl.question('Paste the authorization code: ')
        },
      },
    )
  } finally {
    rl.close()
  }

  console.log(`Token stored at ${config.google.tokenFile}`)
  return 0
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2))
  if (args.help) {
    console.log(USAGE)
    return 0
  }

  const config = loadConfig({ configDir: args.configDir })

  switch (args.command) {
    case 'sync':
      return syncCommand(config, args)
    case 'window':
      console.log(formatWindow(windowFromConfig(config)))
      return 0
    case 'authorize':
      return authorizeCommand(config)
    default:
      console.error(`Unknown command: ${args.command}\n`)
      console.error(USAGE)
      return 1
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err) => {
    if (err instanceof CalendarSyncError) {
      console.error(`Error: ${err.message}`)
    } else {
      console.error('Fatal error:', err)
    }
    process.exitCode = 1
  })
