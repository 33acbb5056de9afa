/**
 * Wires configuration, credentials and both backends into one sync run.
 */

import type { Logger } from 'pino'
import { openCalDAVBackend } from './backends/caldav-backend.js'
import { openGoogleBackend } from './backends/google-backend.js'
import type { CalendarBackend } from './backends/types.js'
import { createGoogleAuthClient, GoogleTokenStore, readClientSecrets } from './google-auth.js'
import { CalendarSyncEngine, type SyncReport } from './sync/engine.js'
import { computeWindow, type TimeWindow } from './sync/window.js'
import { requireCalDAVAccount, type SyncConfig } from './config.js'

export interface SyncBackends {
  sideA: CalendarBackend
  sideB: CalendarBackend
}

/**
 * Connect both backends. Fails before any sync work when either
 * calendar cannot be located.
 */
export async function openBackends(config: SyncConfig, logger: Logger): Promise<SyncBackends> {
  const account = requireCalDAVAccount(config)
  const sideA = await openCalDAVBackend(
    { serverUrl: account.serverUrl, calendar: account.calendar },
    { username: account.username, password: account.password },
    { logger },
  )

  const auth = createGoogleAuthClient(
    readClientSecrets(config.google.credentialsFile),
    new GoogleTokenStore(config.google.tokenFile),
    logger,
  )
  const sideB = await openGoogleBackend({ calendar: config.google.calendar }, auth, { logger })

  return { sideA, sideB }
}

export function windowFromConfig(config: SyncConfig, now: Date = new Date()): TimeWindow {
  return computeWindow(now, config.window.pastDays, config.window.futureDays)
}

export interface RunSyncOptions {
  logger: Logger
  now?: Date
  dryRun?: boolean
  /** Overrides sync.continueOnWriteError from the config */
  continueOnWriteError?: boolean
  /** Pre-opened backends (skips openBackends) */
  backends?: SyncBackends
}

export async function runSync(config: SyncConfig, options: RunSyncOptions): Promise<SyncReport> {
  const { sideA, sideB } = options.backends ?? (await openBackends(config, options.logger))
  const engine = new CalendarSyncEngine(sideA, sideB, options.logger)

  return engine.sync(windowFromConfig(config, options.now), {
    dryRun: options.dryRun,
    continueOnWriteError: options.continueOnWriteError ?? config.sync.continueOnWriteError,
  })
}
