// Public API for consumption by other packages

// Canonical model + window
export {
  EventMap,
  IdentityKey,
  identityKey,
  compareKeys,
  normalizeEvent,
  normalizeInstant,
  formatInstant,
} from './sync/event.js'
export type { CanonicalEvent, RawEvent, RawInstant } from './sync/event.js'
export { computeWindow, isWithinWindow, formatWindow } from './sync/window.js'
export type { TimeWindow } from './sync/window.js'

// Reconciliation
export { CalendarSyncEngine, mergeEventMaps, computeDelta } from './sync/engine.js'
export type {
  SyncReport,
  SyncDelta,
  SyncOptions,
  SyncSide,
  SkippedWrite,
  FailedWrite,
} from './sync/engine.js'
export { formatReport } from './sync/report.js'
export type { SideNames } from './sync/report.js'

// Backends
export type { CalendarBackend, AppendOutcome } from './backends/types.js'
export { BaseCalendarBackend } from './backends/base.js'
export {
  CalDAVBackend,
  openCalDAVBackend,
  parseICalEvents,
  generateICalEvent,
  escapeICalText,
  foldICalLine,
} from './backends/caldav-backend.js'
export type {
  CalDAVBackendConfig,
  CalDAVBackendOptions,
  CalDAVCredentials,
  CalDAVTransport,
} from './backends/caldav-backend.js'
export {
  GoogleCalendarBackend,
  openGoogleBackend,
  createGoogleCalendarApi,
  googleEventToCanonical,
  canonicalToGoogleEvent,
} from './backends/google-backend.js'
export type {
  GoogleCalendarApi,
  GoogleBackendConfig,
  GoogleBackendOptions,
} from './backends/google-backend.js'

// Credentials
export {
  GoogleTokenStore,
  readClientSecrets,
  createGoogleAuthClient,
  authorizeInteractively,
} from './google-auth.js'
export type { ClientSecrets, StoredToken, AuthorizeOptions } from './google-auth.js'

// Config, logging, errors
export { loadConfig, findConfigDir, requireCalDAVAccount, CONFIG_DIRNAME } from './config.js'
export type { SyncConfig, LoadConfigOptions, CalDAVAccount } from './config.js'
export { createLogger, silentLogger } from './logger.js'
export type { Logger, LoggerOptions } from './logger.js'
export {
  CalendarSyncError,
  BackendUnavailableError,
  CalendarNotFoundError,
  WriteFailureError,
  InvalidEventError,
  ConfigError,
} from './errors.js'
export type { SyncErrorCode } from './errors.js'

export { openBackends, runSync, windowFromConfig } from './app.js'
export type { SyncBackends, RunSyncOptions } from './app.js'
