/**
 * Sync Error Types
 *
 * Every failure the sync run can surface. Out-of-window writes are not
 * errors; they are reported as skips by the backends.
 */

export type SyncErrorCode =
  | 'BACKEND_UNAVAILABLE'
  | 'CALENDAR_NOT_FOUND'
  | 'WRITE_FAILURE'
  | 'INVALID_EVENT'
  | 'CONFIG_INVALID'

export class CalendarSyncError extends Error {
  readonly code: SyncErrorCode

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CalendarSyncError'
    this.code = code
  }
}

/** Network or auth failure talking to a provider. Aborts the run. */
export class BackendUnavailableError extends CalendarSyncError {
  readonly backend: string

  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super('BACKEND_UNAVAILABLE', `[${backend}] ${message}`, options)
    this.name = 'BackendUnavailableError'
    this.backend = backend
  }
}

/** The configured calendar does not exist on the backend. */
export class CalendarNotFoundError extends CalendarSyncError {
  readonly backend: string
  readonly calendar: string

  constructor(backend: string, calendar: string) {
    super('CALENDAR_NOT_FOUND', `[${backend}] Calendar not found: ${calendar}`)
    this.name = 'CalendarNotFoundError'
    this.backend = backend
    this.calendar = calendar
  }
}

/** A single append was rejected by the backend. */
export class WriteFailureError extends CalendarSyncError {
  readonly backend: string
  readonly key: string

  constructor(backend: string, key: string, options?: { cause?: unknown }) {
    super('WRITE_FAILURE', `[${backend}] Failed to create event ${key}: ${describeError(options?.cause)}`, options)
    this.name = 'WriteFailureError'
    this.backend = backend
    this.key = key
  }
}

export class InvalidEventError extends CalendarSyncError {
  constructor(message: string) {
    super('INVALID_EVENT', message)
    this.name = 'InvalidEventError'
  }
}

export class ConfigError extends CalendarSyncError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super('CONFIG_INVALID', issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export function describeError(err: unknown): string {
  if (err === undefined) return 'unknown error'
  return err instanceof Error ? err.message : String(err)
}
