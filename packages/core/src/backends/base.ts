import type { Logger } from 'pino'
import { formatInstant, identityKey, type CanonicalEvent, type EventMap } from '../sync/event.js'
import { isWithinWindow, type TimeWindow } from '../sync/window.js'
import { WriteFailureError } from '../errors.js'
import { silentLogger } from '../logger.js'
import type { AppendOutcome, CalendarBackend } from './types.js'

/**
 * Shared write path for concrete backends: re-checks the window before any
 * remote write and wraps provider failures as WriteFailureError.
 */
export abstract class BaseCalendarBackend implements CalendarBackend {
  abstract readonly name: string
  protected readonly logger: Logger

  constructor(logger?: Logger) {
    this.logger = logger ?? silentLogger
  }

  abstract fetch(window: TimeWindow): Promise<EventMap>

  /**
   * Perform the remote write and return the backend-local id
   */
  protected abstract insert(event: CanonicalEvent): Promise<string>

  async append(event: CanonicalEvent, window: TimeWindow): Promise<AppendOutcome> {
    if (!isWithinWindow(event.start, window)) {
      this.logger.info(
        { backend: this.name, event: event.name, start: formatInstant(event.start) },
        `Event '${event.name}' skipped because its start time ${formatInstant(event.start)} is out of range`,
      )
      return { status: 'skipped', reason: 'out-of-window' }
    }

    let id: string
    try {
      id = await this.insert(event)
    } catch (err) {
      if (err instanceof WriteFailureError) throw err
      throw new WriteFailureError(this.name, identityKey(event).toString(), { cause: err })
    }

    this.logger.debug({ backend: this.name, id, key: identityKey(event).toString() }, 'Event created')
    return { status: 'created', id }
  }
}
