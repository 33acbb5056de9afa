/**
 * Google Calendar Backend
 *
 * Side B of the sync, on the Calendar v3 API. Recurring events come back
 * expanded (singleEvents) so each occurrence gets its own identity.
 */

import { google, type Auth, type calendar_v3 } from 'googleapis'
import type { Logger } from 'pino'
import { BaseCalendarBackend } from './base.js'
import {
  EventMap,
  formatInstant,
  normalizeEvent,
  type CanonicalEvent,
  type RawInstant,
} from '../sync/event.js'
import { isWithinWindow, type TimeWindow } from '../sync/window.js'
import { BackendUnavailableError, CalendarNotFoundError, describeError } from '../errors.js'

/** The calls this backend makes, so tests can stand in for Google */
export interface GoogleCalendarApi {
  getCalendar(calendarId: string): Promise<calendar_v3.Schema$Calendar>
  listCalendars(pageToken?: string): Promise<calendar_v3.Schema$CalendarList>
  listEvents(params: calendar_v3.Params$Resource$Events$List): Promise<calendar_v3.Schema$Events>
  insertEvent(params: calendar_v3.Params$Resource$Events$Insert): Promise<calendar_v3.Schema$Event>
}

export interface GoogleBackendConfig {
  /** "primary", a calendar id, or a calendar's summary */
  calendar: string
}

export interface GoogleBackendOptions {
  logger?: Logger
}

const BACKEND_NAME = 'google'
const PAGE_SIZE = 250

export function createGoogleCalendarApi(auth: Auth.OAuth2Client): GoogleCalendarApi {
  const calendar = google.calendar({ version: 'v3', auth })

  return {
    async getCalendar(calendarId) {
      return (await calendar.calendars.get({ calendarId })).data
    },
    async listCalendars(pageToken) {
      return (await calendar.calendarList.list({ pageToken, maxResults: PAGE_SIZE })).data
    },
    async listEvents(params) {
      return (await calendar.events.list(params)).data
    },
    async insertEvent(params) {
      return (await calendar.events.insert(params)).data
    },
  }
}

/**
 * HTTP status carried by a gaxios error, if any
 */
export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined
  if ('status' in err && typeof err.status === 'number') return err.status
  if (
    'response' in err &&
    typeof err.response === 'object' &&
    err.response !== null &&
    'status' in err.response &&
    typeof err.response.status === 'number'
  ) {
    return err.response.status
  }
  if ('code' in err && typeof err.code === 'number') return err.code
  return undefined
}

function googleTimeToRaw(time: calendar_v3.Schema$EventDateTime | undefined): RawInstant | null {
  if (time?.dateTime) return time.dateTime
  // All-day events: the date alone, read as UTC midnight
  if (time?.date) return time.date
  return null
}

/**
 * Convert a Google event into the canonical shape. Cancelled instances and
 * events without usable times yield null.
 */
export function googleEventToCanonical(item: calendar_v3.Schema$Event): CanonicalEvent | null {
  if (item.status === 'cancelled') return null

  const start = googleTimeToRaw(item.start)
  const end = googleTimeToRaw(item.end)
  if (start === null || end === null) return null

  return normalizeEvent({
    name: item.summary,
    description: item.description,
    start,
    end,
  })
}

export function canonicalToGoogleEvent(event: CanonicalEvent): calendar_v3.Schema$Event {
  return {
    summary: event.name,
    description: event.description,
    start: { dateTime: formatInstant(event.start), timeZone: 'UTC' },
    end: { dateTime: formatInstant(event.end), timeZone: 'UTC' },
  }
}

export class GoogleCalendarBackend extends BaseCalendarBackend {
  readonly name = BACKEND_NAME
  private api: GoogleCalendarApi
  private config: GoogleBackendConfig
  private calendarId: string | null = null

  constructor(config: GoogleBackendConfig, api: GoogleCalendarApi, options: GoogleBackendOptions = {}) {
    super(options.logger)
    this.config = config
    this.api = api
  }

  /**
   * Resolve the configured calendar to an id.
   *
   * @throws CalendarNotFoundError when neither the id nor a summary matches
   * @throws BackendUnavailableError on auth or network failure
   */
  async connect(): Promise<void> {
    if (this.calendarId) return

    const wanted = this.config.calendar
    try {
      const calendar = await this.api.getCalendar(wanted)
      this.calendarId = wanted === 'primary' ? wanted : (calendar.id ?? wanted)
    } catch (err) {
      if (httpStatusOf(err) !== 404) {
        throw this.unavailable(`Could not look up calendar '${wanted}'`, err)
      }
      this.calendarId = await this.findBySummary(wanted)
    }

    this.logger.info({ backend: this.name, calendarId: this.calendarId }, `Using calendar '${wanted}'`)
  }

  private async findBySummary(summary: string): Promise<string> {
    let pageToken: string | undefined
    do {
      let page: calendar_v3.Schema$CalendarList
      try {
        page = await this.api.listCalendars(pageToken)
      } catch (err) {
        throw this.unavailable('Could not list calendars', err)
      }

      const match = (page.items ?? []).find(
        (entry) => entry.summary === summary || entry.summaryOverride === summary,
      )
      if (match?.id) return match.id

      pageToken = page.nextPageToken ?? undefined
    } while (pageToken)

    throw new CalendarNotFoundError(this.name, summary)
  }

  private async requireCalendarId(): Promise<string> {
    await this.connect()
    if (!this.calendarId) {
      throw new BackendUnavailableError(this.name, 'Not connected')
    }
    return this.calendarId
  }

  private unavailable(message: string, err: unknown): BackendUnavailableError {
    const status = httpStatusOf(err)
    const suffix = status === 401 || status === 403 ? ' (re-run `calendar-sync authorize`)' : ''
    return new BackendUnavailableError(this.name, `${message}: ${describeError(err)}${suffix}`, { cause: err })
  }

  async fetch(window: TimeWindow): Promise<EventMap> {
    const calendarId = await this.requireCalendarId()
    const events = new EventMap()

    let pageToken: string | undefined
    do {
      let page: calendar_v3.Schema$Events
      try {
        page = await this.api.listEvents({
          calendarId,
          timeMin: formatInstant(window.floor),
          // timeMax is exclusive
          timeMax: formatInstant(window.ceiling.plus({ seconds: 1 })),
          singleEvents: true,
          maxResults: PAGE_SIZE,
          pageToken,
        })
      } catch (err) {
        throw this.unavailable('Failed to fetch events', err)
      }

      for (const item of page.items ?? []) {
        const event = googleEventToCanonical(item)
        if (event && isWithinWindow(event.start, window)) {
          events.set(event)
        }
      }

      pageToken = page.nextPageToken ?? undefined
    } while (pageToken)

    this.logger.debug({ backend: this.name, count: events.size }, 'Fetched events')
    return events
  }

  protected async insert(event: CanonicalEvent): Promise<string> {
    const calendarId = await this.requireCalendarId()

    const created = await this.api.insertEvent({
      calendarId,
      requestBody: canonicalToGoogleEvent(event),
    })

    if (!created.id) {
      throw new Error('Google Calendar returned an event without an id')
    }
    return created.id
  }
}

/**
 * Create a connected GoogleCalendarBackend from an authorized OAuth2 client
 */
export async function openGoogleBackend(
  config: GoogleBackendConfig,
  auth: Auth.OAuth2Client,
  options?: GoogleBackendOptions,
): Promise<GoogleCalendarBackend> {
  const backend = new GoogleCalendarBackend(config, createGoogleCalendarApi(auth), options)
  await backend.connect()
  return backend
}
