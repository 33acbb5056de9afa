/**
 * CalDAV Backend
 *
 * Side A of the sync: any CalDAV server (Yandex Calendar by default).
 * Uses tsdav for the protocol and ical-expander to expand recurring events
 * into the occurrences that fall inside the sync window.
 */

import { createDAVClient, type DAVCalendar } from 'tsdav'
import IcalExpander from 'ical-expander'
import { DateTime } from 'luxon'
import { randomUUID } from 'node:crypto'
import type { Logger } from 'pino'
import { BaseCalendarBackend } from './base.js'
import {
  EventMap,
  formatInstant,
  normalizeEvent,
  type CanonicalEvent,
} from '../sync/event.js'
import { isWithinWindow, type TimeWindow } from '../sync/window.js'
import { BackendUnavailableError, CalendarNotFoundError, describeError } from '../errors.js'

// Type for the DAV client returned by createDAVClient
type DAVClientInstance = Awaited<ReturnType<typeof createDAVClient>>

/** The part of the tsdav client this backend talks to */
export type CalDAVTransport = Pick<
  DAVClientInstance,
  'fetchCalendars' | 'fetchCalendarObjects' | 'createCalendarObject'
>

// Types for ical-expander results (not exported by the library)
interface ICalTime {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  isDate: boolean
  zone?: { tzid: string } | null
  toJSDate(): Date
}

interface ICalComponent {
  getFirstPropertyValue(name: string): unknown
}

interface ICalExpanderEvent {
  startDate: ICalTime
  endDate: ICalTime
  component: ICalComponent
}

interface ICalExpanderOccurrence {
  startDate: ICalTime
  endDate: ICalTime
  item: { component: ICalComponent }
}

interface ICalExpanderResult {
  events: ICalExpanderEvent[]
  occurrences: ICalExpanderOccurrence[]
}

export interface CalDAVBackendConfig {
  serverUrl: string
  /** Display name or URL segment of the calendar collection */
  calendar: string
}

export interface CalDAVCredentials {
  username: string
  password: string
}

export interface CalDAVBackendOptions {
  logger?: Logger
  /** Replaces the tsdav connection (used by tests) */
  createClient?: () => Promise<CalDAVTransport>
  /**
   * Upper bound on recurrence steps per object, counted from DTSTART.
   * 0 (default) walks every series up to the window ceiling.
   */
  maxIterations?: number
}

const BACKEND_NAME = 'caldav'
const DEFAULT_MAX_ITERATIONS = 0
const MAX_LINE_OCTETS = 75

/**
 * Calendar id as the last URL path segment
 */
function calendarIdFromUrl(url: string): string {
  const urlParts = url.replace(/\/$/, '').split('/')
  return urlParts[urlParts.length - 1] ?? url
}

function displayNameOf(calendar: DAVCalendar): string | undefined {
  // displayName can be string or object
  return typeof calendar.displayName === 'string' ? calendar.displayName : undefined
}

/**
 * Read an ical.js time as a UTC instant. Floating times and all-day dates
 * carry no zone and are taken as UTC.
 */
function icalTimeToUtc(time: ICalTime): DateTime {
  const zoneless = time.isDate || !time.zone || time.zone.tzid === 'floating'
  if (zoneless) {
    return DateTime.utc(
      time.year,
      time.month,
      time.day,
      time.isDate ? 0 : time.hour,
      time.isDate ? 0 : time.minute,
      time.isDate ? 0 : time.second,
    )
  }
  return DateTime.fromJSDate(time.toJSDate(), { zone: 'utc' })
}

function textProperty(component: ICalComponent, name: string): string | undefined {
  const value = component.getFirstPropertyValue(name)
  return typeof value === 'string' ? value : undefined
}

/**
 * Escape text for iCalendar format
 */
export function escapeICalText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r\n|\r|\n/g, '\\n')
}

/**
 * Fold a content line into chunks of at most 75 UTF-8 octets. Continuation
 * lines start with a space; multi-byte characters are never split.
 */
export function foldICalLine(line: string): string {
  const chunks: string[] = []
  let current = ''
  let octets = 0
  let limit = MAX_LINE_OCTETS

  for (const char of line) {
    const size = Buffer.byteLength(char, 'utf-8')
    if (octets + size > limit) {
      chunks.push(current)
      current = ''
      octets = 0
      // the leading space of a continuation line counts
      limit = MAX_LINE_OCTETS - 1
    }
    current += char
    octets += size
  }
  chunks.push(current)

  return chunks.join('\r\n ')
}

function toICalUtc(instant: DateTime): string {
  return instant.toUTC().toFormat("yyyyMMdd'T'HHmmss'Z'")
}

/**
 * Generate a single-VEVENT iCalendar document
 */
export function generateICalEvent(event: CanonicalEvent, uid: string, now: DateTime = DateTime.utc()): string {
  const lines: string[] = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'PRODID:-//calendar-sync//caldav-backend//EN',
    'BEGIN:VEVENT',
    `UID:${uid}`,
    `DTSTAMP:${toICalUtc(now)}`,
    `DTSTART:${toICalUtc(event.start)}`,
    `DTEND:${toICalUtc(event.end)}`,
    `SUMMARY:${escapeICalText(event.name)}`,
  ]

  if (event.description) {
    lines.push(`DESCRIPTION:${escapeICalText(event.description)}`)
  }

  lines.push('END:VEVENT', 'END:VCALENDAR')

  return lines.map(foldICalLine).join('\r\n')
}

/**
 * Parse one calendar object into canonical events, expanding recurrences
 * between the window bounds.
 */
export function parseICalEvents(icalData: string, window: TimeWindow, maxIterations = DEFAULT_MAX_ITERATIONS): CanonicalEvent[] {
  const expander = new IcalExpander({ ics: icalData, maxIterations })
  const expanded = expander.between(window.floor.toJSDate(), window.ceiling.toJSDate()) as ICalExpanderResult

  // startDate/endDate are prototype getters on ical.js objects, so no spreading
  const instances = [
    ...expanded.events.map((event) => ({
      startDate: event.startDate,
      endDate: event.endDate,
      component: event.component,
    })),
    ...expanded.occurrences.map((occurrence) => ({
      startDate: occurrence.startDate,
      endDate: occurrence.endDate,
      component: occurrence.item.component,
    })),
  ]

  return instances.map(({ startDate, endDate, component }) =>
    normalizeEvent({
      name: textProperty(component, 'summary'),
      description: textProperty(component, 'description'),
      start: icalTimeToUtc(startDate),
      end: icalTimeToUtc(endDate),
    }),
  )
}

export class CalDAVBackend extends BaseCalendarBackend {
  readonly name = BACKEND_NAME
  private client: CalDAVTransport | null = null
  private calendar: DAVCalendar | null = null
  private config: CalDAVBackendConfig
  private credentials: CalDAVCredentials
  private createClient: () => Promise<CalDAVTransport>
  private maxIterations: number

  constructor(config: CalDAVBackendConfig, credentials: CalDAVCredentials, options: CalDAVBackendOptions = {}) {
    super(options.logger)
    this.config = config
    this.credentials = credentials
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS
    this.createClient =
      options.createClient ??
      (() =>
        createDAVClient({
          serverUrl: this.config.serverUrl,
          credentials: {
            username: this.credentials.username,
            password: this.credentials.password,
          },
          authMethod: 'Basic',
          defaultAccountType: 'caldav',
        }))
  }

  /**
   * Connect and locate the configured calendar.
   *
   * @throws BackendUnavailableError when the server cannot be reached
   * @throws CalendarNotFoundError when no collection matches
   */
  async connect(): Promise<void> {
    if (this.calendar) return

    let calendars: DAVCalendar[]
    try {
      this.client = await this.createClient()
      calendars = await this.client.fetchCalendars()
    } catch (err) {
      this.client = null
      throw new BackendUnavailableError(
        this.name,
        `Could not connect to ${this.config.serverUrl}: ${describeError(err)}`,
        { cause: err },
      )
    }

    const wanted = this.config.calendar
    const calendar = calendars.find(
      (cal) => displayNameOf(cal) === wanted || calendarIdFromUrl(cal.url) === wanted,
    )
    if (!calendar) {
      throw new CalendarNotFoundError(this.name, wanted)
    }

    this.calendar = calendar
    this.logger.info({ backend: this.name, calendar: calendar.url }, `Using calendar '${wanted}'`)
  }

  private async requireConnection(): Promise<{ client: CalDAVTransport; calendar: DAVCalendar }> {
    await this.connect()
    if (!this.client || !this.calendar) {
      throw new BackendUnavailableError(this.name, 'Not connected')
    }
    return { client: this.client, calendar: this.calendar }
  }

  async fetch(window: TimeWindow): Promise<EventMap> {
    const { client, calendar } = await this.requireConnection()

    let objects: Awaited<ReturnType<CalDAVTransport['fetchCalendarObjects']>>
    try {
      objects = await client.fetchCalendarObjects({
        calendar,
        timeRange: {
          start: formatInstant(window.floor),
          // time-range end is exclusive on the server
          end: formatInstant(window.ceiling.plus({ seconds: 1 })),
        },
      })
    } catch (err) {
      throw new BackendUnavailableError(this.name, `Failed to fetch events: ${describeError(err)}`, {
        cause: err,
      })
    }

    const events = new EventMap()
    for (const obj of objects) {
      if (typeof obj.data !== 'string' || obj.data === '') continue

      let parsed: CanonicalEvent[]
      try {
        parsed = parseICalEvents(obj.data, window, this.maxIterations)
      } catch (err) {
        this.logger.warn({ backend: this.name, url: obj.url, err }, 'Skipping unparseable calendar object')
        continue
      }

      for (const event of parsed) {
        if (isWithinWindow(event.start, window)) {
          events.set(event)
        }
      }
    }

    this.logger.debug({ backend: this.name, count: events.size }, 'Fetched events')
    return events
  }

  protected async insert(event: CanonicalEvent): Promise<string> {
    const { client, calendar } = await this.requireConnection()

    const uid = randomUUID()
    const response = await client.createCalendarObject({
      calendar,
      filename: `${uid}.ics`,
      iCalString: generateICalEvent(event, uid),
    })

    if (!response.ok) {
      throw new Error(`CalDAV server responded ${response.status} ${response.statusText}`)
    }

    return uid
  }
}

/**
 * Create a connected CalDAVBackend
 */
export async function openCalDAVBackend(
  config: CalDAVBackendConfig,
  credentials: CalDAVCredentials,
  options?: CalDAVBackendOptions,
): Promise<CalDAVBackend> {
  const backend = new CalDAVBackend(config, credentials, options)
  await backend.connect()
  return backend
}
