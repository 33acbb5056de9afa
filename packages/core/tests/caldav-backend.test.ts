/**
 * CalDAV Backend Tests
 *
 * Uses an in-process stand-in for the tsdav client; iCalendar parsing and
 * recurrence expansion run for real.
 */

import { describe, it, expect, vi, type Mock } from 'vitest'
import { DateTime } from 'luxon'
import type { DAVCalendar, DAVCalendarObject } from 'tsdav'
import {
  CalDAVBackend,
  escapeICalText,
  foldICalLine,
  generateICalEvent,
  openCalDAVBackend,
  parseICalEvents,
  type CalDAVTransport,
} from '../src/backends/caldav-backend.js'
import { formatInstant, identityKey } from '../src/sync/event.js'
import { computeWindow } from '../src/sync/window.js'
import {
  BackendUnavailableError,
  CalendarNotFoundError,
  WriteFailureError,
} from '../src/errors.js'
import { makeEvent } from './helpers.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

// 2024-02-23T00:00:00Z .. 2024-03-31T23:59:59.999Z
const window = computeWindow(new Date('2024-03-01T00:00:00Z'), 7, 30)

const CONFIG = { serverUrl: 'https://caldav.example.test', calendar: 'Work' }
const CREDENTIALS = { username: 'test-user', password: 'test-secret' }

const CALENDARS: DAVCalendar[] = [
  { url: 'https://caldav.example.test/calendars/test-user/personal/', displayName: 'Personal' },
  { url: 'https://caldav.example.test/calendars/test-user/work-1234/', displayName: 'Work' },
]

function ics(...vevent: string[]): string {
  return ['BEGIN:VCALENDAR', 'VERSION:2.0', 'PRODID:-//test//EN', 'BEGIN:VEVENT', ...vevent, 'END:VEVENT', 'END:VCALENDAR'].join(
    '\r\n',
  )
}

const MEETING = ics(
  'UID:evt-1',
  'DTSTAMP:20240301T000000Z',
  'DTSTART:20240301T100000Z',
  'DTEND:20240301T110000Z',
  'SUMMARY:Meeting',
  'DESCRIPTION:Quarterly review',
)

const FLOATING_LUNCH = ics(
  'UID:evt-2',
  'DTSTAMP:20240301T000000Z',
  'DTSTART:20240302T090000',
  'DTEND:20240302T100000',
  'SUMMARY:Lunch',
)

const ALL_DAY = ics(
  'UID:evt-3',
  'DTSTAMP:20240301T000000Z',
  'DTSTART;VALUE=DATE:20240305',
  'DTEND;VALUE=DATE:20240306',
  'SUMMARY:Holiday',
)

const DAILY_STANDUP = ics(
  'UID:evt-4',
  'DTSTAMP:20240301T000000Z',
  'DTSTART:20240301T080000Z',
  'DTEND:20240301T081500Z',
  'RRULE:FREQ=DAILY;COUNT=3',
  'SUMMARY:Standup',
)

const JANUARY = ics(
  'UID:evt-5',
  'DTSTAMP:20240101T000000Z',
  'DTSTART:20240110T100000Z',
  'DTEND:20240110T110000Z',
  'SUMMARY:Kickoff',
)

// Daily series started four years before the window
const MORNING_RUN = ics(
  'UID:evt-6',
  'DTSTAMP:20200101T000000Z',
  'DTSTART:20200101T080000Z',
  'DTEND:20200101T081500Z',
  'RRULE:FREQ=DAILY',
  'SUMMARY:Morning run',
)

interface FakeServer {
  transport: CalDAVTransport
  created: Array<{ calendarUrl: string; filename: string; iCalString: string }>
  fetchObjects: Mock<CalDAVTransport['fetchCalendarObjects']>
}

function fakeServer(objects: DAVCalendarObject[], options: { status?: number } = {}): FakeServer {
  const created: FakeServer['created'] = []
  const fetchObjects = vi.fn<CalDAVTransport['fetchCalendarObjects']>(async () => objects)

  const transport: CalDAVTransport = {
    fetchCalendars: async () => CALENDARS,
    fetchCalendarObjects: fetchObjects,
    createCalendarObject: async (params) => {
      created.push({ calendarUrl: params.calendar.url, filename: params.filename, iCalString: params.iCalString })
      return new Response(null, { status: options.status ?? 201 })
    },
  }

  return { transport, created, fetchObjects }
}

function openWith(server: FakeServer, calendar = 'Work'): Promise<CalDAVBackend> {
  return openCalDAVBackend({ ...CONFIG, calendar }, CREDENTIALS, { createClient: async () => server.transport })
}

// -------------------------------------------------------------------
// Connection
// -------------------------------------------------------------------

describe('CalDAVBackend.connect', () => {
  it('finds the calendar by display name', async () => {
    const server = fakeServer([])
    const backend = await openWith(server)

    await backend.fetch(window)

    expect(server.fetchObjects.mock.calls[0][0].calendar.url).toBe(
      'https://caldav.example.test/calendars/test-user/work-1234/',
    )
  })

  it('finds the calendar by URL segment', async () => {
    const server = fakeServer([])
    const backend = await openWith(server, 'personal')

    await backend.fetch(window)

    expect(server.fetchObjects.mock.calls[0][0].calendar.displayName).toBe('Personal')
  })

  it('fails with CalendarNotFoundError for an unknown calendar', async () => {
    await expect(openWith(fakeServer([]), 'Vacation')).rejects.toThrow(
      new CalendarNotFoundError('caldav', 'Vacation'),
    )
  })

  it('wraps connection failures as BackendUnavailableError', async () => {
    const open = openCalDAVBackend(CONFIG, CREDENTIALS, {
      createClient: async () => {
        throw new Error('getaddrinfo ENOTFOUND caldav.example.test')
      },
    })

    await expect(open).rejects.toBeInstanceOf(BackendUnavailableError)
    await expect(open).rejects.toThrow(
      '[caldav] Could not connect to https://caldav.example.test: getaddrinfo ENOTFOUND caldav.example.test',
    )
  })
})

// -------------------------------------------------------------------
// Fetch
// -------------------------------------------------------------------

describe('CalDAVBackend.fetch', () => {
  it('queries the server with the window as a time range', async () => {
    const server = fakeServer([])
    const backend = await openWith(server)

    await backend.fetch(window)

    expect(server.fetchObjects.mock.calls[0][0].timeRange).toEqual({
      start: '2024-02-23T00:00:00Z',
      end: '2024-04-01T00:00:00Z',
    })
  })

  it('normalizes events into identity keys', async () => {
    const backend = await openWith(
      fakeServer([
        { url: '/work/evt-1.ics', data: MEETING },
        { url: '/work/evt-2.ics', data: FLOATING_LUNCH },
        { url: '/work/evt-3.ics', data: ALL_DAY },
      ]),
    )

    const events = await backend.fetch(window)

    expect(events.keys().map(String).sort()).toEqual([
      'Holiday/2024-03-05T00:00:00Z',
      'Lunch/2024-03-02T09:00:00Z',
      'Meeting/2024-03-01T10:00:00Z',
    ])

    const meeting = events.get('Meeting/2024-03-01T10:00:00Z')
    expect(meeting?.description).toBe('Quarterly review')
    expect(meeting && formatInstant(meeting.end)).toBe('2024-03-01T11:00:00Z')
    expect(events.get('Lunch/2024-03-02T09:00:00Z')?.description).toBe('')
  })

  it('expands recurring events into occurrences', async () => {
    const backend = await openWith(fakeServer([{ url: '/work/evt-4.ics', data: DAILY_STANDUP }]))

    const events = await backend.fetch(window)

    expect(events.keys().map(String).sort()).toEqual([
      'Standup/2024-03-01T08:00:00Z',
      'Standup/2024-03-02T08:00:00Z',
      'Standup/2024-03-03T08:00:00Z',
    ])
  })

  it('expands series that started long before the window', async () => {
    const backend = await openWith(fakeServer([{ url: '/work/evt-6.ics', data: MORNING_RUN }]))

    const events = await backend.fetch(window)
    const keys = events.keys().map(String).sort()

    expect(keys).toHaveLength(38)
    expect(keys[0]).toBe('Morning run/2024-02-23T08:00:00Z')
    expect(keys[37]).toBe('Morning run/2024-03-31T08:00:00Z')
  })

  it('drops events starting outside the window', async () => {
    const backend = await openWith(
      fakeServer([
        { url: '/work/evt-5.ics', data: JANUARY },
        { url: '/work/evt-1.ics', data: MEETING },
      ]),
    )

    const events = await backend.fetch(window)

    expect(events.keys().map(String)).toEqual(['Meeting/2024-03-01T10:00:00Z'])
  })

  it('skips objects that are not valid iCalendar', async () => {
    const backend = await openWith(
      fakeServer([
        { url: '/work/broken.ics', data: 'this is not ical' },
        { url: '/work/empty.ics' },
        { url: '/work/evt-1.ics', data: MEETING },
      ]),
    )

    const events = await backend.fetch(window)

    expect(events.size).toBe(1)
  })

  it('wraps fetch failures as BackendUnavailableError', async () => {
    const server = fakeServer([])
    server.fetchObjects.mockRejectedValueOnce(new Error('socket hang up'))
    const backend = await openWith(server)

    await expect(backend.fetch(window)).rejects.toThrow('[caldav] Failed to fetch events: socket hang up')
  })
})

// -------------------------------------------------------------------
// Append
// -------------------------------------------------------------------

describe('CalDAVBackend.append', () => {
  it('creates a new object under a fresh UID', async () => {
    const server = fakeServer([])
    const backend = await openWith(server)
    const event = makeEvent('Meeting', '2024-03-01T10:00:00Z', { end: '2024-03-01T11:00:00Z' })

    const outcome = await backend.append(event, window)

    expect(outcome.status).toBe('created')
    expect(server.created).toHaveLength(1)

    const [object] = server.created
    const id = outcome.status === 'created' ? outcome.id : ''
    expect(object.filename).toBe(`${id}.ics`)
    expect(object.calendarUrl).toBe('https://caldav.example.test/calendars/test-user/work-1234/')
    expect(object.iCalString.split('\r\n')).toContain(`UID:${id}`)
    expect(object.iCalString.split('\r\n')).toContain('DTSTART:20240301T100000Z')
    expect(object.iCalString.split('\r\n')).toContain('SUMMARY:Meeting')
  })

  it('gives every append its own UID', async () => {
    const server = fakeServer([])
    const backend = await openWith(server)
    const event = makeEvent('Meeting', '2024-03-01T10:00:00Z')

    await backend.append(event, window)
    await backend.append(event, window)

    expect(server.created[0].filename).not.toBe(server.created[1].filename)
  })

  it('skips events outside the window without writing', async () => {
    const server = fakeServer([])
    const backend = await openWith(server)

    const outcome = await backend.append(makeEvent('Kickoff', '2024-01-10T10:00:00Z'), window)

    expect(outcome).toEqual({ status: 'skipped', reason: 'out-of-window' })
    expect(server.created).toEqual([])
  })

  it('raises WriteFailureError when the server rejects the object', async () => {
    const backend = await openWith(fakeServer([], { status: 403 }))

    const append = backend.append(makeEvent('Meeting', '2024-03-01T10:00:00Z'), window)

    await expect(append).rejects.toBeInstanceOf(WriteFailureError)
    await expect(append).rejects.toThrow(
      '[caldav] Failed to create event Meeting/2024-03-01T10:00:00Z: CalDAV server responded 403',
    )
  })
})

// -------------------------------------------------------------------
// iCalendar helpers
// -------------------------------------------------------------------

describe('generateICalEvent', () => {
  it('writes a single UTC VEVENT', () => {
    const event = makeEvent('Planning, Q2', '2024-03-01T10:00:00+01:00', {
      end: '2024-03-01T11:30:00+01:00',
      description: 'Line one\nLine two',
    })

    const output = generateICalEvent(event, 'uid-1', DateTime.utc(2024, 2, 20, 12, 0, 0))

    expect(output).toBe(
      [
        'BEGIN:VCALENDAR',
        'VERSION:2.0',
        'PRODID:-//calendar-sync//caldav-backend//EN',
        'BEGIN:VEVENT',
        'UID:uid-1',
        'DTSTAMP:20240220T120000Z',
        'DTSTART:20240301T090000Z',
        'DTEND:20240301T103000Z',
        'SUMMARY:Planning\\, Q2',
        'DESCRIPTION:Line one\\nLine two',
        'END:VEVENT',
        'END:VCALENDAR',
      ].join('\r\n'),
    )
  })

  it('omits an empty description', () => {
    const output = generateICalEvent(makeEvent('Call', '2024-03-01T10:00:00Z'), 'uid-2')
    expect(output).not.toContain('DESCRIPTION')
  })

  it('reads back to the same identity', () => {
    const event = makeEvent('Review; final', '2024-03-04T15:00:00Z', { description: 'a\\b' })

    const [parsed] = parseICalEvents(generateICalEvent(event, 'uid-3'), window)

    expect(identityKey(parsed).toString()).toBe('Review; final/2024-03-04T15:00:00Z')
    expect(parsed.description).toBe('a\\b')
  })
})

describe('parseICalEvents', () => {
  it('walks the whole series by default', () => {
    expect(parseICalEvents(MORNING_RUN, window)).toHaveLength(38)
  })

  it('stops expanding at an explicit iteration cap', () => {
    expect(parseICalEvents(MORNING_RUN, window, 10)).toEqual([])
  })
})

describe('foldICalLine', () => {
  it('leaves short lines alone', () => {
    expect(foldICalLine('SUMMARY:Meeting')).toBe('SUMMARY:Meeting')
  })

  it('folds at 75 octets with a leading space on continuations', () => {
    expect(foldICalLine('SUMMARY:' + 'a'.repeat(100))).toBe('SUMMARY:' + 'a'.repeat(67) + '\r\n ' + 'a'.repeat(33))
  })

  it('never splits a multi-byte character', () => {
    expect(foldICalLine('X'.repeat(74) + '\u00e9')).toBe('X'.repeat(74) + '\r\n \u00e9')
  })

  it('keeps long descriptions readable after folding', () => {
    const description = 'Join: https://meet.example.test/' + 'x'.repeat(200) + ' caf\u00e9'
    const event = makeEvent('Standup', '2024-03-04T09:00:00Z', { description })

    const output = generateICalEvent(event, 'uid-4')

    for (const line of output.split('\r\n')) {
      expect(Buffer.byteLength(line, 'utf-8')).toBeLessThanOrEqual(75)
    }
    expect(parseICalEvents(output, window)[0].description).toBe(description)
  })
})

describe('escapeICalText', () => {
  it('escapes backslashes, separators and newlines', () => {
    expect(escapeICalText('a,b;c\\d\r\ne')).toBe('a\\,b\\;c\\\\d\\ne')
  })

  it('escapes a lone carriage return as a newline', () => {
    expect(escapeICalText('a\rb')).toBe('a\\nb')
  })
})
