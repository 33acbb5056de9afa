/**
 * Canonical Event Model
 *
 * Provider-independent event record and the identity rule used to decide
 * whether two records on different backends are the same event.
 *
 * Identity is (name, start) only. Provider ids, end and description never
 * participate, so two distinct events sharing a title and start instant
 * collapse into one.
 */

import { DateTime } from 'luxon'
import { InvalidEventError } from '../errors.js'

export interface CanonicalEvent {
  /** Display title */
  name: string

  /** Free text, empty when the provider has none */
  description: string

  /** UTC, second precision */
  start: DateTime

  /** UTC, second precision. Not checked against start. */
  end: DateTime
}

/** Instants as providers hand them over */
export type RawInstant = Date | string | DateTime

export interface RawEvent {
  start: RawInstant
  end: RawInstant
  name?: string | null
  description?: string | null
}

const INSTANT_FORMAT = "yyyy-MM-dd'T'HH:mm:ss'Z'"
const UNTITLED = 'Untitled'

/**
 * ISO-8601 form used in identity keys and provider payloads
 */
export function formatInstant(instant: DateTime): string {
  return instant.toUTC().toFormat(INSTANT_FORMAT)
}

/**
 * Convert a raw instant to UTC at second precision.
 * Strings without an offset are read as UTC, never as local time.
 */
export function normalizeInstant(value: RawInstant, field = 'instant'): DateTime {
  let parsed: DateTime
  if (value instanceof Date) {
    parsed = DateTime.fromJSDate(value, { zone: 'utc' })
  } else if (typeof value === 'string') {
    parsed = DateTime.fromISO(value.trim(), { zone: 'utc' })
  } else {
    parsed = value
  }

  if (!parsed.isValid) {
    throw new InvalidEventError(`Invalid ${field}: ${String(value)}`)
  }

  return parsed.toUTC().startOf('second')
}

function normalizeText(value: string | null | undefined): string {
  return (value ?? '').normalize('NFC')
}

export function normalizeEvent(raw: RawEvent): CanonicalEvent {
  const name = normalizeText(raw.name)

  return {
    name: name.trim() === '' ? UNTITLED : name,
    description: normalizeText(raw.description),
    start: normalizeInstant(raw.start, 'start'),
    end: normalizeInstant(raw.end, 'end'),
  }
}

/**
 * Value type for (name, UTC start). Equality goes through the string form,
 * which is injective because the start part has a fixed width.
 */
export class IdentityKey {
  readonly name: string
  readonly start: DateTime
  private readonly text: string

  constructor(name: string, start: DateTime) {
    this.name = name
    this.start = start.toUTC().startOf('second')
    this.text = `${name}/${formatInstant(this.start)}`
  }

  equals(other: IdentityKey): boolean {
    return this.text === other.text
  }

  /** Chronological, then by name */
  compare(other: IdentityKey): number {
    const diff = this.start.toMillis() - other.start.toMillis()
    if (diff !== 0) return diff < 0 ? -1 : 1
    if (this.name === other.name) return 0
    return this.name < other.name ? -1 : 1
  }

  toString(): string {
    return this.text
  }

  toJSON(): string {
    return this.text
  }
}

export function identityKey(event: CanonicalEvent): IdentityKey {
  return new IdentityKey(event.name, event.start)
}

export function compareKeys(a: IdentityKey, b: IdentityKey): number {
  return a.compare(b)
}

interface EventMapEntry {
  key: IdentityKey
  event: CanonicalEvent
}

/**
 * Events of one backend keyed by identity. Insertion-ordered; a second
 * insert under an existing key replaces the record.
 */
export class EventMap implements Iterable<[IdentityKey, CanonicalEvent]> {
  private entries = new Map<string, EventMapEntry>()

  static from(events: Iterable<CanonicalEvent>): EventMap {
    const map = new EventMap()
    for (const event of events) {
      map.set(event)
    }
    return map
  }

  set(event: CanonicalEvent): IdentityKey {
    const key = identityKey(event)
    this.entries.set(key.toString(), { key, event })
    return key
  }

  get(key: IdentityKey | string): CanonicalEvent | undefined {
    return this.entries.get(key.toString())?.event
  }

  has(key: IdentityKey | string): boolean {
    return this.entries.has(key.toString())
  }

  get size(): number {
    return this.entries.size
  }

  keys(): IdentityKey[] {
    return Array.from(this.entries.values(), (entry) => entry.key)
  }

  events(): CanonicalEvent[] {
    return Array.from(this.entries.values(), (entry) => entry.event)
  }

  *[Symbol.iterator](): Iterator<[IdentityKey, CanonicalEvent]> {
    for (const { key, event } of this.entries.values()) {
      yield [key, event]
    }
  }
}
