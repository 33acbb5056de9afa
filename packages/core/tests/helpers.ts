/**
 * Shared test fixtures: an in-process backend and event builders.
 */

import { BaseCalendarBackend } from '../src/backends/base.js'
import { EventMap, normalizeEvent, type CanonicalEvent } from '../src/sync/event.js'
import { isWithinWindow, type TimeWindow } from '../src/sync/window.js'

export function makeEvent(
  name: string,
  start: string,
  options: { end?: string; description?: string } = {},
): CanonicalEvent {
  return normalizeEvent({
    name,
    start,
    end: options.end ?? start,
    description: options.description,
  })
}

export interface MemoryBackendOptions {
  /** Return stored events regardless of the window (default: false) */
  ignoreWindowOnFetch?: boolean
  /** Reject the remote write for matching events */
  failOn?: (event: CanonicalEvent) => boolean
  /** Receives "<name>:<event name>" on every insert */
  journal?: string[]
}

/**
 * Backend holding its events in an array. Writes are visible to the next
 * fetch, like a real provider.
 */
export class MemoryBackend extends BaseCalendarBackend {
  readonly name: string
  readonly stored: CanonicalEvent[]
  readonly inserted: CanonicalEvent[] = []
  fetchCount = 0
  private options: MemoryBackendOptions

  constructor(name: string, events: CanonicalEvent[] = [], options: MemoryBackendOptions = {}) {
    super()
    this.name = name
    this.stored = [...events]
    this.options = options
  }

  async fetch(window: TimeWindow): Promise<EventMap> {
    this.fetchCount++
    const visible = this.options.ignoreWindowOnFetch
      ? this.stored
      : this.stored.filter((event) => isWithinWindow(event.start, window))
    return EventMap.from(visible)
  }

  protected async insert(event: CanonicalEvent): Promise<string> {
    if (this.options.failOn?.(event)) {
      throw new Error('remote rejected the write')
    }
    this.options.journal?.push(`${this.name}:${event.name}`)
    this.stored.push(event)
    this.inserted.push(event)
    return `${this.name}-${this.stored.length}`
  }
}
