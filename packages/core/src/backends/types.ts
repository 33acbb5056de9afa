/**
 * Calendar Backend Types
 *
 * The contract the reconciliation engine consumes. Provider protocol,
 * authentication and record schema stay behind it.
 */

import type { CanonicalEvent, EventMap } from '../sync/event.js'
import type { TimeWindow } from '../sync/window.js'

export type AppendOutcome =
  | {
      status: 'created'
      /** Backend-local id of the new record, unrelated to the identity key */
      id: string
    }
  | {
      status: 'skipped'
      reason: 'out-of-window'
    }

export interface CalendarBackend {
  /** Short label used in logs and reports (e.g. "caldav", "google") */
  readonly name: string

  /**
   * All events whose normalized start falls within the window, keyed by
   * identity.
   *
   * @throws BackendUnavailableError when the provider cannot be reached
   */
  fetch(window: TimeWindow): Promise<EventMap>

  /**
   * Create the event under a fresh backend id. Events starting outside the
   * window are not written and come back as skipped.
   *
   * @throws WriteFailureError when the provider rejects the write
   */
  append(event: CanonicalEvent, window: TimeWindow): Promise<AppendOutcome>
}
