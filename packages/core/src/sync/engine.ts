/**
 * Reconciliation Engine
 *
 * Copies events missing on one backend from the other, inside the sync
 * window. Additions only: nothing is updated or deleted.
 *
 * Run order:
 *   1. fetch side A, then side B (a fetch failure aborts the run)
 *   2. union the two maps, side B winning on identity collisions
 *   3. missing sets = union keys minus each side's own keys
 *   4. append every missing-in-A event to A, then every missing-in-B to B
 */

import type { Logger } from 'pino'
import { EventMap, compareKeys, formatInstant, type IdentityKey } from './event.js'
import { formatWindow, type TimeWindow } from './window.js'
import type { CalendarBackend } from '../backends/types.js'
import { WriteFailureError, describeError } from '../errors.js'
import { silentLogger } from '../logger.js'

export type SyncSide = 'A' | 'B'

export interface SyncDelta {
  missingInA: IdentityKey[]
  missingInB: IdentityKey[]
}

export interface SkippedWrite {
  side: SyncSide
  key: IdentityKey
  name: string
  /** Computed UTC start, ISO-8601 */
  start: string
  reason: 'out-of-window'
}

export interface FailedWrite {
  side: SyncSide
  key: IdentityKey
  error: string
}

export interface SyncReport {
  window: TimeWindow
  dryRun: boolean
  totals: {
    union: number
    sideA: number
    sideB: number
  }
  missingInA: IdentityKey[]
  missingInB: IdentityKey[]
  created: Record<SyncSide, IdentityKey[]>
  skipped: SkippedWrite[]
  /** Only populated when continueOnWriteError is set */
  failed: FailedWrite[]
}

export interface SyncOptions {
  /** Compute and report the delta without writing */
  dryRun?: boolean
  /**
   * Record write failures in the report and keep going. Off by default:
   * the first failed write aborts the run.
   */
  continueOnWriteError?: boolean
}

/**
 * Union of two event maps. Every entry of `first` is inserted, then every
 * entry of `second`; on a shared key the record from `second` wins.
 */
export function mergeEventMaps(first: EventMap, second: EventMap): EventMap {
  const union = new EventMap()
  for (const event of first.events()) {
    union.set(event)
  }
  for (const event of second.events()) {
    union.set(event)
  }
  return union
}

export function computeDelta(mapA: EventMap, mapB: EventMap, union: EventMap): SyncDelta {
  const keys = union.keys().sort(compareKeys)
  return {
    missingInA: keys.filter((key) => !mapA.has(key)),
    missingInB: keys.filter((key) => !mapB.has(key)),
  }
}

export class CalendarSyncEngine {
  private sideA: CalendarBackend
  private sideB: CalendarBackend
  private logger: Logger

  /**
   * @param sideA - First backend; its records lose identity collisions
   * @param sideB - Second backend; its records win identity collisions
   */
  constructor(sideA: CalendarBackend, sideB: CalendarBackend, logger?: Logger) {
    this.sideA = sideA
    this.sideB = sideB
    this.logger = logger ?? silentLogger
  }

  async sync(window: TimeWindow, options: SyncOptions = {}): Promise<SyncReport> {
    const dryRun = options.dryRun ?? false
    this.logger.info({ window: formatWindow(window), dryRun }, 'Starting sync')

    const mapA = await this.sideA.fetch(window)
    const mapB = await this.sideB.fetch(window)

    const union = mergeEventMaps(mapA, mapB)
    const delta = computeDelta(mapA, mapB, union)

    this.logger.info(
      `Total events: ${union.size}, ${this.sideA.name} events: ${mapA.size}, ${this.sideB.name} events: ${mapB.size}`,
    )

    const report: SyncReport = {
      window,
      dryRun,
      totals: { union: union.size, sideA: mapA.size, sideB: mapB.size },
      missingInA: delta.missingInA,
      missingInB: delta.missingInB,
      created: { A: [], B: [] },
      skipped: [],
      failed: [],
    }

    await this.applySide('A', this.sideA, delta.missingInA, union, window, options, report)
    await this.applySide('B', this.sideB, delta.missingInB, union, window, options, report)

    this.logger.info(
      {
        createdA: report.created.A.length,
        createdB: report.created.B.length,
        skipped: report.skipped.length,
        failed: report.failed.length,
      },
      'Sync finished',
    )

    return report
  }

  private async applySide(
    side: SyncSide,
    target: CalendarBackend,
    missing: IdentityKey[],
    union: EventMap,
    window: TimeWindow,
    options: SyncOptions,
    report: SyncReport,
  ): Promise<void> {
    this.logger.info(
      { missing: missing.map((key) => key.toString()) },
      `Missing events in ${target.name}: ${missing.length}`,
    )

    if (options.dryRun) return

    for (const key of missing) {
      const event = union.get(key)
      if (!event) continue

      try {
        const outcome = await target.append(event, window)
        if (outcome.status === 'created') {
          report.created[side].push(key)
        } else {
          report.skipped.push({
            side,
            key,
            name: event.name,
            start: formatInstant(event.start),
            reason: outcome.reason,
          })
        }
      } catch (err) {
        if (!options.continueOnWriteError || !(err instanceof WriteFailureError)) {
          throw err
        }
        this.logger.error({ backend: target.name, key: key.toString(), err }, 'Write failed, continuing')
        report.failed.push({ side, key, error: describeError(err) })
      }
    }
  }
}
