import { formatWindow } from './window.js'
import type { SyncReport } from './engine.js'

export interface SideNames {
  A: string
  B: string
}

/**
 * Plain-text summary of a sync run, one line per entry
 */
export function formatReport(report: SyncReport, names: SideNames): string[] {
  const lines: string[] = [
    `Window: ${formatWindow(report.window)}`,
    `Total events: ${report.totals.union}, ${names.A} events: ${report.totals.sideA}, ${names.B} events: ${report.totals.sideB}`,
    `Missing in ${names.A}: ${report.missingInA.length}`,
    ...report.missingInA.map((key) => `  ${key.toString()}`),
    `Missing in ${names.B}: ${report.missingInB.length}`,
    ...report.missingInB.map((key) => `  ${key.toString()}`),
  ]

  if (report.dryRun) {
    lines.push('Dry run: nothing written')
    return lines
  }

  lines.push(`Created in ${names.A}: ${report.created.A.length}, created in ${names.B}: ${report.created.B.length}`)

  for (const skip of report.skipped) {
    lines.push(`Skipped '${skip.name}' for ${names[skip.side]}: start ${skip.start} is out of range`)
  }
  for (const failure of report.failed) {
    lines.push(`Failed ${failure.key.toString()} on ${names[failure.side]}: ${failure.error}`)
  }

  return lines
}
