import { pino, type DestinationStream, type Logger, type LevelWithSilent } from 'pino'

export type { Logger }

export interface LoggerOptions {
  level?: LevelWithSilent
  /** Human-readable output through pino-pretty (default: stderr is a TTY) */
  pretty?: boolean
  /** JSON output stream (default: stderr). stdout carries the CLI report. */
  destination?: DestinationStream
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info'
  const pretty = options.pretty ?? process.stderr.isTTY === true

  if (!pretty) {
    return pino({ level, base: undefined }, options.destination ?? process.stderr)
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination: 2,
      },
    },
  })
}

/** Default for components constructed without a logger */
export const silentLogger: Logger = pino({ level: 'silent' })
