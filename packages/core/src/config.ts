import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { ConfigError, describeError } from './errors.js'

export const CONFIG_DIRNAME = '.calendar-sync'
const CONFIG_FILENAME = 'config.yaml'

const DEFAULT_CALDAV_URL = 'https://caldav.yandex.ru'
const DEFAULT_GOOGLE_SCOPES = ['https://www.googleapis.com/auth/calendar']

const dayCount = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback)

const configSchema = z.object({
  // Account fields are enforced at sync time by requireCalDAVAccount
  caldav: z
    .object({
      serverUrl: z.string().url().default(DEFAULT_CALDAV_URL),
      username: z.string().min(1).optional(),
      password: z.string().min(1).optional(),
      calendar: z.string().min(1).optional(),
    })
    .default({}),
  google: z
    .object({
      calendar: z.string().min(1).default('primary'),
      credentialsFile: z.string().min(1).default('credentials.json'),
      tokenFile: z.string().min(1).default('google-token.json'),
      scopes: z.array(z.string().min(1)).min(1).default(DEFAULT_GOOGLE_SCOPES),
    })
    .default({}),
  window: z
    .object({
      pastDays: dayCount(7),
      futureDays: dayCount(30),
    })
    .default({}),
  sync: z
    .object({
      continueOnWriteError: z.boolean().default(false),
    })
    .default({}),
  log: z
    .object({
      level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    })
    .default({}),
})

export type SyncConfig = z.infer<typeof configSchema> & {
  /** Directory config.yaml was read from; relative paths resolve against it */
  configDir: string
}

export interface CalDAVAccount {
  serverUrl: string
  username: string
  password: string
  calendar: string
}

type YamlSection = Record<string, unknown>

/**
 * Walk up from cwd looking for an existing .calendar-sync/ directory.
 * Falls back to ./.calendar-sync
 */
export function findConfigDir(startDir: string = process.cwd()): string {
  let dir = startDir
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, CONFIG_DIRNAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  return path.resolve(startDir, CONFIG_DIRNAME)
}

function loadYamlConfig(configDir: string): Record<string, YamlSection> {
  const configPath = path.join(configDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return {}
  }

  let parsed: unknown
  try {
    parsed = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Could not parse ${configPath}: ${describeError(err)}`)
  }

  if (parsed === null || parsed === undefined) return {}
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`${configPath} must contain a mapping at the top level`)
  }

  const sections: Record<string, YamlSection> = {}
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      sections[key] = Object.fromEntries(Object.entries(value))
    } else {
      throw new ConfigError(`${configPath}: '${key}' must be a mapping`)
    }
  }
  return sections
}

/**
 * Set `section.key` from an env var when the var is present
 */
function override(
  sections: Record<string, YamlSection>,
  section: string,
  key: string,
  value: string | undefined,
): void {
  if (value === undefined || value === '') return
  sections[section] = { ...(sections[section] ?? {}), [key]: value }
}

export interface LoadConfigOptions {
  configDir?: string
  env?: NodeJS.ProcessEnv
}

/**
 * Load config.yaml, apply CALSYNC_* environment overrides and validate.
 *
 * @throws ConfigError listing every invalid or missing setting
 */
export function loadConfig(options: LoadConfigOptions = {}): SyncConfig {
  const env = options.env ?? process.env
  const configDir = path.resolve(options.configDir ?? env.CALSYNC_DIR ?? findConfigDir())
  const sections = loadYamlConfig(configDir)

  override(sections, 'caldav', 'serverUrl', env.CALSYNC_CALDAV_URL)
  override(sections, 'caldav', 'username', env.CALSYNC_CALDAV_USERNAME)
  override(sections, 'caldav', 'password', env.CALSYNC_CALDAV_PASSWORD)
  override(sections, 'caldav', 'calendar', env.CALSYNC_CALDAV_CALENDAR)
  override(sections, 'google', 'calendar', env.CALSYNC_GOOGLE_CALENDAR)
  override(sections, 'window', 'pastDays', env.CALSYNC_PAST_DAYS)
  override(sections, 'window', 'futureDays', env.CALSYNC_FUTURE_DAYS)
  override(sections, 'log', 'level', env.CALSYNC_LOG_LEVEL)

  const result = configSchema.safeParse(sections)
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration (${path.join(configDir, CONFIG_FILENAME)})`,
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }

  const config = result.data
  return {
    ...config,
    google: {
      ...config.google,
      credentialsFile: path.resolve(configDir, config.google.credentialsFile),
      tokenFile: path.resolve(configDir, config.google.tokenFile),
    },
    configDir,
  }
}

/**
 * The CalDAV account a sync run needs.
 *
 * @throws ConfigError naming every missing field
 */
export function requireCalDAVAccount(config: SyncConfig): CalDAVAccount {
  const { serverUrl, username, password, calendar } = config.caldav
  if (username && password && calendar) {
    return { serverUrl, username, password, calendar }
  }

  const missing = Object.entries({ username, password, calendar })
    .filter(([, value]) => !value)
    .map(([key]) => `caldav.${key}: Required`)
  throw new ConfigError(`Incomplete CalDAV account (${path.join(config.configDir, CONFIG_FILENAME)})`, missing)
}
