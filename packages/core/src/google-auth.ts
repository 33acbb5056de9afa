/**
 * Google Credentials
 *
 * OAuth client secrets and the persisted user token. Owned by the CLI and
 * injected into the Google backend; the sync engine never touches them.
 */

import * as path from 'node:path'
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { google, type Auth } from 'googleapis'
import { z } from 'zod'
import type { Logger } from 'pino'
import { BackendUnavailableError, ConfigError, describeError } from './errors.js'
import { silentLogger } from './logger.js'

const DEFAULT_REDIRECT_URI = 'http://127.0.0.1'

const clientEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
})

const clientSecretsSchema = z.union([
  z.object({ installed: clientEntrySchema }),
  z.object({ web: clientEntrySchema }),
])

const storedTokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  scope: z.string().optional(),
  id_token: z.string().nullish(),
})

export type StoredToken = z.infer<typeof storedTokenSchema>

export interface ClientSecrets {
  clientId: string
  clientSecret: string
  redirectUri: string
}

/**
 * Read the OAuth client file downloaded from the Google Cloud console
 */
export function readClientSecrets(filePath: string): ClientSecrets {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Could not read Google client secrets at ${filePath}: ${describeError(err)}`)
  }

  const parsed = clientSecretsSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid Google client secrets at ${filePath}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }

  const entry = 'installed' in parsed.data ? parsed.data.installed : parsed.data.web
  return {
    clientId: entry.client_id,
    clientSecret: entry.client_secret,
    redirectUri: entry.redirect_uris?.[0] ?? DEFAULT_REDIRECT_URI,
  }
}

/**
 * JSON file holding the user's OAuth token
 */
export class GoogleTokenStore {
  readonly filePath: string

  constructor(filePath: string) {
    this.filePath = filePath
  }

  read(): StoredToken | null {
    let raw: string
    try {
      raw = readFileSync(this.filePath, 'utf-8')
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return null
      }
      throw new ConfigError(`Could not read Google token at ${this.filePath}: ${describeError(err)}`)
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (err) {
      throw new ConfigError(
        `Google token at ${this.filePath} is not valid JSON: ${describeError(err)}. ` +
          'Delete the file and run `calendar-sync authorize`.',
      )
    }

    const parsed = storedTokenSchema.safeParse(json)
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid Google token at ${this.filePath}`,
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      )
    }
    return parsed.data
  }

  /**
   * Merge into the stored token. Google sends the refresh token only on
   * the first exchange, so it is kept when an update omits it.
   */
  write(update: StoredToken): StoredToken {
    const dir = path.dirname(this.filePath)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }

    const existing: StoredToken = this.read() ?? {}
    const merged: StoredToken = { ...existing, ...update }
    if (!update.refresh_token && existing.refresh_token) {
      merged.refresh_token = existing.refresh_token
    }

    writeFileSync(this.filePath, JSON.stringify(merged, null, 2) + '\n', { encoding: 'utf-8', mode: 0o600 })
    return merged
  }
}

function newOAuthClient(secrets: ClientSecrets): Auth.OAuth2Client {
  return new google.auth.OAuth2(secrets.clientId, secrets.clientSecret, secrets.redirectUri)
}

/**
 * OAuth2 client loaded with the stored token. Refreshed tokens are written
 * back to the store.
 *
 * @throws BackendUnavailableError when no token has been stored yet
 */
export function createGoogleAuthClient(
  secrets: ClientSecrets,
  store: GoogleTokenStore,
  logger: Logger = silentLogger,
): Auth.OAuth2Client {
  const token = store.read()
  if (!token || (!token.refresh_token && !token.access_token)) {
    throw new BackendUnavailableError(
      'google',
      `No Google token at ${store.filePath}. Run \`calendar-sync authorize\` first.`,
    )
  }

  const client = newOAuthClient(secrets)
  client.setCredentials(token)

  client.on('tokens', (tokens: Auth.Credentials) => {
    try {
      store.write(tokens)
      logger.debug('Stored refreshed Google token')
    } catch (err) {
      logger.warn({ err }, 'Could not persist refreshed Google token')
    }
  })

  return client
}

export interface AuthorizeOptions {
  scopes: string[]
  /** Show the consent URL and return the code the user pastes back */
  promptForCode: (authUrl: string) => Promise<string>
}

/**
 * Run the consent flow and store the resulting token
 */
export async function authorizeInteractively(
  secrets: ClientSecrets,
  store: GoogleTokenStore,
  options: AuthorizeOptions,
): Promise<StoredToken> {
  const client = newOAuthClient(secrets)
  const authUrl = client.generateAuthUrl({
    access_type: 'offline',
    scope: options.scopes,
    // Force consent so a refresh token is issued
    prompt: 'consent',
  })

  const code = (await options.promptForCode(authUrl)).trim()
  if (!code) {
    throw new ConfigError('No authorization code entered')
  }

  const { tokens } = await client.getToken(code)
  return store.write(tokens)
}
