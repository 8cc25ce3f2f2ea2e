import { ValidationError } from '@shopfront/errors'

export type CatalogSource = 'http' | 'memory'

export interface ShopConfig {
  apiBaseUrl: string
  catalogSource: CatalogSource
  /** How long the "added to cart" confirmation stays up. */
  confirmationDismissMs: number
  /** 0 disables the timeout. */
  httpTimeoutMs: number
  debug: boolean
}

export type EnvRecord = Readonly<Record<string, unknown>>

export const DEFAULT_CONFIG: ShopConfig = {
  apiBaseUrl: 'http://localhost:3000/api',
  catalogSource: 'memory',
  confirmationDismissMs: 2000,
  httpTimeoutMs: 10_000,
  debug: false,
}

function readString(env: EnvRecord, key: string): string | undefined {
  const value = env[key]
  if (value === undefined || value === '') return undefined
  if (typeof value !== 'string') throw new ValidationError(key, 'expected a string')
  return value
}

function readMillis(env: EnvRecord, key: string, fallback: number): number {
  const raw = readString(env, key)
  if (raw === undefined) return fallback
  if (!/^\d+$/.test(raw.trim())) {
    throw new ValidationError(key, `expected a whole number of milliseconds, got "${raw}"`)
  }
  return Number(raw.trim())
}

function readSource(env: EnvRecord): CatalogSource {
  const raw = readString(env, 'VITE_CATALOG_SOURCE')
  if (raw === undefined) return DEFAULT_CONFIG.catalogSource
  if (raw === 'http' || raw === 'memory') return raw
  throw new ValidationError('VITE_CATALOG_SOURCE', `expected "http" or "memory", got "${raw}"`)
}

function readUrl(env: EnvRecord): string {
  const raw = readString(env, 'VITE_API_BASE_URL')
  if (raw === undefined) return DEFAULT_CONFIG.apiBaseUrl
  if (!/^https?:\/\/\S+$/i.test(raw) && !raw.startsWith('/')) {
    throw new ValidationError('VITE_API_BASE_URL', `expected an http(s) URL or an absolute path, got "${raw}"`)
  }
  return raw
}

/**
 * Builds the app config from a Vite env record. Missing keys take their
 * defaults; malformed ones throw ValidationError. The host calls this with
 * `import.meta.env`; the package itself never reads the environment.
 *
 * @example
 *   readConfig({ VITE_CATALOG_SOURCE: 'http', VITE_API_BASE_URL: '/api' })
 */
export function readConfig(env: EnvRecord): ShopConfig {
  return {
    apiBaseUrl: readUrl(env),
    catalogSource: readSource(env),
    confirmationDismissMs: readMillis(env, 'VITE_CONFIRMATION_MS', DEFAULT_CONFIG.confirmationDismissMs),
    httpTimeoutMs: readMillis(env, 'VITE_HTTP_TIMEOUT_MS', DEFAULT_CONFIG.httpTimeoutMs),
    debug: env.DEV === true,
  }
}
