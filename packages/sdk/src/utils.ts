/**
 * FIWARE SDK Utilities
 */

import type { QueryValue, SdkConfig } from './types.js'

export const DEFAULT_IOT_AGENT_URL = 'http://localhost:4061'
export const DEFAULT_ORION_URL = 'http://localhost:1026'
export const DEFAULT_SERVICE = 'openiot'
export const DEFAULT_SERVICE_PATH = '/'
export const DEFAULT_TIMEOUT_SECONDS = 5

/** Largest delay setTimeout honours (2^31 - 1 ms); longer ones fire at once */
export const MAX_TIMEOUT_SECONDS = 2147483

/**
 * Join a base URL, a path and query parameters into a request URL
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  query: Record<string, QueryValue> = {}
): string {
  const params = new URLSearchParams()
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.append(key, String(value))
    }
  }

  const search = params.toString()
  const normalizedPath = path.startsWith('/') ? path : `/${path}`
  return `${trimTrailingSlash(baseUrl)}${normalizedPath}${search ? `?${search}` : ''}`
}

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '')
}

/**
 * Encode a single path segment (device ids and entity ids may carry ':')
 */
export function segment(value: string): string {
  return encodeURIComponent(value)
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validate the connection settings shared by both clients
 */
export function validateConnection(config: {
  baseUrl?: string
  service?: string
  servicePath?: string
  timeout?: number
}, label = 'baseUrl'): string[] {
  const errors: string[] = []

  if (!config.baseUrl) {
    errors.push(`${label} is required`)
  } else if (!isValidUrl(config.baseUrl)) {
    errors.push(`${label} must be a valid URL`)
  }

  if (!config.service) {
    errors.push('service is required')
  }

  if (!config.servicePath) {
    errors.push('servicePath is required')
  } else if (!config.servicePath.startsWith('/')) {
    errors.push('servicePath must start with "/"')
  }

  if (config.timeout === undefined) {
    errors.push('timeout is required')
  } else if (!Number.isFinite(config.timeout) || config.timeout < 0) {
    errors.push('timeout must be a non-negative number of seconds')
  } else if (config.timeout > MAX_TIMEOUT_SECONDS) {
    errors.push(`timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds`)
  }

  return errors
}

/**
 * Validate FIWARE SDK configuration
 */
export function validateConfig(config: Partial<SdkConfig>): string[] {
  const shared = {
    service: config.service,
    servicePath: config.servicePath,
    timeout: config.timeout,
  }

  const errors = [
    ...validateConnection({ ...shared, baseUrl: config.iotAgentUrl }, 'iotAgentUrl'),
    ...validateConnection({ ...shared, baseUrl: config.orionUrl }, 'orionUrl')
      .filter(error => error.startsWith('orionUrl')),
  ]

  return errors
}

/**
 * Read SDK configuration from environment variables
 *
 * Reads:
 * - IOTA_URL (default http://localhost:4061)
 * - ORION_URL (default http://localhost:1026)
 * - FIWARE_SERVICE (default openiot)
 * - FIWARE_SERVICEPATH (default /)
 * - TIMEOUT in seconds (default 5)
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SdkConfig {
  return {
    iotAgentUrl: env.IOTA_URL || DEFAULT_IOT_AGENT_URL,
    orionUrl: env.ORION_URL || DEFAULT_ORION_URL,
    service: env.FIWARE_SERVICE || DEFAULT_SERVICE,
    servicePath: env.FIWARE_SERVICEPATH || DEFAULT_SERVICE_PATH,
    timeout: env.TIMEOUT ? Number(env.TIMEOUT) : DEFAULT_TIMEOUT_SECONDS,
  }
}

/**
 * Check if string is valid URL
 */
export function isValidUrl(str: string): boolean {
  try {
    const url = new URL(str)
    return url.protocol === 'http:' || url.protocol === 'https:'
  } catch {
    return false
  }
}
