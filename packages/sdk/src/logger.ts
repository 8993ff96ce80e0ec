import pino from 'pino'
import type { Logger } from 'pino'

/**
 * Shared SDK logger. Clients take their own logger through config and fall
 * back to this one.
 */
export const logger: Logger = pino({
  name: 'fiware-sdk',
  level: process.env.LOG_LEVEL || 'info',
})
