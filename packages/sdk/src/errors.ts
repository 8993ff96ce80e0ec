/**
 * FIWARE SDK Errors
 *
 * Every failure surfaced by the clients is a RemoteOperationError. Callers
 * pick the subclass they care about (e.g., NotFoundError as "does not exist")
 * and let the rest propagate.
 */

import type { HttpMethod } from './types.js'
import { isRecord } from './utils.js'

export type RemoteOperationErrorCode =
  | 'VALIDATION_FAILED'
  | 'UNREACHABLE'
  | 'TIMEOUT'
  | 'ABORTED'
  | 'CLIENT_ERROR'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'SERVER_ERROR'
  | 'UNEXPECTED_STATUS'

export interface RequestDetails {
  method?: HttpMethod
  path?: string
  status?: number
  /** Parsed JSON error body, or the raw text when it is not JSON */
  body?: unknown
  cause?: unknown
}

export class RemoteOperationError extends Error {
  readonly method?: HttpMethod
  readonly path?: string
  readonly status?: number
  readonly body?: unknown

  constructor(
    message: string,
    public readonly code: RemoteOperationErrorCode,
    details: RequestDetails = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause })
    this.name = 'RemoteOperationError'
    this.method = details.method
    this.path = details.path
    this.status = details.status
    this.body = details.body
  }
}

/**
 * Input failed a local invariant. Never reaches the network.
 */
export class ValidationError extends RemoteOperationError {
  constructor(
    message: string,
    public readonly issues: string[] = [message]
  ) {
    super(message, 'VALIDATION_FAILED')
    this.name = 'ValidationError'
  }
}

/**
 * No HTTP response was obtained (DNS, refused connection, timeout, abort).
 */
export class ConnectivityError extends RemoteOperationError {
  constructor(
    message: string,
    code: 'UNREACHABLE' | 'TIMEOUT' | 'ABORTED',
    details: RequestDetails = {}
  ) {
    super(message, code, details)
    this.name = 'ConnectivityError'
  }
}

export class ClientError extends RemoteOperationError {
  constructor(message: string, details: RequestDetails = {}) {
    super(message, 'CLIENT_ERROR', details)
    this.name = 'ClientError'
  }
}

export class NotFoundError extends RemoteOperationError {
  constructor(message: string, details: RequestDetails = {}) {
    super(message, 'NOT_FOUND', details)
    this.name = 'NotFoundError'
  }
}

/**
 * Duplicate resource (409, or 422 "Already Exists" from Orion)
 */
export class ConflictError extends RemoteOperationError {
  constructor(message: string, details: RequestDetails = {}) {
    super(message, 'CONFLICT', details)
    this.name = 'ConflictError'
  }
}

export class ServerError extends RemoteOperationError {
  constructor(message: string, details: RequestDetails = {}) {
    super(message, 'SERVER_ERROR', details)
    this.name = 'ServerError'
  }
}

export function isRemoteOperationError(error: unknown): error is RemoteOperationError {
  return error instanceof RemoteOperationError
}

/**
 * Translate a non-2xx status into the matching error kind
 */
export function errorFromStatus(
  status: number,
  details: Omit<RequestDetails, 'status'>
): RemoteOperationError {
  const reason = describeBody(details.body)
  const message = `${details.method ?? 'GET'} ${details.path ?? ''} failed with ${status}${reason ? `: ${reason}` : ''}`
  const withStatus = { ...details, status }

  if (status === 404) return new NotFoundError(message, withStatus)
  if (status === 409 || status === 422) return new ConflictError(message, withStatus)
  if (status >= 400 && status < 500) return new ClientError(message, withStatus)
  if (status >= 500 && status < 600) return new ServerError(message, withStatus)
  return new RemoteOperationError(message, 'UNEXPECTED_STATUS', withStatus)
}

/**
 * Pull a human-readable reason out of an IoT Agent ({ name, message })
 * or Orion ({ error, description }) error body
 */
function describeBody(body: unknown): string {
  if (typeof body === 'string') {
    return body.slice(0, 200)
  }
  if (!isRecord(body)) {
    return ''
  }

  const label = pickString(body, 'name') ?? pickString(body, 'error')
  const text = pickString(body, 'message') ?? pickString(body, 'description')
  return [label, text].filter(Boolean).join(' - ')
}

function pickString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key]
  return typeof value === 'string' && value.length > 0 ? value : undefined
}
