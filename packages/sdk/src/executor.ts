/**
 * FIWARE Request Executor
 *
 * Issues one HTTP request per call against a configured base URL, with the
 * tenant headers on every request, and turns the outcome into an
 * ExecuteResult or a RemoteOperationError.
 */

import type { Logger } from 'pino'
import type {
  ClientConfig,
  ExecuteOptions,
  ExecuteResult,
  HttpMethod,
} from './types.js'
import {
  ConnectivityError,
  RemoteOperationError,
  ValidationError,
  errorFromStatus,
  isRemoteOperationError,
} from './errors.js'
import { logger as defaultLogger } from './logger.js'
import { buildUrl, trimTrailingSlash, validateConnection } from './utils.js'

export class RequestExecutor {
  private readonly baseUrl: string
  private readonly headers: Readonly<Record<string, string>>
  private readonly timeoutMs: number
  private readonly fetchImpl: typeof fetch
  private readonly logger: Logger

  constructor(config: ClientConfig) {
    const errors = validateConnection(config)
    if (errors.length > 0) {
      throw new ValidationError(`Invalid configuration: ${errors.join(', ')}`, errors)
    }

    this.baseUrl = trimTrailingSlash(config.baseUrl)
    this.headers = Object.freeze({
      'fiware-service': config.service,
      'fiware-servicepath': config.servicePath,
      'Accept': 'application/json',
    })
    this.timeoutMs = Math.round(config.timeout * 1000)
    this.fetchImpl = config.fetch ?? fetch
    this.logger = config.logger ?? defaultLogger
  }

  /**
   * Send a request and interpret the response
   *
   * @param path - Path relative to the base URL
   * @throws ConnectivityError when no response was obtained
   * @throws NotFoundError, ConflictError, ClientError or ServerError on non-2xx
   */
  async execute(
    method: HttpMethod,
    path: string,
    options: ExecuteOptions = {}
  ): Promise<ExecuteResult> {
    const url = buildUrl(this.baseUrl, path, options.query)
    const headers: Record<string, string> = { ...this.headers }
    let body: string | undefined

    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json'
      body = JSON.stringify(options.body)
    }

    const controller = new AbortController()
    let timedOut = false
    const timeoutId = this.timeoutMs > 0
      ? setTimeout(() => {
        timedOut = true
        controller.abort()
      }, this.timeoutMs)
      : undefined
    const onCallerAbort = () => controller.abort()
    options.signal?.addEventListener('abort', onCallerAbort, { once: true })

    this.logger.debug({ method, url }, 'fiware request')

    try {
      if (options.signal?.aborted) {
        controller.abort()
      }

      const response = await this.fetchImpl(url, {
        method,
        headers,
        body,
        signal: controller.signal,
      })
      const text = await response.text()

      this.logger.debug({ method, url, status: response.status }, 'fiware response')

      if (!response.ok) {
        throw errorFromStatus(response.status, {
          method,
          path,
          body: parseErrorBody(text),
        })
      }

      return interpretSuccess(response, text)
    } catch (error) {
      if (isRemoteOperationError(error)) {
        throw error
      }

      const details = { method, path, cause: error }

      if (timedOut) {
        throw new ConnectivityError(
          `${method} ${path} timed out after ${this.timeoutMs}ms`,
          'TIMEOUT',
          details
        )
      }

      if (controller.signal.aborted) {
        throw new ConnectivityError(`${method} ${path} was aborted`, 'ABORTED', details)
      }

      throw new ConnectivityError(
        `Failed to reach ${this.baseUrl}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        'UNREACHABLE',
        details
      )
    } finally {
      clearTimeout(timeoutId)
      options.signal?.removeEventListener('abort', onCallerAbort)
    }
  }

  /**
   * GET a health endpoint. Resolves true only on a 2xx answer and never throws.
   */
  async checkStatus(healthPath: string): Promise<boolean> {
    try {
      await this.execute('GET', healthPath)
      return true
    } catch (error) {
      this.logger.warn(
        { err: error, url: `${this.baseUrl}${healthPath}` },
        'fiware status check failed'
      )
      return false
    }
  }
}

/**
 * Extract the JSON payload of a successful response
 */
export function requireJson(result: ExecuteResult, method: HttpMethod, path: string): unknown {
  if (result.kind !== 'json') {
    throw new RemoteOperationError(
      `${method} ${path} answered ${result.status} without a JSON body`,
      'UNEXPECTED_STATUS',
      { method, path, status: result.status }
    )
  }
  return result.data
}

/**
 * Parse one record of a response. A record the model rejects is the remote
 * side's fault, so it surfaces as UNEXPECTED_STATUS with the request details
 * rather than as a ValidationError.
 */
export function parseResponseRecord<T>(
  parse: (raw: unknown) => T,
  raw: unknown,
  request: { method: HttpMethod; path: string; status: number }
): T {
  try {
    return parse(raw)
  } catch (error) {
    if (!(error instanceof ValidationError)) {
      throw error
    }
    throw new RemoteOperationError(
      `${request.method} ${request.path} answered ${request.status} with an unreadable record: ${error.message}`,
      'UNEXPECTED_STATUS',
      { ...request, body: raw, cause: error }
    )
  }
}

function interpretSuccess(response: Response, text: string): ExecuteResult {
  const { status, headers } = response

  if (text.trim().length === 0) {
    return { kind: 'empty', status, headers }
  }

  const contentType = headers.get('content-type') ?? ''
  if (/[/+]json\b/i.test(contentType)) {
    const data = parseJson(text)
    if (data !== undefined) {
      return { kind: 'json', status, headers, data }
    }
  }

  return { kind: 'text', status, headers, text }
}

function parseErrorBody(text: string): unknown {
  if (text.length === 0) {
    return undefined
  }
  return parseJson(text) ?? text
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}
