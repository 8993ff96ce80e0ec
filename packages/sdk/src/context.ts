/**
 * FIWARE Context Client
 *
 * Entity and subscription operations against the Orion Context Broker
 * (NGSIv2). Reads always reflect the broker at call time.
 */

import type { Logger } from 'pino'
import type {
  AttributeUpdate,
  ClientConfig,
  Entity,
  EntityQuery,
  ExecuteResult,
  Subscription,
} from './types.js'
import { RemoteOperationError } from './errors.js'
import { RequestExecutor, parseResponseRecord, requireJson } from './executor.js'
import { logger as defaultLogger } from './logger.js'
import {
  attributeUpdatesToWire,
  entityFromWire,
  identifier,
  subscriptionFromWire,
  subscriptionToWire,
  subscription as validateSubscription,
} from './models.js'
import { segment } from './utils.js'

export const ORION_PATH_PREFIX = '/v2'
export const ORION_HEALTH_PATH = '/version'

export class ContextClient {
  private readonly executor: RequestExecutor
  private readonly prefix: string
  private readonly logger: Logger

  constructor(config: ClientConfig) {
    this.executor = new RequestExecutor(config)
    this.prefix = config.pathPrefix ?? ORION_PATH_PREFIX
    this.logger = config.logger ?? defaultLogger
  }

  /**
   * Check whether Orion answers its version endpoint
   */
  async checkStatus(): Promise<boolean> {
    return this.executor.checkStatus(ORION_HEALTH_PATH)
  }

  // ============= Entities =============

  /**
   * List entities, optionally filtered. No match is an empty list, not an error.
   *
   * @example
   * ```typescript
   * const lamps = await orion.listEntities({ type: 'Lamp', idPattern: '^urn:ngsi-ld:Lamp:' })
   * ```
   */
  async listEntities(query: EntityQuery = {}): Promise<Entity[]> {
    const path = `${this.prefix}/entities`
    const result = await this.executor.execute('GET', path, {
      query: {
        type: query.type,
        id: query.id,
        idPattern: query.idPattern,
        limit: query.limit,
      },
    })
    return listBody(result, path)
      .map(raw => parseResponseRecord(entityFromWire, raw, { method: 'GET', path, status: result.status }))
  }

  /**
   * @throws NotFoundError when the entity does not exist
   */
  async getEntity(entityId: string): Promise<Entity> {
    const path = this.entityPath(entityId)
    const result = await this.executor.execute('GET', path)
    return parseResponseRecord(entityFromWire, requireJson(result, 'GET', path), {
      method: 'GET',
      path,
      status: result.status,
    })
  }

  /**
   * Patch existing attributes of an entity
   *
   * @throws NotFoundError when the entity does not exist
   * @throws ClientError when Orion rejects an attribute payload
   */
  async updateEntityAttrs(
    entityId: string,
    attrs: Record<string, AttributeUpdate>
  ): Promise<void> {
    await this.executor.execute('PATCH', `${this.entityPath(entityId)}/attrs`, {
      body: attributeUpdatesToWire(attrs),
    })
    this.logger.info({ entityId, attrs: Object.keys(attrs) }, 'entity attributes updated')
  }

  /**
   * Trigger a device command through its context entity. The IoT Agent
   * registered as context provider forwards it to the device.
   */
  async sendCommand(entityId: string, commandName: string, value: unknown = ''): Promise<void> {
    await this.updateEntityAttrs(entityId, {
      [identifier('commandName', commandName)]: { type: 'command', value },
    })
  }

  /**
   * @throws NotFoundError when the entity does not exist
   */
  async deleteEntity(entityId: string): Promise<void> {
    await this.executor.execute('DELETE', this.entityPath(entityId))
    this.logger.info({ entityId }, 'entity deleted')
  }

  // ============= Subscriptions =============

  /**
   * Create a subscription
   *
   * @returns The subscription id Orion reports in the Location header
   */
  async createSubscription(value: Subscription): Promise<string> {
    const path = `${this.prefix}/subscriptions`
    const checked = validateSubscription(value)
    const result = await this.executor.execute('POST', path, {
      body: subscriptionToWire(checked),
    })

    const location = result.headers.get('location')
    const id = location?.split('/').filter(Boolean).pop()
    if (!id) {
      throw new RemoteOperationError(
        `POST ${path} answered ${result.status} without a Location header`,
        'UNEXPECTED_STATUS',
        { method: 'POST', path, status: result.status }
      )
    }

    this.logger.info({ subscriptionId: id }, 'subscription created')
    return id
  }

  async listSubscriptions(): Promise<Subscription[]> {
    const path = `${this.prefix}/subscriptions`
    const result = await this.executor.execute('GET', path)
    return listBody(result, path)
      .map(raw => parseResponseRecord(subscriptionFromWire, raw, { method: 'GET', path, status: result.status }))
  }

  /**
   * @throws NotFoundError when the subscription does not exist
   */
  async deleteSubscription(subscriptionId: string): Promise<void> {
    const id = identifier('subscriptionId', subscriptionId)
    await this.executor.execute('DELETE', `${this.prefix}/subscriptions/${segment(id)}`)
    this.logger.info({ subscriptionId }, 'subscription deleted')
  }

  private entityPath(entityId: string): string {
    return `${this.prefix}/entities/${segment(identifier('entityId', entityId))}`
  }
}

/**
 * Orion answers listings with a bare JSON array
 */
function listBody(result: ExecuteResult, path: string): unknown[] {
  if (result.kind === 'empty') {
    return []
  }

  const data = requireJson(result, 'GET', path)
  if (!Array.isArray(data)) {
    throw new RemoteOperationError(
      `GET ${path} did not answer with a list`,
      'UNEXPECTED_STATUS',
      { method: 'GET', path, status: result.status, body: data }
    )
  }
  return data
}
