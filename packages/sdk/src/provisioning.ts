/**
 * FIWARE Provisioning Client
 *
 * Service-group and device lifecycle against the IoT Agent north port.
 */

import type { Logger } from 'pino'
import type {
  ClientConfig,
  Device,
  DeviceUpdate,
  ExecuteResult,
  ServiceGroup,
  ServiceGroupUpdate,
} from './types.js'
import { RemoteOperationError } from './errors.js'
import { RequestExecutor, parseResponseRecord, requireJson } from './executor.js'
import { logger as defaultLogger } from './logger.js'
import {
  deviceFromWire,
  deviceToWire,
  deviceUpdateToWire,
  device as validateDevice,
  identifier,
  serviceGroupFromWire,
  serviceGroupToWire,
  serviceGroupUpdateToWire,
  serviceGroup as validateServiceGroup,
} from './models.js'
import { isRecord, segment } from './utils.js'

export const IOT_AGENT_PATH_PREFIX = '/iot'

/** Health endpoint, relative to the path prefix */
export const IOT_AGENT_HEALTH_ENDPOINT = '/about'

export class ProvisioningClient {
  private readonly executor: RequestExecutor
  private readonly prefix: string
  private readonly logger: Logger

  constructor(config: ClientConfig) {
    this.executor = new RequestExecutor(config)
    this.prefix = config.pathPrefix ?? IOT_AGENT_PATH_PREFIX
    this.logger = config.logger ?? defaultLogger
  }

  /**
   * Check whether the IoT Agent answers its about endpoint
   */
  async checkStatus(): Promise<boolean> {
    return this.executor.checkStatus(`${this.prefix}${IOT_AGENT_HEALTH_ENDPOINT}`)
  }

  // ============= Service Groups =============

  /**
   * Register a service group
   *
   * @throws ConflictError when a group with the same apikey and resource exists
   */
  async createServiceGroup(group: ServiceGroup): Promise<void> {
    const checked = validateServiceGroup(group)
    await this.executor.execute('POST', `${this.prefix}/services`, {
      body: { services: [serviceGroupToWire(checked)] },
    })
    this.logger.info({ apikey: checked.apikey, resource: checked.resource }, 'service group created')
  }

  async listServiceGroups(): Promise<ServiceGroup[]> {
    const path = `${this.prefix}/services`
    const result = await this.executor.execute('GET', path)
    return listField(result, path, 'services')
      .map(raw => parseResponseRecord(serviceGroupFromWire, raw, { method: 'GET', path, status: result.status }))
  }

  async updateServiceGroup(
    apikey: string,
    resource: string,
    updates: ServiceGroupUpdate
  ): Promise<void> {
    const query = groupQuery(apikey, resource)
    await this.executor.execute('PUT', `${this.prefix}/services`, {
      body: serviceGroupUpdateToWire(updates),
      query,
    })
    this.logger.info({ apikey, resource }, 'service group updated')
  }

  /**
   * @throws NotFoundError when no group matches
   */
  async deleteServiceGroup(apikey: string, resource: string): Promise<void> {
    await this.executor.execute('DELETE', `${this.prefix}/services`, {
      query: groupQuery(apikey, resource),
    })
    this.logger.info({ apikey, resource }, 'service group deleted')
  }

  // ============= Devices =============

  /**
   * Provision a device. Its apikey must belong to a group created earlier on
   * the same tenant; the IoT Agent rejects it otherwise.
   *
   * @throws ConflictError on a duplicate device id
   */
  async createDevice(value: Device): Promise<void> {
    const checked = validateDevice(value)
    await this.executor.execute('POST', `${this.prefix}/devices`, {
      body: { devices: [deviceToWire(checked)] },
    })
    this.logger.info({ deviceId: checked.deviceId }, 'device created')
  }

  /**
   * @throws NotFoundError when the device does not exist
   */
  async getDevice(deviceId: string): Promise<Device> {
    const path = this.devicePath(deviceId)
    const result = await this.executor.execute('GET', path)
    return parseResponseRecord(deviceFromWire, requireJson(result, 'GET', path), {
      method: 'GET',
      path,
      status: result.status,
    })
  }

  async listDevices(): Promise<Device[]> {
    const path = `${this.prefix}/devices`
    const result = await this.executor.execute('GET', path)
    return listField(result, path, 'devices')
      .map(raw => parseResponseRecord(deviceFromWire, raw, { method: 'GET', path, status: result.status }))
  }

  async updateDevice(deviceId: string, updates: DeviceUpdate): Promise<void> {
    const path = this.devicePath(deviceId)
    await this.executor.execute('PUT', path, {
      body: deviceUpdateToWire(updates),
    })
    this.logger.info({ deviceId }, 'device updated')
  }

  /**
   * @throws NotFoundError when the device does not exist
   */
  async deleteDevice(deviceId: string): Promise<void> {
    await this.executor.execute('DELETE', this.devicePath(deviceId))
    this.logger.info({ deviceId }, 'device deleted')
  }

  private devicePath(deviceId: string): string {
    return `${this.prefix}/devices/${segment(identifier('deviceId', deviceId))}`
  }
}

function groupQuery(apikey: string, resource: string): { apikey: string; resource: string } {
  return {
    apikey: identifier('apikey', apikey),
    resource: identifier('resource', resource),
  }
}

/**
 * The IoT Agent wraps listings as `{ count, services }` / `{ count, devices }`
 */
function listField(result: ExecuteResult, path: string, field: 'services' | 'devices'): unknown[] {
  if (result.kind === 'empty') {
    return []
  }

  const data = requireJson(result, 'GET', path)
  const list = isRecord(data) ? data[field] : undefined
  if (!Array.isArray(list)) {
    throw new RemoteOperationError(
      `GET ${path} returned a listing without "${field}"`,
      'UNEXPECTED_STATUS',
      { method: 'GET', path, status: result.status, body: data }
    )
  }
  return list
}
