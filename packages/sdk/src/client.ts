/**
 * FIWARE SDK Client
 *
 * Main entry point for provisioning FIWARE actuators.
 */

import type { ClientConfig, HealthStatus, SdkConfig } from './types.js'
import { ValidationError } from './errors.js'
import { ProvisioningClient } from './provisioning.js'
import { ContextClient } from './context.js'
import { loadConfigFromEnv, validateConfig } from './utils.js'

/**
 * FIWARE SDK Client
 *
 * @example
 * ```typescript
 * import { Fiware, serviceGroup, device } from 'fiware-provisioning-sdk'
 *
 * const fiware = new Fiware({
 *   iotAgentUrl: 'http://localhost:4061',
 *   orionUrl: 'http://localhost:1026',
 *   service: 'openiot',
 *   servicePath: '/',
 *   timeout: 5,
 * })
 *
 * await fiware.iotAgent.createServiceGroup(serviceGroup({
 *   apikey: 'test-apikey',
 *   entityType: 'Lamp',
 *   resource: '/iot/d',
 *   cbroker: 'http://orion:1026',
 * }))
 *
 * await fiware.orion.sendCommand('urn:ngsi-ld:Lamp:001', 'on')
 * ```
 */
export class Fiware {
  readonly iotAgent: ProvisioningClient
  readonly orion: ContextClient
  private readonly config: Readonly<SdkConfig>

  constructor(config: SdkConfig) {
    const errors = validateConfig(config)
    if (errors.length > 0) {
      throw new ValidationError(`Invalid configuration: ${errors.join(', ')}`, errors)
    }

    this.config = Object.freeze({ ...config })

    const shared: Omit<ClientConfig, 'baseUrl'> = {
      service: config.service,
      servicePath: config.servicePath,
      timeout: config.timeout,
      fetch: config.fetch,
      logger: config.logger,
    }
    this.iotAgent = new ProvisioningClient({ ...shared, baseUrl: config.iotAgentUrl })
    this.orion = new ContextClient({ ...shared, baseUrl: config.orionUrl })
  }

  /**
   * Check health of both the IoT Agent and Orion
   */
  async health(): Promise<HealthStatus> {
    const [iotAgent, orion] = await Promise.all([
      this.iotAgent.checkStatus(),
      this.orion.checkStatus(),
    ])

    return {
      status: iotAgent && orion ? 'ok' : iotAgent || orion ? 'degraded' : 'down',
      iotAgent,
      orion,
    }
  }

  /**
   * Get current configuration
   */
  getConfig(): Readonly<SdkConfig> {
    return this.config
  }
}

/**
 * Create a FIWARE client from environment variables
 *
 * Expects (all optional, see loadConfigFromEnv for defaults):
 * - IOTA_URL
 * - ORION_URL
 * - FIWARE_SERVICE
 * - FIWARE_SERVICEPATH
 * - TIMEOUT
 */
export function createFiwareFromEnv(env: NodeJS.ProcessEnv = process.env): Fiware {
  return new Fiware(loadConfigFromEnv(env))
}
