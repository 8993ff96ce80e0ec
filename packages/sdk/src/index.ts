/**
 * FIWARE Provisioning SDK
 *
 * Typed clients for the IoT Agent and the Orion Context Broker.
 *
 * @packageDocumentation
 */

// Main client
export { Fiware, createFiwareFromEnv } from './client.js'

// Sub-clients
export {
  ProvisioningClient,
  IOT_AGENT_PATH_PREFIX,
  IOT_AGENT_HEALTH_ENDPOINT,
} from './provisioning.js'
export { ContextClient, ORION_PATH_PREFIX, ORION_HEALTH_PATH } from './context.js'
export { RequestExecutor, parseResponseRecord, requireJson } from './executor.js'

// Types
export type {
  SdkConfig,
  ClientConfig,
  HttpMethod,
  QueryValue,
  ExecuteOptions,
  ExecuteResult,
  Transport,
  ServiceGroup,
  ServiceGroupUpdate,
  Command,
  Device,
  DeviceAttribute,
  DeviceUpdate,
  StaticAttribute,
  Entity,
  EntityAttribute,
  EntityQuery,
  AttributeUpdate,
  EntityPattern,
  Subscription,
  SubscriptionSubject,
  SubscriptionNotification,
  SubscriptionStatus,
  AttrsFormat,
  HealthStatus,
} from './types.js'

export { TRANSPORTS } from './types.js'

// Errors
export {
  RemoteOperationError,
  ValidationError,
  ConnectivityError,
  ClientError,
  NotFoundError,
  ConflictError,
  ServerError,
  isRemoteOperationError,
  errorFromStatus,
} from './errors.js'

export type { RemoteOperationErrorCode, RequestDetails } from './errors.js'

// Data model
export {
  serviceGroup,
  command,
  device,
  entity,
  subscription,
  serviceGroupToWire,
  serviceGroupFromWire,
  serviceGroupUpdateToWire,
  deviceToWire,
  deviceFromWire,
  deviceUpdateToWire,
  entityToWire,
  entityFromWire,
  attributeUpdatesToWire,
  subscriptionToWire,
  subscriptionFromWire,
  inferAttributeType,
  identifier,
} from './models.js'

export type {
  ServiceGroupInput,
  CommandInput,
  DeviceInput,
  EntityInput,
  SubscriptionInput,
} from './models.js'

// Utilities
export {
  buildUrl,
  validateConfig,
  validateConnection,
  loadConfigFromEnv,
  isValidUrl,
  MAX_TIMEOUT_SECONDS,
} from './utils.js'

export { logger } from './logger.js'
