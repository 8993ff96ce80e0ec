/**
 * FIWARE SDK Type Definitions
 */

import type { Logger } from 'pino'

// ============= Configuration =============

export interface SdkConfig {
  /** URL of the IoT Agent north port (e.g., http://localhost:4061) */
  iotAgentUrl: string
  /** URL of the Orion Context Broker (e.g., http://localhost:1026) */
  orionUrl: string
  /** Tenant name sent as `fiware-service` */
  service: string
  /** Tenant sub-path sent as `fiware-servicepath` (e.g., '/') */
  servicePath: string
  /** Request timeout in seconds; 0 disables the timer */
  timeout: number
  /** Optional: fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch
  /** Optional: logger (defaults to the shared SDK logger) */
  logger?: Logger
}

export interface ClientConfig {
  /** Base URL of the remote service */
  baseUrl: string
  service: string
  servicePath: string
  /** Request timeout in seconds; 0 disables the timer */
  timeout: number
  /** Optional: path prefix for resource endpoints (defaults per client) */
  pathPrefix?: string
  fetch?: typeof fetch
  logger?: Logger
}

// ============= Requests =============

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE'

export type QueryValue = string | number | boolean | undefined

export interface ExecuteOptions {
  /** JSON-serializable request body */
  body?: unknown
  /** Query parameters; undefined entries are skipped */
  query?: Record<string, QueryValue>
  /** Aborts the in-flight request when signalled */
  signal?: AbortSignal
}

export type ExecuteResult =
  | { kind: 'json'; status: number; headers: Headers; data: unknown }
  | { kind: 'text'; status: number; headers: Headers; text: string }
  | { kind: 'empty'; status: number; headers: Headers }

// ============= IoT Agent =============

export type Transport = 'HTTP' | 'MQTT' | 'AMQP'

export const TRANSPORTS: readonly Transport[] = ['HTTP', 'MQTT', 'AMQP']

export interface ServiceGroup {
  /** Shared secret identifying the group */
  readonly apikey: string
  /** Default entity type for devices of this group */
  readonly entityType: string
  /** Southbound path used by devices (e.g., '/iot/d') */
  readonly resource: string
  /** Context broker the group forwards measures to */
  readonly cbroker: string
}

export interface Command {
  readonly name: string
  readonly type: string
}

export interface DeviceAttribute {
  /** Short name used by the device payload */
  readonly objectId?: string
  readonly name: string
  readonly type: string
}

export interface StaticAttribute {
  readonly name: string
  readonly type: string
  readonly value: unknown
}

export interface Device {
  readonly deviceId: string
  readonly entityName: string
  readonly entityType: string
  readonly transport: Transport
  readonly protocol: string
  readonly apikey: string
  readonly commands: readonly Command[]
  readonly attributes?: readonly DeviceAttribute[]
  readonly staticAttributes?: readonly StaticAttribute[]
}

export type DeviceUpdate = Partial<Omit<Device, 'deviceId'>>

export type ServiceGroupUpdate = Partial<Pick<ServiceGroup, 'entityType' | 'cbroker'>>

// ============= Orion =============

export interface EntityAttribute {
  readonly value: unknown
  readonly type: string
  readonly metadata: Readonly<Record<string, unknown>>
}

export interface Entity {
  readonly id: string
  readonly type: string
  readonly attributes: Readonly<Record<string, EntityAttribute>>
}

export interface AttributeUpdate {
  value: unknown
  type?: string
  metadata?: Record<string, unknown>
}

export interface EntityQuery {
  /** Exact entity type */
  type?: string
  /** Comma-separated list of entity ids */
  id?: string
  /** Regular expression matched against entity ids */
  idPattern?: string
  /** Page size (Orion defaults to 20, maximum 1000) */
  limit?: number
}

export interface EntityPattern {
  readonly id?: string
  readonly idPattern?: string
  readonly type?: string
}

export interface SubscriptionSubject {
  readonly entities: readonly EntityPattern[]
  readonly condition?: {
    /** Attributes whose change triggers a notification */
    readonly attrs?: readonly string[]
  }
}

export type AttrsFormat = 'normalized' | 'keyValues' | 'values'

export interface SubscriptionNotification {
  readonly http: { readonly url: string }
  /** Attribute projection; omitted means every attribute */
  readonly attrs?: readonly string[]
  readonly attrsFormat?: AttrsFormat
}

export type SubscriptionStatus = 'active' | 'inactive' | 'expired' | 'failed' | 'oneshot'

export interface Subscription {
  /** Assigned by the broker */
  readonly id?: string
  readonly description?: string
  readonly subject: SubscriptionSubject
  readonly notification: SubscriptionNotification
  /** ISO-8601 expiry timestamp */
  readonly expires?: string
  /** Minimum seconds between two notifications */
  readonly throttling?: number
  readonly status?: SubscriptionStatus
}

// ============= Health & Status =============

export interface HealthStatus {
  /** Overall health status */
  status: 'ok' | 'degraded' | 'down'
  /** Whether the IoT Agent answered its about endpoint */
  iotAgent: boolean
  /** Whether Orion answered its version endpoint */
  orion: boolean
}
