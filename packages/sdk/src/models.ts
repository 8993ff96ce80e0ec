/**
 * FIWARE SDK Data Model
 *
 * Constructors validate their input and throw ValidationError on the first
 * violated invariant, before anything is sent. The *FromWire parsers run the
 * same checks on JSON coming back from the IoT Agent and Orion.
 *
 * The IoT Agent speaks snake_case (`device_id`, `entity_type`, ...) while the
 * records here are camelCase; Orion entities are flattened on the wire with
 * one key per attribute.
 */

import type {
  AttrsFormat,
  AttributeUpdate,
  Command,
  Device,
  DeviceAttribute,
  DeviceUpdate,
  Entity,
  EntityAttribute,
  EntityPattern,
  ServiceGroup,
  ServiceGroupUpdate,
  StaticAttribute,
  Subscription,
  SubscriptionStatus,
  Transport,
} from './types.js'
import { TRANSPORTS } from './types.js'
import { ValidationError } from './errors.js'
import { isRecord, isValidUrl } from './utils.js'

// ============= Input shapes =============

export interface ServiceGroupInput {
  apikey: string
  entityType: string
  resource: string
  cbroker: string
}

export interface CommandInput {
  name: string
  /** Defaults to 'command' */
  type?: string
}

export interface DeviceInput {
  deviceId: string
  entityName: string
  entityType: string
  /** 'HTTP', 'MQTT' or 'AMQP' */
  transport: string
  protocol: string
  apikey: string
  commands?: readonly CommandInput[]
  attributes?: readonly DeviceAttribute[]
  staticAttributes?: readonly StaticAttribute[]
}

export interface EntityInput {
  id: string
  type: string
  attributes?: Record<string, AttributeUpdate>
}

export interface SubscriptionInput {
  description?: string
  subject: {
    entities: readonly EntityPattern[]
    condition?: { attrs?: readonly string[] }
  }
  notification: {
    http: { url: string }
    attrs?: readonly string[]
    attrsFormat?: AttrsFormat
  }
  expires?: string
  throttling?: number
}

const ATTRS_FORMATS: readonly AttrsFormat[] = ['normalized', 'keyValues', 'values']
const SUBSCRIPTION_STATUSES: readonly SubscriptionStatus[] = [
  'active',
  'inactive',
  'expired',
  'failed',
  'oneshot',
]

// ============= Constructors =============

export function serviceGroup(input: ServiceGroupInput): ServiceGroup {
  return parseServiceGroup(input)
}

export function command(input: CommandInput): Command {
  return parseCommand(input, 'Command')
}

/**
 * Build a validated device
 *
 * @example
 * ```typescript
 * const lamp = device({
 *   deviceId: 'lamp001',
 *   entityName: 'urn:ngsi-ld:Lamp:001',
 *   entityType: 'Lamp',
 *   transport: 'MQTT',
 *   protocol: 'PDI-IoTA-UltraLight',
 *   apikey: 'test-apikey',
 *   commands: [{ name: 'on' }, { name: 'off' }],
 * })
 * ```
 */
export function device(input: DeviceInput): Device {
  return parseDevice(input)
}

export function entity(input: EntityInput): Entity {
  const model = 'Entity'
  const attributes: Record<string, EntityAttribute> = {}

  for (const [name, update] of Object.entries(input.attributes ?? {})) {
    attributes[attributeName(model, name)] = parseAttribute(model, name, update)
  }

  return {
    id: requireString(model, 'id', input.id),
    type: requireString(model, 'type', input.type),
    attributes,
  }
}

export function subscription(input: SubscriptionInput): Subscription {
  return parseSubscription(input)
}

// ============= Service groups =============

export function serviceGroupToWire(group: ServiceGroup): Record<string, unknown> {
  return {
    apikey: group.apikey,
    entity_type: group.entityType,
    resource: group.resource,
    cbroker: group.cbroker,
  }
}

export function serviceGroupFromWire(raw: unknown): ServiceGroup {
  const record = requireRecord('ServiceGroup', raw)
  return parseServiceGroup({
    apikey: record.apikey,
    entityType: record.entity_type,
    resource: record.resource,
    cbroker: record.cbroker,
  })
}

export function serviceGroupUpdateToWire(updates: ServiceGroupUpdate): Record<string, unknown> {
  const model = 'ServiceGroup update'
  const wire: Record<string, unknown> = {}

  if (updates.entityType !== undefined) {
    wire.entity_type = requireString(model, 'entityType', updates.entityType)
  }
  if (updates.cbroker !== undefined) {
    wire.cbroker = requireUrl(model, 'cbroker', updates.cbroker)
  }

  return requireNonEmptyUpdate(model, wire)
}

function parseServiceGroup(raw: Record<string, unknown> | ServiceGroupInput): ServiceGroup {
  const model = 'ServiceGroup'
  const apikey = requireString(model, 'apikey', raw.apikey)
  const entityType = requireString(model, 'entityType', raw.entityType)
  const resource = requireString(model, 'resource', raw.resource)
  if (!resource.startsWith('/')) {
    fail(model, 'resource must be a path starting with "/"')
  }

  return {
    apikey,
    entityType,
    resource,
    cbroker: requireUrl(model, 'cbroker', raw.cbroker),
  }
}

// ============= Devices =============

export function deviceToWire(value: Device): Record<string, unknown> {
  return {
    device_id: value.deviceId,
    ...deviceFieldsToWire(value),
  }
}

export function deviceFromWire(raw: unknown): Device {
  const record = requireRecord('Device', raw)
  return parseDevice({
    deviceId: record.device_id,
    entityName: record.entity_name,
    entityType: record.entity_type,
    transport: record.transport,
    protocol: record.protocol,
    apikey: record.apikey,
    commands: record.commands ?? [],
    attributes: fromWireList(record.attributes),
    staticAttributes: record.static_attributes,
  })
}

/**
 * Validate a partial device and convert it to its wire form. The device id
 * is part of the URL and cannot be changed.
 */
export function deviceUpdateToWire(updates: DeviceUpdate): Record<string, unknown> {
  const model = 'Device update'
  const checked: DeviceUpdate = {
    ...(updates.entityName !== undefined && {
      entityName: requireString(model, 'entityName', updates.entityName),
    }),
    ...(updates.entityType !== undefined && {
      entityType: requireString(model, 'entityType', updates.entityType),
    }),
    ...(updates.transport !== undefined && {
      transport: requireTransport(model, updates.transport),
    }),
    ...(updates.protocol !== undefined && {
      protocol: requireString(model, 'protocol', updates.protocol),
    }),
    ...(updates.apikey !== undefined && {
      apikey: requireString(model, 'apikey', updates.apikey),
    }),
    ...(updates.commands !== undefined && {
      commands: parseCommands(model, updates.commands),
    }),
    ...(updates.attributes !== undefined && {
      attributes: parseDeviceAttributes(model, updates.attributes),
    }),
    ...(updates.staticAttributes !== undefined && {
      staticAttributes: parseStaticAttributes(model, updates.staticAttributes),
    }),
  }

  return requireNonEmptyUpdate(model, deviceFieldsToWire(checked))
}

function deviceFieldsToWire(value: DeviceUpdate): Record<string, unknown> {
  return {
    ...(value.entityName !== undefined && { entity_name: value.entityName }),
    ...(value.entityType !== undefined && { entity_type: value.entityType }),
    ...(value.transport !== undefined && { transport: value.transport }),
    ...(value.protocol !== undefined && { protocol: value.protocol }),
    ...(value.apikey !== undefined && { apikey: value.apikey }),
    ...(value.commands !== undefined && {
      commands: value.commands.map(c => ({ name: c.name, type: c.type })),
    }),
    ...(value.attributes !== undefined && {
      attributes: value.attributes.map(a => ({
        ...(a.objectId !== undefined && { object_id: a.objectId }),
        name: a.name,
        type: a.type,
      })),
    }),
    ...(value.staticAttributes !== undefined && {
      static_attributes: value.staticAttributes.map(a => ({
        name: a.name,
        type: a.type,
        value: a.value,
      })),
    }),
  }
}

function fromWireList(raw: unknown): unknown {
  if (!Array.isArray(raw)) {
    return raw
  }
  return raw.map(item => isRecord(item)
    ? { objectId: item.object_id, name: item.name, type: item.type }
    : item)
}

function parseDevice(raw: Record<string, unknown> | DeviceInput): Device {
  const model = 'Device'
  const value: Device = {
    deviceId: requireString(model, 'deviceId', raw.deviceId),
    entityName: requireString(model, 'entityName', raw.entityName),
    entityType: requireString(model, 'entityType', raw.entityType),
    transport: requireTransport(model, raw.transport),
    protocol: requireString(model, 'protocol', raw.protocol),
    apikey: requireString(model, 'apikey', raw.apikey),
    commands: parseCommands(model, raw.commands ?? []),
  }

  return {
    ...value,
    ...(raw.attributes !== undefined && {
      attributes: parseDeviceAttributes(model, raw.attributes),
    }),
    ...(raw.staticAttributes !== undefined && {
      staticAttributes: parseStaticAttributes(model, raw.staticAttributes),
    }),
  }
}

function parseCommands(model: string, raw: unknown): Command[] {
  const commands = requireArray(model, 'commands', raw).map(item => parseCommand(item, model))

  const seen = new Set<string>()
  for (const { name } of commands) {
    if (seen.has(name)) {
      fail(model, `duplicate command "${name}"`)
    }
    seen.add(name)
  }

  return commands
}

function parseCommand(raw: unknown, model: string): Command {
  const record = requireRecord(model, raw)
  return {
    name: requireString(model, 'command name', record.name),
    type: record.type === undefined
      ? 'command'
      : requireString(model, 'command type', record.type),
  }
}

function parseDeviceAttributes(model: string, raw: unknown): DeviceAttribute[] {
  return requireArray(model, 'attributes', raw).map(item => {
    const record = requireRecord(model, item)
    return {
      ...(record.objectId !== undefined && {
        objectId: requireString(model, 'attribute objectId', record.objectId),
      }),
      name: requireString(model, 'attribute name', record.name),
      type: requireString(model, 'attribute type', record.type),
    }
  })
}

function parseStaticAttributes(model: string, raw: unknown): StaticAttribute[] {
  return requireArray(model, 'staticAttributes', raw).map(item => {
    const record = requireRecord(model, item)
    return {
      name: requireString(model, 'static attribute name', record.name),
      type: requireString(model, 'static attribute type', record.type),
      value: record.value,
    }
  })
}

function requireTransport(model: string, raw: unknown): Transport {
  const transport = TRANSPORTS.find(candidate => candidate === raw)
  if (transport === undefined) {
    fail(model, `transport must be one of ${TRANSPORTS.join(', ')}`)
  }
  return transport
}

// ============= Entities =============

export function entityToWire(value: Entity): Record<string, unknown> {
  const wire: Record<string, unknown> = { id: value.id, type: value.type }
  for (const [name, attribute] of Object.entries(value.attributes)) {
    wire[name] = {
      value: attribute.value,
      type: attribute.type,
      metadata: attribute.metadata,
    }
  }
  return wire
}

export function entityFromWire(raw: unknown): Entity {
  const model = 'Entity'
  const record = requireRecord(model, raw)
  const attributes: Record<string, EntityAttribute> = {}

  for (const [name, attribute] of Object.entries(record)) {
    if (name !== 'id' && name !== 'type') {
      attributes[name] = parseAttribute(model, name, attribute)
    }
  }

  return {
    id: requireString(model, 'id', record.id),
    type: requireString(model, 'type', record.type),
    attributes,
  }
}

/**
 * Validate an attribute patch and convert it to its wire form. Only the
 * keys the caller set are sent, so Orion keeps existing types and metadata.
 */
export function attributeUpdatesToWire(
  updates: Record<string, AttributeUpdate>
): Record<string, unknown> {
  const model = 'Attribute update'
  const wire: Record<string, unknown> = {}

  for (const [name, update] of Object.entries(updates)) {
    const record = requireRecord(model, update)
    if (!('value' in record)) {
      fail(model, `attribute "${name}" must carry a value`)
    }

    wire[attributeName(model, name)] = {
      value: record.value,
      ...(record.type !== undefined && {
        type: requireString(model, `${name}.type`, record.type),
      }),
      ...(record.metadata !== undefined && {
        metadata: requireRecord(model, record.metadata),
      }),
    }
  }

  return requireNonEmptyUpdate(model, wire)
}

function parseAttribute(model: string, name: string, raw: unknown): EntityAttribute {
  const record = requireRecord(model, raw)
  if (!('value' in record)) {
    fail(model, `attribute "${name}" must carry a value`)
  }

  return {
    value: record.value,
    type: record.type === undefined
      ? inferAttributeType(record.value)
      : requireString(model, `${name}.type`, record.type),
    metadata: record.metadata === undefined ? {} : requireRecord(model, record.metadata),
  }
}

function attributeName(model: string, name: string): string {
  if (name.length === 0 || name === 'id' || name === 'type') {
    fail(model, `"${name}" is not a valid attribute name`)
  }
  return name
}

/**
 * Type Orion assigns to an attribute created without one
 */
export function inferAttributeType(value: unknown): string {
  if (value === null) return 'None'
  if (typeof value === 'string') return 'Text'
  if (typeof value === 'number') return 'Number'
  if (typeof value === 'boolean') return 'Boolean'
  return 'StructuredValue'
}

// ============= Subscriptions =============

export function subscriptionToWire(value: Subscription): Record<string, unknown> {
  const { id: _id, status: _status, ...writable } = value
  return { ...writable }
}

export function subscriptionFromWire(raw: unknown): Subscription {
  return parseSubscription(requireRecord('Subscription', raw))
}

function parseSubscription(raw: Record<string, unknown> | SubscriptionInput): Subscription {
  const model = 'Subscription'
  const record: Record<string, unknown> = { ...raw }

  const subject = requireRecord(model, record.subject)
  const entities = requireArray(model, 'subject.entities', subject.entities)
    .map(item => parseEntityPattern(model, item))
  if (entities.length === 0) {
    fail(model, 'subject.entities must name at least one entity')
  }
  const condition = subject.condition === undefined
    ? undefined
    : requireRecord(model, subject.condition)

  const notification = requireRecord(model, record.notification)
  const http = requireRecord(model, notification.http)

  return {
    ...(record.id !== undefined && { id: requireString(model, 'id', record.id) }),
    ...(record.description !== undefined && {
      description: requireString(model, 'description', record.description),
    }),
    subject: {
      entities,
      ...(condition !== undefined && {
        condition: condition.attrs === undefined
          ? {}
          : { attrs: requireStringList(model, 'subject.condition.attrs', condition.attrs) },
      }),
    },
    notification: {
      http: { url: requireUrl(model, 'notification.http.url', http.url) },
      ...(notification.attrs !== undefined && {
        attrs: requireStringList(model, 'notification.attrs', notification.attrs),
      }),
      ...(notification.attrsFormat !== undefined && {
        attrsFormat: requireOneOf(model, 'notification.attrsFormat', ATTRS_FORMATS, notification.attrsFormat),
      }),
    },
    ...(record.expires !== undefined && { expires: requireTimestamp(model, record.expires) }),
    ...(record.throttling !== undefined && {
      throttling: requireNonNegativeInteger(model, 'throttling', record.throttling),
    }),
    ...(record.status !== undefined && {
      status: requireOneOf(model, 'status', SUBSCRIPTION_STATUSES, record.status),
    }),
  }
}

function parseEntityPattern(model: string, raw: unknown): EntityPattern {
  const record = requireRecord(model, raw)
  if (record.id === undefined && record.idPattern === undefined) {
    fail(model, 'every subject entity needs an id or an idPattern')
  }

  return {
    ...(record.id !== undefined && { id: requireString(model, 'subject entity id', record.id) }),
    ...(record.idPattern !== undefined && {
      idPattern: requireString(model, 'subject entity idPattern', record.idPattern),
    }),
    ...(record.type !== undefined && {
      type: requireString(model, 'subject entity type', record.type),
    }),
  }
}

// ============= Checks =============

function fail(model: string, issue: string): never {
  throw new ValidationError(`Invalid ${model}: ${issue}`)
}

function requireRecord(model: string, raw: unknown): Record<string, unknown> {
  if (!isRecord(raw)) {
    fail(model, 'expected an object')
  }
  return raw
}

function requireArray(model: string, field: string, raw: unknown): unknown[] {
  if (!Array.isArray(raw)) {
    fail(model, `${field} must be a list`)
  }
  return raw
}

function requireString(model: string, field: string, raw: unknown): string {
  if (typeof raw !== 'string' || raw.trim().length === 0) {
    fail(model, `${field} is required`)
  }
  return raw
}

function requireStringList(model: string, field: string, raw: unknown): string[] {
  return requireArray(model, field, raw).map(item => requireString(model, field, item))
}

function requireUrl(model: string, field: string, raw: unknown): string {
  const value = requireString(model, field, raw)
  if (!isValidUrl(value)) {
    fail(model, `${field} must be a valid URL`)
  }
  return value
}

function requireTimestamp(model: string, raw: unknown): string {
  const value = requireString(model, 'expires', raw)
  if (Number.isNaN(Date.parse(value))) {
    fail(model, 'expires must be an ISO-8601 timestamp')
  }
  return value
}

function requireNonNegativeInteger(model: string, field: string, raw: unknown): number {
  if (typeof raw !== 'number' || !Number.isInteger(raw) || raw < 0) {
    fail(model, `${field} must be a non-negative integer`)
  }
  return raw
}

function requireOneOf<T extends string>(
  model: string,
  field: string,
  allowed: readonly T[],
  raw: unknown
): T {
  const match = allowed.find(candidate => candidate === raw)
  if (match === undefined) {
    fail(model, `${field} must be one of ${allowed.join(', ')}`)
  }
  return match
}

function requireNonEmptyUpdate(
  model: string,
  wire: Record<string, unknown>
): Record<string, unknown> {
  if (Object.keys(wire).length === 0) {
    fail(model, 'nothing to update')
  }
  return wire
}

/**
 * Check an id or key a client operation puts in the URL
 */
export function identifier(field: string, value: string): string {
  return requireString('request', field, value)
}
