/**
 * Unit Tests for the Provisioning Client
 *
 * Runs service-group and device lifecycles against FakeFiware, an
 * in-memory IoT Agent.
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals'

import { ProvisioningClient } from '../provisioning.js'
import {
  ClientError,
  ConflictError,
  NotFoundError,
  RemoteOperationError,
  ValidationError,
} from '../errors.js'
import { device, serviceGroup } from '../models.js'
import { FakeFiware, IOTA_URL, clientConfig, json } from './fiware-helpers.js'

// ============= Test Data =============

const GROUP = serviceGroup({
  apikey: 'test-apikey',
  entityType: 'Lamp',
  resource: '/iot/d',
  cbroker: 'http://orion:1026',
})

const LAMP = device({
  deviceId: 'lamp001',
  entityName: 'urn:ngsi-ld:Lamp:001',
  entityType: 'Lamp',
  transport: 'MQTT',
  protocol: 'PDI-IoTA-UltraLight',
  apikey: 'test-apikey',
  commands: [{ name: 'on' }, { name: 'off' }],
  attributes: [{ objectId: 's', name: 'state', type: 'Text' }],
})

// ============= Tests =============

describe('Provisioning Client', () => {
  let fake: FakeFiware
  let iotAgent: ProvisioningClient

  beforeEach(() => {
    fake = new FakeFiware()
    iotAgent = new ProvisioningClient(clientConfig(IOTA_URL, fake.fetch))
  })

  describe('Service Groups', () => {
    it('should post the group wrapped in a services list', async () => {
      await iotAgent.createServiceGroup(GROUP)

      expect(fake.calls).toHaveLength(1)
      expect(fake.calls[0]?.method).toBe('POST')
      expect(fake.calls[0]?.url.href).toBe('http://iot-agent:4041/iot/services')
      expect(fake.calls[0]?.body).toEqual({
        services: [{
          apikey: 'test-apikey',
          entity_type: 'Lamp',
          resource: '/iot/d',
          cbroker: 'http://orion:1026',
        }],
      })
    })

    it('should list the groups it created', async () => {
      await iotAgent.createServiceGroup(GROUP)

      await expect(iotAgent.listServiceGroups()).resolves.toEqual([GROUP])
    })

    it('should list nothing on a fresh agent', async () => {
      await expect(iotAgent.listServiceGroups()).resolves.toEqual([])
    })

    it('should raise ConflictError on a duplicate group', async () => {
      await iotAgent.createServiceGroup(GROUP)

      await expect(iotAgent.createServiceGroup(GROUP)).rejects.toBeInstanceOf(ConflictError)
    })

    it('should validate before sending', async () => {
      await expect(iotAgent.createServiceGroup({ ...GROUP, resource: 'iot/d' }))
        .rejects.toBeInstanceOf(ValidationError)
      expect(fake.calls).toHaveLength(0)
    })

    it('should update a group addressed by apikey and resource', async () => {
      await iotAgent.createServiceGroup(GROUP)
      await iotAgent.updateServiceGroup('test-apikey', '/iot/d', { entityType: 'Bell' })

      const update = fake.calls[1]
      expect(update?.method).toBe('PUT')
      expect(update?.url.searchParams.get('apikey')).toBe('test-apikey')
      expect(update?.url.searchParams.get('resource')).toBe('/iot/d')
      expect(update?.body).toEqual({ entity_type: 'Bell' })
      await expect(iotAgent.listServiceGroups()).resolves.toEqual([{ ...GROUP, entityType: 'Bell' }])
    })

    it('should not send an empty update', async () => {
      await expect(iotAgent.updateServiceGroup('test-apikey', '/iot/d', {}))
        .rejects.toThrow('Invalid ServiceGroup update: nothing to update')
      expect(fake.calls).toHaveLength(0)
    })

    it('should delete a group', async () => {
      await iotAgent.createServiceGroup(GROUP)
      await iotAgent.deleteServiceGroup('test-apikey', '/iot/d')

      await expect(iotAgent.listServiceGroups()).resolves.toEqual([])
    })

    it('should raise NotFoundError when deleting an unknown group', async () => {
      await expect(iotAgent.deleteServiceGroup('test-apikey', '/iot/d'))
        .rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe('Devices', () => {
    beforeEach(async () => {
      await iotAgent.createServiceGroup(GROUP)
    })

    it('should post the device wrapped in a devices list', async () => {
      await iotAgent.createDevice(LAMP)

      const create = fake.calls[1]
      expect(create?.url.pathname).toBe('/iot/devices')
      expect(create?.body).toEqual({
        devices: [{
          device_id: 'lamp001',
          entity_name: 'urn:ngsi-ld:Lamp:001',
          entity_type: 'Lamp',
          transport: 'MQTT',
          protocol: 'PDI-IoTA-UltraLight',
          apikey: 'test-apikey',
          commands: [
            { name: 'on', type: 'command' },
            { name: 'off', type: 'command' },
          ],
          attributes: [{ object_id: 's', name: 'state', type: 'Text' }],
        }],
      })
    })

    it('should read back a created device', async () => {
      await iotAgent.createDevice(LAMP)

      await expect(iotAgent.getDevice('lamp001')).resolves.toEqual(LAMP)
      await expect(iotAgent.listDevices()).resolves.toEqual([LAMP])
    })

    it('should raise ConflictError on a duplicate device id', async () => {
      await iotAgent.createDevice(LAMP)

      await expect(iotAgent.createDevice(LAMP)).rejects.toThrow(
        'POST /iot/devices failed with 409: DUPLICATE_DEVICE_ID - Duplicate device id: lamp001'
      )
      await expect(iotAgent.createDevice(LAMP)).rejects.toBeInstanceOf(ConflictError)
    })

    it('should raise ClientError for an apikey without a group', async () => {
      await expect(iotAgent.createDevice({ ...LAMP, apikey: 'unknown-apikey' }))
        .rejects.toBeInstanceOf(ClientError)
    })

    it('should raise NotFoundError for an unknown device', async () => {
      const failure = iotAgent.getDevice('lamp404')

      await expect(failure).rejects.toBeInstanceOf(NotFoundError)
      await expect(failure).rejects.toMatchObject({ status: 404, path: '/iot/devices/lamp404' })
    })

    it('should encode device ids in the path', async () => {
      await iotAgent.createDevice({ ...LAMP, deviceId: 'lamp:001' })
      await iotAgent.getDevice('lamp:001')

      expect(fake.calls[2]?.url.pathname).toBe('/iot/devices/lamp%3A001')
    })

    it('should validate before sending', async () => {
      await expect(iotAgent.createDevice({ ...LAMP, commands: [LAMP.commands[0], LAMP.commands[0]] }))
        .rejects.toThrow('Invalid Device: duplicate command "on"')
      expect(fake.calls).toHaveLength(1)
    })

    it('should update a device', async () => {
      await iotAgent.createDevice(LAMP)
      await iotAgent.updateDevice('lamp001', { entityName: 'urn:ngsi-ld:Lamp:002' })

      expect(fake.calls[2]?.body).toEqual({ entity_name: 'urn:ngsi-ld:Lamp:002' })
      await expect(iotAgent.getDevice('lamp001')).resolves.toEqual({
        ...LAMP,
        entityName: 'urn:ngsi-ld:Lamp:002',
      })
    })

    it('should delete a device', async () => {
      await iotAgent.createDevice(LAMP)
      await iotAgent.deleteDevice('lamp001')

      await expect(iotAgent.getDevice('lamp001')).rejects.toBeInstanceOf(NotFoundError)
      await expect(iotAgent.listDevices()).resolves.toEqual([])
    })
  })

  describe('Requests', () => {
    it('should send tenant headers on every call and a content type only with a body', async () => {
      await iotAgent.createServiceGroup(GROUP)
      await iotAgent.listServiceGroups()
      await iotAgent.createDevice(LAMP)
      await iotAgent.getDevice('lamp001')
      await iotAgent.updateDevice('lamp001', { protocol: 'PDI-IoTA-JSON' })
      await iotAgent.deleteDevice('lamp001')
      await iotAgent.deleteServiceGroup('test-apikey', '/iot/d')

      expect(fake.calls.map(call => call.method)).toEqual([
        'POST', 'GET', 'POST', 'GET', 'PUT', 'DELETE', 'DELETE',
      ])
      for (const call of fake.calls) {
        expect(call.headers['fiware-service']).toBe('openiot')
        expect(call.headers['fiware-servicepath']).toBe('/')
        expect('content-type' in call.headers).toBe(call.method === 'POST' || call.method === 'PUT')
      }
    })

    it('should reject a listing without its wrapper field', async () => {
      const client = new ProvisioningClient(
        clientConfig(IOTA_URL, jest.fn<typeof fetch>(async () => json(200, [])))
      )

      const failure = client.listDevices()

      await expect(failure).rejects.toBeInstanceOf(RemoteOperationError)
      await expect(failure).rejects.toMatchObject({ code: 'UNEXPECTED_STATUS' })
    })

    it('should report the agent status', async () => {
      await expect(iotAgent.checkStatus()).resolves.toBe(true)
      expect(fake.calls[0]?.url.pathname).toBe('/iot/about')
    })

    it('should check status under a custom path prefix', async () => {
      const fetchImpl = jest.fn<typeof fetch>(async () => json(200, { libVersion: '4.0.0' }))
      const client = new ProvisioningClient(clientConfig(IOTA_URL, fetchImpl, { pathPrefix: '/agent' }))

      await expect(client.checkStatus()).resolves.toBe(true)
      expect(String(fetchImpl.mock.calls[0]?.[0])).toBe('http://iot-agent:4041/agent/about')
    })
  })

  describe('Unreadable responses', () => {
    const SENSOR_WITHOUT_TRANSPORT = {
      device_id: 'sensor001',
      entity_name: 'urn:ngsi-ld:Sensor:001',
      entity_type: 'Sensor',
      protocol: 'PDI-IoTA-UltraLight',
      apikey: 'test-apikey',
    }

    it('should report a listing with a record the model rejects as UNEXPECTED_STATUS', async () => {
      fake.devices.set('sensor001', SENSOR_WITHOUT_TRANSPORT)

      const failure = iotAgent.listDevices()

      await expect(failure).rejects.not.toBeInstanceOf(ValidationError)
      await expect(failure).rejects.toMatchObject({
        code: 'UNEXPECTED_STATUS',
        method: 'GET',
        path: '/iot/devices',
        status: 200,
        body: SENSOR_WITHOUT_TRANSPORT,
        message: 'GET /iot/devices answered 200 with an unreadable record: Invalid Device: transport must be one of HTTP, MQTT, AMQP',
      })
    })

    it('should report a single unreadable device with its path', async () => {
      fake.devices.set('sensor001', SENSOR_WITHOUT_TRANSPORT)

      await expect(iotAgent.getDevice('sensor001')).rejects.toMatchObject({
        code: 'UNEXPECTED_STATUS',
        path: '/iot/devices/sensor001',
        status: 200,
      })
    })
  })

  describe('Identifiers', () => {
    it('should reject an empty device id without sending anything', async () => {
      await expect(iotAgent.getDevice('')).rejects.toThrow('Invalid request: deviceId is required')
      await expect(iotAgent.deleteDevice('  ')).rejects.toBeInstanceOf(ValidationError)
      await expect(iotAgent.updateDevice('', { protocol: 'PDI-IoTA-JSON' })).rejects.toBeInstanceOf(ValidationError)
      expect(fake.calls).toHaveLength(0)
    })

    it('should reject an empty apikey or resource without sending anything', async () => {
      await expect(iotAgent.deleteServiceGroup('', '/iot/d')).rejects.toThrow('Invalid request: apikey is required')
      await expect(iotAgent.updateServiceGroup('test-apikey', '', { entityType: 'Bell' }))
        .rejects.toThrow('Invalid request: resource is required')
      expect(fake.calls).toHaveLength(0)
    })
  })
})
