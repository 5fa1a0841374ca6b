/**
 * Tests for the Azure Resource Manager catalog source
 */

import { describe, it, expect } from 'vitest'
import {
  AzureCatalogSource,
  flattenProviderOperations,
  toRawFeature,
  type ArmFeatureResult,
  type ArmProviderOperationsMetadata,
  type AzureCatalogClients
} from '../../src/source/azure.js'

async function* iterate<T>(items: T[]): AsyncGenerator<T> {
  yield* items
}

function fakeClients(
  providers: ArmProviderOperationsMetadata[],
  features: ArmFeatureResult[]
): { clients: AzureCatalogClients; calls: string[] } {
  const calls: string[] = []
  const clients: AzureCatalogClients = {
    providerOperations: {
      list: (options) => {
        calls.push(`providerOperations.list(${options?.expand ?? ''})`)
        return iterate(providers)
      }
    },
    features: {
      listAll: () => {
        calls.push('features.listAll()')
        return iterate(features)
      },
      list: (namespace) => {
        calls.push(`features.list(${namespace})`)
        return iterate(features.filter(f => f.name?.startsWith(`${namespace}/`)))
      }
    }
  }
  return { clients, calls }
}

const compute: ArmProviderOperationsMetadata = {
  name: 'Microsoft.Compute',
  displayName: 'Microsoft Compute',
  operations: [{ name: 'Microsoft.Compute/register/action', displayName: 'Register', description: 'Registers the provider' }],
  resourceTypes: [
    {
      name: 'virtualMachines',
      displayName: 'Virtual Machines',
      operations: [
        { name: 'Microsoft.Compute/virtualMachines/read', displayName: 'Get VM', description: 'Reads a VM', isDataAction: false },
        { name: 'Microsoft.Compute/virtualMachines/write', displayName: 'Create VM', description: 'Creates a VM' }
      ]
    },
    { name: 'disks', operations: [{ name: 'Microsoft.Compute/disks/read' }] }
  ]
}

describe('azure source', () => {
  describe('flattenProviderOperations', () => {
    it('should list provider operations before resource type operations', () => {
      expect(flattenProviderOperations(compute)).toEqual([
        {
          providerNamespace: 'Microsoft Compute',
          operation: 'Microsoft.Compute/register/action',
          operationName: 'Register',
          resourceName: 'Microsoft Compute',
          isDataAction: false,
          description: 'Registers the provider'
        },
        {
          providerNamespace: 'Microsoft Compute',
          operation: 'Microsoft.Compute/virtualMachines/read',
          operationName: 'Get VM',
          resourceName: 'Virtual Machines',
          isDataAction: false,
          description: 'Reads a VM'
        },
        {
          providerNamespace: 'Microsoft Compute',
          operation: 'Microsoft.Compute/virtualMachines/write',
          operationName: 'Create VM',
          resourceName: 'Virtual Machines',
          isDataAction: false,
          description: 'Creates a VM'
        },
        {
          providerNamespace: 'Microsoft Compute',
          operation: 'Microsoft.Compute/disks/read',
          operationName: '',
          resourceName: 'disks',
          isDataAction: false,
          description: ''
        }
      ])
    })

    it('should fall back to the provider name without a display name', () => {
      const [first] = flattenProviderOperations({ name: 'Microsoft.Quantum', operations: [{ name: 'Microsoft.Quantum/read' }] })
      expect(first.providerNamespace).toBe('Microsoft.Quantum')
    })

    it('should return nothing for an empty provider', () => {
      expect(flattenProviderOperations({})).toEqual([])
    })
  })

  describe('toRawFeature', () => {
    it('should split the feature name at the first slash', () => {
      expect(toRawFeature({ name: 'Microsoft.Compute/Preview/Extra', properties: { state: 'Registered' } })).toEqual({
        providerName: 'Microsoft.Compute',
        featureName: 'Preview/Extra',
        registrationState: 'Registered',
        description: ''
      })
    })

    it('should tolerate a name without provider', () => {
      expect(toRawFeature({ name: 'Orphan' })).toEqual({
        providerName: '',
        featureName: 'Orphan',
        registrationState: '',
        description: ''
      })
    })
  })

  describe('AzureCatalogSource', () => {
    const features: ArmFeatureResult[] = [
      { name: 'Microsoft.Compute/Preview', properties: { state: 'Registered' } },
      { name: 'Microsoft.Quantum/Access', properties: { state: 'NotRegistered' } }
    ]

    it('should be named after the subscription', () => {
      const { clients } = fakeClients([], [])
      expect(new AzureCatalogSource(clients, 'sub-123').name).toBe('azure://sub-123')
    })

    it('should list operations with resource types expanded', async () => {
      const { clients, calls } = fakeClients([compute, { name: 'Microsoft.Quantum', operations: [] }], [])
      const operations = await new AzureCatalogSource(clients, 'sub-123').listProviderOperations()

      expect(operations).toHaveLength(4)
      expect(calls).toEqual(['providerOperations.list(resourceTypes)'])
    })

    it('should list all features', async () => {
      const { clients, calls } = fakeClients([], features)
      const listed = await new AzureCatalogSource(clients, 'sub-123').listProviderFeatures()

      expect(listed.map(f => [f.providerName, f.featureName, f.registrationState])).toEqual([
        ['Microsoft.Compute', 'Preview', 'Registered'],
        ['Microsoft.Quantum', 'Access', 'NotRegistered']
      ])
      expect(calls).toEqual(['features.listAll()'])
    })

    it('should list the features of one provider', async () => {
      const { clients, calls } = fakeClients([], features)
      const listed = await new AzureCatalogSource(clients, 'sub-123').listProviderFeatures('Microsoft.Quantum')

      expect(listed.map(f => f.featureName)).toEqual(['Access'])
      expect(calls).toEqual(['features.list(Microsoft.Quantum)'])
    })

    it('should propagate client errors', async () => {
      const { clients } = fakeClients([], [])
      clients.features.listAll = () => ({
        [Symbol.asyncIterator]: () => ({
          next: () => Promise.reject(new Error('AuthorizationFailed'))
        })
      })

      await expect(new AzureCatalogSource(clients, 'sub-123').listProviderFeatures()).rejects.toThrow('AuthorizationFailed')
    })
  })
})
