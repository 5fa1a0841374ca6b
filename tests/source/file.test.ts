/**
 * Tests for the JSON dump catalog source
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { FileCatalogSource, parseCatalogDump } from '../../src/source/file.js'
import { SourceUnavailableError } from '../../src/lib/errors.js'
import { rawOp } from '../fixtures.js'

describe('file source', () => {
  describe('parseCatalogDump', () => {
    it('should combine flat operations with provider metadata', () => {
      const dump = parseCatalogDump({
        operations: [rawOp('Microsoft.Compute/virtualMachines/read')],
        providers: [{
          name: 'Microsoft.Storage',
          displayName: 'Microsoft Storage',
          operations: [{ name: 'Microsoft.Storage/register/action', displayName: 'Register', description: 'Registers' }],
          resourceTypes: [{
            name: 'storageAccounts',
            displayName: 'Storage Accounts',
            operations: [{ name: 'Microsoft.Storage/storageAccounts/blobServices/containers/blobs/read', isDataAction: true }]
          }]
        }],
        features: [{ providerName: 'Microsoft.Quantum', featureName: 'Preview', registrationState: 'Registered' }]
      })

      expect(dump.operations.map(o => [o.providerNamespace, o.operation, o.resourceName, o.isDataAction])).toEqual([
        ['Microsoft Compute', 'Microsoft.Compute/virtualMachines/read', 'virtualMachines', false],
        ['Microsoft Storage', 'Microsoft.Storage/register/action', 'Microsoft Storage', false],
        ['Microsoft Storage', 'Microsoft.Storage/storageAccounts/blobServices/containers/blobs/read', 'Storage Accounts', true]
      ])
      expect(dump.features).toEqual([{
        providerName: 'Microsoft.Quantum',
        featureName: 'Preview',
        registrationState: 'Registered',
        description: ''
      }])
    })

    it('should keep a feature namespace when present', () => {
      const dump = parseCatalogDump({
        features: [{ providerNamespace: 'Quantum', providerName: 'Microsoft.Quantum', featureName: 'Preview' }]
      })
      expect(dump.features[0].providerNamespace).toBe('Quantum')
    })

    it('should reject invalid entries', () => {
      expect(() => parseCatalogDump([])).toThrow('dump must be a JSON object')
      expect(() => parseCatalogDump({ operations: {} })).toThrow('"operations" must be an array')
      expect(() => parseCatalogDump({ operations: [{ providerNamespace: 'NS', operation: 7 }] })).toThrow(
        'operations[0].operation must be a string'
      )
      expect(() => parseCatalogDump({ features: ['x'] })).toThrow('features[0] must be an object')
    })
  })

  describe('FileCatalogSource', () => {
    let tempDir: string

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'azcatalog-file-source-test-'))
    })

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true })
    })

    it('should list the dump contents', async () => {
      const dumpPath = path.join(tempDir, 'dump.json')
      fs.writeFileSync(dumpPath, JSON.stringify({
        operations: [rawOp('Microsoft.Compute/virtualMachines/read')],
        features: [
          { providerName: 'Microsoft.Compute', featureName: 'A' },
          { providerName: 'Microsoft.Quantum', featureName: 'B' }
        ]
      }))

      const source = new FileCatalogSource(dumpPath)

      expect(source.name).toBe(`file://${dumpPath}`)
      expect(await source.listProviderOperations()).toEqual([rawOp('Microsoft.Compute/virtualMachines/read')])
      expect((await source.listProviderFeatures('Microsoft.Quantum')).map(f => f.featureName)).toEqual(['B'])
    })

    it('should raise SourceUnavailableError for a missing file', async () => {
      const dumpPath = path.join(tempDir, 'missing.json')
      const source = new FileCatalogSource(dumpPath)

      await expect(source.listProviderOperations()).rejects.toThrow(SourceUnavailableError)
      await expect(source.listProviderOperations()).rejects.toThrow(
        `Catalog source file://${dumpPath} is unavailable: file not found`
      )
    })

    it('should raise SourceUnavailableError for invalid JSON', async () => {
      const dumpPath = path.join(tempDir, 'broken.json')
      fs.writeFileSync(dumpPath, '{ not json')

      await expect(new FileCatalogSource(dumpPath).listProviderFeatures()).rejects.toThrow('invalid dump:')
    })
  })
})
