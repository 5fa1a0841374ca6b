/**
 * File catalog source
 *
 * Reads a JSON dump captured earlier, for offline runs:
 *
 *   {
 *     "operations": [ { providerNamespace, operation, operationName, resourceName, isDataAction, description } ],
 *     "providers":  [ <az provider operation list output> ],
 *     "features":   [ { providerName, featureName, registrationState, description } ]
 *   }
 *
 * "operations" and "providers" may both be present; their entries are combined.
 */

import fs from 'node:fs'
import type { RawFeature, RawOperation } from '../types.js'
import type { CatalogSource } from './types.js'
import { SourceUnavailableError } from '../lib/errors.js'
import {
  flattenProviderOperations,
  type ArmProviderOperation,
  type ArmProviderOperationsMetadata
} from './azure.js'

interface CatalogDump {
  operations: RawOperation[]
  features: RawFeature[]
}

// ============================================================================
// Validation
// ============================================================================

type Json = Record<string, unknown>

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readString(entry: Json, key: string, where: string, optional = false): string {
  const value = entry[key]
  if (value === undefined && optional) return ''
  if (typeof value !== 'string') {
    throw new Error(`${where}.${key} must be a string`)
  }
  return value
}

function readArray(dump: Json, key: string): unknown[] {
  const value = dump[key]
  if (value === undefined) return []
  if (!Array.isArray(value)) {
    throw new Error(`"${key}" must be an array`)
  }
  return value
}

function parseOperation(value: unknown, index: number): RawOperation {
  const where = `operations[${index}]`
  if (!isObject(value)) throw new Error(`${where} must be an object`)
  return {
    providerNamespace: readString(value, 'providerNamespace', where),
    operation: readString(value, 'operation', where),
    operationName: readString(value, 'operationName', where, true),
    resourceName: readString(value, 'resourceName', where, true),
    isDataAction: value.isDataAction === true,
    description: readString(value, 'description', where, true)
  }
}

function optionalString(entry: Json, key: string): string | undefined {
  const value = entry[key]
  return typeof value === 'string' ? value : undefined
}

function parseArmOperations(value: unknown): ArmProviderOperation[] {
  if (!Array.isArray(value)) return []
  return value.filter(isObject).map(op => ({
    name: optionalString(op, 'name'),
    displayName: optionalString(op, 'displayName'),
    description: optionalString(op, 'description'),
    isDataAction: op.isDataAction === true
  }))
}

function parseProvider(value: unknown, index: number): RawOperation[] {
  if (!isObject(value)) throw new Error(`providers[${index}] must be an object`)
  const resourceTypes = Array.isArray(value.resourceTypes) ? value.resourceTypes.filter(isObject) : []
  const provider: ArmProviderOperationsMetadata = {
    name: optionalString(value, 'name'),
    displayName: optionalString(value, 'displayName'),
    operations: parseArmOperations(value.operations),
    resourceTypes: resourceTypes.map(resourceType => ({
      name: optionalString(resourceType, 'name'),
      displayName: optionalString(resourceType, 'displayName'),
      operations: parseArmOperations(resourceType.operations)
    }))
  }
  return flattenProviderOperations(provider)
}

function parseFeature(value: unknown, index: number): RawFeature {
  const where = `features[${index}]`
  if (!isObject(value)) throw new Error(`${where} must be an object`)
  const providerNamespace = readString(value, 'providerNamespace', where, true)
  return {
    ...(providerNamespace ? { providerNamespace } : {}),
    providerName: readString(value, 'providerName', where),
    featureName: readString(value, 'featureName', where),
    registrationState: readString(value, 'registrationState', where, true),
    description: readString(value, 'description', where, true)
  }
}

/**
 * Validate a parsed dump
 *
 * @throws Error naming the first invalid entry
 */
export function parseCatalogDump(data: unknown): CatalogDump {
  if (!isObject(data)) {
    throw new Error('dump must be a JSON object')
  }
  return {
    operations: [
      ...readArray(data, 'operations').map(parseOperation),
      ...readArray(data, 'providers').flatMap(parseProvider)
    ],
    features: readArray(data, 'features').map(parseFeature)
  }
}

// ============================================================================
// Source
// ============================================================================

export class FileCatalogSource implements CatalogSource {
  readonly name: string
  private dump: CatalogDump | null = null

  constructor(private readonly filePath: string) {
    this.name = `file://${filePath}`
  }

  private load(): CatalogDump {
    if (this.dump) return this.dump

    if (!fs.existsSync(this.filePath)) {
      throw new SourceUnavailableError(this.name, 'file not found')
    }
    try {
      this.dump = parseCatalogDump(JSON.parse(fs.readFileSync(this.filePath, 'utf-8')))
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error))
      throw new SourceUnavailableError(this.name, `invalid dump: ${cause.message}`, cause)
    }
    return this.dump
  }

  async listProviderOperations(): Promise<RawOperation[]> {
    return this.load().operations.map(op => ({ ...op }))
  }

  async listProviderFeatures(providerNamespace?: string): Promise<RawFeature[]> {
    const wanted = providerNamespace?.toLowerCase()
    return this.load().features
      .filter(feature => !wanted || feature.providerName.toLowerCase() === wanted)
      .map(feature => ({ ...feature }))
  }
}
