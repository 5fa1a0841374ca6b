/**
 * Catalog Extractor
 *
 * Turns raw listings from a catalog source into the three normalized record
 * sets: Services, Features and Operations. Every function here is pure: the
 * raw inputs are never modified and each call returns fresh arrays.
 */

import type {
  RawOperation,
  RawFeature,
  ServiceRecord,
  FeatureRecord,
  OperationRecord,
  Extraction
} from '../types.js'
import { UNKNOWN_NAMESPACE } from '../types.js'
import { MalformedOperationError } from '../lib/errors.js'
import {
  compareOrdinal,
  parseProviderName,
  createPlaceholder,
  sortByProviderThenOperation
} from './records.js'

// ============================================================================
// Provider filters
// ============================================================================

const PRIVATE_PROVIDER_PREFIX = 'private.'
const TEST_PROVIDER_NAME = 'providers.test'

/**
 * Providers that only exist for internal testing and never get a service row
 */
export function isPrivateProvider(providerName: string): boolean {
  const normalized = providerName.trim().toLowerCase()
  return normalized.startsWith(PRIVATE_PROVIDER_PREFIX) || normalized === TEST_PROVIDER_NAME
}

function malformedWarning(error: MalformedOperationError): string {
  return `Skipped ${error.message}`
}

/**
 * Resolve the provider of a raw operation, or a warning when it is malformed
 */
function resolveProvider(raw: RawOperation): { providerName: string } | { warning: string } {
  try {
    return { providerName: parseProviderName(raw.operation, raw.providerNamespace) }
  } catch (error) {
    if (error instanceof MalformedOperationError) {
      return { warning: malformedWarning(error) }
    }
    throw error
  }
}

// ============================================================================
// Services
// ============================================================================

/**
 * Derive one ServiceRecord per provider.
 *
 * Providers come from the operation listing first. Providers that appear
 * only in the feature listing are added with the "-" namespace, minus the
 * private/test ones. Feature provider names are trimmed and compared
 * case-insensitively.
 */
export function extractServices(
  rawOperations: readonly RawOperation[],
  rawFeatures: readonly RawFeature[] = []
): Extraction<ServiceRecord> {
  const warnings: string[] = []

  // providerName -> smallest namespace seen for it
  const namespaceByProvider = new Map<string, string>()
  for (const raw of rawOperations) {
    const resolved = resolveProvider(raw)
    if ('warning' in resolved) {
      warnings.push(resolved.warning)
      continue
    }
    const current = namespaceByProvider.get(resolved.providerName)
    if (current === undefined || compareOrdinal(raw.providerNamespace, current) < 0) {
      namespaceByProvider.set(resolved.providerName, raw.providerNamespace)
    }
  }

  const records: ServiceRecord[] = [...namespaceByProvider].map(([providerName, namespace]) => ({
    namespace,
    providerName,
    description: ''
  }))

  const known = new Set([...namespaceByProvider.keys()].map(name => name.toLowerCase()))
  for (const feature of rawFeatures) {
    const providerName = feature.providerName.trim()
    if (!providerName || isPrivateProvider(providerName)) continue

    const key = providerName.toLowerCase()
    if (known.has(key)) continue
    known.add(key)

    records.push({ namespace: UNKNOWN_NAMESPACE, providerName, description: '' })
  }

  records.sort((a, b) =>
    compareOrdinal(a.providerName, b.providerName) || compareOrdinal(a.namespace, b.namespace)
  )

  return { records, warnings }
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Map raw operations 1:1 onto OperationRecords and add a placeholder for
 * every service that ended up with none. Sorted by (providerName, operation).
 */
export function extractOperations(
  rawOperations: readonly RawOperation[],
  services: readonly ServiceRecord[]
): Extraction<OperationRecord> {
  const warnings: string[] = []
  const records: OperationRecord[] = []
  const withOperations = new Set<string>()

  for (const raw of rawOperations) {
    const resolved = resolveProvider(raw)
    if ('warning' in resolved) {
      warnings.push(resolved.warning)
      continue
    }

    withOperations.add(resolved.providerName)
    records.push({
      namespace: raw.providerNamespace,
      providerName: resolved.providerName,
      operation: raw.operation.trim(),
      operationName: raw.operationName,
      resourceName: raw.resourceName,
      description: raw.description,
      isDataAction: raw.isDataAction
    })
  }

  for (const service of services) {
    if (!withOperations.has(service.providerName)) {
      records.push(createPlaceholder(service))
    }
  }

  return { records: sortByProviderThenOperation(records), warnings }
}

// ============================================================================
// Features
// ============================================================================

/**
 * Map raw features 1:1 onto FeatureRecords.
 *
 * When `services` is given (full extraction), a feature without a namespace
 * borrows the namespace of its provider's service row.
 */
export function extractFeatures(
  rawFeatures: readonly RawFeature[],
  services?: readonly ServiceRecord[]
): FeatureRecord[] {
  const namespaceByProvider = new Map<string, string>()
  for (const service of services ?? []) {
    namespaceByProvider.set(service.providerName.toLowerCase(), service.namespace)
  }

  return rawFeatures.map(raw => ({
    namespace: raw.providerNamespace
      || namespaceByProvider.get(raw.providerName.trim().toLowerCase())
      || UNKNOWN_NAMESPACE,
    providerName: raw.providerName,
    featureName: raw.featureName,
    registrationState: raw.registrationState,
    description: raw.description
  }))
}

// ============================================================================
// Summary
// ============================================================================

export interface OperationCounts {
  /** Real operations (placeholders excluded) */
  operations: number
  /** Providers represented only by a placeholder */
  providersWithoutOperations: number
}

export function countOperations(records: readonly OperationRecord[]): OperationCounts {
  let operations = 0
  let providersWithoutOperations = 0
  for (const record of records) {
    if (record.operation === '') providersWithoutOperations++
    else operations++
  }
  return { operations, providersWithoutOperations }
}
