/**
 * Record helpers shared by the extractor and the differ
 */

import type { OperationRecord, ServiceRecord } from '../types.js'
import { NO_OPERATIONS_SENTINEL } from '../types.js'
import { MalformedOperationError } from '../lib/errors.js'

/**
 * Ordinal (UTF-16 code unit) comparison.
 *
 * Every sort and every merge-scan comparison goes through this, so the
 * order the differ scans in is the order the records were sorted in.
 */
export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Provider name of an operation string: everything before the first '/'.
 *
 * @throws MalformedOperationError when the string has no '/'
 */
export function parseProviderName(operation: string, namespace?: string): string {
  const trimmed = operation.trim()
  const slash = trimmed.indexOf('/')
  if (slash <= 0) {
    throw new MalformedOperationError(trimmed, namespace)
  }
  return trimmed.slice(0, slash)
}

/**
 * Placeholders stand in for providers with zero discovered operations.
 * They carry no permission identity.
 */
export function isPlaceholder(record: OperationRecord): boolean {
  return record.operation === ''
}

/**
 * Build the placeholder row for a provider that has no operations.
 * The provider name is kept in resourceName so it survives the flat table.
 */
export function createPlaceholder(service: ServiceRecord): OperationRecord {
  return {
    namespace: service.namespace,
    providerName: service.providerName,
    operation: '',
    operationName: NO_OPERATIONS_SENTINEL,
    resourceName: service.providerName,
    description: `No operations listed for ${service.providerName}; provider discovered only through the feature listing`,
    isDataAction: false
  }
}

/**
 * New array sorted by operation key ascending
 */
export function sortByOperation(records: readonly OperationRecord[]): OperationRecord[] {
  return [...records].sort((a, b) => compareOrdinal(a.operation, b.operation))
}

/**
 * New array sorted by (providerName, operation) ascending
 */
export function sortByProviderThenOperation(records: readonly OperationRecord[]): OperationRecord[] {
  return [...records].sort((a, b) =>
    compareOrdinal(a.providerName, b.providerName) || compareOrdinal(a.operation, b.operation)
  )
}

/**
 * True when every adjacent pair is in ascending operation order
 */
export function isSortedByOperation(records: readonly OperationRecord[]): boolean {
  for (let i = 1; i < records.length; i++) {
    if (compareOrdinal(records[i - 1].operation, records[i].operation) > 0) {
      return false
    }
  }
  return true
}

/**
 * Distinct non-empty provider names, sorted
 */
export function distinctProviderNames(records: readonly { providerName: string }[]): string[] {
  const names = new Set(records.map(r => r.providerName).filter(name => name !== ''))
  return [...names].sort(compareOrdinal)
}
