/**
 * Snapshot Differ
 *
 * Computes what changed between two Operations snapshots.
 *
 * Operation delta algorithm (co-sorted merge scan):
 * 1. Drop placeholders; they have no permission identity
 * 2. Sort both sides by operation key and drop repeated keys
 * 3. Walk both lists together:
 *    - previous key < current key (or current exhausted) → Deprecated
 *    - keys equal                                         → unchanged
 *    - otherwise                                          → New
 *
 * The result equals the symmetric difference by key, sorted by key, with New
 * and Deprecated entries interleaved.
 */

import type { DeltaEntry, OperationRecord, ServiceNameDelta } from '../types.js'
import {
  compareOrdinal,
  distinctProviderNames,
  isPlaceholder,
  isSortedByOperation,
  sortByOperation
} from './records.js'

// ============================================================================
// Operation Delta
// ============================================================================

/**
 * Placeholder-free, sorted, one record per key (first occurrence wins)
 */
function prepareSide(records: readonly OperationRecord[]): OperationRecord[] {
  const real = records.filter(record => !isPlaceholder(record))
  const sorted = isSortedByOperation(real) ? real : sortByOperation(real)

  const unique: OperationRecord[] = []
  for (const record of sorted) {
    const last = unique[unique.length - 1]
    if (last && last.operation === record.operation) continue
    unique.push(record)
  }
  return unique
}

export function computeOperationDelta(
  previousOperations: readonly OperationRecord[],
  currentOperations: readonly OperationRecord[]
): DeltaEntry[] {
  const previous = prepareSide(previousOperations)
  const current = prepareSide(currentOperations)
  const delta: DeltaEntry[] = []

  let i = 0
  let j = 0
  while (i < previous.length || j < current.length) {
    if (j >= current.length || (i < previous.length && compareOrdinal(previous[i].operation, current[j].operation) < 0)) {
      delta.push({ record: previous[i], status: 'Deprecated' })
      i++
    } else if (i < previous.length && previous[i].operation === current[j].operation) {
      i++
      j++
    } else {
      delta.push({ record: current[j], status: 'New' })
      j++
    }
  }

  return delta
}

export interface DeltaSummary {
  total: number
  added: number
  deprecated: number
}

export function summarizeDelta(delta: readonly DeltaEntry[]): DeltaSummary {
  const added = delta.filter(entry => entry.status === 'New').length
  return {
    total: delta.length,
    added,
    deprecated: delta.length - added
  }
}

// ============================================================================
// Service Name Delta
// ============================================================================

/**
 * Compare the provider-name sets of two snapshots.
 *
 * Either side may be Services or Operations records; only providerName is read.
 */
export function computeServiceNameDelta(
  previous: readonly { providerName: string }[],
  current: readonly { providerName: string }[]
): ServiceNameDelta {
  const before = new Set(distinctProviderNames(previous))
  const after = distinctProviderNames(current)
  const afterSet = new Set(after)

  return {
    added: after.filter(name => !before.has(name)),
    removed: [...before].filter(name => !afterSet.has(name))
  }
}
