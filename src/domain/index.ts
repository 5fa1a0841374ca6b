/**
 * Domain layer: extraction, diffing and history rendering
 */

export {
  extractServices,
  extractOperations,
  extractFeatures,
  countOperations,
  isPrivateProvider,
  type OperationCounts
} from './extract.js'

export {
  computeOperationDelta,
  computeServiceNameDelta,
  summarizeDelta,
  type DeltaSummary
} from './delta.js'

export {
  renderHistoryEntry,
  appendHistoryEntry,
  formatHistoryDate,
  HISTORY_BANNER,
  HISTORY_DIVIDER
} from './history.js'

export {
  compareOrdinal,
  parseProviderName,
  isPlaceholder,
  createPlaceholder,
  sortByOperation,
  sortByProviderThenOperation,
  distinctProviderNames
} from './records.js'
