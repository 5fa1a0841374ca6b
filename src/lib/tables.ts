/**
 * Table definitions for the exported record sets
 *
 * Each table has a CSV layout (all columns) and a fixed-width text layout
 * (a presentational selection of columns with fixed widths).
 */

import type { FeatureRecord, OperationRecord, ServiceRecord } from '../types.js'
import { formatCsv } from './csv.js'
import { formatFixedWidth, type FixedWidthColumn } from './fixed-width.js'

// =============================================================================
// Types
// =============================================================================

export type TableName = 'Services' | 'Features' | 'Operations'

export interface TableDefinition<T> {
  name: TableName
  header: readonly string[]
  toRow(record: T): string[]
  text: {
    columns: readonly FixedWidthColumn[]
    toCells(record: T): string[]
  }
}

// =============================================================================
// Headers
// =============================================================================

export const SERVICE_HEADER = ['ProviderNamespace', 'ProviderName', 'Description'] as const

export const FEATURE_HEADER = [
  'ProviderNamespace',
  'ProviderName',
  'FeatureName',
  'RegistrationState',
  'Description'
] as const

export const OPERATION_HEADER = [
  'ProviderNamespace',
  'Operation',
  'OperationName',
  'ResourceName',
  'Description',
  'IsDataAction'
] as const

export function formatBoolean(value: boolean): string {
  return value ? 'True' : 'False'
}

export function parseBoolean(value: string): boolean {
  return value.trim().toLowerCase() === 'true'
}

// =============================================================================
// Definitions
// =============================================================================

export const servicesTable: TableDefinition<ServiceRecord> = {
  name: 'Services',
  header: SERVICE_HEADER,
  toRow: s => [s.namespace, s.providerName, s.description],
  text: {
    columns: [
      { header: 'ProviderNamespace', width: 56 },
      { header: 'ProviderName', width: 40 },
      { header: 'Description' }
    ],
    toCells: s => [s.namespace, s.providerName, s.description]
  }
}

export const featuresTable: TableDefinition<FeatureRecord> = {
  name: 'Features',
  header: FEATURE_HEADER,
  toRow: f => [f.namespace, f.providerName, f.featureName, f.registrationState, f.description],
  text: {
    columns: [
      { header: 'ProviderNamespace', width: 56 },
      { header: 'ProviderName', width: 40 },
      { header: 'FeatureName', width: 64 },
      { header: 'RegistrationState', width: 20 },
      { header: 'Description' }
    ],
    toCells: f => [f.namespace, f.providerName, f.featureName, f.registrationState, f.description]
  }
}

export const operationsTable: TableDefinition<OperationRecord> = {
  name: 'Operations',
  header: OPERATION_HEADER,
  toRow: o => [o.namespace, o.operation, o.operationName, o.resourceName, o.description, formatBoolean(o.isDataAction)],
  text: {
    columns: [
      { header: 'ProviderNamespace', width: 60 },
      { header: 'Operation', width: 100 },
      { header: 'OperationName', width: 100 },
      { header: 'Description' }
    ],
    toCells: o => [o.namespace, o.operation, o.operationName, o.description]
  }
}

// =============================================================================
// Rendering
// =============================================================================

export function renderCsv<T>(table: TableDefinition<T>, records: readonly T[]): string {
  return formatCsv(table.header, records.map(record => table.toRow(record)))
}

export function renderText<T>(table: TableDefinition<T>, records: readonly T[]): string {
  const lines = formatFixedWidth(table.text.columns, records.map(record => table.text.toCells(record)))
  return lines.join('\n') + '\n'
}

/**
 * The reserved first row of the Operations export in note mode
 */
export function createNoteRow(date: string, operationCount: number, providerCount: number): OperationRecord {
  return {
    namespace: '',
    providerName: '',
    operation: '',
    operationName: '',
    resourceName: '',
    description: `Generated ${date}: ${operationCount} operations across ${providerCount} providers.`,
    isDataAction: false
  }
}
