/**
 * Record builders shared by the tests
 */

import type { OperationRecord, RawFeature, RawOperation } from '../src/types.js'

export function rawOp(
  operation: string,
  providerNamespace: string = 'Microsoft Compute',
  overrides: Partial<RawOperation> = {}
): RawOperation {
  return {
    providerNamespace,
    operation,
    operationName: `Name of ${operation}`,
    resourceName: 'virtualMachines',
    isDataAction: false,
    description: `Description of ${operation}`,
    ...overrides
  }
}

export function rawFeature(providerName: string, featureName: string = 'PreviewAccess'): RawFeature {
  return { providerName, featureName, registrationState: 'Registered', description: '' }
}

export function op(operation: string, overrides: Partial<OperationRecord> = {}): OperationRecord {
  return {
    namespace: 'Test Provider',
    providerName: operation.slice(0, operation.indexOf('/')),
    operation,
    operationName: `Name of ${operation}`,
    resourceName: 'things',
    description: `Description of ${operation}`,
    isDataAction: false,
    ...overrides
  }
}
