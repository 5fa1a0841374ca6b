/**
 * Azure Resource Manager catalog source
 *
 * Operations come from the provider operations metadata listing (with
 * resource types expanded), features from the subscription feature listing.
 * Credentials are resolved by DefaultAzureCredential (environment, managed
 * identity, Azure CLI login, ...).
 *
 * The ARM clients are injected as narrow interfaces so the flattening logic
 * can run against in-process fakes.
 */

import { DefaultAzureCredential } from '@azure/identity'
import { AuthorizationManagementClient } from '@azure/arm-authorization'
import { FeatureClient } from '@azure/arm-features'
import type { RawFeature, RawOperation } from '../types.js'
import type { CatalogSource } from './types.js'

// ============================================================================
// ARM shapes (the subset this source reads)
// ============================================================================

export interface ArmProviderOperation {
  name?: string
  displayName?: string
  description?: string
  isDataAction?: boolean
}

export interface ArmResourceType {
  name?: string
  displayName?: string
  operations?: ArmProviderOperation[]
}

export interface ArmProviderOperationsMetadata {
  name?: string
  displayName?: string
  resourceTypes?: ArmResourceType[]
  operations?: ArmProviderOperation[]
}

export interface ArmFeatureResult {
  name?: string
  properties?: { state?: string }
}

export interface ProviderOperationsMetadataClient {
  list(options?: { expand?: string }): AsyncIterable<ArmProviderOperationsMetadata>
}

export interface FeaturesClient {
  listAll(): AsyncIterable<ArmFeatureResult>
  list(resourceProviderNamespace: string): AsyncIterable<ArmFeatureResult>
}

export interface AzureCatalogClients {
  providerOperations: ProviderOperationsMetadataClient
  features: FeaturesClient
}

// ============================================================================
// Flattening
// ============================================================================

function toRawOperation(
  providerNamespace: string,
  resourceName: string,
  op: ArmProviderOperation
): RawOperation {
  return {
    providerNamespace,
    operation: op.name ?? '',
    operationName: op.displayName ?? '',
    resourceName,
    isDataAction: op.isDataAction ?? false,
    description: op.description ?? ''
  }
}

/**
 * Flatten one provider's metadata into raw operation entries: provider-level
 * operations first, then each resource type's operations.
 */
export function flattenProviderOperations(provider: ArmProviderOperationsMetadata): RawOperation[] {
  const namespace = provider.displayName ?? provider.name ?? ''
  const result = (provider.operations ?? []).map(op => toRawOperation(namespace, namespace, op))

  for (const resourceType of provider.resourceTypes ?? []) {
    const resourceName = resourceType.displayName ?? resourceType.name ?? ''
    for (const op of resourceType.operations ?? []) {
      result.push(toRawOperation(namespace, resourceName, op))
    }
  }

  return result
}

/**
 * ARM feature names are "<provider>/<feature>"
 */
export function toRawFeature(feature: ArmFeatureResult): RawFeature {
  const name = feature.name ?? ''
  const slash = name.indexOf('/')
  return {
    providerName: slash >= 0 ? name.slice(0, slash) : '',
    featureName: slash >= 0 ? name.slice(slash + 1) : name,
    registrationState: feature.properties?.state ?? '',
    description: ''
  }
}

// ============================================================================
// Source
// ============================================================================

export class AzureCatalogSource implements CatalogSource {
  readonly name: string

  constructor(
    private readonly clients: AzureCatalogClients,
    subscriptionId: string
  ) {
    this.name = `azure://${subscriptionId}`
  }

  /**
   * Build a source backed by the real ARM clients
   */
  static connect(subscriptionId: string): AzureCatalogSource {
    const credential = new DefaultAzureCredential()
    const authorization = new AuthorizationManagementClient(credential, subscriptionId)
    const features = new FeatureClient(credential, subscriptionId)

    return new AzureCatalogSource(
      {
        providerOperations: authorization.providerOperationsMetadataOperations,
        features: features.features
      },
      subscriptionId
    )
  }

  async listProviderOperations(): Promise<RawOperation[]> {
    const operations: RawOperation[] = []
    for await (const provider of this.clients.providerOperations.list({ expand: 'resourceTypes' })) {
      operations.push(...flattenProviderOperations(provider))
    }
    return operations
  }

  async listProviderFeatures(providerNamespace?: string): Promise<RawFeature[]> {
    const listing = providerNamespace
      ? this.clients.features.list(providerNamespace)
      : this.clients.features.listAll()

    const features: RawFeature[] = []
    for await (const feature of listing) {
      features.push(toRawFeature(feature))
    }
    return features
  }
}
