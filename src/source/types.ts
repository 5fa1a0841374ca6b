/**
 * Catalog Source Interface
 *
 * A source lists the raw provider operations and feature registrations of a
 * cloud subscription. Results are unordered.
 */

import type { RawFeature, RawOperation } from '../types.js'

export interface CatalogSource {
  /** Human-readable location, used in messages (e.g. "azure://<id>") */
  readonly name: string

  listProviderOperations(): Promise<RawOperation[]>

  /**
   * @param providerNamespace - limit to one provider (e.g. "Microsoft.Compute")
   */
  listProviderFeatures(providerNamespace?: string): Promise<RawFeature[]>
}
