/**
 * Storage Provider Factory
 *
 * Creates and configures storage provider instances based on the provider type
 */

import type { StorageProvider } from './StorageProvider';
import { ImgurAdapter, type ImgurAdapterOptions } from './adapters/ImgurAdapter';

export type ProviderType = 'imgur';

/**
 * Create a storage provider instance based on the provider type
 * @param type - The type of storage provider to create
 * @param options - Credentials and transport settings for the provider
 */
export function createStorageProvider(type: ProviderType, options: ImgurAdapterOptions): StorageProvider {
  switch (type) {
    case 'imgur':
      return new ImgurAdapter(options);

    default:
      throw new Error(`Unknown storage provider type: ${String(type)}`);
  }
}
