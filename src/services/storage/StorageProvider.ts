/**
 * Storage Provider Interface
 *
 * The two calls the uploader needs from a photo host. Tests substitute a fake
 * implementation; `ImgurAdapter` is the real one.
 */

import type {
  Album,
  CreateAlbumRequest,
  UploadImageOptions,
  UploadResult,
} from '../../types/models';

export interface StorageProvider {
  /**
   * Get the name/type of the storage provider
   */
  readonly name: string;

  /**
   * Upload one image
   * @param bytes - Raw file content
   * @returns The identifiers the service assigned to the image
   * @throws UploadError when the service rejects the request
   * @throws TransportError when the service cannot be reached
   */
  uploadImage(bytes: Uint8Array, options: UploadImageOptions): Promise<UploadResult>;

  /**
   * Create an album holding `imageIds` in the given order
   * @throws UploadError when the service rejects the request
   * @throws TransportError when the service cannot be reached
   */
  createAlbum(request: CreateAlbumRequest): Promise<Album>;
}
