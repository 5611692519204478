/**
 * Imgur Storage Provider Adapter
 *
 * Implements the StorageProvider interface for Imgur's API.
 * Requests are made once; a failure is turned into an UploadError (the
 * service answered) or a TransportError (it did not) and handed back to the
 * caller.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { StorageProvider } from '../StorageProvider';
import type {
  Album,
  CreateAlbumRequest,
  UploadImageOptions,
  UploadResult,
} from '../../../types/models';
import type {
  ImgurApiResponse,
  ImgurCreateAlbumBody,
  ImgurCreatedAlbum,
  ImgurImage,
} from '../../../types/imgur';
import { TransportError, UploadError } from '../../../lib/errors';
import { logger as rootLogger, type Logger } from '../../../lib/logger';

export const IMGUR_API_BASE_URL = 'https://api.imgur.com/3';
export const IMGUR_WEB_BASE_URL = 'https://imgur.com';

export interface ImgurAdapterOptions {
  accessToken: string;
  baseURL?: string;
  /** Replaces axios' HTTP transport; used by tests */
  httpAdapter?: AxiosRequestConfig['adapter'];
  logger?: Logger;
}

export function albumUrl(albumId: string): string {
  return `${IMGUR_WEB_BASE_URL}/a/${albumId}`;
}

/**
 * Pull a readable message out of an Imgur error body. `data.error` is a plain
 * string on most endpoints, an object with a `message` on some upload failures.
 */
export function extractServiceMessage(body: unknown, fallback: string): string {
  if (typeof body !== 'object' || body === null || !('data' in body)) return fallback;

  const payload = body.data;
  if (typeof payload !== 'object' || payload === null || !('error' in payload)) return fallback;

  const error = payload.error;
  if (typeof error === 'string' && error.length > 0) return error;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string' && error.message) {
    return error.message;
  }
  return fallback;
}

export class ImgurAdapter implements StorageProvider {
  public readonly name = 'imgur';
  private api: AxiosInstance;
  private logger: Logger;

  constructor(options: ImgurAdapterOptions) {
    const accessToken = options.accessToken.trim();
    if (!accessToken) {
      throw new Error('Imgur access token is required');
    }

    this.logger = options.logger ?? rootLogger.child('Imgur');
    this.api = axios.create({
      baseURL: options.baseURL ?? IMGUR_API_BASE_URL,
      adapter: options.httpAdapter,
      headers: {
        'Content-Type': 'application/json',
      },
    });

    this.setupInterceptors(accessToken);
  }

  private setupInterceptors(accessToken: string): void {
    this.api.interceptors.request.use((config) => {
      config.headers.Authorization = `Bearer ${accessToken}`;
      this.logger.debug(`${config.method?.toUpperCase()} ${config.url}`, { authType: 'OAuth' });
      return config;
    });
  }

  /**
   * Makes a single API request and maps failures onto the error taxonomy
   */
  private async request<T>(config: AxiosRequestConfig): Promise<{ status: number; body: T }> {
    const requestId = Math.random().toString(36).substring(2, 8);
    const logPrefix = `[Req ${requestId}]`;

    this.logger.debug(`${logPrefix} Starting request to ${config.url}`, { method: config.method });

    try {
      const response = await this.api.request<T>(config);
      this.logger.debug(`${logPrefix} Request succeeded`, { status: response.status });
      return { status: response.status, body: response.data };
    } catch (error: unknown) {
      const details = { url: config.url, method: config.method, requestId };

      if (axios.isAxiosError(error) && error.response) {
        const { status, statusText, data } = error.response;
        const serviceMessage = extractServiceMessage(data, statusText || `HTTP ${status}`);
        this.logger.debug(`${logPrefix} Request rejected`, { status, serviceMessage });

        throw new UploadError({
          message: `Imgur rejected ${config.method?.toUpperCase()} ${config.url} (${status}): ${serviceMessage}`,
          status,
          serviceMessage,
          cause: error,
          details,
        });
      }

      const reason = error instanceof Error ? error.message : String(error);
      this.logger.debug(`${logPrefix} Request failed without a response`, { reason });

      throw new TransportError({
        message: `Could not reach Imgur: ${reason}`,
        cause: error,
        details,
      });
    }
  }

  async uploadImage(bytes: Uint8Array, options: UploadImageOptions): Promise<UploadResult> {
    const formData = new FormData();
    formData.append('image', new Blob([bytes]), options.name);
    formData.append('type', 'file');
    formData.append('name', options.name);

    if (options.title) formData.append('title', options.title);
    if (options.description) formData.append('description', options.description);

    const { status, body } = await this.request<ImgurApiResponse<ImgurImage>>({
      method: 'POST',
      url: '/image',
      data: formData,
      headers: {
        'Content-Type': 'multipart/form-data',
      },
    });

    const image = body?.data;
    if (!image?.id) {
      throw new UploadError({
        message: `Imgur accepted ${options.name} but returned no image id`,
        status,
        serviceMessage: 'Missing image id in response',
      });
    }

    return {
      id: image.id,
      deletehash: image.deletehash,
      link: image.link,
    };
  }

  async createAlbum(request: CreateAlbumRequest): Promise<Album> {
    const imgurData: ImgurCreateAlbumBody = {
      ids: [...request.imageIds],
      title: request.title,
      description: request.description ?? '',
      privacy: request.privacy ?? 'hidden',
    };

    const { status, body } = await this.request<ImgurApiResponse<ImgurCreatedAlbum>>({
      method: 'POST',
      url: '/album',
      data: imgurData,
    });

    const created = body?.data;
    if (!created?.id) {
      throw new UploadError({
        message: `Imgur accepted album "${request.title}" but returned no album id`,
        status,
        serviceMessage: 'Missing album id in response',
      });
    }

    return {
      id: created.id,
      title: request.title,
      imageIds: imgurData.ids,
      url: albumUrl(created.id),
      deletehash: created.deletehash,
    };
  }
}
