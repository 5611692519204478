/**
 * Provider-agnostic data models for the uploader
 */

import type { ImgurPrivacy } from './imgur';

export type Privacy = ImgurPrivacy;

export type SortOrder = 'lexical' | 'natural';

export const SORT_ORDERS: readonly SortOrder[] = ['lexical', 'natural'];

export interface ImageFile {
  readonly path: string; // Absolute path on disk
  readonly name: string; // Basename shown to the user
  readonly stem: string; // Basename without extension, used as the remote title
}

export interface UploadResult {
  id: string;
  deletehash: string;
  link: string;
}

export interface Album {
  id: string;
  title: string;
  imageIds: string[]; // Order in which the album shows its images
  url: string;
  deletehash?: string;
}

export interface UploadImageOptions {
  name: string;
  title?: string;
  description?: string;
}

export interface CreateAlbumRequest {
  title: string;
  imageIds: string[];
  description?: string;
  privacy?: Privacy;
}
