/**
 * Types for the ordered upload run
 */
import type { Album, ImageFile, UploadResult } from './models';

export type UploadState =
  | 'enumerating'
  | 'confirming'
  | 'uploading'
  | 'creating-album'
  | 'reporting'
  | 'done'
  | 'aborted'
  | 'failed';

export type UploadEvent =
  | { type: 'enumerated'; files: readonly ImageFile[] }
  | { type: 'aborted' }
  | { type: 'uploading'; index: number; total: number; file: ImageFile }
  | { type: 'uploaded'; index: number; total: number; file: ImageFile; result: UploadResult }
  | { type: 'creating-album'; title: string; imageIds: readonly string[] }
  | { type: 'album-created'; album: Album }
  | { type: 'failed'; state: UploadState; error: unknown; file?: ImageFile };

export type UploadObserver = (event: UploadEvent) => void;

export interface UploadRequest {
  directory: string;
  title: string;
}

export type UploadOutcome =
  | { status: 'done'; album: Album; uploads: UploadResult[] }
  | { status: 'aborted' };
