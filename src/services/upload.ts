/**
 * Drives one run: enumerate, confirm, upload each image in order, create the
 * album from the collected ids, report.
 *
 * Uploads are awaited one at a time. That, and passing the collected ids
 * unchanged to album creation, is what keeps the album in file order; Imgur
 * has no other notion of sequence.
 */
import * as fs from 'fs/promises';
import type { StorageProvider } from './storage/StorageProvider';
import { listImageFiles } from './files';
import { logger as rootLogger, type Logger } from '../lib/logger';
import type { Album, ImageFile, Privacy, SortOrder, UploadResult } from '../types/models';
import type { UploadObserver, UploadOutcome, UploadRequest, UploadState } from '../types/upload';

/** Called once, after the user confirms and before the first upload */
export type StorageFactory = () => Promise<StorageProvider>;

export interface UploadServiceOptions {
  /** Asked once the files are known; false aborts the run */
  confirm: (files: readonly ImageFile[]) => Promise<boolean>;
  observer?: UploadObserver;
  sortOrder?: SortOrder;
  privacy?: Privacy;
  readFile?: (filePath: string) => Promise<Uint8Array>;
  logger?: Logger;
}

export class UploadService {
  private getStorage: StorageFactory;
  private options: UploadServiceOptions;
  private logger: Logger;
  private readFile: (filePath: string) => Promise<Uint8Array>;
  private currentState: UploadState = 'enumerating';

  constructor(getStorage: StorageFactory, options: UploadServiceOptions) {
    this.getStorage = getStorage;
    this.options = options;
    this.logger = options.logger ?? rootLogger.child('Upload');
    this.readFile = options.readFile ?? (filePath => fs.readFile(filePath));
  }

  get state(): UploadState {
    return this.currentState;
  }

  private transition(state: UploadState): void {
    this.logger.debug(`${this.currentState} -> ${state}`);
    this.currentState = state;
  }

  private emit: UploadObserver = (event) => {
    this.options.observer?.(event);
  };

  async run(request: UploadRequest): Promise<UploadOutcome> {
    let currentFile: ImageFile | undefined;

    try {
      this.transition('enumerating');
      const files = await listImageFiles(request.directory, { sortOrder: this.options.sortOrder });
      this.emit({ type: 'enumerated', files });

      this.transition('confirming');
      if (!(await this.options.confirm(files))) {
        this.transition('aborted');
        this.emit({ type: 'aborted' });
        return { status: 'aborted' };
      }

      const storage = await this.getStorage();

      this.transition('uploading');
      const uploads: UploadResult[] = [];
      for (const [index, file] of files.entries()) {
        currentFile = file;
        this.emit({ type: 'uploading', index, total: files.length, file });

        const result = await this.uploadFile(storage, file);
        uploads.push(result);

        this.emit({ type: 'uploaded', index, total: files.length, file, result });
      }
      currentFile = undefined;

      this.transition('creating-album');
      const album = await this.createAlbum(storage, request.title, uploads);

      this.transition('reporting');
      this.emit({ type: 'album-created', album });

      this.transition('done');
      return { status: 'done', album, uploads };
    } catch (error: unknown) {
      const failedIn = this.currentState;
      this.transition('failed');
      this.logger.debug('Run failed', { state: failedIn, file: currentFile?.name });
      this.emit({ type: 'failed', state: failedIn, error, file: currentFile });
      throw error;
    }
  }

  private async uploadFile(storage: StorageProvider, file: ImageFile): Promise<UploadResult> {
    const bytes = await this.readFile(file.path);

    this.logger.debug(`Uploading ${file.name}`, { size: bytes.byteLength });
    const result = await storage.uploadImage(bytes, {
      name: file.name,
      title: file.stem,
      description: file.stem,
    });
    this.logger.debug(`Uploaded ${file.name}`, { id: result.id });

    return result;
  }

  private async createAlbum(storage: StorageProvider, title: string, uploads: readonly UploadResult[]): Promise<Album> {
    const imageIds = uploads.map(upload => upload.id);
    this.emit({ type: 'creating-album', title, imageIds });

    return storage.createAlbum({
      title,
      imageIds,
      description: '',
      privacy: this.options.privacy ?? 'hidden',
    });
  }
}
