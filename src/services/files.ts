/**
 * Finds the images to upload and fixes their order
 */
import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { EmptyInputError, NotFoundError, isErrnoException } from '../lib/errors';
import type { ImageFile, SortOrder } from '../types/models';

export const IMAGE_EXTENSIONS: readonly string[] = [
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.apng',
  '.tif',
  '.tiff',
  '.webp',
];

export interface ListImageFilesOptions {
  sortOrder?: SortOrder;
  extensions?: readonly string[];
}

function compareLexical(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareDigits(a: string, b: string): number {
  const left = a.replace(/^0+/, '');
  const right = b.replace(/^0+/, '');
  return left.length - right.length || compareLexical(left, right);
}

/**
 * Splits both names into text and digit runs. Text runs compare by code unit,
 * so case stays significant; digit runs compare by value.
 */
function compareNatural(a: string, b: string): number {
  // split with a capture group puts the digit runs at odd indices
  const left = a.split(/(\d+)/);
  const right = b.split(/(\d+)/);
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i++) {
    const order = i % 2 === 1 ? compareDigits(left[i], right[i]) : compareLexical(left[i], right[i]);
    if (order !== 0) return order;
  }
  return left.length - right.length || compareLexical(a, b);
}

export function compareFileNames(a: string, b: string, sortOrder: SortOrder = 'lexical'): number {
  return sortOrder === 'natural' ? compareNatural(a, b) : compareLexical(a, b);
}

export function isImageFileName(name: string, extensions: readonly string[] = IMAGE_EXTENSIONS): boolean {
  if (name.startsWith('.')) return false;
  return extensions.includes(path.extname(name).toLowerCase());
}

export function toImageFile(filePath: string): ImageFile {
  const name = path.basename(filePath);
  return {
    path: filePath,
    name,
    stem: path.basename(name, path.extname(name)),
  };
}

/** Follows the link; a dangling link is not a file */
async function isLinkToFile(linkPath: string): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isFile();
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') return false;
    throw error;
  }
}

/**
 * List the images in `dirPath`, ordered by file name
 * @throws NotFoundError when the path is missing or not a directory
 * @throws EmptyInputError when no recognized image is found
 */
export async function listImageFiles(dirPath: string, options: ListImageFilesOptions = {}): Promise<ImageFile[]> {
  const { sortOrder = 'lexical', extensions = IMAGE_EXTENSIONS } = options;
  const absoluteDir = path.resolve(dirPath);

  let stats: Stats;
  try {
    stats = await fs.stat(absoluteDir);
  } catch (error: unknown) {
    throw new NotFoundError({
      message: `The given path does not exist: ${dirPath}`,
      cause: error,
      details: { path: absoluteDir },
    });
  }

  if (!stats.isDirectory()) {
    throw new NotFoundError({
      message: `The given path is not a directory: ${dirPath}`,
      details: { path: absoluteDir },
    });
  }

  const entries = await fs.readdir(absoluteDir, { withFileTypes: true });
  const names: string[] = [];
  for (const entry of entries) {
    if (!isImageFileName(entry.name, extensions)) continue;
    if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkToFile(path.join(absoluteDir, entry.name))))) {
      names.push(entry.name);
    }
  }

  const images = names
    .sort((a, b) => compareFileNames(a, b, sortOrder))
    .map(name => toImageFile(path.join(absoluteDir, name)));

  if (images.length === 0) {
    throw new EmptyInputError({
      message: `The given directory does not contain any images: ${dirPath}`,
      details: { path: absoluteDir, extensions: [...extensions] },
    });
  }

  return images;
}
