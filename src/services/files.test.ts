import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { compareFileNames, isImageFileName, listImageFiles, toImageFile } from './files';
import { EmptyInputError, NotFoundError } from '../lib/errors';
import { makeTempDir, writeFiles } from '../testing/fakes';

describe('listImageFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should return only images, in lexical order of file name', async () => {
    await writeFiles(dir, ['image10.png', 'image2.png', 'notes.txt', 'image1.jpg', 'Zeta.gif', 'a.PNG', '.hidden.png']);
    await fs.mkdir(path.join(dir, 'folder.png'));

    const files = await listImageFiles(dir);

    expect(files.map(file => file.name)).toEqual(['Zeta.gif', 'a.PNG', 'image1.jpg', 'image10.png', 'image2.png']);
  });

  it('should keep zero-padded numeric names in numeric order', async () => {
    await writeFiles(dir, ['page-010.png', 'page-002.png', 'page-001.png']);

    const files = await listImageFiles(dir);

    expect(files.map(file => file.name)).toEqual(['page-001.png', 'page-002.png', 'page-010.png']);
  });

  it('should compare digit runs numerically with the natural sort order', async () => {
    await writeFiles(dir, ['image10.png', 'image2.png', 'image1.jpg', 'Zeta.gif', 'a.PNG']);

    const files = await listImageFiles(dir, { sortOrder: 'natural' });

    expect(files.map(file => file.name)).toEqual(['Zeta.gif', 'a.PNG', 'image1.jpg', 'image2.png', 'image10.png']);
  });

  it('should keep case and punctuation significant in the natural sort order', async () => {
    await writeFiles(dir, ['b1.png', 'A2.png', 'a10.png', 'a9.png', 'x_2.png', 'x-10.png']);

    const files = await listImageFiles(dir, { sortOrder: 'natural' });

    expect(files.map(file => file.name)).toEqual(['A2.png', 'a9.png', 'a10.png', 'b1.png', 'x-10.png', 'x_2.png']);
  });

  it('should include symlinked images and skip dangling links', async () => {
    const source = path.join(dir, 'source');
    const album = path.join(dir, 'album');
    await fs.mkdir(source);
    await fs.mkdir(album);
    await writeFiles(source, ['real.png']);
    await writeFiles(album, ['image1.png']);
    await fs.symlink(path.join(source, 'real.png'), path.join(album, 'image0.png'));
    await fs.symlink(path.join(source, 'gone.png'), path.join(album, 'image2.png'));
    await fs.symlink(source, path.join(album, 'image3.png'));

    const files = await listImageFiles(album);

    expect(files.map(file => file.name)).toEqual(['image0.png', 'image1.png']);
  });

  it('should describe each file with an absolute path and a stem', async () => {
    await writeFiles(dir, ['cover.jpeg']);

    const [file] = await listImageFiles(dir);

    expect(file).toEqual({
      path: path.join(path.resolve(dir), 'cover.jpeg'),
      name: 'cover.jpeg',
      stem: 'cover',
    });
  });

  it('should honour a custom extension list', async () => {
    await writeFiles(dir, ['a.png', 'b.webp']);

    const files = await listImageFiles(dir, { extensions: ['.webp'] });

    expect(files.map(file => file.name)).toEqual(['b.webp']);
  });

  it('should fail with NotFoundError when the directory does not exist', async () => {
    await expect(listImageFiles(path.join(dir, 'missing'))).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should fail with NotFoundError when the path is a file', async () => {
    await writeFiles(dir, ['image0.png']);

    await expect(listImageFiles(path.join(dir, 'image0.png'))).rejects.toThrow(
      `The given path is not a directory: ${path.join(dir, 'image0.png')}`
    );
  });

  it('should fail with EmptyInputError when no image is present', async () => {
    await writeFiles(dir, ['notes.txt', 'archive.zip']);

    await expect(listImageFiles(dir)).rejects.toBeInstanceOf(EmptyInputError);
  });
});

describe('isImageFileName', () => {
  it('should match extensions case-insensitively', () => {
    expect(isImageFileName('photo.JPG')).toBe(true);
    expect(isImageFileName('photo.jpeg')).toBe(true);
    expect(isImageFileName('photo.txt')).toBe(false);
    expect(isImageFileName('png')).toBe(false);
  });

  it('should skip hidden files', () => {
    expect(isImageFileName('.thumb.png')).toBe(false);
  });
});

describe('compareFileNames', () => {
  it('should order upper case before lower case lexically', () => {
    expect(compareFileNames('B.png', 'a.png')).toBeLessThan(0);
    expect(compareFileNames('a.png', 'a.png')).toBe(0);
  });

  it('should compare digit runs by value and break ties on zero padding', () => {
    expect(compareFileNames('page2.png', 'page10.png', 'natural')).toBeLessThan(0);
    expect(compareFileNames('page007.png', 'page7.png', 'natural')).toBeLessThan(0);
    expect(compareFileNames('12345678901234567890.png', '9.png', 'natural')).toBeGreaterThan(0);
  });
});

describe('toImageFile', () => {
  it('should strip only the last extension for the stem', () => {
    expect(toImageFile('/tmp/scan.final.png')).toEqual({
      path: '/tmp/scan.final.png',
      name: 'scan.final.png',
      stem: 'scan.final',
    });
  });
});
