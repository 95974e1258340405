import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ImageStore } from './store';

describe('ImageStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'image-store-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes images into the folder for their kind', async () => {
    const store = new ImageStore(root);
    const paths = await store.save('images', [
      { fileName: 'page_1_abcdef12.jpg', page: 1, mimeType: 'image/jpeg', data: Buffer.from('first') },
      { fileName: 'page_2_abcdef34.jpg', page: 2, mimeType: 'image/jpeg', data: Buffer.from('second') },
    ]);

    expect(paths).toEqual([
      path.join(root, 'images', 'page_1_abcdef12.jpg'),
      path.join(root, 'images', 'page_2_abcdef34.jpg'),
    ]);
    expect(await readFile(paths[1], 'utf8')).toBe('second');
  });

  it('keeps file names inside the target folder', async () => {
    const paths = await new ImageStore(root).save('embedded_images', [
      { fileName: '../escape.png', page: 1, mimeType: 'image/png', data: Buffer.from('x') },
    ]);

    expect(paths).toEqual([path.join(root, 'embedded_images', 'escape.png')]);
  });

  it('creates nothing for an empty list', async () => {
    expect(await new ImageStore(root).save('embedded_images', [])).toEqual([]);
    await expect(stat(path.join(root, 'embedded_images'))).rejects.toThrow();
  });
});
