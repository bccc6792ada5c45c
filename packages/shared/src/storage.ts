import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';

export const IMAGE_CONTENT_TYPES = ['image/jpeg', 'image/png', 'image/webp'] as const;

export type ImageContentType = (typeof IMAGE_CONTENT_TYPES)[number];

const EXTENSIONS: Record<ImageContentType, string> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/webp': '.webp',
};

export function isImageContentType(value: string): value is ImageContentType {
  return (IMAGE_CONTENT_TYPES as readonly string[]).includes(value);
}

export function extensionFor(contentType: string): string {
  const bare = contentType.split(';')[0].trim().toLowerCase();
  return isImageContentType(bare) ? EXTENSIONS[bare] : '.bin';
}

export interface ImageStorage {
  /** Writes the image and returns the stored name to persist on the scan. */
  save(key: string, data: Buffer, contentType: string): Promise<string>;
  read(name: string): Promise<Buffer>;
  /** No-op when the image is already gone. */
  remove(name: string): Promise<void>;
}

function assertPlainName(name: string): void {
  if (!name || name.includes('..') || basename(name) !== name) {
    throw new Error(`Invalid image name: ${name}`);
  }
}

export function createLocalImageStorage(rootDir: string): ImageStorage {
  const root = resolve(rootDir);

  return {
    async save(key, data, contentType) {
      const name = `${key}${extensionFor(contentType)}`;
      assertPlainName(name);
      await mkdir(root, { recursive: true });
      await writeFile(join(root, name), data);
      return name;
    },

    async read(name) {
      assertPlainName(name);
      return readFile(join(root, name));
    },

    async remove(name) {
      assertPlainName(name);
      await rm(join(root, name), { force: true });
    },
  };
}
