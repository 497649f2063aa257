import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join, resolve, sep } from 'node:path';
import { resolveBlobPath } from '../../domain/index.js';

/**
 * Binary sidecar storage, bucketed by capture date.
 *
 * `write` resolves only after the bytes are on disk; the gate awaits it
 * before the owning record is inserted.
 */
export class BlobStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /** Writes the bytes and returns the path relative to the store root. */
  async write(
    timestampSeconds: number,
    objectId: string,
    bytes: Uint8Array,
    extension: string | undefined,
  ): Promise<string> {
    const location = resolveBlobPath(this.root, timestampSeconds, objectId, extension);
    await mkdir(dirname(location.absolutePath), { recursive: true });
    await writeFile(location.absolutePath, bytes);
    return location.relativePath;
  }

  resolve(relativePath: string): string {
    const absolute = resolve(join(this.root, ...relativePath.split('/')));
    if (absolute !== this.root && !absolute.startsWith(this.root + sep)) {
      throw new Error(`Blob path escapes store root: ${relativePath}`);
    }
    return absolute;
  }

  async read(relativePath: string): Promise<Buffer> {
    return readFile(this.resolve(relativePath));
  }
}
