import { dirname, join, relative, sep } from 'node:path';
import { promises as fs, type Dirent } from 'node:fs';
import type { StorageProvider, StoredObjectMetadata } from './types';
import { StorageNotFoundError } from './errors';
import { normalizeKey, normalizePrefix } from './keys';

const TEMP_SUFFIX = '.tmp';

function isNotFound(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === 'ENOENT';
}

/**
 * Filesystem-backed object store. Keys map to paths below `basePath`:
 * `compliance-results/2026/10/user_7/compliance_summary.csv` lives at
 * `<basePath>/compliance-results/2026/10/user_7/compliance_summary.csv`.
 */
export class FilesystemObjectStorage implements StorageProvider {
  private readonly basePath: string;

  constructor(basePath: string) {
    this.basePath = basePath;
  }

  async put(key: string, content: Buffer, contentType: string): Promise<StoredObjectMetadata> {
    const storagePath = this.getStoragePath(key);
    await fs.mkdir(dirname(storagePath), { recursive: true });

    const tempPath = `${storagePath}${TEMP_SUFFIX}`;
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, storagePath);

    return {
      key: normalizeKey(key),
      contentType,
      sizeBytes: content.length,
      lastModified: new Date().toISOString(),
      storagePath,
    };
  }

  async get(key: string): Promise<Buffer> {
    const storagePath = this.getStoragePath(key);
    try {
      return await fs.readFile(storagePath);
    } catch (error) {
      if (isNotFound(error) || (error as NodeJS.ErrnoException).code === 'EISDIR') {
        throw new StorageNotFoundError(normalizeKey(key));
      }
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.getStoragePath(key));
      return stats.isFile();
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.unlink(this.getStoragePath(key));
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw error;
    }
  }

  async list(prefix: string): Promise<StoredObjectMetadata[]> {
    const normalized = normalizePrefix(prefix);
    const root = normalized ? join(this.basePath, ...normalized.split('/')) : this.basePath;
    const objects: StoredObjectMetadata[] = [];
    await this.walk(root, objects);
    return objects.sort((a, b) => a.key.localeCompare(b.key));
  }

  describe(): string {
    return `filesystem:${this.basePath}`;
  }

  getStoragePath(key: string): string {
    return join(this.basePath, ...normalizeKey(key).split('/'));
  }

  private async walk(directory: string, into: StoredObjectMetadata[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === 'ENOENT' || code === 'ENOTDIR') return;
      throw error;
    }

    for (const entry of entries) {
      const fullPath = join(directory, entry.name);
      if (entry.isDirectory()) {
        await this.walk(fullPath, into);
        continue;
      }
      if (!entry.isFile() || entry.name.endsWith(TEMP_SUFFIX)) continue;

      const stats = await fs.stat(fullPath);
      into.push({
        key: relative(this.basePath, fullPath).split(sep).join('/'),
        sizeBytes: stats.size,
        lastModified: stats.mtime.toISOString(),
        storagePath: fullPath,
      });
    }
  }
}
