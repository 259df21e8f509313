import type { Dirent } from 'fs';
import { mkdir, readdir, readFile, rm, stat, writeFile } from 'fs/promises';
import path from 'path';

/**
 * Byte storage keyed by posix-style path strings. Snapshots and saved
 * variable files go through this so the engine never assumes a filesystem.
 */
export interface Persistence {
  read(key: string): Promise<Buffer>;
  write(key: string, data: Buffer | string): Promise<void>;
  exists(key: string): Promise<boolean>;
  /** Every stored key under `dir`, recursively, sorted */
  list(dir: string): Promise<string[]>;
  remove(key: string): Promise<void>;
}

/** Normalize to a posix key without a leading "./". */
export function normalizeKey(key: string): string {
  const posix = path.posix.normalize(key.replace(/\\/g, '/'));
  return posix.replace(/^(\.\/)+/, '') || '.';
}

export function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class FsPersistence implements Persistence {
  constructor(private baseDir: string = process.cwd()) {}

  private resolve(key: string): string {
    return path.resolve(this.baseDir, normalizeKey(key));
  }

  async read(key: string): Promise<Buffer> {
    return readFile(this.resolve(key));
  }

  async write(key: string, data: Buffer | string): Promise<void> {
    const target = this.resolve(key);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, data);
  }

  async exists(key: string): Promise<boolean> {
    try {
      await stat(this.resolve(key));
      return true;
    } catch (error) {
      if (isMissingFileError(error)) return false;
      throw error;
    }
  }

  async list(dir: string): Promise<string[]> {
    const root = normalizeKey(dir);
    const keys: string[] = [];
    const walk = async (relative: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await readdir(this.resolve(relative), { withFileTypes: true });
      } catch (error) {
        if (isMissingFileError(error)) return;
        throw error;
      }
      for (const entry of entries) {
        const child = relative === '.' ? entry.name : `${relative}/${entry.name}`;
        if (entry.isDirectory()) {
          await walk(child);
        } else if (entry.isFile()) {
          keys.push(child);
        }
      }
    };
    await walk(root);
    return keys.sort();
  }

  async remove(key: string): Promise<void> {
    await rm(this.resolve(key), { force: true });
  }
}

/** In-process store; a read of a missing key fails with ENOENT like the fs store. */
export class MemoryPersistence implements Persistence {
  private files = new Map<string, Buffer>();

  async read(key: string): Promise<Buffer> {
    const data = this.files.get(normalizeKey(key));
    if (!data) {
      throw Object.assign(new Error(`ENOENT: no such file, open '${key}'`), { code: 'ENOENT' });
    }
    return Buffer.from(data);
  }

  async write(key: string, data: Buffer | string): Promise<void> {
    this.files.set(normalizeKey(key), Buffer.from(data));
  }

  async exists(key: string): Promise<boolean> {
    return this.files.has(normalizeKey(key));
  }

  async list(dir: string): Promise<string[]> {
    const root = normalizeKey(dir);
    const prefix = root === '.' ? '' : `${root}/`;
    return [...this.files.keys()].filter((k) => k.startsWith(prefix)).sort();
  }

  async remove(key: string): Promise<void> {
    this.files.delete(normalizeKey(key));
  }
}
