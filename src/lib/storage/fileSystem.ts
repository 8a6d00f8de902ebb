import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { StorageError } from '@/lib/errors';

export type DirEntry = {
  name: string;
  path: string;
  isFile: boolean;
  isDirectory: boolean;
};

/**
 * Accès fichiers dont le moteur a besoin (projet, autosave, export, listing).
 * Toutes les erreurs d'E/S remontent en StorageError.
 */
export interface FileSystem {
  exists(path: string): Promise<boolean>;
  readText(path: string): Promise<string>;
  writeText(path: string, text: string): Promise<void>;
  writeBytes(path: string, bytes: Uint8Array): Promise<void>;
  remove(path: string): Promise<void>;
  list(dir: string): Promise<DirEntry[]>;
}

// un fichier temporaire par écriture
let writeSeq = 0;

export function tempPathFor(path: string): string {
  writeSeq += 1;
  return `${path}.${process.pid}.${writeSeq}.tmp`;
}

async function writeAtomic(path: string, data: string | Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = tempPathFor(path);
  await writeFile(tmp, data);
  await rename(tmp, path);
}

export const nodeFileSystem: FileSystem = {
  async exists(path) {
    try {
      await stat(path);
      return true;
    } catch {
      return false;
    }
  },

  async readText(path) {
    try {
      return await readFile(path, 'utf8');
    } catch (err) {
      throw new StorageError('read', path, err);
    }
  },

  async writeText(path, text) {
    try {
      await writeAtomic(path, text);
    } catch (err) {
      throw new StorageError('write', path, err);
    }
  },

  async writeBytes(path, bytes) {
    try {
      await writeAtomic(path, bytes);
    } catch (err) {
      throw new StorageError('write', path, err);
    }
  },

  async remove(path) {
    try {
      await rm(path, { force: true });
    } catch (err) {
      throw new StorageError('remove', path, err);
    }
  },

  async list(dir) {
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries.map((e) => ({
        name: e.name,
        path: join(dir, e.name),
        isFile: e.isFile(),
        isDirectory: e.isDirectory(),
      }));
    } catch (err) {
      throw new StorageError('list', dir, err);
    }
  },
};
