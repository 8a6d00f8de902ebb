import { IMAGE_EXTENSIONS } from '@/constants/measurement';
import type { FileSystem } from '@/lib/storage/fileSystem';

const EXT_SET = new Set<string>(IMAGE_EXTENSIONS);

// Ordre "Finder" : insensible à la casse, nombres comparés numériquement
const collator = new Intl.Collator(undefined, { numeric: true, sensitivity: 'base' });

export function extensionOf(path: string): string {
  const base = baseName(path);
  const dot = base.lastIndexOf('.');
  return dot <= 0 ? '' : base.slice(dot + 1).toLowerCase();
}

export function baseName(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] ?? path;
}

export function stemOf(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot <= 0 ? name : name.slice(0, dot);
}

export function isImageFile(path: string): boolean {
  return EXT_SET.has(extensionOf(path));
}

export function compareFileNames(a: string, b: string): number {
  return collator.compare(baseName(a), baseName(b));
}

/**
 * Liste récursivement les images d'un dossier (fichiers cachés ignorés),
 * triées par nom de fichier.
 */
export async function listImageFiles(dir: string, fs: FileSystem): Promise<string[]> {
  const found: string[] = [];

  const walk = async (current: string) => {
    const entries = await fs.list(current);
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      if (entry.isDirectory) {
        await walk(entry.path);
      } else if (entry.isFile && isImageFile(entry.name)) {
        found.push(entry.path);
      }
    }
  };

  await walk(dir);
  return found.sort(compareFileNames);
}
