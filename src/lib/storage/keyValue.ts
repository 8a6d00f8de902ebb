import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Sous-ensemble de l'interface Storage (localStorage) utilisé pour les préférences.
 */
export interface KeyValueStore {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export function createMemoryStore(initial: Record<string, string> = {}): KeyValueStore {
  const store = new Map(Object.entries(initial));
  return {
    getItem: (key) => store.get(key) ?? null,
    setItem: (key, value) => {
      store.set(key, value);
    },
    removeItem: (key) => {
      store.delete(key);
    },
  };
}

/**
 * localStorage du navigateur s'il existe, sinon null (Node sans DOM).
 */
export function browserStore(): KeyValueStore | null {
  try {
    if (typeof localStorage === 'undefined') return null;
    return localStorage;
  } catch {
    // accès refusé (iframe sandbox, mode privé strict)
    return null;
  }
}

function readJsonRecord(path: string): Record<string, string> {
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return {};
    const out: Record<string, string> = {};
    for (const [k, v] of Object.entries(parsed)) {
      if (typeof v === 'string') out[k] = v;
    }
    return out;
  } catch {
    return {};
  }
}

/**
 * Store clé/valeur persisté dans un fichier JSON (usage Node).
 * Le fichier est relu une fois à la création puis réécrit à chaque modification.
 */
export function createJsonFileStore(path: string): KeyValueStore {
  const data = readJsonRecord(path);

  const flush = () => {
    try {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, JSON.stringify(data, null, 2));
    } catch (err) {
      console.error('[prefs] write failed:', err);
    }
  };

  return {
    getItem: (key) => (Object.prototype.hasOwnProperty.call(data, key) ? data[key] : null),
    setItem: (key, value) => {
      data[key] = value;
      flush();
    },
    removeItem: (key) => {
      delete data[key];
      flush();
    },
  };
}
