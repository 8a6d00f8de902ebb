/**
 * Préférences utilisateur persistées (arrondi, mesure continue, snap).
 * Lecture tolérante : valeur absente ou invalide → défaut.
 */

import type { RoundingMode } from '@/types/measurement';
import type { KeyValueStore } from '@/lib/storage/keyValue';
import { PREFS_KEYS } from '@/constants/measurement';

export type Preferences = {
  roundingMode: RoundingMode;
  continuousMeasure: boolean;
  edgeSnap: boolean;
};

export const DEFAULT_PREFERENCES: Preferences = {
  roundingMode: 'round',
  continuousMeasure: false,
  edgeSnap: false,
};

function readItem(store: KeyValueStore, key: string): string | null {
  try {
    return store.getItem(key);
  } catch {
    return null;
  }
}

export function readPreferences(store: KeyValueStore): Preferences {
  const rounding = readItem(store, PREFS_KEYS.rounding);
  return {
    roundingMode: rounding === 'ceil' || rounding === 'round' ? rounding : DEFAULT_PREFERENCES.roundingMode,
    continuousMeasure: readItem(store, PREFS_KEYS.continuous) === 'true',
    edgeSnap: readItem(store, PREFS_KEYS.snap) === 'true',
  };
}

export function writePreference<K extends keyof Preferences>(
  store: KeyValueStore,
  key: K,
  value: Preferences[K],
): void {
  const storageKey =
    key === 'roundingMode' ? PREFS_KEYS.rounding : key === 'continuousMeasure' ? PREFS_KEYS.continuous : PREFS_KEYS.snap;
  try {
    store.setItem(storageKey, String(value));
  } catch (err) {
    console.error('[prefs] writePreference failed:', err);
  }
}
