/**
 * Capacités externes consommées par le store de mesure.
 * Le store ne touche jamais directement au décodage d'image, au presse-papiers
 * ni à la pile d'annulation de l'hôte.
 */

import { join } from 'node:path';
import type { RasterImage } from '@/types/measurement';
import type { FileSystem } from '@/lib/storage/fileSystem';
import { nodeFileSystem } from '@/lib/storage/fileSystem';
import { createJsonFileStore, type KeyValueStore } from '@/lib/storage/keyValue';
import { UndoStack, type UndoSink } from '@/lib/history/undoStack';
import type { AnnotationRenderer } from '@/lib/export/annotated';
import { AUTOSAVE_FILE_NAME } from '@/constants/measurement';

/** Décode un fichier image ; rejette avec DecodeError si illisible */
export interface ImageProvider {
  decode(path: string): Promise<RasterImage>;
}

export interface Clipboard {
  setText(text: string): void;
}

export type MeasurementEnv = {
  images: ImageProvider;
  files: FileSystem;
  prefs: KeyValueStore;
  clipboard: Clipboard;
  undo: UndoSink;
  /** Emplacement fixe de l'autosave ; null désactive l'autosave */
  autosavePath: string | null;
  autosaveDelayMs?: number;
  renderer?: AnnotationRenderer;
  /** Retour haptique/visuel quand un snap déplace effectivement le point */
  onSnapFeedback?: () => void;
  now?: () => Date;
};

/**
 * Environnement Node : fichiers réels, préférences et autosave sous `dataDir`.
 * Décodage et presse-papiers restent à fournir par l'hôte.
 */
export function createNodeEnv(opts: {
  dataDir: string;
  images: ImageProvider;
  clipboard: Clipboard;
  undo?: UndoSink;
  renderer?: AnnotationRenderer;
}): MeasurementEnv {
  return {
    images: opts.images,
    files: nodeFileSystem,
    prefs: createJsonFileStore(join(opts.dataDir, 'prefs.json')),
    clipboard: opts.clipboard,
    undo: opts.undo ?? new UndoStack(),
    autosavePath: join(opts.dataDir, AUTOSAVE_FILE_NAME),
    renderer: opts.renderer,
  };
}
