import type { ImageSession } from '@/types/measurement';
import { PROJECT_EXTENSION, PROJECT_VERSION } from '@/constants/measurement';
import { stemOf } from '@/lib/files/imageFiles';
import {
  isProjectDocument,
  normalizeProjectDocument,
  type ProjectDocument,
  type ProjectSessionState,
} from './schema';

export type ParseResult =
  | { ok: true; document: ProjectDocument }
  | { ok: false; reason: 'invalid_json' | 'invalid_format' };

/** ISO-8601 à la seconde, sans millisecondes ("2026-01-02T03:04:05Z") */
export function isoTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/** Projette une session du store vers son état persistant (null sans fichier image) */
export function sessionToState(session: ImageSession): ProjectSessionState | null {
  if (!session.imagePath) return null;
  return {
    name: session.name,
    imagePath: session.imagePath,
    ...(session.calibration ? { calibration: { ...session.calibration } } : {}),
    transform: { ...session.transform },
    hasCustomTransform: session.hasCustomTransform,
    nextResultID: session.nextResultID,
    results: session.results.map((r) => ({ ...r, p1: { ...r.p1 }, p2: { ...r.p2 } })),
  };
}

/**
 * Construit le document projet complet.
 * Les sessions sans chemin d'image sont ignorées ; activeIndex est borné.
 */
export function buildProjectDocument(
  sessions: readonly ImageSession[],
  activeIndex: number,
  now: Date = new Date(),
): ProjectDocument {
  const states = sessions
    .map(sessionToState)
    .filter((s): s is ProjectSessionState => s !== null);

  return {
    version: PROJECT_VERSION,
    exportedAt: isoTimestamp(now),
    activeIndex: states.length === 0 ? -1 : Math.max(0, Math.min(activeIndex, states.length - 1)),
    sessions: states,
  };
}

export function serializeProjectDocument(doc: ProjectDocument): string {
  return JSON.stringify(doc, null, 2);
}

export function parseProjectDocument(text: string): ParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { ok: false, reason: 'invalid_json' };
  }
  if (!isProjectDocument(raw)) return { ok: false, reason: 'invalid_format' };
  return { ok: true, document: normalizeProjectDocument(raw) };
}

export function ensureProjectExtension(path: string): string {
  return path.toLowerCase().endsWith(`.${PROJECT_EXTENSION}`) ? path : `${path}.${PROJECT_EXTENSION}`;
}

export function defaultProjectName(activeName?: string): string {
  return activeName ? `${stemOf(activeName)}.${PROJECT_EXTENSION}` : `Projet.${PROJECT_EXTENSION}`;
}
