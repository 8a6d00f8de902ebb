/**
 * Schema and validation for the JSON project file format v1
 */

import type { Calibration, Measurement, Point, ViewTransform } from '@/types/measurement';
import { clampScale } from '@/core/geo/transform';

export type ProjectSessionState = {
  name: string;
  imagePath: string; // absolu
  calibration?: Calibration;
  transform: ViewTransform;
  hasCustomTransform: boolean;
  nextResultID: number;
  results: Measurement[];
};

export type ProjectDocument = {
  version: number;
  exportedAt: string; // ISO-8601
  activeIndex: number; // -1 si vide
  sessions: ProjectSessionState[];
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === 'object' && !Array.isArray(x);
}

function isFiniteNumber(x: unknown): x is number {
  return typeof x === 'number' && Number.isFinite(x);
}

function isPoint(x: unknown): x is Point {
  return isRecord(x) && isFiniteNumber(x.x) && isFiniteNumber(x.y);
}

function isPositive(x: unknown): x is number {
  return isFiniteNumber(x) && x > 0;
}

function isCalibration(x: unknown): x is Calibration {
  return isRecord(x) && typeof x.unit === 'string' && isPositive(x.unitsPerPixel);
}

function isTransform(x: unknown): x is ViewTransform {
  return isRecord(x) && isPositive(x.scale) && isFiniteNumber(x.tx) && isFiniteNumber(x.ty);
}

function isMeasurement(x: unknown): x is Measurement {
  if (!isRecord(x)) return false;
  if (!Number.isInteger(x.id)) return false;
  if (!isPoint(x.p1) || !isPoint(x.p2)) return false;
  if (!isFiniteNumber(x.pixelLength)) return false;
  return typeof x.createdAt === 'string';
}

function isSessionState(x: unknown): x is ProjectSessionState {
  if (!isRecord(x)) return false;
  if (typeof x.name !== 'string' || typeof x.imagePath !== 'string') return false;
  if (x.calibration !== undefined && x.calibration !== null && !isCalibration(x.calibration)) return false;
  if (!isTransform(x.transform)) return false;
  if (typeof x.hasCustomTransform !== 'boolean') return false;
  if (!Number.isInteger(x.nextResultID)) return false;
  if (!Array.isArray(x.results)) return false;
  return x.results.every(isMeasurement);
}

/**
 * Type guard: validate ProjectDocument structure.
 * Unknown extra fields are tolerated.
 */
export function isProjectDocument(x: unknown): x is ProjectDocument {
  if (!isRecord(x)) return false;
  if (!Number.isInteger(x.version)) return false;
  if (typeof x.exportedAt !== 'string') return false;
  if (!Number.isInteger(x.activeIndex)) return false;
  if (!Array.isArray(x.sessions)) return false;
  return x.sessions.every(isSessionState);
}

function pickPoint(p: Point): Point {
  return { x: p.x, y: p.y };
}

/**
 * Recopie un document validé avec l'ordre de clés stable et sans champs inconnus.
 * - calibration null → absente
 * - nextResultID relevé au-dessus du plus grand id
 * - échelle bornée à [MIN_SCALE, MAX_SCALE]
 */
export function normalizeProjectDocument(doc: ProjectDocument): ProjectDocument {
  const sessions = doc.sessions.map((s): ProjectSessionState => {
    const results = s.results.map(
      (r): Measurement => ({
        id: r.id,
        p1: pickPoint(r.p1),
        p2: pickPoint(r.p2),
        pixelLength: r.pixelLength,
        createdAt: r.createdAt,
      }),
    );
    const maxId = results.reduce((m, r) => Math.max(m, r.id), 0);
    return {
      name: s.name,
      imagePath: s.imagePath,
      ...(s.calibration ? { calibration: { unit: s.calibration.unit, unitsPerPixel: s.calibration.unitsPerPixel } } : {}),
      transform: { scale: clampScale(s.transform.scale), tx: s.transform.tx, ty: s.transform.ty },
      hasCustomTransform: s.hasCustomTransform,
      nextResultID: Math.max(s.nextResultID, maxId + 1),
      results,
    };
  });

  const activeIndex = sessions.length === 0 ? -1 : Math.max(0, Math.min(doc.activeIndex, sessions.length - 1));

  return {
    version: doc.version,
    exportedAt: doc.exportedAt,
    activeIndex,
    sessions,
  };
}
