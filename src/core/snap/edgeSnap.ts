import type { Point } from '@/types/measurement';
import { SNAP_RADIUS_SCREEN, SNAP_MIN_SCORE, SNAP_FEEDBACK_MIN_PX } from '@/constants/measurement';
import { clamp, distance } from '@/core/geo/transform';
import { sampleLuma, type LumaBuffer } from './luma';

export type EdgeSnapOptions = {
  radiusScreen?: number;
  minScore?: number;
};

export type EdgeSnapResult = {
  point: Point;
  /** true si le point a bougé de plus de SNAP_FEEDBACK_MIN_PX */
  moved: boolean;
  /** meilleur score trouvé (-1 si aucune recherche) */
  score: number;
};

/**
 * Rayon de recherche en pixels source pour un rayon écran fixe.
 * Le snap garde la même taille perçue quel que soit le zoom.
 */
export function snapRadiusForScale(scale: number, radiusScreen = SNAP_RADIUS_SCREEN): number {
  if (!Number.isFinite(scale) || scale <= 0) return 1;
  return Math.max(1, Math.round(radiusScreen / scale));
}

/** Gradient central, combinaison L1 horizontal + vertical */
export function gradientScore(luma: LumaBuffer, x: number, y: number): number {
  const gx = Math.abs(sampleLuma(luma, x + 1, y) - sampleLuma(luma, x - 1, y));
  const gy = Math.abs(sampleLuma(luma, x, y + 1) - sampleLuma(luma, x, y - 1));
  return gx + gy;
}

/**
 * Déplace `point` sur le pixel de gradient maximal dans un disque autour de lui.
 *
 * - centre arrondi au pixel, borné à [1, W-2] × [1, H-2] (bordure réservée au gradient)
 * - balayage ligne par ligne (y puis x croissants), premier maximum conservé
 * - score < minScore → point d'origine inchangé
 * - buffer absent ou image < 3 px → point d'origine inchangé
 */
export function snapToEdge(
  point: Point,
  luma: LumaBuffer | null | undefined,
  scale: number,
  opts: EdgeSnapOptions = {},
): EdgeSnapResult {
  const unchanged: EdgeSnapResult = { point, moved: false, score: -1 };
  if (!luma || luma.width < 3 || luma.height < 3) return unchanged;
  if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) return unchanged;

  const minScore = opts.minScore ?? SNAP_MIN_SCORE;
  const cx = clamp(Math.round(point.x), 1, luma.width - 2);
  const cy = clamp(Math.round(point.y), 1, luma.height - 2);

  const radius = snapRadiusForScale(scale, opts.radiusScreen);
  const minX = Math.max(1, cx - radius);
  const maxX = Math.min(luma.width - 2, cx + radius);
  const minY = Math.max(1, cy - radius);
  const maxY = Math.min(luma.height - 2, cy + radius);
  const rr = radius * radius;

  let bestX = cx;
  let bestY = cy;
  let bestScore = -1;

  for (let y = minY; y <= maxY; y++) {
    const dy = y - cy;
    for (let x = minX; x <= maxX; x++) {
      const dx = x - cx;
      if (dx * dx + dy * dy > rr) continue;

      const score = gradientScore(luma, x, y);
      if (score > bestScore) {
        bestScore = score;
        bestX = x;
        bestY = y;
      }
    }
  }

  if (bestScore < minScore) return { point, moved: false, score: bestScore };

  const snapped: Point = { x: bestX, y: bestY };
  return {
    point: snapped,
    moved: distance(snapped, point) > SNAP_FEEDBACK_MIN_PX,
    score: bestScore,
  };
}
