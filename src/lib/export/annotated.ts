import type { ImageSession, Point, RasterImage, RoundingMode } from '@/types/measurement';
import { formattedLength } from '@/lib/format/sigfig';
import { stemOf } from '@/lib/files/imageFiles';

export type AnnotationLabel = {
  text: string;
  anchor: Point; // milieu du segment
  box: { x: number; y: number; w: number; h: number };
};

export type AnnotationOverlay = {
  width: number;
  height: number;
  lineWidth: number;
  fontSize: number;
  lines: Array<{ id: number; p1: Point; p2: Point }>;
  labels: AnnotationLabel[];
};

/**
 * Rasterise une image + overlay en PNG. Fourni par l'hôte (canvas, sharp, etc.).
 */
export interface AnnotationRenderer {
  renderPng(image: RasterImage, overlay: AnnotationOverlay): Promise<Uint8Array>;
}

// Largeur moyenne d'un glyphe en fraction de la taille de police (estimation sans mesure de texte)
const GLYPH_WIDTH_RATIO = 0.6;
const LABEL_HEIGHT = 18;
const LABEL_PADDING = 10;

/**
 * Calcule les segments et étiquettes à dessiner, mesures les plus anciennes d'abord.
 * Les boîtes d'étiquette restent dans l'image.
 */
export function buildAnnotationOverlay(
  session: Pick<ImageSession, 'pixelSize' | 'calibration' | 'results'>,
  mode: RoundingMode = 'round',
): AnnotationOverlay {
  const { w: width, h: height } = session.pixelSize;
  const lineWidth = Math.max(1.5, Math.min(4, width / 800));
  const fontSize = Math.max(12, width / 120);

  const ordered = [...session.results].reverse();
  const lines = ordered.map((m) => ({ id: m.id, p1: m.p1, p2: m.p2 }));
  const labels = ordered.map((m): AnnotationLabel => {
    const text = `#${m.id} ${formattedLength(m.pixelLength, session.calibration, mode)}`;
    const anchor = { x: (m.p1.x + m.p2.x) * 0.5, y: (m.p1.y + m.p2.y) * 0.5 };
    const textWidth = text.length * fontSize * GLYPH_WIDTH_RATIO;
    return {
      text,
      anchor,
      box: {
        x: Math.max(4, Math.min(width - textWidth - 14, anchor.x + 8)),
        y: Math.max(4, Math.min(height - 24, anchor.y + 8)),
        w: textWidth + LABEL_PADDING,
        h: LABEL_HEIGHT,
      },
    };
  });

  return { width, height, lineWidth, fontSize, lines, labels };
}

/** "sample.tif" → "sample_measured.png" */
export function measuredExportName(fileName: string): string {
  return `${stemOf(fileName)}_measured.png`;
}

function withIndex(base: string, idx: number): string {
  if (idx === 0) return base;
  const stem = stemOf(base);
  const ext = base.slice(stem.length); // ".png" ou ""
  return `${stem}_${String(idx).padStart(2, '0')}${ext}`;
}

/**
 * Premier nom libre parmi base, base_01, base_02… (ni déjà utilisé dans ce lot, ni existant).
 * `used` est complété avec le nom retenu.
 */
export async function uniqueFileName(
  base: string,
  used: Set<string>,
  exists: (name: string) => Promise<boolean>,
): Promise<string> {
  for (let idx = 0; ; idx++) {
    const name = withIndex(base, idx);
    if (used.has(name)) continue;
    if (await exists(name)) continue;
    used.add(name);
    return name;
  }
}
