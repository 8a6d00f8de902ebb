import type { RasterImage, SessionID } from '@/types/measurement';

export type LumaBuffer = {
  width: number;
  height: number;
  pixels: Uint8Array; // 1 octet par pixel, ligne par ligne
};

/**
 * Rééchantillonne un raster RGBA en niveaux de gris 8 bits, à la résolution native
 * (plus proche voisin : un pixel source par pixel gris).
 * Retourne null si le raster est vide ou incohérent.
 */
export function buildLumaBuffer(raster: RasterImage): LumaBuffer | null {
  const { width, height, data } = raster;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) return null;
  if (data.length < width * height * 4) return null;

  const pixels = new Uint8Array(width * height);
  for (let i = 0, j = 0; i < pixels.length; i++, j += 4) {
    pixels[i] = Math.round(0.299 * data[j] + 0.587 * data[j + 1] + 0.114 * data[j + 2]);
  }
  return { width, height, pixels };
}

export function sampleLuma(luma: LumaBuffer, x: number, y: number): number {
  return luma.pixels[y * luma.width + x];
}

/**
 * Cache mémoïsé des buffers de luminance, par session.
 * Calculé à la première demande, libéré avec la session.
 */
export class LumaCacheRegistry {
  private readonly cache = new Map<SessionID, LumaBuffer | null>();

  get(sessionId: SessionID, raster: RasterImage | undefined): LumaBuffer | null {
    if (this.cache.has(sessionId)) return this.cache.get(sessionId) ?? null;
    if (!raster) return null;
    const luma = buildLumaBuffer(raster);
    this.cache.set(sessionId, luma);
    return luma;
  }

  has(sessionId: SessionID): boolean {
    return this.cache.has(sessionId);
  }

  drop(sessionId: SessionID): void {
    this.cache.delete(sessionId);
  }

  clear(): void {
    this.cache.clear();
  }
}
