import type { Calibration } from '@/types/measurement';
import { DEFAULT_UNIT } from '@/constants/measurement';

export type CalibrationResult =
  | { ok: true; calibration: Calibration }
  | { ok: false; reason: 'invalid_pixels' | 'invalid_length' };

/**
 * Lit une longueur saisie par l'utilisateur (virgule décimale acceptée).
 * Retourne NaN si la saisie n'est pas un nombre complet.
 */
export function parseRealLength(text: string): number {
  const normalized = text.trim().replace(/,/g, '.');
  if (normalized === '') return NaN;
  return Number(normalized);
}

/**
 * Construit une calibration à partir de la distance pixel entre les deux clics
 * de scale et de la longueur réelle saisie.
 */
export function computeCalibration(pixels: number, realLengthText: string, unitText: string): CalibrationResult {
  if (!Number.isFinite(pixels) || pixels <= 0) return { ok: false, reason: 'invalid_pixels' };

  const realLength = parseRealLength(realLengthText);
  if (!Number.isFinite(realLength) || realLength <= 0) return { ok: false, reason: 'invalid_length' };

  const unitsPerPixel = realLength / pixels;
  if (!Number.isFinite(unitsPerPixel) || unitsPerPixel <= 0) return { ok: false, reason: 'invalid_length' };

  const unit = unitText.trim() || DEFAULT_UNIT;
  return { ok: true, calibration: { unit, unitsPerPixel } };
}

export function isValidCalibration(c: Calibration | undefined): c is Calibration {
  return !!c && typeof c.unit === 'string' && Number.isFinite(c.unitsPerPixel) && c.unitsPerPixel > 0;
}
