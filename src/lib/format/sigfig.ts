import type { Calibration, RoundingMode } from '@/types/measurement';
import { DISPLAY_DIGITS } from '@/constants/measurement';

function ceilAwayFromZero(v: number): number {
  return v < 0 ? -Math.ceil(-v) : Math.ceil(v);
}

/**
 * Arrondit `value` à `digits` chiffres significatifs.
 * - round : au plus proche
 * - ceil  : en s'éloignant de zéro (magnitude supérieure)
 */
export function roundToSignificant(value: number, digits: number, mode: RoundingMode): number {
  if (!Number.isFinite(value) || value === 0) return value;

  const exponent = Math.floor(Math.log10(Math.abs(value)));
  const shift = digits - exponent - 1;
  const rounder = mode === 'ceil' ? ceilAwayFromZero : Math.round;

  if (shift >= 0) {
    const factor = Math.pow(10, shift);
    return rounder(value * factor) / factor;
  }
  const factor = Math.pow(10, -shift);
  return rounder(value / factor) * factor;
}

function zeroText(digits: number): string {
  return `0.${'0'.repeat(digits)}`;
}

/**
 * Formatte avec un nombre fixe de chiffres significatifs.
 * @example formatSig(123.456) === '123.5'
 */
export function formatSig(value: number, mode: RoundingMode = 'round', digits = DISPLAY_DIGITS): string {
  if (!Number.isFinite(value)) return '';
  if (value === 0) return zeroText(digits);

  const rounded = roundToSignificant(value, digits, mode);
  if (rounded === 0) return zeroText(digits);

  const exponent = Math.floor(Math.log10(Math.abs(rounded)));
  const decimals = Math.max(0, digits - exponent - 1);
  return rounded.toFixed(decimals);
}

/** Longueur en unité réelle (ou en px sans calibration) */
export function calibratedValue(pixelLength: number, calibration?: Calibration): number {
  return calibration ? pixelLength * calibration.unitsPerPixel : pixelLength;
}

export function unitLabel(calibration?: Calibration): string {
  return calibration?.unit ?? 'px';
}

export function formattedLength(
  pixelLength: number,
  calibration: Calibration | undefined,
  mode: RoundingMode = 'round',
): string {
  return `${formatSig(calibratedValue(pixelLength, calibration), mode)} ${unitLabel(calibration)}`;
}

export function formatScale(calibration: Calibration, mode: RoundingMode = 'round'): string {
  return `${formatSig(calibration.unitsPerPixel, mode)} ${calibration.unit}/px`;
}
