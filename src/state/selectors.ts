/**
 * Sélecteurs dérivés du store de mesure (textes de la barre d'info, résultats dessinés).
 *
 * Purs et sans mémoïsation.
 */

import type { ImageSession, Measurement } from '@/types/measurement';
import { MAX_VISIBLE_RESULTS } from '@/constants/measurement';
import { formatScale, formattedLength } from '@/lib/format/sigfig';
import type { MeasurementState } from './useMeasurementStore';
import { MODE_LABELS } from './status';

const EMPTY: Measurement[] = [];

export function selectActiveSession(state: MeasurementState): ImageSession | undefined {
  const { sessions, activeIndex } = state;
  return activeIndex >= 0 && activeIndex < sessions.length ? sessions[activeIndex] : undefined;
}

/** Mesures de la session active, plus récente en tête */
export function selectCurrentResults(state: MeasurementState): Measurement[] {
  return selectActiveSession(state)?.results ?? EMPTY;
}

// Le rendu se limite aux plus récentes ; CSV et sauvegarde gardent tout
export function selectDrawResults(state: MeasurementState): Measurement[] {
  const results = selectCurrentResults(state);
  return results.length > MAX_VISIBLE_RESULTS ? results.slice(0, MAX_VISIBLE_RESULTS) : results;
}

export function selectDrawLimitNote(state: MeasurementState): string | null {
  return selectCurrentResults(state).length > MAX_VISIBLE_RESULTS
    ? `Affichage limité aux ${MAX_VISIBLE_RESULTS} dernières mesures (CSV et sauvegarde complets).`
    : null;
}

/** "2 / 3 name.png", "0 / 0" sans session */
export function selectImageChipText(state: MeasurementState): string {
  const session = selectActiveSession(state);
  if (!session) return '0 / 0';
  return `${state.activeIndex + 1} / ${state.sessions.length} ${session.name}`;
}

export function selectScaleText(state: MeasurementState): string {
  const calibration = selectActiveSession(state)?.calibration;
  if (!calibration) return 'Non définie';
  return formatScale(calibration, state.roundingMode);
}

export function selectAverageText(state: MeasurementState): string {
  const session = selectActiveSession(state);
  if (!session || session.results.length === 0) return '--';
  const avg = session.results.reduce((sum, r) => sum + r.pixelLength, 0) / session.results.length;
  return formattedLength(avg, session.calibration, state.roundingMode);
}

export function selectModeLabel(state: MeasurementState): string {
  return MODE_LABELS[state.mode];
}
