/**
 * Export tabulé (TSV) des mesures, pour le presse-papiers.
 * Lignes dans l'ordre de création (la plus ancienne en premier).
 */

import type { ImageSession, RoundingMode } from '@/types/measurement';
import { calibratedValue, formatSig, unitLabel } from '@/lib/format/sigfig';

type CsvSession = Pick<ImageSession, 'name' | 'calibration' | 'results'>;

function columnValues(session: CsvSession, mode: RoundingMode): string[] {
  return [...session.results]
    .reverse()
    .map((r) => formatSig(calibratedValue(r.pixelLength, session.calibration), mode));
}

export function buildSessionCSV(session: CsvSession, mode: RoundingMode = 'round'): string {
  const rows = [`PositionNo\t${session.name}`, `Unit\t${unitLabel(session.calibration)}`];
  columnValues(session, mode).forEach((v, idx) => {
    rows.push(`${idx + 1}\t${v}`);
  });
  return rows.join('\n');
}

/**
 * Une colonne par session ayant des mesures ; cellules vides pour compléter
 * les colonnes plus courtes.
 */
export function buildMultiSessionCSV(sessions: readonly CsvSession[], mode: RoundingMode = 'round'): string {
  const withResults = sessions.filter((s) => s.results.length > 0);
  const values = withResults.map((s) => columnValues(s, mode));
  const maxRows = values.reduce((m, col) => Math.max(m, col.length), 0);

  const rows = [
    ['PositionNo', ...withResults.map((s) => s.name)].join('\t'),
    ['Unit', ...withResults.map((s) => unitLabel(s.calibration))].join('\t'),
  ];
  for (let row = 0; row < maxRows; row++) {
    const cols = values.map((col) => (row < col.length ? col[row] : ''));
    rows.push([String(row + 1), ...cols].join('\t'));
  }
  return rows.join('\n');
}

/** Une seule session → format simple, sinon format multi-colonnes */
export function buildCSV(sessions: readonly CsvSession[], mode: RoundingMode = 'round'): string {
  if (sessions.length === 1) return buildSessionCSV(sessions[0], mode);
  return buildMultiSessionCSV(sessions, mode);
}
