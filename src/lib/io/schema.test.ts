import { describe, it, expect } from 'vitest';
import { isProjectDocument, normalizeProjectDocument, type ProjectDocument } from './schema';
import { MAX_SCALE, MIN_SCALE } from '@/constants/measurement';

const validDoc: ProjectDocument = {
  version: 1,
  exportedAt: '2026-01-01T00:00:00.000Z',
  activeIndex: 0,
  sessions: [
    {
      name: 'a.png',
      imagePath: '/data/a.png',
      calibration: { unit: 'mm', unitsPerPixel: 0.1 },
      transform: { scale: 1.5, tx: 10, ty: -4 },
      hasCustomTransform: true,
      nextResultID: 3,
      results: [
        { id: 2, p1: { x: 0, y: 0 }, p2: { x: 3, y: 4 }, pixelLength: 5, createdAt: '2026-01-01T00:00:01.000Z' },
        { id: 1, p1: { x: 1, y: 1 }, p2: { x: 1, y: 11 }, pixelLength: 10, createdAt: '2026-01-01T00:00:00.500Z' },
      ],
    },
  ],
};

function clone<T>(x: T): T {
  const copy: T = JSON.parse(JSON.stringify(x));
  return copy;
}

describe('isProjectDocument', () => {
  it('accepts a valid document', () => {
    expect(isProjectDocument(validDoc)).toBe(true);
  });

  it('tolerates unknown extra fields and a null calibration', () => {
    const doc = { ...clone(validDoc), app: 'other', sessions: [{ ...clone(validDoc.sessions[0]), calibration: null, zoomHint: 2 }] };
    expect(isProjectDocument(doc)).toBe(true);
  });

  it('rejects non-objects and missing fields', () => {
    expect(isProjectDocument(null)).toBe(false);
    expect(isProjectDocument([])).toBe(false);
    const noDate: Record<string, unknown> = { ...validDoc };
    delete noDate.exportedAt;
    expect(isProjectDocument(noDate)).toBe(false);
  });

  it('rejects an invalid calibration or transform', () => {
    const badCal = clone(validDoc);
    badCal.sessions[0].calibration = { unit: 'mm', unitsPerPixel: 0 };
    expect(isProjectDocument(badCal)).toBe(false);

    const badScale = clone(validDoc);
    badScale.sessions[0].transform.scale = -1;
    expect(isProjectDocument(badScale)).toBe(false);
  });

  it('rejects a non-integer measurement id', () => {
    const doc = { ...clone(validDoc), sessions: [{ ...clone(validDoc.sessions[0]), results: [{ ...validDoc.sessions[0].results[0], id: 1.5 }] }] };
    expect(isProjectDocument(doc)).toBe(false);
  });
});

describe('normalizeProjectDocument', () => {
  it('keeps a canonical document unchanged', () => {
    expect(normalizeProjectDocument(clone(validDoc))).toEqual(validDoc);
  });

  it('raises nextResultID above the largest id', () => {
    const doc = clone(validDoc);
    doc.sessions[0].nextResultID = 1;
    expect(normalizeProjectDocument(doc).sessions[0].nextResultID).toBe(3);
  });

  it('clamps activeIndex into range', () => {
    expect(normalizeProjectDocument({ ...clone(validDoc), activeIndex: 7 }).activeIndex).toBe(0);
    expect(normalizeProjectDocument({ ...clone(validDoc), sessions: [] }).activeIndex).toBe(-1);
  });

  it('brings the view scale back within the zoom bounds', () => {
    const big = clone(validDoc);
    big.sessions[0].transform.scale = 5000;
    expect(normalizeProjectDocument(big).sessions[0].transform).toEqual({ scale: MAX_SCALE, tx: 10, ty: -4 });

    const tiny = clone(validDoc);
    tiny.sessions[0].transform.scale = 0.001;
    expect(normalizeProjectDocument(tiny).sessions[0].transform.scale).toBe(MIN_SCALE);
  });

  it('emits keys in the stable order', () => {
    const doc = normalizeProjectDocument(clone(validDoc));
    expect(Object.keys(doc)).toEqual(['version', 'exportedAt', 'activeIndex', 'sessions']);
    expect(Object.keys(doc.sessions[0])).toEqual([
      'name',
      'imagePath',
      'calibration',
      'transform',
      'hasCustomTransform',
      'nextResultID',
      'results',
    ]);
    expect(Object.keys(doc.sessions[0].results[0])).toEqual(['id', 'p1', 'p2', 'pixelLength', 'createdAt']);
  });
});
