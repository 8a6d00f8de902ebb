import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createMeasurementStore, type MeasurementStore } from '@/state/useMeasurementStore';
import {
  selectActiveSession,
  selectAverageText,
  selectDrawLimitNote,
  selectDrawResults,
  selectImageChipText,
  selectModeLabel,
  selectScaleText,
} from '@/state/selectors';
import { MAX_VISIBLE_RESULTS } from '@/constants/measurement';
import { createTestEnv, type TestEnv } from '../utils/fakes';

let env: TestEnv;
let store: MeasurementStore;

beforeEach(() => {
  env = createTestEnv();
  store = createMeasurementStore(env);
});

afterEach(() => {
  store.getState().dispose();
});

describe('selectors without a session', () => {
  it('fall back to placeholders', () => {
    const state = store.getState();
    expect(selectActiveSession(state)).toBeUndefined();
    expect(selectImageChipText(state)).toBe('0 / 0');
    expect(selectScaleText(state)).toBe('Non définie');
    expect(selectAverageText(state)).toBe('--');
    expect(selectDrawResults(state)).toEqual([]);
    expect(selectDrawLimitNote(state)).toBeNull();
    expect(selectModeLabel(state)).toBe('Normal');
  });
});

describe('selectors with sessions', () => {
  beforeEach(async () => {
    env.images.add('/img/a.png').add('/img/b.png').add('/img/c.png');
    await store.getState().addImageFiles(['/img/a.png', '/img/b.png', '/img/c.png']);
  });

  it('describe the active image and mode', () => {
    store.getState().activateSession(1);
    store.getState().setMode('scale');
    const state = store.getState();
    expect(selectImageChipText(state)).toBe('2 / 3 b.png');
    expect(selectModeLabel(state)).toBe('Échelle');
  });

  it('average the current results in the session unit', () => {
    const s = store.getState();
    s.commitImagePoint({ x: 0, y: 0 });
    s.commitImagePoint({ x: 3, y: 4 });
    s.commitImagePoint({ x: 0, y: 0 });
    s.commitImagePoint({ x: 0, y: 6 });
    expect(selectAverageText(store.getState())).toBe('5.500 px');

    s.setMode('scale');
    s.commitImagePoint({ x: 0, y: 0 });
    s.commitImagePoint({ x: 0, y: 100 });
    s.applyScaleInput({ unit: 'mm', length: '5' });
    expect(selectScaleText(store.getState())).toBe('0.05000 mm/px');
    expect(selectAverageText(store.getState())).toBe('0.2750 mm');
  });

  it('limit drawn results to the newest ones', () => {
    const s = store.getState();
    for (let i = 0; i <= MAX_VISIBLE_RESULTS; i++) {
      s.commitImagePoint({ x: 0, y: 0 });
      s.commitImagePoint({ x: 1 + (i % 50), y: 0 });
    }
    const state = store.getState();
    const drawn = selectDrawResults(state);
    expect(drawn).toHaveLength(MAX_VISIBLE_RESULTS);
    expect(drawn[0].id).toBe(MAX_VISIBLE_RESULTS + 1);
    expect(selectDrawLimitNote(state)).toBe(
      'Affichage limité aux 120 dernières mesures (CSV et sauvegarde complets).',
    );
  });
});
