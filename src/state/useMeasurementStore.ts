import { create } from 'zustand';
import { produce } from 'immer';
import { join } from 'node:path';
import type {
  Calibration,
  ImageSession,
  MeasureMode,
  Measurement,
  MeasurementID,
  Point,
  RasterImage,
  RoundingMode,
  SessionID,
  Size,
} from '@/types/measurement';
import {
  CANVAS_RESIZE_EPS,
  DEFAULT_UNIT,
  MIN_CANVAS_SIDE,
  SAME_POINT_EPSILON,
} from '@/constants/measurement';
import {
  IDENTITY_TRANSFORM,
  clampPointToImage,
  distance,
  fitTransform,
  imageFromScreen,
  panTransform,
  zoomTransform,
} from '@/core/geo/transform';
import { snapToEdge } from '@/core/snap/edgeSnap';
import { LumaCacheRegistry } from '@/core/snap/luma';
import { computeCalibration } from '@/lib/calibration';
import { formatScale, formattedLength } from '@/lib/format/sigfig';
import { AutosaveScheduler } from '@/lib/autosave';
import { readPreferences, writePreference } from '@/lib/prefs';
import { buildCSV } from '@/lib/io/csv';
import {
  buildProjectDocument,
  ensureProjectExtension,
  isoTimestamp,
  parseProjectDocument,
  serializeProjectDocument,
} from '@/lib/io/project';
import type { ProjectSessionState } from '@/lib/io/schema';
import { baseName, listImageFiles } from '@/lib/files/imageFiles';
import { buildAnnotationOverlay, measuredExportName, uniqueFileName } from '@/lib/export/annotated';
import { incProjectMissingImages, incSnap } from '@/lib/metrics';
import { errorMessage } from '@/lib/errors';
import type { MeasurementEnv } from './env';
import { STATUS, UNDO_LABELS, statusMessages } from './status';

function genId(prefix = 'id'): SessionID {
  return `${prefix}_${Math.random().toString(36).slice(2, 10)}`;
}

export type ScalePrompt = {
  pixels: number; // distance pixel entre les deux clics de scale
  suggestedUnit: string;
};

export type MeasurementState = {
  sessions: ImageSession[];
  activeIndex: number; // -1 si aucune session
  mode: MeasureMode;
  pendingPoints: Point[]; // 0, 1 (2 seulement le temps d'une opération)
  hoverScreenPoint: Point | null;
  highlightedId: MeasurementID | null;
  roundingMode: RoundingMode;
  continuousMeasure: boolean;
  edgeSnap: boolean;
  canvasSize: Size;
  statusText: string;
  scalePrompt: ScalePrompt | null;
  lastCalibration: Calibration | null;
  revision: number; // incrémenté à chaque mutation observable
};

export type MeasurementActions = {
  // Session
  newProject: () => void;
  addImageFiles: (paths: string[]) => Promise<number>;
  addImageFolder: (dir: string) => Promise<number>;
  switchSession: (delta: number) => void;
  activateSession: (index: number) => void;

  // Vue
  updateCanvasSize: (size: Size) => void;
  resetView: () => void;
  pan: (delta: { dx: number; dy: number }) => void;
  zoom: (anchor: Point, factor: number) => void;
  updateHover: (screenPoint: Point | null) => void;

  // Points et mesures
  setMode: (next: MeasureMode) => void;
  commitClick: (screenPoint: Point) => void;
  commitImagePoint: (p: Point) => void;
  cancelAction: () => void;
  deleteMeasurement: (id: MeasurementID) => void;
  clearMeasurements: () => void;
  toggleHighlight: (id: MeasurementID) => void;

  // Échelle
  applyScaleInput: (input: { unit: string; length: string }) => boolean;
  cancelScaleInput: () => void;

  // Préférences
  toggleRounding: () => void;
  setContinuousMeasure: (enabled: boolean) => void;
  setEdgeSnap: (enabled: boolean) => void;

  // Export et persistance
  copyCurrentCSV: () => void;
  copyAllCSV: () => void;
  saveProject: (path: string) => Promise<boolean>;
  loadProject: (path: string, opts?: { asAutosaveRestore?: boolean }) => Promise<boolean>;
  restoreAutosave: () => Promise<boolean>;
  flushAutosave: () => Promise<void>;
  exportAnnotatedCurrent: (path: string) => Promise<boolean>;
  exportAnnotatedAll: (dir: string) => Promise<number>;
  dispose: () => void;
};

export type MeasurementStoreState = MeasurementState & MeasurementActions;

// Snapshot des résultats d'une session avant mutation (pour l'annulation)
type ResultsSnapshot = {
  sessionId: SessionID;
  results: Measurement[];
  nextResultID: MeasurementID;
  highlightedId: MeasurementID | null;
};

function takeResultsSnapshot(s: MeasurementState, session: ImageSession): ResultsSnapshot {
  return {
    sessionId: session.id,
    results: session.results,
    nextResultID: session.nextResultID,
    highlightedId: s.highlightedId,
  };
}

function activeOf(s: MeasurementState): ImageSession | undefined {
  return s.activeIndex >= 0 && s.activeIndex < s.sessions.length ? s.sessions[s.activeIndex] : undefined;
}

// helper interne : ajuste la session au canvas et efface le transform utilisateur
function fitSession(session: ImageSession, canvas: Size): void {
  const t = fitTransform(session.pixelSize, canvas);
  if (!t) return;
  session.transform = t;
  session.hasCustomTransform = false;
}

function makeSession(path: string, raster: RasterImage): ImageSession {
  return {
    id: genId('session'),
    name: baseName(path),
    imagePath: path,
    pixelSize: { w: raster.width, h: raster.height },
    transform: { ...IDENTITY_TRANSFORM },
    hasCustomTransform: false,
    results: [],
    nextResultID: 1,
  };
}

function sessionFromState(state: ProjectSessionState, raster: RasterImage): ImageSession {
  return {
    ...makeSession(state.imagePath, raster),
    name: state.name,
    calibration: state.calibration,
    transform: state.transform,
    hasCustomTransform: state.hasCustomTransform,
    results: state.results,
    nextResultID: state.nextResultID,
  };
}

function initialState(env: MeasurementEnv): MeasurementState {
  const prefs = readPreferences(env.prefs);
  return {
    sessions: [],
    activeIndex: -1,
    mode: 'idle',
    pendingPoints: [],
    hoverScreenPoint: null,
    highlightedId: null,
    roundingMode: prefs.roundingMode,
    continuousMeasure: prefs.continuousMeasure,
    edgeSnap: prefs.edgeSnap,
    canvasSize: { w: 0, h: 0 },
    statusText: STATUS.ready,
    scalePrompt: null,
    lastCalibration: null,
    revision: 0,
  };
}

/**
 * Crée le store de session de mesure.
 *
 * Le state ne contient que des données sérialisables ; les rasters décodés et
 * les buffers de luminance vivent à côté, indexés par id de session.
 * Les étapes d'annulation ne gardent que l'id de session (jamais la session).
 */
export function createMeasurementStore(env: MeasurementEnv) {
  const rasters = new Map<SessionID, RasterImage>();
  const lumas = new LumaCacheRegistry();
  const now = env.now ?? (() => new Date());

  const autosave = new AutosaveScheduler(() => persistAutosave(), { delayMs: env.autosaveDelayMs });

  function releaseAll() {
    rasters.clear();
    lumas.clear();
  }

  async function persistAutosave(): Promise<void> {
    const path = env.autosavePath;
    if (!path) return;
    const { sessions, activeIndex } = store.getState();
    const doc = buildProjectDocument(sessions, activeIndex, now());
    if (doc.sessions.length === 0) {
      await env.files.remove(path);
      return;
    }
    await env.files.writeText(path, serializeProjectDocument(doc));
  }

  const store = create<MeasurementStoreState>()((set, get) => {
    const mutate = (recipe: (draft: MeasurementState) => void) =>
      set(
        produce((draft: MeasurementStoreState) => {
          recipe(draft);
          draft.revision++;
        }),
      );

    const setStatus = (text: string) => mutate((draft) => {
      draft.statusText = text;
    });

    const registerUndo = (snap: ResultsSnapshot, label: string) => {
      env.undo.push({ label, apply: () => restoreSnapshot(snap, label) });
    };

    // Restaure un snapshot et enregistre l'inverse (annuler une annulation = rétablir)
    const restoreSnapshot = (snap: ResultsSnapshot, label: string) => {
      const state = get();
      const session = state.sessions.find((s) => s.id === snap.sessionId);
      if (!session) return;

      const reverse = takeResultsSnapshot(state, session);
      mutate((draft) => {
        const target = draft.sessions.find((s) => s.id === snap.sessionId);
        if (!target) return;
        target.results = snap.results;
        target.nextResultID = snap.nextResultID;
        draft.highlightedId = snap.highlightedId;
      });
      registerUndo(reverse, label);
      autosave.schedule();
    };

    return {
      ...initialState(env),

      // ───────────────────────────── Session ─────────────────────────────

      newProject: () => {
        releaseAll();
        mutate((draft) => {
          draft.sessions = [];
          draft.activeIndex = -1;
          draft.mode = 'idle';
          draft.pendingPoints = [];
          draft.hoverScreenPoint = null;
          draft.highlightedId = null;
          draft.scalePrompt = null;
          draft.lastCalibration = null;
          draft.statusText = STATUS.newProject;
        });
        autosave.schedule();
      },

      addImageFiles: async (paths) => {
        const loaded: Array<{ session: ImageSession; raster: RasterImage }> = [];
        for (const path of paths) {
          try {
            const raster = await env.images.decode(path);
            loaded.push({ session: makeSession(path, raster), raster });
          } catch (err) {
            console.warn(`[session] skipped ${path}:`, errorMessage(err));
          }
        }

        if (loaded.length === 0) {
          setStatus(STATUS.loadNoImages);
          return 0;
        }

        for (const { session, raster } of loaded) rasters.set(session.id, raster);
        mutate((draft) => {
          const firstNew = draft.sessions.length;
          draft.sessions.push(...loaded.map((l) => l.session));
          if (draft.activeIndex < 0) {
            draft.activeIndex = firstNew;
            fitSession(draft.sessions[firstNew], draft.canvasSize);
          }
          draft.statusText = statusMessages.imagesAdded(loaded.length);
        });
        autosave.schedule();
        return loaded.length;
      },

      addImageFolder: async (dir) => {
        let files: string[];
        try {
          files = await listImageFiles(dir, env.files);
        } catch (err) {
          console.warn('[session] folder listing failed:', errorMessage(err));
          setStatus(STATUS.folderUnreadable);
          return 0;
        }
        if (files.length === 0) {
          setStatus(STATUS.folderEmpty);
          return 0;
        }
        return get().addImageFiles(files);
      },

      switchSession: (delta) => {
        const { sessions, activeIndex } = get();
        const n = sessions.length;
        if (n === 0) return;
        const next = (((activeIndex + delta) % n) + n) % n;
        get().activateSession(next);
      },

      activateSession: (index) => {
        if (index < 0 || index >= get().sessions.length) return;
        mutate((draft) => {
          draft.pendingPoints = [];
          draft.highlightedId = null;
          draft.scalePrompt = null; // la distance saisie appartient à l'image quittée
          draft.activeIndex = index;
          const session = draft.sessions[index];
          if (!session.hasCustomTransform) fitSession(session, draft.canvasSize);
          draft.statusText = statusMessages.sessionSwitched(session.name);
        });
        autosave.schedule();
      },

      // ─────────────────────────────── Vue ───────────────────────────────

      updateCanvasSize: (size) => {
        if (size.w <= MIN_CANVAS_SIDE || size.h <= MIN_CANVAS_SIDE) return;
        const { canvasSize } = get();
        const unchanged =
          Math.abs(canvasSize.w - size.w) < CANVAS_RESIZE_EPS && Math.abs(canvasSize.h - size.h) < CANVAS_RESIZE_EPS;
        if (unchanged) return;

        mutate((draft) => {
          draft.canvasSize = { w: size.w, h: size.h };
          const session = activeOf(draft);
          if (session && !session.hasCustomTransform) fitSession(session, draft.canvasSize);
        });
      },

      resetView: () => {
        if (!activeOf(get())) return;
        mutate((draft) => {
          const session = activeOf(draft);
          if (!session) return;
          fitSession(session, draft.canvasSize);
          draft.statusText = STATUS.viewReset;
        });
        autosave.schedule();
      },

      pan: (delta) => {
        if (!activeOf(get())) return;
        mutate((draft) => {
          const session = activeOf(draft);
          if (!session) return;
          session.transform = panTransform(session.transform, delta);
          session.hasCustomTransform = true;
        });
        autosave.schedule();
      },

      zoom: (anchor, factor) => {
        if (!activeOf(get())) return;
        if (!Number.isFinite(factor) || factor <= 0) return;
        mutate((draft) => {
          const session = activeOf(draft);
          if (!session) return;
          session.transform = zoomTransform(session.transform, anchor, factor);
          session.hasCustomTransform = true;
        });
        autosave.schedule();
      },

      updateHover: (screenPoint) => {
        const current = get().hoverScreenPoint;
        if (current === screenPoint) return;
        if (current && screenPoint && current.x === screenPoint.x && current.y === screenPoint.y) return;
        set({ hoverScreenPoint: screenPoint });
      },

      // ──────────────────────────── Mesures ─────────────────────────────

      setMode: (next) => {
        mutate((draft) => {
          draft.mode = next;
          draft.pendingPoints = [];
          draft.scalePrompt = null;
        });
        autosave.schedule();
      },

      commitClick: (screenPoint) => {
        const state = get();
        const session = activeOf(state);
        if (!session) return;

        let p = clampPointToImage(imageFromScreen(screenPoint, session.transform), session.pixelSize);
        if (state.edgeSnap) {
          const luma = lumas.get(session.id, rasters.get(session.id));
          const snapped = snapToEdge(p, luma, session.transform.scale);
          if (snapped.moved) {
            incSnap('moved');
            env.onSnapFeedback?.();
          } else {
            incSnap('missed');
          }
          p = snapped.point;
        }
        get().commitImagePoint(p);
      },

      commitImagePoint: (p) => {
        const state = get();
        const session = activeOf(state);
        if (!session) return;

        const pending = [...state.pendingPoints, p];

        if (pending.length === 1) {
          mutate((draft) => {
            draft.pendingPoints = pending;
            if (draft.mode === 'idle') draft.mode = 'measure';
            draft.statusText = draft.mode === 'scale' ? STATUS.scaleSecondPoint : STATUS.measureSecondPoint;
          });
          return;
        }

        const [p1, p2] = pending;
        const px = distance(p1, p2);

        if (px <= SAME_POINT_EPSILON) {
          mutate((draft) => {
            draft.pendingPoints = [];
            draft.statusText = STATUS.samePoint;
          });
          return;
        }

        if (state.mode === 'scale') {
          mutate((draft) => {
            draft.pendingPoints = [];
            draft.scalePrompt = {
              pixels: px,
              suggestedUnit: session.calibration?.unit ?? draft.lastCalibration?.unit ?? DEFAULT_UNIT,
            };
            draft.statusText = STATUS.scaleEnterValue;
          });
          return;
        }

        const snap = takeResultsSnapshot(state, session);
        mutate((draft) => {
          const target = activeOf(draft);
          if (!target) return;

          // Calibration héritée uniquement au moment d'une mesure
          if (!target.calibration && draft.lastCalibration) target.calibration = { ...draft.lastCalibration };
          if (target.calibration) draft.lastCalibration = { ...target.calibration };

          const result: Measurement = {
            id: target.nextResultID,
            p1,
            p2,
            pixelLength: px,
            createdAt: isoTimestamp(now()),
          };
          target.nextResultID += 1;
          target.results.unshift(result);
          draft.highlightedId = result.id;

          draft.pendingPoints = draft.continuousMeasure ? [p2] : [];
          draft.statusText = statusMessages.measurementAdded(
            formattedLength(px, target.calibration, draft.roundingMode),
            draft.continuousMeasure,
          );
        });
        registerUndo(snap, UNDO_LABELS.add);
        autosave.schedule();
      },

      cancelAction: () => {
        const state = get();
        if (state.pendingPoints.length > 0) {
          mutate((draft) => {
            draft.pendingPoints = [];
            draft.statusText = STATUS.cancelPending;
          });
          return;
        }

        const session = activeOf(state);
        if (!session || session.results.length === 0) {
          setStatus(STATUS.nothingToCancel);
          return;
        }

        const snap = takeResultsSnapshot(state, session);
        const removedId = session.results[0].id;
        mutate((draft) => {
          const target = activeOf(draft);
          if (!target) return;
          target.results.shift();
          if (draft.highlightedId === removedId) draft.highlightedId = null;
          draft.statusText = statusMessages.measurementCancelled(removedId);
        });
        registerUndo(snap, UNDO_LABELS.cancelLast);
        autosave.schedule();
      },

      deleteMeasurement: (id) => {
        const state = get();
        const session = activeOf(state);
        if (!session || !session.results.some((r) => r.id === id)) return;

        const snap = takeResultsSnapshot(state, session);
        mutate((draft) => {
          const target = activeOf(draft);
          if (!target) return;
          target.results = target.results.filter((r) => r.id !== id);
          if (draft.highlightedId === id) draft.highlightedId = null;
        });
        registerUndo(snap, UNDO_LABELS.remove);
        autosave.schedule();
      },

      clearMeasurements: () => {
        const state = get();
        const session = activeOf(state);
        if (!session || session.results.length === 0) return;

        const snap = takeResultsSnapshot(state, session);
        mutate((draft) => {
          const target = activeOf(draft);
          if (!target) return;
          target.results = [];
          target.nextResultID = 1;
          draft.pendingPoints = [];
          draft.highlightedId = null;
          draft.statusText = STATUS.cleared;
        });
        registerUndo(snap, UNDO_LABELS.clear);
        autosave.schedule();
      },

      toggleHighlight: (id) =>
        mutate((draft) => {
          draft.highlightedId = draft.highlightedId === id ? null : id;
        }),

      // ───────────────────────────── Échelle ─────────────────────────────

      applyScaleInput: ({ unit, length }) => {
        const state = get();
        const prompt = state.scalePrompt;
        if (!prompt || prompt.pixels <= 0) {
          get().cancelScaleInput();
          return false;
        }

        const result = computeCalibration(prompt.pixels, length, unit);
        if (!result.ok) {
          setStatus(STATUS.scaleInvalid);
          return false;
        }
        if (!activeOf(state)) return false;

        const { calibration } = result;
        mutate((draft) => {
          const target = activeOf(draft);
          if (!target) return;
          target.calibration = { ...calibration };
          draft.lastCalibration = { ...calibration };
          draft.scalePrompt = null;
          draft.statusText = statusMessages.scaleConfirmed(formatScale(calibration, draft.roundingMode));
        });
        autosave.schedule();
        return true;
      },

      cancelScaleInput: () =>
        mutate((draft) => {
          draft.scalePrompt = null;
          draft.statusText = STATUS.scaleCancelled;
        }),

      // ─────────────────────────── Préférences ───────────────────────────

      toggleRounding: () => {
        const next: RoundingMode = get().roundingMode === 'round' ? 'ceil' : 'round';
        writePreference(env.prefs, 'roundingMode', next);
        mutate((draft) => {
          draft.roundingMode = next;
          draft.statusText = statusMessages.roundingChanged(next);
        });
        autosave.schedule();
      },

      setContinuousMeasure: (enabled) => {
        if (get().continuousMeasure === enabled) return;
        writePreference(env.prefs, 'continuousMeasure', enabled);
        mutate((draft) => {
          draft.continuousMeasure = enabled;
          draft.statusText = statusMessages.continuousChanged(enabled);
        });
        autosave.schedule();
      },

      setEdgeSnap: (enabled) => {
        if (get().edgeSnap === enabled) return;
        writePreference(env.prefs, 'edgeSnap', enabled);
        mutate((draft) => {
          draft.edgeSnap = enabled;
          draft.statusText = statusMessages.snapChanged(enabled);
        });
        autosave.schedule();
      },

      // ─────────────────────── Export et persistance ───────────────────────

      copyCurrentCSV: () => {
        const state = get();
        const session = activeOf(state);
        if (!session) return;
        env.clipboard.setText(buildCSV([session], state.roundingMode));
        setStatus(STATUS.csvCurrent);
      },

      copyAllCSV: () => {
        const state = get();
        const measured = state.sessions.filter((s) => s.results.length > 0);
        if (measured.length === 0) {
          setStatus(STATUS.nothingToCopy);
          return;
        }
        env.clipboard.setText(buildCSV(measured, state.roundingMode));
        setStatus(statusMessages.csvAll(measured.length));
      },

      saveProject: async (rawPath) => {
        const { sessions, activeIndex } = get();
        if (sessions.length === 0) {
          setStatus(STATUS.nothingToSave);
          return false;
        }
        const path = ensureProjectExtension(rawPath);
        try {
          const doc = buildProjectDocument(sessions, activeIndex, now());
          await env.files.writeText(path, serializeProjectDocument(doc));
          setStatus(statusMessages.projectSaved(baseName(path)));
          return true;
        } catch (err) {
          console.error('[project] save failed:', err);
          setStatus(STATUS.saveFailed);
          return false;
        }
      },

      loadProject: async (path, opts = {}) => {
        const silent = opts.asAutosaveRestore ?? false;
        const fail = (text: string) => {
          if (!silent) setStatus(text);
          return false;
        };

        let text: string;
        try {
          text = await env.files.readText(path);
        } catch (err) {
          if (!silent) console.error('[project] read failed:', err);
          return fail(STATUS.loadFailed);
        }

        const parsed = parseProjectDocument(text);
        if (!parsed.ok) {
          if (!silent) console.warn(`[project] ${path}: ${parsed.reason}`);
          return fail(STATUS.loadFailed);
        }

        const loaded: Array<{ session: ImageSession; raster: RasterImage }> = [];
        const missing: string[] = [];
        for (const state of parsed.document.sessions) {
          try {
            const raster = await env.images.decode(state.imagePath);
            loaded.push({ session: sessionFromState(state, raster), raster });
          } catch (err) {
            console.warn(`[project] missing image ${state.imagePath}:`, errorMessage(err));
            missing.push(baseName(state.imagePath));
          }
        }
        incProjectMissingImages(missing.length);

        if (loaded.length === 0) return fail(STATUS.loadMissingImages);

        releaseAll();
        for (const { session, raster } of loaded) rasters.set(session.id, raster);

        const activeIndex = Math.max(0, Math.min(parsed.document.activeIndex, loaded.length - 1));
        mutate((draft) => {
          draft.sessions = loaded.map((l) => l.session);
          draft.activeIndex = activeIndex;
          draft.mode = 'idle';
          draft.pendingPoints = [];
          draft.hoverScreenPoint = null;
          draft.highlightedId = null;
          draft.scalePrompt = null;

          const active = draft.sessions[activeIndex];
          if (!active.hasCustomTransform) fitSession(active, draft.canvasSize);

          const calibrated = draft.sessions.filter((s) => s.calibration);
          const fallback = calibrated[calibrated.length - 1]?.calibration;
          const last = active.calibration ?? fallback;
          draft.lastCalibration = last ? { ...last } : null;

          draft.statusText = silent
            ? statusMessages.autosaveRestored(loaded.length)
            : statusMessages.projectLoaded(loaded.length, missing.length);
        });
        autosave.schedule();
        return true;
      },

      restoreAutosave: async () => {
        const path = env.autosavePath;
        if (!path) return false;
        try {
          if (!(await env.files.exists(path))) return false;
          return await get().loadProject(path, { asAutosaveRestore: true });
        } catch (err) {
          // restauration best-effort : pas de message utilisateur
          console.warn('[autosave] restore skipped:', errorMessage(err));
          return false;
        }
      },

      flushAutosave: () => autosave.flush(),

      exportAnnotatedCurrent: async (path) => {
        const state = get();
        const session = activeOf(state);
        if (!session) return false;
        if (session.results.length === 0) {
          setStatus(STATUS.nothingToSave);
          return false;
        }
        const raster = rasters.get(session.id);
        if (!env.renderer || !raster) {
          setStatus(STATUS.exportUnavailable);
          return false;
        }
        try {
          const bytes = await env.renderer.renderPng(raster, buildAnnotationOverlay(session, state.roundingMode));
          await env.files.writeBytes(path, bytes);
          setStatus(statusMessages.imageExported(baseName(path)));
          return true;
        } catch (err) {
          console.error('[export] annotated image failed:', err);
          setStatus(STATUS.exportFailed);
          return false;
        }
      },

      exportAnnotatedAll: async (dir) => {
        const state = get();
        const measured = state.sessions.filter((s) => s.results.length > 0);
        if (measured.length === 0) {
          setStatus(STATUS.nothingToSave);
          return 0;
        }
        const renderer = env.renderer;
        if (!renderer) {
          setStatus(STATUS.exportUnavailable);
          return 0;
        }

        const used = new Set<string>();
        let saved = 0;
        for (const session of measured) {
          const raster = rasters.get(session.id);
          if (!raster) continue;
          try {
            const bytes = await renderer.renderPng(raster, buildAnnotationOverlay(session, state.roundingMode));
            const name = await uniqueFileName(measuredExportName(session.name), used, (n) =>
              env.files.exists(join(dir, n)),
            );
            await env.files.writeBytes(join(dir, name), bytes);
            saved++;
          } catch (err) {
            console.warn(`[export] ${session.name} skipped:`, errorMessage(err));
          }
        }
        setStatus(statusMessages.imagesExported(saved));
        return saved;
      },

      dispose: () => {
        autosave.dispose();
        releaseAll();
      },
    };
  });

  return store;
}

export type MeasurementStore = ReturnType<typeof createMeasurementStore>;
