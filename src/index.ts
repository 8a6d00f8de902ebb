export * from './types/measurement';
export * from './constants/measurement';
export * from './core/geo/transform';
export { buildLumaBuffer, sampleLuma, LumaCacheRegistry, type LumaBuffer } from './core/snap/luma';
export * from './core/snap/edgeSnap';
export * from './lib/format/sigfig';
export * from './lib/calibration';
export * from './lib/errors';
export { getAll as getMetrics, resetMetrics } from './lib/metrics';
export * from './lib/history/undoStack';
export * from './lib/autosave';
export * from './lib/storage/keyValue';
export * from './lib/storage/fileSystem';
export * from './lib/prefs';
export * from './lib/files/imageFiles';
export * from './lib/io/schema';
export * from './lib/io/project';
export * from './lib/io/csv';
export * from './lib/export/annotated';
export * from './state/env';
export * from './state/status';
export * from './state/selectors';
export * from './state/useMeasurementStore';
