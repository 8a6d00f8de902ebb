// Runtime metrics context for counters
type Ctx = { [k: string]: number };
let ctx: Ctx = Object.create(null);

export function inc(key: string, by = 1) {
  ctx[key] = (ctx[key] ?? 0) + by;
}

export function getAll(): Record<string, number> {
  return { ...ctx };
}

export function resetMetrics() {
  ctx = Object.create(null);
}

// Helpers for autosave tracking
export function incAutosaveWrite(ok: boolean) {
  inc(ok ? 'autosave_write_total' : 'autosave_write_failed_total');
}

export function incAutosaveCoalesced() {
  inc('autosave_coalesced_total');
}

// Helpers for edge snap tracking
export function incSnap(outcome: 'moved' | 'missed') {
  inc(outcome === 'moved' ? 'snap_moved_total' : 'snap_missed_total');
}

export function incProjectMissingImages(count: number) {
  if (count > 0) inc('project_missing_image_total', count);
}
