/**
 * Autosave différé (debounce) basé sur un compteur de révision.
 *
 * schedule() incrémente la révision et arme un timer s'il n'y en a pas.
 * À l'échéance : si la révision a bougé pendant l'attente, on réarme
 * (les rafales d'éditions donnent une seule écriture), sinon on persiste.
 */

import { AUTOSAVE_DEBOUNCE_MS } from '@/constants/measurement';
import { incAutosaveCoalesced, incAutosaveWrite } from '@/lib/metrics';

export type PersistFn = () => Promise<void> | void;

export type AutosaveOptions = {
  delayMs?: number;
};

export class AutosaveScheduler {
  private revision = 0;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private readonly delayMs: number;
  private disposed = false;

  constructor(
    private readonly persist: PersistFn,
    opts: AutosaveOptions = {},
  ) {
    this.delayMs = opts.delayMs ?? AUTOSAVE_DEBOUNCE_MS;
  }

  get pending(): boolean {
    return this.timer !== undefined;
  }

  get currentRevision(): number {
    return this.revision;
  }

  schedule(): void {
    if (this.disposed) return;
    this.revision++;
    if (this.timer !== undefined) return;
    this.arm(this.revision);
  }

  /** Écrit immédiatement si une sauvegarde est en attente */
  async flush(): Promise<void> {
    if (this.timer === undefined) return;
    clearTimeout(this.timer);
    this.timer = undefined;
    await this.write();
  }

  dispose(): void {
    this.disposed = true;
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private arm(seen: number): void {
    this.timer = setTimeout(() => {
      if (this.revision !== seen) {
        incAutosaveCoalesced();
        this.arm(this.revision);
        return;
      }
      this.timer = undefined;
      void this.write();
    }, this.delayMs);
  }

  private async write(): Promise<void> {
    try {
      await this.persist();
      incAutosaveWrite(true);
    } catch (err) {
      incAutosaveWrite(false);
      console.error('[autosave] write failed:', err);
    }
  }
}
