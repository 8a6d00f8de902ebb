import { HISTORY_LIMIT } from '@/constants/measurement';

/**
 * Étape d'annulation : `apply` restaure l'état capturé avant la mutation.
 * Pendant `apply`, l'étape inverse doit être enregistrée via `push`
 * (annuler une annulation = rétablir).
 */
export type UndoEntry = {
  label: string;
  apply: () => void;
};

/** Capacité minimale attendue d'un gestionnaire d'annulation hôte */
export interface UndoSink {
  push(entry: UndoEntry): void;
}

type Phase = 'idle' | 'undoing' | 'redoing';

/**
 * Pile d'annulation unique (LIFO) avec limite FIFO.
 * - push normal : va dans past, vide future
 * - push pendant undo : va dans future
 * - push pendant redo : va dans past (future conservé)
 */
export class UndoStack implements UndoSink {
  private past: UndoEntry[] = [];
  private future: UndoEntry[] = [];
  private phase: Phase = 'idle';

  constructor(private readonly limit = HISTORY_LIMIT) {}

  push(entry: UndoEntry): void {
    if (this.phase === 'undoing') {
      this.future.push(entry);
      return;
    }
    this.past.push(entry);
    if (this.past.length > this.limit) {
      this.past.shift(); // FIFO drop
    }
    if (this.phase === 'idle') {
      this.future = []; // Clear future on new action
    }
  }

  get canUndo(): boolean {
    return this.past.length > 0;
  }

  get canRedo(): boolean {
    return this.future.length > 0;
  }

  get undoLabel(): string | undefined {
    return this.past[this.past.length - 1]?.label;
  }

  get redoLabel(): string | undefined {
    return this.future[this.future.length - 1]?.label;
  }

  undo(): boolean {
    const entry = this.past.pop();
    if (!entry) return false;
    this.run('undoing', entry);
    return true;
  }

  redo(): boolean {
    const entry = this.future.pop();
    if (!entry) return false;
    this.run('redoing', entry);
    return true;
  }

  clear(): void {
    this.past = [];
    this.future = [];
  }

  private run(phase: Phase, entry: UndoEntry): void {
    this.phase = phase;
    try {
      entry.apply();
    } catch (err) {
      console.error(`[history] ${entry.label} failed:`, err);
    } finally {
      this.phase = 'idle';
    }
  }
}
