import { describe, it, expect, vi } from 'vitest';
import { UndoStack, type UndoSink } from './undoStack';

// Compteur annulable : chaque étape réenregistre son inverse, comme le store
function counter(sink: UndoSink) {
  let value = 0;
  const register = (previous: number) => {
    sink.push({
      label: 'set',
      apply: () => {
        const current = value;
        value = previous;
        register(current);
      },
    });
  };
  return {
    get value() {
      return value;
    },
    set(next: number) {
      register(value);
      value = next;
    },
  };
}

describe('UndoStack', () => {
  it('undo then redo restores each value', () => {
    const stack = new UndoStack();
    const c = counter(stack);
    c.set(1);
    c.set(2);

    expect(stack.undo()).toBe(true);
    expect(c.value).toBe(1);
    expect(stack.canRedo).toBe(true);

    expect(stack.undo()).toBe(true);
    expect(c.value).toBe(0);
    expect(stack.canUndo).toBe(false);

    expect(stack.redo()).toBe(true);
    expect(c.value).toBe(1);
    expect(stack.redo()).toBe(true);
    expect(c.value).toBe(2);
    expect(stack.canRedo).toBe(false);
    expect(stack.canUndo).toBe(true);
  });

  it('a new action clears the redo branch', () => {
    const stack = new UndoStack();
    const c = counter(stack);
    c.set(1);
    stack.undo();
    c.set(5);
    expect(stack.canRedo).toBe(false);
    expect(stack.redo()).toBe(false);
  });

  it('drops the oldest entries beyond the limit', () => {
    const stack = new UndoStack(2);
    const c = counter(stack);
    c.set(1);
    c.set(2);
    c.set(3);
    stack.undo();
    stack.undo();
    expect(c.value).toBe(1);
    expect(stack.undo()).toBe(false);
  });

  it('exposes labels', () => {
    const stack = new UndoStack();
    stack.push({ label: 'Ajout', apply: () => {} });
    expect(stack.undoLabel).toBe('Ajout');
    expect(stack.redoLabel).toBeUndefined();
  });

  it('logs a failing step and stays usable', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const stack = new UndoStack();
    stack.push({
      label: 'broken',
      apply: () => {
        throw new Error('boom');
      },
    });
    expect(stack.undo()).toBe(true);
    expect(spy).toHaveBeenCalledWith('[history] broken failed:', expect.any(Error));

    const c = counter(stack);
    c.set(4);
    stack.undo();
    expect(c.value).toBe(0);
    spy.mockRestore();
  });
});
