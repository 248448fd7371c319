import { Margins } from '../models/slice.types';

export const MAX_UNDO = 50;

/**
 * Linear undo/redo over immutable margin snapshots.
 * Lives with the editing controller; the slicing services know nothing of it.
 */
export class MarginHistory {
  private undoStack: Readonly<Margins>[] = [];
  private redoStack: Readonly<Margins>[] = [];

  constructor(private readonly limit: number = MAX_UNDO) {}

  /**
   * Record the state about to be replaced. Clears the redo branch.
   */
  push(current: Margins): void {
    this.undoStack.push(Object.freeze({ ...current }));
    if (this.undoStack.length > this.limit) {
      this.undoStack.shift();
    }
    this.redoStack = [];
  }

  /**
   * Snapshot to restore, or undefined when there is nothing to undo
   */
  undo(current: Margins): Readonly<Margins> | undefined {
    const previous = this.undoStack.pop();
    if (!previous) return undefined;
    this.redoStack.push(Object.freeze({ ...current }));
    return previous;
  }

  redo(current: Margins): Readonly<Margins> | undefined {
    const next = this.redoStack.pop();
    if (!next) return undefined;
    this.undoStack.push(Object.freeze({ ...current }));
    return next;
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }
}
