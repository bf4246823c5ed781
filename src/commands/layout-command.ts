import { type Command } from './command.js';
import { type LayoutClass } from '../classes/layout.js';
import { type JsonObject } from '../types/json.js';

/**
 * Snapshot command around one layout edit.
 *
 * The first `execute()` runs the edit and keeps its result and the
 * after-state; later executes (redo) restore that after-state instead of
 * re-running the edit.
 */
export class LayoutCommand<R> implements Command {
  private readonly before: JsonObject;
  private after: JsonObject | null = null;
  private _result: R | null = null;

  constructor(
    private layout: LayoutClass,
    public readonly label: string,
    private edit: (layout: LayoutClass) => R,
  ) {
    this.before = layout.toJSON();
  }

  /** The edit's change record, available after the first execute. */
  get result(): R {
    if (this._result === null) {
      throw new Error(`Command '${this.label}' has not been executed.`);
    }
    return this._result;
  }

  execute(): void {
    if (this.after !== null) {
      this.layout._restore(this.after);
      return;
    }
    this._result = this.edit(this.layout);
    this.after = this.layout.toJSON();
  }

  undo(): void {
    this.layout._restore(this.before);
  }
}
