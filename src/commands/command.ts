/**
 * Command interface for the undo/redo system.
 *
 * Concrete implementations capture a snapshot of the before-state at
 * creation time. `execute()` applies the edit; `undo()` restores the
 * snapshot. `label` names the edit in workspace info and backup file names.
 */
export interface Command {
  readonly label: string;
  execute(): void;
  undo(): void;
}

/**
 * Manages undo/redo stacks of Command objects.
 *
 * `push()` executes the command and adds it to the undo stack.
 * New pushes clear the redo stack (branching invalidates the redo path).
 * Stack depth is capped at `maxDepth`; the oldest commands are dropped.
 */
export class CommandHistory {
  private _undoStack: Command[] = [];
  private _redoStack: Command[] = [];
  private readonly _maxDepth: number;

  constructor(maxDepth: number = 100) {
    this._maxDepth = maxDepth;
  }

  push(cmd: Command): void {
    cmd.execute();
    this._undoStack.push(cmd);
    this._redoStack = [];
    if (this._undoStack.length > this._maxDepth) {
      this._undoStack.shift();
    }
  }

  /** Undoes the most recent command and returns it. */
  undo(): Command {
    const cmd = this._undoStack.pop();
    if (cmd === undefined) {
      throw new Error('Nothing to undo.');
    }
    cmd.undo();
    this._redoStack.push(cmd);
    return cmd;
  }

  /** Re-applies the most recently undone command and returns it. */
  redo(): Command {
    const cmd = this._redoStack.pop();
    if (cmd === undefined) {
      throw new Error('Nothing to redo.');
    }
    cmd.execute();
    this._undoStack.push(cmd);
    return cmd;
  }

  get undoDepth(): number {
    return this._undoStack.length;
  }

  get redoDepth(): number {
    return this._redoStack.length;
  }

  /** Labels of the undoable commands, oldest first. */
  get labels(): string[] {
    return this._undoStack.map((cmd) => cmd.label);
  }

  clear(): void {
    this._undoStack = [];
    this._redoStack = [];
  }
}
