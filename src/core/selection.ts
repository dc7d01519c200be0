import { InvalidDefault } from "./errors.js";

/**
 * Cursor/commit/cancel state of a single-choice list prompt.
 * Rendering lives in the presenter; this class never touches a terminal.
 */
export class SelectionFlow {
  readonly options: readonly string[];
  private focus: number;
  private isCommitted = false;
  private isCancelled = false;

  constructor(options: readonly string[], defaultIndex = 0) {
    if (options.length === 0) {
      throw new InvalidDefault("options should not be an empty list");
    }
    if (!Number.isInteger(defaultIndex) || defaultIndex < 0 || defaultIndex >= options.length) {
      throw new InvalidDefault("default index should be less than the length of options");
    }
    this.options = options;
    this.focus = defaultIndex;
  }

  get focusIndex(): number {
    return this.focus;
  }

  get committed(): boolean {
    return this.isCommitted;
  }

  get cancelled(): boolean {
    return this.isCancelled;
  }

  get settled(): boolean {
    return this.isCommitted || this.isCancelled;
  }

  /** Move the focus by delta, wrapping at both ends */
  move(delta: number): number {
    if (this.settled) return this.focus;
    const count = this.options.length;
    this.focus = (((this.focus + delta) % count) + count) % count;
    return this.focus;
  }

  confirm(): number | null {
    if (this.isCancelled) return null;
    this.isCommitted = true;
    return this.focus;
  }

  cancel(): null {
    if (!this.isCommitted) this.isCancelled = true;
    return null;
  }
}
