import type { Row } from '../types.js';

export interface VisibleRange {
  start: number;
  /** Exclusive */
  end: number;
}

/**
 * Table rows plus a single selection cursor with circular navigation.
 * The cursor is undefined until the first navigation; with no rows navigation does nothing.
 */
export class SelectableTable {
  private cursor: number | undefined = undefined;
  private offset = 0;

  constructor(private readonly items: Row[]) {}

  get rows(): readonly Row[] {
    return this.items;
  }

  get selected(): number | undefined {
    return this.cursor;
  }

  get length(): number {
    return this.items.length;
  }

  next(): void {
    const len = this.items.length;
    if (len === 0) return;
    this.cursor = this.cursor === undefined ? 0 : (this.cursor + 1) % len;
  }

  previous(): void {
    const len = this.items.length;
    if (len === 0) return;
    this.cursor = this.cursor === undefined ? 0 : (this.cursor - 1 + len) % len;
  }

  select(index: number | undefined): void {
    if (index === undefined || this.items.length === 0) {
      this.cursor = undefined;
      return;
    }
    this.cursor = Math.min(Math.max(0, Math.trunc(index)), this.items.length - 1);
  }

  /**
   * Rows to draw in `height` lines. Moves the viewport only as far as needed to keep the selection on screen.
   */
  visibleRange(height: number): VisibleRange {
    const len = this.items.length;
    const size = Math.max(0, Math.floor(height));
    if (size === 0 || len === 0) {
      return { start: 0, end: 0 };
    }

    if (this.cursor !== undefined) {
      if (this.cursor < this.offset) {
        this.offset = this.cursor;
      } else if (this.cursor >= this.offset + size) {
        this.offset = this.cursor - size + 1;
      }
    }
    this.offset = Math.min(this.offset, Math.max(0, len - size));

    return { start: this.offset, end: Math.min(len, this.offset + size) };
  }
}
