/**
 * Tape
 *
 * Growable byte memory. Starts with one zero cell, grows to the right on
 * demand and never shrinks. Cell values wrap modulo 256.
 */

const INITIAL_CAPACITY = 1024;

export class Tape {
  private cells: Uint8Array;
  private used = 1;

  /** @param limit - Maximum length in cells (undefined = unlimited) */
  constructor(private readonly limit: number | undefined) {
    this.cells = new Uint8Array(Math.min(INITIAL_CAPACITY, limit ?? Infinity));
  }

  /** Number of cells reached so far */
  get length(): number {
    return this.used;
  }

  get(index: number): number {
    return this.cells[index] ?? 0;
  }

  set(index: number, value: number): void {
    this.cells[index] = value & 0xff;
  }

  /**
   * Make `index` addressable, appending zero cells as needed.
   * Returns false when that would take the tape past its limit.
   */
  reach(index: number): boolean {
    if (index < this.used) {
      return true;
    }
    if (this.limit !== undefined && index >= this.limit) {
      return false;
    }
    if (index >= this.cells.length) {
      this.grow(index + 1);
    }
    this.used = index + 1;
    return true;
  }

  /** Copy of the cells reached so far */
  snapshot(): Uint8Array {
    return this.cells.slice(0, this.used);
  }

  private grow(minimum: number): void {
    let capacity = Math.max(this.cells.length * 2, minimum);
    if (this.limit !== undefined) {
      capacity = Math.min(capacity, this.limit);
    }
    const next = new Uint8Array(capacity);
    next.set(this.cells);
    this.cells = next;
  }
}
