/**
 * Block Counter
 *
 * Reference count of open full-screen UIs (loading screens, shops, modals)
 * that suppress interruption admission. Invariant: count >= 0.
 */

export class BlockCounter {
  private count = 0;

  get value(): number {
    return this.count;
  }

  get isBlocked(): boolean {
    return this.count > 0;
  }

  /** Returns the new count. */
  block(): number {
    this.count += 1;
    return this.count;
  }

  /**
   * Returns the new count. Clamped at zero: an unmatched unblock is tolerated.
   */
  unblock(): number {
    if (this.count > 0) {
      this.count -= 1;
    }
    return this.count;
  }

  /**
   * Last-resort recovery for mismatched block/unblock pairs.
   *
   * @returns The count before the reset
   */
  forceReset(): number {
    const previous = this.count;
    this.count = 0;
    return previous;
  }
}
