/**
 * Single-slot handoff between a background producer and the main loop.
 * A new value overwrites an unread one; only the latest result matters.
 */
export class ResultSlot<T> {
  private value: T | undefined;
  private filled = false;

  put(value: T): void {
    this.value = value;
    this.filled = true;
  }

  /**
   * Drain the slot without waiting. Returns undefined when empty.
   */
  take(): T | undefined {
    if (!this.filled) {
      return undefined;
    }
    const value = this.value;
    this.value = undefined;
    this.filled = false;
    return value;
  }
}
