// ============================================
// Event Queue
// Single-frame buffer: writers push during the frame, one reader drains it
// ============================================

export class EventQueue<T> {
  private items: T[] = [];

  push(event: T): void {
    this.items.push(event);
  }

  /**
   * Take every queued event in arrival order and empty the queue.
   */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  get length(): number {
    return this.items.length;
  }
}
