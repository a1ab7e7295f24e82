const COMPACT_THRESHOLD = 64;

/**
 * Array-backed FIFO for pending and settled tasks. `shift` clears the slot it
 * reads, so a dequeued task closure and its caller state are not retained.
 */
export class FifoQueue<T> {
  private slots: (T | undefined)[] = [];
  private head = 0;

  get length(): number {
    return this.slots.length - this.head;
  }

  push(item: T): void {
    this.slots.push(item);
  }

  shift(): T | undefined {
    if (this.head >= this.slots.length) return undefined;

    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head += 1;

    if (this.head === this.slots.length) {
      this.slots = [];
      this.head = 0;
    } else if (
      this.head >= COMPACT_THRESHOLD &&
      this.head * 2 >= this.slots.length
    ) {
      this.slots = this.slots.slice(this.head);
      this.head = 0;
    }

    return item;
  }
}
