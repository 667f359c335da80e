/** Entry stored in {@link MinHeap}; `priority` orders, `value` rides along. */
export interface HeapEntry<T> {
  readonly priority: number;
  readonly value: T;
}

interface SequencedEntry<T> extends HeapEntry<T> {
  readonly sequence: number;
}

/**
 * Binary min-heap. Equal priorities pop in insertion order, so runs over the
 * same input always finalise vertices in the same order.
 */
export class MinHeap<T> {
  private readonly data: SequencedEntry<T>[] = [];
  private sequence = 0;

  get size(): number {
    return this.data.length;
  }

  enqueue(priority: number, value: T): void {
    this.data.push({ priority, value, sequence: this.sequence });
    this.sequence += 1;
    this.bubbleUp(this.data.length - 1);
  }

  dequeue(): HeapEntry<T> | undefined {
    const last = this.data.pop();
    if (last === undefined) {
      return undefined;
    }
    let min = last;
    if (this.data.length > 0) {
      min = this.data[0];
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return { priority: min.priority, value: min.value };
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  private less(left: number, right: number): boolean {
    const a = this.data[left];
    const b = this.data[right];
    return a.priority < b.priority || (a.priority === b.priority && a.sequence < b.sequence);
  }

  private swap(left: number, right: number): void {
    [this.data[left], this.data[right]] = [this.data[right], this.data[left]];
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (!this.less(index, parent)) {
        break;
      }
      this.swap(parent, index);
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.less(left, smallest)) {
        smallest = left;
      }
      if (right < length && this.less(right, smallest)) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      this.swap(index, smallest);
      index = smallest;
    }
  }
}
