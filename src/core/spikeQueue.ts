import type { NeuronId } from "./topology";

export type SpikeEvent = {
  readonly target: NeuronId;
  readonly time: number;
  readonly magnitude: number;
  /** Insertion counter; breaks ties between equal times. */
  readonly sequence: number;
};

/**
 * Pending spike deliveries ordered by `(time, sequence)` in a binary
 * min-heap, so events due at the same time come out in the order they were
 * pushed.
 */
export class SpikeQueue {
  private readonly heap: SpikeEvent[] = [];
  private nextSequence = 0;
  private rejected = 0;

  /** `capacity` defaults to unbounded. */
  constructor(private readonly capacity = Number.POSITIVE_INFINITY) {}

  get size(): number {
    return this.heap.length;
  }

  /** Events turned away because the queue was full. */
  get dropped(): number {
    return this.rejected;
  }

  /** Returns false, and counts the event as dropped, when the queue is full. */
  push(target: NeuronId, time: number, magnitude: number): boolean {
    if (this.heap.length >= this.capacity) {
      this.rejected += 1;
      return false;
    }
    const event: SpikeEvent = { target, time, magnitude, sequence: this.nextSequence };
    this.nextSequence += 1;
    this.heap.push(event);
    this.siftUp(this.heap.length - 1);
    return true;
  }

  peek(): SpikeEvent | undefined {
    return this.heap[0];
  }

  /** Removes and returns every event with `time <= now`, earliest first. */
  popDue(now: number): SpikeEvent[] {
    const due: SpikeEvent[] = [];
    while (this.heap.length > 0 && this.heap[0].time <= now) {
      due.push(this.popMin());
    }
    return due;
  }

  clear(): void {
    this.heap.length = 0;
    this.nextSequence = 0;
    this.rejected = 0;
  }

  private popMin(): SpikeEvent {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private less(a: SpikeEvent, b: SpikeEvent): boolean {
    return a.time < b.time || (a.time === b.time && a.sequence < b.sequence);
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(this.heap[i], this.heap[parent])) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const n = this.heap.length;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.less(this.heap[left], this.heap[smallest])) smallest = left;
      if (right < n && this.less(this.heap[right], this.heap[smallest])) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = tmp;
  }
}
